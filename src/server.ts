import express from "express";
import path from "path";
import helmet from "helmet";
import session from "express-session";
import FileStoreFactory from "session-file-store";
import cookieParser from "cookie-parser";

import { env, isDev } from "./config/env";
import { logger } from "./lib/logger";
import { createViewEnvironment } from "./lib/views";
import { requestLogger } from "./middleware/requestLogger";
import { flashNote } from "./middleware/flash";
import { errorHandler } from "./middleware/errorHandler";
import { router as homeRouter } from "./routes/home";

const app = express();
const FileStore = FileStoreFactory(session);

if (env.trustProxy) {
  app.set("trust proxy", 1);
}

const sessionMiddleware = session({
  store: new FileStore({
    path: path.join(process.cwd(), ".sessions"),
    ttl: 60 * 60 * 24
  }),
  secret: env.sessionSecret,
  resave: false,
  saveUninitialized: false,
  cookie: {
    httpOnly: true,
    sameSite: "lax",
    secure: !isDev,
    maxAge: 1000 * 60 * 60 * 2
  }
});

const viewsPath = path.join(process.cwd(), "views");
createViewEnvironment(viewsPath, { app, noCache: isDev });
app.set("view engine", "njk");
app.set("views", viewsPath);

app.use(helmet());
app.use(cookieParser());
app.use(express.urlencoded({ extended: true }));
app.use(express.json());
app.use(requestLogger);
app.use(sessionMiddleware);

// Throws on invalid FLASH_* settings before the app listens
app.use(flashNote(env.flash));

app.use("/", homeRouter);

app.get("/healthz", (_req, res) => {
  res.json({ status: "ok", time: new Date().toISOString() });
});

app.use((_req, res) => {
  res.status(404).render("404", { title: "Not Found" });
});

app.use(errorHandler);

if (require.main === module) {
  app.listen(env.port, env.host, () => {
    logger.info(`Server listening on http://${env.host}:${env.port}`);
  });
}

export { app };
