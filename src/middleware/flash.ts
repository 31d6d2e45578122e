import { NextFunction, Request, Response } from "express";
import { createFlashPolicy, FlashStore } from "../lib/flash";
import { AppLogger, logger as defaultLogger } from "../lib/logger";
import { expressSession } from "../lib/session";
import { FlashSettingsInput, parseFlashSettings } from "../validators/flashSettings";

export interface FlashNoteOptions {
  logger?: AppLogger;
}

/** The parts of an Express request the middleware touches. */
export interface FlashRequest {
  session?: Record<string, unknown>;
  flash?: Request["flash"];
  flashFlush?: Request["flashFlush"];
}

export interface FlashResponse {
  locals: Record<string, unknown>;
  render: Response["render"];
}

/**
 * Mounts flash notes on an Express app. Settings are validated here, so a bad
 * configuration throws a ConfigurationError before the app serves anything.
 * Must be registered after express-session.
 */
export const flashNote = (
  settings: FlashSettingsInput | Record<string, unknown> = {},
  options: FlashNoteOptions = {}
) => {
  const policy = createFlashPolicy(parseFlashSettings(settings));
  const logger = options.logger ?? defaultLogger;

  return (req: FlashRequest, res: FlashResponse, next: NextFunction) => {
    if (!req.session) {
      next(new Error("Flash notes require session middleware to be registered before them."));
      return;
    }

    const store = new FlashStore(policy, expressSession(req.session), logger);
    req.flash = (...args) => store.enqueue(...args);
    req.flashFlush = (...keys) => store.flush(...keys);

    const render = res.render;
    res.render = (...args: unknown[]) => {
      store.prepareForRender(res.locals);
      Reflect.apply(render, res, args);
    };
    next();
  };
};
