import "express-session";

declare module "express-session" {
  interface SessionData {
    // Flash notes live under a configurable key
    [key: string]: unknown;
  }
}

declare global {
  namespace Express {
    interface Request {
      /** Queues a flash note; keyed queue styles take the key first. */
      flash: (...args: unknown[]) => unknown;
      flashFlush: (...keys: string[]) => unknown;
    }
  }
}

export {};
