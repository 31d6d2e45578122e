import { DequeueStyle } from "../validators/flashSettings";
import { FlashSession, isFlashMapping } from "./session";

export type RenderContext = Record<string, unknown>;
export type FlashAccessor = () => unknown;

export type RenderPreparer = (
  session: FlashSession,
  target: { tokenName: string; sessionKey: string },
  context: RenderContext
) => void;

/** Runs `resolve` on the first call only and replays its result afterwards. */
export const deferred = (resolve: () => unknown): FlashAccessor => {
  let resolved = false;
  let cached: unknown;
  return () => {
    if (!resolved) {
      cached = resolve();
      resolved = true;
    }
    return cached;
  };
};

export const createRenderPreparer = (style: DequeueStyle): RenderPreparer => {
  switch (style) {
    case "never":
      return (session, { tokenName, sessionKey }, context) => {
        context[tokenName] = session.get(sessionKey);
      };
    case "always":
      return (session, { tokenName, sessionKey }, context) => {
        context[tokenName] = session.get(sessionKey);
        session.set(sessionKey, undefined);
      };
    case "when_used":
      return (session, { tokenName, sessionKey }, context) => {
        context[tokenName] = deferred(() => {
          const flash = session.get(sessionKey);
          session.set(sessionKey, undefined);
          return flash;
        });
      };
    case "by_key":
      return (session, { tokenName, sessionKey }, context) => {
        const stored = session.get(sessionKey);
        const flash: Record<string, unknown> = isFlashMapping(stored) ? { ...stored } : {};
        const accessors: Record<string, FlashAccessor> = {};
        for (const name of Object.keys(flash)) {
          accessors[name] = deferred(() => {
            // Notes queued after this render started stay in the session
            const current = session.get(sessionKey);
            if (isFlashMapping(current)) {
              const remaining = { ...current };
              delete remaining[name];
              session.set(sessionKey, Object.keys(remaining).length ? remaining : undefined);
            }
            return flash[name];
          });
        }
        context[tokenName] = accessors;
      };
  }
};
