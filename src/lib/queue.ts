import { QueueStyle } from "../validators/flashSettings";
import { ArgumentReducer } from "./arguments";
import { FlashSession, isFlashMapping } from "./session";

export type FlashWriter = (session: FlashSession, sessionKey: string, args: unknown[]) => unknown;

const readList = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const readMapping = (value: unknown): Record<string, unknown> =>
  isFlashMapping(value) ? value : {};

export const createFlashWriter = (style: QueueStyle, reduce: ArgumentReducer): FlashWriter => {
  switch (style) {
    case "single":
      return (session, sessionKey, args) => {
        const payload = reduce(args);
        session.set(sessionKey, payload);
        return payload;
      };
    case "multiple":
      return (session, sessionKey, args) => {
        const payload = reduce(args);
        session.set(sessionKey, [...readList(session.get(sessionKey)), payload]);
        return payload;
      };
    case "key_single":
      return (session, sessionKey, [key, ...rest]) => {
        const payload = reduce(rest);
        session.set(sessionKey, { ...readMapping(session.get(sessionKey)), [String(key)]: payload });
        return payload;
      };
    case "key_multiple":
      return (session, sessionKey, [key, ...rest]) => {
        const payload = reduce(rest);
        const flash = readMapping(session.get(sessionKey));
        const name = String(key);
        session.set(sessionKey, { ...flash, [name]: [...readList(flash[name]), payload] });
        return payload;
      };
  }
};
