/** The slice of a session the flash store needs. Setting `undefined` removes the entry. */
export interface FlashSession {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
}

/** Adapts an express-session object, whose entries are saved when the response ends. */
export const expressSession = (session: Record<string, unknown>): FlashSession => {
  return {
    get: (key) => session[key],
    set: (key, value) => {
      if (value === undefined) {
        delete session[key];
      } else {
        session[key] = value;
      }
    }
  };
};

export const isFlashMapping = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
