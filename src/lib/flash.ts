import { FlashSettings, isKeyedQueue } from "../validators/flashSettings";
import { createArgumentReducer } from "./arguments";
import { createRenderPreparer, RenderContext, RenderPreparer } from "./dequeue";
import { AppLogger, logger as defaultLogger } from "./logger";
import { createFlashWriter, FlashWriter } from "./queue";
import { FlashSession, isFlashMapping } from "./session";

/** Strategies resolved once from validated settings and shared by every request. */
export interface FlashPolicy {
  settings: FlashSettings;
  write: FlashWriter;
  prepare: RenderPreparer;
}

export const createFlashPolicy = (settings: FlashSettings): FlashPolicy => ({
  settings,
  write: createFlashWriter(
    settings.queueStyle,
    createArgumentReducer(settings.argumentStyle, settings.joinSeparator)
  ),
  prepare: createRenderPreparer(settings.dequeueStyle)
});

/**
 * Request-scoped view of the flash notes kept in one session. Holds no state
 * of its own: every call reads and writes through the session.
 */
export class FlashStore {
  constructor(
    private readonly policy: FlashPolicy,
    private readonly session: FlashSession,
    private readonly logger: AppLogger = defaultLogger
  ) {}

  /**
   * Queues a note and returns the stored payload. With the `key_single` and
   * `key_multiple` queue styles the first argument is the key and must be
   * given; omitting it is a programming error.
   */
  enqueue(...args: unknown[]): unknown {
    const { queueStyle, sessionKey } = this.policy.settings;
    const payload = this.policy.write(this.session, sessionKey, args);
    this.logger.debug({ queueStyle, sessionKey }, "flash note queued");
    return payload;
  }

  /**
   * Drains stored notes outside of a render. Without keys, or when the store
   * is not keyed, the whole structure is returned and removed. With keys on a
   * keyed store, the removed values come back as an array aligned with the
   * keys; keys that were never set give `undefined`.
   */
  flush(...keys: string[]): unknown {
    const { queueStyle, sessionKey } = this.policy.settings;
    const flash = this.session.get(sessionKey);
    const keyed = isKeyedQueue(queueStyle) && (flash === undefined || isFlashMapping(flash));

    if (!keys.length || !keyed) {
      this.session.set(sessionKey, undefined);
      this.logger.debug({ sessionKey, found: flash !== undefined }, "flash notes flushed");
      return flash;
    }

    const remaining: Record<string, unknown> = isFlashMapping(flash) ? { ...flash } : {};
    const values = keys.map((key) => {
      const value = remaining[key];
      delete remaining[key];
      return value;
    });
    if (flash !== undefined) {
      this.session.set(sessionKey, Object.keys(remaining).length ? remaining : undefined);
    }
    this.logger.debug({ sessionKey, keys }, "flash notes flushed by key");
    return values;
  }

  prepareForRender(context: RenderContext): void {
    const { tokenName, sessionKey, dequeueStyle } = this.policy.settings;
    this.policy.prepare(this.session, { tokenName, sessionKey }, context);
    this.logger.debug({ tokenName, dequeueStyle }, "flash token injected");
  }
}
