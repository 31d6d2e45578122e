import nunjucks from "nunjucks";
import { isFlashMapping } from "./session";

export interface FlashNoteView {
  kind: string;
  message: string;
}

const describeNote = (value: unknown): string => {
  if (Array.isArray(value)) return value.map(describeNote).join(" ");
  return value === undefined || value === null ? "" : String(value);
};

const toNotes = (kind: string, value: unknown): FlashNoteView[] => {
  if (value === undefined || value === null) return [];
  const entries = Array.isArray(value) ? value : [value];
  return entries.map((entry) => ({ kind, message: describeNote(entry) }));
};

const resolve = (token: unknown): unknown => (typeof token === "function" ? token() : token);

/**
 * Flattens whatever the dequeue style injected (stored notes, a deferred
 * accessor, or a mapping of per-key accessors) into a list for the layout.
 * Notes without a key are of kind "info".
 */
export const flashNotes = (token: unknown): FlashNoteView[] => {
  const flash = resolve(token);
  if (!isFlashMapping(flash)) return toNotes("info", flash);
  return Object.entries(flash).flatMap(([kind, entry]) => toNotes(kind, resolve(entry)));
};

export const createViewEnvironment = (
  viewsPath: string,
  options: { app?: object; noCache?: boolean } = {}
) => {
  const env = nunjucks.configure(viewsPath, {
    autoescape: true,
    express: options.app,
    noCache: options.noCache
  });
  env.addGlobal("flashNotes", flashNotes);
  return env;
};
