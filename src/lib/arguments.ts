import { ArgumentStyle } from "../validators/flashSettings";

export type ArgumentReducer = (values: unknown[]) => unknown;

const toText = (value: unknown) => (value === undefined || value === null ? "" : String(value));

/**
 * Picks how the arguments of one `flash(...)` call collapse into the single
 * payload that gets stored. Keys have already been stripped off.
 */
export const createArgumentReducer = (
  style: ArgumentStyle,
  separator = ""
): ArgumentReducer => {
  switch (style) {
    case "single":
      return (values) => values[0];
    case "join":
      return (values) => values.map(toText).join(separator);
    case "array":
      return (values) => [...values];
    case "auto":
      return (values) => (values.length > 1 ? [...values] : values[0]);
  }
};
