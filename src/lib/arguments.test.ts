import { describe, expect, it } from "vitest";
import { createArgumentReducer } from "./arguments";

describe("createArgumentReducer", () => {
  it("keeps only the first value for the single style", () => {
    const reduce = createArgumentReducer("single");
    expect(reduce(["first", "second"])).toBe("first");
    expect(reduce([])).toBeUndefined();
  });

  it("joins values with the configured separator", () => {
    expect(createArgumentReducer("join", ",")(["x", "y", "z"])).toBe("x,y,z");
    expect(createArgumentReducer("join")(["x", 1, true])).toBe("x1true");
  });

  it("turns missing values into empty strings when joining", () => {
    expect(createArgumentReducer("join", "-")(["a", undefined, null, "b"])).toBe("a---b");
  });

  it("always returns a list for the array style", () => {
    const reduce = createArgumentReducer("array");
    expect(reduce(["only"])).toEqual(["only"]);
    expect(reduce(["a", "b"])).toEqual(["a", "b"]);
  });

  it("unwraps a lone value for the auto style", () => {
    const reduce = createArgumentReducer("auto");
    expect(reduce(["only"])).toBe("only");
    expect(reduce(["value_not_allowed", "id", 42])).toEqual(["value_not_allowed", "id", 42]);
  });

  it("does not hand back the caller's array", () => {
    const values = ["a", "b"];
    const reduced = createArgumentReducer("array")(values);
    values.push("c");
    expect(reduced).toEqual(["a", "b"]);
  });
});
