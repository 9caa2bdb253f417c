import { describe, it, expect } from "vitest";
import { ValuePath } from "../../src/value/path";
import { toPlain } from "../../src/value/plain";
import {
  NULL,
  describeValue,
  entriesOf,
  vBool,
  vClass,
  vEnum,
  vFloat,
  vInt,
  vList,
  vMap,
  vMedia,
  vString,
  valueEquals,
  I64_MAX,
  I64_MIN,
} from "../../src/value/value";

describe("values", () => {

  it("stores ints as bigints within i64", () => {
    expect(vInt(3).value).toBe(3n);
    expect(vInt(I64_MAX).value).toBe(I64_MAX);
    expect(() => vInt(2n ** 70n)).toThrow("1180591620717411303424 is outside the i64 range");
    expect(() => vInt(I64_MIN - 1n)).toThrow(RangeError);
  });

  it("builds maps from entries or records", () => {
    expect(vMap({ a: vInt(1) })).toEqual(vMap([["a", vInt(1)]]));
    expect(entriesOf(vClass("A", { x: NULL }))?.get("x")).toBe(NULL);
    expect(entriesOf(vList([]))).toBeUndefined();
  });

  it("describes values for error messages", () => {
    expect(describeValue(vString("a"))).toBe('string "a"');
    expect(describeValue(vInt(-4))).toBe("-4");
    expect(describeValue(vFloat(1.5))).toBe("1.5");
    expect(describeValue(vBool(false))).toBe("false");
    expect(describeValue(NULL)).toBe("null");
    expect(describeValue(vList([]))).toBe("list");
    expect(describeValue(vMap([]))).toBe("map");
    expect(describeValue(vClass("User", []))).toBe("class User");
    expect(describeValue(vEnum("Color", "Red"))).toBe("enum Color.Red");
  });

  it("compares maps without regard to order", () => {
    const a = vMap([["x", vInt(1)], ["y", vInt(2)]]);
    const b = vMap([["y", vInt(2)], ["x", vInt(1)]]);
    expect(valueEquals(a, b)).toBe(true);
    expect(valueEquals(a, vMap([["x", vInt(1)]]))).toBe(false);
  });

  it("compares class names, list order and number kinds", () => {
    expect(valueEquals(vClass("A", [["x", NULL]]), vClass("B", [["x", NULL]]))).toBe(false);
    expect(valueEquals(vList([vInt(1), vInt(2)]), vList([vInt(2), vInt(1)]))).toBe(false);
    expect(valueEquals(vInt(1), vFloat(1))).toBe(false);
    expect(valueEquals(vEnum("C", "R"), vEnum("C", "R"))).toBe(true);
  });
});

describe("ValuePath", () => {

  it("renders the root specially", () => {
    expect(ValuePath.ROOT.toString()).toBe("<root>");
    expect(ValuePath.ROOT.isRoot).toBe(true);
  });

  it("renders fields, indices and quoted keys", () => {
    expect(ValuePath.ROOT.field("a").index(2).field("b").toString()).toBe("a[2].b");
    expect(ValuePath.ROOT.key("k").field("v").toString()).toBe('["k"].v');
    expect(ValuePath.ROOT.field("m").key('x"y\\').toString()).toBe('m["x\\"y\\\\"]');
  });

  it("never changes the path it extends", () => {
    const base = ValuePath.ROOT.field("a");
    base.index(1);
    expect(base.toString()).toBe("a");
    expect(ValuePath.of({ kind: "index", index: 0 }).toString()).toBe("[0]");
  });
});

describe("toPlain", () => {

  it("projects values onto plain data", () => {
    const value = vClass("User", [
      ["age", vInt(36)],
      ["tags", vList([vString("a")])],
      ["favorite", vEnum("Color", "Red")],
      ["email", NULL],
      ["extra", vMap([["ok", vBool(true)]])],
    ]);
    expect(toPlain(value)).toEqual({ age: 36, tags: ["a"], favorite: "Red", email: null, extra: { ok: true } });
  });

  it("keeps unsafe integers as bigints", () => {
    expect(toPlain(vInt(2n ** 60n))).toBe(2n ** 60n);
  });

  it("describes media by their content", () => {
    const media = vMedia({ mediaType: "image", content: { kind: "url", url: "https://example.com/a.png" } });
    expect(toPlain(media)).toEqual({ media_type: "image", kind: "url", url: "https://example.com/a.png" });
  });
});
