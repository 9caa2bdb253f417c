import { describe, it, expect } from "vitest";
import { fromBamlValue } from "../../src/convert/from-value";
import { toBamlValue } from "../../src/convert/to-value";
import { BamlConvertError, InvariantViolationError } from "../../src/convert/errors";
import * as T from "../../src/typeir/builders";
import type { FieldCodec } from "../../src/schema/adapters";
import { field, fixedArray, map, option, scalars, struct, unsupported } from "../../src/schema/shapes";
import type { Shape } from "../../src/schema/shape";
import { ValuePath } from "../../src/value/path";
import {
  NULL,
  describeValue,
  vBool,
  vClass,
  vEnum,
  vFloat,
  vInt,
  vList,
  vMap,
  vMedia,
  vString,
  type BamlValue,
} from "../../src/value/value";
import { AddressShape, ColorShape, FigureShape, UserShape } from "../helpers/fixtures";

function convertError(shape: Shape, value: BamlValue): BamlConvertError {
  try {
    fromBamlValue(shape, value);
  } catch (e) {
    if (e instanceof BamlConvertError) return e;
    throw e;
  }
  throw new Error("expected the conversion to fail");
}

describe("fromBamlValue: errors", () => {

  it("reports out of range integers with the target scalar", () => {
    const Counter = struct("Counter", { fields: [field("value", scalars.u32)] });
    const e = convertError(Counter, vClass("Counter", [["value", vInt(-1)]]));
    expect(e.message).toBe("integer out of range (expected u32, got -1) at value");
    expect(e.kind).toBe("out-of-range");
  });

  it("reports missing and null required fields", () => {
    expect(convertError(AddressShape, vClass("Address", [["street", vString("x")]])).message).toBe(
      "missing required field (expected string, got <missing>) at zip"
    );
    expect(
      convertError(AddressShape, vClass("Address", [["street", NULL], ["zip", vString("1")]])).message
    ).toBe("null provided for required field (expected string, got null) at street");
  });

  it("reports unknown enum variants", () => {
    const e = convertError(ColorShape, vString("Purple"));
    expect(e.message).toBe('unknown enum variant (expected Color, got string "Purple") at <root>');
    expect(e.toFailure().reason).toBe("unknown-variant");
  });

  it("reports unknown and missing variant tags at the tag field", () => {
    expect(convertError(FigureShape, vMap([["kind", vString("Hexagon")]])).message).toBe(
      'unknown variant tag (expected Figure, got string "Hexagon") at kind'
    );
    expect(convertError(FigureShape, vMap([["radius", vFloat(1)]])).message).toBe(
      "missing required field (expected Figure, got <missing>) at kind"
    );
  });

  it("reports type mismatches with the value path", () => {
    const e = convertError(UserShape, toUserWith("tags", vList([vString("a"), vInt(2)])));
    expect(e.message).toBe("type mismatch (expected string, got 2) at tags[1]");
  });

  it("checks fixed array length and char width", () => {
    expect(convertError(fixedArray(scalars.i32, 3), vList([vInt(1)])).message).toBe(
      "wrong list length (expected i32[3], got list of 1) at <root>"
    );
    expect(convertError(scalars.char, vString("ab")).message).toBe('type mismatch (expected char, got string "ab") at <root>');
  });

  it("rejects media values", () => {
    const media = vMedia({ mediaType: "image", content: { kind: "url", url: "https://example.com/a.png" } });
    expect(convertError(scalars.string, media).message).toBe("unsupported media value (expected string, got media image) at <root>");
  });

  it("reports map value paths with quoted keys", () => {
    const Scores = struct("Scores", { fields: [field("byName", map(scalars.string, scalars.i8))] });
    expect(convertError(Scores, vClass("Scores", [["byName", vMap([['a"b', vInt(500)]])]])).message).toBe(
      'integer out of range (expected i8, got 500) at byName["a\\"b"]'
    );
  });

  it("converts to a failure with a diagnostic", () => {
    const f = convertError(AddressShape, vMap([["street", vString("x")]])).toFailure();
    expect(f.reason).toBe("missing-field");
    expect(f.recoverable).toBe(true);
    expect(f.diagnostics[0]?.code).toBe("E0101");
    expect(f.diagnostics[0]?.message).toBe("Required field missing: zip");
  });
});

function toUserWith(name: string, value: BamlValue, remove: string[] = []): BamlValue {
  const base = toBamlValue(UserShape, {
    name: "Ada",
    age: 36,
    email: null,
    address: { street: "1 Main St", zip: "12345" },
    tags: [],
    favorite: "Red",
  });
  if (base.tag !== "Class") throw new Error("expected a class value");
  const fields = new Map(base.fields);
  for (const key of remove) fields.delete(key);
  fields.set(name, value);
  return vClass(base.name, fields);
}

describe("fromBamlValue: lenient reads", () => {

  it("finds fields by rendered name", () => {
    const user = fromBamlValue(UserShape, toUserWith("email", NULL));
    expect(user.email).toBeNull();
    const input = toUserWith("email_address", vString("ada@example.com"), ["email"]);
    expect(fromBamlValue(UserShape, input).email).toBe("ada@example.com");
  });

  it("finds fields by alias", () => {
    const Login = struct("Login", { fields: [field("user", scalars.string, { alias: "username" })] });
    expect(fromBamlValue(Login, vMap([["username", vString("ada")]]))).toEqual({ user: "ada" });
  });

  it("matches variants by rendered name, real name and alias", () => {
    expect(fromBamlValue(ColorShape, vString("GREEN"))).toBe("Green");
    expect(fromBamlValue(ColorShape, vString("Green"))).toBe("Green");
    expect(fromBamlValue(ColorShape, vString("verde"))).toBe("Green");
    expect(fromBamlValue(ColorShape, vEnum("Color", "Blue"))).toBe("Blue");
  });

  it("reads ints as floats", () => {
    expect(fromBamlValue(scalars.f64, vInt(2))).toBe(2);
  });

  it("fills absent optional fields with null and defaulted fields with their default", () => {
    const Prefs = struct("Prefs", {
      fields: [
        field("score", scalars.f64, { default: true }),
        field("note", option(scalars.string), { default: () => "n/a" }),
        field("nickname", option(scalars.string)),
      ],
    });
    expect(fromBamlValue(Prefs, vMap([]))).toEqual({ score: 0, note: "n/a", nickname: null });
    expect(fromBamlValue(Prefs, vMap([["note", NULL]]))).toEqual({ score: 0, note: "n/a", nickname: null });
  });

  it("fills skipped fields with their default", () => {
    const Cached = struct("Cached", {
      fields: [field("id", scalars.string), field("hits", scalars.u16, { skip: true })],
    });
    expect(fromBamlValue(Cached, vMap([["id", vString("k")]]))).toEqual({ id: "k", hits: 0 });
  });
});

describe("intRepr", () => {
  const Wide = struct("Wide", {
    fields: [
      field("count", scalars.u64, { intRepr: "string" }),
      field("total", option(scalars.i128), { intRepr: "i64" }),
    ],
  });

  it("writes wide integers as decimal strings", () => {
    expect(toBamlValue(Wide, { count: 18446744073709551615n, total: null })).toEqual(
      vClass("Wide", [["count", vString("18446744073709551615")], ["total", NULL]])
    );
  });

  it("refuses values outside i64 for the i64 form", () => {
    expect(() => toBamlValue(Wide, { count: 1n, total: 2n ** 63n })).toThrow(InvariantViolationError);
    expect(() => toBamlValue(Wide, { count: 1n, total: 2n ** 63n })).toThrow(
      '9223372036854775808 does not fit i64 for intRepr "i64" at total'
    );
  });

  it("reads both forms back as bigints", () => {
    expect(fromBamlValue(Wide, vClass("Wide", [["count", vString("42")], ["total", vInt(-5)]]))).toEqual({
      count: 42n,
      total: -5n,
    });
  });

  it("rejects malformed and out of range strings", () => {
    expect(convertError(Wide, vMap([["count", vString("4x2")]])).message).toBe(
      'invalid integer string (expected u64, got string "4x2") at count'
    );
    expect(convertError(Wide, vMap([["count", vString("-1")]])).message).toBe(
      "integer out of range (expected u64, got -1) at count"
    );
    expect(convertError(Wide, vMap([["count", vInt(3)]])).message).toBe("type mismatch (expected u64 as string, got 3) at count");
  });
});

describe("mapKeyRepr", () => {
  const Lookup = struct("Lookup", {
    fields: [field("table", map(scalars.i32, scalars.string), { mapKeyRepr: "pairs" })],
  });
  const Keyed = struct("Keyed", {
    fields: [field("byId", map(scalars.u8, scalars.bool), { mapKeyRepr: "string" })],
  });

  it("writes pairs as entry class values", () => {
    const table = new Map([
      [1, "a"],
      [2, "b"],
    ]);
    expect(toBamlValue(Lookup, { table })).toEqual(
      vClass("Lookup", [
        [
          "table",
          vList([
            vClass("Lookup::table__Entry", [["key", vInt(1)], ["value", vString("a")]]),
            vClass("Lookup::table__Entry", [["key", vInt(2)], ["value", vString("b")]]),
          ]),
        ],
      ])
    );
    expect(fromBamlValue(Lookup, toBamlValue(Lookup, { table }))).toEqual({ table });
  });

  it("reports the entry path of a missing pair value", () => {
    const input = vMap([["table", vList([vMap([["key", vInt(1)]])])]]);
    expect(convertError(Lookup, input).message).toBe("missing required field (expected string, got <missing>) at table[0].value");
  });

  it("writes and parses stringified keys", () => {
    expect(toBamlValue(Keyed, { byId: new Map([[7, true]]) })).toEqual(vClass("Keyed", [["byId", vMap([["7", vBool(true)]])]]));
    expect(fromBamlValue(Keyed, vMap([["byId", vMap([["7", vBool(true)]])]]))).toEqual({ byId: new Map([[7, true]]) });
  });

  it("rejects keys that do not parse as the key type", () => {
    expect(convertError(Keyed, vMap([["byId", vMap([["300", vBool(true)]])]])).message).toBe(
      'integer out of range (expected u8, got 300) at byId["300"]'
    );
    expect(convertError(Keyed, vMap([["byId", vMap([["x", vBool(true)]])]])).message).toBe(
      'invalid map key (expected u8, got string "x") at byId["x"]'
    );
  });
});

describe("field codecs", () => {
  const cents: FieldCodec<unknown> = {
    typeIR: () => T.string(),
    toBaml: v => vString(typeof v === "number" ? (v / 100).toFixed(2) : "0.00"),
    fromBaml: (v, path) => {
      if (v.tag !== "String") throw new BamlConvertError(path, "money", describeValue(v), "type mismatch");
      return Math.round(Number(v.value) * 100);
    },
  };
  const Price = struct("Price", {
    fields: [field("amount", unsupported("Opaque", "Cents"), { with: cents })],
  });

  it("converts through the codec in both directions", () => {
    expect(toBamlValue(Price, { amount: 1250 })).toEqual(vClass("Price", [["amount", vString("12.50")]]));
    expect(fromBamlValue(Price, vMap([["amount", vString("3.10")]]))).toEqual({ amount: 310 });
  });

  it("lets the codec report errors at the field path", () => {
    expect(convertError(Price, vMap([["amount", vInt(5)]])).message).toBe("type mismatch (expected money, got 5) at amount");
  });

  it("hands an explicit start path to the reader", () => {
    try {
      fromBamlValue(Price, vMap([["amount", vBool(false)]]), { path: ValuePath.ROOT.field("prices").index(2) });
      throw new Error("expected the conversion to fail");
    } catch (e) {
      expect(e instanceof BamlConvertError ? e.path.toString() : String(e)).toBe("prices[2].amount");
    }
  });
});
