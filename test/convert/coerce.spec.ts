import { describe, it, expect } from "vitest";
import * as T from "../../src/typeir/builders";
import { coerceValue } from "../../src/convert/coerce";
import { BamlConvertError } from "../../src/convert/errors";
import { NunjucksEvaluator, evaluateConstraints, type ConstraintEvaluator } from "../../src/convert/constraints";
import { buildSchema } from "../../src/schema/builder";
import { SchemaRegistry } from "../../src/schema/registry";
import { field, scalars, struct } from "../../src/schema/shapes";
import { createLogger } from "../../src/log/logger";
import { DEFAULT_STREAMING_BEHAVIOR, check, assertion } from "../../src/typeir/meta";
import { makeName } from "../../src/typeir/definitions";
import type { TypeIR } from "../../src/typeir/types";
import { NULL, vBool, vClass, vEnum, vFloat, vInt, vList, vMap, vString, type BamlValue } from "../../src/value/value";
import { ColorShape, UserShape } from "../helpers/fixtures";

const noDefs = new SchemaRegistry().build(T.nullType());

function coerceError(value: BamlValue, type: TypeIR): BamlConvertError {
  try {
    coerceValue(value, type, noDefs);
  } catch (e) {
    if (e instanceof BamlConvertError) return e;
    throw e;
  }
  throw new Error("expected coercion to fail");
}

describe("coerceValue: primitives and unions", () => {

  it("widens ints to floats and flags it", () => {
    const out = coerceValue(vInt(2), T.float(), noDefs);
    expect(out.value).toEqual(vFloat(2));
    expect(out.flags).toEqual([{ kind: "int-to-float", path: "<root>" }]);
  });

  it("keeps the last member's error when no union member fits", () => {
    expect(coerceError(vString("x"), T.union([T.int(), T.bool()])).message).toBe(
      'type mismatch (expected bool, got string "x") at <root>'
    );
  });

  it("flags which union member was taken", () => {
    const out = coerceValue(vBool(true), T.union([T.int(), T.bool()]), noDefs);
    expect(out.value).toEqual(vBool(true));
    expect(out.flags).toEqual([{ kind: "union-member", path: "<root>", detail: "1" }]);
  });

  it("accepts null for optional unions", () => {
    const out = coerceValue(NULL, T.optional(T.int()), noDefs);
    expect(out.value).toBe(NULL);
    expect(out.flags).toEqual([]);
  });

  it("matches literals exactly", () => {
    expect(coerceValue(vString("a"), T.literalString("a"), noDefs).value).toEqual(vString("a"));
    expect(coerceError(vString("b"), T.literalString("a")).message).toBe(
      'literal mismatch (expected "a", got string "b") at <root>'
    );
  });

  it("reports list item paths", () => {
    expect(coerceError(vList([vInt(1), vString("2")]), T.list(T.int())).message).toBe(
      'type mismatch (expected int, got string "2") at [1]'
    );
  });
});

describe("coerceValue: maps", () => {

  it("drops entries that do not fit and explains why", () => {
    const out = coerceValue(vMap([["a", vInt(1)], ["b", vString("x")]]), T.map(T.string(), T.int()), noDefs);
    expect(out.value).toEqual(vMap([["a", vInt(1)]]));
    expect(out.explanations).toEqual([
      { path: '["b"]', message: 'dropped map entry: type mismatch (expected int, got string "x") at ["b"]' },
    ]);
  });

  it("rejects non-map values outright", () => {
    expect(coerceError(vList([]), T.map(T.string(), T.int())).message).toBe(
      "type mismatch (expected map<string, int>, got list) at <root>"
    );
  });
});

describe("coerceValue: classes and enums", () => {
  const users = buildSchema(UserShape);

  const userInput = (fields: [string, BamlValue][]): BamlValue =>
    vMap([
      ["name", vString("Ada")],
      ["age", vInt(36)],
      ["address", vMap([["street", vString("1 Main St")], ["zip", vString("12345")]])],
      ["tags", vList([])],
      ...fields,
    ]);

  it("names class values and normalizes enum strings", () => {
    const out = coerceValue(userInput([["favorite", vString("Red")]]), users.target, users.outputFormat);
    expect(out.value).toEqual(
      vClass("app::models::User", [
        ["name", vString("Ada")],
        ["age", vInt(36)],
        ["email", NULL],
        ["address", vClass("app::models::Address", [["street", vString("1 Main St")], ["zip", vString("12345")]])],
        ["tags", vList([])],
        ["favorite", vEnum("Color", "Red")],
      ])
    );
    expect(out.flags).toEqual([
      { kind: "optional-defaulted", path: "email" },
      { kind: "string-to-enum", path: "favorite", detail: "Red" },
    ]);
  });

  it("reads fields under their rendered names", () => {
    const out = coerceValue(
      userInput([["email_address", vString("ada@example.com")], ["favorite", vEnum("Color", "Blue")]]),
      users.target,
      users.outputFormat
    );
    const fields = out.value.tag === "Class" ? out.value.fields : undefined;
    expect(fields?.get("email")).toEqual(vString("ada@example.com"));
    expect(out.flags).toEqual([]);
  });

  it("accepts enum aliases", () => {
    const colors = buildSchema(ColorShape);
    const out = coerceValue(vString("GREEN"), colors.target, colors.outputFormat);
    expect(out.value).toEqual(vEnum("Color", "Green"));
    expect(out.flags).toEqual([{ kind: "string-to-enum", path: "<root>", detail: "GREEN" }]);
  });

  it("rejects unknown enum values", () => {
    const colors = buildSchema(ColorShape);
    expect(() => coerceValue(vString("Purple"), colors.target, colors.outputFormat)).toThrow(
      'unknown enum variant (expected Color, got string "Purple") at <root>'
    );
  });

  it("reports missing and null required fields", () => {
    expect(() => coerceValue(userInput([]), users.target, users.outputFormat)).toThrow(
      "missing required field (expected Color, got <missing>) at favorite"
    );
    expect(() => coerceValue(userInput([["favorite", NULL]]), users.target, users.outputFormat)).toThrow(
      "null provided for required field (expected Color, got null) at favorite"
    );
  });
});

describe("constraints", () => {
  const Person = struct("Person", {
    fields: [
      field("age", scalars.i32, {
        checks: [{ label: "non_negative", expression: "this >= 0" }],
        asserts: [{ label: "below_100", expression: "this < 100" }],
      }),
    ],
  });
  const people = buildSchema(Person);

  it("records checks and collects failed asserts", () => {
    const young = coerceValue(vMap([["age", vInt(-5)]]), people.target, people.outputFormat);
    expect(young.checks).toEqual([{ name: "non_negative", expression: "this >= 0", status: "failed" }]);
    expect(young.failedAsserts).toEqual([]);

    const old = coerceValue(vMap([["age", vInt(150)]]), people.target, people.outputFormat);
    expect(old.checks).toEqual([{ name: "non_negative", expression: "this >= 0", status: "succeeded" }]);
    expect(old.failedAsserts).toEqual([{ name: "below_100", expression: "this < 100", status: "failed" }]);
  });

  it("evaluates class level constraints against the whole value", () => {
    const Range = struct("Range", {
      attrs: { asserts: [{ label: "ordered", expression: "this.lo <= this.hi" }] },
      fields: [field("lo", scalars.i32), field("hi", scalars.i32)],
    });
    const ranges = buildSchema(Range);
    const ok = coerceValue(vMap([["lo", vInt(1)], ["hi", vInt(2)]]), ranges.target, ranges.outputFormat);
    expect(ok.failedAsserts).toEqual([]);
    const bad = coerceValue(vMap([["lo", vInt(3)], ["hi", vInt(2)]]), ranges.target, ranges.outputFormat);
    expect(bad.failedAsserts).toEqual([{ name: "ordered", expression: "this.lo <= this.hi", status: "failed" }]);
  });

  it("evaluates constraints found only on the class definition", () => {
    const registry = new SchemaRegistry();
    registry.registerClass({
      name: makeName("Crate"),
      mode: "NonStreaming",
      dynamic: false,
      fields: [{ name: makeName("n"), type: T.int(), dynamic: false }],
      constraints: [assertion("this.n > 0", "positive")],
      streamingBehavior: DEFAULT_STREAMING_BEHAVIOR,
    });
    const crate = T.classType("Crate");
    const out = coerceValue(vMap([["n", vInt(0)]]), crate, registry.build(crate));
    expect(out.failedAsserts).toEqual([{ name: "positive", expression: "this.n > 0", status: "failed" }]);
  });

  it("names unlabeled asserts after their level and unlabeled checks after their expression", () => {
    const evaluator = new NunjucksEvaluator();
    const results = evaluateConstraints(
      vInt(0),
      [assertion("this > 0"), { level: "check", expression: "this == 0" }],
      evaluator
    );
    expect(results.failedAsserts).toEqual([{ name: "assert", expression: "this > 0", status: "failed" }]);
    expect(results.checks).toEqual([{ name: "this == 0", expression: "this == 0", status: "succeeded" }]);
  });

  it("treats an evaluation error as a failure and logs it", () => {
    const lines: unknown[][] = [];
    const logger = createLogger("warn", {
      log: (...args) => lines.push(args),
      warn: (...args) => lines.push(args),
      error: (...args) => lines.push(args),
    });
    const broken: ConstraintEvaluator = {
      evaluate() {
        throw new Error("boom");
      },
    };
    const results = evaluateConstraints(vInt(1), [check("positive", "this > 0")], broken, logger);
    expect(results.checks).toEqual([{ name: "positive", expression: "this > 0", status: "failed" }]);
    expect(lines).toEqual([["[warn] constraint expression failed to evaluate: this > 0", { error: "Error: boom" }]]);
  });

  it("sees enums as their variant name", () => {
    const results = evaluateConstraints(
      vEnum("Color", "Red"),
      [check("is_red", 'this == "Red"')],
      new NunjucksEvaluator()
    );
    expect(results.checks[0]?.status).toBe("succeeded");
  });
});
