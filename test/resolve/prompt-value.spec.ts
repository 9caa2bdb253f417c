import { describe, it, expect } from "vitest";
import * as T from "../../src/typeir/builders";
import { displayType } from "../../src/typeir/display";
import { makeName } from "../../src/typeir/definitions";
import { DEFAULT_STREAMING_BEHAVIOR } from "../../src/typeir/meta";
import { SchemaRegistry } from "../../src/schema/registry";
import { buildSchema } from "../../src/schema/builder";
import { toBamlValue } from "../../src/convert/to-value";
import { AmbiguousUnionError, PromptValue } from "../../src/resolve/prompt-value";
import { NULL, vInt, vMap, vString } from "../../src/value/value";
import { UserShape, sampleUser } from "../helpers/fixtures";

function userPrompt(): PromptValue {
  const bundle = buildSchema(UserShape);
  return new PromptValue(toBamlValue(UserShape, sampleUser, { bundle }), bundle.target, bundle.outputFormat);
}

function ambiguousPrompt(): PromptValue {
  const registry = new SchemaRegistry();
  const classes: [string, string][] = [
    ["Foo", "a"],
    ["Bar", "b"],
  ];
  for (const [name, field] of classes) {
    registry.registerClass({
      name: makeName(name),
      mode: "NonStreaming",
      dynamic: false,
      fields: [{ name: makeName(field), type: T.int(), dynamic: false }],
      constraints: [],
      streamingBehavior: DEFAULT_STREAMING_BEHAVIOR,
    });
  }
  const type = T.union([T.classType("Foo"), T.classType("Bar")]);
  return new PromptValue(vMap([["z", vInt(1)]]), type, registry.build(type));
}

describe("PromptValue", () => {

  it("navigates class fields with typed children", () => {
    const user = userPrompt();
    const name = user.field("name");
    expect(name?.value).toEqual(vString("Ada"));
    expect(name && displayType(name.type)).toBe("string");
    expect(user.field("address")?.field("zip")?.path.toString()).toBe("address.zip");
  });

  it("accepts rendered field names", () => {
    const email = userPrompt().field("email_address");
    expect(email?.path.toString()).toBe("email");
    expect(email?.value).toBe(NULL);
    expect(email?.resolvedType()?.tag).toBe("Primitive");
  });

  it("returns undefined for unknown fields and indices", () => {
    const user = userPrompt();
    expect(user.field("nope")).toBeUndefined();
    expect(user.field("tags")?.index(5)).toBeUndefined();
    expect(user.index(0)).toBeUndefined();
  });

  it("walks list items with their item type", () => {
    const tags = userPrompt().field("tags")?.items() ?? [];
    expect(tags.map(t => t.path.toString())).toEqual(["tags[0]", "tags[1]"]);
    expect(tags.map(t => displayType(t.type))).toEqual(["string", "string"]);
  });

  it("lists entries in value order", () => {
    expect(userPrompt().entries().map(([k]) => k)).toEqual(["name", "age", "email", "address", "tags", "favorite"]);
  });

  it("types map values by the map's value type", () => {
    const scores = new PromptValue(vMap([["k", vInt(1)]]), T.map(T.string(), T.int()), buildSchema(UserShape).outputFormat);
    const k = scores.field("k");
    expect(k?.path.toString()).toBe('["k"]');
    expect(k && displayType(k.type)).toBe("int");
  });

  it("remembers its resolution", () => {
    const user = userPrompt();
    expect(user.resolve()).toBe(user.resolve());
    expect(user.isAmbiguous).toBe(false);
  });

  it("refuses to navigate an ambiguous value", () => {
    const pv = ambiguousPrompt();
    expect(pv.isAmbiguous).toBe(true);
    expect(pv.resolvedType()).toBeUndefined();
    expect(() => pv.field("z")).toThrow(AmbiguousUnionError);
    expect(() => pv.entries()).toThrow("ambiguous union at <root>: Foo | Bar");
  });

  it("reports ambiguity as a failure listing the candidates", () => {
    try {
      ambiguousPrompt().items();
      throw new Error("expected navigation to fail");
    } catch (e) {
      if (!(e instanceof AmbiguousUnionError)) throw e;
      const f = e.toFailure();
      expect(f.reason).toBe("ambiguous-union");
      expect(f.diagnostics[0]?.message).toBe("Ambiguous union access: Foo, Bar");
    }
  });
});
