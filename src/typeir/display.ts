import type { MetaBase } from "./meta";
import type { LiteralValue, TypeGeneric } from "./types";
import { iterIncludeNull } from "./union";
import { canonicalEquals } from "./codec";

export function literalToString(lit: LiteralValue): string {
  switch (lit.kind) {
    case "string":
      return JSON.stringify(lit.value);
    case "int":
      return lit.value.toString();
    case "bool":
      return lit.value ? "true" : "false";
  }
}

function constraintSuffix(meta: MetaBase): string {
  return meta.constraints
    .map(c => (c.label === undefined ? `@${c.level}({{${c.expression}}})` : `@${c.level}(${c.label}, {{${c.expression}}})`))
    .map(s => ` ${s}`)
    .join("");
}

/**
 * Render a type in BAML's surface syntax, e.g. `(int | string)[]`,
 * `map<string, Foo>`, `"a" | "b" | null`.
 */
export function displayType<M extends MetaBase>(t: TypeGeneric<M>): string {
  const body = displayBody(t);
  const suffix = constraintSuffix(t.meta);
  return suffix === "" ? body : `(${body}${suffix})`;
}

function displayBody<M extends MetaBase>(t: TypeGeneric<M>): string {
  switch (t.tag) {
    case "Top":
      return "any";
    case "Primitive":
      return t.value.startsWith("media:") ? t.value.slice("media:".length) : t.value;
    case "Enum":
    case "Class":
    case "RecursiveTypeAlias":
      return t.name;
    case "Literal":
      return literalToString(t.value);
    case "List": {
      const inner = displayType(t.item);
      return t.item.tag === "Union" && t.item.meta.constraints.length === 0 ? `(${inner})[]` : `${inner}[]`;
    }
    case "Map":
      return `map<${displayType(t.key)}, ${displayType(t.value)}>`;
    case "Tuple":
      return `(${t.items.map(displayType).join(", ")})`;
    case "Arrow":
      return `(${t.params.map(displayType).join(", ")}) -> ${displayType(t.returns)}`;
    case "Union":
      return iterIncludeNull(t.union).map(displayType).join(" | ");
  }
}

/** Structural equality, metadata included. */
export function typeEquals<M extends MetaBase>(a: TypeGeneric<M>, b: TypeGeneric<M>): boolean {
  return canonicalEquals(a, b);
}

/** Structural equality ignoring metadata at every level. */
export function typeShapeEquals<M extends MetaBase>(a: TypeGeneric<M>, b: TypeGeneric<M>): boolean {
  return canonicalEquals(a, b, { includeMeta: false });
}
