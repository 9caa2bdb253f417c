import type { TypeLookups } from "../typeir/definitions";
import type { IRMeta } from "../typeir/meta";
import type { TypeIR, UnionType } from "../typeir/types";
import { entriesOf, type BamlValue } from "../value/value";

export type Resolution =
  | { readonly kind: "Resolved"; readonly type: TypeIR }
  | { readonly kind: "Ambiguous"; readonly candidates: readonly TypeIR[] };

const SCORE = {
  literal: 100,
  enumVariant: 90,
  primitive: 10,
  container: 5,
  enumAsString: 2,
} as const;

/** Follow one level of recursive-alias indirection. */
function expandAlias(t: TypeIR, lookups: TypeLookups): TypeIR {
  if (t.tag !== "RecursiveTypeAlias") return t;
  return lookups.expandRecursiveType(t.name) ?? t;
}

/**
 * How well a value matches a candidate type. Zero means no signal; literal
 * and structural matches outrank bare kind matches.
 */
export function scoreCandidate(value: BamlValue, candidate: TypeIR, lookups: TypeLookups): number {
  const t = expandAlias(candidate, lookups);
  switch (t.tag) {
    case "Class": {
      const entries = entriesOf(value);
      const def = lookups.findClass(t.name, t.mode);
      if (entries === undefined || def === undefined) return 0;
      let score = 0;
      for (const key of entries.keys()) {
        if (def.fields.some(f => f.name.name === key || f.name.alias === key)) score++;
      }
      return score;
    }
    case "Enum": {
      const name = value.tag === "Enum" ? value.variant : value.tag === "String" ? value.value : undefined;
      const def = lookups.findEnum(t.name);
      if (name === undefined || def === undefined) return 0;
      return def.values.some(v => v.name.name === name || v.name.alias === name) ? SCORE.enumVariant : 0;
    }
    case "Literal": {
      const lit = t.value;
      switch (lit.kind) {
        case "string":
          if (value.tag === "String") return value.value === lit.value ? SCORE.literal : 0;
          if (value.tag === "Enum") return value.variant === lit.value ? SCORE.literal : 0;
          return 0;
        case "int":
          return value.tag === "Int" && value.value === lit.value ? SCORE.literal : 0;
        case "bool":
          return value.tag === "Bool" && value.value === lit.value ? SCORE.literal : 0;
      }
    }
    case "Primitive":
      switch (t.value) {
        case "string":
          if (value.tag === "String") return SCORE.primitive;
          return value.tag === "Enum" ? SCORE.enumAsString : 0;
        case "int":
          return value.tag === "Int" ? SCORE.primitive : 0;
        case "float":
          return value.tag === "Float" ? SCORE.primitive : 0;
        case "bool":
          return value.tag === "Bool" ? SCORE.primitive : 0;
        case "null":
          return 0;
        default:
          return value.tag === "Media" && `media:${value.media.mediaType}` === t.value ? SCORE.primitive : 0;
      }
    case "List":
      return value.tag === "List" ? SCORE.container : 0;
    case "Map":
      return value.tag === "Map" ? SCORE.container : 0;
    case "Union":
      return Math.max(0, ...t.union.members.map(m => scoreCandidate(value, m, lookups)));
    default:
      return 0;
  }
}

/**
 * Pick the union member that governs navigation into `value`. Ties with a
 * positive score go to the earliest member; no signal at all is ambiguous.
 */
export function resolveUnion(value: BamlValue, union: UnionType<IRMeta>, lookups: TypeLookups): Resolution {
  const candidates = union.members;
  if (value.tag === "Null") {
    if (union.nullType !== undefined) return { kind: "Resolved", type: union.nullType };
    return { kind: "Ambiguous", candidates };
  }

  let best = -1;
  let top: TypeIR[] = [];
  for (const c of candidates) {
    const score = scoreCandidate(value, c, lookups);
    if (score > best) {
      best = score;
      top = [c];
    } else if (score === best) {
      top.push(c);
    }
  }

  const [first] = top;
  if (first === undefined) return { kind: "Ambiguous", candidates: [] };
  if (top.length === 1 || best > 0) return { kind: "Resolved", type: expandAlias(first, lookups) };
  return { kind: "Ambiguous", candidates: top };
}
