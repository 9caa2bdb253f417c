import { hasChecks, type MetaBase } from "./meta";
import type { TypeGeneric } from "./types";
import { isNullType, iterIncludeNull } from "./union";
import { typeEquals } from "./display";
import { optionalOf, withMeta } from "./builders";

/**
 * Flatten nested unions into one member list. A union for which `preserve`
 * holds (by default: one carrying check constraints) is kept whole.
 */
export function flattenUnionMembers<M extends MetaBase>(
  types: readonly TypeGeneric<M>[],
  preserve: (meta: M) => boolean = hasChecks
): TypeGeneric<M>[] {
  const out: TypeGeneric<M>[] = [];
  for (const t of types) {
    if (t.tag === "Union" && !preserve(t.meta)) {
      out.push(...flattenUnionMembers(iterIncludeNull(t.union), preserve));
    } else {
      out.push(t);
    }
  }
  return out;
}

function coveredBy<M extends MetaBase>(t: TypeGeneric<M>, preserved: readonly TypeGeneric<M>[]): boolean {
  for (const p of preserved) {
    if (p.tag !== "Union") continue;
    if (isNullType(t) && p.union.nullType !== undefined) return true;
    if (p.union.members.some(m => typeEquals(m, t))) return true;
  }
  return false;
}

/**
 * Normalize a union: flatten, drop members already covered by a preserved
 * (checked) union, dedupe structurally, keep at most one trailing null.
 * Zero members collapse to null; a single member collapses to itself
 * (optional when a null was present). The union's own metadata is kept on
 * the result whenever the result is still a union.
 */
export function simplifyUnion<M extends MetaBase>(
  types: readonly TypeGeneric<M>[],
  meta: M,
  nullMeta: M = meta
): TypeGeneric<M> {
  const flat = flattenUnionMembers(types);
  const preserved = flat.filter(t => t.tag === "Union");

  const members: TypeGeneric<M>[] = [];
  let nullType: TypeGeneric<M> | undefined;
  for (const t of flat) {
    if (t.tag !== "Union" && coveredBy(t, preserved)) continue;
    if (isNullType(t)) {
      nullType = nullType ?? t;
      continue;
    }
    if (members.some(m => typeEquals(m, t))) continue;
    members.push(t);
  }

  const [first] = members;
  if (first === undefined) {
    return nullType ?? { tag: "Primitive", value: "null", meta: nullMeta };
  }
  if (members.length === 1) {
    return nullType === undefined ? first : optionalOf(first, nullType.meta);
  }
  return nullType === undefined
    ? { tag: "Union", union: { members }, meta }
    : { tag: "Union", union: { members, nullType }, meta };
}

/** Recursively simplify every union in a type. */
export function simplify<M extends MetaBase>(t: TypeGeneric<M>): TypeGeneric<M> {
  switch (t.tag) {
    case "List":
      return { ...t, item: simplify(t.item) };
    case "Map":
      return { ...t, key: simplify(t.key), value: simplify(t.value) };
    case "Tuple":
      return { ...t, items: t.items.map(simplify) };
    case "Arrow":
      return { ...t, params: t.params.map(simplify), returns: simplify(t.returns) };
    case "Union": {
      const simplified = simplifyUnion(iterIncludeNull(t.union).map(simplify), t.meta);
      if (simplified.tag === "Union") return simplified;
      return t.meta.constraints.length === 0 ? simplified : withMeta(simplified, mergeConstraints(simplified.meta, t.meta));
    }
    default:
      return t;
  }
}

function mergeConstraints<M extends MetaBase>(inner: M, outer: M): M {
  return { ...inner, constraints: [...inner.constraints, ...outer.constraints] };
}
