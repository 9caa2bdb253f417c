import type { MetaBase } from "./meta";
import type { StreamingMode, TypeGeneric } from "./types";
import { iterIncludeNull } from "./union";

/**
 * Rebuild a type tree with new metadata. `fn` sees each original node.
 * When `mode` is given, every class and alias is moved to that mode.
 */
export function mapMeta<M extends MetaBase, N extends MetaBase>(
  t: TypeGeneric<M>,
  fn: (node: TypeGeneric<M>) => N,
  mode?: StreamingMode
): TypeGeneric<N> {
  const meta = fn(t);
  const recur = (child: TypeGeneric<M>): TypeGeneric<N> => mapMeta(child, fn, mode);
  switch (t.tag) {
    case "Top":
      return { tag: "Top", meta };
    case "Primitive":
      return { tag: "Primitive", value: t.value, meta };
    case "Enum":
      return { tag: "Enum", name: t.name, dynamic: t.dynamic, meta };
    case "Literal":
      return { tag: "Literal", value: t.value, meta };
    case "Class":
      return { tag: "Class", name: t.name, mode: mode ?? t.mode, dynamic: t.dynamic, meta };
    case "RecursiveTypeAlias":
      return { tag: "RecursiveTypeAlias", name: t.name, mode: mode ?? t.mode, meta };
    case "List":
      return { tag: "List", item: recur(t.item), meta };
    case "Map":
      return { tag: "Map", key: recur(t.key), value: recur(t.value), meta };
    case "Tuple":
      return { tag: "Tuple", items: t.items.map(recur), meta };
    case "Arrow":
      return { tag: "Arrow", params: t.params.map(recur), returns: recur(t.returns), meta };
    case "Union": {
      const members = t.union.members.map(recur);
      const nullType = t.union.nullType === undefined ? undefined : recur(t.union.nullType);
      return { tag: "Union", union: nullType === undefined ? { members } : { members, nullType }, meta };
    }
  }
}

export function children<M extends MetaBase>(t: TypeGeneric<M>): TypeGeneric<M>[] {
  switch (t.tag) {
    case "List":
      return [t.item];
    case "Map":
      return [t.key, t.value];
    case "Tuple":
      return [...t.items];
    case "Arrow":
      return [...t.params, t.returns];
    case "Union":
      return iterIncludeNull(t.union);
    default:
      return [];
  }
}

/** Depth-first search for the first node matching `pred`. */
export function findIf<M extends MetaBase>(
  t: TypeGeneric<M>,
  pred: (node: TypeGeneric<M>) => boolean
): TypeGeneric<M> | undefined {
  if (pred(t)) return t;
  for (const child of children(t)) {
    const found = findIf(child, pred);
    if (found) return found;
  }
  return undefined;
}

/**
 * Names of classes and recursive aliases a type refers to, in first-seen order.
 */
export function classDependencies<M extends MetaBase>(t: TypeGeneric<M>, out: Set<string> = new Set()): Set<string> {
  if (t.tag === "Class" || t.tag === "RecursiveTypeAlias") {
    out.add(t.name);
  }
  for (const child of children(t)) {
    classDependencies(child, out);
  }
  return out;
}

export function enumDependencies<M extends MetaBase>(t: TypeGeneric<M>, out: Set<string> = new Set()): Set<string> {
  if (t.tag === "Enum") out.add(t.name);
  for (const child of children(t)) {
    enumDependencies(child, out);
  }
  return out;
}

/** Rewrite class, enum and alias names; names `rename` returns undefined for are kept. */
export function renameRefs<M extends MetaBase>(
  t: TypeGeneric<M>,
  rename: (kind: "class" | "enum", name: string) => string | undefined
): TypeGeneric<M> {
  const recur = (child: TypeGeneric<M>): TypeGeneric<M> => renameRefs(child, rename);
  switch (t.tag) {
    case "Class":
      return { ...t, name: rename("class", t.name) ?? t.name };
    case "RecursiveTypeAlias":
      return { ...t, name: rename("class", t.name) ?? t.name };
    case "Enum":
      return { ...t, name: rename("enum", t.name) ?? t.name };
    case "List":
      return { ...t, item: recur(t.item) };
    case "Map":
      return { ...t, key: recur(t.key), value: recur(t.value) };
    case "Tuple":
      return { ...t, items: t.items.map(recur) };
    case "Arrow":
      return { ...t, params: t.params.map(recur), returns: recur(t.returns) };
    case "Union": {
      const members = t.union.members.map(recur);
      const nullType = t.union.nullType === undefined ? undefined : recur(t.union.nullType);
      return { ...t, union: nullType === undefined ? { members } : { members, nullType } };
    }
    default:
      return t;
  }
}
