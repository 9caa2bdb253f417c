import type { MetaBase } from "./meta";
import type { TypeGeneric, UnionType } from "./types";

export function isNullType<M extends MetaBase>(t: TypeGeneric<M>): boolean {
  return t.tag === "Primitive" && t.value === "null";
}

/**
 * Build a union from an ordered member list. Nulls are collapsed to one and
 * moved to the end; the first null's metadata is kept.
 */
export function makeUnionType<M extends MetaBase>(types: readonly TypeGeneric<M>[]): UnionType<M> {
  const members: TypeGeneric<M>[] = [];
  let nullType: TypeGeneric<M> | undefined;
  for (const t of types) {
    if (isNullType(t)) {
      nullType = nullType ?? t;
    } else {
      members.push(t);
    }
  }
  return nullType === undefined ? { members } : { members, nullType };
}

export function isOptionalUnion<M extends MetaBase>(u: UnionType<M>): boolean {
  return u.nullType !== undefined;
}

export function iterSkipNull<M extends MetaBase>(u: UnionType<M>): readonly TypeGeneric<M>[] {
  return u.members;
}

export function iterIncludeNull<M extends MetaBase>(u: UnionType<M>): TypeGeneric<M>[] {
  return u.nullType === undefined ? [...u.members] : [...u.members, u.nullType];
}

export type UnionView<M extends MetaBase> =
  | { readonly kind: "Null" }
  | { readonly kind: "Optional"; readonly inner: TypeGeneric<M> }
  | { readonly kind: "Single"; readonly inner: TypeGeneric<M> }
  | { readonly kind: "OneOf"; readonly members: readonly TypeGeneric<M>[] }
  | { readonly kind: "OneOfOptional"; readonly members: readonly TypeGeneric<M>[] };

/** Classify a union by how many non-null members it has and whether it accepts null. */
export function viewUnion<M extends MetaBase>(u: UnionType<M>): UnionView<M> {
  const optional = isOptionalUnion(u);
  const [first] = u.members;
  if (first === undefined) return { kind: "Null" };
  if (u.members.length === 1) {
    return optional ? { kind: "Optional", inner: first } : { kind: "Single", inner: first };
  }
  return optional ? { kind: "OneOfOptional", members: u.members } : { kind: "OneOf", members: u.members };
}
