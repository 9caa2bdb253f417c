import { irMeta, type Constraint, type IRMeta, type MetaBase, type StreamingBehavior } from "./meta";
import type {
  LiteralValue,
  MediaType,
  StreamingMode,
  TypeGeneric,
  TypeIR,
  TypeValue,
} from "./types";
import { isNullType, makeUnionType } from "./union";

// =========================================================================
// Meta-generic constructors
// =========================================================================

export function topOf<M extends MetaBase>(meta: M): TypeGeneric<M> {
  return { tag: "Top", meta };
}

export function primitiveOf<M extends MetaBase>(value: TypeValue, meta: M): TypeGeneric<M> {
  return { tag: "Primitive", value, meta };
}

export function literalOf<M extends MetaBase>(value: LiteralValue, meta: M): TypeGeneric<M> {
  return { tag: "Literal", value, meta };
}

export function enumOf<M extends MetaBase>(name: string, meta: M, dynamic = false): TypeGeneric<M> {
  return { tag: "Enum", name, dynamic, meta };
}

export function classOf<M extends MetaBase>(
  name: string,
  meta: M,
  mode: StreamingMode = "NonStreaming",
  dynamic = false
): TypeGeneric<M> {
  return { tag: "Class", name, mode, dynamic, meta };
}

export function listOf<M extends MetaBase>(item: TypeGeneric<M>, meta: M): TypeGeneric<M> {
  return { tag: "List", item, meta };
}

export function mapOf<M extends MetaBase>(key: TypeGeneric<M>, value: TypeGeneric<M>, meta: M): TypeGeneric<M> {
  return { tag: "Map", key, value, meta };
}

export function tupleOf<M extends MetaBase>(items: readonly TypeGeneric<M>[], meta: M): TypeGeneric<M> {
  return { tag: "Tuple", items, meta };
}

export function aliasOf<M extends MetaBase>(
  name: string,
  meta: M,
  mode: StreamingMode = "NonStreaming"
): TypeGeneric<M> {
  return { tag: "RecursiveTypeAlias", name, mode, meta };
}

export function arrowOf<M extends MetaBase>(
  params: readonly TypeGeneric<M>[],
  returns: TypeGeneric<M>,
  meta: M
): TypeGeneric<M> {
  return { tag: "Arrow", params, returns, meta };
}

export function unionOf<M extends MetaBase>(types: readonly TypeGeneric<M>[], meta: M): TypeGeneric<M> {
  return { tag: "Union", union: makeUnionType(types), meta };
}

/**
 * Make a type accept null. A union gains a null member (keeping its metadata);
 * anything else is wrapped in a two-member union with `wrapperMeta`.
 */
export function optionalOf<M extends MetaBase>(t: TypeGeneric<M>, wrapperMeta: M): TypeGeneric<M> {
  if (isNullType(t)) return t;
  if (t.tag === "Union") {
    if (t.union.nullType !== undefined) return t;
    return { tag: "Union", union: { members: t.union.members, nullType: primitiveOf("null", wrapperMeta) }, meta: t.meta };
  }
  return unionOf([t, primitiveOf("null", wrapperMeta)], wrapperMeta);
}

export function withMeta<M extends MetaBase>(t: TypeGeneric<M>, meta: M): TypeGeneric<M> {
  return { ...t, meta };
}

// =========================================================================
// IR constructors
// =========================================================================

export const top = (): TypeIR => topOf(irMeta());
export const string = (): TypeIR => primitiveOf("string", irMeta());
export const int = (): TypeIR => primitiveOf("int", irMeta());
export const float = (): TypeIR => primitiveOf("float", irMeta());
export const bool = (): TypeIR => primitiveOf("bool", irMeta());
export const nullType = (): TypeIR => primitiveOf("null", irMeta());
export const media = (kind: MediaType): TypeIR => primitiveOf(`media:${kind}`, irMeta());

export const literalString = (value: string): TypeIR => literalOf({ kind: "string", value }, irMeta());
export const literalInt = (value: bigint): TypeIR => literalOf({ kind: "int", value }, irMeta());
export const literalBool = (value: boolean): TypeIR => literalOf({ kind: "bool", value }, irMeta());

export const enumType = (name: string, dynamic = false): TypeIR => enumOf(name, irMeta(), dynamic);

export const classType = (name: string, mode: StreamingMode = "NonStreaming"): TypeIR =>
  classOf(name, irMeta(), mode);

export const recursiveAlias = (name: string): TypeIR => aliasOf(name, irMeta());

export const list = (item: TypeIR): TypeIR => listOf(item, irMeta());
export const map = (key: TypeIR, value: TypeIR): TypeIR => mapOf(key, value, irMeta());
export const tuple = (items: readonly TypeIR[]): TypeIR => tupleOf(items, irMeta());
export const arrow = (params: readonly TypeIR[], returns: TypeIR): TypeIR => arrowOf(params, returns, irMeta());
export const union = (types: readonly TypeIR[]): TypeIR => unionOf(types, irMeta());
export const optional = (t: TypeIR): TypeIR => optionalOf(t, irMeta());

/** Append constraints to an IR type's metadata. */
export function withConstraints(t: TypeIR, constraints: readonly Constraint[]): TypeIR {
  if (constraints.length === 0) return t;
  return withMeta(t, { ...t.meta, constraints: [...t.meta.constraints, ...constraints] });
}

export function withStreaming(t: TypeIR, behavior: Partial<StreamingBehavior>): TypeIR {
  const meta: IRMeta = { ...t.meta, streamingBehavior: { ...t.meta.streamingBehavior, ...behavior } };
  return withMeta(t, meta);
}

export function isOptional<M extends MetaBase>(t: TypeGeneric<M>): boolean {
  return isNullType(t) || (t.tag === "Union" && t.union.nullType !== undefined);
}
