import type { IRMeta, MetaBase, NonStreamingMeta, StreamingMeta } from "./meta";

export type MediaType = "image" | "audio" | "pdf" | "video";

export type TypeValue = "string" | "int" | "float" | "bool" | "null" | `media:${MediaType}`;

export type LiteralValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "bool"; readonly value: boolean };

export type StreamingMode = "NonStreaming" | "Streaming";

export interface TTop<M extends MetaBase> {
  readonly tag: "Top";
  readonly meta: M;
}

export interface TPrimitive<M extends MetaBase> {
  readonly tag: "Primitive";
  readonly value: TypeValue;
  readonly meta: M;
}

export interface TEnum<M extends MetaBase> {
  readonly tag: "Enum";
  readonly name: string;
  readonly dynamic: boolean;
  readonly meta: M;
}

export interface TLiteral<M extends MetaBase> {
  readonly tag: "Literal";
  readonly value: LiteralValue;
  readonly meta: M;
}

export interface TClass<M extends MetaBase> {
  readonly tag: "Class";
  readonly name: string;
  readonly mode: StreamingMode;
  readonly dynamic: boolean;
  readonly meta: M;
}

export interface TList<M extends MetaBase> {
  readonly tag: "List";
  readonly item: TypeGeneric<M>;
  readonly meta: M;
}

export interface TMap<M extends MetaBase> {
  readonly tag: "Map";
  readonly key: TypeGeneric<M>;
  readonly value: TypeGeneric<M>;
  readonly meta: M;
}

export interface TTuple<M extends MetaBase> {
  readonly tag: "Tuple";
  readonly items: readonly TypeGeneric<M>[];
  readonly meta: M;
}

export interface TRecursiveTypeAlias<M extends MetaBase> {
  readonly tag: "RecursiveTypeAlias";
  readonly name: string;
  readonly mode: StreamingMode;
  readonly meta: M;
}

export interface TArrow<M extends MetaBase> {
  readonly tag: "Arrow";
  readonly params: readonly TypeGeneric<M>[];
  readonly returns: TypeGeneric<M>;
  readonly meta: M;
}

/**
 * Ordered union members. Null is kept apart from the other members so a
 * union can never hold more than one null; iteration places it last.
 */
export interface UnionType<M extends MetaBase> {
  readonly members: readonly TypeGeneric<M>[];
  readonly nullType?: TypeGeneric<M>;
}

export interface TUnion<M extends MetaBase> {
  readonly tag: "Union";
  readonly union: UnionType<M>;
  readonly meta: M;
}

export type TypeGeneric<M extends MetaBase> =
  | TTop<M>
  | TPrimitive<M>
  | TEnum<M>
  | TLiteral<M>
  | TClass<M>
  | TList<M>
  | TMap<M>
  | TTuple<M>
  | TRecursiveTypeAlias<M>
  | TArrow<M>
  | TUnion<M>;

export type TypeIR = TypeGeneric<IRMeta>;
export type TypeNonStreaming = TypeGeneric<NonStreamingMeta>;
export type TypeStreaming = TypeGeneric<StreamingMeta>;
