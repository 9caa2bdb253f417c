import type { FieldCodec } from "./adapters";

export type ScalarType =
  | "bool"
  | "char"
  | "string"
  | "f32"
  | "f64"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "isize"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "usize"
  | "i128"
  | "u128"
  | "unit";

export type IntRepr = "string" | "i64";
export type MapKeyRepr = "string" | "pairs";

export interface CheckSpec {
  readonly label: string;
  readonly expression: string;
}

export interface AssertSpec {
  readonly label?: string;
  readonly expression: string;
}

export interface TypeAttrs {
  /** Rendered (display) name. */
  readonly rename?: string;
  /** Registry key override. */
  readonly internalName?: string;
  readonly description?: string;
  readonly checks?: readonly CheckSpec[];
  readonly asserts?: readonly AssertSpec[];
}

export interface EnumAttrs extends TypeAttrs {
  /** Tag field name for data enums. */
  readonly tag?: string;
  /** Render a unit enum as an inline union of string literals. */
  readonly asUnion?: boolean;
}

export interface FieldAttrs {
  readonly rename?: string;
  /** Extra input name accepted when reading the field. */
  readonly alias?: string;
  readonly skip?: boolean;
  /** `true` uses the type's zero value. */
  readonly default?: true | (() => unknown);
  readonly description?: string;
  readonly with?: FieldCodec<unknown>;
  readonly intRepr?: IntRepr;
  readonly mapKeyRepr?: MapKeyRepr;
  readonly checks?: readonly CheckSpec[];
  readonly asserts?: readonly AssertSpec[];
}

export interface VariantAttrs {
  readonly rename?: string;
  readonly alias?: string;
  readonly description?: string;
}

/**
 * Shapes carry the native TypeScript type they describe as a phantom
 * parameter; nothing reads `__native` at run time.
 */
interface ShapeBase<T> {
  readonly id: number;
  readonly typeIdentifier: string;
  readonly __native?: T;
}

export type ShapeRef = Shape | (() => Shape);

export interface ScalarShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Scalar";
  readonly scalar: ScalarType;
}

export interface OptionShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Option";
  readonly inner: ShapeRef;
}

export type ListCollection = "array" | "set" | "fixed";

export interface ListShape<T = unknown> extends ShapeBase<T> {
  readonly def: "List";
  readonly inner: ShapeRef;
  readonly collection: ListCollection;
  /** Required length for `fixed` collections. */
  readonly length?: number;
}

export interface MapShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Map";
  readonly key: ShapeRef;
  readonly value: ShapeRef;
  /** `map` is a JS Map; `record` a string-keyed plain object. */
  readonly collection: "map" | "record";
}

export type PointerKind = "box" | "rc" | "arc";

export interface PointerShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Pointer";
  readonly pointer: PointerKind;
  readonly pointee: ShapeRef;
}

export interface FieldShape {
  readonly name: string;
  readonly shape: ShapeRef;
  readonly doc: readonly string[];
  readonly attrs: FieldAttrs;
}

export interface StructShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Struct";
  readonly module?: string;
  readonly doc: readonly string[];
  readonly attrs: TypeAttrs;
  readonly fields: readonly FieldShape[];
}

export interface VariantShape {
  readonly name: string;
  readonly doc: readonly string[];
  readonly attrs: VariantAttrs;
  readonly fields: readonly FieldShape[];
}

export interface EnumShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Enum";
  readonly module?: string;
  readonly doc: readonly string[];
  readonly attrs: EnumAttrs;
  readonly variants: readonly VariantShape[];
}

/** Shapes that have no schema representation. */
export interface UnsupportedShape<T = unknown> extends ShapeBase<T> {
  readonly def: "Tuple" | "Function" | "Dynamic" | "Opaque";
}

export type Shape<T = unknown> =
  | ScalarShape<T>
  | OptionShape<T>
  | ListShape<T>
  | MapShape<T>
  | PointerShape<T>
  | StructShape<T>
  | EnumShape<T>
  | UnsupportedShape<T>;

export function resolveRef(ref: ShapeRef): Shape {
  return typeof ref === "function" ? ref() : ref;
}

/** Data enums have at least one variant with fields. */
export function isDataEnum(shape: EnumShape): boolean {
  return shape.variants.some(v => v.fields.length > 0);
}
