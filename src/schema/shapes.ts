import type {
  EnumAttrs,
  EnumShape,
  FieldAttrs,
  FieldShape,
  ListShape,
  MapShape,
  OptionShape,
  PointerKind,
  PointerShape,
  ScalarShape,
  ScalarType,
  Shape,
  StructShape,
  TypeAttrs,
  UnsupportedShape,
  VariantAttrs,
  VariantShape,
} from "./shape";

let nextId = 1;

function nextShapeId(): number {
  return nextId++;
}

type Ref<T> = Shape<T> | (() => Shape<T>);

function docLines(doc: string | readonly string[] | undefined): readonly string[] {
  if (doc === undefined) return [];
  return typeof doc === "string" ? doc.split("\n") : doc;
}

function scalar<T>(kind: ScalarType, typeIdentifier: string): ScalarShape<T> {
  return { id: nextShapeId(), def: "Scalar", scalar: kind, typeIdentifier };
}

export const scalars = {
  bool: scalar<boolean>("bool", "bool"),
  char: scalar<string>("char", "char"),
  string: scalar<string>("string", "String"),
  f32: scalar<number>("f32", "f32"),
  f64: scalar<number>("f64", "f64"),
  i8: scalar<number>("i8", "i8"),
  i16: scalar<number>("i16", "i16"),
  i32: scalar<number>("i32", "i32"),
  u8: scalar<number>("u8", "u8"),
  u16: scalar<number>("u16", "u16"),
  u32: scalar<number>("u32", "u32"),
  i64: scalar<bigint>("i64", "i64"),
  isize: scalar<bigint>("isize", "isize"),
  u64: scalar<bigint>("u64", "u64"),
  usize: scalar<bigint>("usize", "usize"),
  i128: scalar<bigint>("i128", "i128"),
  u128: scalar<bigint>("u128", "u128"),
  unit: scalar<null>("unit", "()"),
};

export function option<T>(inner: Ref<T>): OptionShape<T | null> {
  return { id: nextShapeId(), def: "Option", inner, typeIdentifier: "Option" };
}

export function list<T>(inner: Ref<T>): ListShape<T[]> {
  return { id: nextShapeId(), def: "List", inner, collection: "array", typeIdentifier: "Vec" };
}

export function set<T>(inner: Ref<T>): ListShape<Set<T>> {
  return { id: nextShapeId(), def: "List", inner, collection: "set", typeIdentifier: "Set" };
}

export function fixedArray<T>(inner: Ref<T>, length: number): ListShape<T[]> {
  return { id: nextShapeId(), def: "List", inner, collection: "fixed", length, typeIdentifier: `[_; ${length}]` };
}

export function map<K, V>(key: Ref<K>, value: Ref<V>): MapShape<Map<K, V>> {
  return { id: nextShapeId(), def: "Map", key, value, collection: "map", typeIdentifier: "Map" };
}

export function record<V>(value: Ref<V>): MapShape<Record<string, V>> {
  return {
    id: nextShapeId(),
    def: "Map",
    key: scalars.string,
    value,
    collection: "record",
    typeIdentifier: "Record",
  };
}

function pointer<T>(kind: PointerKind, pointee: Ref<T>): PointerShape<T> {
  return { id: nextShapeId(), def: "Pointer", pointer: kind, pointee, typeIdentifier: kind };
}

export const box = <T>(pointee: Ref<T>): PointerShape<T> => pointer("box", pointee);
export const rc = <T>(pointee: Ref<T>): PointerShape<T> => pointer("rc", pointee);
export const arc = <T>(pointee: Ref<T>): PointerShape<T> => pointer("arc", pointee);

export function field(name: string, shape: Ref<unknown>, attrs: FieldAttrs & { doc?: string | string[] } = {}): FieldShape {
  const { doc, ...rest } = attrs;
  return { name, shape, doc: docLines(doc), attrs: rest };
}

export function struct<T>(
  typeIdentifier: string,
  opts: { module?: string; doc?: string | string[]; attrs?: TypeAttrs; fields: FieldShape[] }
): StructShape<T> {
  return {
    id: nextShapeId(),
    def: "Struct",
    typeIdentifier,
    module: opts.module,
    doc: docLines(opts.doc),
    attrs: opts.attrs ?? {},
    fields: opts.fields,
  };
}

export function variant(
  name: string,
  opts: { doc?: string | string[]; attrs?: VariantAttrs; fields?: FieldShape[] } = {}
): VariantShape {
  return { name, doc: docLines(opts.doc), attrs: opts.attrs ?? {}, fields: opts.fields ?? [] };
}

export function enumeration<T>(
  typeIdentifier: string,
  opts: { module?: string; doc?: string | string[]; attrs?: EnumAttrs; variants: VariantShape[] }
): EnumShape<T> {
  return {
    id: nextShapeId(),
    def: "Enum",
    typeIdentifier,
    module: opts.module,
    doc: docLines(opts.doc),
    attrs: opts.attrs ?? {},
    variants: opts.variants,
  };
}

export function unsupported(def: UnsupportedShape["def"], typeIdentifier: string): UnsupportedShape<never> {
  return { id: nextShapeId(), def, typeIdentifier };
}
