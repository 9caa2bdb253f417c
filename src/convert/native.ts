import { DEFAULT_TAG_FIELD, type SchemaBundle } from "../schema/builder";
import { baseInternalName } from "../schema/names";
import { resolveRef, type EnumShape, type FieldShape, type ScalarType, type Shape, type StructShape } from "../schema/shape";
import { InvariantViolationError } from "./errors";
import type { ValuePath } from "../value/path";

/** Inclusive bounds of each integer scalar. */
export const INT_RANGES: Readonly<Partial<Record<ScalarType, readonly [bigint, bigint]>>> = {
  i8: [-(2n ** 7n), 2n ** 7n - 1n],
  i16: [-(2n ** 15n), 2n ** 15n - 1n],
  i32: [-(2n ** 31n), 2n ** 31n - 1n],
  i64: [-(2n ** 63n), 2n ** 63n - 1n],
  isize: [-(2n ** 63n), 2n ** 63n - 1n],
  u8: [0n, 2n ** 8n - 1n],
  u16: [0n, 2n ** 16n - 1n],
  u32: [0n, 2n ** 32n - 1n],
  u64: [0n, 2n ** 64n - 1n],
  usize: [0n, 2n ** 64n - 1n],
  i128: [-(2n ** 127n), 2n ** 127n - 1n],
  u128: [0n, 2n ** 128n - 1n],
};

/** Integer scalars carried as `number` natively. */
const NUMBER_INTS = new Set<ScalarType>(["i8", "i16", "i32", "u8", "u16", "u32"]);

export function isNumberInt(scalar: ScalarType): boolean {
  return NUMBER_INTS.has(scalar);
}

export function inIntRange(scalar: ScalarType, value: bigint): boolean {
  const range = INT_RANGES[scalar];
  return range !== undefined && value >= range[0] && value <= range[1];
}

/** Names the converters need to agree with the built schema. */
export interface NameTable {
  internalName(shape: StructShape | EnumShape): string;
  readonly defaultTagField: string;
}

export function nameTable(bundle?: SchemaBundle): NameTable {
  return {
    internalName: shape => bundle?.names.get(shape) ?? baseInternalName(shape),
    defaultTagField: bundle?.defaultTagField ?? DEFAULT_TAG_FIELD,
  };
}

export function tagFieldOf(shape: EnumShape, names: NameTable): string {
  return shape.attrs.tag ?? names.defaultTagField;
}

/** Type name used in "expected ..." messages. */
export function describeShape(shape: Shape): string {
  switch (shape.def) {
    case "Scalar":
      return shape.scalar === "string" ? "string" : shape.scalar;
    case "Option":
      return `${describeShape(resolveRef(shape.inner))}?`;
    case "List":
      if (shape.collection === "fixed") return `${describeShape(resolveRef(shape.inner))}[${shape.length ?? 0}]`;
      return `${describeShape(resolveRef(shape.inner))}[]`;
    case "Map":
      return `map<${describeShape(resolveRef(shape.key))}, ${describeShape(resolveRef(shape.value))}>`;
    case "Pointer":
      return describeShape(resolveRef(shape.pointee));
    default:
      return shape.typeIdentifier;
  }
}

export function unwrapPointer(shape: Shape): Shape {
  let current = shape;
  while (current.def === "Pointer") current = resolveRef(current.pointee);
  return current;
}

export function isOptionShape(shape: Shape): boolean {
  return unwrapPointer(shape).def === "Option";
}

/** The type's zero value, used for `default: true` and skipped fields. */
export function zeroValue(shape: Shape, path: ValuePath): unknown {
  switch (shape.def) {
    case "Scalar":
      switch (shape.scalar) {
        case "bool":
          return false;
        case "char":
        case "string":
          return "";
        case "f32":
        case "f64":
          return 0;
        case "unit":
          return null;
        default:
          return isNumberInt(shape.scalar) ? 0 : 0n;
      }
    case "Option":
      return null;
    case "List":
      if (shape.collection === "set") return new Set();
      if (shape.collection === "fixed") {
        const inner = resolveRef(shape.inner);
        return Array.from({ length: shape.length ?? 0 }, (_, i) => zeroValue(inner, path.index(i)));
      }
      return [];
    case "Map":
      return shape.collection === "record" ? {} : new Map();
    case "Pointer":
      return zeroValue(resolveRef(shape.pointee), path);
    case "Struct": {
      const out: Record<string, unknown> = {};
      for (const f of shape.fields) {
        out[f.name] = fieldDefault(f, path.field(f.name));
      }
      return out;
    }
    case "Enum": {
      const first = shape.variants[0];
      if (first === undefined || first.fields.length > 0) {
        throw new InvariantViolationError(`${shape.typeIdentifier} has no field-free first variant to default to`, path);
      }
      return first.name;
    }
    default:
      throw new InvariantViolationError(`${shape.typeIdentifier} has no default value`, path);
  }
}

/** A field's declared default, or the zero value of its type. */
export function fieldDefault(f: FieldShape, path: ValuePath): unknown {
  const d = f.attrs.default;
  if (typeof d === "function") return d();
  return zeroValue(resolveRef(f.shape), path);
}

export function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Map) && !(value instanceof Set);
}
