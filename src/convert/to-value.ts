import { defaultSchemaCache } from "../schema/cache";
import { mapEntryNames, variantClassName, type FieldContext, type SchemaBundle } from "../schema/builder";
import { renderedFieldName, renderedVariantName } from "../schema/names";
import {
  isDataEnum,
  resolveRef,
  type EnumShape,
  type FieldShape,
  type IntRepr,
  type MapKeyRepr,
  type MapShape,
  type ScalarShape,
  type Shape,
  type StructShape,
} from "../schema/shape";
import { ValuePath } from "../value/path";
import {
  I64_MAX,
  I64_MIN,
  NULL,
  vBool,
  vClass,
  vEnum,
  vFloat,
  vInt,
  vList,
  vMap,
  vString,
  type BamlValue,
} from "../value/value";
import { InvariantViolationError } from "./errors";
import { inIntRange, isRecordObject, nameTable, tagFieldOf, type NameTable } from "./native";

export interface ToValueOptions {
  /** Bundle whose internal names class and enum values carry. */
  bundle?: SchemaBundle;
}

/**
 * Native value to dynamic value. Infallible for values that match their
 * shape; a value that does not is a caller defect and raises
 * `InvariantViolationError`.
 */
export function toBamlValue<T>(shape: Shape<T>, value: T, options: ToValueOptions = {}): BamlValue {
  const bundle = options.bundle ?? defaultSchemaCache.get(shape);
  return new ToValue(nameTable(bundle)).convert(shape, value, ValuePath.ROOT);
}

class ToValue {
  constructor(private readonly names: NameTable) {}

  convert(shape: Shape, value: unknown, path: ValuePath): BamlValue {
    switch (shape.def) {
      case "Scalar":
        return this.scalar(shape, value, path);
      case "Option":
        return value === null || value === undefined ? NULL : this.convert(resolveRef(shape.inner), value, path);
      case "List":
        return vList(this.items(value, path).map((item, i) => this.convert(resolveRef(shape.inner), item, path.index(i))));
      case "Map":
        return vMap(this.mapEntries(shape, value, path));
      case "Pointer":
        return this.convert(resolveRef(shape.pointee), value, path);
      case "Struct":
        return this.struct(shape, value, path);
      case "Enum":
        return this.enumeration(shape, value, path);
      default:
        throw new InvariantViolationError(`${shape.typeIdentifier} has no dynamic representation`, path);
    }
  }

  private scalar(shape: ScalarShape, value: unknown, path: ValuePath): BamlValue {
    const mismatch = (): never => {
      throw new InvariantViolationError(`expected ${shape.scalar}, got ${typeof value}`, path);
    };
    switch (shape.scalar) {
      case "bool":
        return typeof value === "boolean" ? vBool(value) : mismatch();
      case "char":
      case "string":
        return typeof value === "string" ? vString(value) : mismatch();
      case "f32":
      case "f64":
        return typeof value === "number" ? vFloat(value) : mismatch();
      case "unit":
        return NULL;
      default: {
        if (typeof value !== "bigint" && !(typeof value === "number" && Number.isInteger(value))) return mismatch();
        const n = BigInt(value);
        if (!inIntRange(shape.scalar, n) || n < I64_MIN || n > I64_MAX) {
          throw new InvariantViolationError(`integer out of range (expected ${shape.scalar}, got ${n})`, path);
        }
        return vInt(n);
      }
    }
  }

  private items(value: unknown, path: ValuePath): unknown[] {
    if (Array.isArray(value)) return value;
    if (value instanceof Set) return Array.from(value);
    throw new InvariantViolationError("expected an array or set", path);
  }

  private nativeEntries(value: unknown, path: ValuePath): [unknown, unknown][] {
    if (value instanceof Map) return Array.from(value.entries());
    if (isRecordObject(value)) return Object.entries(value);
    throw new InvariantViolationError("expected a Map or record", path);
  }

  private mapEntries(shape: MapShape, value: unknown, path: ValuePath): [string, BamlValue][] {
    const valueShape = resolveRef(shape.value);
    return this.nativeEntries(value, path).map(([k, v]): [string, BamlValue] => {
      if (typeof k !== "string") throw new InvariantViolationError("map keys must be strings", path);
      return [k, this.convert(valueShape, v, path.key(k))];
    });
  }

  private struct(shape: StructShape, value: unknown, path: ValuePath): BamlValue {
    if (!isRecordObject(value)) throw new InvariantViolationError(`expected ${shape.typeIdentifier} object`, path);
    const internal = this.names.internalName(shape);
    return vClass(internal, this.fields(shape.fields, value, path, { ownerInternalName: internal, fieldName: "", renderedField: "" }));
  }

  private fields(
    fields: readonly FieldShape[],
    value: Record<string, unknown>,
    path: ValuePath,
    owner: FieldContext
  ): [string, BamlValue][] {
    const out: [string, BamlValue][] = [];
    for (const f of fields) {
      if (f.attrs.skip) continue;
      const fieldPath = path.field(f.name);
      const ctx: FieldContext = { ...owner, fieldName: f.name, renderedField: renderedFieldName(f) };
      out.push([f.name, this.field(f, value[f.name], fieldPath, ctx)]);
    }
    return out;
  }

  private field(f: FieldShape, value: unknown, path: ValuePath, ctx: FieldContext): BamlValue {
    if (f.attrs.with) return f.attrs.with.toBaml(value);
    if (f.attrs.intRepr !== undefined) return this.intRepr(resolveRef(f.shape), f.attrs.intRepr, value, path);
    if (f.attrs.mapKeyRepr !== undefined) return this.mapKeyRepr(resolveRef(f.shape), f.attrs.mapKeyRepr, value, path, ctx);
    return this.convert(resolveRef(f.shape), value, path);
  }

  private intRepr(shape: Shape, repr: IntRepr, value: unknown, path: ValuePath): BamlValue {
    switch (shape.def) {
      case "Option":
        return value === null || value === undefined ? NULL : this.intRepr(resolveRef(shape.inner), repr, value, path);
      case "List":
        return vList(this.items(value, path).map((item, i) => this.intRepr(resolveRef(shape.inner), repr, item, path.index(i))));
      case "Pointer":
        return this.intRepr(resolveRef(shape.pointee), repr, value, path);
      default:
        break;
    }
    if (typeof value !== "bigint" && !(typeof value === "number" && Number.isInteger(value))) {
      throw new InvariantViolationError(`expected an integer for ${shape.typeIdentifier}`, path);
    }
    const n = BigInt(value);
    if (repr === "string") return vString(n.toString());
    if (n < I64_MIN || n > I64_MAX) {
      throw new InvariantViolationError(`${n} does not fit i64 for intRepr "i64"`, path);
    }
    return vInt(n);
  }

  private mapKeyRepr(shape: Shape, repr: MapKeyRepr, value: unknown, path: ValuePath, ctx: FieldContext): BamlValue {
    switch (shape.def) {
      case "Option":
        return value === null || value === undefined
          ? NULL
          : this.mapKeyRepr(resolveRef(shape.inner), repr, value, path, ctx);
      case "List":
        return vList(
          this.items(value, path).map((item, i) => this.mapKeyRepr(resolveRef(shape.inner), repr, item, path.index(i), ctx))
        );
      case "Pointer":
        return this.mapKeyRepr(resolveRef(shape.pointee), repr, value, path, ctx);
      case "Map":
        break;
      default:
        return this.convert(shape, value, path);
    }

    const keyShape = resolveRef(shape.key);
    const valueShape = resolveRef(shape.value);
    const entries = this.nativeEntries(value, path);

    if (repr === "string") {
      return vMap(
        entries.map(([k, v]): [string, BamlValue] => {
          const key = keyToString(k, path);
          return [key, this.convert(valueShape, v, path.key(key))];
        })
      );
    }

    const entryClass = mapEntryNames(ctx).internal;
    return vList(
      entries.map(([k, v], i) =>
        vClass(entryClass, [
          ["key", this.convert(keyShape, k, path.index(i).field("key"))],
          ["value", this.convert(valueShape, v, path.index(i).field("value"))],
        ])
      )
    );
  }

  private enumeration(shape: EnumShape, value: unknown, path: ValuePath): BamlValue {
    const internal = this.names.internalName(shape);

    if (!isDataEnum(shape)) {
      const v = shape.variants.find(x => x.name === value);
      if (!v) throw new InvariantViolationError(`${String(value)} is not a variant of ${shape.typeIdentifier}`, path);
      return shape.attrs.asUnion ? vString(renderedVariantName(v)) : vEnum(internal, v.name);
    }

    if (!isRecordObject(value)) throw new InvariantViolationError(`expected ${shape.typeIdentifier} object`, path);
    const tag = tagFieldOf(shape, this.names);
    const v = shape.variants.find(x => x.name === value[tag]);
    if (!v) throw new InvariantViolationError(`${String(value[tag])} is not a variant of ${shape.typeIdentifier}`, path);

    const variantRendered = renderedVariantName(v);
    const fields = this.fields(v.fields, value, path, {
      ownerInternalName: internal,
      fieldName: "",
      renderedField: "",
      variantName: v.name,
      variantRendered,
    });
    return vClass(variantClassName(internal, v), [[tag, vString(variantRendered)], ...fields]);
  }
}

function keyToString(key: unknown, path: ValuePath): string {
  switch (typeof key) {
    case "string":
      return key;
    case "number":
    case "bigint":
    case "boolean":
      return String(key);
    default:
      throw new InvariantViolationError(`map key of type ${typeof key} has no string form`, path);
  }
}
