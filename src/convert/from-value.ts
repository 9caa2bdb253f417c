import { defaultSchemaCache } from "../schema/cache";
import { mapEntryNames, type FieldContext, type SchemaBundle } from "../schema/builder";
import { renderedFieldName, renderedVariantName } from "../schema/names";
import {
  isDataEnum,
  resolveRef,
  type EnumShape,
  type FieldShape,
  type IntRepr,
  type MapKeyRepr,
  type ScalarShape,
  type Shape,
  type StructShape,
  type VariantShape,
} from "../schema/shape";
import { ValuePath } from "../value/path";
import { describeValue, entriesOf, type BamlValue } from "../value/value";
import { BamlConvertError, InvariantViolationError } from "./errors";
import {
  describeShape,
  fieldDefault,
  inIntRange,
  isNumberInt,
  isOptionShape,
  nameTable,
  tagFieldOf,
  unwrapPointer,
  type NameTable,
} from "./native";

export interface FromValueOptions {
  bundle?: SchemaBundle;
  /** Path the value sits at, for error messages. */
  path?: ValuePath;
}

/**
 * Dynamic value to native value. Throws `BamlConvertError` naming the path,
 * the expected type and what was found.
 */
export function fromBamlValue<T>(shape: Shape<T>, value: BamlValue, options: FromValueOptions = {}): T {
  const bundle = options.bundle ?? defaultSchemaCache.get(shape);
  const out = new FromValue(nameTable(bundle)).convert(shape, value, options.path ?? ValuePath.ROOT);
  return out as T;
}

const DECIMAL = /^[+-]?\d+$/;

class FromValue {
  constructor(private readonly names: NameTable) {}

  convert(shape: Shape, value: BamlValue, path: ValuePath): unknown {
    if (value.tag === "Media") {
      throw new BamlConvertError(path, describeShape(shape), describeValue(value), "unsupported media value");
    }
    switch (shape.def) {
      case "Scalar":
        return this.scalar(shape, value, path);
      case "Option":
        return value.tag === "Null" ? null : this.convert(resolveRef(shape.inner), value, path);
      case "List":
        return this.list(shape.collection, shape.length, resolveRef(shape.inner), value, path, (s, v, p) =>
          this.convert(s, v, p)
        );
      case "Map": {
        const entries = this.entries(shape, value, path);
        const valueShape = resolveRef(shape.value);
        const converted = Array.from(entries, ([k, v]): [string, unknown] => [k, this.convert(valueShape, v, path.key(k))]);
        return shape.collection === "record" ? Object.fromEntries(converted) : new Map(converted);
      }
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

  private mismatch(shape: Shape, value: BamlValue, path: ValuePath): never {
    throw new BamlConvertError(path, describeShape(shape), describeValue(value), "type mismatch");
  }

  private scalar(shape: ScalarShape, value: BamlValue, path: ValuePath): unknown {
    switch (shape.scalar) {
      case "bool":
        return value.tag === "Bool" ? value.value : this.mismatch(shape, value, path);
      case "string":
        return value.tag === "String" ? value.value : this.mismatch(shape, value, path);
      case "char":
        if (value.tag === "String" && Array.from(value.value).length === 1) return value.value;
        return this.mismatch(shape, value, path);
      case "f32":
      case "f64":
        if (value.tag === "Float") return value.value;
        if (value.tag === "Int") return Number(value.value);
        return this.mismatch(shape, value, path);
      case "unit":
        return value.tag === "Null" ? null : this.mismatch(shape, value, path);
      default:
        if (value.tag !== "Int") return this.mismatch(shape, value, path);
        return this.integer(shape, value.value, path);
    }
  }

  private integer(shape: ScalarShape, n: bigint, path: ValuePath): number | bigint {
    if (!inIntRange(shape.scalar, n)) {
      throw new BamlConvertError(path, shape.scalar, n.toString(), "integer out of range", "out-of-range");
    }
    return isNumberInt(shape.scalar) ? Number(n) : n;
  }

  private list(
    collection: "array" | "set" | "fixed",
    length: number | undefined,
    inner: Shape,
    value: BamlValue,
    path: ValuePath,
    item: (shape: Shape, value: BamlValue, path: ValuePath) => unknown
  ): unknown {
    if (value.tag !== "List") {
      throw new BamlConvertError(path, `${describeShape(inner)}[]`, describeValue(value), "type mismatch");
    }
    if (collection === "fixed" && value.items.length !== length) {
      throw new BamlConvertError(
        path,
        `${describeShape(inner)}[${length ?? 0}]`,
        `list of ${value.items.length}`,
        "wrong list length"
      );
    }
    const items = value.items.map((v, i) => item(inner, v, path.index(i)));
    return collection === "set" ? new Set(items) : items;
  }

  private entries(shape: Shape, value: BamlValue, path: ValuePath): ReadonlyMap<string, BamlValue> {
    const entries = entriesOf(value);
    if (entries === undefined) return this.mismatch(shape, value, path);
    return entries;
  }

  private struct(shape: StructShape, value: BamlValue, path: ValuePath): Record<string, unknown> {
    const entries = this.entries(shape, value, path);
    const ctx: FieldContext = { ownerInternalName: this.names.internalName(shape), fieldName: "", renderedField: "" };
    return this.fields(shape.fields, entries, path, ctx);
  }

  private fields(
    fields: readonly FieldShape[],
    entries: ReadonlyMap<string, BamlValue>,
    path: ValuePath,
    owner: FieldContext
  ): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const f of fields) {
      const fieldPath = path.field(f.name);
      if (f.attrs.skip) {
        out[f.name] = fieldDefault(f, fieldPath);
        continue;
      }

      const found = lookupField(f, entries);
      const defaulted = f.attrs.default !== undefined;
      if (found === undefined || (found.tag === "Null" && defaulted)) {
        if (defaulted) {
          out[f.name] = fieldDefault(f, fieldPath);
        } else if (!f.attrs.with && isOptionShape(resolveRef(f.shape))) {
          out[f.name] = null;
        } else {
          throw BamlConvertError.missingField(fieldPath, describeShape(resolveRef(f.shape)));
        }
        continue;
      }

      const ctx: FieldContext = { ...owner, fieldName: f.name, renderedField: renderedFieldName(f) };
      out[f.name] = this.field(f, found, fieldPath, ctx);
    }
    return out;
  }

  private field(f: FieldShape, value: BamlValue, path: ValuePath, ctx: FieldContext): unknown {
    const shape = resolveRef(f.shape);
    if (f.attrs.with) return f.attrs.with.fromBaml(value, path);
    if (value.tag === "Null" && !isOptionShape(shape)) {
      throw BamlConvertError.nullForRequired(path, describeShape(shape));
    }
    if (f.attrs.intRepr !== undefined) return this.intRepr(shape, f.attrs.intRepr, value, path);
    if (f.attrs.mapKeyRepr !== undefined) return this.mapKeyRepr(shape, f.attrs.mapKeyRepr, value, path, ctx);
    return this.convert(shape, value, path);
  }

  private intRepr(shape: Shape, repr: IntRepr, value: BamlValue, path: ValuePath): unknown {
    switch (shape.def) {
      case "Option":
        return value.tag === "Null" ? null : this.intRepr(resolveRef(shape.inner), repr, value, path);
      case "List":
        return this.list(shape.collection, shape.length, resolveRef(shape.inner), value, path, (s, v, p) =>
          this.intRepr(s, repr, v, p)
        );
      case "Pointer":
        return this.intRepr(resolveRef(shape.pointee), repr, value, path);
      case "Scalar":
        break;
      default:
        throw new InvariantViolationError(`intRepr on non-integer ${shape.typeIdentifier}`, path);
    }

    if (repr === "i64") {
      if (value.tag !== "Int") return this.mismatch(shape, value, path);
      return this.integer(shape, value.value, path);
    }
    if (value.tag !== "String") {
      throw new BamlConvertError(path, `${shape.scalar} as string`, describeValue(value), "type mismatch");
    }
    if (!DECIMAL.test(value.value)) {
      throw new BamlConvertError(path, shape.scalar, describeValue(value), "invalid integer string");
    }
    return this.integer(shape, BigInt(value.value), path);
  }

  private mapKeyRepr(shape: Shape, repr: MapKeyRepr, value: BamlValue, path: ValuePath, ctx: FieldContext): unknown {
    switch (shape.def) {
      case "Option":
        return value.tag === "Null" ? null : this.mapKeyRepr(resolveRef(shape.inner), repr, value, path, ctx);
      case "List":
        return this.list(shape.collection, shape.length, resolveRef(shape.inner), value, path, (s, v, p) =>
          this.mapKeyRepr(s, repr, v, p, ctx)
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
    const out = new Map<unknown, unknown>();

    if (repr === "string") {
      for (const [k, v] of this.entries(shape, value, path)) {
        const keyPath = path.key(k);
        out.set(this.parseKey(keyShape, k, keyPath), this.convert(valueShape, v, keyPath));
      }
    } else {
      if (value.tag !== "List") {
        throw new BamlConvertError(path, `${mapEntryNames(ctx).rendered}[]`, describeValue(value), "type mismatch");
      }
      value.items.forEach((item, i) => {
        const entryPath = path.index(i);
        const entry = this.entries(shape, item, entryPath);
        const k = entry.get("key");
        const v = entry.get("value");
        if (k === undefined) throw BamlConvertError.missingField(entryPath.field("key"), describeShape(keyShape));
        if (v === undefined) throw BamlConvertError.missingField(entryPath.field("value"), describeShape(valueShape));
        out.set(this.convert(keyShape, k, entryPath.field("key")), this.convert(valueShape, v, entryPath.field("value")));
      });
    }
    return shape.collection === "record" ? Object.fromEntries(out) : out;
  }

  /** Inverse of the string form `mapKeyRepr: "string"` gives a key. */
  private parseKey(shape: Shape, key: string, path: ValuePath): unknown {
    const s = unwrapPointer(shape);
    const fail = (): never => {
      throw new BamlConvertError(path, describeShape(s), `string ${JSON.stringify(key)}`, "invalid map key");
    };
    if (s.def === "Enum" && !isDataEnum(s)) {
      const v = s.variants.find(x => x.name === key || renderedVariantName(x) === key || x.attrs.alias === key);
      return v ? v.name : fail();
    }
    if (s.def !== "Scalar") return fail();
    switch (s.scalar) {
      case "string":
        return key;
      case "char":
        return Array.from(key).length === 1 ? key : fail();
      case "bool":
        return key === "true" ? true : key === "false" ? false : fail();
      case "f32":
      case "f64": {
        const n = Number(key);
        return key.trim() === "" || Number.isNaN(n) ? fail() : n;
      }
      case "unit":
        return fail();
      default:
        return DECIMAL.test(key) ? this.integer(s, BigInt(key), path) : fail();
    }
  }

  private enumeration(shape: EnumShape, value: BamlValue, path: ValuePath): unknown {
    if (!isDataEnum(shape)) {
      const name = value.tag === "Enum" ? value.variant : value.tag === "String" ? value.value : undefined;
      if (name === undefined) return this.mismatch(shape, value, path);
      const v = matchVariant(shape.variants, name);
      if (!v) {
        throw new BamlConvertError(path, shape.typeIdentifier, describeValue(value), "unknown enum variant", "unknown-variant");
      }
      return v.name;
    }

    const entries = this.entries(shape, value, path);
    const tag = tagFieldOf(shape, this.names);
    const tagValue = entries.get(tag);
    if (tagValue === undefined) throw BamlConvertError.missingField(path.field(tag), shape.typeIdentifier);
    const tagName = tagValue.tag === "String" ? tagValue.value : tagValue.tag === "Enum" ? tagValue.variant : undefined;
    const v = tagName === undefined ? undefined : matchVariant(shape.variants, tagName);
    if (!v) {
      throw new BamlConvertError(path.field(tag), shape.typeIdentifier, describeValue(tagValue), "unknown variant tag", "unknown-variant");
    }

    const fields = this.fields(v.fields, entries, path, {
      ownerInternalName: this.names.internalName(shape),
      fieldName: "",
      renderedField: "",
      variantName: v.name,
      variantRendered: renderedVariantName(v),
    });
    return { [tag]: v.name, ...fields };
  }
}

/** Rendered name first, then the real name, then the alias. */
function matchVariant(variants: readonly VariantShape[], name: string): VariantShape | undefined {
  return (
    variants.find(v => renderedVariantName(v) === name) ??
    variants.find(v => v.name === name) ??
    variants.find(v => v.attrs.alias === name)
  );
}

/** By real name, then rendered name, then alias. */
function lookupField(f: FieldShape, entries: ReadonlyMap<string, BamlValue>): BamlValue | undefined {
  return (
    entries.get(f.name) ??
    entries.get(renderedFieldName(f)) ??
    (f.attrs.alias === undefined ? undefined : entries.get(f.attrs.alias))
  );
}
