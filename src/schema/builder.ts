import * as T from "../typeir/builders";
import { makeName, type ClassDef, type ClassField } from "../typeir/definitions";
import type { Constraint } from "../typeir/meta";
import { DEFAULT_STREAMING_BEHAVIOR } from "../typeir/meta";
import type { TypeIR } from "../typeir/types";
import { silentLogger, type Logger } from "../log/logger";
import { SchemaBuildError, type SchemaBuildErrorKind } from "./errors";
import {
  baseInternalName,
  constraintsFrom,
  docDescription,
  invalidConstraint,
  renderedFieldName,
  renderedTypeName,
  renderedVariantName,
} from "./names";
import { OutputFormat, SchemaRegistry } from "./registry";
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
  type ShapeRef,
  type StructShape,
  type VariantShape,
} from "./shape";

export const DEFAULT_TAG_FIELD = "type";

export interface SchemaBuildOptions {
  logger?: Logger;
  /** Tag field for data enums without an explicit `tag` attribute. */
  defaultTagField?: string;
}

/** Root type plus every class and enum it reaches. */
export interface SchemaBundle {
  readonly target: TypeIR;
  readonly outputFormat: OutputFormat;
  /** Internal name each struct and enum shape received. */
  readonly names: ReadonlyMap<Shape, string>;
  readonly defaultTagField: string;
}

/** Naming context of the field being built, used for synthesized entry classes. */
export interface FieldContext {
  ownerInternalName: string;
  fieldName: string;
  renderedField: string;
  variantName?: string;
  variantRendered?: string;
}

const PAIRS_FALLBACK: FieldContext = {
  ownerInternalName: "MapEntry",
  fieldName: "entries",
  renderedField: "entries",
};

const WIDE_INTS = new Set(["u64", "usize", "i128", "u128"]);
const INT_SCALARS = new Set(["i8", "i16", "i32", "i64", "isize", "u8", "u16", "u32", "u64", "usize", "i128", "u128"]);

export function isIntegerScalar(shape: ScalarShape): boolean {
  return INT_SCALARS.has(shape.scalar);
}

/** Internal name and rendered name of a synthesized `pairs` entry class. */
export function mapEntryNames(ctx: FieldContext = PAIRS_FALLBACK): { internal: string; rendered: string } {
  const suffix = ctx.variantName !== undefined ? `${ctx.variantName}__${ctx.fieldName}__Entry` : `${ctx.fieldName}__Entry`;
  return {
    internal: `${ctx.ownerInternalName}::${suffix}`,
    rendered: `${ctx.variantRendered ?? ""}${ctx.renderedField}Entry`,
  };
}

/**
 * Walks a shape graph and produces its TypeIR, registering every class and
 * enum reached along the way. One builder serves one build.
 */
export class SchemaBuilder {
  readonly registry: SchemaRegistry = new SchemaRegistry();
  private visited: Map<Shape, TypeIR> = new Map();
  private assignedNames: Map<Shape, string> = new Map();
  private usedInternalNames: Map<string, Shape> = new Map();
  private nameCounter = 0;
  private trail: string[] = [];
  private readonly log: Logger;
  private readonly defaultTagField: string;

  constructor(options: SchemaBuildOptions = {}) {
    this.log = options.logger ?? silentLogger;
    this.defaultTagField = options.defaultTagField ?? DEFAULT_TAG_FIELD;
  }

  build(root: Shape): TypeIR {
    this.trail = [root.typeIdentifier];
    return this.buildType(root);
  }

  finish(target: TypeIR): OutputFormat {
    return this.registry.build(target);
  }

  /** Internal names assigned so far, by shape. */
  internalNames(): ReadonlyMap<Shape, string> {
    return new Map(this.assignedNames);
  }

  get tagField(): string {
    return this.defaultTagField;
  }

  private fail(kind: SchemaBuildErrorKind, shape: Shape, detail: string): never {
    throw new SchemaBuildError(kind, shape.id, shape.typeIdentifier, this.trail.join("."), detail);
  }

  private buildRef(ref: ShapeRef): TypeIR {
    return this.buildType(resolveRef(ref));
  }

  buildType(shape: Shape): TypeIR {
    const seen = this.visited.get(shape);
    if (seen) return seen;

    switch (shape.def) {
      case "Scalar":
        return this.buildScalar(shape);
      case "Option":
        return T.optional(this.buildRef(shape.inner));
      case "List":
        return T.list(this.buildRef(shape.inner));
      case "Map":
        return this.buildMap(shape);
      case "Pointer":
        return this.buildRef(shape.pointee);
      case "Struct":
        return this.buildStruct(shape);
      case "Enum":
        return this.buildEnum(shape);
      case "Tuple":
        return this.fail("unsupported", shape, "tuple types have no schema representation");
      case "Function":
        return this.fail("unsupported", shape, "function types have no schema representation");
      case "Dynamic":
        return this.fail("unsupported", shape, "untyped values need a field codec");
      case "Opaque":
        return this.fail("unsupported", shape, "opaque types have no schema representation");
    }
  }

  private buildScalar(shape: ScalarShape): TypeIR {
    switch (shape.scalar) {
      case "bool":
        return T.bool();
      case "char":
      case "string":
        return T.string();
      case "f32":
      case "f64":
        return T.float();
      case "unit":
        return T.nullType();
      default:
        if (WIDE_INTS.has(shape.scalar)) {
          return this.fail("unsupported", shape, `${shape.scalar} does not fit a schema int; set intRepr`);
        }
        return T.int();
    }
  }

  private buildMap(shape: MapShape): TypeIR {
    const value = this.buildRef(shape.value);
    if (shape.collection === "record") return T.map(T.string(), value);

    const key = unwrapPointers(resolveRef(shape.key));
    if (key.def === "Scalar" && (key.scalar === "string" || key.scalar === "char")) {
      return T.map(T.string(), value);
    }
    return this.fail("map-key", shape, `map key ${key.typeIdentifier} is not a string; set mapKeyRepr`);
  }

  private constraintsOf(
    shape: Shape,
    attrs: { checks?: FieldShape["attrs"]["checks"]; asserts?: FieldShape["attrs"]["asserts"] }
  ): Constraint[] {
    const constraints = constraintsFrom(attrs.checks, attrs.asserts);
    const problem = invalidConstraint(constraints);
    if (problem !== undefined) this.fail("constraint", shape, problem);
    return constraints;
  }

  private buildStruct(shape: StructShape): TypeIR {
    const internal = this.internalName(shape);
    const rendered = renderedTypeName(shape);
    const constraints = this.constraintsOf(shape, shape.attrs);

    const typeIR = T.withConstraints(T.classType(internal), constraints);
    this.visited.set(shape, typeIR);

    const fields = this.buildFields(shape, shape.fields, internal);

    this.registerClass({
      name: makeName(internal, rendered),
      description: shape.attrs.description ?? docDescription(shape.doc),
      mode: "NonStreaming",
      dynamic: false,
      fields,
      constraints,
      streamingBehavior: DEFAULT_STREAMING_BEHAVIOR,
    });
    return typeIR;
  }

  private buildEnum(shape: EnumShape): TypeIR {
    const internal = this.internalName(shape);
    const rendered = renderedTypeName(shape);
    const constraints = this.constraintsOf(shape, shape.attrs);

    if (!isDataEnum(shape)) {
      if (shape.attrs.asUnion) {
        const literals = shape.variants.map(v => T.literalString(renderedVariantName(v)));
        const typeIR = T.withConstraints(T.union(literals), constraints);
        this.visited.set(shape, typeIR);
        return typeIR;
      }

      const typeIR = T.withConstraints(T.enumType(internal), constraints);
      this.visited.set(shape, typeIR);
      this.registry.registerEnum({
        name: makeName(internal, rendered),
        description: shape.attrs.description ?? docDescription(shape.doc),
        values: shape.variants.map(v => ({
          name: makeName(v.name, renderedVariantName(v)),
          description: v.attrs.description ?? docDescription(v.doc),
        })),
        constraints,
      });
      this.log.debug(`registered enum ${internal}`);
      return typeIR;
    }

    const typeIR = T.withConstraints(
      T.union(shape.variants.map(v => T.classType(variantClassName(internal, v)))),
      constraints
    );
    this.visited.set(shape, typeIR);

    const tag = shape.attrs.tag ?? this.defaultTagField;
    for (const v of shape.variants) {
      const collision = v.fields.find(f => f.name === tag || renderedFieldName(f) === tag);
      if (collision) {
        this.fail("unsupported", shape, `variant ${v.name} field ${collision.name} collides with tag field ${tag}`);
      }

      const variantRendered = renderedVariantName(v);
      this.trail.push(v.name);
      const fields = this.buildFields(shape, v.fields, internal, v);
      this.trail.pop();

      this.registerClass({
        name: makeName(variantClassName(internal, v), `${rendered}_${variantRendered}`),
        description: v.attrs.description ?? docDescription(v.doc),
        mode: "NonStreaming",
        dynamic: false,
        fields: [{ name: makeName(tag), type: T.literalString(variantRendered), dynamic: false }, ...fields],
        constraints: [],
        streamingBehavior: DEFAULT_STREAMING_BEHAVIOR,
      });
    }
    return typeIR;
  }

  private buildFields(
    owner: Shape,
    fields: readonly FieldShape[],
    ownerInternalName: string,
    variant?: VariantShape
  ): ClassField[] {
    const out: ClassField[] = [];
    for (const f of fields) {
      if (f.attrs.skip) continue;
      this.trail.push(f.name);

      const ctx: FieldContext = {
        ownerInternalName,
        fieldName: f.name,
        renderedField: renderedFieldName(f),
        variantName: variant?.name,
        variantRendered: variant === undefined ? undefined : renderedVariantName(variant),
      };
      let type = T.withConstraints(this.buildFieldType(f, ctx), this.constraintsOf(owner, f.attrs));
      if (f.attrs.default !== undefined && !T.isOptional(type)) {
        type = T.optional(type);
      }

      out.push({
        name: makeName(f.name, renderedFieldName(f)),
        type,
        description: f.attrs.description ?? docDescription(f.doc),
        dynamic: false,
      });
      this.trail.pop();
    }
    return out;
  }

  /** Field overrides in priority order: codec, intRepr, mapKeyRepr. */
  private buildFieldType(f: FieldShape, ctx: FieldContext): TypeIR {
    const codec = f.attrs.with;
    if (codec) {
      codec.register?.({
        registry: this.registry,
        ownerInternalName: ctx.ownerInternalName,
        fieldName: ctx.fieldName,
        renderedFieldName: ctx.renderedField,
        variantName: ctx.variantName,
        renderedVariantName: ctx.variantRendered,
      });
      return codec.typeIR();
    }
    if (f.attrs.intRepr !== undefined) return this.buildIntRepr(resolveRef(f.shape), f.attrs.intRepr);
    if (f.attrs.mapKeyRepr !== undefined) return this.buildMapKeyRepr(resolveRef(f.shape), f.attrs.mapKeyRepr, ctx);
    return this.buildRef(f.shape);
  }

  private buildIntRepr(shape: Shape, repr: IntRepr): TypeIR {
    switch (shape.def) {
      case "Option":
        return T.optional(this.buildIntRepr(resolveRef(shape.inner), repr));
      case "List":
        return T.list(this.buildIntRepr(resolveRef(shape.inner), repr));
      case "Pointer":
        return this.buildIntRepr(resolveRef(shape.pointee), repr);
      case "Scalar":
        if (isIntegerScalar(shape)) return repr === "string" ? T.string() : T.int();
        break;
      default:
        break;
    }
    return this.fail("unsupported", shape, `intRepr applies to integer fields, not ${shape.typeIdentifier}`);
  }

  private buildMapKeyRepr(shape: Shape, repr: MapKeyRepr, ctx: FieldContext): TypeIR {
    switch (shape.def) {
      case "Option":
        return T.optional(this.buildMapKeyRepr(resolveRef(shape.inner), repr, ctx));
      case "List":
        return T.list(this.buildMapKeyRepr(resolveRef(shape.inner), repr, ctx));
      case "Pointer":
        return this.buildMapKeyRepr(resolveRef(shape.pointee), repr, ctx);
      case "Map":
        if (repr === "string") return T.map(T.string(), this.buildRef(shape.value));
        return T.list(T.classType(this.ensureEntryClass(shape, ctx)));
      default:
        return this.buildType(shape);
    }
  }

  private ensureEntryClass(shape: MapShape, ctx: FieldContext): string {
    const { internal, rendered } = mapEntryNames(ctx);
    const key = this.buildRef(shape.key);
    const value = this.buildRef(shape.value);
    this.registerClass({
      name: makeName(internal, rendered),
      mode: "NonStreaming",
      dynamic: false,
      fields: [
        { name: makeName("key"), type: key, dynamic: false },
        { name: makeName("value"), type: value, dynamic: false },
      ],
      constraints: [],
      streamingBehavior: DEFAULT_STREAMING_BEHAVIOR,
    });
    return internal;
  }

  private registerClass(def: ClassDef): void {
    if (!this.registry.hasClass(def.name.name)) {
      this.log.debug(`registered class ${def.name.name}`, { fields: def.fields.length });
    }
    this.registry.registerClass(def);
  }

  /**
   * Distinct shapes that want the same name get `name__1`, `name__2`, ... in
   * first-seen order. The same shape always gets its first name back.
   */
  private internalName(shape: StructShape | EnumShape): string {
    const assigned = this.assignedNames.get(shape);
    if (assigned !== undefined) return assigned;

    const base = baseInternalName(shape);
    let name = base;
    if (this.usedInternalNames.has(base)) {
      do {
        this.nameCounter++;
        name = `${base}__${this.nameCounter}`;
      } while (this.usedInternalNames.has(name));
      this.log.debug(`internal name ${base} taken; using ${name}`, { shape: shape.id });
    }
    this.usedInternalNames.set(name, shape);
    this.assignedNames.set(shape, name);
    return name;
  }
}

export function variantClassName(internal: string, v: VariantShape): string {
  return `${internal}__${v.name}`;
}

function unwrapPointers(shape: Shape): Shape {
  let current = shape;
  while (current.def === "Pointer") current = resolveRef(current.pointee);
  return current;
}

/** Build the schema bundle for a root shape. Throws `SchemaBuildError`. */
export function buildSchema(shape: Shape, options: SchemaBuildOptions = {}): SchemaBundle {
  const builder = new SchemaBuilder(options);
  const target = builder.build(shape);
  return {
    target,
    outputFormat: builder.finish(target),
    names: builder.internalNames(),
    defaultTagField: builder.tagField,
  };
}

/** TypeIR for a shape without the definitions it references. */
export function buildTypeIR(shape: Shape, options: SchemaBuildOptions = {}): TypeIR {
  return new SchemaBuilder(options).build(shape);
}
