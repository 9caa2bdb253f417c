import type { TypeLookups } from "../typeir/definitions";
import { displayType, literalToString } from "../typeir/display";
import type { Constraint, IRMeta } from "../typeir/meta";
import type { TClass, TPrimitive, TUnion, TypeIR } from "../typeir/types";
import { silentLogger, type Logger } from "../log/logger";
import { ValuePath } from "../value/path";
import {
  NULL,
  describeValue,
  entriesOf,
  vClass,
  vEnum,
  vFloat,
  vList,
  vMap,
  type BamlValue,
} from "../value/value";
import { evaluateConstraints, NunjucksEvaluator, type ConstraintEvaluator, type ResponseCheck } from "./constraints";
import { BamlConvertError, InvariantViolationError } from "./errors";

export type CoercionFlagKind = "optional-defaulted" | "int-to-float" | "string-to-enum" | "union-member";

export interface CoercionFlag {
  readonly kind: CoercionFlagKind;
  readonly path: string;
  readonly detail?: string;
}

export interface Explanation {
  readonly path: string;
  readonly message: string;
}

export interface Coerced {
  readonly value: BamlValue;
  readonly checks: ResponseCheck[];
  readonly failedAsserts: ResponseCheck[];
  readonly flags: CoercionFlag[];
  readonly explanations: Explanation[];
}

export interface CoerceOptions {
  evaluator?: ConstraintEvaluator;
  logger?: Logger;
  path?: ValuePath;
}

interface Acc {
  checks: ResponseCheck[];
  failedAsserts: ResponseCheck[];
  flags: CoercionFlag[];
  explanations: Explanation[];
}

const emptyAcc = (): Acc => ({ checks: [], failedAsserts: [], flags: [], explanations: [] });

function mergeInto(target: Acc, src: Acc): void {
  target.checks.push(...src.checks);
  target.failedAsserts.push(...src.failedAsserts);
  target.flags.push(...src.flags);
  target.explanations.push(...src.explanations);
}

let sharedEvaluator: ConstraintEvaluator | undefined;

function defaultEvaluator(): ConstraintEvaluator {
  sharedEvaluator = sharedEvaluator ?? new NunjucksEvaluator();
  return sharedEvaluator;
}

/**
 * Check a dynamic value against a type and normalize it: class values take
 * their class name, enum strings become enum values, ints widen to floats.
 * Constraints are evaluated on the way out of each node. Structural
 * mismatches throw `BamlConvertError`; failed asserts are returned, not
 * thrown.
 */
export function coerceValue(value: BamlValue, type: TypeIR, lookups: TypeLookups, options: CoerceOptions = {}): Coerced {
  const coercer = new Coercer(lookups, options.evaluator ?? defaultEvaluator(), options.logger ?? silentLogger);
  const acc = emptyAcc();
  const out = coercer.coerce(value, type, options.path ?? ValuePath.ROOT, acc);
  return { value: out, ...acc };
}

class Coercer {
  constructor(
    private readonly lookups: TypeLookups,
    private readonly evaluator: ConstraintEvaluator,
    private readonly log: Logger
  ) {}

  coerce(value: BamlValue, type: TypeIR, path: ValuePath, acc: Acc): BamlValue {
    const out = this.structural(value, type, path, acc);
    if (type.meta.constraints.length > 0) {
      const results = evaluateConstraints(out, type.meta.constraints, this.evaluator, this.log);
      acc.checks.push(...results.checks);
      acc.failedAsserts.push(...results.failedAsserts);
    }
    return out;
  }

  private mismatch(type: TypeIR, value: BamlValue, path: ValuePath): never {
    throw new BamlConvertError(path, displayType(type), describeValue(value), "type mismatch");
  }

  private structural(value: BamlValue, type: TypeIR, path: ValuePath, acc: Acc): BamlValue {
    switch (type.tag) {
      case "Top":
        return value;
      case "Primitive":
        return this.primitive(value, type, path, acc);
      case "Literal": {
        const lit = type.value;
        const matches =
          (lit.kind === "string" && value.tag === "String" && value.value === lit.value) ||
          (lit.kind === "string" && value.tag === "Enum" && value.variant === lit.value) ||
          (lit.kind === "int" && value.tag === "Int" && value.value === lit.value) ||
          (lit.kind === "bool" && value.tag === "Bool" && value.value === lit.value);
        if (!matches) {
          throw new BamlConvertError(path, literalToString(lit), describeValue(value), "literal mismatch");
        }
        return value;
      }
      case "Enum": {
        const def = this.lookups.findEnum(type.name);
        if (!def) throw new InvariantViolationError(`enum ${type.name} is not in the schema`, path);
        const name = value.tag === "Enum" ? value.variant : value.tag === "String" ? value.value : undefined;
        if (name === undefined) return this.mismatch(type, value, path);
        const found = def.values.find(v => v.name.name === name) ?? def.values.find(v => v.name.alias === name);
        if (!found) {
          throw new BamlConvertError(path, type.name, describeValue(value), "unknown enum variant", "unknown-variant");
        }
        if (value.tag === "String") acc.flags.push({ kind: "string-to-enum", path: path.toString(), detail: name });
        return vEnum(type.name, found.name.name);
      }
      case "Class":
        return this.klass(value, type, path, acc);
      case "List": {
        if (value.tag !== "List") return this.mismatch(type, value, path);
        const item = type.item;
        return vList(value.items.map((v, i) => this.coerce(v, item, path.index(i), acc)));
      }
      case "Map": {
        const entries = entriesOf(value);
        if (entries === undefined) return this.mismatch(type, value, path);
        const kept: [string, BamlValue][] = [];
        for (const [k, v] of entries) {
          const child = emptyAcc();
          try {
            kept.push([k, this.coerce(v, type.value, path.key(k), child)]);
            mergeInto(acc, child);
          } catch (e) {
            if (!(e instanceof BamlConvertError)) throw e;
            acc.explanations.push({ path: e.path.toString(), message: `dropped map entry: ${e.message}` });
            this.log.debug(`dropped map entry ${k}`, { error: e.message });
          }
        }
        return vMap(kept);
      }
      case "Tuple": {
        if (value.tag !== "List" || value.items.length !== type.items.length) return this.mismatch(type, value, path);
        const items = type.items;
        return vList(value.items.map((v, i) => {
          const t = items[i];
          return t === undefined ? v : this.coerce(v, t, path.index(i), acc);
        }));
      }
      case "RecursiveTypeAlias": {
        const expanded = this.lookups.expandRecursiveType(type.name);
        if (!expanded) throw new InvariantViolationError(`type alias ${type.name} is not in the schema`, path);
        return this.coerce(value, expanded, path, acc);
      }
      case "Arrow":
        return this.mismatch(type, value, path);
      case "Union":
        return this.union(value, type, path, acc);
    }
  }

  private primitive(value: BamlValue, type: TPrimitive<IRMeta>, path: ValuePath, acc: Acc): BamlValue {
    switch (type.value) {
      case "string":
        return value.tag === "String" ? value : this.mismatch(type, value, path);
      case "int":
        return value.tag === "Int" ? value : this.mismatch(type, value, path);
      case "float":
        if (value.tag === "Float") return value;
        if (value.tag === "Int") {
          acc.flags.push({ kind: "int-to-float", path: path.toString() });
          return vFloat(Number(value.value));
        }
        return this.mismatch(type, value, path);
      case "bool":
        return value.tag === "Bool" ? value : this.mismatch(type, value, path);
      case "null":
        return value.tag === "Null" ? value : this.mismatch(type, value, path);
      default: {
        const kind = type.value.slice("media:".length);
        return value.tag === "Media" && value.media.mediaType === kind ? value : this.mismatch(type, value, path);
      }
    }
  }

  private klass(value: BamlValue, type: TClass<IRMeta>, path: ValuePath, acc: Acc): BamlValue {
    const def = this.lookups.findClass(type.name, type.mode);
    if (!def) throw new InvariantViolationError(`class ${type.name} is not in the schema`, path);
    const entries = entriesOf(value);
    if (entries === undefined) return this.mismatch(type, value, path);

    const fields: [string, BamlValue][] = [];
    for (const f of def.fields) {
      const fieldPath = path.field(f.name.name);
      const found = entries.get(f.name.name) ?? (f.name.alias === undefined ? undefined : entries.get(f.name.alias));
      if (found === undefined) {
        if (!acceptsNull(f.type, this.lookups)) {
          throw BamlConvertError.missingField(fieldPath, displayType(f.type));
        }
        acc.flags.push({ kind: "optional-defaulted", path: fieldPath.toString() });
        fields.push([f.name.name, NULL]);
        continue;
      }
      if (found.tag === "Null" && !acceptsNull(f.type, this.lookups)) {
        throw BamlConvertError.nullForRequired(fieldPath, displayType(f.type));
      }
      fields.push([f.name.name, this.coerce(found, f.type, fieldPath, acc)]);
    }

    const out = vClass(type.name, fields);
    // References built from a shape already carry the class constraints in their meta.
    const own = def.constraints.filter(c => !type.meta.constraints.some(m => sameConstraint(m, c)));
    if (own.length > 0) {
      const results = evaluateConstraints(out, own, this.evaluator, this.log);
      acc.checks.push(...results.checks);
      acc.failedAsserts.push(...results.failedAsserts);
    }
    return out;
  }

  /** Members in order; the first that fits wins, else the last member's error. */
  private union(value: BamlValue, type: TUnion<IRMeta>, path: ValuePath, acc: Acc): BamlValue {
    const { members, nullType } = type.union;
    if (value.tag === "Null" && nullType !== undefined) return value;

    let lastError: BamlConvertError | undefined;
    for (const [i, member] of members.entries()) {
      const child = emptyAcc();
      try {
        const out = this.coerce(value, member, path, child);
        mergeInto(acc, child);
        if (members.length > 1) {
          acc.flags.push({ kind: "union-member", path: path.toString(), detail: String(i) });
        }
        return out;
      } catch (e) {
        if (!(e instanceof BamlConvertError)) throw e;
        lastError = e;
      }
    }
    if (lastError) throw lastError;
    return this.mismatch(type, value, path);
  }
}

function sameConstraint(a: Constraint, b: Constraint): boolean {
  return a.level === b.level && a.label === b.label && a.expression === b.expression;
}

function acceptsNull(t: TypeIR, lookups: TypeLookups): boolean {
  switch (t.tag) {
    case "Top":
      return true;
    case "Primitive":
      return t.value === "null";
    case "Union":
      return t.union.nullType !== undefined || t.union.members.some(m => acceptsNull(m, lookups));
    case "RecursiveTypeAlias": {
      const expanded = lookups.expandRecursiveType(t.name);
      return expanded !== undefined && acceptsNull(expanded, lookups);
    }
    default:
      return false;
  }
}
