import { failure, type Failure } from "../outcome/failure";
import { makeDiagnostic } from "../outcome/codes";
import { findField, type TypeLookups } from "../typeir/definitions";
import { displayType } from "../typeir/display";
import type { TypeIR } from "../typeir/types";
import { top } from "../typeir/builders";
import { ValuePath } from "../value/path";
import { entriesOf, type BamlValue } from "../value/value";
import { resolveUnion, type Resolution } from "./union";

/** Navigation into a value whose union member could not be chosen. */
export class AmbiguousUnionError extends Error {
  constructor(
    readonly candidates: readonly TypeIR[],
    readonly path: ValuePath
  ) {
    super(`ambiguous union at ${path.toString()}: ${candidates.map(displayType).join(" | ") || "no candidates"}`);
    this.name = "AmbiguousUnionError";
  }

  toFailure(): Failure {
    const candidates = this.candidates.map(displayType).join(", ");
    return failure("ambiguous-union", this.message, {
      diagnostics: [makeDiagnostic("E0300", { candidates }, this.path.toString())],
      recoverable: false,
    });
  }
}

/**
 * A value paired with its declared type for rendering. Union members are
 * resolved on first use and remembered; navigating an ambiguous value throws
 * `AmbiguousUnionError`.
 */
export class PromptValue {
  private resolution: Resolution | undefined;

  constructor(
    readonly value: BamlValue,
    readonly type: TypeIR,
    private readonly lookups: TypeLookups,
    readonly path: ValuePath = ValuePath.ROOT
  ) {}

  /** Resolution of the declared type against the value, computed once. */
  resolve(): Resolution {
    if (this.resolution === undefined) {
      this.resolution = this.computeResolution(this.type);
    }
    return this.resolution;
  }

  private computeResolution(t: TypeIR): Resolution {
    if (t.tag === "RecursiveTypeAlias") {
      const expanded = this.lookups.expandRecursiveType(t.name);
      return expanded ? this.computeResolution(expanded) : { kind: "Resolved", type: t };
    }
    if (t.tag !== "Union") return { kind: "Resolved", type: t };
    const r = resolveUnion(this.value, t.union, this.lookups);
    return r.kind === "Resolved" && r.type !== t ? this.computeResolution(r.type) : r;
  }

  resolvedType(): TypeIR | undefined {
    const r = this.resolve();
    return r.kind === "Resolved" ? r.type : undefined;
  }

  get isAmbiguous(): boolean {
    return this.resolve().kind === "Ambiguous";
  }

  private requireType(): TypeIR {
    const r = this.resolve();
    if (r.kind === "Ambiguous") throw new AmbiguousUnionError(r.candidates, this.path);
    return r.type;
  }

  /** Field of a class or map value, by real name or rendered name. */
  field(name: string): PromptValue | undefined {
    const t = this.requireType();
    const entries = entriesOf(this.value);
    if (entries === undefined) return undefined;

    if (t.tag === "Class") {
      const def = this.lookups.findClass(t.name, t.mode);
      const f = def && findField(def, name);
      if (!f) return undefined;
      const v = entries.get(f.name.name) ?? (f.name.alias === undefined ? undefined : entries.get(f.name.alias));
      return v === undefined ? undefined : new PromptValue(v, f.type, this.lookups, this.path.field(f.name.name));
    }

    const v = entries.get(name);
    if (v === undefined) return undefined;
    return new PromptValue(v, t.tag === "Map" ? t.value : top(), this.lookups, this.path.key(name));
  }

  index(i: number): PromptValue | undefined {
    const t = this.requireType();
    if (this.value.tag !== "List") return undefined;
    const v = this.value.items[i];
    if (v === undefined) return undefined;
    const itemType = t.tag === "List" ? t.item : t.tag === "Tuple" ? t.items[i] ?? top() : top();
    return new PromptValue(v, itemType, this.lookups, this.path.index(i));
  }

  items(): PromptValue[] {
    const t = this.requireType();
    if (this.value.tag !== "List") return [];
    return this.value.items.map((v, i) => {
      const itemType = t.tag === "List" ? t.item : t.tag === "Tuple" ? t.items[i] ?? top() : top();
      return new PromptValue(v, itemType, this.lookups, this.path.index(i));
    });
  }

  entries(): [string, PromptValue][] {
    this.requireType();
    const entries = entriesOf(this.value);
    if (entries === undefined) return [];
    const out: [string, PromptValue][] = [];
    for (const key of entries.keys()) {
      const child = this.field(key);
      if (child) out.push([key, child]);
    }
    return out;
  }
}
