import type { ClassDef, EnumDef, TypeLookups } from "../typeir/definitions";
import type { StreamingMode, TypeIR } from "../typeir/types";
import { classDependencies } from "../typeir/visitor";
import { toIrType, toStreamingType } from "../typeir/streaming";

function modeRank(mode: StreamingMode): number {
  return mode === "NonStreaming" ? 0 : 1;
}

/**
 * Collects class and enum definitions during a schema build. The first
 * registration of a name (and mode, for classes) wins.
 */
export class SchemaRegistry {
  private enums: Map<string, EnumDef> = new Map();
  private classes: Map<string, Map<StreamingMode, ClassDef>> = new Map();
  private classDeps: Map<string, Set<string>> = new Map();
  private structuralRecursiveAliases: Map<string, TypeIR> = new Map();
  private registered: Set<string> = new Set();

  /**
   * Claim a type name. Returns false when it was already claimed, so shared
   * definitions are registered once.
   */
  markType(name: string): boolean {
    if (this.registered.has(name)) return false;
    this.registered.add(name);
    return true;
  }

  registerEnum(def: EnumDef): void {
    if (!this.enums.has(def.name.name)) {
      this.enums.set(def.name.name, def);
    }
  }

  registerClass(def: ClassDef): void {
    const name = def.name.name;
    let byMode = this.classes.get(name);
    if (!byMode) {
      byMode = new Map();
      this.classes.set(name, byMode);
    }
    if (byMode.has(def.mode)) return;
    byMode.set(def.mode, def);

    let deps = this.classDeps.get(name);
    if (!deps) {
      deps = new Set();
      this.classDeps.set(name, deps);
    }
    for (const f of def.fields) {
      classDependencies(f.type, deps);
    }
  }

  registerStructuralAlias(name: string, alias: TypeIR): void {
    this.structuralRecursiveAliases.set(name, alias);
  }

  hasClass(name: string, mode: StreamingMode = "NonStreaming"): boolean {
    return this.classes.get(name)?.has(mode) ?? false;
  }

  hasEnum(name: string): boolean {
    return this.enums.has(name);
  }

  /**
   * Freeze the collected definitions into an output format rooted at `target`.
   * Enums are ordered by name, classes by name then mode.
   */
  build(target: TypeIR): OutputFormat {
    const enums = Array.from(this.enums.values()).sort((a, b) => compareStrings(a.name.name, b.name.name));
    const classes: ClassDef[] = [];
    for (const byMode of this.classes.values()) {
      classes.push(...byMode.values());
    }
    classes.sort((a, b) => compareStrings(a.name.name, b.name.name) || modeRank(a.mode) - modeRank(b.mode));

    return new OutputFormat(
      target,
      enums,
      classes,
      computeRecursiveClasses(this.classDeps),
      new Map(this.structuralRecursiveAliases)
    );
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Built schema: the root type plus every class and enum it reaches.
 * Immutable once constructed; streaming class views are derived on demand
 * and cached.
 */
export class OutputFormat implements TypeLookups {
  private classIndex: Map<string, ClassDef> = new Map();
  private enumIndex: Map<string, EnumDef> = new Map();
  private derivedStreaming: Map<string, ClassDef> = new Map();

  constructor(
    readonly target: TypeIR,
    private readonly enumList: readonly EnumDef[],
    private readonly classList: readonly ClassDef[],
    readonly recursiveClasses: ReadonlySet<string>,
    readonly structuralRecursiveAliases: ReadonlyMap<string, TypeIR>
  ) {
    for (const c of classList) {
      this.classIndex.set(classKey(c.name.name, c.mode), c);
    }
    for (const e of enumList) {
      this.enumIndex.set(e.name.name, e);
    }
  }

  classes(): readonly ClassDef[] {
    return this.classList;
  }

  enums(): readonly EnumDef[] {
    return this.enumList;
  }

  findEnum(name: string): EnumDef | undefined {
    return this.enumIndex.get(name);
  }

  /**
   * Look up a class by name and mode. A streaming lookup without a
   * registered streaming entry derives one from the non-streaming entry.
   */
  findClass(name: string, mode: StreamingMode): ClassDef | undefined {
    const found = this.classIndex.get(classKey(name, mode));
    if (found || mode === "NonStreaming") return found;

    const cached = this.derivedStreaming.get(name);
    if (cached) return cached;

    const base = this.classIndex.get(classKey(name, "NonStreaming"));
    if (!base) return undefined;
    const derived: ClassDef = {
      ...base,
      mode: "Streaming",
      fields: base.fields.map(f => ({ ...f, type: toIrType(toStreamingType(f.type)) })),
    };
    this.derivedStreaming.set(name, derived);
    return derived;
  }

  expandRecursiveType(name: string): TypeIR | undefined {
    return this.structuralRecursiveAliases.get(name);
  }

  isRecursive(name: string): boolean {
    return this.recursiveClasses.has(name);
  }

  toJSON(): {
    target: TypeIR;
    classes: readonly ClassDef[];
    enums: readonly EnumDef[];
    recursiveClasses: string[];
  } {
    return {
      target: this.target,
      classes: this.classList,
      enums: this.enumList,
      recursiveClasses: Array.from(this.recursiveClasses),
    };
  }
}

function classKey(name: string, mode: StreamingMode): string {
  return `${mode}:${name}`;
}

/**
 * Classes that take part in a reference cycle: members of a strongly
 * connected component with more than one class, or classes that refer to
 * themselves. Tarjan's algorithm over the dependency graph.
 */
export function computeRecursiveClasses(deps: ReadonlyMap<string, ReadonlySet<string>>): Set<string> {
  let index = 0;
  const indices = new Map<string, number>();
  const lowlinks = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const recursive = new Set<string>();

  const strongConnect = (node: string): void => {
    indices.set(node, index);
    lowlinks.set(node, index);
    index++;
    stack.push(node);
    onStack.add(node);

    for (const next of deps.get(node) ?? []) {
      if (!deps.has(next)) continue;
      if (!indices.has(next)) {
        strongConnect(next);
        lowlinks.set(node, Math.min(lowlinks.get(node) ?? 0, lowlinks.get(next) ?? 0));
      } else if (onStack.has(next)) {
        lowlinks.set(node, Math.min(lowlinks.get(node) ?? 0, indices.get(next) ?? 0));
      }
    }

    if (lowlinks.get(node) === indices.get(node)) {
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== node);

      const selfLoop = deps.get(node)?.has(node) ?? false;
      if (component.length > 1 || selfLoop) {
        for (const c of component) recursive.add(c);
      }
    }
  };

  for (const node of deps.keys()) {
    if (!indices.has(node)) strongConnect(node);
  }

  return new Set(Array.from(recursive).sort(compareStrings));
}
