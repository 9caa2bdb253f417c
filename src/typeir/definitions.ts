import type { Constraint, StreamingBehavior } from "./meta";
import type { StreamingMode, TypeIR } from "./types";

/** Real identifier plus an optional rendered alias. */
export interface Name {
  readonly name: string;
  readonly alias?: string;
}

export function makeName(name: string, rendered?: string): Name {
  return rendered === undefined || rendered === name ? { name } : { name, alias: rendered };
}

export function renderedName(n: Name): string {
  return n.alias ?? n.name;
}

export interface ClassField {
  readonly name: Name;
  readonly type: TypeIR;
  readonly description?: string;
  readonly dynamic: boolean;
}

export interface ClassDef {
  readonly name: Name;
  readonly description?: string;
  readonly mode: StreamingMode;
  readonly dynamic: boolean;
  readonly fields: readonly ClassField[];
  readonly constraints: readonly Constraint[];
  readonly streamingBehavior: StreamingBehavior;
}

export interface EnumValueDef {
  readonly name: Name;
  readonly description?: string;
}

export interface EnumDef {
  readonly name: Name;
  readonly description?: string;
  readonly values: readonly EnumValueDef[];
  readonly constraints: readonly Constraint[];
}

/** Side tables a type tree refers into by name. */
export interface TypeLookups {
  findClass(name: string, mode: StreamingMode): ClassDef | undefined;
  findEnum(name: string): EnumDef | undefined;
  expandRecursiveType(name: string): TypeIR | undefined;
}

export function findField(cls: ClassDef, key: string): ClassField | undefined {
  return cls.fields.find(f => f.name.name === key) ?? cls.fields.find(f => f.name.alias === key);
}
