import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from "../config/config";
import { encodeCanonical } from "../typeir/codec";
import { renderedName, type ClassDef, type EnumDef } from "../typeir/definitions";
import { sha256Hex } from "../typeir/hash";
import type { TypeIR } from "../typeir/types";
import { renameRefs } from "../typeir/visitor";
import type { OutputFormat } from "./registry";

export type SchemaFingerprint = `schema:sha256:${string}`;

/**
 * Stable hash of a built schema as a model would see it. References use
 * rendered names, so internal collision suffixes never change the result;
 * renames, field order and render options do.
 */
export function schemaFingerprint(
  format: OutputFormat,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS
): SchemaFingerprint {
  const classNames = new Map<string, string>();
  for (const c of format.classes()) classNames.set(c.name.name, renderedName(c.name));
  const enumNames = new Map<string, string>();
  for (const e of format.enums()) enumNames.set(e.name.name, renderedName(e.name));

  const rename = (t: TypeIR): TypeIR =>
    renameRefs(t, (kind, name) => (kind === "class" ? classNames.get(name) : enumNames.get(name)));

  const classes = format.classes().map(c => classView(c, rename));
  const enums = format.enums().map(enumView);

  const payload = {
    options,
    target: rename(format.target),
    classes: sortByNameThenContent(classes),
    enums: sortByNameThenContent(enums),
  };
  return `schema:sha256:${sha256Hex(encodeCanonical(payload)).slice(0, 32)}`;
}

function classView(c: ClassDef, rename: (t: TypeIR) => TypeIR): Record<string, unknown> {
  return {
    name: renderedName(c.name),
    description: c.description ?? null,
    mode: c.mode,
    constraints: c.constraints,
    fields: c.fields.map(f => ({
      name: renderedName(f.name),
      type: rename(f.type),
      description: f.description ?? null,
    })),
  };
}

function enumView(e: EnumDef): Record<string, unknown> {
  return {
    name: renderedName(e.name),
    description: e.description ?? null,
    constraints: e.constraints,
    values: e.values.map(v => ({ name: renderedName(v.name), description: v.description ?? null })),
  };
}

function sortByNameThenContent(items: Record<string, unknown>[]): Record<string, unknown>[] {
  const keyed = items.map(item => ({ name: String(item.name), content: encodeCanonical(item), item }));
  keyed.sort((a, b) => compare(a.name, b.name) || compare(a.content, b.content));
  return keyed.map(k => k.item);
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
