import type { Constraint } from "../typeir/meta";
import type { AssertSpec, CheckSpec, EnumShape, FieldShape, StructShape, VariantShape } from "./shape";

type NamedShape = StructShape | EnumShape;

/** Registry key: explicit override, else `module::Type`, else the bare identifier. */
export function baseInternalName(shape: NamedShape): string {
  if (shape.attrs.internalName !== undefined) return shape.attrs.internalName;
  return shape.module ? `${shape.module}::${shape.typeIdentifier}` : shape.typeIdentifier;
}

export function renderedTypeName(shape: NamedShape): string {
  return shape.attrs.rename ?? shape.typeIdentifier;
}

export function renderedFieldName(field: FieldShape): string {
  return field.attrs.rename ?? field.name;
}

export function renderedVariantName(variant: VariantShape): string {
  return variant.attrs.rename ?? variant.name;
}

/** Doc lines trimmed and joined; blank docs give no description. */
export function docDescription(doc: readonly string[]): string | undefined {
  const text = doc.map(line => line.trim()).join("\n").trim();
  return text === "" ? undefined : text;
}

export function constraintsFrom(
  checks: readonly CheckSpec[] | undefined,
  asserts: readonly AssertSpec[] | undefined
): Constraint[] {
  const out: Constraint[] = [];
  for (const c of checks ?? []) {
    out.push({ level: "check", label: c.label, expression: c.expression });
  }
  for (const a of asserts ?? []) {
    out.push(a.label === undefined ? { level: "assert", expression: a.expression } : { level: "assert", label: a.label, expression: a.expression });
  }
  return out;
}

/** Returns a reason the constraint list is invalid, or undefined. */
export function invalidConstraint(constraints: readonly Constraint[]): string | undefined {
  const seen = new Set<string>();
  for (const c of constraints) {
    if (c.expression.trim() === "") {
      return c.label === undefined ? `${c.level} has an empty expression` : `${c.level} ${c.label} has an empty expression`;
    }
    if (c.level === "check") {
      if (c.label === undefined || c.label.trim() === "") return "check constraints require a label";
      if (seen.has(c.label)) return `duplicate check label: ${c.label}`;
      seen.add(c.label);
    }
  }
  return undefined;
}
