import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Convert", template: "Type mismatch: expected {expected}, got {got}" },
  E0101: { code: "E0101", severity: "error", category: "Convert", template: "Required field missing: {field}" },
  E0102: { code: "E0102", severity: "error", category: "Convert", template: "Integer out of range for {expected}: {got}" },
  E0103: { code: "E0103", severity: "error", category: "Convert", template: "Unknown variant {got} for {expected}" },

  E0200: { code: "E0200", severity: "error", category: "Constraint", template: "Assertion failed: {label}" },
  W0200: { code: "W0200", severity: "warning", category: "Constraint", template: "Check failed: {label}" },

  E0300: { code: "E0300", severity: "error", category: "Union", template: "Ambiguous union access: {candidates}" },

  E0400: { code: "E0400", severity: "error", category: "Schema", template: "Unsupported shape: {shape}" },
  E0401: { code: "E0401", severity: "error", category: "Schema", template: "Map key must be a string: {shape}" },
  E0402: { code: "E0402", severity: "error", category: "Schema", template: "Invalid constraint on {shape}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: string
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    path,
    data: params,
  };
}
