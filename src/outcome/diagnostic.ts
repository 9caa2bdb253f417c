export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Value path or shape trail the diagnostic points at. */
  path?: string;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
}
