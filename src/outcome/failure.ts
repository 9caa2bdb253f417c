import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "schema-unsupported"
  | "schema-invalid"
  | "type-mismatch"
  | "missing-field"
  | "out-of-range"
  | "unknown-variant"
  | "assert-failed"
  | "ambiguous-union"
  | "invariant-violated"
  | "internal-error"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}
