import { failure, type Failure } from "../outcome/failure";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { ValuePath } from "../value/path";

export type ConvertErrorKind = "type-mismatch" | "missing-field" | "out-of-range" | "unknown-variant";

const CODES: Record<ConvertErrorKind, DiagnosticCode> = {
  "type-mismatch": "E0100",
  "missing-field": "E0101",
  "out-of-range": "E0102",
  "unknown-variant": "E0103",
};

/**
 * A value that does not fit the type it is read as. Renders as
 * `{message} (expected {expected}, got {got}) at {path}`.
 */
export class BamlConvertError extends Error {
  constructor(
    readonly path: ValuePath,
    readonly expected: string,
    readonly got: string,
    readonly detail: string,
    readonly kind: ConvertErrorKind = "type-mismatch"
  ) {
    super(`${detail} (expected ${expected}, got ${got}) at ${path.toString()}`);
    this.name = "BamlConvertError";
  }

  static missingField(path: ValuePath, expected: string): BamlConvertError {
    return new BamlConvertError(path, expected, "<missing>", "missing required field", "missing-field");
  }

  static nullForRequired(path: ValuePath, expected: string): BamlConvertError {
    return new BamlConvertError(path, expected, "null", "null provided for required field", "missing-field");
  }

  toDiagnostic(): Diagnostic {
    const params: Record<string, string | number> =
      this.kind === "missing-field"
        ? { field: this.path.toString() }
        : { expected: this.expected, got: this.got };
    return makeDiagnostic(CODES[this.kind], params, this.path.toString());
  }

  toFailure(): Failure {
    return failure(this.kind, this.message, {
      diagnostics: [this.toDiagnostic()],
      context: { path: this.path.toString(), expected: this.expected, got: this.got },
      recoverable: true,
    });
  }
}

/**
 * The schema promised a value fits and it does not: a defect in the caller,
 * not bad input.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    readonly path: ValuePath = ValuePath.ROOT
  ) {
    super(`${message} at ${path.toString()}`);
    this.name = "InvariantViolationError";
  }

  toFailure(): Failure {
    return failure("invariant-violated", this.message, {
      context: { path: this.path.toString() },
      recoverable: false,
    });
  }
}
