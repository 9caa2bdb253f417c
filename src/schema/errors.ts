import { failure, type Failure } from "../outcome/failure";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";

export type SchemaBuildErrorKind = "unsupported" | "map-key" | "constraint";

const CODES: Record<SchemaBuildErrorKind, DiagnosticCode> = {
  unsupported: "E0400",
  "map-key": "E0401",
  constraint: "E0402",
};

/**
 * A type whose shape cannot be expressed as a schema. Raised while the
 * schema is built, never while converting values.
 */
export class SchemaBuildError extends Error {
  constructor(
    readonly kind: SchemaBuildErrorKind,
    readonly shapeId: number,
    readonly typeIdentifier: string,
    /** Field trail from the root shape, e.g. `User.address.zip`. */
    readonly trail: string,
    readonly detail: string
  ) {
    super(`${detail} (shape #${shapeId} ${typeIdentifier} at ${trail})`);
    this.name = "SchemaBuildError";
  }

  toFailure(): Failure {
    return failure(this.kind === "constraint" ? "schema-invalid" : "schema-unsupported", this.message, {
      diagnostics: [makeDiagnostic(CODES[this.kind], { shape: this.typeIdentifier }, this.trail)],
      context: { shapeId: this.shapeId, detail: this.detail },
      recoverable: false,
    });
  }
}
