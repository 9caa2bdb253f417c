import { done, fail } from "../outcome/constructors";
import { failure } from "../outcome/failure";
import type { Outcome } from "../outcome/outcome";
import type { SchemaBundle } from "../schema/builder";
import type { Shape } from "../schema/shape";
import { silentLogger, type Logger } from "../log/logger";
import type { BamlValue } from "../value/value";
import { coerceValue, type CoercionFlag, type Explanation } from "./coerce";
import { checkDiagnostics, ConstraintAssertsFailedError, type ConstraintEvaluator, type ResponseCheck } from "./constraints";
import { BamlConvertError, InvariantViolationError } from "./errors";
import { fromBamlValue } from "./from-value";

export interface Parsed<T> {
  readonly value: T;
  /** The value after coercion against the schema. */
  readonly bamlValue: BamlValue;
  readonly flags: readonly CoercionFlag[];
  readonly checks: readonly ResponseCheck[];
  readonly explanations: readonly Explanation[];
}

export interface ParseOptions {
  evaluator?: ConstraintEvaluator;
  logger?: Logger;
}

/**
 * Coerce `input` against the bundle's schema, run its constraints and read
 * the result as the shape's native type. Throws `BamlConvertError` on a
 * structural mismatch and `ConstraintAssertsFailedError` when any assert
 * fails; failed checks are reported in `checks`.
 */
export function parseValue<T>(bundle: SchemaBundle, shape: Shape<T>, input: BamlValue, options: ParseOptions = {}): Parsed<T> {
  const log = options.logger ?? silentLogger;
  const coerced = coerceValue(input, bundle.target, bundle.outputFormat, { evaluator: options.evaluator, logger: log });
  if (coerced.failedAsserts.length > 0) {
    throw new ConstraintAssertsFailedError(coerced.failedAsserts);
  }
  const failedChecks = coerced.checks.filter(c => c.status === "failed");
  if (failedChecks.length > 0) {
    log.info(`${failedChecks.length} check(s) failed`, { checks: failedChecks.map(c => c.name) });
  }

  return {
    value: fromBamlValue(shape, coerced.value, { bundle }),
    bamlValue: coerced.value,
    flags: coerced.flags,
    checks: coerced.checks,
    explanations: coerced.explanations,
  };
}

/** `parseValue` with errors returned as a failed outcome. */
export function parseOutcome<T>(
  bundle: SchemaBundle,
  shape: Shape<T>,
  input: BamlValue,
  options: ParseOptions = {}
): Outcome<Parsed<T>> {
  try {
    const parsed = parseValue(bundle, shape, input, options);
    const warnings = checkDiagnostics(parsed.checks);
    if (warnings.length > 0) {
      (options.logger ?? silentLogger).debug("parsed with failed checks", { warnings });
    }
    return done(parsed);
  } catch (e) {
    if (e instanceof BamlConvertError || e instanceof ConstraintAssertsFailedError || e instanceof InvariantViolationError) {
      return fail(e.toFailure(), { path: e instanceof ConstraintAssertsFailedError ? undefined : e.path.toString() });
    }
    return fail(failure("internal-error", e instanceof Error ? e.message : String(e), { recoverable: false }));
  }
}
