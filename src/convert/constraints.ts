import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";
import { failure, type Failure } from "../outcome/failure";
import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import type { Constraint } from "../typeir/meta";
import { silentLogger, type Logger } from "../log/logger";
import { toPlain, type PlainValue } from "../value/plain";
import type { BamlValue } from "../value/value";

export type CheckStatus = "succeeded" | "failed";

export interface ResponseCheck {
  readonly name: string;
  readonly expression: string;
  readonly status: CheckStatus;
}

/** Evaluates one constraint expression with `this` bound to the value. */
export interface ConstraintEvaluator {
  evaluate(expression: string, value: PlainValue): boolean;
}

/** Jinja-style expressions rendered through nunjucks. */
export class NunjucksEvaluator implements ConstraintEvaluator {
  private env: Environment;

  constructor(env?: Environment) {
    this.env = env ?? new nunjucks.Environment(null, { autoescape: false, throwOnUndefined: false });
  }

  evaluate(expression: string, value: PlainValue): boolean {
    const out = this.env.renderString(`{% if ${expression} %}true{% else %}false{% endif %}`, { this: value });
    return out.trim() === "true";
  }
}

export const DEFAULT_ASSERT_LABEL = "assert";

export interface ConstraintResults {
  readonly checks: ResponseCheck[];
  readonly failedAsserts: ResponseCheck[];
}

/**
 * Evaluate constraints against a converted value. A check records its result;
 * an assert that fails is collected for the caller to raise.
 */
export function evaluateConstraints(
  value: BamlValue,
  constraints: readonly Constraint[],
  evaluator: ConstraintEvaluator,
  logger: Logger = silentLogger
): ConstraintResults {
  const checks: ResponseCheck[] = [];
  const failedAsserts: ResponseCheck[] = [];
  if (constraints.length === 0) return { checks, failedAsserts };

  const plain = toPlain(value);
  for (const c of constraints) {
    let passed: boolean;
    try {
      passed = evaluator.evaluate(c.expression, plain);
    } catch (e) {
      logger.warn(`constraint expression failed to evaluate: ${c.expression}`, { error: String(e) });
      passed = false;
    }
    const result: ResponseCheck = {
      name: c.label ?? (c.level === "assert" ? DEFAULT_ASSERT_LABEL : c.expression),
      expression: c.expression,
      status: passed ? "succeeded" : "failed",
    };
    if (c.level === "check") {
      checks.push(result);
    } else if (!passed) {
      failedAsserts.push(result);
    }
  }
  return { checks, failedAsserts };
}

export function checkDiagnostics(checks: readonly ResponseCheck[]): Diagnostic[] {
  return checks.filter(c => c.status === "failed").map(c => makeDiagnostic("W0200", { label: c.name }));
}

/** One or more asserts failed; every failed assert is listed. */
export class ConstraintAssertsFailedError extends Error {
  constructor(readonly failed: readonly ResponseCheck[]) {
    super(`assertions failed: ${failed.map(f => `${f.name} (${f.expression})`).join(", ")}`);
    this.name = "ConstraintAssertsFailedError";
  }

  toFailure(): Failure {
    return failure("assert-failed", this.message, {
      diagnostics: this.failed.map(f => makeDiagnostic("E0200", { label: f.name })),
      context: { failed: this.failed },
      recoverable: false,
    });
  }
}
