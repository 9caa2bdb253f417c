export type ConstraintLevel = "check" | "assert";

/**
 * A labeled boolean expression attached to a type or field.
 * Checks are recorded; asserts fail the parse.
 */
export interface Constraint {
  readonly level: ConstraintLevel;
  readonly label?: string;
  readonly expression: string;
}

/** Authoring-time streaming annotations. */
export interface StreamingBehavior {
  readonly needed: boolean;
  readonly done: boolean;
  readonly state: boolean;
}

/** Streaming behavior after `needed` has been applied structurally. */
export interface ResolvedStreamingBehavior {
  readonly done: boolean;
  readonly state: boolean;
}

export interface MetaBase {
  readonly constraints: readonly Constraint[];
}

export interface IRMeta extends MetaBase {
  readonly streamingBehavior: StreamingBehavior;
}

export type NonStreamingMeta = MetaBase;

export interface StreamingMeta extends MetaBase {
  readonly streamingBehavior: ResolvedStreamingBehavior;
}

export const DEFAULT_STREAMING_BEHAVIOR: StreamingBehavior = {
  needed: false,
  done: false,
  state: false,
};

export function irMeta(
  opts: { constraints?: readonly Constraint[]; streaming?: Partial<StreamingBehavior> } = {}
): IRMeta {
  return {
    constraints: opts.constraints ?? [],
    streamingBehavior: { ...DEFAULT_STREAMING_BEHAVIOR, ...opts.streaming },
  };
}

export function nonStreamingMeta(constraints: readonly Constraint[] = []): NonStreamingMeta {
  return { constraints };
}

export function streamingMeta(
  opts: { constraints?: readonly Constraint[]; done?: boolean; state?: boolean } = {}
): StreamingMeta {
  return {
    constraints: opts.constraints ?? [],
    streamingBehavior: { done: opts.done ?? false, state: opts.state ?? false },
  };
}

export function check(label: string, expression: string): Constraint {
  return { level: "check", label, expression };
}

export function assertion(expression: string, label?: string): Constraint {
  return label === undefined ? { level: "assert", expression } : { level: "assert", label, expression };
}

export function hasChecks(meta: MetaBase): boolean {
  return meta.constraints.some(c => c.level === "check");
}

export function hasConstraints(meta: MetaBase): boolean {
  return meta.constraints.length > 0;
}

/** True when the metadata carries the explicit stream-state flag. */
export function hasStreamState(meta: MetaBase): boolean {
  return "streamingBehavior" in meta && isStateful(meta.streamingBehavior);
}

function isStateful(behavior: unknown): boolean {
  return typeof behavior === "object" && behavior !== null && "state" in behavior && behavior.state === true;
}
