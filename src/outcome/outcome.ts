import type { Failure } from "./failure";

export interface OutcomeMeta {
  /** Rendered value path the outcome refers to. */
  path?: string;
  durationMs?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
