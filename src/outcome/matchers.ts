import type { Outcome } from "./outcome";
import { isDone } from "./outcome";

export function flatMapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  if (isDone(o)) {
    return fn(o.value);
  }
  return o;
}
