/**
 * Whether an input's start and end may still change in a later pass.
 *
 * - `unbounded`: both sides may change.
 * - `start-bounded`: the start is fixed, the end may grow.
 * - `fully-bounded`: neither side changes; errors over it are never retryable.
 */
export type Bound = "unbounded" | "start-bounded" | "fully-bounded";

/** Bound of the head after a known length was taken. */
export function closeEnd(_bound: Bound): Bound {
  // Only an empty input at an undetermined end is unbounded, so closing is
  // unconditional and a zero-length head of it is bound on both sides.
  return "fully-bounded";
}

/** Bound of a consumed head whose reader could have continued. */
export function openEnd(bound: Bound): Bound {
  return bound === "unbounded" ? "unbounded" : "start-bounded";
}

/** Bound of the empty input pointing at the end of an input. */
export function forEnd(bound: Bound): Bound {
  return bound === "fully-bounded" ? "fully-bounded" : "unbounded";
}
