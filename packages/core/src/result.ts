/**
 * Result union returned by every fallible operation.
 *
 * Nothing in the public API throws for bad input; failures are values.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/** Map the success value, leaving failures untouched. */
export function mapResult<T, U, E>(result: Result<T, E>, f: (value: T) => U): Result<U, E> {
  return result.ok ? ok(f(result.value)) : result;
}

/** Thrown by {@link unwrap} when called on a failure. */
export class UnwrapError<E> extends Error {
  readonly error: E;

  constructor(error: E) {
    super(`called unwrap on a failed result: ${String(error)}`);
    this.name = "UnwrapError";
    this.error = error;
  }
}

/** Return the success value or throw {@link UnwrapError}. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new UnwrapError(result.error);
}

/** Return the failure or throw if the result succeeded. */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (!result.ok) {
    return result.error;
  }
  throw new UnwrapError(result.value);
}

/** Internal invariant violated; never raised through the typed API. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
