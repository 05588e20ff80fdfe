/**
 * The seams errors flow through.
 *
 * Parse logic is written once against `ErrorMode<E>` and runs unchanged under
 * the verbose catch-all error, the retry-only error or the zero-information
 * error.
 */

import type { Backtrace } from "./backtrace.js";
import type { Context } from "./context.js";
import type { AnyInput } from "./input.js";
import type { ExpectedLength, ExpectedValid, ExpectedValue } from "./kinds.js";
import type { Result } from "./result.js";
import type { RetryRequirement } from "./retry.js";
import type { Span } from "./span.js";

/** How an error type is built from the primitive causes and enriched on the way out. */
export interface ErrorMode<E> {
  fromValue(error: ExpectedValue): E;
  fromLength(error: ExpectedLength): E;
  fromValid(error: ExpectedValid): E;
  /** Add a frame as the error leaves a scope. */
  withContext(error: E, context: Context): E;
  /** Offer a wider input; kept only if it contains the error's current input. */
  withInput(error: E, input: AnyInput): E;
}

/** What a renderer needs from an error. */
export interface ErrorDetails {
  /** The "big picture" input the error occurred in. */
  input(): AnyInput;
  /** Exact location of the failure. */
  span(): Span;
  /** The value that was expected, when one exact value was. */
  expected(): AnyInput | undefined;
  description(): string;
  backtrace(): Backtrace;
}

/**
 * Adapter for errors raised by foreign parsers surfaced through
 * `tryExpectExternal` and `intoExternal`.
 */
export interface External {
  /** Location of the failure, when the foreign error knows it. */
  span?(): Span | undefined;
  retryRequirement?(): RetryRequirement | undefined;
  /** Fold the foreign error's own frames into the backtrace, innermost first. */
  pushBacktrace?(push: (context: Context) => void): void;
}

/** Run `f`, adding `context` and `input` to any error it returns. */
export function withContext<T, E>(
  mode: ErrorMode<E>,
  input: AnyInput,
  context: Context,
  f: () => Result<T, E>
): Result<T, E> {
  const result = f();
  if (result.ok) {
    return result;
  }
  return { ok: false, error: mode.withInput(mode.withContext(result.error, context), input) };
}
