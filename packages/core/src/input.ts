/**
 * Zero-copy inputs.
 *
 * An input is a view `[offset, offset + byteLength)` over a caller-owned
 * `Uint8Array` plus a {@link Bound}. Every split returns new views over the
 * same source, so spans taken from any of them stay comparable.
 *
 * Two refinements exist: {@link Bytes} (byte tokens) and {@link Text}
 * (code point tokens over a range known to be valid UTF-8).
 */

import { closeEnd, forEnd, openEnd, type Bound } from "./bound.js";
import type { Bytes } from "./bytes.js";
import { childContext, CORE_OPERATIONS, CoreContext, operationContext, type CoreOperation } from "./context.js";
import { debugLog, isDebugEnabled } from "./debug.js";
import { withContext, type ErrorMode, type External } from "./error.js";
import { Invalid } from "./invalid.js";
import { atLeast, exactly, ExpectedLength, ExpectedValid, ExpectedValue } from "./kinds.js";
import type { BytesPattern, Pattern, TextPattern } from "./pattern.js";
import { startsWith, type BytesPrefix, type TextPrefix } from "./prefix.js";
import { InfallibleReader, Reader } from "./reader.js";
import { err, ok, type Result } from "./result.js";
import { hasRetryRequirement, RetryRequirement } from "./retry.js";
import { Span } from "./span.js";
import type { Text } from "./text.js";

/** Either input refinement; what errors record. */
export type AnyInput = Bytes | Text;

export type TokenOf<I> = I extends Bytes ? number : I extends Text ? string : never;
export type PatternOf<I> = I extends Bytes ? BytesPattern : I extends Text ? TextPattern : never;
export type PrefixOf<I> = I extends Bytes ? BytesPrefix : I extends Text ? TextPrefix : never;

// ============================================================================
// Debug logging
// ============================================================================

function describeFailure(error: unknown): string {
  if (!hasRetryRequirement(error)) {
    return String(error);
  }
  const requirement = error.toRetryRequirement();
  return requirement === undefined ? "fatal" : `retry after ${requirement.toString()}`;
}

function logFailure<T, E>(op: CoreOperation, result: Result<T, E>): void {
  if (!result.ok && isDebugEnabled()) {
    debugLog("read", `${CORE_OPERATIONS[op]} failed: ${describeFailure(result.error)}`);
  }
}

// ============================================================================
// Input
// ============================================================================

/**
 * Shared implementation of both refinements.
 *
 * - `I`: the concrete input type returned by splits
 * - `T`: token type
 * - `P`: accepted pattern sources
 * - `X`: accepted prefix sources
 */
export abstract class Input<I extends Input<I, T, P, X>, T, P, X> {
  readonly source: Uint8Array;
  readonly offset: number;
  readonly byteLength: number;
  readonly bound: Bound;

  protected constructor(source: Uint8Array, offset: number, byteLength: number, bound: Bound) {
    this.source = source;
    this.offset = offset;
    this.byteLength = byteLength;
    this.bound = bound;
  }

  abstract readonly kind: "bytes" | "text";

  /** Number of tokens. */
  abstract get length(): number;

  abstract last(): T | undefined;

  /** This input as the union errors carry. */
  abstract toAny(): AnyInput;

  /** Another range over the same source. */
  protected abstract derive(offset: number, byteLength: number, bound: Bound): I;

  protected abstract toPattern(pattern: P): Pattern;

  protected abstract prefixBytes(prefix: X): Uint8Array;

  /** An input over an expected value, for `ExpectedValue` errors. */
  protected abstract expectedInput(bytes: Uint8Array): AnyInput;

  /** Token starting `at` bytes in, and its encoded length. */
  protected abstract tokenAt(at: number): [token: T, length: number] | undefined;

  /** Byte offset of the token at `index`, or of the end when `index === length`. */
  protected abstract byteIndexOf(index: number): number | undefined;

  /** Whether splitting `at` bytes in keeps both halves whole. */
  protected abstract isBoundary(at: number): boolean;

  // --------------------------------------------------------------------------
  // Inspection
  // --------------------------------------------------------------------------

  isEmpty(): boolean {
    return this.byteLength === 0;
  }

  isBound(): boolean {
    return this.bound === "fully-bounded";
  }

  intoBound(): I {
    return this.derive(this.offset, this.byteLength, "fully-bounded");
  }

  clone(): I {
    return this.derive(this.offset, this.byteLength, this.bound);
  }

  span(): Span {
    return Span.within(this.source, this.offset, this.offset + this.byteLength);
  }

  /** Zero-copy view of the raw bytes. */
  asBytes(): Uint8Array {
    return this.source.subarray(this.offset, this.offset + this.byteLength);
  }

  /** Empty input pointing at the end of this one. */
  end(): I {
    return this.derive(this.offset + this.byteLength, 0, forEnd(this.bound));
  }

  first(): T | undefined {
    return this.tokenAt(0)?.[0];
  }

  nth(index: number): T | undefined {
    let seen = 0;
    for (const token of this.tokens()) {
      if (seen++ === index) {
        return token;
      }
    }
    return undefined;
  }

  *tokens(): Generator<T, void, undefined> {
    let at = 0;
    while (at < this.byteLength) {
      const entry = this.tokenAt(at);
      if (entry === undefined) {
        return;
      }
      yield entry[0];
      at += entry[1];
    }
  }

  /** Content equality. */
  equals(other: I): boolean {
    const a = this.asBytes();
    const b = other.asBytes();
    return a.length === b.length && startsWith(a, b);
  }

  hasPrefix(prefix: X): boolean {
    return startsWith(this.asBytes(), this.prefixBytes(prefix));
  }

  // --------------------------------------------------------------------------
  // Splitting
  // --------------------------------------------------------------------------

  protected splitAtByteUnchecked(mid: number): [I, I] {
    return [
      this.derive(this.offset, mid, closeEnd(this.bound)),
      this.derive(this.offset + mid, this.byteLength - mid, this.bound),
    ];
  }

  /** The whole input followed by its end. */
  protected exhausted(): [I, I] {
    return [this.clone(), this.end()];
  }

  /** Split after `mid` tokens. */
  splitAtOpt(mid: number): [I, I] | undefined {
    const at = this.byteIndexOf(mid);
    return at === undefined ? undefined : this.splitAtByteUnchecked(at);
  }

  splitAt<E>(mid: number, mode: ErrorMode<E>, op: CoreOperation = "splitAt"): Result<[I, I], E> {
    const parts = this.splitAtOpt(mid);
    if (parts !== undefined) {
      return ok(parts);
    }
    return err(this.lengthError(mode, mid, op));
  }

  splitAtByteOpt(mid: number): [I, I] | undefined {
    return mid <= this.byteLength && this.isBoundary(mid) ? this.splitAtByteUnchecked(mid) : undefined;
  }

  splitAtByte<E>(mid: number, mode: ErrorMode<E>, op: CoreOperation = "splitAtByte"): Result<[I, I], E> {
    if (mid > this.byteLength) {
      return err(this.lengthError(mode, mid, op));
    }
    if (!this.isBoundary(mid)) {
      const at = this.offset + mid;
      const context = new CoreContext(op, "char index", Span.within(this.source, at, at));
      return err(mode.fromValid(new ExpectedValid(context, this.toAny())));
    }
    return ok(this.splitAtByteUnchecked(mid));
  }

  /** First token and the input after it. */
  splitFirst<E>(mode: ErrorMode<E>, op: CoreOperation): Result<[T, I], E> {
    const entry = this.byteLength > 0 ? this.tokenAt(0) : undefined;
    if (entry === undefined) {
      return err(this.lengthError(mode, 1, op));
    }
    const [token, length] = entry;
    return ok([token, this.derive(this.offset + length, this.byteLength - length, this.bound)]);
  }

  splitWhile(pattern: P): [I, I] {
    const index = this.toPattern(pattern).findReject(this.asBytes());
    return index === undefined ? this.exhausted() : this.splitAtByteUnchecked(index);
  }

  trySplitWhile<E>(
    predicate: (token: T) => Result<boolean, E>,
    mode: ErrorMode<E>,
    op: CoreOperation = "splitWhile"
  ): Result<[I, I], E> {
    let at = 0;
    while (at < this.byteLength) {
      const entry = this.tokenAt(at);
      if (entry === undefined) {
        break;
      }
      const [token, length] = entry;
      const accepted = withContext(mode, this.toAny(), operationContext(op), () => predicate(token));
      if (!accepted.ok) {
        return accepted;
      }
      if (!accepted.value) {
        return ok(this.splitAtByteUnchecked(at));
      }
      at += length;
    }
    return ok(this.exhausted());
  }

  /** First match of `pattern`, when it lies within the input on token boundaries. */
  private locate(pattern: P): [index: number, length: number] | undefined {
    const match = this.toPattern(pattern).findMatch(this.asBytes());
    if (match === undefined) {
      return undefined;
    }
    const [index, length] = match;
    const end = index + length;
    if (length < 0 || !this.isBoundary(index) || !this.isBoundary(end)) {
      return undefined;
    }
    return match;
  }

  splitUntilOpt(pattern: P): [I, I] | undefined {
    const match = this.locate(pattern);
    return match === undefined ? undefined : this.splitAtByteUnchecked(match[0]);
  }

  /** Like `splitUntilOpt`, dropping the match from the tail. */
  splitUntilConsumeOpt(pattern: P): [I, I] | undefined {
    const match = this.locate(pattern);
    if (match === undefined) {
      return undefined;
    }
    const [index, length] = match;
    const rest = index + length;
    return [
      this.derive(this.offset, index, closeEnd(this.bound)),
      this.derive(this.offset + rest, this.byteLength - rest, this.bound),
    ];
  }

  splitUntil<E>(pattern: P, mode: ErrorMode<E>, op: CoreOperation = "splitUntil"): Result<[I, I], E> {
    const parts = this.splitUntilOpt(pattern);
    return parts === undefined ? err(this.untilError(mode, op)) : ok(parts);
  }

  splitUntilConsume<E>(pattern: P, mode: ErrorMode<E>, op: CoreOperation = "splitUntil"): Result<[I, I], E> {
    const parts = this.splitUntilConsumeOpt(pattern);
    return parts === undefined ? err(this.untilError(mode, op)) : ok(parts);
  }

  splitPrefixOpt(prefix: X): [I, I] | undefined {
    const expected = this.prefixBytes(prefix);
    return startsWith(this.asBytes(), expected) ? this.splitAtByteUnchecked(expected.length) : undefined;
  }

  splitPrefix<E>(prefix: X, mode: ErrorMode<E>, op: CoreOperation = "splitPrefix"): Result<[I, I], E> {
    const expected = this.prefixBytes(prefix);
    if (startsWith(this.asBytes(), expected)) {
      return ok(this.splitAtByteUnchecked(expected.length));
    }
    const found = Span.within(this.source, this.offset, this.offset + Math.min(expected.length, this.byteLength));
    const context = new CoreContext(op, "exact value", found);
    return err(mode.fromValue(new ExpectedValue(this.expectedInput(expected), context, this.toAny())));
  }

  // --------------------------------------------------------------------------
  // Consuming through a reader
  // --------------------------------------------------------------------------

  /** Head covering what the reader consumed, given what it left. */
  protected consumedHead(tail: I): I {
    const mid = this.byteLength - tail.byteLength;
    const bound = tail.bound === "unbounded" ? openEnd(this.bound) : closeEnd(this.bound);
    return this.derive(this.offset, mid, bound);
  }

  /** Run `f` over a reader; returns its value, the consumed head and the tail. */
  splitConsumed<R, E>(mode: ErrorMode<E>, f: (r: Reader<I, E, T, P, X>) => R): [R, I, I] {
    const reader = new Reader<I, E, T, P, X>(this.clone(), mode);
    const value = f(reader);
    const tail = reader.takeRemaining();
    return [value, this.consumedHead(tail), tail];
  }

  trySplitConsumed<R, E>(
    mode: ErrorMode<E>,
    f: (r: Reader<I, E, T, P, X>) => Result<R, E>
  ): Result<[R, I, I], E> {
    const [result, head, tail] = this.splitConsumed(mode, f);
    return result.ok ? ok([result.value, head, tail]) : result;
  }

  /** Run `f`; `undefined` becomes `ExpectedValid(expected)` over the consumed part. */
  splitExpect<R, E>(
    mode: ErrorMode<E>,
    f: (r: Reader<I, E, T, P, X>) => R | undefined,
    expected: string,
    op: CoreOperation = "expect"
  ): Result<[R, I], E> {
    const [value, head, tail] = this.splitConsumed(mode, f);
    if (value !== undefined) {
      return ok([value, tail]);
    }
    return err(mode.fromValid(new ExpectedValid(new CoreContext(op, expected, head.span()), this.toAny())));
  }

  trySplitExpect<R, E>(
    mode: ErrorMode<E>,
    f: (r: Reader<I, E, T, P, X>) => Result<R | undefined, E>,
    expected: string,
    op: CoreOperation = "expect"
  ): Result<[R, I], E> {
    const [result, head, tail] = this.splitConsumed(mode, f);
    if (!result.ok) {
      return result;
    }
    if (result.value !== undefined) {
      return ok([result.value, tail]);
    }
    return err(mode.fromValid(new ExpectedValid(new CoreContext(op, expected, head.span()), this.toAny())));
  }

  /** Run `f` under the retry-only error; its failure surfaces as `ExpectedValid(expected)`. */
  trySplitExpectErased<R, E>(
    mode: ErrorMode<E>,
    f: (r: Reader<I, Invalid, T, P, X>) => Result<R, Invalid>,
    expected: string,
    op: CoreOperation = "expectErased"
  ): Result<[R, I], E> {
    const [result, head, tail] = this.splitConsumed(Invalid.Mode, f);
    if (result.ok) {
      return ok([result.value, tail]);
    }
    const context = new CoreContext(op, expected, head.span());
    return err(mode.fromValid(new ExpectedValid(context, this.toAny(), result.error.toRetryRequirement())));
  }

  /** Hand the input to a foreign parser reporting how many bytes it read. */
  trySplitExternal<R, E>(
    mode: ErrorMode<E>,
    f: (input: I) => Result<[value: R, read: number], External>,
    expected: string,
    op: CoreOperation = "expectExternal"
  ): Result<[R, I], E> {
    const result = f(this.clone());
    if (!result.ok) {
      return err(this.externalError(mode, result.error, expected, op));
    }
    const [value, read] = result.value;
    const parts = this.splitAtByte(read, mode, op);
    return parts.ok ? ok([value, parts.value[1]]) : parts;
  }

  protected externalError<E>(mode: ErrorMode<E>, external: External, expected: string, op: CoreOperation): E {
    const span = external.span?.() ?? this.span();
    const retry = external.retryRequirement?.();
    let error = mode.fromValid(new ExpectedValid(new CoreContext(op, expected, span), this.toAny(), retry));
    external.pushBacktrace?.((context) => {
      error = mode.withContext(error, childContext(context));
    });
    return error;
  }

  // --------------------------------------------------------------------------
  // Conversions
  // --------------------------------------------------------------------------

  intoNonEmpty<E>(mode: ErrorMode<E>): Result<I, E> {
    if (!this.isEmpty()) {
      return ok(this.clone());
    }
    const context = new CoreContext("intoNonEmpty", "non-empty input", this.span());
    return err(mode.fromLength(new ExpectedLength(atLeast(1), context, this.toAny())));
  }

  intoExternal<R, E>(mode: ErrorMode<E>, expected: string, f: (input: I) => Result<R, External>): Result<R, E> {
    const result = f(this.clone());
    return result.ok ? result : err(this.externalError(mode, result.error, expected, "intoExternal"));
  }

  // --------------------------------------------------------------------------
  // Entry points
  // --------------------------------------------------------------------------

  /** Run `f` over the whole input; anything left over is an error. */
  readAll<R, E>(mode: ErrorMode<E>, f: (r: Reader<I, E, T, P, X>) => Result<R, E>): Result<R, E> {
    const reader = new Reader<I, E, T, P, X>(this.clone(), mode);
    let result = withContext(mode, this.toAny(), operationContext("readAll"), () => f(reader));
    if (result.ok && !reader.atEnd()) {
      const rest = reader.takeRemaining();
      const context = new CoreContext("readAll", "no trailing input", rest.span());
      result = err(mode.fromLength(new ExpectedLength(exactly(0), context, this.toAny())));
    }
    logFailure("readAll", result);
    return result;
  }

  /** Run `f`; returns its value and whatever it left unread. */
  readPartial<R, E>(mode: ErrorMode<E>, f: (r: Reader<I, E, T, P, X>) => Result<R, E>): Result<[R, I], E> {
    const reader = new Reader<I, E, T, P, X>(this.clone(), mode);
    const result = withContext(mode, this.toAny(), operationContext("readPartial"), () => f(reader));
    logFailure("readPartial", result);
    return result.ok ? ok([result.value, reader.takeRemaining()]) : result;
  }

  readInfallible<R>(f: (r: InfallibleReader<I, T, P, X>) => R): [R, I] {
    const reader = InfallibleReader.over<I, T, P, X>(this.clone());
    const value = f(reader);
    return [value, reader.takeRemaining()];
  }

  // --------------------------------------------------------------------------
  // Errors
  // --------------------------------------------------------------------------

  private lengthError<E>(mode: ErrorMode<E>, min: number, op: CoreOperation): E {
    if (!Number.isInteger(min) || min < 0) {
      const context = new CoreContext(op, "valid length", Span.within(this.source, this.offset, this.offset));
      return mode.fromValid(new ExpectedValid(context, this.toAny()));
    }
    const context = new CoreContext(op, "enough input", this.span());
    return mode.fromLength(new ExpectedLength(atLeast(min), context, this.toAny()));
  }

  /** No match yet; one more byte could still bring one. */
  private untilError<E>(mode: ErrorMode<E>, op: CoreOperation): E {
    const context = new CoreContext(op, "pattern match", this.span());
    return mode.fromValid(new ExpectedValid(context, this.toAny(), RetryRequirement.create(1)));
  }
}
