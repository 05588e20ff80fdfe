/**
 * Reader: a single-owner cursor over an input.
 *
 * Every operation either advances past what it read and succeeds, or fails
 * and leaves the cursor where it was. Scoped operations (`context`,
 * `recover`, `errorScope`, ...) say explicitly what happens to the cursor
 * when the scope fails.
 *
 * @example
 * ```typescript
 * const result = input("hello world").readAll(Expected.Root, (r) =>
 *   r.context("greeting", (r) => {
 *     const word = r.takeWhile((c) => c !== " ");
 *     const space = r.consume(" ");
 *     if (!space.ok) return space;
 *     return ok([word.asString(), r.takeRemaining().asString()]);
 *   })
 * );
 * ```
 */

import type { Bytes } from "./bytes.js";
import { operationContext, toContext, type ContextLike } from "./context.js";
import { withContext, type ErrorMode, type External } from "./error.js";
import type { Input, PatternOf, PrefixOf, TokenOf } from "./input.js";
import type { Invalid } from "./invalid.js";
import {
  decodeBigInt,
  decodeNumber,
  isBigKind,
  NUMERIC_WIDTH,
  type BigNumericKind,
  type Endian,
  type NumericKind,
  type SmallNumericKind,
} from "./num.js";
import { err, InvariantError, ok, type Result } from "./result.js";
import type { Text } from "./text.js";

/** The shape of a parse function. */
export type ParseFn<I extends Input<I, TokenOf<I>, PatternOf<I>, PrefixOf<I>>, E, R> = (
  r: Reader<I, E>
) => Result<R, E>;

export class Reader<I extends Input<I, T, P, X>, E, T = TokenOf<I>, P = PatternOf<I>, X = PrefixOf<I>> {
  private input: I;
  readonly mode: ErrorMode<E>;

  constructor(input: I, mode: ErrorMode<E>) {
    this.input = input;
    this.mode = mode;
  }

  private advance<R>(result: Result<[R, I], E>): Result<R, E> {
    if (!result.ok) {
      return result;
    }
    const [value, tail] = result.value;
    this.input = tail;
    return ok(value);
  }

  private discard<R>(result: Result<[R, I], E>): Result<void, E> {
    if (!result.ok) {
      return result;
    }
    this.input = result.value[1];
    return ok(undefined);
  }

  private advanceOpt(parts: [I, I] | undefined): I | undefined {
    if (parts === undefined) {
      return undefined;
    }
    this.input = parts[1];
    return parts[0];
  }

  // ==========================================================================
  // Position
  // ==========================================================================

  atEnd(): boolean {
    return this.input.isEmpty();
  }

  remainingBytes(): number {
    return this.input.byteLength;
  }

  /** What is left, without consuming it. */
  peekRemaining(): I {
    return this.input.clone();
  }

  takeRemaining(): I {
    const rest = this.input.clone();
    this.input = this.input.end();
    return rest;
  }

  // ==========================================================================
  // Peeking
  // ==========================================================================

  peek(len: number): Result<I, E> {
    const parts = this.input.splitAt(len, this.mode, "peek");
    return parts.ok ? ok(parts.value[0]) : parts;
  }

  peekOpt(len: number): I | undefined {
    return this.input.splitAtOpt(len)?.[0];
  }

  peekEq(prefix: X): boolean {
    return this.input.hasPrefix(prefix);
  }

  // ==========================================================================
  // Taking and skipping
  // ==========================================================================

  take(len: number): Result<I, E> {
    return this.advance(this.input.splitAt(len, this.mode, "take"));
  }

  takeOpt(len: number): I | undefined {
    return this.advanceOpt(this.input.splitAtOpt(len));
  }

  skip(len: number): Result<void, E> {
    return this.discard(this.input.splitAt(len, this.mode, "skip"));
  }

  skipOpt(len: number): boolean {
    return this.advanceOpt(this.input.splitAtOpt(len)) !== undefined;
  }

  /** Never fails; an empty head means the first token was rejected. */
  takeWhile(pattern: P): I {
    const [head, tail] = this.input.splitWhile(pattern);
    this.input = tail;
    return head;
  }

  skipWhile(pattern: P): void {
    this.input = this.input.splitWhile(pattern)[1];
  }

  tryTakeWhile(predicate: (token: T) => Result<boolean, E>): Result<I, E> {
    return this.advance(this.input.trySplitWhile(predicate, this.mode, "takeWhile"));
  }

  trySkipWhile(predicate: (token: T) => Result<boolean, E>): Result<void, E> {
    return this.discard(this.input.trySplitWhile(predicate, this.mode, "skipWhile"));
  }

  /** Up to (not including) the first match. */
  takeUntil(pattern: P): Result<I, E> {
    return this.advance(this.input.splitUntil(pattern, this.mode, "takeUntil"));
  }

  takeUntilOpt(pattern: P): I | undefined {
    return this.advanceOpt(this.input.splitUntilOpt(pattern));
  }

  /** Up to the first match, which is consumed and dropped. */
  takeUntilConsume(pattern: P): Result<I, E> {
    return this.advance(this.input.splitUntilConsume(pattern, this.mode, "takeUntilConsume"));
  }

  takeUntilConsumeOpt(pattern: P): I | undefined {
    return this.advanceOpt(this.input.splitUntilConsumeOpt(pattern));
  }

  skipUntil(pattern: P): Result<void, E> {
    return this.discard(this.input.splitUntil(pattern, this.mode, "skipUntil"));
  }

  skipUntilOpt(pattern: P): boolean {
    return this.advanceOpt(this.input.splitUntilOpt(pattern)) !== undefined;
  }

  skipUntilConsume(pattern: P): Result<void, E> {
    return this.discard(this.input.splitUntilConsume(pattern, this.mode, "skipUntilConsume"));
  }

  skipUntilConsumeOpt(pattern: P): boolean {
    return this.advanceOpt(this.input.splitUntilConsumeOpt(pattern)) !== undefined;
  }

  consume(prefix: X): Result<void, E> {
    return this.discard(this.input.splitPrefix(prefix, this.mode, "consume"));
  }

  consumeOpt(prefix: X): boolean {
    return this.advanceOpt(this.input.splitPrefixOpt(prefix)) !== undefined;
  }

  // ==========================================================================
  // Scopes
  // ==========================================================================

  /** Run `f`, adding `context` (and the input at scope entry) to its error. */
  context<R>(context: ContextLike, f: (r: Reader<I, E, T, P, X>) => Result<R, E>): Result<R, E> {
    const input = this.input.toAny();
    return withContext(this.mode, input, toContext(context), () => f(this));
  }

  /** Like `context`, on a copy of the cursor that never advances this one. */
  peekContext<R>(context: ContextLike, f: (r: Reader<I, E, T, P, X>) => Result<R, E>): Result<R, E> {
    const copy = new Reader<I, E, T, P, X>(this.input.clone(), this.mode);
    return copy.context(context, f);
  }

  /** Returns `f`'s value and the input it consumed. */
  takeConsumed<R>(f: (r: Reader<I, E, T, P, X>) => R): [R, I] {
    const [value, head, tail] = this.input.splitConsumed(this.mode, f);
    this.input = tail;
    return [value, head];
  }

  tryTakeConsumed<R>(f: (r: Reader<I, E, T, P, X>) => Result<R, E>): Result<[R, I], E> {
    const result = this.input.trySplitConsumed(this.mode, f);
    if (!result.ok) {
      return result;
    }
    const [value, head, tail] = result.value;
    this.input = tail;
    return ok([value, head]);
  }

  /** `undefined` on failure, with the cursor restored. */
  recover<R>(f: (r: Reader<I, E, T, P, X>) => Result<R, E>): R | undefined {
    const checkpoint = this.input;
    const result = f(this);
    if (result.ok) {
      return result.value;
    }
    this.input = checkpoint;
    return undefined;
  }

  /**
   * Recover from the errors `predicate` accepts. Others are returned with a
   * "recover if" frame and the checkpoint as their input.
   */
  recoverIf<R>(
    f: (r: Reader<I, E, T, P, X>) => Result<R, E>,
    predicate: (error: E) => boolean
  ): Result<R | undefined, E> {
    const checkpoint = this.input;
    const result = f(this);
    if (result.ok) {
      return result;
    }
    this.input = checkpoint;
    if (predicate(result.error)) {
      return ok(undefined);
    }
    const error = this.mode.withContext(result.error, operationContext("recoverIf"));
    return err(this.mode.withInput(error, checkpoint.toAny()));
  }

  /** Run `f` under another error mode, advancing by what it consumed on success. */
  errorScope<R, F>(mode: ErrorMode<F>, f: (r: Reader<I, F, T, P, X>) => Result<R, F>): Result<R, F> {
    const scoped = new Reader<I, F, T, P, X>(this.input.clone(), mode);
    const result = f(scoped);
    if (result.ok) {
      this.input = scoped.takeRemaining();
    }
    return result;
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /** Fails with `ExpectedValid(expected)` over the consumed input when `f` returns false. */
  verify(expected: string, f: (r: Reader<I, E, T, P, X>) => boolean): Result<void, E> {
    return this.discard(this.input.splitExpect(this.mode, (r) => (f(r) ? true : undefined), expected, "verify"));
  }

  tryVerify(expected: string, f: (r: Reader<I, E, T, P, X>) => Result<boolean, E>): Result<void, E> {
    const parts = this.input.trySplitExpect(
      this.mode,
      (r): Result<true | undefined, E> => {
        const verified = f(r);
        return verified.ok ? ok(verified.value ? true : undefined) : verified;
      },
      expected,
      "verify"
    );
    return this.discard(parts);
  }

  /** `f`'s value, or `ExpectedValid(expected)` when it returns `undefined`. */
  expect<R>(expected: string, f: (r: Reader<I, E, T, P, X>) => R | undefined): Result<R, E> {
    return this.advance(this.input.splitExpect(this.mode, f, expected, "expect"));
  }

  tryExpect<R>(expected: string, f: (r: Reader<I, E, T, P, X>) => Result<R | undefined, E>): Result<R, E> {
    return this.advance(this.input.trySplitExpect(this.mode, f, expected, "expect"));
  }

  /** Run `f` under the retry-only error; only its retry requirement survives. */
  tryExpectErased<R>(
    expected: string,
    f: (r: Reader<I, Invalid, T, P, X>) => Result<R, Invalid>
  ): Result<R, E> {
    return this.advance(this.input.trySplitExpectErased(this.mode, f, expected));
  }

  /** Hand the input to a foreign parser that reports how many bytes it read. */
  tryExpectExternal<R>(
    expected: string,
    f: (input: I) => Result<[value: R, read: number], External>
  ): Result<R, E> {
    return this.advance(this.input.trySplitExternal(this.mode, f, expected));
  }

  // ==========================================================================
  // Bytes
  // ==========================================================================

  readU8(this: Reader<Bytes, E>): Result<number, E> {
    return this.advance(this.input.splitFirst(this.mode, "readU8"));
  }

  peekU8(this: Reader<Bytes, E>): Result<number, E> {
    const parts = this.input.splitFirst(this.mode, "peekU8");
    return parts.ok ? ok(parts.value[0]) : parts;
  }

  peekU8Opt(this: Reader<Bytes, E>): number | undefined {
    return this.input.first();
  }

  /** Fixed-width number; big-endian unless told otherwise. */
  readNum(this: Reader<Bytes, E>, kind: BigNumericKind, endian?: Endian): Result<bigint, E>;
  readNum(this: Reader<Bytes, E>, kind: SmallNumericKind, endian?: Endian): Result<number, E>;
  readNum(this: Reader<Bytes, E>, kind: NumericKind, endian: Endian = "be"): Result<number | bigint, E> {
    const taken = this.advance(this.input.splitAt(NUMERIC_WIDTH[kind], this.mode, "readNum"));
    if (!taken.ok) {
      return taken;
    }
    const bytes = taken.value.asBytes();
    return ok(isBigKind(kind) ? decodeBigInt(bytes, kind, endian) : decodeNumber(bytes, kind, endian));
  }

  /** A copy of the next `len` bytes. */
  takeArray(this: Reader<Bytes, E>, len: number): Result<Uint8Array, E> {
    const taken = this.advance(this.input.splitAt(len, this.mode, "takeArray"));
    return taken.ok ? ok(taken.value.asBytes().slice()) : taken;
  }

  takeStrWhile(this: Reader<Bytes, E>, predicate: (char: string) => boolean): Result<Text, E> {
    return this.advance(this.input.splitStrWhile(predicate, this.mode, "takeStrWhile"));
  }

  tryTakeStrWhile(this: Reader<Bytes, E>, predicate: (char: string) => Result<boolean, E>): Result<Text, E> {
    return this.advance(this.input.trySplitStrWhile(predicate, this.mode, "takeStrWhile"));
  }

  skipStrWhile(this: Reader<Bytes, E>, predicate: (char: string) => boolean): Result<void, E> {
    return this.discard(this.input.splitStrWhile(predicate, this.mode, "skipStrWhile"));
  }

  trySkipStrWhile(this: Reader<Bytes, E>, predicate: (char: string) => Result<boolean, E>): Result<void, E> {
    return this.discard(this.input.trySplitStrWhile(predicate, this.mode, "skipStrWhile"));
  }

  takeRemainingStr(this: Reader<Bytes, E>): Result<Text, E> {
    const text = this.input.intoText(this.mode, "takeRemainingStr");
    if (text.ok) {
      this.input = this.input.end();
    }
    return text;
  }

  // ==========================================================================
  // Text
  // ==========================================================================

  readChar(this: Reader<Text, E>): Result<string, E> {
    return this.advance(this.input.splitFirst(this.mode, "readChar"));
  }

  peekChar(this: Reader<Text, E>): Result<string, E> {
    const parts = this.input.splitFirst(this.mode, "peekChar");
    return parts.ok ? ok(parts.value[0]) : parts;
  }

  peekCharOpt(this: Reader<Text, E>): string | undefined {
    return this.input.first();
  }
}

// ============================================================================
// Infallible reader
// ============================================================================

function unreachable(what: string): never {
  throw new InvariantError(`infallible reader produced an error: ${what}`);
}

const INFALLIBLE: ErrorMode<never> = {
  fromValue: (error) => unreachable(error.description()),
  fromLength: (error) => unreachable(error.description()),
  fromValid: (error) => unreachable(error.description()),
  withContext: (error) => error,
  withInput: (error) => error,
};

/** A reader exposing only operations that cannot fail. */
export class InfallibleReader<I extends Input<I, T, P, X>, T = TokenOf<I>, P = PatternOf<I>, X = PrefixOf<I>> {
  private readonly reader: Reader<I, never, T, P, X>;

  private constructor(reader: Reader<I, never, T, P, X>) {
    this.reader = reader;
  }

  static over<I extends Input<I, T, P, X>, T, P, X>(input: I): InfallibleReader<I, T, P, X> {
    return new InfallibleReader(new Reader<I, never, T, P, X>(input, INFALLIBLE));
  }

  atEnd(): boolean {
    return this.reader.atEnd();
  }

  remainingBytes(): number {
    return this.reader.remainingBytes();
  }

  peekRemaining(): I {
    return this.reader.peekRemaining();
  }

  takeRemaining(): I {
    return this.reader.takeRemaining();
  }

  peekOpt(len: number): I | undefined {
    return this.reader.peekOpt(len);
  }

  peekEq(prefix: X): boolean {
    return this.reader.peekEq(prefix);
  }

  takeOpt(len: number): I | undefined {
    return this.reader.takeOpt(len);
  }

  skipOpt(len: number): boolean {
    return this.reader.skipOpt(len);
  }

  takeWhile(pattern: P): I {
    return this.reader.takeWhile(pattern);
  }

  skipWhile(pattern: P): void {
    this.reader.skipWhile(pattern);
  }

  takeUntilOpt(pattern: P): I | undefined {
    return this.reader.takeUntilOpt(pattern);
  }

  takeUntilConsumeOpt(pattern: P): I | undefined {
    return this.reader.takeUntilConsumeOpt(pattern);
  }

  skipUntilOpt(pattern: P): boolean {
    return this.reader.skipUntilOpt(pattern);
  }

  skipUntilConsumeOpt(pattern: P): boolean {
    return this.reader.skipUntilConsumeOpt(pattern);
  }

  consumeOpt(prefix: X): boolean {
    return this.reader.consumeOpt(prefix);
  }

  takeConsumed<R>(f: (r: InfallibleReader<I, T, P, X>) => R): [R, I] {
    return this.reader.takeConsumed((r) => f(new InfallibleReader(r)));
  }

  peekU8Opt(this: InfallibleReader<Bytes>): number | undefined {
    return this.reader.peekU8Opt();
  }

  peekCharOpt(this: InfallibleReader<Text>): string | undefined {
    return this.reader.peekCharOpt();
  }
}
