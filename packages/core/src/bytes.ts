/**
 * Byte input: tokens are single bytes.
 */

import type { Bound } from "./bound.js";
import { closeEnd } from "./bound.js";
import { CoreContext, operationContext, type CoreOperation } from "./context.js";
import { withContext, type ErrorMode } from "./error.js";
import { Input } from "./input.js";
import { atLeast, ExpectedLength, ExpectedValid } from "./kinds.js";
import { bytesPattern, type BytesPattern, type Pattern } from "./pattern.js";
import { bytesPrefix, type BytesPrefix } from "./prefix.js";
import { err, ok, type Result } from "./result.js";
import { RetryRequirement } from "./retry.js";
import { Span } from "./span.js";
import { Text } from "./text.js";
import { decodeChar, validateUtf8 } from "./utf8.js";

function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

export class Bytes extends Input<Bytes, number, BytesPattern, BytesPrefix> {
  readonly kind = "bytes";

  /** @internal Use `input()` at the trust boundary. */
  constructor(source: Uint8Array, offset: number, byteLength: number, bound: Bound) {
    super(source, offset, byteLength, bound);
  }

  get length(): number {
    return this.byteLength;
  }

  last(): number | undefined {
    return this.byteLength === 0 ? undefined : this.source[this.offset + this.byteLength - 1];
  }

  toAny(): Bytes {
    return this;
  }

  intoBytes(): Bytes {
    return this;
  }

  protected derive(offset: number, byteLength: number, bound: Bound): Bytes {
    return new Bytes(this.source, offset, byteLength, bound);
  }

  protected toPattern(pattern: BytesPattern): Pattern {
    return bytesPattern(pattern);
  }

  protected prefixBytes(prefix: BytesPrefix): Uint8Array {
    return bytesPrefix(prefix);
  }

  protected expectedInput(bytes: Uint8Array): Bytes {
    return new Bytes(bytes, 0, bytes.length, "fully-bounded");
  }

  protected tokenAt(at: number): [number, number] | undefined {
    if (at < 0 || at >= this.byteLength) {
      return undefined;
    }
    const byte = this.source[this.offset + at];
    return byte === undefined ? undefined : [byte, 1];
  }

  protected byteIndexOf(index: number): number | undefined {
    return Number.isInteger(index) && index >= 0 && index <= this.byteLength ? index : undefined;
  }

  protected isBoundary(at: number): boolean {
    return Number.isInteger(at) && at >= 0 && at <= this.byteLength;
  }

  // --------------------------------------------------------------------------
  // UTF-8
  // --------------------------------------------------------------------------

  /** Validate as UTF-8. A sequence cut short by the end of input is a length error. */
  intoText<E>(mode: ErrorMode<E>, op: CoreOperation = "intoText"): Result<Text, E> {
    const problem = validateUtf8(this.source, this.offset, this.offset + this.byteLength);
    if (problem === undefined) {
      return ok(new Text(this.source, this.offset, this.byteLength, this.bound));
    }
    const at = this.offset + problem.validUpTo;
    if (problem.kind === "invalid") {
      const context = new CoreContext(op, "utf-8 code point", Span.within(this.source, at, at + problem.length));
      return err(mode.fromValid(new ExpectedValid(context, this)));
    }
    const end = this.offset + this.byteLength;
    const context = new CoreContext(op, "utf-8 code point", Span.within(this.source, at, end));
    return err(mode.fromLength(new ExpectedLength(atLeast(problem.expected), context, this)));
  }

  splitStrWhile<E>(
    predicate: (char: string) => boolean,
    mode: ErrorMode<E>,
    op: CoreOperation = "takeStrWhile"
  ): Result<[Text, Bytes], E> {
    return this.trySplitStrWhile((char) => ok(predicate(char)), mode, op);
  }

  /** Decode chars while `predicate` accepts them; the head is always valid text. */
  trySplitStrWhile<E>(
    predicate: (char: string) => Result<boolean, E>,
    mode: ErrorMode<E>,
    op: CoreOperation = "takeStrWhile"
  ): Result<[Text, Bytes], E> {
    const view = this.asBytes();
    let at = 0;
    while (at < view.length) {
      const decoded = decodeChar(view, at);
      if (decoded.kind === "invalid") {
        return err(this.codePointError(mode, op, at, decoded.length));
      }
      if (decoded.kind === "incomplete") {
        const retry = RetryRequirement.fromHadAndNeeded(decoded.available, decoded.expected);
        return err(this.codePointError(mode, op, at, decoded.available, retry));
      }
      const char = String.fromCodePoint(decoded.codePoint);
      const accepted = withContext(mode, this, operationContext(op), () => predicate(char));
      if (!accepted.ok) {
        return accepted;
      }
      if (!accepted.value) {
        return ok([
          new Text(this.source, this.offset, at, closeEnd(this.bound)),
          this.derive(this.offset + at, this.byteLength - at, this.bound),
        ]);
      }
      at += decoded.length;
    }
    return ok([new Text(this.source, this.offset, this.byteLength, this.bound), this.end()]);
  }

  private codePointError<E>(
    mode: ErrorMode<E>,
    op: CoreOperation,
    at: number,
    length: number,
    retry?: RetryRequirement
  ): E {
    const start = this.offset + at;
    const context = new CoreContext(op, "utf-8 code point", Span.within(this.source, start, start + length));
    return mode.fromValid(new ExpectedValid(context, this, retry));
  }

  toString(): string {
    return `[${Array.from(this.asBytes(), hex).join(" ")}]`;
  }
}
