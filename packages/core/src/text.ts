/**
 * Text input: a range known to be valid UTF-8, tokenized by code point.
 */

import type { Bound } from "./bound.js";
import { Bytes } from "./bytes.js";
import { Input } from "./input.js";
import { textPattern, type Pattern, type TextPattern } from "./pattern.js";
import { textPrefix, type TextPrefix } from "./prefix.js";
import { decodeChar, decodeValid, isContinuationByte, lastCharStart } from "./utf8.js";

export class Text extends Input<Text, string, TextPattern, TextPrefix> {
  readonly kind = "text";

  /** @internal The range must be valid UTF-8; use `input()` or `Bytes.intoText()`. */
  constructor(source: Uint8Array, offset: number, byteLength: number, bound: Bound) {
    super(source, offset, byteLength, bound);
  }

  /** Number of code points. */
  get length(): number {
    let count = 0;
    for (let i = this.offset; i < this.offset + this.byteLength; i++) {
      if (!isContinuationByte(this.source[i] ?? 0)) {
        count++;
      }
    }
    return count;
  }

  last(): string | undefined {
    if (this.byteLength === 0) {
      return undefined;
    }
    return this.tokenAt(lastCharStart(this.asBytes(), this.byteLength))?.[0];
  }

  toAny(): Text {
    return this;
  }

  intoText(): Text {
    return this;
  }

  intoBytes(): Bytes {
    return new Bytes(this.source, this.offset, this.byteLength, this.bound);
  }

  /** Decoded copy of the range. */
  asString(): string {
    return decodeValid(this.asBytes());
  }

  protected derive(offset: number, byteLength: number, bound: Bound): Text {
    return new Text(this.source, offset, byteLength, bound);
  }

  protected toPattern(pattern: TextPattern): Pattern {
    return textPattern(pattern);
  }

  protected prefixBytes(prefix: TextPrefix): Uint8Array {
    return textPrefix(prefix);
  }

  protected expectedInput(bytes: Uint8Array): Text {
    return new Text(bytes, 0, bytes.length, "fully-bounded");
  }

  protected tokenAt(at: number): [string, number] | undefined {
    if (at < 0 || at >= this.byteLength) {
      return undefined;
    }
    const decoded = decodeChar(this.source, this.offset + at);
    return decoded.kind === "char" ? [String.fromCodePoint(decoded.codePoint), decoded.length] : undefined;
  }

  protected byteIndexOf(index: number): number | undefined {
    if (!Number.isInteger(index) || index < 0) {
      return undefined;
    }
    let at = 0;
    for (let seen = 0; seen < index; seen++) {
      const entry = this.tokenAt(at);
      if (entry === undefined) {
        return undefined;
      }
      at += entry[1];
    }
    return at;
  }

  protected isBoundary(at: number): boolean {
    if (!Number.isInteger(at) || at < 0 || at > this.byteLength) {
      return false;
    }
    return at === this.byteLength || !isContinuationByte(this.source[this.offset + at] ?? 0);
  }

  toString(): string {
    return this.asString();
  }
}
