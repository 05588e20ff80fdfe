/**
 * A reference to a byte range of some input, decoupled from its content.
 *
 * Offsets are absolute within the backing `ArrayBuffer`, so spans taken from
 * unrelated views over the same buffer compare correctly and spans over
 * different buffers are never within each other.
 */

export interface SpanRange {
  start: number;
  end: number;
}

export class Span {
  readonly buffer: ArrayBufferLike;
  readonly start: number;
  readonly end: number;

  private constructor(buffer: ArrayBufferLike, start: number, end: number) {
    this.buffer = buffer;
    this.start = start;
    this.end = end;
  }

  /** Span covering a byte view. */
  static of(bytes: Uint8Array): Span {
    return new Span(bytes.buffer, bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
  }

  /** Span of `[start, end)` within a byte view, clamped to the view. */
  static within(bytes: Uint8Array, start: number, end: number): Span {
    const lo = Math.min(Math.max(0, start), bytes.byteLength);
    const hi = Math.min(Math.max(lo, end), bytes.byteLength);
    return new Span(bytes.buffer, bytes.byteOffset + lo, bytes.byteOffset + hi);
  }

  get length(): number {
    return this.end - this.start;
  }

  isEmpty(): boolean {
    return this.start === this.end;
  }

  /** `this` if non-empty. */
  nonEmpty(): Span | undefined {
    return this.isEmpty() ? undefined : this;
  }

  isWithin(other: Span): boolean {
    return this.buffer === other.buffer && other.start <= this.start && other.end >= this.end;
  }

  /** Offsets of `this` relative to `parent`, if within it. */
  rangeOf(parent: Span): SpanRange | undefined {
    if (!this.isWithin(parent)) {
      return undefined;
    }
    return { start: this.start - parent.start, end: this.end - parent.start };
  }

  offsetWithin(other: Span): number | undefined {
    return this.isWithin(other) ? this.start - other.start : undefined;
  }

  /** Empty and pointing at the start of `other`. */
  isStartOf(other: Span): boolean {
    return this.isEmpty() && this.buffer === other.buffer && other.start === this.start;
  }

  /** Empty and pointing at the end of `other`. */
  isEndOf(other: Span): boolean {
    return this.isEmpty() && this.buffer === other.buffer && other.end === this.end;
  }

  isOverlappingStartOf(other: Span): boolean {
    return this.buffer === other.buffer && other.start > this.start;
  }

  isOverlappingEndOf(other: Span): boolean {
    return this.buffer === other.buffer && other.end < this.end;
  }

  isStartWithin(other: Span): boolean {
    return this.buffer === other.buffer && other.start <= this.start && other.end > this.start;
  }

  /** The bytes of this span, if it lies within `parent`. */
  of(parent: Uint8Array): Uint8Array | undefined {
    const range = this.rangeOf(Span.of(parent));
    return range === undefined ? undefined : parent.subarray(range.start, range.end);
  }

  /** The bytes of this span read straight from its buffer. */
  bytes(): Uint8Array {
    return new Uint8Array(this.buffer, this.start, this.length);
  }

  equals(other: Span): boolean {
    return this.buffer === other.buffer && this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `(offset: ${this.start}, len: ${this.length})`;
  }
}
