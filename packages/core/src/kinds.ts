/**
 * The three primitive failure causes. Every other error form is one of these
 * plus accumulated context, or a lossy reduction of one.
 */

import type { CoreContext } from "./context.js";
import type { AnyInput } from "./input.js";
import { startsWith } from "./prefix.js";
import { byteCount, RetryRequirement, type ToRetryRequirement } from "./retry.js";
import type { Span } from "./span.js";

/** Length expectation: at least `min`, or exactly `min` when `max` is set. */
export interface Length {
  readonly min: number;
  readonly max?: number;
}

export function atLeast(min: number): Length {
  return { min };
}

export function exactly(len: number): Length {
  return { min: len, max: len };
}

export function describeLength(length: Length): string {
  return length.max === undefined
    ? `at least ${byteCount(length.min)}`
    : `exactly ${byteCount(length.max)}`;
}

// ---------------------------------------------------------------------------
// ExpectedValue
// ---------------------------------------------------------------------------

/** An exact value was expected and something else (or too little) was found. */
export class ExpectedValue implements ToRetryRequirement {
  readonly kind = "value";
  readonly expected: AnyInput;
  readonly context: CoreContext;
  readonly input: AnyInput;

  constructor(expected: AnyInput, context: CoreContext, input: AnyInput) {
    this.expected = expected;
    this.context = context;
    this.input = input;
  }

  get span(): Span {
    return this.context.span;
  }

  /** Fatal unless what was found is a strict prefix of what was expected. */
  isFatal(): boolean {
    if (this.input.isBound()) {
      return true;
    }
    const found = this.context.span.of(this.input.asBytes());
    return found === undefined || !startsWith(this.expected.asBytes(), found);
  }

  toRetryRequirement(): RetryRequirement | undefined {
    if (this.isFatal()) {
      return undefined;
    }
    return RetryRequirement.fromHadAndNeeded(this.context.span.length, this.expected.byteLength);
  }

  description(): string {
    return this.isFatal()
      ? "found a different value to the exact expected"
      : "not enough input to match expected value";
  }
}

// ---------------------------------------------------------------------------
// ExpectedLength
// ---------------------------------------------------------------------------

/** More (or an exact amount of) input was expected. */
export class ExpectedLength implements ToRetryRequirement {
  readonly kind = "length";
  readonly length: Length;
  readonly context: CoreContext;
  readonly input: AnyInput;

  constructor(length: Length, context: CoreContext, input: AnyInput) {
    this.length = length;
    this.context = context;
    this.input = input;
  }

  get span(): Span {
    return this.context.span;
  }

  get min(): number {
    return this.length.min;
  }

  get max(): number | undefined {
    return this.length.max;
  }

  isFatal(): boolean {
    return this.input.isBound() || this.length.max !== undefined;
  }

  toRetryRequirement(): RetryRequirement | undefined {
    if (this.isFatal()) {
      return undefined;
    }
    return RetryRequirement.fromHadAndNeeded(this.context.span.length, this.length.min);
  }

  description(): string {
    return `found ${byteCount(this.context.span.length)} when ${describeLength(this.length)} was expected`;
  }
}

// ---------------------------------------------------------------------------
// ExpectedValid
// ---------------------------------------------------------------------------

/** Input was present but not valid for what was expected. */
export class ExpectedValid implements ToRetryRequirement {
  readonly kind = "valid";
  readonly context: CoreContext;
  readonly input: AnyInput;
  /** Supplied by the producer; absent means no amount of input helps. */
  readonly retryRequirement: RetryRequirement | undefined;

  constructor(context: CoreContext, input: AnyInput, retryRequirement?: RetryRequirement) {
    this.context = context;
    this.input = input;
    this.retryRequirement = retryRequirement;
  }

  get span(): Span {
    return this.context.span;
  }

  isFatal(): boolean {
    return this.input.isBound() || this.retryRequirement === undefined;
  }

  toRetryRequirement(): RetryRequirement | undefined {
    return this.isFatal() ? undefined : this.retryRequirement;
  }

  description(): string {
    return `expected ${this.context.expected}`;
  }
}

export type ExpectedKind = ExpectedValue | ExpectedLength | ExpectedValid;
