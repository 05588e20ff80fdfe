/**
 * Context frames: "what operation was attempted" records attached to errors as
 * they propagate out of nested scopes.
 */

import type { Span } from "./span.js";

/** A frame in an error backtrace. */
export interface Context {
  /** Description of the operation attempted. */
  readonly operation: string;
  /** What the operation expected, if known. */
  readonly expected?: string;
  /** Grouped with the next non-child frame when walking. */
  readonly isChild?: boolean;
}

/** What a caller passes to `Reader.context`: a bare operation name or a full frame. */
export type ContextLike = string | Context;

export function toContext(context: ContextLike): Context {
  return typeof context === "string" ? { operation: context } : context;
}

/** Mark a frame as a child of the frame beneath it. */
export function childContext(context: Context): Context {
  return { operation: context.operation, expected: context.expected, isChild: true };
}

// ============================================================================
// Core operations
// ============================================================================

export const CORE_OPERATIONS = {
  readAll: "read all input",
  readPartial: "read a partial input",
  intoText: "convert input into UTF-8 text",
  intoNonEmpty: "convert input into non-empty input",
  intoExternal: "convert input into an external type",
  splitAt: "split input",
  splitAtByte: "split input at a byte index",
  splitPrefix: "split a prefix from input",
  splitUntil: "split input until a pattern matches",
  splitWhile: "split input while a condition remains true",
  take: "take a length of input",
  takeArray: "take an array of bytes",
  takeWhile: "take input while a condition remains true",
  takeUntil: "take input until a pattern matches",
  takeUntilConsume: "take input until a pattern matches and consume it",
  takeConsumed: "take consumed input",
  takeStrWhile: "take UTF-8 input while a condition remains true",
  takeRemainingStr: "take remaining input as UTF-8",
  skip: "skip a length of input",
  skipWhile: "skip input while a condition remains true",
  skipUntil: "skip input until a pattern matches",
  skipUntilConsume: "skip input until a pattern matches and consume it",
  skipStrWhile: "skip UTF-8 input while a condition remains true",
  consume: "consume input",
  peek: "peek a length of input",
  peekU8: "peek a u8",
  peekChar: "peek a char",
  readU8: "read a u8",
  readNum: "read a number",
  readChar: "read a char",
  verify: "verify input",
  expect: "read and expect a value",
  expectErased: "read and expect an erased value",
  expectExternal: "read and expect an external value",
  recoverIf: "recover if",
} as const;

export type CoreOperation = keyof typeof CORE_OPERATIONS;

/**
 * The frame a failing primitive creates. It becomes the root of the error's
 * backtrace and carries the exact span of the failure.
 */
export class CoreContext implements Context {
  readonly op: CoreOperation;
  readonly expected: string;
  readonly span: Span;

  constructor(op: CoreOperation, expected: string, span: Span) {
    this.op = op;
    this.expected = expected;
    this.span = span;
  }

  get operation(): string {
    return CORE_OPERATIONS[this.op];
  }

  /** Same frame pointing at a different span. */
  withSpan(span: Span): CoreContext {
    return new CoreContext(this.op, this.expected, span);
  }
}

/** Frame pushed by scoping operations that expect nothing in particular. */
export function operationContext(op: CoreOperation): Context {
  return { operation: CORE_OPERATIONS[op] };
}
