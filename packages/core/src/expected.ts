/**
 * The catch-all verbose error: one primitive cause, the widest input known to
 * contain it, and a backtrace of the scopes it left.
 */

import { RootBacktrace, FullBacktrace } from "./backtrace.js";
import type { Backtrace, BacktraceBuilder, BacktraceStrategy } from "./backtrace.js";
import { config } from "./config.js";
import type { Context } from "./context.js";
import type { ErrorDetails, ErrorMode } from "./error.js";
import type { AnyInput } from "./input.js";
import type { ExpectedKind, ExpectedLength, ExpectedValid, ExpectedValue } from "./kinds.js";
import type { RetryRequirement, ToRetryRequirement } from "./retry.js";
import type { Span } from "./span.js";

function summarize(kind: ExpectedKind): string {
  return `error attempting to ${kind.context.operation}: ${kind.description()}`;
}

export class Expected extends Error implements ErrorDetails, ToRetryRequirement {
  /** Catch-all errors keeping only the failing primitive's frame. */
  static readonly Root: ErrorMode<Expected> = Expected.modeFor(RootBacktrace.strategy);
  /** Catch-all errors keeping every frame. */
  static readonly Full: ErrorMode<Expected> = Expected.modeFor(FullBacktrace.strategy);

  /** The primitive cause. */
  readonly kind: ExpectedKind;
  private currentInput: AnyInput;
  private readonly trace: BacktraceBuilder;

  constructor(kind: ExpectedKind, strategy: BacktraceStrategy = RootBacktrace.strategy) {
    super(summarize(kind));
    this.name = "Expected";
    this.kind = kind;
    this.currentInput = kind.input;
    this.trace = strategy.fromRoot(kind.context);
  }

  /** Error mode building `Expected` values with the given backtrace strategy. */
  static modeFor(strategy: BacktraceStrategy): ErrorMode<Expected> {
    const build = (kind: ExpectedKind): Expected => new Expected(kind, strategy);
    return {
      fromValue: (error: ExpectedValue) => build(error),
      fromLength: (error: ExpectedLength) => build(error),
      fromValid: (error: ExpectedValid) => build(error),
      withContext: (error, context) => error.addContext(context),
      withInput: (error, input) => error.addInput(input),
    };
  }

  /** Error mode whose strategy comes from the `backtrace` config key. */
  static mode(): ErrorMode<Expected> {
    return config.get("backtrace") === "full" ? Expected.Full : Expected.Root;
  }

  /** Push a frame; returns `this` for chaining. */
  addContext(context: Context): this {
    this.trace.push(context);
    return this;
  }

  /** Widen the recorded input if `input` contains it; returns `this`. */
  addInput(input: AnyInput): this {
    if (this.currentInput.span().isWithin(input.span())) {
      this.currentInput = input;
    }
    return this;
  }

  input(): AnyInput {
    return this.currentInput;
  }

  span(): Span {
    return this.kind.context.span;
  }

  expected(): AnyInput | undefined {
    return this.kind.kind === "value" ? this.kind.expected : undefined;
  }

  description(): string {
    return this.kind.description();
  }

  backtrace(): Backtrace {
    return this.trace;
  }

  toRetryRequirement(): RetryRequirement | undefined {
    return this.kind.toRetryRequirement();
  }

  isFatal(): boolean {
    return this.kind.isFatal();
  }
}
