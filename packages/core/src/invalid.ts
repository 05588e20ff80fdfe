/**
 * Minimal error: keeps only whether and when to retry.
 */

import type { ErrorMode } from "./error.js";
import type { RetryRequirement, ToRetryRequirement } from "./retry.js";

export class Invalid implements ToRetryRequirement {
  static readonly Mode: ErrorMode<Invalid> = {
    fromValue: (error) => Invalid.from(error),
    fromLength: (error) => Invalid.from(error),
    fromValid: (error) => Invalid.from(error),
    withContext: (error) => error,
    withInput: (error) => error,
  };

  readonly retryRequirement: RetryRequirement | undefined;

  constructor(retryRequirement?: RetryRequirement) {
    this.retryRequirement = retryRequirement;
  }

  static fatal(): Invalid {
    return new Invalid();
  }

  /** Reduce any richer error to its retry requirement. */
  static from(source: ToRetryRequirement): Invalid {
    return new Invalid(source.toRetryRequirement());
  }

  toRetryRequirement(): RetryRequirement | undefined {
    return this.retryRequirement;
  }

  isFatal(): boolean {
    return this.retryRequirement === undefined;
  }

  toString(): string {
    if (this.retryRequirement === undefined) {
      return "invalid input";
    }
    return `invalid input: needs ${this.retryRequirement.toString()} to continue processing`;
  }
}
