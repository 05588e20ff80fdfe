/**
 * Zero-information error for whole-buffer parses that never retry.
 */

import type { ErrorMode } from "./error.js";
import type { RetryRequirement, ToRetryRequirement } from "./retry.js";

export class Fatal implements ToRetryRequirement {
  static readonly instance = new Fatal();

  static readonly Mode: ErrorMode<Fatal> = {
    fromValue: () => Fatal.instance,
    fromLength: () => Fatal.instance,
    fromValid: () => Fatal.instance,
    withContext: (error) => error,
    withInput: (error) => error,
  };

  private constructor() {}

  /** Discard everything about `_source`. */
  static from(_source: unknown): Fatal {
    return Fatal.instance;
  }

  toRetryRequirement(): RetryRequirement | undefined {
    return undefined;
  }

  isFatal(): boolean {
    return true;
  }

  toString(): string {
    return "invalid input";
  }
}
