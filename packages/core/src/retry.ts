/**
 * Retry requirements: how many more bytes a failed, non-fatal parse needs
 * before it could succeed.
 */

/** Render `n` as "1 byte" / "n bytes". */
export function byteCount(n: number): string {
  return n === 1 ? "1 byte" : `${n} bytes`;
}

/** A strictly positive count of additional bytes. */
export class RetryRequirement {
  private readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  /** `undefined` when `value` is zero (or not a positive integer). */
  static create(value: number): RetryRequirement | undefined {
    return Number.isInteger(value) && value > 0 ? new RetryRequirement(value) : undefined;
  }

  /** Requirement for `needed` bytes when only `had` were present. */
  static fromHadAndNeeded(had: number, needed: number): RetryRequirement | undefined {
    return RetryRequirement.create(Math.max(0, needed - had));
  }

  /** Whether `count` additional bytes satisfy this requirement. */
  metBy(count: number): boolean {
    return count >= this.value;
  }

  /** Additional bytes to wait for before trying again. */
  continueAfter(): number {
    return this.value;
  }

  equals(other: RetryRequirement | undefined): boolean {
    return other !== undefined && other.value === this.value;
  }

  toString(): string {
    return `${byteCount(this.value)} more`;
  }
}

/** Anything that can say whether and when to retry. */
export interface ToRetryRequirement {
  toRetryRequirement(): RetryRequirement | undefined;
  /** No amount of additional input could change the outcome. */
  isFatal(): boolean;
}

export function hasRetryRequirement(value: unknown): value is ToRetryRequirement {
  return (
    typeof value === "object" &&
    value !== null &&
    "toRetryRequirement" in value &&
    typeof value.toRetryRequirement === "function" &&
    "isFatal" in value &&
    typeof value.isFatal === "function"
  );
}
