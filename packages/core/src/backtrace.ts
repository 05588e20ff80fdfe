/**
 * Backtrace strategies.
 *
 * Both start from the root frame created by the failing primitive. The root-only
 * strategy ignores every later push; the full strategy keeps them in push order
 * (innermost first) and walks them outermost first.
 */

import type { Context, CoreContext } from "./context.js";

/** Called per frame with its depth (1 = outermost); return `false` to stop. */
export type BacktraceWalker = (depth: number, context: Context) => boolean;

export interface Backtrace {
  /** The failing primitive's frame. */
  root(): CoreContext;
  /** Number of frames held. */
  count(): number;
  /** Visit frames outermost first; `false` if the walker stopped early. */
  walk(f: BacktraceWalker): boolean;
}

export interface BacktraceBuilder extends Backtrace {
  push(context: Context): void;
}

/** Chooses how much context an error keeps. */
export interface BacktraceStrategy {
  readonly name: "root" | "full";
  fromRoot(context: CoreContext): BacktraceBuilder;
}

// ---------------------------------------------------------------------------
// Root-only
// ---------------------------------------------------------------------------

export class RootBacktrace implements BacktraceBuilder {
  static readonly strategy: BacktraceStrategy = {
    name: "root",
    fromRoot: (context) => new RootBacktrace(context),
  };

  private readonly context: CoreContext;

  constructor(context: CoreContext) {
    this.context = context;
  }

  push(_context: Context): void {}

  root(): CoreContext {
    return this.context;
  }

  count(): number {
    return 1;
  }

  walk(f: BacktraceWalker): boolean {
    return f(1, this.context);
  }
}

// ---------------------------------------------------------------------------
// Full
// ---------------------------------------------------------------------------

export class FullBacktrace implements BacktraceBuilder {
  static readonly strategy: BacktraceStrategy = {
    name: "full",
    fromRoot: (context) => new FullBacktrace(context),
  };

  private readonly rootContext: CoreContext;
  private readonly stack: Context[] = [];

  constructor(context: CoreContext) {
    this.rootContext = context;
  }

  push(context: Context): void {
    this.stack.push(context);
  }

  root(): CoreContext {
    return this.rootContext;
  }

  count(): number {
    return this.stack.length + 1;
  }

  walk(f: BacktraceWalker): boolean {
    const frames: Context[] = [this.rootContext, ...this.stack].reverse();
    const children = frames.filter((context) => context.isChild === true);
    let nextChild = 0;
    let skipped = 0;
    let depth = 0;
    for (const context of frames) {
      if (context.isChild === true) {
        skipped++;
        continue;
      }
      depth++;
      if (!f(depth, context)) {
        return false;
      }
      // Children pushed above this frame are listed right after it.
      for (; skipped > 0; skipped--) {
        const child = children[nextChild++];
        if (child !== undefined && !f(depth, child)) {
          return false;
        }
      }
    }
    return true;
  }
}
