/**
 * Error rendering.
 *
 * @example Output:
 * ```
 * error attempting to take UTF-8 input while a condition remains true: expected utf-8 code point
 * > [68 65 6c 6c 6f 20 77 6f 72 6c 64 c2 20]
 *                                     ^^
 * additional:
 *   error offset: 11, input length: 13
 * backtrace:
 *   1. `take UTF-8 input while a condition remains true` (expected utf-8 code point)
 * ```
 */

import { Fatal, Invalid, config } from "@caution/core";
import type { AnyInput, ErrorDetails, SpanRange } from "@caution/core";
import { renderBytes, renderInput, renderInputSpan } from "./input-display.js";
import type { InputDisplayOptions } from "./input-display.js";

// ============================================================================
// Colors
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

type Style = keyof typeof COLORS;

function colorsEnabled(requested: boolean): boolean {
  if (!requested || typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && env.FORCE_COLOR !== "0";
}

type Painter = (text: string, ...styles: Style[]) => string;

function painter(enabled: boolean): Painter {
  return (text, ...styles) => {
    if (!enabled || text === "") return text;
    return `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`;
  };
}

// ============================================================================
// Options
// ============================================================================

export interface ErrorRenderOptions extends InputDisplayOptions {
  /** Wrap the output in `-- INPUT ERROR --` rules (default: config `display.banner`) */
  banner?: boolean;
  /** Whether to use colors (default: config `display.colors`) */
  colors?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (text: string) => void;
}

const INPUT_PREFIX = "> ";
const RULE_WIDTH = 60;

const SPAN_NOTE = [
  "note: error span is not within the error input indicating the",
  "      concrete error being used has a bug. Consider raising an",
  "      issue with the maintainer!",
];

// ============================================================================
// Sections
// ============================================================================

function lineOf(bytes: Uint8Array, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < bytes.length; i++) {
    if (bytes[i] === 0x0a) line++;
  }
  return line;
}

function additional(input: AnyInput, range: SpanRange): string {
  const offsets = `error offset: ${range.start}, input length: ${input.byteLength}`;
  if (input.kind === "text") {
    return `  error line: ${lineOf(input.asBytes(), range.start)}, ${offsets}`;
  }
  return `  ${offsets}`;
}

function backtraceLines(error: ErrorDetails, paint: Painter): string[] {
  const lines: string[] = [];
  let child = 0;
  error.backtrace().walk((depth, context) => {
    let line: string;
    if (context.isChild === true) {
      child++;
      line = `    ${child}. ${paint(`\`${context.operation}\``, "yellow")}`;
    } else {
      child = 0;
      line = `  ${depth}. ${paint(`\`${context.operation}\``, "yellow")}`;
    }
    if (context.expected !== undefined) {
      line += ` (expected ${context.expected})`;
    }
    lines.push(line);
    return true;
  });
  return lines;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render an error. Errors that carry no details (`Invalid`, `Fatal`) render as
 * their one-line text.
 */
export function renderError(error: ErrorDetails | Invalid | Fatal, options: ErrorRenderOptions = {}): string {
  if (error instanceof Invalid || error instanceof Fatal) {
    return error.toString();
  }
  const paint = painter(colorsEnabled(options.colors ?? config.getBoolean("display.colors", false)));
  const banner = options.banner ?? config.getBoolean("display.banner", false);
  const input = error.input();
  const span = error.span();
  const lines: string[] = [];

  // Header line: error attempting to <operation>: <description>
  const operation = error.backtrace().root().operation;
  lines.push(`${paint("error", "bold", "red")} attempting to ${operation}: ${paint(error.description(), "bold")}`);

  const expected = error.expected();
  if (expected !== undefined) {
    lines.push(paint("expected:", "cyan"));
    lines.push(INPUT_PREFIX + renderInput(expected, options));
    lines.push(paint("in:", "cyan"));
  }

  const range = span.rangeOf(input.span());
  if (range === undefined) {
    const strHint = options.strHint === true || input.kind === "text";
    lines.push(...SPAN_NOTE.map((line) => paint(line, "yellow")));
    lines.push(paint("span:", "cyan"));
    lines.push(INPUT_PREFIX + renderBytes(span.bytes(), false, { ...options, strHint }));
    lines.push(paint("input:", "cyan"));
    lines.push(INPUT_PREFIX + renderInput(input, options));
  } else {
    const rendered = renderInputSpan(input, range, options);
    lines.push(INPUT_PREFIX + rendered.line);
    const carets = rendered.underline.trimStart();
    const indent = INPUT_PREFIX.length + rendered.underline.length - carets.length;
    lines.push(" ".repeat(indent) + paint(carets, "red"));
    lines.push(paint("additional:", "cyan"));
    lines.push(additional(input, range));
  }

  lines.push(paint("backtrace:", "cyan"));
  lines.push(...backtraceLines(error, paint));

  if (banner) {
    lines.unshift("-- INPUT ERROR ".padEnd(RULE_WIDTH, "-"));
    lines.push("-".repeat(RULE_WIDTH));
  }
  return lines.join("\n");
}

/**
 * Print an error to the console (stderr).
 */
export function printError(error: ErrorDetails | Invalid | Fatal, options: ErrorRenderOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderError(error, options));
}
