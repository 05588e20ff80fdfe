/**
 * Input rendering.
 *
 * An input is laid out as a sequence of elements (one per byte, or one per
 * char when rendered as text), a window of those elements is chosen, and the
 * window is written with `..` where elements were cut. Each element keeps its
 * column so a span can be underlined beneath the rendered line.
 */

import { config, decodeChar, validateUtf8 } from "@caution/core";
import type { AnyInput, SpanRange } from "@caution/core";

// ============================================================================
// Options
// ============================================================================

/** Which part of an input to keep when it has more than `maxElements` elements. */
export type Section = "full" | "head" | "tail" | "head-tail";

export interface InputDisplayOptions {
  /** Elements shown before truncating (default: config `display.maxElements`) */
  maxElements?: number;
  /** Which elements survive truncation (default: "head-tail") */
  section?: Section;
  /** Render bytes as text where they decode (default: config `display.strHint`) */
  strHint?: boolean;
}

/** An input rendered on one line, with the columns of a span beneath it. */
export interface RenderedInput {
  line: string;
  /** Carets under the span, trailing spaces removed; empty when no span was given. */
  underline: string;
}

// ============================================================================
// Elements
// ============================================================================

interface Element {
  text: string;
  /** Byte range of the element within the rendered bytes. */
  start: number;
  end: number;
}

const HEX = "0123456789abcdef";

function hex(byte: number): string {
  return (HEX[byte >> 4] ?? "0") + (HEX[byte & 0xf] ?? "0");
}

function escapeChar(char: string): string {
  switch (char) {
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    case '"':
      return '\\"';
    case "\\":
      return "\\\\";
  }
  const codePoint = char.codePointAt(0) ?? 0;
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return `\\u{${codePoint.toString(16)}}`;
  }
  return char;
}

function byteElements(bytes: Uint8Array, quoteAscii: boolean): Element[] {
  const elements: Element[] = [];
  bytes.forEach((byte, i) => {
    const text = quoteAscii && byte > 0x20 && byte < 0x7f ? `'${String.fromCharCode(byte)}'` : hex(byte);
    elements.push({ text, start: i, end: i + 1 });
  });
  return elements;
}

/** One element per char; `bytes` must be valid UTF-8. */
function charElements(bytes: Uint8Array): Element[] {
  const elements: Element[] = [];
  let i = 0;
  while (i < bytes.length) {
    const decoded = decodeChar(bytes, i);
    if (decoded.kind !== "char") break;
    elements.push({
      text: escapeChar(String.fromCodePoint(decoded.codePoint)),
      start: i,
      end: i + decoded.length,
    });
    i += decoded.length;
  }
  return elements;
}

// ============================================================================
// Windows
// ============================================================================

/** Half-open element index ranges to show, in order. */
type Window = Array<[number, number]>;

function sectionWindow(count: number, max: number, section: Section): Window {
  if (section === "full" || count <= max) {
    return [[0, count]];
  }
  switch (section) {
    case "head":
      return [[0, max]];
    case "tail":
      return [[count - max, count]];
    case "head-tail": {
      const head = Math.ceil(max / 2);
      return [
        [0, head],
        [count - (max - head), count],
      ];
    }
  }
}

/** `max` elements starting a quarter of `max` before `focus`, clamped to the input. */
function spanWindow(count: number, max: number, focus: number): Window {
  const start = Math.min(Math.max(0, focus - Math.floor(max / 4)), Math.max(0, count - max));
  return [[start, Math.min(count, start + max)]];
}

// ============================================================================
// Layout
// ============================================================================

interface Placed {
  element: Element;
  column: number;
}

interface Layout {
  line: string;
  placed: Placed[];
  /** Column just past the last element shown. */
  endColumn: number;
}

function layout(elements: Element[], window: Window, textual: boolean): Layout {
  const count = elements.length;
  const placed: Placed[] = [];
  let line = textual ? "" : "[";
  let endColumn = line.length;

  if (textual) {
    window.forEach(([from, to], n) => {
      if (n > 0 || from > 0) line += "..";
      line += '"';
      for (let i = from; i < to; i++) {
        const element = elements[i];
        if (element === undefined) continue;
        placed.push({ element, column: line.length });
        line += element.text;
      }
      endColumn = line.length;
      line += '"';
    });
    const last = window[window.length - 1];
    if (last !== undefined && last[1] < count) line += "..";
    return { line, placed, endColumn };
  }

  const parts: string[] = [];
  let column = line.length;
  const push = (text: string, element?: Element): void => {
    if (parts.length > 0) column += 1;
    if (element !== undefined) placed.push({ element, column });
    parts.push(text);
    column += text.length;
  };
  window.forEach(([from, to], n) => {
    if (n > 0 || from > 0) push("..");
    for (let i = from; i < to; i++) {
      const element = elements[i];
      if (element !== undefined) push(element.text, element);
    }
  });
  const last = window[window.length - 1];
  if (last !== undefined && last[1] < count) push("..");
  endColumn = column;
  line += parts.join(" ") + "]";
  return { line, placed, endColumn };
}

function underline(result: Layout, span: SpanRange): string {
  const marks: string[] = Array.from({ length: result.line.length + 1 }, () => " ");
  const mark = (column: number, width: number): void => {
    for (let i = 0; i < Math.max(1, width); i++) marks[column + i] = "^";
  };
  if (span.start === span.end) {
    const at = result.placed.find((p) => p.element.start >= span.start);
    mark(at === undefined ? result.endColumn : at.column, 1);
  } else {
    for (const { element, column } of result.placed) {
      if (element.start < span.end && element.end > span.start) {
        mark(column, element.text.length);
      }
    }
  }
  return marks.join("").trimEnd();
}

// ============================================================================
// Rendering
// ============================================================================

interface Resolved {
  max: number;
  section: Section;
  strHint: boolean;
}

function resolve(options: InputDisplayOptions): Resolved {
  const max = options.maxElements ?? config.getNumber("display.maxElements", 40);
  return {
    max: Math.max(1, Math.floor(max)),
    section: options.section ?? "head-tail",
    strHint: options.strHint ?? config.getBoolean("display.strHint", false),
  };
}

function elementsOf(bytes: Uint8Array, isText: boolean, strHint: boolean): [Element[], boolean] {
  if (isText || (strHint && validateUtf8(bytes) === undefined)) {
    return [charElements(bytes), true];
  }
  return [byteElements(bytes, strHint), false];
}

/**
 * Render raw bytes. `isText` marks bytes known to be UTF-8 text.
 *
 * @example
 * ```typescript
 * renderBytes(new Uint8Array([0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff]), false, { maxElements: 4 });
 * // → "[aa bb .. ee ff]"
 * ```
 */
export function renderBytes(bytes: Uint8Array, isText: boolean, options: InputDisplayOptions = {}): string {
  const { max, section, strHint } = resolve(options);
  const [elements, textual] = elementsOf(bytes, isText, strHint);
  return layout(elements, sectionWindow(elements.length, max, section), textual).line;
}

/** Render an input on one line. */
export function renderInput(input: AnyInput, options: InputDisplayOptions = {}): string {
  return renderBytes(input.asBytes(), input.kind === "text", options);
}

/**
 * Render an input windowed around `span` (byte offsets relative to the
 * input) and underline the elements the span covers.
 */
export function renderInputSpan(input: AnyInput, span: SpanRange, options: InputDisplayOptions = {}): RenderedInput {
  const { max, strHint } = resolve(options);
  const [elements, textual] = elementsOf(input.asBytes(), input.kind === "text", strHint);
  let focus = elements.findIndex((element) => element.end > span.start);
  if (focus === -1) focus = elements.length;
  const result = layout(elements, spanWindow(elements.length, max, focus), textual);
  return { line: result.line, underline: underline(result, span) };
}
