/**
 * Patterns decouple "what to find" from "how to scan".
 *
 * Every implementation works on the raw byte view of an input and must only
 * return offsets on token boundaries: any byte offset for bytes, char
 * boundaries for text.
 */

import { decodeChar, decodeValid, encode, utf8ByteLength } from "./utf8.js";

export interface Pattern {
  /** Offset and byte length of the first match. */
  findMatch(bytes: Uint8Array): [index: number, length: number] | undefined;
  /** Offset of the first token the pattern rejects. */
  findReject(bytes: Uint8Array): number | undefined;
}

/** What a bytes input accepts as a pattern. */
export type BytesPattern = Pattern | number | Uint8Array | string | ((byte: number) => boolean);

/** What a text input accepts as a pattern. */
export type TextPattern = Pattern | string | RegExp | ((char: string) => boolean);

// ---------------------------------------------------------------------------
// Single byte
// ---------------------------------------------------------------------------

export class BytePattern implements Pattern {
  constructor(private readonly byte: number) {}

  findMatch(bytes: Uint8Array): [number, number] | undefined {
    const index = bytes.indexOf(this.byte);
    return index === -1 ? undefined : [index, 1];
  }

  findReject(bytes: Uint8Array): number | undefined {
    for (let i = 0; i < bytes.length; i++) {
      if (bytes[i] !== this.byte) return i;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

function matchesAt(bytes: Uint8Array, needle: Uint8Array, at: number): boolean {
  if (at + needle.length > bytes.length) return false;
  for (let j = 0; j < needle.length; j++) {
    if (bytes[at + j] !== needle[j]) return false;
  }
  return true;
}

/**
 * Byte or string literal. A UTF-8 lead byte never equals a continuation byte,
 * so a match found on raw bytes always starts on a char boundary.
 */
export class LiteralPattern implements Pattern {
  constructor(private readonly needle: Uint8Array) {}

  findMatch(bytes: Uint8Array): [number, number] | undefined {
    const first = this.needle[0];
    if (first === undefined) return [0, 0];
    let from = 0;
    for (;;) {
      const index = bytes.indexOf(first, from);
      if (index === -1) return undefined;
      if (matchesAt(bytes, this.needle, index)) return [index, this.needle.length];
      from = index + 1;
    }
  }

  findReject(bytes: Uint8Array): number | undefined {
    if (this.needle.length === 0) return 0;
    let i = 0;
    while (i < bytes.length) {
      if (!matchesAt(bytes, this.needle, i)) return i;
      i += this.needle.length;
    }
    return undefined;
  }
}

/** A literal, preferring the single-byte fast path. */
export function literal(needle: Uint8Array): Pattern {
  const only = needle[0];
  return needle.length === 1 && only !== undefined ? new BytePattern(only) : new LiteralPattern(needle);
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export class BytePredicate implements Pattern {
  constructor(private readonly predicate: (byte: number) => boolean) {}

  findMatch(bytes: Uint8Array): [number, number] | undefined {
    for (let i = 0; i < bytes.length; i++) {
      if (this.predicate(bytes[i] ?? 0)) return [i, 1];
    }
    return undefined;
  }

  findReject(bytes: Uint8Array): number | undefined {
    for (let i = 0; i < bytes.length; i++) {
      if (!this.predicate(bytes[i] ?? 0)) return i;
    }
    return undefined;
  }
}

/** Char predicate over bytes known to be valid UTF-8. */
export class CharPredicate implements Pattern {
  constructor(private readonly predicate: (char: string) => boolean) {}

  findMatch(bytes: Uint8Array): [number, number] | undefined {
    let i = 0;
    while (i < bytes.length) {
      const decoded = decodeChar(bytes, i);
      if (decoded.kind !== "char") return undefined;
      if (this.predicate(String.fromCodePoint(decoded.codePoint))) return [i, decoded.length];
      i += decoded.length;
    }
    return undefined;
  }

  findReject(bytes: Uint8Array): number | undefined {
    let i = 0;
    while (i < bytes.length) {
      const decoded = decodeChar(bytes, i);
      if (decoded.kind !== "char") return i;
      if (!this.predicate(String.fromCodePoint(decoded.codePoint))) return i;
      i += decoded.length;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Regular expressions (text only)
// ---------------------------------------------------------------------------

/** `index` falls between the two halves of a surrogate pair. */
function splitsPair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/** Flags with `u` added, unless the source only compiles without it. */
function unicodeFlags(regex: RegExp): string {
  const flags = regex.flags.replace(/[gy]/g, "");
  if (flags.includes("u") || flags.includes("v")) return flags;
  try {
    new RegExp(regex.source, `${flags}u`);
    return `${flags}u`;
  } catch (error) {
    if (error instanceof SyntaxError) return flags;
    throw error;
  }
}

/**
 * Matches are computed on the decoded text and mapped back to byte offsets.
 * A match that would start or end inside a surrogate pair is skipped.
 */
export class RegexPattern implements Pattern {
  private readonly global: RegExp;
  private readonly sticky: RegExp;

  constructor(regex: RegExp) {
    const flags = unicodeFlags(regex);
    this.global = new RegExp(regex.source, `${flags}g`);
    this.sticky = new RegExp(regex.source, `${flags}y`);
  }

  findMatch(bytes: Uint8Array): [number, number] | undefined {
    const text = decodeValid(bytes);
    this.global.lastIndex = 0;
    for (;;) {
      const match = this.global.exec(text);
      if (match === null) return undefined;
      const end = match.index + match[0].length;
      if (!splitsPair(text, match.index) && !splitsPair(text, end)) {
        return [utf8ByteLength(text.slice(0, match.index)), utf8ByteLength(match[0])];
      }
      this.global.lastIndex = match.index + 1;
    }
  }

  /** Repeatedly match anchored; the first position that does not match (or matches empty) rejects. */
  findReject(bytes: Uint8Array): number | undefined {
    const text = decodeValid(bytes);
    let index = 0;
    let byteIndex = 0;
    while (index < text.length) {
      this.sticky.lastIndex = index;
      const match = this.sticky.exec(text);
      if (match === null || match[0].length === 0 || splitsPair(text, index + match[0].length)) {
        return byteIndex;
      }
      index += match[0].length;
      byteIndex += utf8ByteLength(match[0]);
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export function bytesPattern(pattern: BytesPattern): Pattern {
  if (typeof pattern === "number") return new BytePattern(pattern);
  if (typeof pattern === "string") return literal(encode(pattern));
  if (typeof pattern === "function") return new BytePredicate(pattern);
  if (pattern instanceof Uint8Array) return literal(pattern);
  return pattern;
}

export function textPattern(pattern: TextPattern): Pattern {
  if (typeof pattern === "string") return literal(encode(pattern));
  if (typeof pattern === "function") return new CharPredicate(pattern);
  if (pattern instanceof RegExp) return new RegexPattern(pattern);
  return pattern;
}
