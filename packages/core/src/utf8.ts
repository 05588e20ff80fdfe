/**
 * UTF-8 helpers over raw bytes (RFC 3629).
 *
 * Decoding here never allocates; it reports where and how a sequence went
 * wrong so callers can tell broken input from input that was cut short.
 */

// ---------------------------------------------------------------------------
// Char length table
// ---------------------------------------------------------------------------

/**
 * Encoded length announced by a lead byte, or 0 when the byte can never start
 * a code point (continuation bytes, 0xC0, 0xC1 and 0xF5..0xFF).
 */
export function utf8CharLength(byte: number): number {
  if (byte < 0x80) return 1;
  if (byte < 0xc2) return 0;
  if (byte < 0xe0) return 2;
  if (byte < 0xf0) return 3;
  if (byte < 0xf5) return 4;
  return 0;
}

export function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/** Number of bytes `codePoint` takes when encoded. */
export function encodedLength(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/** UTF-8 byte length of a JS string without encoding it. */
export function utf8ByteLength(text: string): number {
  let len = 0;
  for (const c of text) {
    len += encodedLength(c.codePointAt(0) ?? 0);
  }
  return len;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export type DecodedChar =
  | { kind: "char"; codePoint: number; length: number }
  /** `length` bytes starting at the offset can never be valid. */
  | { kind: "invalid"; length: number }
  /** Valid so far but cut short: `expected` bytes were announced, `available` remain. */
  | { kind: "incomplete"; expected: number; available: number };

/** Range the second byte of a sequence must fall in, given its lead byte. */
function secondByteRange(lead: number): [number, number] {
  switch (lead) {
    case 0xe0:
      return [0xa0, 0xbf];
    case 0xed:
      return [0x80, 0x9f];
    case 0xf0:
      return [0x90, 0xbf];
    case 0xf4:
      return [0x80, 0x8f];
    default:
      return [0x80, 0xbf];
  }
}

/** Decode the code point starting at `offset` of `bytes`. */
export function decodeChar(bytes: Uint8Array, offset: number): DecodedChar {
  const lead = bytes[offset];
  if (lead === undefined) {
    return { kind: "incomplete", expected: 1, available: 0 };
  }
  const expected = utf8CharLength(lead);
  if (expected === 0) {
    return { kind: "invalid", length: 1 };
  }
  if (expected === 1) {
    return { kind: "char", codePoint: lead, length: 1 };
  }
  let codePoint = lead & (0xff >> (expected + 1));
  for (let i = 1; i < expected; i++) {
    const byte = bytes[offset + i];
    if (byte === undefined) {
      return { kind: "incomplete", expected, available: i };
    }
    const [lo, hi] = i === 1 ? secondByteRange(lead) : [0x80, 0xbf];
    if (byte < lo || byte > hi) {
      return { kind: "invalid", length: i };
    }
    codePoint = (codePoint << 6) | (byte & 0x3f);
  }
  return { kind: "char", codePoint, length: expected };
}

/** Start offset of the last code point in `bytes[0, end)`, assuming valid UTF-8. */
export function lastCharStart(bytes: Uint8Array, end: number): number {
  let i = end - 1;
  while (i > 0 && isContinuationByte(bytes[i] ?? 0)) {
    i--;
  }
  return Math.max(i, 0);
}

export type Utf8Error =
  /** `validUpTo` bytes are valid, then `length` bytes that can never be. */
  | { kind: "invalid"; validUpTo: number; length: number }
  /** `validUpTo` bytes are valid, then a sequence announcing `expected` bytes was cut short. */
  | { kind: "incomplete"; validUpTo: number; expected: number; available: number };

/** Validate `bytes[start, end)`; `undefined` when it is all valid UTF-8. */
export function validateUtf8(bytes: Uint8Array, start = 0, end = bytes.length): Utf8Error | undefined {
  const view = bytes.subarray(start, end);
  let i = 0;
  while (i < view.length) {
    const decoded = decodeChar(view, i);
    switch (decoded.kind) {
      case "char":
        i += decoded.length;
        break;
      case "invalid":
        return { kind: "invalid", validUpTo: i, length: decoded.length };
      case "incomplete":
        return {
          kind: "incomplete",
          validUpTo: i,
          expected: decoded.expected,
          available: decoded.available,
        };
    }
  }
  return undefined;
}

const decoder = new TextDecoder("utf-8", { ignoreBOM: true });
const encoder = new TextEncoder();

/** Decode bytes already known to be valid UTF-8. */
export function decodeValid(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}
