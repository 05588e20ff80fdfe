/**
 * Prefixes: exact leading values matched by `splitPrefix` and `consume`.
 */

import { encode } from "./utf8.js";

/** A byte, a byte literal, or a string matched as its UTF-8 bytes. */
export type BytesPrefix = number | Uint8Array | string;

/** A char or string literal. */
export type TextPrefix = string;

export function bytesPrefix(prefix: BytesPrefix): Uint8Array {
  if (typeof prefix === "number") return Uint8Array.of(prefix);
  if (typeof prefix === "string") return encode(prefix);
  return prefix;
}

export function textPrefix(prefix: TextPrefix): Uint8Array {
  return encode(prefix);
}

export function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > bytes.length) {
    return false;
  }
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) {
      return false;
    }
  }
  return true;
}
