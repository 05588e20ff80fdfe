/**
 * The trust boundary: untrusted data enters only through `input()`.
 */

import { Bytes } from "./bytes.js";
import { Text } from "./text.js";
import { encode } from "./utf8.js";

/**
 * Wrap untrusted data. Byte arrays are viewed in place; strings are encoded
 * to UTF-8 once. Both are start-bounded: more input may follow.
 */
export function input(data: Uint8Array): Bytes;
export function input(data: string): Text;
export function input(data: Uint8Array | string): Bytes | Text;
export function input(data: Uint8Array | string): Bytes | Text {
  if (typeof data === "string") {
    const bytes = encode(data);
    return new Text(bytes, 0, bytes.length, "start-bounded");
  }
  return new Bytes(data, 0, data.length, "start-bounded");
}
