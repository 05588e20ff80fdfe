/**
 * Fixed-width numeric decoding over `DataView`.
 */

export type Endian = "le" | "be";

/** 64-bit integers decode to `bigint`. */
export type BigNumericKind = "u64" | "i64";

export type SmallNumericKind = "u8" | "i8" | "u16" | "i16" | "u32" | "i32" | "f32" | "f64";

export type NumericKind = SmallNumericKind | BigNumericKind;

/** Encoded width in bytes. */
export const NUMERIC_WIDTH: Readonly<Record<NumericKind, number>> = {
  u8: 1,
  i8: 1,
  u16: 2,
  i16: 2,
  u32: 4,
  i32: 4,
  u64: 8,
  i64: 8,
  f32: 4,
  f64: 8,
};

export function isBigKind(kind: NumericKind): kind is BigNumericKind {
  return kind === "u64" || kind === "i64";
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Decode `bytes`, which must hold at least the kind's width. */
export function decodeNumber(bytes: Uint8Array, kind: SmallNumericKind, endian: Endian): number {
  const view = viewOf(bytes);
  const little = endian === "le";
  switch (kind) {
    case "u8":
      return view.getUint8(0);
    case "i8":
      return view.getInt8(0);
    case "u16":
      return view.getUint16(0, little);
    case "i16":
      return view.getInt16(0, little);
    case "u32":
      return view.getUint32(0, little);
    case "i32":
      return view.getInt32(0, little);
    case "f32":
      return view.getFloat32(0, little);
    case "f64":
      return view.getFloat64(0, little);
  }
}

export function decodeBigInt(bytes: Uint8Array, kind: BigNumericKind, endian: Endian): bigint {
  const view = viewOf(bytes);
  const little = endian === "le";
  return kind === "u64" ? view.getBigUint64(0, little) : view.getBigInt64(0, little);
}
