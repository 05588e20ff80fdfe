import { describe, it, expect } from "vitest";
import { input } from "../entry.js";
import { Expected } from "../expected.js";
import { ok, unwrap, unwrapErr } from "../result.js";

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe("readNum", () => {
  it("decodes big-endian by default", () => {
    expect(unwrap(input(bytes(0x01, 0x02)).readAll(Expected.Root, (r) => r.readNum("u16")))).toBe(258);
  });

  it("decodes little-endian on request", () => {
    expect(unwrap(input(bytes(0x01, 0x02)).readAll(Expected.Root, (r) => r.readNum("u16", "le")))).toBe(513);
  });

  it("decodes signed and floating point kinds", () => {
    expect(unwrap(input(bytes(0xff)).readAll(Expected.Root, (r) => r.readNum("i8")))).toBe(-1);
    expect(unwrap(input(bytes(0x3f, 0xc0, 0x00, 0x00)).readAll(Expected.Root, (r) => r.readNum("f32")))).toBe(1.5);
  });

  it("decodes 64-bit integers as bigint", () => {
    const data = bytes(0, 0, 0, 0, 0, 0, 1, 0);
    expect(unwrap(input(data).readAll(Expected.Root, (r) => r.readNum("u64")))).toBe(256n);
    const minusOne = bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff);
    expect(unwrap(input(minusOne).readAll(Expected.Root, (r) => r.readNum("i64")))).toBe(-1n);
  });

  it("reads consecutive values from an unaligned view", () => {
    const data = bytes(0x99, 0x00, 0x2a, 0xff).subarray(1);
    const values = unwrap(
      input(data).readAll(Expected.Root, (r) => {
        const short = r.readNum("u16");
        if (!short.ok) return short;
        const signed = r.readNum("i8");
        if (!signed.ok) return signed;
        return ok([short.value, signed.value]);
      })
    );
    expect(values).toEqual([42, -1]);
  });

  it("reports a shortfall of the kind's width", () => {
    const error = unwrapErr(input(bytes(1, 2)).readAll(Expected.Root, (r) => r.readNum("u32")));
    expect(error.message).toBe("error attempting to read a number: found 2 bytes when at least 4 bytes was expected");
    expect(error.toRetryRequirement()?.continueAfter()).toBe(2);
  });
});

describe("byte readers", () => {
  it("reads and peeks single bytes", () => {
    const [values, rest] = unwrap(
      input(bytes(7, 8, 9)).readPartial(Expected.Root, (r) => {
        const peeked = unwrap(r.peekU8());
        const first = unwrap(r.readU8());
        return ok([peeked, first, r.peekU8Opt()]);
      })
    );
    expect(values).toEqual([7, 7, 8]);
    expect(Array.from(rest.asBytes())).toEqual([8, 9]);
  });

  it("copies taken arrays out of the source", () => {
    const data = bytes(1, 2, 3);
    const [array] = unwrap(input(data).readPartial(Expected.Root, (r) => r.takeArray(2)));
    array[0] = 9;
    expect(Array.from(array)).toEqual([9, 2]);
    expect(data[0]).toBe(1);
  });
});
