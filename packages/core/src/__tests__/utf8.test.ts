import { describe, it, expect } from "vitest";
import { input } from "../entry.js";
import { Expected } from "../expected.js";
import { ExpectedLength } from "../kinds.js";
import { unwrap, unwrapErr } from "../result.js";
import { decodeChar, encode, utf8ByteLength, utf8CharLength } from "../utf8.js";

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe("utf8CharLength", () => {
  it("reads the encoded length from the lead byte", () => {
    expect([0x41, 0xc3, 0xe6, 0xf0].map(utf8CharLength)).toEqual([1, 2, 3, 4]);
  });

  it("is zero for bytes that never lead", () => {
    expect([0x80, 0xbf, 0xc0, 0xc1, 0xf5, 0xff].map(utf8CharLength)).toEqual([0, 0, 0, 0, 0, 0]);
  });
});

describe("decodeChar", () => {
  it("decodes multi-byte code points", () => {
    expect(decodeChar(encode("日"), 0)).toEqual({ kind: "char", codePoint: 0x65e5, length: 3 });
  });

  it("rejects surrogates and overlong forms", () => {
    expect(decodeChar(bytes(0xed, 0xa0, 0x80), 0)).toEqual({ kind: "invalid", length: 1 });
    expect(decodeChar(bytes(0xe0, 0x80, 0x80), 0)).toEqual({ kind: "invalid", length: 1 });
  });

  it("tells truncation apart from corruption", () => {
    expect(decodeChar(bytes(0xe6, 0x97), 0)).toEqual({ kind: "incomplete", expected: 3, available: 2 });
  });

  it("counts bytes without encoding", () => {
    expect(utf8ByteLength("日本")).toBe(6);
  });
});

describe("intoText", () => {
  it("reports a truncated final char as a length shortfall", () => {
    const i = input(bytes(0x41, 0xc3, 0xa9, 0x20, 0xc2));
    const error = unwrapErr(i.intoText(Expected.Root));
    expect(error.kind).toBeInstanceOf(ExpectedLength);
    expect(error.description()).toBe("found 1 byte when at least 2 bytes was expected");
    expect(error.span().offsetWithin(i.span())).toBe(4);
    expect(error.span().length).toBe(1);
    expect(error.toRetryRequirement()?.continueAfter()).toBe(1);
  });

  it("reports an impossible sequence as invalid", () => {
    const i = input(bytes(0x61, 0xff, 0x62));
    const error = unwrapErr(i.intoText(Expected.Root));
    expect(error.description()).toBe("expected utf-8 code point");
    expect(error.span().offsetWithin(i.span())).toBe(1);
    expect(error.span().length).toBe(1);
    expect(error.isFatal()).toBe(true);
  });
});

describe("takeStrWhile", () => {
  it("stops where the predicate rejects", () => {
    const [text, rest] = unwrap(
      input(encode("ab cd")).readPartial(Expected.Root, (r) => r.takeStrWhile((c) => c !== " "))
    );
    expect(text.asString()).toBe("ab");
    expect(Array.from(rest.asBytes())).toEqual([0x20, 0x63, 0x64]);
  });

  it("fails on an invalid char", () => {
    const i = input(bytes(...encode("hello"), 0xc2, 0x20));
    const error = unwrapErr(i.readPartial(Expected.Root, (r) => r.takeStrWhile((c) => c !== " ")));
    expect(error.message).toBe(
      "error attempting to take UTF-8 input while a condition remains true: expected utf-8 code point"
    );
    expect(error.span().offsetWithin(i.span())).toBe(5);
    expect(error.isFatal()).toBe(true);
  });

  it("asks for the rest of a truncated char", () => {
    const i = input(bytes(0x61, 0x62, 0xe6));
    const error = unwrapErr(i.readPartial(Expected.Root, (r) => r.takeStrWhile(() => true)));
    expect(error.toRetryRequirement()?.continueAfter()).toBe(2);
    expect(error.span().offsetWithin(i.span())).toBe(2);
    expect(error.span().length).toBe(1);

    const bounded = unwrapErr(i.intoBound().readPartial(Expected.Root, (r) => r.takeStrWhile(() => true)));
    expect(bounded.toRetryRequirement()).toBeUndefined();
  });

  it("converts the remaining bytes", () => {
    const text = unwrap(input(bytes(0x68, 0x69)).readAll(Expected.Root, (r) => r.takeRemainingStr()));
    expect(text.asString()).toBe("hi");
  });
});
