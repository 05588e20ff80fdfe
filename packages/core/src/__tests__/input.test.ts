import { describe, it, expect } from "vitest";
import { input } from "../entry.js";
import { Expected } from "../expected.js";
import type { Pattern } from "../pattern.js";
import { ok, unwrap, unwrapErr } from "../result.js";

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

// ---------------------------------------------------------------------------
// Construction and inspection
// ---------------------------------------------------------------------------

describe("input()", () => {
  it("views byte arrays in place as start-bounded bytes", () => {
    const data = bytes(1, 2, 3);
    const i = input(data);
    expect(i.kind).toBe("bytes");
    expect(i.bound).toBe("start-bounded");
    expect(i.asBytes().buffer).toBe(data.buffer);
    expect(i.length).toBe(3);
  });

  it("encodes strings as start-bounded text", () => {
    const i = input("añb");
    expect(i.kind).toBe("text");
    expect(i.bound).toBe("start-bounded");
    expect(i.byteLength).toBe(4);
    expect(i.length).toBe(3);
  });
});

describe("token lookups", () => {
  it("walks code points on text", () => {
    const i = input("añb");
    expect(i.first()).toBe("a");
    expect(i.nth(1)).toBe("ñ");
    expect(i.last()).toBe("b");
    expect(i.nth(3)).toBeUndefined();
  });

  it("walks bytes on bytes", () => {
    const i = input(bytes(7, 8, 9));
    expect(i.first()).toBe(7);
    expect(i.last()).toBe(9);
    expect(Array.from(i.tokens())).toEqual([7, 8, 9]);
  });

  it("returns undefined on empty input", () => {
    expect(input("").first()).toBeUndefined();
    expect(input("").last()).toBeUndefined();
  });

  it("renders bytes as hex", () => {
    expect(input(bytes(0x68, 0x0a)).toString()).toBe("[68 0a]");
  });
});

// ---------------------------------------------------------------------------
// Splitting
// ---------------------------------------------------------------------------

describe("splitAt", () => {
  it("round-trips at every index", () => {
    const i = input(bytes(1, 2, 3, 4, 5, 6));
    for (let mid = 0; mid <= 6; mid++) {
      const parts = i.splitAtOpt(mid);
      expect(parts).toBeDefined();
      if (parts === undefined) continue;
      const [head, tail] = parts;
      expect([...head.asBytes(), ...tail.asBytes()]).toEqual([1, 2, 3, 4, 5, 6]);
      expect(head.byteLength).toBe(mid);
      expect(head.bound).toBe("fully-bounded");
      expect(tail.bound).toBe("start-bounded");
      expect(head.span().end).toBe(tail.span().start);
    }
  });

  it("splits text by chars", () => {
    const [head, tail] = unwrap(input("héllo").splitAt(2, Expected.Root));
    expect(head.asString()).toBe("hé");
    expect(head.byteLength).toBe(3);
    expect(tail.asString()).toBe("llo");
  });

  it("reports a length shortfall over the whole input", () => {
    const i = input(bytes(1, 2, 3));
    const error = unwrapErr(i.splitAt(5, Expected.Root));
    expect(error.message).toBe("error attempting to split input: found 3 bytes when at least 5 bytes was expected");
    expect(error.span().equals(i.span())).toBe(true);
    expect(error.toRetryRequirement()?.continueAfter()).toBe(2);
  });

  it("rejects a negative or fractional length without asking for more input", () => {
    for (const mid of [-1, 1.5]) {
      const error = unwrapErr(input("abc").splitAt(mid, Expected.Root));
      expect(error.description()).toBe("expected valid length");
      expect(error.isFatal()).toBe(true);
      expect(error.toRetryRequirement()).toBeUndefined();
    }
  });

  it("rejects a byte split inside a char", () => {
    const error = unwrapErr(input("é").splitAtByte(1, Expected.Root));
    expect(error.description()).toBe("expected char index");
    expect(error.isFatal()).toBe(true);
  });
});

describe("splitWhile", () => {
  it("stops at the first rejected token", () => {
    const [head, tail] = input("aab").splitWhile("a");
    expect(head.asString()).toBe("aa");
    expect(tail.asString()).toBe("b");
  });

  it("opens the tail when the scan exhausts the input", () => {
    const [head, tail] = input("aaa").splitWhile("a");
    expect(head.asString()).toBe("aaa");
    expect(head.bound).toBe("start-bounded");
    expect(tail.isEmpty()).toBe(true);
    expect(tail.bound).toBe("unbounded");
  });

  it("keeps a fully-bounded end bound", () => {
    const [, tail] = input("aaa").intoBound().splitWhile("a");
    expect(tail.bound).toBe("fully-bounded");
  });
});

describe("splitUntil", () => {
  it("splits before the match", () => {
    const [head, tail] = unwrap(input("key=value").splitUntil("=", Expected.Root));
    expect(head.asString()).toBe("key");
    expect(tail.asString()).toBe("=value");
  });

  it("drops the match when consuming", () => {
    const parts = input("key=value").splitUntilConsumeOpt("=");
    expect(parts?.map((part) => part.asString())).toEqual(["key", "value"]);
  });

  it("waits for more input when nothing matches", () => {
    const error = unwrapErr(input("key").splitUntil("=", Expected.Root));
    expect(error.description()).toBe("expected pattern match");
    expect(error.toRetryRequirement()?.continueAfter()).toBe(1);
    expect(unwrapErr(input("key").intoBound().splitUntil("=", Expected.Root)).isFatal()).toBe(true);
  });

  it("keeps a leading byte order mark in the head of a regex split", () => {
    const [head, tail] = unwrap(input("\uFEFFab").splitUntil(/b/, Expected.Root));
    expect(Array.from(head.asBytes())).toEqual([0xef, 0xbb, 0xbf, 0x61]);
    expect(tail.asString()).toBe("b");
  });

  it("never splits a four-byte char on half of a surrogate pair", () => {
    expect(input("😀").splitUntilOpt(/\uDE00/)).toBeUndefined();
    expect(input("😀").splitUntilConsumeOpt(/\uDE00/)).toBeUndefined();
  });

  it("ignores custom matches that fall outside the input", () => {
    const overlong: Pattern = {
      findMatch: () => [2, 10],
      findReject: () => undefined,
    };
    expect(input("abc").splitUntilConsumeOpt(overlong)).toBeUndefined();
    expect(input("é").splitUntilOpt({ findMatch: () => [1, 0], findReject: () => undefined })).toBeUndefined();
  });

  it("leaves the reader untouched when an astral char cannot be consumed", () => {
    const [[taken, remaining]] = unwrap(
      input("😀").readPartial(Expected.Root, (r) => {
        const taken = r.takeUntilConsumeOpt(/\uDE00/);
        return ok([taken, r.remainingBytes()] as const);
      })
    );
    expect(taken).toBeUndefined();
    expect(remaining).toBe(4);
  });
});

describe("splitPrefix", () => {
  it("advances past an exact match", () => {
    const [head, tail] = unwrap(input("hello world").splitPrefix("hello", Expected.Root));
    expect(head.asString()).toBe("hello");
    expect(tail.asString()).toBe(" world");
  });

  it("is fatal on a definite mismatch", () => {
    const error = unwrapErr(input("world").splitPrefix("hello", Expected.Root));
    expect(error.isFatal()).toBe(true);
    expect(error.description()).toBe("found a different value to the exact expected");
    expect(error.expected()?.toString()).toBe("hello");
  });

  it("accepts byte, literal and string prefixes on bytes", () => {
    const i = input(bytes(0x47, 0x45, 0x54));
    expect(i.hasPrefix(0x47)).toBe(true);
    expect(i.hasPrefix(bytes(0x47, 0x45))).toBe(true);
    expect(i.hasPrefix("GET")).toBe(true);
    expect(i.hasPrefix("PUT")).toBe(false);
  });
});

describe("conversions", () => {
  it("rejects empty input as non-empty", () => {
    const error = unwrapErr(input("").intoNonEmpty(Expected.Root));
    expect(error.description()).toBe("found 0 bytes when at least 1 byte was expected");
  });

  it("forces a bound", () => {
    expect(input("x").intoBound().isBound()).toBe(true);
  });

  it("compares content", () => {
    const [a, b] = unwrap(input("abab").splitAt(2, Expected.Root));
    expect(a.equals(b)).toBe(true);
    expect(a.equals(input("ab"))).toBe(true);
    expect(a.equals(input("abc"))).toBe(false);
  });

  it("keeps a leading byte order mark when decoding text", () => {
    expect(input("\uFEFFab").asString()).toBe("\uFEFFab");
  });

  it("converts between bytes and text", () => {
    const text = unwrap(input(bytes(0x68, 0x69)).intoText(Expected.Root));
    expect(text.asString()).toBe("hi");
    expect(Array.from(text.intoBytes().asBytes())).toEqual([0x68, 0x69]);
  });
});
