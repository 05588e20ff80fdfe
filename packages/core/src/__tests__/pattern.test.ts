import { describe, it, expect } from "vitest";
import { input } from "../entry.js";
import { Expected } from "../expected.js";
import {
  BytePattern,
  bytesPattern,
  CharPredicate,
  literal,
  LiteralPattern,
  RegexPattern,
} from "../pattern.js";
import { ok, unwrap } from "../result.js";
import { encode } from "../utf8.js";

describe("literal patterns", () => {
  it("uses the single-byte path for one-byte literals", () => {
    expect(literal(encode("a"))).toBeInstanceOf(BytePattern);
    expect(literal(encode("ab"))).toBeInstanceOf(LiteralPattern);
  });

  it("finds the first full match past partial ones", () => {
    expect(new LiteralPattern(encode("abd")).findMatch(encode("abcabd"))).toEqual([3, 3]);
    expect(new LiteralPattern(encode("abd")).findMatch(encode("abcab"))).toBeUndefined();
  });

  it("rejects where a repetition stops", () => {
    expect(new LiteralPattern(encode("ab")).findReject(encode("ababx"))).toBe(4);
    expect(new LiteralPattern(encode("ab")).findReject(encode("abab"))).toBeUndefined();
  });
});

describe("predicates", () => {
  it("matches bytes", () => {
    expect(bytesPattern((b) => b > 0x7f).findMatch(Uint8Array.of(1, 200))).toEqual([1, 1]);
  });

  it("reports byte offsets of chars", () => {
    expect(new CharPredicate((c) => c !== "x").findReject(encode("日本x"))).toBe(6);
    expect(new CharPredicate((c) => c === "本").findMatch(encode("日本x"))).toEqual([3, 3]);
  });
});

describe("RegexPattern", () => {
  it("maps matches to byte offsets", () => {
    expect(new RegexPattern(/[0-9]+/).findMatch(encode("héllo 42"))).toEqual([7, 2]);
  });

  it("rejects at the first position that does not match", () => {
    expect(new RegexPattern(/[a-z]/).findReject(encode("abc1"))).toBe(3);
    expect(new RegexPattern(/[a-z]/).findReject(encode("abc"))).toBeUndefined();
  });

  it("matches whole astral chars", () => {
    expect(new RegexPattern(/./).findMatch(encode("😀a"))).toEqual([0, 4]);
    expect(new RegexPattern(/\uDE00/).findMatch(encode("😀"))).toBeUndefined();
    expect(new RegexPattern(/[^a]/).findReject(encode("😀😀a"))).toBe(8);
  });

  it("skips half-pair matches of sources that only compile without the u flag", () => {
    expect(new RegexPattern(/\-/).findMatch(encode("a-b"))).toEqual([1, 1]);
    expect(new RegexPattern(/\uDE00|\-/).findMatch(encode("😀-"))).toEqual([4, 1]);
  });

  it("counts a leading byte order mark in offsets", () => {
    expect(new RegexPattern(/b/).findMatch(encode("\uFEFFab"))).toEqual([4, 1]);
  });

  it("drives text readers", () => {
    const [year, rest] = unwrap(input("2024-10-19").readPartial(Expected.Root, (r) => ok(r.takeWhile(/\d/))));
    expect(year.asString()).toBe("2024");
    expect(rest.asString()).toBe("-10-19");
  });
});
