import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CoreContext,
  Expected,
  Fatal,
  Invalid,
  RetryRequirement,
  RootBacktrace,
  Span,
  config,
  err,
  input,
  unwrapErr,
} from "@caution/core";
import type { ErrorDetails, External } from "@caution/core";
import { printError, renderError } from "../index.js";

function bytes(text: string): Uint8Array {
  return Uint8Array.from(text, (c) => c.charCodeAt(0));
}

function invalidUtf8(mode = Expected.Root): Expected {
  return unwrapErr(
    input(bytes("hello world\xC2 ")).readAll(mode, (r) => r.context("hi", (r) => r.takeStrWhile(() => true)))
  );
}

beforeEach(() => {
  config.reset();
});

afterEach(() => {
  vi.unstubAllEnvs();
  config.reset();
});

// ---------------------------------------------------------------------------
// Expected
// ---------------------------------------------------------------------------

describe("renderError", () => {
  it("underlines an invalid code point in byte input", () => {
    expect(renderError(invalidUtf8()).split("\n")).toEqual([
      "error attempting to take UTF-8 input while a condition remains true: expected utf-8 code point",
      "> [68 65 6c 6c 6f 20 77 6f 72 6c 64 c2 20]",
      " ".repeat(36) + "^^",
      "additional:",
      "  error offset: 11, input length: 13",
      "backtrace:",
      "  1. `take UTF-8 input while a condition remains true` (expected utf-8 code point)",
    ]);
  });

  it("lists every frame under a full backtrace", () => {
    const lines = renderError(invalidUtf8(Expected.Full)).split("\n");
    expect(lines.slice(-4)).toEqual([
      "backtrace:",
      "  1. `read all input`",
      "  2. `hi`",
      "  3. `take UTF-8 input while a condition remains true` (expected utf-8 code point)",
    ]);
  });

  it("underlines every byte of a short take", () => {
    const error = unwrapErr(input(bytes("hello world")).readAll(Expected.Root, (r) => r.take(13)));
    expect(renderError(error).split("\n")).toEqual([
      "error attempting to take a length of input: found 11 bytes when at least 13 bytes was expected",
      "> [68 65 6c 6c 6f 20 77 6f 72 6c 64]",
      "   ^^ ^^ ^^ ^^ ^^ ^^ ^^ ^^ ^^ ^^ ^^",
      "additional:",
      "  error offset: 0, input length: 11",
      "backtrace:",
      "  1. `take a length of input` (expected enough input)",
    ]);
  });

  it("shows the expected value above the input", () => {
    const error = unwrapErr(input("hello world").readAll(Expected.Root, (r) => r.consume("123")));
    expect(renderError(error).split("\n")).toEqual([
      "error attempting to consume input: found a different value to the exact expected",
      "expected:",
      '> "123"',
      "in:",
      '> "hello world"',
      "   ^^^",
      "additional:",
      "  error line: 1, error offset: 0, input length: 11",
      "backtrace:",
      "  1. `consume input` (expected exact value)",
    ]);
  });

  it("reports the line of a text error and escapes newlines", () => {
    const error = unwrapErr(
      input("ab\ncd").readAll(Expected.Root, (r) => {
        r.skipOpt(3);
        return r.consume("x");
      })
    );
    const lines = renderError(error).split("\n");
    expect(lines.slice(4, 8)).toEqual([
      '> "ab\\ncd"',
      "       ^",
      "additional:",
      "  error line: 2, error offset: 3, input length: 5",
    ]);
  });

  it("points past the last element for an empty span at the end", () => {
    const error = unwrapErr(
      input("ab").readAll(Expected.Root, (r) => {
        r.skipOpt(2);
        return r.take(1);
      })
    );
    expect(renderError(error).split("\n")).toEqual([
      "error attempting to take a length of input: found 0 bytes when at least 1 byte was expected",
      '> "ab"',
      "     ^",
      "additional:",
      "  error line: 1, error offset: 2, input length: 2",
      "backtrace:",
      "  1. `take a length of input` (expected enough input)",
    ]);
  });

  it("indents child frames of an external error", () => {
    const external: External = {
      pushBacktrace: (push) => {
        push({ operation: "parse digit" });
        push({ operation: "parse number" });
      },
    };
    const error = unwrapErr(
      input("abc").readAll(Expected.Full, (r) => r.tryExpectExternal("number", () => err(external)))
    );
    expect(renderError(error).split("\n")).toEqual([
      "error attempting to read and expect an external value: expected number",
      '> "abc"',
      "   ^^^",
      "additional:",
      "  error line: 1, error offset: 0, input length: 3",
      "backtrace:",
      "  1. `read all input`",
      "  2. `read and expect an external value` (expected number)",
      "    1. `parse number`",
      "    2. `parse digit`",
    ]);
  });

  it("notes a span that lies outside the error input", () => {
    const elsewhere = Span.of(bytes("xy"));
    const broken: ErrorDetails = {
      input: () => input("hello"),
      span: () => elsewhere,
      expected: () => undefined,
      description: () => "broken",
      backtrace: () => new RootBacktrace(new CoreContext("take", "enough input", elsewhere)),
    };
    expect(renderError(broken).split("\n")).toEqual([
      "error attempting to take a length of input: broken",
      "note: error span is not within the error input indicating the",
      "      concrete error being used has a bug. Consider raising an",
      "      issue with the maintainer!",
      "span:",
      '> "xy"',
      "input:",
      '> "hello"',
      "backtrace:",
      "  1. `take a length of input` (expected enough input)",
    ]);
  });

  it("wraps the output in a banner", () => {
    const lines = renderError(invalidUtf8(), { banner: true }).split("\n");
    expect(lines[0]).toBe("-- INPUT ERROR ---------------------------------------------");
    expect(lines[1]).toBe(
      "error attempting to take UTF-8 input while a condition remains true: expected utf-8 code point"
    );
    expect(lines[lines.length - 1]).toBe("-".repeat(60));
  });

  it("takes the banner default from config", () => {
    config.set({ display: { banner: true } });
    expect(renderError(invalidUtf8()).startsWith("-- INPUT ERROR ")).toBe(true);
  });

  it("renders the minimal errors as one line", () => {
    expect(renderError(new Invalid(RetryRequirement.create(2)))).toBe(
      "invalid input: needs 2 bytes more to continue processing"
    );
    expect(renderError(Fatal.instance)).toBe("invalid input");
  });
});

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

describe("colors", () => {
  it("styles the header when requested", () => {
    vi.stubEnv("NO_COLOR", "");
    vi.stubEnv("FORCE_COLOR", "1");
    const [header] = renderError(invalidUtf8(), { colors: true }).split("\n");
    expect(header).toBe(
      "\x1b[1m\x1b[31merror\x1b[0m attempting to take UTF-8 input while a condition remains true: " +
        "\x1b[1mexpected utf-8 code point\x1b[0m"
    );
  });

  it("stays plain under NO_COLOR", () => {
    vi.stubEnv("NO_COLOR", "1");
    const [header] = renderError(invalidUtf8(), { colors: true }).split("\n");
    expect(header).toBe(
      "error attempting to take UTF-8 input while a condition remains true: expected utf-8 code point"
    );
  });
});

// ---------------------------------------------------------------------------
// printError
// ---------------------------------------------------------------------------

describe("printError", () => {
  it("writes the rendered error through the writer", () => {
    const written: string[] = [];
    const error = invalidUtf8();
    printError(error, { writer: (text) => written.push(text) });
    expect(written).toEqual([renderError(error)]);
  });

  it("defaults to console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    printError(Fatal.instance);
    expect(spy).toHaveBeenCalledWith("invalid input");
    spy.mockRestore();
  });
});
