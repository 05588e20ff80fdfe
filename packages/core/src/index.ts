/**
 * @caution/core
 *
 * Panic-free, zero-copy parsing over untrusted bytes and text.
 */

// Entry
export { input } from "./entry.js";

// Inputs
export { Input, type AnyInput, type TokenOf, type PatternOf, type PrefixOf } from "./input.js";
export { Bytes } from "./bytes.js";
export { Text } from "./text.js";
export { type Bound, closeEnd, openEnd, forEnd } from "./bound.js";
export { Span, type SpanRange } from "./span.js";

// Patterns
export {
  type Pattern,
  type BytesPattern,
  type TextPattern,
  BytePattern,
  LiteralPattern,
  BytePredicate,
  CharPredicate,
  RegexPattern,
  literal,
  bytesPattern,
  textPattern,
} from "./pattern.js";
export { type BytesPrefix, type TextPrefix, bytesPrefix, textPrefix } from "./prefix.js";

// Reader
export { Reader, InfallibleReader, type ParseFn } from "./reader.js";
export {
  type NumericKind,
  type BigNumericKind,
  type SmallNumericKind,
  type Endian,
  NUMERIC_WIDTH,
  decodeNumber,
  decodeBigInt,
} from "./num.js";

// Errors
export { type ErrorMode, type ErrorDetails, type External, withContext } from "./error.js";
export {
  type Length,
  type ExpectedKind,
  atLeast,
  exactly,
  describeLength,
  ExpectedValue,
  ExpectedLength,
  ExpectedValid,
} from "./kinds.js";
export { Expected } from "./expected.js";
export { Invalid } from "./invalid.js";
export { Fatal } from "./fatal.js";
export { RetryRequirement, type ToRetryRequirement, hasRetryRequirement, byteCount } from "./retry.js";
export {
  type Context,
  type ContextLike,
  type CoreOperation,
  CORE_OPERATIONS,
  CoreContext,
  toContext,
  childContext,
  operationContext,
} from "./context.js";
export {
  type Backtrace,
  type BacktraceBuilder,
  type BacktraceStrategy,
  type BacktraceWalker,
  RootBacktrace,
  FullBacktrace,
} from "./backtrace.js";
export {
  type Result,
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  unwrap,
  unwrapErr,
  UnwrapError,
  InvariantError,
} from "./result.js";

// UTF-8
export {
  utf8CharLength,
  isContinuationByte,
  utf8ByteLength,
  decodeChar,
  validateUtf8,
  type DecodedChar,
  type Utf8Error,
} from "./utf8.js";

// Configuration & logging
export { config, envKeyToPath, type CautionConfig, type DisplayConfig, type ResetOptions } from "./config.js";
export { debugLog, setDebugWriter, isDebugEnabled, type DebugWriter } from "./debug.js";
