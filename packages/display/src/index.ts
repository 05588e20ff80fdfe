/**
 * @caution/display - Human-readable rendering of inputs and parse errors
 *
 * @example
 * ```typescript
 * import { Expected, input } from "@caution/core";
 * import { printError } from "@caution/display";
 *
 * const result = input("hell").readAll(Expected.Full, (r) => r.consume("hello"));
 * if (!result.ok) printError(result.error);
 * ```
 */

export {
  renderInput,
  renderInputSpan,
  renderBytes,
  type Section,
  type InputDisplayOptions,
  type RenderedInput,
} from "./input-display.js";
export { renderError, printError, type ErrorRenderOptions } from "./error-display.js";
