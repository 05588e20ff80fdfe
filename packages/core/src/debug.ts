/**
 * Debug logging, enabled by the `debug` config key (or CAUTION_DEBUG=1).
 */

import { config } from "./config.js";

export type DebugWriter = (line: string) => void;

const defaultWriter: DebugWriter = (line) => console.error(line);

let writer: DebugWriter = defaultWriter;

/** Route debug lines somewhere other than stderr; `undefined` restores the default. */
export function setDebugWriter(next: DebugWriter | undefined): void {
  writer = next ?? defaultWriter;
}

export function isDebugEnabled(): boolean {
  return config.getBoolean("debug", false);
}

export function debugLog(scope: string, message: string): void {
  if (isDebugEnabled()) {
    writer(`[caution:${scope}] ${message}`);
  }
}
