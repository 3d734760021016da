/**
 * Internal helpers shared across the samplehash implementation.
 *
 * NOT part of the public API.
 *
 * @module
 * @internal
 */

import type { HashInput } from "./types";

// ── Cached Buffer methods (avoid repeated property lookups) ──────────────

export const { from: bufferFrom, alloc: bufferAlloc, allocUnsafe: bufferAllocUnsafe, isBuffer } = Buffer;

// ── Data conversion ──────────────────────────────────────────────────────

/** Convert {@link HashInput} to a Buffer without unnecessary copies. */
export function toBuffer(input: HashInput): Buffer {
  if (typeof input === "string") {
    return bufferFrom(input, "utf-8");
  }
  if (isBuffer(input)) {
    return input;
  }
  return bufferFrom(input.buffer, input.byteOffset, input.byteLength);
}

/** `true` when `value` is an integer in `[0, Number.MAX_SAFE_INTEGER]`. */
export function isNonNegativeSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** `true` when `value` is an integer in `[1, Number.MAX_SAFE_INTEGER]`. */
export function isPositiveSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
