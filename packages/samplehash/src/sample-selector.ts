/**
 * Sample window placement.
 *
 * Inputs up to the threshold are covered by a single range. Longer inputs
 * get up to three windows (start, middle, end) merged wherever they
 * touch or overlap, so the result is always ascending and disjoint.
 *
 * @module
 */

import { ConfigurationError } from "./errors";
import { isNonNegativeSafeInteger, isPositiveSafeInteger } from "./helpers";
import type { SampleRange } from "./types";

/**
 * Compute the ranges to read for an input of `totalLength` bytes.
 *
 * @param totalLength Input length in bytes.
 * @param sampleSize  Bytes per sample window.
 * @param threshold   Maximum length that is read in full.
 * @throws {ConfigurationError} If `totalLength` is not a non-negative safe integer,
 *   or `sampleSize` or `threshold` is not a positive one.
 */
export function selectSamples(totalLength: number, sampleSize: number, threshold: number): SampleRange[] {
  if (!isNonNegativeSafeInteger(totalLength)) {
    throw new ConfigurationError(`selectSamples: unsupported input length ${String(totalLength)}`);
  }
  if (!isPositiveSafeInteger(sampleSize)) {
    throw new ConfigurationError(`selectSamples: sampleSize must be a positive integer, got ${String(sampleSize)}`);
  }
  if (!isPositiveSafeInteger(threshold)) {
    throw new ConfigurationError(`selectSamples: threshold must be a positive integer, got ${String(threshold)}`);
  }

  if (totalLength <= threshold || sampleSize >= totalLength) {
    return [{ offset: 0, length: totalLength }];
  }

  const lastStart = totalLength - sampleSize;
  const middleStart = Math.min(Math.max(Math.floor(totalLength / 2) - Math.floor(sampleSize / 2), 0), lastStart);

  // Window starts are already ascending: 0 <= middleStart <= lastStart.
  const starts = [0, middleStart, lastStart];
  const ranges: { offset: number; end: number }[] = [];
  for (const start of starts) {
    const end = start + sampleSize;
    const prev = ranges.length > 0 ? ranges[ranges.length - 1] : undefined;
    if (prev !== undefined && start <= prev.end) {
      prev.end = Math.max(prev.end, end);
    } else {
      ranges.push({ offset: start, end });
    }
  }

  return ranges.map(({ offset, end }) => ({ offset, length: end - offset }));
}
