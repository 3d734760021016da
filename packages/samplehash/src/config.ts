/**
 * Hasher configuration: defaults, validation and the frozen config value
 * shared by every call on a {@link SampleHasher}.
 *
 * @module
 */

import { ConfigurationError } from "./errors";
import { isPositiveSafeInteger } from "./helpers";

/** Default size of each sample window (16 KiB). */
export const DEFAULT_SAMPLE_SIZE = 16 * 1024;

/** Default maximum input length that is hashed in full (128 KiB). */
export const DEFAULT_THRESHOLD = 128 * 1024;

/** Options for the {@link SampleHasher} constructor. */
export interface HasherOptions {
  /** Bytes per sample window. Default: {@link DEFAULT_SAMPLE_SIZE}. */
  sampleSize?: number | undefined;

  /**
   * Inputs of at most this many bytes are hashed in full; longer ones are
   * sampled. Default: {@link DEFAULT_THRESHOLD}.
   */
  threshold?: number | undefined;
}

/** Resolved, immutable hasher configuration. */
export interface HasherConfig {
  readonly sampleSize: number;
  readonly threshold: number;
}

function positiveInteger(name: string, value: number): number {
  if (!isPositiveSafeInteger(value)) {
    throw new ConfigurationError(`SampleHasher: ${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

/**
 * Validate options and fill in defaults.
 *
 * @throws {ConfigurationError} If `sampleSize` or `threshold` is not a positive integer.
 */
export function resolveHasherConfig(options?: HasherOptions): HasherConfig {
  return Object.freeze({
    sampleSize: positiveInteger("sampleSize", options?.sampleSize ?? DEFAULT_SAMPLE_SIZE),
    threshold: positiveInteger("threshold", options?.threshold ?? DEFAULT_THRESHOLD),
  });
}
