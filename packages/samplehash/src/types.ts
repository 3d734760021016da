/**
 * Public types for samplehash.
 * @module
 */

/** Input accepted by {@link SampleHasher.sum} and the streaming hasher. */
export type HashInput = string | Buffer | Uint8Array;

/** A contiguous byte range of an input, read as one sample window. */
export interface SampleRange {
  /** Byte offset of the first byte of the range. */
  readonly offset: number;
  /** Number of bytes in the range. */
  readonly length: number;
}
