/**
 * samplehash — fast sampled 128-bit fingerprints for buffers and large files.
 *
 * Small inputs are hashed in full; large ones are hashed from a start,
 * middle and end window, with the total length embedded in the digest.
 * Built on MurmurHash3 x64-128 with a fixed seed.
 *
 * @example
 * ```ts
 * import { hashToHex, SampleHasher } from "samplehash";
 *
 * const hasher = new SampleHasher();
 * console.log(hashToHex(hasher.sumFile("/data/archive.tar")));
 * ```
 *
 * @module
 */

export type { AsyncByteSource, ByteSource } from "./byte-source";
export {
  BufferByteSource,
  FileByteSource,
  FileHandleByteSource,
  withFileByteSource,
  withFileHandleByteSource,
} from "./byte-source";
export type { HasherConfig, HasherOptions } from "./config";
export { DEFAULT_SAMPLE_SIZE, DEFAULT_THRESHOLD, resolveHasherConfig } from "./config";
export type { ParsedDigest } from "./digest";
export { composeDigest, DIGEST_SIZE, parseDigest } from "./digest";
export type { IOErrorOptions } from "./errors";
export { ConfigurationError, IOError } from "./errors";
export { hashesToHexArray, hashToHex, hexToHash } from "./functions";
export { MurmurHash3x64 } from "./murmur3";
export { SampleHasher } from "./sample-hasher";
export { selectSamples } from "./sample-selector";
export type { HashInput, SampleRange } from "./types";
