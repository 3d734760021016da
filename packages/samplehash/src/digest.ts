/**
 * Digest composition. Splices the total input length into the raw
 * content hash.
 *
 * ### Layout (16 bytes)
 *
 * ```
 *   [0]        B: byte count of the input length (0–8)
 *   [1..1+B]   input length, little-endian, minimal (no zero high byte)
 *   [1+B..16]  the same positions of the 16-byte raw content hash
 * ```
 *
 * Digests of inputs with different lengths always differ in bytes `0..1+B`.
 *
 * @module
 */

import { ConfigurationError } from "./errors";
import { bufferAllocUnsafe } from "./helpers";

/** Size of a digest in bytes. */
export const DIGEST_SIZE = 16;

/** Maximum number of bytes used to encode the input length. */
const MAX_LENGTH_BYTES = 8;

const MAX_U64 = 0xffffffffffffffffn;

/** Result of {@link parseDigest}. */
export interface ParsedDigest {
  /** Byte count `B` of the embedded length. */
  lengthByteCount: number;
  /** Input length embedded in the digest. */
  inputLength: bigint;
}

function toLength(totalLength: number | bigint): bigint {
  if (typeof totalLength === "number") {
    if (!Number.isSafeInteger(totalLength) || totalLength < 0) {
      throw new ConfigurationError(`composeDigest: unsupported input length ${String(totalLength)}`);
    }
    return BigInt(totalLength);
  }
  if (totalLength < 0n || totalLength > MAX_U64) {
    throw new ConfigurationError(`composeDigest: input length ${totalLength} is outside [0, 2^64 - 1]`);
  }
  return totalLength;
}

/**
 * Build the final digest from a raw 16-byte content hash and the input length.
 *
 * @param rawHash     16-byte raw content hash.
 * @param totalLength Total input length in bytes.
 * @returns A new 16-byte Buffer.
 * @throws {ConfigurationError} If the length is negative or exceeds 2^64 - 1.
 */
export function composeDigest(rawHash: Uint8Array, totalLength: number | bigint): Buffer {
  if (rawHash.length !== DIGEST_SIZE) {
    throw new RangeError(`composeDigest: raw hash must be ${DIGEST_SIZE} bytes, got ${rawHash.length}`);
  }

  let remaining = toLength(totalLength);
  const out = bufferAllocUnsafe(DIGEST_SIZE);

  let b = 0;
  while (remaining > 0n) {
    out[1 + b] = Number(remaining & 0xffn);
    remaining >>= 8n;
    b++;
  }
  out[0] = b;
  out.set(rawHash.subarray(1 + b, DIGEST_SIZE), 1 + b);
  return out;
}

/**
 * Read the input length back out of a digest.
 *
 * @throws {RangeError} If `digest` is not a well-formed 16-byte digest.
 */
export function parseDigest(digest: Uint8Array): ParsedDigest {
  if (digest.length !== DIGEST_SIZE) {
    throw new RangeError(`parseDigest: digest must be ${DIGEST_SIZE} bytes, got ${digest.length}`);
  }
  const b = digest[0];
  if (b > MAX_LENGTH_BYTES) {
    throw new RangeError(`parseDigest: invalid length byte count ${b}`);
  }
  if (b > 0 && digest[b] === 0) {
    throw new RangeError("parseDigest: length encoding is not minimal");
  }
  let inputLength = 0n;
  for (let i = b; i >= 1; i--) {
    inputLength = (inputLength << 8n) | BigInt(digest[i]);
  }
  return { lengthByteCount: b, inputLength };
}
