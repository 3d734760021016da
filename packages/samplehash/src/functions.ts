/**
 * Hex interchange form of digests.
 *
 * @module
 */

import { bufferAllocUnsafe } from "./helpers";

/** Byte (0–255) → two lowercase hex chars. */
const HEX_TABLE: readonly string[] = Array.from({ length: 256 }, (_, i) => (i < 16 ? "0" : "") + i.toString(16));

const HEX_DIGEST_RE = /^[0-9a-fA-F]{32}$/;

/**
 * Convert a single 16-byte hash to a 32-character lowercase hex string.
 *
 * @param hash   A `Uint8Array` or `Buffer` of at least `offset + 16` bytes.
 * @param offset Byte offset to start reading from (default `0`).
 */
export function hashToHex(hash: Uint8Array, offset = 0): string {
  if (!Number.isInteger(offset) || offset < 0 || offset + 16 > hash.length) {
    throw new RangeError("hashToHex: need 16 bytes at the given offset");
  }
  let out = "";
  for (let i = offset; i < offset + 16; i++) {
    out += HEX_TABLE[hash[i]];
  }
  return out;
}

/**
 * Split a buffer of concatenated 16-byte hashes into an array of hex strings.
 *
 * @param hashes A `Uint8Array` or `Buffer` whose length is a multiple of 16.
 */
export function hashesToHexArray(hashes: Uint8Array): string[] {
  if (hashes.length % 16 !== 0) {
    throw new RangeError(`hashesToHexArray: length ${hashes.length} is not a multiple of 16`);
  }
  const result = new Array<string>(hashes.length >>> 4);
  for (let i = 0; i < result.length; i++) {
    result[i] = hashToHex(hashes, i * 16);
  }
  return result;
}

/**
 * Parse a 32-character hex string (either case) back into a 16-byte Buffer.
 *
 * @throws {RangeError} If `hex` is not exactly 32 hex characters.
 */
export function hexToHash(hex: string): Buffer {
  if (!HEX_DIGEST_RE.test(hex)) {
    throw new RangeError("hexToHash: expected 32 hexadecimal characters");
  }
  const out = bufferAllocUnsafe(16);
  out.write(hex, 0, 16, "hex");
  return out;
}
