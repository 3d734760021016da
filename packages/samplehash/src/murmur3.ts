/**
 * MurmurHash3x64 — streaming MurmurHash3 x64 128-bit hasher.
 *
 * The seed is fixed at `0`, so digests are reproducible across processes
 * and releases. Input is consumed in 16-byte blocks; a partial block is kept
 * between {@link MurmurHash3x64.update} calls, so feeding several chunks
 * yields the same digest as feeding their concatenation.
 *
 * The 16-byte digest is `h1` big-endian followed by `h2` big-endian, the
 * canonical hex form of the algorithm.
 *
 * @module
 */

import { bufferAllocUnsafe, toBuffer } from "./helpers";
import type { HashInput } from "./types";

// ── Constants ────────────────────────────────────────────────────────────
//
// 64-bit values are carried as unsigned 32-bit halves, high then low.

const C1_HI = 0x87c37b91;
const C1_LO = 0x114253d5;
const C2_HI = 0x4cf5ad43;
const C2_LO = 0x2745937f;

const FMIX1_HI = 0xff51afd7;
const FMIX1_LO = 0xed558ccd;
const FMIX2_HI = 0xc4ceb9fe;
const FMIX2_LO = 0x1a85ec53;

/** Block size in bytes. */
const BLOCK = 16;

// ── 64-bit mixing primitives ─────────────────────────────────────────────

// Result registers written by the primitives below.
let rHi = 0;
let rLo = 0;

/** High 32 bits of the unsigned product `a * b`. */
function mulHigh32(a: number, b: number): number {
  const a0 = a & 0xffff;
  const a1 = a >>> 16;
  const b0 = b & 0xffff;
  const b1 = b >>> 16;
  const p01 = a0 * b1;
  const p10 = a1 * b0;
  const mid = ((a0 * b0) >>> 16) + (p01 & 0xffff) + (p10 & 0xffff);
  return (a1 * b1 + (p01 >>> 16) + (p10 >>> 16) + (mid >>> 16)) >>> 0;
}

function mul64(aHi: number, aLo: number, bHi: number, bLo: number): void {
  const lo = Math.imul(aLo, bLo) >>> 0;
  rHi = (mulHigh32(aLo, bLo) + Math.imul(aHi, bLo) + Math.imul(aLo, bHi)) >>> 0;
  rLo = lo;
}

function add64(aHi: number, aLo: number, bHi: number, bLo: number): void {
  const lo = aLo + bLo;
  rHi = (aHi + bHi + (lo > 0xffffffff ? 1 : 0)) >>> 0;
  rLo = lo >>> 0;
}

/** Rotate left by `r`, which must not be 0 or 32. */
function rotl64(hi: number, lo: number, r: number): void {
  if (r > 32) {
    const t = hi;
    hi = lo;
    lo = t;
    r -= 32;
  }
  rHi = ((hi << r) | (lo >>> (32 - r))) >>> 0;
  rLo = ((lo << r) | (hi >>> (32 - r))) >>> 0;
}

function fmix64(hi: number, lo: number): void {
  lo = (lo ^ (hi >>> 1)) >>> 0;
  mul64(hi, lo, FMIX1_HI, FMIX1_LO);
  hi = rHi;
  lo = (rLo ^ (hi >>> 1)) >>> 0;
  mul64(hi, lo, FMIX2_HI, FMIX2_LO);
  rLo = (rLo ^ (rHi >>> 1)) >>> 0;
}

function mixK1(hi: number, lo: number): void {
  mul64(hi, lo, C1_HI, C1_LO);
  rotl64(rHi, rLo, 31);
  mul64(rHi, rLo, C2_HI, C2_LO);
}

function mixK2(hi: number, lo: number): void {
  mul64(hi, lo, C2_HI, C2_LO);
  rotl64(rHi, rLo, 33);
  mul64(rHi, rLo, C1_HI, C1_LO);
}

/** Little-endian lane from `bytes[start..end)` (at most 8 bytes). */
function readLaneLE(bytes: Uint8Array, start: number, end: number): void {
  let hi = 0;
  let lo = 0;
  for (let i = start; i < end; i++) {
    const shift = (i - start) * 8;
    if (shift < 32) {
      lo |= bytes[i] << shift;
    } else {
      hi |= bytes[i] << (shift - 32);
    }
  }
  rHi = hi >>> 0;
  rLo = lo >>> 0;
}

// ── MurmurHash3x64 class ─────────────────────────────────────────────────

/**
 * Streaming MurmurHash3 x64 128-bit hasher with a fixed seed.
 *
 * @example
 * ```ts
 * const h = new MurmurHash3x64();
 * h.update("hel");
 * h.update("lo");
 * hashToHex(h.digest()); // "cbd8a7b341bd9b025b1e906a48ae1d19"
 * ```
 */
export class MurmurHash3x64 {
  // Seed is 0.
  private _h1Hi = 0;
  private _h1Lo = 0;
  private _h2Hi = 0;
  private _h2Lo = 0;

  /** Total number of bytes fed since construction or the last reset. */
  private _totalLength = 0;

  /** Pending bytes of an incomplete block. */
  private readonly _pending = new Uint8Array(BLOCK);
  private readonly _pendingView = new DataView(this._pending.buffer);
  private _pendingLength = 0;

  /** One-shot hash of `input`. Returns the 16-byte digest. */
  public static hash(input: HashInput): Buffer {
    const h = new MurmurHash3x64();
    h.update(input);
    return h.digest();
  }

  /** Number of bytes fed so far. */
  public get totalLength(): number {
    return this._totalLength;
  }

  /** Reset the hasher state. */
  public reset(): void {
    this._h1Hi = 0;
    this._h1Lo = 0;
    this._h2Hi = 0;
    this._h2Lo = 0;
    this._totalLength = 0;
    this._pendingLength = 0;
  }

  /**
   * Feed data into the hasher.
   *
   * @param input       Data to feed (string, Buffer, or Uint8Array).
   * @param inputOffset Byte offset into the buffer.
   * @param inputLength Byte length to hash.
   */
  public update(input: HashInput, inputOffset?: number | undefined, inputLength?: number | undefined): void {
    const buf = toBuffer(input);
    const offset = inputOffset ?? 0;
    const length = inputLength ?? buf.length - offset;
    if (offset < 0 || length < 0 || offset + length > buf.length) {
      throw new RangeError("update: offset + length exceeds buffer size");
    }

    let pos = offset;
    const end = offset + length;
    this._totalLength += length;

    if (this._pendingLength > 0) {
      const take = Math.min(BLOCK - this._pendingLength, length);
      this._pending.set(buf.subarray(pos, pos + take), this._pendingLength);
      this._pendingLength += take;
      pos += take;
      if (this._pendingLength < BLOCK) {
        return;
      }
      this._block(this._pendingView, 0);
      this._pendingLength = 0;
    }

    if (end - pos >= BLOCK) {
      const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
      for (; end - pos >= BLOCK; pos += BLOCK) {
        this._block(view, pos);
      }
    }

    if (pos < end) {
      this._pending.set(buf.subarray(pos, end), 0);
      this._pendingLength = end - pos;
    }
  }

  /**
   * Compute the digest of all data fed so far.
   *
   * The hasher state is **not** reset; you can continue calling
   * {@link update} and {@link digest} for incremental snapshots.
   *
   * @returns 16-byte Buffer, `h1` then `h2`, both big-endian.
   */
  public digest(): Buffer {
    const out = bufferAllocUnsafe(16);
    this._finalizeInto(out, 0);
    return out;
  }

  /**
   * Write the 16-byte digest into an existing buffer.
   *
   * @param output       Destination Uint8Array (or Buffer).
   * @param outputOffset Byte offset to write at (default `0`).
   */
  public digestTo(output: Uint8Array, outputOffset?: number | undefined): void {
    const off = outputOffset ?? 0;
    if (off < 0 || off + 16 > output.byteLength) {
      throw new RangeError("digestTo: output buffer too small (need 16 bytes)");
    }
    this._finalizeInto(output, off);
  }

  // ── Internals ──────────────────────────────────────────────────────

  private _block(view: DataView, offset: number): void {
    let h1Hi = this._h1Hi;
    let h1Lo = this._h1Lo;
    let h2Hi = this._h2Hi;
    let h2Lo = this._h2Lo;

    mixK1(view.getUint32(offset + 4, true), view.getUint32(offset, true));
    rotl64((h1Hi ^ rHi) >>> 0, (h1Lo ^ rLo) >>> 0, 27);
    add64(rHi, rLo, h2Hi, h2Lo);
    mul64(rHi, rLo, 0, 5);
    add64(rHi, rLo, 0, 0x52dce729);
    h1Hi = rHi;
    h1Lo = rLo;

    mixK2(view.getUint32(offset + 12, true), view.getUint32(offset + 8, true));
    rotl64((h2Hi ^ rHi) >>> 0, (h2Lo ^ rLo) >>> 0, 31);
    add64(rHi, rLo, h1Hi, h1Lo);
    mul64(rHi, rLo, 0, 5);
    add64(rHi, rLo, 0, 0x38495ab5);
    h2Hi = rHi;
    h2Lo = rLo;

    this._h1Hi = h1Hi;
    this._h1Lo = h1Lo;
    this._h2Hi = h2Hi;
    this._h2Lo = h2Lo;
  }

  private _finalizeInto(output: Uint8Array, offset: number): void {
    let h1Hi = this._h1Hi;
    let h1Lo = this._h1Lo;
    let h2Hi = this._h2Hi;
    let h2Lo = this._h2Lo;
    const tail = this._pendingLength;

    if (tail > 8) {
      readLaneLE(this._pending, 8, tail);
      mixK2(rHi, rLo);
      h2Hi = (h2Hi ^ rHi) >>> 0;
      h2Lo = (h2Lo ^ rLo) >>> 0;
    }
    if (tail > 0) {
      readLaneLE(this._pending, 0, Math.min(tail, 8));
      mixK1(rHi, rLo);
      h1Hi = (h1Hi ^ rHi) >>> 0;
      h1Lo = (h1Lo ^ rLo) >>> 0;
    }

    const lenHi = Math.floor(this._totalLength / 0x100000000) >>> 0;
    const lenLo = this._totalLength >>> 0;
    h1Hi = (h1Hi ^ lenHi) >>> 0;
    h1Lo = (h1Lo ^ lenLo) >>> 0;
    h2Hi = (h2Hi ^ lenHi) >>> 0;
    h2Lo = (h2Lo ^ lenLo) >>> 0;

    add64(h1Hi, h1Lo, h2Hi, h2Lo);
    h1Hi = rHi;
    h1Lo = rLo;
    add64(h2Hi, h2Lo, h1Hi, h1Lo);
    h2Hi = rHi;
    h2Lo = rLo;

    fmix64(h1Hi, h1Lo);
    h1Hi = rHi;
    h1Lo = rLo;
    fmix64(h2Hi, h2Lo);
    h2Hi = rHi;
    h2Lo = rLo;

    add64(h1Hi, h1Lo, h2Hi, h2Lo);
    h1Hi = rHi;
    h1Lo = rLo;
    add64(h2Hi, h2Lo, h1Hi, h1Lo);

    const view = new DataView(output.buffer, output.byteOffset + offset, 16);
    view.setUint32(0, h1Hi, false);
    view.setUint32(4, h1Lo, false);
    view.setUint32(8, rHi, false);
    view.setUint32(12, rLo, false);
  }
}
