/**
 * SampleHasher — sampled 128-bit fingerprints of buffers and files.
 *
 * Inputs up to `threshold` bytes are hashed in full. Longer inputs are
 * hashed from three `sampleSize` windows (start, middle, end) only, and the
 * total length is embedded in the digest. Changes outside the windows of a
 * large input do not change its digest.
 *
 * @module
 */

import { availableParallelism } from "node:os";
import path from "node:path";
import type { ByteSource } from "./byte-source";
import { BufferByteSource, withFileByteSource, withFileHandleByteSource } from "./byte-source";
import type { HasherConfig, HasherOptions } from "./config";
import { resolveHasherConfig } from "./config";
import { composeDigest, DIGEST_SIZE } from "./digest";
import { IOError } from "./errors";
import { bufferAlloc, toBuffer } from "./helpers";
import { MurmurHash3x64 } from "./murmur3";
import { selectSamples } from "./sample-selector";
import type { HashInput, SampleRange } from "./types";

/** Trim and resolve a user-supplied input path. */
function resolveInputPath(filePath: string): string {
  const trimmed = filePath.trim();
  if (trimmed.length === 0) {
    throw new IOError("SampleHasher: empty file path", { path: filePath });
  }
  return path.resolve(trimmed);
}

/**
 * Immutable sampled hasher.
 *
 * @example
 * ```ts
 * import { hashToHex, SampleHasher } from "samplehash";
 *
 * const hasher = new SampleHasher({ sampleSize: 4096, threshold: 65536 });
 *
 * hashToHex(hasher.sum("hello"));          // "0105a7b341bd9b025b1e906a48ae1d19"
 * hashToHex(hasher.sumFile("./video.mp4"));
 * ```
 */
export class SampleHasher {
  /** Frozen configuration used by every call. */
  public readonly config: HasherConfig;

  /**
   * @param options Sample size and threshold; defaults apply to omitted fields.
   * @throws {ConfigurationError} If either value is not a positive integer.
   */
  public constructor(options?: HasherOptions) {
    this.config = resolveHasherConfig(options);
    Object.freeze(this);
  }

  /** Bytes per sample window. */
  public get sampleSize(): number {
    return this.config.sampleSize;
  }

  /** Maximum input length hashed in full. */
  public get threshold(): number {
    return this.config.threshold;
  }

  /** The ranges this hasher reads from an input of `totalLength` bytes. */
  public samples(totalLength: number): SampleRange[] {
    return selectSamples(totalLength, this.config.sampleSize, this.config.threshold);
  }

  /**
   * Digest of an in-memory input.
   *
   * @param input Data to hash (string as UTF-8, Buffer, or Uint8Array).
   * @returns 16-byte digest.
   */
  public sum(input: HashInput): Buffer {
    return this.sumSource(new BufferByteSource(toBuffer(input)));
  }

  /**
   * Digest of any synchronous byte source.
   *
   * @returns 16-byte digest.
   * @throws {IOError} If the source fails to supply a sampled range.
   */
  public sumSource(source: ByteSource): Buffer {
    const h = new MurmurHash3x64();
    for (const { offset, length } of this.samples(source.length)) {
      h.update(source.readExact(offset, length));
    }
    return composeDigest(h.digest(), source.length);
  }

  /**
   * Digest of a file, read synchronously.
   *
   * The path is trimmed and resolved against the working directory. Only
   * the sampled ranges are read; the file is closed before returning.
   *
   * @returns 16-byte digest.
   * @throws {IOError} If the file cannot be opened, sized, or read.
   */
  public sumFile(filePath: string): Buffer {
    return withFileByteSource(resolveInputPath(filePath), (source) => this.sumSource(source));
  }

  /**
   * Same digest as {@link sumFile}, read through a `FileHandle`.
   *
   * @throws {IOError} If the file cannot be opened, sized, or read.
   */
  public async sumFileAsync(filePath: string): Promise<Buffer> {
    const resolved = resolveInputPath(filePath);
    return withFileHandleByteSource(resolved, async (source) => {
      const h = new MurmurHash3x64();
      for (const { offset, length } of this.samples(source.length)) {
        h.update(await source.readExact(offset, length));
      }
      return composeDigest(h.digest(), source.length);
    });
  }

  /**
   * Digest many files, returning their digests concatenated in input order
   * (`N × 16` bytes).
   *
   * Files are hashed by up to `concurrency` parallel lanes (`0` = hardware
   * concurrency). If any file fails, the promise rejects with the error of
   * the lowest failing index once in-flight files settle, and no further
   * files are started.
   *
   * @param files       File paths.
   * @param concurrency Maximum number of files open at once.
   * @throws {IOError} If any file cannot be opened, sized, or read.
   */
  public async sumFiles(files: readonly string[], concurrency = 0): Promise<Buffer> {
    const fileCount = files.length;
    const digests = bufferAlloc(fileCount * DIGEST_SIZE);
    if (fileCount === 0) {
      return digests;
    }

    const maxLanes = concurrency >= 1 ? Math.floor(concurrency) : availableParallelism();
    const lanes = Math.min(maxLanes, fileCount);

    let cursor = 0;
    let failedIndex = -1;
    let failure: unknown = null;

    const worker = async (): Promise<void> => {
      while (failedIndex < 0) {
        const idx = cursor++;
        if (idx >= fileCount) {
          break;
        }
        try {
          digests.set(await this.sumFileAsync(files[idx]), idx * DIGEST_SIZE);
        } catch (error) {
          if (failedIndex < 0 || idx < failedIndex) {
            failedIndex = idx;
            failure = error;
          }
        }
      }
    };

    const workers = new Array<Promise<void>>(lanes);
    for (let i = 0; i < lanes; i++) {
      workers[i] = worker();
    }
    await Promise.all(workers);

    if (failedIndex >= 0) {
      throw failure;
    }
    return digests;
  }
}
