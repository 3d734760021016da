/**
 * Byte sources: the "read N bytes at offset O" capability the hasher needs
 * from its input.
 *
 * File-backed sources are only reachable through {@link withFileByteSource}
 * and {@link withFileHandleByteSource}, which close the descriptor on every
 * exit path.
 *
 * @module
 */

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { IOError } from "./errors";
import { bufferAllocUnsafe, isNonNegativeSafeInteger } from "./helpers";

// ── Public types ─────────────────────────────────────────────────────────

/** Synchronous source of input bytes. */
export interface ByteSource {
  /** Total number of bytes available. */
  readonly length: number;

  /**
   * Read exactly `length` bytes starting at `offset`.
   *
   * @throws {IOError} If the range exceeds the source or the read fails.
   */
  readExact(offset: number, length: number): Uint8Array;
}

/** Asynchronous source of input bytes. */
export interface AsyncByteSource {
  /** Total number of bytes available. */
  readonly length: number;

  /**
   * Read exactly `length` bytes starting at `offset`.
   *
   * @throws {IOError} If the range exceeds the source or the read fails.
   */
  readExact(offset: number, length: number): Promise<Uint8Array>;
}

// ── Helpers ──────────────────────────────────────────────────────────────

function checkRange(offset: number, length: number, available: number, path: string | undefined): void {
  if (!isNonNegativeSafeInteger(offset) || !isNonNegativeSafeInteger(length) || offset + length > available) {
    throw new IOError(`readExact: range [${offset}, ${offset + length}) exceeds source length ${available}`, {
      path,
    });
  }
}

/**
 * Close `fd`. A failure surfaces as {@link IOError} unless another error is
 * already propagating (`pending`), which then takes precedence.
 */
function closeFd(path: string, fd: number, pending: boolean): void {
  try {
    closeSync(fd);
  } catch (error) {
    if (!pending) {
      throw new IOError(`withFileByteSource: cannot close ${path}`, { path, cause: error });
    }
  }
}

/** Async counterpart of {@link closeFd}. */
async function closeHandle(path: string, fh: FileHandle, pending: boolean): Promise<void> {
  try {
    await fh.close();
  } catch (error) {
    if (!pending) {
      throw new IOError(`withFileHandleByteSource: cannot close ${path}`, { path, cause: error });
    }
  }
}

function shortRead(path: string, offset: number, length: number, got: number): IOError {
  return new IOError(`readExact: unexpected end of file reading ${length} bytes at ${offset} (got ${got})`, {
    path,
  });
}

// ── In-memory ────────────────────────────────────────────────────────────

/** Byte source over an in-memory buffer. Reads are zero-copy views. */
export class BufferByteSource implements ByteSource {
  public readonly length: number;

  private readonly _data: Uint8Array;

  public constructor(data: Uint8Array) {
    this._data = data;
    this.length = data.length;
  }

  public readExact(offset: number, length: number): Uint8Array {
    checkRange(offset, length, this.length, undefined);
    return this._data.subarray(offset, offset + length);
  }
}

// ── Synchronous file ─────────────────────────────────────────────────────

/** Byte source over an open file descriptor, read with positional `readSync`. */
export class FileByteSource implements ByteSource {
  /** The file being read. */
  public readonly path: string;

  public readonly length: number;

  private readonly _fd: number;

  /** @internal Use {@link withFileByteSource}. */
  public constructor(path: string, fd: number, length: number) {
    this.path = path;
    this._fd = fd;
    this.length = length;
  }

  public readExact(offset: number, length: number): Uint8Array {
    checkRange(offset, length, this.length, this.path);
    const out = bufferAllocUnsafe(length);
    let filled = 0;
    while (filled < length) {
      let n: number;
      try {
        n = readSync(this._fd, out, filled, length - filled, offset + filled);
      } catch (error) {
        throw new IOError(`readExact: failed to read ${this.path}`, { path: this.path, cause: error });
      }
      if (n === 0) {
        throw shortRead(this.path, offset, length, filled);
      }
      filled += n;
    }
    return out;
  }
}

/**
 * Open `path`, run `fn` with a {@link FileByteSource} over it, and close the
 * descriptor whether `fn` returns or throws.
 *
 * @throws {IOError} If the file cannot be opened, sized or closed.
 */
export function withFileByteSource<T>(path: string, fn: (source: FileByteSource) => T): T {
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch (error) {
    throw new IOError(`withFileByteSource: cannot open ${path}`, { path, cause: error });
  }
  let result: T;
  try {
    let size: number;
    try {
      size = fstatSync(fd).size;
    } catch (error) {
      throw new IOError(`withFileByteSource: cannot determine the size of ${path}`, { path, cause: error });
    }
    result = fn(new FileByteSource(path, fd, size));
  } catch (error) {
    closeFd(path, fd, true);
    throw error;
  }
  closeFd(path, fd, false);
  return result;
}

// ── Asynchronous file ────────────────────────────────────────────────────

/** Byte source over a `node:fs/promises` {@link FileHandle}. */
export class FileHandleByteSource implements AsyncByteSource {
  /** The file being read. */
  public readonly path: string;

  public readonly length: number;

  private readonly _fh: FileHandle;

  /** @internal Use {@link withFileHandleByteSource}. */
  public constructor(path: string, fh: FileHandle, length: number) {
    this.path = path;
    this._fh = fh;
    this.length = length;
  }

  public async readExact(offset: number, length: number): Promise<Uint8Array> {
    checkRange(offset, length, this.length, this.path);
    const out = bufferAllocUnsafe(length);
    let filled = 0;
    while (filled < length) {
      let n: number;
      try {
        n = (await this._fh.read(out, filled, length - filled, offset + filled)).bytesRead;
      } catch (error) {
        throw new IOError(`readExact: failed to read ${this.path}`, { path: this.path, cause: error });
      }
      if (n === 0) {
        throw shortRead(this.path, offset, length, filled);
      }
      filled += n;
    }
    return out;
  }
}

/**
 * Async counterpart of {@link withFileByteSource}: the handle is closed
 * after `fn` settles, on success or failure.
 *
 * @throws {IOError} If the file cannot be opened, sized or closed.
 */
export async function withFileHandleByteSource<T>(
  path: string,
  fn: (source: FileHandleByteSource) => Promise<T>
): Promise<T> {
  let fh: FileHandle;
  try {
    fh = await open(path, "r");
  } catch (error) {
    throw new IOError(`withFileHandleByteSource: cannot open ${path}`, { path, cause: error });
  }
  let result: T;
  try {
    let size: number;
    try {
      size = (await fh.stat()).size;
    } catch (error) {
      throw new IOError(`withFileHandleByteSource: cannot determine the size of ${path}`, { path, cause: error });
    }
    result = await fn(new FileHandleByteSource(path, fh, size));
  } catch (error) {
    await closeHandle(path, fh, true);
    throw error;
  }
  await closeHandle(path, fh, false);
  return result;
}
