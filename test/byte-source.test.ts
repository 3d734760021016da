/**
 * Tests for the byte sources: range checks, exact reads, short reads and
 * scoped release of file descriptors.
 */

import { mkdtempSync, rmSync, truncateSync, writeFileSync } from "node:fs";
import { truncate } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { FileByteSource, FileHandleByteSource } from "../packages/samplehash/src/index";
import {
  BufferByteSource,
  IOError,
  withFileByteSource,
  withFileHandleByteSource,
} from "../packages/samplehash/src/index";

describe("BufferByteSource", () => {
  const source = new BufferByteSource(Buffer.from("0123456789"));

  it("reports the buffer length", () => {
    expect(source.length).toBe(10);
  });

  it("reads exact ranges", () => {
    expect(Buffer.from(source.readExact(2, 3)).toString()).toBe("234");
    expect(Buffer.from(source.readExact(0, 10)).toString()).toBe("0123456789");
    expect(source.readExact(10, 0)).toHaveLength(0);
  });

  it("rejects ranges beyond the buffer", () => {
    expect(() => source.readExact(8, 3)).toThrow(IOError);
    expect(() => source.readExact(-1, 2)).toThrow(IOError);
    expect(() => source.readExact(8, 3)).toThrow(expect.objectContaining({ path: undefined }));
  });
});

describe("file byte sources", () => {
  let dir = "";
  const fp = (name: string) => path.join(dir, name);

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), "samplehash-source-"));
    writeFileSync(fp("digits.txt"), "0123456789");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("withFileByteSource reads exact ranges", () => {
    const result = withFileByteSource(fp("digits.txt"), (source) => {
      expect(source.length).toBe(10);
      expect(source.path).toBe(fp("digits.txt"));
      return Buffer.from(source.readExact(3, 4)).toString();
    });
    expect(result).toBe("3456");
  });

  it("withFileByteSource rejects ranges beyond the file", () => {
    expect(() => withFileByteSource(fp("digits.txt"), (source) => source.readExact(5, 6))).toThrow(IOError);
  });

  it("withFileByteSource propagates errors thrown by the callback", () => {
    const failure = new Error("callback failed");
    expect(() =>
      withFileByteSource(fp("digits.txt"), () => {
        throw failure;
      })
    ).toThrow(failure);
  });

  it("withFileByteSource reports a file truncated after its size was read", () => {
    writeFileSync(fp("shrinking.txt"), "0123456789");
    expect(() =>
      withFileByteSource(fp("shrinking.txt"), (source) => {
        truncateSync(source.path, 4);
        return source.readExact(0, 10);
      })
    ).toThrow(
      expect.objectContaining({
        name: "IOError",
        path: fp("shrinking.txt"),
        message: "readExact: unexpected end of file reading 10 bytes at 0 (got 4)",
      })
    );
  });

  it("withFileByteSource of a missing file throws IOError", () => {
    expect(() => withFileByteSource(fp("missing.txt"), () => 0)).toThrow(
      expect.objectContaining({ name: "IOError", code: "ENOENT", path: fp("missing.txt") })
    );
  });

  it("withFileHandleByteSource reads exact ranges", async () => {
    const result = await withFileHandleByteSource(fp("digits.txt"), async (source) => {
      expect(source.length).toBe(10);
      return Buffer.from(await source.readExact(6, 4)).toString();
    });
    expect(result).toBe("6789");
  });

  it("withFileHandleByteSource reports a file truncated after its size was read", async () => {
    writeFileSync(fp("shrinking-async.txt"), "0123456789");
    const result = withFileHandleByteSource(fp("shrinking-async.txt"), async (source) => {
      await truncate(source.path, 0);
      return source.readExact(2, 5);
    });
    await expect(result).rejects.toBeInstanceOf(IOError);
    await expect(result).rejects.toMatchObject({
      message: "readExact: unexpected end of file reading 5 bytes at 2 (got 0)",
    });
  });

  it("withFileHandleByteSource of a missing file rejects with IOError", async () => {
    await expect(withFileHandleByteSource(fp("missing.txt"), async () => 0)).rejects.toMatchObject({
      name: "IOError",
      code: "ENOENT",
    });
  });

  it("withFileByteSource releases the descriptor when the callback returns", () => {
    const kept: { source?: FileByteSource } = {};
    withFileByteSource(fp("digits.txt"), (source) => {
      kept.source = source;
    });
    expect(() => kept.source?.readExact(0, 1)).toThrow(expect.objectContaining({ name: "IOError", code: "EBADF" }));
  });

  it("withFileByteSource releases the descriptor when the callback throws", () => {
    const kept: { source?: FileByteSource } = {};
    expect(() =>
      withFileByteSource(fp("digits.txt"), (source) => {
        kept.source = source;
        throw new Error("callback failed");
      })
    ).toThrow("callback failed");
    expect(() => kept.source?.readExact(0, 1)).toThrow(expect.objectContaining({ name: "IOError", code: "EBADF" }));
  });

  it("withFileHandleByteSource releases the handle when the callback resolves", async () => {
    const kept: { source?: FileHandleByteSource } = {};
    await withFileHandleByteSource(fp("digits.txt"), async (source) => {
      kept.source = source;
    });
    await expect(kept.source?.readExact(0, 1)).rejects.toMatchObject({ name: "IOError", code: "EBADF" });
  });

  it("withFileHandleByteSource releases the handle when the callback rejects", async () => {
    const kept: { source?: FileHandleByteSource } = {};
    await expect(
      withFileHandleByteSource(fp("digits.txt"), async (source) => {
        kept.source = source;
        throw new Error("callback failed");
      })
    ).rejects.toThrow("callback failed");
    await expect(kept.source?.readExact(0, 1)).rejects.toMatchObject({ name: "IOError", code: "EBADF" });
  });
});
