/**
 * Tests for close failures in the scoped file byte sources.
 */

import { closeSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { open } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { IOError, withFileByteSource, withFileHandleByteSource } from "../packages/samplehash/src/index";

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return { ...actual, closeSync: vi.fn(actual.closeSync) };
});

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, open: vi.fn(actual.open) };
});

function closeFailure(): Error {
  return Object.assign(new Error("close failed"), { code: "EIO" });
}

describe("closing file byte sources", () => {
  let dir = "";
  const fp = (name: string) => path.join(dir, name);

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), "samplehash-close-"));
    writeFileSync(fp("digits.txt"), "0123456789");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.mocked(closeSync).mockClear();
    vi.mocked(open).mockClear();
  });

  async function failingCloseOnNextOpen(): Promise<void> {
    const actual = await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");
    vi.mocked(open).mockImplementationOnce(async (file, flags) => {
      const fh = await actual.open(file, flags);
      const close = fh.close.bind(fh);
      fh.close = async () => {
        await close();
        throw closeFailure();
      };
      return fh;
    });
  }

  async function failingCloseSync(): Promise<void> {
    const actual = await vi.importActual<typeof import("node:fs")>("node:fs");
    vi.mocked(closeSync).mockImplementationOnce((fd) => {
      actual.closeSync(fd);
      throw closeFailure();
    });
  }

  it("withFileByteSource reports a close failure as IOError", async () => {
    await failingCloseSync();
    expect(() => withFileByteSource(fp("digits.txt"), (source) => source.length)).toThrow(
      expect.objectContaining({
        name: "IOError",
        code: "EIO",
        path: fp("digits.txt"),
        message: `withFileByteSource: cannot close ${fp("digits.txt")}`,
      })
    );
  });

  it("withFileByteSource keeps the callback error when close also fails", async () => {
    await failingCloseSync();
    const failure = new IOError("callback failed");
    expect(() =>
      withFileByteSource(fp("digits.txt"), () => {
        throw failure;
      })
    ).toThrow(failure);
    expect(closeSync).toHaveBeenCalledTimes(1);
  });

  it("withFileHandleByteSource reports a close failure as IOError", async () => {
    await failingCloseOnNextOpen();
    await expect(withFileHandleByteSource(fp("digits.txt"), async (source) => source.length)).rejects.toMatchObject({
      name: "IOError",
      code: "EIO",
      path: fp("digits.txt"),
      message: `withFileHandleByteSource: cannot close ${fp("digits.txt")}`,
    });
  });

  it("withFileHandleByteSource keeps the callback error when close also fails", async () => {
    await failingCloseOnNextOpen();
    const failure = new IOError("callback failed");
    await expect(
      withFileHandleByteSource(fp("digits.txt"), async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });
});
