/**
 * Tests for file writing on the Effect platform
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { isDirectory } from "../../src/io/file-reader";
import { copyFile, makeDirectory, writeByteRange, writeBytes, writeString } from "../../src/io/file-writer";
import { makeTempDir, removeTempDir } from "../utils/segy-fixtures";

describe("FileWriter", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("should create nested directories", async () => {
    const nested = join(dir, "a", "b", "c");
    await makeDirectory(nested);
    await makeDirectory(nested);
    expect(await isDirectory(nested)).toBe(true);
  });

  test("should write strings and bytes, creating parents", async () => {
    const textPath = join(dir, "deep", "note.txt");
    await writeString(textPath, "line one\n");
    expect(await readFile(textPath, "utf8")).toBe("line one\n");

    const bytesPath = join(dir, "data.bin");
    await writeBytes(bytesPath, new Uint8Array([1, 2, 3, 4]));
    expect([...(await readFile(bytesPath))]).toEqual([1, 2, 3, 4]);
  });

  test("should patch bytes in place without truncating", async () => {
    const path = join(dir, "patch.bin");
    await writeBytes(path, new Uint8Array([1, 2, 3, 4, 5]));
    await writeByteRange(path, 1, new Uint8Array([9, 9]));
    expect([...(await readFile(path))]).toEqual([1, 9, 9, 4, 5]);
  });

  test("should not create a file when patching", async () => {
    await expect(writeByteRange(join(dir, "absent.bin"), 0, new Uint8Array([1]))).rejects.toBeInstanceOf(FileError);
  });

  test("should copy files into new folders", async () => {
    const from = join(dir, "source.txt");
    const to = join(dir, "copies", "target.txt");
    await writeString(from, "copy me");
    await copyFile(from, to);
    expect(await readFile(to, "utf8")).toBe("copy me");
  });

  test("should wrap copy failures", async () => {
    await expect(copyFile(join(dir, "missing.txt"), join(dir, "x.txt"))).rejects.toMatchObject({
      operation: "copy",
    });
  });
});
