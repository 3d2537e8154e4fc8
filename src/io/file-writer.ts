/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers for output preparation: directories, whole-file
 * writes and file copies. Parent directories are created on demand.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { runPlatform } from "./runtime";

/**
 * Create a directory and any missing parents
 *
 * @throws {FileError} If the directory cannot be created
 */
export async function makeDirectory(dir: string): Promise<void> {
  const validatedDir = validatePath(dir);
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(validatedDir, { recursive: true });
  });

  try {
    await runPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("mkdir", validatedDir, error);
  }
}

/**
 * Write string content to a file, replacing it
 */
export async function writeString(path: string, content: string): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content));
}

/**
 * Write binary content to a file, replacing it
 *
 * @throws {FileError} If the file cannot be written
 */
export async function writeBytes(path: string, data: Uint8Array): Promise<void> {
  const validatedPath = validatePath(path);
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    yield* fs.makeDirectory(pathService.dirname(validatedPath), { recursive: true });
    yield* fs.writeFile(validatedPath, data);
  });

  try {
    await runPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Copy a file byte-for-byte, overwriting the destination
 *
 * @throws {FileError} If the source cannot be read or the destination written
 */
export async function copyFile(fromPath: string, toPath: string): Promise<void> {
  const from = validatePath(fromPath);
  const to = validatePath(toPath);
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    yield* fs.makeDirectory(pathService.dirname(to), { recursive: true });
    yield* fs.copyFile(from, to);
    yield* Effect.logDebug(`Copied ${from} -> ${to}`);
  });

  try {
    await runPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("copy", from, error);
  }
}

/**
 * Overwrite bytes at a position inside an existing file
 *
 * The file is neither truncated nor created.
 *
 * @throws {FileError} If the file cannot be opened for update
 */
export async function writeByteRange(path: string, position: number, data: Uint8Array): Promise<void> {
  const validatedPath = validatePath(path);
  if (position < 0) {
    throw new FileError("Write position must be non-negative", validatedPath, "write");
  }

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(validatedPath, { flag: "r+" });
      yield* file.seek(position, "start");
      yield* file.writeAll(data);
    })
  );

  try {
    await runPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

export const FileWriter = {
  makeDirectory,
  writeString,
  writeBytes,
  writeByteRange,
  copyFile,
} as const;
