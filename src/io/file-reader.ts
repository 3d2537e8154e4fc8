/**
 * File reading utilities on the Effect platform
 *
 * Promise-returning wrappers; every failure surfaces as a FileError carrying
 * the path and the operation that failed.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option } from "effect";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { FilePathSchema } from "../types";
import type { PlatformServices } from "./runtime";
import { runPlatform } from "./runtime";

/** Upper bound for whole-file text reads (templates, CSV tables) */
const MAX_TEXT_FILE_SIZE = 104_857_600;

/**
 * Run a platform program against one path, mapping any failure to FileError
 */
async function runOnPath<A>(
  operation: "read" | "stat",
  path: FilePath,
  program: Effect.Effect<A, unknown, PlatformServices>
): Promise<A> {
  try {
    return await runPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError(operation, path, error);
  }
}

/** Entry type at a path, or "missing" */
function entryKind(path: FilePath) {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return "missing" as const;
    return (yield* fs.stat(path)).type;
  });
}

/**
 * Check if a regular file exists at a path
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const target = validatePath(path);
  return (await runOnPath("stat", target, entryKind(target))) === "File";
}

/**
 * Check if a directory exists at a path
 */
export async function isDirectory(path: string): Promise<boolean> {
  const target = validatePath(path);
  return (await runOnPath("stat", target, entryKind(target))) === "Directory";
}

/**
 * Size of a file in bytes
 *
 * @throws {FileError} If the file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const target = validatePath(path);
  const program = Effect.flatMap(FileSystem.FileSystem, (fs) => fs.stat(target));
  const info = await runOnPath("stat", target, program);
  return Number(info.size);
}

/**
 * Read a whole text file (UTF-8)
 *
 * @throws {FileError} If the file cannot be read or exceeds 100 MB
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);
  const size = await getSize(validatedPath);
  if (size > MAX_TEXT_FILE_SIZE) {
    throw new FileError(
      `File too large: ${size} bytes exceeds limit of ${MAX_TEXT_FILE_SIZE} bytes`,
      validatedPath,
      "read"
    );
  }

  return runOnPath(
    "read",
    validatedPath,
    Effect.flatMap(FileSystem.FileSystem, (fs) => fs.readFileString(validatedPath))
  );
}

/**
 * Read a byte range from a file
 *
 * Bytes past the end of the file are not returned, so the result may be
 * shorter than `end - start`.
 *
 * @param start Starting byte offset (inclusive)
 * @param end Ending byte offset (exclusive)
 * @throws {FileError} If the file cannot be read or the range is invalid
 *
 * @example
 * ```typescript
 * // Textual header of a SEG-Y file
 * const raw = await readByteRange("line_001.sgy", 0, 3200);
 * ```
 */
export async function readByteRange(path: string, start: number, end: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  if (start < 0 || end < 0) {
    throw new FileError("Byte range must be non-negative", validatedPath, "read");
  }
  if (start >= end) {
    throw new FileError("Start byte must be less than end byte", validatedPath, "read");
  }

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(validatedPath, { flag: "r" });
      yield* file.seek(start, "start");
      const chunk = yield* file.readAlloc(end - start);
      return Option.getOrElse(chunk, () => new Uint8Array(0));
    })
  );

  return runOnPath("read", validatedPath, program);
}

export const FileReader = {
  exists,
  isDirectory,
  getSize,
  readToString,
  readByteRange,
} as const;

/**
 * Validate file path using ArkType
 *
 * @throws {FileError} For empty paths or paths with NUL characters
 */
export function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
