/**
 * Tests for opening SEG-Y files and positional header access
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { viewOf, writeField } from "../../src/codec/binary";
import { BINARY_FIELD_MAP, TRACE_FIELD_MAP } from "../../src/codec/field-maps";
import { FileError, SegyError, SegyOpenError } from "../../src/errors";
import type { OpenStrategy } from "../../src/io/segy-handle";
import { OPEN_STRATEGIES, resolveLayout, SegyHandle } from "../../src/io/segy-handle";
import { makeTempDir, removeTempDir, writeSegy } from "../utils/segy-fixtures";

function strategy(name: string): OpenStrategy {
  const found = OPEN_STRATEGIES.find((s) => s.name === name);
  if (found === undefined) throw new Error(`No open strategy named ${name}`);
  return found;
}

const DEFAULT_STRATEGY = strategy("default");
const IGNORE_GEOMETRY = strategy("ignore-geometry");

function binaryHeader(values: Record<string, number>): Uint8Array {
  const bytes = new Uint8Array(400);
  for (const [name, value] of Object.entries(values)) {
    writeField(viewOf(bytes), BINARY_FIELD_MAP.resolve({ fieldName: name }), value);
  }
  return bytes;
}

describe("resolveLayout", () => {
  const header = binaryHeader({ format_code: 1, samples_per_trace: 50 });

  test("should derive trace size and count", () => {
    expect(resolveLayout(header, undefined, 3600 + 2 * 440, DEFAULT_STRATEGY)).toEqual({
      formatCode: 1,
      samplesPerTrace: 50,
      bytesPerSample: 4,
      traceSize: 440,
      traceCount: 2,
    });
  });

  test("should reject files smaller than the file headers", () => {
    expect(() => resolveLayout(header, undefined, 3500, DEFAULT_STRATEGY)).toThrow(
      "File is 3500 bytes, smaller than the 3600-byte file headers"
    );
  });

  test("should take samples from the first trace when the binary header has none", () => {
    const trace = new Uint8Array(240);
    writeField(viewOf(trace), TRACE_FIELD_MAP.resolve({ fieldName: "samples" }), 25);
    const layout = resolveLayout(binaryHeader({ format_code: 1 }), trace, 3600 + 340, DEFAULT_STRATEGY);
    expect(layout.samplesPerTrace).toBe(25);
    expect(layout.traceCount).toBe(1);
    expect(() => resolveLayout(binaryHeader({ format_code: 1 }), undefined, 3600, DEFAULT_STRATEGY)).toThrow(
      "Samples per trace is 0"
    );
  });

  test("should require whole traces unless geometry is ignored", () => {
    expect(() => resolveLayout(header, undefined, 3600 + 500, DEFAULT_STRATEGY)).toThrow(
      "Trace data (500 bytes) is not a whole number of 440-byte traces"
    );
    expect(resolveLayout(header, undefined, 3600 + 500, IGNORE_GEOMETRY).traceCount).toBe(1);
  });

  test("should assume 4-byte samples for an unknown but plausible format code", () => {
    const unknown = binaryHeader({ format_code: 4, samples_per_trace: 10 });
    expect(() => resolveLayout(unknown, undefined, 3600, DEFAULT_STRATEGY)).toThrow("Unsupported data format code 4");
    expect(resolveLayout(unknown, undefined, 3600 + 280, IGNORE_GEOMETRY).bytesPerSample).toBe(4);
    const implausible = binaryHeader({ format_code: 300, samples_per_trace: 10 });
    expect(() => resolveLayout(implausible, undefined, 3600, IGNORE_GEOMETRY)).toThrow(
      "Unsupported data format code 300"
    );
  });
});

describe("SegyHandle", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("should open a conformant file with the default strategy", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "default.sgy"));
    try {
      expect(handle.strategy.name).toBe("default");
      expect(handle.endianness).toBe("big");
      expect(handle.fileSize).toBe(4920);
      expect(handle.traceCount).toBe(3);
      expect(handle.layout.traceSize).toBe(440);
      expect(handle.writable).toBe(false);
    } finally {
      await handle.close();
    }
  });

  test("should fall back to ignoring a trailing partial trace", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "trailing.sgy", { trailingBytes: 100 }));
    try {
      expect(handle.strategy.name).toBe("ignore-geometry");
      expect(handle.traceCount).toBe(3);
    } finally {
      await handle.close();
    }
  });

  test("should fall back to little-endian", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "little.sgy", { endianness: "little" }));
    try {
      expect(handle.strategy.name).toBe("little-endian");
      expect(await handle.firstCoordinateScalar()).toBe(-100);
      expect(await handle.readTraceField(2, TRACE_FIELD_MAP.resolve({ fieldName: "crossline" }))).toBe(202);
    } finally {
      await handle.close();
    }
  });

  test("should fall back to little-endian with irregular geometry", async () => {
    const path = await writeSegy(dir, "little-trailing.sgy", { endianness: "little", trailingBytes: 7 });
    const handle = await SegyHandle.open(path);
    try {
      expect(handle.strategy.name).toBe("little-endian+ignore-geometry");
    } finally {
      await handle.close();
    }
  });

  test("should raise SegyOpenError listing every strategy tried", async () => {
    const path = join(dir, "tiny.sgy");
    await writeFile(path, new Uint8Array(1000));
    const error = await SegyHandle.open(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SegyOpenError);
    if (!(error instanceof SegyOpenError)) return;
    expect(error.attempted).toEqual(OPEN_STRATEGIES.map((s) => s.name));
    expect(error.message).toBe(
      "Cannot open SEG-Y file with any strategy: File is 1000 bytes, smaller than the 3600-byte file headers"
    );
  });

  test("should raise FileError for a missing file", async () => {
    await expect(SegyHandle.open(join(dir, "missing.sgy"))).rejects.toBeInstanceOf(FileError);
  });

  test("should read headers and iterate trace ranges", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "iterate.sgy", { traceCount: 5 }));
    try {
      const values = await handle.readBinaryValues();
      expect(values["sample_interval"]).toBe(2000);
      expect(values["format_code"]).toBe(1);
      expect((await handle.readTextualHeader()).length).toBe(3200);

      const seen: number[] = [];
      for await (const { index } of handle.traceHeaders(1, 3)) seen.push(index);
      expect(seen).toEqual([1, 2]);
      expect(await handle.readColumn(TRACE_FIELD_MAP.resolve({ fieldName: "trace_sequence_line" }))).toEqual([
        1, 2, 3, 4, 5,
      ]);
    } finally {
      await handle.close();
    }
  });

  test("should write fields through a writable handle", async () => {
    const path = await writeSegy(dir, "write.sgy");
    const cdp = TRACE_FIELD_MAP.resolve({ fieldName: "cdp" });
    const handle = await SegyHandle.open(path, { writable: true });
    try {
      await handle.writeTraceField(1, cdp, 77);
      await handle.writeBinaryField(BINARY_FIELD_MAP.resolve({ fieldName: "job_id" }), 12);
    } finally {
      await handle.close();
    }

    const reopened = await SegyHandle.open(path);
    try {
      expect(await reopened.readColumn(cdp)).toEqual([0, 77, 0]);
      expect((await reopened.readBinaryValues())["job_id"]).toBe(12);
    } finally {
      await reopened.close();
    }
  });

  test("should refuse invalid access", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "guarded.sgy"));
    const cdp = TRACE_FIELD_MAP.resolve({ fieldName: "cdp" });

    await expect(handle.writeTraceField(0, cdp, 1)).rejects.toMatchObject({ code: "READ_ONLY" });
    await expect(handle.readTraceField(3, cdp)).rejects.toMatchObject({ code: "TRACE_INDEX_ERROR", traceIndex: 3 });
    await expect(handle.writeTextualHeader(new Uint8Array(10))).rejects.toMatchObject({ code: "TEXTUAL_HEADER_SIZE" });

    await handle.close();
    await expect(handle.readBinaryHeader()).rejects.toBeInstanceOf(SegyError);
    await expect(handle.readBinaryHeader()).rejects.toMatchObject({ code: "HANDLE_CLOSED" });
  });

  test("should attach the trace index to range errors", async () => {
    const handle = await SegyHandle.open(await writeSegy(dir, "range.sgy"), { writable: true });
    try {
      await expect(
        handle.writeTraceField(2, TRACE_FIELD_MAP.resolve({ fieldName: "trace_id" }), 99999)
      ).rejects.toMatchObject({ code: "FIELD_RANGE_ERROR", traceIndex: 2 });
    } finally {
      await handle.close();
    }
  });
});
