/**
 * Tests for SEG-Y metadata extraction
 */

import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FieldStatsAccumulator, SegyFileReader } from "../../src/io/segy-reader";
import { makeTempDir, removeTempDir, writeSegy } from "../utils/segy-fixtures";

describe("FieldStatsAccumulator", () => {
  test("should compute population statistics", () => {
    const accumulator = new FieldStatsAccumulator();
    for (const value of [2, 4, 4, 4, 5, 5, 7, 9]) accumulator.add(value);
    const stats = accumulator.getStats();
    expect([stats.min, stats.max]).toEqual([2, 9]);
    expect(stats.mean).toBeCloseTo(5, 12);
    expect(stats.std).toBeCloseTo(2, 12);
  });

  test("should report zeros when empty", () => {
    expect(new FieldStatsAccumulator().getStats()).toEqual({ min: 0, max: 0, mean: 0, std: 0 });
  });
});

describe("SegyFileReader", () => {
  const reader = new SegyFileReader();
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("should extract a full metadata snapshot", async () => {
    const path = await writeSegy(dir, "line_001.sgy");
    const info = await reader.open(path);

    expect(info).toMatchObject({
      path,
      filename: "line_001.sgy",
      fileSizeBytes: 4920,
      textualEncoding: "EBCDIC",
      formatCode: 1,
      sampleInterval: 2000,
      samplesPerTrace: 50,
      traceCount: 3,
      bytesPerSample: 4,
      expectedFileSize: 4920,
      coordinateScalar: -100,
      endianness: "big",
      openStrategy: "default",
    });
    expect(info.textualLines[0]?.trimEnd()).toBe("C 1 CLIENT: TEST COMPANY");
    expect(info.binaryHeader["samples_per_trace"]).toBe(50);

    const sourceX = info.traceHeaderSummary["source_x"];
    expect(sourceX?.min).toBe(500_000);
    expect(sourceX?.max).toBe(500_020);
    expect(sourceX?.mean).toBe(500_010);
    expect(sourceX?.std).toBeCloseTo(Math.sqrt(200 / 3), 9);
    expect(info.traceHeaderSummary["cdp"]).toEqual({ min: 0, max: 0, mean: 0, std: 0 });
  });

  test("should detect an ASCII textual header", async () => {
    const info = await reader.open(
      await writeSegy(dir, "ascii.sgy", { encoding: "ASCII", textLines: ["C 1 PLAIN ASCII"] })
    );
    expect(info.textualEncoding).toBe("ASCII");
    expect(info.textualLines[0]?.trimEnd()).toBe("C 1 PLAIN ASCII");
  });

  test("should take samples per trace from the traces when the binary header has none", async () => {
    const info = await reader.open(await writeSegy(dir, "no-spt.sgy", { binary: { samples_per_trace: 0 } }));
    expect(info.binaryHeader["samples_per_trace"]).toBe(0);
    expect(info.samplesPerTrace).toBe(50);
    expect(info.expectedFileSize).toBe(4920);
  });

  test("should report the strategy used for a non-conformant file", async () => {
    const info = await reader.open(await writeSegy(dir, "le.sgy", { endianness: "little", traceCount: 2 }));
    expect(info.openStrategy).toBe("little-endian");
    expect(info.endianness).toBe("little");
    expect(info.sampleInterval).toBe(2000);
    expect(info.traceCount).toBe(2);
  });

  test("should read selected trace header columns", async () => {
    const path = await writeSegy(dir, "table.sgy");
    expect(await reader.readAllTraceHeaders(path, ["cdp_x", "bogus", "crossline"])).toEqual({
      trace_index: [0, 1, 2],
      cdp_x: [500_000, 500_010, 500_020],
      crossline: [200, 201, 202],
    });
  });

  test("should read the default columns", async () => {
    const table = await reader.readAllTraceHeaders(await writeSegy(dir, "default-table.sgy", { traceCount: 2 }));
    expect(Object.keys(table)).toHaveLength(16);
    expect(table["samples"]).toEqual([50, 50]);
  });
});
