/**
 * In-memory SEG-Y builder for tests
 *
 * Files are assembled byte by byte with the library's own field codec and
 * written to a fresh directory under the OS temp dir.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { viewOf, writeField } from "../../src/codec/binary";
import { BINARY_FIELD_MAP, TRACE_FIELD_MAP } from "../../src/codec/field-maps";
import { bytesPerSample } from "../../src/codec/formats";
import { encodeTextualHeader } from "../../src/codec/textual-header";
import type { Endianness, FieldStats, SegyFileInfo, TextEncoding } from "../../src/types";
import { BINARY_HEADER_SIZE, FIRST_TRACE_OFFSET, TEXTUAL_HEADER_SIZE, TRACE_HEADER_SIZE } from "../../src/types";

export interface SegyFixture {
  readonly traceCount?: number;
  readonly samplesPerTrace?: number;
  readonly formatCode?: number;
  readonly sampleInterval?: number;
  readonly endianness?: Endianness;
  readonly encoding?: TextEncoding;
  readonly textLines?: readonly string[];
  /** Extra binary header values, written after the geometry fields */
  readonly binary?: Readonly<Record<string, number>>;
  /** Trace header values for trace `i`; merged over `defaultTraceFields` */
  readonly traces?: (index: number) => Readonly<Record<string, number>>;
  /** Bytes per sample to lay the traces out with (defaults to the format's) */
  readonly sampleBytes?: number;
  /** Bytes appended after the last trace */
  readonly trailingBytes?: number;
}

export const DEFAULT_TEXT_LINES = ["C 1 CLIENT: TEST COMPANY", "C 2 LINE: L001"];

/**
 * Plausible trace headers: sequence numbers, coordinates 10 units apart, scalar -100
 */
export function defaultTraceFields(index: number): Record<string, number> {
  return {
    trace_sequence_line: index + 1,
    trace_sequence_file: index + 1,
    coordinate_scalar: -100,
    source_x: 500_000 + index * 10,
    source_y: 6_000_000 + index * 10,
    cdp_x: 500_000 + index * 10,
    cdp_y: 6_000_000 + index * 10,
    inline: 100,
    crossline: 200 + index,
  };
}

export function buildSegy(fixture: SegyFixture = {}): Uint8Array {
  const traceCount = fixture.traceCount ?? 3;
  const samplesPerTrace = fixture.samplesPerTrace ?? 50;
  const formatCode = fixture.formatCode ?? 1;
  const sampleInterval = fixture.sampleInterval ?? 2000;
  const endianness = fixture.endianness ?? "big";
  const sampleBytes = fixture.sampleBytes ?? bytesPerSample(formatCode);
  const traceSize = TRACE_HEADER_SIZE + Math.max(samplesPerTrace, 0) * sampleBytes;

  const bytes = new Uint8Array(FIRST_TRACE_OFFSET + traceCount * traceSize + (fixture.trailingBytes ?? 0));
  bytes.set(encodeTextualHeader(fixture.textLines ?? DEFAULT_TEXT_LINES, fixture.encoding ?? "EBCDIC"), 0);

  const binary = viewOf(bytes.subarray(TEXTUAL_HEADER_SIZE, FIRST_TRACE_OFFSET));
  const binaryValues: Record<string, number> = {
    sample_interval: sampleInterval,
    samples_per_trace: samplesPerTrace,
    format_code: formatCode,
    ...fixture.binary,
  };
  for (const [name, value] of Object.entries(binaryValues)) {
    writeField(binary, BINARY_FIELD_MAP.resolve({ fieldName: name }), value, endianness);
  }

  for (let i = 0; i < traceCount; i++) {
    const start = FIRST_TRACE_OFFSET + i * traceSize;
    const header = viewOf(bytes.subarray(start, start + TRACE_HEADER_SIZE));
    const values: Record<string, number> = {
      ...defaultTraceFields(i),
      samples: Math.max(samplesPerTrace, 0),
      sample_interval: sampleInterval,
      ...fixture.traces?.(i),
    };
    for (const [name, value] of Object.entries(values)) {
      writeField(header, TRACE_FIELD_MAP.resolve({ fieldName: name }), value, endianness);
    }
  }
  return bytes;
}

/**
 * Size a fixture file will have
 */
export function fixtureSize(traceCount: number, samplesPerTrace: number, sampleBytes: number): number {
  return TEXTUAL_HEADER_SIZE + BINARY_HEADER_SIZE + traceCount * (TRACE_HEADER_SIZE + samplesPerTrace * sampleBytes);
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "segy-fixer-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeSegy(dir: string, name: string, fixture: SegyFixture = {}): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, buildSegy(fixture));
  return path;
}

/**
 * Metadata snapshot for validator tests, without any file
 */
export function makeFileInfo(overrides: Partial<SegyFileInfo> = {}): SegyFileInfo {
  const stats = (min: number, max: number, mean: number, std: number): FieldStats => ({ min, max, mean, std });
  return {
    path: "/data/test.sgy",
    filename: "test.sgy",
    fileSizeBytes: 4920,
    textualLines: [],
    textualEncoding: "EBCDIC",
    binaryHeader: { sample_interval: 2000, samples_per_trace: 50, format_code: 1 },
    formatCode: 1,
    sampleInterval: 2000,
    samplesPerTrace: 50,
    traceCount: 3,
    bytesPerSample: 4,
    expectedFileSize: 4920,
    traceHeaderSummary: {
      coordinate_scalar: stats(-100, -100, -100, 0),
      source_x: stats(500_000, 500_020, 500_010, 8),
      source_y: stats(6_000_000, 6_000_020, 6_000_010, 8),
      cdp_x: stats(500_000, 500_020, 500_010, 8),
      cdp_y: stats(6_000_000, 6_000_020, 6_000_010, 8),
    },
    coordinateScalar: -100,
    endianness: "big",
    openStrategy: "default",
    ...overrides,
  };
}
