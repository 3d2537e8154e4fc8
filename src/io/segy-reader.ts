/**
 * SEG-Y metadata reader
 *
 * Produces the immutable `SegyFileInfo` snapshot: decoded textual header,
 * every binary header field, derived geometry, and min/max/mean/std of
 * every trace header field over all traces.
 */

import { basename } from "node:path";
import { Effect } from "effect";
import { readField } from "../codec/binary";
import { TRACE_FIELD_MAP, TRACE_INDEX_VARIABLE } from "../codec/field-maps";
import { bytesPerSample, expectedFileSize } from "../codec/formats";
import { decodeTextualHeader, detectEncoding } from "../codec/textual-header";
import { logSync } from "../logging";
import type { FieldStats, SegyFileInfo } from "../types";
import { TEXTUAL_HEADER_SIZE } from "../types";
import { getSize, readByteRange } from "./file-reader";
import { SegyHandle } from "./segy-handle";

/**
 * Streaming min/max/mean/std of one field
 *
 * Uses Welford's algorithm; std is the population standard deviation.
 */
export class FieldStatsAccumulator {
  private count = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = Number.NEGATIVE_INFINITY;
  private mean = 0;
  private m2 = 0;

  add(value: number): void {
    this.count++;
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
    const delta = value - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (value - this.mean);
  }

  getStats(): FieldStats {
    if (this.count === 0) {
      return { min: 0, max: 0, mean: 0, std: 0 };
    }
    return {
      min: this.min,
      max: this.max,
      mean: this.mean,
      std: Math.sqrt(this.m2 / this.count),
    };
  }
}

/** Columns returned by `readAllTraceHeaders` when none are requested */
export const DEFAULT_TABLE_FIELDS: readonly string[] = [
  "trace_sequence_line",
  "source_x",
  "source_y",
  "group_x",
  "group_y",
  "cdp_x",
  "cdp_y",
  "coordinate_scalar",
  "elevation_scalar",
  "inline",
  "crossline",
  "offset",
  "delay_recording_time",
  "samples",
  "sample_interval",
];

/**
 * Column table of trace header values: `trace_index` plus one array per field
 */
export type TraceHeaderTable = Record<string, number[]>;

export class SegyFileReader {
  /**
   * Open a file read-only and extract all metadata
   *
   * @throws {FileError} If the file cannot be read
   * @throws {SegyOpenError} If no open strategy fits the file
   */
  async open(path: string): Promise<SegyFileInfo> {
    const filename = basename(path);
    const fileSizeBytes = await getSize(path);

    // Textual header is decoded from raw bytes, independent of the handle
    const raw = await readByteRange(path, 0, TEXTUAL_HEADER_SIZE);
    const textualEncoding = detectEncoding(raw);
    const textualLines = decodeTextualHeader(raw, textualEncoding);

    const handle = await SegyHandle.open(path);
    try {
      const binaryHeader = await handle.readBinaryValues();

      const formatCode = binaryHeader["format_code"] ?? 0;
      const sampleInterval = binaryHeader["sample_interval"] ?? 0;
      const binarySamples = binaryHeader["samples_per_trace"] ?? 0;
      const samplesPerTrace =
        binarySamples === 0 && handle.traceCount > 0 ? handle.layout.samplesPerTrace : binarySamples;
      const sampleBytes = bytesPerSample(formatCode);

      const accumulators = new Map(TRACE_FIELD_MAP.fields.map((field) => [field, new FieldStatsAccumulator()]));
      for await (const { header } of handle.traceHeaders()) {
        for (const [field, accumulator] of accumulators) {
          accumulator.add(readField(header, field, handle.endianness));
        }
      }
      const traceHeaderSummary: Record<string, FieldStats> = {};
      for (const [field, accumulator] of accumulators) {
        traceHeaderSummary[field.name] = accumulator.getStats();
      }

      const info: SegyFileInfo = {
        path,
        filename,
        fileSizeBytes,
        textualLines,
        textualEncoding,
        binaryHeader,
        formatCode,
        sampleInterval,
        samplesPerTrace,
        traceCount: handle.traceCount,
        bytesPerSample: sampleBytes,
        expectedFileSize: expectedFileSize(handle.traceCount, samplesPerTrace, sampleBytes),
        traceHeaderSummary,
        coordinateScalar: await handle.firstCoordinateScalar(),
        endianness: handle.endianness,
        openStrategy: handle.strategy.name,
      };

      logSync(
        Effect.logInfo(
          `Read ${info.traceCount} traces, ${info.samplesPerTrace} samples, format ${info.formatCode}`
        ).pipe(Effect.annotateLogs("file", filename))
      );
      return info;
    } finally {
      await handle.close();
    }
  }

  /**
   * Read fields from every trace header into columns
   *
   * Names not in the trace field map are left out of the table.
   */
  async readAllTraceHeaders(
    path: string,
    fields: readonly string[] = DEFAULT_TABLE_FIELDS
  ): Promise<TraceHeaderTable> {
    const resolved = fields.flatMap((name) => {
      const field = TRACE_FIELD_MAP.byFieldName(name);
      return field === undefined ? [] : [field];
    });

    const handle = await SegyHandle.open(path);
    try {
      const table: TraceHeaderTable = { [TRACE_INDEX_VARIABLE]: [] };
      for (const field of resolved) table[field.name] = [];

      for await (const { index, header } of handle.traceHeaders()) {
        table[TRACE_INDEX_VARIABLE]?.push(index);
        for (const field of resolved) {
          table[field.name]?.push(readField(header, field, handle.endianness));
        }
      }
      return table;
    } finally {
      await handle.close();
    }
  }
}
