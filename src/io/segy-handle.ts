/**
 * Random-access handle on a SEG-Y file
 *
 * Opening works out the trace geometry from the binary header, trying a
 * sequence of strategies (big-endian first, then tolerating an irregular
 * trace layout, then the little-endian variants) until one fits. All
 * header reads and writes go through the byte order that succeeded.
 */

import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { Effect } from "effect";
import { readField, viewOf, writeField } from "../codec/binary";
import { BINARY_FIELD_MAP, TRACE_FIELD_MAP } from "../codec/field-maps";
import { bytesPerSample, DEFAULT_BYTES_PER_SAMPLE, isKnownFormat } from "../codec/formats";
import { FieldRangeError, FileError, SegyError, SegyOpenError } from "../errors";
import { logSync } from "../logging";
import type { Endianness, FieldDefinition } from "../types";
import { BINARY_HEADER_SIZE, FIRST_TRACE_OFFSET, TEXTUAL_HEADER_SIZE, TRACE_HEADER_SIZE } from "../types";
import { getSize, validatePath } from "./file-reader";

export interface OpenStrategy {
  readonly name: string;
  readonly endianness: Endianness;
  /** Accept a trailing partial trace and an unrecognised format code */
  readonly ignoreGeometry: boolean;
}

export const OPEN_STRATEGIES: readonly OpenStrategy[] = [
  { name: "default", endianness: "big", ignoreGeometry: false },
  { name: "ignore-geometry", endianness: "big", ignoreGeometry: true },
  { name: "little-endian", endianness: "little", ignoreGeometry: false },
  { name: "little-endian+ignore-geometry", endianness: "little", ignoreGeometry: true },
];

export interface TraceLayout {
  readonly formatCode: number;
  readonly samplesPerTrace: number;
  readonly bytesPerSample: number;
  /** Trace header plus samples */
  readonly traceSize: number;
  readonly traceCount: number;
}

// A format code read with the wrong byte order lands far above this
const MAX_PLAUSIBLE_FORMAT_CODE = 255;

const READ_BLOCK_BYTES = 1 << 20;

const SAMPLES_FIELD = TRACE_FIELD_MAP.resolve({ fieldName: "samples" });
const COORDINATE_SCALAR_FIELD = TRACE_FIELD_MAP.resolve({ fieldName: "coordinate_scalar" });
const FORMAT_FIELD = BINARY_FIELD_MAP.resolve({ fieldName: "format_code" });
const SAMPLES_PER_TRACE_FIELD = BINARY_FIELD_MAP.resolve({ fieldName: "samples_per_trace" });

/**
 * Work out trace geometry under one strategy
 *
 * Samples per trace come from the binary header, or from the first trace
 * header when the binary header says 0.
 *
 * @param binaryHeader The 400-byte binary header
 * @param firstTraceHeader The first 240-byte trace header, if the file has one
 * @throws {SegyError} If the strategy cannot make sense of the file
 */
export function resolveLayout(
  binaryHeader: Uint8Array,
  firstTraceHeader: Uint8Array | undefined,
  fileSize: number,
  strategy: OpenStrategy
): TraceLayout {
  if (fileSize < FIRST_TRACE_OFFSET) {
    throw new SegyError(
      `File is ${fileSize} bytes, smaller than the ${FIRST_TRACE_OFFSET}-byte file headers`,
      "LAYOUT_ERROR"
    );
  }

  const binary = viewOf(binaryHeader);
  const formatCode = readField(binary, FORMAT_FIELD, strategy.endianness);
  let samplesPerTrace = readField(binary, SAMPLES_PER_TRACE_FIELD, strategy.endianness);
  if (samplesPerTrace <= 0 && firstTraceHeader !== undefined && firstTraceHeader.length >= TRACE_HEADER_SIZE) {
    samplesPerTrace = readField(viewOf(firstTraceHeader), SAMPLES_FIELD, strategy.endianness);
  }
  if (samplesPerTrace <= 0) {
    throw new SegyError(`Samples per trace is ${samplesPerTrace}`, "LAYOUT_ERROR");
  }

  let sampleBytes: number;
  if (isKnownFormat(formatCode)) {
    sampleBytes = bytesPerSample(formatCode);
  } else if (strategy.ignoreGeometry && formatCode >= 0 && formatCode <= MAX_PLAUSIBLE_FORMAT_CODE) {
    sampleBytes = DEFAULT_BYTES_PER_SAMPLE;
  } else {
    throw new SegyError(`Unsupported data format code ${formatCode}`, "LAYOUT_ERROR");
  }

  const traceSize = TRACE_HEADER_SIZE + samplesPerTrace * sampleBytes;
  const dataBytes = fileSize - FIRST_TRACE_OFFSET;
  if (!strategy.ignoreGeometry && dataBytes % traceSize !== 0) {
    throw new SegyError(
      `Trace data (${dataBytes} bytes) is not a whole number of ${traceSize}-byte traces`,
      "LAYOUT_ERROR"
    );
  }

  return {
    formatCode,
    samplesPerTrace,
    bytesPerSample: sampleBytes,
    traceSize,
    traceCount: Math.floor(dataBytes / traceSize),
  };
}

export interface OpenOptions {
  /** Open for in-place header edits */
  readonly writable?: boolean;
  readonly strategies?: readonly OpenStrategy[];
}

/**
 * Open SEG-Y file with positional header access
 *
 * Always `close()` a handle; writes are not buffered.
 */
export class SegyHandle {
  private closed = false;

  private constructor(
    public readonly path: string,
    private readonly file: FileHandle,
    public readonly fileSize: number,
    public readonly strategy: OpenStrategy,
    public readonly layout: TraceLayout,
    public readonly writable: boolean
  ) {}

  /**
   * Open a file, trying each strategy in order
   *
   * @throws {FileError} If the file cannot be opened
   * @throws {SegyOpenError} If no strategy fits the file
   */
  static async open(path: string, options: OpenOptions = {}): Promise<SegyHandle> {
    const validatedPath = validatePath(path);
    const writable = options.writable ?? false;
    const strategies = options.strategies ?? OPEN_STRATEGIES;
    const fileSize = await getSize(validatedPath);

    let file: FileHandle;
    try {
      file = await open(validatedPath, writable ? "r+" : "r");
    } catch (error) {
      throw FileError.fromSystemError("open", validatedPath, error);
    }

    try {
      const head = await readFully(file, validatedPath, 0, FIRST_TRACE_OFFSET + TRACE_HEADER_SIZE);
      const binaryHeader = head.subarray(TEXTUAL_HEADER_SIZE, FIRST_TRACE_OFFSET);
      const firstTrace =
        head.length >= FIRST_TRACE_OFFSET + TRACE_HEADER_SIZE ? head.subarray(FIRST_TRACE_OFFSET) : undefined;

      const attempted: string[] = [];
      let lastError: unknown;
      for (const strategy of strategies) {
        attempted.push(strategy.name);
        try {
          const layout = resolveLayout(binaryHeader, firstTrace, fileSize, strategy);
          logSync(
            Effect.logDebug(
              `Opened ${validatedPath} (${strategy.name}): ${layout.traceCount} traces x ${layout.samplesPerTrace} samples`
            )
          );
          return new SegyHandle(validatedPath, file, fileSize, strategy, layout, writable);
        } catch (error) {
          lastError = error;
          logSync(Effect.logDebug(`Open strategy ${strategy.name} rejected ${validatedPath}: ${String(error)}`));
        }
      }
      throw new SegyOpenError(validatedPath, attempted, lastError);
    } catch (error) {
      await file.close();
      throw error;
    }
  }

  get endianness(): Endianness {
    return this.strategy.endianness;
  }

  get traceCount(): number {
    return this.layout.traceCount;
  }

  // ---------------------------------------------------------------------------
  // File headers
  // ---------------------------------------------------------------------------

  async readTextualHeader(): Promise<Uint8Array> {
    return this.readAt(0, TEXTUAL_HEADER_SIZE);
  }

  /**
   * Overwrite the 3200-byte textual header
   */
  async writeTextualHeader(bytes: Uint8Array): Promise<void> {
    if (bytes.length !== TEXTUAL_HEADER_SIZE) {
      throw new SegyError(
        `Textual header must be ${TEXTUAL_HEADER_SIZE} bytes, got ${bytes.length}`,
        "TEXTUAL_HEADER_SIZE"
      );
    }
    await this.writeAt(0, bytes);
  }

  async readBinaryHeader(): Promise<DataView> {
    return viewOf(await this.readAt(TEXTUAL_HEADER_SIZE, BINARY_HEADER_SIZE));
  }

  /**
   * Every binary field map entry, keyed by name
   */
  async readBinaryValues(): Promise<Record<string, number>> {
    const view = await this.readBinaryHeader();
    const values: Record<string, number> = {};
    for (const field of BINARY_FIELD_MAP.fields) {
      values[field.name] = readField(view, field, this.endianness);
    }
    return values;
  }

  async readBinaryField(field: FieldDefinition): Promise<number> {
    return readField(await this.readBinaryHeader(), field, this.endianness);
  }

  /**
   * @throws {FieldRangeError} If the value does not fit the field
   */
  async writeBinaryField(field: FieldDefinition, value: number): Promise<void> {
    await this.writeFieldAt(TEXTUAL_HEADER_SIZE, field, value);
  }

  // ---------------------------------------------------------------------------
  // Trace headers
  // ---------------------------------------------------------------------------

  async readTraceHeader(index: number): Promise<DataView> {
    return viewOf(await this.readAt(this.traceOffset(index), TRACE_HEADER_SIZE));
  }

  async readTraceField(index: number, field: FieldDefinition): Promise<number> {
    return readField(await this.readTraceHeader(index), field, this.endianness);
  }

  /**
   * @throws {FieldRangeError} If the value does not fit the field
   */
  async writeTraceField(index: number, field: FieldDefinition, value: number): Promise<void> {
    try {
      await this.writeFieldAt(this.traceOffset(index), field, value);
    } catch (error) {
      if (error instanceof FieldRangeError) {
        throw new FieldRangeError(error.fieldName, error.value, error.width, index);
      }
      throw error;
    }
  }

  /**
   * Iterate trace headers in order, reading whole blocks of traces at a time
   *
   * A header yielded for trace `i` reflects writes to traces before `i` made
   * during the iteration.
   */
  async *traceHeaders(
    start = 0,
    end = this.traceCount
  ): AsyncGenerator<{ readonly index: number; readonly header: DataView }> {
    const last = Math.min(end, this.traceCount);
    const perBlock = Math.max(1, Math.floor(READ_BLOCK_BYTES / this.layout.traceSize));
    for (let blockStart = Math.max(0, start); blockStart < last; blockStart += perBlock) {
      const count = Math.min(perBlock, last - blockStart);
      const block = await this.readAt(this.traceOffset(blockStart), count * this.layout.traceSize);
      for (let i = 0; i < count; i++) {
        const offset = i * this.layout.traceSize;
        yield { index: blockStart + i, header: viewOf(block.subarray(offset, offset + TRACE_HEADER_SIZE)) };
      }
    }
  }

  /**
   * One field of every trace header, in trace order
   */
  async readColumn(field: FieldDefinition): Promise<number[]> {
    const values: number[] = [];
    for await (const { header } of this.traceHeaders()) {
      values.push(readField(header, field, this.endianness));
    }
    return values;
  }

  /**
   * Coordinate scalar of the first trace, 0 for a file without traces
   */
  async firstCoordinateScalar(): Promise<number> {
    if (this.traceCount === 0) return 0;
    return this.readTraceField(0, COORDINATE_SCALAR_FIELD);
  }

  async sync(): Promise<void> {
    if (!this.writable || this.closed) return;
    try {
      await this.file.sync();
    } catch (error) {
      throw FileError.fromSystemError("write", this.path, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.file.close();
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private traceOffset(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.traceCount) {
      throw new SegyError(
        `Trace index ${index} out of range (0..${this.traceCount - 1})`,
        "TRACE_INDEX_ERROR",
        index
      );
    }
    return FIRST_TRACE_OFFSET + index * this.layout.traceSize;
  }

  private async writeFieldAt(headerOffset: number, field: FieldDefinition, value: number): Promise<void> {
    const size = field.width === "int16" ? 2 : 4;
    const bytes = new Uint8Array(size);
    writeField(viewOf(bytes), { ...field, byteOffset: 1 }, value, this.endianness);
    await this.writeAt(headerOffset + field.byteOffset - 1, bytes);
  }

  private async readAt(position: number, length: number): Promise<Uint8Array> {
    this.assertOpen();
    const bytes = await readFully(this.file, this.path, position, length);
    if (bytes.length < length) {
      throw new SegyError(
        `Unexpected end of file reading ${length} bytes at offset ${position}`,
        "TRUNCATED_FILE"
      );
    }
    return bytes;
  }

  private async writeAt(position: number, bytes: Uint8Array): Promise<void> {
    this.assertOpen();
    if (!this.writable) {
      throw new SegyError(`${this.path} was opened read-only`, "READ_ONLY");
    }
    try {
      await this.file.write(bytes, 0, bytes.length, position);
    } catch (error) {
      throw FileError.fromSystemError("write", this.path, error);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SegyError(`${this.path} is closed`, "HANDLE_CLOSED");
    }
  }
}

async function readFully(file: FileHandle, path: string, position: number, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let filled = 0;
  try {
    while (filled < length) {
      const { bytesRead } = await file.read(buffer, filled, length - filled, position + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  }
  return buffer.subarray(0, filled);
}
