/**
 * Core type definitions for SEG-Y inspection and editing
 *
 * Everything here is plain data: snapshots, edit descriptors and results
 * can be handed to reporting or UI layers and serialized without holding
 * on to any open file.
 */

import { type } from "arktype";

// =============================================================================
// FORMAT CONSTANTS
// =============================================================================

/** Size of the textual (EBCDIC/ASCII) file header */
export const TEXTUAL_HEADER_SIZE = 3200;
/** Size of the binary file header */
export const BINARY_HEADER_SIZE = 400;
/** Size of each trace header */
export const TRACE_HEADER_SIZE = 240;
/** Offset of the first trace record */
export const FIRST_TRACE_OFFSET = TEXTUAL_HEADER_SIZE + BINARY_HEADER_SIZE;

/**
 * Textual header encodings
 */
export const TextEncoding = {
  EBCDIC: "EBCDIC",
  ASCII: "ASCII",
} as const;

export type TextEncoding = (typeof TextEncoding)[keyof typeof TextEncoding];

/**
 * Byte order a file was opened with. Writes always use the handle's order.
 */
export type Endianness = "big" | "little";

/**
 * Storage widths of header fields
 */
export type FieldWidth = "int16" | "int32";

/**
 * Data type an edit declares for display purposes
 *
 * The bytes written are always governed by the field map entry's width.
 */
export type FieldDtype = "int16" | "int32" | "uint16" | "uint32" | "float32";

/**
 * One entry of a header field map
 */
export interface FieldDefinition {
  /** Symbolic name, also the variable name in expressions */
  readonly name: string;
  /** Storage width */
  readonly width: FieldWidth;
  /** 1-based byte offset inside the header (binary: 1..400, trace: 1..240) */
  readonly byteOffset: number;
}

/**
 * Header a field belongs to
 */
export type HeaderKind = "binary_header" | "trace_header";

// =============================================================================
// FILE SNAPSHOT
// =============================================================================

/**
 * Aggregate statistics of one trace header field across every trace
 */
export interface FieldStats {
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly std: number;
}

/**
 * Metadata snapshot of an opened SEG-Y file
 *
 * Built by the reader and never mutated; edits act on the file and a fresh
 * snapshot has to be read afterwards.
 */
export interface SegyFileInfo {
  readonly path: string;
  readonly filename: string;
  readonly fileSizeBytes: number;

  /** Decoded textual header: 40 lines of 80 characters */
  readonly textualLines: readonly string[];
  readonly textualEncoding: TextEncoding;

  /** Binary header values keyed by field map name */
  readonly binaryHeader: Readonly<Record<string, number>>;
  readonly formatCode: number;
  /** Microseconds */
  readonly sampleInterval: number;
  readonly samplesPerTrace: number;
  readonly traceCount: number;
  readonly bytesPerSample: number;
  /** 3200 + 400 + traceCount * (240 + samplesPerTrace * bytesPerSample), or 0 when unknown */
  readonly expectedFileSize: number;

  /** Per-field statistics across all traces */
  readonly traceHeaderSummary: Readonly<Record<string, FieldStats>>;
  /** Coordinate scalar of the first trace */
  readonly coordinateScalar: number;

  /** Byte order and open strategy that succeeded */
  readonly endianness: Endianness;
  readonly openStrategy: string;
}

// =============================================================================
// VALIDATION
// =============================================================================

export const CheckStatus = {
  PASS: "PASS",
  WARNING: "WARNING",
  FAIL: "FAIL",
} as const;

export type CheckStatus = (typeof CheckStatus)[keyof typeof CheckStatus];

export type CheckCategory = "structure" | "binary_header" | "trace_header" | "post_edit";

export interface ValidationCheck {
  readonly name: string;
  readonly category: CheckCategory;
  readonly status: CheckStatus;
  readonly message: string;
  readonly details?: string;
}

/**
 * Accepted coordinate extents, in scaled (real-world) units
 */
export interface CoordinateBounds {
  readonly xMin?: number;
  readonly xMax?: number;
  readonly yMin?: number;
  readonly yMax?: number;
}

export interface ValidationResult {
  readonly filename: string;
  readonly overallStatus: CheckStatus;
  readonly checks: readonly ValidationCheck[];
  /** ISO-8601, seconds precision */
  readonly timestamp: string;
}

// =============================================================================
// EDIT DESCRIPTORS
// =============================================================================

/**
 * Replace individual textual header lines (0-based index → text)
 */
export interface EbcdicLinesEdit {
  readonly mode: "lines";
  readonly lines: Readonly<Record<number, string>>;
}

/**
 * Rebuild the textual header from a `{{placeholder}}` template
 *
 * `templateText` is filled in from `templatePath` before the edit is applied.
 */
export interface EbcdicTemplateEdit {
  readonly mode: "template";
  readonly templatePath?: string;
  readonly templateText?: string;
  readonly replacements: Readonly<Record<string, string>>;
}

export type EbcdicEdit = EbcdicLinesEdit | EbcdicTemplateEdit;

/**
 * Target of a header edit: by name, by byte offset, or both
 */
export interface FieldTarget {
  readonly fieldName?: string;
  readonly byteOffset?: number;
}

export interface BinaryHeaderEdit extends FieldTarget {
  readonly value: number;
  readonly dtype?: FieldDtype;
}

interface TraceHeaderEditBase extends FieldTarget {
  /** Traces for which this evaluates false are left untouched */
  readonly condition?: string;
  readonly dtype?: FieldDtype;
}

export interface TraceSetEdit extends TraceHeaderEditBase {
  readonly mode: "set";
  readonly value: number;
}

export interface TraceExpressionEdit extends TraceHeaderEditBase {
  readonly mode: "expression";
  readonly expression: string;
}

export interface TraceCopyEdit extends TraceHeaderEditBase {
  readonly mode: "copy";
  readonly sourceField: string;
}

export interface TraceCsvImportEdit extends TraceHeaderEditBase {
  readonly mode: "csv_import";
  readonly csvPath: string;
  /** Defaults to the target field name */
  readonly csvColumn?: string;
}

export type TraceHeaderEdit = TraceSetEdit | TraceExpressionEdit | TraceCopyEdit | TraceCsvImportEdit;

export type TraceEditMode = TraceHeaderEdit["mode"];

/**
 * Edits to apply to one file; textual edits always go first
 */
export interface EditJob {
  readonly ebcdicEdits: readonly EbcdicEdit[];
  readonly binaryEdits: readonly BinaryHeaderEdit[];
  readonly traceEdits: readonly TraceHeaderEdit[];
}

export const EMPTY_EDIT_JOB: EditJob = {
  ebcdicEdits: [],
  binaryEdits: [],
  traceEdits: [],
};

// =============================================================================
// CHANGE LOG AND RESULTS
// =============================================================================

export type ChangeFieldType = "ebcdic" | "binary_header" | "trace_header";

/**
 * One observed field mutation
 */
export interface ChangeRecord {
  readonly filename: string;
  readonly timestamp: string;
  readonly fieldType: ChangeFieldType;
  readonly fieldName: string;
  /** Absent for header-level changes */
  readonly traceIndex?: number;
  readonly beforeValue: string;
  readonly afterValue: string;
}

export const BatchStatus = {
  SUCCESS: "SUCCESS",
  FAILURE: "FAILURE",
  SKIPPED: "SKIPPED",
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

export interface BatchResult {
  readonly filename: string;
  readonly status: BatchStatus;
  readonly message: string;
  readonly changes: readonly ChangeRecord[];
  readonly validationBefore?: ValidationResult;
  readonly validationAfter?: ValidationResult;
  readonly durationSeconds: number;
}

export const PipelineState = {
  IDLE: "idle",
  FILES_LOADED: "files_loaded",
  VALIDATED: "validated",
  EDITS_DEFINED: "edits_defined",
  APPLIED: "applied",
} as const;

export type PipelineState = (typeof PipelineState)[keyof typeof PipelineState];

// =============================================================================
// PREVIEW
// =============================================================================

export interface EbcdicPreview {
  readonly changedLines: readonly number[];
  readonly before: readonly string[];
  readonly after: readonly string[];
}

export interface BinaryPreview {
  readonly field: string;
  readonly before: number;
  readonly after: number;
}

export interface TracePreviewRow {
  readonly trace: number;
  readonly field: string;
  readonly current: number;
  readonly new: number;
  readonly changed: boolean;
  readonly skipped: boolean;
}

export interface DryRunResult {
  readonly ebcdicPreview: readonly EbcdicPreview[];
  readonly binaryPreview: readonly BinaryPreview[];
  readonly tracePreview: readonly (readonly TracePreviewRow[])[];
}

// =============================================================================
// CALLBACKS AND OUTPUT
// =============================================================================

export type ProgressCallback = (current: number, total: number) => void;
export type ChangeCallback = (change: ChangeRecord) => void;
export type StageCallback = (stage: number, label: string) => void;
export type LogCallback = (message: string) => void;

export type OutputMode = "separate_folder" | "in_place_backup";

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * Non-empty path without NUL bytes
 */
export const FilePathSchema = type("string>0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

export type FilePath = typeof FilePathSchema.infer;

/**
 * Current timestamp, ISO-8601 at seconds precision
 */
export function isoTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19);
}
