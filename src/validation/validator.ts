/**
 * Integrity rules for SEG-Y metadata snapshots
 *
 * Checks run on a `SegyFileInfo` only; the file itself is never reopened.
 * A FAIL is an ordinary result the caller uses to gate editing.
 */

import { FORMAT_BYTES_PER_SAMPLE, isKnownFormat } from "../codec/formats";
import type {
  CheckCategory,
  CheckStatus,
  CoordinateBounds,
  FieldStats,
  SegyFileInfo,
  ValidationCheck,
  ValidationResult,
} from "../types";
import { FIRST_TRACE_OFFSET, isoTimestamp } from "../types";

export interface ValidatorOptions {
  readonly coordinateBounds?: CoordinateBounds;
  readonly checkStructure?: boolean;
  readonly checkBinaryHeader?: boolean;
  readonly checkTraceHeader?: boolean;
  readonly checkCoordinateRange?: boolean;
}

/** Above this many samples per trace the value is suspicious */
export const MAX_REASONABLE_SAMPLES = 100_000;

const COORDINATE_FIELDS = ["source_x", "source_y", "cdp_x", "cdp_y"] as const;

const BOUND_KEYS: Record<(typeof COORDINATE_FIELDS)[number], { min: keyof CoordinateBounds; max: keyof CoordinateBounds }> = {
  source_x: { min: "xMin", max: "xMax" },
  source_y: { min: "yMin", max: "yMax" },
  cdp_x: { min: "xMin", max: "xMax" },
  cdp_y: { min: "yMin", max: "yMax" },
};

const EMPTY_STATS: FieldStats = { min: 0, max: 0, mean: 0, std: 0 };

function check(
  name: string,
  category: CheckCategory,
  status: CheckStatus,
  message: string,
  details?: string
): ValidationCheck {
  return details === undefined ? { name, category, status, message } : { name, category, status, message, details };
}

function grouped(value: number): string {
  return value.toLocaleString("en-US");
}

function signedGrouped(value: number): string {
  return `${value >= 0 ? "+" : ""}${grouped(value)}`;
}

/**
 * FAIL if any check fails, else WARNING if any warns, else PASS
 */
export function overallStatus(checks: readonly ValidationCheck[]): CheckStatus {
  if (checks.some((c) => c.status === "FAIL")) return "FAIL";
  if (checks.some((c) => c.status === "WARNING")) return "WARNING";
  return "PASS";
}

export class SegyValidator {
  private readonly bounds?: CoordinateBounds;
  private readonly checkStructure: boolean;
  private readonly checkBinaryHeader: boolean;
  private readonly checkTraceHeader: boolean;
  private readonly checkCoordinateRange: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.bounds = options.coordinateBounds;
    this.checkStructure = options.checkStructure ?? true;
    this.checkBinaryHeader = options.checkBinaryHeader ?? true;
    this.checkTraceHeader = options.checkTraceHeader ?? true;
    this.checkCoordinateRange = options.checkCoordinateRange ?? true;
  }

  /**
   * Run every enabled check category, in order
   */
  validate(info: SegyFileInfo): ValidationResult {
    const checks: ValidationCheck[] = [];
    if (this.checkStructure) checks.push(...this.validateStructure(info));
    if (this.checkBinaryHeader) checks.push(...this.validateBinaryHeader(info));
    if (this.checkTraceHeader) checks.push(...this.validateTraceHeaders(info));
    if (this.checkCoordinateRange && this.bounds !== undefined && hasAnyBound(this.bounds)) {
      checks.push(...this.validateCoordinateBounds(info, this.bounds));
    }
    return result(info.filename, checks);
  }

  /**
   * Structure and binary header checks on the edited file, plus a WARNING
   * for each binary header field that changed without being edited
   *
   * Drift is only checked when `editedFields` is non-empty.
   */
  validatePostEdit(before: SegyFileInfo, after: SegyFileInfo, editedFields?: ReadonlySet<string>): ValidationResult {
    const checks = [...this.validateStructure(after), ...this.validateBinaryHeader(after)];

    if (editedFields !== undefined && editedFields.size > 0) {
      checks.push(...this.detectDrift(before, after, editedFields));
    }
    return result(after.filename, checks);
  }

  /**
   * WARNING per binary header field whose value changed but was not edited
   */
  detectDrift(before: SegyFileInfo, after: SegyFileInfo, editedFields: ReadonlySet<string>): ValidationCheck[] {
    const checks: ValidationCheck[] = [];
    for (const [name, beforeValue] of Object.entries(before.binaryHeader)) {
      const afterValue = after.binaryHeader[name] ?? beforeValue;
      if (!editedFields.has(name) && beforeValue !== afterValue) {
        checks.push(
          check(
            `Unintended Change: ${name}`,
            "post_edit",
            "WARNING",
            `Binary header '${name}' changed unexpectedly`,
            `Before: ${beforeValue}, After: ${afterValue}`
          )
        );
      }
    }
    return checks;
  }

  validateStructure(info: SegyFileInfo): ValidationCheck[] {
    const checks: ValidationCheck[] = [];

    if (info.expectedFileSize > 0) {
      if (info.fileSizeBytes === info.expectedFileSize) {
        checks.push(
          check(
            "File Size Consistency",
            "structure",
            "PASS",
            `File size matches expected: ${grouped(info.fileSizeBytes)} bytes`
          )
        );
      } else {
        const diff = info.fileSizeBytes - info.expectedFileSize;
        checks.push(
          check(
            "File Size Consistency",
            "structure",
            "FAIL",
            "File size does not match expected structure",
            `Actual: ${grouped(info.fileSizeBytes)} bytes, Expected: ${grouped(info.expectedFileSize)} bytes, ` +
              `Difference: ${signedGrouped(diff)} bytes\n` +
              `Formula: 3200 + 400 + (240 + ${info.samplesPerTrace} x ${info.bytesPerSample}) x ${info.traceCount}`
          )
        );
      }
    } else {
      checks.push(
        check("File Size Consistency", "structure", "WARNING", "Cannot verify file size (missing header info)")
      );
    }

    if (info.fileSizeBytes < FIRST_TRACE_OFFSET) {
      checks.push(
        check(
          "Minimum File Size",
          "structure",
          "FAIL",
          `File too small: ${info.fileSizeBytes} bytes (minimum ${FIRST_TRACE_OFFSET} for header)`
        )
      );
    }

    checks.push(
      info.traceCount <= 0
        ? check("Trace Count", "structure", "FAIL", `Invalid trace count: ${info.traceCount}`)
        : check("Trace Count", "structure", "PASS", `Trace count: ${grouped(info.traceCount)}`)
    );

    return checks;
  }

  validateBinaryHeader(info: SegyFileInfo): ValidationCheck[] {
    const checks: ValidationCheck[] = [];

    checks.push(
      info.sampleInterval <= 0
        ? check("Sample Interval", "binary_header", "FAIL", `Invalid sample interval: ${info.sampleInterval} us`)
        : check("Sample Interval", "binary_header", "PASS", `Sample interval: ${info.sampleInterval} us`)
    );

    if (info.samplesPerTrace <= 0) {
      checks.push(
        check("Samples per Trace", "binary_header", "FAIL", `Invalid samples per trace: ${info.samplesPerTrace}`)
      );
    } else if (info.samplesPerTrace > MAX_REASONABLE_SAMPLES) {
      checks.push(
        check(
          "Samples per Trace",
          "binary_header",
          "WARNING",
          `Unusually high samples per trace: ${info.samplesPerTrace}`
        )
      );
    } else {
      checks.push(check("Samples per Trace", "binary_header", "PASS", `Samples per trace: ${info.samplesPerTrace}`));
    }

    if (isKnownFormat(info.formatCode)) {
      checks.push(
        check(
          "Data Format Code",
          "binary_header",
          "PASS",
          `Format code: ${info.formatCode} (${FORMAT_BYTES_PER_SAMPLE[info.formatCode]} bytes/sample)`
        )
      );
    } else {
      const valid = Object.keys(FORMAT_BYTES_PER_SAMPLE).map(Number).sort((a, b) => a - b);
      checks.push(
        check(
          "Data Format Code",
          "binary_header",
          "FAIL",
          `Unknown format code: ${info.formatCode}`,
          `Valid codes: [${valid.join(", ")}]`
        )
      );
    }

    return checks;
  }

  validateTraceHeaders(info: SegyFileInfo): ValidationCheck[] {
    const checks: ValidationCheck[] = [];

    const scalar = info.traceHeaderSummary["coordinate_scalar"] ?? EMPTY_STATS;
    checks.push(
      scalar.min !== scalar.max
        ? check(
            "Coordinate Scalar Consistency",
            "trace_header",
            "WARNING",
            "Coordinate scalar varies across traces",
            `Min: ${scalar.min}, Max: ${scalar.max}`
          )
        : check(
            "Coordinate Scalar Consistency",
            "trace_header",
            "PASS",
            `Coordinate scalar: ${scalar.min} (consistent)`
          )
    );

    for (const name of COORDINATE_FIELDS) {
      const { min, max, mean, std } = info.traceHeaderSummary[name] ?? EMPTY_STATS;
      const label = `Coordinate Range: ${name}`;

      if (std > 0 && mean !== 0) {
        const rangeRatio = (max - min) / Math.abs(mean);
        checks.push(
          rangeRatio > 1.0
            ? check(
                label,
                "trace_header",
                "WARNING",
                `${name} has high variability`,
                `Min: ${min.toFixed(0)}, Max: ${max.toFixed(0)}, Mean: ${mean.toFixed(0)}, Std: ${std.toFixed(0)}`
              )
            : check(label, "trace_header", "PASS", `${name}: ${min.toFixed(0)} ~ ${max.toFixed(0)}`)
        );
      } else if (min === 0 && max === 0 && mean === 0) {
        checks.push(check(label, "trace_header", "WARNING", `${name}: all zeros`));
      }
    }

    return checks;
  }

  /**
   * Scaled min/max of each coordinate field against the configured bounds
   *
   * A negative coordinate scalar divides, a positive one multiplies; fields
   * that are entirely zero are not checked.
   */
  validateCoordinateBounds(info: SegyFileInfo, bounds: CoordinateBounds): ValidationCheck[] {
    const checks: ValidationCheck[] = [];
    const scalar = info.coordinateScalar;
    const scale = scalar < 0 ? 1 / Math.abs(scalar) : scalar > 0 ? scalar : 1;

    for (const name of COORDINATE_FIELDS) {
      const stats = info.traceHeaderSummary[name] ?? EMPTY_STATS;
      const fieldMin = stats.min * scale;
      const fieldMax = stats.max * scale;
      if (fieldMin === 0 && fieldMax === 0) continue;

      const boundMin = bounds[BOUND_KEYS[name].min];
      const boundMax = bounds[BOUND_KEYS[name].max];

      if (boundMin !== undefined && fieldMin < boundMin) {
        checks.push(
          check(
            `Bounds Check: ${name}`,
            "trace_header",
            "WARNING",
            `${name} min (${fieldMin.toFixed(0)}) below bound (${boundMin})`
          )
        );
      }
      if (boundMax !== undefined && fieldMax > boundMax) {
        checks.push(
          check(
            `Bounds Check: ${name}`,
            "trace_header",
            "WARNING",
            `${name} max (${fieldMax.toFixed(0)}) above bound (${boundMax})`
          )
        );
      }
    }
    return checks;
  }
}

function hasAnyBound(bounds: CoordinateBounds): boolean {
  return Object.values(bounds).some((value) => value !== undefined);
}

/**
 * Result with extra checks appended and the overall status recomputed
 */
export function withChecks(base: ValidationResult, extra: readonly ValidationCheck[]): ValidationResult {
  if (extra.length === 0) return base;
  const checks = [...base.checks, ...extra];
  return { ...base, checks, overallStatus: overallStatus(checks) };
}

function result(filename: string, checks: ValidationCheck[]): ValidationResult {
  return { filename, overallStatus: overallStatus(checks), checks, timestamp: isoTimestamp() };
}
