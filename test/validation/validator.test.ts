/**
 * Tests for SEG-Y integrity rules
 */

import { describe, expect, test } from "vitest";
import type { ValidationCheck } from "../../src/types";
import { overallStatus, SegyValidator, withChecks } from "../../src/validation/validator";
import { makeFileInfo } from "../utils/segy-fixtures";

const byName = (checks: readonly ValidationCheck[], name: string): ValidationCheck | undefined =>
  checks.find((c) => c.name === name);

describe("SegyValidator", () => {
  const validator = new SegyValidator();

  test("should pass a consistent file", () => {
    const result = validator.validate(makeFileInfo());
    expect(result.overallStatus).toBe("PASS");
    expect(result.filename).toBe("test.sgy");
    expect(result.checks.map((c) => c.name)).toEqual([
      "File Size Consistency",
      "Trace Count",
      "Sample Interval",
      "Samples per Trace",
      "Data Format Code",
      "Coordinate Scalar Consistency",
      "Coordinate Range: source_x",
      "Coordinate Range: source_y",
      "Coordinate Range: cdp_x",
      "Coordinate Range: cdp_y",
    ]);
    expect(result.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/);
  });

  test("should fail a size mismatch with the formula in the details", () => {
    const check = byName(
      validator.validateStructure(makeFileInfo({ fileSizeBytes: 5000, expectedFileSize: 7200 })),
      "File Size Consistency"
    );
    expect(check).toEqual({
      name: "File Size Consistency",
      category: "structure",
      status: "FAIL",
      message: "File size does not match expected structure",
      details:
        "Actual: 5,000 bytes, Expected: 7,200 bytes, Difference: -2,200 bytes\n" +
        "Formula: 3200 + 400 + (240 + 50 x 4) x 3",
    });
  });

  test("should group the matching size", () => {
    const check = byName(
      validator.validateStructure(makeFileInfo({ fileSizeBytes: 1_204_800, expectedFileSize: 1_204_800 })),
      "File Size Consistency"
    );
    expect(check?.message).toBe("File size matches expected: 1,204,800 bytes");
  });

  test("should warn when the expected size is unknown", () => {
    const check = byName(validator.validateStructure(makeFileInfo({ expectedFileSize: 0 })), "File Size Consistency");
    expect(check?.status).toBe("WARNING");
    expect(check?.message).toBe("Cannot verify file size (missing header info)");
  });

  test("should fail a file with no traces or below header size", () => {
    const checks = validator.validateStructure(makeFileInfo({ traceCount: 0, fileSizeBytes: 3000 }));
    expect(byName(checks, "Trace Count")?.message).toBe("Invalid trace count: 0");
    expect(byName(checks, "Minimum File Size")?.message).toBe(
      "File too small: 3000 bytes (minimum 3600 for header)"
    );
    expect(overallStatus(checks)).toBe("FAIL");
  });

  test("should fail an unknown format code and list valid codes", () => {
    const check = byName(validator.validateBinaryHeader(makeFileInfo({ formatCode: 99 })), "Data Format Code");
    expect(check).toMatchObject({
      status: "FAIL",
      message: "Unknown format code: 99",
      details: "Valid codes: [1, 2, 3, 5, 6, 8]",
    });
  });

  test("should describe a known format code", () => {
    const check = byName(validator.validateBinaryHeader(makeFileInfo({ formatCode: 3 })), "Data Format Code");
    expect(check?.message).toBe("Format code: 3 (2 bytes/sample)");
  });

  test("should warn about unusually many samples", () => {
    const check = byName(validator.validateBinaryHeader(makeFileInfo({ samplesPerTrace: 200_000 })), "Samples per Trace");
    expect(check).toMatchObject({ status: "WARNING", message: "Unusually high samples per trace: 200000" });
  });

  test("should fail a zero sample interval", () => {
    const check = byName(validator.validateBinaryHeader(makeFileInfo({ sampleInterval: 0 })), "Sample Interval");
    expect(check).toMatchObject({ status: "FAIL", message: "Invalid sample interval: 0 us" });
  });

  test("should warn about a varying coordinate scalar", () => {
    const info = makeFileInfo({
      traceHeaderSummary: { coordinate_scalar: { min: -100, max: 1, mean: -50, std: 50 } },
    });
    const check = byName(validator.validateTraceHeaders(info), "Coordinate Scalar Consistency");
    expect(check).toMatchObject({ status: "WARNING", details: "Min: -100, Max: 1" });
  });

  test("should warn about all-zero and highly variable coordinates", () => {
    const info = makeFileInfo({
      traceHeaderSummary: {
        coordinate_scalar: { min: 1, max: 1, mean: 1, std: 0 },
        source_x: { min: 0, max: 0, mean: 0, std: 0 },
        source_y: { min: 10, max: 1000, mean: 100, std: 300 },
        cdp_x: { min: 5, max: 5, mean: 5, std: 0 },
      },
    });
    const checks = validator.validateTraceHeaders(info);
    expect(byName(checks, "Coordinate Range: source_x")?.message).toBe("source_x: all zeros");
    expect(byName(checks, "Coordinate Range: source_y")).toMatchObject({
      status: "WARNING",
      message: "source_y has high variability",
      details: "Min: 10, Max: 1000, Mean: 100, Std: 300",
    });
    // constant non-zero: no range check at all
    expect(byName(checks, "Coordinate Range: cdp_x")).toBeUndefined();
    expect(byName(checks, "Coordinate Range: cdp_y")?.message).toBe("cdp_y: all zeros");
  });

  test("should check scaled coordinates against bounds", () => {
    const bounded = new SegyValidator({ coordinateBounds: { xMin: 6000, xMax: 5000, yMax: 70_000 } });
    const result = bounded.validate(makeFileInfo());
    const bounds = result.checks.filter((c) => c.name.startsWith("Bounds Check"));
    expect(bounds.map((c) => c.message)).toEqual([
      "source_x min (5000) below bound (6000)",
      "source_x max (5000) above bound (5000)",
      "cdp_x min (5000) below bound (6000)",
      "cdp_x max (5000) above bound (5000)",
    ]);
    expect(result.overallStatus).toBe("WARNING");
  });

  test("should skip disabled categories", () => {
    const structureOnly = new SegyValidator({
      checkBinaryHeader: false,
      checkTraceHeader: false,
      coordinateBounds: { xMin: 1e9 },
      checkCoordinateRange: false,
    });
    expect(structureOnly.validate(makeFileInfo()).checks.map((c) => c.category)).toEqual(["structure", "structure"]);
  });

  test("should report binary fields that changed without being edited", () => {
    const before = makeFileInfo();
    const after = makeFileInfo({
      binaryHeader: { sample_interval: 4000, samples_per_trace: 50, format_code: 5 },
      sampleInterval: 4000,
      formatCode: 5,
    });
    const result = validator.validatePostEdit(before, after, new Set(["sample_interval"]));
    const drift = result.checks.filter((c) => c.category === "post_edit");
    expect(drift).toEqual([
      {
        name: "Unintended Change: format_code",
        category: "post_edit",
        status: "WARNING",
        message: "Binary header 'format_code' changed unexpectedly",
        details: "Before: 1, After: 5",
      },
    ]);
    expect(result.overallStatus).toBe("WARNING");
  });

  test("should not check drift without edited fields", () => {
    const after = makeFileInfo({ binaryHeader: { sample_interval: 1, samples_per_trace: 50, format_code: 1 } });
    const result = validator.validatePostEdit(makeFileInfo(), after);
    expect(result.checks.some((c) => c.category === "post_edit")).toBe(false);
  });
});

describe("withChecks", () => {
  test("should append and recompute the status", () => {
    const base = new SegyValidator().validate(makeFileInfo());
    const extra: ValidationCheck = { name: "x", category: "post_edit", status: "FAIL", message: "x" };
    const combined = withChecks(base, [extra]);
    expect(combined.overallStatus).toBe("FAIL");
    expect(combined.checks).toHaveLength(base.checks.length + 1);
    expect(withChecks(base, [])).toBe(base);
  });
});
