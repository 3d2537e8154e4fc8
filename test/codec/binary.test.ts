/**
 * Tests for header field primitives and format codes
 */

import { describe, expect, test } from "vitest";
import { fitsWidth, readField, readInt16, viewOf, widthBytes, writeField } from "../../src/codec/binary";
import { BINARY_FIELD_MAP } from "../../src/codec/field-maps";
import { bytesPerSample, expectedFileSize, formatName, isKnownFormat } from "../../src/codec/formats";
import { FieldRangeError, SegyError } from "../../src/errors";

const SAMPLE_INTERVAL = BINARY_FIELD_MAP.resolve({ fieldName: "sample_interval" });
const JOB_ID = BINARY_FIELD_MAP.resolve({ fieldName: "job_id" });

describe("field codec", () => {
  test("should write big-endian by default at the 1-based offset", () => {
    const bytes = new Uint8Array(400);
    writeField(viewOf(bytes), SAMPLE_INTERVAL, 2000);
    expect(bytes[16]).toBe(0x07);
    expect(bytes[17]).toBe(0xd0);
    expect(readField(viewOf(bytes), SAMPLE_INTERVAL)).toBe(2000);
  });

  test("should honour little-endian order", () => {
    const bytes = new Uint8Array(400);
    writeField(viewOf(bytes), SAMPLE_INTERVAL, 2000, "little");
    expect(bytes[16]).toBe(0xd0);
    expect(bytes[17]).toBe(0x07);
    expect(readField(viewOf(bytes), SAMPLE_INTERVAL, "little")).toBe(2000);
    expect(readField(viewOf(bytes), SAMPLE_INTERVAL, "big")).toBe(-12281);
  });

  test("should read negative 32-bit values", () => {
    const bytes = new Uint8Array(400);
    writeField(viewOf(bytes), JOB_ID, -42);
    expect(readField(viewOf(bytes), JOB_ID)).toBe(-42);
  });

  test("should reject values outside the field width", () => {
    const bytes = new Uint8Array(400);
    expect(() => writeField(viewOf(bytes), SAMPLE_INTERVAL, 40000)).toThrow(FieldRangeError);
    expect(() => writeField(viewOf(bytes), SAMPLE_INTERVAL, 1.5)).toThrow(
      "Value 1.5 does not fit int16 field 'sample_interval'"
    );
  });

  test("should reject reads past the buffer", () => {
    expect(() => readInt16(new DataView(new ArrayBuffer(2)), 1)).toThrow(SegyError);
  });

  test("should know width limits", () => {
    expect(widthBytes("int16")).toBe(2);
    expect(widthBytes("int32")).toBe(4);
    expect(fitsWidth(32767, "int16")).toBe(true);
    expect(fitsWidth(-32769, "int16")).toBe(false);
    expect(fitsWidth(2147483647, "int32")).toBe(true);
    expect(fitsWidth(2147483648, "int32")).toBe(false);
  });

  test("should respect the subarray window of a view", () => {
    const bytes = new Uint8Array(10);
    bytes[4] = 0x01;
    bytes[5] = 0x02;
    expect(readInt16(viewOf(bytes.subarray(4)), 0)).toBe(0x0102);
  });
});

describe("format codes", () => {
  test("should map known codes to sample widths", () => {
    expect(bytesPerSample(1)).toBe(4);
    expect(bytesPerSample(3)).toBe(2);
    expect(bytesPerSample(6)).toBe(8);
    expect(bytesPerSample(8)).toBe(1);
    expect(bytesPerSample(99)).toBe(4);
  });

  test("should name known and unknown codes", () => {
    expect(isKnownFormat(5)).toBe(true);
    expect(isKnownFormat(4)).toBe(false);
    expect(formatName(5)).toBe("IEEE Float (4-byte)");
    expect(formatName(99)).toBe("Unknown (99)");
  });

  test("should compute the expected file size", () => {
    expect(expectedFileSize(3, 50, 4)).toBe(4920);
    expect(expectedFileSize(0, 50, 4)).toBe(3600);
    expect(expectedFileSize(3, 0, 4)).toBe(0);
  });
});
