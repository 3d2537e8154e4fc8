/**
 * Binary field primitives for SEG-Y headers
 *
 * SEG-Y stores header integers big-endian. Little-endian reading exists
 * only for non-conformant files; a handle writes in whichever order it
 * was opened with.
 */

import { FieldRangeError, SegyError } from "../errors";
import type { Endianness, FieldDefinition, FieldWidth } from "../types";

const INT16_MIN = -32768;
const INT16_MAX = 32767;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Bytes occupied by a field width
 */
export function widthBytes(width: FieldWidth): 2 | 4 {
  return width === "int16" ? 2 : 4;
}

function assertInBounds(view: DataView, offset: number, size: number): void {
  if (offset < 0 || offset + size > view.byteLength) {
    throw new SegyError(
      `Cannot access ${size} bytes at offset ${offset}: buffer too small (${view.byteLength} bytes)`,
      "BUFFER_ERROR"
    );
  }
}

/**
 * Read a 16-bit signed integer
 * @throws {SegyError} If offset is out of bounds
 */
export function readInt16(view: DataView, offset: number, endianness: Endianness = "big"): number {
  assertInBounds(view, offset, 2);
  return view.getInt16(offset, endianness === "little");
}

/**
 * Read a 32-bit signed integer
 * @throws {SegyError} If offset is out of bounds
 */
export function readInt32(view: DataView, offset: number, endianness: Endianness = "big"): number {
  assertInBounds(view, offset, 4);
  return view.getInt32(offset, endianness === "little");
}

/**
 * Whether a value is an integer representable in the given width
 */
export function fitsWidth(value: number, width: FieldWidth): boolean {
  if (!Number.isInteger(value)) return false;
  return width === "int16"
    ? value >= INT16_MIN && value <= INT16_MAX
    : value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Read a field from a header buffer
 *
 * @param view Header bytes (400-byte binary header or 240-byte trace header)
 * @param field Field map entry; its 1-based offset is converted here
 */
export function readField(view: DataView, field: FieldDefinition, endianness: Endianness = "big"): number {
  const offset = field.byteOffset - 1;
  return field.width === "int16" ? readInt16(view, offset, endianness) : readInt32(view, offset, endianness);
}

/**
 * Write a field into a header buffer
 *
 * @throws {FieldRangeError} If the value is not an integer that fits the field width
 */
export function writeField(
  view: DataView,
  field: FieldDefinition,
  value: number,
  endianness: Endianness = "big"
): void {
  if (!fitsWidth(value, field.width)) {
    throw new FieldRangeError(field.name, value, field.width);
  }
  const offset = field.byteOffset - 1;
  const littleEndian = endianness === "little";
  assertInBounds(view, offset, widthBytes(field.width));
  if (field.width === "int16") {
    view.setInt16(offset, value, littleEndian);
  } else {
    view.setInt32(offset, value, littleEndian);
  }
}

/**
 * DataView over the exact bytes of a Uint8Array
 */
export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export const BinaryCodec = {
  widthBytes,
  readInt16,
  readInt32,
  fitsWidth,
  readField,
  writeField,
  viewOf,
} as const;
