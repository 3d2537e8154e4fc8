/**
 * Textual file header codec
 *
 * The first 3200 bytes of a SEG-Y file hold 40 card images of 80
 * characters, in EBCDIC (IBM code page 500) or, for many modern files,
 * plain ASCII. Decoding detects which one by counting printable bytes.
 */

import { TEXTUAL_HEADER_SIZE, TextEncoding } from "../types";
import cp500 from "./cp500.json";

export const LINES = 40;
export const COLS = 80;

const EBCDIC_PRINTABLE_MIN = 0x40;
const EBCDIC_PRINTABLE_MAX = 0xfe;
const ASCII_PRINTABLE_MIN = 0x20;
const ASCII_PRINTABLE_MAX = 0x7e;
const REPLACEMENT_CHAR = "�";
const ASCII_SUBSTITUTE = 0x3f; // "?"
const EBCDIC_SUBSTITUTE = 0x6f; // "?" in cp500

const EBCDIC_DECODE: readonly string[] = cp500.table;
const EBCDIC_ENCODE: ReadonlyMap<string, number> = new Map(EBCDIC_DECODE.map((char, byte) => [char, byte]));

if (EBCDIC_DECODE.length !== 256) {
  throw new Error(`EBCDIC code page table must have 256 entries, found ${EBCDIC_DECODE.length}`);
}

/**
 * Detect whether a textual header is EBCDIC or ASCII
 *
 * EBCDIC wins only with strictly more bytes in 0x40-0xFE than ASCII has in
 * 0x20-0x7E; short buffers are reported as ASCII.
 */
export function detectEncoding(raw: Uint8Array): TextEncoding {
  if (raw.length < TEXTUAL_HEADER_SIZE) {
    return TextEncoding.ASCII;
  }
  let ebcdicPrintable = 0;
  let asciiPrintable = 0;
  for (let i = 0; i < TEXTUAL_HEADER_SIZE; i++) {
    const byte = raw[i] ?? 0;
    if (byte >= EBCDIC_PRINTABLE_MIN && byte <= EBCDIC_PRINTABLE_MAX) ebcdicPrintable++;
    if (byte >= ASCII_PRINTABLE_MIN && byte <= ASCII_PRINTABLE_MAX) asciiPrintable++;
  }
  return ebcdicPrintable > asciiPrintable ? TextEncoding.EBCDIC : TextEncoding.ASCII;
}

function decodeBytes(bytes: Uint8Array, encoding: TextEncoding): string {
  let text = "";
  for (const byte of bytes) {
    if (encoding === TextEncoding.EBCDIC) {
      text += EBCDIC_DECODE[byte] ?? REPLACEMENT_CHAR;
    } else {
      text += byte <= 0x7f ? String.fromCharCode(byte) : REPLACEMENT_CHAR;
    }
  }
  return text;
}

function encodeChar(char: string, encoding: TextEncoding): number {
  if (encoding === TextEncoding.EBCDIC) {
    return EBCDIC_ENCODE.get(char) ?? EBCDIC_SUBSTITUTE;
  }
  const code = char.charCodeAt(0);
  return code <= 0x7f ? code : ASCII_SUBSTITUTE;
}

/**
 * Pad or truncate a line to exactly 80 characters
 */
export function fitLine(line: string): string {
  return line.slice(0, COLS).padEnd(COLS, " ");
}

/**
 * Normalize to exactly 40 lines of 80 characters
 */
export function normalizeLines(lines: readonly string[]): string[] {
  const result = lines.slice(0, LINES).map(fitLine);
  while (result.length < LINES) {
    result.push(" ".repeat(COLS));
  }
  return result;
}

/**
 * Decode a 3200-byte textual header into 40 lines of 80 characters
 *
 * @param raw Header bytes; shorter input yields blank trailing lines
 * @param encoding Skip detection and force an encoding
 */
export function decodeTextualHeader(raw: Uint8Array, encoding: TextEncoding = detectEncoding(raw)): string[] {
  const text = decodeBytes(raw.subarray(0, TEXTUAL_HEADER_SIZE), encoding);
  const lines: string[] = [];
  for (let i = 0; i < LINES; i++) {
    lines.push(text.slice(i * COLS, (i + 1) * COLS));
  }
  return normalizeLines(lines);
}

/**
 * Encode up to 40 lines into exactly 3200 bytes
 *
 * Characters outside the target character set become "?".
 */
export function encodeTextualHeader(
  lines: readonly string[],
  encoding: TextEncoding = TextEncoding.EBCDIC
): Uint8Array {
  const out = new Uint8Array(TEXTUAL_HEADER_SIZE);
  const text = normalizeLines(lines).join("");
  for (let i = 0; i < TEXTUAL_HEADER_SIZE; i++) {
    out[i] = encodeChar(text.charAt(i), encoding);
  }
  return out;
}

/**
 * Substitute `{{key}}` placeholders and split into 40 × 80 lines
 */
export function applyTemplate(templateText: string, replacements: Readonly<Record<string, string>>): string[] {
  let text = templateText;
  for (const [key, value] of Object.entries(replacements)) {
    text = text.split(`{{${key}}}`).join(value);
  }
  return normalizeLines(text.split(/\r\n|\r|\n/));
}

/**
 * Render lines with card labels: `C01 ...` through `C40 ...`
 */
export function formatLinesDisplay(lines: readonly string[]): string {
  return lines.map((line, i) => `C${String(i + 1).padStart(2, "0")} ${line}`).join("\n");
}

export const TextualHeader = {
  LINES,
  COLS,
  detectEncoding,
  decodeTextualHeader,
  encodeTextualHeader,
  applyTemplate,
  normalizeLines,
  fitLine,
  formatLinesDisplay,
} as const;
