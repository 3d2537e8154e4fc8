/**
 * CSV tables for trace header import
 *
 * Rows are joined to traces by position: data row N (after the header row)
 * supplies trace N. Fields follow RFC 4180 (quoted fields, doubled quotes,
 * line breaks inside quotes).
 */

import { CsvImportError } from "../errors";
import { readToString } from "../io/file-reader";

enum ParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Split one logical CSV record into fields
 *
 * @throws {CsvImportError} On an unclosed quote
 */
export function parseCsvRow(line: string, delimiter = ",", quote = '"'): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = ParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case ParseState.FIELD_START:
        if (char === quote) {
          state = ParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = ParseState.UNQUOTED_FIELD;
        }
        break;

      case ParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = ParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case ParseState.QUOTED_FIELD:
        if (char === quote) {
          if (line.charAt(i + 1) === quote) {
            currentField += quote;
            i++;
          } else {
            state = ParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case ParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = ParseState.FIELD_START;
        } else {
          // Lenient: text after a closing quote joins the field
          currentField += char;
          state = ParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === ParseState.QUOTED_FIELD) {
    throw new CsvImportError("Unclosed quote in CSV field");
  }
  if (state === ParseState.UNQUOTED_FIELD || state === ParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }
  return fields;
}

/**
 * Whether text ends inside a quoted field
 *
 * A quote opens a field only at its start; quotes elsewhere in an unquoted
 * field are literal text.
 */
function endsInQuotedField(text: string, delimiter = ",", quote = '"'): boolean {
  let state = ParseState.FIELD_START;
  for (const char of text) {
    const boundary = char === delimiter || char === "\n";
    switch (state) {
      case ParseState.FIELD_START:
        if (char === quote) state = ParseState.QUOTED_FIELD;
        else if (!boundary) state = ParseState.UNQUOTED_FIELD;
        break;
      case ParseState.UNQUOTED_FIELD:
        if (boundary) state = ParseState.FIELD_START;
        break;
      case ParseState.QUOTED_FIELD:
        if (char === quote) state = ParseState.QUOTE_IN_QUOTED;
        break;
      case ParseState.QUOTE_IN_QUOTED:
        if (char === quote) state = ParseState.QUOTED_FIELD;
        else state = boundary ? ParseState.FIELD_START : ParseState.UNQUOTED_FIELD;
        break;
    }
  }
  return state === ParseState.QUOTED_FIELD;
}

/**
 * Parsed CSV: header row plus positional data rows
 */
export class CsvTable {
  private readonly columnIndex: ReadonlyMap<string, number>;

  constructor(
    public readonly headers: readonly string[],
    public readonly rows: readonly (readonly string[])[],
    public readonly source?: string
  ) {
    this.columnIndex = new Map(headers.map((name, i) => [name, i]));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.columnIndex.has(name);
  }

  /**
   * Numeric value at a data row, truncated toward zero
   *
   * @returns undefined when the row, the column or the cell is missing
   * @throws {CsvImportError} When the cell is not a number
   */
  numberAt(row: number, column: string): number | undefined {
    const col = this.columnIndex.get(column);
    const cells = this.rows[row];
    if (col === undefined || cells === undefined) return undefined;
    const text = (cells[col] ?? "").trim();
    if (text === "") return undefined;
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw new CsvImportError(`Not a number: '${text}'`, this.source, row + 2, column);
    }
    return Math.trunc(value);
  }
}

/**
 * Parse CSV text with a header row
 *
 * @throws {CsvImportError} If there is no header row or a quote is unclosed
 */
export function parseCsv(text: string, source?: string): CsvTable {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const physical = body.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");

  const records: { fields: string[]; line: number }[] = [];
  let pending = "";
  let startLine = 0;
  for (let i = 0; i < physical.length; i++) {
    const line = physical[i] ?? "";
    if (pending === "") startLine = i + 1;
    pending = pending === "" ? line : `${pending}\n${line}`;
    if (endsInQuotedField(pending)) continue;
    if (pending.trim() !== "") {
      try {
        records.push({ fields: parseCsvRow(pending), line: startLine });
      } catch (error) {
        throw new CsvImportError(
          error instanceof Error ? error.message : String(error),
          source,
          startLine
        );
      }
    }
    pending = "";
  }
  if (pending !== "") {
    throw new CsvImportError("Unclosed quote in CSV field", source, startLine);
  }

  const [header, ...rows] = records;
  if (header === undefined) {
    throw new CsvImportError("CSV file has no header row", source);
  }
  return new CsvTable(
    header.fields.map((name) => name.trim()),
    rows.map((row) => row.fields),
    source
  );
}

/**
 * Read and parse a CSV file
 *
 * @throws {FileError} If the file cannot be read
 * @throws {CsvImportError} If it cannot be parsed
 */
export async function loadCsvTable(path: string): Promise<CsvTable> {
  return parseCsv(await readToString(path), path);
}
