/**
 * Tests for CSV parsing used by trace header imports
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { loadCsvTable, parseCsv, parseCsvRow } from "../../src/editors/csv-import";
import { CsvImportError, FileError } from "../../src/errors";
import { makeTempDir, removeTempDir } from "../utils/segy-fixtures";

describe("parseCsvRow", () => {
  test("should split plain fields", () => {
    expect(parseCsvRow("a,b,c")).toEqual(["a", "b", "c"]);
  });

  test("should handle quoted fields with delimiters and escaped quotes", () => {
    expect(parseCsvRow('a,"b ""q"" c",d')).toEqual(["a", 'b "q" c', "d"]);
    expect(parseCsvRow('"x,y",3')).toEqual(["x,y", "3"]);
  });

  test("should keep empty fields", () => {
    expect(parseCsvRow("1,,3")).toEqual(["1", "", "3"]);
    expect(parseCsvRow("1,")).toEqual(["1", ""]);
  });

  test("should support other delimiters", () => {
    expect(parseCsvRow("1;2", ";")).toEqual(["1", "2"]);
  });

  test("should reject an unclosed quote", () => {
    expect(() => parseCsvRow('"open')).toThrow(CsvImportError);
  });
});

describe("parseCsv", () => {
  test("should read a header row and data rows", () => {
    const table = parseCsv("trace, cdp_x\n0,100\n1,200\n");
    expect(table.headers).toEqual(["trace", "cdp_x"]);
    expect(table.rowCount).toBe(2);
    expect(table.numberAt(1, "cdp_x")).toBe(200);
  });

  test("should strip a byte order mark and handle CRLF", () => {
    const table = parseCsv("\uFEFFx\r\n7\r\n");
    expect(table.hasColumn("x")).toBe(true);
    expect(table.numberAt(0, "x")).toBe(7);
  });

  test("should skip blank lines", () => {
    expect(parseCsv("x\n\n1\n\n2").rows).toEqual([["1"], ["2"]]);
  });

  test("should join quoted fields spanning lines", () => {
    expect(parseCsv('name,v\n"line1\nline2",5').rows).toEqual([["line1\nline2", "5"]]);
  });

  test("should treat a quote inside an unquoted field as text", () => {
    const table = parseCsv('cdp,label\n5,12" pipe\n6,plain\n');
    expect(table.rows).toEqual([["5", '12" pipe'], ["6", "plain"]]);
    expect(table.numberAt(1, "cdp")).toBe(6);
  });

  test("should still join a quoted field opened after a delimiter", () => {
    expect(parseCsv('a,b\n1,"x\ny"\n2,z').rows).toEqual([["1", "x\ny"], ["2", "z"]]);
  });

  test("should truncate numbers toward zero", () => {
    const table = parseCsv("v\n12.9\n-12.9\n1e2");
    expect([0, 1, 2].map((row) => table.numberAt(row, "v"))).toEqual([12, -12, 100]);
  });

  test("should give undefined for missing rows, columns and cells", () => {
    const table = parseCsv("a,b\n1,\n");
    expect(table.numberAt(0, "b")).toBeUndefined();
    expect(table.numberAt(5, "a")).toBeUndefined();
    expect(table.numberAt(0, "zz")).toBeUndefined();
  });

  test("should report non-numeric cells with file, line and column", () => {
    const table = parseCsv("a\nabc", "data.csv");
    expect(() => table.numberAt(0, "a")).toThrow(`Not a number: 'abc' (file data.csv, line 2, column "a")`);
  });

  test("should reject input without a header row", () => {
    expect(() => parseCsv("\n\n")).toThrow("CSV file has no header row");
  });

  test("should reject an unterminated quoted field", () => {
    expect(() => parseCsv('a\n"oops')).toThrow("Unclosed quote in CSV field (line 2)");
  });
});

describe("loadCsvTable", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test("should load a file from disk", async () => {
    const path = join(dir, "values.csv");
    await writeFile(path, "cdp\n5\n6\n");
    const table = await loadCsvTable(path);
    expect(table.source).toBe(path);
    expect(table.numberAt(1, "cdp")).toBe(6);
  });

  test("should raise FileError for a missing file", async () => {
    await expect(loadCsvTable(join(dir, "missing.csv"))).rejects.toBeInstanceOf(FileError);
  });
});
