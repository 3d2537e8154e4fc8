/**
 * Textual header editor
 *
 * Stateless: every operation takes the current 40 lines and returns new
 * ones. Template text must be loaded (see `loadTemplate`) before a template
 * edit is applied.
 */

import { applyTemplate, COLS, decodeTextualHeader, encodeTextualHeader, LINES, normalizeLines } from "../codec/textual-header";
import { ConfigError } from "../errors";
import { readToString } from "../io/file-reader";
import type { ChangeRecord, EbcdicEdit, EbcdicPreview, TextEncoding } from "../types";
import { isoTimestamp } from "../types";

export class EbcdicEditor {
  getLines(raw: Uint8Array): string[] {
    return decodeTextualHeader(raw);
  }

  /**
   * Apply one edit to the current lines
   *
   * Line indices outside 0..39 are ignored.
   *
   * @throws {ConfigError} For a template edit whose text has not been loaded
   */
  applyEdit(currentLines: readonly string[], edit: EbcdicEdit): string[] {
    if (edit.mode === "template") {
      if (edit.templateText === undefined) {
        throw new ConfigError(
          "Template text is required for template mode",
          edit.templatePath ?? "ebcdic template"
        );
      }
      return applyTemplate(edit.templateText, edit.replacements);
    }

    const lines = normalizeLines(currentLines);
    for (const [key, text] of Object.entries(edit.lines)) {
      const index = Number(key);
      if (Number.isInteger(index) && index >= 0 && index < LINES) {
        lines[index] = text.slice(0, COLS).padEnd(COLS, " ");
      }
    }
    return lines;
  }

  /**
   * New lines plus the indices that differ from the current ones
   */
  preview(currentLines: readonly string[], edit: EbcdicEdit): { lines: string[]; changed: number[] } {
    const lines = this.applyEdit(currentLines, edit);
    return { lines, changed: changedIndices(currentLines, lines) };
  }

  /**
   * Preview in the shape reported by a dry run
   */
  previewChanges(currentLines: readonly string[], edit: EbcdicEdit): EbcdicPreview {
    const { lines, changed } = this.preview(currentLines, edit);
    return {
      changedLines: changed,
      before: changed.map((i) => currentLines[i] ?? ""),
      after: changed.map((i) => lines[i] ?? ""),
    };
  }

  encode(lines: readonly string[], encoding: TextEncoding = "EBCDIC"): Uint8Array {
    return encodeTextualHeader(lines, encoding);
  }

  /**
   * One change record per differing line, named `line_01`..`line_40`
   */
  diff(before: readonly string[], after: readonly string[], filename: string): ChangeRecord[] {
    const timestamp = isoTimestamp();
    return changedIndices(before, after).map((i): ChangeRecord => ({
      filename,
      timestamp,
      fieldType: "ebcdic",
      fieldName: `line_${String(i + 1).padStart(2, "0")}`,
      beforeValue: (before[i] ?? "").trimEnd(),
      afterValue: (after[i] ?? "").trimEnd(),
    }));
  }

  /**
   * Fill in a template edit's text from its file
   *
   * @throws {ConfigError} If a template edit has neither text nor path
   * @throws {FileError} If the template cannot be read
   */
  async loadTemplate(edit: EbcdicEdit): Promise<EbcdicEdit> {
    if (edit.mode !== "template" || edit.templateText !== undefined) return edit;
    if (edit.templatePath === undefined || edit.templatePath === "") {
      throw new ConfigError("Template path is required for template mode");
    }
    return { ...edit, templateText: await readToString(edit.templatePath) };
  }
}

function changedIndices(before: readonly string[], after: readonly string[]): number[] {
  const changed: number[] = [];
  const count = Math.min(LINES, before.length, after.length);
  for (let i = 0; i < count; i++) {
    if (before[i] !== after[i]) changed.push(i);
  }
  return changed;
}
