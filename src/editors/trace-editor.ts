/**
 * Trace header batch editor
 *
 * One edit runs as a single sequential pass over every trace. Per-trace
 * failures are collected and reported together after the pass; traces
 * already written stay written.
 */

import { readField } from "../codec/binary";
import { TRACE_FIELD_MAP, TRACE_INDEX_VARIABLE, traceExpressionVariables } from "../codec/field-maps";
import { describeError, FieldResolutionError, TraceEditError } from "../errors";
import type { CompiledExpression, Variables } from "../expression";
import { compileExpression, roundHalfEven, validateExpression } from "../expression";
import { exists } from "../io/file-reader";
import type { SegyHandle } from "../io/segy-handle";
import type {
  ChangeRecord,
  Endianness,
  FieldDefinition,
  ProgressCallback,
  TraceHeaderEdit,
  TracePreviewRow,
} from "../types";
import { isoTimestamp } from "../types";
import type { ChangeRecordPolicy } from "./change-policy";
import { SampledChangePolicy } from "./change-policy";
import type { CsvTable } from "./csv-import";
import { loadCsvTable } from "./csv-import";

/** Traces between progress reports */
export const PROGRESS_INTERVAL = 500;
/** Per-trace error messages kept for the aggregate error */
export const MAX_STORED_ERRORS = 10;
/** Traces shown by a preview unless told otherwise */
export const DEFAULT_PREVIEW_TRACES = 20;

export interface TraceEditOptions {
  readonly filename?: string;
  readonly onProgress?: ProgressCallback;
  readonly policy?: ChangeRecordPolicy;
}

/**
 * Everything an edit needs per trace, prepared once before the loop
 */
interface PreparedEdit {
  readonly target: FieldDefinition;
  readonly displayName: string;
  readonly condition?: CompiledExpression;
  /** New value for a trace, or undefined to leave it alone */
  readonly compute: (index: number, variables: () => Variables) => number | undefined;
}

/**
 * Expression environment for one trace: every trace field plus `trace_index`
 */
export function traceVariables(header: DataView, index: number, endianness: Endianness): Record<string, number> {
  const variables: Record<string, number> = { [TRACE_INDEX_VARIABLE]: index };
  for (const field of TRACE_FIELD_MAP.fields) {
    variables[field.name] = readField(header, field, endianness);
  }
  return variables;
}

export class TraceHeaderEditor {
  /**
   * @throws {FieldResolutionError} If neither name nor offset resolves
   */
  resolveField(edit: TraceHeaderEdit): FieldDefinition {
    return TRACE_FIELD_MAP.resolve(edit);
  }

  getDisplayName(edit: TraceHeaderEdit): string {
    return TRACE_FIELD_MAP.displayName(edit);
  }

  /**
   * Apply an edit to every trace that passes its condition
   *
   * Traces whose value would not change are not written and not recorded.
   *
   * @throws {FieldResolutionError} If the target or copy source does not resolve (before any write)
   * @throws {ExpressionError} If the expression or condition does not parse (before any write)
   * @throws {TraceEditError} After the pass, if any trace failed
   */
  async applyEdit(handle: SegyHandle, edit: TraceHeaderEdit, options: TraceEditOptions = {}): Promise<ChangeRecord[]> {
    const { filename = "", onProgress } = options;
    const policy = options.policy ?? new SampledChangePolicy();
    const prepared = await this.prepare(handle, edit);
    const total = handle.traceCount;
    const changes: ChangeRecord[] = [];
    const errors: string[] = [];
    let errorCount = 0;

    for await (const { index, header } of handle.traceHeaders()) {
      if (onProgress !== undefined && index % PROGRESS_INTERVAL === 0) {
        onProgress(index, total);
      }

      try {
        let cached: Variables | undefined;
        const variables = (): Variables => {
          cached ??= traceVariables(header, index, handle.endianness);
          return cached;
        };

        if (prepared.condition !== undefined && !prepared.condition.evaluateCondition(variables())) {
          continue;
        }

        const before = readField(header, prepared.target, handle.endianness);
        const after = prepared.compute(index, variables);
        if (after === undefined || after === before) continue;

        await handle.writeTraceField(index, prepared.target, after);
        if (policy.shouldRecord(changes.length, index)) {
          changes.push({
            filename,
            timestamp: isoTimestamp(),
            fieldType: "trace_header",
            fieldName: prepared.displayName,
            traceIndex: index,
            beforeValue: String(before),
            afterValue: String(after),
          });
        }
      } catch (error) {
        errorCount++;
        if (errors.length < MAX_STORED_ERRORS) {
          errors.push(`Trace ${index}: ${describeError(error)}`);
        }
      }
    }

    onProgress?.(total, total);
    await handle.sync();

    if (errorCount > 0) {
      throw new TraceEditError(prepared.displayName, errors, errorCount);
    }
    return changes;
  }

  /**
   * Compute the edit for the first traces without writing
   *
   * Always traces 0..maxTraces-1. A trace that fails is shown as skipped
   * with zero values.
   */
  async previewEdit(
    handle: SegyHandle,
    edit: TraceHeaderEdit,
    maxTraces = DEFAULT_PREVIEW_TRACES
  ): Promise<TracePreviewRow[]> {
    const prepared = await this.prepare(handle, edit);
    const field = prepared.displayName;
    const rows: TracePreviewRow[] = [];

    for await (const { index, header } of handle.traceHeaders(0, maxTraces)) {
      try {
        const variables = traceVariables(header, index, handle.endianness);
        const current = readField(header, prepared.target, handle.endianness);
        if (prepared.condition !== undefined && !prepared.condition.evaluateCondition(variables)) {
          rows.push({ trace: index, field, current, new: current, changed: false, skipped: true });
          continue;
        }
        const next = prepared.compute(index, () => variables) ?? current;
        rows.push({ trace: index, field, current, new: next, changed: next !== current, skipped: false });
      } catch {
        rows.push({ trace: index, field, current: 0, new: 0, changed: false, skipped: true });
      }
    }
    return rows;
  }

  /**
   * Static checks run before any file is touched
   *
   * @returns Error message, or undefined if the edit is valid
   */
  async validateEdit(edit: TraceHeaderEdit): Promise<string | undefined> {
    if (TRACE_FIELD_MAP.tryResolve(edit) === undefined) {
      if (edit.byteOffset === undefined && edit.fieldName !== undefined && edit.fieldName !== "") {
        return `Unknown field: '${edit.fieldName}'`;
      }
      return new FieldResolutionError("trace_header", edit.fieldName ?? "", edit.byteOffset).message;
    }

    const available = traceExpressionVariables();

    if (edit.mode === "expression") {
      const problem = validateExpression(edit.expression, available);
      if (problem !== undefined) return `Expression error: ${problem}`;
    }

    if (edit.condition !== undefined && edit.condition !== "") {
      const problem = validateExpression(edit.condition, available);
      if (problem !== undefined) return `Condition error: ${problem}`;
    }

    if (edit.mode === "csv_import" && !(await exists(edit.csvPath))) {
      return `CSV file not found: ${edit.csvPath}`;
    }

    if (edit.mode === "copy" && !TRACE_FIELD_MAP.has(edit.sourceField)) {
      return `Unknown source field: '${edit.sourceField}'`;
    }

    return undefined;
  }

  listFields(): ReturnType<typeof TRACE_FIELD_MAP.describe> {
    return TRACE_FIELD_MAP.describe();
  }

  private async prepare(handle: SegyHandle, edit: TraceHeaderEdit): Promise<PreparedEdit> {
    const target = this.resolveField(edit);
    const displayName = this.getDisplayName(edit);
    const condition =
      edit.condition !== undefined && edit.condition.trim() !== "" ? compileExpression(edit.condition) : undefined;

    switch (edit.mode) {
      case "set": {
        const value = Math.trunc(edit.value);
        return { target, displayName, condition, compute: () => value };
      }

      case "expression": {
        const expression = compileExpression(edit.expression);
        return {
          target,
          displayName,
          condition,
          compute: (_index, variables) => roundHalfEven(expression.evaluate(variables())),
        };
      }

      case "copy": {
        const source = TRACE_FIELD_MAP.resolve({ fieldName: edit.sourceField });
        // Read before any write so the copy sees the field as it was
        const values = await handle.readColumn(source);
        return { target, displayName, condition, compute: (index) => values[index] };
      }

      case "csv_import": {
        const table: CsvTable = await loadCsvTable(edit.csvPath);
        const column = [edit.csvColumn, edit.fieldName].find((name) => name !== undefined && name !== "") ?? target.name;
        return { target, displayName, condition, compute: (index) => table.numberAt(index, column) };
      }
    }
  }
}
