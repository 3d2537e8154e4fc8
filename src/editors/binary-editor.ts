/**
 * Binary file header editor
 */

import { Effect } from "effect";
import { BINARY_FIELD_MAP } from "../codec/field-maps";
import { describeError } from "../errors";
import type { SegyHandle } from "../io/segy-handle";
import { logSync } from "../logging";
import type { BinaryHeaderEdit, BinaryPreview, ChangeRecord, FieldDefinition } from "../types";
import { isoTimestamp } from "../types";

export class BinaryHeaderEditor {
  /**
   * Field an edit targets: by name, else by byte offset (relative or file-absolute)
   *
   * @throws {FieldResolutionError} If neither resolves
   */
  resolveField(edit: BinaryHeaderEdit): FieldDefinition {
    return BINARY_FIELD_MAP.resolve(edit);
  }

  getDisplayName(edit: BinaryHeaderEdit): string {
    return BINARY_FIELD_MAP.displayName(edit);
  }

  /**
   * Write the edit's value and record the change
   *
   * A current value that cannot be read is reported as 0. The record is
   * produced even when the value is unchanged.
   *
   * @throws {FieldResolutionError} If the target does not resolve
   * @throws {FieldRangeError} If the value does not fit the field
   */
  async applyEdit(handle: SegyHandle, edit: BinaryHeaderEdit, filename = ""): Promise<ChangeRecord> {
    const field = this.resolveField(edit);
    const value = Math.trunc(edit.value);

    let before = 0;
    try {
      before = await handle.readBinaryField(field);
    } catch (error) {
      logSync(Effect.logWarning(`Cannot read binary field ${field.name}, using 0: ${describeError(error)}`));
    }

    await handle.writeBinaryField(field, value);
    return {
      filename,
      timestamp: isoTimestamp(),
      fieldType: "binary_header",
      fieldName: this.getDisplayName(edit),
      beforeValue: String(before),
      afterValue: String(value),
    };
  }

  /**
   * Before/after against a snapshot of binary header values; touches no file
   */
  previewEdit(currentValues: Readonly<Record<string, number>>, edit: BinaryHeaderEdit): BinaryPreview {
    const field = BINARY_FIELD_MAP.tryResolve(edit);
    const key = field?.name ?? edit.fieldName ?? "";
    return {
      field: this.getDisplayName(edit),
      before: currentValues[key] ?? 0,
      after: Math.trunc(edit.value),
    };
  }

  listFields(): ReturnType<typeof BINARY_FIELD_MAP.describe> {
    return BINARY_FIELD_MAP.describe();
  }
}
