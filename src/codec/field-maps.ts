/**
 * Binary header and trace header field maps
 *
 * Both maps are loaded once from field-maps.json and frozen. Byte offsets
 * are 1-based within their header and unique within each map; the name is
 * also the variable name exposed to expressions.
 */

import { type } from "arktype";
import { FieldResolutionError } from "../errors";
import type { FieldDefinition, FieldTarget, HeaderKind } from "../types";
import { BINARY_HEADER_SIZE, TEXTUAL_HEADER_SIZE, TRACE_HEADER_SIZE } from "../types";
import fieldMapData from "./field-maps.json";

const FieldDefinitionSchema = type({
  name: "string>0",
  width: "'int16'|'int32'",
  byteOffset: "number.integer>=1",
});

const FieldMapFileSchema = type({
  binary_header: FieldDefinitionSchema.array(),
  trace_header: FieldDefinitionSchema.array(),
});

/**
 * Ordered, immutable lookup table for one header
 */
export class FieldMap {
  private readonly byName: ReadonlyMap<string, FieldDefinition>;
  private readonly byOffset: ReadonlyMap<number, FieldDefinition>;

  public readonly fields: readonly FieldDefinition[];

  constructor(
    public readonly kind: HeaderKind,
    definitions: readonly FieldDefinition[],
    private readonly headerSize: number
  ) {
    this.fields = Object.freeze(definitions.map((field) => Object.freeze({ ...field })));
    const byName = new Map<string, FieldDefinition>();
    const byOffset = new Map<number, FieldDefinition>();
    for (const field of this.fields) {
      if (byName.has(field.name)) {
        throw new Error(`Duplicate ${kind} field name: ${field.name}`);
      }
      if (byOffset.has(field.byteOffset)) {
        throw new Error(`Duplicate ${kind} byte offset: ${field.byteOffset}`);
      }
      const end = field.byteOffset - 1 + (field.width === "int16" ? 2 : 4);
      if (end > headerSize) {
        throw new Error(`${kind} field ${field.name} extends past byte ${headerSize}`);
      }
      byName.set(field.name, field);
      byOffset.set(field.byteOffset, field);
    }
    this.byName = byName;
    this.byOffset = byOffset;
  }

  get names(): string[] {
    return this.fields.map((field) => field.name);
  }

  get size(): number {
    return this.headerSize;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  byFieldName(name: string): FieldDefinition | undefined {
    return this.byName.get(name);
  }

  byByteOffset(offset: number): FieldDefinition | undefined {
    return this.byOffset.get(offset);
  }

  /**
   * Resolve an edit target: name first, then byte offset
   *
   * @throws {FieldResolutionError} If neither matches an entry
   */
  resolve(target: FieldTarget): FieldDefinition {
    const resolved = this.tryResolve(target);
    if (resolved === undefined) {
      throw new FieldResolutionError(this.kind, target.fieldName ?? "", target.byteOffset);
    }
    return resolved;
  }

  tryResolve(target: FieldTarget): FieldDefinition | undefined {
    if (target.fieldName !== undefined && target.fieldName !== "") {
      const named = this.byName.get(target.fieldName);
      if (named !== undefined) return named;
    }
    if (target.byteOffset !== undefined) {
      return this.byOffset.get(this.normalizeOffset(target.byteOffset));
    }
    return undefined;
  }

  /**
   * Name used in change records and previews
   */
  displayName(target: FieldTarget): string {
    if (target.fieldName !== undefined && target.fieldName !== "" && this.byName.has(target.fieldName)) {
      return target.fieldName;
    }
    if (target.byteOffset !== undefined) {
      const offset = this.normalizeOffset(target.byteOffset);
      const field = this.byOffset.get(offset);
      return field !== undefined ? `${field.name} (byte ${offset})` : `byte_offset_${target.byteOffset}`;
    }
    return target.fieldName !== undefined && target.fieldName !== "" ? target.fieldName : "unknown";
  }

  /**
   * Field listing for pickers: description is the title-cased name
   */
  describe(): Array<{ name: string; dtype: string; byteOffset: number; description: string }> {
    return this.fields.map((field) => ({
      name: field.name,
      dtype: field.width,
      byteOffset: field.byteOffset,
      description: field.name
        .split("_")
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join(" "),
    }));
  }

  // Binary header offsets may also be given file-absolute (3201..3600)
  private normalizeOffset(offset: number): number {
    if (this.kind === "binary_header" && offset > TEXTUAL_HEADER_SIZE) {
      return offset - TEXTUAL_HEADER_SIZE;
    }
    return offset;
  }
}

function loadFieldMaps(): { binary: FieldMap; trace: FieldMap } {
  const parsed = FieldMapFileSchema(fieldMapData);
  if (parsed instanceof type.errors) {
    throw new Error(`Invalid field map table: ${parsed.summary}`);
  }
  return {
    binary: new FieldMap("binary_header", parsed.binary_header, BINARY_HEADER_SIZE),
    trace: new FieldMap("trace_header", parsed.trace_header, TRACE_HEADER_SIZE),
  };
}

const maps = loadFieldMaps();

/** Binary file header fields (offsets within the 400-byte header) */
export const BINARY_FIELD_MAP: FieldMap = maps.binary;

/** Trace header fields (offsets within the 240-byte header) */
export const TRACE_FIELD_MAP: FieldMap = maps.trace;

/** Synthetic expression variable holding the 0-based trace position */
export const TRACE_INDEX_VARIABLE = "trace_index";

/**
 * Variables available to trace header expressions and conditions
 */
export function traceExpressionVariables(): string[] {
  return [...TRACE_FIELD_MAP.names, TRACE_INDEX_VARIABLE];
}
