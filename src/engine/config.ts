/**
 * Engine configuration and declarative edit definitions
 *
 * Configuration files are JSON with snake_case keys:
 *
 * ```json
 * {
 *   "output_mode": "separate_folder",
 *   "output_dir": "./fixed",
 *   "validations": { "check_coordinate_range": true, "coordinate_bounds": { "x_min": 300000 } },
 *   "edits": [
 *     { "type": "binary_header", "fields": [{ "name": "sample_interval", "value": 4000 }] },
 *     { "type": "trace_header", "condition": "trace_index < 100",
 *       "fields": [{ "name": "cdp_x", "expression": "source_x * 10" }] }
 *   ]
 * }
 * ```
 */

import { type } from "arktype";
import { ConfigError, describeError } from "../errors";
import { readToString } from "../io/file-reader";
import { writeString } from "../io/file-writer";
import { LogLevelNameSchema } from "../logging";
import type { BinaryHeaderEdit, EbcdicEdit, EditJob, TraceHeaderEdit } from "../types";

// =============================================================================
// ENGINE CONFIG
// =============================================================================

const OutputModeSchema = type("'separate_folder'|'in_place_backup'");
const DtypeSchema = type("'int16'|'int32'|'uint16'|'uint32'|'float32'");

export const CoordinateBoundsSchema = type({
  "xMin?": "number",
  "xMax?": "number",
  "yMin?": "number",
  "yMax?": "number",
});

export const EngineConfigSchema = type({
  outputMode: OutputModeSchema,
  outputDir: "string>0",
  backupSuffix: "string>0",
  dryRun: "boolean",
  checks: {
    structure: "boolean",
    binaryHeader: "boolean",
    traceHeader: "boolean",
    coordinateRange: "boolean",
  },
  "coordinateBounds?": CoordinateBoundsSchema,
  logLevel: LogLevelNameSchema,
  previewTraces: "number.integer>0",
});

export type EngineConfig = typeof EngineConfigSchema.infer;

/**
 * Partial configuration; `checks` may itself be partial
 */
export type EngineConfigInput = Partial<Omit<EngineConfig, "checks">> & {
  readonly checks?: Partial<EngineConfig["checks"]>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  outputMode: "separate_folder",
  outputDir: "./output",
  backupSuffix: ".bak",
  dryRun: false,
  checks: {
    structure: true,
    binaryHeader: true,
    traceHeader: true,
    coordinateRange: false,
  },
  logLevel: "info",
  previewTraces: 20,
};

// Keys explicitly set to undefined do not override defaults
function withoutUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = { ...value };
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) Reflect.deleteProperty(result, key);
  }
  return result;
}

/**
 * Merge overrides over the defaults and validate the result
 *
 * @throws {ConfigError} If the merged configuration is invalid
 */
export function mergeEngineConfig(
  overrides: EngineConfigInput = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const { checks, coordinateBounds, ...rest } = overrides;
  const bounds = coordinateBounds ?? base.coordinateBounds;
  const merged = {
    ...base,
    ...withoutUndefined(rest),
    checks: { ...base.checks, ...withoutUndefined(checks ?? {}) },
    ...(bounds === undefined ? {} : { coordinateBounds: withoutUndefined(bounds) }),
  };

  const validationResult = EngineConfigSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ConfigError(`Invalid engine configuration: ${validationResult.summary}`);
  }
  return validationResult;
}

// =============================================================================
// EDIT DEFINITIONS
// =============================================================================

const FieldEditSchema = type({
  "name?": "string",
  "offset?": "number.integer>0",
  "dtype?": DtypeSchema,
  "value?": "number",
  "expression?": "string",
  "copy_from?": "string",
  "csv_file?": "string",
  "csv_column?": "string",
});

const EbcdicDefinitionSchema = type({
  type: "'ebcdic'",
  "mode?": "'lines'|'template'",
  "lines?": "Record<string, string>",
  "template?": "string",
  "replacements?": "Record<string, string>",
});

const BinaryDefinitionSchema = type({
  type: "'binary_header'",
  fields: FieldEditSchema.array(),
});

const TraceDefinitionSchema = type({
  type: "'trace_header'",
  "condition?": "string",
  fields: FieldEditSchema.array(),
});

export const EditDefinitionSchema = EbcdicDefinitionSchema.or(BinaryDefinitionSchema).or(TraceDefinitionSchema);

export type EditDefinition = typeof EditDefinitionSchema.infer;
type FieldEditDefinition = typeof FieldEditSchema.infer;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

function ebcdicEdit(definition: typeof EbcdicDefinitionSchema.infer): EbcdicEdit {
  if (definition.mode === "template") {
    return {
      mode: "template",
      templatePath: definition.template ?? "",
      replacements: definition.replacements ?? {},
    };
  }
  const lines: Record<number, string> = {};
  for (const [key, text] of Object.entries(definition.lines ?? {})) {
    const index = Number(key);
    if (!Number.isInteger(index)) {
      throw new ConfigError(`Textual header line index must be an integer, got '${key}'`);
    }
    lines[index] = text;
  }
  return { mode: "lines", lines };
}

function binaryEdit(field: FieldEditDefinition): BinaryHeaderEdit {
  return {
    fieldName: field.name,
    byteOffset: field.offset,
    value: field.value ?? 0,
    dtype: field.dtype ?? "int16",
  };
}

function traceEdit(field: FieldEditDefinition, condition: string | undefined): TraceHeaderEdit {
  const base = {
    fieldName: field.name,
    byteOffset: field.offset,
    dtype: field.dtype ?? "int32",
    condition,
  } as const;

  if (field.expression !== undefined) {
    return { ...base, mode: "expression", expression: field.expression };
  }
  if (field.copy_from !== undefined) {
    return { ...base, mode: "copy", sourceField: field.copy_from };
  }
  if (field.csv_file !== undefined) {
    return { ...base, mode: "csv_import", csvPath: field.csv_file, csvColumn: nonEmpty(field.csv_column) };
  }
  return { ...base, mode: "set", value: field.value ?? 0 };
}

/**
 * Convert declarative edit definitions into an EditJob
 *
 * A trace group's condition applies to every field in the group.
 */
export function buildEditJob(definitions: readonly EditDefinition[]): EditJob {
  const ebcdicEdits: EbcdicEdit[] = [];
  const binaryEdits: BinaryHeaderEdit[] = [];
  const traceEdits: TraceHeaderEdit[] = [];

  for (const definition of definitions) {
    switch (definition.type) {
      case "ebcdic":
        ebcdicEdits.push(ebcdicEdit(definition));
        break;
      case "binary_header":
        binaryEdits.push(...definition.fields.map(binaryEdit));
        break;
      case "trace_header": {
        const condition = nonEmpty(definition.condition);
        traceEdits.push(...definition.fields.map((field) => traceEdit(field, condition)));
        break;
      }
    }
  }

  return { ebcdicEdits, binaryEdits, traceEdits };
}

// =============================================================================
// CONFIG FILES
// =============================================================================

export const ConfigFileSchema = type({
  "output_mode?": OutputModeSchema,
  "output_dir?": "string>0",
  "backup?": "boolean",
  "backup_suffix?": "string>0",
  "dry_run?": "boolean",
  "log_level?": LogLevelNameSchema,
  "preview_traces?": "number.integer>0",
  "validations?": {
    "check_file_structure?": "boolean",
    "check_binary_header?": "boolean",
    "check_trace_header?": "boolean",
    "check_coordinate_range?": "boolean",
    "coordinate_bounds?": {
      "x_min?": "number",
      "x_max?": "number",
      "y_min?": "number",
      "y_max?": "number",
    },
  },
  "edits?": EditDefinitionSchema.array(),
});

export type ConfigFile = typeof ConfigFileSchema.infer;

/**
 * Engine configuration and edit job described by a parsed config file
 *
 * `backup: true` selects in-place editing with a backup copy.
 *
 * @throws {ConfigError} If the data does not match the config file schema
 */
export function parseConfigFile(data: unknown, source?: string): { config: EngineConfig; job: EditJob } {
  const parsed = ConfigFileSchema(data);
  if (parsed instanceof type.errors) {
    throw new ConfigError(`Invalid configuration: ${parsed.summary}`, source);
  }

  const validations = parsed.validations ?? {};
  const bounds = validations.coordinate_bounds;
  const config = mergeEngineConfig({
    outputMode: parsed.backup === true ? "in_place_backup" : parsed.output_mode,
    outputDir: parsed.output_dir,
    backupSuffix: parsed.backup_suffix,
    dryRun: parsed.dry_run,
    logLevel: parsed.log_level,
    previewTraces: parsed.preview_traces,
    checks: {
      structure: validations.check_file_structure,
      binaryHeader: validations.check_binary_header,
      traceHeader: validations.check_trace_header,
      coordinateRange: validations.check_coordinate_range,
    },
    coordinateBounds:
      bounds === undefined
        ? undefined
        : { xMin: bounds.x_min, xMax: bounds.x_max, yMin: bounds.y_min, yMax: bounds.y_max },
  });

  return { config, job: buildEditJob(parsed.edits ?? []) };
}

/**
 * Load a JSON configuration file
 *
 * @throws {FileError} If the file cannot be read
 * @throws {ConfigError} If it is not valid JSON or fails validation
 */
export async function loadEngineConfig(path: string): Promise<{ config: EngineConfig; job: EditJob }> {
  const text = await readToString(path);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration is not valid JSON: ${describeError(error)}`, path);
  }
  return parseConfigFile(data, path);
}

/**
 * Write engine settings and raw edit definitions as a JSON config file
 */
export async function saveEngineConfig(
  path: string,
  config: EngineConfig,
  edits: readonly EditDefinition[] = []
): Promise<void> {
  const bounds = config.coordinateBounds;
  const data: ConfigFile = {
    output_mode: config.outputMode,
    output_dir: config.outputDir,
    backup_suffix: config.backupSuffix,
    dry_run: config.dryRun,
    log_level: config.logLevel,
    preview_traces: config.previewTraces,
    validations: {
      check_file_structure: config.checks.structure,
      check_binary_header: config.checks.binaryHeader,
      check_trace_header: config.checks.traceHeader,
      check_coordinate_range: config.checks.coordinateRange,
      ...(bounds === undefined
        ? {}
        : { coordinate_bounds: { x_min: bounds.xMin, x_max: bounds.xMax, y_min: bounds.yMin, y_max: bounds.yMax } }),
    },
    edits: [...edits],
  };
  await writeString(path, `${JSON.stringify(data, null, 2)}\n`);
}
