/**
 * segy-fixer - inspect, validate and batch-edit SEG-Y seismic file headers
 *
 * Reads the textual, binary and trace headers of SEG-Y files, checks them
 * for structural problems, and applies header edits (literal values, safe
 * expressions, field copies, CSV imports) to copies or backed-up originals.
 */

// Error types
export {
  ConfigError,
  CsvImportError,
  DivisionByZeroError,
  describeError,
  ExpressionError,
  FieldRangeError,
  FieldResolutionError,
  FileError,
  SegyError,
  SegyOpenError,
  TraceEditError,
} from "./errors";
export type { ExpressionErrorKind } from "./errors";
// Data model
export * from "./types";
// Logging
export type { LogLevelName } from "./logging";
export {
  configureLogging,
  currentLoggingLayer,
  currentLogLevel,
  LogLevelNameSchema,
  logSync,
  makeLoggingLayer,
  parseLogLevel,
} from "./logging";
// Header codecs and field maps
export * from "./codec";
// Expression language
export * from "./expression";
// Editors
export * from "./editors";
// Validation
export * from "./validation";
// File access
export * from "./io";
// Pipeline
export * from "./engine";
