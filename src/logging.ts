/**
 * Operator logging built on Effect's Logger
 *
 * Library code logs from inside the Effect programs it runs
 * (`Effect.logInfo`, `Effect.logDebug`, ...). Output is logfmt on stdout;
 * the minimum level comes from `configureLogging` or the SEGY_LOG_LEVEL
 * environment variable, `info` by default.
 */

import { type } from "arktype";
import { Effect, Layer, Logger, LogLevel } from "effect";
import { ConfigError } from "./errors";

export const LogLevelNameSchema = type("'all'|'trace'|'debug'|'info'|'warning'|'error'|'fatal'|'none'");

export type LogLevelName = typeof LogLevelNameSchema.infer;

const LITERALS: Record<LogLevelName, LogLevel.Literal> = {
  all: "All",
  trace: "Trace",
  debug: "Debug",
  info: "Info",
  warning: "Warning",
  error: "Error",
  fatal: "Fatal",
  none: "None",
};

/**
 * Parse a level name, e.g. from the environment
 *
 * @throws {ConfigError} On an unknown name
 */
export function parseLogLevel(name: string): LogLevelName {
  const parsed = LogLevelNameSchema(name.trim().toLowerCase());
  if (parsed instanceof type.errors) {
    throw new ConfigError(`Invalid log level '${name}': ${parsed.summary}`, "SEGY_LOG_LEVEL");
  }
  return parsed;
}

/**
 * Logger layer: logfmt output filtered at the given level
 */
export function makeLoggingLayer(level: LogLevelName): Layer.Layer<never> {
  return Layer.merge(Logger.logFmt, Logger.minimumLogLevel(LogLevel.fromLiteral(LITERALS[level])));
}

/**
 * Level named by an environment value, falling back to `info`
 *
 * An unusable value yields a warning instead of an error, so a bad
 * SEGY_LOG_LEVEL never stops the library from loading.
 */
export function resolveLogLevel(raw: string | undefined): { level: LogLevelName; warning?: string } {
  if (raw === undefined || raw.trim() === "") return { level: "info" };
  const parsed = LogLevelNameSchema(raw.trim().toLowerCase());
  if (parsed instanceof type.errors) {
    return { level: "info", warning: `Invalid SEGY_LOG_LEVEL '${raw}', using info` };
  }
  return { level: parsed };
}

const fromEnvironment = resolveLogLevel(process.env["SEGY_LOG_LEVEL"]);
let currentLevel: LogLevelName = fromEnvironment.level;
let currentLayer = makeLoggingLayer(currentLevel);
if (fromEnvironment.warning !== undefined) {
  logSync(Effect.logWarning(fromEnvironment.warning));
}

/**
 * Set the minimum level for all subsequent library logging
 */
export function configureLogging(level: LogLevelName): void {
  if (level === currentLevel) return;
  currentLevel = level;
  currentLayer = makeLoggingLayer(level);
}

export function currentLogLevel(): LogLevelName {
  return currentLevel;
}

export function currentLoggingLayer(): Layer.Layer<never> {
  return currentLayer;
}

/**
 * Run a self-contained logging effect outside any platform program
 */
export function logSync(effect: Effect.Effect<void>): void {
  Effect.runSync(effect.pipe(Effect.provide(currentLayer)));
}
