/**
 * Error handling for SEG-Y inspection and editing
 *
 * Every failure the library raises is a SegyError subclass with a stable
 * `code`, so callers (CLI, GUI, batch reports) can surface the message
 * verbatim and branch on the code.
 */

/**
 * Base error class for all segy-fixer errors
 */
export class SegyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly traceIndex?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SegyError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.traceIndex !== undefined) {
      msg += ` (trace ${this.traceIndex})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends SegyError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "copy" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = describeError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Raised when no open strategy could make sense of a file
 */
export class SegyOpenError extends SegyError {
  constructor(
    public readonly filePath: string,
    public readonly attempted: readonly string[],
    public readonly lastError?: unknown
  ) {
    super(
      `Cannot open SEG-Y file with any strategy: ${lastError !== undefined ? describeError(lastError) : "no strategy attempted"}`,
      "OPEN_ERROR",
      undefined,
      `Strategies tried: ${attempted.join(", ")}`
    );
    this.name = "SegyOpenError";
  }
}

/**
 * An edit target (or copy source) that matches no field map entry
 */
export class FieldResolutionError extends SegyError {
  constructor(
    public readonly header: "binary_header" | "trace_header",
    public readonly fieldName: string,
    public readonly byteOffset?: number
  ) {
    const label = header === "binary_header" ? "binary header" : "trace header";
    super(
      `Cannot resolve ${label} field: name='${fieldName}', offset=${byteOffset ?? "none"}`,
      "FIELD_RESOLUTION_ERROR"
    );
    this.name = "FieldResolutionError";
  }
}

/**
 * A value that does not fit the width of the field it is written to
 */
export class FieldRangeError extends SegyError {
  constructor(
    public readonly fieldName: string,
    public readonly value: number,
    public readonly width: string,
    traceIndex?: number
  ) {
    super(`Value ${value} does not fit ${width} field '${fieldName}'`, "FIELD_RANGE_ERROR", traceIndex);
    this.name = "FieldRangeError";
  }
}

/**
 * Failure kinds reported by the expression language
 */
export type ExpressionErrorKind =
  | "syntax"
  | "unknown_variable"
  | "unknown_function"
  | "unsupported"
  | "type"
  | "arity"
  | "division_by_zero";

/**
 * Expression parse or evaluation failure
 */
export class ExpressionError extends SegyError {
  constructor(
    message: string,
    public readonly kind: ExpressionErrorKind,
    public readonly expression?: string,
    public readonly position?: number
  ) {
    super(
      message,
      "EXPRESSION_ERROR",
      undefined,
      expression !== undefined && position !== undefined
        ? `${expression}\n${" ".repeat(position)}^`
        : expression
    );
    this.name = "ExpressionError";
  }
}

/**
 * Division or modulo by zero inside an expression
 */
export class DivisionByZeroError extends ExpressionError {
  override readonly code = "DIVISION_BY_ZERO";

  constructor(expression?: string) {
    super("Division by zero", "division_by_zero", expression);
    this.name = "DivisionByZeroError";
  }
}

/**
 * CSV import errors with line and column context
 */
export class CsvImportError extends SegyError {
  constructor(
    message: string,
    public readonly csvPath?: string,
    public readonly line?: number,
    public readonly column?: string
  ) {
    const context = [
      csvPath !== undefined && `file ${csvPath}`,
      line !== undefined && `line ${line}`,
      column !== undefined && `column "${column}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "CSV_IMPORT_ERROR");
    this.name = "CsvImportError";
  }
}

/**
 * Aggregate failure of a trace header pass
 *
 * Raised after the loop completes; traces processed before and after the
 * failing ones keep whatever was written to them.
 */
export class TraceEditError extends SegyError {
  constructor(
    public readonly fieldName: string,
    public readonly errors: readonly string[],
    public readonly totalErrors: number
  ) {
    const shown = errors.slice(0, 5).join("; ");
    const more = totalErrors > 5 ? ` ... (+${totalErrors - 5} more)` : "";
    super(`Errors during trace header edit '${fieldName}': ${shown}${more}`, "TRACE_EDIT_ERROR");
    this.name = "TraceEditError";
  }
}

/**
 * Configuration or edit definition rejected by schema validation
 */
export class ConfigError extends SegyError {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(message, "CONFIG_ERROR", undefined, source);
    this.name = "ConfigError";
  }
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
