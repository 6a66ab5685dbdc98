/**
 * Error handling for the extraction and validation pipeline
 *
 * Every fatal condition carries the unit of work it affects (a sample, a
 * stage, a file) so the message alone identifies what to look at.
 */

/**
 * Base error class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly unit?: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PipelineError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.unit !== undefined && this.unit !== "") {
      msg += ` [${this.unit}]`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Missing or invalid required input, unreadable file, or parameter out of range
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, unit?: string, context?: string) {
    super(message, "CONFIGURATION_ERROR", unit, context);
    this.name = "ConfigurationError";
  }

  static forField(field: string, detail: string): ConfigurationError {
    return new ConfigurationError(`Invalid value for ${field}: ${detail}`, field);
  }
}

/**
 * A sample's alignment table or raw sequence source is absent.
 * Fatal to that sample's task only.
 */
export class InputMissingError extends PipelineError {
  constructor(
    message: string,
    public readonly sample: string,
    public readonly path: string
  ) {
    super(message, "INPUT_MISSING", sample, `Path: ${path}`);
    this.name = "InputMissingError";
  }
}

/**
 * Zero usable records reached a stage that cannot proceed on empty input
 */
export class NoDataError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: string,
    context?: string
  ) {
    super(message, "NO_DATA", stage, context);
    this.name = "NoDataError";
  }
}

/**
 * An external engine exited abnormally or could not be started. Not retried.
 */
export class DownstreamToolFailure extends PipelineError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly exitCode?: number,
    context?: string
  ) {
    super(message, "DOWNSTREAM_TOOL_FAILURE", tool, context);
    this.name = "DownstreamToolFailure";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    return msg;
  }
}

/**
 * A barrier wait exceeded the caller's timeout before every unit finished
 */
export class BarrierTimeoutError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly missing: readonly string[]
  ) {
    super(message, "BARRIER_TIMEOUT", stage, `Still waiting on: ${missing.join(", ")}`);
    this.name = "BarrierTimeoutError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "list" | "remove",
    public readonly systemError?: unknown
  ) {
    super(message, "FILE_ERROR", filePath);
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
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Format-specific parsing errors
 */
export class ParseError extends PipelineError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", format, context);
    this.name = "ParseError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    return msg;
  }
}

/**
 * Decompression failures on gzip inputs
 */
export class CompressionError extends PipelineError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress"
  ) {
    super(message, "COMPRESSION_ERROR", format);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const lower = errorMessage.toLowerCase();
    const hint =
      lower.includes("header") || lower.includes("magic")
        ? ". File may be corrupted or not actually gzip compressed"
        : lower.includes("unexpected end")
          ? ". File appears to be truncated"
          : "";
    return new CompressionError(`${operation} failed for ${format}: ${errorMessage}${hint}`, format, operation);
  }
}

/**
 * Whether a thrown value belongs to this package's taxonomy
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
