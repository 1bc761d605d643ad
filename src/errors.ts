/**
 * Error handling for peptide mapping
 *
 * Configuration problems are raised before any matching or packing work
 * starts. Empty inputs are never errors; they produce empty results.
 */

/**
 * Base error class for all peptide-map errors
 */
export class PeptideMapError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PeptideMapError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid data
 */
export class ValidationError extends PeptideMapError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Invalid search or layout parameter (mismatch budget, row count, gap)
 *
 * The offending parameter is always named in the message.
 */
export class ConfigurationError extends PeptideMapError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value: unknown,
    context?: string
  ) {
    super(`Invalid ${parameter}: ${message}`, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

/**
 * File I/O errors with the failing operation and path
 */
export class FileError extends PeptideMapError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "decompress",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
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
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("incorrect header check") || msg.includes("unexpected end")) {
      return "File may be truncated or not actually gzip compressed";
    }

    return undefined;
  }

  override toString(): string {
    return `${super.toString()}\nFile: ${this.filePath} (${this.operation})`;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_BUDGET: "The mismatch budget must be a non-negative integer (0 for exact matching)",
  INVALID_ROWS: "maxRows must be a positive integer; overlap is accepted once all rows are busy",
  INVALID_GAP: "minGap must be a non-negative integer number of residues",
  FILE_NOT_FOUND: "Check that the file path is correct and the file exists",
  COMPRESSED_FILE_ERROR: "File may be truncated or not actually gzip compressed",
  INVALID_INPUT: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: PeptideMapError): string | undefined {
  if (error instanceof ConfigurationError) {
    switch (error.parameter) {
      case "budget":
        return ERROR_SUGGESTIONS.INVALID_BUDGET;
      case "maxRows":
        return ERROR_SUGGESTIONS.INVALID_ROWS;
      case "minGap":
        return ERROR_SUGGESTIONS.INVALID_GAP;
    }
  }
  if (error instanceof FileError && error.operation === "decompress") {
    return ERROR_SUGGESTIONS.COMPRESSED_FILE_ERROR;
  }
  if (error instanceof FileError) {
    return ERROR_SUGGESTIONS.FILE_NOT_FOUND;
  }

  return ERROR_SUGGESTIONS.INVALID_INPUT;
}
