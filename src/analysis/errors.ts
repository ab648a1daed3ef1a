/**
 * Error classes for the duplicate-code engine.
 *
 * Per-file errors (unsupported language, tokenize, read) are caught by the
 * scanner and turned into warnings. ConfigError is fatal and surfaces before
 * any file is read.
 */

export type TwinscanErrorCode =
  | "UNSUPPORTED_LANGUAGE"
  | "TOKENIZE_ERROR"
  | "CACHE_CORRUPTION"
  | "CONFIG_ERROR"
  | "IO_ERROR"
  | "SCAN_ABORTED";

/**
 * Codes that skip a single file instead of failing the scan.
 */
export type FileErrorCode = Extract<
  TwinscanErrorCode,
  "UNSUPPORTED_LANGUAGE" | "TOKENIZE_ERROR" | "IO_ERROR"
>;

/**
 * Base class for every error the engine throws on purpose.
 */
export class TwinscanError extends Error {
  public readonly code: TwinscanErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: TwinscanErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export class UnsupportedLanguageError extends TwinscanError {
  public readonly language: string;

  constructor(language: string, file?: string) {
    super(`No tokenizer registered for language "${language}"`, "UNSUPPORTED_LANGUAGE", {
      language,
      file,
    });
    this.language = language;
  }
}

export class TokenizeError extends TwinscanError {
  /** 1-based line of the first syntax problem, when known */
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`, "TOKENIZE_ERROR", { line });
    this.line = line;
  }
}

export class CacheCorruptionError extends TwinscanError {
  constructor(contentHash: string, reason: string) {
    super(`Cache record ${contentHash} is unusable: ${reason}`, "CACHE_CORRUPTION", {
      contentHash,
      reason,
    });
  }
}

export class ConfigError extends TwinscanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
  }
}

export class FileReadError extends TwinscanError {
  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read ${file}: ${reason}`, "IO_ERROR", { file });
  }
}

export class ScanAbortedError extends TwinscanError {
  constructor(completed: number, total: number) {
    super(`Scan aborted after ${completed} of ${total} files`, "SCAN_ABORTED", { completed, total });
  }
}

/**
 * Narrow an unknown thrown value to one of the per-file error codes.
 */
export function isFileError(
  error: unknown
): error is TwinscanError & { code: FileErrorCode } {
  return (
    error instanceof TwinscanError &&
    (error.code === "UNSUPPORTED_LANGUAGE" ||
      error.code === "TOKENIZE_ERROR" ||
      error.code === "IO_ERROR")
  );
}
