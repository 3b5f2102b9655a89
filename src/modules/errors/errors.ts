/**
 * Error taxonomy for the analysis pipeline.
 * Every error carries a stable `code` so the HTTP layer and job records can
 * report it without string matching on messages.
 */

export type ErrorCode =
  | "EXTRACTION_ERROR"
  | "EMBEDDING_ERROR"
  | "MODEL_CALL_ERROR"
  | "PARSE_ERROR"
  | "INDEX_ERROR"
  | "JOB_STATE_ERROR";

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ExtractionFailureReason = "unsupported_format" | "parse_failure";

/** Document could not be turned into text. Fatal for the job. */
export class ExtractionError extends AppError {
  readonly reason: ExtractionFailureReason;

  constructor(
    reason: ExtractionFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("EXTRACTION_ERROR", message, options);
    this.reason = reason;
  }
}

/** Embedding provider failed (transport, HTTP status or empty vector). */
export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_ERROR", message, options);
  }
}

/** Completion provider failed before returning a usable body. */
export class ModelCallError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MODEL_CALL_ERROR", message, options);
  }
}

/** Model returned output that does not match the expected structure. Never retried. */
export class ParseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", message, options);
  }
}

/** Vector index failure. Queries against an absent collection do not raise this. */
export class IndexError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_ERROR", message, options);
  }
}

export class JobStateError extends AppError {
  constructor(message: string) {
    super("JOB_STATE_ERROR", message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
