/**
 * Base error class for all confluence-rag errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Auth errors (1xxx)
  AUTH_REQUIRED = 1001,
  AUTH_INVALID_TOKEN = 1002,

  // Network errors (2xxx)
  NETWORK_TIMEOUT = 2001,
  NETWORK_CONNECTION_FAILED = 2002,
  NETWORK_RATE_LIMITED = 2003,
  CONFLUENCE_API_ERROR = 2010,
  CONFLUENCE_NOT_FOUND = 2011,

  // Configuration errors (3xxx)
  CONFIG_MISSING_CREDENTIALS = 3001,
  CONFIG_INVALID_VALUE = 3002,

  // Validation errors (4xxx)
  VALIDATION_MISSING_PARAM = 4003,
  VALIDATION_INVALID_FORMAT = 4004,
  VALIDATION_UNKNOWN_FIELD = 4005,

  // Processing errors (5xxx)
  PROCESSING_FAILED = 5001,
  EXTRACTOR_FAILED = 5002,
  EXTRACTOR_TIMEOUT = 5003,
  TABLE_MALFORMED = 5004,
  EXPORT_FAILED = 5010,

  // Analysis errors (6xxx)
  ANALYSIS_FAILED = 6001,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  pageId?: string;
  spaceKey?: string;
  stage?: string;
  corpusSize?: number;
  url?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

export class ConfluenceRagError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  declare readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "ConfluenceRagError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  toUserMessage(): string {
    return this.message;
  }

  /**
   * Detailed single-line message for logs.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.pageId) parts.push(`PageID: ${this.context.pageId}`);
    if (this.context.spaceKey) parts.push(`Space: ${this.context.spaceKey}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Wrap an unknown thrown value in a ConfluenceRagError, merging context.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): ConfluenceRagError {
  if (error instanceof ConfluenceRagError) {
    return new ConfluenceRagError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new ConfluenceRagError(error.message, code, context, { cause: error });
  }

  return new ConfluenceRagError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isConfluenceRagError(error: unknown): error is ConfluenceRagError {
  return error instanceof ConfluenceRagError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isConfluenceRagError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

/** Message of any thrown value, for log context. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
