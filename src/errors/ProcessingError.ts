import { ConfluenceRagError, ErrorCode, type ErrorContext } from "./ConfluenceRagError";

/**
 * Error for page processing failures that could not be recovered per field.
 */
export class ConfluenceRagProcessingError extends ConfluenceRagError {
  public readonly pageId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PROCESSING_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ConfluenceRagProcessingError";
    this.pageId = context.pageId;
  }

  static pageFailed(pageId: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagProcessingError(
      `Failed to process page: ${cause?.message ?? "unknown error"}`,
      ErrorCode.PROCESSING_FAILED,
      { operation: "processPage", ...context, pageId },
      { cause }
    );
  }

  static extractorFailed(stage: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagProcessingError(
      `Extractor "${stage}" failed: ${cause?.message ?? "unknown error"}`,
      ErrorCode.EXTRACTOR_FAILED,
      { operation: "extract", ...context, stage },
      { cause }
    );
  }

  static extractorTimeout(stage: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagProcessingError(
      `Extractor "${stage}" did not finish within ${timeoutMs}ms`,
      ErrorCode.EXTRACTOR_TIMEOUT,
      { operation: "extract", ...context, stage }
    );
  }

  static malformedTable(reason: string, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagProcessingError(
      `Malformed table: ${reason}`,
      ErrorCode.TABLE_MALFORMED,
      { operation: "extractTables", ...context }
    );
  }

  static exportFailed(target: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagProcessingError(
      `Failed to export ${target}: ${cause?.message ?? "unknown error"}`,
      ErrorCode.EXPORT_FAILED,
      { operation: "export", ...context, target },
      { cause }
    );
  }
}
