import { ConfluenceRagError, ErrorCode, type ErrorContext } from "./ConfluenceRagError";

/**
 * Error for corpus analysis failures. Empty corpora are not errors.
 */
export class ConfluenceRagAnalysisError extends ConfluenceRagError {
  public readonly corpusSize: number;

  constructor(
    message: string,
    corpusSize: number,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, ErrorCode.ANALYSIS_FAILED, { ...context, corpusSize }, { ...options, isRetryable: false });
    this.name = "ConfluenceRagAnalysisError";
    this.corpusSize = corpusSize;
  }

  static failed(operation: string, corpusSize: number, cause?: Error) {
    return new ConfluenceRagAnalysisError(
      `Failed to ${operation}: ${cause?.message ?? "unknown error"}`,
      corpusSize,
      { operation },
      { cause }
    );
  }
}
