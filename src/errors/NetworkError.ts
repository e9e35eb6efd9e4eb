import { ConfluenceRagError, ErrorCode, type ErrorContext } from "./ConfluenceRagError";

/**
 * Error for network-related failures (Confluence REST calls, timeouts, rate limits).
 */
export class ConfluenceRagNetworkError extends ConfluenceRagError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    context: Partial<ErrorContext> & { statusCode?: number; endpoint?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "ConfluenceRagNetworkError";
    this.statusCode = context.statusCode;
    this.endpoint = context.endpoint;
  }

  static timeout(endpoint: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagNetworkError(
      `Request to ${endpoint} timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      { ...context, endpoint },
      { isRetryable: true }
    );
  }

  static connectionFailed(endpoint: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagNetworkError(
      `Failed to connect to ${endpoint}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      { ...context, endpoint },
      { cause, isRetryable: true }
    );
  }

  static rateLimited(endpoint: string, windowMs?: number, context: Partial<ErrorContext> = {}) {
    const message = windowMs
      ? `Rate limit exceeded for ${endpoint} (window ${windowMs}ms)`
      : `Rate limit exceeded for ${endpoint}`;
    return new ConfluenceRagNetworkError(
      message,
      ErrorCode.NETWORK_RATE_LIMITED,
      { ...context, endpoint },
      { isRetryable: true }
    );
  }

  static apiError(endpoint: string, statusCode: number, statusText: string, context: Partial<ErrorContext> = {}) {
    if (statusCode === 404) {
      return new ConfluenceRagNetworkError(
        `Confluence resource not found: ${endpoint}`,
        ErrorCode.CONFLUENCE_NOT_FOUND,
        { ...context, endpoint, statusCode },
        { isRetryable: false }
      );
    }
    return new ConfluenceRagNetworkError(
      `Confluence API error: HTTP ${statusCode} (${statusText}) for ${endpoint}`,
      ErrorCode.CONFLUENCE_API_ERROR,
      { ...context, endpoint, statusCode },
      { isRetryable: statusCode === 429 || statusCode >= 500 }
    );
  }
}
