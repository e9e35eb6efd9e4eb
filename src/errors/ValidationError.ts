import { ConfluenceRagError, ErrorCode, type ErrorContext } from "./ConfluenceRagError";

/**
 * Error for input validation failures.
 */
export class ConfluenceRagValidationError extends ConfluenceRagError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ConfluenceRagValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingParam(paramName: string, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagValidationError(
      `Missing required parameter: ${paramName}`,
      ErrorCode.VALIDATION_MISSING_PARAM,
      { ...context, field: paramName }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }

  static unknownField(field: string, context: Partial<ErrorContext> = {}) {
    return new ConfluenceRagValidationError(
      `Unknown field: ${field}`,
      ErrorCode.VALIDATION_UNKNOWN_FIELD,
      { ...context, field }
    );
  }
}
