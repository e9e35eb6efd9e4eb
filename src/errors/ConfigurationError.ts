import { ConfluenceRagError, ErrorCode, type ErrorContext } from "./ConfluenceRagError";

/**
 * Error for missing or unusable configuration.
 */
export class ConfluenceRagConfigurationError extends ConfluenceRagError {
  public readonly settings: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID_VALUE,
    context: Partial<ErrorContext> & { settings?: string[] } = {}
  ) {
    super(message, code, context, { isRetryable: false });
    this.name = "ConfluenceRagConfigurationError";
    this.settings = context.settings ?? [];
  }

  static missingCredentials(settings: string[]) {
    return new ConfluenceRagConfigurationError(
      `Missing required Confluence settings: ${settings.join(", ")}`,
      ErrorCode.CONFIG_MISSING_CREDENTIALS,
      { operation: "loadConfig", settings }
    );
  }
}
