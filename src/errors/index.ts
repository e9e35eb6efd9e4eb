export {
  ConfluenceRagError,
  ErrorCode,
  wrapError,
  isConfluenceRagError,
  getErrorCode,
  errorMessage,
  type ErrorContext,
  type SerializedError,
} from "./ConfluenceRagError";

export { ConfluenceRagNetworkError } from "./NetworkError";
export { ConfluenceRagValidationError } from "./ValidationError";
export { ConfluenceRagProcessingError } from "./ProcessingError";
export { ConfluenceRagAnalysisError } from "./AnalysisError";
export { ConfluenceRagConfigurationError } from "./ConfigurationError";

export { ConfluenceRagAuthError } from "../auth/validateToken";
