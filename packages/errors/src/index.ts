export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";
export type { ErrorContext } from "./errors.js";

export {
  NotFoundError,
  ValidationError,
  ExternalServiceError,
  UnsupportedFormatError,
  MalformedInputError,
  EncodingError,
  ExtractionError,
  StoreUnavailableError,
  PartialBatchFailureError,
} from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";

export { errorMessage } from "./message.js";
