export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  ValidationError,
  InvalidNamespaceError,
  ExternalServiceError,
  MissingCredentialsError,
  UnsupportedJobError,
  JobExecutionError,
} from "./errors.js";

export { withRetry, isRetryable, sleep } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";
