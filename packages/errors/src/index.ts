export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  DocumentNotFoundError,
  ValidationError,
  StoreWriteError,
  ExternalServiceError,
  GeneratorUnavailableError,
} from "./errors.js";
export type { StoreName } from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryAttempt, RetryOptions } from "./retry.js";
