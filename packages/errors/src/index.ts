export { AppError, errorMessage, toAppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ExtractionError,
  EnhancementError,
  AssemblyError,
  StoreError,
  ValidationError,
  ExternalServiceError,
  EmbeddingError,
  CompletionError,
} from "./errors.js";
export type { ErrorExtras } from "./errors.js";

export { createCircuitBreaker, isOpenCircuitError } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";
