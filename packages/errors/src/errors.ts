import { AppError } from "./app-error.js";

export interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** No content to build on; the run stops. */
export class ExtractionError extends AppError {
  public readonly sourcePath: string;

  constructor(message = "Document extraction failed", sourcePath = "", options?: ErrorExtras) {
    super({
      message,
      code: "EXTRACTION_FAILED",
      recoverable: false,
      details: { sourcePath, ...options?.details },
      cause: options?.cause,
    });
    this.sourcePath = sourcePath;
  }
}

export class EnhancementError extends AppError {
  constructor(message = "Content enhancement failed", options?: ErrorExtras) {
    super({
      message,
      code: "ENHANCEMENT_FAILED",
      recoverable: true,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class AssemblyError extends AppError {
  constructor(message = "Notebook assembly failed", options?: ErrorExtras) {
    super({
      message,
      code: "ASSEMBLY_FAILED",
      recoverable: true,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class StoreError extends AppError {
  constructor(message = "Document store operation failed", options?: ErrorExtras) {
    super({
      message,
      code: "STORE_FAILED",
      recoverable: true,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      code: "VALIDATION_ERROR",
      recoverable: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(
    message = "External service error",
    service: string,
    options?: ErrorExtras & { code?: string },
  ) {
    super({
      message,
      code: options?.code ?? "EXTERNAL_SERVICE_ERROR",
      recoverable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class EmbeddingError extends ExternalServiceError {
  constructor(message = "Embedding request failed", service: string, options?: ErrorExtras) {
    super(message, service, { ...options, code: "EMBEDDING_FAILED" });
  }
}

export class CompletionError extends ExternalServiceError {
  constructor(message = "Completion request failed", service: string, options?: ErrorExtras) {
    super(message, service, { ...options, code: "COMPLETION_FAILED" });
  }
}
