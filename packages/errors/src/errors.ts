import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class DocumentNotFoundError extends AppError {
  public readonly source: string;

  constructor(source: string, options?: ErrorExtras) {
    super({
      message: `Document not found: ${source}`,
      statusCode: 404,
      code: "DOCUMENT_NOT_FOUND",
      details: options?.details,
      cause: options?.cause,
    });
    this.source = source;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
    });
    this.fields = fields;
  }
}

export type StoreName = "semantic-index" | "relationship-index";

export class StoreWriteError extends AppError {
  public readonly store: StoreName;

  constructor(message: string, store: StoreName, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "STORE_WRITE_FAILED",
      details: options?.details,
      cause: options?.cause,
    });
    this.store = store;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  /**
   * `statusCode` defaults to 502; pass the upstream status for client errors so
   * that retry logic can tell them apart.
   */
  constructor(
    message = "External service error",
    service: string,
    options?: ErrorExtras & { statusCode?: number },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class GeneratorUnavailableError extends AppError {
  constructor(message = "Text generator is not configured") {
    super({
      message,
      statusCode: 503,
      code: "GENERATOR_UNAVAILABLE",
    });
  }
}
