import { AppError } from "./app-error.js";

interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: { ...options?.details, fields },
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

/**
 * The `meta` form field did not decode to a JSON object. Reported as a server
 * error, which is what upload clients of this endpoint have always received.
 */
export class InvalidMetadataError extends AppError {
  constructor(message: string, options?: ErrorContext) {
    super({ message, statusCode: 500, code: "INVALID_METADATA", ...options });
  }
}

export class MissingCollectionError extends AppError {
  constructor(
    message = 'Metadata of the first file must contain an "index" naming the target collection',
    options?: ErrorContext,
  ) {
    super({ message, statusCode: 500, code: "MISSING_COLLECTION", ...options });
  }
}

export class ServerBusyError extends AppError {
  public readonly limit: number;

  constructor(limit: number, message = "The server is busy processing requests", options?: ErrorContext) {
    super({ message, statusCode: 503, code: "SERVER_BUSY", ...options });
    this.limit = limit;
  }
}

export class DuplicateDocumentError extends AppError {
  public readonly documentIds: string[];

  constructor(collection: string, documentIds: string[], options?: ErrorContext) {
    super({
      message: `Documents already exist in collection "${collection}": ${documentIds.join(", ")}`,
      statusCode: 409,
      code: "DUPLICATE_DOCUMENT",
      ...options,
    });
    this.documentIds = documentIds;
  }
}

/** A backing service (document store, embedding server) failed. */
export class BackendError extends AppError {
  public readonly service: string;

  constructor(message = "Backend service error", service: string, options?: ErrorContext) {
    super({ message, statusCode: 500, code: "BACKEND_ERROR", ...options });
    this.service = service;
  }
}

/** Pipeline graph wiring is wrong; a programming error, not a request error. */
export class PipelineConfigurationError extends AppError {
  constructor(message: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "PIPELINE_CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
  }
}
