import { AppError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
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
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/** The declared file type is not one of pdf, docx, txt, json. */
export class UnsupportedFormatError extends AppError {
  public readonly format: string;

  constructor(format: string, message = "Unsupported file format", options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "UNSUPPORTED_FORMAT",
      requestId: options?.requestId,
      details: { format, ...options?.details },
      cause: options?.cause,
    });
    this.format = format;
  }
}

export class MalformedInputError extends AppError {
  constructor(message = "Malformed input", options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "MALFORMED_INPUT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class EncodingError extends AppError {
  public readonly encoding: string;

  constructor(encoding: string, message?: string, options?: ErrorContext) {
    super({
      message: message ?? `Content is not valid ${encoding}`,
      statusCode: 400,
      code: "ENCODING_ERROR",
      requestId: options?.requestId,
      details: { encoding, ...options?.details },
      cause: options?.cause,
    });
    this.encoding = encoding;
  }
}

/** OCR or document parsing failed inside an extractor. */
export class ExtractionError extends AppError {
  constructor(message = "Text extraction failed", options?: ErrorContext) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = "Vector store unavailable", options?: ErrorContext) {
    super({
      message,
      statusCode: 503,
      code: "STORE_UNAVAILABLE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * Some, but not all, records of a document reached the store.
 * `insertedChunks` is the number actually persisted.
 */
export class PartialBatchFailureError extends AppError {
  public readonly insertedChunks: number;
  public readonly totalChunks: number;

  constructor(insertedChunks: number, totalChunks: number, options?: ErrorContext) {
    super({
      message: `Only ${String(insertedChunks)} of ${String(totalChunks)} chunks were stored`,
      statusCode: 502,
      code: "PARTIAL_BATCH_FAILURE",
      requestId: options?.requestId,
      details: { insertedChunks, totalChunks, ...options?.details },
      cause: options?.cause,
    });
    this.insertedChunks = insertedChunks;
    this.totalChunks = totalChunks;
  }
}
