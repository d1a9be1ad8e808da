import { AppError } from "./app-error.js";

interface ErrorOptions {
  taskId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorOptions & { code?: string }) {
    super({
      message,
      statusCode: 409,
      code: options?.code ?? "CONFLICT",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** A task update was attempted from a status that does not allow it. */
export class InvalidTaskTransitionError extends ConflictError {
  public readonly from: string;
  public readonly to: string | undefined;

  constructor(taskId: string, from: string, to: string | undefined) {
    super(`Task ${taskId} cannot move from ${from}${to ? ` to ${to}` : ""}`, {
      code: "INVALID_TASK_TRANSITION",
      taskId,
      details: { from, to },
    });
    this.from = from;
    this.to = to;
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the upstream asked us to wait. */
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorOptions) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class UnsupportedMediaTypeError extends AppError {
  public readonly mediaType: string;

  constructor(mediaType: string, options?: ErrorOptions) {
    super({
      message: `Unsupported media type: ${mediaType}`,
      statusCode: 415,
      code: "UNSUPPORTED_MEDIA_TYPE",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
    this.mediaType = mediaType;
  }
}

export class ExtractionError extends AppError {
  constructor(message = "Extraction failed", options?: ErrorOptions) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ClassificationError extends AppError {
  constructor(message = "Classification failed", options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "CLASSIFICATION_FAILED",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** Connection failure, timeout or backend 5xx from the vector store. */
export class StoreTransientError extends AppError {
  constructor(message = "Vector store unavailable", options?: ErrorOptions) {
    super({
      message,
      statusCode: 503,
      code: "STORE_TRANSIENT",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** Rejected by the vector store (validation, auth). Never retried. */
export class StoreError extends AppError {
  constructor(message = "Vector store rejected the request", options?: ErrorOptions) {
    super({
      message,
      statusCode: 500,
      code: "STORE_ERROR",
      taskId: options?.taskId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** Reads an HTTP-ish status from an unknown thrown value (SDK errors carry one). */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
