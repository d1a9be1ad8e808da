import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  NotFoundError,
  ConflictError,
  InvalidTaskTransitionError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
  UnsupportedMediaTypeError,
  ExtractionError,
  ClassificationError,
  StoreTransientError,
  StoreError,
  statusOf,
  messageOf,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      taskId: "task-1",
      details: { foo: "bar" },
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.taskId).toBe("task-1");
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });

  it("keeps the cause", () => {
    const root = new Error("socket hang up");
    const err = new StoreTransientError("upsert failed", { cause: root });
    expect(err.cause).toBe(root);
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new NotFoundError())).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
  });

  it("serializes code and details", () => {
    const err = new ExtractionError("page 2 unreadable", { details: { page: 2 } });
    expect(err.toJSON()).toEqual({
      name: "ExtractionError",
      code: "EXTRACTION_FAILED",
      message: "page 2 unreadable",
      statusCode: 422,
      details: { page: 2 },
    });
  });
});

describe("Error Subclasses", () => {
  it("NotFoundError has status 404", () => {
    const err = new NotFoundError("Task t-1 not found");
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe("NOT_FOUND");
    expect(err.message).toBe("Task t-1 not found");
  });

  it("InvalidTaskTransitionError is a ConflictError with its own code", () => {
    const err = new InvalidTaskTransitionError("t-1", "completed", "in_progress");
    expect(err).toBeInstanceOf(ConflictError);
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe("INVALID_TASK_TRANSITION");
    expect(err.message).toBe("Task t-1 cannot move from completed to in_progress");
    expect(err.name).toBe("InvalidTaskTransitionError");
    expect(err.taskId).toBe("t-1");
    expect(err.details).toEqual({ from: "completed", to: "in_progress" });
  });

  it("RateLimitedError carries retryAfter", () => {
    const err = new RateLimitedError("Too many requests", 60);
    expect(err.statusCode).toBe(429);
    expect(err.code).toBe("RATE_LIMITED");
    expect(err.retryAfter).toBe(60);
  });

  it("ValidationError carries fields", () => {
    const err = new ValidationError("Invalid job payload", { taskId: "Required" });
    expect(err.statusCode).toBe(400);
    expect(err.fields).toEqual({ taskId: "Required" });
  });

  it("ExternalServiceError carries the service", () => {
    const err = new ExternalServiceError("Cohere is down", "cohere");
    expect(err.statusCode).toBe(502);
    expect(err.service).toBe("cohere");
  });

  it("UnsupportedMediaTypeError names the media type", () => {
    const err = new UnsupportedMediaTypeError("application/x-msdownload");
    expect(err.statusCode).toBe(415);
    expect(err.code).toBe("UNSUPPORTED_MEDIA_TYPE");
    expect(err.mediaType).toBe("application/x-msdownload");
    expect(err.message).toBe("Unsupported media type: application/x-msdownload");
  });

  it("store errors split transient from permanent", () => {
    expect(new StoreTransientError().code).toBe("STORE_TRANSIENT");
    expect(new StoreTransientError().statusCode).toBe(503);
    expect(new StoreError().code).toBe("STORE_ERROR");
    expect(new ClassificationError().code).toBe("CLASSIFICATION_FAILED");
  });
});

describe("statusOf", () => {
  it("reads status or statusCode from SDK errors", () => {
    expect(statusOf(Object.assign(new Error("x"), { status: 503 }))).toBe(503);
    expect(statusOf(Object.assign(new Error("x"), { statusCode: 400 }))).toBe(400);
    expect(statusOf(new Error("x"))).toBeUndefined();
    expect(statusOf("boom")).toBeUndefined();
  });
});

describe("messageOf", () => {
  it("stringifies non-errors", () => {
    expect(messageOf(new Error("boom"))).toBe("boom");
    expect(messageOf(42)).toBe("42");
  });
});
