import { describe, it, expect } from "vitest";
import { AppError, errorMessage } from "./app-error.js";
import {
  NotFoundError,
  ConflictError,
  ValidationError,
  InvalidNamespaceError,
  ExternalServiceError,
  MissingCredentialsError,
  UnsupportedJobError,
  JobExecutionError,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("socket hang up");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      jobId: "job-1",
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.jobId).toBe("job-1");
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
  });

  it("derives retryable from the status code unless given", () => {
    expect(new AppError({ message: "a", statusCode: 400, code: "A" }).retryable).toBe(false);
    expect(new AppError({ message: "b", statusCode: 502, code: "B" }).retryable).toBe(true);
    expect(
      new AppError({ message: "c", statusCode: 500, code: "C", retryable: false }).retryable,
    ).toBe(false);
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });
    const plainErr = new Error("plain");

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(plainErr)).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });

  it("serializes to a structured object", () => {
    const err = new NotFoundError("Document missing", { jobId: "job-9" });

    expect(err.toJSON()).toEqual({
      name: "NotFoundError",
      message: "Document missing",
      code: "NOT_FOUND",
      statusCode: 404,
      retryable: false,
      jobId: "job-9",
    });
  });
});

describe("errorMessage", () => {
  it("reads messages from errors, strings and other values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain text")).toBe("plain text");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("Error Subclasses", () => {
  describe("NotFoundError", () => {
    it("has status 404 and NOT_FOUND code", () => {
      const err = new NotFoundError();
      expect(err.statusCode).toBe(404);
      expect(err.code).toBe("NOT_FOUND");
      expect(err.message).toBe("Resource not found");
      expect(err.name).toBe("NotFoundError");
      expect(err).toBeInstanceOf(AppError);
    });

    it("accepts custom message and options", () => {
      const err = new NotFoundError("Document not found", { jobId: "job-1" });
      expect(err.message).toBe("Document not found");
      expect(err.jobId).toBe("job-1");
    });
  });

  describe("ConflictError", () => {
    it("has status 409 and CONFLICT code", () => {
      const err = new ConflictError();
      expect(err.statusCode).toBe(409);
      expect(err.code).toBe("CONFLICT");
      expect(err.name).toBe("ConflictError");
    });
  });

  describe("ValidationError", () => {
    it("has status 400, VALIDATION_ERROR code, and fields", () => {
      const fields = { documentIds: "Required" };
      const err = new ValidationError("Validation failed", fields);
      expect(err.statusCode).toBe(400);
      expect(err.code).toBe("VALIDATION_ERROR");
      expect(err.fields).toEqual(fields);
      expect(err.name).toBe("ValidationError");
    });
  });

  describe("InvalidNamespaceError", () => {
    it("names the rejected namespace", () => {
      const err = new InvalidNamespaceError("bad ns");
      expect(err.statusCode).toBe(400);
      expect(err.code).toBe("INVALID_NAMESPACE");
      expect(err.namespace).toBe("bad ns");
      expect(err.message).toBe('Invalid vector namespace: "bad ns"');
    });
  });

  describe("ExternalServiceError", () => {
    it("has status 502, EXTERNAL_SERVICE_ERROR code, and service", () => {
      const err = new ExternalServiceError("Qdrant is down", "qdrant");
      expect(err.statusCode).toBe(502);
      expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
      expect(err.service).toBe("qdrant");
      expect(err.retryable).toBe(true);
      expect(err.name).toBe("ExternalServiceError");
    });
  });

  describe("MissingCredentialsError", () => {
    it("is a 503 that is never retryable", () => {
      const err = new MissingCredentialsError("openai");
      expect(err.statusCode).toBe(503);
      expect(err.code).toBe("MISSING_CREDENTIALS");
      expect(err.retryable).toBe(false);
      expect(err.service).toBe("openai");
      expect(err.message).toBe("openai credentials are missing or invalid");
    });
  });

  describe("UnsupportedJobError", () => {
    it("has status 422 and keeps the task type", () => {
      const err = new UnsupportedJobError("video_processing");
      expect(err.statusCode).toBe(422);
      expect(err.code).toBe("UNSUPPORTED_JOB");
      expect(err.taskType).toBe("video_processing");
      expect(err.message).toBe("Unsupported job: video_processing");
      expect(err.retryable).toBe(false);
    });
  });

  describe("JobExecutionError", () => {
    it("is retryable by default and can be marked terminal", () => {
      expect(new JobExecutionError().retryable).toBe(true);
      expect(new JobExecutionError("All files failed", { retryable: false }).retryable).toBe(false);
      expect(new JobExecutionError().code).toBe("JOB_EXECUTION_FAILED");
    });
  });
});
