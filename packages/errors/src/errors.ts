import { AppError } from "./app-error.js";

type ErrorExtras = {
  jobId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
  retryable?: boolean;
};

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      ...options,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      ...options,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      ...options,
    });
    this.fields = fields;
  }
}

export class InvalidNamespaceError extends AppError {
  public readonly namespace: string;

  constructor(namespace: string, options?: ErrorExtras) {
    super({
      message: `Invalid vector namespace: "${namespace}"`,
      statusCode: 400,
      code: "INVALID_NAMESPACE",
      ...options,
    });
    this.namespace = namespace;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      ...options,
    });
    this.service = service;
  }
}

/**
 * Raised when a provider cannot be called because its API key is absent or
 * was rejected. Never retried: the same call fails until config changes.
 */
export class MissingCredentialsError extends AppError {
  public readonly service: string;

  constructor(service: string, message = `${service} credentials are missing or invalid`, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "MISSING_CREDENTIALS",
      ...options,
      retryable: false,
    });
    this.service = service;
  }
}

export class UnsupportedJobError extends AppError {
  public readonly taskType: string;

  constructor(taskType: string, message = `Unsupported job: ${taskType}`, options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "UNSUPPORTED_JOB",
      ...options,
    });
    this.taskType = taskType;
  }
}

/** A job ran but did not reach its goal; the queue may schedule it again. */
export class JobExecutionError extends AppError {
  constructor(message = "Job execution failed", options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "JOB_EXECUTION_FAILED",
      ...options,
    });
  }
}
