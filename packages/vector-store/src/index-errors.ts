import { AppError, ExternalServiceError, errorMessage } from "@voicekb/errors";

const UNEXPECTED_RESPONSE = /^Unexpected Response: (\d{3})/;

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  if (err instanceof Error) {
    const match = UNEXPECTED_RESPONSE.exec(err.message);
    if (match?.[1] !== undefined) return Number(match[1]);
  }
  return undefined;
}

/**
 * Map a vector index client error onto the app's error types. AppErrors
 * pass through. 429, 5xx and transport failures are retryable; any other
 * 4xx (wrong dimension, malformed payload, missing collection) is not.
 */
export function toIndexError(err: unknown): AppError {
  if (AppError.isAppError(err)) return err;

  const status = statusOf(err);
  const retryable = status === undefined || status === 429 || status >= 500;
  return new ExternalServiceError(`Vector index request failed: ${errorMessage(err)}`, "qdrant", {
    cause: err,
    retryable,
    ...(status !== undefined && { details: { status } }),
  });
}
