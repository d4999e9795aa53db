import { ExternalServiceError, MissingCredentialsError, errorMessage, type AppError } from "@voicekb/errors";

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

/**
 * Map an SDK error onto the app's error types.
 *
 * 401/403 mean the key is absent or wrong. 429, 5xx and transport failures
 * are retryable; any other 4xx means the request itself was rejected.
 */
export function toProviderError(service: string, err: unknown): AppError {
  const status = statusOf(err);

  if (status === 401 || status === 403) {
    return new MissingCredentialsError(service, `${service} rejected the API key`, { cause: err });
  }

  const retryable = status === undefined || status === 429 || status >= 500;
  return new ExternalServiceError(`${service} embedding request failed: ${errorMessage(err)}`, service, {
    cause: err,
    retryable,
    ...(status !== undefined && { details: { status } }),
  });
}
