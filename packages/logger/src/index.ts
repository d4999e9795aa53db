/**
 * Structured logging with secret redaction for the ingestion worker.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactEntries, REDACT_PATHS } from "./pii-redactor.js";
