/**
 * @storyvault/logger
 *
 * Structured logging with secret redaction for the ingestion job.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACTED } from "./redaction.js";
