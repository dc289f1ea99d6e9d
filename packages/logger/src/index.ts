/**
 * @indexflow/logger
 *
 * Structured pino logging with secret redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactRecord, REDACT_PATHS } from "./redaction.js";
