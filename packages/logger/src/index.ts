/**
 * @quire/logger
 *
 * Structured logging with secret and PII redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactFields, REDACT_PATHS } from "./pii-redactor.js";
