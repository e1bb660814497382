/**
 * @docrag/logger
 *
 * Structured pino logging with secret redaction.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactSecrets, REDACT_PATHS } from "./redact.js";
