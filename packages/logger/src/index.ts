export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";
export { createMemoryDestination } from "./memory-destination.js";
export type { MemoryDestination, LogRecord } from "./memory-destination.js";
