/**
 * Logging module exports.
 */

export { type LogLevel, type Logger, LOG_LEVELS, resolveLogLevel, createRootLogger, createLogger } from "./logger.js";
