/**
 * @fileoverview Public API exports for @sessionkit/logger
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { redactPII, redactSensitiveFields, isSensitiveField, renderPretty } from './formats.js';

export { startTimer } from './perf-timer.js';
export type { PerfTimer, TimeSource } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
