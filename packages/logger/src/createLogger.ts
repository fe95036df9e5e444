/**
 * @fileoverview Main logger factory for the session engine.
 * Creates configured Winston logger instances with structured logging,
 * sensitive-field redaction and console/file transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Format chain: redaction, then standard fields (timestamp, error stacks),
 * then JSON or pretty output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Sessions loaded', { count: 42, duration_ms: 3 });
 * ```
 *
 * @example
 * ```typescript
 * // File output only, e.g. for a reload job
 * const logger = createLogger({
 *   level: 'debug',
 *   console: false,
 *   filePath: './logs/sessions.log',
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const json = config.json ?? process.env['NODE_ENV'] === 'production';

  return winston.createLogger({
    level: config.level,
    // Redaction runs first so no later format sees a raw secret
    format: winston.format.combine(redactPII(), standardFields, json ? winston.format.json() : prettyPrint),
    transports: sinksFor(config),
    exitOnError: false,
  });
}

/**
 * Transports inherit level and format from the logger. With console and
 * file both off a silent console remains, since winston warns on every
 * write to a logger without transports.
 */
function sinksFor({ filePath, console: toConsole = true }: LoggerConfig): winston.transport[] {
  const sinks: winston.transport[] = [];
  if (toConsole) {
    sinks.push(new winston.transports.Console());
  }
  if (filePath) {
    sinks.push(new winston.transports.File({ filename: filePath }));
  }
  return sinks.length > 0 ? sinks : [new winston.transports.Console({ silent: true })];
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const registryLogger = createChildLogger(logger, { component: 'session-registry' });
 * registryLogger.warn('Duplicate product row', { product: 'ag', line: 7 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
