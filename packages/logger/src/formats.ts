/**
 * @fileoverview Custom Winston formats for the session engine logger.
 * Includes sensitive-field redaction, standard fields and pretty output.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Field names whose values never reach a log line. Matching is
 * case-insensitive. Configuration sources may carry credentials for the
 * database they were exported from.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Fields Winston itself owns; never rewritten.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveField(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive fields replaced at any depth.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ user: 'ops', password: 'test-secret' });
 * // { user: 'ops', password: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value instanceof Error) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the chain so nothing downstream sees the raw values.
 *
 * @example
 * ```typescript
 * logger.info('Loading sessions', { source: 'db', password: 'test-secret' });
 * // {"level":"info","message":"Loading sessions","source":"db","password":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    redacted[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Winston format that adds the timestamp and expands Error objects.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Builds the single-line pretty representation of a log entry.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Sessions loaded component=session-registry count=42
 * ```
 */
export function renderPretty(info: Record<string, unknown>): string {
  const { timestamp, level, message, component, product, source, stack, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (product) context.push(`product=${String(product)}`);
  if (source) context.push(`source=${String(source)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'splat') {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(timestamp)}] ${String(level)}: ${String(message)}${contextStr}`;

  if (typeof stack === 'string') {
    return `${baseMsg}\n${stack}`;
  }

  return baseMsg;
}

/**
 * Winston format for human-readable output in development.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderPretty(info))
);
