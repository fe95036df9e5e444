/**
 * @fileoverview Error taxonomy for the session engine.
 *
 * Every error carries a machine-readable code, a structured data payload
 * and an ISO timestamp, so callers can branch on `code`/`data.reason`
 * instead of parsing messages.
 *
 * @module @sessionkit/contracts/errors
 */

/**
 * Base error class for all session engine errors.
 *
 * @example
 * ```typescript
 * throw new SessionKitError('CUSTOM_ERROR', 'Something went wrong', { product: 'ag' });
 * ```
 */
export class SessionKitError extends Error {
  /**
   * Machine-readable error code (e.g., 'SESSION_CONFIG').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionKitError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Why a session could not be built from the values given to it.
 */
export type ConfigErrorReason =
  | 'invalid_slice'
  | 'time_out_of_range'
  | 'invalid_markers'
  | 'sealed'
  | 'not_sealed'
  | 'invalid_config';

/**
 * Thrown while building or querying a session: a slice whose end does not
 * follow its start, a clock value out of range, or a call made in the wrong
 * lifecycle phase. Also used for invalid registry configuration
 * (`invalid_config`).
 *
 * @example
 * ```typescript
 * throw new ConfigError('Slice end must follow its start', {
 *   reason: 'invalid_slice',
 *   start: '15:00',
 *   end: '09:00',
 * });
 * ```
 */
export class ConfigError extends SessionKitError {
  declare readonly data: { reason: ConfigErrorReason; [key: string]: unknown };

  constructor(
    message: string,
    data: { reason: ConfigErrorReason; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super('SESSION_CONFIG', message, data, options);
    this.name = 'ConfigError';
  }
}

/**
 * Why a configuration source could not be loaded.
 */
export type SourceErrorReason = 'io' | 'malformed_row' | 'invalid_slice';

/**
 * Thrown when a configuration source cannot be read or one of its rows is
 * malformed. A registry load that throws it leaves the registry unchanged.
 *
 * @example
 * ```typescript
 * throw new SourceError('Line 3: expected groups of four integers', {
 *   reason: 'malformed_row',
 *   line: 3,
 *   product: 'ag',
 * });
 * ```
 */
export class SourceError extends SessionKitError {
  declare readonly data: {
    reason: SourceErrorReason;
    line?: number;
    product?: string;
    path?: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { reason: SourceErrorReason; line?: number; product?: string; path?: string; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super('SESSION_SOURCE', message, data, options);
    this.name = 'SourceError';
  }
}

/**
 * Type guard to check if an error is a SessionKitError.
 *
 * @example
 * ```typescript
 * try {
 *   registry.loadFile('./sessions.csv');
 * } catch (err) {
 *   if (isSessionKitError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isSessionKitError(error: unknown): error is SessionKitError {
  return error instanceof SessionKitError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}
