/**
 * @fileoverview Main entry point for @sessionkit/contracts package.
 *
 * Exports the error taxonomy and the row types shared by the session
 * packages.
 *
 * @module @sessionkit/contracts
 */

// Error classes and guards
export {
  SessionKitError,
  ConfigError,
  SourceError,
  isSessionKitError,
  isConfigError,
  isSourceError,
} from './errors.js';

export type { ConfigErrorReason, SourceErrorReason } from './errors.js';

// Configuration row types
export type { ClockTime, TimeInput, SliceSpec, SessionRow } from './rows.js';
