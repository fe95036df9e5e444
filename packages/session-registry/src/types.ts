/**
 * @fileoverview Public types for the session registry.
 */

import type { SessionRow, SourceError } from '@sessionkit/contracts';
import type { Logger } from '@sessionkit/logger';
import type { SessionOptions } from '@sessionkit/trade-session';

/**
 * CSV text, or rows already read from elsewhere.
 */
export type SessionSource = string | Iterable<SessionRow>;

export interface LoadOptions {
  /**
   * Keep products the source does not mention. Products it does mention
   * are replaced whole.
   * @default true
   */
  merge?: boolean;

  /** Label used in log entries, e.g. a file path */
  source?: string;
}

/**
 * Outcome of a successful load.
 */
export interface LoadSummary {
  /** Distinct products in the source */
  loaded: number;

  /** Products that were already registered and got a new session */
  replaced: number;

  /** Products registered for the first time */
  added: number;

  /** Products dropped by a non-merge load */
  removed: number;

  /** Registry size after the load */
  total: number;

  durationMs: number;
}

export type LoadResult = { ok: true; summary: LoadSummary } | { ok: false; error: SourceError };

export interface SessionRegistryOptions {
  /** Parent logger; the registry logs through a child of it */
  logger?: Logger;

  /** Applied to every session the registry builds */
  session?: SessionOptions;
}
