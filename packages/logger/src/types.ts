/**
 * @fileoverview Logger types.
 */

import type { Logger as WinstonLogger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'debug',
 *   json: true,
 *   filePath: './logs/sessions.log',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * One JSON object per line instead of the pretty single-line layout.
   * @default true when NODE_ENV is "production"
   */
  json?: boolean;

  /** Also append entries to this file */
  filePath?: string;

  /** @default true */
  console?: boolean;
}

/**
 * Fields a child logger stamps on every entry. Registry entries use
 * `component`; per-product work adds `product`.
 */
export interface ChildLoggerContext {
  component?: string;
  product?: string;
  source?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so packages depend on this one only.
 */
export type Logger = WinstonLogger;
