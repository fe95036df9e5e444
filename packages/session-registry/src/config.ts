/**
 * @fileoverview Registry configuration from environment variables.
 */

import { z } from 'zod';
import { ConfigError, isConfigError } from '@sessionkit/contracts';
import { createLogger } from '@sessionkit/logger';
import type { Logger } from '@sessionkit/logger';
import { parseClock } from '@sessionkit/trade-session';
import { SessionRegistry } from './registry.js';

const clockText = z.string().transform((text, ctx) => {
  try {
    return parseClock(text);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: isConfigError(err) ? err.message : `Invalid time "${text}"`,
    });
    return z.NEVER;
  }
});

/**
 * Registry configuration schema
 */
export const registryConfigSchema = z.object({
  sessions: z
    .object({
      file: z.string().min(1).optional(),
      merge: z.boolean().default(true),
      morningWindow: z
        .object({
          from: clockText.default('06:00'),
          to: clockText.default('11:00'),
        })
        .default({}),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),
});

export type RegistryConfig = z.infer<typeof registryConfigSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  SESSIONS_FILE: 'sessions.file',
  SESSIONS_MERGE: 'sessions.merge',
  MORNING_WINDOW_FROM: 'sessions.morningWindow.from',
  MORNING_WINDOW_TO: 'sessions.morningWindow.to',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};

type RawConfig = { [key: string]: unknown };

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const existing = current[key];
    if (isRawConfig(existing)) {
      current = existing;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/**
 * Booleans become booleans; everything else stays text, so a clock value
 * such as "09:00" reaches the schema untouched.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigError} `invalid_config`, listing every failing path
 *
 * @example
 * ```typescript
 * const config = loadRegistryConfig({ SESSIONS_FILE: './sessions.csv', LOG_LEVEL: 'debug' });
 * config.sessions.merge; // true
 * ```
 */
export function loadRegistryConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  logger?: Logger
): RegistryConfig {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = registryConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`, {
      reason: 'invalid_config',
      errors,
    });
  }

  logger?.info('Configuration loaded', {
    sessionsFile: result.data.sessions.file,
    merge: result.data.sessions.merge,
    logLevel: result.data.logging.level,
  });

  return result.data;
}

/**
 * Logger described by the `logging` section.
 */
export function createLoggerFromConfig(config: RegistryConfig): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Builds a registry using the configured morning window and loads the
 * configured file, if any.
 *
 * @throws {SourceError} When the configured file cannot be loaded
 */
export function createRegistryFromConfig(config: RegistryConfig, logger?: Logger): SessionRegistry {
  const registry = new SessionRegistry({
    logger,
    session: { morningWindow: config.sessions.morningWindow },
  });

  if (config.sessions.file) {
    registry.loadFile(config.sessions.file, { merge: config.sessions.merge });
  }

  return registry;
}
