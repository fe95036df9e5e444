import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ConfigError, SourceError } from '@sessionkit/contracts';
import { createLoggerFromConfig, createRegistryFromConfig, loadRegistryConfig } from '../src/config.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/sessions.csv', import.meta.url));

describe('loadRegistryConfig', () => {
  it('should apply defaults', () => {
    const config = loadRegistryConfig({});

    expect(config.sessions.file).toBeUndefined();
    expect(config.sessions.merge).toBe(true);
    expect(config.sessions.morningWindow).toEqual({
      from: { hour: 6, minute: 0, second: 0, millisecond: 0 },
      to: { hour: 11, minute: 0, second: 0, millisecond: 0 },
    });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
  });

  it('should read every mapped variable', () => {
    const config = loadRegistryConfig({
      SESSIONS_FILE: './sessions.csv',
      SESSIONS_MERGE: 'false',
      MORNING_WINDOW_FROM: '08:30',
      MORNING_WINDOW_TO: '12:00',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      LOG_FILE: './logs/sessions.log',
    });

    expect(config.sessions).toEqual({
      file: './sessions.csv',
      merge: false,
      morningWindow: {
        from: { hour: 8, minute: 30, second: 0, millisecond: 0 },
        to: { hour: 12, minute: 0, second: 0, millisecond: 0 },
      },
    });
    expect(config.logging).toEqual({ level: 'debug', format: 'json', filePath: './logs/sessions.log' });
  });

  it('should ignore unrelated and empty variables', () => {
    const config = loadRegistryConfig({ HOME: '/home/ops', SESSIONS_FILE: '' });

    expect(config.sessions.file).toBeUndefined();
  });

  it('should list every invalid path', () => {
    let caught: unknown;
    try {
      loadRegistryConfig({ LOG_LEVEL: 'verbose', MORNING_WINDOW_TO: '25:00', SESSIONS_MERGE: 'yes' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.data.reason).toBe('invalid_config');
      expect(caught.data['errors']).toHaveLength(3);
      expect(caught.message).toContain('sessions.merge:');
      expect(caught.message).toContain('sessions.morningWindow.to:');
      expect(caught.message).toContain('logging.level:');
    }
  });
});

describe('createRegistryFromConfig', () => {
  it('should load the configured file with the configured morning window', () => {
    const config = loadRegistryConfig({
      SESSIONS_FILE: FIXTURE,
      MORNING_WINDOW_FROM: '12:00',
      MORNING_WINDOW_TO: '14:00',
    });
    const registry = createRegistryFromConfig(config);

    expect(registry.count()).toBe(4);
    expect(registry.morningBegin('ag', 'minute')).toBe(13 * 60 + 30);
  });

  it('should start empty without a file', () => {
    expect(createRegistryFromConfig(loadRegistryConfig({})).count()).toBe(0);
  });

  it('should fail when the configured file is missing', () => {
    const config = loadRegistryConfig({
      SESSIONS_FILE: fileURLToPath(new URL('./fixtures/missing.csv', import.meta.url)),
    });

    expect(() => createRegistryFromConfig(config)).toThrow(SourceError);
  });
});

describe('createLoggerFromConfig', () => {
  it('should use the configured level', () => {
    const logger = createLoggerFromConfig(loadRegistryConfig({ LOG_LEVEL: 'warn', LOG_FORMAT: 'json' }));

    expect(logger.level).toBe('warn');
  });
});
