/**
 * @fileoverview Tests for redaction and pretty formatting
 */

import { describe, it, expect } from 'vitest';
import { redactSensitiveFields, isSensitiveField, renderPretty } from '../src/formats.js';

describe('redactSensitiveFields', () => {
  it('should redact password variants', () => {
    expect(redactSensitiveFields({ user: 'ops', passwd: 'a', pwd: 'b', PASSWORD: 'c' })).toEqual({
      user: 'ops',
      passwd: '[REDACTED]',
      pwd: '[REDACTED]',
      PASSWORD: '[REDACTED]',
    });
  });

  it('should redact nested objects and arrays', () => {
    const input = {
      source: { path: './sessions.csv', apiKey: 'test-key' },
      rows: [{ product: 'ag', token: 'test-token' }],
    };

    expect(redactSensitiveFields(input)).toEqual({
      source: { path: './sessions.csv', apiKey: '[REDACTED]' },
      rows: [{ product: 'ag', token: '[REDACTED]' }],
    });
  });

  it('should not mutate the input', () => {
    const input = { secret: 'test-secret' };
    redactSensitiveFields(input);

    expect(input.secret).toBe('test-secret');
  });

  it('should pass primitives through', () => {
    expect(redactSensitiveFields(42)).toBe(42);
    expect(redactSensitiveFields(null)).toBeNull();
  });
});

describe('isSensitiveField', () => {
  it('should match case-insensitively', () => {
    expect(isSensitiveField('Authorization')).toBe(true);
    expect(isSensitiveField('api_key')).toBe(true);
    expect(isSensitiveField('product')).toBe(false);
  });
});

describe('renderPretty', () => {
  it('should render context fields after the message', () => {
    const line = renderPretty({
      timestamp: '2025-01-02T03:04:05.006Z',
      level: 'info',
      message: 'Sessions loaded',
      component: 'session-registry',
      count: 2,
    });

    expect(line).toBe('[2025-01-02T03:04:05.006Z] info: Sessions loaded component=session-registry count=2');
  });

  it('should append the stack on its own line', () => {
    const line = renderPretty({
      timestamp: 't',
      level: 'error',
      message: 'Load failed',
      stack: 'SourceError: bad row\n    at parse',
    });

    expect(line).toBe('[t] error: Load failed\nSourceError: bad row\n    at parse');
  });
});
