import { describe, it, expect } from 'vitest';
import { defaultWindowMs, loadConfig, parseWindowMs } from './config.js';
import { ConfigError, InvalidWindowError, isConfigError, isInvalidWindowError } from './lib/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({ LOG_LEVEL: 'info', TIMEWINDOW_DEFAULT_MS: 60_000 });
  });

  it('coerces TIMEWINDOW_DEFAULT_MS from a string', () => {
    expect(loadConfig({ TIMEWINDOW_DEFAULT_MS: '250', LOG_LEVEL: 'debug' })).toEqual({
      LOG_LEVEL: 'debug',
      TIMEWINDOW_DEFAULT_MS: 250,
    });
  });

  it('lists every offending variable on the error', () => {
    try {
      loadConfig({ LOG_LEVEL: 'loud', TIMEWINDOW_DEFAULT_MS: '-5' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e).toMatchObject({ variables: ['LOG_LEVEL', 'TIMEWINDOW_DEFAULT_MS'] });
    }
  });

  it('defaultWindowMs reads only TIMEWINDOW_DEFAULT_MS', () => {
    expect(defaultWindowMs({ LOG_LEVEL: 'loud', TIMEWINDOW_DEFAULT_MS: '750' })).toBe(750);
    expect(defaultWindowMs({})).toBe(60_000);
    expect(() => defaultWindowMs({ TIMEWINDOW_DEFAULT_MS: '-1' })).toThrow(ConfigError);
  });

  it('rejects a negative default window with ConfigError', () => {
    expect(() => loadConfig({ TIMEWINDOW_DEFAULT_MS: '-5' })).toThrow(ConfigError);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^environment validation failed: LOG_LEVEL: /);
    try {
      loadConfig({ LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (e) {
      expect(isConfigError(e)).toBe(true);
    }
  });
});

describe('parseWindowMs', () => {
  it('accepts zero and fractional durations', () => {
    expect(parseWindowMs(0)).toBe(0);
    expect(parseWindowMs(12.5)).toBe(12.5);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY, '100'])('rejects %s', (bad) => {
    expect(() => parseWindowMs(bad)).toThrow(InvalidWindowError);
  });

  it('keeps the rejected value on the error', () => {
    try {
      parseWindowMs(-1);
      expect.unreachable();
    } catch (e) {
      expect(isInvalidWindowError(e)).toBe(true);
      expect(e).toMatchObject({ name: 'InvalidWindowError', windowMs: -1 });
    }
  });
});
