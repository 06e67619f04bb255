/**
 * Unit tests for configuration and logging
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG, loadConfig } from '../../src/core/config/config.js';
import { ScratchError, ScratchErrorCode } from '../../src/core/errors/scratch-error.js';
import { createLogger, createModuleLogger } from '../../src/core/logging/logger.js';

describe('Configuration', () => {
  it('should be silent under test', () => {
    expect(loadConfig({ NODE_ENV: 'test' })).toEqual({
      logLevel: 'silent',
      logName: 'rendermark-scratch',
    });
  });

  it('should default to info in production and debug elsewhere', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).logLevel).toBe(DEFAULT_CONFIG.logLevel);
    expect(loadConfig({}).logLevel).toBe('debug');
  });

  it('should prefer SCRATCH_LOG_LEVEL over LOG_LEVEL', () => {
    expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
    expect(loadConfig({ LOG_LEVEL: 'warn', SCRATCH_LOG_LEVEL: 'trace' }).logLevel).toBe('trace');
  });

  it('should turn logging off', () => {
    expect(loadConfig({ SCRATCH_LOGGING: 'false', SCRATCH_LOG_LEVEL: 'debug' }).logLevel).toBe(
      'silent'
    );
  });

  it('should take a log name', () => {
    expect(loadConfig({ SCRATCH_LOG_NAME: 'site-build' }).logName).toBe('site-build');
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ NODE_ENV: 'test', PATH: '/usr/bin' }).logLevel).toBe('silent');
  });

  it('should ignore a LOG_LEVEL it does not recognise', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG', NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ LOG_LEVEL: 'verbose', NODE_ENV: 'production' }).logLevel).toBe('info');
    expect(loadConfig({ LOG_LEVEL: 'loud', SCRATCH_LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });

  it('should reject an unknown SCRATCH_LOG_LEVEL', () => {
    expect.assertions(2);

    try {
      loadConfig({ SCRATCH_LOG_LEVEL: 'loud' });
    } catch (error) {
      expect(error).toBeInstanceOf(ScratchError);
      if (error instanceof ScratchError) {
        expect(error.code).toBe(ScratchErrorCode.INVALID_CONFIG);
      }
    }
  });
});

describe('Logger', () => {
  function capture(level: 'debug' | 'info'): { lines: string[]; config: { logLevel: 'debug' | 'info'; logName: string } } {
    return { lines: [], config: { logLevel: level, logName: 'logger-test' } };
  }

  it('should write JSON lines with the level label and name', () => {
    const { lines, config } = capture('info');
    const logger = createLogger(config, { write: (msg: string) => lines.push(msg) });

    logger.info({ page: '/about' }, 'rendered');

    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    expect(entry).toMatchObject({
      level: 'info',
      name: 'logger-test',
      page: '/about',
      msg: 'rendered',
    });
    expect(typeof entry['time']).toBe('string');
  });

  it('should drop lines below the configured level', () => {
    const { lines, config } = capture('info');
    const logger = createLogger(config, { write: (msg: string) => lines.push(msg) });

    logger.debug('hidden');
    expect(lines).toHaveLength(0);
  });

  it('should bind the module name on child loggers', () => {
    const { lines, config } = capture('debug');
    const parent = createLogger(config, { write: (msg: string) => lines.push(msg) });

    createModuleLogger('scratch', parent).debug('hello');

    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    expect(entry).toMatchObject({ module: 'scratch', msg: 'hello' });
  });
});
