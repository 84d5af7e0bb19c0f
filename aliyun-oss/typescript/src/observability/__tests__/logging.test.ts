/**
 * Tests for loggers and redaction
 */

import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, InMemoryLogger, LogLevel, NoopLogger, redactSensitive } from '../logging.js';

describe('redactSensitive', () => {
  it('should hide secrets at any depth', () => {
    expect(
      redactSensitive({
        accessKeySecret: 'test-secret',
        request: { Authorization: 'OSS id:sig', url: 'http://b.example.com/k' },
        tags: ['a'],
      })
    ).toEqual({
      accessKeySecret: '[REDACTED]',
      request: { Authorization: '[REDACTED]', url: 'http://b.example.com/k' },
      tags: ['a'],
    });
  });
});

describe('ConsoleLogger', () => {
  it('should drop entries below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn, format: 'json' });

    logger.info('ignored');
    logger.warn('slow request', { durationMs: 1200 });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'WARN', message: 'slow request', durationMs: 1200 });
  });

  it('should carry child context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: 'json', context: { service: 'oss' } }).child({
      bucket: 'b1',
    });

    logger.error('failed', { signature: 'abc' });

    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'ERROR',
      service: 'oss',
      bucket: 'b1',
      signature: '[REDACTED]',
    });
  });
});

describe('InMemoryLogger', () => {
  it('should share entries with children', () => {
    const logger = new InMemoryLogger({ service: 'oss' });

    logger.child({ key: 'a.txt' }).debug('put');
    logger.info('done');

    expect(logger.getLogs()).toEqual([
      { level: LogLevel.Debug, message: 'put', context: { service: 'oss', key: 'a.txt' } },
      { level: LogLevel.Info, message: 'done', context: { service: 'oss' } },
    ]);
    expect(logger.getLogsByLevel(LogLevel.Info)).toHaveLength(1);

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child()).toBe(logger);
  });
});
