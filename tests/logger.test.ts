import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { createLogger, noopLogger } from '../src/logger.js';

const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

function lines(): unknown[] {
  return write.mock.calls.map(([chunk]): unknown => JSON.parse(String(chunk)));
}

beforeEach(() => {
  write.mockClear();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

afterAll(() => {
  write.mockRestore();
});

describe('createLogger', () => {
  it('writes one JSON line per event', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    createLogger('rfc2136').info('hello', { zone: 'example.org.' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0]).endsWith('\n')).toBe(true);
    expect(lines()[0]).toMatchObject({
      level: 'info',
      service: 'rfc2136',
      msg: 'hello',
      zone: 'example.org.',
    });
  });

  it('stays quiet below warn by default', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const logger = createLogger('rfc2136');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines()).toEqual([
      expect.objectContaining({ level: 'warn', msg: 'w' }),
      expect.objectContaining({ level: 'error', msg: 'e' }),
    ]);
  });

  it('honors LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    createLogger('rfc2136').warn('hidden');
    expect(write).not.toHaveBeenCalled();
  });

  it('carries child fields', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    createLogger('rfc2136', { a: 1 })
      .child({ nameserver: '127.0.0.1:53' })
      .debug('sent', { id: 7 });

    expect(lines()[0]).toMatchObject({
      level: 'debug',
      a: 1,
      nameserver: '127.0.0.1:53',
      id: 7,
    });
  });
});

describe('noopLogger', () => {
  it('writes nothing', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    noopLogger.child({ a: 1 }).error('nothing');
    expect(write).not.toHaveBeenCalled();
  });
});
