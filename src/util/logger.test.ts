import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, type LogSink } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes lines with the scope and passes extras through', () => {
    const sink = vi.fn<Parameters<LogSink>, void>();
    const logger = createLogger('ProtectAPI', { sink });

    logger.info('Sending GET', { attempt: 1 });

    expect(sink).toHaveBeenCalledWith('info', '[protect][ProtectAPI] Sending GET', { attempt: 1 });
  });

  it('drops lines below the threshold', () => {
    const sink = vi.fn<Parameters<LogSink>, void>();
    const logger = createLogger('test', { level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(sink.mock.calls.map(([level]) => level)).toEqual(['warn', 'error']);
  });

  it('emits nothing when silent', () => {
    const sink = vi.fn<Parameters<LogSink>, void>();
    const logger = createLogger('test', { level: 'silent', sink });

    logger.error('nope');

    expect(sink).not.toHaveBeenCalled();
  });

  it('defaults to info', () => {
    const sink = vi.fn<Parameters<LogSink>, void>();
    const logger = createLogger('test', { sink });

    logger.trace('a');
    logger.debug('b');
    logger.info('c');

    expect(sink).toHaveBeenCalledTimes(1);
  });

  it('survives a failing sink and reports it once', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('test', {
      sink: () => {
        throw new Error('disk full');
      },
    });

    expect(() => {
      logger.info('one');
      logger.info('two');
    }).not.toThrow();
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('writes to the console by default', () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('test').warn('careful');

    expect(consoleWarn).toHaveBeenCalledWith('[protect][test] careful');
  });
});
