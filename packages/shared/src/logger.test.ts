import { describe, expect, it, vi } from 'vitest';

import { createLogger, isLogLevel } from './logger';

function createSink() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createLogger', () => {
  it('drops messages below the configured level', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('[test] debug');
    logger.info('[test] info');
    logger.warn('[test] warn', { a: 1 });
    logger.error('[test] error');

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('[test] warn', { a: 1 });
    expect(sink.error).toHaveBeenCalledWith('[test] error');
  });

  it('defaults to info and routes debug through console.log', () => {
    const sink = createSink();
    createLogger({ sink }).debug('[test] hidden');
    expect(sink.log).not.toHaveBeenCalled();

    createLogger({ level: 'debug', sink }).debug('[test] shown', 1);
    expect(sink.log).toHaveBeenCalledWith('[test] shown', 1);
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
