import { describe, it, expect, vi } from 'vitest';
import { createCapturingLogger, createConsoleLogger, silentLogger, withLogContext } from './logger.js';

function fakeConsole() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('writes prefixed lines at or above the configured level', () => {
    const output = fakeConsole();
    const logger = createConsoleLogger({ level: 'warn', output });

    logger.info('Transaction committed', { steps: ['model'] });
    logger.warn('Transaction rolled back', { step: 'model' });
    logger.error('Broken chain');

    expect(output.info).not.toHaveBeenCalled();
    expect(output.warn).toHaveBeenCalledWith('[trailkeep] WARN Transaction rolled back', { step: 'model' });
    expect(output.error).toHaveBeenCalledWith('[trailkeep] ERROR Broken chain');
  });

  it('defaults to info with a custom prefix', () => {
    const output = fakeConsole();
    const logger = createConsoleLogger({ prefix: 'audit', output });

    logger.debug('Running step');
    logger.info('Transaction committed');

    expect(output.debug).not.toHaveBeenCalled();
    expect(output.info).toHaveBeenCalledWith('[audit] INFO Transaction committed');
  });
});

describe('withLogContext', () => {
  it('adds context to every entry, letting entry data win', () => {
    const logger = createCapturingLogger();
    const scoped = withLogContext(logger, { operation: 'insert', step: 'none' });

    scoped.debug('Running step', { step: 'model' });
    scoped.info('Transaction committed');

    expect(logger.entries).toEqual([
      { level: 'debug', message: 'Running step', data: { operation: 'insert', step: 'model' } },
      { level: 'info', message: 'Transaction committed', data: { operation: 'insert', step: 'none' } },
    ]);
  });
});

describe('silentLogger', () => {
  it('accepts every level', () => {
    expect(() => {
      silentLogger.debug('a');
      silentLogger.error('b', { c: 1 });
    }).not.toThrow();
  });
});
