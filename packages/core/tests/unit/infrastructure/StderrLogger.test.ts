import { describe, it, expect } from 'vitest';
import { StderrLogger, resolveLogLevel } from '../../../src/infrastructure/logging/StderrLogger.js';

function capture(level: 'error' | 'warn' | 'info' | 'debug') {
  const lines: string[] = [];
  const logger = new StderrLogger({ level, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('StderrLogger', () => {
  it('should write prefixed lines with metadata', () => {
    const { logger, lines } = capture('debug');

    logger.info('Synthesized Person', { fields: 3 });

    expect(lines).toEqual(['[rowmodel] INFO: Synthesized Person {"fields":3}\n']);
  });

  it('should drop entries below the configured level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toEqual(['[rowmodel] WARN: shown\n', '[rowmodel] ERROR: shown too\n']);
  });

  it('should change level at runtime', () => {
    const { logger, lines } = capture('error');

    logger.setLevel('debug');
    logger.debug('now visible');

    expect(lines).toEqual(['[rowmodel] DEBUG: now visible\n']);
  });

  it('should use a custom prefix', () => {
    const lines: string[] = [];
    const logger = new StderrLogger({ level: 'info', prefix: 'sync', write: (line) => lines.push(line) });

    logger.info('done');

    expect(lines).toEqual(['[sync] INFO: done\n']);
  });
});

describe('resolveLogLevel', () => {
  it('should read the level from the environment', () => {
    expect(resolveLogLevel({ ROWMODEL_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('should fall back to warn when unset or unknown', () => {
    expect(resolveLogLevel({})).toBe('warn');
    expect(resolveLogLevel({ ROWMODEL_LOG_LEVEL: 'verbose' })).toBe('warn');
  });
});
