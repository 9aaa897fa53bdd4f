/**
 * Tests for the leveled logger
 */

import { describe, test, expect } from 'vitest';
import { createLogger, formatMessage, isLogLevel, type LoggerOptions } from './logger.ts';

function capture(options: LoggerOptions = {}) {
  const lines: Array<[string, string]> = [];
  const logger = createLogger({ ...options, write: (lvl, line) => lines.push([lvl, line]) });
  return { logger, lines };
}

describe('formatMessage', () => {
  test('formats timestamp, level, scope and data', () => {
    const line = formatMessage('info', 'Saved results', { rows: 3 }, 'reinfo');
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[reinfo\] Saved results \{"rows":3\}$/);
  });

  test('omits empty data and missing scope', () => {
    const line = formatMessage('warning', 'Careful', {});
    expect(line).toMatch(/^\[[^\]]+\] \[WARNING\] Careful$/);
  });
});

describe('createLogger', () => {
  test('drops messages below the configured level', () => {
    const { logger, lines } = capture({ level: 'warning' });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');

    expect(lines.map(([lvl]) => lvl)).toEqual(['warning', 'error']);
  });

  test('silent suppresses everything', () => {
    const { logger, lines } = capture({ level: 'silent' });
    logger.error('nope');
    expect(lines).toEqual([]);
  });

  test('child scopes nest with a colon', () => {
    const { logger, lines } = capture({ level: 'info', scope: 'sunat' });

    logger.child('batch').child('navigator').info('hello');

    expect(lines[0]?.[1]).toContain('[INFO] [sunat:batch:navigator] hello');
  });
});

describe('isLogLevel', () => {
  test('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
