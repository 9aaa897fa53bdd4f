/**
 * Unit tests for delay helpers
 */

import { describe, test, expect } from 'vitest';
import { formatDuration, formatRunTimestamp, sleep } from './timing.ts';

describe('sleep', () => {
  test('an abort during the wait is INTERRUPTED', async () => {
    const controller = new AbortController();
    const pending = sleep(5000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ code: 'INTERRUPTED' });
  });

  test('an already aborted signal rejects immediately', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(0, controller.signal)).rejects.toMatchObject({ code: 'INTERRUPTED' });
  });
});

describe('formatRunTimestamp', () => {
  test('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatRunTimestamp(new Date(2023, 10, 5, 9, 7, 3))).toBe('20231105_090703');
  });
});

describe('formatDuration', () => {
  test('seconds below a minute', () => {
    expect(formatDuration(1234)).toBe('1.23s');
  });

  test('minutes and seconds above', () => {
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});
