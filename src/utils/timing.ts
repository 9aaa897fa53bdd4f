/**
 * Delay helpers. Every wait observes the run's abort signal so an operator
 * interrupt surfaces from inside a settle delay.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { createError } from '../types.ts';

/**
 * Throw INTERRUPTED if the run was cancelled
 */
export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createError('INTERRUPTED', 'Run interrupted by operator', { cause: signal.reason });
  }
}

/**
 * Sleep utility
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfInterrupted(signal);
  if (ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) {
      throw createError('INTERRUPTED', 'Run interrupted by operator', { cause: err });
    }
    throw err;
  }
}

/**
 * Run timestamp tag used in partial output names: YYYYMMDD_HHMMSS (local time)
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(2)}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}
