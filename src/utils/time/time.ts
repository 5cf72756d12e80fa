/**
 * Time utility functions
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}

/**
 * Format a moment as the naive UTC text stored in the database
 *
 * Second resolution, `YYYY-MM-DD HH:MM:SS`. Lexicographic order of these
 * strings matches chronological order, which the range queries rely on.
 *
 * @param date - Moment to format
 */
export function formatStorageTimestamp(date: Date): string {
  return date.getUTCFullYear() + '-' + pad2(date.getUTCMonth() + 1) + '-' + pad2(date.getUTCDate()) +
    ' ' + pad2(date.getUTCHours()) + ':' + pad2(date.getUTCMinutes()) + ':' + pad2(date.getUTCSeconds());
}

/**
 * Format a moment in local time for the live display (`DD/MM/YYYY HH:MM:SS`)
 * @param date - Moment to format
 */
export function formatDisplayTimestamp(date: Date): string {
  return pad2(date.getDate()) + '/' + pad2(date.getMonth() + 1) + '/' + date.getFullYear() +
    ' ' + pad2(date.getHours()) + ':' + pad2(date.getMinutes()) + ':' + pad2(date.getSeconds());
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Sleep for a fixed interval, resolving early when the signal aborts
 *
 * @param ms - Interval in milliseconds
 * @param signal - Optional cancellation signal
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal && signal.aborted) {
    return;
  }
  try {
    await delay(ms, undefined, { signal: signal });
  } catch (err) {
    if (isAbortError(err)) {
      return;
    }
    throw err;
  }
}
