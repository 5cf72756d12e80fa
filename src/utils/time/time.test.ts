/**
 * Tests for time utility functions
 */

import { now, nowMs, formatStorageTimestamp, formatDisplayTimestamp, sleep } from './time';

describe('Time Utilities', () => {
  describe('now', () => {
    it('should return current Unix timestamp in seconds', () => {
      const before = Math.floor(Date.now() / 1000);
      const result = now();
      const after = Math.floor(Date.now() / 1000);

      expect(result).toBeGreaterThanOrEqual(before);
      expect(result).toBeLessThanOrEqual(after);
    });

    it('should return an integer', () => {
      expect(Number.isInteger(now())).toBe(true);
    });
  });

  describe('nowMs', () => {
    it('should be consistent with Date.now()', () => {
      const before = Date.now();
      const result = nowMs();
      expect(result).toBeGreaterThanOrEqual(before);
    });
  });

  describe('formatStorageTimestamp', () => {
    it('should format in UTC with second resolution', () => {
      const date = new Date(Date.UTC(2024, 0, 5, 7, 8, 9, 999));
      expect(formatStorageTimestamp(date)).toBe('2024-01-05 07:08:09');
    });

    it('should zero-pad every field', () => {
      const date = new Date(Date.UTC(2023, 11, 31, 23, 59, 0));
      expect(formatStorageTimestamp(date)).toBe('2023-12-31 23:59:00');
    });
  });

  describe('formatDisplayTimestamp', () => {
    it('should format local time day-first', () => {
      const date = new Date(2024, 0, 5, 7, 8, 9);
      expect(formatDisplayTimestamp(date)).toBe('05/01/2024 07:08:09');
    });
  });

  describe('sleep', () => {
    it('should resolve after the interval', async () => {
      const start = Date.now();
      await sleep(20);
      expect(Date.now() - start).toBeGreaterThanOrEqual(15);
    });

    it('should resolve immediately when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const start = Date.now();
      await sleep(10000, controller.signal);
      expect(Date.now() - start).toBeLessThan(1000);
    });

    it('should resolve early when aborted mid-sleep', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);
      const start = Date.now();
      await sleep(10000, controller.signal);
      expect(Date.now() - start).toBeLessThan(1000);
    });
  });
});
