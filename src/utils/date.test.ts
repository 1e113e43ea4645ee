import { describe, it, expect } from 'vitest';
import {
  formatClock,
  formatRelativeDay,
  formatTimeSpan,
  formatTimeUntil,
  getTodayRange,
  getUpcomingRange,
  toGraphDateTime
} from './date.js';

// TZ=UTC（vitest.setup.ts）
describe('date utils', () => {
  const now = new Date('2025-01-20T10:15:30Z');

  it('should span the local day', () => {
    const range = getTodayRange(now);
    expect(range.start.toISOString()).toBe('2025-01-20T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2025-01-21T00:00:00.000Z');
  });

  it('should span the requested number of days from now', () => {
    const range = getUpcomingRange(now, 3);
    expect(range.start).toBe(now);
    expect(range.end.toISOString()).toBe('2025-01-23T10:15:30.000Z');
  });

  it('should format Graph date times in UTC', () => {
    expect(toGraphDateTime(now)).toBe('2025-01-20T10:15:30.000Z');
  });

  describe('formatTimeUntil', () => {
    it('should show minutes below an hour', () => {
      expect(formatTimeUntil(0)).toBe('in 0m');
      expect(formatTimeUntil(59_999)).toBe('in 0m');
      expect(formatTimeUntil(14 * 60000)).toBe('in 14m');
      expect(formatTimeUntil(59 * 60000 + 59_000)).toBe('in 59m');
    });

    it('should show hours and minutes', () => {
      expect(formatTimeUntil(60 * 60000)).toBe('in 1h0m');
      expect(formatTimeUntil(125 * 60000)).toBe('in 2h5m');
    });

    it('should clamp negative durations', () => {
      expect(formatTimeUntil(-5 * 60000)).toBe('in 0m');
    });
  });

  it('should format clock times', () => {
    expect(formatClock(now)).toBe('10:15');
    expect(formatTimeSpan(now, new Date('2025-01-20T11:00:00Z'))).toBe('10:15-11:00');
  });

  it('should label days relative to now', () => {
    expect(formatRelativeDay(new Date('2025-01-20T16:00:00Z'), now)).toBe('16:00');
    expect(formatRelativeDay(new Date('2025-01-21T09:30:00Z'), now)).toBe('Tomorrow 09:30');
    expect(formatRelativeDay(new Date('2025-01-23T14:00:00Z'), now)).toBe('Thu 23/1 14:00');
  });
});
