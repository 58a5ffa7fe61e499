/**
 * Tests for calendar date helpers.
 */
import { describe, it, expect } from 'vitest';
import { daysBetween, formatLocalDate, parseIsoDate } from '../../../src/utils/date.js';

describe('parseIsoDate', () => {
  it('should parse a YYYY-MM-DD date as UTC midnight', () => {
    const date = parseIsoDate('2026-03-15');
    expect(date?.toISOString()).toBe('2026-03-15T00:00:00.000Z');
  });

  it('should reject other shapes', () => {
    expect(parseIsoDate('2026-3-15')).toBeNull();
    expect(parseIsoDate('15/03/2026')).toBeNull();
    expect(parseIsoDate('2026-03-15T10:00:00Z')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });

  it('should reject impossible dates', () => {
    expect(parseIsoDate('2026-02-30')).toBeNull();
    expect(parseIsoDate('2026-13-01')).toBeNull();
  });

  it('should accept leap days', () => {
    expect(parseIsoDate('2028-02-29')).not.toBeNull();
  });
});

describe('daysBetween', () => {
  it('should count whole days', () => {
    const from = parseIsoDate('2026-01-01');
    const to = parseIsoDate('2026-03-01');
    expect(from).not.toBeNull();
    expect(to).not.toBeNull();
    if (from && to) {
      expect(daysBetween(from, to)).toBe(59);
    }
  });

  it('should be negative when the target is earlier', () => {
    const from = new Date(Date.UTC(2026, 0, 10));
    const to = new Date(Date.UTC(2026, 0, 7));
    expect(daysBetween(from, to)).toBe(-3);
  });
});

describe('formatLocalDate', () => {
  it('should zero-pad month and day', () => {
    expect(formatLocalDate(new Date(2026, 0, 5, 12, 0, 0))).toBe('2026-01-05');
  });
});
