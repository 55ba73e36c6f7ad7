import { describe, expect, it } from 'vitest';

import {
  compareWeekdays,
  datesOfWeekdayInMonth,
  formatDateColumn,
  formatDisplayDate,
  parseMonthToken,
  parseWeekdayToken,
  toIsoDate,
  weekdayOfIsoDate,
} from '@/lib/flights/calendar';
import type { Weekday } from '@/lib/flights/types';

describe('parseMonthToken', () => {
  it('accepts short and full english names', () => {
    expect(parseMonthToken('Feb')).toBe(2);
    expect(parseMonthToken('february')).toBe(2);
    expect(parseMonthToken('SEPT')).toBe(9);
    expect(parseMonthToken('December')).toBe(12);
  });

  it('rejects partial or unknown tokens', () => {
    expect(parseMonthToken('Febr')).toBeNull();
    expect(parseMonthToken('xx')).toBeNull();
    expect(parseMonthToken('Foo')).toBeNull();
  });
});

describe('parseWeekdayToken', () => {
  it('maps any casing and long names to the short label', () => {
    expect(parseWeekdayToken('sun')).toBe('Sun');
    expect(parseWeekdayToken('Wednesday')).toBe('Wed');
    expect(parseWeekdayToken('Xyz')).toBeNull();
  });
});

describe('calendar dates', () => {
  it('rejects impossible dates', () => {
    expect(toIsoDate(2026, 2, 2)).toBe('2026-02-02');
    expect(toIsoDate(2026, 2, 30)).toBeNull();
    expect(toIsoDate(2026, 13, 1)).toBeNull();
  });

  it('derives the weekday from a date', () => {
    expect(weekdayOfIsoDate('2026-02-02')).toBe('Mon');
    expect(weekdayOfIsoDate('2026-02-22')).toBe('Sun');
    expect(weekdayOfIsoDate('not-a-date')).toBeNull();
  });

  it('lists every date of a weekday in a month', () => {
    expect(datesOfWeekdayInMonth({ year: 2026, month: 2 }, 'Mon')).toEqual([
      '2026-02-02',
      '2026-02-09',
      '2026-02-16',
      '2026-02-23',
    ]);
    expect(datesOfWeekdayInMonth({ year: 2026, month: 2 }, 'Sun')).toEqual([
      '2026-02-01',
      '2026-02-08',
      '2026-02-15',
      '2026-02-22',
    ]);
  });

  it('orders weekdays Monday first', () => {
    const days: Weekday[] = ['Sun', 'Mon', 'Thu'];
    expect([...days].sort(compareWeekdays)).toEqual(['Mon', 'Thu', 'Sun']);
  });
});

describe('date labels', () => {
  it('formats matrix columns', () => {
    expect(formatDateColumn('2026-02-09', 'dd-mm')).toBe('09-02');
    expect(formatDateColumn('2026-02-09', 'dd MonAbbrev')).toBe('09 Feb');
  });

  it('formats the summary period', () => {
    expect(formatDisplayDate('2026-02-01')).toBe('01/02/2026');
  });
});
