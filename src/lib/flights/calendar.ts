import { DateTime } from 'luxon';

import {
  WEEKDAYS,
  type DateFormat,
  type TargetMonth,
  type Weekday,
} from '@/lib/flights/types';

const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

export const MONTH_NAME_PATTERN =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

export const WEEKDAY_PATTERN =
  '(?:mon(?:day)?|tue(?:s(?:day)?)?|wed(?:nesday)?|thu(?:r(?:s(?:day)?)?)?|fri(?:day)?|sat(?:urday)?|sun(?:day)?)';

/** Accepts 3-letter or full English month names ("Sept" too). */
export function parseMonthToken(value: string): number | null {
  const token = value.trim().toLowerCase();
  if (token.length < 3) return null;
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(token.slice(0, 3)));
  if (index === -1) return null;
  const name = MONTH_NAMES[index];
  if (token !== name.slice(0, 3) && token !== name && token !== 'sept') {
    return null;
  }
  return index + 1;
}

export function parseWeekdayToken(value: string): Weekday | null {
  const key = value.trim().toLowerCase().slice(0, 3);
  return WEEKDAYS.find((w) => w.toLowerCase() === key) ?? null;
}

export function toIsoDate(year: number, month: number, day: number): string | null {
  const dt = DateTime.fromObject({ year, month, day }, { zone: 'utc' });
  if (!dt.isValid) return null;
  return dt.toISODate();
}

export function weekdayOfIsoDate(isoDate: string): Weekday | null {
  const dt = DateTime.fromISO(isoDate, { zone: 'utc' });
  if (!dt.isValid) return null;
  return WEEKDAYS[dt.weekday - 1] ?? null;
}

export function compareWeekdays(a: Weekday, b: Weekday): number {
  return WEEKDAYS.indexOf(a) - WEEKDAYS.indexOf(b);
}

/** Every date of `month` falling on `weekday`, ascending. */
export function datesOfWeekdayInMonth(month: TargetMonth, weekday: Weekday): string[] {
  const first = DateTime.fromObject(
    { year: month.year, month: month.month, day: 1 },
    { zone: 'utc' },
  );
  if (!first.isValid) return [];

  const target = WEEKDAYS.indexOf(weekday) + 1;
  const delta = (target - first.weekday + 7) % 7;
  const out: string[] = [];
  for (
    let dt = first.plus({ days: delta });
    dt.month === month.month;
    dt = dt.plus({ days: 7 })
  ) {
    const iso = dt.toISODate();
    if (iso) out.push(iso);
  }
  return out;
}

export function formatDateColumn(isoDate: string, format: DateFormat): string {
  const [, mm, dd] = isoDate.split('-');
  if (format === 'dd-mm') return `${dd}-${mm}`;
  const monthLabel = MONTH_ABBREVIATIONS[Number(mm) - 1] ?? mm;
  return `${dd} ${monthLabel}`;
}

/** dd/mm/yyyy, as shown in the summary period. */
export function formatDisplayDate(isoDate: string): string {
  const [yyyy, mm, dd] = isoDate.split('-');
  return `${dd}/${mm}/${yyyy}`;
}
