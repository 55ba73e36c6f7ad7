import {
  MONTH_NAME_PATTERN,
  WEEKDAY_PATTERN,
  parseMonthToken,
  parseWeekdayToken,
  toIsoDate,
  weekdayOfIsoDate,
} from '@/lib/flights/calendar';
import type { TargetMonth, Weekday } from '@/lib/flights/types';

export type DayHeader = { date: string; weekday: Weekday };

export type DayHeaderMatch =
  | { kind: 'header'; header: DayHeader }
  // The text looks like a header but names an impossible date.
  | { kind: 'invalid'; text: string }
  | { kind: 'none' };

const NONE: DayHeaderMatch = { kind: 'none' };

const cellHeaderRegex = new RegExp(
  `^(${WEEKDAY_PATTERN})\\.?,?\\s+(\\d{1,2})\\s+(${MONTH_NAME_PATTERN})\\.?\\s+(\\d{4})$`,
  'i',
);

const weekdayPrefix = `(?:\\b(${WEEKDAY_PATTERN})\\.?,?\\s+)?`;

const textDatePatterns: Array<{
  regex: RegExp;
  read: (m: RegExpMatchArray) => { year: number; month: number | null; day: number };
}> = [
  {
    // 2 February 2026, 2 Feb 2026
    regex: new RegExp(
      `${weekdayPrefix}\\b(\\d{1,2})\\s+(${MONTH_NAME_PATTERN})\\.?\\s+(\\d{4})\\b`,
      'i',
    ),
    read: (m) => ({
      day: Number(m[2]),
      month: parseMonthToken(m[3] ?? ''),
      year: Number(m[4]),
    }),
  },
  {
    // 02/02/2026
    regex: new RegExp(`${weekdayPrefix}\\b(\\d{1,2})/(\\d{1,2})/(\\d{4})\\b`, 'i'),
    read: (m) => ({ day: Number(m[2]), month: Number(m[3]), year: Number(m[4]) }),
  },
  {
    // 2026-02-02
    regex: new RegExp(`${weekdayPrefix}\\b(\\d{4})-(\\d{1,2})-(\\d{1,2})\\b`, 'i'),
    read: (m) => ({ year: Number(m[2]), month: Number(m[3]), day: Number(m[4]) }),
  },
];

function matchesTarget(
  year: number,
  month: number,
  target: TargetMonth | undefined,
): boolean {
  if (!target) return true;
  return target.year === year && target.month === month;
}

function resolveHeader(params: {
  text: string;
  year: number;
  month: number;
  day: number;
  weekdayToken: string | undefined;
}): DayHeaderMatch {
  const date = toIsoDate(params.year, params.month, params.day);
  if (!date) return { kind: 'invalid', text: params.text };

  const explicit = params.weekdayToken ? parseWeekdayToken(params.weekdayToken) : null;
  const weekday = explicit ?? weekdayOfIsoDate(date);
  if (!weekday) return { kind: 'invalid', text: params.text };
  return { kind: 'header', header: { date, weekday } };
}

/**
 * Header as printed in the first cell of a day table, e.g. "Mon 2 Feb 2026".
 * The whole cell must match.
 */
export function detectCellHeader(
  cell: string,
  target?: TargetMonth,
): DayHeaderMatch {
  const text = cell.trim().replaceAll(/\s+/g, ' ');
  const m = text.match(cellHeaderRegex);
  if (!m) return NONE;

  const month = parseMonthToken(m[3] ?? '');
  const year = Number(m[4]);
  if (!month || !matchesTarget(year, month, target)) return NONE;

  return resolveHeader({
    text,
    year,
    month,
    day: Number(m[2]),
    weekdayToken: m[1],
  });
}

/** First date found anywhere in a free-text line. */
export function detectTextHeader(
  line: string,
  target?: TargetMonth,
): DayHeaderMatch {
  const text = line.trim();
  for (const pattern of textDatePatterns) {
    const m = text.match(pattern.regex);
    if (!m) continue;

    const { year, month, day } = pattern.read(m);
    if (!month || !Number.isInteger(year) || !Number.isInteger(day)) continue;
    if (month < 1 || month > 12) return { kind: 'invalid', text };
    if (!matchesTarget(year, month, target)) return NONE;

    return resolveHeader({ text, year, month, day, weekdayToken: m[1] });
  }
  return NONE;
}
