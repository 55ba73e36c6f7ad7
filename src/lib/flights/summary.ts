import { formatDisplayDate } from '@/lib/flights/calendar';
import { listWeekdaysPresent } from '@/lib/flights/matrix';
import type { FlightRecord, Weekday } from '@/lib/flights/types';

export type RecordSummary = {
  flightCount: number;
  dayCount: number;
  firstDate: string | null;
  lastDate: string | null;
  weekdays: Weekday[];
};

export function summarizeRecords(records: readonly FlightRecord[]): RecordSummary {
  const days = [...new Set(records.map((r) => r.date))].sort();
  return {
    flightCount: records.length,
    dayCount: days.length,
    firstDate: days[0] ?? null,
    lastDate: days[days.length - 1] ?? null,
    weekdays: listWeekdaysPresent(records),
  };
}

export function formatSummary(summary: RecordSummary): string {
  const lines = [
    `PAX flights: ${summary.flightCount}`,
    `Days covered: ${summary.dayCount}`,
  ];
  if (summary.firstDate && summary.lastDate) {
    lines.push(
      `Period: ${formatDisplayDate(summary.firstDate)} – ${formatDisplayDate(summary.lastDate)}`,
    );
  }
  return lines.join('\n');
}
