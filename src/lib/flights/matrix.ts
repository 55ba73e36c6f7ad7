import {
  compareWeekdays,
  datesOfWeekdayInMonth,
  formatDateColumn,
} from '@/lib/flights/calendar';
import {
  matrixOptionsSchema,
  type FlightMatrix,
  type FlightRecord,
  type MatrixOptions,
  type MatrixRow,
  type TargetMonth,
  type Weekday,
} from '@/lib/flights/types';

/** ETA for arrivals, ETD for departures; nothing otherwise. */
export function displayTime(record: FlightRecord): string | null {
  if (record.direction === 'Arrival') return record.eta ?? null;
  if (record.direction === 'Departure') return record.etd ?? null;
  return null;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareRowKeys(a: MatrixRow, b: MatrixRow): number {
  return (
    compareText(a.flight, b.flight) ||
    compareText(a.route, b.route) ||
    compareText(a.direction, b.direction)
  );
}

function paddingMonth(
  target: TargetMonth | undefined,
  dates: readonly string[],
): TargetMonth | null {
  if (target) return target;
  const earliest = dates[0];
  if (!earliest) return null;
  const [year, month] = earliest.split('-').map(Number);
  return { year, month };
}

export function listWeekdaysPresent(records: readonly FlightRecord[]): Weekday[] {
  return [...new Set(records.map((r) => r.weekday))].sort(compareWeekdays);
}

/**
 * Pivot one weekday's records into (flight, route, direction) × date.
 * Collisions keep the first value in traversal order.
 */
export function buildWeekdayMatrix(
  records: readonly FlightRecord[],
  weekday: Weekday,
  input: Partial<MatrixOptions> = {},
): FlightMatrix {
  const options = matrixOptionsSchema.parse(input);

  type Entry = Omit<MatrixRow, 'cells'> & { byDate: Map<string, string> };
  const entries = new Map<string, Entry>();
  const dates = new Set<string>();

  for (const record of records) {
    if (record.weekday !== weekday) continue;
    const time = displayTime(record);
    if (time === null || record.direction === 'Unknown') continue;

    const key = JSON.stringify([record.flight, record.route, record.direction]);
    let entry = entries.get(key);
    if (!entry) {
      entry = {
        flight: record.flight,
        route: record.route,
        direction: record.direction,
        directionCode: record.directionCode,
        byDate: new Map(),
      };
      entries.set(key, entry);
    }
    if (!entry.byDate.has(record.date)) entry.byDate.set(record.date, time);
    dates.add(record.date);
  }

  const sortedDates = [...dates].sort(compareText);
  let columnDates = sortedDates;
  if (options.padMonth) {
    const month = paddingMonth(options.target, sortedDates);
    if (month) {
      const all = new Set([...datesOfWeekdayInMonth(month, weekday), ...sortedDates]);
      columnDates = [...all].sort(compareText);
    }
  }

  const rows: MatrixRow[] = [...entries.values()]
    .map(({ byDate, ...key }) => ({
      ...key,
      cells: columnDates.map((date) => byDate.get(date) ?? null),
    }))
    .sort(compareRowKeys);

  return {
    weekday,
    columns: columnDates.map((date) => ({
      date,
      label: formatDateColumn(date, options.dateFormat),
    })),
    rows,
  };
}

/** Header row plus one row per key, as plain strings (absent cells empty). */
export function matrixToTable(
  matrix: FlightMatrix,
  labels: { flight: string; route: string; direction: string } = {
    flight: 'Flight',
    route: 'Route',
    direction: 'AD',
  },
): string[][] {
  const header = [
    labels.flight,
    labels.route,
    labels.direction,
    ...matrix.columns.map((c) => c.label),
  ];
  const body = matrix.rows.map((row) => [
    row.flight,
    row.route,
    row.directionCode,
    ...row.cells.map((cell) => cell ?? ''),
  ]);
  return [header, ...body];
}
