import type { Direction, FlightRecord, RawFlightRow } from '@/lib/flights/types';

const ARRIVAL_CODES = new Set(['A', 'ARR', 'ARRIVAL']);
const DEPARTURE_CODES = new Set(['P', 'D', 'DEP', 'DEPT', 'DEPARTURE']);

export function normalizeDirection(code: string): Direction {
  const key = code.trim().toUpperCase();
  if (ARRIVAL_CODES.has(key)) return 'Arrival';
  if (DEPARTURE_CODES.has(key)) return 'Departure';
  return 'Unknown';
}

function optionalUpper(value: string): string | undefined {
  const v = value.trim().toUpperCase();
  return v.length > 0 ? v : undefined;
}

export type NormalizeOutcome = {
  records: FlightRecord[];
  dropped: number;
  unknownDirection: number;
};

/** PAX rows only; everything else is counted and dropped. */
export function normalizeRows(rows: readonly RawFlightRow[]): NormalizeOutcome {
  const records: FlightRecord[] = [];
  let dropped = 0;
  let unknownDirection = 0;

  for (const row of rows) {
    const type = row.type.trim().toUpperCase();
    const flight = row.flight.trim();
    if (type !== 'PAX' || flight.length === 0) {
      dropped += 1;
      continue;
    }

    const direction = normalizeDirection(row.direction);
    if (direction === 'Unknown') unknownDirection += 1;

    const record: FlightRecord = {
      date: row.date,
      weekday: row.weekday,
      flight,
      route: row.route.trim(),
      direction,
      directionCode: row.direction.trim().toUpperCase(),
      type,
    };
    const eta = optionalUpper(row.eta);
    const etd = optionalUpper(row.etd);
    if (eta) record.eta = eta;
    if (etd) record.etd = etd;
    records.push(record);
  }

  return { records, dropped, unknownDirection };
}
