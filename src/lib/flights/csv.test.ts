import { describe, expect, it } from 'vitest';

import { EXPORT_LABELS, exportFileName, matrixToCsv, parseCsv, toCsv } from '@/lib/flights/csv';
import { buildWeekdayMatrix, matrixToTable } from '@/lib/flights/matrix';
import type { FlightRecord } from '@/lib/flights/types';

function record(overrides: Partial<FlightRecord>): FlightRecord {
  return {
    date: '2026-02-02',
    weekday: 'Mon',
    flight: 'DX100',
    route: 'FCO',
    direction: 'Departure',
    directionCode: 'P',
    type: 'PAX',
    etd: '07:30',
    ...overrides,
  };
}

const records = [
  record({}),
  record({ date: '2026-02-09', etd: '07:35' }),
  record({ flight: 'DX101', route: 'ROME, "FCO"', direction: 'Arrival', directionCode: 'A', eta: '08:10' }),
];

describe('toCsv', () => {
  it('quotes fields with separators, quotes or line breaks', () => {
    expect(toCsv([['a', 'b,c'], ['"q"', 'x\ny']])).toBe('a,"b,c"\r\n"""q""","x\ny"\r\n');
  });
});

describe('parseCsv', () => {
  it('reads quoted fields back', () => {
    expect(parseCsv('a,"b,c"\r\n"""q""","x\ny"\r\n')).toEqual([
      ['a', 'b,c'],
      ['"q"', 'x\ny'],
    ]);
  });

  it('keeps empty fields and tolerates a missing final line break', () => {
    expect(parseCsv('a,,\r\nb,c')).toEqual([
      ['a', '', ''],
      ['b', 'c'],
    ]);
  });
});

describe('matrixToCsv', () => {
  it('writes a header and one line per flight key', () => {
    const csv = matrixToCsv(buildWeekdayMatrix(records, 'Mon'));
    expect(csv.split('\r\n')).toEqual([
      'Flight,Route,AD,02-02,09-02',
      'DX100,FCO,P,07:30,07:35',
      'DX101,"ROME, ""FCO""",A,08:10,',
      '',
    ]);
  });

  it('uses localized header labels', () => {
    const csv = matrixToCsv(buildWeekdayMatrix(records, 'Mon'), EXPORT_LABELS.it);
    expect(csv.split('\r\n')[0]).toBe('Codice Volo,Aeroporto,AD,02-02,09-02');
  });

  it('names the export after the localized weekday', () => {
    expect(exportFileName('Mon', EXPORT_LABELS.it)).toBe('flight_matrix_lunedì.csv');
    expect(exportFileName('Sun', EXPORT_LABELS.it)).toBe('flight_matrix_domenica.csv');
    expect(exportFileName('Wed')).toBe('flight_matrix_wednesday.csv');
  });

  it('reproduces the matrix table after a re-parse', () => {
    const matrix = buildWeekdayMatrix(records, 'Mon');
    expect(parseCsv(matrixToCsv(matrix))).toEqual(matrixToTable(matrix));
  });
});
