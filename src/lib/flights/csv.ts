import { matrixToTable } from '@/lib/flights/matrix';
import type { FlightMatrix, Weekday } from '@/lib/flights/types';

export type ExportLabels = {
  flight: string;
  route: string;
  direction: string;
  weekdays: Record<Weekday, string>;
};

export const EXPORT_LABELS: Record<'en' | 'it', ExportLabels> = {
  en: {
    flight: 'Flight',
    route: 'Route',
    direction: 'AD',
    weekdays: {
      Mon: 'Monday',
      Tue: 'Tuesday',
      Wed: 'Wednesday',
      Thu: 'Thursday',
      Fri: 'Friday',
      Sat: 'Saturday',
      Sun: 'Sunday',
    },
  },
  it: {
    flight: 'Codice Volo',
    route: 'Aeroporto',
    direction: 'AD',
    weekdays: {
      Mon: 'Lunedì',
      Tue: 'Martedì',
      Wed: 'Mercoledì',
      Thu: 'Giovedì',
      Fri: 'Venerdì',
      Sat: 'Sabato',
      Sun: 'Domenica',
    },
  },
};

/** e.g. `flight_matrix_lunedì.csv` */
export function exportFileName(weekday: Weekday, labels: ExportLabels = EXPORT_LABELS.en): string {
  return `flight_matrix_${labels.weekdays[weekday].toLowerCase()}.csv`;
}

function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replaceAll('"', '""')}"`;
}

export function toCsv(table: readonly (readonly string[])[]): string {
  return table.map((row) => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
}

export function matrixToCsv(
  matrix: FlightMatrix,
  labels?: ExportLabels,
): string {
  return toCsv(matrixToTable(matrix, labels));
}

/**
 * Reads comma-separated text with double-quote escaping. A trailing line
 * break does not produce an extra empty row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\r' && text[i + 1] === '\n') {
      endRow();
      i += 1;
    } else if (ch === '\n' || ch === '\r') {
      endRow();
    } else {
      field += ch;
    }
    i += 1;
  }

  if (field.length > 0 || row.length > 0) endRow();
  return rows;
}
