import { describe, expect, it } from 'vitest';

import { detectCellHeader, detectTextHeader } from '@/lib/flights/dayHeader';

const FEB_2026 = { year: 2026, month: 2 };

describe('detectCellHeader', () => {
  it('recognizes a table day header', () => {
    expect(detectCellHeader('Mon 2 Feb 2026', FEB_2026)).toEqual({
      kind: 'header',
      header: { date: '2026-02-02', weekday: 'Mon' },
    });
  });

  it('is case-insensitive and tolerates extra spacing', () => {
    expect(detectCellHeader('  sun   22 feb 2026 ', FEB_2026)).toEqual({
      kind: 'header',
      header: { date: '2026-02-22', weekday: 'Sun' },
    });
  });

  it('keeps the printed weekday over the computed one', () => {
    expect(detectCellHeader('Tue 2 Feb 2026')).toEqual({
      kind: 'header',
      header: { date: '2026-02-02', weekday: 'Tue' },
    });
  });

  it('reports impossible dates as invalid', () => {
    expect(detectCellHeader('Mon 30 Feb 2026', FEB_2026)).toEqual({
      kind: 'invalid',
      text: 'Mon 30 Feb 2026',
    });
  });

  it('ignores other months, partial matches and column titles', () => {
    expect(detectCellHeader('Mon 2 Mar 2026', FEB_2026)).toEqual({ kind: 'none' });
    expect(detectCellHeader('Mon 2 Feb 2026 extra', FEB_2026)).toEqual({ kind: 'none' });
    expect(detectCellHeader('Flight', FEB_2026)).toEqual({ kind: 'none' });
  });
});

describe('detectTextHeader', () => {
  it('finds a day-month-name date and derives the weekday', () => {
    expect(detectTextHeader('Schedule for 2 February 2026')).toEqual({
      kind: 'header',
      header: { date: '2026-02-02', weekday: 'Mon' },
    });
  });

  it('uses a weekday token placed before the date', () => {
    expect(detectTextHeader('Wednesday 4 Feb 2026')).toEqual({
      kind: 'header',
      header: { date: '2026-02-04', weekday: 'Wed' },
    });
  });

  it('reads slash and ISO dates', () => {
    expect(detectTextHeader('02/02/2026')).toEqual({
      kind: 'header',
      header: { date: '2026-02-02', weekday: 'Mon' },
    });
    expect(detectTextHeader('2026-02-03')).toEqual({
      kind: 'header',
      header: { date: '2026-02-03', weekday: 'Tue' },
    });
  });

  it('reports impossible dates as invalid', () => {
    expect(detectTextHeader('31/02/2026')).toEqual({ kind: 'invalid', text: '31/02/2026' });
    expect(detectTextHeader('15/13/2026')).toEqual({ kind: 'invalid', text: '15/13/2026' });
  });

  it('ignores data lines and dates outside the target month', () => {
    expect(detectTextHeader('DX100 FCO P PAX 07:30')).toEqual({ kind: 'none' });
    expect(detectTextHeader('2 March 2026', FEB_2026)).toEqual({ kind: 'none' });
  });
});
