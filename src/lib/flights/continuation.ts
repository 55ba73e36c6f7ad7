import { SLOT_COUNT } from '@/lib/flights/columns';
import type { DayHeader } from '@/lib/flights/dayHeader';

// One optional binding per weekday column. A bound slot is never unset again.
export type ColumnSlots = readonly (DayHeader | null)[];

export function createColumnSlots(): ColumnSlots {
  return Array.from({ length: SLOT_COUNT }, () => null);
}

export function bindSlot(
  slots: ColumnSlots,
  slot: number,
  header: DayHeader,
): ColumnSlots {
  if (slot < 0 || slot >= SLOT_COUNT) return slots;
  return slots.map((current, index) => (index === slot ? header : current));
}

export function slotBinding(slots: ColumnSlots, slot: number): DayHeader | null {
  return slots[slot] ?? null;
}

const TITLE_SENTINEL = 'flightroutea/dtypeetaetd';

/** The repeated "Flight Route A/D Type ETA ETD" title row. */
export function isTitleSentinel(tokens: readonly string[]): boolean {
  return tokens.join('').replaceAll(/\s+/g, '').toLowerCase() === TITLE_SENTINEL;
}
