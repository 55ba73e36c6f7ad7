import { detectCellHeader } from '@/lib/flights/dayHeader';
import type {
  ColumnLayoutStrategy,
  DocumentPage,
  TableBlock,
  TargetMonth,
} from '@/lib/flights/types';

export const SLOT_COUNT = 7;

export type ColumnLayout =
  | { strategy: 'fixed'; columns: number }
  | { strategy: 'clustered'; columns: number; centers: number[] };

export function tableCenterX(table: TableBlock): number {
  return 0.5 * (table.bbox.x0 + table.bbox.x1);
}

export function firstCell(table: TableBlock): string {
  return (table.rows[0]?.[0] ?? '').trim();
}

function clampSlot(index: number): number {
  return Math.max(0, Math.min(SLOT_COUNT - 1, index));
}

export function fixedSlot(centerX: number, pageWidth: number): number {
  const colWidth = pageWidth / SLOT_COUNT;
  return clampSlot(Math.floor(centerX / colWidth));
}

/**
 * Centers of the first page's day-header tables, merged when closer than
 * half a fixed column width.
 */
export function clusterHeaderCenters(
  page: DocumentPage,
  target?: TargetMonth,
): number[] {
  const tolerance = page.width / SLOT_COUNT / 2;
  const centers = (page.tables ?? [])
    .filter((t) => detectCellHeader(firstCell(t), target).kind === 'header')
    .map(tableCenterX)
    .sort((a, b) => a - b);

  const merged: number[] = [];
  for (const x of centers) {
    const last = merged[merged.length - 1];
    if (last !== undefined && x - last < tolerance) continue;
    merged.push(x);
  }
  return merged;
}

export function resolveColumnLayout(params: {
  pages: readonly DocumentPage[];
  strategy: ColumnLayoutStrategy;
  target?: TargetMonth;
}): ColumnLayout {
  const hasTables = params.pages.some((p) => (p.tables ?? []).length > 0);
  if (!hasTables) return { strategy: 'fixed', columns: 0 };
  if (params.strategy === 'fixed') return { strategy: 'fixed', columns: SLOT_COUNT };

  const firstPage = params.pages[0];
  const centers = firstPage ? clusterHeaderCenters(firstPage, params.target) : [];
  if (centers.length === 0 || centers.length > SLOT_COUNT) {
    return { strategy: 'fixed', columns: SLOT_COUNT };
  }
  return { strategy: 'clustered', columns: centers.length, centers };
}

export function slotForTable(
  layout: ColumnLayout,
  table: TableBlock,
  pageWidth: number,
): number {
  const x = tableCenterX(table);
  if (layout.strategy === 'fixed') return fixedSlot(x, pageWidth);

  let best = 0;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const [index, center] of layout.centers.entries()) {
    const dist = Math.abs(center - x);
    if (dist < bestDist) {
      best = index;
      bestDist = dist;
    }
  }
  return best;
}
