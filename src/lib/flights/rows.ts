import { firstCell, slotForTable, type ColumnLayout } from '@/lib/flights/columns';
import {
  bindSlot,
  isTitleSentinel,
  slotBinding,
  type ColumnSlots,
} from '@/lib/flights/continuation';
import {
  detectCellHeader,
  detectTextHeader,
  type DayHeader,
} from '@/lib/flights/dayHeader';
import { normalizeDirection } from '@/lib/flights/normalize';
import type {
  DocumentPage,
  PageSourceDocument,
  RawFlightRow,
  ResolvedRowStrategy,
  RowStrategy,
  TableBlock,
  TargetMonth,
} from '@/lib/flights/types';

export type ExtractionTally = {
  tablesSeen: number;
  headersFound: number;
  invalidDates: number;
  unattachedBlocks: number;
  rowsRejected: number;
  linesIgnored: number;
  tablesIgnored: number;
  truncated: boolean;
  debugLines: string[];
};

export function createTally(): ExtractionTally {
  return {
    tablesSeen: 0,
    headersFound: 0,
    invalidDates: 0,
    unattachedBlocks: 0,
    rowsRejected: 0,
    linesIgnored: 0,
    tablesIgnored: 0,
    truncated: false,
    debugLines: [],
  };
}

export type ExtractionContext = {
  layout: ColumnLayout;
  target?: TargetMonth;
  maxRowsPerBlock: number;
  tally: ExtractionTally;
};

export type PageExtraction = { rows: RawFlightRow[]; slots: ColumnSlots };

export type RowExtractor = {
  strategy: ResolvedRowStrategy;
  extractRows(
    page: DocumentPage,
    pageIndex: number,
    slots: ColumnSlots,
    ctx: ExtractionContext,
  ): PageExtraction;
};

function capRows<T>(items: readonly T[], ctx: ExtractionContext): readonly T[] {
  if (items.length <= ctx.maxRowsPerBlock) return items;
  ctx.tally.truncated = true;
  return items.slice(0, ctx.maxRowsPerBlock);
}

function rowFromFields(
  header: DayHeader,
  fields: {
    flight: string;
    route?: string;
    direction?: string;
    type?: string;
    eta?: string;
    etd?: string;
  },
): RawFlightRow {
  return {
    date: header.date,
    weekday: header.weekday,
    flight: fields.flight,
    route: fields.route ?? '',
    direction: fields.direction ?? '',
    type: fields.type ?? '',
    eta: fields.eta ?? '',
    etd: fields.etd ?? '',
  };
}

// ---- Structured: table grids

/** Top-to-bottom; equal tops keep the order the source listed them in. */
export function orderTables(tables: readonly TableBlock[]): TableBlock[] {
  return tables
    .map((table, index) => ({ table, index }))
    .sort((a, b) => a.table.bbox.y0 - b.table.bbox.y0 || a.index - b.index)
    .map((entry) => entry.table);
}

export const structuredExtractor: RowExtractor = {
  strategy: 'structured',
  extractRows(page, pageIndex, slots, ctx) {
    const rows: RawFlightRow[] = [];
    let current = slots;

    const lines = (page.lines ?? []).filter((line) => line.trim().length > 0).length;
    if (lines > 0) {
      ctx.tally.linesIgnored += lines;
      ctx.tally.debugLines.push(`skipLines page=${pageIndex + 1} count=${lines}`);
    }

    for (const [tableIndex, table] of orderTables(page.tables ?? []).entries()) {
      ctx.tally.tablesSeen += 1;
      if (table.rows.length === 0) continue;

      const where = `page=${pageIndex + 1} table=${tableIndex + 1}`;
      const slot = slotForTable(ctx.layout, table, page.width);
      const head = firstCell(table);
      const match = detectCellHeader(head, ctx.target);

      let start = 0;
      if (match.kind === 'header') {
        current = bindSlot(current, slot, match.header);
        ctx.tally.headersFound += 1;
        // row 0 = day header, row 1 = column titles
        start = 2;
      } else {
        if (match.kind === 'invalid') {
          ctx.tally.invalidDates += 1;
          ctx.tally.debugLines.push(
            `invalidDate ${where} text=${JSON.stringify(match.text)}`,
          );
        }
        start = head.toLowerCase() === 'flight' ? 1 : 0;
      }

      const binding = slotBinding(current, slot);
      if (!binding) {
        ctx.tally.unattachedBlocks += 1;
        ctx.tally.debugLines.push(`skipTable unattached ${where} slot=${slot}`);
        continue;
      }

      for (const [offset, cells] of capRows(table.rows.slice(start), ctx).entries()) {
        const values = cells.map((cell) => (cell ?? '').trim());
        if (isTitleSentinel(values)) continue;

        const [flight, route, direction, type, eta, etd] = values;
        if (!flight) {
          ctx.tally.rowsRejected += 1;
          ctx.tally.debugLines.push(
            `skipRow empty flight ${where} row=${start + offset + 1}`,
          );
          continue;
        }
        rows.push(rowFromFields(binding, { flight, route, direction, type, eta, etd }));
      }
    }

    return { rows, slots: current };
  },
};

// ---- Token strategies: text lines

const bannerRegex = /^from\s+.+\s+to\s+.+$/i;
const TIME_PATTERN = '\\d{1,2}[:.]\\d{2}';

const rowLineRegex = new RegExp(
  `^(\\S+)\\s+(\\S+)\\s+([A-Za-z]+)\\s+([A-Za-z]+)(?:\\s+(${TIME_PATTERN}))?(?:\\s+(${TIME_PATTERN}))?$`,
);

function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter((t) => t.length > 0);
}

function placeTime(direction: string, time: string): { eta?: string; etd?: string } {
  return normalizeDirection(direction) === 'Arrival' ? { eta: time } : { etd: time };
}

type LineParser = (
  line: string,
  header: DayHeader,
  reject: (reason: string) => void,
) => RawFlightRow[];

/** Consecutive 5-token groups; several flights may share one line. */
const parseTokenGroups: LineParser = (line, header, reject) => {
  const tokens = tokenize(line);
  const rows: RawFlightRow[] = [];
  let i = 0;
  for (; i + 5 <= tokens.length; i += 5) {
    const [flight, route, direction, type, time] = tokens.slice(i, i + 5);
    rows.push(
      rowFromFields(header, { flight, route, direction, type, ...placeTime(direction, time) }),
    );
  }
  if (i < tokens.length) {
    reject(`incomplete group tokens=${tokens.length - i}`);
  }
  return rows;
};

/** One flight per line; both ETA and ETD may be present. */
const parseRowLine: LineParser = (line, header, reject) => {
  const m = line.trim().replaceAll(/\s+/g, ' ').match(rowLineRegex);
  if (!m) {
    reject('no row match');
    return [];
  }
  const [, flight, route, direction, type, first, second] = m;
  const times =
    first && second
      ? { eta: first, etd: second }
      : first
        ? placeTime(direction, first)
        : {};
  return [rowFromFields(header, { flight, route, direction, type, ...times })];
};

function createLineExtractor(
  strategy: 'tokenStream' | 'tokenRegex',
  parseLine: LineParser,
): RowExtractor {
  return {
    strategy,
    extractRows(page, pageIndex, slots, ctx) {
      const rows: RawFlightRow[] = [];
      let current = slots;

      const tables = (page.tables ?? []).length;
      if (tables > 0) {
        ctx.tally.tablesIgnored += tables;
        ctx.tally.debugLines.push(`skipTables page=${pageIndex + 1} count=${tables}`);
      }

      for (const [lineIndex, raw] of capRows(page.lines ?? [], ctx).entries()) {
        const line = raw.trim();
        if (line.length === 0 || bannerRegex.test(line)) continue;
        if (isTitleSentinel(tokenize(line))) continue;

        const where = `page=${pageIndex + 1} line=${lineIndex + 1}`;
        const match = detectTextHeader(line, ctx.target);
        if (match.kind === 'header') {
          // Text lines carry no geometry; everything lives in slot 0.
          current = bindSlot(current, 0, match.header);
          ctx.tally.headersFound += 1;
          continue;
        }
        if (match.kind === 'invalid') {
          ctx.tally.invalidDates += 1;
          ctx.tally.debugLines.push(`invalidDate ${where} text=${JSON.stringify(line)}`);
          continue;
        }

        const binding = slotBinding(current, 0);
        if (!binding) {
          ctx.tally.unattachedBlocks += 1;
          ctx.tally.debugLines.push(`skipLine unattached ${where}`);
          continue;
        }

        const parsed = parseLine(line, binding, (reason) => {
          ctx.tally.rowsRejected += 1;
          ctx.tally.debugLines.push(`skipRow ${reason} ${where} text=${JSON.stringify(line)}`);
        });
        rows.push(...parsed);
      }

      return { rows, slots: current };
    },
  };
}

export const tokenStreamExtractor = createLineExtractor('tokenStream', parseTokenGroups);
export const tokenRegexExtractor = createLineExtractor('tokenRegex', parseRowLine);

const EXTRACTORS: Record<ResolvedRowStrategy, RowExtractor> = {
  structured: structuredExtractor,
  tokenStream: tokenStreamExtractor,
  tokenRegex: tokenRegexExtractor,
};

export type StrategyProbe = { layout: ColumnLayout; target?: TargetMonth };

function hasTables(page: DocumentPage): boolean {
  return (page.tables ?? []).length > 0;
}

/**
 * Picks the pattern for text-only pages: a line holding one flight with both
 * times selects the single-line pattern, but only once slot 0 carries a day,
 * the same way the line extractors attach rows.
 */
export function detectLineStrategy(
  document: PageSourceDocument,
  probe: StrategyProbe,
): 'tokenStream' | 'tokenRegex' {
  let attached = false;
  for (const page of document.pages) {
    if (hasTables(page)) {
      for (const table of orderTables(page.tables ?? [])) {
        if (table.rows.length === 0) continue;
        const match = detectCellHeader(firstCell(table), probe.target);
        if (match.kind === 'header' && slotForTable(probe.layout, table, page.width) === 0) {
          attached = true;
        }
      }
      continue;
    }

    for (const raw of page.lines ?? []) {
      const line = raw.trim();
      if (line.length === 0 || bannerRegex.test(line)) continue;
      if (isTitleSentinel(tokenize(line))) continue;
      const match = detectTextHeader(line, probe.target);
      if (match.kind === 'header') {
        attached = true;
        continue;
      }
      if (match.kind === 'invalid' || !attached) continue;
      const m = line.replaceAll(/\s+/g, ' ').match(rowLineRegex);
      if (m?.[5] && m[6]) return 'tokenRegex';
    }
  }
  return 'tokenStream';
}

/** Tables win when any page has them; otherwise the text-line probe decides. */
export function detectRowStrategy(
  document: PageSourceDocument,
  probe: StrategyProbe,
): ResolvedRowStrategy {
  if (document.pages.some(hasTables)) return 'structured';
  return detectLineStrategy(document, probe);
}

export type ExtractionPlan = {
  strategy: ResolvedRowStrategy;
  extractorFor(page: DocumentPage): RowExtractor;
};

/**
 * An explicit strategy applies to every page. Under `auto` each page is
 * routed on its own: pages with tables go through the structured extractor,
 * text-only pages through the line pattern the probe picked.
 */
export function planRowExtraction(
  strategy: RowStrategy,
  document: PageSourceDocument,
  probe: StrategyProbe,
): ExtractionPlan {
  if (strategy !== 'auto') {
    const extractor = EXTRACTORS[strategy];
    return { strategy, extractorFor: () => extractor };
  }
  const lineExtractor = EXTRACTORS[detectLineStrategy(document, probe)];
  return {
    strategy: detectRowStrategy(document, probe),
    extractorFor: (page) => (hasTables(page) ? structuredExtractor : lineExtractor),
  };
}
