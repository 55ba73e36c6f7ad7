import { resolveColumnLayout } from '@/lib/flights/columns';
import { createColumnSlots } from '@/lib/flights/continuation';
import { normalizeRows } from '@/lib/flights/normalize';
import { createTally, planRowExtraction } from '@/lib/flights/rows';
import {
  parseOptionsSchema,
  type PageSourceDocument,
  type ParseOptions,
  type ParseResult,
  type RawFlightRow,
  type ResolvedRowStrategy,
} from '@/lib/flights/types';

export type ParseOptionsInput = Partial<ParseOptions>;

/**
 * Single pass over the pages in document order. Pure: the column slots and
 * counters are created here and never escape except through the result.
 */
export function parseFlightDocument(
  document: PageSourceDocument,
  input: ParseOptionsInput = {},
): ParseResult {
  const options = parseOptionsSchema.parse(input);
  const truncatedPages = document.pages.length > options.maxPages;
  const pages = document.pages.slice(0, options.maxPages);

  const layout = resolveColumnLayout({
    pages,
    strategy: options.columnLayout,
    target: options.target,
  });
  const plan = planRowExtraction(options.rowStrategy, { pages }, {
    layout,
    target: options.target,
  });
  const tally = createTally();
  tally.truncated = truncatedPages;

  const ctx = {
    layout,
    target: options.target,
    maxRowsPerBlock: options.maxRowsPerBlock,
    tally,
  };

  let slots = createColumnSlots();
  const rawRows: RawFlightRow[] = [];
  const pageStrategies: ResolvedRowStrategy[] = [];
  for (const [pageIndex, page] of pages.entries()) {
    const extractor = plan.extractorFor(page);
    pageStrategies.push(extractor.strategy);
    const extraction = extractor.extractRows(page, pageIndex, slots, ctx);
    slots = extraction.slots;
    rawRows.push(...extraction.rows);
  }

  const normalized = normalizeRows(rawRows);
  const records = Object.freeze(normalized.records.map((r) => Object.freeze(r)));

  return {
    records,
    diagnostics: {
      rowStrategy: plan.strategy,
      pageStrategies,
      columnLayout: { strategy: layout.strategy, columns: layout.columns },
      pagesSeen: pages.length,
      tablesSeen: tally.tablesSeen,
      headersFound: tally.headersFound,
      invalidDates: tally.invalidDates,
      unattachedBlocks: tally.unattachedBlocks,
      rowsRejected: tally.rowsRejected,
      linesIgnored: tally.linesIgnored,
      tablesIgnored: tally.tablesIgnored,
      recordsExtracted: rawRows.length,
      recordsDropped: normalized.dropped,
      unknownDirection: normalized.unknownDirection,
      structureRecognized: tally.headersFound > 0 || rawRows.length > 0,
      truncated: tally.truncated,
      debugLines: tally.debugLines,
    },
  };
}
