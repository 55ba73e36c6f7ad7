#!/usr/bin/env tsx
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';

import { z } from 'zod';

import { loadPageSource } from '@/lib/document/load';
import { formatIssues, getEnv, resolveOptions } from '@/lib/env';
import { EXPORT_LABELS, exportFileName, matrixToCsv } from '@/lib/flights/csv';
import { buildWeekdayMatrix } from '@/lib/flights/matrix';
import { parseFlightDocument } from '@/lib/flights/parse';
import { formatSummary, summarizeRecords } from '@/lib/flights/summary';
import {
  columnLayoutStrategySchema,
  dateFormatSchema,
  rowStrategySchema,
  weekdaySchema,
} from '@/lib/flights/types';
import { createLogger } from '@/lib/log';

const USAGE = `Usage: flight-matrix <document.json> [options]

  --weekday <Mon..Sun>     weekday to pivot (default: first weekday present)
  --year <yyyy> --month <m> target month for day headers and padding
  --pad                    pad columns to every date of the weekday in the month
  --strategy <name>        structured | tokenStream | tokenRegex | auto
  --layout <name>          fixed | clustered | auto
  --date-format <name>     dd-mm | "dd MonAbbrev"
  --labels <en|it>         header labels of the CSV export
  --records                print the flat PAX records as JSON instead of CSV
  --out <file>             write to a file instead of stdout
  --out-dir <dir>          write the CSV to <dir>/flight_matrix_<weekday>.csv`;

const cliArgsSchema = z
  .object({
    document: z.string().min(1),
    weekday: weekdaySchema.optional(),
    year: z.coerce.number().int().min(1900).max(2999).optional(),
    month: z.coerce.number().int().min(1).max(12).optional(),
    pad: z.boolean().optional(),
    strategy: rowStrategySchema.optional(),
    layout: columnLayoutStrategySchema.optional(),
    dateFormat: dateFormatSchema.optional(),
    labels: z.enum(['en', 'it']).default('en'),
    records: z.boolean().default(false),
    out: z.string().min(1).optional(),
    outDir: z.string().min(1).optional(),
  })
  .refine((a) => (a.year === undefined) === (a.month === undefined), {
    message: '--year and --month must be given together',
    path: ['year'],
  })
  .refine((a) => a.outDir === undefined || (a.out === undefined && !a.records), {
    message: '--out-dir cannot be combined with --out or --records',
    path: ['outDir'],
  });

export type CliArgs = z.infer<typeof cliArgsSchema>;

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      weekday: { type: 'string' },
      year: { type: 'string' },
      month: { type: 'string' },
      pad: { type: 'boolean' },
      strategy: { type: 'string' },
      layout: { type: 'string' },
      'date-format': { type: 'string' },
      labels: { type: 'string' },
      records: { type: 'boolean' },
      out: { type: 'string' },
      'out-dir': { type: 'string' },
    },
  });

  const parsed = cliArgsSchema.safeParse({
    document: positionals[0],
    weekday: values.weekday,
    year: values.year,
    month: values.month,
    pad: values.pad,
    strategy: values.strategy,
    layout: values.layout,
    dateFormat: values['date-format'],
    labels: values.labels,
    records: values.records,
    out: values.out,
    outDir: values['out-dir'],
  });
  if (!parsed.success) {
    throw new Error(`${formatIssues(parsed.error)}\n\n${USAGE}`);
  }
  return parsed.data;
}

export async function run(argv: string[]): Promise<number> {
  const log = createLogger('flight-matrix');
  const args = parseCliArgs(argv);

  const document = await loadPageSource(args.document);
  if (!document) {
    log.error(`File not found: ${args.document}`);
    return 1;
  }

  const options = resolveOptions(getEnv(), {
    target:
      args.year !== undefined && args.month !== undefined
        ? { year: args.year, month: args.month }
        : undefined,
    rowStrategy: args.strategy,
    columnLayout: args.layout,
    padMonth: args.pad,
    dateFormat: args.dateFormat,
  });

  const { records, diagnostics } = parseFlightDocument(document, options.parse);
  for (const line of diagnostics.debugLines) log.debug(line);
  log.debug(
    `strategy=${diagnostics.rowStrategy} pages=${diagnostics.pageStrategies.join(',')} layout=${diagnostics.columnLayout.strategy}/${diagnostics.columnLayout.columns} headers=${diagnostics.headersFound} rejected=${diagnostics.rowsRejected} unattached=${diagnostics.unattachedBlocks} ignoredLines=${diagnostics.linesIgnored} ignoredTables=${diagnostics.tablesIgnored} dropped=${diagnostics.recordsDropped}`,
  );
  if (diagnostics.truncated) log.warn('input exceeded the page or row cap and was truncated');

  if (records.length === 0) {
    log.error('No PAX flights found or the document structure was not recognized.');
    return 2;
  }

  const summary = summarizeRecords(records);
  console.error(formatSummary(summary));

  let output: string;
  let target = args.out;
  if (args.records) {
    output = JSON.stringify(records, null, 2) + '\n';
  } else {
    const weekday = args.weekday ?? summary.weekdays[0];
    if (!weekday) return 2;
    const labels = EXPORT_LABELS[args.labels];
    const matrix = buildWeekdayMatrix(records, weekday, options.matrix);
    if (matrix.rows.length === 0) {
      log.warn(`No PAX flights with a valid time on ${labels.weekdays[weekday]}.`);
    }
    output = matrixToCsv(matrix, labels);
    if (args.outDir) target = path.join(args.outDir, exportFileName(weekday, labels));
  }

  if (target) {
    await writeFile(target, output, 'utf8');
    log.debug(`wrote ${target}`);
  } else {
    process.stdout.write(output);
  }
  return 0;
}

const entry = process.argv[1];
const isEntryPoint = entry !== undefined && import.meta.url === pathToFileURL(entry).href;

if (isEntryPoint) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      createLogger('flight-matrix').error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    },
  );
}
