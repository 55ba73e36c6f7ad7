import { z } from 'zod';

export const WEEKDAYS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export const weekdaySchema = z.enum(WEEKDAYS);
export type Weekday = z.infer<typeof weekdaySchema>;

export const directionSchema = z.enum(['Arrival', 'Departure', 'Unknown']);
export type Direction = z.infer<typeof directionSchema>;

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const flightRecordSchema = z.object({
  date: isoDateSchema,
  weekday: weekdaySchema,
  flight: z.string().min(1),
  route: z.string(),
  direction: directionSchema,
  // Upper-cased A/D token as printed in the document ("A", "P", "DEP", ...).
  directionCode: z.string(),
  type: z.literal('PAX'),
  eta: z.string().min(1).optional(),
  etd: z.string().min(1).optional(),
});

export type FlightRecord = z.infer<typeof flightRecordSchema>;

// ---- Page source (input collaborator contract)

const bboxSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
});

export type BoundingBox = z.infer<typeof bboxSchema>;

export const tableBlockSchema = z.object({
  bbox: bboxSchema,
  rows: z.array(z.array(z.string().nullable())),
});

export type TableBlock = z.infer<typeof tableBlockSchema>;

export const documentPageSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive().optional(),
  lines: z.array(z.string()).optional(),
  tables: z.array(tableBlockSchema).optional(),
});

export type DocumentPage = z.infer<typeof documentPageSchema>;

export const pageSourceDocumentSchema = z.object({
  pages: z.array(documentPageSchema),
});

export type PageSourceDocument = z.infer<typeof pageSourceDocumentSchema>;

// ---- Options

export const rowStrategySchema = z.enum([
  'structured',
  'tokenStream',
  'tokenRegex',
  'auto',
]);
export type RowStrategy = z.infer<typeof rowStrategySchema>;
export type ResolvedRowStrategy = Exclude<RowStrategy, 'auto'>;

export const columnLayoutStrategySchema = z.enum(['fixed', 'clustered', 'auto']);
export type ColumnLayoutStrategy = z.infer<typeof columnLayoutStrategySchema>;

export const dateFormatSchema = z.enum(['dd-mm', 'dd MonAbbrev']);
export type DateFormat = z.infer<typeof dateFormatSchema>;

export const targetMonthSchema = z.object({
  year: z.number().int().min(1900).max(2999),
  month: z.number().int().min(1).max(12),
});

export type TargetMonth = z.infer<typeof targetMonthSchema>;

export const parseOptionsSchema = z.object({
  target: targetMonthSchema.optional(),
  rowStrategy: rowStrategySchema.default('auto'),
  columnLayout: columnLayoutStrategySchema.default('auto'),
  maxPages: z.number().int().positive().default(500),
  maxRowsPerBlock: z.number().int().positive().default(5000),
});

export type ParseOptions = z.infer<typeof parseOptionsSchema>;

export const matrixOptionsSchema = z.object({
  target: targetMonthSchema.optional(),
  padMonth: z.boolean().default(false),
  dateFormat: dateFormatSchema.default('dd-mm'),
});

export type MatrixOptions = z.infer<typeof matrixOptionsSchema>;

// ---- Results

export type RawFlightRow = {
  date: string;
  weekday: Weekday;
  flight: string;
  route: string;
  direction: string;
  type: string;
  eta: string;
  etd: string;
};

export type ParseDiagnostics = {
  rowStrategy: ResolvedRowStrategy;
  /** Extractor used for each page, in page order. */
  pageStrategies: ResolvedRowStrategy[];
  columnLayout: { strategy: 'fixed' | 'clustered'; columns: number };
  pagesSeen: number;
  tablesSeen: number;
  headersFound: number;
  invalidDates: number;
  unattachedBlocks: number;
  rowsRejected: number;
  linesIgnored: number;
  tablesIgnored: number;
  recordsExtracted: number;
  recordsDropped: number;
  unknownDirection: number;
  structureRecognized: boolean;
  truncated: boolean;
  debugLines: string[];
};

export type ParseResult = {
  records: readonly FlightRecord[];
  diagnostics: ParseDiagnostics;
};

export type MatrixColumn = { date: string; label: string };

export type MatrixRow = {
  flight: string;
  route: string;
  direction: Exclude<Direction, 'Unknown'>;
  directionCode: string;
  cells: Array<string | null>;
};

export type FlightMatrix = {
  weekday: Weekday;
  columns: MatrixColumn[];
  rows: MatrixRow[];
};
