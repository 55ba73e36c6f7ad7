import { z } from 'zod';

import {
  columnLayoutStrategySchema,
  dateFormatSchema,
  rowStrategySchema,
  type MatrixOptions,
  type ParseOptions,
} from '@/lib/flights/types';

const flagSchema = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  FLIGHT_MATRIX_YEAR: z.coerce.number().int().min(1900).max(2999).optional(),
  FLIGHT_MATRIX_MONTH: z.coerce.number().int().min(1).max(12).optional(),
  FLIGHT_MATRIX_ROW_STRATEGY: rowStrategySchema.optional(),
  FLIGHT_MATRIX_COLUMN_LAYOUT: columnLayoutStrategySchema.optional(),
  FLIGHT_MATRIX_DATE_FORMAT: dateFormatSchema.optional(),
  FLIGHT_MATRIX_PAD_MONTH: flagSchema.optional(),
  FLIGHT_MATRIX_DEBUG: flagSchema.optional(),
});

export type Env = z.infer<typeof envSchema>;

type RawEnv = Record<string, string | undefined>;

function getRawEnv(source: RawEnv): RawEnv {
  const pick = (key: keyof Env): string | undefined => {
    const value = source[key];
    return value && value.trim().length > 0 ? value.trim() : undefined;
  };
  return {
    FLIGHT_MATRIX_YEAR: pick('FLIGHT_MATRIX_YEAR'),
    FLIGHT_MATRIX_MONTH: pick('FLIGHT_MATRIX_MONTH'),
    FLIGHT_MATRIX_ROW_STRATEGY: pick('FLIGHT_MATRIX_ROW_STRATEGY'),
    FLIGHT_MATRIX_COLUMN_LAYOUT: pick('FLIGHT_MATRIX_COLUMN_LAYOUT'),
    FLIGHT_MATRIX_DATE_FORMAT: pick('FLIGHT_MATRIX_DATE_FORMAT'),
    FLIGHT_MATRIX_PAD_MONTH: pick('FLIGHT_MATRIX_PAD_MONTH'),
    FLIGHT_MATRIX_DEBUG: pick('FLIGHT_MATRIX_DEBUG'),
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

export function getEnv(source: RawEnv = process.env): Env {
  const parsed = envSchema.safeParse(getRawEnv(source));
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${formatIssues(parsed.error)}`);
  }
  if (
    (parsed.data.FLIGHT_MATRIX_YEAR === undefined) !==
    (parsed.data.FLIGHT_MATRIX_MONTH === undefined)
  ) {
    throw new Error(
      'Invalid environment variables: FLIGHT_MATRIX_YEAR and FLIGHT_MATRIX_MONTH must be set together',
    );
  }
  return parsed.data;
}

/** Reads only the debug flag, so logging works before the rest of the env is checked. */
export function isDebugEnabled(source: RawEnv = process.env): boolean {
  const parsed = envSchema.shape.FLIGHT_MATRIX_DEBUG.safeParse(
    getRawEnv(source).FLIGHT_MATRIX_DEBUG,
  );
  return parsed.success && parsed.data === true;
}

/** Environment defaults; explicit values win. */
export function resolveOptions(
  env: Env,
  overrides: Partial<ParseOptions & MatrixOptions> = {},
): { parse: Partial<ParseOptions>; matrix: Partial<MatrixOptions> } {
  const envTarget =
    env.FLIGHT_MATRIX_YEAR !== undefined && env.FLIGHT_MATRIX_MONTH !== undefined
      ? { year: env.FLIGHT_MATRIX_YEAR, month: env.FLIGHT_MATRIX_MONTH }
      : undefined;
  const target = overrides.target ?? envTarget;

  return {
    parse: {
      target,
      rowStrategy: overrides.rowStrategy ?? env.FLIGHT_MATRIX_ROW_STRATEGY,
      columnLayout: overrides.columnLayout ?? env.FLIGHT_MATRIX_COLUMN_LAYOUT,
      maxPages: overrides.maxPages,
      maxRowsPerBlock: overrides.maxRowsPerBlock,
    },
    matrix: {
      target,
      padMonth: overrides.padMonth ?? env.FLIGHT_MATRIX_PAD_MONTH,
      dateFormat: overrides.dateFormat ?? env.FLIGHT_MATRIX_DATE_FORMAT,
    },
  };
}
