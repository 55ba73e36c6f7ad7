import { describe, expect, it } from 'vitest';

import { getEnv, isDebugEnabled, resolveOptions } from '@/lib/env';

describe('getEnv', () => {
  it('reads typed settings from the environment', () => {
    const env = getEnv({
      FLIGHT_MATRIX_YEAR: '2026',
      FLIGHT_MATRIX_MONTH: '2',
      FLIGHT_MATRIX_PAD_MONTH: 'true',
      FLIGHT_MATRIX_DATE_FORMAT: 'dd MonAbbrev',
      UNRELATED: 'x',
    });

    expect(env).toEqual({
      FLIGHT_MATRIX_YEAR: 2026,
      FLIGHT_MATRIX_MONTH: 2,
      FLIGHT_MATRIX_PAD_MONTH: true,
      FLIGHT_MATRIX_DATE_FORMAT: 'dd MonAbbrev',
    });
  });

  it('treats blank values as unset', () => {
    expect(getEnv({ FLIGHT_MATRIX_YEAR: '  ', FLIGHT_MATRIX_MONTH: '' })).toEqual({});
  });

  it('names the invalid variable', () => {
    expect(() => getEnv({ FLIGHT_MATRIX_ROW_STRATEGY: 'bogus' })).toThrow(
      /^Invalid environment variables: FLIGHT_MATRIX_ROW_STRATEGY: /,
    );
  });

  it('requires year and month together', () => {
    expect(() => getEnv({ FLIGHT_MATRIX_YEAR: '2026' })).toThrow(
      'Invalid environment variables: FLIGHT_MATRIX_YEAR and FLIGHT_MATRIX_MONTH must be set together',
    );
  });
});

describe('isDebugEnabled', () => {
  it('accepts 1 and true', () => {
    expect(isDebugEnabled({ FLIGHT_MATRIX_DEBUG: '1' })).toBe(true);
    expect(isDebugEnabled({ FLIGHT_MATRIX_DEBUG: 'true' })).toBe(true);
    expect(isDebugEnabled({})).toBe(false);
  });

  it('reads the flag the same way getEnv does', () => {
    const source = { FLIGHT_MATRIX_DEBUG: ' 1 ' };
    expect(isDebugEnabled(source)).toBe(true);
    expect(getEnv(source).FLIGHT_MATRIX_DEBUG).toBe(true);
    expect(isDebugEnabled({ FLIGHT_MATRIX_DEBUG: '0' })).toBe(false);
    expect(isDebugEnabled({ FLIGHT_MATRIX_DEBUG: 'yes' })).toBe(false);
  });
});

describe('resolveOptions', () => {
  it('lets explicit values win over environment defaults', () => {
    const env = getEnv({
      FLIGHT_MATRIX_YEAR: '2026',
      FLIGHT_MATRIX_MONTH: '2',
      FLIGHT_MATRIX_ROW_STRATEGY: 'structured',
      FLIGHT_MATRIX_PAD_MONTH: '1',
    });

    const options = resolveOptions(env, { rowStrategy: 'tokenRegex', dateFormat: 'dd MonAbbrev' });

    expect(options.parse).toMatchObject({
      target: { year: 2026, month: 2 },
      rowStrategy: 'tokenRegex',
    });
    expect(options.matrix).toEqual({
      target: { year: 2026, month: 2 },
      padMonth: true,
      dateFormat: 'dd MonAbbrev',
    });
  });

  it('leaves unset options to the schema defaults', () => {
    const options = resolveOptions(getEnv({}));
    expect(options.parse.target).toBeUndefined();
    expect(options.parse.rowStrategy).toBeUndefined();
    expect(options.matrix.padMonth).toBeUndefined();
  });
});
