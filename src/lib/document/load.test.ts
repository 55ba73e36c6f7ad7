import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadPageSource, parsePageSource } from '@/lib/document/load';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flight-matrix-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('parsePageSource', () => {
  it('accepts pages with lines and tables', () => {
    const doc = parsePageSource({
      pages: [
        {
          width: 842,
          lines: ['Mon 2 Feb 2026'],
          tables: [{ bbox: { x0: 0, y0: 0, x1: 100, y1: 50 }, rows: [['DX100', null]] }],
        },
      ],
    });
    expect(doc.pages[0]?.tables?.[0]?.rows).toEqual([['DX100', null]]);
  });

  it('reports where the document is malformed', () => {
    expect(() => parsePageSource({ pages: [{ width: -1 }] }, 'feb.json')).toThrow(
      /^Invalid page source in feb\.json: pages\.0\.width: /,
    );
  });
});

describe('loadPageSource', () => {
  it('reads and validates a JSON file', async () => {
    const filePath = path.join(dir, 'doc.json');
    await fs.writeFile(filePath, JSON.stringify({ pages: [{ width: 595, lines: ['x'] }] }), 'utf8');

    await expect(loadPageSource(filePath)).resolves.toEqual({
      pages: [{ width: 595, lines: ['x'] }],
    });
  });

  it('returns null for a missing file', async () => {
    await expect(loadPageSource(path.join(dir, 'missing.json'))).resolves.toBeNull();
  });

  it('rejects text that is not JSON', async () => {
    const filePath = path.join(dir, 'broken.json');
    await fs.writeFile(filePath, '{ pages:', 'utf8');
    await expect(loadPageSource(filePath)).rejects.toThrow(`Invalid JSON in ${filePath}`);
  });
});
