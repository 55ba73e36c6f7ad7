import { readFile } from 'node:fs/promises';

import { formatIssues } from '@/lib/env';
import {
  pageSourceDocumentSchema,
  type PageSourceDocument,
} from '@/lib/flights/types';

export function parsePageSource(json: unknown, origin = 'document'): PageSourceDocument {
  const parsed = pageSourceDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid page source in ${origin}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Returns null when the file does not exist. */
export async function loadPageSource(
  filePath: string,
): Promise<PageSourceDocument | null> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${filePath}: ${reason}`);
  }
  return parsePageSource(json, filePath);
}
