import { readdir, readFile } from 'node:fs/promises';
import { extname, join, parse } from 'node:path';
import type { Document } from '../types/index.js';
import { makeSnippet } from '../pipeline/IngestionCoordinator.js';
import { isObject } from '../config/merge.js';

export const CORPUS_EXTENSIONS = ['.md', '.txt', '.rst'] as const;
export const CORPUS_SNIPPET_LENGTH = 200;

/** `getting-started_guide` → `Getting Started Guide` */
export function titleFromStem(stem: string): string {
  return stem
    .replace(/[-_]/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function isCorpusFile(name: string): boolean {
  const ext = extname(name).toLowerCase();
  return CORPUS_EXTENSIONS.some((allowed) => allowed === ext);
}

/**
 * Read the text files directly under `dir` as documents, in file name order.
 * A directory that does not exist yields an empty list.
 */
export async function loadDocuments(dir: string): Promise<Document[]> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isObject(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const files = entries
    .filter((entry) => entry.isFile() && isCorpusFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  const documents: Document[] = [];
  for (const name of files) {
    const text = await readFile(join(dir, name), 'utf-8');
    const stem = parse(name).name;
    documents.push({
      id: stem,
      text,
      meta: {
        title: titleFromStem(stem),
        source: name,
        snippet: makeSnippet(text, CORPUS_SNIPPET_LENGTH)
      }
    });
  }
  return documents;
}
