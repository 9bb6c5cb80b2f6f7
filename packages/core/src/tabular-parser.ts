/**
 * CSV → translation model.
 *
 * The header row must start with `key`; every further header cell is a
 * language column. Rows are keyed by their first cell.
 */

import fs from 'fs/promises';
import Papa from 'papaparse';
import { FormatError } from './errors.js';
import { buildLanguageIds, KEY_FIELD } from './identifiers.js';
import { getValue, isCommentKey, type LanguageId, type TranslationRecord } from './model.js';

export type DuplicateKeyPolicy = 'last-wins' | 'first-wins' | 'error';

export interface TabularParseOptions {
  /** Stable sort of records by key (code-unit order). */
  sortKeys?: boolean;
  /** What the in-memory model keeps when a key appears more than once. Defaults to 'last-wins'. */
  duplicateKeys?: DuplicateKeyPolicy;
  /** File name used to prefix error messages. */
  source?: string;
}

export interface TabularStats {
  rows: number;
  languages: LanguageId[];
  emptyPerLanguage: Record<LanguageId, number>;
  /** Each duplicated key once, in the order its first duplicate was met. */
  duplicates: string[];
  sorted: boolean;
}

export interface TabularParseResult {
  languages: LanguageId[];
  records: TranslationRecord[];
  stats: TabularStats;
}

const BOM = '\uFEFF';

function stripBom(value: string): string {
  return value.startsWith(BOM) ? value.slice(1) : value;
}

/**
 * Tokenize CSV text into rows of cells. Quoted cells may hold commas,
 * newlines and doubled quotes.
 */
export function parseCsvText(text: string, source?: string): string[][] {
  const result = Papa.parse<string[]>(stripBom(text), {
    delimiter: ',',
    skipEmptyLines: false,
  });

  const quoteError = result.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    const row = typeof quoteError.row === 'number' ? ` (row ${quoteError.row + 1})` : '';
    throw new FormatError(`Malformed CSV${row}: ${quoteError.message}`, source);
  }

  return result.data;
}

export async function readTabular(csvPath: string): Promise<string[][]> {
  let text: string;
  try {
    text = await fs.readFile(csvPath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new FormatError(`CSV file not found: ${csvPath}`);
    }
    throw error;
  }
  return parseCsvText(text, csvPath);
}

export function parseTabularRows(
  rawRows: readonly (readonly string[])[],
  options: TabularParseOptions = {}
): TabularParseResult {
  const { source } = options;
  const duplicatePolicy = options.duplicateKeys ?? 'last-wins';
  const sortKeys = options.sortKeys ?? false;

  const rows = rawRows
    .map((row) => row.map((cell) => cell.trim()))
    .filter((row) => row.some((cell) => cell.length > 0));

  if (!rows.length) {
    throw new FormatError('CSV is empty.', source);
  }

  const [header, ...body] = rows;
  const firstCell = stripBom(header[0] ?? '').trim();
  if (firstCell.toLowerCase() !== KEY_FIELD) {
    throw new FormatError(`First column must be 'key' (case-insensitive), found '${firstCell}'.`, source);
  }

  const rawLanguages = header.slice(1);
  if (!rawLanguages.length) {
    throw new FormatError("No language columns found (need at least one after 'key').", source);
  }

  const languages = buildLanguageIds(rawLanguages);
  const width = 1 + languages.length;

  const byKey = new Map<string, TranslationRecord>();
  const duplicates: string[] = [];

  for (const row of body) {
    const cells = row.length < width ? [...row, ...new Array<string>(width - row.length).fill('')] : row;
    const key = cells[0];
    if (!key || isCommentKey(key)) {
      continue;
    }

    const values = Object.fromEntries(languages.map((language, index) => [language, cells[index + 1] ?? '']));

    if (byKey.has(key)) {
      if (duplicatePolicy === 'error') {
        throw new FormatError(`Duplicate key '${key}'.`, source);
      }
      if (!duplicates.includes(key)) {
        duplicates.push(key);
      }
      if (duplicatePolicy === 'first-wins') {
        continue;
      }
    }

    // Map#set on an existing key keeps the first position.
    byKey.set(key, { key, values });
  }

  let records = Array.from(byKey.values());
  if (sortKeys) {
    // Array#sort is stable; plain comparison keeps case-sensitive code-unit order.
    records = [...records].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  const emptyPerLanguage = Object.fromEntries(
    languages.map((language) => [language, records.filter((record) => !getValue(record, language)).length])
  );

  return {
    languages,
    records,
    stats: {
      rows: records.length,
      languages,
      emptyPerLanguage,
      duplicates,
      sorted: sortKeys,
    },
  };
}
