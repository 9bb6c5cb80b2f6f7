/**
 * Generated table → CSV, for seeding a spreadsheet from an existing table.
 */

import Papa from 'papaparse';
import { TableFormatError } from './errors.js';
import { parseEntryInitializer } from './generated-parser.js';
import { KEY_FIELD } from './identifiers.js';
import type { LanguageId } from './model.js';

export interface CsvExportOptions {
  /** Column names for the value fields; used when they cover the widest row. */
  languages?: readonly LanguageId[];
  /** Prefix the output with a UTF-8 byte-order mark. Defaults to true. */
  bom?: boolean;
  source?: string;
}

export interface CsvExportResult {
  csv: string;
  rowCount: number;
  /** Widest row, key included. */
  fieldCount: number;
  columns: string[];
}

export function extractTableRows(source: string): string[][] | undefined {
  return parseEntryInitializer(source)?.filter((row) => row.length > 0);
}

export function buildCsvFromTable(source: string, options: CsvExportOptions = {}): CsvExportResult {
  const rows = extractTableRows(source);
  if (!rows) {
    throw new TableFormatError('Could not find an Entry table (const Entry D[] = { ... };).', options.source);
  }
  if (!rows.length) {
    throw new TableFormatError('Found the Entry table but extracted no translation rows.', options.source);
  }

  const fieldCount = rows.reduce((widest, row) => Math.max(widest, row.length), 0);
  const valueColumns =
    options.languages && options.languages.length >= fieldCount - 1
      ? [...options.languages]
      : Array.from({ length: fieldCount - 1 }, (_, index) => `lang_${index + 1}`);
  const columns = [KEY_FIELD, ...valueColumns];

  const data = rows.map((row) => columns.map((_, index) => row[index] ?? ''));
  const body = Papa.unparse({ fields: columns, data }, { quotes: true, newline: '\r\n' });
  const bom = options.bom ?? true;

  return {
    csv: `${bom ? '\uFEFF' : ''}${body}\r\n`,
    rowCount: rows.length,
    fieldCount,
    columns,
  };
}
