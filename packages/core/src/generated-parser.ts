/**
 * Reads a previously generated table back into the normalized model.
 *
 * Grammar (over table-lexer tokens):
 *
 *   struct-decl  := 'struct' 'Entry' '{' field* '}' ';'
 *   field        := 'const' 'char' '*' IDENT ';'
 *   table-decl   := 'static'? 'const' 'Entry' IDENT '[' NUMBER? ']' '=' '{' (element ','?)* '}' ';'
 *   element      := '{' value (',' value)* ','? '}'
 *   value        := STRING+ | 'nullptr' | 'NULL' | '0'
 *
 * Elements are read leniently: string literals inside tokens the grammar does
 * not cover are still collected. Nothing here throws; a missing or unclosed
 * block reads as "no data".
 */

import fs from 'fs/promises';
import { KEY_FIELD } from './identifiers.js';
import type { LanguageId, TranslationModel, TranslationRecord } from './model.js';
import { TableSyntaxError, tokenize, TokenStream, type Token } from './table-lexer.js';

const ENTRY_TYPE = 'Entry';
const NULL_VALUES = new Set(['nullptr', 'NULL', '0']);

function tryTokenize(source: string): Token[] | undefined {
  try {
    return tokenize(source);
  } catch (error) {
    if (error instanceof TableSyntaxError) {
      return undefined;
    }
    throw error;
  }
}

function readStructFields(stream: TokenStream): string[] {
  stream.expect('{');
  const fields: string[] = [];
  let declaration: Token[] = [];

  while (!stream.done()) {
    if (stream.accept('}')) {
      return fields;
    }
    const token = stream.next();
    if (!token) {
      break;
    }
    if (token.kind === 'punct' && token.value === ';') {
      const isCharPointer =
        declaration.some((part) => part.kind === 'identifier' && part.value === 'char') &&
        declaration.some((part) => part.kind === 'punct' && part.value === '*');
      const name = [...declaration].reverse().find((part) => part.kind === 'identifier');
      if (isCharPointer && name) {
        fields.push(name.value);
      }
      declaration = [];
      continue;
    }
    declaration.push(token);
  }

  throw new TableSyntaxError('Unterminated struct body', -1);
}

/**
 * Language field names declared in `struct Entry`, in order, without `key`.
 * Returns undefined when the declaration is missing or declares no languages.
 */
export function parseGeneratedLanguages(source: string): LanguageId[] | undefined {
  const tokens = tryTokenize(source);
  if (!tokens) {
    return undefined;
  }

  const stream = new TokenStream(tokens);
  while (!stream.done()) {
    if (stream.is('struct') && stream.is(ENTRY_TYPE, 1) && stream.is('{', 2)) {
      stream.seek(stream.index + 2);
      try {
        const languages = readStructFields(stream).filter((field) => field !== KEY_FIELD);
        return languages.length ? languages : undefined;
      } catch (error) {
        if (error instanceof TableSyntaxError) {
          return undefined;
        }
        throw error;
      }
    }
    stream.next();
  }

  return undefined;
}

function findTableStart(stream: TokenStream): boolean {
  while (!stream.done()) {
    const declaresArray =
      stream.is(ENTRY_TYPE) &&
      stream.peek(1)?.kind === 'identifier' &&
      stream.is('[', 2) &&
      !stream.is('struct', -1);
    if (declaresArray) {
      stream.seek(stream.index + 3);
      if (stream.peek()?.kind === 'number') {
        stream.next();
      }
      stream.expect(']');
      stream.expect('=');
      stream.expect('{');
      return true;
    }
    stream.next();
  }
  return false;
}

const OPENERS = new Set(['{', '(', '[']);
const CLOSERS = new Set([')', ']']);

function isNullValue(token: Token): boolean {
  return (token.kind === 'identifier' || token.kind === 'number') && NULL_VALUES.has(token.value);
}

/**
 * One brace element. Adjacent string literals form one value; anything the
 * grammar does not know (a macro call, a cast) is stepped over and only the
 * string literals inside it are kept, so a hand-edited row is never lost.
 */
function readElement(stream: TokenStream): string[] {
  stream.expect('{');
  const values: string[] = [];
  let nesting = 0;
  let previous: Token | undefined;

  while (!stream.done()) {
    const token = stream.next();
    if (!token) {
      break;
    }

    if (token.kind === 'string') {
      if (previous?.kind === 'string') {
        values[values.length - 1] += token.value;
      } else {
        values.push(token.value);
      }
    } else if (token.kind === 'punct' && token.value === '}' && nesting === 0) {
      return values;
    } else if (token.kind === 'punct' && OPENERS.has(token.value)) {
      nesting++;
    } else if (token.kind === 'punct' && (CLOSERS.has(token.value) || token.value === '}')) {
      nesting = Math.max(0, nesting - 1);
    } else if (nesting === 0 && isNullValue(token) && (previous === undefined || previous.value === ',')) {
      values.push('');
    }

    previous = token;
  }

  throw new TableSyntaxError('Unterminated table element', -1);
}

function readInitializer(stream: TokenStream): string[][] {
  const rows: string[][] = [];
  while (!stream.done()) {
    if (stream.accept('}')) {
      return rows;
    }
    if (stream.is('{')) {
      rows.push(readElement(stream));
      continue;
    }
    // Separators and stray tokens between elements.
    stream.next();
  }
  throw new TableSyntaxError('Unterminated table initializer', -1);
}

/**
 * Every element of the first `Entry` array initializer, as decoded string
 * fields. Undefined when no initializer is found or it is never closed.
 */
export function parseEntryInitializer(source: string): string[][] | undefined {
  const tokens = tryTokenize(source);
  if (!tokens) {
    return undefined;
  }

  const stream = new TokenStream(tokens);
  try {
    return findTableStart(stream) ? readInitializer(stream) : undefined;
  } catch (error) {
    if (error instanceof TableSyntaxError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Matches row fields positionally against `languages`. Missing trailing values
 * read as '' and excess values are ignored. A repeated key keeps its first
 * position and its last values.
 */
function recordsFromRows(rows: readonly string[][], languages: readonly LanguageId[]): TranslationRecord[] {
  const byKey = new Map<string, TranslationRecord>();

  for (const fields of rows) {
    const [key, ...rest] = fields;
    if (!key) {
      continue;
    }
    const values = Object.fromEntries(languages.map((language, index) => [language, rest[index] ?? '']));
    byKey.set(key, { key, values });
  }

  return Array.from(byKey.values());
}

export function parseGeneratedRecords(source: string, languages: readonly LanguageId[]): TranslationRecord[] {
  return recordsFromRows(parseEntryInitializer(source) ?? [], languages);
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export async function readGeneratedLanguages(headerPath: string): Promise<LanguageId[] | undefined> {
  const source = await readIfExists(headerPath);
  return source === undefined ? undefined : parseGeneratedLanguages(source);
}

export async function readGeneratedRecords(
  tablePath: string,
  languages: readonly LanguageId[]
): Promise<TranslationRecord[]> {
  const source = await readIfExists(tablePath);
  return source === undefined ? [] : parseGeneratedRecords(source, languages);
}

export type GeneratedModelStatus = 'loaded' | 'missing-files' | 'no-languages' | 'no-table';

export interface GeneratedModelResult {
  status: GeneratedModelStatus;
  /** Undefined unless status is 'loaded'. */
  model?: TranslationModel;
}

/**
 * Load the existing header + table pair. Anything short of a header with
 * languages and a readable `Entry` initializer yields no model.
 */
export async function readGeneratedModel(headerPath: string, tablePath: string): Promise<GeneratedModelResult> {
  const [header, table] = await Promise.all([readIfExists(headerPath), readIfExists(tablePath)]);
  if (header === undefined || table === undefined) {
    return { status: 'missing-files' };
  }

  const languages = parseGeneratedLanguages(header);
  if (!languages) {
    return { status: 'no-languages' };
  }

  const rows = parseEntryInitializer(table);
  if (!rows) {
    return { status: 'no-table' };
  }

  return {
    status: 'loaded',
    model: { languages, records: recordsFromRows(rows, languages) },
  };
}
