import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { emitHeader, emitTable } from './emitter.js';
import {
  parseEntryInitializer,
  parseGeneratedLanguages,
  parseGeneratedRecords,
  readGeneratedLanguages,
  readGeneratedModel,
  readGeneratedRecords,
} from './generated-parser.js';
import type { TranslationRecord } from './model.js';

const HAND_EDITED_TABLE = String.raw`// Auto-generated from CSV - DO NOT EDIT MANUALLY
#include "i18n.h"
#include "i18n_gen_export.h"

static const Entry D_builtin[] = {
    { "hello", "Hello", "Bok", "extra" },
    { "short", "Only" },
    { "nul", nullptr, "Null" },   // edited by hand
    { "multi", "Line\nTwo", "Tab\there" },
    { "joined", "Hel" "lo", "" },
    { "hello", "Hi", "Bok!" },
    { "", "skip" },
};
`;

describe('parseGeneratedLanguages', () => {
  it('reads the language fields of an emitted header', () => {
    expect(parseGeneratedLanguages(emitHeader(['en', 'hr', 'de']))).toEqual(['en', 'hr', 'de']);
  });

  it('tolerates reformatting, comments and non-string fields', () => {
    const source = `
      struct Entry
      {
          const char *key;
          const char * en; // English
          int priority;
          const char* de;
      };
    `;
    expect(parseGeneratedLanguages(source)).toEqual(['en', 'de']);
  });

  it('returns undefined when the declaration is missing or has no languages', () => {
    expect(parseGeneratedLanguages('#pragma once\n')).toBeUndefined();
    expect(parseGeneratedLanguages('struct Entry { const char* key; };')).toBeUndefined();
    expect(parseGeneratedLanguages('struct Entry { const char* en;')).toBeUndefined();
    expect(parseGeneratedLanguages('/* struct Entry { const char* en; };')).toBeUndefined();
  });
});

describe('parseGeneratedRecords', () => {
  it('matches values positionally and decodes escapes', () => {
    expect(parseGeneratedRecords(HAND_EDITED_TABLE, ['en', 'hr'])).toEqual([
      { key: 'hello', values: { en: 'Hi', hr: 'Bok!' } },
      { key: 'short', values: { en: 'Only', hr: '' } },
      { key: 'nul', values: { en: '', hr: 'Null' } },
      { key: 'multi', values: { en: 'Line\nTwo', hr: 'Tab\there' } },
      { key: 'joined', values: { en: 'Hello', hr: '' } },
    ]);
  });

  it('reads back what the emitter writes', () => {
    const records: TranslationRecord[] = [
      { key: 'quote', values: { en: 'Say "hi"', fr: 'C:\\path' } },
      { key: 'lines', values: { en: 'One\nTwo', fr: 'Tab\there' } },
      { key: 'empty', values: { en: '', fr: '' } },
    ];
    expect(parseGeneratedRecords(emitTable(['en', 'fr'], records), ['en', 'fr'])).toEqual(records);
  });

  it('yields no records when the table is missing or never closed', () => {
    expect(parseGeneratedRecords('int main() { return 0; }', ['en'])).toEqual([]);
    expect(parseGeneratedRecords('const Entry D[] = { { "a", "b" }', ['en'])).toEqual([]);
    expect(parseGeneratedRecords('const Entry D[] = { { "a", TXT("b") };', ['en'])).toEqual([]);
  });

  it('keeps every row when an element holds tokens outside the grammar', () => {
    const source = String.raw`const Entry D[] = {
    { "hello", "Hi (manual)" },
    { "orphan", TXT("kept") },
    { "cast", (const char*)"x", NULL },
};`;

    expect(parseGeneratedRecords(source, ['en', 'fr'])).toEqual([
      { key: 'hello', values: { en: 'Hi (manual)', fr: '' } },
      { key: 'orphan', values: { en: 'kept', fr: '' } },
      { key: 'cast', values: { en: 'x', fr: '' } },
    ]);
  });

  it('decodes byte escapes as UTF-8 text', () => {
    const source = String.raw`const Entry D[] = { { "k", "caf\xC3\xA9", "\303\251" } };`;
    expect(parseGeneratedRecords(source, ['fr', 'pt'])).toEqual([{ key: 'k', values: { fr: 'café', pt: 'é' } }]);
  });

  it('reads an emptied table as no records', () => {
    expect(parseGeneratedRecords('const Entry D[] = {\n};\n', ['en'])).toEqual([]);
  });
});

describe('parseEntryInitializer', () => {
  it('returns the raw fields of every element', () => {
    expect(parseEntryInitializer('const Entry D[2] = { { "a", "1" }, { "b" } };')).toEqual([['a', '1'], ['b']]);
  });
});

describe('generated file readers', () => {
  let tempDir: string;
  let headerPath: string;
  let tablePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingotable-generated-'));
    headerPath = path.join(tempDir, 'i18n_gen_export.h');
    tablePath = path.join(tempDir, 'i18n_gen.cpp');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('treats missing files as absent', async () => {
    expect(await readGeneratedLanguages(headerPath)).toBeUndefined();
    expect(await readGeneratedRecords(tablePath, ['en'])).toEqual([]);
    expect(await readGeneratedModel(headerPath, tablePath)).toEqual({ status: 'missing-files' });
  });

  it('reports a header without languages', async () => {
    await fs.writeFile(headerPath, '#pragma once\n');
    await fs.writeFile(tablePath, emitTable(['en'], [{ key: 'a', values: { en: 'A' } }]));

    expect(await readGeneratedModel(headerPath, tablePath)).toEqual({ status: 'no-languages' });
  });

  it('reports a table file without a readable Entry table', async () => {
    await fs.writeFile(headerPath, emitHeader(['en']));
    await fs.writeFile(tablePath, 'const Entry D[] = {\n    { "a", "A" },\n');

    expect(await readGeneratedModel(headerPath, tablePath)).toEqual({ status: 'no-table' });
  });

  it('loads the header and table pair', async () => {
    await fs.writeFile(headerPath, emitHeader(['en', 'hr']));
    await fs.writeFile(tablePath, emitTable(['en', 'hr'], [{ key: 'a', values: { en: 'A', hr: 'Ah' } }]));

    expect(await readGeneratedModel(headerPath, tablePath)).toEqual({
      status: 'loaded',
      model: { languages: ['en', 'hr'], records: [{ key: 'a', values: { en: 'A', hr: 'Ah' } }] },
    });
  });
});
