import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { normalizeConfig } from './config/index.js';
import { emitHeader, emitTable } from './emitter.js';
import { FormatError } from './errors.js';
import { generatorOptionsFromConfig, TableGenerator, toMergePolicy } from './generator.js';

const RUN_AT = new Date(2024, 4, 1, 12, 0, 0);

describe('TableGenerator', () => {
  let tempDir: string;
  let csvPath: string;
  let outDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingotable-generator-'));
    csvPath = path.join(tempDir, 'translations.csv');
    outDir = path.join(tempDir, 'gen');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('plans header and table from the CSV without touching disk', async () => {
    await fs.writeFile(csvPath, 'key,en,hr\nhello,Hello,Bok\nbye,Bye,\n');
    const generator = new TableGenerator({ csvPath, outDir, workspaceRoot: tempDir });

    const plan = await generator.plan();

    expect(plan.languages).toEqual(['en', 'hr']);
    expect(plan.records.map((record) => record.key)).toEqual(['hello', 'bye']);
    expect(plan.merge).toBeNull();
    expect(plan.outputs.map((output) => [output.kind, path.relative(tempDir, output.path)])).toEqual([
      ['header', path.join('gen', 'i18n_gen_export.h')],
      ['table', path.join('gen', 'i18n_gen.cpp')],
    ]);
    expect(plan.outputs[1].content).toBe(
      emitTable(['en', 'hr'], [
        { key: 'hello', values: { en: 'Hello', hr: 'Bok' } },
        { key: 'bye', values: { en: 'Bye', hr: '' } },
      ])
    );
    await expect(fs.access(outDir)).rejects.toThrow();
  });

  it('writes outputs and reports a dry run when nothing was written', async () => {
    await fs.writeFile(csvPath, 'key,en\nhello,Hello\n');
    const generator = new TableGenerator({ csvPath, outDir, emitFallback: true, workspaceRoot: tempDir });
    const plan = await generator.plan();

    expect(generator.buildReport(plan).dryRun).toBe(true);

    const written = await generator.write(plan, RUN_AT);
    const report = generator.buildReport(plan, written);

    expect(report.dryRun).toBe(false);
    expect(report.outputs.map((output) => [output.kind, output.changed, output.backupPath])).toEqual([
      ['header', true, null],
      ['table', true, null],
      ['fallback', true, null],
    ]);
    expect(await fs.readFile(path.join(outDir, 'i18n_gen_export.h'), 'utf8')).toBe(emitHeader(['en']));
    expect(await fs.readFile(path.join(outDir, 'i18n_fallback.cpp'), 'utf8')).toContain('static const Entry D_builtin[] = {');
  });

  it('backs up previous outputs on a second run', async () => {
    await fs.writeFile(csvPath, 'key,en\nhello,Hello\n');
    const generator = new TableGenerator({ csvPath, outDir });
    await generator.write(await generator.plan(), RUN_AT);

    const second = await generator.plan();
    const written = await generator.write(second, new Date(2024, 4, 1, 12, 0, 5));

    expect(written.map((result) => result.backupPath)).toEqual([
      path.join(outDir, 'i18n_gen_export.h.20240501_120005.bak'),
      path.join(outDir, 'i18n_gen.cpp.20240501_120005.bak'),
    ]);
    expect(generator.buildReport(second, written).outputs.every((output) => !output.changed)).toBe(true);
  });

  it('merges with the existing table and keeps translations the CSV lacks', async () => {
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(path.join(outDir, 'i18n_gen_export.h'), emitHeader(['en', 'fr']));
    await fs.writeFile(
      path.join(outDir, 'i18n_gen.cpp'),
      emitTable(['en', 'fr'], [
        { key: 'ok', values: { en: '', fr: "D'accord" } },
        { key: 'legacy', values: { en: 'Legacy', fr: 'Ancien' } },
      ])
    );
    await fs.writeFile(csvPath, 'key,en,fr\nok,OK,\nnew,New,Nouveau\n');

    const generator = new TableGenerator({ csvPath, outDir, merge: {} });
    const plan = await generator.plan();

    expect(plan.records).toEqual([
      { key: 'ok', values: { en: 'OK', fr: "D'accord" } },
      { key: 'new', values: { en: 'New', fr: 'Nouveau' } },
      { key: 'legacy', values: { en: 'Legacy', fr: 'Ancien' } },
    ]);
    expect(plan.merge).toMatchObject({
      status: 'merged',
      counters: { added: 1, updated: 1, unchanged: 0, orphanKept: 1, orphanDropped: 0 },
      existingLanguages: ['en', 'fr'],
      existingRecords: 2,
    });
    expect(plan.warnings).toEqual([]);
  });

  it('keeps hand-edited rows that use macros in the existing table', async () => {
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(path.join(outDir, 'i18n_gen_export.h'), emitHeader(['en']));
    await fs.writeFile(
      path.join(outDir, 'i18n_gen.cpp'),
      'const Entry D[] = {\n    { "hello", "Hi (manual)" },\n    { "orphan", TXT("kept") },\n};\n'
    );
    await fs.writeFile(csvPath, 'key,en\nhello,Hello\n');

    const plan = await new TableGenerator({ csvPath, outDir, merge: { prefer: 'existing' } }).plan();

    expect(plan.records).toEqual([
      { key: 'hello', values: { en: 'Hi (manual)' } },
      { key: 'orphan', values: { en: 'kept' } },
    ]);
    expect(plan.merge?.status).toBe('merged');
    expect(plan.merge?.counters).toEqual({ added: 0, updated: 0, unchanged: 1, orphanKept: 1, orphanDropped: 0 });
    expect(plan.warnings).toEqual([]);
  });

  it('warns when the existing table cannot be read', async () => {
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(path.join(outDir, 'i18n_gen_export.h'), emitHeader(['en']));
    await fs.writeFile(path.join(outDir, 'i18n_gen.cpp'), 'const Entry D[] = {\n    { "a", "A" },\n');
    await fs.writeFile(csvPath, 'key,en\na,B\n');

    const plan = await new TableGenerator({ csvPath, outDir, merge: {} }).plan();

    expect(plan.merge?.status).toBe('missing-existing');
    expect(plan.merge?.counters.added).toBe(1);
    expect(plan.warnings).toEqual([
      'Merge requested, but no Entry table could be read from i18n_gen.cpp; every key is treated as new.',
    ]);
  });

  it('warns when the existing table holds no entries', async () => {
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(path.join(outDir, 'i18n_gen_export.h'), emitHeader(['en']));
    await fs.writeFile(path.join(outDir, 'i18n_gen.cpp'), emitTable(['en'], []));
    await fs.writeFile(csvPath, 'key,en\na,A\n');

    const plan = await new TableGenerator({ csvPath, outDir, merge: {} }).plan();

    expect(plan.merge?.status).toBe('merged');
    expect(plan.warnings).toEqual(['Merge requested, but the Entry table in i18n_gen.cpp holds no entries.']);
  });

  it('warns when merging without existing outputs', async () => {
    await fs.writeFile(csvPath, 'key,en\na,A\n');
    const generator = new TableGenerator({ csvPath, outDir, merge: { dropOrphans: true } });

    const plan = await generator.plan();

    expect(plan.merge?.status).toBe('missing-existing');
    expect(plan.merge?.counters.added).toBe(1);
    expect(plan.warnings).toEqual([
      `Merge requested, but i18n_gen_export.h and i18n_gen.cpp were not both found in ${outDir}; every key is treated as new.`,
    ]);
  });

  it('summarizes duplicate keys as a warning', async () => {
    await fs.writeFile(csvPath, 'key,en\na,1\nb,2\na,3\nb,4\n');
    const plan = await new TableGenerator({ csvPath, outDir }).plan();

    expect(plan.warnings).toEqual(['Duplicate keys (2): a, b']);
    expect(plan.records).toEqual([
      { key: 'a', values: { en: '3' } },
      { key: 'b', values: { en: '4' } },
    ]);
  });

  it('fails with a FormatError for a missing CSV', async () => {
    await expect(new TableGenerator({ csvPath, outDir }).plan()).rejects.toBeInstanceOf(FormatError);
  });

  it('diffs planned outputs against disk', async () => {
    await fs.writeFile(csvPath, 'key,en\nhello,Hello\n');
    const generator = new TableGenerator({ csvPath, outDir, workspaceRoot: tempDir });
    await generator.write(await generator.plan(), RUN_AT);
    await fs.writeFile(csvPath, 'key,en\nhello,Hi\n');

    const diffs = generator.diff(await generator.plan());

    expect(diffs.map((entry) => [entry.kind, entry.status, entry.relativePath])).toEqual([
      ['table', 'modified', path.join('gen', 'i18n_gen.cpp')],
    ]);
    expect(diffs[0].diff).toContain('-    { "hello", "Hello" },');
    expect(diffs[0].diff).toContain('+    { "hello", "Hi" },');
  });
});

describe('generatorOptionsFromConfig', () => {
  it('resolves paths against the project root and maps merge settings', () => {
    const config = normalizeConfig({
      csv: 'strings.csv',
      outDir: 'gen',
      merge: { enabled: true, prefer: 'existing' },
    });

    const options = generatorOptionsFromConfig(config, '/project');

    expect(options.csvPath).toBe(path.resolve('/project', 'strings.csv'));
    expect(options.outDir).toBe(path.resolve('/project', 'gen'));
    expect(options.merge).toEqual({ prefer: 'existing', overwriteAll: false, dropOrphans: false });
    expect(options.workspaceRoot).toBe('/project');
  });

  it('leaves merge off when disabled', () => {
    expect(generatorOptionsFromConfig(normalizeConfig({}), '/project').merge).toBeUndefined();
  });
});

describe('toMergePolicy', () => {
  it('defaults to preferring the CSV conservatively', () => {
    expect(toMergePolicy({})).toEqual({ preferPrimaryOnTie: true, overwriteAll: false, dropOrphans: false });
    expect(toMergePolicy({ prefer: 'existing', overwriteAll: true })).toEqual({
      preferPrimaryOnTie: false,
      overwriteAll: true,
      dropOrphans: false,
    });
  });
});
