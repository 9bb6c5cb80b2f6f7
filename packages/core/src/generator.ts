import fs from 'fs/promises';
import path from 'path';
import { writeTextFile, type WriteTextResult } from './backup.js';
import { DEFAULT_OUTPUT_FILES, DEFAULT_RUNTIME_HEADER, resolveProjectPath } from './config/index.js';
import type { OutputFilesConfig, PreferSource, TableConfig } from './config/index.js';
import { buildOutputDiffs, hasChanged, type OutputDiffEntry, type PlannedOutput } from './diff-utils.js';
import { emitFallback, emitHeader, emitTable } from './emitter.js';
import { readGeneratedModel, type GeneratedModelStatus } from './generated-parser.js';
import { mergeModels, type MergeCounters, type MergePolicy } from './merge.js';
import type { LanguageId, TranslationRecord } from './model.js';
import { parseTabularRows, readTabular, type DuplicateKeyPolicy, type TabularStats } from './tabular-parser.js';

export interface GeneratorMergeOptions {
  prefer?: PreferSource;
  overwriteAll?: boolean;
  dropOrphans?: boolean;
}

export interface TableGeneratorOptions {
  csvPath: string;
  outDir: string;
  files?: Partial<OutputFilesConfig>;
  runtimeHeader?: string;
  sortKeys?: boolean;
  emitFallback?: boolean;
  duplicateKeys?: DuplicateKeyPolicy;
  /** Merge with the existing generated files; omit to regenerate from the CSV alone. */
  merge?: GeneratorMergeOptions;
  /** Rename existing outputs aside before writing. Defaults to true. */
  backup?: boolean;
  /** Base for relative paths in diffs. Defaults to process.cwd(). */
  workspaceRoot?: string;
}

/** Generator options as far as a config file can supply them. */
export type ConfiguredGeneratorOptions = Omit<TableGeneratorOptions, 'csvPath'> & { csvPath?: string };

export type MergeStatus = 'merged' | 'missing-existing' | 'no-languages';

export interface MergeOutcome {
  status: MergeStatus;
  policy: MergePolicy;
  counters: MergeCounters;
  existingLanguages: LanguageId[];
  existingRecords: number;
  droppedKeys: string[];
}

export interface GenerationPlan {
  csvPath: string;
  outDir: string;
  languages: LanguageId[];
  records: TranslationRecord[];
  stats: TabularStats;
  merge: MergeOutcome | null;
  outputs: PlannedOutput[];
  warnings: string[];
}

export interface GenerationReport {
  csv: string;
  outDir: string;
  dryRun: boolean;
  rows: number;
  records: number;
  languages: LanguageId[];
  sorted: boolean;
  emptyPerLanguage: Record<LanguageId, number>;
  duplicates: string[];
  merge: (Omit<MergeOutcome, 'policy'> & MergePolicy) | null;
  outputs: Array<{ kind: PlannedOutput['kind']; path: string; changed: boolean; backupPath: string | null }>;
  warnings: string[];
}

const DUPLICATE_PREVIEW_LIMIT = 10;

function statusFromModel(status: GeneratedModelStatus): MergeStatus {
  switch (status) {
    case 'loaded':
      return 'merged';
    case 'missing-files':
    case 'no-table':
      return 'missing-existing';
    case 'no-languages':
      return 'no-languages';
  }
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

export function toMergePolicy(options: GeneratorMergeOptions): MergePolicy {
  return {
    preferPrimaryOnTie: (options.prefer ?? 'csv') === 'csv',
    overwriteAll: options.overwriteAll ?? false,
    dropOrphans: options.dropOrphans ?? false,
  };
}

/**
 * Maps a loaded config onto generator options; paths resolve against the project root.
 */
export function generatorOptionsFromConfig(config: TableConfig, projectRoot: string): ConfiguredGeneratorOptions {
  return {
    csvPath: config.csv ? resolveProjectPath(projectRoot, config.csv) : undefined,
    outDir: resolveProjectPath(projectRoot, config.outDir),
    files: config.files,
    runtimeHeader: config.runtimeHeader,
    sortKeys: config.sortKeys,
    emitFallback: config.emitFallback,
    duplicateKeys: config.duplicateKeys,
    merge: config.merge.enabled
      ? { prefer: config.merge.prefer, overwriteAll: config.merge.overwriteAll, dropOrphans: config.merge.dropOrphans }
      : undefined,
    backup: config.backup,
    workspaceRoot: projectRoot,
  };
}

/**
 * CSV → (merge) → generated header/table. `plan()` only reads; `write()`
 * applies a plan with aside backups.
 */
export class TableGenerator {
  private readonly files: OutputFilesConfig;
  private readonly workspaceRoot: string;

  constructor(private readonly options: TableGeneratorOptions) {
    this.files = { ...DEFAULT_OUTPUT_FILES, ...options.files };
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
  }

  public getOutputPath(kind: keyof OutputFilesConfig): string {
    return path.join(this.options.outDir, this.files[kind]);
  }

  public async plan(): Promise<GenerationPlan> {
    const { csvPath, outDir } = this.options;
    const rows = await readTabular(csvPath);
    const parsed = parseTabularRows(rows, {
      sortKeys: this.options.sortKeys,
      duplicateKeys: this.options.duplicateKeys,
      source: path.basename(csvPath),
    });

    const warnings: string[] = [];
    if (parsed.stats.duplicates.length) {
      const preview = parsed.stats.duplicates.slice(0, DUPLICATE_PREVIEW_LIMIT).join(', ');
      const more = parsed.stats.duplicates.length > DUPLICATE_PREVIEW_LIMIT ? ', ...' : '';
      warnings.push(`Duplicate keys (${parsed.stats.duplicates.length}): ${preview}${more}`);
    }

    let languages: LanguageId[] = parsed.languages;
    let records: TranslationRecord[] = parsed.records;
    let merge: MergeOutcome | null = null;

    if (this.options.merge) {
      const policy = toMergePolicy(this.options.merge);
      const existing = await readGeneratedModel(this.getOutputPath('header'), this.getOutputPath('table'));
      const status = statusFromModel(existing.status);
      if (existing.status === 'missing-files') {
        warnings.push(
          `Merge requested, but ${this.files.header} and ${this.files.table} were not both found in ${outDir}; every key is treated as new.`
        );
      } else if (existing.status === 'no-table') {
        warnings.push(`Merge requested, but no Entry table could be read from ${this.files.table}; every key is treated as new.`);
      } else if (existing.status === 'no-languages') {
        warnings.push(`Merge requested, but no language fields were found in ${this.files.header}; every key is treated as new.`);
      } else if (!existing.model?.records.length) {
        warnings.push(`Merge requested, but the Entry table in ${this.files.table} holds no entries.`);
      }

      const merged = mergeModels(
        parsed,
        existing.model,
        policy,
        parsed.records.map((record) => record.key)
      );
      languages = merged.languages;
      records = merged.records;
      merge = {
        status,
        policy,
        counters: merged.counters,
        existingLanguages: [...(existing.model?.languages ?? [])],
        existingRecords: existing.model?.records.length ?? 0,
        droppedKeys: merged.droppedKeys,
      };
    }

    const outputs = await this.buildOutputs(languages, records);

    return { csvPath, outDir, languages, records, stats: parsed.stats, merge, outputs, warnings };
  }

  public diff(plan: GenerationPlan): OutputDiffEntry[] {
    return buildOutputDiffs(plan.outputs, this.workspaceRoot);
  }

  public async write(plan: GenerationPlan, now: Date = new Date()): Promise<WriteTextResult[]> {
    const results: WriteTextResult[] = [];
    for (const output of plan.outputs) {
      results.push(await writeTextFile(output.path, output.content, { backup: this.options.backup ?? true, now }));
    }
    return results;
  }

  public buildReport(plan: GenerationPlan, written?: readonly WriteTextResult[]): GenerationReport {
    const backups = new Map((written ?? []).map((result) => [result.path, result.backupPath]));
    return {
      csv: plan.csvPath,
      outDir: plan.outDir,
      dryRun: written === undefined,
      rows: plan.stats.rows,
      records: plan.records.length,
      languages: plan.languages,
      sorted: plan.stats.sorted,
      emptyPerLanguage: plan.stats.emptyPerLanguage,
      duplicates: plan.stats.duplicates,
      merge: plan.merge
        ? {
            status: plan.merge.status,
            counters: plan.merge.counters,
            existingLanguages: plan.merge.existingLanguages,
            existingRecords: plan.merge.existingRecords,
            droppedKeys: plan.merge.droppedKeys,
            ...plan.merge.policy,
          }
        : null,
      outputs: plan.outputs.map((output) => ({
        kind: output.kind,
        path: output.path,
        changed: hasChanged(output),
        backupPath: backups.get(output.path) ?? null,
      })),
      warnings: plan.warnings,
    };
  }

  private async buildOutputs(languages: LanguageId[], records: TranslationRecord[]): Promise<PlannedOutput[]> {
    const runtimeHeader = this.options.runtimeHeader ?? DEFAULT_RUNTIME_HEADER;
    const outputs: Array<Omit<PlannedOutput, 'previous'>> = [
      { kind: 'header', path: this.getOutputPath('header'), content: emitHeader(languages) },
      {
        kind: 'table',
        path: this.getOutputPath('table'),
        content: emitTable(languages, records, { headerFile: this.files.header, runtimeHeader }),
      },
    ];
    if (this.options.emitFallback) {
      outputs.push({
        kind: 'fallback',
        path: this.getOutputPath('fallback'),
        content: emitFallback(languages, records, { runtimeHeader }),
      });
    }

    return Promise.all(
      outputs.map(async (output) => ({ ...output, previous: await readIfExists(output.path) }))
    );
  }
}
