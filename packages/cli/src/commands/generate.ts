import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  DUPLICATE_KEY_POLICIES,
  PREFER_SOURCES,
  TableGenerator,
  generatorOptionsFromConfig,
  type DuplicateKeyPolicy,
  type GeneratorMergeOptions,
  type PreferSource,
} from '@lingotable/core';
import { loadProjectConfig, resolveCliPath } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES } from '../utils/exit-codes.js';
import { printGenerationSummary, printOutputDiffs, writeJsonReport } from '../utils/output.js';
import { confirmAction, isInteractive, promptForCsvPath } from '../utils/prompts.js';

interface GenerateCommandOptions {
  config?: string;
  csv?: string;
  out?: string;
  sortKeys?: boolean;
  emitFallback?: boolean;
  merge?: boolean;
  prefer?: PreferSource;
  overwriteAll?: boolean;
  dropOrphans?: boolean;
  duplicates?: DuplicateKeyPolicy;
  dryRun?: boolean;
  diff?: boolean;
  json?: boolean;
  report?: string;
  backup?: boolean;
  yes?: boolean;
}

async function resolveCsvPath(options: GenerateCommandOptions, configured: string | undefined): Promise<string> {
  if (options.csv) {
    return resolveCliPath(options.csv);
  }
  if (configured) {
    return configured;
  }
  if (!options.yes && !options.json && isInteractive()) {
    return resolveCliPath(await promptForCsvPath());
  }
  throw new CliError(
    'No CSV file given. Pass --csv <path> or set "csv" in lingotable.config.json.',
    EXIT_CODES.FORMAT_ERROR
  );
}

export function registerGenerate(program: Command) {
  program
    .command('generate')
    .description('Generate the C++ translation table from the translations CSV')
    .option('-c, --config <path>', 'Path to lingotable config file (searched upward by default)')
    .option('--csv <path>', 'Translations CSV (overrides "csv" in config)')
    .option('--out <dir>', 'Output folder for generated files (overrides "outDir" in config)')
    .option('--sort-keys', 'Sort records by key')
    .option('--emit-fallback', 'Also write the self-contained fallback table')
    .option('--merge', 'Merge with the header and table already in the output folder')
    .addOption(new Option('--prefer <source>', 'Which side wins when both hold a value').choices(PREFER_SOURCES))
    .option('--overwrite-all', 'Take the preferred side even when its cell is empty (can blank translations)')
    .option('--drop-orphans', 'Remove keys that exist only in the generated table')
    .addOption(
      new Option('--duplicates <policy>', 'How repeated CSV keys are handled').choices(DUPLICATE_KEY_POLICIES)
    )
    .option('--dry-run', 'Plan and report without writing files', false)
    .option('--diff', 'Display unified diffs for outputs that would change', false)
    .option('--json', 'Print the report as JSON', false)
    .option('--report <path>', 'Write the JSON report to a file')
    .option('--backup', 'Rename existing outputs aside before writing (default)')
    .option('--no-backup', 'Overwrite existing outputs without backups')
    .option('-y, --yes', 'Skip prompts and confirmations', false)
    .action(
      withErrorHandling(async (options: GenerateCommandOptions) => {
        const dryRun = Boolean(options.dryRun);
        if (!options.json) {
          console.log(chalk.blue(dryRun ? 'Planning table generation (dry run)...' : 'Generating translation table...'));
        }

        const { config, projectRoot } = await loadProjectConfig(options.config, { quiet: options.json });
        const configured = generatorOptionsFromConfig(config, projectRoot);
        const csvPath = await resolveCsvPath(options, configured.csvPath);

        const mergeEnabled = options.merge ?? config.merge.enabled;
        const merge: GeneratorMergeOptions | undefined = mergeEnabled
          ? {
              prefer: options.prefer ?? config.merge.prefer,
              overwriteAll: options.overwriteAll ?? config.merge.overwriteAll,
              dropOrphans: options.dropOrphans ?? config.merge.dropOrphans,
            }
          : undefined;

        if (merge?.overwriteAll && !dryRun && !options.yes && isInteractive()) {
          const confirmed = await confirmAction(
            'Overwrite-all merge can blank translations that are filled today. Continue?'
          );
          if (!confirmed) {
            console.log(chalk.yellow('Generation cancelled.'));
            return;
          }
        }

        const generator = new TableGenerator({
          ...configured,
          csvPath,
          outDir: options.out ? resolveCliPath(options.out) : configured.outDir,
          sortKeys: options.sortKeys ?? configured.sortKeys,
          emitFallback: options.emitFallback ?? configured.emitFallback,
          duplicateKeys: options.duplicates ?? configured.duplicateKeys,
          backup: options.backup ?? configured.backup,
          merge,
        });

        const plan = await generator.plan();
        const diffs = options.diff ? generator.diff(plan) : undefined;
        const written = dryRun ? undefined : await generator.write(plan);
        const report = generator.buildReport(plan, written);
        const payload = diffs ? { ...report, diffs } : report;

        if (options.report) {
          const reportPath = await writeJsonReport(options.report, payload);
          if (!options.json) {
            console.log(chalk.gray(`Report written to ${reportPath}`));
          }
        }

        if (options.json) {
          console.log(JSON.stringify(payload, null, 2));
          return;
        }

        printGenerationSummary(report);
        if (diffs) {
          printOutputDiffs(diffs);
        }
      })
    );
}
