import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { buildCsvFromTable, readGeneratedLanguages, resolveProjectPath, writeTextFile } from '@lingotable/core';
import { loadProjectConfig, resolveCliPath } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES } from '../utils/exit-codes.js';

interface ExportCommandOptions {
  config?: string;
  table?: string;
  header?: string;
  output?: string;
  bom: boolean;
}

const DEFAULT_EXPORT_NAME = 'translations.csv';

async function readTable(tablePath: string): Promise<string> {
  try {
    return await fs.readFile(tablePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new CliError(`Table file not found: ${tablePath}`, EXIT_CODES.TABLE_NOT_FOUND);
    }
    throw error;
  }
}

export function registerExport(program: Command) {
  program
    .command('export')
    .description('Export an existing generated table back to CSV')
    .option('-c, --config <path>', 'Path to lingotable config file (searched upward by default)')
    .option('--table <path>', 'Generated table to read (defaults to the configured table file)')
    .option('--header <path>', 'Generated header naming the languages (defaults to the configured header)')
    .option('--output <path>', `CSV to write (defaults to ${DEFAULT_EXPORT_NAME} beside the table)`)
    .option('--no-bom', 'Write the CSV without a UTF-8 byte-order mark')
    .action(
      withErrorHandling(async (options: ExportCommandOptions) => {
        const { config, projectRoot } = await loadProjectConfig(options.config);
        const outDir = resolveProjectPath(projectRoot, config.outDir);
        const tablePath = options.table ? resolveCliPath(options.table) : path.join(outDir, config.files.table);
        const headerPath = options.header
          ? resolveCliPath(options.header)
          : path.join(path.dirname(tablePath), config.files.header);
        const outputPath = options.output
          ? resolveCliPath(options.output)
          : path.join(path.dirname(tablePath), DEFAULT_EXPORT_NAME);

        console.log(chalk.blue(`Exporting ${path.relative(process.cwd(), tablePath) || tablePath} to CSV...`));

        const source = await readTable(tablePath);
        const languages = await readGeneratedLanguages(headerPath);
        if (!languages) {
          console.log(chalk.yellow(`⚠️  No languages found in ${headerPath}; using numbered columns.`));
        }

        const result = buildCsvFromTable(source, {
          languages,
          bom: options.bom,
          source: path.basename(tablePath),
        });
        const written = await writeTextFile(outputPath, result.csv, { backup: config.backup });

        console.log(
          chalk.green(`Exported ${result.rowCount} row(s) with columns ${result.columns.join(', ')} to ${outputPath}`)
        );
        if (written.backupPath) {
          console.log(chalk.gray(`   backup: ${written.backupPath}`));
        }
      })
    );
}
