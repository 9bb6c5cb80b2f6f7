import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { listTableBackups, resolveProjectPath, restoreTableBackup, type TableConfig } from '@lingotable/core';
import { loadProjectConfig, resolveCliPath } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES } from '../utils/exit-codes.js';
import { confirmAction, isInteractive } from '../utils/prompts.js';

interface BackupCommandOptions {
  config?: string;
  out?: string;
}

interface RestoreCommandOptions extends BackupCommandOptions {
  yes?: boolean;
}

function generatedFileNames(config: TableConfig): string[] {
  return [config.files.header, config.files.table, config.files.fallback];
}

async function resolveBackupScope(options: BackupCommandOptions) {
  const { config, projectRoot } = await loadProjectConfig(options.config);
  const outDir = options.out ? resolveCliPath(options.out) : resolveProjectPath(projectRoot, config.outDir);
  return { outDir, fileNames: generatedFileNames(config) };
}

/**
 * Registers backup-related commands (backup-list, backup-restore)
 */
export function registerBackup(program: Command): void {
  program
    .command('backup-list')
    .description('List aside backups of the generated files')
    .option('-c, --config <path>', 'Path to lingotable config file (searched upward by default)')
    .option('--out <dir>', 'Output folder holding the generated files (overrides "outDir" in config)')
    .action(
      withErrorHandling(async (options: BackupCommandOptions) => {
        const { outDir, fileNames } = await resolveBackupScope(options);
        const backups = await listTableBackups(outDir, fileNames);

        if (backups.length === 0) {
          console.log(chalk.yellow('No backups found.'));
          console.log(chalk.gray('Backups are created automatically whenever generate replaces a file.'));
          return;
        }

        console.log(chalk.blue(`Found ${backups.length} backup(s) in ${outDir}:\n`));
        for (const backup of backups) {
          console.log(`  ${chalk.cyan(backup.timestamp)}  ${backup.files.join(', ')}`);
        }
        console.log(chalk.gray(`\nRestore a backup with: lingotable backup-restore <timestamp>`));
      })
    );

  program
    .command('backup-restore')
    .description('Restore the generated files from an aside backup')
    .argument('<timestamp>', 'Backup timestamp (from backup-list) or "latest" for most recent')
    .option('-c, --config <path>', 'Path to lingotable config file (searched upward by default)')
    .option('--out <dir>', 'Output folder holding the generated files (overrides "outDir" in config)')
    .option('-y, --yes', 'Restore without asking for confirmation', false)
    .action(
      withErrorHandling(async (timestamp: string, options: RestoreCommandOptions) => {
        const { outDir, fileNames } = await resolveBackupScope(options);
        const backups = await listTableBackups(outDir, fileNames);

        if (backups.length === 0) {
          throw new CliError(`No backups found in ${outDir}.`, EXIT_CODES.BACKUP_NOT_FOUND);
        }

        const target = timestamp === 'latest' ? backups[0] : backups.find((backup) => backup.timestamp === timestamp);
        if (!target) {
          const suggestion = backups
            .slice(0, 5)
            .map((backup) => backup.timestamp)
            .join(', ');
          throw new CliError(
            `Backup not found: ${timestamp}. Available backups: ${suggestion}`,
            EXIT_CODES.BACKUP_NOT_FOUND
          );
        }

        if (!options.yes) {
          if (!isInteractive()) {
            throw new CliError('Refusing to restore without confirmation; pass --yes.');
          }
          const confirmed = await confirmAction(
            `Restore ${target.files.join(', ')} from backup ${target.timestamp}? Current files are kept as new backups.`
          );
          if (!confirmed) {
            console.log(chalk.yellow('Restore cancelled.'));
            return;
          }
        }

        const result = await restoreTableBackup(outDir, target.timestamp, fileNames);

        console.log(chalk.green(`\n✅ ${result.summary}`));
        for (const file of result.restored) {
          console.log(chalk.gray(`   Restored: ${path.join(outDir, file)}`));
        }
        for (const file of result.displaced) {
          console.log(chalk.gray(`   Previous version kept at: ${file}`));
        }
      })
    );
}
