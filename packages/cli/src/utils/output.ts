/**
 * Console presentation for generation reports and output diffs.
 */

import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import type { GenerationReport, OutputDiffEntry } from '@lingotable/core';

export function printGenerationSummary(report: GenerationReport, cwd: string = process.cwd()) {
  console.log(
    chalk.green(
      `${report.records} record(s) in ${report.languages.length} language(s): ${report.languages.join(', ') || '(none)'}`
    )
  );
  console.log(chalk.gray(`  CSV rows: ${report.rows}${report.sorted ? ' (sorted by key)' : ''}`));

  const empty = Object.entries(report.emptyPerLanguage).filter(([, count]) => count > 0);
  if (empty.length) {
    console.log(chalk.gray(`  Empty CSV cells: ${empty.map(([language, count]) => `${language} ${count}`).join(', ')}`));
  }

  if (report.merge) {
    const { counters } = report.merge;
    const prefer = report.merge.preferPrimaryOnTie ? 'csv' : 'existing';
    const mode = report.merge.overwriteAll ? ', overwrite all' : '';
    console.log(chalk.blue(`Merge (prefer ${prefer}${mode}):`));
    console.log(
      `  added ${counters.added}, updated ${counters.updated}, unchanged ${counters.unchanged}, ` +
        `orphans kept ${counters.orphanKept}, orphans dropped ${counters.orphanDropped}`
    );
    if (report.merge.droppedKeys.length) {
      console.log(chalk.gray(`  Dropped: ${report.merge.droppedKeys.join(', ')}`));
    }
  }

  for (const warning of report.warnings) {
    console.log(chalk.yellow(`⚠️  ${warning}`));
  }

  for (const output of report.outputs) {
    const relative = path.relative(cwd, output.path) || output.path;
    const state = output.changed ? '' : chalk.gray(' (unchanged)');
    if (report.dryRun) {
      console.log(`  ${chalk.cyan('would write')} ${relative}${state}`);
      continue;
    }
    console.log(`  ${chalk.cyan('wrote')} ${relative}${state}`);
    if (output.backupPath) {
      console.log(chalk.gray(`     backup: ${path.relative(cwd, output.backupPath) || output.backupPath}`));
    }
  }

  if (report.dryRun) {
    console.log(chalk.yellow('\nDry run: no files were written. Re-run without --dry-run to apply.'));
  }
}

export function printOutputDiffs(diffs: readonly OutputDiffEntry[]) {
  if (!diffs.length) {
    console.log(chalk.gray('No output changes to display.'));
    return;
  }

  console.log(chalk.blue('\nUnified output diffs:'));
  diffs.forEach((entry) => {
    console.log(chalk.yellow(`\n--- ${entry.kind} (${entry.relativePath}, ${entry.status})`));
    console.log(entry.diff.trimEnd());
  });
}

export async function writeJsonReport(reportPath: string, payload: unknown) {
  const outputPath = path.resolve(process.cwd(), reportPath);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
  return outputPath;
}
