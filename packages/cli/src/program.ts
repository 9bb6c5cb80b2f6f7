import { Command } from 'commander';
import { registerGenerate } from './commands/generate.js';
import { registerExport } from './commands/export.js';
import { registerBackup } from './commands/backup.js';
import { EXIT_CODE_DESCRIPTIONS } from './utils/exit-codes.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('lingotable')
    .description('Generate and merge C++ translation tables from a translations CSV')
    .version('0.1.0');

  registerGenerate(program);
  registerExport(program);
  registerBackup(program);

  const exitCodes = Object.entries(EXIT_CODE_DESCRIPTIONS)
    .map(([code, description]) => `  ${code}  ${description}`)
    .join('\n');
  program.addHelpText('after', `\nExit codes:\n${exitCodes}`);

  return program;
}
