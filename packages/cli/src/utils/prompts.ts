import inquirer from 'inquirer';

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export async function confirmAction(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: false,
    },
  ]);
  return confirmed;
}

export async function promptForCsvPath(): Promise<string> {
  const { csvPath } = await inquirer.prompt<{ csvPath: string }>([
    {
      type: 'input',
      name: 'csvPath',
      message: 'Path to the translations CSV:',
      default: 'translations.csv',
      validate: (value: string) => (value.trim() ? true : 'Enter a path'),
    },
  ]);
  return csvPath.trim();
}
