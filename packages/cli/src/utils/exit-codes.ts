/**
 * Exit Code Reference for the lingotable CLI
 *
 * | Code | Meaning                                          |
 * |------|--------------------------------------------------|
 * | 0    | Success (dry runs included)                      |
 * | 1    | Unexpected error or invalid configuration        |
 * | 2    | Malformed CSV input                              |
 * | 3    | No Entry table found to export                   |
 * | 4    | Backup not found                                 |
 *
 * ## Usage in CI/CD
 *
 * ```bash
 * npx lingotable generate --merge --dry-run --json > plan.json
 * case $? in
 *   0) echo "Plan ready" ;;
 *   2) echo "Fix the CSV first" ;;
 * esac
 * ```
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Catch-all for exceptions, config errors and cancelled confirmations */
  ERROR: 1,
  /** Missing, empty or malformed CSV */
  FORMAT_ERROR: 2,
  /** `export` found no Entry table or no rows */
  TABLE_NOT_FOUND: 3,
  /** `backup-restore` got an unknown timestamp, or there are no backups */
  BACKUP_NOT_FOUND: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [EXIT_CODES.SUCCESS]: 'Success',
  [EXIT_CODES.ERROR]: 'General error',
  [EXIT_CODES.FORMAT_ERROR]: 'Malformed CSV input',
  [EXIT_CODES.TABLE_NOT_FOUND]: 'No Entry table found',
  [EXIT_CODES.BACKUP_NOT_FOUND]: 'Backup not found',
};
