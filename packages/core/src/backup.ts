/**
 * Aside backups for generated files.
 * An existing output is renamed to `<file>.<YYYYMMDD_HHMMSS>.bak` before it is
 * replaced, so every regeneration can be undone by hand or with `restoreTableBackup`.
 */

import fs from 'fs/promises';
import path from 'path';

export interface WriteTextOptions {
  /** Rename an existing file aside before writing. Defaults to true. */
  backup?: boolean;
  now?: Date;
}

export interface WriteTextResult {
  path: string;
  backupPath: string | null;
}

export interface TableBackupSet {
  timestamp: string;
  /** Original file names covered by this backup set. */
  files: string[];
}

export interface RestoreResult {
  restored: string[];
  /** Backups taken of the files that were replaced by the restore. */
  displaced: string[];
  summary: string;
}

const BACKUP_EXTENSION = '.bak';
const TIMESTAMP_PATTERN = '\\d{8}_\\d{6}(?:_\\d+)?';

/**
 * Formats a date as YYYYMMDD_HHMMSS (local time) for backup file names.
 */
export function formatBackupTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function backupPathFor(filePath: string, timestamp: string): string {
  return `${filePath}.${timestamp}${BACKUP_EXTENSION}`;
}

/**
 * Renames `filePath` aside when it exists. Returns the backup path, or null
 * when there was nothing to back up.
 */
export async function backupIfExists(filePath: string, now: Date = new Date()): Promise<string | null> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return null;
    }
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const base = formatBackupTimestamp(now);
  let timestamp = base;
  let attempt = 1;
  while (await exists(backupPathFor(filePath, timestamp))) {
    attempt++;
    timestamp = `${base}_${attempt}`;
  }

  const target = backupPathFor(filePath, timestamp);
  await fs.rename(filePath, target);
  return target;
}

export async function writeTextFile(
  filePath: string,
  content: string,
  options: WriteTextOptions = {}
): Promise<WriteTextResult> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const backupPath = options.backup === false ? null : await backupIfExists(filePath, options.now);
  await fs.writeFile(filePath, content, 'utf8');
  return { path: filePath, backupPath };
}

/**
 * Lists backup sets for the given generated file names, newest first.
 */
export async function listTableBackups(directory: string, fileNames: readonly string[]): Promise<TableBackupSet[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const sets = new Map<string, TableBackupSet>();
  for (const fileName of fileNames) {
    const pattern = new RegExp(`^${escapeRegExp(fileName)}\\.(${TIMESTAMP_PATTERN})\\${BACKUP_EXTENSION}$`);
    for (const entry of entries) {
      const match = pattern.exec(entry);
      if (!match) {
        continue;
      }
      const timestamp = match[1];
      const set = sets.get(timestamp) ?? { timestamp, files: [] };
      set.files.push(fileName);
      sets.set(timestamp, set);
    }
  }

  return Array.from(sets.values()).sort((a, b) => b.timestamp.localeCompare(a.timestamp));
}

/**
 * Puts the files of one backup set back in place. Current files are renamed
 * aside first, so a restore is itself undoable.
 */
export async function restoreTableBackup(
  directory: string,
  timestamp: string,
  fileNames: readonly string[],
  now: Date = new Date()
): Promise<RestoreResult> {
  const restored: string[] = [];
  const displaced: string[] = [];

  for (const fileName of fileNames) {
    const target = path.join(directory, fileName);
    const source = backupPathFor(target, timestamp);
    if (!(await exists(source))) {
      continue;
    }

    const aside = await backupIfExists(target, now);
    if (aside) {
      displaced.push(aside);
    }
    await fs.rename(source, target);
    restored.push(fileName);
  }

  return {
    restored,
    displaced,
    summary: `Restored ${restored.length} generated file(s) from backup ${timestamp}`,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
