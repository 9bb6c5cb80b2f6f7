import { ConfigError, type ConfigIssue } from '../errors.js';
import { DUPLICATE_KEY_POLICIES, PREFER_SOURCES } from './defaults.js';
import { isRecord } from './normalizer.js';
import type { TableConfig } from './types.js';

export type ConfigValidationIssue = ConfigIssue;

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const FILE_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;
const MAX_PATH_LIKE_LENGTH = 320;
const BOOLEAN_FIELDS = ['sortKeys', 'emitFallback', 'backup'] as const;
const MERGE_BOOLEAN_FIELDS = ['enabled', 'overwriteAll', 'dropOrphans'] as const;

export function isSafeFileName(value: string): boolean {
  return FILE_NAME_PATTERN.test(value) && value !== '.' && value !== '..';
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

function validateFileName(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!isSafeFileName(value)) {
    issues.push({ field, message: 'must be a bare file name (letters, numbers, ".", "-", "_")' });
  }
}

export function validateConfig(config: TableConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  if (config.csv !== undefined) {
    validatePathLike('csv', config.csv, issues);
  }
  validatePathLike('outDir', config.outDir, issues);
  validateFileName('files.header', config.files.header, issues);
  validateFileName('files.table', config.files.table, issues);
  validateFileName('files.fallback', config.files.fallback, issues);
  validatePathLike('runtimeHeader', config.runtimeHeader, issues);

  const names = [config.files.header, config.files.table, config.files.fallback];
  if (new Set(names).size !== names.length) {
    issues.push({ field: 'files', message: 'header, table and fallback must be different files' });
  }

  return issues;
}

/**
 * Catches values the normalizer would otherwise silently replace with defaults.
 */
export function validateRawConfig(raw: unknown): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];
  if (!isRecord(raw)) {
    issues.push({ field: '(root)', message: 'must be a JSON object' });
    return issues;
  }

  const record = raw;
  for (const field of BOOLEAN_FIELDS) {
    if (record[field] !== undefined && typeof record[field] !== 'boolean') {
      issues.push({ field, message: 'must be true or false' });
    }
  }

  if (record.duplicateKeys !== undefined && !DUPLICATE_KEY_POLICIES.some((policy) => policy === record.duplicateKeys)) {
    issues.push({ field: 'duplicateKeys', message: `must be one of ${DUPLICATE_KEY_POLICIES.join(', ')}` });
  }

  const merge = record.merge;
  if (merge !== undefined) {
    if (!isRecord(merge)) {
      issues.push({ field: 'merge', message: 'must be an object' });
    } else {
      const mergeRecord = merge;
      for (const field of MERGE_BOOLEAN_FIELDS) {
        if (mergeRecord[field] !== undefined && typeof mergeRecord[field] !== 'boolean') {
          issues.push({ field: `merge.${field}`, message: 'must be true or false' });
        }
      }
      if (mergeRecord.prefer !== undefined && !PREFER_SOURCES.some((source) => source === mergeRecord.prefer)) {
        issues.push({ field: 'merge.prefer', message: `must be one of ${PREFER_SOURCES.join(', ')}` });
      }
    }
  }

  return issues;
}

export function assertConfigValid(config: TableConfig, raw?: unknown): void {
  const issues = [...(raw === undefined ? [] : validateRawConfig(raw)), ...validateConfig(config)];
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new ConfigError(`Invalid lingotable configuration:\n${details}`, issues);
}
