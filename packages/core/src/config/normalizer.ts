/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { DuplicateKeyPolicy, MergeConfig, OutputFilesConfig, PreferSource, TableConfig } from './types.js';
import {
  DEFAULT_DUPLICATE_KEYS,
  DEFAULT_OUT_DIR,
  DEFAULT_OUTPUT_FILES,
  DEFAULT_PREFER,
  DEFAULT_RUNTIME_HEADER,
  DUPLICATE_KEY_POLICIES,
  PREFER_SOURCES,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isPreferSource = (value: unknown): value is PreferSource =>
  typeof value === 'string' && PREFER_SOURCES.some((source) => source === value);

export const isDuplicateKeyPolicy = (value: unknown): value is DuplicateKeyPolicy =>
  typeof value === 'string' && DUPLICATE_KEY_POLICIES.some((policy) => policy === value);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

// ─────────────────────────────────────────────────────────────────────────────
// Section Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeOutputFiles(input: unknown): OutputFilesConfig {
  const raw: Record<string, unknown> = isRecord(input) ? input : {};
  return {
    header: normalizeOptionalString(raw.header) ?? DEFAULT_OUTPUT_FILES.header,
    table: normalizeOptionalString(raw.table) ?? DEFAULT_OUTPUT_FILES.table,
    fallback: normalizeOptionalString(raw.fallback) ?? DEFAULT_OUTPUT_FILES.fallback,
  };
}

export function normalizeMergeConfig(input: unknown): MergeConfig {
  const raw: Record<string, unknown> = isRecord(input) ? input : {};
  return {
    enabled: normalizeBoolean(raw.enabled, false),
    prefer: isPreferSource(raw.prefer) ? raw.prefer : DEFAULT_PREFER,
    overwriteAll: normalizeBoolean(raw.overwriteAll, false),
    dropOrphans: normalizeBoolean(raw.dropOrphans, false),
  };
}

export function normalizeConfig(input: unknown): TableConfig {
  const raw: Record<string, unknown> = isRecord(input) ? input : {};

  return {
    csv: normalizeOptionalString(raw.csv),
    outDir: normalizeOptionalString(raw.outDir) ?? DEFAULT_OUT_DIR,
    files: normalizeOutputFiles(raw.files),
    runtimeHeader: normalizeOptionalString(raw.runtimeHeader) ?? DEFAULT_RUNTIME_HEADER,
    sortKeys: normalizeBoolean(raw.sortKeys, false),
    emitFallback: normalizeBoolean(raw.emitFallback, false),
    duplicateKeys: isDuplicateKeyPolicy(raw.duplicateKeys) ? raw.duplicateKeys : DEFAULT_DUPLICATE_KEYS,
    backup: normalizeBoolean(raw.backup, true),
    merge: normalizeMergeConfig(raw.merge),
  };
}
