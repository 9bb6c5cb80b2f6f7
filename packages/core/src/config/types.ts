/**
 * Configuration type definitions for lingotable
 */

import type { DuplicateKeyPolicy } from '../tabular-parser.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

/** Which source wins a conflict when both hold a value. */
export type PreferSource = 'csv' | 'existing';

export type { DuplicateKeyPolicy };

// ─────────────────────────────────────────────────────────────────────────────
// Output Files
// ─────────────────────────────────────────────────────────────────────────────

export interface OutputFilesConfig {
  /** Shared `struct Entry` declaration. Defaults to `i18n_gen_export.h`. */
  header: string;
  /** Table definition. Defaults to `i18n_gen.cpp`. */
  table: string;
  /** Optional self-contained table. Defaults to `i18n_fallback.cpp`. */
  fallback: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Merge Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface MergeConfig {
  /** Merge with the header/table already in the output folder. */
  enabled: boolean;
  prefer: PreferSource;
  /**
   * Take the preferred side even when its cell is empty.
   * Dangerous: can blank previously filled translations.
   */
  overwriteAll: boolean;
  /** Remove keys that only exist in the generated table. */
  dropOrphans: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface TableConfig {
  /** Translator-edited CSV, relative to the project root. */
  csv?: string;
  /** Folder receiving the generated files, relative to the project root. */
  outDir: string;
  files: OutputFilesConfig;
  /** Runtime header included by the generated table. */
  runtimeHeader: string;
  sortKeys: boolean;
  emitFallback: boolean;
  duplicateKeys: DuplicateKeyPolicy;
  /** Rename existing outputs aside before overwriting them. */
  backup: boolean;
  merge: MergeConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Loader Result Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadConfigResult {
  config: TableConfig;
  /** Null when no config file was found and defaults apply. */
  configPath: string | null;
  projectRoot: string;
}
