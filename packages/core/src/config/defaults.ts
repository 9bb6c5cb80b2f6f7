/**
 * Default configuration values for lingotable
 */

import type { DuplicateKeyPolicy, OutputFilesConfig, PreferSource } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Output Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_OUTPUT_FILES: OutputFilesConfig = {
  header: 'i18n_gen_export.h',
  table: 'i18n_gen.cpp',
  fallback: 'i18n_fallback.cpp',
};

export const DEFAULT_OUT_DIR = '.';
export const DEFAULT_RUNTIME_HEADER = 'i18n.h';

// ─────────────────────────────────────────────────────────────────────────────
// Merge Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_PREFER: PreferSource = 'csv';
export const PREFER_SOURCES: readonly PreferSource[] = ['csv', 'existing'];

// ─────────────────────────────────────────────────────────────────────────────
// Other Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_DUPLICATE_KEYS: DuplicateKeyPolicy = 'last-wins';
export const DUPLICATE_KEY_POLICIES: readonly DuplicateKeyPolicy[] = ['last-wins', 'first-wins', 'error'];
export const DEFAULT_CONFIG_FILENAME = 'lingotable.config.json';
