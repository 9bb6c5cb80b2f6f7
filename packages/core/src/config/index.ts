/**
 * Configuration module for lingotable
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type {
  PreferSource,
  DuplicateKeyPolicy,
  OutputFilesConfig,
  MergeConfig,
  TableConfig,
  LoadConfigResult,
} from './types.js';

export {
  DEFAULT_OUTPUT_FILES,
  DEFAULT_OUT_DIR,
  DEFAULT_RUNTIME_HEADER,
  DEFAULT_PREFER,
  PREFER_SOURCES,
  DEFAULT_DUPLICATE_KEYS,
  DUPLICATE_KEY_POLICIES,
  DEFAULT_CONFIG_FILENAME,
} from './defaults.js';

export {
  isPreferSource,
  isDuplicateKeyPolicy,
  normalizeOptionalString,
  normalizeBoolean,
  normalizeOutputFiles,
  normalizeMergeConfig,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, validateRawConfig, assertConfigValid, isSafeFileName } from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfig, loadConfigWithMeta, resolveProjectPath } from './loader.js';
