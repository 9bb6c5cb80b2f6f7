import type { LanguageId } from './model.js';

const NON_IDENTIFIER_CHARS = /[^A-Za-z0-9_]/g;

/** Field name of the key column in the generated `Entry` struct. */
export const KEY_FIELD = 'key';

/**
 * Convert a raw CSV header cell into a C identifier usable as a struct field.
 */
export function sanitizeLanguageName(raw: string): LanguageId {
  let name = raw.trim().replace(/[-\s]/g, '_').replace(NON_IDENTIFIER_CHARS, '_');
  if (/^[0-9]/.test(name)) {
    name = `_${name}`;
  }
  return name || 'unnamed';
}

/**
 * Sanitize a header row and disambiguate collisions with `_2`, `_3`, ... in
 * first-seen order. `key` is reserved for the key field.
 */
export function buildLanguageIds(rawNames: readonly string[]): LanguageId[] {
  const seen = new Set<string>([KEY_FIELD]);
  const ids: LanguageId[] = [];

  for (const raw of rawNames) {
    const base = sanitizeLanguageName(raw);
    let candidate = base;
    let suffix = 1;
    while (seen.has(candidate)) {
      suffix += 1;
      candidate = `${base}_${suffix}`;
    }
    seen.add(candidate);
    ids.push(candidate);
  }

  return ids;
}
