/**
 * Normalized translation model shared by both parsers, the merge engine and
 * the emitter.
 */

export type LanguageId = string;

export interface TranslationRecord {
  readonly key: string;
  /** One value per language identifier of the owning model. */
  readonly values: Readonly<Record<LanguageId, string>>;
}

export interface TranslationModel {
  readonly languages: readonly LanguageId[];
  readonly records: readonly TranslationRecord[];
}

export const EMPTY_MODEL: TranslationModel = Object.freeze({
  languages: Object.freeze([]),
  records: Object.freeze([]),
});

export const COMMENT_PREFIXES = ['#', '//'] as const;

export function isCommentKey(key: string): boolean {
  return COMMENT_PREFIXES.some((prefix) => key.startsWith(prefix));
}

export function getValue(record: TranslationRecord | undefined, language: LanguageId): string {
  if (!record) {
    return '';
  }
  return Object.prototype.hasOwnProperty.call(record.values, language) ? record.values[language] : '';
}

/**
 * Builds a record holding exactly the given languages, reading absent ones as ''.
 * Value maps are built with `Object.fromEntries` so a language named
 * `__proto__` is stored as an own property.
 */
export function projectRecord(
  key: string,
  source: TranslationRecord | undefined,
  languages: readonly LanguageId[]
): TranslationRecord {
  const values = Object.fromEntries(languages.map((language) => [language, getValue(source, language)]));
  return { key, values };
}
