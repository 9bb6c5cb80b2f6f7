/**
 * Merge engine: reconciles the freshly parsed CSV model (primary) with the
 * previously generated table (secondary).
 *
 * Pure and total over well-formed models. An absent secondary model is the
 * empty model, so every primary key is then "added".
 */

import {
  EMPTY_MODEL,
  getValue,
  projectRecord,
  type LanguageId,
  type TranslationModel,
  type TranslationRecord,
} from './model.js';

export interface MergePolicy {
  /** Which side wins when both hold a value. `true` = primary (CSV). */
  preferPrimaryOnTie: boolean;
  /**
   * Take the preferred side unconditionally, even when its value is empty.
   * This can blank out previously filled translations.
   */
  overwriteAll: boolean;
  /** Omit keys that exist only in the secondary model. */
  dropOrphans: boolean;
}

export const DEFAULT_MERGE_POLICY: MergePolicy = {
  preferPrimaryOnTie: true,
  overwriteAll: false,
  dropOrphans: false,
};

export interface MergeCounters {
  added: number;
  updated: number;
  unchanged: number;
  orphanKept: number;
  orphanDropped: number;
}

export type MergeClassification = 'added' | 'updated' | 'unchanged' | 'orphan-kept';

export interface MergeResult extends TranslationModel {
  readonly languages: LanguageId[];
  readonly records: TranslationRecord[];
  counters: MergeCounters;
  /** Classification of every merged key, in output order. */
  classifications: Map<string, MergeClassification>;
  /** Secondary-only keys omitted because of `dropOrphans`, in secondary order. */
  droppedKeys: string[];
}

export function mergeLanguages(primary: readonly LanguageId[], secondary: readonly LanguageId[]): LanguageId[] {
  const merged = [...primary];
  for (const language of secondary) {
    if (!merged.includes(language)) {
      merged.push(language);
    }
  }
  return merged;
}

function resolveValue(primaryValue: string, secondaryValue: string, policy: MergePolicy): string {
  if (policy.overwriteAll) {
    return policy.preferPrimaryOnTie ? primaryValue : secondaryValue;
  }
  if (policy.preferPrimaryOnTie) {
    return primaryValue !== '' ? primaryValue : secondaryValue;
  }
  return secondaryValue !== '' ? secondaryValue : primaryValue;
}

function indexByKey(records: readonly TranslationRecord[]): Map<string, TranslationRecord> {
  const index = new Map<string, TranslationRecord>();
  for (const record of records) {
    index.set(record.key, record);
  }
  return index;
}

/**
 * Output key order: hint entries that name primary keys, then primary keys the
 * hint left out, then secondary-only keys. Every key appears once.
 */
function orderKeys(
  primary: readonly TranslationRecord[],
  secondary: readonly TranslationRecord[],
  primaryIndex: Map<string, TranslationRecord>,
  orderHint: readonly string[] | undefined
): string[] {
  const placed = new Set<string>();
  const ordered: string[] = [];
  const place = (key: string) => {
    if (!placed.has(key)) {
      placed.add(key);
      ordered.push(key);
    }
  };

  for (const key of orderHint ?? []) {
    if (primaryIndex.has(key)) {
      place(key);
    }
  }
  primary.forEach((record) => place(record.key));
  secondary.forEach((record) => place(record.key));

  return ordered;
}

export function mergeModels(
  primary: TranslationModel,
  secondary: TranslationModel | undefined,
  policy: Partial<MergePolicy> = {},
  orderHint?: readonly string[]
): MergeResult {
  const effectivePolicy: MergePolicy = { ...DEFAULT_MERGE_POLICY, ...policy };
  const existing = secondary ?? EMPTY_MODEL;

  const languages = mergeLanguages(primary.languages, existing.languages);
  const primaryIndex = indexByKey(primary.records);
  const secondaryIndex = indexByKey(existing.records);

  const counters: MergeCounters = { added: 0, updated: 0, unchanged: 0, orphanKept: 0, orphanDropped: 0 };
  const classifications = new Map<string, MergeClassification>();
  const droppedKeys: string[] = [];
  const records: TranslationRecord[] = [];

  for (const key of orderKeys(primary.records, existing.records, primaryIndex, orderHint)) {
    const fromPrimary = primaryIndex.get(key);
    const fromSecondary = secondaryIndex.get(key);

    if (fromPrimary && !fromSecondary) {
      records.push(projectRecord(key, fromPrimary, languages));
      classifications.set(key, 'added');
      counters.added++;
      continue;
    }

    if (!fromPrimary) {
      if (effectivePolicy.dropOrphans) {
        droppedKeys.push(key);
        counters.orphanDropped++;
        continue;
      }
      records.push(projectRecord(key, fromSecondary, languages));
      classifications.set(key, 'orphan-kept');
      counters.orphanKept++;
      continue;
    }

    const values = Object.fromEntries(
      languages.map((language) => [
        language,
        resolveValue(getValue(fromPrimary, language), getValue(fromSecondary, language), effectivePolicy),
      ])
    );
    const changed = languages.some((language) => values[language] !== getValue(fromSecondary, language));

    records.push({ key, values });
    classifications.set(key, changed ? 'updated' : 'unchanged');
    if (changed) {
      counters.updated++;
    } else {
      counters.unchanged++;
    }
  }

  return { languages, records, counters, classifications, droppedKeys };
}
