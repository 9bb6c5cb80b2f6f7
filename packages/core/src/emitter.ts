import { getValue, type LanguageId, type TranslationRecord } from './model.js';

export const GENERATED_BANNER = '// Auto-generated from CSV - DO NOT EDIT MANUALLY';
export const FALLBACK_BANNER = '// Auto-generated fallback table - optional';

export interface TableEmitOptions {
  /** Include name of the generated header. */
  headerFile?: string;
  /** Include name of the runtime i18n header. */
  runtimeHeader?: string;
}

const DEFAULT_EMIT_OPTIONS: Required<TableEmitOptions> = {
  headerFile: 'i18n_gen_export.h',
  runtimeHeader: 'i18n.h',
};

/**
 * Escape a value for a C++ string literal (UTF-8 passes through).
 */
export function escapeCppString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, '\\t')
    .replace(/\n/g, '\\n');
}

function renderRow(record: TranslationRecord, languages: readonly LanguageId[]): string {
  const fields = [record.key, ...languages.map((language) => getValue(record, language))];
  return `    { ${fields.map((field) => `"${escapeCppString(field)}"`).join(', ')} },`;
}

function renderStruct(languages: readonly LanguageId[]): string[] {
  return ['struct Entry {', '    const char* key;', ...languages.map((language) => `    const char* ${language};`), '};'];
}

export function emitHeader(languages: readonly LanguageId[]): string {
  const lines = [
    GENERATED_BANNER,
    '#pragma once',
    '#include <stddef.h>',
    '',
    ...renderStruct(languages),
    '',
    'extern "C" {',
    '    extern const Entry* g_i18n_gen_table;',
    '    extern const size_t g_i18n_gen_count;',
    '}',
  ];
  return `${lines.join('\n')}\n`;
}

export function emitTable(
  languages: readonly LanguageId[],
  records: readonly TranslationRecord[],
  options: TableEmitOptions = {}
): string {
  const { headerFile, runtimeHeader } = { ...DEFAULT_EMIT_OPTIONS, ...options };
  const lines = [
    GENERATED_BANNER,
    `#include "${runtimeHeader}"`,
    `#include "${headerFile}"`,
    '',
    'const Entry D[] = {',
    ...records.map((record) => renderRow(record, languages)),
    '};',
    '',
    'extern "C" {',
    '    const Entry* g_i18n_gen_table = D;',
    '    const size_t g_i18n_gen_count = sizeof(D) / sizeof(D[0]);',
    '}',
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Self-contained variant with its own `struct Entry`, for builds that do not
 * include the generated header.
 */
export function emitFallback(
  languages: readonly LanguageId[],
  records: readonly TranslationRecord[],
  options: Pick<TableEmitOptions, 'runtimeHeader'> = {}
): string {
  const runtimeHeader = options.runtimeHeader ?? DEFAULT_EMIT_OPTIONS.runtimeHeader;
  const lines = [
    FALLBACK_BANNER,
    `#include "${runtimeHeader}"`,
    '// This file can be used instead of the generated table if desired.',
    '',
    ...renderStruct(languages),
    '',
    'static const Entry D_builtin[] = {',
    ...records.map((record) => renderRow(record, languages)),
    '};',
    '',
    '// Implement your own tr() to search D_builtin if you want a built-in table.',
  ];
  return `${lines.join('\n')}\n`;
}
