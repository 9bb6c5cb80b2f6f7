// Public API - used by the CLI
export * from './config/index.js';
export * from './errors.js';
export * from './model.js';
export * from './identifiers.js';
export * from './tabular-parser.js';
export * from './generated-parser.js';
export * from './merge.js';
export * from './emitter.js';
export * from './exporter.js';
export * from './backup.js';
export * from './diff-utils.js';
export * from './generator.js';

// Internal API - grammar used by the generated-table parser
export { tokenize, TokenStream, TableSyntaxError } from './table-lexer.js';
export type { Token, TokenKind } from './table-lexer.js';
