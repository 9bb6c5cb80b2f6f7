/**
 * Minimal C++ lexer for generated translation tables.
 *
 * Only what the table grammar needs is recognized: identifiers, numbers,
 * punctuation and string/char literals. Whitespace, comments and
 * preprocessor lines are skipped.
 */

export type TokenKind = 'identifier' | 'number' | 'string' | 'char' | 'punct';

export interface Token {
  kind: TokenKind;
  /** Decoded text for string literals, raw text otherwise. */
  value: string;
  offset: number;
}

export class TableSyntaxError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'TableSyntaxError';
  }
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const NUMBER_PART = /[A-Za-z0-9_.']/;
const STRING_PREFIXES = ['u8', 'u', 'U', 'L'];

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '?': '?',
};

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  let lineStart = true;

  while (index < source.length) {
    const char = source[index];

    if (char === '\n') {
      lineStart = true;
      index++;
      continue;
    }
    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (char === '#' && lineStart) {
      index = skipPreprocessorLine(source, index);
      continue;
    }
    lineStart = false;

    if (char === '/' && source[index + 1] === '/') {
      const end = source.indexOf('\n', index);
      index = end === -1 ? source.length : end;
      continue;
    }
    if (char === '/' && source[index + 1] === '*') {
      const end = source.indexOf('*/', index + 2);
      if (end === -1) {
        throw new TableSyntaxError('Unterminated block comment', index);
      }
      index = end + 2;
      continue;
    }

    if (char === '"') {
      const literal = readQuoted(source, index, '"');
      tokens.push({ kind: 'string', value: literal.value, offset: index });
      index = literal.end;
      continue;
    }
    if (char === "'") {
      const literal = readQuoted(source, index, "'");
      tokens.push({ kind: 'char', value: literal.value, offset: index });
      index = literal.end;
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      let end = index + 1;
      while (end < source.length && IDENTIFIER_PART.test(source[end])) {
        end++;
      }
      const word = source.slice(index, end);
      if (STRING_PREFIXES.includes(word) && source[end] === '"') {
        const literal = readQuoted(source, end, '"');
        tokens.push({ kind: 'string', value: literal.value, offset: index });
        index = literal.end;
        continue;
      }
      tokens.push({ kind: 'identifier', value: word, offset: index });
      index = end;
      continue;
    }

    if (DIGIT.test(char)) {
      let end = index + 1;
      while (end < source.length && NUMBER_PART.test(source[end])) {
        end++;
      }
      tokens.push({ kind: 'number', value: source.slice(index, end), offset: index });
      index = end;
      continue;
    }

    tokens.push({ kind: 'punct', value: char, offset: index });
    index++;
  }

  return tokens;
}

function skipPreprocessorLine(source: string, start: number): number {
  let index = start;
  while (index < source.length) {
    const char = source[index];
    if (char === '\\' && source[index + 1] === '\n') {
      index += 2;
      continue;
    }
    if (char === '\n') {
      return index;
    }
    index++;
  }
  return index;
}

type Escape = { kind: 'text'; text: string; end: number } | { kind: 'byte'; byte: number; end: number };

/**
 * Octal and `\x` escapes are bytes of a narrow literal; runs of them are
 * decoded together as UTF-8 so multi-byte sequences survive.
 */
function readQuoted(source: string, start: number, quote: '"' | "'"): { value: string; end: number } {
  let value = '';
  let bytes: number[] = [];
  let index = start + 1;

  const flushBytes = () => {
    if (bytes.length) {
      value += Buffer.from(bytes).toString('utf8');
      bytes = [];
    }
  };

  while (index < source.length) {
    const char = source[index];
    if (char === quote) {
      flushBytes();
      return { value, end: index + 1 };
    }
    if (char === '\n') {
      break;
    }
    if (char !== '\\') {
      flushBytes();
      value += char;
      index++;
      continue;
    }

    const escape = decodeEscape(source, index);
    if (escape.kind === 'byte') {
      bytes.push(escape.byte);
    } else {
      flushBytes();
      value += escape.text;
    }
    index = escape.end;
  }

  throw new TableSyntaxError('Unterminated literal', start);
}

function decodeEscape(source: string, backslash: number): Escape {
  const next = source[backslash + 1];
  if (next === undefined) {
    throw new TableSyntaxError('Dangling escape', backslash);
  }

  if (Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, next)) {
    return { kind: 'text', text: SIMPLE_ESCAPES[next], end: backslash + 2 };
  }

  if (/[0-7]/.test(next)) {
    const digits = /^[0-7]{1,3}/.exec(source.slice(backslash + 1, backslash + 4));
    const octal = digits ? digits[0] : next;
    return { kind: 'byte', byte: parseInt(octal, 8) & 0xff, end: backslash + 1 + octal.length };
  }

  if (next === 'x') {
    const digits = /^[0-9A-Fa-f]+/.exec(source.slice(backslash + 2));
    if (digits) {
      return { kind: 'byte', byte: parseInt(digits[0].slice(-2), 16), end: backslash + 2 + digits[0].length };
    }
  }

  if (next === 'u' || next === 'U') {
    const length = next === 'u' ? 4 : 8;
    const digits = source.slice(backslash + 2, backslash + 2 + length);
    if (digits.length === length && /^[0-9A-Fa-f]+$/.test(digits)) {
      return { kind: 'text', text: String.fromCodePoint(parseInt(digits, 16)), end: backslash + 2 + length };
    }
  }

  // Unknown escape: keep the character itself.
  return { kind: 'text', text: next, end: backslash + 2 };
}
