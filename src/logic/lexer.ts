/**
 * Tokenizer for the expression language.
 *
 * @packageDocumentation
 */

import { EvaluationError } from '../errors.js';

/**
 * Token kinds produced by the lexer.
 */
export type TokenType = 'number' | 'string' | 'name' | 'operator' | 'eof';

/**
 * A lexical token.
 */
export interface Token {
  readonly type: TokenType;
  /** Operator or name text; decoded text for strings; source text for numbers. */
  readonly value: string;
  /** Zero-based offset of the token in the source. */
  readonly position: number;
}

/**
 * Operators, longest first so that `//` wins over `/`.
 */
const OPERATORS = [
  '==',
  '!=',
  '<=',
  '>=',
  '//',
  '<',
  '>',
  '+',
  '-',
  '*',
  '/',
  '%',
  '~',
  '|',
  '.',
  ',',
  ':',
  '(',
  ')',
  '[',
  ']',
  '{',
  '}',
] as const;

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

function isNameStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isNamePart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Splits expression source into tokens. The list always ends with an `eof` token.
 *
 * @param source - Expression source text.
 * @returns The tokens.
 * @throws EvaluationError on characters that start no token, or unterminated strings.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (/\s/.test(ch)) {
      pos += 1;
      continue;
    }

    if (isDigit(ch)) {
      const start = pos;
      while (pos < source.length && isDigit(source.charAt(pos))) {
        pos += 1;
      }
      if (source.charAt(pos) === '.' && isDigit(source.charAt(pos + 1))) {
        pos += 1;
        while (pos < source.length && isDigit(source.charAt(pos))) {
          pos += 1;
        }
      }
      tokens.push({ type: 'number', value: source.slice(start, pos), position: start });
      continue;
    }

    if (isNameStart(ch)) {
      const start = pos;
      while (pos < source.length && isNamePart(source.charAt(pos))) {
        pos += 1;
      }
      tokens.push({ type: 'name', value: source.slice(start, pos), position: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = pos;
      pos += 1;
      let text = '';
      let closed = false;
      while (pos < source.length) {
        const c = source.charAt(pos);
        pos += 1;
        if (c === ch) {
          closed = true;
          break;
        }
        if (c === '\\' && pos < source.length) {
          const next = source.charAt(pos);
          pos += 1;
          text += ESCAPES[next] ?? next;
        } else {
          text += c;
        }
      }
      if (!closed) {
        throw new EvaluationError(`Unterminated string at position ${String(start)}`, source);
      }
      tokens.push({ type: 'string', value: text, position: start });
      continue;
    }

    const operator = OPERATORS.find((op) => source.startsWith(op, pos));
    if (operator === undefined) {
      throw new EvaluationError(`Unexpected character "${ch}" at position ${String(pos)}`, source);
    }
    tokens.push({ type: 'operator', value: operator, position: pos });
    pos += operator.length;
  }

  tokens.push({ type: 'eof', value: '', position: source.length });
  return tokens;
}
