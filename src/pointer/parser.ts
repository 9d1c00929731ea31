/**
 * Pointer parser and formatter.
 *
 * Grammar:
 * ```
 * pointer  := first ( '.' ident | bracket )*
 * first    := ident | bracket
 * bracket  := '[' ( digits | string | pointer ) ']'
 * ```
 *
 * @packageDocumentation
 */

import { PointerSyntaxError } from '../errors.js';
import {
  IDENTIFIER_PATTERN,
  createPointer,
  indexSegment,
  indirectSegment,
  keySegment,
  type PointerSegment,
  type ValuePointer,
} from './types.js';

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Recursive-descent parser over a single source string.
 */
class PointerParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): ValuePointer {
    if (this.source.length === 0) {
      throw this.error('Empty pointer');
    }
    const pointer = this.parsePointer();
    if (this.pos < this.source.length) {
      const ch = this.peek();
      throw this.error(ch === ']' ? 'Unbalanced closing bracket' : `Unexpected character "${String(ch)}"`);
    }
    return pointer;
  }

  private parsePointer(): ValuePointer {
    const segments: PointerSegment[] = [];

    if (this.peek() === '[') {
      segments.push(this.parseBracket());
    } else if (isIdentStart(this.peek())) {
      segments.push(keySegment(this.parseIdentifier()));
    } else if (this.peek() === '.') {
      throw this.error('Empty segment');
    } else {
      throw this.error(
        this.peek() === undefined ? 'Unexpected end of pointer' : `Unexpected character "${String(this.peek())}"`
      );
    }

    for (;;) {
      const ch = this.peek();
      if (ch === '.') {
        this.pos += 1;
        const next = this.peek();
        if (next === undefined || next === '.' || next === '[' || next === ']') {
          throw this.error('Empty segment');
        }
        if (!isIdentStart(next)) {
          throw this.error(`Unexpected character "${next}"`);
        }
        segments.push(keySegment(this.parseIdentifier()));
      } else if (ch === '[') {
        segments.push(this.parseBracket());
      } else {
        return createPointer(segments);
      }
    }
  }

  private parseBracket(): PointerSegment {
    const open = this.pos;
    this.pos += 1;
    const ch = this.peek();
    let segment: PointerSegment;

    if (ch === undefined) {
      throw this.errorAt('Unbalanced opening bracket', open);
    } else if (ch === ']') {
      throw this.error('Empty brackets');
    } else if (isDigit(ch)) {
      segment = indexSegment(this.parseIndex());
    } else if (ch === '"' || ch === "'") {
      segment = keySegment(this.parseString(ch));
    } else {
      segment = indirectSegment(this.parsePointer());
    }

    if (this.peek() !== ']') {
      if (this.peek() === undefined) {
        throw this.errorAt('Unbalanced opening bracket', open);
      }
      throw this.error(`Expected "]" but found "${String(this.peek())}"`);
    }
    this.pos += 1;
    return segment;
  }

  private parseIdentifier(): string {
    const start = this.pos;
    while (isIdentPart(this.peek())) {
      this.pos += 1;
    }
    return this.source.slice(start, this.pos);
  }

  private parseIndex(): number {
    const start = this.pos;
    while (isDigit(this.peek())) {
      this.pos += 1;
    }
    if (isIdentStart(this.peek())) {
      throw this.error(`Unexpected character "${String(this.peek())}"`);
    }
    return Number.parseInt(this.source.slice(start, this.pos), 10);
  }

  private parseString(quote: string): string {
    const open = this.pos;
    this.pos += 1;
    let result = '';
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        throw this.errorAt('Unterminated string', open);
      }
      this.pos += 1;
      if (ch === quote) {
        return result;
      }
      if (ch === '\\') {
        const escaped = this.peek();
        if (escaped === undefined) {
          throw this.errorAt('Unterminated string', open);
        }
        this.pos += 1;
        result += escaped;
      } else {
        result += ch;
      }
    }
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private error(message: string): PointerSyntaxError {
    return this.errorAt(message, this.pos);
  }

  private errorAt(message: string, column: number): PointerSyntaxError {
    return new PointerSyntaxError(message, this.source, column);
  }
}

/**
 * Parses a pointer expression.
 *
 * @param text - The pointer text, e.g. `item[n][0]`. Surrounding whitespace is ignored.
 * @returns The parsed pointer.
 * @throws PointerSyntaxError on malformed input.
 *
 * @example
 * ```typescript
 * const pointer = parsePointer('registration.options[0]');
 * ```
 */
export function parsePointer(text: string): ValuePointer {
  return new PointerParser(text.trim()).parse();
}

function formatKey(key: string, first: boolean): string {
  if (IDENTIFIER_PATTERN.test(key)) {
    return first ? key : `.${key}`;
  }
  // The parser reads a backslash as "take the next character literally".
  return `["${key.replace(/[\\"]/g, (ch) => `\\${ch}`)}"]`;
}

/**
 * Formats a pointer in canonical form.
 *
 * `parsePointer(formatPointer(p))` is structurally equal to `p`.
 */
export function formatPointer(pointer: ValuePointer): string {
  return pointer.segments
    .map((segment, i) => {
      switch (segment.kind) {
        case 'key':
          return formatKey(segment.key, i === 0);
        case 'index':
          return `[${String(segment.index)}]`;
        case 'indirect':
          return `[${formatPointer(segment.pointer)}]`;
      }
    })
    .join('');
}
