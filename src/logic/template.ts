/**
 * Splits template text into literal text and `{{ expression }}` placeholders.
 *
 * @packageDocumentation
 */

import { EvaluationError } from '../errors.js';

/**
 * A piece of a template.
 */
export type TemplatePart =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'expression'; readonly source: string };

const OPEN = '{{';
const CLOSE = '}}';

/**
 * Finds the `}}` that closes a placeholder, skipping quoted strings.
 */
function findClose(source: string, from: number): number {
  let quote: string | undefined;
  for (let pos = from; pos < source.length; pos += 1) {
    const ch = source.charAt(pos);
    if (quote !== undefined) {
      if (ch === '\\') {
        pos += 1;
      } else if (ch === quote) {
        quote = undefined;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (source.startsWith(CLOSE, pos)) {
      return pos;
    }
  }
  return -1;
}

/**
 * Splits a template into parts.
 *
 * @param source - The template text.
 * @returns Text and expression parts, in order. Empty text parts are omitted.
 * @throws EvaluationError when a placeholder is never closed.
 */
export function splitTemplate(source: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let pos = 0;
  while (pos < source.length) {
    const open = source.indexOf(OPEN, pos);
    if (open === -1) {
      parts.push({ type: 'text', text: source.slice(pos) });
      break;
    }
    if (open > pos) {
      parts.push({ type: 'text', text: source.slice(pos, open) });
    }
    const close = findClose(source, open + OPEN.length);
    if (close === -1) {
      throw new EvaluationError(
        `Unterminated placeholder at position ${String(open)}`,
        source
      );
    }
    parts.push({ type: 'expression', source: source.slice(open + OPEN.length, close).trim() });
    pos = close + CLOSE.length;
  }
  return parts;
}
