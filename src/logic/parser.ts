/**
 * Recursive-descent parser for the expression language.
 *
 * Precedence, lowest first: conditional, `or`, `and`, `not`, comparisons,
 * `+ -`, `~`, `* / // %`, unary `- +`, then postfix access, filters and tests.
 *
 * @packageDocumentation
 */

import { EvaluationError } from '../errors.js';
import type { CompareOperator, ExpressionNode } from './ast.js';
import { tokenize, type Token } from './lexer.js';

const KEYWORDS: ReadonlySet<string> = new Set([
  'and',
  'or',
  'not',
  'in',
  'is',
  'if',
  'else',
  'true',
  'false',
  'True',
  'False',
  'none',
  'None',
  'null',
]);

const COMPARE_OPERATORS: readonly CompareOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function asCompareOperator(value: string): CompareOperator | undefined {
  return COMPARE_OPERATORS.find((op) => op === value);
}

/**
 * Names accepted after `is`.
 */
export const TEST_NAMES: ReadonlySet<string> = new Set([
  'defined',
  'undefined',
  'none',
  'number',
  'string',
  'boolean',
  'list',
  'mapping',
  'true',
  'false',
]);

/**
 * Options for parsing.
 */
export interface ParseOptions {
  /** Filter names that may appear after `|`. */
  readonly filters: ReadonlySet<string>;
}

class ExpressionParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly options: ParseOptions
  ) {
    this.tokens = tokenize(source);
  }

  parse(): ExpressionNode {
    const node = this.parseConditional();
    const token = this.peek();
    if (token.type !== 'eof') {
      throw this.unexpected(token);
    }
    return node;
  }

  private parseConditional(): ExpressionNode {
    const consequent = this.parseOr();
    if (!this.matchKeyword('if')) {
      return consequent;
    }
    const test = this.parseOr();
    const alternate = this.matchKeyword('else') ? this.parseConditional() : undefined;
    return { type: 'conditional', test, consequent, alternate };
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchKeyword('or')) {
      left = { type: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchKeyword('and')) {
      left = { type: 'logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.matchKeyword('not')) {
      return { type: 'unary', operator: 'not', operand: this.parseNot() };
    }
    return this.parseCompare();
  }

  private parseCompare(): ExpressionNode {
    let left = this.parseAdditive();
    for (;;) {
      const token = this.peek();
      let operator = token.type === 'operator' ? asCompareOperator(token.value) : undefined;
      if (operator !== undefined) {
        this.advance();
      } else if (this.isKeyword(token, 'in')) {
        this.advance();
        operator = 'in';
      } else if (this.isKeyword(token, 'not') && this.isKeyword(this.peek(1), 'in')) {
        this.advance();
        this.advance();
        operator = 'not in';
      } else {
        return left;
      }
      left = { type: 'compare', operator, left, right: this.parseAdditive() };
    }
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseConcat();
    for (;;) {
      const operator = this.matchOperator('+', '-');
      if (operator === undefined) {
        return left;
      }
      left = { type: 'binary', operator, left, right: this.parseConcat() };
    }
  }

  private parseConcat(): ExpressionNode {
    let left = this.parseMultiplicative();
    while (this.matchOperator('~') !== undefined) {
      left = { type: 'binary', operator: '~', left, right: this.parseMultiplicative() };
    }
    return left;
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const operator = this.matchOperator('*', '/', '//', '%');
      if (operator === undefined) {
        return left;
      }
      left = { type: 'binary', operator, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): ExpressionNode {
    const operator = this.matchOperator('-', '+');
    if (operator === '-' || operator === '+') {
      return { type: 'unary', operator, operand: this.parseUnary() };
    }
    return this.parsePostfix(this.parsePrimary());
  }

  private parsePostfix(node: ExpressionNode): ExpressionNode {
    let current = node;
    for (;;) {
      if (this.matchOperator('.') !== undefined) {
        current = { type: 'attribute', object: current, name: this.expectName() };
      } else if (this.matchOperator('[') !== undefined) {
        const index = this.parseConditional();
        this.expectOperator(']');
        current = { type: 'subscript', object: current, index };
      } else if (this.matchOperator('|') !== undefined) {
        current = this.parseFilter(current);
      } else if (this.matchKeyword('is')) {
        const negated = this.matchKeyword('not');
        const token = this.advance();
        if (token.type !== 'name' || !TEST_NAMES.has(token.value)) {
          throw this.error(`Unknown test "${token.value}"`, token);
        }
        current = { type: 'test', operand: current, test: token.value, negated };
      } else {
        return current;
      }
    }
  }

  private parseFilter(operand: ExpressionNode): ExpressionNode {
    const token = this.peek();
    const name = this.expectName();
    if (!this.options.filters.has(name)) {
      throw this.error(`Unknown filter "${name}"`, token);
    }
    const args: ExpressionNode[] = [];
    if (this.matchOperator('(') !== undefined) {
      if (this.matchOperator(')') === undefined) {
        do {
          args.push(this.parseConditional());
        } while (this.matchOperator(',') !== undefined);
        this.expectOperator(')');
      }
    }
    return { type: 'filter', operand, name, args };
  }

  private parsePrimary(): ExpressionNode {
    const token = this.advance();
    switch (token.type) {
      case 'number':
        return { type: 'literal', value: Number(token.value) };
      case 'string':
        return { type: 'literal', value: token.value };
      case 'name':
        return this.parseNameToken(token);
      case 'operator':
        if (token.value === '(') {
          const inner = this.parseConditional();
          this.expectOperator(')');
          return inner;
        }
        if (token.value === '[') {
          return { type: 'list', items: this.parseSequence(']') };
        }
        if (token.value === '{') {
          return this.parseObject();
        }
        throw this.unexpected(token);
      case 'eof':
        throw this.unexpected(token);
    }
  }

  private parseNameToken(token: Token): ExpressionNode {
    switch (token.value) {
      case 'true':
      case 'True':
        return { type: 'literal', value: true };
      case 'false':
      case 'False':
        return { type: 'literal', value: false };
      case 'none':
      case 'None':
      case 'null':
        return { type: 'literal', value: null };
      default:
        if (KEYWORDS.has(token.value)) {
          throw this.unexpected(token);
        }
        return { type: 'name', name: token.value };
    }
  }

  private parseSequence(close: string): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    while (this.matchOperator(close) === undefined) {
      items.push(this.parseConditional());
      if (this.matchOperator(',') === undefined) {
        this.expectOperator(close);
        break;
      }
    }
    return items;
  }

  private parseObject(): ExpressionNode {
    const entries: { key: ExpressionNode; value: ExpressionNode }[] = [];
    while (this.matchOperator('}') === undefined) {
      const key = this.parseConditional();
      this.expectOperator(':');
      entries.push({ key, value: this.parseConditional() });
      if (this.matchOperator(',') === undefined) {
        this.expectOperator('}');
        break;
      }
    }
    return { type: 'object', entries };
  }

  private peek(offset = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const token = this.tokens[this.index + offset] ?? last;
    if (token === undefined) {
      throw new EvaluationError('Empty token stream', this.source);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index += 1;
    }
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === 'name' && token.value === keyword;
  }

  private matchKeyword(keyword: string): boolean {
    if (this.isKeyword(this.peek(), keyword)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchOperator<T extends string>(...operators: T[]): T | undefined {
    const token = this.peek();
    if (token.type !== 'operator') {
      return undefined;
    }
    const found = operators.find((op) => op === token.value);
    if (found !== undefined) {
      this.advance();
    }
    return found;
  }

  private expectOperator(operator: string): void {
    const token = this.peek();
    if (token.type !== 'operator' || token.value !== operator) {
      throw this.error(`Expected "${operator}" but found ${describeToken(token)}`, token);
    }
    this.advance();
  }

  private expectName(): string {
    const token = this.advance();
    if (token.type !== 'name' || KEYWORDS.has(token.value)) {
      throw this.unexpected(token);
    }
    return token.value;
  }

  private unexpected(token: Token): EvaluationError {
    return this.error(`Unexpected ${describeToken(token)}`, token);
  }

  private error(message: string, token: Token): EvaluationError {
    return new EvaluationError(`${message} at position ${String(token.position)}`, this.source);
  }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of expression';
    case 'string':
      return `string ${JSON.stringify(token.value)}`;
    default:
      return `"${token.value}"`;
  }
}

/**
 * Parses expression source into a syntax tree.
 *
 * @param source - The expression text.
 * @param options - Parse options, including the known filter names.
 * @returns The syntax tree.
 * @throws EvaluationError on syntax errors, unknown filters or unknown tests.
 */
export function parseExpression(source: string, options: ParseOptions): ExpressionNode {
  return new ExpressionParser(source, options).parse();
}
