/**
 * Compilation of expressions, templates and pointers with a shared bounded cache.
 *
 * Compiled objects are immutable, so one compiled form may serve any number
 * of interviews. The cache only affects performance: a cache of size 1 gives
 * the same results as a cache of size 10 000.
 *
 * @packageDocumentation
 */

import { EvaluationError, InterviewError, toError } from '../errors.js';
import { parsePointer as parsePointerText } from '../pointer/parser.js';
import type { ValuePointer } from '../pointer/types.js';
import type { Value } from '../utils/json.js';
import { LruCache, type CacheStats } from '../utils/lru-cache.js';
import { evaluateNode, type FilterTable, type Scope } from './evaluator.js';
import { BUILTIN_FILTERS } from './filters.js';
import { parseExpression } from './parser.js';
import { splitTemplate } from './template.js';
import { EvaluationFailure, toText } from './values.js';

/** Default number of compiled entries kept. */
export const DEFAULT_CACHE_SIZE = 1024;

/**
 * A compiled expression.
 */
export interface Expression {
  readonly kind: 'expression';
  readonly source: string;
  /**
   * @throws EvaluationError when the expression performs an undefined operation.
   */
  evaluate(scope: Scope): Value;
}

/**
 * A compiled template.
 */
export interface Template {
  readonly kind: 'template';
  readonly source: string;
  /** True when the template has no placeholders. */
  readonly isStatic: boolean;
  render(scope: Scope): string;
}

interface PointerEntry {
  readonly kind: 'pointer';
  readonly pointer: ValuePointer;
}

type CacheEntry = Expression | Template | PointerEntry;

/**
 * Options for an ExpressionEnvironment.
 */
export interface EnvironmentOptions {
  /** Maximum number of compiled entries to keep. Defaults to DEFAULT_CACHE_SIZE. */
  readonly cacheSize?: number;
  /** Extra filters, merged over the built-in ones. */
  readonly filters?: FilterTable;
}

function runGuarded<T>(source: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof EvaluationFailure) {
      throw new EvaluationError(error.message, source);
    }
    if (error instanceof InterviewError) {
      throw error;
    }
    const cause = toError(error);
    throw new EvaluationError(`Evaluation failed: ${cause.message}`, source, cause);
  }
}

/**
 * Compiles and caches expressions, templates and pointers.
 *
 * @example
 * ```ts
 * const env = new ExpressionEnvironment({ cacheSize: 256 });
 * env.compileExpression('age >= 18').evaluate({ age: 20 }); // true
 * env.compileTemplate('Hello {{ name }}').render({ name: 'Ada' }); // 'Hello Ada'
 * ```
 */
export class ExpressionEnvironment {
  private readonly cache: LruCache<string, CacheEntry>;
  private readonly filters: FilterTable;
  private readonly filterNames: ReadonlySet<string>;

  constructor(options: EnvironmentOptions = {}) {
    this.cache = new LruCache(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    this.filters = { ...BUILTIN_FILTERS, ...options.filters };
    this.filterNames = new Set(Object.keys(this.filters));
  }

  /**
   * Compiles an expression.
   *
   * @throws EvaluationError on syntax errors, unknown filters or unknown tests.
   */
  compileExpression(source: string): Expression {
    const entry = this.cache.getOrCompute(`e:${source}`, () => this.buildExpression(source));
    if (entry.kind !== 'expression') {
      throw new EvaluationError('Cache entry has the wrong kind', source);
    }
    return entry;
  }

  /**
   * Compiles a template.
   *
   * @throws EvaluationError when a placeholder is malformed.
   */
  compileTemplate(source: string): Template {
    const entry = this.cache.getOrCompute(`t:${source}`, () => this.buildTemplate(source));
    if (entry.kind !== 'template') {
      throw new EvaluationError('Cache entry has the wrong kind', source);
    }
    return entry;
  }

  /**
   * Parses a pointer.
   *
   * @throws PointerSyntaxError when the text is not a valid pointer.
   */
  parsePointer(source: string): ValuePointer {
    const entry = this.cache.getOrCompute(`p:${source}`, () => ({
      kind: 'pointer',
      pointer: parsePointerText(source),
    }));
    if (entry.kind !== 'pointer') {
      throw new EvaluationError('Cache entry has the wrong kind', source);
    }
    return entry.pointer;
  }

  /**
   * Returns hit and miss counters for the compilation cache.
   */
  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /** The maximum number of compiled entries kept. */
  get cacheSize(): number {
    return this.cache.capacity;
  }

  private buildExpression(source: string): Expression {
    const node = parseExpression(source, { filters: this.filterNames });
    const filters = this.filters;
    return Object.freeze({
      kind: 'expression' as const,
      source,
      evaluate: (scope: Scope): Value => runGuarded(source, () => evaluateNode(node, scope, filters)),
    });
  }

  private buildTemplate(source: string): Template {
    const parts = splitTemplate(source).map((part) =>
      part.type === 'text' ? part.text : this.compileExpression(part.source)
    );
    return Object.freeze({
      kind: 'template' as const,
      source,
      isStatic: parts.every((part) => typeof part === 'string'),
      render: (scope: Scope): string =>
        parts
          .map((part) => (typeof part === 'string' ? part : toText(part.evaluate(scope))))
          .join(''),
    });
  }
}
