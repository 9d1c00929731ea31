import { describe, it, expect } from 'vitest';
import { splitTemplate } from './template.js';
import { ExpressionEnvironment } from './environment.js';
import { EvaluationError } from '../errors.js';

describe('splitTemplate', () => {
  it('should split text and placeholders', () => {
    expect(splitTemplate('Hello {{ name }}!')).toEqual([
      { type: 'text', text: 'Hello ' },
      { type: 'expression', source: 'name' },
      { type: 'text', text: '!' },
    ]);
  });

  it('should ignore closing braces inside quoted strings', () => {
    expect(splitTemplate('{{ "}}" }}')).toEqual([{ type: 'expression', source: '"}}"' }]);
  });

  it('should return no parts for an empty template', () => {
    expect(splitTemplate('')).toEqual([]);
  });

  it('should reject an unterminated placeholder', () => {
    expect(() => splitTemplate('a {{ b')).toThrow('Unterminated placeholder at position 2');
  });
});

describe('template rendering', () => {
  const env = new ExpressionEnvironment();

  it('should substitute values', () => {
    expect(env.compileTemplate('Hello {{ name }}!').render({ name: 'Ada' })).toBe('Hello Ada!');
  });

  it('should render absent and null values as empty text', () => {
    expect(env.compileTemplate('[{{ a }}|{{ b }}]').render({ b: null })).toBe('[|]');
  });

  it('should render booleans, numbers and structures', () => {
    const template = env.compileTemplate('{{ flag }} {{ n }} {{ items }} {{ obj }}');
    expect(template.render({ flag: false, n: 2.5, items: [1, 'x'], obj: { a: 1 } })).toBe(
      'false 2.5 [1,"x"] {"a":1}'
    );
  });

  it('should evaluate full expressions inside placeholders', () => {
    const template = env.compileTemplate("{{ first ~ ' ' ~ last | upper }}");
    expect(template.render({ first: 'ada', last: 'lovelace' })).toBe('ada LOVELACE');
  });

  it('should mark templates without placeholders as static', () => {
    expect(env.compileTemplate('plain text').isStatic).toBe(true);
    expect(env.compileTemplate('{{ x }}').isStatic).toBe(false);
  });

  it('should report placeholder errors with the expression source', () => {
    const template = env.compileTemplate('Total: {{ 1 / count }}');
    expect(() => template.render({ count: 0 })).toThrow('Division by zero in "1 / count"');
    expect(() => env.compileTemplate('{{ x | nope }}')).toThrow(EvaluationError);
  });
});
