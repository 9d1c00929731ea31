import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ExpressionEnvironment } from '../logic/environment.js';
import { ALWAYS } from '../logic/condition.js';
import { isOptionalField, renderFieldSchema, validateFieldValue } from './field.js';
import { isCalendarDate } from './date.js';
import type {
  DateField,
  NumberField,
  SelectField,
  SelectOption,
  TextField,
  ValidatorResult,
} from './types.js';
import type { JsonObject, Value } from '../utils/json.js';

const env = new ExpressionEnvironment();

function text(overrides: Partial<TextField> = {}): TextField {
  return { type: 'text', optional: false, min: 1, max: 300, ...overrides };
}

function check(
  field: TextField | NumberField | DateField | SelectField,
  value: Value,
  scope: JsonObject = {}
): ValidatorResult {
  return validateFieldValue(field, value, scope);
}

describe('text fields', () => {
  it('should render a schema with a title and length bounds', () => {
    const field = text({ label: env.compileTemplate('Name of {{ who }}') });
    expect(renderFieldSchema(field, { who: 'guest' })).toEqual({
      type: 'string',
      'x-type': 'text',
      title: 'Name of guest',
      minLength: 1,
      maxLength: 300,
    });
  });

  it('should render optional, pattern, format and default', () => {
    const field = text({
      optional: true,
      min: 2,
      max: 10,
      regex: '^[a-z@.]+$',
      format: 'email',
      default: { type: 'expression', expression: env.compileExpression('context.email') },
    });
    expect(renderFieldSchema(field, { context: { email: 'a@b.io' } })).toEqual({
      type: ['string', 'null'],
      'x-type': 'text',
      minLength: 2,
      maxLength: 10,
      pattern: '^[a-z@.]+$',
      format: 'email',
      default: 'a@b.io',
    });
  });

  it('should trim values and enforce presence', () => {
    expect(check(text(), '  Ada  ')).toEqual({ valid: true, value: 'Ada' });
    expect(check(text(), '   ')).toEqual({ valid: false, message: 'This field is required' });
    expect(check(text({ optional: true }), undefined)).toEqual({ valid: true, value: null });
    expect(check(text(), 42)).toEqual({ valid: false, message: 'Must be text' });
  });

  it('should enforce length, pattern and email format', () => {
    expect(check(text({ min: 2 }), 'a')).toEqual({
      valid: false,
      message: 'Must be at least 2 characters',
    });
    expect(check(text({ max: 3 }), 'abcd')).toEqual({
      valid: false,
      message: 'Must be at most 3 characters',
    });
    expect(check(text({ regex: '^[0-9]+$' }), '12a')).toEqual({
      valid: false,
      message: 'Does not match the required pattern',
    });
    expect(check(text({ format: 'email' }), 'not-an-email')).toEqual({
      valid: false,
      message: 'Must be a valid email address',
    });
    expect(check(text({ format: 'email' }), 'ada@example.com')).toEqual({
      valid: true,
      value: 'ada@example.com',
    });
  });
});

describe('number fields', () => {
  const age: NumberField = { type: 'number', optional: false, integer: true, min: 0, max: 120 };

  it('should render an integer schema with bounds', () => {
    expect(renderFieldSchema(age, {})).toEqual({
      type: 'integer',
      'x-type': 'number',
      minimum: 0,
      maximum: 120,
    });
  });

  it('should validate type, integrality and bounds', () => {
    expect(check(age, 10)).toEqual({ valid: true, value: 10 });
    expect(check(age, 10.5)).toEqual({ valid: false, message: 'Must be a whole number' });
    expect(check(age, -1)).toEqual({ valid: false, message: 'Must be at least 0' });
    expect(check(age, 121)).toEqual({ valid: false, message: 'Must be at most 120' });
    expect(check(age, '10')).toEqual({ valid: false, message: 'Must be a number' });
    expect(check(age, undefined)).toEqual({ valid: false, message: 'This field is required' });
  });
});

describe('date fields', () => {
  const start: DateField = { type: 'date', optional: true, min: '2024-01-01', max: '2024-12-31' };

  it('should render a date schema', () => {
    expect(renderFieldSchema(start, {})).toEqual({
      type: ['string', 'null'],
      'x-type': 'date',
      format: 'date',
      'x-min': '2024-01-01',
      'x-max': '2024-12-31',
    });
  });

  it('should check format, calendar and bounds', () => {
    expect(check(start, '2024-02-29')).toEqual({ valid: true, value: '2024-02-29' });
    expect(check(start, '2024/02/01')).toEqual({
      valid: false,
      message: 'Must be a date in YYYY-MM-DD format',
    });
    expect(check(start, '2024-02-30')).toEqual({
      valid: false,
      message: 'Must be a valid calendar date',
    });
    expect(check(start, '2023-12-31')).toEqual({
      valid: false,
      message: 'Must be on or after 2024-01-01',
    });
    expect(check(start, '2025-01-01')).toEqual({
      valid: false,
      message: 'Must be on or before 2024-12-31',
    });
    expect(check(start, null)).toEqual({ valid: true, value: null });
  });

  it('should recognize real calendar dates', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
  });
});

describe('select fields', () => {
  const options: SelectOption[] = [
    { label: env.compileTemplate('Basic'), value: 'basic', default: false, when: ALWAYS },
    {
      label: env.compileTemplate('Sponsor'),
      value: 'sponsor',
      default: false,
      defaultExpr: env.compileExpression('vip'),
      when: ALWAYS,
    },
    {
      label: env.compileTemplate('Staff'),
      value: 'staff',
      default: false,
      when: { type: 'expression', expression: env.compileExpression('staff') },
    },
  ];
  const single: SelectField = { type: 'select', options, min: 1, max: 1, component: 'dropdown' };
  const multi: SelectField = { type: 'select', options, min: 0, max: 3, component: 'checkbox' };

  it('should render a single choice with visible options and a default', () => {
    expect(renderFieldSchema(single, { vip: true })).toEqual({
      type: 'string',
      oneOf: [
        { const: '0', title: 'Basic' },
        { const: '1', title: 'Sponsor' },
      ],
      default: '1',
      'x-component': 'dropdown',
    });
    expect(isOptionalField(single)).toBe(false);
  });

  it('should add a null branch to an optional single choice', () => {
    const optional: SelectField = { ...single, min: 0, autocomplete: 'off' };
    expect(renderFieldSchema(optional, {})).toEqual({
      type: ['string', 'null'],
      oneOf: [
        { const: '0', title: 'Basic' },
        { const: '1', title: 'Sponsor' },
        { type: 'null' },
      ],
      'x-component': 'dropdown',
      'x-autoComplete': 'off',
    });
  });

  it('should render a multiple choice as an array', () => {
    expect(renderFieldSchema(multi, { staff: true })).toEqual({
      type: ['array', 'null'],
      items: {
        type: 'string',
        oneOf: [
          { const: '0', title: 'Basic' },
          { const: '1', title: 'Sponsor' },
          { const: '2', title: 'Staff' },
        ],
      },
      uniqueItems: true,
      minItems: 0,
      maxItems: 3,
      'x-component': 'checkbox',
    });
  });

  it('should map chosen ids to option values', () => {
    expect(check(single, '1')).toEqual({ valid: true, value: 'sponsor' });
    expect(check(multi, ['0', '2'], { staff: true })).toEqual({
      valid: true,
      value: ['basic', 'staff'],
    });
    expect(check(multi, null)).toEqual({ valid: true, value: [] });
  });

  it('should reject hidden or unknown options and wrong counts', () => {
    expect(check(single, '2')).toEqual({ valid: false, message: 'Invalid choice' });
    expect(check(single, 5)).toEqual({ valid: false, message: 'Invalid choice' });
    expect(check(single, undefined)).toEqual({ valid: false, message: 'Choose at least 1' });
    expect(check(single, ['0', '1'])).toEqual({ valid: false, message: 'Choose at most 1' });
  });

  it('should accept exactly one choice when min and max are 1', () => {
    fc.assert(
      fc.property(fc.subarray(['0', '1']), (ids) => {
        expect(check(single, ids).valid).toBe(ids.length === 1);
      })
    );
  });
});
