import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { formatPointer, parsePointer } from './parser.js';
import { PointerSyntaxError } from '../errors.js';
import {
  createPointer,
  indexSegment,
  indirectSegment,
  keySegment,
  type PointerSegment,
  type ValuePointer,
} from './types.js';

function expectSyntaxError(text: string, column: number, message: string): void {
  try {
    parsePointer(text);
  } catch (error) {
    expect(error).toBeInstanceOf(PointerSyntaxError);
    if (error instanceof PointerSyntaxError) {
      expect(error.column).toBe(column);
      expect(error.message).toContain(message);
    }
    return;
  }
  throw new Error(`Expected "${text}" to fail parsing`);
}

describe('parsePointer', () => {
  it('should parse a single key', () => {
    expect(parsePointer('level')).toEqual(createPointer([keySegment('level')]));
  });

  it('should parse dotted keys', () => {
    expect(parsePointer('registration.first_name')).toEqual(
      createPointer([keySegment('registration'), keySegment('first_name')])
    );
  });

  it('should parse literal indices', () => {
    expect(parsePointer('items[0][12]')).toEqual(
      createPointer([keySegment('items'), indexSegment(0), indexSegment(12)])
    );
  });

  it('should parse quoted keys', () => {
    expect(parsePointer('answers["first name"][\'x\']')).toEqual(
      createPointer([keySegment('answers'), keySegment('first name'), keySegment('x')])
    );
  });

  it('should parse escapes inside quoted keys', () => {
    expect(parsePointer('a["say \\"hi\\""]')).toEqual(
      createPointer([keySegment('a'), keySegment('say "hi"')])
    );
  });

  it('should parse indirect segments', () => {
    expect(parsePointer('item[n][0]')).toEqual(
      createPointer([
        keySegment('item'),
        indirectSegment(createPointer([keySegment('n')])),
        indexSegment(0),
      ])
    );
  });

  it('should parse nested indirect segments', () => {
    expect(parsePointer('item[a.b[c]]')).toEqual(
      createPointer([
        keySegment('item'),
        indirectSegment(
          createPointer([
            keySegment('a'),
            keySegment('b'),
            indirectSegment(createPointer([keySegment('c')])),
          ])
        ),
      ])
    );
  });

  it('should allow a leading bracket', () => {
    expect(parsePointer('["odd key"].x')).toEqual(
      createPointer([keySegment('odd key'), keySegment('x')])
    );
  });

  it('should ignore surrounding whitespace', () => {
    expect(parsePointer('  level ')).toEqual(createPointer([keySegment('level')]));
  });

  describe('errors', () => {
    it('should reject an empty pointer', () => {
      expectSyntaxError('', 0, 'Empty pointer');
    });

    it('should reject empty segments', () => {
      expectSyntaxError('a..b', 2, 'Empty segment');
      expectSyntaxError('a.', 2, 'Empty segment');
      expectSyntaxError('.a', 0, 'Empty segment');
    });

    it('should reject unbalanced brackets', () => {
      expectSyntaxError('a[0', 1, 'Unbalanced opening bracket');
      expectSyntaxError('a[n', 1, 'Unbalanced opening bracket');
      expectSyntaxError('a]', 1, 'Unbalanced closing bracket');
    });

    it('should reject empty brackets', () => {
      expectSyntaxError('a[]', 2, 'Empty brackets');
    });

    it('should reject invalid characters', () => {
      expectSyntaxError('a-b', 1, 'Unexpected character "-"');
      expectSyntaxError('a[0x]', 3, 'Unexpected character "x"');
      expectSyntaxError('a.1', 2, 'Unexpected character "1"');
    });

    it('should reject unterminated strings', () => {
      expectSyntaxError('a["abc', 2, 'Unterminated string');
    });

    it('should include the source in the message', () => {
      expect(() => parsePointer('a..b')).toThrow('Empty segment at column 2 in "a..b"');
    });
  });
});

describe('formatPointer', () => {
  it('should format keys, indices and indirect segments', () => {
    expect(formatPointer(parsePointer('item[n][0].name'))).toBe('item[n][0].name');
  });

  it('should quote keys that are not identifiers', () => {
    expect(formatPointer(parsePointer("answers['first name']"))).toBe('answers["first name"]');
  });

  it('should keep control characters and backslashes in quoted keys', () => {
    const pointer = createPointer([keySegment('a\nb'), keySegment('c\\d"e'), keySegment('\t')]);
    expect(formatPointer(pointer)).toBe('["a\nb"]["c\\\\d\\"e"]["\t"]');
    expect(parsePointer(formatPointer(pointer))).toEqual(pointer);
  });

  const keyArb = fc.oneof(
    fc.stringMatching(/^[A-Za-z_][A-Za-z0-9_]{0,6}$/),
    fc.string({ maxLength: 6 }),
    fc.fullUnicodeString({ maxLength: 4 })
  );
  const segmentArb: fc.Arbitrary<PointerSegment> = fc.oneof(
    keyArb.map(keySegment),
    fc.nat({ max: 50 }).map(indexSegment),
    fc
      .array(fc.stringMatching(/^[a-z]{1,4}$/), { minLength: 1, maxLength: 3 })
      .map((keys) => indirectSegment(createPointer(keys.map(keySegment))))
  );
  const pointerArb: fc.Arbitrary<ValuePointer> = fc
    .array(segmentArb, { minLength: 1, maxLength: 5 })
    .map(createPointer);

  it('should round-trip through parsePointer', () => {
    fc.assert(
      fc.property(pointerArb, (pointer) => {
        expect(parsePointer(formatPointer(pointer))).toEqual(pointer);
      })
    );
  });
});
