import { describe, it, expect } from 'vitest';
import { coerceCell, parseDateText } from '../../../src/domain/services/TypeCoercion.js';
import { EMPTY_CELL, booleanCell, dateCell, numberCell, textCell } from '../../../src/domain/model/CellValue.js';

describe('coerceCell', () => {
  describe('Number', () => {
    it('should parse plain and grouped numbers', () => {
      expect(coerceCell(textCell(' 42 '), 'Number')).toEqual({ ok: true, value: 42 });
      expect(coerceCell(textCell('1,234.5'), 'Number')).toEqual({ ok: true, value: 1234.5 });
      expect(coerceCell(textCell('-3e2'), 'Number')).toEqual({ ok: true, value: -300 });
    });

    it('should keep number cells as they are', () => {
      expect(coerceCell(numberCell(7.25), 'Number')).toEqual({ ok: true, value: 7.25 });
    });

    it('should reject text that is not entirely a number', () => {
      expect(coerceCell(textCell('12abc'), 'Number')).toEqual({ ok: false });
      expect(coerceCell(textCell('1,23'), 'Number')).toEqual({ ok: false });
      expect(coerceCell(booleanCell(true), 'Number')).toEqual({ ok: false });
    });
  });

  describe('Boolean', () => {
    it('should accept yes/no words in any case', () => {
      expect(coerceCell(textCell('Yes'), 'Boolean')).toEqual({ ok: true, value: true });
      expect(coerceCell(textCell('FALSE'), 'Boolean')).toEqual({ ok: true, value: false });
    });

    it('should accept 1 and 0 number cells', () => {
      expect(coerceCell(numberCell(1), 'Boolean')).toEqual({ ok: true, value: true });
      expect(coerceCell(numberCell(0), 'Boolean')).toEqual({ ok: true, value: false });
    });

    it('should reject other words', () => {
      expect(coerceCell(textCell('maybe'), 'Boolean')).toEqual({ ok: false });
      expect(coerceCell(numberCell(2), 'Boolean')).toEqual({ ok: false });
    });
  });

  describe('Date', () => {
    it('should parse ISO dates', () => {
      const result = coerceCell(textCell('2024-03-15'), 'Date');
      expect(result).toEqual({ ok: true, value: new Date(2024, 2, 15) });
    });

    it('should parse the listed day-first and slash formats', () => {
      expect(coerceCell(textCell('15.03.2024'), 'Date')).toEqual({ ok: true, value: new Date(2024, 2, 15) });
      expect(coerceCell(textCell('2024/03/15'), 'Date')).toEqual({ ok: true, value: new Date(2024, 2, 15) });
    });

    it('should keep date cells', () => {
      const date = new Date(Date.UTC(2023, 0, 1));
      expect(coerceCell(dateCell(date), 'Date')).toEqual({ ok: true, value: date });
    });

    it('should reject unparsable text and numbers', () => {
      expect(coerceCell(textCell('not a date'), 'Date')).toEqual({ ok: false });
      expect(coerceCell(numberCell(45000), 'Date')).toEqual({ ok: false });
    });

    it('should reject bare numbers and years', () => {
      expect(coerceCell(textCell('12'), 'Date')).toEqual({ ok: false });
      expect(coerceCell(textCell('99'), 'Date')).toEqual({ ok: false });
      expect(coerceCell(textCell('2024'), 'Date')).toEqual({ ok: false });
    });
  });

  describe('String', () => {
    it('should trim text', () => {
      expect(coerceCell(textCell('  Alice '), 'String')).toEqual({ ok: true, value: 'Alice' });
    });

    it('should render numbers, booleans and dates', () => {
      expect(coerceCell(numberCell(3), 'String')).toEqual({ ok: true, value: '3' });
      expect(coerceCell(booleanCell(false), 'String')).toEqual({ ok: true, value: 'false' });
      expect(coerceCell(dateCell(new Date(Date.UTC(2024, 0, 2))), 'String')).toEqual({
        ok: true,
        value: '2024-01-02T00:00:00.000Z',
      });
    });
  });

  it('should fail empty cells for every type', () => {
    for (const type of ['String', 'Number', 'Date', 'Boolean'] as const) {
      expect(coerceCell(EMPTY_CELL, type)).toEqual({ ok: false });
    }
  });
});

describe('parseDateText', () => {
  it('should return null for blank text', () => {
    expect(parseDateText('   ')).toBeNull();
  });

  it('should parse month names', () => {
    expect(parseDateText('Mar 5, 2024')).toEqual(new Date(2024, 2, 5));
  });
});
