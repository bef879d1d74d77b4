import { describe, it, expect } from 'vitest';
import { EMPTY_CELL, describeCell, isEmptyCell, toCellValue } from '../../../src/domain/model/CellValue.js';

describe('toCellValue', () => {
  it('should tag primitives without converting them', () => {
    expect(toCellValue('42')).toEqual({ kind: 'text', value: '42' });
    expect(toCellValue(42)).toEqual({ kind: 'number', value: 42 });
    expect(toCellValue(false)).toEqual({ kind: 'boolean', value: false });
    expect(toCellValue(10n)).toEqual({ kind: 'number', value: 10 });
  });

  it('should treat missing and blank values as empty', () => {
    expect(toCellValue(null)).toBe(EMPTY_CELL);
    expect(toCellValue(undefined)).toBe(EMPTY_CELL);
    expect(toCellValue('   ')).toBe(EMPTY_CELL);
    expect(toCellValue(Number.NaN)).toBe(EMPTY_CELL);
    expect(toCellValue(new Date('nope'))).toBe(EMPTY_CELL);
  });

  it('should serialise objects to text', () => {
    expect(toCellValue({ a: 1 })).toEqual({ kind: 'text', value: '{"a":1}' });
  });
});

describe('describeCell', () => {
  it('should render dates as ISO strings', () => {
    expect(describeCell(toCellValue(new Date(Date.UTC(2024, 4, 1))))).toBe('2024-05-01T00:00:00.000Z');
  });

  it('should render empty cells as null', () => {
    expect(describeCell(EMPTY_CELL)).toBeNull();
    expect(describeCell(undefined)).toBeNull();
    expect(isEmptyCell(undefined)).toBe(true);
  });
});
