import { describe, it, expect } from 'vitest';
import { columnName, formatCellRef, formatRangeRef, mergedRange, parseCellRef, parseRangeRef, quoteSheetName } from './cell-ref';

describe('cell references', () => {
  it('should parse relative and absolute A1 references', () => {
    expect(parseCellRef('B3')).toEqual({ row: 2, col: 1 });
    expect(parseCellRef('$AA$10')).toEqual({ row: 9, col: 26 });
    expect(parseCellRef('c7')).toEqual({ row: 6, col: 2 });
  });

  it('should reject text that is not a cell reference', () => {
    expect(parseCellRef('A0')).toBeNull();
    expect(parseCellRef('Totals')).toBeNull();
    expect(parseCellRef('')).toBeNull();
  });

  it('should normalize ranges to top-left and bottom-right corners', () => {
    expect(parseRangeRef('C3:A1')).toEqual({ start: { row: 0, col: 0 }, end: { row: 2, col: 2 } });
    expect(parseRangeRef('D4')).toEqual({ start: { row: 3, col: 3 }, end: { row: 3, col: 3 } });
    expect(parseRangeRef('A1:B2:C3')).toBeNull();
  });

  it('should format references', () => {
    expect(formatCellRef({ row: 0, col: 0 })).toBe('A1');
    expect(formatCellRef({ row: 4, col: 27 }, true)).toBe('$AB$5');
    expect(formatRangeRef({ row: 0, col: 0 }, { row: 0, col: 0 })).toBe('A1');
    expect(formatRangeRef({ row: 0, col: 0 }, { row: 3, col: 1 })).toBe('A1:B4');
    expect(columnName(25)).toBe('Z');
  });

  it('should always write both corners of a merged range', () => {
    expect(mergedRange({ row: 1, col: 1 }, { row: 1, col: 1 }).ref).toBe('B2:B2');
  });

  it('should quote sheet names that are not plain identifiers', () => {
    expect(quoteSheetName('Sheet1')).toBe('Sheet1');
    expect(quoteSheetName('Q1 Data')).toBe("'Q1 Data'");
    expect(quoteSheetName("Bob's")).toBe("'Bob''s'");
  });
});
