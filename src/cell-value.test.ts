import { describe, it, expect } from 'vitest';
import { EMPTY, binaryErrorCell, cellToText, intCell, isEmpty, toPlainValue } from './cell-value';
import type { CellValue } from './cell-value';

describe('cell values', () => {
  describe('toPlainValue', () => {
    it('should map each variant to a host value', () => {
      expect(toPlainValue(EMPTY)).toBeNull();
      expect(toPlainValue({ type: 'bool', value: false })).toBe(false);
      expect(toPlainValue(intCell(12))).toBe(12);
      expect(toPlainValue({ type: 'float', value: 0.5 })).toBe(0.5);
      expect(toPlainValue({ type: 'duration', milliseconds: 90_000, serial: null })).toBe(90_000);
      expect(toPlainValue({ type: 'error', code: '#REF!' })).toBe('#REF!');
    });

    it('should keep integers beyond the safe range as text', () => {
      expect(toPlainValue(intCell(2n ** 60n))).toBe('1152921504606846976');
    });
  });

  describe('cellToText', () => {
    const at = (kind: 'date' | 'time' | 'datetime', ms: number): CellValue => ({
      type: 'datetime',
      value: new Date(ms),
      kind,
      serial: null,
    });

    it('should render dates according to their kind', () => {
      expect(cellToText(at('date', Date.UTC(2021, 0, 1)))).toBe('2021-01-01');
      expect(cellToText(at('time', Date.UTC(1899, 11, 30, 13, 30)))).toBe('13:30:00');
      expect(cellToText(at('datetime', Date.UTC(2021, 0, 1, 12)))).toBe('2021-01-01T12:00:00');
    });

    it('should render durations as hours, minutes and seconds', () => {
      expect(cellToText({ type: 'duration', milliseconds: 130_500_000, serial: null })).toBe('36:15:00');
      expect(cellToText({ type: 'duration', milliseconds: -90_000, serial: null })).toBe('-0:01:30');
    });

    it('should render scalars', () => {
      expect(cellToText(EMPTY)).toBe('');
      expect(cellToText({ type: 'bool', value: true })).toBe('TRUE');
      expect(cellToText(intCell(-7))).toBe('-7');
      expect(cellToText({ type: 'float', value: 2.25 })).toBe('2.25');
      expect(cellToText({ type: 'error', code: '#N/A' })).toBe('#N/A');
    });
  });

  describe('binaryErrorCell', () => {
    it('should name the stored error codes', () => {
      expect(binaryErrorCell(0x07)).toEqual({ type: 'error', code: '#DIV/0!' });
      expect(binaryErrorCell(0x2a)).toEqual({ type: 'error', code: '#N/A' });
    });

    it('should report unknown codes as malformed', () => {
      expect(binaryErrorCell(0x99)).toEqual({
        type: 'error',
        code: '#MALFORMED_CELL',
        detail: 'unknown error code 0x99',
      });
    });
  });

  it('should treat missing cells as empty', () => {
    expect(isEmpty(undefined)).toBe(true);
    expect(isEmpty(EMPTY)).toBe(true);
    expect(isEmpty({ type: 'string', value: '' })).toBe(false);
  });
});
