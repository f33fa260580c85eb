import { describe, it, expect } from 'vitest';
import {
  isoToDateCell,
  isoToDurationCell,
  serialToDateCell,
  serialToDurationCell,
  serialToEpochMs,
} from './date-serial';

describe('serialToEpochMs', () => {
  it('should convert serial 44197 under both epochs', () => {
    expect(serialToEpochMs(44197, 1900)).toBe(Date.UTC(2021, 0, 1));
    expect(serialToEpochMs(44197, 1904)).toBe(Date.UTC(2025, 0, 2));
  });

  it('should keep the fractional part as time of day', () => {
    expect(serialToEpochMs(44197.75, 1900)).toBe(Date.UTC(2021, 0, 1, 18));
  });

  it('should map the phantom 1900-02-29 and the serials before it', () => {
    expect(serialToEpochMs(1, 1900)).toBe(Date.UTC(1900, 0, 1));
    expect(serialToEpochMs(59, 1900)).toBe(Date.UTC(1900, 1, 28));
    expect(serialToEpochMs(60, 1900)).toBe(Date.UTC(1900, 1, 28));
    expect(serialToEpochMs(61, 1900)).toBe(Date.UTC(1900, 2, 1));
  });

  it('should start the 1904 epoch on its first day', () => {
    expect(serialToEpochMs(0, 1904)).toBe(Date.UTC(1904, 0, 1));
  });

  it('should reject serials outside the calendar range', () => {
    expect(serialToEpochMs(-1, 1900)).toBeNull();
    expect(serialToEpochMs(2958466, 1900)).toBeNull();
    expect(serialToEpochMs(2957004, 1904)).toBeNull();
    expect(serialToEpochMs(Number.NaN, 1900)).toBeNull();
    expect(serialToEpochMs(2958465, 1900)).toBe(Date.UTC(9999, 11, 31));
  });
});

describe('serialToDateCell', () => {
  it('should carry the kind and the original serial', () => {
    expect(serialToDateCell(44197.5, 1900, 'datetime')).toEqual({
      type: 'datetime',
      value: new Date(Date.UTC(2021, 0, 1, 12)),
      kind: 'datetime',
      serial: 44197.5,
    });
  });

  it('should return a date-range error cell for out-of-range serials', () => {
    expect(serialToDateCell(-3, 1900, 'date')).toEqual({
      type: 'error',
      code: '#DATE_RANGE',
      detail: 'serial -3 is outside the 1900 date range',
    });
  });
});

describe('serialToDurationCell', () => {
  it('should express the serial in milliseconds', () => {
    expect(serialToDurationCell(1.5)).toEqual({ type: 'duration', milliseconds: 129_600_000, serial: 1.5 });
  });
});

describe('isoToDateCell', () => {
  it('should read a bare date as a date', () => {
    expect(isoToDateCell('2021-03-04')).toEqual({
      type: 'datetime',
      value: new Date(Date.UTC(2021, 2, 4)),
      kind: 'date',
      serial: null,
    });
  });

  it('should read a date-time with fraction and offset', () => {
    const cell = isoToDateCell('2021-03-04T05:06:07.250+02:00');
    expect(cell).toEqual({
      type: 'datetime',
      value: new Date(Date.UTC(2021, 2, 4, 3, 6, 7, 250)),
      kind: 'datetime',
      serial: null,
    });
  });

  it('should flag text that is not an ISO date', () => {
    expect(isoToDateCell('next tuesday')).toEqual({
      type: 'error',
      code: '#MALFORMED_CELL',
      detail: '"next tuesday" is not an ISO date',
    });
  });
});

describe('isoToDurationCell', () => {
  it('should read hours, minutes and seconds', () => {
    expect(isoToDurationCell('PT36H15M00S')).toEqual({ type: 'duration', milliseconds: 130_500_000, serial: null });
  });

  it('should read days and negative durations', () => {
    expect(isoToDurationCell('P1DT2H')).toEqual({ type: 'duration', milliseconds: 93_600_000, serial: null });
    expect(isoToDurationCell('-PT1H')).toEqual({ type: 'duration', milliseconds: -3_600_000, serial: null });
  });

  it('should reject an empty period', () => {
    expect(isoToDurationCell('PT')).toMatchObject({ type: 'error', code: '#MALFORMED_CELL' });
  });
});
