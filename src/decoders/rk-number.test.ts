import { describe, it, expect } from 'vitest';
import { decodeRk } from './rk-number';
import { rkInt } from '../test-utils/xlsb-builder';

describe('decodeRk', () => {
  it('should decode 30-bit integers', () => {
    expect(decodeRk(rkInt(42))).toEqual({ value: 42, isInt: true });
    expect(decodeRk(rkInt(-5))).toEqual({ value: -5, isInt: true });
  });

  it('should scale integers marked as hundredths', () => {
    expect(decodeRk(((1234 << 2) | 0x03) >>> 0)).toEqual({ value: 12.34, isInt: false });
  });

  it('should rebuild doubles from their high 30 bits', () => {
    // 1.5 is 0x3FF8000000000000
    expect(decodeRk(0x3ff80000)).toEqual({ value: 1.5, isInt: false });
    expect(decodeRk(0x3ff80001)).toEqual({ value: 0.015, isInt: false });
  });
});
