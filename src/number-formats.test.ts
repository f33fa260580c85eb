import { describe, it, expect } from 'vitest';
import { classifyBuiltinFormat, classifyFormatCode, isTemporal } from './number-formats';

describe('classifyBuiltinFormat', () => {
  it('should classify the built-in date, time and duration ids', () => {
    expect(classifyBuiltinFormat(14)).toBe('date');
    expect(classifyBuiltinFormat(20)).toBe('time');
    expect(classifyBuiltinFormat(22)).toBe('datetime');
    expect(classifyBuiltinFormat(46)).toBe('duration');
  });

  it('should treat plain numeric and text ids as non-temporal', () => {
    expect(classifyBuiltinFormat(0)).toBe('general');
    expect(classifyBuiltinFormat(2)).toBe('numeric');
    expect(classifyBuiltinFormat(49)).toBe('text');
  });

  it('should treat unassigned ids below the custom range as general', () => {
    expect(classifyBuiltinFormat(100)).toBe('general');
  });

  it('should leave custom-range and invalid ids unresolved', () => {
    expect(classifyBuiltinFormat(164)).toBeUndefined();
    expect(classifyBuiltinFormat(-1)).toBeUndefined();
    expect(classifyBuiltinFormat(1.5)).toBeUndefined();
  });
});

describe('classifyFormatCode', () => {
  it.each([
    ['yyyy-mm-dd', 'date'],
    ['[$-409]mmmm d, yyyy', 'date'],
    ['"Due: "yyyy', 'date'],
    ['hh:mm:ss', 'time'],
    ['mm:ss', 'time'],
    ['m/d/yyyy h:mm AM/PM', 'datetime'],
    ['[h]:mm', 'duration'],
    ['[mm]:ss', 'duration'],
    ['#,##0.00', 'numeric'],
    ['0.00E+00', 'numeric'],
    ['[Red]0.00;[Blue]-0.00', 'numeric'],
    ['@', 'text'],
    ['General', 'general'],
    ['', 'general'],
  ])('should classify %j as %s', (code, expected) => {
    expect(classifyFormatCode(code)).toBe(expected);
  });

  it('should ignore letters inside quotes and after escapes', () => {
    expect(classifyFormatCode('0.0" days"')).toBe('numeric');
    expect(classifyFormatCode('0\\h')).toBe('numeric');
  });

  it('should only look at the first section', () => {
    expect(classifyFormatCode('0.00;"yyyy"')).toBe('numeric');
  });
});

describe('isTemporal', () => {
  it('should accept date-like classes only', () => {
    expect(isTemporal('date')).toBe(true);
    expect(isTemporal('datetime')).toBe(true);
    expect(isTemporal('time')).toBe(true);
    expect(isTemporal('duration')).toBe(false);
    expect(isTemporal('numeric')).toBe(false);
  });
});
