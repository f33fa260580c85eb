import { describe, it, expect } from 'vitest';
import { BinaryWriter } from '../test-utils/binary-writer';
import { renderNameFormula, sheetRangePrefix } from './name-formula';
import type { SheetPrefixResolver } from './name-formula';

const SHEETS = ['Data', 'Q1 Sales'];
const prefix: SheetPrefixResolver = (ixti) => sheetRangePrefix(SHEETS, ixti, ixti);

function area3d(ixti: number, r1: number, r2: number, c1: number, c2: number): BinaryWriter {
  return new BinaryWriter().u8(0x3b).u16(ixti).u16(r1).u16(r2).u16(c1).u16(c2);
}

describe('renderNameFormula', () => {
  it('should render an absolute 3-D area', () => {
    expect(renderNameFormula(area3d(0, 0, 3, 0, 1).bytes(), 'biff8', prefix)).toBe('Data!$A$1:$B$4');
  });

  it('should quote sheet names that need it', () => {
    expect(renderNameFormula(area3d(1, 4, 4, 2, 2).bytes(), 'biff8', prefix)).toBe("'Q1 Sales'!$C$5:$C$5");
  });

  it('should join areas with the union operator', () => {
    const rgce = area3d(0, 0, 0, 0, 0).raw(area3d(0, 1, 1, 1, 1).bytes()).u8(0x10).bytes();
    expect(renderNameFormula(rgce, 'biff8', prefix)).toBe('Data!$A$1:$A$1,Data!$B$2:$B$2');
  });

  it('should honour relative row and column flags', () => {
    const both = new BinaryWriter().u8(0x24).u16(2).u16(0xc001).bytes();
    const columnOnly = new BinaryWriter().u8(0x24).u16(0).u16(0x4002).bytes();
    expect(renderNameFormula(both, 'biff8', prefix)).toBe('B3');
    expect(renderNameFormula(columnOnly, 'biff8', prefix)).toBe('C$1');
  });

  it('should read 32-bit rows in the binary workbook dialect', () => {
    const rgce = new BinaryWriter().u8(0x3a).u16(1).u32(99_999).u16(0).bytes();
    expect(renderNameFormula(rgce, 'xlsb', prefix)).toBe("'Q1 Sales'!$A$100000");
  });

  it('should render constants', () => {
    expect(renderNameFormula(new BinaryWriter().u8(0x1e).u16(42).bytes(), 'biff8', prefix)).toBe('42');
    expect(renderNameFormula(new BinaryWriter().u8(0x17).u8(2).u8(0).latin1('hi').bytes(), 'biff8', prefix)).toBe('"hi"');
    expect(renderNameFormula(new BinaryWriter().u8(0x1d).u8(1).bytes(), 'biff8', prefix)).toBe('TRUE');
  });

  it('should write #REF! for a reference to an unknown sheet', () => {
    expect(renderNameFormula(area3d(7, 0, 0, 0, 0).bytes(), 'biff8', prefix)).toBe('#REF!');
  });

  it('should give up on tokens outside the supported subset', () => {
    expect(renderNameFormula(new BinaryWriter().u8(0x21).u16(4).bytes(), 'biff8', prefix)).toBeNull();
  });

  it('should give up on a truncated token stream', () => {
    expect(renderNameFormula(Uint8Array.from([0x3b, 0x00]), 'biff8', prefix)).toBeNull();
  });
});

describe('sheetRangePrefix', () => {
  it('should cover single sheets and sheet ranges', () => {
    expect(sheetRangePrefix(SHEETS, 0, 0)).toBe('Data');
    expect(sheetRangePrefix(SHEETS, 0, 1)).toBe("'Data:Q1 Sales'");
    expect(sheetRangePrefix(SHEETS, 0, 5)).toBeNull();
  });
});
