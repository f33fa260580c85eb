import { describe, it, expect } from 'vitest';
import { BinaryWriter } from '../../test-utils/binary-writer';
import { drain, plainRows } from '../../test-utils/cursor';
import { buildXlsb, rkInt, xlsbCell, xlsbRecord, xlsbSheet } from '../../test-utils/xlsb-builder';
import type { XlsbSpec } from '../../test-utils/xlsb-builder';
import { openWorkbook } from '../../workbook';
import { Brt } from './records';

const SALES = xlsbSheet(
  [
    { index: 0, cells: [xlsbCell.isst(0, 0), xlsbCell.real(1, 2.5), xlsbCell.rk(2, rkInt(7))] },
    {
      index: 2,
      cells: [xlsbCell.real(0, 44197, 1), xlsbCell.bool(1, true), xlsbCell.error(2, 0x2a), xlsbCell.text(3, 'memo')],
    },
    { index: 3, cells: [xlsbCell.isst(0, 5), xlsbCell.blank(1), xlsbCell.formulaNumber(2, 1.25)] },
  ],
  { dimension: [0, 3, 0, 3], merges: [[0, 0, 0, 1]] },
);

const NOTES = xlsbSheet([{ index: 1, cells: [xlsbCell.text(1, 'hello')] }]);

function truncatedSheet(): Uint8Array {
  const full = xlsbSheet([
    { index: 0, cells: [xlsbCell.real(0, 1)] },
    { index: 1, cells: [xlsbCell.real(0, 2)] },
    { index: 2, cells: [xlsbCell.real(0, 3)] },
  ]);
  // drops the end-of-data record and the tail of the last cell
  return full.subarray(0, full.length - 5);
}

function spec(overrides: Partial<XlsbSpec> = {}): XlsbSpec {
  return {
    sheets: [
      { name: 'Sales', data: SALES },
      { name: 'Notes', data: NOTES, state: 1 },
    ],
    sharedStrings: ['north', 'south'],
    cellXfs: [0, 14],
    ...overrides,
  };
}

describe('XLSB decoding', () => {
  it('should decode cells from binary records', () => {
    const workbook = openWorkbook(buildXlsb(spec()));
    expect(workbook.format).toBe('xlsb');
    const { rows, outcome } = drain(workbook.openSheet('Sales'));
    expect(outcome).toEqual({ kind: 'end' });
    expect(plainRows(rows)).toEqual([
      [0, ['north', 2.5, 7]],
      [2, [new Date(Date.UTC(2021, 0, 1)), true, '#N/A', 'memo']],
      [3, ['#BAD_STRING_INDEX', null, 1.25]],
    ]);
    expect(rows[0].cells[2]).toEqual({ type: 'int', value: 7n });
    expect(rows[0].cells[1]).toEqual({ type: 'float', value: 2.5 });
  });

  it('should read sheet metadata, dimensions and merged ranges', () => {
    const workbook = openWorkbook(buildXlsb(spec()));
    expect(workbook.sheetsMetadata()).toEqual([
      {
        name: 'Sales',
        index: 0,
        type: 'worksheet',
        visibility: 'visible',
        dimensions: { start: { row: 0, col: 0 }, end: { row: 3, col: 3 } },
      },
      { name: 'Notes', index: 1, type: 'worksheet', visibility: 'hidden', dimensions: null },
    ]);
    expect(workbook.mergedRanges(0)).toEqual([{ start: { row: 0, col: 0 }, end: { row: 0, col: 1 }, ref: 'A1:B1' }]);
    expect(plainRows(drain(workbook.openSheet('Notes')).rows)).toEqual([[1, [null, 'hello']]]);
  });

  it('should report a truncated sheet after the rows it could read', () => {
    const workbook = openWorkbook(
      buildXlsb(spec({ sheets: [{ name: 'Broken', data: truncatedSheet() }, { name: 'Notes', data: NOTES }] })),
    );
    const cursor = workbook.openSheet('Broken');
    expect(cursor.nextRow()).toMatchObject({ kind: 'row', row: { index: 0 } });
    expect(cursor.nextRow()).toMatchObject({ kind: 'row', row: { index: 1 } });
    const truncated = cursor.nextRow();
    expect(truncated.kind).toBe('truncated');
    expect(cursor.nextRow()).toBe(truncated);

    expect(plainRows(drain(workbook.openSheet('Notes')).rows)).toEqual([[1, [null, 'hello']]]);
  });

  it('should fall back to no merged ranges when a side scan hits the truncation', () => {
    const workbook = openWorkbook(buildXlsb(spec({ sheets: [{ name: 'Broken', data: truncatedSheet() }] })));
    expect(workbook.mergedRanges('Broken')).toEqual([]);
    expect(workbook.warnings().map((warning) => [warning.code, warning.sheet])).toContainEqual([
      'SHEET_SCAN_FAILED',
      'Broken',
    ]);
  });

  it('should keep decoding a row past malformed cell records', () => {
    const odd = xlsbSheet([
      {
        index: 0,
        cells: [
          xlsbCell.real(0, 1),
          xlsbRecord(Brt.CellReal, Uint8Array.from([1, 2, 3])),
          xlsbRecord(Brt.CellReal, new BinaryWriter().u32(4).u32(0)),
        ],
      },
    ]);
    const workbook = openWorkbook(buildXlsb(spec({ sheets: [{ name: 'Odd', data: odd }] })));
    expect(plainRows(drain(workbook.openSheet('Odd')).rows)).toEqual([[0, [1, null, null, null, '#MALFORMED_CELL']]]);
    expect(workbook.warnings().filter((warning) => warning.code === 'MALFORMED_CELL')).toHaveLength(2);
  });

  it('should apply the 1904 date system', () => {
    const workbook = openWorkbook(buildXlsb(spec({ date1904: true })));
    expect(workbook.epoch).toBe(1904);
    const rows = drain(workbook.openSheet('Sales')).rows;
    expect(rows[1].cells[0]).toMatchObject({ type: 'datetime', value: new Date(Date.UTC(2025, 0, 2)) });
  });

  it('should render defined names and skip the ones it cannot read', () => {
    const workbook = openWorkbook(
      buildXlsb(
        spec({
          externSheets: [
            [0, 0],
            [1, 1],
          ],
          names: [
            { name: 'Totals', rgce: new BinaryWriter().u8(0x3b).u16(0).u32(0).u32(3).u16(0).u16(1).bytes() },
            { name: 'Local', itab: 1, rgce: new BinaryWriter().u8(0x3a).u16(1).u32(0).u16(0).bytes() },
            { name: 'Func', rgce: new BinaryWriter().u8(0x21).u16(4).bytes() },
          ],
        }),
      ),
    );
    expect([...workbook.definedNames()]).toEqual([
      ['Totals', 'Sales!$A$1:$B$4'],
      ['Notes!Local', 'Notes!$A$1'],
    ]);
    expect(workbook.warnings()).toContainEqual({
      code: 'UNSUPPORTED_NAME_FORMULA',
      message: 'Defined name "Func" was skipped',
    });
  });
});
