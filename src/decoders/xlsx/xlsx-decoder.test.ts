import { describe, it, expect } from 'vitest';
import { WorkbookOpenError } from '../../errors';
import { drain, plainRows } from '../../test-utils/cursor';
import { buildXlsx, cell, row, sheetData } from '../../test-utils/xlsx-builder';
import type { XlsxSpec } from '../../test-utils/xlsx-builder';
import { openWorkbook } from '../../workbook';

const SALES_BODY =
  '<dimension ref="A1:D4"/>' +
  sheetData([
    row(1, [cell('A1', '0', { t: 's' }), cell('B1', '3.5'), cell('C1', '44197', { s: 1 })]),
    row(3, [
      cell('A3', '1', { t: 'b' }),
      cell('B3', '#DIV/0!', { t: 'e' }),
      '<c r="D3" t="inlineStr"><is><t>inline</t></is></c>',
    ]),
    row(4, [cell('A4', '1.5', { s: 2 }), cell('B4', '9', { t: 's' }), cell('C4', '2', { s: 9 })]),
    row(5, [cell('A5', null, { s: 1 })]),
  ]) +
  '<mergeCells count="1"><mergeCell ref="A1:B2"/></mergeCells>';

function spec(overrides: Partial<XlsxSpec> = {}): XlsxSpec {
  return {
    sheets: [
      { name: 'Sales', body: SALES_BODY },
      {
        name: 'Notes',
        state: 'hidden',
        body: sheetData([row(5, [cell('A5', 'later', { t: 'str' })]), row(3, [cell('A3', 'x_x000D_y', { t: 'str' })])]),
      },
      { name: 'Loose', body: '<sheetData><row><c><v>1</v></c><c><v>2</v></c></row><row><c r="C2"><v>3</v></c></row></sheetData>' },
    ],
    sharedStrings: ['alpha', 'beta'],
    numFmts: [{ id: 164, code: '[h]:mm' }],
    cellXfs: [0, 14, 164],
    definedNames: [
      { name: 'Totals', formula: 'Sales!$A$1:$B$4' },
      { name: '_xlnm.Print_Area', formula: 'Notes!$A$1:$C$3', localSheetId: 1, hidden: true },
      { name: 'Orphan', formula: '1', localSheetId: 9 },
    ],
    ...overrides,
  };
}

describe('XLSX decoding', () => {
  it('should list sheets with their kind and visibility', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    expect(workbook.format).toBe('xlsx');
    expect(workbook.epoch).toBe(1900);
    expect(workbook.sheetsMetadata()).toEqual([
      {
        name: 'Sales',
        index: 0,
        type: 'worksheet',
        visibility: 'visible',
        dimensions: { start: { row: 0, col: 0 }, end: { row: 3, col: 3 } },
      },
      { name: 'Notes', index: 1, type: 'worksheet', visibility: 'hidden', dimensions: null },
      { name: 'Loose', index: 2, type: 'worksheet', visibility: 'visible', dimensions: null },
    ]);
  });

  it('should decode every cell type and skip rows with no values', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    const { rows, outcome } = drain(workbook.openSheet('Sales'));
    expect(outcome).toEqual({ kind: 'end' });
    expect(plainRows(rows)).toEqual([
      [0, ['alpha', 3.5, new Date(Date.UTC(2021, 0, 1))]],
      [2, [true, '#DIV/0!', null, 'inline']],
      [3, [129_600_000, '#BAD_STRING_INDEX', '#BAD_STYLE_INDEX']],
    ]);
    expect(rows[0].cells[2]).toMatchObject({ type: 'datetime', kind: 'date', serial: 44197 });
    expect(rows[0].cells[1]).toEqual({ type: 'float', value: 3.5 });
  });

  it('should log cell-level problems with their position', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    drain(workbook.openSheet('Sales'));
    const cellWarnings = workbook.warnings().filter((warning) => warning.sheet === 'Sales');
    expect(cellWarnings.map(({ code, row: r, col }) => [code, r, col])).toEqual([
      ['BAD_STRING_INDEX', 3, 1],
      ['BAD_STYLE_INDEX', 3, 2],
    ]);
  });

  it('should skip rows that go backwards and unescape string text', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    const { rows } = drain(workbook.openSheet('Notes'));
    expect(plainRows(rows)).toEqual([[4, ['later']]]);
    expect(workbook.warnings().map((warning) => warning.code)).toContain('ROW_OUT_OF_ORDER');

    const unescaped = openWorkbook(
      buildXlsx(spec({ sheets: [{ name: 'Only', body: sheetData([row(1, [cell('A1', 'x_x000D_y', { t: 'str' })])]) }] })),
    );
    expect(plainRows(drain(unescaped.openSheet(0)).rows)).toEqual([[0, ['x\ry']]]);
  });

  it('should place cells without references after the previous one', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    expect(plainRows(drain(workbook.openSheet('Loose')).rows)).toEqual([
      [0, [1, 2]],
      [1, [null, null, 3]],
    ]);
  });

  it('should read merged ranges', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    expect(workbook.mergedRanges('Sales')).toEqual([
      { start: { row: 0, col: 0 }, end: { row: 1, col: 1 }, ref: 'A1:B2' },
    ]);
    expect(workbook.mergedRanges('Notes')).toEqual([]);
  });

  it('should key sheet-scoped names by their sheet', () => {
    const workbook = openWorkbook(buildXlsx(spec()));
    expect([...workbook.definedNames()]).toEqual([
      ['Totals', 'Sales!$A$1:$B$4'],
      ['Notes!_xlnm.Print_Area', 'Notes!$A$1:$C$3'],
      ['Orphan', '1'],
    ]);
    expect(workbook.definedNameEntries()[1]).toEqual({
      name: '_xlnm.Print_Area',
      reference: 'Notes!$A$1:$C$3',
      scope: 'Notes',
      hidden: true,
    });
    expect(workbook.warnings()).toContainEqual({
      code: 'BAD_NAME_SCOPE',
      message: 'Defined name "Orphan" refers to missing sheet 9',
    });
  });

  it('should apply the 1904 date system', () => {
    const workbook = openWorkbook(buildXlsx(spec({ date1904: true })));
    expect(workbook.epoch).toBe(1904);
    const [first] = drain(workbook.openSheet('Sales')).rows;
    expect(first.cells[2]).toMatchObject({ type: 'datetime', value: new Date(Date.UTC(2025, 0, 2)) });
  });

  it('should produce the same rows when parsing in small chunks', () => {
    const bytes = buildXlsx(spec());
    const whole = drain(openWorkbook(bytes).openSheet('Sales')).rows;
    const chunked = drain(openWorkbook(bytes, { chunkSize: 16 }).openSheet('Sales')).rows;
    expect(chunked).toEqual(whole);
  });

  it('should report a sheet as truncated at broken markup and keep the rows before it', () => {
    const body =
      sheetData([row(1, [cell('A1', '1')]), row(2, [cell('A2', '2')])]).replace('</sheetData>', '') +
      '<row r="3"><c r="A3"><v>3</v></x></row></sheetData>';
    const workbook = openWorkbook(buildXlsx(spec({ sheets: [{ name: 'Broken', body }] })), { chunkSize: 16 });
    const cursor = workbook.openSheet('Broken');
    const { rows, outcome } = drain(cursor);
    expect(plainRows(rows)).toEqual([
      [0, [1]],
      [1, [2]],
    ]);
    expect(outcome.kind).toBe('truncated');
    expect(cursor.nextRow()).toBe(outcome);
  });

  it('should type chart sheets from their relationship', () => {
    const workbook = openWorkbook(
      buildXlsx(spec({ sheets: [{ name: 'Chart1', kind: 'chartsheet', body: '' }] })),
    );
    expect(workbook.sheetMetadata('Chart1').type).toBe('chartsheet');
  });

  it('should refuse duplicate sheet names', () => {
    const duplicate = spec({
      sheets: [
        { name: 'Same', body: '<sheetData/>' },
        { name: 'Same', body: '<sheetData/>' },
      ],
    });
    expect(() => openWorkbook(buildXlsx(duplicate))).toThrow(WorkbookOpenError);
  });
});
