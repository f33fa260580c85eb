import { describe, it, expect } from 'vitest';
import { drain, plainRows } from '../../test-utils/cursor';
import { buildOds, floatCell, stringCell, table } from '../../test-utils/ods-builder';
import { openWorkbook } from '../../workbook';

const ROW = (cells: string, attrs = '') => `<table:table-row${attrs}>${cells}</table:table-row>`;

const MAIN = table(
  'Main',
  ROW(floatCell(1) + stringCell('two')) +
    ROW(floatCell(5, ' table:number-columns-repeated="2"'), ' table:number-rows-repeated="2"') +
    ROW('<table:table-cell table:number-columns-repeated="3"/>', ' table:number-rows-repeated="1000"') +
    ROW(
      '<table:table-cell office:value-type="date" office:date-value="2021-01-01"/>' +
        '<table:table-cell office:value-type="boolean" office:boolean-value="true"/>' +
        '<table:table-cell office:value-type="time" office:time-value="PT36H15M00S"/>' +
        '<table:table-cell office:value-type="percentage" office:value="0.25"/>' +
        '<table:table-cell office:value-type="currency" office:value="9.99"/>',
    ) +
    ROW(
      '<table:table-cell office:value-type="string">' +
        '<text:p>line one</text:p><text:p>a<text:s text:c="2"/>b</text:p>' +
        '<office:annotation><text:p>note</text:p></office:annotation>' +
        '</table:table-cell>' +
        '<table:table-cell office:value-type="float" office:value="0" calcext:value-type="error"><text:p>#DIV/0!</text:p></table:table-cell>',
    ),
);

const MERGED = table(
  'Merged',
  ROW(
    '<table:table-cell office:value-type="string" table:number-columns-spanned="2" table:number-rows-spanned="2"><text:p>big</text:p></table:table-cell>' +
      '<table:covered-table-cell/>',
  ) + ROW('<table:covered-table-cell table:number-columns-repeated="2"/>'),
);

const SECRET = table('Secret', ROW(stringCell('hush')), 'ta2');

const HIDDEN_STYLE =
  '<style:style style:name="ta2" style:family="table"><style:table-properties table:display="false"/></style:style>';

const NAMES =
  '<table:named-expressions>' +
  '<table:named-range table:name="Totals" table:base-cell-address="$Main.$A$1" table:cell-range-address="$Main.$A$1:.$B$2"/>' +
  '</table:named-expressions>';

function workbook(body = MAIN + MERGED + SECRET + NAMES) {
  return openWorkbook(buildOds({ body, styles: HIDDEN_STYLE }));
}

describe('ODS decoding', () => {
  it('should list tables with visibility from their automatic style', () => {
    const opened = workbook();
    expect(opened.format).toBe('ods');
    expect(opened.sheetsMetadata()).toEqual([
      { name: 'Main', index: 0, type: 'worksheet', visibility: 'visible', dimensions: null },
      { name: 'Merged', index: 1, type: 'worksheet', visibility: 'visible', dimensions: null },
      { name: 'Secret', index: 2, type: 'worksheet', visibility: 'hidden', dimensions: null },
    ]);
  });

  it('should expand repeated rows and columns and skip empty repeats', () => {
    const { rows, outcome } = drain(workbook().openSheet('Main'));
    expect(outcome).toEqual({ kind: 'end' });
    expect(plainRows(rows)).toEqual([
      [0, [1, 'two']],
      [1, [5, 5]],
      [2, [5, 5]],
      [1003, [new Date(Date.UTC(2021, 0, 1)), true, 130_500_000, 0.25, 9.99]],
      [1004, ['line one\na  b', '#DIV/0!']],
    ]);
    expect(rows[3].cells[2]).toEqual({ type: 'duration', milliseconds: 130_500_000, serial: null });
  });

  it('should read spanned cells as merged ranges', () => {
    const opened = workbook();
    expect(opened.mergedRanges('Merged')).toEqual([{ start: { row: 0, col: 0 }, end: { row: 1, col: 1 }, ref: 'A1:B2' }]);
    expect(opened.mergedRanges('Main')).toEqual([]);
    expect(plainRows(drain(opened.openSheet('Merged')).rows)).toEqual([[0, ['big']]]);
  });

  it('should stream a later table without reading earlier ones as rows', () => {
    expect(plainRows(drain(workbook().openSheet('Secret')).rows)).toEqual([[0, ['hush']]]);
  });

  it('should keep named range addresses as written', () => {
    expect([...workbook().definedNames()]).toEqual([['Totals', '$Main.$A$1:.$B$2']]);
  });

  it('should expand a huge populated repeat one row per pull', () => {
    const cursor = workbook(table('Big', ROW(floatCell(4), ' table:number-rows-repeated="100000000"'))).openSheet('Big');
    expect(cursor.nextRow()).toMatchObject({ kind: 'row', row: { index: 0 } });
    expect(cursor.nextRow()).toMatchObject({ kind: 'row', row: { index: 1 } });
    expect(cursor.nextRow()).toMatchObject({ kind: 'row', row: { index: 2, cells: [{ type: 'float', value: 4 }] } });
    cursor.close();
    expect(cursor.nextRow()).toEqual({ kind: 'end' });
  });

  it('should truncate only the table whose rows are malformed', () => {
    const opened = workbook(table('Good', ROW(floatCell(7))) + table('Broken', ROW(floatCell(1)) + '<table:table-row><bad'));
    expect(opened.sheetNames()).toEqual(['Good', 'Broken']);
    expect(opened.warnings().map((warning) => [warning.code, warning.sheet])).toContainEqual([
      'ODS_CONTENT_TRUNCATED',
      'Broken',
    ]);

    const good = drain(opened.openSheet('Good'));
    expect(plainRows(good.rows)).toEqual([[0, [7]]]);
    expect(good.outcome).toEqual({ kind: 'end' });

    const cursor = opened.openSheet('Broken');
    const broken = drain(cursor);
    expect(plainRows(broken.rows)).toEqual([[0, [1]]]);
    expect(broken.outcome.kind).toBe('truncated');
    expect(cursor.nextRow()).toBe(broken.outcome);
  });

  it('should pick the epoch from the null date', () => {
    expect(workbook().epoch).toBe(1900);
    const settings = '<table:calculation-settings><table:null-date table:date-value="1904-01-01"/></table:calculation-settings>';
    expect(workbook(settings + MAIN).epoch).toBe(1904);
  });
});
