import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MalformedContainerError, SheetNotFoundError, SourceRejectedError, WorkbookClosedError } from './errors';
import { drain, plainRows } from './test-utils/cursor';
import { buildOds, floatCell, table } from './test-utils/ods-builder';
import { packZip } from './test-utils/packages';
import { biffCell, buildXls } from './test-utils/xls-builder';
import { buildXlsb, xlsbCell, xlsbSheet } from './test-utils/xlsb-builder';
import { buildXlsx, cell, row, sheetData } from './test-utils/xlsx-builder';
import { openWorkbook, tryOpenWorkbook } from './workbook';

function twoSheets(): Uint8Array {
  return buildXlsx({
    sheets: [
      { name: 'Sheet1', body: sheetData([row(1, [cell('A1', '1')]), row(2, [cell('A2', '2')])]) },
      { name: 'Sheet2', body: sheetData([row(1, [cell('A1', '10')])]) },
    ],
  });
}

describe('openWorkbook', () => {
  it.each([
    ['xlsx', buildXlsx({ sheets: [{ name: 'S', body: sheetData([row(1, [cell('A1', '42')])]) }] })],
    ['xlsb', buildXlsb({ sheets: [{ name: 'S', data: xlsbSheet([{ index: 0, cells: [xlsbCell.real(0, 42)] }]) }] })],
    ['xls', buildXls({ sheets: [{ name: 'S', records: [biffCell.number(0, 0, 42)] }] })],
    ['ods', buildOds({ body: table('S', `<table:table-row>${floatCell(42)}</table:table-row>`) })],
  ])('should read the same sheet from %s', (format, bytes) => {
    const workbook = openWorkbook(bytes);
    expect(workbook.format).toBe(format);
    expect(workbook.sheetNames()).toEqual(['S']);
    expect(plainRows(drain(workbook.openSheet('S')).rows)).toEqual([[0, [42]]]);
  });

  it('should keep reporting the end once a sheet is exhausted', () => {
    const cursor = openWorkbook(twoSheets()).openSheet('Sheet1');
    expect(drain(cursor).rows).toHaveLength(2);
    expect(cursor.nextRow()).toEqual({ kind: 'end' });
    expect(cursor.nextRow()).toEqual({ kind: 'end' });
  });

  it('should give each cursor its own position', () => {
    const workbook = openWorkbook(twoSheets());
    const first = workbook.openSheet(0);
    expect(first.nextRow()).toMatchObject({ kind: 'row', row: { index: 0 } });
    const second = workbook.openSheet(0);
    expect(second.nextRow()).toMatchObject({ kind: 'row', row: { index: 0 } });
    expect(first.nextRow()).toMatchObject({ kind: 'row', row: { index: 1 } });
    expect(plainRows(drain(workbook.openSheet('Sheet2')).rows)).toEqual([[0, [10]]]);
  });

  it('should return the same metadata on every call', () => {
    const workbook = openWorkbook(twoSheets());
    expect(workbook.sheetsMetadata()).toEqual(workbook.sheetsMetadata());
    expect(workbook.sheetMetadata(1)).toEqual(workbook.sheetsMetadata()[1]);
  });

  it('should reject unknown sheets', () => {
    const workbook = openWorkbook(twoSheets());
    expect(() => workbook.openSheet('Missing')).toThrow(SheetNotFoundError);
    expect(() => workbook.sheetMetadata(5)).toThrow(SheetNotFoundError);
  });

  it('should end open cursors and refuse calls once closed', () => {
    const workbook = openWorkbook(twoSheets());
    const cursor = workbook.openSheet(0);
    workbook.close();
    expect(workbook.isClosed).toBe(true);
    expect(cursor.nextRow()).toEqual({ kind: 'end' });
    expect(() => workbook.sheetNames()).toThrow(WorkbookClosedError);
    expect(() => workbook.openSheet(0)).toThrow(WorkbookClosedError);
  });

  it('should describe the source it was opened from', () => {
    const bytes = twoSheets();
    const { source } = openWorkbook(bytes);
    expect(source.fileSize).toBe(bytes.length);
    expect(source.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(source.path).toBeUndefined();
  });

  it('should validate options before reading', () => {
    expect(() => openWorkbook(twoSheets(), { chunkSize: 0 })).toThrow(SourceRejectedError);
    expect(tryOpenWorkbook(twoSheets(), { chunkSize: 1.5, maxFileSize: -1 })).toEqual({
      success: false,
      code: 'SOURCE_REJECTED',
      errors: ['chunkSize must be a positive integer (got 1.5)', 'maxFileSize must be positive (got -1)'],
    });
  });

  it('should report unrecognized bytes as a result value', () => {
    const result = tryOpenWorkbook(new TextEncoder().encode('just some text'));
    expect(result).toEqual({ success: false, code: 'UNSUPPORTED_FORMAT', errors: ['Unrecognized file signature'] });
  });

  it('should report broken package relationships as a malformed container', () => {
    const bytes = packZip({
      '[Content_Types].xml': '<Types/>',
      '_rels/.rels': '<Relationships><Relationship Id="r1"',
      'xl/workbook.xml': '<workbook/>',
    });
    expect(tryOpenWorkbook(bytes)).toMatchObject({ success: false, code: 'MALFORMED_CONTAINER' });
    expect(() => openWorkbook(bytes)).toThrow(MalformedContainerError);
  });
});

describe('openWorkbook from a path', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetwise-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read a workbook file and record its path', () => {
    const file = path.join(dir, 'book.xlsx');
    fs.writeFileSync(file, twoSheets());
    const workbook = openWorkbook(file);
    expect(workbook.source.path).toBe(file);
    expect(workbook.sheetNames()).toEqual(['Sheet1', 'Sheet2']);
  });

  it('should reject other extensions unless the check is off', () => {
    const file = path.join(dir, 'book.txt');
    fs.writeFileSync(file, twoSheets());
    expect(tryOpenWorkbook(file)).toEqual({
      success: false,
      code: 'SOURCE_REJECTED',
      errors: ['Unsupported file extension: .txt'],
    });
    expect(openWorkbook(file, { checkExtension: false }).format).toBe('xlsx');
  });
});
