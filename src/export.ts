import * as yaml from 'js-yaml';
import { EMPTY, cellToText, toPlainValue } from './cell-value';
import type { CellValue, PlainValue } from './cell-value';
import { columnName } from './cell-ref';
import type { SheetCursor } from './sheet-cursor';
import type { CellEntry, ReadRowsOptions, Row, SheetRef } from './types';
import type { Workbook } from './workbook';

export type ExportFormat = 'json' | 'csv' | 'tsv' | 'yaml' | 'markdown';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'tsv', 'yaml', 'markdown'];

export interface ExportOptions extends ReadRowsOptions {
  /** Rows shown in a markdown preview. */
  previewRows?: number;
}

const MARKDOWN_PREVIEW_ROWS = 20;
const MARKDOWN_CELL_WIDTH = 50;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** Yields every non-empty cell of the remaining rows with its position. */
export function* iterateCells(cursor: SheetCursor): Generator<CellEntry> {
  for (const row of cursor) {
    for (let col = 0; col < row.cells.length; col++) {
      const value = row.cells[col];
      if (value.type !== 'empty') yield { row: row.index, col, value };
    }
  }
}

/**
 * Materializes a sheet as a dense grid. By default the grid starts at the
 * first populated row and column; with `skipEmptyArea: false` it starts
 * at A1. `nrows` caps the number of grid rows.
 */
export function readRows(workbook: Workbook, ref: SheetRef, options: ReadRowsOptions = {}): CellValue[][] {
  const { nrows, skipEmptyArea = true } = options;
  if (nrows !== undefined && nrows <= 0) return [];

  const rows: Row[] = [];
  const cursor = workbook.openSheet(ref);
  try {
    for (const row of cursor) {
      const firstRow = skipEmptyArea ? rows[0]?.index ?? row.index : 0;
      if (nrows !== undefined && row.index - firstRow >= nrows) break;
      rows.push(row);
    }
  } finally {
    cursor.close();
  }
  if (rows.length === 0) return [];

  const firstRow = skipEmptyArea ? rows[0].index : 0;
  let firstCol = Infinity;
  let width = 0;
  for (const row of rows) {
    width = Math.max(width, row.cells.length);
    const populated = row.cells.findIndex((cell) => cell.type !== 'empty');
    if (populated !== -1) firstCol = Math.min(firstCol, populated);
  }
  if (!skipEmptyArea || firstCol === Infinity) firstCol = 0;

  const lastRow = rows[rows.length - 1].index;
  const height = nrows === undefined ? lastRow - firstRow + 1 : Math.min(nrows, lastRow - firstRow + 1);
  const grid: CellValue[][] = Array.from({ length: height }, () => new Array<CellValue>(width - firstCol).fill(EMPTY));
  for (const row of rows) {
    const target = grid[row.index - firstRow];
    if (!target) continue;
    for (let col = firstCol; col < row.cells.length; col++) target[col - firstCol] = row.cells[col];
  }
  return grid;
}

function plainGrid(grid: CellValue[][]): PlainValue[][] {
  return grid.map((row) => row.map(toPlainValue));
}

function delimited(grid: CellValue[][], delimiter: string): string {
  return grid
    .map((row) => row.map((cell) => `"${cellToText(cell).replace(/"/g, '""')}"`).join(delimiter))
    .join('\n');
}

function markdown(sheet: string, grid: CellValue[][], previewRows: number): string {
  let output = `## Sheet: ${sheet}\n\n`;
  if (grid.length === 0) return `${output}*No data in this sheet*\n`;

  if (grid.length > previewRows) {
    output += `*Showing first ${previewRows} rows of ${grid.length} total rows*\n\n`;
  }
  const shown = grid.slice(0, previewRows);
  const columnCount = Math.max(...shown.map((row) => row.length));
  const headers = Array.from({ length: columnCount }, (_, i) => columnName(i));
  output += `| ${headers.join(' | ')} |\n`;
  output += `| ${headers.map(() => '---').join(' | ')} |\n`;
  for (const row of shown) {
    const values = Array.from({ length: columnCount }, (_, i) => {
      const text = cellToText(row[i] ?? EMPTY);
      const truncated = text.length > MARKDOWN_CELL_WIDTH ? `${text.slice(0, MARKDOWN_CELL_WIDTH)}...` : text;
      return truncated.replace(/\|/g, '\\|').replace(/\n/g, ' ');
    });
    output += `| ${values.join(' | ')} |\n`;
  }
  return output;
}

/** Renders one sheet in a text format. */
export function exportSheet(workbook: Workbook, ref: SheetRef, format: ExportFormat, options: ExportOptions = {}): string {
  const { name } = workbook.sheetMetadata(ref);
  const grid = readRows(workbook, ref, options);
  switch (format) {
    case 'json':
      return JSON.stringify({ sheet: name, rows: plainGrid(grid) }, null, 2);
    case 'csv':
      return delimited(grid, ',');
    case 'tsv':
      return delimited(grid, '\t');
    case 'yaml':
      return yaml.dump({ sheet: name, rows: plainGrid(grid) });
    case 'markdown':
      return markdown(name, grid, options.previewRows ?? MARKDOWN_PREVIEW_ROWS);
  }
}

/**
 * Renders the whole workbook. Structured formats and markdown cover every
 * sheet; delimited formats hold one table, so they take the first sheet.
 */
export function exportWorkbook(workbook: Workbook, format: ExportFormat, options: ExportOptions = {}): string {
  const names = workbook.sheetNames();
  switch (format) {
    case 'csv':
    case 'tsv':
      return names.length === 0 ? '' : exportSheet(workbook, 0, format, options);
    case 'json':
    case 'yaml': {
      const sheets = names.map((sheet) => ({ sheet, rows: plainGrid(readRows(workbook, sheet, options)) }));
      return format === 'json' ? JSON.stringify(sheets, null, 2) : yaml.dump(sheets);
    }
    case 'markdown':
      return names.map((sheet) => exportSheet(workbook, sheet, 'markdown', options)).join('\n');
  }
}
