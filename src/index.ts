export { openWorkbook, tryOpenWorkbook, Workbook, DEFAULT_OPEN_OPTIONS } from './workbook';
export type { OpenResult } from './workbook';
export { SheetCursor } from './sheet-cursor';
export type { RowResult } from './sheet-cursor';
export { readRows, iterateCells, exportSheet, exportWorkbook, isExportFormat, EXPORT_FORMATS } from './export';
export type { ExportFormat, ExportOptions } from './export';
export { toPlainValue, cellToText, isEmpty, DecodeErrorCode } from './cell-value';
export type { CellValue, CellValueType, DateTimeKind, PlainValue } from './cell-value';
export { parseCellRef, parseRangeRef, formatCellRef, formatRangeRef } from './cell-ref';
export * from './errors';
export * from './types';
