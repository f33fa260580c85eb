import type { CellValue } from './cell-value';

export type SpreadsheetFormat = 'xls' | 'xlsx' | 'xlsb' | 'ods';

export type DateEpoch = 1900 | 1904;

export type SheetVisibility = 'visible' | 'hidden' | 'veryHidden';

export type SheetType = 'worksheet' | 'dialogsheet' | 'macrosheet' | 'chartsheet' | 'vba';

/** A sheet is addressed either by its zero-based index or by its name. */
export type SheetRef = number | string;

export interface CellAddress {
  row: number;
  col: number;
}

export interface Dimensions {
  start: CellAddress;
  end: CellAddress;
}

export interface SheetMetadata {
  name: string;
  index: number;
  type: SheetType;
  visibility: SheetVisibility;
  /** Declared extent of the sheet, `null` when the source does not declare one. */
  dimensions: Dimensions | null;
}

export interface MergedRange {
  start: CellAddress;
  end: CellAddress;
  ref: string;
}

export interface DefinedName {
  name: string;
  reference: string;
  /** Name of the sheet the definition is local to, `null` for workbook scope. */
  scope: string | null;
  hidden: boolean;
}

export interface DecodeWarning {
  code: string;
  message: string;
  sheet?: string;
  row?: number;
  col?: number;
}

export interface Row {
  index: number;
  cells: CellValue[];
}

export interface OpenOptions {
  /** Largest file accepted when opening by path, in bytes. */
  maxFileSize?: number;
  /** Reject paths whose extension is not a known spreadsheet extension. */
  checkExtension?: boolean;
  /** Number of bytes handed to the XML parser per pull. */
  chunkSize?: number;
}

export type ResolvedOpenOptions = Required<OpenOptions>;

export interface SourceInfo {
  path?: string;
  fileSize: number;
  hash: string;
}

export interface ReadRowsOptions {
  /** Stop after this many rows of the resulting grid. */
  nrows?: number;
  /** Start the grid at the first populated cell instead of A1. */
  skipEmptyArea?: boolean;
}

export interface CellEntry {
  row: number;
  col: number;
  value: CellValue;
}
