import * as XLSX from 'xlsx';
import type { CellAddress, Dimensions, MergedRange } from './types';

const CELL_REF = /^\$?[A-Z]{1,3}\$?\d{1,7}$/;

/** Parses an A1-style reference such as `B3` or `$B$3`. */
export function parseCellRef(ref: string): CellAddress | null {
  const upper = ref.trim().toUpperCase();
  if (!CELL_REF.test(upper)) return null;
  const { r, c } = XLSX.utils.decode_cell(upper.replace(/\$/g, ''));
  return r >= 0 && c >= 0 ? { row: r, col: c } : null;
}

/** Parses `A1:C3` (or a single cell) into an inclusive, normalized extent. */
export function parseRangeRef(ref: string): Dimensions | null {
  const parts = ref.trim().split(':');
  if (parts.length > 2) return null;
  const start = parseCellRef(parts[0]);
  const end = parts.length === 2 ? parseCellRef(parts[1]) : start;
  if (!start || !end) return null;
  return {
    start: { row: Math.min(start.row, end.row), col: Math.min(start.col, end.col) },
    end: { row: Math.max(start.row, end.row), col: Math.max(start.col, end.col) },
  };
}

export function formatCellRef(address: CellAddress, absolute = false): string {
  if (!absolute) return XLSX.utils.encode_cell({ r: address.row, c: address.col });
  return `$${XLSX.utils.encode_col(address.col)}$${XLSX.utils.encode_row(address.row)}`;
}

export function formatRangeRef(start: CellAddress, end: CellAddress, absolute = false): string {
  const from = formatCellRef(start, absolute);
  const to = formatCellRef(end, absolute);
  return from === to ? from : `${from}:${to}`;
}

export function columnName(col: number): string {
  return XLSX.utils.encode_col(col);
}

export function mergedRange(start: CellAddress, end: CellAddress): MergedRange {
  return { start, end, ref: `${formatCellRef(start)}:${formatCellRef(end)}` };
}

/** Quotes a sheet name for use in a reference when it is not a plain identifier. */
export function quoteSheetName(name: string): string {
  return /^[A-Za-z_][A-Za-z0-9_.]*$/.test(name) ? name : `'${name.replace(/'/g, "''")}'`;
}
