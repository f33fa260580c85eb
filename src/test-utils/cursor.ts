import { toPlainValue } from '../cell-value';
import type { PlainValue } from '../cell-value';
import type { RowResult, SheetCursor } from '../sheet-cursor';
import type { Row } from '../types';

export interface Drained {
  rows: Row[];
  /** The result that ended the pull loop: `end` or `truncated`. */
  outcome: Exclude<RowResult, { kind: 'row' }>;
}

export function drain(cursor: SheetCursor): Drained {
  const rows: Row[] = [];
  for (;;) {
    const result = cursor.nextRow();
    if (result.kind !== 'row') return { rows, outcome: result };
    rows.push(result.row);
  }
}

/** Rows as `[index, plain values]` pairs, for compact assertions. */
export function plainRows(rows: Row[]): Array<[number, PlainValue[]]> {
  return rows.map((row) => [row.index, row.cells.map(toPlainValue)]);
}
