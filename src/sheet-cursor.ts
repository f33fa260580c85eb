import { EMPTY, isEmpty } from './cell-value';
import type { CellValue } from './cell-value';
import { MalformedContainerError, SheetTruncatedError, StreamFramingError, errorMessage } from './errors';
import type { WarningLog } from './shared-tables';
import type { Row } from './types';

export type RowResult =
  | { kind: 'row'; row: Row }
  | { kind: 'end' }
  | { kind: 'truncated'; error: SheetTruncatedError };

type CursorStatus = 'streaming' | 'ended' | 'truncated' | 'closed';

const END: RowResult = { kind: 'end' };

/** Widest row any supported format can address (XFD). */
export const MAX_COLUMNS = 16_384;

/**
 * Stores a decoded cell at its column, padding the gap with empty cells.
 * Returns `false` for a column no format can address.
 */
export function placeCell(row: Row, col: number, value: CellValue): boolean {
  if (!Number.isInteger(col) || col < 0 || col >= MAX_COLUMNS) return false;
  while (row.cells.length < col) row.cells.push(EMPTY);
  row.cells[col] = value;
  return true;
}

/**
 * Lazy, forward-only producer of the rows of one sheet. Decoders supply
 * `readRow`; this class owns the end/truncation states, drops trailing
 * empty cells and all-empty rows, and keeps row indices increasing.
 */
export abstract class SheetCursor implements Iterable<Row> {
  private status: CursorStatus = 'streaming';
  private lastIndex = -1;
  private truncation: RowResult | null = null;

  constructor(
    readonly sheet: string,
    protected readonly warnings: WarningLog,
  ) {}

  get finished(): boolean {
    return this.status !== 'streaming';
  }

  nextRow(): RowResult {
    if (this.status === 'truncated' && this.truncation) return this.truncation;
    if (this.status !== 'streaming') return END;

    try {
      for (;;) {
        const row = this.readRow();
        if (row === null) {
          this.finish('ended');
          return END;
        }
        while (row.cells.length > 0 && isEmpty(row.cells[row.cells.length - 1])) {
          row.cells.pop();
        }
        if (row.cells.length === 0) continue;
        if (row.index <= this.lastIndex) {
          this.warnings.add({
            code: 'ROW_OUT_OF_ORDER',
            message: `Row ${row.index} follows row ${this.lastIndex} and was skipped`,
            sheet: this.sheet,
            row: row.index,
          });
          continue;
        }
        this.lastIndex = row.index;
        return { kind: 'row', row };
      }
    } catch (error) {
      if (error instanceof StreamFramingError || error instanceof MalformedContainerError) {
        const truncated = new SheetTruncatedError(this.sheet, errorMessage(error), { cause: error });
        this.truncation = { kind: 'truncated', error: truncated };
        this.finish('truncated');
        return this.truncation;
      }
      throw error;
    }
  }

  /** Releases the cursor's read state; a closed cursor reports end of sheet. */
  close(): void {
    if (this.status === 'streaming') this.finish('closed');
  }

  *[Symbol.iterator](): Iterator<Row> {
    for (;;) {
      const result = this.nextRow();
      if (result.kind === 'end') return;
      if (result.kind === 'truncated') throw result.error;
      yield result.row;
    }
  }

  /** Decodes the next row of the stream, or returns `null` at the end of the sheet. */
  protected abstract readRow(): Row | null;

  /** Drops parser state and buffers. */
  protected abstract release(): void;

  private finish(status: CursorStatus): void {
    this.status = status;
    this.release();
  }
}
