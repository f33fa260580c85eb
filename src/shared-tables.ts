import { DecodeErrorCode, errorCell, floatCell, intCell, stringCell } from './cell-value';
import type { CellValue } from './cell-value';
import { serialToDateCell, serialToDurationCell } from './date-serial';
import { classifyBuiltinFormat, classifyFormatCode, isTemporal } from './number-formats';
import type { FormatClass } from './number-formats';
import type { DateEpoch, DecodeWarning } from './types';

const DEFAULT_WARNING_LIMIT = 10_000;

/** Append-only diagnostics shared by a workbook and every cursor it opens. */
export class WarningLog {
  private readonly entries: DecodeWarning[] = [];
  private dropped = 0;

  constructor(private readonly limit: number = DEFAULT_WARNING_LIMIT) {}

  add(warning: DecodeWarning): void {
    if (this.entries.length < this.limit) {
      this.entries.push(warning);
    } else {
      this.dropped++;
    }
  }

  list(): DecodeWarning[] {
    if (this.dropped === 0) return [...this.entries];
    return [
      ...this.entries,
      { code: 'WARNINGS_DROPPED', message: `${this.dropped} further warnings were not recorded` },
    ];
  }

  get size(): number {
    return this.entries.length + this.dropped;
  }
}

export interface NumberFormat {
  id: number;
  code: string | null;
  kind: FormatClass;
}

export type StyleLookup =
  | { ok: true; format: NumberFormat }
  | { ok: false; code: string; detail: string };

/**
 * Strings, number formats and style→format assignments of one workbook.
 * Ids are the ones written in the file; nothing is renumbered.
 */
export class SharedResourceTables {
  constructor(
    private readonly strings: readonly string[],
    private readonly formats: ReadonlyMap<number, NumberFormat>,
    private readonly styleFormats: readonly number[],
    readonly epoch: DateEpoch,
  ) {}

  get stringCount(): number {
    return this.strings.length;
  }

  get styleCount(): number {
    return this.styleFormats.length;
  }

  sharedString(index: number): string | undefined {
    return Number.isInteger(index) && index >= 0 ? this.strings[index] : undefined;
  }

  numberFormat(id: number): NumberFormat | undefined {
    const custom = this.formats.get(id);
    if (custom) return custom;
    const kind = classifyBuiltinFormat(id);
    return kind === undefined ? undefined : { id, code: null, kind };
  }

  formatForStyle(styleIndex: number): StyleLookup {
    // a workbook without a style table formats everything as General
    if (this.styleFormats.length === 0 && styleIndex === 0) {
      return { ok: true, format: { id: 0, code: null, kind: 'general' } };
    }
    const formatId = this.styleFormats[styleIndex];
    if (formatId === undefined) {
      return { ok: false, code: DecodeErrorCode.Style, detail: `style index ${styleIndex} is not defined` };
    }
    const format = this.numberFormat(formatId);
    if (!format) {
      return { ok: false, code: DecodeErrorCode.NumberFormat, detail: `number format ${formatId} is not defined` };
    }
    return { ok: true, format };
  }
}

export class SharedTablesBuilder {
  private readonly strings: string[] = [];
  private readonly formats = new Map<number, NumberFormat>();
  private readonly styleFormats: number[] = [];
  private epoch: DateEpoch = 1900;

  constructor(private readonly warnings: WarningLog) {}

  addString(value: string): void {
    this.strings.push(value);
  }

  get stringCount(): number {
    return this.strings.length;
  }

  addFormat(id: number, code: string): void {
    if (!Number.isInteger(id) || id < 0) {
      this.warnings.add({ code: 'BAD_NUMBER_FORMAT', message: `Skipped number format with id ${id}` });
      return;
    }
    this.formats.set(id, { id, code, kind: classifyFormatCode(code) });
  }

  addStyle(formatId: number): void {
    this.styleFormats.push(formatId);
  }

  setEpoch(epoch: DateEpoch): void {
    this.epoch = epoch;
  }

  build(): SharedResourceTables {
    return new SharedResourceTables(
      Object.freeze([...this.strings]),
      new Map(this.formats),
      Object.freeze([...this.styleFormats]),
      this.epoch,
    );
  }
}

/**
 * Turns raw cell payloads into `CellValue`s for one sheet, consulting the
 * shared tables and logging cell-level problems.
 */
export class CellResolver {
  constructor(
    private readonly tables: SharedResourceTables,
    private readonly warnings: WarningLog,
    private readonly sheet: string,
  ) {}

  number(value: number, styleIndex: number, row: number, col: number): CellValue {
    return this.numeric(value, styleIndex, row, col, false);
  }

  integer(value: number, styleIndex: number, row: number, col: number): CellValue {
    return this.numeric(value, styleIndex, row, col, true);
  }

  sharedString(index: number, row: number, col: number): CellValue {
    const value = this.tables.sharedString(index);
    if (value === undefined) {
      const detail = `shared string ${index} is outside a table of ${this.tables.stringCount}`;
      this.warn('BAD_STRING_INDEX', detail, row, col);
      return errorCell(DecodeErrorCode.SharedString, detail);
    }
    return stringCell(value);
  }

  malformed(detail: string, row: number, col: number): CellValue {
    this.warn('MALFORMED_CELL', detail, row, col);
    return errorCell(DecodeErrorCode.Malformed, detail);
  }

  warn(code: string, message: string, row?: number, col?: number): void {
    this.warnings.add({ code, message, sheet: this.sheet, row, col });
  }

  private numeric(value: number, styleIndex: number, row: number, col: number, isInt: boolean): CellValue {
    const lookup = this.tables.formatForStyle(styleIndex);
    if (!lookup.ok) {
      this.warn(lookup.code === DecodeErrorCode.Style ? 'BAD_STYLE_INDEX' : 'BAD_NUMBER_FORMAT', lookup.detail, row, col);
      return errorCell(lookup.code, lookup.detail);
    }
    const kind = lookup.format.kind;
    if (isTemporal(kind)) {
      const cell = serialToDateCell(value, this.tables.epoch, kind);
      if (cell.type === 'error') this.warn('DATE_OUT_OF_RANGE', cell.detail ?? cell.code, row, col);
      return cell;
    }
    if (kind === 'duration') {
      const cell = serialToDurationCell(value);
      if (cell.type === 'error') this.warn('DATE_OUT_OF_RANGE', cell.detail ?? cell.code, row, col);
      return cell;
    }
    return isInt ? intCell(value) : floatCell(value);
  }
}
