import { EMPTY, binaryErrorCell, boolCell, stringCell } from '../../cell-value';
import type { CellValue } from '../../cell-value';
import { mergedRange } from '../../cell-ref';
import { ByteReader, decodeLatin1 } from '../../container/byte-reader';
import { BiffRecordStream } from '../../container/record-stream';
import type { BinaryRecord } from '../../container/record-stream';
import { StreamFramingError, WorkbookOpenError } from '../../errors';
import { CellResolver, SharedTablesBuilder } from '../../shared-tables';
import type { SharedResourceTables } from '../../shared-tables';
import { SheetCursor, placeCell } from '../../sheet-cursor';
import type { Dimensions, MergedRange, Row } from '../../types';
import { BaseDecoder } from '../decoder';
import type { DecoderContext, ParsedHeader, SheetDescriptor } from '../decoder';
import { decodeRk } from '../rk-number';
import { resolveDefinedNames } from '../xlsx/xlsx-decoder';
import { readLongString } from './biff-strings';
import type { BiffText } from './biff-strings';
import { parseGlobals } from './globals';
import { Biff } from './records';

const CELL_RECORDS = new Set<number>([
  Biff.Blank,
  Biff.MulBlank,
  Biff.Number,
  Biff.Rk,
  Biff.MulRk,
  Biff.Label,
  Biff.RString,
  Biff.LabelSst,
  Biff.BoolErr,
  Biff.Formula,
]);

/** Records that may sit between a FORMULA and the STRING carrying its cached text. */
const FORMULA_COMPANIONS = new Set<number>([Biff.ShrFmla, Biff.Array, Biff.Table]);

/**
 * Visits the records of one sheet substream, skipping nested substreams
 * such as embedded charts. `visit` returns `true` to stop early.
 */
function walkSheet(bytes: Uint8Array, offset: number, visit: (record: BinaryRecord) => boolean): void {
  const stream = new BiffRecordStream(bytes);
  stream.seek(offset);
  const bof = stream.next();
  if (!bof || bof.type !== Biff.Bof) throw new StreamFramingError('Sheet does not start with a BOF record', offset);
  let depth = 0;
  for (;;) {
    const record = stream.next();
    if (record === null) throw new StreamFramingError('Sheet ends without an EOF record', stream.position);
    if (record.type === Biff.Bof) depth++;
    else if (record.type === Biff.Eof) {
      if (depth === 0) return;
      depth--;
    } else if (depth === 0 && visit(record)) return;
  }
}

/** BIFF5/BIFF8 workbook stream, from a compound file or a bare BIFF file. */
export class XlsDecoder extends BaseDecoder<number> {
  readonly format = 'xls';
  private text: BiffText = { version: 8, decode8: decodeLatin1 };

  constructor(
    private readonly bytes: Uint8Array,
    context: DecoderContext,
  ) {
    super(context);
  }

  protected parseHeader(): ParsedHeader<number> {
    const { warnings } = this.context;
    const builder = new SharedTablesBuilder(warnings);
    const globals = parseGlobals(this.bytes, builder, warnings);
    builder.setEpoch(globals.date1904 ? 1904 : 1900);
    this.text = globals.text;

    const seen = new Set<string>();
    const sheets = globals.sheets.map((entry, index) => {
      if (seen.has(entry.name)) throw new WorkbookOpenError(`Duplicate sheet name "${entry.name}"`);
      seen.add(entry.name);
      return {
        descriptor: { name: entry.name, index, type: entry.type, visibility: entry.visibility },
        locator: entry.offset,
      };
    });
    const definedNames = resolveDefinedNames(
      globals.definedNames,
      globals.sheets.map((entry) => entry.name),
      (name, id) =>
        warnings.add({ code: 'BAD_NAME_SCOPE', message: `Defined name "${name}" refers to missing sheet ${id}` }),
    );
    return { sheets, definedNames, tables: builder.build() };
  }

  protected createCursor(sheet: SheetDescriptor, offset: number, tables: SharedResourceTables): SheetCursor {
    return new XlsSheetCursor(
      sheet.name,
      sheet.type === 'vba' ? null : this.bytes,
      offset,
      new CellResolver(tables, this.context.warnings, sheet.name),
      this.text,
      this.context,
    );
  }

  protected scanDimensions(sheet: SheetDescriptor, offset: number): Dimensions | null {
    if (sheet.type === 'vba') return null;
    const found: { extent: Dimensions | null } = { extent: null };
    walkSheet(this.bytes, offset, (record) => {
      if (CELL_RECORDS.has(record.type)) return true;
      if (record.type !== Biff.Dimensions) return false;
      const reader = new ByteReader(record.data);
      const firstRow = this.text.version === 8 ? reader.u32() : reader.u16();
      const rowLimit = this.text.version === 8 ? reader.u32() : reader.u16();
      const firstCol = reader.u16();
      const colLimit = reader.u16();
      // the upper bounds are exclusive; an empty sheet declares nothing
      if (rowLimit > firstRow && colLimit > firstCol) {
        found.extent = { start: { row: firstRow, col: firstCol }, end: { row: rowLimit - 1, col: colLimit - 1 } };
      }
      return true;
    });
    return found.extent;
  }

  protected scanMergedRanges(sheet: SheetDescriptor, offset: number): MergedRange[] {
    const ranges: MergedRange[] = [];
    if (sheet.type === 'vba') return ranges;
    walkSheet(this.bytes, offset, (record) => {
      if (record.type !== Biff.MergedCells) return false;
      const reader = new ByteReader(record.data);
      const count = reader.u16();
      for (let i = 0; i < count; i++) {
        const firstRow = reader.u16();
        const lastRow = reader.u16();
        const firstCol = reader.u16();
        const lastCol = reader.u16();
        ranges.push(mergedRange({ row: firstRow, col: firstCol }, { row: lastRow, col: lastCol }));
      }
      return false;
    });
    return ranges;
  }
}

/**
 * Groups the cell records of a sheet substream into rows. A row is
 * complete when a cell of another row shows up; that record stays in
 * the stream's lookahead for the next pull.
 */
class XlsSheetCursor extends SheetCursor {
  private stream: BiffRecordStream | null;
  private current: Row | null = null;
  private started = false;
  private depth = 0;
  private failure: StreamFramingError | null = null;

  constructor(
    sheet: string,
    bytes: Uint8Array | null,
    private readonly offset: number,
    private readonly resolver: CellResolver,
    private readonly text: BiffText,
    context: DecoderContext,
  ) {
    super(sheet, context.warnings);
    this.stream = bytes ? new BiffRecordStream(bytes) : null;
  }

  protected readRow(): Row | null {
    if (this.failure) throw this.failure;
    try {
      return this.readRecords();
    } catch (error) {
      if (!(error instanceof StreamFramingError) || !this.current) throw error;
      // cells read from complete records come out before the truncation
      this.failure = error;
      this.stream = null;
      return this.flush();
    }
  }

  private readRecords(): Row | null {
    const stream = this.stream;
    if (!stream) return null;
    if (!this.started) {
      stream.seek(this.offset);
      const bof = stream.next();
      if (!bof || bof.type !== Biff.Bof) throw new StreamFramingError('Sheet does not start with a BOF record', this.offset);
      this.started = true;
    }

    for (;;) {
      const record = stream.peek();
      if (record === null) throw new StreamFramingError('Sheet ends without an EOF record', stream.position);
      if (this.depth > 0 || record.type === Biff.Bof || record.type === Biff.Eof) {
        stream.next();
        if (record.type === Biff.Bof) {
          this.depth++;
        } else if (record.type === Biff.Eof) {
          if (this.depth === 0) {
            this.stream = null;
            return this.flush();
          }
          this.depth--;
        }
        continue;
      }
      if (!CELL_RECORDS.has(record.type)) {
        stream.next();
        continue;
      }
      if (record.data.length < 4) {
        stream.next();
        this.resolver.warn('MALFORMED_CELL', `Cell record at offset ${record.offset} is too short`);
        continue;
      }
      const rowIndex = record.data[0] | (record.data[1] << 8);
      if (this.current && this.current.index !== rowIndex) return this.flush();
      stream.next();
      const row = this.current ?? { index: rowIndex, cells: [] };
      this.current = row;
      this.readCell(record, row, stream);
    }
  }

  protected release(): void {
    this.stream = null;
    this.current = null;
  }

  private flush(): Row | null {
    const row = this.current;
    this.current = null;
    return row;
  }

  private readCell(record: BinaryRecord, row: Row, stream: BiffRecordStream): void {
    const reader = new ByteReader(record.data);
    reader.u16();
    const col = reader.u16();
    try {
      if (record.type === Biff.MulRk) {
        this.readMulRk(reader, row, col);
        return;
      }
      if (record.type === Biff.Blank || record.type === Biff.MulBlank) return;
      this.place(row, col, this.decodeCell(record.type, reader, row.index, col, stream));
    } catch (error) {
      if (!(error instanceof StreamFramingError)) throw error;
      this.place(row, col, this.resolver.malformed(error.message, row.index, col));
    }
  }

  private readMulRk(reader: ByteReader, row: Row, firstCol: number): void {
    // (style, rk) pairs followed by the last column
    const count = Math.floor((reader.remaining - 2) / 6);
    for (let i = 0; i < count; i++) {
      const style = reader.u16();
      this.place(row, firstCol + i, this.rkCell(reader.u32(), style, row.index, firstCol + i));
    }
  }

  private decodeCell(type: number, reader: ByteReader, rowIndex: number, col: number, stream: BiffRecordStream): CellValue {
    const style = reader.u16();
    switch (type) {
      case Biff.Number:
        return this.resolver.number(reader.f64(), style, rowIndex, col);
      case Biff.Rk:
        return this.rkCell(reader.u32(), style, rowIndex, col);
      case Biff.Label:
      case Biff.RString:
        return stringCell(readLongString(reader, this.text));
      case Biff.LabelSst:
        return this.resolver.sharedString(reader.u32(), rowIndex, col);
      case Biff.BoolErr: {
        const value = reader.u8();
        return reader.u8() === 0 ? boolCell(value !== 0) : binaryErrorCell(value);
      }
      case Biff.Formula:
        return this.formulaResult(reader.take(8), style, rowIndex, col, stream);
      default:
        return this.resolver.malformed(`unexpected cell record 0x${type.toString(16)}`, rowIndex, col);
    }
  }

  private rkCell(rk: number, style: number, rowIndex: number, col: number): CellValue {
    const decoded = decodeRk(rk);
    return decoded.isInt
      ? this.resolver.integer(decoded.value, style, rowIndex, col)
      : this.resolver.number(decoded.value, style, rowIndex, col);
  }

  /** Cached result of a FORMULA record; a string result arrives in the next STRING record. */
  private formulaResult(value: Uint8Array, style: number, rowIndex: number, col: number, stream: BiffRecordStream): CellValue {
    if (value[6] !== 0xff || value[7] !== 0xff) {
      return this.resolver.number(new ByteReader(value).f64(), style, rowIndex, col);
    }
    switch (value[0]) {
      case 0: {
        const text = this.followingString(stream);
        if (text === null) {
          this.resolver.warn('MISSING_FORMULA_STRING', 'Formula string result has no STRING record', rowIndex, col);
          return EMPTY;
        }
        return stringCell(text);
      }
      case 1:
        return boolCell(value[2] !== 0);
      case 2:
        return binaryErrorCell(value[2]);
      case 3:
        return stringCell('');
      default:
        return this.resolver.malformed(`formula result type ${value[0]}`, rowIndex, col);
    }
  }

  private followingString(stream: BiffRecordStream): string | null {
    for (let record = stream.peek(); record !== null; record = stream.peek()) {
      if (FORMULA_COMPANIONS.has(record.type)) {
        stream.next();
        continue;
      }
      if (record.type !== Biff.String) return null;
      stream.next();
      return readLongString(new ByteReader(record.data), this.text);
    }
    return null;
  }

  private place(row: Row, col: number, value: CellValue): void {
    if (!placeCell(row, col, value)) {
      this.resolver.warn('BAD_CELL_POSITION', `Column ${col} is outside the sheet`, row.index);
    }
  }
}
