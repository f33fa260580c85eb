import { EMPTY, binaryErrorCell, boolCell, stringCell } from '../../cell-value';
import type { CellValue } from '../../cell-value';
import { mergedRange } from '../../cell-ref';
import { ByteReader } from '../../container/byte-reader';
import type { EntryContainer } from '../../container/container-reader';
import { XlsbRecordStream } from '../../container/record-stream';
import type { BinaryRecord } from '../../container/record-stream';
import { StreamFramingError, WorkbookOpenError } from '../../errors';
import { CellResolver, SharedTablesBuilder } from '../../shared-tables';
import type { SharedResourceTables } from '../../shared-tables';
import { SheetCursor, placeCell } from '../../sheet-cursor';
import type { Dimensions, MergedRange, Row } from '../../types';
import { BaseDecoder } from '../decoder';
import type { DecoderContext, ParsedHeader, SheetDescriptor } from '../decoder';
import { decodeRk } from '../rk-number';
import { PartRelationships } from '../xlsx/relationships';
import { REL_SHARED_STRINGS, REL_STYLES, resolveDefinedNames, sheetTypeFromRelationship } from '../xlsx/xlsx-decoder';
import { parseBinarySharedStrings, parseBinaryStyles, parseBinaryWorkbook } from './parts';
import { Brt } from './records';

const CELL_RECORDS = new Set<number>([
  Brt.CellBlank,
  Brt.CellRk,
  Brt.CellError,
  Brt.CellBool,
  Brt.CellReal,
  Brt.CellSt,
  Brt.CellIsst,
  Brt.FmlaString,
  Brt.FmlaNum,
  Brt.FmlaBool,
  Brt.FmlaError,
  Brt.CellRString,
]);

export class XlsbDecoder extends BaseDecoder<string> {
  readonly format = 'xlsb';

  constructor(
    private readonly archive: EntryContainer,
    private readonly workbookPart: string,
    context: DecoderContext,
  ) {
    super(context);
  }

  protected parseHeader(): ParsedHeader<string> {
    const { warnings } = this.context;
    const workbook = parseBinaryWorkbook(this.archive.readEntry(this.workbookPart), warnings);
    const rels = new PartRelationships(this.archive, this.workbookPart);

    const builder = new SharedTablesBuilder(warnings);
    builder.setEpoch(workbook.date1904 ? 1904 : 1900);
    const sharedStringsPart = rels.related(REL_SHARED_STRINGS, 'xl/sharedStrings.bin');
    if (sharedStringsPart) parseBinarySharedStrings(this.archive.readEntry(sharedStringsPart), builder, warnings);
    const stylesPart = rels.related(REL_STYLES, 'xl/styles.bin');
    if (stylesPart) parseBinaryStyles(this.archive.readEntry(stylesPart), builder);

    const sheets: ParsedHeader<string>['sheets'] = [];
    const seen = new Set<string>();
    for (const entry of workbook.sheets) {
      const rel = entry.relationshipId === null ? undefined : rels.get(entry.relationshipId);
      if (!rel) {
        warnings.add({ code: 'MISSING_SHEET_PART', message: `Sheet "${entry.name}" has no relationship`, sheet: entry.name });
        continue;
      }
      if (seen.has(entry.name)) throw new WorkbookOpenError(`Duplicate sheet name "${entry.name}"`);
      seen.add(entry.name);
      sheets.push({
        descriptor: {
          name: entry.name,
          index: sheets.length,
          type: sheetTypeFromRelationship(rel.type),
          visibility: entry.visibility,
        },
        locator: rels.resolve(rel),
      });
    }

    const definedNames = resolveDefinedNames(
      workbook.definedNames,
      workbook.sheets.map((entry) => entry.name),
      (name, id) =>
        warnings.add({ code: 'BAD_NAME_SCOPE', message: `Defined name "${name}" refers to missing sheet ${id}` }),
    );
    return { sheets, definedNames, tables: builder.build() };
  }

  protected createCursor(sheet: SheetDescriptor, part: string, tables: SharedResourceTables): SheetCursor {
    return new XlsbSheetCursor(
      sheet.name,
      this.archive.readEntry(part),
      new CellResolver(tables, this.context.warnings, sheet.name),
      this.context,
    );
  }

  protected scanDimensions(_sheet: SheetDescriptor, part: string): Dimensions | null {
    const stream = new XlsbRecordStream(this.archive.readEntry(part));
    for (let record = stream.next(); record !== null; record = stream.next()) {
      if (record.type === Brt.BeginSheetData) return null;
      if (record.type !== Brt.WsDim) continue;
      const reader = new ByteReader(record.data);
      const firstRow = reader.u32();
      const lastRow = reader.u32();
      const firstCol = reader.u32();
      const lastCol = reader.u32();
      return { start: { row: firstRow, col: firstCol }, end: { row: lastRow, col: lastCol } };
    }
    return null;
  }

  protected scanMergedRanges(_sheet: SheetDescriptor, part: string): MergedRange[] {
    const ranges: MergedRange[] = [];
    const stream = new XlsbRecordStream(this.archive.readEntry(part));
    for (let record = stream.next(); record !== null; record = stream.next()) {
      if (record.type !== Brt.MergeCell) continue;
      const reader = new ByteReader(record.data);
      const firstRow = reader.u32();
      const lastRow = reader.u32();
      const firstCol = reader.u32();
      const lastCol = reader.u32();
      ranges.push(mergedRange({ row: firstRow, col: firstCol }, { row: lastRow, col: lastCol }));
    }
    return ranges;
  }
}

/**
 * Pulls records from a binary worksheet part until the next row header,
 * so a row is handed out once the following one starts.
 */
class XlsbSheetCursor extends SheetCursor {
  private stream: XlsbRecordStream | null;
  private current: Row | null = null;
  private inSheetData = false;

  constructor(
    sheet: string,
    bytes: Uint8Array,
    private readonly resolver: CellResolver,
    context: DecoderContext,
  ) {
    super(sheet, context.warnings);
    this.stream = new XlsbRecordStream(bytes);
  }

  protected readRow(): Row | null {
    const stream = this.stream;
    if (!stream) return null;
    for (;;) {
      const record = stream.next();
      if (record === null) {
        if (this.inSheetData) throw new StreamFramingError('Sheet data ends without an end-of-data record', stream.position);
        return this.flush();
      }
      switch (record.type) {
        case Brt.BeginSheetData:
          this.inSheetData = true;
          break;
        case Brt.EndSheetData:
          this.stream = null;
          return this.flush();
        case Brt.RowHdr: {
          const finished = this.current;
          this.current = { index: new ByteReader(record.data).u32(), cells: [] };
          if (finished) return finished;
          break;
        }
        default:
          if (CELL_RECORDS.has(record.type)) this.readCell(record);
      }
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

  private readCell(record: BinaryRecord): void {
    const row = this.current;
    if (!row) {
      this.resolver.warn('CELL_OUTSIDE_ROW', `Cell record at offset ${record.offset} precedes any row header`);
      return;
    }
    if (record.data.length < 8) {
      this.resolver.warn('MALFORMED_CELL', `Cell record at offset ${record.offset} is too short`, row.index);
      return;
    }
    const reader = new ByteReader(record.data);
    const col = reader.u32();
    const style = reader.u32() & 0xffffff;
    let value: CellValue;
    try {
      value = this.decodeCell(record.type, reader, style, row.index, col);
    } catch (error) {
      if (!(error instanceof StreamFramingError)) throw error;
      value = this.resolver.malformed(error.message, row.index, col);
    }
    if (!placeCell(row, col, value)) {
      this.resolver.warn('BAD_CELL_POSITION', `Column ${col} is outside the sheet`, row.index);
    }
  }

  private decodeCell(type: number, reader: ByteReader, style: number, row: number, col: number): CellValue {
    switch (type) {
      case Brt.CellBlank:
        return EMPTY;
      case Brt.CellRk: {
        const rk = decodeRk(reader.u32());
        return rk.isInt
          ? this.resolver.integer(rk.value, style, row, col)
          : this.resolver.number(rk.value, style, row, col);
      }
      case Brt.CellError:
      case Brt.FmlaError:
        return binaryErrorCell(reader.u8());
      case Brt.CellBool:
      case Brt.FmlaBool:
        return boolCell(reader.u8() !== 0);
      case Brt.CellReal:
      case Brt.FmlaNum:
        return this.resolver.number(reader.f64(), style, row, col);
      case Brt.CellSt:
      case Brt.FmlaString:
        return stringCell(reader.wideString());
      case Brt.CellRString:
        reader.u8(); // rich-text flags
        return stringCell(reader.wideString());
      case Brt.CellIsst:
        return this.resolver.sharedString(reader.u32(), row, col);
      default:
        return this.resolver.malformed(`unexpected cell record 0x${type.toString(16)}`, row, col);
    }
  }
}
