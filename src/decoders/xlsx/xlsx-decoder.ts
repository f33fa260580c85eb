import { EMPTY, boolCell, errorCell, stringCell } from '../../cell-value';
import type { CellValue } from '../../cell-value';
import { mergedRange, parseCellRef, parseRangeRef } from '../../cell-ref';
import type { EntryContainer } from '../../container/container-reader';
import { XmlEventSource, localName } from '../../container/xml-source';
import type { XmlElement } from '../../container/xml-source';
import { isoToDateCell } from '../../date-serial';
import { StreamFramingError, WorkbookOpenError } from '../../errors';
import { CellResolver, SharedTablesBuilder } from '../../shared-tables';
import type { SharedResourceTables } from '../../shared-tables';
import { SheetCursor, placeCell } from '../../sheet-cursor';
import type { DefinedName, Dimensions, MergedRange, Row, SheetType } from '../../types';
import { BaseDecoder } from '../decoder';
import type { DecoderContext, ParsedHeader, SheetDescriptor } from '../decoder';
import { parseSharedStrings, parseStyles, parseWorkbookPart, unescapeOoxml } from './parts';
import type { RawDefinedName } from './parts';
import { PartRelationships } from './relationships';

export const REL_SHARED_STRINGS = /\/sharedStrings$/;
export const REL_STYLES = /\/styles$/;

/** Sheet kind from the relationship type that points at the sheet part. */
export function sheetTypeFromRelationship(type: string): SheetType {
  if (/\/chartsheet$/.test(type)) return 'chartsheet';
  if (/\/dialogsheet$/.test(type)) return 'dialogsheet';
  if (/\/xl(Intl)?Macrosheet$/.test(type)) return 'macrosheet';
  return 'worksheet';
}

/** Converts workbook-level name records into `DefinedName`s, resolving local scope to a sheet name. */
export function resolveDefinedNames(
  raw: RawDefinedName[],
  sheetNames: readonly string[],
  onBadScope: (name: string, sheetId: number) => void,
): DefinedName[] {
  return raw.map((entry) => {
    let scope: string | null = null;
    if (entry.localSheetId !== null) {
      const sheet = sheetNames[entry.localSheetId];
      if (sheet !== undefined) scope = sheet;
      else onBadScope(entry.name, entry.localSheetId);
    }
    return { name: entry.name, reference: entry.formula, scope, hidden: entry.hidden };
  });
}

export class XlsxDecoder extends BaseDecoder<string> {
  readonly format = 'xlsx';

  constructor(
    private readonly archive: EntryContainer,
    private readonly workbookPart: string,
    context: DecoderContext,
  ) {
    super(context);
  }

  protected parseHeader(): ParsedHeader<string> {
    const { warnings, chunkSize } = this.context;
    const workbook = parseWorkbookPart(this.archive.readEntry(this.workbookPart), chunkSize);
    const rels = new PartRelationships(this.archive, this.workbookPart);

    const builder = new SharedTablesBuilder(warnings);
    builder.setEpoch(workbook.date1904 ? 1904 : 1900);
    const sharedStringsPart = rels.related(REL_SHARED_STRINGS, 'xl/sharedStrings.xml');
    if (sharedStringsPart) {
      parseSharedStrings(this.archive.readEntry(sharedStringsPart), builder, warnings, chunkSize);
    }
    const stylesPart = rels.related(REL_STYLES, 'xl/styles.xml');
    if (stylesPart) {
      parseStyles(this.archive.readEntry(stylesPart), builder, warnings, chunkSize);
    }

    const sheets: ParsedHeader<string>['sheets'] = [];
    const seen = new Set<string>();
    for (const entry of workbook.sheets) {
      const rel = rels.get(entry.relationshipId);
      if (!rel) {
        warnings.add({ code: 'MISSING_SHEET_PART', message: `Sheet "${entry.name}" has no relationship`, sheet: entry.name });
        continue;
      }
      if (seen.has(entry.name)) {
        throw new WorkbookOpenError(`Duplicate sheet name "${entry.name}"`);
      }
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
    return new XlsxSheetCursor(
      sheet.name,
      this.sheetBytes(part),
      new CellResolver(tables, this.context.warnings, sheet.name),
      this.context,
    );
  }

  protected scanDimensions(_sheet: SheetDescriptor, part: string): Dimensions | null {
    const found: { ref: string | null; stop: boolean } = { ref: null, stop: false };
    const source = new XmlEventSource(
      this.sheetBytes(part),
      {
        open(element) {
          const name = localName(element.name);
          if (name === 'dimension') {
            found.ref = element.attributes.ref ?? null;
            found.stop = true;
          } else if (name === 'sheetData') {
            found.stop = true;
          }
        },
      },
      this.context.chunkSize,
    );
    while (!found.stop && source.pump()) {
      // the dimension element precedes sheetData
    }
    source.stop();
    return found.ref === null ? null : parseRangeRef(found.ref);
  }

  protected scanMergedRanges(sheet: SheetDescriptor, part: string): MergedRange[] {
    const ranges: MergedRange[] = [];
    const warnings = this.context.warnings;
    new XmlEventSource(
      this.sheetBytes(part),
      {
        open(element) {
          if (localName(element.name) !== 'mergeCell') return;
          const ref = element.attributes.ref ?? '';
          const extent = parseRangeRef(ref);
          if (extent) ranges.push(mergedRange(extent.start, extent.end));
          else warnings.add({ code: 'BAD_MERGE_RANGE', message: `Unreadable merge range "${ref}"`, sheet: sheet.name });
        },
      },
      this.context.chunkSize,
    ).drain();
    return ranges;
  }

  private sheetBytes(part: string): Uint8Array {
    return this.archive.readEntry(part);
  }
}

interface PendingCell {
  col: number;
  type: string;
  style: number;
  value: string | null;
  inline: string;
}

/** Streams `sheetData` rows out of a worksheet part, parsing only as far as the requested row. */
class XlsxSheetCursor extends SheetCursor {
  private source: XmlEventSource | null;
  private readonly ready: Row[] = [];
  private current: Row | null = null;
  private cell: PendingCell | null = null;
  private capture: 'value' | 'inline' | null = null;
  private phoneticDepth = 0;
  private lastRow = -1;
  private lastCol = -1;
  private sheetDataDone = false;
  private failure: StreamFramingError | null = null;

  constructor(
    sheet: string,
    bytes: Uint8Array,
    private readonly resolver: CellResolver,
    context: DecoderContext,
  ) {
    super(sheet, context.warnings);
    this.source = new XmlEventSource(
      bytes,
      {
        open: (element) => this.onOpen(element),
        close: (name) => this.onClose(localName(name)),
        text: (text) => this.onText(text),
      },
      context.chunkSize,
    );
  }

  protected readRow(): Row | null {
    try {
      while (this.ready.length === 0 && !this.sheetDataDone && this.source && this.source.pump()) {
        // handlers fill `ready`
      }
    } catch (error) {
      if (!(error instanceof StreamFramingError)) throw error;
      if (!this.sheetDataDone) this.failure = error;
      this.source = null;
    }
    const row = this.ready.shift();
    if (row) return row;
    if (this.failure) throw this.failure;
    return null;
  }

  protected release(): void {
    this.source?.stop();
    this.source = null;
    this.ready.length = 0;
    this.current = null;
  }

  private onOpen(element: XmlElement): void {
    const { attributes } = element;
    switch (localName(element.name)) {
      case 'row': {
        const declared = attributes.r === undefined ? NaN : Number(attributes.r) - 1;
        const index = Number.isInteger(declared) && declared >= 0 ? declared : this.lastRow + 1;
        this.current = { index, cells: [] };
        this.lastRow = index;
        this.lastCol = -1;
        break;
      }
      case 'c': {
        if (!this.current) {
          this.resolver.warn('CELL_OUTSIDE_ROW', 'Cell element outside a row was ignored');
          return;
        }
        const ref = attributes.r === undefined ? null : parseCellRef(attributes.r);
        const col = ref ? ref.col : this.lastCol + 1;
        const style = attributes.s === undefined ? 0 : Number(attributes.s);
        this.cell = { col, type: attributes.t ?? 'n', style, value: null, inline: '' };
        this.lastCol = col;
        break;
      }
      case 'v':
        if (this.cell) {
          this.capture = 'value';
          this.cell.value = '';
        }
        break;
      case 'rPh':
        this.phoneticDepth++;
        break;
      case 't':
        if (this.cell && this.cell.type === 'inlineStr' && this.phoneticDepth === 0) this.capture = 'inline';
        break;
    }
  }

  private onText(text: string): void {
    if (!this.cell || this.capture === null) return;
    if (this.capture === 'value') this.cell.value = (this.cell.value ?? '') + text;
    else this.cell.inline += text;
  }

  private onClose(name: string): void {
    switch (name) {
      case 'v':
      case 't':
        this.capture = null;
        break;
      case 'rPh':
        this.phoneticDepth--;
        break;
      case 'c':
        if (this.cell && this.current) {
          const { col } = this.cell;
          if (!placeCell(this.current, col, this.decodeCell(this.cell, this.current.index))) {
            this.resolver.warn('BAD_CELL_POSITION', `Column ${col} is outside the sheet`, this.current.index);
          }
        }
        this.cell = null;
        break;
      case 'row':
        if (this.current) this.ready.push(this.current);
        this.current = null;
        break;
      case 'sheetData':
        this.sheetDataDone = true;
        this.source?.stop();
        break;
    }
  }

  private decodeCell(cell: PendingCell, row: number): CellValue {
    const { col } = cell;
    const raw = cell.value;
    switch (cell.type) {
      case 's': {
        const index = raw === null ? NaN : Number(raw);
        if (!Number.isInteger(index)) return this.resolver.malformed(`shared string index "${raw ?? ''}"`, row, col);
        return this.resolver.sharedString(index, row, col);
      }
      case 'str':
        return raw === null ? EMPTY : stringCell(unescapeOoxml(raw));
      case 'inlineStr':
        return stringCell(unescapeOoxml(cell.inline !== '' ? cell.inline : raw ?? ''));
      case 'b':
        if (raw === null) return EMPTY;
        if (raw === '1' || raw === 'true') return boolCell(true);
        if (raw === '0' || raw === 'false') return boolCell(false);
        return this.resolver.malformed(`boolean "${raw}"`, row, col);
      case 'e':
        return raw === null ? EMPTY : errorCell(raw.trim());
      case 'd': {
        if (raw === null) return EMPTY;
        const value = isoToDateCell(raw);
        if (value.type === 'error') this.resolver.warn('MALFORMED_CELL', value.detail ?? value.code, row, col);
        return value;
      }
      case 'n': {
        if (raw === null || raw.trim() === '') return EMPTY;
        const value = Number(raw);
        if (!Number.isFinite(value)) return this.resolver.malformed(`number "${raw}"`, row, col);
        if (!Number.isInteger(cell.style) || cell.style < 0) {
          return this.resolver.malformed(`style index "${cell.style}"`, row, col);
        }
        return this.resolver.number(value, cell.style, row, col);
      }
      default:
        return this.resolver.malformed(`unknown cell type "${cell.type}"`, row, col);
    }
  }
}
