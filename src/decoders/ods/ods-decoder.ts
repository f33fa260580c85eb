import { EMPTY, boolCell, errorCell, floatCell, stringCell } from '../../cell-value';
import type { CellValue } from '../../cell-value';
import { mergedRange } from '../../cell-ref';
import type { EntryContainer } from '../../container/container-reader';
import { XmlEventSource } from '../../container/xml-source';
import type { XmlElement } from '../../container/xml-source';
import { isoToDateCell, isoToDurationCell } from '../../date-serial';
import { StreamFramingError, WorkbookOpenError } from '../../errors';
import { CellResolver, SharedTablesBuilder } from '../../shared-tables';
import type { SharedResourceTables } from '../../shared-tables';
import { SheetCursor, placeCell } from '../../sheet-cursor';
import type { MergedRange, Row } from '../../types';
import { BaseDecoder } from '../decoder';
import type { DecoderContext, ParsedHeader, SheetDescriptor } from '../decoder';
import { parseContentHeader, repeatCount } from './content';

const CONTENT_PART = 'content.xml';

interface PendingCell {
  valueType: string | undefined;
  attributes: Record<string, string>;
  repeat: number;
  text: string;
  paragraphs: number;
}

/**
 * Tracks position inside one `table:table` of `content.xml`: which table
 * is active, the current row and column, and the text of the open cell.
 * The cursor and the merged-range scan both drive it.
 */
class TableWalker {
  private ordinal = -1;
  private depth = 0;
  private active = false;
  private finished = false;
  private annotationDepth = 0;
  private inParagraph = false;
  rowIndex = 0;
  rowRepeat = 1;
  col = 0;
  cell: PendingCell | null = null;

  constructor(private readonly target: number) {}

  get done(): boolean {
    return this.finished;
  }

  /** Returns the element name when it belongs to the target table's own grid. */
  open(element: XmlElement): string | null {
    const { name, attributes } = element;
    if (name === 'table:table') {
      this.depth++;
      if (this.depth === 1) {
        this.ordinal++;
        this.active = this.ordinal === this.target;
      }
      return null;
    }
    if (!this.active || this.depth !== 1) return null;

    switch (name) {
      case 'table:table-row':
        this.rowRepeat = repeatCount(attributes['table:number-rows-repeated']);
        this.col = 0;
        return name;
      case 'table:table-cell':
      case 'table:covered-table-cell':
        this.cell = {
          valueType: attributes['office:value-type'],
          attributes,
          repeat: repeatCount(attributes['table:number-columns-repeated']),
          text: '',
          paragraphs: 0,
        };
        return name;
      case 'office:annotation':
        this.annotationDepth++;
        return null;
    }
    if (!this.cell || this.annotationDepth > 0) return null;
    switch (name) {
      case 'text:p':
      case 'text:h':
        if (this.cell.paragraphs > 0) this.cell.text += '\n';
        this.cell.paragraphs++;
        this.inParagraph = true;
        break;
      case 'text:s':
        this.cell.text += ' '.repeat(repeatCount(attributes['text:c']));
        break;
      case 'text:tab':
        this.cell.text += '\t';
        break;
      case 'text:line-break':
        this.cell.text += '\n';
        break;
    }
    return null;
  }

  text(value: string): void {
    if (this.cell && this.inParagraph && this.annotationDepth === 0) this.cell.text += value;
  }

  /** Returns the element name for closes the caller acts on (cells, rows). */
  close(name: string): string | null {
    if (name === 'table:table') {
      if (this.depth === 1 && this.active) {
        this.active = false;
        this.finished = true;
      }
      this.depth--;
      return null;
    }
    if (!this.active || this.depth !== 1) return null;
    switch (name) {
      case 'office:annotation':
        this.annotationDepth--;
        return null;
      case 'text:p':
      case 'text:h':
        if (this.annotationDepth === 0) this.inParagraph = false;
        return null;
      case 'table:table-cell':
      case 'table:covered-table-cell':
      case 'table:table-row':
        return name;
    }
    return null;
  }
}

export class OdsDecoder extends BaseDecoder<number> {
  readonly format = 'ods';

  constructor(
    private readonly archive: EntryContainer,
    context: DecoderContext,
  ) {
    super(context);
  }

  protected parseHeader(): ParsedHeader<number> {
    const { warnings, chunkSize } = this.context;
    const content = parseContentHeader(this.archive.readEntry(CONTENT_PART), chunkSize, warnings);
    const builder = new SharedTablesBuilder(warnings);
    builder.setEpoch(content.date1904 ? 1904 : 1900);

    const seen = new Set<string>();
    const sheets = content.tables.map((table, index) => {
      if (seen.has(table.name)) throw new WorkbookOpenError(`Duplicate sheet name "${table.name}"`);
      seen.add(table.name);
      const descriptor: SheetDescriptor = {
        name: table.name,
        index,
        type: 'worksheet',
        visibility: table.hidden ? 'hidden' : 'visible',
      };
      return { descriptor, locator: index };
    });
    const definedNames = content.names.map((entry) => ({
      name: entry.name,
      reference: entry.reference,
      scope: entry.scope,
      hidden: false,
    }));
    return { sheets, definedNames, tables: builder.build() };
  }

  protected createCursor(sheet: SheetDescriptor, ordinal: number, tables: SharedResourceTables): SheetCursor {
    return new OdsSheetCursor(
      sheet.name,
      this.archive.readEntry(CONTENT_PART),
      ordinal,
      new CellResolver(tables, this.context.warnings, sheet.name),
      this.context,
    );
  }

  /** OpenDocument does not declare a used range. */
  protected scanDimensions(): null {
    return null;
  }

  protected scanMergedRanges(_sheet: SheetDescriptor, ordinal: number): MergedRange[] {
    const ranges: MergedRange[] = [];
    const walker = new TableWalker(ordinal);
    const spans: Array<{ col: number; rows: number; cols: number }> = [];
    const source = new XmlEventSource(
      this.archive.readEntry(CONTENT_PART),
      {
        open(element) {
          if (walker.open(element) !== 'table:table-cell') return;
          const rows = repeatCount(element.attributes['table:number-rows-spanned']);
          const cols = repeatCount(element.attributes['table:number-columns-spanned']);
          if (rows > 1 || cols > 1) spans.push({ col: walker.col, rows, cols });
        },
        text: (value) => walker.text(value),
        close(name) {
          const closed = walker.close(name);
          if (closed === 'table:table-cell' || closed === 'table:covered-table-cell') {
            walker.col += walker.cell ? walker.cell.repeat : 1;
            walker.cell = null;
          } else if (closed === 'table:table-row') {
            for (let i = 0; i < walker.rowRepeat && spans.length > 0; i++) {
              const row = walker.rowIndex + i;
              for (const span of spans) {
                ranges.push(mergedRange({ row, col: span.col }, { row: row + span.rows - 1, col: span.col + span.cols - 1 }));
              }
            }
            spans.length = 0;
            walker.rowIndex += walker.rowRepeat;
          }
        },
      },
      this.context.chunkSize,
    );
    try {
      while (!walker.done && source.pump()) {
        // collect spans up to the end of the table
      }
    } catch (error) {
      if (!(error instanceof StreamFramingError) || !walker.done) throw error;
    }
    source.stop();
    return ranges;
  }
}

interface QueuedRow {
  index: number;
  cells: CellValue[];
  repeat: number;
}

/**
 * Streams one table of `content.xml`. Repeated rows are expanded one per
 * pull; empty repeated rows only move the row index forward.
 */
class OdsSheetCursor extends SheetCursor {
  private source: XmlEventSource | null;
  private readonly walker: TableWalker;
  private readonly queue: QueuedRow[] = [];
  private cells: CellValue[] = [];
  private repeating: { cells: CellValue[]; index: number; remaining: number } | null = null;
  private failure: StreamFramingError | null = null;

  constructor(
    sheet: string,
    bytes: Uint8Array,
    ordinal: number,
    private readonly resolver: CellResolver,
    context: DecoderContext,
  ) {
    super(sheet, context.warnings);
    this.walker = new TableWalker(ordinal);
    this.source = new XmlEventSource(
      bytes,
      {
        open: (element) => {
          if (this.walker.open(element) === 'table:table-row') this.cells = [];
        },
        text: (value) => this.walker.text(value),
        close: (name) => this.onClose(name),
      },
      context.chunkSize,
    );
  }

  protected readRow(): Row | null {
    const repeating = this.repeating;
    if (repeating) {
      const row = { index: repeating.index, cells: [...repeating.cells] };
      repeating.index++;
      if (--repeating.remaining === 0) this.repeating = null;
      return row;
    }
    this.fill();
    const next = this.queue.shift();
    if (!next) {
      if (this.failure) throw this.failure;
      return null;
    }
    if (next.repeat > 1) {
      this.repeating = { cells: next.cells, index: next.index + 1, remaining: next.repeat - 1 };
    }
    return { index: next.index, cells: [...next.cells] };
  }

  protected release(): void {
    this.source?.stop();
    this.source = null;
    this.queue.length = 0;
    this.repeating = null;
  }

  /** Pumps until a row is queued; rows completed before broken markup are still served. */
  private fill(): void {
    try {
      while (this.queue.length === 0 && !this.walker.done && this.source && this.source.pump()) {
        // handlers fill the queue
      }
    } catch (error) {
      if (!(error instanceof StreamFramingError)) throw error;
      // markup broken past the end of this table does not concern it
      if (!this.walker.done) this.failure = error;
      this.source = null;
    }
  }

  private onClose(name: string): void {
    const walker = this.walker;
    const closed = walker.close(name);
    if (walker.done) this.source?.stop();
    if (closed === 'table:table-cell' || closed === 'table:covered-table-cell') {
      const cell = walker.cell;
      walker.cell = null;
      if (!cell) return;
      const value = this.cellValue(cell, walker.rowIndex, walker.col);
      if (value.type !== 'empty') {
        for (let i = 0; i < cell.repeat; i++) {
          if (!placeCell({ index: walker.rowIndex, cells: this.cells }, walker.col + i, value)) {
            this.resolver.warn('BAD_CELL_POSITION', `Column ${walker.col + i} is outside the sheet`, walker.rowIndex);
            break;
          }
        }
      }
      walker.col += cell.repeat;
    } else if (closed === 'table:table-row') {
      if (this.cells.length > 0) {
        this.queue.push({ index: walker.rowIndex, cells: this.cells, repeat: walker.rowRepeat });
      }
      this.cells = [];
      walker.rowIndex += walker.rowRepeat;
    }
  }

  private cellValue(cell: PendingCell, row: number, col: number): CellValue {
    const { attributes } = cell;
    if (attributes['calcext:value-type'] === 'error') return errorCell(cell.text.trim() || '#N/A');
    switch (cell.valueType) {
      case undefined:
        return EMPTY;
      case 'float':
      case 'percentage':
      case 'currency': {
        const raw = attributes['office:value'];
        const value = raw === undefined ? NaN : Number(raw);
        return Number.isFinite(value) ? floatCell(value) : this.resolver.malformed(`number "${raw ?? ''}"`, row, col);
      }
      case 'date':
        return this.temporal(isoToDateCell(attributes['office:date-value'] ?? ''), row, col);
      case 'time':
        return this.temporal(isoToDurationCell(attributes['office:time-value'] ?? ''), row, col);
      case 'boolean': {
        const raw = attributes['office:boolean-value'];
        if (raw === 'true') return boolCell(true);
        if (raw === 'false') return boolCell(false);
        return this.resolver.malformed(`boolean "${raw ?? ''}"`, row, col);
      }
      case 'string':
        return stringCell(attributes['office:string-value'] ?? cell.text);
      default:
        return this.resolver.malformed(`unknown value type "${cell.valueType}"`, row, col);
    }
  }

  private temporal(value: CellValue, row: number, col: number): CellValue {
    if (value.type === 'error') this.resolver.warn('MALFORMED_CELL', value.detail ?? value.code, row, col);
    return value;
  }
}
