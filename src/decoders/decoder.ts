import {
  MalformedContainerError,
  SpreadsheetError,
  StreamFramingError,
  WorkbookOpenError,
  errorMessage,
} from '../errors';
import type { SharedResourceTables, WarningLog } from '../shared-tables';
import type { SheetCursor } from '../sheet-cursor';
import type {
  DefinedName,
  Dimensions,
  MergedRange,
  SheetType,
  SheetVisibility,
  SpreadsheetFormat,
} from '../types';

export type DecoderState = 'opening' | 'headerParsed' | 'ready';

export interface SheetDescriptor {
  name: string;
  index: number;
  type: SheetType;
  visibility: SheetVisibility;
}

export interface WorkbookHeader {
  sheets: SheetDescriptor[];
  definedNames: DefinedName[];
  tables: SharedResourceTables;
}

export interface DecoderContext {
  warnings: WarningLog;
  chunkSize: number;
}

/**
 * The three-phase protocol every format implements: header, sheet open,
 * row streaming. One decoder is chosen per workbook at open time.
 */
export interface WorkbookDecoder {
  readonly format: SpreadsheetFormat;
  readonly state: DecoderState;
  readHeader(): WorkbookHeader;
  openCursor(sheet: SheetDescriptor): SheetCursor;
  readDimensions(sheet: SheetDescriptor): Dimensions | null;
  readMergedRanges(sheet: SheetDescriptor): MergedRange[];
}

export interface ParsedHeader<L> {
  sheets: Array<{ descriptor: SheetDescriptor; locator: L }>;
  definedNames: DefinedName[];
  tables: SharedResourceTables;
}

/**
 * Shared state machine for the decoders. `L` is how a format finds a
 * sheet's row data again: an archive part name or a stream offset.
 */
export abstract class BaseDecoder<L> implements WorkbookDecoder {
  abstract readonly format: SpreadsheetFormat;
  private phase: DecoderState = 'opening';
  private header: WorkbookHeader | null = null;
  private readonly locators = new Map<number, L>();

  constructor(protected readonly context: DecoderContext) {}

  get state(): DecoderState {
    return this.phase;
  }

  readHeader(): WorkbookHeader {
    if (this.header) return this.header;
    let parsed: ParsedHeader<L>;
    try {
      parsed = this.parseHeader();
    } catch (error) {
      if (error instanceof SpreadsheetError) throw error;
      if (error instanceof StreamFramingError) {
        throw new MalformedContainerError(`Workbook header is malformed: ${error.message}`, { cause: error });
      }
      throw new WorkbookOpenError(`Could not read the workbook header: ${errorMessage(error)}`, { cause: error });
    }
    this.phase = 'headerParsed';

    for (const { descriptor, locator } of parsed.sheets) {
      this.locators.set(descriptor.index, locator);
    }
    this.header = {
      sheets: parsed.sheets.map(({ descriptor }) => descriptor),
      definedNames: parsed.definedNames,
      tables: parsed.tables,
    };
    this.phase = 'ready';
    return this.header;
  }

  openCursor(sheet: SheetDescriptor): SheetCursor {
    return this.createCursor(sheet, this.locate(sheet), this.tables());
  }

  readDimensions(sheet: SheetDescriptor): Dimensions | null {
    return this.scanDimensions(sheet, this.locate(sheet));
  }

  readMergedRanges(sheet: SheetDescriptor): MergedRange[] {
    return this.scanMergedRanges(sheet, this.locate(sheet));
  }

  protected tables(): SharedResourceTables {
    return this.readHeader().tables;
  }

  protected abstract parseHeader(): ParsedHeader<L>;

  protected abstract createCursor(sheet: SheetDescriptor, locator: L, tables: SharedResourceTables): SheetCursor;

  protected abstract scanDimensions(sheet: SheetDescriptor, locator: L): Dimensions | null;

  protected abstract scanMergedRanges(sheet: SheetDescriptor, locator: L): MergedRange[];

  private locate(sheet: SheetDescriptor): L {
    this.readHeader();
    const locator = this.locators.get(sheet.index);
    if (locator === undefined) {
      throw new WorkbookOpenError(`Sheet "${sheet.name}" has no row data location`);
    }
    return locator;
  }
}
