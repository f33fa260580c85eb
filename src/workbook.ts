import { quoteSheetName } from './cell-ref';
import { EntryContainer } from './container/container-reader';
import { DEFAULT_CHUNK_SIZE } from './container/xml-source';
import type { DecoderContext, SheetDescriptor, WorkbookDecoder, WorkbookHeader } from './decoders/decoder';
import { OdsDecoder } from './decoders/ods/ods-decoder';
import { XlsDecoder } from './decoders/xls/xls-decoder';
import { XlsbDecoder } from './decoders/xlsb/xlsb-decoder';
import { XlsxDecoder } from './decoders/xlsx/xlsx-decoder';
import {
  MalformedContainerError,
  SheetNotFoundError,
  SourceRejectedError,
  SpreadsheetError,
  StreamFramingError,
  WorkbookClosedError,
  WorkbookOpenError,
  errorMessage,
} from './errors';
import type { SpreadsheetErrorCode } from './errors';
import { detectFormat, resolveArchiveFormat } from './format-detector';
import { WarningLog } from './shared-tables';
import type { SheetCursor } from './sheet-cursor';
import { SourceLoader } from './source-loader';
import type {
  DateEpoch,
  DecodeWarning,
  DefinedName,
  Dimensions,
  MergedRange,
  OpenOptions,
  ResolvedOpenOptions,
  SheetMetadata,
  SheetRef,
  SourceInfo,
  SpreadsheetFormat,
} from './types';

export const DEFAULT_OPEN_OPTIONS: ResolvedOpenOptions = {
  maxFileSize: 500 * 1024 * 1024,
  checkExtension: true,
  chunkSize: DEFAULT_CHUNK_SIZE,
};

export type OpenResult =
  | { success: true; workbook: Workbook; warnings: DecodeWarning[] }
  | { success: false; code: SpreadsheetErrorCode; errors: string[] };

/** Picks the decoder for a byte image by signature and, for zips, by directory. */
function createDecoder(bytes: Uint8Array, context: DecoderContext): WorkbookDecoder {
  const signature = detectFormat(bytes);
  if (signature === 'biff') return new XlsDecoder(bytes, context);
  if (signature === 'xls') {
    const compound = EntryContainer.open(bytes, 'cfb');
    const stream = compound.tryReadEntry('Workbook') ?? compound.tryReadEntry('Book');
    if (stream) return new XlsDecoder(stream, context);
    if (compound.hasEntry('EncryptionInfo')) throw new WorkbookOpenError('Workbook is encrypted');
    throw new MalformedContainerError('Compound file has no Workbook stream');
  }

  const archive = EntryContainer.open(bytes, 'zip');
  const { format, workbookPart } = resolveArchiveFormat(archive);
  switch (format) {
    case 'xlsx':
      return new XlsxDecoder(archive, workbookPart, context);
    case 'xlsb':
      return new XlsbDecoder(archive, workbookPart, context);
    case 'ods':
      return new OdsDecoder(archive, context);
  }
}

function resolveOptions(options: OpenOptions): ResolvedOpenOptions {
  const resolved = { ...DEFAULT_OPEN_OPTIONS, ...options };
  const issues: string[] = [];
  if (!Number.isInteger(resolved.chunkSize) || resolved.chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${resolved.chunkSize})`);
  }
  if (!(resolved.maxFileSize > 0)) {
    issues.push(`maxFileSize must be positive (got ${resolved.maxFileSize})`);
  }
  if (issues.length > 0) throw new SourceRejectedError(issues);
  return resolved;
}

/**
 * Opens a workbook from a path or an in-memory image and reads its
 * header. Rows are not decoded until a sheet cursor asks for them.
 */
export function openWorkbook(source: string | Uint8Array, options: OpenOptions = {}): Workbook {
  const resolved = resolveOptions(options);
  const { bytes, info } = new SourceLoader(resolved).load(source);
  const warnings = new WarningLog();
  const decoder = createDecoder(bytes, { warnings, chunkSize: resolved.chunkSize });
  return new Workbook(decoder, warnings, info);
}

/** Like {@link openWorkbook}, but reports library failures as a result value. */
export function tryOpenWorkbook(source: string | Uint8Array, options: OpenOptions = {}): OpenResult {
  try {
    const workbook = openWorkbook(source, options);
    return { success: true, workbook, warnings: workbook.warnings() };
  } catch (error) {
    if (error instanceof SourceRejectedError) return { success: false, code: error.code, errors: [...error.issues] };
    if (error instanceof SpreadsheetError) return { success: false, code: error.code, errors: [error.message] };
    throw error;
  }
}

export class Workbook {
  private readonly header: WorkbookHeader;
  private readonly dimensions = new Map<number, Dimensions | null>();
  private readonly merged = new Map<number, MergedRange[]>();
  private readonly cursors = new Set<SheetCursor>();
  private closed = false;

  constructor(
    private readonly decoder: WorkbookDecoder,
    private readonly log: WarningLog,
    readonly source: SourceInfo,
  ) {
    this.header = decoder.readHeader();
  }

  get format(): SpreadsheetFormat {
    return this.decoder.format;
  }

  get epoch(): DateEpoch {
    return this.header.tables.epoch;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  sheetNames(): string[] {
    this.ensureOpen();
    return this.header.sheets.map((sheet) => sheet.name);
  }

  sheetMetadata(ref: SheetRef): SheetMetadata {
    this.ensureOpen();
    const sheet = this.resolve(ref);
    return { ...sheet, dimensions: this.dimensionsOf(sheet.index) };
  }

  sheetsMetadata(): SheetMetadata[] {
    this.ensureOpen();
    return this.header.sheets.map((sheet) => ({ ...sheet, dimensions: this.dimensionsOf(sheet.index) }));
  }

  /** A fresh cursor positioned before the first row of the sheet. */
  openSheet(ref: SheetRef): SheetCursor {
    this.ensureOpen();
    const cursor = this.decoder.openCursor(this.resolve(ref));
    for (const open of this.cursors) {
      if (open.finished) this.cursors.delete(open);
    }
    this.cursors.add(cursor);
    return cursor;
  }

  /** Name → reference text. Sheet-scoped names are keyed `Sheet!Name`. */
  definedNames(): ReadonlyMap<string, string> {
    this.ensureOpen();
    const names = new Map<string, string>();
    for (const entry of this.header.definedNames) {
      const key = entry.scope === null ? entry.name : `${quoteSheetName(entry.scope)}!${entry.name}`;
      names.set(key, entry.reference);
    }
    return names;
  }

  definedNameEntries(): DefinedName[] {
    this.ensureOpen();
    return this.header.definedNames.map((entry) => ({ ...entry }));
  }

  mergedRanges(ref: SheetRef): MergedRange[] {
    this.ensureOpen();
    const sheet = this.resolve(ref);
    let ranges = this.merged.get(sheet.index);
    if (!ranges) {
      ranges = this.scan<MergedRange[]>(sheet.name, [], () => this.decoder.readMergedRanges(sheet));
      this.merged.set(sheet.index, ranges);
    }
    return [...ranges];
  }

  warnings(): DecodeWarning[] {
    return this.log.list();
  }

  /** Ends every open cursor; later calls on the workbook throw `WorkbookClosedError`. */
  close(): void {
    if (this.closed) return;
    for (const cursor of this.cursors) cursor.close();
    this.cursors.clear();
    this.closed = true;
  }

  private dimensionsOf(index: number): Dimensions | null {
    if (!this.dimensions.has(index)) {
      const sheet = this.header.sheets[index];
      this.dimensions.set(index, this.scan<Dimensions | null>(sheet.name, null, () => this.decoder.readDimensions(sheet)));
    }
    return this.dimensions.get(index) ?? null;
  }

  /** Runs a side scan of a sheet; a broken sheet yields `fallback` and a warning instead of failing the call. */
  private scan<T>(sheet: string, fallback: T, read: () => T): T {
    try {
      return read();
    } catch (error) {
      if (!(error instanceof StreamFramingError || error instanceof MalformedContainerError)) throw error;
      this.log.add({ code: 'SHEET_SCAN_FAILED', message: errorMessage(error), sheet });
      return fallback;
    }
  }

  private resolve(ref: SheetRef): SheetDescriptor {
    const sheets = this.header.sheets;
    const sheet = typeof ref === 'number' ? sheets[ref] : sheets.find((candidate) => candidate.name === ref);
    if (!sheet) throw new SheetNotFoundError(ref);
    return sheet;
  }

  private ensureOpen(): void {
    if (this.closed) throw new WorkbookClosedError();
  }
}
