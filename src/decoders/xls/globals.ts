import { ByteReader, decodeLatin1 } from '../../container/byte-reader';
import { BiffRecordStream } from '../../container/record-stream';
import { MalformedContainerError, StreamFramingError, UnsupportedFormatError, WorkbookOpenError } from '../../errors';
import type { SharedTablesBuilder, WarningLog } from '../../shared-tables';
import type { SheetType, SheetVisibility } from '../../types';
import { renderNameFormula, sheetRangePrefix } from '../name-formula';
import type { RawDefinedName } from '../xlsx/parts';
import { ContinuedReader, readLongString, readShortString, readStringNoCount } from './biff-strings';
import type { BiffText } from './biff-strings';
import { codepageDecoder } from './codepage';
import { Biff, Substream } from './records';
import type { BiffVersion } from './records';

export interface BoundSheet {
  name: string;
  /** Offset of the sheet's BOF record within the workbook stream. */
  offset: number;
  visibility: SheetVisibility;
  type: SheetType;
}

export interface WorkbookGlobals {
  text: BiffText;
  sheets: BoundSheet[];
  definedNames: RawDefinedName[];
  date1904: boolean;
}

const BUILTIN_NAMES = [
  'Consolidate_Area',
  'Auto_Open',
  'Auto_Close',
  'Extract',
  'Database',
  'Criteria',
  'Print_Area',
  'Print_Titles',
  'Recorder',
  'Data_Form',
  'Auto_Activate',
  'Auto_Deactivate',
  'Sheet_Title',
  '_FilterDatabase',
];

const SUPBOOK_SELF = 0x0401;

interface PendingName {
  name: string;
  localSheetId: number | null;
  hidden: boolean;
  rgce: Uint8Array;
}

/** Reads the BIFF version from a BOF record payload. */
export function biffVersion(bof: Uint8Array): BiffVersion {
  const version = new ByteReader(bof).u16();
  if (version === 0x0600) return 8;
  if (version === 0x0500) return 5;
  throw new UnsupportedFormatError(`Unsupported BIFF version 0x${version.toString(16)}`);
}

function sheetTypeOf(dt: number): SheetType {
  switch (dt) {
    case 1:
      return 'macrosheet';
    case 2:
      return 'chartsheet';
    case 6:
      return 'vba';
    default:
      return 'worksheet';
  }
}

function visibilityOf(state: number): SheetVisibility {
  if (state === 1) return 'hidden';
  if (state === 2) return 'veryHidden';
  return 'visible';
}

/**
 * Walks the workbook globals substream: sheet directory, code page,
 * epoch, number formats, cell styles, the shared string table and
 * defined names.
 */
export function parseGlobals(bytes: Uint8Array, builder: SharedTablesBuilder, warnings: WarningLog): WorkbookGlobals {
  const stream = new BiffRecordStream(bytes);
  const bof = stream.next();
  if (!bof || bof.type !== Biff.Bof) throw new StreamFramingError('Workbook stream does not start with a BOF record', 0);
  const version = biffVersion(bof.data);
  const bofReader = new ByteReader(bof.data);
  bofReader.u16();
  if (bofReader.u16() !== Substream.Globals) {
    throw new WorkbookOpenError('Workbook stream does not start with the globals substream');
  }

  const globals: WorkbookGlobals = {
    text: { version, decode8: decodeLatin1 },
    sheets: [],
    definedNames: [],
    date1904: false,
  };
  const supBooks: Array<'local' | 'external'> = [];
  const externs: Array<{ supBook: number; first: number; last: number }> = [];
  const names: PendingName[] = [];

  for (;;) {
    const record = stream.next();
    if (record === null) throw new StreamFramingError('Workbook globals end without an EOF record', stream.position);
    if (record.type === Biff.Eof) break;
    const reader = new ByteReader(record.data);

    switch (record.type) {
      case Biff.FilePass:
        throw new WorkbookOpenError('Workbook is encrypted');
      case Biff.CodePage: {
        const codepage = reader.u16();
        const decode = codepageDecoder(codepage);
        if (decode) globals.text.decode8 = decode;
        else warnings.add({ code: 'UNKNOWN_CODEPAGE', message: `Code page ${codepage} is not supported; reading text as Latin-1` });
        break;
      }
      case Biff.DateMode:
        globals.date1904 = reader.u16() === 1;
        break;
      case Biff.Format: {
        const id = reader.u16();
        const code = version === 8 ? readLongString(reader, globals.text) : globals.text.decode8(reader.take(reader.u8()));
        builder.addFormat(id, code);
        break;
      }
      case Biff.Xf:
        reader.u16(); // font
        builder.addStyle(reader.u16());
        break;
      case Biff.BoundSheet: {
        const offset = reader.u32();
        const state = reader.u8() & 0x03;
        const dt = reader.u8();
        globals.sheets.push({
          name: readShortString(reader, globals.text),
          offset,
          visibility: visibilityOf(state),
          type: sheetTypeOf(dt),
        });
        break;
      }
      case Biff.Sst:
        readSharedStrings(record.data, stream, builder);
        break;
      case Biff.SupBook:
        if (version === 8) {
          reader.u16(); // sheet count
          supBooks.push(reader.u16() === SUPBOOK_SELF ? 'local' : 'external');
        }
        break;
      case Biff.ExternSheet:
        if (version === 8) {
          const count = reader.u16();
          for (let i = 0; i < count; i++) {
            externs.push({ supBook: reader.u16(), first: reader.i16(), last: reader.i16() });
          }
        }
        break;
      case Biff.Name:
        if (version === 8) names.push(readName(reader, globals.text));
        else warnings.add({ code: 'UNSUPPORTED_NAME_FORMULA', message: 'BIFF5 defined names are not read' });
        break;
    }
  }

  const sheetNames = globals.sheets.map((sheet) => sheet.name);
  const prefix = (ixti: number): string | null => {
    const xti = externs[ixti];
    if (!xti || xti.first < 0) return null;
    if ((supBooks[xti.supBook] ?? 'local') !== 'local') return null;
    return sheetRangePrefix(sheetNames, xti.first, xti.last);
  };
  for (const entry of names) {
    const formula = renderNameFormula(entry.rgce, 'biff8', prefix);
    if (formula === null) {
      warnings.add({ code: 'UNSUPPORTED_NAME_FORMULA', message: `Defined name "${entry.name}" was skipped` });
      continue;
    }
    globals.definedNames.push({ name: entry.name, localSheetId: entry.localSheetId, hidden: entry.hidden, formula });
  }
  return globals;
}

function readName(reader: ByteReader, text: BiffText): PendingName {
  const flags = reader.u16();
  reader.u8(); // keyboard shortcut
  const length = reader.u8();
  const formulaLength = reader.u16();
  reader.u16();
  const itab = reader.u16();
  reader.skip(4); // menu, description, help and status text lengths
  let name = readStringNoCount(reader, length, text);
  if (flags & 0x0020) {
    const builtin = BUILTIN_NAMES[name.charCodeAt(0)];
    name = `_xlnm.${builtin ?? name}`;
  }
  return {
    name,
    localSheetId: itab === 0 ? null : itab - 1,
    hidden: (flags & 0x0001) !== 0,
    rgce: reader.take(formulaLength),
  };
}

function readSharedStrings(
  first: Uint8Array,
  stream: BiffRecordStream,
  builder: SharedTablesBuilder,
): void {
  const segments = [first];
  for (let next = stream.peek(); next !== null && next.type === Biff.Continue; next = stream.peek()) {
    segments.push(next.data);
    stream.next();
  }
  const reader = new ContinuedReader(segments);
  reader.u32(); // total references
  const unique = reader.u32();
  for (let i = 0; i < unique && !reader.exhausted; i++) {
    builder.addString(reader.richString());
  }
  if (builder.stringCount < unique) {
    throw new MalformedContainerError(`Shared string table ends after ${builder.stringCount} of ${unique} entries`);
  }
}
