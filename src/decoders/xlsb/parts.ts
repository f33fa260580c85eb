import { ByteReader } from '../../container/byte-reader';
import { XlsbRecordStream } from '../../container/record-stream';
import { MalformedContainerError } from '../../errors';
import type { SharedTablesBuilder, WarningLog } from '../../shared-tables';
import type { SheetVisibility } from '../../types';
import { renderNameFormula, sheetRangePrefix } from '../name-formula';
import type { RawDefinedName } from '../xlsx/parts';
import { Brt } from './records';

export interface BundleSheet {
  name: string;
  relationshipId: string | null;
  visibility: SheetVisibility;
}

export interface BinaryWorkbookPart {
  sheets: BundleSheet[];
  definedNames: RawDefinedName[];
  date1904: boolean;
}

interface ExternSheet {
  supBook: number;
  first: number;
  last: number;
}

interface PendingName {
  name: string;
  localSheetId: number | null;
  hidden: boolean;
  rgce: Uint8Array;
}

const WORKBOOK_SCOPE = 0xffffffff;

function visibilityOf(state: number): SheetVisibility {
  if (state === 1) return 'hidden';
  if (state === 2) return 'veryHidden';
  return 'visible';
}

export function parseBinaryWorkbook(bytes: Uint8Array, warnings: WarningLog): BinaryWorkbookPart {
  const stream = new XlsbRecordStream(bytes);
  const part: BinaryWorkbookPart = { sheets: [], definedNames: [], date1904: false };
  const supBooks: Array<'local' | 'external'> = [];
  const externs: ExternSheet[] = [];
  const names: PendingName[] = [];

  for (let record = stream.next(); record !== null; record = stream.next()) {
    const reader = new ByteReader(record.data);
    switch (record.type) {
      case Brt.WbProp:
        part.date1904 = (reader.u32() & 0x01) !== 0;
        break;
      case Brt.BundleSh: {
        const state = reader.u32();
        reader.u32(); // iTabID
        const relationshipId = reader.nullableWideString();
        part.sheets.push({ name: reader.wideString(), relationshipId, visibility: visibilityOf(state) });
        break;
      }
      case Brt.SupSelf:
      case Brt.SupSame:
        supBooks.push('local');
        break;
      case Brt.SupBookSrc:
      case Brt.SupAddin:
        supBooks.push('external');
        break;
      case Brt.ExternSheet: {
        const count = reader.u32();
        for (let i = 0; i < count; i++) {
          externs.push({ supBook: reader.u32(), first: reader.i32(), last: reader.i32() });
        }
        break;
      }
      case Brt.Name: {
        const flags = reader.u32();
        reader.u8(); // keyboard shortcut
        const itab = reader.u32();
        const name = reader.wideString();
        const rgce = reader.take(reader.u32());
        names.push({ name, localSheetId: itab === WORKBOOK_SCOPE ? null : itab, hidden: (flags & 0x01) !== 0, rgce });
        break;
      }
    }
  }

  const sheetNames = part.sheets.map((sheet) => sheet.name);
  const prefix = (ixti: number): string | null => {
    const xti = externs[ixti];
    if (!xti || xti.first < 0) return null;
    if ((supBooks[xti.supBook] ?? 'local') !== 'local') return null;
    return sheetRangePrefix(sheetNames, xti.first, xti.last);
  };
  for (const entry of names) {
    const formula = renderNameFormula(entry.rgce, 'xlsb', prefix);
    if (formula === null) {
      warnings.add({ code: 'UNSUPPORTED_NAME_FORMULA', message: `Defined name "${entry.name}" was skipped` });
      continue;
    }
    part.definedNames.push({ name: entry.name, localSheetId: entry.localSheetId, hidden: entry.hidden, formula });
  }
  return part;
}

export function parseBinarySharedStrings(bytes: Uint8Array, builder: SharedTablesBuilder, warnings: WarningLog): void {
  const stream = new XlsbRecordStream(bytes);
  let declared: number | null = null;
  let closed = false;

  for (let record = stream.next(); record !== null; record = stream.next()) {
    const reader = new ByteReader(record.data);
    if (record.type === Brt.BeginSst) {
      reader.u32(); // total references
      declared = reader.u32();
    } else if (record.type === Brt.SstItem) {
      reader.u8(); // rich-text and phonetic flags
      builder.addString(reader.wideString());
    } else if (record.type === Brt.EndSst) {
      closed = true;
      break;
    }
  }

  if (!closed && declared !== null && builder.stringCount < declared) {
    throw new MalformedContainerError(
      `Shared string table ends after ${builder.stringCount} of ${declared} entries`,
    );
  }
  if (declared !== null && declared !== builder.stringCount) {
    warnings.add({
      code: 'SST_COUNT_MISMATCH',
      message: `Shared string table declares ${declared} entries but holds ${builder.stringCount}`,
    });
  }
}

export function parseBinaryStyles(bytes: Uint8Array, builder: SharedTablesBuilder): void {
  const stream = new XlsbRecordStream(bytes);
  let inCellXfs = false;

  for (let record = stream.next(); record !== null; record = stream.next()) {
    const reader = new ByteReader(record.data);
    switch (record.type) {
      case Brt.Fmt: {
        const id = reader.u16();
        builder.addFormat(id, reader.wideString());
        break;
      }
      case Brt.BeginCellXfs:
        inCellXfs = true;
        break;
      case Brt.EndCellXfs:
        inCellXfs = false;
        break;
      case Brt.Xf:
        if (inCellXfs) {
          reader.u16(); // parent style
          builder.addStyle(reader.u16());
        }
        break;
    }
  }
}
