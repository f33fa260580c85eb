import { Biff, Substream } from '../decoders/xls/records';
import { BinaryWriter, concatBytes } from './binary-writer';
import { packCompound } from './packages';

export function biffRecord(type: number, payload: BinaryWriter | Uint8Array = new Uint8Array(0)): Uint8Array {
  const body = payload instanceof BinaryWriter ? payload.bytes() : payload;
  return concatBytes([new BinaryWriter().u16(type).u16(body.length).bytes(), body]);
}

export function biffBof(substream: number): Uint8Array {
  return biffRecord(Biff.Bof, new BinaryWriter().u16(0x0600).u16(substream).u16(0x0dbb).u16(1996).u32(0).u32(0x06));
}

export const BIFF_EOF = biffRecord(Biff.Eof);

/** BIFF8 string with a 16-bit count, stored compressed (one byte per character). */
function longString(writer: BinaryWriter, text: string): BinaryWriter {
  return writer.u16(text.length).u8(0).latin1(text);
}

function cellHeader(row: number, col: number, xf: number): BinaryWriter {
  return new BinaryWriter().u16(row).u16(col).u16(xf);
}

/** Cell records of a worksheet substream. */
export const biffCell = {
  number: (row: number, col: number, value: number, xf = 0) =>
    biffRecord(Biff.Number, cellHeader(row, col, xf).f64(value)),
  rk: (row: number, col: number, rk: number, xf = 0) => biffRecord(Biff.Rk, cellHeader(row, col, xf).u32(rk)),
  labelSst: (row: number, col: number, index: number, xf = 0) =>
    biffRecord(Biff.LabelSst, cellHeader(row, col, xf).u32(index)),
  label: (row: number, col: number, text: string) => biffRecord(Biff.Label, longString(cellHeader(row, col, 0), text)),
  bool: (row: number, col: number, value: boolean) =>
    biffRecord(Biff.BoolErr, cellHeader(row, col, 0).u8(value ? 1 : 0).u8(0)),
  error: (row: number, col: number, code: number) => biffRecord(Biff.BoolErr, cellHeader(row, col, 0).u8(code).u8(1)),
  blank: (row: number, col: number, xf = 0) => biffRecord(Biff.Blank, cellHeader(row, col, xf)),
  mulRk: (row: number, firstCol: number, rks: number[], xf = 0) => {
    const writer = new BinaryWriter().u16(row).u16(firstCol);
    for (const rk of rks) writer.u16(xf).u32(rk);
    return biffRecord(Biff.MulRk, writer.u16(firstCol + rks.length - 1));
  },
  formulaNumber: (row: number, col: number, value: number, xf = 0) =>
    biffRecord(Biff.Formula, cellHeader(row, col, xf).f64(value).u16(0).u32(0).u16(0)),
  /** FORMULA with a cached text result, followed by its STRING record. */
  formulaString: (row: number, col: number, text: string): Uint8Array[] => [
    biffRecord(Biff.Formula, cellHeader(row, col, 0).u8(0).u8(0).u8(0).u8(0).u8(0).u8(0).u16(0xffff).u16(0).u32(0).u16(0)),
    biffRecord(Biff.String, longString(new BinaryWriter(), text)),
  ],
  formulaBool: (row: number, col: number, value: boolean) =>
    biffRecord(
      Biff.Formula,
      cellHeader(row, col, 0).u8(1).u8(0).u8(value ? 1 : 0).u8(0).u8(0).u8(0).u16(0xffff).u16(0).u32(0).u16(0),
    ),
};

/** DIMENSIONS with exclusive upper bounds, as written by Excel. */
export function biffDimensions(firstRow: number, rowLimit: number, firstCol: number, colLimit: number): Uint8Array {
  return biffRecord(Biff.Dimensions, new BinaryWriter().u32(firstRow).u32(rowLimit).u16(firstCol).u16(colLimit).u16(0));
}

export function biffMergedCells(ranges: Array<[number, number, number, number]>): Uint8Array {
  const writer = new BinaryWriter().u16(ranges.length);
  for (const [r1, r2, c1, c2] of ranges) writer.u16(r1).u16(r2).u16(c1).u16(c2);
  return biffRecord(Biff.MergedCells, writer);
}

export interface XlsSheetSpec {
  name: string;
  records: Uint8Array[];
  /** 0 visible, 1 hidden, 2 very hidden. */
  state?: number;
  /** BOUNDSHEET sheet type: 0 worksheet, 1 macro sheet, 2 chart, 6 VBA module. */
  dt?: number;
}

export interface XlsNameSpec {
  name: string;
  rgce: Uint8Array;
  /** One-based sheet index for a local name; 0 for workbook scope. */
  itab?: number;
  hidden?: boolean;
  /** Built-in name code (e.g. 6 for Print_Area) written instead of `name`. */
  builtin?: number;
}

export interface XlsSpec {
  sheets: XlsSheetSpec[];
  sst?: string[];
  /** Unique-string count written in the SST header, when it should differ from `sst.length`. */
  sstUniqueCount?: number;
  formats?: Array<{ id: number; code: string }>;
  /** Number format id of each XF record, in order. */
  xfs?: number[];
  date1904?: boolean;
  codepage?: number;
  encrypted?: boolean;
  /** EXTERNSHEET entries as [firstSheet, lastSheet] in this workbook. */
  externSheets?: Array<[number, number]>;
  names?: XlsNameSpec[];
  /** Omit the globals EOF record. */
  truncateGlobals?: boolean;
}

function nameRecord(name: XlsNameSpec): Uint8Array {
  const flags = (name.hidden ? 0x0001 : 0) | (name.builtin === undefined ? 0 : 0x0020);
  const writer = new BinaryWriter()
    .u16(flags)
    .u8(0)
    .u8(name.builtin === undefined ? name.name.length : 1)
    .u16(name.rgce.length)
    .u16(0)
    .u16(name.itab ?? 0)
    .u32(0)
    .u8(0);
  if (name.builtin === undefined) writer.latin1(name.name);
  else writer.u8(name.builtin);
  return biffRecord(Biff.Name, writer.raw(name.rgce));
}

function globals(spec: XlsSpec, offsets: number[]): Uint8Array {
  const records: Uint8Array[] = [biffBof(Substream.Globals)];
  if (spec.encrypted) records.push(biffRecord(Biff.FilePass, new BinaryWriter().u16(1).u16(1)));
  records.push(biffRecord(Biff.CodePage, new BinaryWriter().u16(spec.codepage ?? 1200)));
  records.push(biffRecord(Biff.DateMode, new BinaryWriter().u16(spec.date1904 ? 1 : 0)));
  for (const format of spec.formats ?? []) {
    records.push(biffRecord(Biff.Format, longString(new BinaryWriter().u16(format.id), format.code)));
  }
  for (const formatId of spec.xfs ?? [0]) {
    records.push(biffRecord(Biff.Xf, new BinaryWriter().u16(0).u16(formatId).raw(new Uint8Array(16))));
  }
  spec.sheets.forEach((sheet, i) => {
    records.push(
      biffRecord(
        Biff.BoundSheet,
        new BinaryWriter()
          .u32(offsets[i] ?? 0)
          .u8(sheet.state ?? 0)
          .u8(sheet.dt ?? 0)
          .u8(sheet.name.length)
          .u8(0)
          .latin1(sheet.name),
      ),
    );
  });
  if (spec.externSheets) {
    records.push(biffRecord(Biff.SupBook, new BinaryWriter().u16(spec.sheets.length).u16(0x0401)));
    const extern = new BinaryWriter().u16(spec.externSheets.length);
    for (const [first, last] of spec.externSheets) extern.u16(0).u16(first).u16(last);
    records.push(biffRecord(Biff.ExternSheet, extern));
  }
  for (const name of spec.names ?? []) records.push(nameRecord(name));
  if (spec.sst) {
    const writer = new BinaryWriter().u32(spec.sst.length).u32(spec.sstUniqueCount ?? spec.sst.length);
    for (const text of spec.sst) longString(writer, text);
    records.push(biffRecord(Biff.Sst, writer));
  }
  if (!spec.truncateGlobals) records.push(BIFF_EOF);
  return concatBytes(records);
}

/** The bare BIFF8 workbook stream. */
export function buildBiff(spec: XlsSpec): Uint8Array {
  const sheets = spec.sheets.map((sheet) => concatBytes([biffBof(Substream.Worksheet), ...sheet.records, BIFF_EOF]));
  const globalsLength = globals(spec, []).length;
  const offsets: number[] = [];
  let offset = globalsLength;
  for (const sheet of sheets) {
    offsets.push(offset);
    offset += sheet.length;
  }
  return concatBytes([globals(spec, offsets), ...sheets]);
}

/** A compound file with the workbook stream stored as `Workbook`. */
export function buildXls(spec: XlsSpec): Uint8Array {
  return packCompound({ Workbook: buildBiff(spec) });
}
