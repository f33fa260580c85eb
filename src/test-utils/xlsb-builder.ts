import { Brt } from '../decoders/xlsb/records';
import { BinaryWriter, concatBytes } from './binary-writer';
import { packZip } from './packages';
import type { EntryContent } from './packages';

const REL_BASE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const RELS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';

function varint(value: number, maxBytes: number): number[] {
  const out: number[] = [];
  let rest = value;
  for (let i = 0; i < maxBytes; i++) {
    const byte = rest & 0x7f;
    rest = Math.floor(rest / 128);
    if (rest === 0) {
      out.push(byte);
      return out;
    }
    out.push(byte | 0x80);
  }
  throw new Error(`${value} does not fit in ${maxBytes} varint bytes`);
}

export function xlsbRecord(type: number, payload: BinaryWriter | Uint8Array = new Uint8Array(0)): Uint8Array {
  const body = payload instanceof BinaryWriter ? payload.bytes() : payload;
  return concatBytes([Uint8Array.from([...varint(type, 2), ...varint(body.length, 4)]), body]);
}

function cellHeader(col: number, style: number): BinaryWriter {
  return new BinaryWriter().u32(col).u32(style);
}

/** Cell records of a binary worksheet. */
export const xlsbCell = {
  blank: (col: number, style = 0) => xlsbRecord(Brt.CellBlank, cellHeader(col, style)),
  rk: (col: number, rk: number, style = 0) => xlsbRecord(Brt.CellRk, cellHeader(col, style).u32(rk)),
  real: (col: number, value: number, style = 0) => xlsbRecord(Brt.CellReal, cellHeader(col, style).f64(value)),
  isst: (col: number, index: number, style = 0) => xlsbRecord(Brt.CellIsst, cellHeader(col, style).u32(index)),
  text: (col: number, value: string) => xlsbRecord(Brt.CellSt, cellHeader(col, 0).wide(value)),
  bool: (col: number, value: boolean) => xlsbRecord(Brt.CellBool, cellHeader(col, 0).u8(value ? 1 : 0)),
  error: (col: number, code: number) => xlsbRecord(Brt.CellError, cellHeader(col, 0).u8(code)),
  formulaNumber: (col: number, value: number, style = 0) =>
    xlsbRecord(Brt.FmlaNum, cellHeader(col, style).f64(value).u16(0)),
};

/** RK encoding of a 30-bit integer. */
export function rkInt(value: number): number {
  return ((value << 2) | 0x02) >>> 0;
}

export interface XlsbRowSpec {
  index: number;
  cells: Uint8Array[];
}

export interface XlsbSheetOptions {
  /** Inclusive extent written as the dimension record: [firstRow, lastRow, firstCol, lastCol]. */
  dimension?: [number, number, number, number];
  merges?: Array<[number, number, number, number]>;
}

export function xlsbSheet(rows: XlsbRowSpec[], options: XlsbSheetOptions = {}): Uint8Array {
  const records: Uint8Array[] = [];
  if (options.dimension) {
    const [r1, r2, c1, c2] = options.dimension;
    records.push(xlsbRecord(Brt.WsDim, new BinaryWriter().u32(r1).u32(r2).u32(c1).u32(c2)));
  }
  records.push(xlsbRecord(Brt.BeginSheetData));
  for (const row of rows) {
    records.push(xlsbRecord(Brt.RowHdr, new BinaryWriter().u32(row.index).u32(0).u16(0x0f0).u16(0)), ...row.cells);
  }
  records.push(xlsbRecord(Brt.EndSheetData));
  for (const [r1, r2, c1, c2] of options.merges ?? []) {
    records.push(xlsbRecord(Brt.MergeCell, new BinaryWriter().u32(r1).u32(r2).u32(c1).u32(c2)));
  }
  return concatBytes(records);
}

export interface XlsbNameSpec {
  name: string;
  rgce: Uint8Array;
  /** Sheet index for a local name. */
  itab?: number;
  hidden?: boolean;
}

export interface XlsbSpec {
  sheets: Array<{ name: string; data: Uint8Array; state?: number }>;
  sharedStrings?: string[];
  numFmts?: Array<{ id: number; code: string }>;
  cellXfs?: number[];
  date1904?: boolean;
  /** Extern sheet entries as [firstSheet, lastSheet], all pointing at this workbook. */
  externSheets?: Array<[number, number]>;
  names?: XlsbNameSpec[];
  extra?: Record<string, EntryContent>;
}

function workbookBin(spec: XlsbSpec): Uint8Array {
  const records: Uint8Array[] = [xlsbRecord(Brt.WbProp, new BinaryWriter().u32(spec.date1904 ? 1 : 0).u32(0).u32(0))];
  spec.sheets.forEach((sheet, i) => {
    records.push(
      xlsbRecord(Brt.BundleSh, new BinaryWriter().u32(sheet.state ?? 0).u32(i + 1).wide(`rId${i + 1}`).wide(sheet.name)),
    );
  });
  if (spec.externSheets) {
    records.push(xlsbRecord(Brt.SupSelf));
    const extern = new BinaryWriter().u32(spec.externSheets.length);
    for (const [first, last] of spec.externSheets) extern.u32(0).i32(first).i32(last);
    records.push(xlsbRecord(Brt.ExternSheet, extern));
  }
  for (const name of spec.names ?? []) {
    records.push(
      xlsbRecord(
        Brt.Name,
        new BinaryWriter()
          .u32(name.hidden ? 1 : 0)
          .u8(0)
          .u32(name.itab ?? 0xffffffff)
          .wide(name.name)
          .u32(name.rgce.length)
          .raw(name.rgce),
      ),
    );
  }
  return concatBytes(records);
}

function sharedStringsBin(strings: string[]): Uint8Array {
  return concatBytes([
    xlsbRecord(Brt.BeginSst, new BinaryWriter().u32(strings.length).u32(strings.length)),
    ...strings.map((text) => xlsbRecord(Brt.SstItem, new BinaryWriter().u8(0).wide(text))),
    xlsbRecord(Brt.EndSst),
  ]);
}

function stylesBin(spec: XlsbSpec): Uint8Array {
  const xfs = spec.cellXfs ?? [0];
  return concatBytes([
    ...(spec.numFmts ?? []).map((fmt) => xlsbRecord(Brt.Fmt, new BinaryWriter().u16(fmt.id).wide(fmt.code))),
    xlsbRecord(Brt.BeginCellXfs, new BinaryWriter().u32(xfs.length)),
    ...xfs.map((id) => xlsbRecord(Brt.Xf, new BinaryWriter().u16(0).u16(id).u16(0).u16(0).u16(0))),
    xlsbRecord(Brt.EndCellXfs),
  ]);
}

export function buildXlsb(spec: XlsbSpec): Uint8Array {
  const rels = spec.sheets.map(
    (_, i) => `<Relationship Id="rId${i + 1}" Type="${REL_BASE}/worksheet" Target="worksheets/sheet${i + 1}.bin"/>`,
  );
  const next = spec.sheets.length + 1;
  if (spec.sharedStrings) {
    rels.push(`<Relationship Id="rId${next}" Type="${REL_BASE}/sharedStrings" Target="sharedStrings.bin"/>`);
  }
  rels.push(`<Relationship Id="rId${next + 1}" Type="${REL_BASE}/styles" Target="styles.bin"/>`);

  const entries: Record<string, EntryContent> = {
    '[Content_Types].xml':
      '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="bin" ContentType="application/vnd.ms-excel.sheet.binary.macroEnabled.main"/></Types>',
    '_rels/.rels': `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${RELS_NS}"><Relationship Id="rId1" Type="${REL_BASE}/officeDocument" Target="xl/workbook.bin"/></Relationships>`,
    'xl/workbook.bin': workbookBin(spec),
    'xl/_rels/workbook.bin.rels': `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${RELS_NS}">${rels.join('')}</Relationships>`,
    'xl/styles.bin': stylesBin(spec),
  };
  if (spec.sharedStrings) entries['xl/sharedStrings.bin'] = sharedStringsBin(spec.sharedStrings);
  spec.sheets.forEach((sheet, i) => {
    entries[`xl/worksheets/sheet${i + 1}.bin`] = sheet.data;
  });
  return packZip({ ...entries, ...spec.extra });
}
