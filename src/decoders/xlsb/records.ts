/** Record ids of the XLSB parts this decoder reads. */
export const Brt = {
  RowHdr: 0x0000,
  CellBlank: 0x0001,
  CellRk: 0x0002,
  CellError: 0x0003,
  CellBool: 0x0004,
  CellReal: 0x0005,
  CellSt: 0x0006,
  CellIsst: 0x0007,
  FmlaString: 0x0008,
  FmlaNum: 0x0009,
  FmlaBool: 0x000a,
  FmlaError: 0x000b,
  SstItem: 0x0013,
  Name: 0x0027,
  Fmt: 0x002c,
  Xf: 0x002f,
  CellRString: 0x003e,
  BeginSheetData: 0x0091,
  EndSheetData: 0x0092,
  WsDim: 0x0094,
  WbProp: 0x0099,
  BundleSh: 0x009c,
  BeginSst: 0x009f,
  EndSst: 0x00a0,
  MergeCell: 0x00b0,
  SupBookSrc: 0x0162,
  SupSelf: 0x0163,
  SupSame: 0x0164,
  SupAddin: 0x0166,
  ExternSheet: 0x016a,
  BeginCellXfs: 0x0269,
  EndCellXfs: 0x026a,
} as const;
