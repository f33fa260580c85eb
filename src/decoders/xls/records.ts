/** BIFF5/BIFF8 record ids read by the legacy decoder. */
export const Biff = {
  Formula: 0x0006,
  Eof: 0x000a,
  ExternSheet: 0x0017,
  Name: 0x0018,
  DateMode: 0x0022,
  FilePass: 0x002f,
  Continue: 0x003c,
  CodePage: 0x0042,
  BoundSheet: 0x0085,
  MulRk: 0x00bd,
  MulBlank: 0x00be,
  RString: 0x00d6,
  Xf: 0x00e0,
  MergedCells: 0x00e5,
  Sst: 0x00fc,
  LabelSst: 0x00fd,
  SupBook: 0x01ae,
  Dimensions: 0x0200,
  Blank: 0x0201,
  Number: 0x0203,
  Label: 0x0204,
  BoolErr: 0x0205,
  String: 0x0207,
  Array: 0x0221,
  Table: 0x0236,
  Rk: 0x027e,
  Format: 0x041e,
  ShrFmla: 0x04bc,
  Bof: 0x0809,
} as const;

/** BOF substream types. */
export const Substream = {
  Globals: 0x0005,
  Worksheet: 0x0010,
  Chart: 0x0020,
  Macro: 0x0040,
} as const;

export type BiffVersion = 5 | 8;
