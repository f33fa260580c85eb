export type DateTimeKind = 'date' | 'time' | 'datetime';

export type CellValue =
  | { type: 'empty' }
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'datetime'; value: Date; kind: DateTimeKind; serial: number | null }
  | { type: 'duration'; milliseconds: number; serial: number | null }
  | { type: 'error'; code: string; detail?: string };

export type CellValueType = CellValue['type'];

/** Codes for cells that could not be decoded, as opposed to errors stored in the file. */
export const DecodeErrorCode = {
  SharedString: '#BAD_STRING_INDEX',
  Style: '#BAD_STYLE_INDEX',
  NumberFormat: '#BAD_NUMBER_FORMAT',
  DateRange: '#DATE_RANGE',
  Malformed: '#MALFORMED_CELL',
} as const;

/** Error codes as stored in BIFF and XLSB cell records. */
const BINARY_ERROR_CODES: Record<number, string> = {
  0x00: '#NULL!',
  0x07: '#DIV/0!',
  0x0f: '#VALUE!',
  0x17: '#REF!',
  0x1d: '#NAME?',
  0x24: '#NUM!',
  0x2a: '#N/A',
  0x2b: '#GETTING_DATA',
};

export const EMPTY: CellValue = { type: 'empty' };

export function boolCell(value: boolean): CellValue {
  return { type: 'bool', value };
}

export function intCell(value: number | bigint): CellValue {
  return { type: 'int', value: BigInt(value) };
}

export function floatCell(value: number): CellValue {
  return { type: 'float', value };
}

export function stringCell(value: string): CellValue {
  return { type: 'string', value };
}

export function errorCell(code: string, detail?: string): CellValue {
  return detail === undefined ? { type: 'error', code } : { type: 'error', code, detail };
}

export function binaryErrorCell(code: number): CellValue {
  const text = BINARY_ERROR_CODES[code];
  return text === undefined
    ? errorCell(DecodeErrorCode.Malformed, `unknown error code 0x${code.toString(16)}`)
    : errorCell(text);
}

export function isEmpty(cell: CellValue | undefined): boolean {
  return cell === undefined || cell.type === 'empty';
}

export type PlainValue = string | number | boolean | Date | null;

/**
 * Host-friendly rendering of a cell: ints become numbers when they fit,
 * durations become milliseconds, errors their code.
 */
export function toPlainValue(cell: CellValue): PlainValue {
  switch (cell.type) {
    case 'empty':
      return null;
    case 'bool':
    case 'float':
    case 'string':
    case 'datetime':
      return cell.value;
    case 'int': {
      const asNumber = Number(cell.value);
      return Number.isSafeInteger(asNumber) ? asNumber : cell.value.toString();
    }
    case 'duration':
      return cell.milliseconds;
    case 'error':
      return cell.code;
  }
}

/** Text rendering used by delimited and table exports. */
export function cellToText(cell: CellValue): string {
  switch (cell.type) {
    case 'empty':
      return '';
    case 'bool':
      return cell.value ? 'TRUE' : 'FALSE';
    case 'int':
      return cell.value.toString();
    case 'float':
    case 'string':
      return String(cell.value);
    case 'datetime':
      return formatDateTime(cell.value, cell.kind);
    case 'duration':
      return formatDuration(cell.milliseconds);
    case 'error':
      return cell.code;
  }
}

function formatDateTime(value: Date, kind: DateTimeKind): string {
  const iso = value.toISOString();
  if (kind === 'date') return iso.slice(0, 10);
  if (kind === 'time') return iso.slice(11, 19);
  return iso.slice(0, 19);
}

function formatDuration(milliseconds: number): string {
  const sign = milliseconds < 0 ? '-' : '';
  const totalSeconds = Math.round(Math.abs(milliseconds) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${sign}${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}
