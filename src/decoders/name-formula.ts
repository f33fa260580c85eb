import { formatCellRef, quoteSheetName } from '../cell-ref';
import { ByteReader, decodeLatin1, decodeUtf16 } from '../container/byte-reader';
import { StreamFramingError } from '../errors';

export type FormulaDialect = 'biff8' | 'xlsb';

/** Resolves an extern-sheet index to the `Sheet!` prefix text, or `null` when it points nowhere. */
export type SheetPrefixResolver = (ixti: number) => string | null;

const ERROR_LITERALS: Record<number, string> = {
  0x00: '#NULL!',
  0x07: '#DIV/0!',
  0x0f: '#VALUE!',
  0x17: '#REF!',
  0x1d: '#NAME?',
  0x24: '#NUM!',
  0x2a: '#N/A',
};

/**
 * Renders the parsed formula of a defined name back to reference text
 * (`Sheet1!$A$1:$B$4`, `Data!$A:$A,Data!$C:$C`, constants). Only the
 * token subset that occurs in name definitions is understood; anything
 * else returns `null`.
 */
export function renderNameFormula(rgce: Uint8Array, dialect: FormulaDialect, sheetPrefix: SheetPrefixResolver): string | null {
  try {
    return renderTokens(rgce, dialect, sheetPrefix);
  } catch (error) {
    if (error instanceof StreamFramingError) return null;
    throw error;
  }
}

function renderTokens(rgce: Uint8Array, dialect: FormulaDialect, sheetPrefix: SheetPrefixResolver): string | null {
  const reader = new ByteReader(rgce);
  const stack: string[] = [];
  const row = (): number => (dialect === 'xlsb' ? reader.u32() : reader.u16());

  const cellText = (r: number, colField: number): string => {
    const address = { row: r, col: colField & 0x3fff };
    const colRelative = (colField & 0x4000) !== 0;
    const rowRelative = (colField & 0x8000) !== 0;
    const text = formatCellRef(address);
    const column = text.replace(/\d+$/, '');
    const rowText = text.slice(column.length);
    return `${colRelative ? '' : '$'}${column}${rowRelative ? '' : '$'}${rowText}`;
  };
  const withSheet = (ixti: number, ref: string): string => {
    const prefix = sheetPrefix(ixti);
    return prefix === null ? '#REF!' : `${prefix}!${ref}`;
  };

  while (reader.remaining > 0) {
    const ptg = reader.u8();
    const base = ptg >= 0x20 ? (ptg & 0x1f) | 0x20 : ptg;
    switch (base) {
      case 0x24: {
        const r = row();
        stack.push(cellText(r, reader.u16()));
        break;
      }
      case 0x25: {
        const r1 = row();
        const r2 = row();
        const c1 = reader.u16();
        const c2 = reader.u16();
        stack.push(`${cellText(r1, c1)}:${cellText(r2, c2)}`);
        break;
      }
      case 0x3a: {
        const ixti = reader.u16();
        const r = row();
        stack.push(withSheet(ixti, cellText(r, reader.u16())));
        break;
      }
      case 0x3b: {
        const ixti = reader.u16();
        const r1 = row();
        const r2 = row();
        const c1 = reader.u16();
        const c2 = reader.u16();
        stack.push(withSheet(ixti, `${cellText(r1, c1)}:${cellText(r2, c2)}`));
        break;
      }
      case 0x3c:
        reader.skip(2 + (dialect === 'xlsb' ? 6 : 4));
        stack.push('#REF!');
        break;
      case 0x3d:
        reader.skip(2 + (dialect === 'xlsb' ? 12 : 8));
        stack.push('#REF!');
        break;
      case 0x29:
        // memory-function header wraps the reference tokens that follow
        reader.skip(2);
        break;
      case 0x10:
      case 0x11: {
        const right = stack.pop();
        const left = stack.pop();
        if (left === undefined || right === undefined) return null;
        stack.push(`${left}${base === 0x10 ? ',' : ':'}${right}`);
        break;
      }
      case 0x15:
        break;
      case 0x19: {
        const flags = reader.u8();
        const data = reader.u16();
        // tAttrChoose carries a jump table after the token
        if (flags & 0x04) reader.skip((data + 1) * 2);
        break;
      }
      case 0x17:
        stack.push(`"${readFormulaString(reader, dialect).replace(/"/g, '""')}"`);
        break;
      case 0x1c:
        stack.push(ERROR_LITERALS[reader.u8()] ?? '#N/A');
        break;
      case 0x1d:
        stack.push(reader.u8() === 0 ? 'FALSE' : 'TRUE');
        break;
      case 0x1e:
        stack.push(String(reader.u16()));
        break;
      case 0x1f:
        stack.push(String(reader.f64()));
        break;
      default:
        return null;
    }
  }
  return stack.length === 1 ? stack[0] : null;
}

function readFormulaString(reader: ByteReader, dialect: FormulaDialect): string {
  if (dialect === 'xlsb') {
    const chars = reader.u16();
    return decodeUtf16(reader.take(chars * 2));
  }
  const chars = reader.u8();
  const highByte = (reader.u8() & 0x01) !== 0;
  return highByte ? decodeUtf16(reader.take(chars * 2)) : decodeLatin1(reader.take(chars));
}

export function sheetRangePrefix(names: readonly string[], first: number, last: number): string | null {
  const from = names[first];
  const to = names[last];
  if (from === undefined || to === undefined) return null;
  if (first === last) return quoteSheetName(from);
  return quoteSheetName(`${from}:${to}`);
}
