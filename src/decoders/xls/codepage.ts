import { TextDecoder } from 'util';
import { decodeLatin1 } from '../../container/byte-reader';

/** Windows code page numbers used by CODEPAGE records, mapped to WHATWG encoding labels. */
const CODEPAGE_LABELS: Record<number, string> = {
  367: 'ascii',
  866: 'ibm866',
  874: 'windows-874',
  932: 'shift_jis',
  936: 'gbk',
  949: 'euc-kr',
  950: 'big5',
  1250: 'windows-1250',
  1251: 'windows-1251',
  1252: 'windows-1252',
  1253: 'windows-1253',
  1254: 'windows-1254',
  1255: 'windows-1255',
  1256: 'windows-1256',
  1257: 'windows-1257',
  1258: 'windows-1258',
  10000: 'macintosh',
  32768: 'macintosh',
  32769: 'windows-1252',
};

export type ByteDecoder = (bytes: Uint8Array) => string;

/** Decoder for 8-bit text in the given code page, or `null` when the runtime does not know it. */
export function codepageDecoder(codepage: number): ByteDecoder | null {
  // BIFF8 declares 1200; its compressed strings are Latin-1
  if (codepage === 1200) return decodeLatin1;
  const label = CODEPAGE_LABELS[codepage];
  if (label === undefined) return null;
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label);
  } catch (error) {
    if (error instanceof RangeError) return null;
    throw error;
  }
  return (bytes) => decoder.decode(bytes);
}
