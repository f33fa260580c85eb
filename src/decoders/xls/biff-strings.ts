import { decodeLatin1, decodeUtf16 } from '../../container/byte-reader';
import type { ByteReader } from '../../container/byte-reader';
import { StreamFramingError } from '../../errors';
import type { ByteDecoder } from './codepage';
import type { BiffVersion } from './records';

/** How a sheet's strings are stored: BIFF8 carries UTF-16 or compressed text, BIFF5 code-page bytes. */
export interface BiffText {
  version: BiffVersion;
  decode8: ByteDecoder;
}

const FLAG_HIGH_BYTE = 0x01;
const FLAG_EXT = 0x04;
const FLAG_RICH = 0x08;

function readChars(reader: ByteReader, count: number, highByte: boolean): string {
  return highByte ? decodeUtf16(reader.take(count * 2)) : decodeLatin1(reader.take(count));
}

/** String with an 8-bit length: sheet names in BOUNDSHEET. */
export function readShortString(reader: ByteReader, text: BiffText): string {
  const count = reader.u8();
  if (text.version === 5) return text.decode8(reader.take(count));
  return readChars(reader, count, (reader.u8() & FLAG_HIGH_BYTE) !== 0);
}

/** String with a 16-bit length: LABEL, RSTRING, STRING and FORMAT. */
export function readLongString(reader: ByteReader, text: BiffText): string {
  const count = reader.u16();
  if (text.version === 5) return text.decode8(reader.take(count));
  return readChars(reader, count, (reader.u8() & FLAG_HIGH_BYTE) !== 0);
}

/** String whose length was given earlier in the record (NAME). */
export function readStringNoCount(reader: ByteReader, count: number, text: BiffText): string {
  if (text.version === 5) return text.decode8(reader.take(count));
  return readChars(reader, count, (reader.u8() & FLAG_HIGH_BYTE) !== 0);
}

/**
 * Reads a record whose payload runs on into CONTINUE records. Plain
 * fields may straddle a boundary; character data restarts after one
 * with a fresh option byte that says whether the rest is UTF-16.
 */
export class ContinuedReader {
  private segment = 0;
  private pos = 0;

  constructor(private readonly segments: readonly Uint8Array[]) {}

  get exhausted(): boolean {
    this.skipEmpty();
    return this.segment >= this.segments.length;
  }

  u8(): number {
    this.skipEmpty();
    const current = this.segments[this.segment];
    if (current === undefined) throw new StreamFramingError('String table ends inside an entry');
    return current[this.pos++];
  }

  u16(): number {
    return this.u8() | (this.u8() << 8);
  }

  u32(): number {
    return (this.u16() | (this.u16() << 16)) >>> 0;
  }

  skip(length: number): void {
    for (let i = 0; i < length; i++) this.u8();
  }

  /** Next rich extended string of the shared string table. */
  richString(): string {
    const count = this.u16();
    const flags = this.u8();
    const runs = flags & FLAG_RICH ? this.u16() : 0;
    const extLength = flags & FLAG_EXT ? this.u32() : 0;
    const text = this.chars(count, (flags & FLAG_HIGH_BYTE) !== 0);
    this.skip(runs * 4 + extLength);
    return text;
  }

  private chars(count: number, initialHighByte: boolean): string {
    let highByte = initialHighByte;
    let text = '';
    let left = count;
    while (left > 0) {
      const current = this.segments[this.segment];
      if (current === undefined) throw new StreamFramingError('String table ends inside a string');
      const width = highByte ? 2 : 1;
      const fits = Math.min(left, Math.floor((current.length - this.pos) / width));
      if (fits > 0) {
        const bytes = current.subarray(this.pos, this.pos + fits * width);
        text += highByte ? decodeUtf16(bytes) : decodeLatin1(bytes);
        this.pos += fits * width;
        left -= fits;
      }
      if (left > 0) {
        this.segment++;
        this.pos = 0;
        const next = this.segments[this.segment];
        if (next === undefined || next.length === 0) throw new StreamFramingError('String table ends inside a string');
        highByte = (next[this.pos++] & FLAG_HIGH_BYTE) !== 0;
      }
    }
    return text;
  }

  private skipEmpty(): void {
    while (this.segment < this.segments.length && this.pos >= this.segments[this.segment].length) {
      this.segment++;
      this.pos = 0;
    }
  }
}
