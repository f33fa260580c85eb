import { TextDecoder } from 'util';
import { StreamFramingError } from '../errors';

const utf16 = new TextDecoder('utf-16le');

export function decodeUtf16(bytes: Uint8Array): string {
  return utf16.decode(bytes);
}

/**
 * Single-byte text: BIFF "compressed" strings and pre-BIFF8 labels. Each
 * byte is its own code point; the WHATWG `latin1` label is windows-1252.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/** Little-endian cursor over a record payload. */
export class ByteReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  u8(): number {
    this.ensure(1);
    return this.view.getUint8(this.pos++);
  }

  u16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  i16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.pos, true);
    this.pos += 2;
    return value;
  }

  u32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  i32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  f64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  take(length: number): Uint8Array {
    this.ensure(length);
    const slice = this.bytes.subarray(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  skip(length: number): void {
    this.ensure(length);
    this.pos += length;
  }

  /** XLSB `XLWideString`: u32 character count followed by UTF-16LE text. */
  wideString(): string {
    const chars = this.u32();
    return decodeUtf16(this.take(chars * 2));
  }

  /** XLSB `XLNullableWideString`: a count of 0xFFFFFFFF means no string. */
  nullableWideString(): string | null {
    const chars = this.u32();
    if (chars === 0xffffffff) return null;
    return decodeUtf16(this.take(chars * 2));
  }

  private ensure(length: number): void {
    if (length < 0 || this.pos + length > this.bytes.length) {
      throw new StreamFramingError(
        `Needed ${length} bytes but only ${this.bytes.length - this.pos} remain in the record`,
        this.pos,
      );
    }
  }
}
