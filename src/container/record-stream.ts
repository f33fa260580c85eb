import { StreamFramingError } from '../errors';

export interface BinaryRecord {
  type: number;
  /** Offset of the record header within the stream. */
  offset: number;
  data: Uint8Array;
}

/**
 * Forward-only record reader with seek support. Every cursor creates its
 * own stream over the shared bytes, so positions are never shared.
 */
export abstract class RecordStream {
  private pos: number;
  private lookahead: BinaryRecord | null = null;

  constructor(protected readonly bytes: Uint8Array, start = 0) {
    this.pos = start;
  }

  get position(): number {
    return this.lookahead ? this.lookahead.offset : this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  get atEnd(): boolean {
    return this.lookahead === null && this.pos >= this.bytes.length;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.bytes.length) {
      throw new StreamFramingError(`Seek outside the stream (length ${this.bytes.length})`, offset);
    }
    this.lookahead = null;
    this.pos = offset;
  }

  /** Next record, or `null` at the physical end of the stream. */
  next(): BinaryRecord | null {
    if (this.lookahead) {
      const record = this.lookahead;
      this.lookahead = null;
      return record;
    }
    if (this.pos >= this.bytes.length) return null;
    const offset = this.pos;
    const header = this.readHeader(offset);
    const start = offset + header.headerLength;
    const end = start + header.size;
    if (end > this.bytes.length) {
      throw new StreamFramingError(
        `Record 0x${header.type.toString(16)} declares ${header.size} bytes but ${this.bytes.length - start} remain`,
        offset,
      );
    }
    this.pos = end;
    return { type: header.type, offset, data: this.bytes.subarray(start, end) };
  }

  peek(): BinaryRecord | null {
    if (!this.lookahead) this.lookahead = this.next();
    return this.lookahead;
  }

  protected abstract readHeader(offset: number): { type: number; size: number; headerLength: number };
}

/** BIFF framing: u16 record type, u16 payload size. */
export class BiffRecordStream extends RecordStream {
  protected readHeader(offset: number): { type: number; size: number; headerLength: number } {
    if (offset + 4 > this.bytes.length) {
      throw new StreamFramingError('Incomplete record header', offset);
    }
    const b = this.bytes;
    return {
      type: b[offset] | (b[offset + 1] << 8),
      size: b[offset + 2] | (b[offset + 3] << 8),
      headerLength: 4,
    };
  }
}

/** XLSB framing: 7-bit varint type (≤ 2 bytes) and size (≤ 4 bytes). */
export class XlsbRecordStream extends RecordStream {
  protected readHeader(offset: number): { type: number; size: number; headerLength: number } {
    let p = offset;
    const readByte = (): number => {
      if (p >= this.bytes.length) throw new StreamFramingError('Incomplete record header', offset);
      return this.bytes[p++];
    };

    let type = 0;
    for (let i = 0; i < 2; i++) {
      const byte = readByte();
      type |= (byte & 0x7f) << (7 * i);
      if ((byte & 0x80) === 0) break;
      if (i === 1) throw new StreamFramingError('Record type longer than two bytes', offset);
    }

    let size = 0;
    for (let i = 0; i < 4; i++) {
      const byte = readByte();
      size += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) break;
      if (i === 3) throw new StreamFramingError('Record size longer than four bytes', offset);
    }
    return { type, size, headerLength: p - offset };
  }
}
