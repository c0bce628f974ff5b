import { outOfRange, truncated } from '../shared/index.js';

export type ByteOrder = 'le' | 'be';
export type IntWidth = 1 | 2 | 4;

const latin1 = new TextDecoder('latin1');

/**
 * Cursor over an immutable byte buffer.
 *
 * Every read checks the remaining length first and throws TRUNCATED without
 * moving the cursor; seeks outside [0, length] throw OUT_OF_RANGE.
 */
export class BinaryReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private readonly order: ByteOrder;
  private pos = 0;

  constructor(bytes: Uint8Array, order: ByteOrder = 'le') {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.order = order;
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.bytes.byteLength) {
      throw outOfRange(`Seek to ${offset} outside buffer of ${this.bytes.byteLength} bytes`, {
        offset,
        length: this.bytes.byteLength,
      });
    }
    this.pos = offset;
  }

  skip(count: number): void {
    this.ensure(count, 'skip');
    this.pos += count;
  }

  readU8(): number {
    return this.readUint(1);
  }

  readU16(order?: ByteOrder): number {
    return this.readUint(2, order);
  }

  readU32(order?: ByteOrder): number {
    return this.readUint(4, order);
  }

  readI8(): number {
    return this.readInt(1);
  }

  readI16(order?: ByteOrder): number {
    return this.readInt(2, order);
  }

  readI32(order?: ByteOrder): number {
    return this.readInt(4, order);
  }

  readUint(width: IntWidth, order: ByteOrder = this.order): number {
    this.ensure(width, `u${width * 8}`);
    const le = order === 'le';
    let value: number;
    switch (width) {
      case 1: value = this.view.getUint8(this.pos); break;
      case 2: value = this.view.getUint16(this.pos, le); break;
      default: value = this.view.getUint32(this.pos, le); break;
    }
    this.pos += width;
    return value;
  }

  readInt(width: IntWidth, order: ByteOrder = this.order): number {
    this.ensure(width, `i${width * 8}`);
    const le = order === 'le';
    let value: number;
    switch (width) {
      case 1: value = this.view.getInt8(this.pos); break;
      case 2: value = this.view.getInt16(this.pos, le); break;
      default: value = this.view.getInt32(this.pos, le); break;
    }
    this.pos += width;
    return value;
  }

  readF32(order: ByteOrder = this.order): number {
    this.ensure(4, 'f32');
    const value = this.view.getFloat32(this.pos, order === 'le');
    this.pos += 4;
    return value;
  }

  readF64(order: ByteOrder = this.order): number {
    this.ensure(8, 'f64');
    const value = this.view.getFloat64(this.pos, order === 'le');
    this.pos += 8;
    return value;
  }

  /** Returns the next u32 without advancing. */
  peekU32(order: ByteOrder = this.order): number {
    this.ensure(4, 'u32');
    return this.view.getUint32(this.pos, order === 'le');
  }

  readBytes(count: number): Uint8Array {
    this.ensure(count, 'bytes');
    const slice = this.bytes.slice(this.pos, this.pos + count);
    this.pos += count;
    return slice;
  }

  /** Fixed-width text field, trailing NUL padding removed. */
  readFixedString(count: number): string {
    return latin1.decode(this.readBytes(count)).replace(/\0+$/, '');
  }

  /** Length field first, then that many bytes. The cursor is restored if the body is short. */
  readPrefixedBytes(prefixWidth: IntWidth = 1): Uint8Array {
    const start = this.pos;
    const count = this.readUint(prefixWidth);
    try {
      return this.readBytes(count);
    } catch (err) {
      this.pos = start;
      throw err;
    }
  }

  readPrefixedString(prefixWidth: IntWidth = 1): string {
    return latin1.decode(this.readPrefixedBytes(prefixWidth));
  }

  private ensure(count: number, what: string): void {
    if (!Number.isInteger(count) || count < 0) {
      throw outOfRange(`Invalid ${what} length ${count}`, { offset: this.pos, count });
    }
    if (count > this.remaining) {
      throw truncated(
        `Need ${count} bytes for ${what} at offset ${this.pos}, ${this.remaining} remain`,
        { offset: this.pos, needed: count, remaining: this.remaining },
      );
    }
  }
}
