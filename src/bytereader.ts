// Bounds-checked cursor over an immutable byte buffer

import { OutOfBoundsError } from './errors.js';

export class ByteReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private pos: number;

  constructor(data: Uint8Array, offset: number = 0) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.seek(offset);
  }

  get offset(): number {
    return this.pos;
  }

  get length(): number {
    return this.data.length;
  }

  remaining(): number {
    return this.data.length - this.pos;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.data.length) {
      throw new OutOfBoundsError(`seek to ${offset} outside buffer of ${this.data.length} bytes`);
    }
    this.pos = offset;
  }

  skip(count: number): void {
    this.require(this.pos, count);
    this.pos += count;
  }

  peek(): number {
    return this.u8At(this.pos);
  }

  readU8(): number {
    const value = this.u8At(this.pos);
    this.pos += 1;
    return value;
  }

  readU16LE(): number {
    const value = this.u16At(this.pos);
    this.pos += 2;
    return value;
  }

  readU16BE(): number {
    const value = this.u16BEAt(this.pos);
    this.pos += 2;
    return value;
  }

  readU24(): number {
    const value = this.u24At(this.pos);
    this.pos += 3;
    return value;
  }

  readU32LE(): number {
    const value = this.u32At(this.pos);
    this.pos += 4;
    return value;
  }

  readU32BE(): number {
    const value = this.u32BEAt(this.pos);
    this.pos += 4;
    return value;
  }

  readF64LE(): number {
    this.require(this.pos, 8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  // Returns a view into the underlying buffer, not a copy
  readBytes(count: number): Uint8Array {
    const bytes = this.bytesAt(this.pos, count);
    this.pos += count;
    return bytes;
  }

  // Absolute reads; these never move the cursor

  u8At(offset: number): number {
    this.require(offset, 1);
    return this.data[offset];
  }

  u16At(offset: number): number {
    this.require(offset, 2);
    return this.view.getUint16(offset, true);
  }

  u16BEAt(offset: number): number {
    this.require(offset, 2);
    return this.view.getUint16(offset, false);
  }

  u24At(offset: number): number {
    this.require(offset, 3);
    return this.data[offset] | (this.data[offset + 1] << 8) | (this.data[offset + 2] << 16);
  }

  u32At(offset: number): number {
    this.require(offset, 4);
    return this.view.getUint32(offset, true);
  }

  u32BEAt(offset: number): number {
    this.require(offset, 4);
    return this.view.getUint32(offset, false);
  }

  bytesAt(offset: number, count: number): Uint8Array {
    this.require(offset, count);
    return this.data.subarray(offset, offset + count);
  }

  private require(offset: number, count: number): void {
    if (!Number.isInteger(offset) || !Number.isInteger(count) || offset < 0 || count < 0 || offset + count > this.data.length) {
      throw new OutOfBoundsError(`read of ${count} bytes at offset ${offset} past end of ${this.data.length}-byte buffer`);
    }
  }
}
