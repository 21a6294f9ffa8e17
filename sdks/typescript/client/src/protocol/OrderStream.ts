/**
 * Bounds-checked byte cursors for the drawing-order wire format.
 *
 * All multi-byte integers in drawing orders are LITTLE-ENDIAN. Every read validates the
 * remaining length before consuming anything, so a short buffer fails with a
 * Truncation error instead of yielding a partial value.
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';

/**
 * Read cursor over one update PDU's order data.
 */
export class OrderReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset: number;

  constructor(bytes: Uint8Array, offset = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = offset;
  }

  /** Current read offset from the start of the buffer. */
  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.bytes.length;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  /**
   * Throws a Truncation error unless at least `count` bytes remain.
   */
  ensure(count: number, what = 'field'): void {
    if (count < 0 || this.remaining < count) {
      throw new OrderError(
        OrderErrorCodes.Truncation,
        `${what} needs ${count} bytes, ${this.remaining} remaining at offset ${this.offset}`
      );
    }
  }

  readUInt8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readInt8(): number {
    this.ensure(1);
    const value = this.view.getInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUInt16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readInt16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return value;
  }

  readUInt32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  /**
   * Copies `count` bytes out of the buffer. The copy is owned by the caller.
   */
  readBytes(count: number, what = 'byte block'): Uint8Array {
    this.ensure(count, what);
    const value = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return value;
  }

  skip(count: number, what = 'padding'): void {
    this.ensure(count, what);
    this.offset += count;
  }

  /**
   * Moves the cursor to an absolute offset within the buffer.
   */
  seek(position: number): void {
    if (position < 0 || position > this.bytes.length) {
      throw new OrderError(
        OrderErrorCodes.Truncation,
        `Cannot seek to ${position} in a buffer of ${this.bytes.length} bytes`
      );
    }
    this.offset = position;
  }
}

/**
 * Growable little-endian writer used by the encoders.
 */
export class OrderWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this.offset;
  }

  private reserve(count: number): void {
    const needed = this.offset + count;
    if (needed <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }

  writeUInt8(value: number): void {
    this.reserve(1);
    this.view.setUint8(this.offset, value & 0xff);
    this.offset += 1;
  }

  writeInt8(value: number): void {
    this.reserve(1);
    this.view.setInt8(this.offset, value);
    this.offset += 1;
  }

  writeUInt16(value: number): void {
    this.reserve(2);
    this.view.setUint16(this.offset, value & 0xffff, true);
    this.offset += 2;
  }

  writeInt16(value: number): void {
    this.reserve(2);
    this.view.setInt16(this.offset, value, true);
    this.offset += 2;
  }

  writeUInt32(value: number): void {
    this.reserve(4);
    this.view.setUint32(this.offset, value >>> 0, true);
    this.offset += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  writeZero(count: number): void {
    this.reserve(count);
    this.buffer.fill(0, this.offset, this.offset + count);
    this.offset += count;
  }

  /**
   * Overwrites a previously written 16-bit field, e.g. a length known only after the body.
   */
  setUInt16At(position: number, value: number): void {
    if (position < 0 || position + 2 > this.offset) {
      throw new RangeError(`Cannot patch 2 bytes at ${position}; ${this.offset} bytes written`);
    }
    this.view.setUint16(position, value & 0xffff, true);
  }

  setUInt8At(position: number, value: number): void {
    if (position < 0 || position + 1 > this.offset) {
      throw new RangeError(`Cannot patch 1 byte at ${position}; ${this.offset} bytes written`);
    }
    this.view.setUint8(position, value & 0xff);
  }

  /**
   * Returns a copy of the written bytes.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
