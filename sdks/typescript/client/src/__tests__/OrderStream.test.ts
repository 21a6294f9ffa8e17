/**
 * Unit tests for the little-endian order stream cursors.
 */

import { describe, it, expect } from 'vitest';
import { OrderErrorCodes } from '@orderwire/core';
import { OrderReader, OrderWriter } from '../protocol/OrderStream.js';
import { catchOrderError, readerOf } from './orderTestUtils.js';

describe('OrderReader', () => {
  it('should read little-endian integers', () => {
    const reader = readerOf(0x34, 0x12, 0xff, 0xff, 0x78, 0x56, 0x34, 0x12, 0x80);

    expect(reader.readUInt16()).toBe(0x1234);
    expect(reader.readInt16()).toBe(-1);
    expect(reader.readUInt32()).toBe(0x12345678);
    expect(reader.readInt8()).toBe(-128);
    expect(reader.remaining).toBe(0);
  });

  it('should fail with Truncation instead of reading a partial value', () => {
    const reader = readerOf(0x01);
    const error = catchOrderError(() => reader.readUInt16());

    expect(error.code).toBe(OrderErrorCodes.Truncation);
    expect(error.message).toBe('field needs 2 bytes, 1 remaining at offset 0');
    expect(reader.position).toBe(0);
  });

  it('should name the structure in ensure failures', () => {
    const reader = readerOf(0x01, 0x02);
    expect(() => reader.ensure(3, 'color')).toThrow('color needs 3 bytes, 2 remaining at offset 0');
  });

  it('should copy byte blocks out of the buffer', () => {
    const source = Uint8Array.from([1, 2, 3, 4]);
    const reader = new OrderReader(source, 1);
    const block = reader.readBytes(2);
    source[1] = 0x99;

    expect(Array.from(block)).toEqual([2, 3]);
    expect(reader.position).toBe(3);
  });

  it('should honour the byte offset of a subarray', () => {
    const source = Uint8Array.from([0xaa, 0xbb, 0x01, 0x02]);
    const reader = new OrderReader(source.subarray(2));

    expect(reader.readUInt16()).toBe(0x0201);
  });

  it('should seek within the buffer only', () => {
    const reader = readerOf(1, 2, 3);

    reader.seek(3);
    expect(reader.remaining).toBe(0);
    expect(catchOrderError(() => reader.seek(4)).code).toBe(OrderErrorCodes.Truncation);
  });

  it('should skip padding', () => {
    const reader = readerOf(0, 0, 7);

    reader.skip(2);
    expect(reader.readUInt8()).toBe(7);
    expect(() => reader.skip(1)).toThrow('padding needs 1 bytes, 0 remaining at offset 3');
  });
});

describe('OrderWriter', () => {
  it('should write little-endian integers', () => {
    const writer = new OrderWriter();
    writer.writeUInt16(0x1234);
    writer.writeInt16(-2);
    writer.writeUInt32(0xdeadbeef);

    expect(Array.from(writer.toUint8Array())).toEqual([
      0x34, 0x12, 0xfe, 0xff, 0xef, 0xbe, 0xad, 0xde,
    ]);
  });

  it('should grow past its initial capacity', () => {
    const writer = new OrderWriter(1);
    for (let i = 0; i < 5; i++) {
      writer.writeUInt32(i);
    }

    expect(writer.length).toBe(20);
    expect(writer.toUint8Array()[16]).toBe(4);
  });

  it('should patch previously written fields', () => {
    const writer = new OrderWriter();
    writer.writeUInt16(0);
    writer.writeZero(1);
    writer.setUInt16At(0, 0x0102);
    writer.setUInt8At(2, 0x03);

    expect(Array.from(writer.toUint8Array())).toEqual([0x02, 0x01, 0x03]);
  });

  it('should refuse to patch beyond the written bytes', () => {
    const writer = new OrderWriter();
    writer.writeUInt8(0);

    expect(() => writer.setUInt16At(0, 1)).toThrow(RangeError);
  });
});
