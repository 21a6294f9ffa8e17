/**
 * Unit tests for the secondary (cache) order bodies.
 */

import { describe, it, expect } from 'vitest';
import { GlyphSupportLevel, OrderErrorCodes } from '@orderwire/core';
import { OrderReader, OrderWriter } from '../protocol/OrderStream.js';
import { NO_BITMAP_COMPRESSION_HDR } from '../protocol/OrderFlags.js';
import { SecondaryOrderType } from '../protocol/OrderTypes.js';
import {
  computeSecondaryOrderEnd,
  readCacheBitmapOrder,
  readCacheBitmapV2Order,
  readCacheBitmapV3Order,
  readCacheBrushOrder,
  readCacheColorTableOrder,
  readCacheGlyphOrder,
  readSecondaryOrder,
  writeCacheBrushOrder,
  writeSecondaryOrder,
} from '../protocol/SecondaryOrderCodec.js';
import {
  BITMAP_CACHE_WAITING_LIST_INDEX,
  BRUSH_DATA_SIZE,
  type CacheBitmapOrder,
  type CacheBrushOrder,
  type GlyphData,
  type SecondaryDrawingOrder,
} from '../protocol/SecondaryOrders.js';
import { catchOrderError, readerOf } from './orderTestUtils.js';

/** Writes a body and reads it back through the type dispatch. */
function roundTrip(order: SecondaryDrawingOrder): SecondaryDrawingOrder {
  const writer = new OrderWriter();
  const header = writeSecondaryOrder(writer, order);
  const reader = new OrderReader(writer.toUint8Array());
  const decoded = readSecondaryOrder(
    reader,
    header.orderType,
    header.extraFlags,
    GlyphSupportLevel.Encode
  );
  expect(reader.remaining).toBe(0);
  return decoded;
}

function brushData(pattern: (index: number) => number, size: number): Uint8Array {
  const data = new Uint8Array(BRUSH_DATA_SIZE);
  for (let i = 0; i < size; i++) {
    data[i] = pattern(i);
  }
  return data;
}

describe('SecondaryOrderCodec', () => {
  describe('computeSecondaryOrderEnd', () => {
    it('should add the length adjustment to the body start', () => {
      expect(computeSecondaryOrderEnd(10, 3)).toBe(20);
      expect(computeSecondaryOrderEnd(10, -7)).toBe(10);
    });
  });

  describe('cache bitmap', () => {
    const bitmapHeader = [0x01, 0x00, 0x04, 0x02, 0x08];

    it('should read an uncompressed bitmap', () => {
      const reader = readerOf(...bitmapHeader, 0x08, 0x00, 0x10, 0x00, 1, 2, 3, 4, 5, 6, 7, 8);

      expect(readCacheBitmapOrder(reader, false, 0)).toEqual({
        cacheId: 1,
        bitmapWidth: 4,
        bitmapHeight: 2,
        bitmapBpp: 8,
        bitmapLength: 8,
        cacheIndex: 0x10,
        compressed: false,
        bitmapComprHdr: null,
        bitmapDataStream: Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]),
      });
    });

    it('should split off the compression header', () => {
      const reader = readerOf(
        ...bitmapHeader,
        0x0c,
        0x00,
        0x10,
        0x00,
        ...[0, 1, 2, 3, 4, 5, 6, 7],
        ...[9, 9, 9, 9]
      );
      const order = readCacheBitmapOrder(reader, true, 0);

      expect(order.bitmapLength).toBe(4);
      expect(Array.from(order.bitmapComprHdr ?? [])).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
      expect(Array.from(order.bitmapDataStream)).toEqual([9, 9, 9, 9]);
    });

    it('should honour a missing compression header', () => {
      const reader = readerOf(...bitmapHeader, 0x04, 0x00, 0x10, 0x00, 9, 9, 9, 9);
      const order = readCacheBitmapOrder(reader, true, NO_BITMAP_COMPRESSION_HDR);

      expect(order.bitmapComprHdr).toBeNull();
      expect(order.bitmapLength).toBe(4);
    });

    it('should reject a header that leaves no bitmap data', () => {
      const reader = readerOf(...bitmapHeader, 0x08, 0x00, 0x10, 0x00, 0, 0, 0, 0, 0, 0, 0, 0);
      const error = catchOrderError(() => readCacheBitmapOrder(reader, true, 0));

      expect(error.code).toBe(OrderErrorCodes.LengthFraming);
      expect(error.message).toBe('Cache bitmap declares 0 data bytes');
    });

    it('should reject a zero bpp', () => {
      const reader = readerOf(0x01, 0x00, 0x04, 0x02, 0x00, 0x01, 0x00, 0x00, 0x00, 0xff);
      const error = catchOrderError(() => readCacheBitmapOrder(reader, false, 0));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('Invalid cache bitmap bpp 0');
    });

    it('should round-trip with and without a compression header', () => {
      const bitmap: CacheBitmapOrder = {
        cacheId: 2,
        bitmapWidth: 8,
        bitmapHeight: 8,
        bitmapBpp: 16,
        bitmapLength: 3,
        cacheIndex: 42,
        compressed: true,
        bitmapComprHdr: Uint8Array.from([1, 1, 1, 1, 2, 2, 2, 2]),
        bitmapDataStream: Uint8Array.from([5, 6, 7]),
      };
      const withHeader: SecondaryDrawingOrder = { kind: 'cacheBitmap', order: bitmap };
      const withoutHeader: SecondaryDrawingOrder = {
        kind: 'cacheBitmap',
        order: { ...bitmap, bitmapComprHdr: null },
      };

      expect(roundTrip(withHeader)).toEqual(withHeader);
      expect(roundTrip(withoutHeader)).toEqual(withoutHeader);
      expect(writeSecondaryOrder(new OrderWriter(), withoutHeader)).toEqual({
        orderType: SecondaryOrderType.CacheBitmapCompressed,
        extraFlags: NO_BITMAP_COMPRESSION_HDR,
      });
    });
  });

  describe('cache bitmap v2', () => {
    it('should unpack extraFlags and the variable-length fields', () => {
      const reader = readerOf(1, 0, 0, 0, 2, 0, 0, 0, 0x10, 0x04, 0x80, 0x80, 0xa, 0xb, 0xc, 0xd);
      const order = readCacheBitmapV2Order(reader, false, 0x199);

      expect(order.cacheId).toBe(1);
      expect(order.flags).toBe(0x03);
      expect(order.bitmapBpp).toBe(8);
      expect(order.key1).toBe(1);
      expect(order.key2).toBe(2);
      expect(order.bitmapWidth).toBe(16);
      expect(order.bitmapHeight).toBe(16);
      expect(order.bitmapLength).toBe(4);
      expect(order.cacheIndex).toBe(0x80);
      expect(Array.from(order.bitmapDataStream)).toEqual([0xa, 0xb, 0xc, 0xd]);
    });

    it('should route uncacheable bitmaps to the waiting list', () => {
      const order = readCacheBitmapV2Order(readerOf(0x08, 0x08, 0x01, 0x05, 0xee), false, 0x818);

      expect(order.cacheIndex).toBe(BITMAP_CACHE_WAITING_LIST_INDEX);
      expect(Array.from(order.bitmapDataStream)).toEqual([0xee]);
    });

    it('should reject an unknown bits-per-pixel code', () => {
      const error = catchOrderError(() => readCacheBitmapV2Order(readerOf(0x01), false, 0x00));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('Invalid bits-per-pixel code 0');
    });

    it('should round-trip a compressed bitmap with its header', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheBitmapV2',
        order: {
          cacheId: 2,
          flags: 0,
          key1: 0,
          key2: 0,
          bitmapBpp: 16,
          bitmapWidth: 4,
          bitmapHeight: 3,
          bitmapLength: 5,
          cacheIndex: 300,
          compressed: true,
          cbCompFirstRowSize: 1,
          cbCompMainBodySize: 5,
          cbScanWidth: 8,
          cbUncompressedSize: 24,
          bitmapDataStream: Uint8Array.from([1, 2, 3, 4, 5]),
        },
      };

      expect(writeSecondaryOrder(new OrderWriter(), order)).toEqual({
        orderType: SecondaryOrderType.BitmapCompressedV2,
        extraFlags: 0x22,
      });
      expect(roundTrip(order)).toEqual(order);
    });

    it('should refuse a main body size that disagrees with the data', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheBitmapV2',
        order: {
          cacheId: 0,
          flags: 0,
          key1: 0,
          key2: 0,
          bitmapBpp: 8,
          bitmapWidth: 1,
          bitmapHeight: 1,
          bitmapLength: 2,
          cacheIndex: 0,
          compressed: true,
          cbCompFirstRowSize: 0,
          cbCompMainBodySize: 4,
          cbScanWidth: 0,
          cbUncompressedSize: 0,
          bitmapDataStream: Uint8Array.from([1, 2]),
        },
      };

      expect(catchOrderError(() => writeSecondaryOrder(new OrderWriter(), order)).code).toBe(
        OrderErrorCodes.EncodeRange
      );
    });
  });

  describe('cache bitmap v3', () => {
    it('should read the extended bitmap data', () => {
      const reader = readerOf(
        ...[0x05, 0x00],
        ...[0x11, 0, 0, 0],
        ...[0x22, 0, 0, 0],
        0x20,
        ...[0, 0],
        0x01,
        ...[0x40, 0, 0x40, 0],
        ...[3, 0, 0, 0],
        ...[9, 9, 9]
      );

      expect(readCacheBitmapV3Order(reader, 0x32)).toEqual({
        cacheId: 2,
        flags: 0,
        bpp: 32,
        cacheIndex: 5,
        key1: 0x11,
        key2: 0x22,
        bitmapData: {
          bpp: 32,
          codecId: 1,
          width: 64,
          height: 64,
          length: 3,
          data: Uint8Array.from([9, 9, 9]),
        },
      });
    });
  });

  describe('cache color table', () => {
    it('should read 256 blue-first quads', () => {
      const quads: number[] = [];
      for (let i = 0; i < 256; i++) {
        quads.push(i, 0, 0, 0);
      }
      const order = readCacheColorTableOrder(readerOf(2, 0x00, 0x01, ...quads));

      expect(order.cacheIndex).toBe(2);
      expect(order.numberColors).toBe(256);
      expect(order.colorTable).toHaveLength(256);
      expect(order.colorTable[1]).toBe(0x010000);
      expect(order.colorTable[255]).toBe(0xff0000);
    });

    it('should reject tables of any other size', () => {
      const error = catchOrderError(() => readCacheColorTableOrder(readerOf(2, 0xff, 0x00)));

      expect(error.code).toBe(OrderErrorCodes.BoundViolation);
      expect(error.message).toBe('Color table holds 255 colors, expected 256');
    });

    it('should round-trip', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheColorTable',
        order: {
          cacheIndex: 4,
          numberColors: 256,
          colorTable: Array.from({ length: 256 }, (_, i) => i * 0x010101),
        },
      };

      expect(roundTrip(order)).toEqual(order);
    });
  });

  describe('cache glyph', () => {
    const narrowGlyph = (): GlyphData => ({
      cacheIndex: 9,
      x: 5,
      y: -3,
      cx: 8,
      cy: 1,
      cb: 4,
      aj: Uint8Array.from([0x80, 0, 0, 0]),
    });
    const glyphBytes = [0x05, 0x00, 0xff, 0xff, 0x02, 0x00, 0x09, 0x00, 0x02, 0x00, 1, 2, 3, 4];

    it('should read glyphs and their characters', () => {
      const order = readCacheGlyphOrder(readerOf(7, 1, ...glyphBytes, 0x41, 0x00), 0x10);

      expect(order).toEqual({
        cacheId: 7,
        cGlyphs: 1,
        glyphData: [
          { cacheIndex: 5, x: -1, y: 2, cx: 9, cy: 2, cb: 4, aj: Uint8Array.from([1, 2, 3, 4]) },
        ],
        unicodeCharacters: 'A',
      });
    });

    it('should leave characters unread without the flag', () => {
      const reader = readerOf(7, 1, ...glyphBytes, 0x41, 0x00);
      const order = readCacheGlyphOrder(reader, 0);

      expect(order.unicodeCharacters).toBeNull();
      expect(reader.remaining).toBe(2);
    });

    it('should pick the revision from the glyph support level', () => {
      const v2 = readSecondaryOrder(
        readerOf(0x09, 0x05, 0x43, 0x08, 0x01, 0x80, 0, 0, 0, 0x5a, 0x00),
        SecondaryOrderType.CacheGlyph,
        0x113,
        GlyphSupportLevel.Encode
      );
      expect(v2).toEqual({
        kind: 'cacheGlyphV2',
        order: {
          cacheId: 3,
          flags: 1,
          cGlyphs: 1,
          glyphData: [narrowGlyph()],
          unicodeCharacters: 'Z',
        },
      });

      const v1 = readSecondaryOrder(
        readerOf(7, 0),
        SecondaryOrderType.CacheGlyph,
        0,
        GlyphSupportLevel.Full
      );
      expect(v1.kind).toBe('cacheGlyph');
    });

    it('should set the unicode flag when writing revision 2 characters', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheGlyphV2',
        order: {
          cacheId: 3,
          flags: 1,
          cGlyphs: 1,
          glyphData: [narrowGlyph()],
          unicodeCharacters: 'Z',
        },
      };

      expect(writeSecondaryOrder(new OrderWriter(), order).extraFlags).toBe(0x113);
      expect(roundTrip(order)).toEqual(order);
    });

    it('should refuse glyph bitmaps of the wrong size', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheGlyph',
        order: {
          cacheId: 0,
          cGlyphs: 1,
          glyphData: [{ cacheIndex: 0, x: 0, y: 0, cx: 8, cy: 8, cb: 8, aj: new Uint8Array(4) }],
          unicodeCharacters: null,
        },
      };

      expect(catchOrderError(() => writeSecondaryOrder(new OrderWriter(), order)).code).toBe(
        OrderErrorCodes.EncodeRange
      );
    });
  });

  describe('cache brush', () => {
    it('should read a monochrome brush bottom-up', () => {
      const order = readCacheBrushOrder(readerOf(1, 0x01, 8, 8, 0, 8, 1, 2, 3, 4, 5, 6, 7, 8));

      expect(order.bpp).toBe(1);
      expect(order.data).toHaveLength(BRUSH_DATA_SIZE);
      expect(Array.from(order.data.subarray(0, 8))).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
    });

    it('should reject a monochrome brush that is not 8 bytes', () => {
      const error = catchOrderError(() => readCacheBrushOrder(readerOf(1, 0x01, 8, 8, 0, 4)));

      expect(error.code).toBe(OrderErrorCodes.LengthFraming);
      expect(error.message).toBe('Monochrome brush declares 4 bytes, expected 8');
    });

    it('should expand a compressed brush through its palette', () => {
      const indices = [0x40, ...new Array<number>(15).fill(0)];
      const reader = readerOf(2, 0x03, 8, 8, 0, 20, ...indices, 0xa0, 0xb0, 0xc0, 0xd0);
      const order = readCacheBrushOrder(reader);

      expect(reader.remaining).toBe(0);
      expect(order.data[56]).toBe(0xb0);
      expect(order.data[57]).toBe(0xa0);
      expect(order.data[0]).toBe(0xa0);
      expect(order.data[63]).toBe(0xa0);
      expect(order.data[64]).toBe(0);
    });

    it('should reject unknown bitmap formats', () => {
      const error = catchOrderError(() => readCacheBrushOrder(readerOf(1, 0x02, 8, 8, 0, 8)));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
    });

    it('should compress brushes with at most four colors', () => {
      const order: CacheBrushOrder = {
        index: 3,
        bpp: 8,
        cx: 8,
        cy: 8,
        style: 0,
        length: 20,
        data: brushData((i) => (i % 3 === 0 ? 0x11 : 0x22), 64),
      };
      const writer = new OrderWriter();
      writeCacheBrushOrder(writer, order);
      const bytes = writer.toUint8Array();

      expect(bytes).toHaveLength(26);
      expect(bytes[5]).toBe(20);
      expect(readCacheBrushOrder(new OrderReader(bytes))).toEqual(order);
    });

    it('should send brushes with more colors raw', () => {
      const order: CacheBrushOrder = {
        index: 0,
        bpp: 16,
        cx: 8,
        cy: 8,
        style: 0,
        length: 128,
        data: brushData((i) => i, 128),
      };
      const writer = new OrderWriter();
      writeCacheBrushOrder(writer, order);
      const bytes = writer.toUint8Array();

      expect(bytes).toHaveLength(134);
      expect(bytes[5]).toBe(128);
      expect(readCacheBrushOrder(new OrderReader(bytes))).toEqual(order);
    });

    it('should refuse raw 32 bpp brushes', () => {
      const order: CacheBrushOrder = {
        index: 0,
        bpp: 32,
        cx: 8,
        cy: 8,
        style: 0,
        length: 0,
        data: brushData((i) => i, 256),
      };
      const error = catchOrderError(() => writeCacheBrushOrder(new OrderWriter(), order));

      expect(error.code).toBe(OrderErrorCodes.EncodeRange);
      expect(error.message).toBe('Brush length 256 outside 0..255');
    });

    it('should carry only the length of brushes that are not 8x8', () => {
      const order: SecondaryDrawingOrder = {
        kind: 'cacheBrush',
        order: { index: 0, bpp: 1, cx: 4, cy: 4, style: 0, length: 0, data: brushData(() => 0, 0) },
      };

      expect(roundTrip(order)).toEqual(order);
    });
  });

  describe('readSecondaryOrder', () => {
    it('should reject unknown order types', () => {
      const error = catchOrderError(() =>
        readSecondaryOrder(readerOf(), 0x06, 0, GlyphSupportLevel.Full)
      );

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('Unknown secondary order type 0x6');
    });
  });
});
