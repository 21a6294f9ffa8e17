/**
 * Unit tests for the alternate secondary order bodies.
 */

import { describe, it, expect } from 'vitest';
import { OrderErrorCodes } from '@orderwire/core';
import {
  OffscreenDeleteList,
  hasAltSecondaryBody,
  readAltSecondaryOrder,
  readCreateNineGridBitmapOrder,
  readCreateOffscreenBitmapOrder,
  readDrawGdiPlusFirstOrder,
  readStreamBitmapFirstOrder,
  writeAltSecondaryOrder,
} from '../protocol/AltSecondaryOrderCodec.js';
import type { AltSecondaryDrawingOrder } from '../protocol/AltSecondaryOrders.js';
import { OrderReader, OrderWriter } from '../protocol/OrderStream.js';
import { AltSecondaryOrderType } from '../protocol/OrderTypes.js';
import { catchOrderError, readerOf } from './orderTestUtils.js';

function roundTrip(order: AltSecondaryDrawingOrder): AltSecondaryDrawingOrder {
  const writer = new OrderWriter();
  const orderType = writeAltSecondaryOrder(writer, order);
  const reader = new OrderReader(writer.toUint8Array());
  const decoded = readAltSecondaryOrder(reader, orderType, new OffscreenDeleteList());
  expect(reader.remaining).toBe(0);
  return decoded;
}

describe('AltSecondaryOrderCodec', () => {
  describe('OffscreenDeleteList', () => {
    it('should grow to the largest list and keep its storage', () => {
      const list = new OffscreenDeleteList();

      list.read(readerOf(2, 0, 5, 0, 6, 0));
      expect(list.toArray()).toEqual([5, 6]);
      expect(list.capacity).toBe(2);

      list.read(readerOf(1, 0, 9, 0));
      expect(list.toArray()).toEqual([9]);
      expect(list.cIndices).toBe(1);
      expect(list.capacity).toBe(2);

      list.clear();
      expect(list.toArray()).toEqual([]);
      expect(list.capacity).toBe(2);
    });

    it('should fail on a list longer than the data', () => {
      const error = catchOrderError(() => new OffscreenDeleteList().read(readerOf(3, 0, 1, 0)));

      expect(error.code).toBe(OrderErrorCodes.Truncation);
    });
  });

  describe('create offscreen bitmap', () => {
    it('should read the id, size and delete list', () => {
      const reader = readerOf(0x03, 0x80, 0x40, 0x00, 0x20, 0x00, 0x01, 0x00, 0x07, 0x00);

      expect(readCreateOffscreenBitmapOrder(reader, new OffscreenDeleteList())).toEqual({
        id: 3,
        cx: 64,
        cy: 32,
        deleteList: [7],
      });
    });

    it('should empty the delete list when none is announced', () => {
      const list = new OffscreenDeleteList();
      list.read(readerOf(1, 0, 4, 0));

      const order = readCreateOffscreenBitmapOrder(readerOf(0x03, 0x00, 1, 0, 1, 0), list);

      expect(order.deleteList).toEqual([]);
    });

    it('should reject an empty surface', () => {
      const reader = readerOf(0x03, 0x00, 0x00, 0x00, 0x20, 0x00);
      const error = catchOrderError(() =>
        readCreateOffscreenBitmapOrder(reader, new OffscreenDeleteList())
      );

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('Invalid offscreen bitmap size 0x32');
    });
  });

  describe('stream bitmap', () => {
    it('should read a 32-bit size when the V2 flag is set', () => {
      const reader = readerOf(0x04, 8, 1, 0, 0x10, 0, 0x10, 0, 0, 1, 0, 0, 2, 0, 0xab, 0xcd);

      expect(readStreamBitmapFirstOrder(reader)).toEqual({
        bitmapFlags: 0x04,
        bitmapBpp: 8,
        bitmapType: 1,
        bitmapWidth: 16,
        bitmapHeight: 16,
        bitmapSize: 256,
        bitmapBlockSize: 2,
        bitmapBlock: Uint8Array.from([0xab, 0xcd]),
      });
    });

    it('should read a 16-bit size otherwise', () => {
      const reader = readerOf(0x00, 8, 1, 0, 0x10, 0, 0x10, 0, 0, 1, 1, 0, 0xab);

      const order = readStreamBitmapFirstOrder(reader);

      expect(order.bitmapSize).toBe(256);
      expect(Array.from(order.bitmapBlock)).toEqual([0xab]);
    });

    it('should refuse a block size that disagrees with the block', () => {
      const order: AltSecondaryDrawingOrder = {
        kind: 'streamBitmapNext',
        order: {
          bitmapFlags: 0,
          bitmapType: 1,
          bitmapBlockSize: 3,
          bitmapBlock: new Uint8Array(2),
        },
      };
      const error = catchOrderError(() => writeAltSecondaryOrder(new OrderWriter(), order));

      expect(error.code).toBe(OrderErrorCodes.EncodeRange);
      expect(error.message).toBe('Bitmap block size 3 does not match 2 bytes');
    });
  });

  describe('create nine-grid bitmap', () => {
    const nineGridBytes = [32, 5, 0, 1, 0, 0, 0, 2, 0, 3, 0, 4, 0, 5, 0, 0x11, 0x22, 0x33, 0];

    it('should read the grid and its transparent color', () => {
      expect(readCreateNineGridBitmapOrder(readerOf(...nineGridBytes))).toEqual({
        bitmapBpp: 32,
        bitmapId: 5,
        nineGridInfo: {
          flFlags: 1,
          ulLeftWidth: 2,
          ulRightWidth: 3,
          ulTopHeight: 4,
          ulBottomHeight: 5,
          crTransparent: 0x332211,
        },
      });
    });

    it('should fail on a short body', () => {
      const reader = readerOf(...nineGridBytes.slice(0, 18));
      const error = catchOrderError(() => readCreateNineGridBitmapOrder(reader));

      expect(error.code).toBe(OrderErrorCodes.Truncation);
    });
  });

  describe('GDI+ envelopes', () => {
    it('should read the first chunk of a record stream', () => {
      const reader = readerOf(0, 2, 0, 10, 0, 0, 0, 20, 0, 0, 0, 0xd1, 0xd2);

      expect(readDrawGdiPlusFirstOrder(reader)).toEqual({
        cbSize: 2,
        cbTotalSize: 10,
        cbTotalEmfSize: 20,
        emfRecords: Uint8Array.from([0xd1, 0xd2]),
      });
    });

    it('should refuse a cbSize that disagrees with the records', () => {
      const order: AltSecondaryDrawingOrder = {
        kind: 'drawGdiPlusNext',
        order: { cbSize: 1, emfRecords: Uint8Array.from([1, 2]) },
      };
      const error = catchOrderError(() => writeAltSecondaryOrder(new OrderWriter(), order));

      expect(error.code).toBe(OrderErrorCodes.EncodeRange);
      expect(error.message).toBe('cbSize 1 does not match 2 bytes');
    });
  });

  describe('readAltSecondaryOrder', () => {
    it('should read a frame marker', () => {
      const order = readAltSecondaryOrder(
        readerOf(1, 0, 0, 0),
        AltSecondaryOrderType.FrameMarker,
        new OffscreenDeleteList()
      );

      expect(order).toEqual({ kind: 'frameMarker', order: { action: 1 } });
    });

    it('should reject unknown order types', () => {
      const error = catchOrderError(() =>
        readAltSecondaryOrder(readerOf(), 0x0e, new OffscreenDeleteList())
      );

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('Unknown alternate secondary order type 0xe');
    });

    it('should report which order types carry a parsed body', () => {
      expect(hasAltSecondaryBody(AltSecondaryOrderType.SwitchSurface)).toBe(true);
      expect(hasAltSecondaryBody(AltSecondaryOrderType.FrameMarker)).toBe(true);
      expect(hasAltSecondaryBody(AltSecondaryOrderType.Window)).toBe(false);
      expect(hasAltSecondaryBody(AltSecondaryOrderType.CompDeskFirst)).toBe(false);
      expect(hasAltSecondaryBody(0x0e)).toBe(false);
    });
  });

  describe('round trips', () => {
    const orders: AltSecondaryDrawingOrder[] = [
      { kind: 'switchSurface', order: { bitmapId: 0xffff } },
      { kind: 'createOffscreenBitmap', order: { id: 12, cx: 640, cy: 480, deleteList: [1, 2] } },
      { kind: 'createOffscreenBitmap', order: { id: 13, cx: 8, cy: 8, deleteList: [] } },
      {
        kind: 'streamBitmapFirst',
        order: {
          bitmapFlags: 0,
          bitmapBpp: 24,
          bitmapType: 2,
          bitmapWidth: 32,
          bitmapHeight: 16,
          bitmapSize: 1536,
          bitmapBlockSize: 3,
          bitmapBlock: Uint8Array.from([1, 2, 3]),
        },
      },
      {
        kind: 'streamBitmapNext',
        order: {
          bitmapFlags: 0,
          bitmapType: 2,
          bitmapBlockSize: 1,
          bitmapBlock: Uint8Array.from([4]),
        },
      },
      {
        kind: 'createNineGridBitmap',
        order: {
          bitmapBpp: 16,
          bitmapId: 7,
          nineGridInfo: {
            flFlags: 0x04,
            ulLeftWidth: 1,
            ulRightWidth: 2,
            ulTopHeight: 3,
            ulBottomHeight: 4,
            crTransparent: 0x00ff00,
          },
        },
      },
      {
        kind: 'drawGdiPlusEnd',
        order: { cbSize: 1, cbTotalSize: 9, cbTotalEmfSize: 9, emfRecords: Uint8Array.from([9]) },
      },
      {
        kind: 'drawGdiPlusCacheFirst',
        order: {
          flags: 1,
          cacheType: 2,
          cacheIndex: 3,
          cbSize: 2,
          cbTotalSize: 4,
          emfRecords: Uint8Array.from([5, 6]),
        },
      },
      {
        kind: 'drawGdiPlusCacheNext',
        order: { flags: 0, cacheType: 2, cacheIndex: 3, cbSize: 0, emfRecords: new Uint8Array(0) },
      },
      { kind: 'frameMarker', order: { action: 0 } },
    ];

    it.each(orders)('should round-trip $kind', (order) => {
      expect(roundTrip(order)).toEqual(order);
    });
  });
});
