/**
 * Unit tests for OrderDecoder.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  GlyphSupportLevel,
  OrderErrorCodes,
  OrderSupportIndex,
  createOrderSettings,
  createOrderSupport,
  silentLogger,
  type OrderLogger,
  type OrderSettingsOverrides,
} from '@orderwire/core';
import { OrderDecoder } from '../OrderDecoder.js';
import type { OrderHandler } from '../OrderHandler.js';
import type { OrderReader } from '../protocol/OrderStream.js';
import { catchOrderError, readerOf } from './orderTestUtils.js';

/** Bounded DstBlt followed by a PatBlt that reuses the bounds and only sends its rop. */
const FAST_PATH_UPDATE = [
  ...[0x02, 0x00],
  ...[0x0d, 0x00, 0x1f],
  ...[0x0f, 0x00, 0x00, 0x00, 0x00, 0x63, 0x00, 0x63, 0x00],
  ...[0x0a, 0x00, 0x0a, 0x00, 0x32, 0x00, 0x32, 0x00, 0xaa],
  ...[0x6d, 0x01, 0x10, 0xf0],
];

/** Unbounded DstBlt with every field present. */
const DST_BLT = [0x09, 0x00, 0x1f, 0x0a, 0x00, 0x0a, 0x00, 0x32, 0x00, 0x32, 0x00, 0xaa];

/** Monochrome 8x8 cache brush body. */
const BRUSH_BODY = [0x01, 0x01, 0x08, 0x08, 0x00, 0x08, 1, 2, 3, 4, 5, 6, 7, 8];

/** Smallest secondary body: an order length of 0 spans 7 bytes. */
const PADDING = [0, 0, 0, 0, 0, 0, 0];

function secondaryFrame(orderLength: number, orderType: number, body: number[]): number[] {
  return [0x03, orderLength & 0xff, (orderLength >> 8) & 0xff, 0x00, 0x00, orderType, ...body];
}

function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies OrderLogger;
}

function createDecoder(handler: OrderHandler = {}, overrides: OrderSettingsOverrides = {}) {
  return new OrderDecoder({
    settings: createOrderSettings(overrides),
    logger: silentLogger,
    handler,
  });
}

function decode(decoder: OrderDecoder, ...bytes: number[]): OrderReader {
  const reader = readerOf(...bytes);
  decoder.decodeOrder(reader);
  return reader;
}

describe('OrderDecoder', () => {
  describe('decodeOrdersUpdate', () => {
    it('should decode a fast-path orders update', () => {
      const setBounds = vi.fn();
      const patBlt = vi.fn();
      const decoder = createDecoder({ setBounds, primary: { patBlt } });

      expect(decoder.decodeOrdersUpdate(Uint8Array.from(FAST_PATH_UPDATE), true)).toBe(2);

      const bounds = { left: 0, top: 0, right: 99, bottom: 99 };
      expect(setBounds.mock.calls).toEqual([[bounds], [null], [bounds], [null]]);
      expect(patBlt).toHaveBeenCalledTimes(1);
      expect(decoder.primaryOrders.patBlt.rop).toBe(0xf0);
      expect(decoder.primaryOrders.dstBlt).toEqual({
        leftRect: 10,
        topRect: 10,
        width: 50,
        height: 50,
        rop: 0xaa,
      });
      expect(decoder.orderInfo.orderType).toBe(0x01);
    });

    it('should skip the padding around a slow-path order count', () => {
      const dstBlt = vi.fn();
      const decoder = createDecoder({ primary: { dstBlt } });
      const update = Uint8Array.from([0x00, 0x00, 0x01, 0x00, 0x00, 0x00, ...DST_BLT]);

      expect(decoder.decodeOrdersUpdate(update)).toBe(1);
      expect(dstBlt).toHaveBeenCalledTimes(1);
    });

    it('should fail when the update holds fewer orders than announced', () => {
      const decoder = createDecoder();
      const update = Uint8Array.from([0x02, 0x00, ...DST_BLT]);

      expect(catchOrderError(() => decoder.decodeOrdersUpdate(update, true)).code).toBe(
        OrderErrorCodes.Truncation
      );
    });
  });

  describe('primary orders', () => {
    it('should apply delta coordinates to the persisted order', () => {
      const decoder = createDecoder();
      decode(decoder, ...DST_BLT);
      decode(decoder, 0x11, 0x01, 0x05);

      expect(decoder.primaryOrders.dstBlt.leftRect).toBe(15);
      expect(decoder.primaryOrders.dstBlt.width).toBe(50);
    });

    it.each([0x41, 0x81])(
      'should keep every field when control flags %i drop the field bytes',
      (controlFlags) => {
        const dstBlt = vi.fn();
        const decoder = createDecoder({ primary: { dstBlt } });
        decode(decoder, ...DST_BLT);

        const reader = decode(decoder, controlFlags);

        expect(reader.remaining).toBe(0);
        expect(decoder.orderInfo.fieldFlags).toBe(0);
        expect(dstBlt).toHaveBeenCalledTimes(2);
        expect(decoder.primaryOrders.dstBlt).toEqual({
          leftRect: 10,
          topRect: 10,
          width: 50,
          height: 50,
          rop: 0xaa,
        });
      }
    );

    it('should report the header state with the order name', () => {
      const orderInfo = vi.fn();
      const decoder = createDecoder({ orderInfo });
      decode(decoder, ...DST_BLT);

      expect(orderInfo).toHaveBeenCalledWith(decoder.orderInfo, '[0x00] DstBlt');
      expect(decoder.orderInfo.fieldFlags).toBe(0x1f);
    });

    it('should reject orders that were not announced', () => {
      const logger = spyLogger();
      const decoder = new OrderDecoder({
        settings: createOrderSettings({ orderSupport: createOrderSupport(false) }),
        logger,
      });
      const error = catchOrderError(() => decode(decoder, ...DST_BLT));

      expect(error.code).toBe(OrderErrorCodes.UnsupportedOrder);
      expect(error.message).toBe(
        '[0x00] DstBlt: Order was not announced during capability negotiation'
      );
      expect(logger.error).toHaveBeenCalledWith(
        '[0x00] DstBlt was sent without being announced; ' +
          'set allowUnannouncedOrdersFromServer to accept it'
      );
    });

    it('should accept unannounced orders in relaxed mode', () => {
      const logger = spyLogger();
      const dstBlt = vi.fn();
      const decoder = new OrderDecoder({
        settings: createOrderSettings({
          orderSupport: createOrderSupport(false),
          allowUnannouncedOrdersFromServer: true,
        }),
        logger,
        handler: { primary: { dstBlt } },
      });
      decode(decoder, ...DST_BLT);

      expect(logger.warn).toHaveBeenCalledWith(
        '[0x00] DstBlt was sent without being announced; accepting it'
      );
      expect(dstBlt).toHaveBeenCalledTimes(1);
    });

    it('should accept a PatBlt when only opaque rectangles were announced', () => {
      const orderSupport = createOrderSupport(false);
      orderSupport[OrderSupportIndex.OpaqueRect] = true;
      const decoder = createDecoder({}, { orderSupport });

      const reader = decode(decoder, 0x09, 0x01, 0x10, 0x00, 0xf0);

      expect(reader.remaining).toBe(0);
      expect(decoder.primaryOrders.patBlt.rop).toBe(0xf0);
    });

    it('should reject unknown order types', () => {
      const error = catchOrderError(() => decode(createDecoder(), 0x09, 0x03));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('[0x03] UNUSED: Unknown primary order type 0x3');
    });

    it('should fail when a callback rejects the order', () => {
      const decoder = createDecoder({ primary: { dstBlt: () => false } });
      const error = catchOrderError(() => decode(decoder, ...DST_BLT));

      expect(error.code).toBe(OrderErrorCodes.CallbackRejected);
      expect(error.message).toBe('[0x00] DstBlt: dstBlt callback rejected the order');
    });
  });

  describe('secondary orders', () => {
    it('should deliver a cache brush', () => {
      const cacheBrush = vi.fn();
      const cacheOrderInfo = vi.fn();
      const decoder = createDecoder({ cacheOrderInfo, secondary: { cacheBrush } });
      const reader = decode(decoder, ...secondaryFrame(7, 0x07, BRUSH_BODY));

      expect(reader.remaining).toBe(0);
      expect(cacheOrderInfo).toHaveBeenCalledWith(7, 0, 0x07, '[0x07] Cache Brush');
      expect(cacheBrush).toHaveBeenCalledTimes(1);
      expect(cacheBrush.mock.calls[0]?.[0]).toMatchObject({ index: 1, bpp: 1, cx: 8, cy: 8 });
    });

    it('should skip bytes the body did not use', () => {
      const logger = spyLogger();
      const decoder = new OrderDecoder({ settings: createOrderSettings(), logger });
      const reader = readerOf(...secondaryFrame(10, 0x07, [...BRUSH_BODY, 0, 0, 0]), 0x99);
      decoder.decodeOrder(reader);

      expect(logger.warn).toHaveBeenCalledWith(
        '[0x07] Cache Brush: skipping 3 unread bytes of a 17 byte order'
      );
      expect(reader.remaining).toBe(1);
    });

    it('should end a padded cache bitmap at its declared length', () => {
      const logger = spyLogger();
      const cacheBitmap = vi.fn();
      const decoder = new OrderDecoder({
        settings: createOrderSettings(),
        logger,
        handler: { secondary: { cacheBitmap } },
      });
      const body = [0x01, 0x00, 0x04, 0x02, 0x08, 0x08, 0x00, 0x10, 0x00, 1, 2, 3, 4, 5, 6, 7, 8];
      const reader = readerOf(...secondaryFrame(13, 0x00, [...body, 0, 0, 0]), 0x99);
      decoder.decodeOrder(reader);

      expect(reader.position).toBe(26);
      expect(reader.remaining).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        '[0x00] Cache Bitmap: skipping 3 unread bytes of a 20 byte order'
      );
      expect(cacheBitmap.mock.calls[0]?.[0]).toMatchObject({
        cacheId: 1,
        bitmapWidth: 4,
        bitmapHeight: 2,
        cacheIndex: 0x10,
      });
    });

    it('should fail when the body overruns the order length', () => {
      const error = catchOrderError(() =>
        decode(createDecoder(), ...secondaryFrame(5, 0x07, BRUSH_BODY))
      );

      expect(error.code).toBe(OrderErrorCodes.LengthFraming);
      expect(error.message).toBe('[0x07] Cache Brush: Read 14 bytes of a 12 byte order');
    });

    it.each([-1, -7, -8])('should reject the negative order length %i', (orderLength) => {
      const frame = secondaryFrame(orderLength, 0x07, [0x01, 0x01, 0x04, 0x04, 0x00, 0x00]);
      const error = catchOrderError(() => decode(createDecoder(), ...frame));

      expect(error.code).toBe(OrderErrorCodes.LengthFraming);
      expect(error.message).toBe(`[0x07] Cache Brush: Order length ${orderLength} is negative`);
    });

    it('should reject unknown order types', () => {
      const frame = secondaryFrame(0, 0x06, PADDING);
      const error = catchOrderError(() => decode(createDecoder(), ...frame));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
      expect(error.message).toBe('[0x06] UNUSED: Unknown secondary order type 0x6');
    });

    const unannounced: [string, number, OrderSettingsOverrides][] = [
      ['a color table without MemBlt', 0x01, { orderSupport: createOrderSupport(false) }],
      ['a glyph without glyph support', 0x03, { glyphSupportLevel: GlyphSupportLevel.None }],
      ['a bitmap without the bitmap cache', 0x00, { bitmapCacheEnabled: false }],
      ['a v3 bitmap without the v3 cache', 0x08, { bitmapCacheV3Enabled: false }],
    ];

    it.each(unannounced)(
      'should reject %s',
      (_label, orderType, overrides) => {
        const decoder = createDecoder({}, overrides);
        const frame = secondaryFrame(0, orderType, PADDING);
        const error = catchOrderError(() => decode(decoder, ...frame));

        expect(error.code).toBe(OrderErrorCodes.UnsupportedOrder);
      }
    );
  });

  describe('alternate secondary orders', () => {
    it('should deliver a frame marker', () => {
      const frameMarker = vi.fn();
      const altSecOrderInfo = vi.fn();
      const decoder = createDecoder({ altSecOrderInfo, altSec: { frameMarker } });
      decode(decoder, 0x36, 0x01, 0x00, 0x00, 0x00);

      expect(altSecOrderInfo).toHaveBeenCalledWith(0x0d, '[0x0d] Frame Marker');
      expect(frameMarker).toHaveBeenCalledWith({ action: 1 });
    });

    it('should deliver a switch to the primary surface', () => {
      const switchSurface = vi.fn();
      decode(createDecoder({ altSec: { switchSurface } }), 0x02, 0xff, 0xff);

      expect(switchSurface).toHaveBeenCalledWith({ bitmapId: 0xffff });
    });

    it('should keep the offscreen delete list on the decoder', () => {
      const decoder = createDecoder();
      decode(decoder, 0x06, 0x03, 0x80, 0x40, 0x00, 0x20, 0x00, 0x01, 0x00, 0x07, 0x00);

      expect(decoder.offscreenDeleteList.toArray()).toEqual([7]);
    });

    it('should reject window orders without a window handler', () => {
      const error = catchOrderError(() => decode(createDecoder(), 0x2e, 0xaa, 0xbb));

      expect(error.code).toBe(OrderErrorCodes.UnsupportedOrder);
      expect(error.message).toBe(
        '[0x0b] Windowing: No window order handler is installed; the order size is unknown'
      );
    });

    it('should hand window orders to the window handler', () => {
      const windowOrder = vi.fn((reader: OrderReader) => {
        reader.skip(2);
      });
      const reader = decode(createDecoder({ windowOrder }), 0x2e, 0xaa, 0xbb);

      expect(windowOrder).toHaveBeenCalledTimes(1);
      expect(reader.remaining).toBe(0);
    });

    it('should reject window orders when remote windows are disabled', () => {
      const decoder = createDecoder({ windowOrder: () => true }, { remoteWndSupportLevel: 0 });
      const error = catchOrderError(() => decode(decoder, 0x2e, 0xaa, 0xbb));

      expect(error.code).toBe(OrderErrorCodes.UnsupportedOrder);
    });

    it('should accept desktop composition orders without reading a body', () => {
      const reader = decode(createDecoder(), 0x32, 0x99);

      expect(reader.remaining).toBe(1);
    });

    it('should reject unknown order types', () => {
      const error = catchOrderError(() => decode(createDecoder(), 0x3a));

      expect(error.code).toBe(OrderErrorCodes.InvalidEnumerant);
    });
  });
});
