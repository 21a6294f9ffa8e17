/**
 * Per-connection drawing-order decoder.
 *
 * Holds the state primary orders are delta-encoded against (the current order type,
 * bounds and one persisted order per kind) and the offscreen delete list, routes each
 * order to its codec, enforces the negotiated-capability policy and delivers decoded
 * orders to an {@link OrderHandler}.
 */

import {
  GlyphSupportLevel,
  OrderError,
  OrderErrorCodes,
  OrderSupportIndex,
  consoleLogger,
  createOrderSettings,
  isOrderError,
  isOrderSupported,
  type OrderLogger,
  type OrderSettings,
} from '@orderwire/core';
import type { OrderCallbackResult, OrderHandler } from './OrderHandler.js';
import {
  OffscreenDeleteList,
  hasAltSecondaryBody,
  readAltSecondaryOrder,
} from './protocol/AltSecondaryOrderCodec.js';
import type { AltSecondaryOrderKind, AltSecondaryOrders } from './protocol/AltSecondaryOrders.js';
import {
  createOrderInfo,
  getPrimaryFieldBytes,
  readBounds,
  readFieldFlags,
  type OrderInfo,
} from './protocol/FieldFlags.js';
import { ControlFlags, isAltSecondary, isSecondary } from './protocol/OrderFlags.js';
import { OrderReader } from './protocol/OrderStream.js';
import {
  AltSecondaryOrderType,
  SecondaryOrderType,
  getAltSecondaryOrderName,
  getPrimaryOrderName,
  getSecondaryOrderName,
} from './protocol/OrderTypes.js';
import {
  PRIMARY_ORDER_CODECS,
  getPrimaryOrderKind,
  readPrimaryOrder,
} from './protocol/PrimaryOrderCodec.js';
import {
  createPrimaryOrderStates,
  type PrimaryOrderKind,
  type PrimaryOrderStates,
} from './protocol/PrimaryOrders.js';
import { computeSecondaryOrderEnd, readSecondaryOrder } from './protocol/SecondaryOrderCodec.js';
import type { SecondaryOrderKind, SecondaryOrders } from './protocol/SecondaryOrders.js';

export interface OrderDecoderOptions {
  /** Negotiated capabilities. Defaults to everything announced, strict checking. */
  settings?: OrderSettings;
  logger?: OrderLogger;
  handler?: OrderHandler;
}

type Callbacks<M> = { [K in keyof M]?: (order: M[K]) => OrderCallbackResult };

function deliver<M, K extends keyof M>(
  callbacks: Callbacks<M> | undefined,
  entry: { kind: K; order: M[K] }
): OrderCallbackResult {
  const callback = callbacks?.[entry.kind];
  return callback?.(entry.order);
}

function labelError(error: unknown, orderName: string): unknown {
  return isOrderError(error) ? error.withOrderName(orderName) : error;
}

export class OrderDecoder {
  readonly settings: OrderSettings;
  private readonly logger: OrderLogger;
  private readonly handler: OrderHandler;

  /** Header state of the last primary order. */
  readonly orderInfo: OrderInfo = createOrderInfo();

  /** Last decoded order of each primary kind. */
  readonly primaryOrders: PrimaryOrderStates = createPrimaryOrderStates();

  readonly offscreenDeleteList = new OffscreenDeleteList();

  constructor(options: OrderDecoderOptions = {}) {
    this.settings = options.settings ?? createOrderSettings();
    this.logger = options.logger ?? consoleLogger;
    this.handler = options.handler ?? {};
  }

  /**
   * Decodes the orders section of an update PDU and returns the number of orders read.
   * The slow-path section is framed by two padding words around the order count.
   */
  decodeOrdersUpdate(data: Uint8Array, fastPath = false): number {
    const reader = new OrderReader(data);
    if (!fastPath) {
      reader.skip(2, 'update padding');
    }
    const numberOrders = reader.readUInt16();
    if (!fastPath) {
      reader.skip(2, 'update padding');
    }

    for (let i = 0; i < numberOrders; i++) {
      this.decodeOrder(reader);
    }
    return numberOrders;
  }

  /**
   * Decodes one drawing order at the reader's position.
   */
  decodeOrder(reader: OrderReader): void {
    const controlFlags = reader.readUInt8();

    if (isAltSecondary(controlFlags)) {
      this.decodeAltSecondaryOrder(reader, controlFlags);
    } else if (isSecondary(controlFlags)) {
      this.decodeSecondaryOrder(reader);
    } else {
      this.decodePrimaryOrder(reader, controlFlags);
    }
  }

  // -------------------------------------------------------------------------
  // Primary orders
  // -------------------------------------------------------------------------

  private decodePrimaryOrder(reader: OrderReader, controlFlags: number): void {
    const info = this.orderInfo;
    info.controlFlags = controlFlags;
    if (controlFlags & ControlFlags.TypeChange) {
      info.orderType = reader.readUInt8();
    }

    const orderName = getPrimaryOrderName(info.orderType);
    this.logger.debug(`Primary Drawing Order ${orderName}`);

    try {
      const kind = getPrimaryOrderKind(info.orderType);
      const fieldBytes = getPrimaryFieldBytes(info.orderType);
      if (kind === undefined || !fieldBytes) {
        throw new OrderError(
          OrderErrorCodes.InvalidEnumerant,
          `Unknown primary order type 0x${info.orderType.toString(16)}`
        );
      }
      this.checkOrderSupported(orderName, this.isPrimarySupported(kind));

      info.fieldFlags = readFieldFlags(reader, controlFlags, fieldBytes);

      const bounded = (controlFlags & ControlFlags.Bounds) !== 0;
      if (bounded) {
        if ((controlFlags & ControlFlags.ZeroBoundsDeltas) === 0) {
          info.boundsFlags = readBounds(reader, info.bounds);
        }
        this.expectAccepted(this.handler.setBounds?.({ ...info.bounds }), 'setBounds');
      }

      info.deltaCoordinates = (controlFlags & ControlFlags.DeltaCoordinates) !== 0;
      this.decodePrimaryFields(kind, reader, orderName);

      if (bounded) {
        this.expectAccepted(this.handler.setBounds?.(null), 'setBounds');
      }
    } catch (error) {
      throw labelError(error, orderName);
    }
  }

  private decodePrimaryFields<K extends PrimaryOrderKind>(
    kind: K,
    reader: OrderReader,
    orderName: string
  ): void {
    const order = this.primaryOrders[kind];
    readPrimaryOrder(kind, reader, this.orderInfo, order);

    this.expectAccepted(this.handler.orderInfo?.(this.orderInfo, orderName), 'orderInfo');
    this.expectAccepted(
      deliver<PrimaryOrderStates, K>(this.handler.primary, { kind, order }),
      kind
    );
  }

  private isPrimarySupported(kind: PrimaryOrderKind): boolean {
    return PRIMARY_ORDER_CODECS[kind].supportIndexes.some((index) =>
      isOrderSupported(this.settings, index)
    );
  }

  // -------------------------------------------------------------------------
  // Secondary orders
  // -------------------------------------------------------------------------

  private decodeSecondaryOrder(reader: OrderReader): void {
    reader.ensure(5, 'secondary order header');
    const orderLength = reader.readInt16();
    const extraFlags = reader.readUInt16();
    const orderType = reader.readUInt8();
    const start = reader.position;

    const orderName = getSecondaryOrderName(orderType);
    this.logger.debug(`Secondary Drawing Order ${orderName}`);

    try {
      this.expectAccepted(
        this.handler.cacheOrderInfo?.(orderLength, extraFlags, orderType, orderName),
        'cacheOrderInfo'
      );

      if (orderLength < 0) {
        throw new OrderError(
          OrderErrorCodes.LengthFraming,
          `Order length ${orderLength} is negative`
        );
      }
      const end = computeSecondaryOrderEnd(start, orderLength);
      reader.ensure(end - start, 'secondary order body');

      const supported = this.isSecondarySupported(orderType);
      if (supported === undefined) {
        throw new OrderError(
          OrderErrorCodes.InvalidEnumerant,
          `Unknown secondary order type 0x${orderType.toString(16)}`
        );
      }
      this.checkOrderSupported(orderName, supported);

      const decoded = readSecondaryOrder(
        reader,
        orderType,
        extraFlags,
        this.settings.glyphSupportLevel
      );

      if (reader.position > end) {
        throw new OrderError(
          OrderErrorCodes.LengthFraming,
          `Read ${reader.position - start} bytes of a ${end - start} byte order`
        );
      }
      if (reader.position < end) {
        this.logger.warn(
          `${orderName}: skipping ${end - reader.position} unread bytes of a ` +
            `${end - start} byte order`
        );
        reader.seek(end);
      }

      this.expectAccepted(
        deliver<SecondaryOrders, SecondaryOrderKind>(this.handler.secondary, decoded),
        decoded.kind
      );
    } catch (error) {
      throw labelError(error, orderName);
    }
  }

  /** Returns undefined for order types the protocol does not define. */
  private isSecondarySupported(orderType: number): boolean | undefined {
    const settings = this.settings;
    switch (orderType) {
      case SecondaryOrderType.BitmapUncompressed:
      case SecondaryOrderType.CacheBitmapCompressed:
      case SecondaryOrderType.BitmapUncompressedV2:
      case SecondaryOrderType.BitmapCompressedV2:
        return settings.bitmapCacheEnabled;
      case SecondaryOrderType.BitmapCompressedV3:
        return settings.bitmapCacheV3Enabled;
      case SecondaryOrderType.CacheColorTable:
        return (
          isOrderSupported(settings, OrderSupportIndex.MemBlt) ||
          isOrderSupported(settings, OrderSupportIndex.Mem3Blt)
        );
      case SecondaryOrderType.CacheGlyph:
        return settings.glyphSupportLevel !== GlyphSupportLevel.None;
      case SecondaryOrderType.CacheBrush:
        return true;
      default:
        return undefined;
    }
  }

  // -------------------------------------------------------------------------
  // Alternate secondary orders
  // -------------------------------------------------------------------------

  private decodeAltSecondaryOrder(reader: OrderReader, controlFlags: number): void {
    const orderType = controlFlags >> 2;
    const orderName = getAltSecondaryOrderName(orderType);
    this.logger.debug(`Alternate Secondary Drawing Order ${orderName}`);

    try {
      this.expectAccepted(
        this.handler.altSecOrderInfo?.(orderType, orderName),
        'altSecOrderInfo'
      );

      const supported = this.isAltSecondarySupported(orderType);
      if (supported === undefined) {
        throw new OrderError(
          OrderErrorCodes.InvalidEnumerant,
          `Unknown alternate secondary order type 0x${orderType.toString(16)}`
        );
      }
      this.checkOrderSupported(orderName, supported);

      if (orderType === AltSecondaryOrderType.Window) {
        const windowOrder = this.handler.windowOrder;
        if (windowOrder === undefined) {
          throw new OrderError(
            OrderErrorCodes.UnsupportedOrder,
            'No window order handler is installed; the order size is unknown'
          );
        }
        this.expectAccepted(windowOrder.call(this.handler, reader), 'windowOrder');
        return;
      }
      if (!hasAltSecondaryBody(orderType)) {
        return;
      }

      const decoded = readAltSecondaryOrder(reader, orderType, this.offscreenDeleteList);
      this.expectAccepted(
        deliver<AltSecondaryOrders, AltSecondaryOrderKind>(this.handler.altSec, decoded),
        decoded.kind
      );
    } catch (error) {
      throw labelError(error, orderName);
    }
  }

  /** Returns undefined for order types the protocol does not define. */
  private isAltSecondarySupported(orderType: number): boolean | undefined {
    const settings = this.settings;
    switch (orderType) {
      case AltSecondaryOrderType.CreateOffscreenBitmap:
      case AltSecondaryOrderType.SwitchSurface:
        return settings.offscreenSupportLevel !== 0;
      case AltSecondaryOrderType.CreateNineGridBitmap:
        return settings.drawNineGridEnabled;
      case AltSecondaryOrderType.FrameMarker:
        return settings.frameMarkerCommandEnabled;
      case AltSecondaryOrderType.GdiPlusFirst:
      case AltSecondaryOrderType.GdiPlusNext:
      case AltSecondaryOrderType.GdiPlusEnd:
      case AltSecondaryOrderType.GdiPlusCacheFirst:
      case AltSecondaryOrderType.GdiPlusCacheNext:
      case AltSecondaryOrderType.GdiPlusCacheEnd:
        return settings.drawGdiPlusCacheEnabled;
      case AltSecondaryOrderType.Window:
        return settings.remoteWndSupportLevel !== 0;
      case AltSecondaryOrderType.StreamBitmapFirst:
      case AltSecondaryOrderType.StreamBitmapNext:
      case AltSecondaryOrderType.CompDeskFirst:
        return true;
      default:
        return undefined;
    }
  }

  // -------------------------------------------------------------------------
  // Policy
  // -------------------------------------------------------------------------

  private checkOrderSupported(orderName: string, supported: boolean): void {
    if (supported) {
      return;
    }
    if (this.settings.allowUnannouncedOrdersFromServer) {
      this.logger.warn(`${orderName} was sent without being announced; accepting it`);
      return;
    }
    this.logger.error(
      `${orderName} was sent without being announced; ` +
        'set allowUnannouncedOrdersFromServer to accept it'
    );
    throw new OrderError(
      OrderErrorCodes.UnsupportedOrder,
      'Order was not announced during capability negotiation'
    );
  }

  private expectAccepted(result: OrderCallbackResult, callback: string): void {
    if (result === false) {
      throw new OrderError(
        OrderErrorCodes.CallbackRejected,
        `${callback} callback rejected the order`
      );
    }
  }
}
