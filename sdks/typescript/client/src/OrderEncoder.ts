/**
 * Drawing-order encoder, the mirror of {@link OrderDecoder}.
 *
 * Primary orders are always sent with an explicit order type and every field present,
 * so they decode the same regardless of earlier orders. Only the bounds are delta
 * encoded: a rectangle equal to the previous one is announced with ZeroBoundsDeltas.
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';
import { writeAltSecondaryOrder } from './protocol/AltSecondaryOrderCodec.js';
import type { AltSecondaryDrawingOrder } from './protocol/AltSecondaryOrders.js';
import {
  boundsEqual,
  getPrimaryFieldBytes,
  writeBounds,
  writeFieldFlags,
  type Bounds,
} from './protocol/FieldFlags.js';
import { BoundsFlags, ControlFlags } from './protocol/OrderFlags.js';
import { OrderWriter } from './protocol/OrderStream.js';
import { PRIMARY_ORDER_CODECS, writePrimaryOrder } from './protocol/PrimaryOrderCodec.js';
import type {
  PrimaryDrawingOrder,
  PrimaryOrderKind,
  PrimaryOrderStates,
} from './protocol/PrimaryOrders.js';
import {
  SECONDARY_ORDER_LENGTH_ADJUSTMENT,
  writeSecondaryOrder,
} from './protocol/SecondaryOrderCodec.js';
import type { SecondaryDrawingOrder } from './protocol/SecondaryOrders.js';

/** Bounds flags selecting all four absolute edges. */
const ABSOLUTE_BOUNDS = BoundsFlags.Left | BoundsFlags.Top | BoundsFlags.Right | BoundsFlags.Bottom;

/**
 * An order queued for {@link OrderEncoder.encodeOrdersUpdate}.
 */
export type EncodableOrder =
  | { category: 'primary'; order: PrimaryDrawingOrder; bounds?: Bounds }
  | { category: 'secondary'; order: SecondaryDrawingOrder }
  | { category: 'altSecondary'; order: AltSecondaryDrawingOrder };

export class OrderEncoder {
  private lastBounds: Bounds | null = null;

  /**
   * Encodes a primary order, clipped to `bounds` when given.
   */
  encodePrimary(order: PrimaryDrawingOrder, bounds?: Bounds): Uint8Array {
    const writer = new OrderWriter();
    this.writePrimary(writer, order, bounds);
    return writer.toUint8Array();
  }

  encodeSecondary(order: SecondaryDrawingOrder): Uint8Array {
    const writer = new OrderWriter();
    this.writeSecondary(writer, order);
    return writer.toUint8Array();
  }

  encodeAltSecondary(order: AltSecondaryDrawingOrder): Uint8Array {
    const writer = new OrderWriter();
    this.writeAltSecondary(writer, order);
    return writer.toUint8Array();
  }

  /**
   * Encodes the orders section of an update PDU, with the slow-path padding words
   * unless `fastPath` is set.
   */
  encodeOrdersUpdate(orders: readonly EncodableOrder[], fastPath = false): Uint8Array {
    if (orders.length > 0xffff) {
      throw new OrderError(
        OrderErrorCodes.EncodeRange,
        `Cannot send ${orders.length} orders in one update`
      );
    }

    const writer = new OrderWriter(256);
    if (!fastPath) {
      writer.writeZero(2);
    }
    writer.writeUInt16(orders.length);
    if (!fastPath) {
      writer.writeZero(2);
    }

    for (const entry of orders) {
      switch (entry.category) {
        case 'primary':
          this.writePrimary(writer, entry.order, entry.bounds);
          break;
        case 'secondary':
          this.writeSecondary(writer, entry.order);
          break;
        case 'altSecondary':
          this.writeAltSecondary(writer, entry.order);
          break;
      }
    }
    return writer.toUint8Array();
  }

  /**
   * Forgets the last bounds, so the next bounded order sends its rectangle in full.
   * Call this whenever the peer's decoder state is reset.
   */
  reset(): void {
    this.lastBounds = null;
  }

  private writePrimary<K extends PrimaryOrderKind>(
    writer: OrderWriter,
    entry: { kind: K; order: PrimaryOrderStates[K] },
    bounds: Bounds | undefined
  ): void {
    const orderType = PRIMARY_ORDER_CODECS[entry.kind].orderType;
    const fieldBytes = getPrimaryFieldBytes(orderType) ?? 0;

    const body = new OrderWriter();
    const fieldFlags = writePrimaryOrder(entry.kind, body, entry.order);

    const reuseBounds =
      bounds !== undefined && this.lastBounds !== null && boundsEqual(bounds, this.lastBounds);
    let controlFlags = ControlFlags.Standard | ControlFlags.TypeChange;
    if (bounds !== undefined) {
      controlFlags |= ControlFlags.Bounds;
      if (reuseBounds) {
        controlFlags |= ControlFlags.ZeroBoundsDeltas;
      }
    }

    writer.writeUInt8(controlFlags);
    writer.writeUInt8(orderType);
    writeFieldFlags(writer, fieldFlags, fieldBytes);
    if (bounds !== undefined && !reuseBounds) {
      writeBounds(writer, ABSOLUTE_BOUNDS, bounds);
    }
    writer.writeBytes(body.toUint8Array());

    if (bounds !== undefined) {
      this.lastBounds = { ...bounds };
    }
  }

  private writeSecondary(writer: OrderWriter, order: SecondaryDrawingOrder): void {
    const body = new OrderWriter();
    const header = writeSecondaryOrder(body, order);
    // The length field cannot go below zero; short bodies are padded to the minimum.
    if (body.length < SECONDARY_ORDER_LENGTH_ADJUSTMENT) {
      body.writeZero(SECONDARY_ORDER_LENGTH_ADJUSTMENT - body.length);
    }
    const orderLength = body.length - SECONDARY_ORDER_LENGTH_ADJUSTMENT;
    if (orderLength > 0x7fff) {
      throw new OrderError(
        OrderErrorCodes.EncodeRange,
        `Secondary order body of ${body.length} bytes exceeds the order length field`
      );
    }

    writer.writeUInt8(ControlFlags.Standard | ControlFlags.Secondary);
    writer.writeInt16(orderLength);
    writer.writeUInt16(header.extraFlags);
    writer.writeUInt8(header.orderType);
    writer.writeBytes(body.toUint8Array());
  }

  private writeAltSecondary(writer: OrderWriter, order: AltSecondaryDrawingOrder): void {
    const body = new OrderWriter();
    const orderType = writeAltSecondaryOrder(body, order);
    writer.writeUInt8((orderType << 2) | ControlFlags.Secondary);
    writer.writeBytes(body.toUint8Array());
  }
}
