/**
 * Callbacks the decoder invokes while walking an update PDU.
 * Every callback is optional; a missing callback accepts the order. Returning `false`
 * rejects it and aborts the rest of the update.
 */

import type { AltSecondaryOrders, AltSecondaryOrderKind } from './protocol/AltSecondaryOrders.js';
import type { Bounds, OrderInfo } from './protocol/FieldFlags.js';
import type { OrderReader } from './protocol/OrderStream.js';
import type { PrimaryOrderKind, PrimaryOrderStates } from './protocol/PrimaryOrders.js';
import type { SecondaryOrderKind, SecondaryOrders } from './protocol/SecondaryOrders.js';

/** `false` rejects the order; anything else accepts it. */
export type OrderCallbackResult = boolean | void;

/**
 * Per-kind primary callbacks. The order passed in is the decoder's persisted state for
 * that kind and is overwritten by the next order of the same kind.
 */
export type PrimaryOrderCallbacks = {
  [K in PrimaryOrderKind]?: (order: PrimaryOrderStates[K]) => OrderCallbackResult;
};

/**
 * Per-kind secondary callbacks. Each order is freshly allocated and owned by the callback.
 */
export type SecondaryOrderCallbacks = {
  [K in SecondaryOrderKind]?: (order: SecondaryOrders[K]) => OrderCallbackResult;
};

export type AltSecondaryOrderCallbacks = {
  [K in AltSecondaryOrderKind]?: (order: AltSecondaryOrders[K]) => OrderCallbackResult;
};

export interface OrderHandler {
  /**
   * Called with the clip rectangle before a bounded primary order is delivered, and with
   * null right after it.
   */
  setBounds?(bounds: Bounds | null): OrderCallbackResult;

  /** Called for every primary order after its fields are decoded. */
  orderInfo?(info: Readonly<OrderInfo>, orderName: string): OrderCallbackResult;

  /** Called for every secondary order once its header is read, before any checks. */
  cacheOrderInfo?(
    orderLength: number,
    extraFlags: number,
    orderType: number,
    orderName: string
  ): OrderCallbackResult;

  /** Called for every alternate secondary order before any checks. */
  altSecOrderInfo?(orderType: number, orderName: string): OrderCallbackResult;

  primary?: PrimaryOrderCallbacks;
  secondary?: SecondaryOrderCallbacks;
  altSec?: AltSecondaryOrderCallbacks;

  /**
   * Parses a window order. The reader is positioned just after the control flags and must
   * be advanced past the whole order. Without this callback window orders are rejected,
   * since nothing else knows their size.
   */
  windowOrder?(reader: OrderReader): OrderCallbackResult;
}
