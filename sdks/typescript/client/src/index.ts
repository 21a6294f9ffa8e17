/**
 * @orderwire/client
 *
 * Decoder and encoder for remote-desktop drawing orders.
 *
 * @example
 * ```typescript
 * import { OrderDecoder, createOrderSettings } from '@orderwire/client';
 *
 * const decoder = new OrderDecoder({
 *   settings: createOrderSettings({ allowUnannouncedOrdersFromServer: true }),
 *   handler: {
 *     setBounds: (bounds) => surface.clip(bounds),
 *     primary: {
 *       opaqueRect: (order) =>
 *         surface.fill(order.leftRect, order.topRect, order.width, order.height),
 *     },
 *     secondary: {
 *       cacheBrush: (order) => brushCache.put(order.index, order),
 *     },
 *   },
 * });
 *
 * // Orders section of a fast-path update
 * const count = decoder.decodeOrdersUpdate(payload, true);
 * ```
 */

// Re-export core types for convenience
export {
  OrderErrorCodes,
  type OrderErrorCode,
  OrderError,
  getOrderErrorName,
  isOrderError,
  type OrderLogger,
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  OrderSupportIndex,
  type OrderSupportIndexType,
  ORDER_SUPPORT_SLOTS,
  GlyphSupportLevel,
  type OrderSettings,
  type OrderSettingsOverrides,
  createOrderSupport,
  createOrderSettings,
  isOrderSupported,
} from '@orderwire/core';

export { OrderDecoder, type OrderDecoderOptions } from './OrderDecoder.js';
export { OrderEncoder, type EncodableOrder } from './OrderEncoder.js';
export type {
  OrderHandler,
  OrderCallbackResult,
  PrimaryOrderCallbacks,
  SecondaryOrderCallbacks,
  AltSecondaryOrderCallbacks,
} from './OrderHandler.js';

// Protocol re-exports (for advanced use cases)
export * from './protocol/index.js';
