/**
 * @orderwire/core
 *
 * Shared error taxonomy, logging seam and negotiated capability settings for the
 * drawing-order codec. Contains no wire-format knowledge.
 */

export {
  OrderErrorCodes,
  type OrderErrorCode,
  OrderError,
  getOrderErrorName,
  isOrderError,
} from './OrderError.js';

export {
  type OrderLogger,
  consoleLogger,
  silentLogger,
  createConsoleLogger,
} from './OrderLogger.js';

export {
  OrderSupportIndex,
  type OrderSupportIndexType,
  ORDER_SUPPORT_SLOTS,
  GlyphSupportLevel,
  type OrderSettings,
  type OrderSettingsOverrides,
  createOrderSupport,
  createOrderSettings,
  isOrderSupported,
} from './OrderSettings.js';
