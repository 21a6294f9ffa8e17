/**
 * Error codes raised while decoding or encoding drawing orders.
 * Every fatal condition aborts the current order and the rest of its update PDU.
 *
 * Code ranges:
 * - 10-29: Malformed input (truncated buffers, structural bounds)
 * - 30-49: Well-formed input the codec refuses (bad enumerants, unnegotiated orders)
 * - 50-69: Framing and callback failures
 * - 70+: Encoder-side range errors
 */
export const OrderErrorCodes = {
  /** Not enough bytes remain for a required field, array or header. */
  Truncation: 10,

  /** A count exceeds a fixed structural maximum (45 rectangles, 256 colors, fragment capacity). */
  BoundViolation: 20,

  /** Unknown order type, bpp outside [1,32], or an unknown brush/bitmap format code. */
  InvalidEnumerant: 30,

  /** The order is well formed but was never announced during capability negotiation. */
  UnsupportedOrder: 40,

  /** A secondary order read past its declared length, or declared a negative one. */
  LengthFraming: 50,

  /** A rendering callback reported failure. */
  CallbackRejected: 60,

  /** The encoder was given a value its wire representation cannot carry. */
  EncodeRange: 70,
} as const;

export type OrderErrorCode = (typeof OrderErrorCodes)[keyof typeof OrderErrorCodes];

/**
 * Gets a human-readable name for an order error code.
 */
export function getOrderErrorName(code: number): string {
  for (const [name, value] of Object.entries(OrderErrorCodes)) {
    if (value === code) {
      return name;
    }
  }
  return 'UnknownError';
}

/**
 * Error thrown by the order codec. Carries the taxonomy code and, when known,
 * the `[0xNN] Name` label of the order being processed.
 */
export class OrderError extends Error {
  readonly code: OrderErrorCode;
  readonly errorName: string;
  readonly orderName: string | null;

  constructor(code: OrderErrorCode, message: string, orderName: string | null = null) {
    super(orderName ? `${orderName}: ${message}` : message);
    this.name = 'OrderError';
    this.code = code;
    this.errorName = getOrderErrorName(code);
    this.orderName = orderName;
  }

  /**
   * Returns a copy of this error labelled with the order it occurred in.
   * Errors that already carry a label are returned unchanged.
   */
  withOrderName(orderName: string): OrderError {
    if (this.orderName !== null) {
      return this;
    }
    const labelled = new OrderError(this.code, this.message, orderName);
    labelled.stack = this.stack;
    return labelled;
  }
}

/**
 * Type guard for errors raised by the order codec.
 */
export function isOrderError(value: unknown): value is OrderError {
  return value instanceof OrderError;
}
