/**
 * Negotiated drawing-order capabilities, as agreed during connection setup.
 * The codec only reads these; the session layer owns and populates them.
 */

/**
 * Slots of the order-support array announced in the order capability set.
 * Slots not listed here are reserved by the protocol.
 */
export const OrderSupportIndex = {
  DstBlt: 0x00,
  PatBlt: 0x01,
  ScrBlt: 0x02,
  MemBlt: 0x03,
  Mem3Blt: 0x04,
  DrawNineGrid: 0x07,
  LineTo: 0x08,
  MultiDrawNineGrid: 0x09,
  OpaqueRect: 0x0a,
  SaveBitmap: 0x0b,
  MultiDstBlt: 0x0f,
  MultiPatBlt: 0x10,
  MultiScrBlt: 0x11,
  MultiOpaqueRect: 0x12,
  FastIndex: 0x13,
  PolygonSC: 0x14,
  PolygonCB: 0x15,
  Polyline: 0x16,
  FastGlyph: 0x18,
  EllipseSC: 0x19,
  EllipseCB: 0x1a,
  GlyphIndex: 0x1b,
} as const;

export type OrderSupportIndexType = (typeof OrderSupportIndex)[keyof typeof OrderSupportIndex];

/** Number of entries in the order-support array. */
export const ORDER_SUPPORT_SLOTS = 32;

/**
 * Glyph cache support level from the glyph cache capability set.
 */
export enum GlyphSupportLevel {
  /** Glyph caching is not supported. */
  None = 0,
  /** Only the cache glyph order (revision 1) is supported. */
  Partial = 1,
  /** Cache glyph, glyph index, fast index and fast glyph orders are supported. */
  Full = 2,
  /** As Full, with glyph caches populated through the revision 2 cache glyph order. */
  Encode = 3,
}

export interface OrderSettings {
  /** One entry per {@link OrderSupportIndex} slot. */
  readonly orderSupport: readonly boolean[];
  readonly bitmapCacheEnabled: boolean;
  readonly bitmapCacheV3Enabled: boolean;
  readonly glyphSupportLevel: GlyphSupportLevel;
  /** 0 disables offscreen bitmaps and surface switching. */
  readonly offscreenSupportLevel: number;
  readonly drawNineGridEnabled: boolean;
  readonly frameMarkerCommandEnabled: boolean;
  readonly drawGdiPlusCacheEnabled: boolean;
  /** 0 disables window orders. */
  readonly remoteWndSupportLevel: number;
  /**
   * When set, orders the peer sends without having negotiated them are logged and
   * accepted instead of failing the update.
   */
  readonly allowUnannouncedOrdersFromServer: boolean;
}

export type OrderSettingsOverrides = Partial<OrderSettings>;

/**
 * Builds an order-support array with every listed slot announced.
 */
export function createOrderSupport(enabled = true): boolean[] {
  const support = new Array<boolean>(ORDER_SUPPORT_SLOTS).fill(false);
  if (enabled) {
    for (const index of Object.values(OrderSupportIndex)) {
      support[index] = true;
    }
  }
  return support;
}

/**
 * Creates a frozen settings object. Defaults announce every order and cache with
 * strict (non-relaxed) order checking.
 */
export function createOrderSettings(overrides: OrderSettingsOverrides = {}): OrderSettings {
  const orderSupport = overrides.orderSupport ?? createOrderSupport();
  if (orderSupport.length !== ORDER_SUPPORT_SLOTS) {
    throw new Error(
      `orderSupport must have ${ORDER_SUPPORT_SLOTS} entries, got ${orderSupport.length}`
    );
  }

  return Object.freeze({
    bitmapCacheEnabled: true,
    bitmapCacheV3Enabled: true,
    glyphSupportLevel: GlyphSupportLevel.Full,
    offscreenSupportLevel: 1,
    drawNineGridEnabled: true,
    frameMarkerCommandEnabled: true,
    drawGdiPlusCacheEnabled: true,
    remoteWndSupportLevel: 1,
    allowUnannouncedOrdersFromServer: false,
    ...overrides,
    orderSupport: Object.freeze([...orderSupport]),
  });
}

/**
 * Whether a single order-support slot was announced.
 */
export function isOrderSupported(settings: OrderSettings, index: OrderSupportIndexType): boolean {
  return settings.orderSupport[index] === true;
}
