/**
 * Alternate secondary orders: offscreen surfaces, streamed bitmaps, GDI+ envelopes and
 * frame markers. Their type lives in the upper six bits of the control flags.
 */

/** Action of a frame marker order. */
export const FrameMarkerAction = {
  Begin: 0x00000000,
  End: 0x00000001,
} as const;

export type FrameMarkerActionValue = (typeof FrameMarkerAction)[keyof typeof FrameMarkerAction];

export interface CreateOffscreenBitmapOrder {
  /** Surface id, 15 bits. */
  id: number;
  cx: number;
  cy: number;
  /** Offscreen surfaces to delete before creating this one. */
  deleteList: number[];
}

export interface SwitchSurfaceOrder {
  /** Target surface, or 0xFFFF for the primary drawing surface. */
  bitmapId: number;
}

export interface NineGridBitmapInfo {
  flFlags: number;
  ulLeftWidth: number;
  ulRightWidth: number;
  ulTopHeight: number;
  ulBottomHeight: number;
  crTransparent: number;
}

export interface CreateNineGridBitmapOrder {
  bitmapBpp: number;
  bitmapId: number;
  nineGridInfo: NineGridBitmapInfo;
}

export interface FrameMarkerOrder {
  action: number;
}

export interface StreamBitmapFirstOrder {
  bitmapFlags: number;
  bitmapBpp: number;
  bitmapType: number;
  bitmapWidth: number;
  bitmapHeight: number;
  /** Total size of the streamed bitmap; 32 bits wide when STREAM_BITMAP_V2 is set. */
  bitmapSize: number;
  bitmapBlockSize: number;
  bitmapBlock: Uint8Array;
}

export interface StreamBitmapNextOrder {
  bitmapFlags: number;
  bitmapType: number;
  bitmapBlockSize: number;
  bitmapBlock: Uint8Array;
}

/** First or last chunk of a GDI+ EMF record stream. */
export interface DrawGdiPlusFirstOrder {
  cbSize: number;
  cbTotalSize: number;
  cbTotalEmfSize: number;
  emfRecords: Uint8Array;
}

export type DrawGdiPlusEndOrder = DrawGdiPlusFirstOrder;

export interface DrawGdiPlusNextOrder {
  cbSize: number;
  emfRecords: Uint8Array;
}

/** First or last chunk of a cached GDI+ object. */
export interface DrawGdiPlusCacheFirstOrder {
  flags: number;
  cacheType: number;
  cacheIndex: number;
  cbSize: number;
  cbTotalSize: number;
  emfRecords: Uint8Array;
}

export type DrawGdiPlusCacheEndOrder = DrawGdiPlusCacheFirstOrder;

export interface DrawGdiPlusCacheNextOrder {
  flags: number;
  cacheType: number;
  cacheIndex: number;
  cbSize: number;
  emfRecords: Uint8Array;
}

export interface AltSecondaryOrders {
  switchSurface: SwitchSurfaceOrder;
  createOffscreenBitmap: CreateOffscreenBitmapOrder;
  streamBitmapFirst: StreamBitmapFirstOrder;
  streamBitmapNext: StreamBitmapNextOrder;
  createNineGridBitmap: CreateNineGridBitmapOrder;
  drawGdiPlusFirst: DrawGdiPlusFirstOrder;
  drawGdiPlusNext: DrawGdiPlusNextOrder;
  drawGdiPlusEnd: DrawGdiPlusEndOrder;
  drawGdiPlusCacheFirst: DrawGdiPlusCacheFirstOrder;
  drawGdiPlusCacheNext: DrawGdiPlusCacheNextOrder;
  drawGdiPlusCacheEnd: DrawGdiPlusCacheEndOrder;
  frameMarker: FrameMarkerOrder;
}

export type AltSecondaryOrderKind = keyof AltSecondaryOrders;

/**
 * An alternate secondary order tagged with its kind. Window and desktop composition
 * orders have no entry: the former is parsed by the host, the latter carries no body.
 */
export type AltSecondaryDrawingOrder = {
  [K in AltSecondaryOrderKind]: { kind: K; order: AltSecondaryOrders[K] };
}[AltSecondaryOrderKind];
