/**
 * Order type codes for the three drawing-order categories, plus the small lookup
 * tables (bitmap formats, background modes) shared across order codecs.
 */

/**
 * Primary drawing order types, carried in the order type byte after TypeChange.
 * Codes 0x03-0x06, 0x0C and 0x17 are reserved.
 */
export const PrimaryOrderType = {
  DstBlt: 0x00,
  PatBlt: 0x01,
  ScrBlt: 0x02,
  DrawNineGrid: 0x07,
  MultiDrawNineGrid: 0x08,
  LineTo: 0x09,
  OpaqueRect: 0x0a,
  SaveBitmap: 0x0b,
  MemBlt: 0x0d,
  Mem3Blt: 0x0e,
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

export type PrimaryOrderTypeValue = (typeof PrimaryOrderType)[keyof typeof PrimaryOrderType];

/**
 * Secondary (cache) order types, carried in the secondary order header.
 */
export const SecondaryOrderType = {
  BitmapUncompressed: 0x00,
  CacheColorTable: 0x01,
  CacheBitmapCompressed: 0x02,
  CacheGlyph: 0x03,
  BitmapUncompressedV2: 0x04,
  BitmapCompressedV2: 0x05,
  CacheBrush: 0x07,
  BitmapCompressedV3: 0x08,
} as const;

export type SecondaryOrderTypeValue = (typeof SecondaryOrderType)[keyof typeof SecondaryOrderType];

/**
 * Alternate secondary order types, carried in the upper six bits of the control flags.
 */
export const AltSecondaryOrderType = {
  SwitchSurface: 0x00,
  CreateOffscreenBitmap: 0x01,
  StreamBitmapFirst: 0x02,
  StreamBitmapNext: 0x03,
  CreateNineGridBitmap: 0x04,
  GdiPlusFirst: 0x05,
  GdiPlusNext: 0x06,
  GdiPlusEnd: 0x07,
  GdiPlusCacheFirst: 0x08,
  GdiPlusCacheNext: 0x09,
  GdiPlusCacheEnd: 0x0a,
  Window: 0x0b,
  CompDeskFirst: 0x0c,
  FrameMarker: 0x0d,
} as const;

export type AltSecondaryOrderTypeValue =
  (typeof AltSecondaryOrderType)[keyof typeof AltSecondaryOrderType];

/** Background mix mode of line and polygon orders. */
export const BackMode = {
  Transparent: 0x0001,
  Opaque: 0x0002,
} as const;

export type BackModeValue = (typeof BackMode)[keyof typeof BackMode];

const PRIMARY_ORDER_NAMES: readonly string[] = [
  'DstBlt',
  'PatBlt',
  'ScrBlt',
  'UNUSED',
  'UNUSED',
  'UNUSED',
  'UNUSED',
  'DrawNineGrid',
  'MultiDrawNineGrid',
  'LineTo',
  'OpaqueRect',
  'SaveBitmap',
  'UNUSED',
  'MemBlt',
  'Mem3Blt',
  'MultiDstBlt',
  'MultiPatBlt',
  'MultiScrBlt',
  'MultiOpaqueRect',
  'FastIndex',
  'PolygonSC',
  'PolygonCB',
  'Polyline',
  'UNUSED',
  'FastGlyph',
  'EllipseSC',
  'EllipseCB',
  'GlyphIndex',
];

const SECONDARY_ORDER_NAMES: readonly string[] = [
  'Cache Bitmap',
  'Cache Color Table',
  'Cache Bitmap (Compressed)',
  'Cache Glyph',
  'Cache Bitmap V2',
  'Cache Bitmap V2 (Compressed)',
  'UNUSED',
  'Cache Brush',
  'Cache Bitmap V3',
];

const ALT_SECONDARY_ORDER_NAMES: readonly string[] = [
  'Switch Surface',
  'Create Offscreen Bitmap',
  'Stream Bitmap First',
  'Stream Bitmap Next',
  'Create NineGrid Bitmap',
  'Draw GDI+ First',
  'Draw GDI+ Next',
  'Draw GDI+ End',
  'Draw GDI+ Cache First',
  'Draw GDI+ Cache Next',
  'Draw GDI+ Cache End',
  'Windowing',
  'Desktop Composition',
  'Frame Marker',
];

function formatOrderName(orderType: number, names: readonly string[]): string {
  const hex = (orderType & 0xff).toString(16).padStart(2, '0');
  return `[0x${hex}] ${names[orderType] ?? 'UNKNOWN'}`;
}

/**
 * Gets the log label of a primary order type, e.g. `[0x0a] OpaqueRect`.
 */
export function getPrimaryOrderName(orderType: number): string {
  return formatOrderName(orderType, PRIMARY_ORDER_NAMES);
}

/**
 * Gets the log label of a secondary order type, e.g. `[0x07] Cache Brush`.
 */
export function getSecondaryOrderName(orderType: number): string {
  return formatOrderName(orderType, SECONDARY_ORDER_NAMES);
}

/**
 * Gets the log label of an alternate secondary order type, e.g. `[0x0d] Frame Marker`.
 */
export function getAltSecondaryOrderName(orderType: number): string {
  return formatOrderName(orderType, ALT_SECONDARY_ORDER_NAMES);
}

/**
 * Brush and cache-brush bitmap format codes (BMF) to bits per pixel.
 */
const BMF_BPP: ReadonlyMap<number, number> = new Map([
  [1, 1],
  [3, 8],
  [4, 16],
  [5, 24],
  [6, 32],
]);

/**
 * Maps a bitmap format code to bits per pixel. The cached-brush bit (0x80) is ignored.
 * Returns undefined for codes with no defined depth.
 */
export function getBmfBpp(bmf: number): number | undefined {
  return BMF_BPP.get(bmf & ~0x80);
}

/**
 * Maps bits per pixel to the bitmap format code, or undefined when no code exists.
 */
export function getBppBmf(bpp: number): number | undefined {
  for (const [bmf, value] of BMF_BPP) {
    if (value === bpp) {
      return bmf;
    }
  }
  return undefined;
}

const CBR2_BPP: ReadonlyMap<number, number> = new Map([
  [3, 8],
  [4, 16],
  [5, 24],
  [6, 32],
]);

/**
 * Maps the bits-per-pixel code of revision 2/3 cache bitmap orders to a depth.
 */
export function getCbr2Bpp(code: number): number | undefined {
  return CBR2_BPP.get(code);
}

/**
 * Maps a depth to the revision 2/3 cache bitmap bits-per-pixel code.
 */
export function getBppCbr2(bpp: number): number | undefined {
  for (const [code, value] of CBR2_BPP) {
    if (value === bpp) {
      return code;
    }
  }
  return undefined;
}
