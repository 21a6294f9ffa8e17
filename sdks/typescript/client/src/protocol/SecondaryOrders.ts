/**
 * Cache-population (secondary) orders. Each order is fully specified on the wire and
 * decoded into a fresh value that the rendering callback takes ownership of.
 */

/** Cache index meaning "do not cache; keep on the waiting list". */
export const BITMAP_CACHE_WAITING_LIST_INDEX = 0x7fff;

/** Colors in a cached color table. */
export const COLOR_TABLE_SIZE = 256;

/** Bytes of the fixed 8x8 brush pattern buffer (8x8 pixels at up to 32 bpp). */
export const BRUSH_DATA_SIZE = 256;

export interface CacheBitmapOrder {
  cacheId: number;
  bitmapWidth: number;
  bitmapHeight: number;
  bitmapBpp: number;
  /** Length of `bitmapDataStream`, excluding any compression header. */
  bitmapLength: number;
  cacheIndex: number;
  compressed: boolean;
  /** The 8-byte compression header, or null when the peer omitted it. */
  bitmapComprHdr: Uint8Array | null;
  bitmapDataStream: Uint8Array;
}

export interface CacheBitmapV2Order {
  cacheId: number;
  /** Per-order CacheBitmapV2Flags bits. */
  flags: number;
  key1: number;
  key2: number;
  bitmapBpp: number;
  bitmapWidth: number;
  bitmapHeight: number;
  bitmapLength: number;
  cacheIndex: number;
  compressed: boolean;
  cbCompFirstRowSize: number;
  cbCompMainBodySize: number;
  cbScanWidth: number;
  cbUncompressedSize: number;
  bitmapDataStream: Uint8Array;
}

export interface BitmapDataEx {
  bpp: number;
  codecId: number;
  width: number;
  height: number;
  length: number;
  data: Uint8Array;
}

export interface CacheBitmapV3Order {
  cacheId: number;
  flags: number;
  bpp: number;
  cacheIndex: number;
  key1: number;
  key2: number;
  bitmapData: BitmapDataEx;
}

export interface CacheColorTableOrder {
  cacheIndex: number;
  numberColors: number;
  /** Colors with red in the low byte. */
  colorTable: number[];
}

export interface GlyphData {
  cacheIndex: number;
  x: number;
  y: number;
  cx: number;
  cy: number;
  /** Size of `aj`: ceil(cx / 8) * cy rounded up to a multiple of 4. */
  cb: number;
  aj: Uint8Array;
}

export interface CacheGlyphOrder {
  cacheId: number;
  cGlyphs: number;
  glyphData: GlyphData[];
  unicodeCharacters: string | null;
}

export interface CacheGlyphV2Order {
  cacheId: number;
  /** Four flag bits packed next to the cache id. */
  flags: number;
  cGlyphs: number;
  glyphData: GlyphData[];
  unicodeCharacters: string | null;
}

export interface CacheBrushOrder {
  index: number;
  bpp: number;
  cx: number;
  cy: number;
  style: number;
  /** Declared pattern length (iBytes). */
  length: number;
  /** Expanded pattern, {@link BRUSH_DATA_SIZE} bytes, rows top-down. */
  data: Uint8Array;
}

export interface SecondaryOrders {
  cacheBitmap: CacheBitmapOrder;
  cacheBitmapV2: CacheBitmapV2Order;
  cacheBitmapV3: CacheBitmapV3Order;
  cacheColorTable: CacheColorTableOrder;
  cacheGlyph: CacheGlyphOrder;
  cacheGlyphV2: CacheGlyphV2Order;
  cacheBrush: CacheBrushOrder;
}

export type SecondaryOrderKind = keyof SecondaryOrders;

/**
 * A secondary order tagged with its kind.
 */
export type SecondaryDrawingOrder = {
  [K in SecondaryOrderKind]: { kind: K; order: SecondaryOrders[K] };
}[SecondaryOrderKind];

/**
 * Size of a 1bpp glyph bitmap: whole bytes per row, padded to a 4-byte boundary.
 */
export function glyphBitmapSize(cx: number, cy: number): number {
  const size = Math.ceil(cx / 8) * cy;
  return size % 4 === 0 ? size : size + 4 - (size % 4);
}
