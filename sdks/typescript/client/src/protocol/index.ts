/**
 * Wire-format layer of the drawing-order codec.
 *
 * This module provides the low-level pieces the decoder and encoder are built from:
 * - OrderStream: Bounds-checked little-endian byte cursors
 * - OrderFlags / OrderTypes: Control flags, order type codes and their log names
 * - PrimitiveCodec: Coordinates, colors, variable-length integers and delta lists
 * - FieldFlags: Field presence flags and bounding rectangles
 * - Primary, secondary and alternate secondary order codecs
 */

export { OrderReader, OrderWriter } from './OrderStream.js';

export {
  ControlFlags,
  type ControlFlagsType,
  BoundsFlags,
  type BoundsFlagsType,
  CacheBitmapV2Flags,
  type CacheBitmapV2FlagsType,
  NO_BITMAP_COMPRESSION_HDR,
  CG_GLYPH_UNICODE_PRESENT,
  CACHED_BRUSH,
  STREAM_BITMAP_V2,
  OFFSCREEN_DELETE_LIST_PRESENT,
  hasFlag,
  isAltSecondary,
  isSecondary,
  isPrimary,
} from './OrderFlags.js';

export {
  PrimaryOrderType,
  type PrimaryOrderTypeValue,
  SecondaryOrderType,
  type SecondaryOrderTypeValue,
  AltSecondaryOrderType,
  type AltSecondaryOrderTypeValue,
  BackMode,
  type BackModeValue,
  getPrimaryOrderName,
  getSecondaryOrderName,
  getAltSecondaryOrderName,
  getBmfBpp,
  getBppBmf,
  getCbr2Bpp,
  getBppCbr2,
} from './OrderTypes.js';

export {
  MAX_DELTA_RECTS,
  type DeltaRect,
  type DeltaPoint,
  readCoord,
  writeCoord,
  readColor,
  writeColor,
  readColorRef,
  writeColorRef,
  readColorQuad,
  writeColorQuad,
  read2ByteUnsigned,
  write2ByteUnsigned,
  read2ByteSigned,
  write2ByteSigned,
  read4ByteUnsigned,
  write4ByteUnsigned,
  readDelta,
  writeDelta,
  readDeltaRects,
  writeDeltaRects,
  readDeltaPoints,
  writeDeltaPoints,
  resolveDeltaPoints,
} from './PrimitiveCodec.js';

export {
  type Bounds,
  type OrderInfo,
  createOrderInfo,
  getPrimaryFieldBytes,
  readFieldFlags,
  writeFieldFlags,
  fieldPresent,
  allFieldsPresent,
  readBounds,
  writeBounds,
  boundsEqual,
} from './FieldFlags.js';

export { BRUSH_FIELD_COUNT, type Brush, createBrush, readBrush, writeBrush } from './BrushCodec.js';

export {
  GLYPH_FRAGMENT_CAPACITY,
  type DstBltOrder,
  type PatBltOrder,
  type ScrBltOrder,
  type DrawNineGridOrder,
  type MultiDrawNineGridOrder,
  type LineToOrder,
  type OpaqueRectOrder,
  type SaveBitmapOrder,
  type MemBltOrder,
  type Mem3BltOrder,
  type MultiDstBltOrder,
  type MultiPatBltOrder,
  type MultiScrBltOrder,
  type MultiOpaqueRectOrder,
  type FastIndexOrder,
  type PolygonSCOrder,
  type PolygonCBOrder,
  type PolylineOrder,
  type FastGlyphData,
  type FastGlyphOrder,
  type EllipseSCOrder,
  type EllipseCBOrder,
  type GlyphIndexOrder,
  type PrimaryOrderStates,
  type PrimaryOrderKind,
  type PrimaryDrawingOrder,
  createFastGlyphData,
  createPrimaryOrderStates,
} from './PrimaryOrders.js';

export {
  FieldReader,
  FieldWriter,
  type PrimaryOrderCodec,
  PRIMARY_ORDER_CODECS,
  PRIMARY_ORDER_KINDS,
  getPrimaryOrderKind,
  readPrimaryOrder,
  writePrimaryOrder,
} from './PrimaryOrderCodec.js';

export {
  BITMAP_CACHE_WAITING_LIST_INDEX,
  COLOR_TABLE_SIZE,
  BRUSH_DATA_SIZE,
  type CacheBitmapOrder,
  type CacheBitmapV2Order,
  type BitmapDataEx,
  type CacheBitmapV3Order,
  type CacheColorTableOrder,
  type GlyphData,
  type CacheGlyphOrder,
  type CacheGlyphV2Order,
  type CacheBrushOrder,
  type SecondaryOrders,
  type SecondaryOrderKind,
  type SecondaryDrawingOrder,
  glyphBitmapSize,
} from './SecondaryOrders.js';

export {
  SECONDARY_ORDER_LENGTH_ADJUSTMENT,
  SECONDARY_ORDER_HEADER_SIZE,
  type SecondaryOrderHeader,
  computeSecondaryOrderEnd,
  readCacheBitmapOrder,
  writeCacheBitmapOrder,
  readCacheBitmapV2Order,
  writeCacheBitmapV2Order,
  readCacheBitmapV3Order,
  writeCacheBitmapV3Order,
  readCacheColorTableOrder,
  writeCacheColorTableOrder,
  readCacheGlyphOrder,
  writeCacheGlyphOrder,
  readCacheGlyphV2Order,
  writeCacheGlyphV2Order,
  readCacheBrushOrder,
  writeCacheBrushOrder,
  readSecondaryOrder,
  writeSecondaryOrder,
} from './SecondaryOrderCodec.js';

export {
  FrameMarkerAction,
  type FrameMarkerActionValue,
  type CreateOffscreenBitmapOrder,
  type SwitchSurfaceOrder,
  type NineGridBitmapInfo,
  type CreateNineGridBitmapOrder,
  type FrameMarkerOrder,
  type StreamBitmapFirstOrder,
  type StreamBitmapNextOrder,
  type DrawGdiPlusFirstOrder,
  type DrawGdiPlusNextOrder,
  type DrawGdiPlusEndOrder,
  type DrawGdiPlusCacheFirstOrder,
  type DrawGdiPlusCacheNextOrder,
  type DrawGdiPlusCacheEndOrder,
  type AltSecondaryOrders,
  type AltSecondaryOrderKind,
  type AltSecondaryDrawingOrder,
} from './AltSecondaryOrders.js';

export {
  OffscreenDeleteList,
  hasAltSecondaryBody,
  readAltSecondaryOrder,
  writeAltSecondaryOrder,
  readCreateOffscreenBitmapOrder,
  writeCreateOffscreenBitmapOrder,
  readStreamBitmapFirstOrder,
  writeStreamBitmapFirstOrder,
  readStreamBitmapNextOrder,
  writeStreamBitmapNextOrder,
  readCreateNineGridBitmapOrder,
  writeCreateNineGridBitmapOrder,
  readDrawGdiPlusFirstOrder,
  writeDrawGdiPlusFirstOrder,
  readDrawGdiPlusNextOrder,
  writeDrawGdiPlusNextOrder,
  readDrawGdiPlusCacheFirstOrder,
  writeDrawGdiPlusCacheFirstOrder,
  readDrawGdiPlusCacheNextOrder,
  writeDrawGdiPlusCacheNextOrder,
} from './AltSecondaryOrderCodec.js';
