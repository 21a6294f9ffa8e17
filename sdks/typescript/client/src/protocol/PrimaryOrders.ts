/**
 * Field structures of the primary drawing orders.
 *
 * A decoder keeps one instance of each structure per connection and only overwrites
 * the fields whose presence bit is set; every other field keeps the value of the
 * previous order of the same type.
 */

import { createBrush, type Brush } from './BrushCodec.js';
import type { DeltaPoint, DeltaRect } from './PrimitiveCodec.js';

/** Capacity of the glyph fragment buffer of GlyphIndex/FastIndex orders. */
export const GLYPH_FRAGMENT_CAPACITY = 256;

export interface DstBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
}

export interface PatBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  backColor: number;
  foreColor: number;
  brush: Brush;
}

export interface ScrBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  xSrc: number;
  ySrc: number;
}

export interface DrawNineGridOrder {
  srcLeft: number;
  srcTop: number;
  srcRight: number;
  srcBottom: number;
  bitmapId: number;
}

export interface MultiDrawNineGridOrder {
  srcLeft: number;
  srcTop: number;
  srcRight: number;
  srcBottom: number;
  bitmapId: number;
  nDeltaEntries: number;
  cbData: number;
  rectangles: DeltaRect[];
}

export interface LineToOrder {
  backMode: number;
  xStart: number;
  yStart: number;
  xEnd: number;
  yEnd: number;
  backColor: number;
  rop2: number;
  penStyle: number;
  penWidth: number;
  penColor: number;
}

export interface OpaqueRectOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  /** Red in the low byte; each channel travels as its own field. */
  color: number;
}

export interface SaveBitmapOrder {
  savedBitmapPosition: number;
  leftRect: number;
  topRect: number;
  rightRect: number;
  bottomRect: number;
  operation: number;
}

export interface MemBltOrder {
  /** Bitmap cache id (low byte of the wire field). */
  cacheId: number;
  /** Color table index (high byte of the wire field). */
  colorIndex: number;
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  xSrc: number;
  ySrc: number;
  cacheIndex: number;
}

export interface Mem3BltOrder extends MemBltOrder {
  backColor: number;
  foreColor: number;
  brush: Brush;
}

export interface MultiDstBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  numRectangles: number;
  cbData: number;
  rectangles: DeltaRect[];
}

export interface MultiPatBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  backColor: number;
  foreColor: number;
  brush: Brush;
  numRectangles: number;
  cbData: number;
  rectangles: DeltaRect[];
}

export interface MultiScrBltOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  rop: number;
  xSrc: number;
  ySrc: number;
  numRectangles: number;
  cbData: number;
  rectangles: DeltaRect[];
}

export interface MultiOpaqueRectOrder {
  leftRect: number;
  topRect: number;
  width: number;
  height: number;
  color: number;
  numRectangles: number;
  cbData: number;
  rectangles: DeltaRect[];
}

export interface FastIndexOrder {
  cacheId: number;
  flAccel: number;
  ulCharInc: number;
  backColor: number;
  foreColor: number;
  bkLeft: number;
  bkTop: number;
  bkRight: number;
  bkBottom: number;
  opLeft: number;
  opTop: number;
  opRight: number;
  opBottom: number;
  x: number;
  y: number;
  /** Glyph fragment bytes, at most {@link GLYPH_FRAGMENT_CAPACITY}. */
  data: Uint8Array;
}

export interface PolygonSCOrder {
  xStart: number;
  yStart: number;
  rop2: number;
  fillMode: number;
  brushColor: number;
  numPoints: number;
  cbData: number;
  points: DeltaPoint[];
}

export interface PolygonCBOrder {
  xStart: number;
  yStart: number;
  /** Low five bits of the wire byte. */
  rop2: number;
  /** Derived from the high bit of the wire rop2 byte. */
  backMode: number;
  fillMode: number;
  backColor: number;
  foreColor: number;
  brush: Brush;
  numPoints: number;
  cbData: number;
  points: DeltaPoint[];
}

export interface PolylineOrder {
  xStart: number;
  yStart: number;
  rop2: number;
  brushCacheEntry: number;
  penColor: number;
  numDeltaEntries: number;
  cbData: number;
  points: DeltaPoint[];
}

/**
 * Glyph carried inline by a FastGlyph order.
 */
export interface FastGlyphData {
  cacheIndex: number;
  x: number;
  y: number;
  cx: number;
  cy: number;
  /** 1bpp glyph bits. */
  aj: Uint8Array;
}

export interface FastGlyphOrder {
  cacheId: number;
  flAccel: number;
  ulCharInc: number;
  backColor: number;
  foreColor: number;
  bkLeft: number;
  bkTop: number;
  bkRight: number;
  bkBottom: number;
  opLeft: number;
  opTop: number;
  opRight: number;
  opBottom: number;
  x: number;
  y: number;
  /** Raw bytes of the inline glyph sub-stream. */
  data: Uint8Array;
  glyph: FastGlyphData;
}

export interface EllipseSCOrder {
  leftRect: number;
  topRect: number;
  rightRect: number;
  bottomRect: number;
  rop2: number;
  fillMode: number;
  color: number;
}

export interface EllipseCBOrder {
  leftRect: number;
  topRect: number;
  rightRect: number;
  bottomRect: number;
  rop2: number;
  fillMode: number;
  backColor: number;
  foreColor: number;
  brush: Brush;
}

export interface GlyphIndexOrder {
  cacheId: number;
  flAccel: number;
  ulCharInc: number;
  fOpRedundant: number;
  backColor: number;
  foreColor: number;
  bkLeft: number;
  bkTop: number;
  bkRight: number;
  bkBottom: number;
  opLeft: number;
  opTop: number;
  opRight: number;
  opBottom: number;
  brush: Brush;
  x: number;
  y: number;
  /** Glyph fragment bytes, at most {@link GLYPH_FRAGMENT_CAPACITY}. */
  data: Uint8Array;
}

/**
 * Persisted state of every primary order kind, keyed by kind.
 */
export interface PrimaryOrderStates {
  dstBlt: DstBltOrder;
  patBlt: PatBltOrder;
  scrBlt: ScrBltOrder;
  drawNineGrid: DrawNineGridOrder;
  multiDrawNineGrid: MultiDrawNineGridOrder;
  lineTo: LineToOrder;
  opaqueRect: OpaqueRectOrder;
  saveBitmap: SaveBitmapOrder;
  memBlt: MemBltOrder;
  mem3Blt: Mem3BltOrder;
  multiDstBlt: MultiDstBltOrder;
  multiPatBlt: MultiPatBltOrder;
  multiScrBlt: MultiScrBltOrder;
  multiOpaqueRect: MultiOpaqueRectOrder;
  fastIndex: FastIndexOrder;
  polygonSC: PolygonSCOrder;
  polygonCB: PolygonCBOrder;
  polyline: PolylineOrder;
  fastGlyph: FastGlyphOrder;
  ellipseSC: EllipseSCOrder;
  ellipseCB: EllipseCBOrder;
  glyphIndex: GlyphIndexOrder;
}

export type PrimaryOrderKind = keyof PrimaryOrderStates;

/**
 * A primary order tagged with its kind, as handed to the encoder.
 */
export type PrimaryDrawingOrder = {
  [K in PrimaryOrderKind]: { kind: K; order: PrimaryOrderStates[K] };
}[PrimaryOrderKind];

function rect(): { leftRect: number; topRect: number; width: number; height: number } {
  return { leftRect: 0, topRect: 0, width: 0, height: 0 };
}

function glyphBoxes(): Pick<
  GlyphIndexOrder,
  'bkLeft' | 'bkTop' | 'bkRight' | 'bkBottom' | 'opLeft' | 'opTop' | 'opRight' | 'opBottom'
> {
  return {
    bkLeft: 0,
    bkTop: 0,
    bkRight: 0,
    bkBottom: 0,
    opLeft: 0,
    opTop: 0,
    opRight: 0,
    opBottom: 0,
  };
}

export function createFastGlyphData(): FastGlyphData {
  return { cacheIndex: 0, x: 0, y: 0, cx: 0, cy: 0, aj: new Uint8Array(0) };
}

/**
 * Creates the zeroed state every connection starts from.
 */
export function createPrimaryOrderStates(): PrimaryOrderStates {
  return {
    dstBlt: { ...rect(), rop: 0 },
    patBlt: { ...rect(), rop: 0, backColor: 0, foreColor: 0, brush: createBrush() },
    scrBlt: { ...rect(), rop: 0, xSrc: 0, ySrc: 0 },
    drawNineGrid: { srcLeft: 0, srcTop: 0, srcRight: 0, srcBottom: 0, bitmapId: 0 },
    multiDrawNineGrid: {
      srcLeft: 0,
      srcTop: 0,
      srcRight: 0,
      srcBottom: 0,
      bitmapId: 0,
      nDeltaEntries: 0,
      cbData: 0,
      rectangles: [],
    },
    lineTo: {
      backMode: 0,
      xStart: 0,
      yStart: 0,
      xEnd: 0,
      yEnd: 0,
      backColor: 0,
      rop2: 0,
      penStyle: 0,
      penWidth: 0,
      penColor: 0,
    },
    opaqueRect: { ...rect(), color: 0 },
    saveBitmap: {
      savedBitmapPosition: 0,
      leftRect: 0,
      topRect: 0,
      rightRect: 0,
      bottomRect: 0,
      operation: 0,
    },
    memBlt: { ...rect(), cacheId: 0, colorIndex: 0, rop: 0, xSrc: 0, ySrc: 0, cacheIndex: 0 },
    mem3Blt: {
      ...rect(),
      cacheId: 0,
      colorIndex: 0,
      rop: 0,
      xSrc: 0,
      ySrc: 0,
      cacheIndex: 0,
      backColor: 0,
      foreColor: 0,
      brush: createBrush(),
    },
    multiDstBlt: { ...rect(), rop: 0, numRectangles: 0, cbData: 0, rectangles: [] },
    multiPatBlt: {
      ...rect(),
      rop: 0,
      backColor: 0,
      foreColor: 0,
      brush: createBrush(),
      numRectangles: 0,
      cbData: 0,
      rectangles: [],
    },
    multiScrBlt: {
      ...rect(),
      rop: 0,
      xSrc: 0,
      ySrc: 0,
      numRectangles: 0,
      cbData: 0,
      rectangles: [],
    },
    multiOpaqueRect: { ...rect(), color: 0, numRectangles: 0, cbData: 0, rectangles: [] },
    fastIndex: {
      cacheId: 0,
      flAccel: 0,
      ulCharInc: 0,
      backColor: 0,
      foreColor: 0,
      ...glyphBoxes(),
      x: 0,
      y: 0,
      data: new Uint8Array(0),
    },
    polygonSC: {
      xStart: 0,
      yStart: 0,
      rop2: 0,
      fillMode: 0,
      brushColor: 0,
      numPoints: 0,
      cbData: 0,
      points: [],
    },
    polygonCB: {
      xStart: 0,
      yStart: 0,
      rop2: 0,
      backMode: 0,
      fillMode: 0,
      backColor: 0,
      foreColor: 0,
      brush: createBrush(),
      numPoints: 0,
      cbData: 0,
      points: [],
    },
    polyline: {
      xStart: 0,
      yStart: 0,
      rop2: 0,
      brushCacheEntry: 0,
      penColor: 0,
      numDeltaEntries: 0,
      cbData: 0,
      points: [],
    },
    fastGlyph: {
      cacheId: 0,
      flAccel: 0,
      ulCharInc: 0,
      backColor: 0,
      foreColor: 0,
      ...glyphBoxes(),
      x: 0,
      y: 0,
      data: new Uint8Array(0),
      glyph: createFastGlyphData(),
    },
    ellipseSC: {
      leftRect: 0,
      topRect: 0,
      rightRect: 0,
      bottomRect: 0,
      rop2: 0,
      fillMode: 0,
      color: 0,
    },
    ellipseCB: {
      leftRect: 0,
      topRect: 0,
      rightRect: 0,
      bottomRect: 0,
      rop2: 0,
      fillMode: 0,
      backColor: 0,
      foreColor: 0,
      brush: createBrush(),
    },
    glyphIndex: {
      cacheId: 0,
      flAccel: 0,
      ulCharInc: 0,
      fOpRedundant: 0,
      backColor: 0,
      foreColor: 0,
      ...glyphBoxes(),
      brush: createBrush(),
      x: 0,
      y: 0,
      data: new Uint8Array(0),
    },
  };
}
