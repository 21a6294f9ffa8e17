/**
 * Bodies of the secondary (cache) orders.
 *
 * Secondary order layout:
 * ```
 * controlFlags (1) | orderLength (2, signed) | extraFlags (2) | orderType (1) | body...
 * ```
 * The body spans `orderLength + 7` bytes from the end of the header. Readers here only
 * parse the body; framing and slack handling belong to the decoder.
 */

import { GlyphSupportLevel, OrderError, OrderErrorCodes } from '@orderwire/core';
import {
  CG_GLYPH_UNICODE_PRESENT,
  CacheBitmapV2Flags,
  NO_BITMAP_COMPRESSION_HDR,
} from './OrderFlags.js';
import {
  SecondaryOrderType,
  getBmfBpp,
  getBppBmf,
  getBppCbr2,
  getCbr2Bpp,
} from './OrderTypes.js';
import type { OrderReader, OrderWriter } from './OrderStream.js';
import {
  read2ByteSigned,
  read2ByteUnsigned,
  read4ByteUnsigned,
  readColorQuad,
  write2ByteSigned,
  write2ByteUnsigned,
  write4ByteUnsigned,
  writeColorQuad,
} from './PrimitiveCodec.js';
import {
  BITMAP_CACHE_WAITING_LIST_INDEX,
  BRUSH_DATA_SIZE,
  COLOR_TABLE_SIZE,
  glyphBitmapSize,
  type CacheBitmapOrder,
  type CacheBitmapV2Order,
  type CacheBitmapV3Order,
  type CacheBrushOrder,
  type CacheColorTableOrder,
  type CacheGlyphOrder,
  type CacheGlyphV2Order,
  type GlyphData,
  type SecondaryDrawingOrder,
} from './SecondaryOrders.js';

/**
 * Difference between the body size and the `orderLength` header field. The field is
 * defined as the order's total length minus 13, and the header takes 6 of those bytes.
 */
export const SECONDARY_ORDER_LENGTH_ADJUSTMENT = 7;

/** Size of the header preceding every secondary order body, control flags included. */
export const SECONDARY_ORDER_HEADER_SIZE = 6;

/** Size of the revision 1 compression header. */
const BITMAP_COMPRESSION_HEADER_SIZE = 8;

/**
 * Offset just past the body of a secondary order whose body starts at `start`.
 */
export function computeSecondaryOrderEnd(start: number, orderLength: number): number {
  return start + orderLength + SECONDARY_ORDER_LENGTH_ADJUSTMENT;
}

/**
 * Result of writing a secondary body: the header values the body implies.
 */
export interface SecondaryOrderHeader {
  orderType: number;
  extraFlags: number;
}

function readBpp(reader: OrderReader, what: string): number {
  const bpp = reader.readUInt8();
  if (bpp < 1 || bpp > 32) {
    throw new OrderError(OrderErrorCodes.InvalidEnumerant, `Invalid ${what} bpp ${bpp}`);
  }
  return bpp;
}

function checkBpp(bpp: number, what: string): void {
  if (!Number.isInteger(bpp) || bpp < 1 || bpp > 32) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `Invalid ${what} bpp ${bpp}`);
  }
}

function checkRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `${name} ${value} outside 0..${max}`);
  }
}

function requirePayloadLength(length: number, what: string): void {
  if (length <= 0) {
    throw new OrderError(OrderErrorCodes.LengthFraming, `${what} declares ${length} data bytes`);
  }
}

function cbr2Bpp(extraFlags: number): number {
  const code = (extraFlags & 0x0078) >> 3;
  const bpp = getCbr2Bpp(code);
  if (bpp === undefined) {
    throw new OrderError(OrderErrorCodes.InvalidEnumerant, `Invalid bits-per-pixel code ${code}`);
  }
  return bpp;
}

function cbr2Code(bpp: number): number {
  const code = getBppCbr2(bpp);
  if (code === undefined) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `No bits-per-pixel code for ${bpp} bpp`);
  }
  return code;
}

// ---------------------------------------------------------------------------
// Cache bitmap (revision 1)
// ---------------------------------------------------------------------------

export function readCacheBitmapOrder(
  reader: OrderReader,
  compressed: boolean,
  extraFlags: number
): CacheBitmapOrder {
  reader.ensure(9, 'cache bitmap header');
  const cacheId = reader.readUInt8();
  reader.skip(1);
  const bitmapWidth = reader.readUInt8();
  const bitmapHeight = reader.readUInt8();
  const bitmapBpp = readBpp(reader, 'cache bitmap');
  let bitmapLength = reader.readUInt16();
  const cacheIndex = reader.readUInt16();

  let bitmapComprHdr: Uint8Array | null = null;
  if (compressed && (extraFlags & NO_BITMAP_COMPRESSION_HDR) === 0) {
    bitmapComprHdr = reader.readBytes(BITMAP_COMPRESSION_HEADER_SIZE, 'compression header');
    bitmapLength -= BITMAP_COMPRESSION_HEADER_SIZE;
  }
  requirePayloadLength(bitmapLength, 'Cache bitmap');

  return {
    cacheId,
    bitmapWidth,
    bitmapHeight,
    bitmapBpp,
    bitmapLength,
    cacheIndex,
    compressed,
    bitmapComprHdr,
    bitmapDataStream: reader.readBytes(bitmapLength, 'bitmap data'),
  };
}

export function writeCacheBitmapOrder(
  writer: OrderWriter,
  order: CacheBitmapOrder
): SecondaryOrderHeader {
  checkBpp(order.bitmapBpp, 'cache bitmap');
  const header = order.compressed ? order.bitmapComprHdr : null;
  if (header !== null && header.length !== BITMAP_COMPRESSION_HEADER_SIZE) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Compression header must be ${BITMAP_COMPRESSION_HEADER_SIZE} bytes, got ${header.length}`
    );
  }
  const data = order.bitmapDataStream;
  requirePayloadLength(data.length, 'Cache bitmap');
  const wireLength = data.length + (header === null ? 0 : BITMAP_COMPRESSION_HEADER_SIZE);
  checkRange('Bitmap length', wireLength, 0xffff);
  checkRange('Bitmap width', order.bitmapWidth, 0xff);
  checkRange('Bitmap height', order.bitmapHeight, 0xff);
  checkRange('Cache id', order.cacheId, 0xff);
  checkRange('Cache index', order.cacheIndex, 0xffff);

  writer.writeUInt8(order.cacheId);
  writer.writeUInt8(0);
  writer.writeUInt8(order.bitmapWidth);
  writer.writeUInt8(order.bitmapHeight);
  writer.writeUInt8(order.bitmapBpp);
  writer.writeUInt16(wireLength);
  writer.writeUInt16(order.cacheIndex);
  if (header !== null) {
    writer.writeBytes(header);
  }
  writer.writeBytes(data);

  return {
    orderType: order.compressed
      ? SecondaryOrderType.CacheBitmapCompressed
      : SecondaryOrderType.BitmapUncompressed,
    extraFlags: order.compressed && header === null ? NO_BITMAP_COMPRESSION_HDR : 0,
  };
}

// ---------------------------------------------------------------------------
// Cache bitmap (revision 2)
// ---------------------------------------------------------------------------

export function readCacheBitmapV2Order(
  reader: OrderReader,
  compressed: boolean,
  extraFlags: number
): CacheBitmapV2Order {
  const cacheId = extraFlags & 0x0003;
  const flags = (extraFlags & 0xff80) >> 7;
  const bitmapBpp = cbr2Bpp(extraFlags);

  let key1 = 0;
  let key2 = 0;
  if (flags & CacheBitmapV2Flags.PersistentKeyPresent) {
    reader.ensure(8, 'persistent key');
    key1 = reader.readUInt32();
    key2 = reader.readUInt32();
  }

  const bitmapWidth = read2ByteUnsigned(reader);
  const bitmapHeight =
    flags & CacheBitmapV2Flags.HeightSameAsWidth ? bitmapWidth : read2ByteUnsigned(reader);
  let bitmapLength = read4ByteUnsigned(reader);
  let cacheIndex = read2ByteUnsigned(reader);
  if (flags & CacheBitmapV2Flags.DoNotCache) {
    cacheIndex = BITMAP_CACHE_WAITING_LIST_INDEX;
  }

  let cbCompFirstRowSize = 0;
  let cbCompMainBodySize = 0;
  let cbScanWidth = 0;
  let cbUncompressedSize = 0;
  if (compressed && (flags & CacheBitmapV2Flags.NoBitmapCompressionHeader) === 0) {
    reader.ensure(8, 'compression header');
    cbCompFirstRowSize = reader.readUInt16();
    cbCompMainBodySize = reader.readUInt16();
    cbScanWidth = reader.readUInt16();
    cbUncompressedSize = reader.readUInt16();
    bitmapLength = cbCompMainBodySize;
  }
  requirePayloadLength(bitmapLength, 'Cache bitmap v2');

  return {
    cacheId,
    flags,
    key1,
    key2,
    bitmapBpp,
    bitmapWidth,
    bitmapHeight,
    bitmapLength,
    cacheIndex,
    compressed,
    cbCompFirstRowSize,
    cbCompMainBodySize,
    cbScanWidth,
    cbUncompressedSize,
    bitmapDataStream: reader.readBytes(bitmapLength, 'bitmap data'),
  };
}

export function writeCacheBitmapV2Order(
  writer: OrderWriter,
  order: CacheBitmapV2Order
): SecondaryOrderHeader {
  checkRange('Cache id', order.cacheId, 0x03);
  checkRange('Cache bitmap v2 flags', order.flags, 0x1ff);
  const data = order.bitmapDataStream;
  requirePayloadLength(data.length, 'Cache bitmap v2');
  const withHeader =
    order.compressed && (order.flags & CacheBitmapV2Flags.NoBitmapCompressionHeader) === 0;
  if (withHeader && order.cbCompMainBodySize !== data.length) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `cbCompMainBodySize ${order.cbCompMainBodySize} does not match ${data.length} data bytes`
    );
  }
  if (
    (order.flags & CacheBitmapV2Flags.HeightSameAsWidth) !== 0 &&
    order.bitmapWidth !== order.bitmapHeight
  ) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Bitmap is ${order.bitmapWidth}x${order.bitmapHeight} but flagged as square`
    );
  }
  const extraFlags = order.cacheId | (cbr2Code(order.bitmapBpp) << 3) | (order.flags << 7);

  if (order.flags & CacheBitmapV2Flags.PersistentKeyPresent) {
    writer.writeUInt32(order.key1);
    writer.writeUInt32(order.key2);
  }
  write2ByteUnsigned(writer, order.bitmapWidth);
  if ((order.flags & CacheBitmapV2Flags.HeightSameAsWidth) === 0) {
    write2ByteUnsigned(writer, order.bitmapHeight);
  }
  write4ByteUnsigned(writer, withHeader ? data.length + 8 : data.length);
  write2ByteUnsigned(
    writer,
    order.flags & CacheBitmapV2Flags.DoNotCache ? BITMAP_CACHE_WAITING_LIST_INDEX : order.cacheIndex
  );
  if (withHeader) {
    writer.writeUInt16(order.cbCompFirstRowSize);
    writer.writeUInt16(order.cbCompMainBodySize);
    writer.writeUInt16(order.cbScanWidth);
    writer.writeUInt16(order.cbUncompressedSize);
  }
  writer.writeBytes(data);

  return {
    orderType: order.compressed
      ? SecondaryOrderType.BitmapCompressedV2
      : SecondaryOrderType.BitmapUncompressedV2,
    extraFlags,
  };
}

// ---------------------------------------------------------------------------
// Cache bitmap (revision 3)
// ---------------------------------------------------------------------------

export function readCacheBitmapV3Order(
  reader: OrderReader,
  extraFlags: number
): CacheBitmapV3Order {
  const cacheId = extraFlags & 0x0003;
  const flags = (extraFlags & 0xff80) >> 7;
  const bpp = cbr2Bpp(extraFlags);

  reader.ensure(21, 'cache bitmap v3 header');
  const cacheIndex = reader.readUInt16();
  const key1 = reader.readUInt32();
  const key2 = reader.readUInt32();
  const dataBpp = readBpp(reader, 'bitmap data');
  reader.skip(2);
  const codecId = reader.readUInt8();
  const width = reader.readUInt16();
  const height = reader.readUInt16();
  const length = reader.readUInt32();
  requirePayloadLength(length, 'Cache bitmap v3');

  return {
    cacheId,
    flags,
    bpp,
    cacheIndex,
    key1,
    key2,
    bitmapData: {
      bpp: dataBpp,
      codecId,
      width,
      height,
      length,
      data: reader.readBytes(length, 'bitmap data'),
    },
  };
}

export function writeCacheBitmapV3Order(
  writer: OrderWriter,
  order: CacheBitmapV3Order
): SecondaryOrderHeader {
  checkRange('Cache id', order.cacheId, 0x03);
  checkRange('Cache bitmap v3 flags', order.flags, 0x1ff);
  const bitmap = order.bitmapData;
  checkBpp(bitmap.bpp, 'bitmap data');
  requirePayloadLength(bitmap.data.length, 'Cache bitmap v3');
  const extraFlags = order.cacheId | (cbr2Code(order.bpp) << 3) | (order.flags << 7);

  writer.writeUInt16(order.cacheIndex);
  writer.writeUInt32(order.key1);
  writer.writeUInt32(order.key2);
  writer.writeUInt8(bitmap.bpp);
  writer.writeZero(2);
  writer.writeUInt8(bitmap.codecId);
  writer.writeUInt16(bitmap.width);
  writer.writeUInt16(bitmap.height);
  writer.writeUInt32(bitmap.data.length);
  writer.writeBytes(bitmap.data);

  return { orderType: SecondaryOrderType.BitmapCompressedV3, extraFlags };
}

// ---------------------------------------------------------------------------
// Cache color table
// ---------------------------------------------------------------------------

export function readCacheColorTableOrder(reader: OrderReader): CacheColorTableOrder {
  reader.ensure(3, 'color table header');
  const cacheIndex = reader.readUInt8();
  const numberColors = reader.readUInt16();
  if (numberColors !== COLOR_TABLE_SIZE) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Color table holds ${numberColors} colors, expected ${COLOR_TABLE_SIZE}`
    );
  }

  reader.ensure(numberColors * 4, 'color table');
  const colorTable: number[] = [];
  for (let i = 0; i < numberColors; i++) {
    colorTable.push(readColorQuad(reader));
  }
  return { cacheIndex, numberColors, colorTable };
}

export function writeCacheColorTableOrder(
  writer: OrderWriter,
  order: CacheColorTableOrder
): SecondaryOrderHeader {
  if (order.numberColors !== COLOR_TABLE_SIZE || order.colorTable.length !== COLOR_TABLE_SIZE) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Color table must hold ${COLOR_TABLE_SIZE} colors, got ${order.colorTable.length}`
    );
  }
  checkRange('Cache index', order.cacheIndex, 0xff);
  writer.writeUInt8(order.cacheIndex);
  writer.writeUInt16(order.numberColors);
  for (const color of order.colorTable) {
    writeColorQuad(writer, color);
  }
  return { orderType: SecondaryOrderType.CacheColorTable, extraFlags: 0 };
}

// ---------------------------------------------------------------------------
// Cache glyph (revisions 1 and 2)
// ---------------------------------------------------------------------------

const utf16Decoder = new TextDecoder('utf-16le');

function readGlyphBitmap(reader: OrderReader, glyph: Omit<GlyphData, 'cb' | 'aj'>): GlyphData {
  const cb = glyphBitmapSize(glyph.cx, glyph.cy);
  return { ...glyph, cb, aj: reader.readBytes(cb, 'glyph bitmap') };
}

function readUnicodeCharacters(
  reader: OrderReader,
  extraFlags: number,
  cGlyphs: number
): string | null {
  if ((extraFlags & CG_GLYPH_UNICODE_PRESENT) === 0 || cGlyphs === 0) {
    return null;
  }
  return utf16Decoder.decode(reader.readBytes(cGlyphs * 2, 'glyph characters'));
}

function writeUnicodeCharacters(
  writer: OrderWriter,
  characters: string | null,
  cGlyphs: number
): number {
  if (characters === null || cGlyphs === 0) {
    return 0;
  }
  if (characters.length !== cGlyphs) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Expected ${cGlyphs} glyph characters, got ${characters.length}`
    );
  }
  for (let i = 0; i < characters.length; i++) {
    writer.writeUInt16(characters.charCodeAt(i));
  }
  return CG_GLYPH_UNICODE_PRESENT;
}

function checkGlyphBitmap(glyph: GlyphData): void {
  const cb = glyphBitmapSize(glyph.cx, glyph.cy);
  if (glyph.aj.length !== cb) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Glyph ${glyph.cacheIndex} of ${glyph.cx}x${glyph.cy} needs ${cb} bitmap bytes, ` +
        `got ${glyph.aj.length}`
    );
  }
}

function checkGlyphCount(glyphData: readonly GlyphData[], cGlyphs: number): void {
  if (glyphData.length !== cGlyphs || cGlyphs > 0xff) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Glyph count ${cGlyphs} does not match ${glyphData.length} glyphs`
    );
  }
}

export function readCacheGlyphOrder(reader: OrderReader, extraFlags: number): CacheGlyphOrder {
  reader.ensure(2, 'cache glyph header');
  const cacheId = reader.readUInt8();
  const cGlyphs = reader.readUInt8();

  const glyphData: GlyphData[] = [];
  for (let i = 0; i < cGlyphs; i++) {
    reader.ensure(10, 'glyph header');
    glyphData.push(
      readGlyphBitmap(reader, {
        cacheIndex: reader.readUInt16(),
        x: reader.readInt16(),
        y: reader.readInt16(),
        cx: reader.readUInt16(),
        cy: reader.readUInt16(),
      })
    );
  }

  return {
    cacheId,
    cGlyphs,
    glyphData,
    unicodeCharacters: readUnicodeCharacters(reader, extraFlags, cGlyphs),
  };
}

export function writeCacheGlyphOrder(
  writer: OrderWriter,
  order: CacheGlyphOrder
): SecondaryOrderHeader {
  checkGlyphCount(order.glyphData, order.cGlyphs);
  checkRange('Cache id', order.cacheId, 0xff);
  writer.writeUInt8(order.cacheId);
  writer.writeUInt8(order.cGlyphs);
  for (const glyph of order.glyphData) {
    checkGlyphBitmap(glyph);
    writer.writeUInt16(glyph.cacheIndex);
    writer.writeInt16(glyph.x);
    writer.writeInt16(glyph.y);
    writer.writeUInt16(glyph.cx);
    writer.writeUInt16(glyph.cy);
    writer.writeBytes(glyph.aj);
  }
  const extraFlags = writeUnicodeCharacters(writer, order.unicodeCharacters, order.cGlyphs);
  return { orderType: SecondaryOrderType.CacheGlyph, extraFlags };
}

export function readCacheGlyphV2Order(
  reader: OrderReader,
  extraFlags: number
): CacheGlyphV2Order {
  const cacheId = extraFlags & 0x000f;
  const flags = (extraFlags & 0x00f0) >> 4;
  const cGlyphs = extraFlags >> 8;

  const glyphData: GlyphData[] = [];
  for (let i = 0; i < cGlyphs; i++) {
    glyphData.push(
      readGlyphBitmap(reader, {
        cacheIndex: reader.readUInt8(),
        x: read2ByteSigned(reader),
        y: read2ByteSigned(reader),
        cx: read2ByteUnsigned(reader),
        cy: read2ByteUnsigned(reader),
      })
    );
  }

  return {
    cacheId,
    flags,
    cGlyphs,
    glyphData,
    unicodeCharacters: readUnicodeCharacters(reader, extraFlags, cGlyphs),
  };
}

export function writeCacheGlyphV2Order(
  writer: OrderWriter,
  order: CacheGlyphV2Order
): SecondaryOrderHeader {
  checkGlyphCount(order.glyphData, order.cGlyphs);
  checkRange('Cache id', order.cacheId, 0x0f);
  checkRange('Cache glyph v2 flags', order.flags, 0x0f);
  for (const glyph of order.glyphData) {
    checkGlyphBitmap(glyph);
    checkRange('Glyph cache index', glyph.cacheIndex, 0xff);
    writer.writeUInt8(glyph.cacheIndex);
    write2ByteSigned(writer, glyph.x);
    write2ByteSigned(writer, glyph.y);
    write2ByteUnsigned(writer, glyph.cx);
    write2ByteUnsigned(writer, glyph.cy);
    writer.writeBytes(glyph.aj);
  }
  const unicode = writeUnicodeCharacters(writer, order.unicodeCharacters, order.cGlyphs);
  // The unicode bit is the low bit of the flags nibble.
  const flags = (order.flags & ~0x01) | (unicode >> 4);
  return {
    orderType: SecondaryOrderType.CacheGlyph,
    extraFlags: order.cacheId | (flags << 4) | (order.cGlyphs << 8),
  };
}

// ---------------------------------------------------------------------------
// Cache brush
// ---------------------------------------------------------------------------

/** Bytes of a compressed 8x8 colour brush: 2-bit indices followed by a 4-entry palette. */
function compressedBrushLength(bpp: number): number {
  return 16 + 4 * ((bpp + 1) >> 3);
}

function decompressBrush(reader: OrderReader, bpp: number, data: Uint8Array): void {
  const bytesPerPixel = (bpp + 1) >> 3;
  reader.ensure(compressedBrushLength(bpp), 'compressed brush');
  const indices = reader.readBytes(16, 'brush indices');
  const palette = reader.readBytes(4 * bytesPerPixel, 'brush palette');

  for (let y = 0; y < 8; y++) {
    for (let x = 0; x < 8; x++) {
      const index = ((indices[y * 2 + (x >> 2)] ?? 0) >> ((3 - (x % 4)) * 2)) & 0x03;
      const dst = (8 * (7 - y) + x) * bytesPerPixel;
      for (let k = 0; k < bytesPerPixel; k++) {
        data[dst + k] = palette[index * bytesPerPixel + k] ?? 0;
      }
    }
  }
}

function compressBrush(writer: OrderWriter, bpp: number, data: Uint8Array): boolean {
  const bytesPerPixel = (bpp + 1) >> 3;
  const palette: number[] = [];
  const indices = new Uint8Array(16);

  for (let y = 0; y < 8; y++) {
    for (let x = 0; x < 8; x++) {
      const src = (8 * (7 - y) + x) * bytesPerPixel;
      let pixel = 0;
      for (let k = 0; k < bytesPerPixel; k++) {
        pixel += (data[src + k] ?? 0) * 2 ** (8 * k);
      }
      let index = palette.indexOf(pixel);
      if (index < 0) {
        if (palette.length === 4) {
          return false;
        }
        index = palette.push(pixel) - 1;
      }
      const slot = y * 2 + (x >> 2);
      indices[slot] = (indices[slot] ?? 0) | (index << ((3 - (x % 4)) * 2));
    }
  }

  writer.writeBytes(indices);
  for (let i = 0; i < 4; i++) {
    const pixel = palette[i] ?? 0;
    for (let k = 0; k < bytesPerPixel; k++) {
      writer.writeUInt8(Math.floor(pixel / 2 ** (8 * k)) & 0xff);
    }
  }
  return true;
}

export function readCacheBrushOrder(reader: OrderReader): CacheBrushOrder {
  reader.ensure(6, 'cache brush header');
  const index = reader.readUInt8();
  const bitmapFormat = reader.readUInt8();
  const bpp = getBmfBpp(bitmapFormat);
  if (bpp === undefined) {
    throw new OrderError(
      OrderErrorCodes.InvalidEnumerant,
      `Invalid brush bitmap format 0x${bitmapFormat.toString(16)}`
    );
  }
  const cx = reader.readUInt8();
  const cy = reader.readUInt8();
  const style = reader.readUInt8();
  const length = reader.readUInt8();
  const data = new Uint8Array(BRUSH_DATA_SIZE);

  if (cx === 8 && cy === 8) {
    if (bpp === 1) {
      if (length !== 8) {
        throw new OrderError(
          OrderErrorCodes.LengthFraming,
          `Monochrome brush declares ${length} bytes, expected 8`
        );
      }
      reader.ensure(8, 'brush pattern');
      for (let row = 7; row >= 0; row--) {
        data[row] = reader.readUInt8();
      }
    } else if (length === compressedBrushLength(bpp)) {
      decompressBrush(reader, bpp, data);
    } else {
      const scanline = (bpp / 8) * 8;
      reader.ensure(scanline * 8, 'brush pattern');
      for (let row = 7; row >= 0; row--) {
        data.set(reader.readBytes(scanline), row * scanline);
      }
    }
  }

  return { index, bpp, cx, cy, style, length, data };
}

/**
 * Writes a cache brush body. Colour brushes with at most four distinct pixels are sent
 * compressed; others are sent raw, which does not fit the one-byte length at 32 bpp.
 */
export function writeCacheBrushOrder(
  writer: OrderWriter,
  order: CacheBrushOrder
): SecondaryOrderHeader {
  const bitmapFormat = getBppBmf(order.bpp);
  if (bitmapFormat === undefined) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `No brush bitmap format for ${order.bpp} bpp`
    );
  }
  checkRange('Brush index', order.index, 0xff);
  checkRange('Brush width', order.cx, 0xff);
  checkRange('Brush height', order.cy, 0xff);
  checkRange('Brush style', order.style, 0xff);

  writer.writeUInt8(order.index);
  writer.writeUInt8(bitmapFormat);
  writer.writeUInt8(order.cx);
  writer.writeUInt8(order.cy);
  writer.writeUInt8(order.style);
  const lengthAt = writer.length;

  if (order.cx !== 8 || order.cy !== 8) {
    checkRange('Brush length', order.length, 0xff);
    writer.writeUInt8(order.length);
  } else if (order.bpp === 1) {
    writer.writeUInt8(8);
    for (let row = 7; row >= 0; row--) {
      writer.writeUInt8(order.data[row] ?? 0);
    }
  } else {
    writer.writeUInt8(compressedBrushLength(order.bpp));
    if (!compressBrush(writer, order.bpp, order.data)) {
      const scanline = (order.bpp / 8) * 8;
      checkRange('Brush length', scanline * 8, 0xff);
      writer.setUInt8At(lengthAt, scanline * 8);
      for (let row = 7; row >= 0; row--) {
        writer.writeBytes(order.data.subarray(row * scanline, (row + 1) * scanline));
      }
    }
  }

  return { orderType: SecondaryOrderType.CacheBrush, extraFlags: 0 };
}

// ---------------------------------------------------------------------------
// Dispatch by order type
// ---------------------------------------------------------------------------

/**
 * Reads the body of a secondary order. Cache glyph orders use revision 2 when the
 * negotiated glyph support level is Encode, revision 1 otherwise.
 */
export function readSecondaryOrder(
  reader: OrderReader,
  orderType: number,
  extraFlags: number,
  glyphSupportLevel: GlyphSupportLevel
): SecondaryDrawingOrder {
  switch (orderType) {
    case SecondaryOrderType.BitmapUncompressed:
    case SecondaryOrderType.CacheBitmapCompressed:
      return {
        kind: 'cacheBitmap',
        order: readCacheBitmapOrder(
          reader,
          orderType === SecondaryOrderType.CacheBitmapCompressed,
          extraFlags
        ),
      };
    case SecondaryOrderType.BitmapUncompressedV2:
    case SecondaryOrderType.BitmapCompressedV2:
      return {
        kind: 'cacheBitmapV2',
        order: readCacheBitmapV2Order(
          reader,
          orderType === SecondaryOrderType.BitmapCompressedV2,
          extraFlags
        ),
      };
    case SecondaryOrderType.BitmapCompressedV3:
      return { kind: 'cacheBitmapV3', order: readCacheBitmapV3Order(reader, extraFlags) };
    case SecondaryOrderType.CacheColorTable:
      return { kind: 'cacheColorTable', order: readCacheColorTableOrder(reader) };
    case SecondaryOrderType.CacheGlyph:
      if (glyphSupportLevel === GlyphSupportLevel.Encode) {
        return { kind: 'cacheGlyphV2', order: readCacheGlyphV2Order(reader, extraFlags) };
      }
      return { kind: 'cacheGlyph', order: readCacheGlyphOrder(reader, extraFlags) };
    case SecondaryOrderType.CacheBrush:
      return { kind: 'cacheBrush', order: readCacheBrushOrder(reader) };
    default:
      throw new OrderError(
        OrderErrorCodes.InvalidEnumerant,
        `Unknown secondary order type 0x${orderType.toString(16)}`
      );
  }
}

/**
 * Writes the body of a secondary order and returns the header values it implies.
 */
export function writeSecondaryOrder(
  writer: OrderWriter,
  order: SecondaryDrawingOrder
): SecondaryOrderHeader {
  switch (order.kind) {
    case 'cacheBitmap':
      return writeCacheBitmapOrder(writer, order.order);
    case 'cacheBitmapV2':
      return writeCacheBitmapV2Order(writer, order.order);
    case 'cacheBitmapV3':
      return writeCacheBitmapV3Order(writer, order.order);
    case 'cacheColorTable':
      return writeCacheColorTableOrder(writer, order.order);
    case 'cacheGlyph':
      return writeCacheGlyphOrder(writer, order.order);
    case 'cacheGlyphV2':
      return writeCacheGlyphV2Order(writer, order.order);
    case 'cacheBrush':
      return writeCacheBrushOrder(writer, order.order);
  }
}
