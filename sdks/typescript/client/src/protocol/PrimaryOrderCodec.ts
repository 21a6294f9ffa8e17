/**
 * Field layouts of the primary drawing orders.
 *
 * Decoding reads fields 1..N in order, each gated by its presence bit, and merges them
 * into the persisted order state. Encoding always writes every field and reports the
 * resulting field flags, so encoded orders never depend on earlier state.
 */

import {
  OrderError,
  OrderErrorCodes,
  OrderSupportIndex,
  type OrderSupportIndexType,
} from '@orderwire/core';
import { readBrush, writeBrush, type Brush } from './BrushCodec.js';
import { fieldPresent, type OrderInfo } from './FieldFlags.js';
import { BackMode, PrimaryOrderType, type PrimaryOrderTypeValue } from './OrderTypes.js';
import { OrderReader, OrderWriter } from './OrderStream.js';
import {
  GLYPH_FRAGMENT_CAPACITY,
  type FastGlyphData,
  type PrimaryOrderKind,
  type PrimaryOrderStates,
} from './PrimaryOrders.js';
import {
  read2ByteSigned,
  read2ByteUnsigned,
  readColor,
  readCoord,
  readDeltaPoints,
  readDeltaRects,
  write2ByteSigned,
  write2ByteUnsigned,
  writeColor,
  writeCoord,
  writeDeltaPoints,
  writeDeltaRects,
  type DeltaPoint,
  type DeltaRect,
} from './PrimitiveCodec.js';

/**
 * Reads presence-gated fields of one order. Each accessor returns the new value when the
 * field is present and `previous` otherwise.
 */
export class FieldReader {
  constructor(
    readonly reader: OrderReader,
    readonly info: OrderInfo
  ) {}

  has(field: number): boolean {
    return fieldPresent(this.info.fieldFlags, field);
  }

  coord(field: number, previous: number): number {
    if (!this.has(field)) {
      return previous;
    }
    return readCoord(this.reader, previous, this.info.deltaCoordinates);
  }

  byte(field: number, previous: number): number {
    return this.has(field) ? this.reader.readUInt8() : previous;
  }

  uint16(field: number, previous: number): number {
    return this.has(field) ? this.reader.readUInt16() : previous;
  }

  int16(field: number, previous: number): number {
    return this.has(field) ? this.reader.readInt16() : previous;
  }

  uint32(field: number, previous: number): number {
    return this.has(field) ? this.reader.readUInt32() : previous;
  }

  color(field: number, previous: number): number {
    return this.has(field) ? readColor(this.reader) : previous;
  }
}

function checkRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `${name} ${value} outside ${min}..${max}`);
  }
}

/**
 * Writes fields and accumulates the field flags announcing them.
 */
export class FieldWriter {
  fieldFlags = 0;

  constructor(readonly writer: OrderWriter) {}

  mark(field: number): void {
    this.fieldFlags = (this.fieldFlags | (1 << (field - 1))) >>> 0;
  }

  coord(field: number, value: number): void {
    writeCoord(this.writer, value);
    this.mark(field);
  }

  byte(field: number, value: number): void {
    checkRange(`Field ${field}`, value, 0, 0xff);
    this.writer.writeUInt8(value);
    this.mark(field);
  }

  uint16(field: number, value: number): void {
    checkRange(`Field ${field}`, value, 0, 0xffff);
    this.writer.writeUInt16(value);
    this.mark(field);
  }

  int16(field: number, value: number): void {
    checkRange(`Field ${field}`, value, -0x8000, 0x7fff);
    this.writer.writeInt16(value);
    this.mark(field);
  }

  uint32(field: number, value: number): void {
    checkRange(`Field ${field}`, value, 0, 0xffffffff);
    this.writer.writeUInt32(value);
    this.mark(field);
  }

  color(field: number, value: number): void {
    writeColor(this.writer, value);
    this.mark(field);
  }

  brush(fieldOffset: number, brush: Brush): void {
    this.fieldFlags = (this.fieldFlags | writeBrush(this.writer, brush, fieldOffset)) >>> 0;
  }
}

export interface PrimaryOrderCodec<T> {
  readonly orderType: PrimaryOrderTypeValue;
  /** Order-support slots; announcing any one of them permits the order. */
  readonly supportIndexes: readonly OrderSupportIndexType[];
  read(fields: FieldReader, order: T): void;
  write(fields: FieldWriter, order: T): void;
}

interface RectangleList {
  cbData: number;
  rectangles: DeltaRect[];
}

interface PointList {
  cbData: number;
  points: DeltaPoint[];
}

/**
 * Reads the delta rectangle field of a multi-rectangle order and returns the new count.
 * Without the field the persisted rectangles are kept, trimmed to `count`.
 */
function readRectangleField(
  fields: FieldReader,
  dataField: number,
  count: number,
  current: number,
  list: RectangleList
): number {
  if (fields.has(dataField)) {
    const cbData = fields.reader.readUInt16();
    const rectangles = readDeltaRects(fields.reader, count);
    list.cbData = cbData;
    list.rectangles = rectangles;
    return count;
  }
  if (count > current) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Rectangle count ${count} exceeds the ${current} rectangles held`
    );
  }
  list.rectangles = list.rectangles.slice(0, count);
  return count;
}

function writeRectangleField(
  fields: FieldWriter,
  countField: number,
  count: number,
  rectangles: readonly DeltaRect[]
): void {
  if (count !== rectangles.length) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Rectangle count ${count} does not match ${rectangles.length} rectangles`
    );
  }
  fields.byte(countField, count);
  const writer = fields.writer;
  const sizeAt = writer.length;
  writer.writeUInt16(0);
  writeDeltaRects(writer, rectangles);
  writer.setUInt16At(sizeAt, writer.length - sizeAt - 2);
  fields.mark(countField + 1);
}

/**
 * Reads the delta point field of a polygon or polyline order and returns the new count.
 */
function readPointField(
  fields: FieldReader,
  dataField: number,
  count: number,
  current: number,
  list: PointList
): number {
  if (fields.has(dataField)) {
    if (count === 0) {
      throw new OrderError(
        OrderErrorCodes.BoundViolation,
        'Point data sent with a point count of 0'
      );
    }
    const cbData = fields.reader.readUInt8();
    const points = readDeltaPoints(fields.reader, count);
    list.cbData = cbData;
    list.points = points;
    return count;
  }
  if (count > current) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Point count ${count} exceeds the ${current} points held`
    );
  }
  list.points = list.points.slice(0, count);
  return count;
}

/**
 * Writes a point count and, unless it is zero, the point data.
 */
function writePointField(
  fields: FieldWriter,
  countField: number,
  count: number,
  points: readonly DeltaPoint[]
): void {
  if (count !== points.length) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Point count ${count} does not match ${points.length} points`
    );
  }
  fields.byte(countField, count);
  if (count === 0) {
    return;
  }
  const block = new OrderWriter();
  writeDeltaPoints(block, points);
  checkRange('Point data size', block.length, 0, 0xff);
  fields.writer.writeUInt8(block.length);
  fields.writer.writeBytes(block.toUint8Array());
  fields.mark(countField + 1);
}

function readFragmentField(fields: FieldReader, field: number, previous: Uint8Array): Uint8Array {
  if (!fields.has(field)) {
    return previous;
  }
  const cbData = fields.reader.readUInt8();
  if (cbData > GLYPH_FRAGMENT_CAPACITY) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Glyph fragment of ${cbData} bytes exceeds ${GLYPH_FRAGMENT_CAPACITY}`
    );
  }
  return fields.reader.readBytes(cbData, 'glyph fragments');
}

function writeFragmentField(fields: FieldWriter, field: number, data: Uint8Array): void {
  checkRange('Glyph fragment size', data.length, 0, 0xff);
  fields.writer.writeUInt8(data.length);
  fields.writer.writeBytes(data);
  fields.mark(field);
}

/**
 * Parses the inline glyph sub-stream of a FastGlyph order into `glyph`.
 */
function readFastGlyphData(data: Uint8Array, glyph: FastGlyphData): void {
  const sub = new OrderReader(data);
  glyph.cacheIndex = sub.readUInt8();
  if (data.length <= 1) {
    return;
  }
  glyph.x = read2ByteSigned(sub);
  glyph.y = read2ByteSigned(sub);
  glyph.cx = read2ByteUnsigned(sub);
  glyph.cy = read2ByteUnsigned(sub);
  if (glyph.cx === 0 || glyph.cy === 0) {
    throw new OrderError(
      OrderErrorCodes.InvalidEnumerant,
      `Fast glyph size ${glyph.cx}x${glyph.cy} must not be zero`
    );
  }
  glyph.aj = sub.readBytes(sub.remaining, 'glyph bits');
}

function writeFastGlyphData(glyph: FastGlyphData): Uint8Array {
  const sub = new OrderWriter();
  checkRange('Fast glyph cache index', glyph.cacheIndex, 0, 0xff);
  sub.writeUInt8(glyph.cacheIndex);
  if (glyph.cx !== 0 || glyph.cy !== 0) {
    checkRange('Fast glyph width', glyph.cx, 1, 0x7fff);
    checkRange('Fast glyph height', glyph.cy, 1, 0x7fff);
    write2ByteSigned(sub, glyph.x);
    write2ByteSigned(sub, glyph.y);
    write2ByteUnsigned(sub, glyph.cx);
    write2ByteUnsigned(sub, glyph.cy);
    sub.writeBytes(glyph.aj);
  }
  return sub.toUint8Array();
}

type PrimaryOrderCodecTable = {
  [K in PrimaryOrderKind]: PrimaryOrderCodec<PrimaryOrderStates[K]>;
};

export const PRIMARY_ORDER_CODECS: PrimaryOrderCodecTable = {
  dstBlt: {
    orderType: PrimaryOrderType.DstBlt,
    supportIndexes: [OrderSupportIndex.DstBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
    },
  },

  patBlt: {
    orderType: PrimaryOrderType.PatBlt,
    supportIndexes: [OrderSupportIndex.PatBlt, OrderSupportIndex.OpaqueRect],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
      o.backColor = f.color(6, o.backColor);
      o.foreColor = f.color(7, o.foreColor);
      readBrush(f.reader, f.info.fieldFlags, 7, o.brush);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
      f.color(6, o.backColor);
      f.color(7, o.foreColor);
      f.brush(7, o.brush);
    },
  },

  scrBlt: {
    orderType: PrimaryOrderType.ScrBlt,
    supportIndexes: [OrderSupportIndex.ScrBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
      o.xSrc = f.coord(6, o.xSrc);
      o.ySrc = f.coord(7, o.ySrc);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
      f.coord(6, o.xSrc);
      f.coord(7, o.ySrc);
    },
  },

  drawNineGrid: {
    orderType: PrimaryOrderType.DrawNineGrid,
    supportIndexes: [OrderSupportIndex.DrawNineGrid],
    read(f, o) {
      o.srcLeft = f.coord(1, o.srcLeft);
      o.srcTop = f.coord(2, o.srcTop);
      o.srcRight = f.coord(3, o.srcRight);
      o.srcBottom = f.coord(4, o.srcBottom);
      o.bitmapId = f.uint16(5, o.bitmapId);
    },
    write(f, o) {
      f.coord(1, o.srcLeft);
      f.coord(2, o.srcTop);
      f.coord(3, o.srcRight);
      f.coord(4, o.srcBottom);
      f.uint16(5, o.bitmapId);
    },
  },

  multiDrawNineGrid: {
    orderType: PrimaryOrderType.MultiDrawNineGrid,
    supportIndexes: [OrderSupportIndex.MultiDrawNineGrid],
    read(f, o) {
      o.srcLeft = f.coord(1, o.srcLeft);
      o.srcTop = f.coord(2, o.srcTop);
      o.srcRight = f.coord(3, o.srcRight);
      o.srcBottom = f.coord(4, o.srcBottom);
      o.bitmapId = f.uint16(5, o.bitmapId);
      const count = f.byte(6, o.nDeltaEntries);
      o.nDeltaEntries = readRectangleField(f, 7, count, o.nDeltaEntries, o);
    },
    write(f, o) {
      f.coord(1, o.srcLeft);
      f.coord(2, o.srcTop);
      f.coord(3, o.srcRight);
      f.coord(4, o.srcBottom);
      f.uint16(5, o.bitmapId);
      writeRectangleField(f, 6, o.nDeltaEntries, o.rectangles);
    },
  },

  lineTo: {
    orderType: PrimaryOrderType.LineTo,
    supportIndexes: [OrderSupportIndex.LineTo],
    read(f, o) {
      o.backMode = f.uint16(1, o.backMode);
      o.xStart = f.coord(2, o.xStart);
      o.yStart = f.coord(3, o.yStart);
      o.xEnd = f.coord(4, o.xEnd);
      o.yEnd = f.coord(5, o.yEnd);
      o.backColor = f.color(6, o.backColor);
      o.rop2 = f.byte(7, o.rop2);
      o.penStyle = f.byte(8, o.penStyle);
      o.penWidth = f.byte(9, o.penWidth);
      o.penColor = f.color(10, o.penColor);
    },
    write(f, o) {
      f.uint16(1, o.backMode);
      f.coord(2, o.xStart);
      f.coord(3, o.yStart);
      f.coord(4, o.xEnd);
      f.coord(5, o.yEnd);
      f.color(6, o.backColor);
      f.byte(7, o.rop2);
      f.byte(8, o.penStyle);
      f.byte(9, o.penWidth);
      f.color(10, o.penColor);
    },
  },

  opaqueRect: {
    orderType: PrimaryOrderType.OpaqueRect,
    supportIndexes: [OrderSupportIndex.OpaqueRect, OrderSupportIndex.PatBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      // one field per channel, so a single channel can change on its own
      const red = f.byte(5, o.color & 0xff);
      const green = f.byte(6, (o.color >> 8) & 0xff);
      const blue = f.byte(7, (o.color >> 16) & 0xff);
      o.color = red | (green << 8) | (blue << 16);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.color & 0xff);
      f.byte(6, (o.color >> 8) & 0xff);
      f.byte(7, (o.color >> 16) & 0xff);
    },
  },

  saveBitmap: {
    orderType: PrimaryOrderType.SaveBitmap,
    supportIndexes: [OrderSupportIndex.SaveBitmap],
    read(f, o) {
      o.savedBitmapPosition = f.uint32(1, o.savedBitmapPosition);
      o.leftRect = f.coord(2, o.leftRect);
      o.topRect = f.coord(3, o.topRect);
      o.rightRect = f.coord(4, o.rightRect);
      o.bottomRect = f.coord(5, o.bottomRect);
      o.operation = f.byte(6, o.operation);
    },
    write(f, o) {
      f.uint32(1, o.savedBitmapPosition);
      f.coord(2, o.leftRect);
      f.coord(3, o.topRect);
      f.coord(4, o.rightRect);
      f.coord(5, o.bottomRect);
      f.byte(6, o.operation);
    },
  },

  memBlt: {
    orderType: PrimaryOrderType.MemBlt,
    supportIndexes: [OrderSupportIndex.MemBlt],
    read(f, o) {
      if (f.has(1)) {
        const cacheId = f.reader.readUInt16();
        o.cacheId = cacheId & 0xff;
        o.colorIndex = cacheId >> 8;
      }
      o.leftRect = f.coord(2, o.leftRect);
      o.topRect = f.coord(3, o.topRect);
      o.width = f.coord(4, o.width);
      o.height = f.coord(5, o.height);
      o.rop = f.byte(6, o.rop);
      o.xSrc = f.coord(7, o.xSrc);
      o.ySrc = f.coord(8, o.ySrc);
      o.cacheIndex = f.uint16(9, o.cacheIndex);
    },
    write(f, o) {
      checkRange('Cache id', o.cacheId, 0, 0xff);
      checkRange('Color index', o.colorIndex, 0, 0xff);
      f.uint16(1, (o.colorIndex << 8) | o.cacheId);
      f.coord(2, o.leftRect);
      f.coord(3, o.topRect);
      f.coord(4, o.width);
      f.coord(5, o.height);
      f.byte(6, o.rop);
      f.coord(7, o.xSrc);
      f.coord(8, o.ySrc);
      f.uint16(9, o.cacheIndex);
    },
  },

  mem3Blt: {
    orderType: PrimaryOrderType.Mem3Blt,
    supportIndexes: [OrderSupportIndex.Mem3Blt],
    read(f, o) {
      if (f.has(1)) {
        const cacheId = f.reader.readUInt16();
        o.cacheId = cacheId & 0xff;
        o.colorIndex = cacheId >> 8;
      }
      o.leftRect = f.coord(2, o.leftRect);
      o.topRect = f.coord(3, o.topRect);
      o.width = f.coord(4, o.width);
      o.height = f.coord(5, o.height);
      o.rop = f.byte(6, o.rop);
      o.xSrc = f.coord(7, o.xSrc);
      o.ySrc = f.coord(8, o.ySrc);
      o.backColor = f.color(9, o.backColor);
      o.foreColor = f.color(10, o.foreColor);
      readBrush(f.reader, f.info.fieldFlags, 10, o.brush);
      o.cacheIndex = f.uint16(16, o.cacheIndex);
    },
    write(f, o) {
      checkRange('Cache id', o.cacheId, 0, 0xff);
      checkRange('Color index', o.colorIndex, 0, 0xff);
      f.uint16(1, (o.colorIndex << 8) | o.cacheId);
      f.coord(2, o.leftRect);
      f.coord(3, o.topRect);
      f.coord(4, o.width);
      f.coord(5, o.height);
      f.byte(6, o.rop);
      f.coord(7, o.xSrc);
      f.coord(8, o.ySrc);
      f.color(9, o.backColor);
      f.color(10, o.foreColor);
      f.brush(10, o.brush);
      f.uint16(16, o.cacheIndex);
    },
  },

  multiDstBlt: {
    orderType: PrimaryOrderType.MultiDstBlt,
    supportIndexes: [OrderSupportIndex.MultiDstBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
      const count = f.byte(6, o.numRectangles);
      o.numRectangles = readRectangleField(f, 7, count, o.numRectangles, o);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
      writeRectangleField(f, 6, o.numRectangles, o.rectangles);
    },
  },

  multiPatBlt: {
    orderType: PrimaryOrderType.MultiPatBlt,
    supportIndexes: [OrderSupportIndex.MultiPatBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
      o.backColor = f.color(6, o.backColor);
      o.foreColor = f.color(7, o.foreColor);
      readBrush(f.reader, f.info.fieldFlags, 7, o.brush);
      const count = f.byte(13, o.numRectangles);
      o.numRectangles = readRectangleField(f, 14, count, o.numRectangles, o);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
      f.color(6, o.backColor);
      f.color(7, o.foreColor);
      f.brush(7, o.brush);
      writeRectangleField(f, 13, o.numRectangles, o.rectangles);
    },
  },

  multiScrBlt: {
    orderType: PrimaryOrderType.MultiScrBlt,
    supportIndexes: [OrderSupportIndex.MultiScrBlt],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      o.rop = f.byte(5, o.rop);
      o.xSrc = f.coord(6, o.xSrc);
      o.ySrc = f.coord(7, o.ySrc);
      const count = f.byte(8, o.numRectangles);
      o.numRectangles = readRectangleField(f, 9, count, o.numRectangles, o);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.rop);
      f.coord(6, o.xSrc);
      f.coord(7, o.ySrc);
      writeRectangleField(f, 8, o.numRectangles, o.rectangles);
    },
  },

  multiOpaqueRect: {
    orderType: PrimaryOrderType.MultiOpaqueRect,
    supportIndexes: [OrderSupportIndex.MultiOpaqueRect],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.width = f.coord(3, o.width);
      o.height = f.coord(4, o.height);
      const red = f.byte(5, o.color & 0xff);
      const green = f.byte(6, (o.color >> 8) & 0xff);
      const blue = f.byte(7, (o.color >> 16) & 0xff);
      o.color = red | (green << 8) | (blue << 16);
      const count = f.byte(8, o.numRectangles);
      o.numRectangles = readRectangleField(f, 9, count, o.numRectangles, o);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.width);
      f.coord(4, o.height);
      f.byte(5, o.color & 0xff);
      f.byte(6, (o.color >> 8) & 0xff);
      f.byte(7, (o.color >> 16) & 0xff);
      writeRectangleField(f, 8, o.numRectangles, o.rectangles);
    },
  },

  fastIndex: {
    orderType: PrimaryOrderType.FastIndex,
    supportIndexes: [OrderSupportIndex.FastIndex],
    read(f, o) {
      o.cacheId = f.byte(1, o.cacheId);
      if (f.has(2)) {
        o.ulCharInc = f.reader.readUInt8();
        o.flAccel = f.reader.readUInt8();
      }
      o.backColor = f.color(3, o.backColor);
      o.foreColor = f.color(4, o.foreColor);
      o.bkLeft = f.coord(5, o.bkLeft);
      o.bkTop = f.coord(6, o.bkTop);
      o.bkRight = f.coord(7, o.bkRight);
      o.bkBottom = f.coord(8, o.bkBottom);
      o.opLeft = f.coord(9, o.opLeft);
      o.opTop = f.coord(10, o.opTop);
      o.opRight = f.coord(11, o.opRight);
      o.opBottom = f.coord(12, o.opBottom);
      o.x = f.coord(13, o.x);
      o.y = f.coord(14, o.y);
      o.data = readFragmentField(f, 15, o.data);
    },
    write(f, o) {
      f.byte(1, o.cacheId);
      checkRange('ulCharInc', o.ulCharInc, 0, 0xff);
      checkRange('flAccel', o.flAccel, 0, 0xff);
      f.writer.writeUInt8(o.ulCharInc);
      f.writer.writeUInt8(o.flAccel);
      f.mark(2);
      f.color(3, o.backColor);
      f.color(4, o.foreColor);
      f.coord(5, o.bkLeft);
      f.coord(6, o.bkTop);
      f.coord(7, o.bkRight);
      f.coord(8, o.bkBottom);
      f.coord(9, o.opLeft);
      f.coord(10, o.opTop);
      f.coord(11, o.opRight);
      f.coord(12, o.opBottom);
      f.coord(13, o.x);
      f.coord(14, o.y);
      writeFragmentField(f, 15, o.data);
    },
  },

  polygonSC: {
    orderType: PrimaryOrderType.PolygonSC,
    supportIndexes: [OrderSupportIndex.PolygonSC],
    read(f, o) {
      o.xStart = f.coord(1, o.xStart);
      o.yStart = f.coord(2, o.yStart);
      o.rop2 = f.byte(3, o.rop2);
      o.fillMode = f.byte(4, o.fillMode);
      o.brushColor = f.color(5, o.brushColor);
      const count = f.byte(6, o.numPoints);
      o.numPoints = readPointField(f, 7, count, o.numPoints, o);
    },
    write(f, o) {
      f.coord(1, o.xStart);
      f.coord(2, o.yStart);
      f.byte(3, o.rop2);
      f.byte(4, o.fillMode);
      f.color(5, o.brushColor);
      writePointField(f, 6, o.numPoints, o.points);
    },
  },

  polygonCB: {
    orderType: PrimaryOrderType.PolygonCB,
    supportIndexes: [OrderSupportIndex.PolygonCB],
    read(f, o) {
      o.xStart = f.coord(1, o.xStart);
      o.yStart = f.coord(2, o.yStart);
      if (f.has(3)) {
        const rop2 = f.reader.readUInt8();
        o.backMode = rop2 & 0x80 ? BackMode.Transparent : BackMode.Opaque;
        o.rop2 = rop2 & 0x1f;
      }
      o.fillMode = f.byte(4, o.fillMode);
      o.backColor = f.color(5, o.backColor);
      o.foreColor = f.color(6, o.foreColor);
      readBrush(f.reader, f.info.fieldFlags, 6, o.brush);
      const count = f.byte(12, o.numPoints);
      o.numPoints = readPointField(f, 13, count, o.numPoints, o);
    },
    write(f, o) {
      f.coord(1, o.xStart);
      f.coord(2, o.yStart);
      checkRange('rop2', o.rop2, 0, 0x1f);
      f.byte(3, o.rop2 | (o.backMode === BackMode.Transparent ? 0x80 : 0));
      f.byte(4, o.fillMode);
      f.color(5, o.backColor);
      f.color(6, o.foreColor);
      f.brush(6, o.brush);
      writePointField(f, 12, o.numPoints, o.points);
    },
  },

  polyline: {
    orderType: PrimaryOrderType.Polyline,
    supportIndexes: [OrderSupportIndex.Polyline],
    read(f, o) {
      o.xStart = f.coord(1, o.xStart);
      o.yStart = f.coord(2, o.yStart);
      o.rop2 = f.byte(3, o.rop2);
      o.brushCacheEntry = f.uint16(4, o.brushCacheEntry);
      o.penColor = f.color(5, o.penColor);
      const count = f.byte(6, o.numDeltaEntries);
      o.numDeltaEntries = readPointField(f, 7, count, o.numDeltaEntries, o);
    },
    write(f, o) {
      f.coord(1, o.xStart);
      f.coord(2, o.yStart);
      f.byte(3, o.rop2);
      f.uint16(4, o.brushCacheEntry);
      f.color(5, o.penColor);
      writePointField(f, 6, o.numDeltaEntries, o.points);
    },
  },

  fastGlyph: {
    orderType: PrimaryOrderType.FastGlyph,
    supportIndexes: [OrderSupportIndex.FastGlyph],
    read(f, o) {
      o.cacheId = f.byte(1, o.cacheId);
      if (o.cacheId > 9) {
        throw new OrderError(
          OrderErrorCodes.InvalidEnumerant,
          `Fast glyph cache id ${o.cacheId} exceeds 9`
        );
      }
      if (f.has(2)) {
        o.ulCharInc = f.reader.readUInt8();
        o.flAccel = f.reader.readUInt8();
      }
      o.backColor = f.color(3, o.backColor);
      o.foreColor = f.color(4, o.foreColor);
      o.bkLeft = f.coord(5, o.bkLeft);
      o.bkTop = f.coord(6, o.bkTop);
      o.bkRight = f.coord(7, o.bkRight);
      o.bkBottom = f.coord(8, o.bkBottom);
      o.opLeft = f.coord(9, o.opLeft);
      o.opTop = f.coord(10, o.opTop);
      o.opRight = f.coord(11, o.opRight);
      o.opBottom = f.coord(12, o.opBottom);
      o.x = f.coord(13, o.x);
      o.y = f.coord(14, o.y);
      if (f.has(15)) {
        const cbData = f.reader.readUInt8();
        if (cbData === 0) {
          throw new OrderError(OrderErrorCodes.BoundViolation, 'Fast glyph data is empty');
        }
        o.data = f.reader.readBytes(cbData, 'fast glyph data');
        readFastGlyphData(o.data, o.glyph);
      }
    },
    write(f, o) {
      checkRange('Fast glyph cache id', o.cacheId, 0, 9);
      f.byte(1, o.cacheId);
      checkRange('ulCharInc', o.ulCharInc, 0, 0xff);
      checkRange('flAccel', o.flAccel, 0, 0xff);
      f.writer.writeUInt8(o.ulCharInc);
      f.writer.writeUInt8(o.flAccel);
      f.mark(2);
      f.color(3, o.backColor);
      f.color(4, o.foreColor);
      f.coord(5, o.bkLeft);
      f.coord(6, o.bkTop);
      f.coord(7, o.bkRight);
      f.coord(8, o.bkBottom);
      f.coord(9, o.opLeft);
      f.coord(10, o.opTop);
      f.coord(11, o.opRight);
      f.coord(12, o.opBottom);
      f.coord(13, o.x);
      f.coord(14, o.y);
      writeFragmentField(f, 15, writeFastGlyphData(o.glyph));
    },
  },

  ellipseSC: {
    orderType: PrimaryOrderType.EllipseSC,
    supportIndexes: [OrderSupportIndex.EllipseSC],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.rightRect = f.coord(3, o.rightRect);
      o.bottomRect = f.coord(4, o.bottomRect);
      o.rop2 = f.byte(5, o.rop2);
      o.fillMode = f.byte(6, o.fillMode);
      o.color = f.color(7, o.color);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.rightRect);
      f.coord(4, o.bottomRect);
      f.byte(5, o.rop2);
      f.byte(6, o.fillMode);
      f.color(7, o.color);
    },
  },

  ellipseCB: {
    orderType: PrimaryOrderType.EllipseCB,
    supportIndexes: [OrderSupportIndex.EllipseCB],
    read(f, o) {
      o.leftRect = f.coord(1, o.leftRect);
      o.topRect = f.coord(2, o.topRect);
      o.rightRect = f.coord(3, o.rightRect);
      o.bottomRect = f.coord(4, o.bottomRect);
      o.rop2 = f.byte(5, o.rop2);
      o.fillMode = f.byte(6, o.fillMode);
      o.backColor = f.color(7, o.backColor);
      o.foreColor = f.color(8, o.foreColor);
      readBrush(f.reader, f.info.fieldFlags, 8, o.brush);
    },
    write(f, o) {
      f.coord(1, o.leftRect);
      f.coord(2, o.topRect);
      f.coord(3, o.rightRect);
      f.coord(4, o.bottomRect);
      f.byte(5, o.rop2);
      f.byte(6, o.fillMode);
      f.color(7, o.backColor);
      f.color(8, o.foreColor);
      f.brush(8, o.brush);
    },
  },

  glyphIndex: {
    orderType: PrimaryOrderType.GlyphIndex,
    supportIndexes: [OrderSupportIndex.GlyphIndex],
    read(f, o) {
      o.cacheId = f.byte(1, o.cacheId);
      o.flAccel = f.byte(2, o.flAccel);
      o.ulCharInc = f.byte(3, o.ulCharInc);
      o.fOpRedundant = f.byte(4, o.fOpRedundant);
      o.backColor = f.color(5, o.backColor);
      o.foreColor = f.color(6, o.foreColor);
      o.bkLeft = f.int16(7, o.bkLeft);
      o.bkTop = f.int16(8, o.bkTop);
      o.bkRight = f.int16(9, o.bkRight);
      o.bkBottom = f.int16(10, o.bkBottom);
      o.opLeft = f.int16(11, o.opLeft);
      o.opTop = f.int16(12, o.opTop);
      o.opRight = f.int16(13, o.opRight);
      o.opBottom = f.int16(14, o.opBottom);
      readBrush(f.reader, f.info.fieldFlags, 14, o.brush);
      o.x = f.int16(20, o.x);
      o.y = f.int16(21, o.y);
      o.data = readFragmentField(f, 22, o.data);
    },
    write(f, o) {
      f.byte(1, o.cacheId);
      f.byte(2, o.flAccel);
      f.byte(3, o.ulCharInc);
      f.byte(4, o.fOpRedundant);
      f.color(5, o.backColor);
      f.color(6, o.foreColor);
      f.int16(7, o.bkLeft);
      f.int16(8, o.bkTop);
      f.int16(9, o.bkRight);
      f.int16(10, o.bkBottom);
      f.int16(11, o.opLeft);
      f.int16(12, o.opTop);
      f.int16(13, o.opRight);
      f.int16(14, o.opBottom);
      f.brush(14, o.brush);
      f.int16(20, o.x);
      f.int16(21, o.y);
      writeFragmentField(f, 22, o.data);
    },
  },
};

/**
 * Every primary order kind, in order type order.
 */
export const PRIMARY_ORDER_KINDS: readonly PrimaryOrderKind[] = [
  'dstBlt',
  'patBlt',
  'scrBlt',
  'drawNineGrid',
  'multiDrawNineGrid',
  'lineTo',
  'opaqueRect',
  'saveBitmap',
  'memBlt',
  'mem3Blt',
  'multiDstBlt',
  'multiPatBlt',
  'multiScrBlt',
  'multiOpaqueRect',
  'fastIndex',
  'polygonSC',
  'polygonCB',
  'polyline',
  'fastGlyph',
  'ellipseSC',
  'ellipseCB',
  'glyphIndex',
];

const KIND_BY_ORDER_TYPE: ReadonlyMap<number, PrimaryOrderKind> = new Map(
  PRIMARY_ORDER_KINDS.map((kind) => [PRIMARY_ORDER_CODECS[kind].orderType, kind])
);

/**
 * Gets the order kind of a primary order type, or undefined for reserved and unknown codes.
 */
export function getPrimaryOrderKind(orderType: number): PrimaryOrderKind | undefined {
  return KIND_BY_ORDER_TYPE.get(orderType);
}

/**
 * Decodes the fields announced in `info.fieldFlags` into the persisted `order`.
 */
export function readPrimaryOrder<K extends PrimaryOrderKind>(
  kind: K,
  reader: OrderReader,
  info: OrderInfo,
  order: PrimaryOrderStates[K]
): void {
  PRIMARY_ORDER_CODECS[kind].read(new FieldReader(reader, info), order);
}

/**
 * Encodes every field of `order` and returns the field flags to announce them.
 */
export function writePrimaryOrder<K extends PrimaryOrderKind>(
  kind: K,
  writer: OrderWriter,
  order: PrimaryOrderStates[K]
): number {
  const fields = new FieldWriter(writer);
  PRIMARY_ORDER_CODECS[kind].write(fields, order);
  return fields.fieldFlags;
}
