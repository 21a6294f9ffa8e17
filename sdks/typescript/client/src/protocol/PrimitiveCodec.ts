/**
 * Field-level encodings shared by every drawing order: coordinates, colors, the
 * variable-length integer schemes and the packed delta rectangle/point arrays.
 *
 * Variable-length layouts (first byte shown high bit first):
 * ```
 * 2-byte unsigned: [c vvvvvvv] [vvvvvvvv]?        c = continuation, max 0x7FFF
 * 2-byte signed:   [c s vvvvvv] [vvvvvvvv]?       s = sign, max magnitude 0x3FFF
 * 4-byte unsigned: [nn vvvvvv] [vvvvvvvv]{nn}     nn = extra byte count, max 0x3FFFFFFF
 * delta:           [c s vvvvvv] [vvvvvvvv]?       s = sign-extend the six bits
 * ```
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';
import type { OrderReader, OrderWriter } from './OrderStream.js';

/** Maximum entries in a delta rectangle array. */
export const MAX_DELTA_RECTS = 45;

/**
 * One entry of a delta rectangle array, with left/top already resolved to absolute values.
 */
export interface DeltaRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * One entry of a delta point array: the offset from the previous vertex
 * (the first entry is relative to the order's start point).
 */
export interface DeltaPoint {
  x: number;
  y: number;
}

function rangeError(message: string): OrderError {
  return new OrderError(OrderErrorCodes.EncodeRange, message);
}

/**
 * Reads a coordinate field. In delta mode a signed byte is added to `previous`;
 * otherwise a signed 16-bit value replaces it.
 */
export function readCoord(reader: OrderReader, previous: number, deltaMode: boolean): number {
  if (deltaMode) {
    return previous + reader.readInt8();
  }
  return reader.readInt16();
}

/**
 * Writes an absolute (non-delta) coordinate.
 */
export function writeCoord(writer: OrderWriter, value: number): void {
  if (!Number.isInteger(value) || value < -0x8000 || value > 0x7fff) {
    throw rangeError(`Coordinate ${value} does not fit a signed 16-bit field`);
  }
  writer.writeInt16(value);
}

/**
 * Reads a 3-byte color. The first wire byte lands in the low 8 bits.
 */
export function readColor(reader: OrderReader): number {
  reader.ensure(3, 'color');
  const first = reader.readUInt8();
  const second = reader.readUInt8();
  const third = reader.readUInt8();
  return first | (second << 8) | (third << 16);
}

export function writeColor(writer: OrderWriter, color: number): void {
  writer.writeUInt8(color & 0xff);
  writer.writeUInt8((color >> 8) & 0xff);
  writer.writeUInt8((color >> 16) & 0xff);
}

/**
 * Reads a 4-byte COLORREF: three color bytes followed by one padding byte.
 */
export function readColorRef(reader: OrderReader): number {
  reader.ensure(4, 'color reference');
  const color = readColor(reader);
  reader.skip(1);
  return color;
}

export function writeColorRef(writer: OrderWriter, color: number): void {
  writeColor(writer, color);
  writer.writeUInt8(0);
}

/**
 * Reads a palette quad, sent blue first. The result uses the same numeric layout as
 * {@link readColor}: red in the low byte, blue in the third.
 */
export function readColorQuad(reader: OrderReader): number {
  reader.ensure(4, 'color quad');
  const blue = reader.readUInt8();
  const green = reader.readUInt8();
  const red = reader.readUInt8();
  reader.skip(1);
  return red | (green << 8) | (blue << 16);
}

export function writeColorQuad(writer: OrderWriter, color: number): void {
  writer.writeUInt8((color >> 16) & 0xff);
  writer.writeUInt8((color >> 8) & 0xff);
  writer.writeUInt8(color & 0xff);
  writer.writeUInt8(0);
}

export function read2ByteUnsigned(reader: OrderReader): number {
  const first = reader.readUInt8();
  if (first & 0x80) {
    return ((first & 0x7f) << 8) | reader.readUInt8();
  }
  return first & 0x7f;
}

export function write2ByteUnsigned(writer: OrderWriter, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0x7fff) {
    throw rangeError(`Value ${value} exceeds the 2-byte unsigned range (0..0x7FFF)`);
  }
  if (value >= 0x7f) {
    writer.writeUInt8(((value & 0x7f00) >> 8) | 0x80);
    writer.writeUInt8(value & 0xff);
  } else {
    writer.writeUInt8(value);
  }
}

export function read2ByteSigned(reader: OrderReader): number {
  const first = reader.readUInt8();
  let value = first & 0x3f;
  if (first & 0x80) {
    value = (value << 8) | reader.readUInt8();
  }
  return first & 0x40 ? -value : value;
}

export function write2ByteSigned(writer: OrderWriter, value: number): void {
  const negative = value < 0;
  const magnitude = Math.abs(value);
  if (!Number.isInteger(value) || magnitude > 0x3fff) {
    throw rangeError(`Value ${value} exceeds the 2-byte signed range (-0x3FFF..0x3FFF)`);
  }
  const sign = negative ? 0x40 : 0;
  if (magnitude >= 0x3f) {
    writer.writeUInt8(((magnitude & 0x3f00) >> 8) | sign | 0x80);
    writer.writeUInt8(magnitude & 0xff);
  } else {
    writer.writeUInt8((magnitude & 0x3f) | sign);
  }
}

export function read4ByteUnsigned(reader: OrderReader): number {
  const first = reader.readUInt8();
  const count = (first & 0xc0) >> 6;
  reader.ensure(count, '4-byte unsigned value');
  let value = first & 0x3f;
  for (let i = 0; i < count; i++) {
    value = value * 0x100 + reader.readUInt8();
  }
  return value;
}

export function write4ByteUnsigned(writer: OrderWriter, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0x3fffffff) {
    throw rangeError(`Value ${value} exceeds the 4-byte unsigned range (0..0x3FFFFFFF)`);
  }
  if (value <= 0x3f) {
    writer.writeUInt8(value);
  } else if (value <= 0x3fff) {
    writer.writeUInt8(((value >> 8) & 0x3f) | 0x40);
    writer.writeUInt8(value & 0xff);
  } else if (value <= 0x3fffff) {
    writer.writeUInt8(((value >> 16) & 0x3f) | 0x80);
    writer.writeUInt8((value >> 8) & 0xff);
    writer.writeUInt8(value & 0xff);
  } else {
    writer.writeUInt8(((value >> 24) & 0x3f) | 0xc0);
    writer.writeUInt8((value >> 16) & 0xff);
    writer.writeUInt8((value >> 8) & 0xff);
    writer.writeUInt8(value & 0xff);
  }
}

/**
 * Reads one delta value of a rectangle or point array.
 */
export function readDelta(reader: OrderReader): number {
  const first = reader.readUInt8();
  // bitwise ops keep this in int32, so ~0x3f sign-extends the six value bits
  let value = first & 0x40 ? first | ~0x3f : first & 0x3f;
  if (first & 0x80) {
    value = (value << 8) | reader.readUInt8();
  }
  return value;
}

export function writeDelta(writer: OrderWriter, value: number): void {
  if (!Number.isInteger(value) || value < -0x4000 || value > 0x3fff) {
    throw rangeError(`Delta ${value} exceeds the delta range (-0x4000..0x3FFF)`);
  }
  if (value >= -0x40 && value <= 0x3f) {
    writer.writeUInt8(value & 0x7f);
  } else {
    writer.writeUInt8(0x80 | ((value >> 8) & 0x7f));
    writer.writeUInt8(value & 0xff);
  }
}

/**
 * Reads `count` packed delta rectangles.
 *
 * A header of 4 zero bits per entry (two entries per byte, high nibble first) marks
 * left/top/width/height as absent. Absent left/top contribute a zero delta; absent
 * width/height repeat the previous entry's value (0 for the first entry). Left and
 * top accumulate onto the previous entry.
 */
export function readDeltaRects(reader: OrderReader, count: number): DeltaRect[] {
  if (count > MAX_DELTA_RECTS) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Invalid number of delta rectangles ${count} (max ${MAX_DELTA_RECTS})`
    );
  }

  const zeroBits = reader.readBytes(Math.floor((count + 1) / 2), 'delta rectangle header');
  const rects: DeltaRect[] = [];
  let flags = 0;

  for (let i = 0; i < count; i++) {
    if (i % 2 === 0) {
      flags = zeroBits[i / 2] ?? 0;
    }
    const previous = rects[i - 1];
    const rect: DeltaRect = { left: 0, top: 0, width: 0, height: 0 };

    if (!(flags & 0x80)) {
      rect.left = readDelta(reader);
    }
    if (!(flags & 0x40)) {
      rect.top = readDelta(reader);
    }
    rect.width = flags & 0x20 ? (previous?.width ?? 0) : readDelta(reader);
    rect.height = flags & 0x10 ? (previous?.height ?? 0) : readDelta(reader);

    if (previous) {
      rect.left += previous.left;
      rect.top += previous.top;
    }

    rects.push(rect);
    flags = (flags << 4) & 0xff;
  }

  return rects;
}

/**
 * Writes delta rectangles in the layout {@link readDeltaRects} reads, omitting
 * zero left/top deltas and repeated widths/heights.
 */
export function writeDeltaRects(writer: OrderWriter, rects: readonly DeltaRect[]): void {
  if (rects.length > MAX_DELTA_RECTS) {
    throw new OrderError(
      OrderErrorCodes.BoundViolation,
      `Cannot encode ${rects.length} delta rectangles (max ${MAX_DELTA_RECTS})`
    );
  }

  const zeroBits = new Uint8Array(Math.floor((rects.length + 1) / 2));
  const headerAt = writer.length;
  writer.writeBytes(zeroBits);

  rects.forEach((rect, i) => {
    const previous = rects[i - 1] ?? { left: 0, top: 0, width: 0, height: 0 };
    const deltaLeft = rect.left - previous.left;
    const deltaTop = rect.top - previous.top;
    let flags = 0;

    if (deltaLeft === 0) {
      flags |= 0x80;
    } else {
      writeDelta(writer, deltaLeft);
    }
    if (deltaTop === 0) {
      flags |= 0x40;
    } else {
      writeDelta(writer, deltaTop);
    }
    if (rect.width === previous.width) {
      flags |= 0x20;
    } else {
      writeDelta(writer, rect.width);
    }
    if (rect.height === previous.height) {
      flags |= 0x10;
    } else {
      writeDelta(writer, rect.height);
    }

    const byteIndex = Math.floor(i / 2);
    zeroBits[byteIndex] = (zeroBits[byteIndex] ?? 0) | (i % 2 === 0 ? flags : flags >> 4);
  });

  zeroBits.forEach((value, index) => writer.setUInt8At(headerAt + index, value));
}

/**
 * Reads `count` packed delta points. A header of 2 zero bits per entry (four entries
 * per byte) marks x/y as absent, meaning a zero offset.
 */
export function readDeltaPoints(reader: OrderReader, count: number): DeltaPoint[] {
  const zeroBits = reader.readBytes(Math.floor((count + 3) / 4), 'delta point header');
  const points: DeltaPoint[] = [];
  let flags = 0;

  for (let i = 0; i < count; i++) {
    if (i % 4 === 0) {
      flags = zeroBits[i / 4] ?? 0;
    }
    const point: DeltaPoint = { x: 0, y: 0 };
    if (!(flags & 0x80)) {
      point.x = readDelta(reader);
    }
    if (!(flags & 0x40)) {
      point.y = readDelta(reader);
    }
    points.push(point);
    flags = (flags << 2) & 0xff;
  }

  return points;
}

export function writeDeltaPoints(writer: OrderWriter, points: readonly DeltaPoint[]): void {
  const zeroBits = new Uint8Array(Math.floor((points.length + 3) / 4));
  const headerAt = writer.length;
  writer.writeBytes(zeroBits);

  points.forEach((point, i) => {
    let flags = 0;
    if (point.x === 0) {
      flags |= 0x80;
    } else {
      writeDelta(writer, point.x);
    }
    if (point.y === 0) {
      flags |= 0x40;
    } else {
      writeDelta(writer, point.y);
    }
    const byteIndex = Math.floor(i / 4);
    zeroBits[byteIndex] = (zeroBits[byteIndex] ?? 0) | (flags >> ((i % 4) * 2));
  });

  zeroBits.forEach((value, index) => writer.setUInt8At(headerAt + index, value));
}

/**
 * Resolves a delta point array into absolute vertices, starting from (`xStart`, `yStart`).
 * The start point itself is not included in the result.
 */
export function resolveDeltaPoints(
  xStart: number,
  yStart: number,
  points: readonly DeltaPoint[]
): DeltaPoint[] {
  let x = xStart;
  let y = yStart;
  return points.map((point) => {
    x += point.x;
    y += point.y;
    return { x, y };
  });
}
