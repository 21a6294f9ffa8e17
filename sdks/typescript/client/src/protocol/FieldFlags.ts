/**
 * Field presence flags and bounding rectangles of primary orders.
 *
 * Primary order layout:
 * ```
 * controlFlags (1) | orderType (1, on TypeChange) | fieldFlags (0-3) | bounds (0-9) | fields...
 * ```
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';
import { BoundsFlags, ControlFlags } from './OrderFlags.js';
import { PrimaryOrderType } from './OrderTypes.js';
import type { OrderReader, OrderWriter } from './OrderStream.js';

/**
 * Clip rectangle of a primary order (inclusive edges).
 */
export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Header state of the primary order being processed. One instance lives for the whole
 * connection: the order type and bounds carry over when an order omits them.
 */
export interface OrderInfo {
  orderType: number;
  fieldFlags: number;
  controlFlags: number;
  boundsFlags: number;
  bounds: Bounds;
  deltaCoordinates: boolean;
}

/**
 * Creates the initial header state. Primary orders default to PatBlt until a
 * TypeChange says otherwise.
 */
export function createOrderInfo(): OrderInfo {
  return {
    orderType: PrimaryOrderType.PatBlt,
    fieldFlags: 0,
    controlFlags: 0,
    boundsFlags: 0,
    bounds: { left: 0, top: 0, right: 0, bottom: 0 },
    deltaCoordinates: false,
  };
}

const PRIMARY_FIELD_BYTES: ReadonlyMap<number, number> = new Map([
  [PrimaryOrderType.DstBlt, 1],
  [PrimaryOrderType.PatBlt, 2],
  [PrimaryOrderType.ScrBlt, 1],
  [PrimaryOrderType.DrawNineGrid, 1],
  [PrimaryOrderType.MultiDrawNineGrid, 1],
  [PrimaryOrderType.LineTo, 2],
  [PrimaryOrderType.OpaqueRect, 1],
  [PrimaryOrderType.SaveBitmap, 1],
  [PrimaryOrderType.MemBlt, 2],
  [PrimaryOrderType.Mem3Blt, 3],
  [PrimaryOrderType.MultiDstBlt, 1],
  [PrimaryOrderType.MultiPatBlt, 2],
  [PrimaryOrderType.MultiScrBlt, 2],
  [PrimaryOrderType.MultiOpaqueRect, 2],
  [PrimaryOrderType.FastIndex, 2],
  [PrimaryOrderType.PolygonSC, 1],
  [PrimaryOrderType.PolygonCB, 2],
  [PrimaryOrderType.Polyline, 1],
  [PrimaryOrderType.FastGlyph, 2],
  [PrimaryOrderType.EllipseSC, 1],
  [PrimaryOrderType.EllipseCB, 2],
  [PrimaryOrderType.GlyphIndex, 3],
  [0x03, 0],
  [0x04, 0],
  [0x05, 0],
  [0x06, 0],
  [0x0c, 0],
  [0x17, 0],
]);

/**
 * Gets the maximum number of field-flag bytes of a primary order type.
 * Reserved types yield 0; undefined is returned for codes outside the protocol.
 */
export function getPrimaryFieldBytes(orderType: number): number | undefined {
  return PRIMARY_FIELD_BYTES.get(orderType);
}

/**
 * Reads the field-flag block. The two ZeroFieldByte control bits drop trailing
 * all-zero bytes: bit 0 removes one, bit 1 removes two (or all, if fewer remain).
 */
export function readFieldFlags(
  reader: OrderReader,
  controlFlags: number,
  maxFieldBytes: number
): number {
  let fieldBytes = maxFieldBytes;

  if (controlFlags & ControlFlags.ZeroFieldByteBit0) {
    if (fieldBytes > 0) {
      fieldBytes--;
    }
  }

  if (controlFlags & ControlFlags.ZeroFieldByteBit1) {
    fieldBytes = fieldBytes > 1 ? fieldBytes - 2 : 0;
  }

  reader.ensure(fieldBytes, 'field flags');
  let fieldFlags = 0;
  for (let i = 0; i < fieldBytes; i++) {
    fieldFlags |= reader.readUInt8() << (i * 8);
  }
  return fieldFlags >>> 0;
}

/**
 * Writes a full (uncompressed) field-flag block of `fieldBytes` bytes.
 */
export function writeFieldFlags(writer: OrderWriter, fieldFlags: number, fieldBytes: number): void {
  if (fieldBytes < 1 || fieldBytes > 3) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Field flags must span 1 to 3 bytes, got ${fieldBytes}`
    );
  }
  if (fieldFlags >>> (fieldBytes * 8) !== 0) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Field flags 0x${fieldFlags.toString(16)} do not fit ${fieldBytes} bytes`
    );
  }
  for (let i = 0; i < fieldBytes; i++) {
    writer.writeUInt8((fieldFlags >>> (i * 8)) & 0xff);
  }
}

/**
 * Check if field `fieldNumber` (1-based) is present in the field flags.
 */
export function fieldPresent(fieldFlags: number, fieldNumber: number): boolean {
  return ((fieldFlags >>> (fieldNumber - 1)) & 1) === 1;
}

/**
 * Builds a field-flag mask with fields 1..`count` present.
 */
export function allFieldsPresent(count: number): number {
  return count >= 32 ? 0xffffffff : ((1 << count) - 1) >>> 0;
}

function readBoundsEdge(
  reader: OrderReader,
  flags: number,
  absolute: number,
  delta: number,
  previous: number
): number {
  if (flags & absolute) {
    return reader.readInt16();
  }
  if (flags & delta) {
    return previous + reader.readInt8();
  }
  return previous;
}

/**
 * Reads a bounds flags byte and the edges it announces, updating `bounds` in place.
 * Edges without a flag keep their previous value.
 */
export function readBounds(reader: OrderReader, bounds: Bounds): number {
  const flags = reader.readUInt8();
  bounds.left = readBoundsEdge(reader, flags, BoundsFlags.Left, BoundsFlags.DeltaLeft, bounds.left);
  bounds.top = readBoundsEdge(reader, flags, BoundsFlags.Top, BoundsFlags.DeltaTop, bounds.top);
  bounds.right = readBoundsEdge(
    reader,
    flags,
    BoundsFlags.Right,
    BoundsFlags.DeltaRight,
    bounds.right
  );
  bounds.bottom = readBoundsEdge(
    reader,
    flags,
    BoundsFlags.Bottom,
    BoundsFlags.DeltaBottom,
    bounds.bottom
  );
  return flags;
}

function writeBoundsEdge(
  writer: OrderWriter,
  flags: number,
  absolute: number,
  delta: number,
  value: number,
  previous: number
): void {
  if (flags & absolute) {
    if (value < -0x8000 || value > 0x7fff) {
      throw new OrderError(OrderErrorCodes.EncodeRange, `Bounds edge ${value} exceeds 16 bits`);
    }
    writer.writeInt16(value);
  } else if (flags & delta) {
    const change = value - previous;
    if (change < -0x80 || change > 0x7f) {
      throw new OrderError(
        OrderErrorCodes.EncodeRange,
        `Bounds delta ${change} does not fit a signed byte`
      );
    }
    writer.writeInt8(change);
  }
}

/**
 * Writes a bounds flags byte and the edges it selects. Delta edges are computed
 * against `previous`.
 */
export function writeBounds(
  writer: OrderWriter,
  flags: number,
  bounds: Bounds,
  previous: Bounds = { left: 0, top: 0, right: 0, bottom: 0 }
): void {
  writer.writeUInt8(flags);
  writeBoundsEdge(
    writer,
    flags,
    BoundsFlags.Left,
    BoundsFlags.DeltaLeft,
    bounds.left,
    previous.left
  );
  writeBoundsEdge(writer, flags, BoundsFlags.Top, BoundsFlags.DeltaTop, bounds.top, previous.top);
  writeBoundsEdge(
    writer,
    flags,
    BoundsFlags.Right,
    BoundsFlags.DeltaRight,
    bounds.right,
    previous.right
  );
  writeBoundsEdge(
    writer,
    flags,
    BoundsFlags.Bottom,
    BoundsFlags.DeltaBottom,
    bounds.bottom,
    previous.bottom
  );
}

export function boundsEqual(a: Bounds, b: Bounds): boolean {
  return a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;
}
