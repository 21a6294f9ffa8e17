/**
 * The five brush fields embedded in pattern-filling primary orders.
 *
 * The brush occupies five consecutive field-flag bits whose position depends on the
 * parent order (PatBlt fields 8-12, Mem3Blt 11-15, ...). Callers pass that position
 * as `fieldOffset`, the number of parent fields preceding the brush.
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';
import { CACHED_BRUSH } from './OrderFlags.js';
import { getBmfBpp } from './OrderTypes.js';
import type { OrderReader, OrderWriter } from './OrderStream.js';

export const BRUSH_FIELD_COUNT = 5;

export interface Brush {
  x: number;
  y: number;
  style: number;
  hatch: number;
  /** Brush cache slot; only meaningful for cached brushes. */
  index: number;
  /** Depth of a cached brush; only meaningful for cached brushes. */
  bpp: number;
  /** 8x8 monochrome pattern rows. Row 0 mirrors `hatch`. */
  data: Uint8Array;
}

export function createBrush(): Brush {
  return { x: 0, y: 0, style: 0, hatch: 0, index: 0, bpp: 0, data: new Uint8Array(8) };
}

/**
 * Reads the brush fields present in `fieldFlags`, updating `brush` in place.
 */
export function readBrush(
  reader: OrderReader,
  fieldFlags: number,
  fieldOffset: number,
  brush: Brush
): void {
  const flags = (fieldFlags >>> fieldOffset) & 0x1f;

  if (flags & 0x01) {
    brush.x = reader.readUInt8();
  }
  if (flags & 0x02) {
    brush.y = reader.readUInt8();
  }
  if (flags & 0x04) {
    brush.style = reader.readUInt8();
  }
  if (flags & 0x08) {
    brush.hatch = reader.readUInt8();
  }

  if (brush.style & CACHED_BRUSH) {
    const bpp = getBmfBpp(brush.style);
    if (bpp === undefined) {
      throw new OrderError(
        OrderErrorCodes.InvalidEnumerant,
        `Invalid brush bitmap format 0x${(brush.style & 0x7f).toString(16)}`
      );
    }
    brush.index = brush.hatch;
    brush.bpp = bpp;
  }

  if (flags & 0x10) {
    reader.ensure(7, 'brush pattern');
    for (let row = 7; row >= 1; row--) {
      brush.data[row] = reader.readUInt8();
    }
    brush.data[0] = brush.hatch & 0xff;
  }
}

/**
 * Writes all five brush fields and returns their field-flag bits, already shifted
 * to `fieldOffset`.
 */
export function writeBrush(writer: OrderWriter, brush: Brush, fieldOffset: number): number {
  if ((brush.style & CACHED_BRUSH) !== 0 && getBmfBpp(brush.style) === undefined) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `Invalid brush bitmap format 0x${(brush.style & 0x7f).toString(16)}`
    );
  }
  writer.writeUInt8(brush.x);
  writer.writeUInt8(brush.y);
  writer.writeUInt8(brush.style);
  writer.writeUInt8(brush.hatch);
  for (let row = 7; row >= 1; row--) {
    writer.writeUInt8(brush.data[row] ?? 0);
  }
  return (0x1f << fieldOffset) >>> 0;
}
