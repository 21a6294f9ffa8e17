/**
 * Bodies of the alternate secondary orders.
 *
 * Alternate secondary layout:
 * ```
 * controlFlags (1: orderType << 2 | Secondary) | body...
 * ```
 * Bodies are self-delimiting; there is no length field to resynchronise on.
 */

import { OrderError, OrderErrorCodes } from '@orderwire/core';
import { OFFSCREEN_DELETE_LIST_PRESENT, STREAM_BITMAP_V2 } from './OrderFlags.js';
import { AltSecondaryOrderType, type AltSecondaryOrderTypeValue } from './OrderTypes.js';
import type { OrderReader, OrderWriter } from './OrderStream.js';
import { readColorRef, writeColorRef } from './PrimitiveCodec.js';
import type {
  AltSecondaryDrawingOrder,
  CreateNineGridBitmapOrder,
  CreateOffscreenBitmapOrder,
  DrawGdiPlusCacheFirstOrder,
  DrawGdiPlusCacheNextOrder,
  DrawGdiPlusFirstOrder,
  DrawGdiPlusNextOrder,
  StreamBitmapFirstOrder,
  StreamBitmapNextOrder,
} from './AltSecondaryOrders.js';

/**
 * Delete list of the create offscreen bitmap order. One list lives per connection; its
 * storage only grows, and orders without a list leave it empty.
 */
export class OffscreenDeleteList {
  private indices = new Uint16Array(0);
  private count = 0;

  /** Number of entries announced by the last order. */
  get cIndices(): number {
    return this.count;
  }

  /** Allocated entries. */
  get capacity(): number {
    return this.indices.length;
  }

  read(reader: OrderReader): void {
    const cIndices = reader.readUInt16();
    if (cIndices > this.indices.length) {
      const grown = new Uint16Array(cIndices);
      grown.set(this.indices);
      this.indices = grown;
    }
    reader.ensure(cIndices * 2, 'offscreen delete list');
    for (let i = 0; i < cIndices; i++) {
      this.indices[i] = reader.readUInt16();
    }
    this.count = cIndices;
  }

  clear(): void {
    this.count = 0;
  }

  toArray(): number[] {
    return Array.from(this.indices.subarray(0, this.count));
  }
}

function checkRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `${name} ${value} outside 0..${max}`);
  }
}

function checkBlockSize(name: string, declared: number, block: Uint8Array): void {
  if (declared !== block.length) {
    throw new OrderError(
      OrderErrorCodes.EncodeRange,
      `${name} ${declared} does not match ${block.length} bytes`
    );
  }
  checkRange(name, declared, 0xffff);
}

function readBpp(reader: OrderReader): number {
  const bpp = reader.readUInt8();
  if (bpp < 1 || bpp > 32) {
    throw new OrderError(OrderErrorCodes.InvalidEnumerant, `Invalid bpp value ${bpp}`);
  }
  return bpp;
}

function checkBpp(bpp: number): void {
  if (!Number.isInteger(bpp) || bpp < 1 || bpp > 32) {
    throw new OrderError(OrderErrorCodes.EncodeRange, `Invalid bpp value ${bpp}`);
  }
}

// ---------------------------------------------------------------------------
// Offscreen surfaces
// ---------------------------------------------------------------------------

export function readCreateOffscreenBitmapOrder(
  reader: OrderReader,
  deleteList: OffscreenDeleteList
): CreateOffscreenBitmapOrder {
  reader.ensure(6, 'offscreen bitmap header');
  const flags = reader.readUInt16();
  const cx = reader.readUInt16();
  const cy = reader.readUInt16();
  if (cx === 0 || cy === 0) {
    throw new OrderError(
      OrderErrorCodes.InvalidEnumerant,
      `Invalid offscreen bitmap size ${cx}x${cy}`
    );
  }

  if (flags & OFFSCREEN_DELETE_LIST_PRESENT) {
    deleteList.read(reader);
  } else {
    deleteList.clear();
  }

  return { id: flags & 0x7fff, cx, cy, deleteList: deleteList.toArray() };
}

export function writeCreateOffscreenBitmapOrder(
  writer: OrderWriter,
  order: CreateOffscreenBitmapOrder
): void {
  checkRange('Offscreen bitmap id', order.id, 0x7fff);
  checkRange('Offscreen bitmap width', order.cx, 0xffff);
  checkRange('Offscreen bitmap height', order.cy, 0xffff);
  checkRange('Delete list size', order.deleteList.length, 0xffff);

  const present = order.deleteList.length > 0;
  writer.writeUInt16(order.id | (present ? OFFSCREEN_DELETE_LIST_PRESENT : 0));
  writer.writeUInt16(order.cx);
  writer.writeUInt16(order.cy);
  if (present) {
    writer.writeUInt16(order.deleteList.length);
    for (const index of order.deleteList) {
      checkRange('Delete list entry', index, 0xffff);
      writer.writeUInt16(index);
    }
  }
}

// ---------------------------------------------------------------------------
// Streamed bitmaps
// ---------------------------------------------------------------------------

export function readStreamBitmapFirstOrder(reader: OrderReader): StreamBitmapFirstOrder {
  reader.ensure(10, 'stream bitmap header');
  const bitmapFlags = reader.readUInt8();
  const bitmapBpp = readBpp(reader);
  const bitmapType = reader.readUInt16();
  const bitmapWidth = reader.readUInt16();
  const bitmapHeight = reader.readUInt16();
  const bitmapSize =
    bitmapFlags & STREAM_BITMAP_V2 ? reader.readUInt32() : reader.readUInt16();
  const bitmapBlockSize = reader.readUInt16();

  return {
    bitmapFlags,
    bitmapBpp,
    bitmapType,
    bitmapWidth,
    bitmapHeight,
    bitmapSize,
    bitmapBlockSize,
    bitmapBlock: reader.readBytes(bitmapBlockSize, 'bitmap block'),
  };
}

export function writeStreamBitmapFirstOrder(
  writer: OrderWriter,
  order: StreamBitmapFirstOrder
): void {
  checkBpp(order.bitmapBpp);
  checkRange('Bitmap flags', order.bitmapFlags, 0xff);
  const maxSize = order.bitmapFlags & STREAM_BITMAP_V2 ? 0xffffffff : 0xffff;
  checkRange('Bitmap size', order.bitmapSize, maxSize);
  checkBlockSize('Bitmap block size', order.bitmapBlockSize, order.bitmapBlock);

  writer.writeUInt8(order.bitmapFlags);
  writer.writeUInt8(order.bitmapBpp);
  writer.writeUInt16(order.bitmapType);
  writer.writeUInt16(order.bitmapWidth);
  writer.writeUInt16(order.bitmapHeight);
  if (order.bitmapFlags & STREAM_BITMAP_V2) {
    writer.writeUInt32(order.bitmapSize);
  } else {
    writer.writeUInt16(order.bitmapSize);
  }
  writer.writeUInt16(order.bitmapBlockSize);
  writer.writeBytes(order.bitmapBlock);
}

export function readStreamBitmapNextOrder(reader: OrderReader): StreamBitmapNextOrder {
  reader.ensure(5, 'stream bitmap header');
  const bitmapFlags = reader.readUInt8();
  const bitmapType = reader.readUInt16();
  const bitmapBlockSize = reader.readUInt16();
  return {
    bitmapFlags,
    bitmapType,
    bitmapBlockSize,
    bitmapBlock: reader.readBytes(bitmapBlockSize, 'bitmap block'),
  };
}

export function writeStreamBitmapNextOrder(
  writer: OrderWriter,
  order: StreamBitmapNextOrder
): void {
  checkRange('Bitmap flags', order.bitmapFlags, 0xff);
  checkBlockSize('Bitmap block size', order.bitmapBlockSize, order.bitmapBlock);
  writer.writeUInt8(order.bitmapFlags);
  writer.writeUInt16(order.bitmapType);
  writer.writeUInt16(order.bitmapBlockSize);
  writer.writeBytes(order.bitmapBlock);
}

// ---------------------------------------------------------------------------
// Nine-grid bitmaps and frame markers
// ---------------------------------------------------------------------------

export function readCreateNineGridBitmapOrder(reader: OrderReader): CreateNineGridBitmapOrder {
  reader.ensure(19, 'nine-grid bitmap');
  const bitmapBpp = readBpp(reader);
  const bitmapId = reader.readUInt16();
  return {
    bitmapBpp,
    bitmapId,
    nineGridInfo: {
      flFlags: reader.readUInt32(),
      ulLeftWidth: reader.readUInt16(),
      ulRightWidth: reader.readUInt16(),
      ulTopHeight: reader.readUInt16(),
      ulBottomHeight: reader.readUInt16(),
      crTransparent: readColorRef(reader),
    },
  };
}

export function writeCreateNineGridBitmapOrder(
  writer: OrderWriter,
  order: CreateNineGridBitmapOrder
): void {
  checkBpp(order.bitmapBpp);
  const info = order.nineGridInfo;
  writer.writeUInt8(order.bitmapBpp);
  writer.writeUInt16(order.bitmapId);
  writer.writeUInt32(info.flFlags);
  writer.writeUInt16(info.ulLeftWidth);
  writer.writeUInt16(info.ulRightWidth);
  writer.writeUInt16(info.ulTopHeight);
  writer.writeUInt16(info.ulBottomHeight);
  writeColorRef(writer, info.crTransparent);
}

// ---------------------------------------------------------------------------
// GDI+ envelopes
// ---------------------------------------------------------------------------

export function readDrawGdiPlusFirstOrder(reader: OrderReader): DrawGdiPlusFirstOrder {
  reader.ensure(11, 'GDI+ header');
  reader.skip(1);
  const cbSize = reader.readUInt16();
  const cbTotalSize = reader.readUInt32();
  const cbTotalEmfSize = reader.readUInt32();
  return {
    cbSize,
    cbTotalSize,
    cbTotalEmfSize,
    emfRecords: reader.readBytes(cbSize, 'EMF records'),
  };
}

export function writeDrawGdiPlusFirstOrder(
  writer: OrderWriter,
  order: DrawGdiPlusFirstOrder
): void {
  checkBlockSize('cbSize', order.cbSize, order.emfRecords);
  writer.writeUInt8(0);
  writer.writeUInt16(order.cbSize);
  writer.writeUInt32(order.cbTotalSize);
  writer.writeUInt32(order.cbTotalEmfSize);
  writer.writeBytes(order.emfRecords);
}

export function readDrawGdiPlusNextOrder(reader: OrderReader): DrawGdiPlusNextOrder {
  reader.ensure(3, 'GDI+ header');
  reader.skip(1);
  const cbSize = reader.readUInt16();
  return { cbSize, emfRecords: reader.readBytes(cbSize, 'EMF records') };
}

export function writeDrawGdiPlusNextOrder(writer: OrderWriter, order: DrawGdiPlusNextOrder): void {
  checkBlockSize('cbSize', order.cbSize, order.emfRecords);
  writer.writeUInt8(0);
  writer.writeUInt16(order.cbSize);
  writer.writeBytes(order.emfRecords);
}

export function readDrawGdiPlusCacheFirstOrder(reader: OrderReader): DrawGdiPlusCacheFirstOrder {
  reader.ensure(11, 'GDI+ cache header');
  const flags = reader.readUInt8();
  const cacheType = reader.readUInt16();
  const cacheIndex = reader.readUInt16();
  const cbSize = reader.readUInt16();
  const cbTotalSize = reader.readUInt32();
  return {
    flags,
    cacheType,
    cacheIndex,
    cbSize,
    cbTotalSize,
    emfRecords: reader.readBytes(cbSize, 'EMF records'),
  };
}

export function writeDrawGdiPlusCacheFirstOrder(
  writer: OrderWriter,
  order: DrawGdiPlusCacheFirstOrder
): void {
  checkBlockSize('cbSize', order.cbSize, order.emfRecords);
  checkRange('GDI+ cache flags', order.flags, 0xff);
  writer.writeUInt8(order.flags);
  writer.writeUInt16(order.cacheType);
  writer.writeUInt16(order.cacheIndex);
  writer.writeUInt16(order.cbSize);
  writer.writeUInt32(order.cbTotalSize);
  writer.writeBytes(order.emfRecords);
}

export function readDrawGdiPlusCacheNextOrder(reader: OrderReader): DrawGdiPlusCacheNextOrder {
  reader.ensure(7, 'GDI+ cache header');
  const flags = reader.readUInt8();
  const cacheType = reader.readUInt16();
  const cacheIndex = reader.readUInt16();
  const cbSize = reader.readUInt16();
  return {
    flags,
    cacheType,
    cacheIndex,
    cbSize,
    emfRecords: reader.readBytes(cbSize, 'EMF records'),
  };
}

export function writeDrawGdiPlusCacheNextOrder(
  writer: OrderWriter,
  order: DrawGdiPlusCacheNextOrder
): void {
  checkBlockSize('cbSize', order.cbSize, order.emfRecords);
  checkRange('GDI+ cache flags', order.flags, 0xff);
  writer.writeUInt8(order.flags);
  writer.writeUInt16(order.cacheType);
  writer.writeUInt16(order.cacheIndex);
  writer.writeUInt16(order.cbSize);
  writer.writeBytes(order.emfRecords);
}

// ---------------------------------------------------------------------------
// Dispatch by order type
// ---------------------------------------------------------------------------

/**
 * Whether the alternate secondary order type carries a body this codec parses.
 * Window orders are parsed by the host; desktop composition orders are skipped.
 */
export function hasAltSecondaryBody(orderType: number): boolean {
  return (
    orderType <= AltSecondaryOrderType.FrameMarker &&
    orderType !== AltSecondaryOrderType.Window &&
    orderType !== AltSecondaryOrderType.CompDeskFirst
  );
}

/**
 * Reads the body of an alternate secondary order. Callers must first check
 * {@link hasAltSecondaryBody}.
 */
export function readAltSecondaryOrder(
  reader: OrderReader,
  orderType: number,
  deleteList: OffscreenDeleteList
): AltSecondaryDrawingOrder {
  switch (orderType) {
    case AltSecondaryOrderType.SwitchSurface:
      return { kind: 'switchSurface', order: { bitmapId: reader.readUInt16() } };
    case AltSecondaryOrderType.CreateOffscreenBitmap:
      return {
        kind: 'createOffscreenBitmap',
        order: readCreateOffscreenBitmapOrder(reader, deleteList),
      };
    case AltSecondaryOrderType.StreamBitmapFirst:
      return { kind: 'streamBitmapFirst', order: readStreamBitmapFirstOrder(reader) };
    case AltSecondaryOrderType.StreamBitmapNext:
      return { kind: 'streamBitmapNext', order: readStreamBitmapNextOrder(reader) };
    case AltSecondaryOrderType.CreateNineGridBitmap:
      return { kind: 'createNineGridBitmap', order: readCreateNineGridBitmapOrder(reader) };
    case AltSecondaryOrderType.GdiPlusFirst:
      return { kind: 'drawGdiPlusFirst', order: readDrawGdiPlusFirstOrder(reader) };
    case AltSecondaryOrderType.GdiPlusNext:
      return { kind: 'drawGdiPlusNext', order: readDrawGdiPlusNextOrder(reader) };
    case AltSecondaryOrderType.GdiPlusEnd:
      return { kind: 'drawGdiPlusEnd', order: readDrawGdiPlusFirstOrder(reader) };
    case AltSecondaryOrderType.GdiPlusCacheFirst:
      return { kind: 'drawGdiPlusCacheFirst', order: readDrawGdiPlusCacheFirstOrder(reader) };
    case AltSecondaryOrderType.GdiPlusCacheNext:
      return { kind: 'drawGdiPlusCacheNext', order: readDrawGdiPlusCacheNextOrder(reader) };
    case AltSecondaryOrderType.GdiPlusCacheEnd:
      return { kind: 'drawGdiPlusCacheEnd', order: readDrawGdiPlusCacheFirstOrder(reader) };
    case AltSecondaryOrderType.FrameMarker:
      return { kind: 'frameMarker', order: { action: reader.readUInt32() } };
    default:
      throw new OrderError(
        OrderErrorCodes.InvalidEnumerant,
        `Unknown alternate secondary order type 0x${orderType.toString(16)}`
      );
  }
}

/**
 * Writes the body of an alternate secondary order and returns its order type.
 */
export function writeAltSecondaryOrder(
  writer: OrderWriter,
  order: AltSecondaryDrawingOrder
): AltSecondaryOrderTypeValue {
  switch (order.kind) {
    case 'switchSurface':
      checkRange('Bitmap id', order.order.bitmapId, 0xffff);
      writer.writeUInt16(order.order.bitmapId);
      return AltSecondaryOrderType.SwitchSurface;
    case 'createOffscreenBitmap':
      writeCreateOffscreenBitmapOrder(writer, order.order);
      return AltSecondaryOrderType.CreateOffscreenBitmap;
    case 'streamBitmapFirst':
      writeStreamBitmapFirstOrder(writer, order.order);
      return AltSecondaryOrderType.StreamBitmapFirst;
    case 'streamBitmapNext':
      writeStreamBitmapNextOrder(writer, order.order);
      return AltSecondaryOrderType.StreamBitmapNext;
    case 'createNineGridBitmap':
      writeCreateNineGridBitmapOrder(writer, order.order);
      return AltSecondaryOrderType.CreateNineGridBitmap;
    case 'drawGdiPlusFirst':
      writeDrawGdiPlusFirstOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusFirst;
    case 'drawGdiPlusNext':
      writeDrawGdiPlusNextOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusNext;
    case 'drawGdiPlusEnd':
      writeDrawGdiPlusFirstOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusEnd;
    case 'drawGdiPlusCacheFirst':
      writeDrawGdiPlusCacheFirstOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusCacheFirst;
    case 'drawGdiPlusCacheNext':
      writeDrawGdiPlusCacheNextOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusCacheNext;
    case 'drawGdiPlusCacheEnd':
      writeDrawGdiPlusCacheFirstOrder(writer, order.order);
      return AltSecondaryOrderType.GdiPlusCacheEnd;
    case 'frameMarker':
      checkRange('Frame marker action', order.order.action, 0xffffffff);
      writer.writeUInt32(order.order.action);
      return AltSecondaryOrderType.FrameMarker;
  }
}
