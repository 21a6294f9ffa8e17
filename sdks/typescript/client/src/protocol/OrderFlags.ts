/**
 * Bit flags of the drawing-order wire format.
 *
 * Flags can be combined using bitwise OR operations.
 *
 * @example
 * ```typescript
 * const controlFlags = ControlFlags.Standard | ControlFlags.TypeChange | ControlFlags.Bounds;
 * ```
 */

/**
 * The first byte of every drawing order.
 * For alternate secondary orders only the two low bits are flags; the upper six carry
 * the order type.
 */
export const ControlFlags = {
  /** Primary or secondary order. Cleared for alternate secondary orders. */
  Standard: 0x01,

  /** Secondary order when combined with Standard. Always set on alternate secondary orders. */
  Secondary: 0x02,

  /** A bounding rectangle is present (or reused when ZeroBoundsDeltas is also set). */
  Bounds: 0x04,

  /** An order type byte follows; otherwise the previous primary order type is reused. */
  TypeChange: 0x08,

  /** Coordinate fields are one-byte deltas against the previous value. */
  DeltaCoordinates: 0x10,

  /** Bounds are identical to the previous order's bounds; no bounds byte is sent. */
  ZeroBoundsDeltas: 0x20,

  /** The field-flag block is one byte shorter than the order type's maximum. */
  ZeroFieldByteBit0: 0x40,

  /** The field-flag block is two bytes shorter than the order type's maximum. */
  ZeroFieldByteBit1: 0x80,
} as const;

export type ControlFlagsType = (typeof ControlFlags)[keyof typeof ControlFlags];

/**
 * Flags byte preceding an encoded bounding rectangle. An absolute bit wins over
 * the delta bit for the same edge.
 */
export const BoundsFlags = {
  Left: 0x01,
  Top: 0x02,
  Right: 0x04,
  Bottom: 0x08,
  DeltaLeft: 0x10,
  DeltaTop: 0x20,
  DeltaRight: 0x40,
  DeltaBottom: 0x80,
} as const;

export type BoundsFlagsType = (typeof BoundsFlags)[keyof typeof BoundsFlags];

/**
 * Per-order flag bits of the revision 2 cache bitmap order, after shifting
 * extraFlags right by 7.
 */
export const CacheBitmapV2Flags = {
  HeightSameAsWidth: 0x01,
  PersistentKeyPresent: 0x02,
  NoBitmapCompressionHeader: 0x08,
  DoNotCache: 0x10,
} as const;

export type CacheBitmapV2FlagsType = (typeof CacheBitmapV2Flags)[keyof typeof CacheBitmapV2Flags];

/** extraFlags bit telling cache bitmap orders that no compression header precedes the data. */
export const NO_BITMAP_COMPRESSION_HDR = 0x0400;

/** extraFlags bit marking a trailing Unicode character array on cache glyph orders. */
export const CG_GLYPH_UNICODE_PRESENT = 0x0010;

/** Bit of a brush style or format byte marking a cached brush. */
export const CACHED_BRUSH = 0x80;

/** Stream bitmap flag selecting a 32-bit total size field. */
export const STREAM_BITMAP_V2 = 0x04;

/** High bit of the offscreen bitmap id field announcing a delete list. */
export const OFFSCREEN_DELETE_LIST_PRESENT = 0x8000;

/**
 * Check if a flags value has a specific flag set.
 */
export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}

/**
 * Check if the control flags introduce an alternate secondary order.
 */
export function isAltSecondary(controlFlags: number): boolean {
  return !hasFlag(controlFlags, ControlFlags.Standard);
}

/**
 * Check if the control flags introduce a secondary (cache) order.
 */
export function isSecondary(controlFlags: number): boolean {
  return hasFlag(controlFlags, ControlFlags.Standard | ControlFlags.Secondary);
}

/**
 * Check if the control flags introduce a primary order.
 */
export function isPrimary(controlFlags: number): boolean {
  return (
    hasFlag(controlFlags, ControlFlags.Standard) &&
    !hasFlag(controlFlags, ControlFlags.Secondary)
  );
}
