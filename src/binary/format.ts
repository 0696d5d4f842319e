/**
 * Slot-packed binary format (v1)
 *
 * Every value starts at an even byte offset. The top nibble of a value's
 * first byte is its tag; bit 0x80 of a slot's first byte marks a pointer.
 *
 * [Scalars]
 *   - short int:  [0x0h, ll]            12-bit two's complement, high nibble first
 *   - int:        [0x1s, b0..bn, pad?]  s = byteLength - 1, 0x08 = unsigned, LE payload
 *   - float:      [0x2s, 0x00, LE]      s = 4 (float32) or 8 (float64)
 *   - special:    [0x3v, 0x00]          v = null / false / true
 *
 * [Byte strings]
 *   - string / binary: [0x4n | 0x5n, varint?, bytes, pad?]
 *       n = min(length, 15); a varint length follows when n == 15
 *
 * [Collections]
 *   - header: [0x6w | 0x7w, cc, varint?, pad?]
 *       w = 0x08 for 4-byte slots, count in the low 11 bits of the first two bytes
 *       count == 0x07FF means the real count follows as a varint
 *   - slots:  array: count * width
 *             dict:  count * width of keys, then count * width of values
 *
 * [Pointers]
 *   - width bytes, most significant first, delta = (target - slot) / 2,
 *     top bit set
 */

export enum Tag {
  ShortInt = 0x0,
  Int = 0x1,
  Float = 0x2,
  Special = 0x3,
  String = 0x4,
  Binary = 0x5,
  Array = 0x6,
  Dict = 0x7,
}

export enum SpecialValue {
  Null = 0x0,
  False = 0x4,
  True = 0x8,
}

export const POINTER_FLAG = 0x80;
export const WIDE_FLAG = 0x08;
export const UNSIGNED_FLAG = 0x08;

export const NARROW_WIDTH = 2;
export const WIDE_WIDTH = 4;

export const SHORT_INT_MIN = -2048;
export const SHORT_INT_MAX = 2047;

export const FLOAT32_SIZE_FLAG = 4;
export const FLOAT64_SIZE_FLAG = 8;

export const LONG_COUNT = 0x07ff;
export const MAX_COUNT = 0xffffffff;
export const LONG_STRING_LENGTH = 0x0f;

// Pointer deltas are counted in 2-byte units.
export const NARROW_DELTA_LIMIT = 0x4000;
export const WIDE_DELTA_LIMIT = 0x40000000;

export const DEFAULT_SHARED_STRING_SIZE_LIMIT = 100;

export type SlotWidth = typeof NARROW_WIDTH | typeof WIDE_WIDTH;

export const slotWidth = (wide: boolean): SlotWidth => (wide ? WIDE_WIDTH : NARROW_WIDTH);
