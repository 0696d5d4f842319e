import {
  FLOAT32_SIZE_FLAG,
  FLOAT64_SIZE_FLAG,
  LONG_COUNT,
  LONG_STRING_LENGTH,
  POINTER_FLAG,
  SpecialValue,
  Tag,
  UNSIGNED_FLAG,
  WIDE_FLAG,
  WIDE_WIDTH,
  slotWidth,
} from "./format.js";
import type { PackObject, PackValue } from "./value.js";
import { decodeVarint } from "./varint.js";

const MAX_DEPTH = 512;

const toNumber = (value: bigint): number | bigint =>
  value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value;

/**
 * Reads a whole document back into a value tree. Integers beyond the safe
 * range come back as bigint; byte strings as Buffer views into `buffer`.
 */
export function decode(buffer: Buffer): PackValue {
  const need = (position: number, length: number): void => {
    if (position < 0 || position + length > buffer.length) {
      throw new Error(`Unexpected end of data at ${position} (+${length})`);
    }
  };

  const resolveSlot = (slot: number, width: number): number => {
    need(slot, width);
    if ((buffer[slot] & POINTER_FLAG) === 0) {
      return slot;
    }
    const delta =
      width === WIDE_WIDTH
        ? ((buffer.readUInt32BE(slot) & 0x7fffffff) << 1) >> 1
        : ((buffer.readUInt16BE(slot) & 0x7fff) << 17) >> 17;
    const target = slot + delta * 2;
    need(target, 2);
    return target;
  };

  const readByteString = (position: number): Buffer => {
    let length = buffer[position] & 0x0f;
    let start = position + 1;
    if (length === LONG_STRING_LENGTH) {
      const { value, next } = decodeVarint(buffer, start);
      length = value;
      start = next;
    }
    need(start, length);
    return buffer.subarray(start, start + length);
  };

  const readValue = (position: number, depth: number): PackValue => {
    if (depth > MAX_DEPTH) {
      throw new Error("Document nested too deeply");
    }
    need(position, 2);
    const first = buffer[position];
    if ((first & POINTER_FLAG) !== 0) {
      throw new Error(`Unexpected pointer at ${position}`);
    }
    const tag: number = first >> 4;
    const low = first & 0x0f;

    switch (tag) {
      case Tag.ShortInt:
        return (((low << 8) | buffer[position + 1]) << 20) >> 20;
      case Tag.Int: {
        const size = (low & 0x07) + 1;
        need(position + 1, size);
        let value = 0n;
        for (let i = size - 1; i >= 0; i -= 1) {
          value = (value << 8n) | BigInt(buffer[position + 1 + i]);
        }
        return toNumber((low & UNSIGNED_FLAG) !== 0 ? value : BigInt.asIntN(size * 8, value));
      }
      case Tag.Float:
        if (low === FLOAT32_SIZE_FLAG) {
          need(position + 2, 4);
          return buffer.readFloatLE(position + 2);
        }
        if (low === FLOAT64_SIZE_FLAG) {
          need(position + 2, 8);
          return buffer.readDoubleLE(position + 2);
        }
        throw new Error(`Unknown float size flag ${low} at ${position}`);
      case Tag.Special:
        switch (low) {
          case SpecialValue.Null:
            return null;
          case SpecialValue.False:
            return false;
          case SpecialValue.True:
            return true;
          default:
            throw new Error(`Unknown special value ${low} at ${position}`);
        }
      case Tag.String:
        return readByteString(position).toString("utf8");
      case Tag.Binary:
        return readByteString(position);
      case Tag.Array:
      case Tag.Dict: {
        const width = slotWidth((low & WIDE_FLAG) !== 0);
        let count = ((low & 0x07) << 8) | buffer[position + 1];
        let slots = position + 2;
        if (count === LONG_COUNT) {
          const { value, next } = decodeVarint(buffer, slots);
          count = value;
          slots = next + ((next - position) & 1);
        }
        if (tag === Tag.Array) {
          need(slots, count * width);
          const items: PackValue[] = [];
          for (let i = 0; i < count; i += 1) {
            items.push(readValue(resolveSlot(slots + i * width, width), depth + 1));
          }
          return items;
        }
        need(slots, count * width * 2);
        const values = slots + count * width;
        const entries: PackObject = {};
        for (let i = 0; i < count; i += 1) {
          const key = readValue(resolveSlot(slots + i * width, width), depth + 1);
          if (typeof key !== "string") {
            throw new Error(`Dictionary key at slot ${i} is not a string`);
          }
          Object.defineProperty(entries, key, {
            value: readValue(resolveSlot(values + i * width, width), depth + 1),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        return entries;
      }
      default:
        throw new Error(`Unknown tag ${tag} at ${position}`);
    }
  };

  return readValue(0, 0);
}
