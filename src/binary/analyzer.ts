import {
  LONG_COUNT,
  LONG_STRING_LENGTH,
  NARROW_DELTA_LIMIT,
  NARROW_WIDTH,
  SHORT_INT_MAX,
  SHORT_INT_MIN,
  WIDE_WIDTH,
} from "./format.js";
import { EncodeError, EncodeErrorKind } from "./errors.js";
import type { PackValue } from "./value.js";
import { varintLength } from "./varint.js";

// Furthest a narrow slot can point forward, in bytes.
export const NARROW_REACH = NARROW_DELTA_LIMIT * 2;

// Largest out-of-line scalar: int64 with size byte and pad, or a double.
const MAX_SCALAR_BYTES = 10;

type Collection = PackValue[] | { [key: string]: PackValue };

/**
 * Slot widths chosen by a pre-scan of a value tree.
 *
 * A collection is narrow when everything written after its slots (its own
 * header aside) provably stays within narrow pointer reach of them.
 */
export class WidthPlan {
  constructor(
    private readonly wide: WeakMap<object, boolean>,
    private readonly bounds: WeakMap<object, number>
  ) {}

  isWide(collection: object): boolean {
    return this.wide.get(collection) ?? false;
  }

  /** Upper bound on the bytes `collection` appends when written, if it was scanned. */
  boundOf(collection: object): number | undefined {
    return this.bounds.get(collection);
  }
}

const byteStringBound = (length: number, width: number): number => {
  const payload =
    1 + (length >= LONG_STRING_LENGTH ? varintLength(length) : 0) + length + (length === 0 ? 1 : 0);
  return payload <= width ? 0 : payload + 1;
};

const isShortInt = (value: number | bigint): boolean =>
  typeof value === "bigint"
    ? value >= BigInt(SHORT_INT_MIN) && value <= BigInt(SHORT_INT_MAX)
    : Number.isInteger(value) && value >= SHORT_INT_MIN && value <= SHORT_INT_MAX;

const headerLength = (count: number): number => {
  if (count < LONG_COUNT) {
    return 2;
  }
  const length = 2 + varintLength(count);
  return length + (length & 1);
};

export function planWidths(root: PackValue): WidthPlan {
  const wide = new WeakMap<object, boolean>();
  const bounds = new WeakMap<object, number>();
  const ancestors = new Set<object>();

  // Bytes appended past the slots when `value` is written into a slot of `width`.
  const measure = (value: PackValue, width: number): number => {
    if (value === null || typeof value === "boolean") {
      return 0;
    }
    if (typeof value === "number" || typeof value === "bigint") {
      return isShortInt(value) ? 0 : MAX_SCALAR_BYTES + 1;
    }
    if (typeof value === "string") {
      return byteStringBound(Buffer.byteLength(value, "utf8"), width);
    }
    if (value instanceof Uint8Array) {
      return byteStringBound(value.length, width);
    }
    return measureCollection(value);
  };

  const measureCollection = (collection: Collection): number => {
    const known = bounds.get(collection);
    if (known !== undefined) {
      return known;
    }
    if (ancestors.has(collection)) {
      throw new EncodeError(EncodeErrorKind.InvalidValue, "Cannot encode a cyclic structure");
    }
    ancestors.add(collection);

    const isArray = Array.isArray(collection);
    const values: PackValue[] = Array.isArray(collection) ? collection : Object.values(collection);
    const keys: string[] = Array.isArray(collection) ? [] : Object.keys(collection);

    const body = (width: number): number => {
      let total = values.length * width * (isArray ? 1 : 2);
      for (const key of keys) {
        total += byteStringBound(Buffer.byteLength(key, "utf8"), width);
      }
      for (const item of values) {
        total += measure(item, width);
      }
      return total;
    };

    let bound = 0;
    if (values.length > 0) {
      const narrowBody = body(NARROW_WIDTH);
      const isWide = narrowBody >= NARROW_REACH;
      wide.set(collection, isWide);
      // One pad byte may precede the out-of-line header.
      bound = 1 + headerLength(values.length) + (isWide ? body(WIDE_WIDTH) : narrowBody);
    }

    ancestors.delete(collection);
    bounds.set(collection, bound);
    return bound;
  };

  if (typeof root === "object" && root !== null && !(root instanceof Uint8Array)) {
    measureCollection(root);
  }
  return new WidthPlan(wide, bounds);
}
