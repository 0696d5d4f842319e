import {
  FLOAT32_SIZE_FLAG,
  FLOAT64_SIZE_FLAG,
  LONG_COUNT,
  LONG_STRING_LENGTH,
  MAX_COUNT,
  NARROW_DELTA_LIMIT,
  POINTER_FLAG,
  SHORT_INT_MAX,
  SHORT_INT_MIN,
  SpecialValue,
  Tag,
  UNSIGNED_FLAG,
  WIDE_DELTA_LIMIT,
  WIDE_FLAG,
  WIDE_WIDTH,
  slotWidth,
} from "./format.js";
import { EncodeError, EncodeErrorKind } from "./errors.js";
import { ByteSink } from "./sink.js";
import type { OutputSink } from "./sink.js";
import { StringTable } from "./stringTable.js";
import { encodeVarint } from "./varint.js";

export type ScopeKind = "root" | "array" | "dict";

type Scope = {
  kind: ScopeKind;
  /** Slot size in bytes; 0 for the root, which has no slots. */
  width: number;
  count: number;
  remaining: number;
  valueCursor: number;
  keyCursor: number;
  expectingKey: boolean;
  writingKey: boolean;
};

export type ScopeHandle = Readonly<
  Pick<Scope, "kind" | "width" | "count" | "remaining" | "expectingKey">
>;

export type ReadonlyStringTable = Pick<StringTable, "lookup" | "size" | "sharedSizeLimit">;

export type EncoderOptions = {
  sink?: OutputSink;
  /** Longest string, in UTF-8 bytes, that is shared through pointers. */
  sharedStringSizeLimit?: number;
};

export type EncoderStats = {
  values: {
    nulls: number;
    booleans: number;
    integers: number;
    floats: number;
    strings: number;
    binaries: number;
    arrays: number;
    dicts: number;
    keys: number;
  };
  strings: {
    totalCount: number;
    totalBytes: number;
    sharedCount: number;
    sharedBytes: number;
    refreshedCount: number;
  };
  pointers: number;
  inlineValues: number;
};

const PAD = Buffer.from([0]);
const EMPTY = Buffer.alloc(0);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;
const INT64_LIMIT = 2 ** 63;
const INT32_LIMIT = 2 ** 31;

const createStats = (): EncoderStats => ({
  values: {
    nulls: 0,
    booleans: 0,
    integers: 0,
    floats: 0,
    strings: 0,
    binaries: 0,
    arrays: 0,
    dicts: 0,
    keys: 0,
  },
  strings: {
    totalCount: 0,
    totalBytes: 0,
    sharedCount: 0,
    sharedBytes: 0,
    refreshedCount: 0,
  },
  pointers: 0,
  inlineValues: 0,
});

const createRootScope = (): Scope => ({
  kind: "root",
  width: 0,
  count: 1,
  remaining: 1,
  valueCursor: 0,
  keyCursor: 0,
  expectingKey: false,
  writingKey: false,
});

const invalidValue = (message: string): EncodeError =>
  new EncodeError(EncodeErrorKind.InvalidValue, message);

const toBigInt = (value: number | bigint): bigint => {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isInteger(value)) {
    throw invalidValue(`Not an integer: ${value}`);
  }
  return BigInt(value);
};

const signedByteLength = (value: bigint): number => {
  for (let size = 1; size < 8; size += 1) {
    const limit = 1n << BigInt(size * 8 - 1);
    if (value >= -limit && value < limit) {
      return size;
    }
  }
  return 8;
};

const unsignedByteLength = (value: bigint): number => {
  for (let size = 1; size < 8; size += 1) {
    if (value < 1n << BigInt(size * 8)) {
      return size;
    }
  }
  return 8;
};

/**
 * Relative pointer from a slot to an even position, or null when the delta
 * does not fit the slot width.
 */
export const encodePointer = (distance: number, width: number): Buffer | null => {
  if (distance % 2 !== 0) {
    throw new Error(`Pointer distance ${distance} is not 2-byte aligned`);
  }
  const delta = distance / 2;
  const limit = width === WIDE_WIDTH ? WIDE_DELTA_LIMIT : NARROW_DELTA_LIMIT;
  if (delta < -limit || delta >= limit) {
    return null;
  }
  const pointer = Buffer.alloc(width);
  if (width === WIDE_WIDTH) {
    pointer.writeInt32BE(delta, 0);
  } else {
    pointer.writeInt16BE(delta, 0);
  }
  pointer[0] |= POINTER_FLAG;
  return pointer;
};

export const encodeCollectionHeader = (count: number, wide: boolean): Buffer => {
  const long = count >= LONG_COUNT;
  const inlineCount = long ? LONG_COUNT : count;
  const extra = long ? encodeVarint(count) : EMPTY;
  const length = 2 + extra.length + (extra.length & 1);
  const header = Buffer.alloc(length);
  header[0] = (inlineCount >> 8) | (wide ? WIDE_FLAG : 0);
  header[1] = inlineCount & 0xff;
  extra.copy(header, 2);
  return header;
};

/**
 * Single-pass writer for one document at a time.
 *
 * The encoder keeps a stack of open scopes. The bottom entry is the root,
 * which takes exactly one value. Opening an array or dictionary writes its
 * header into the current scope, reserves its slots, and pushes it; a scope
 * is popped as soon as its last declared value has been written.
 *
 * Any error leaves the document unusable: the first failure is kept and
 * rethrown by every later call until `reset()`.
 */
export class Encoder {
  private sink: OutputSink;
  private readonly stringTable: StringTable;
  private readonly scopes: Scope[] = [createRootScope()];
  private error: Error | null = null;
  private stats: EncoderStats = createStats();

  constructor(options: EncoderOptions = {}) {
    this.sink = options.sink ?? new ByteSink();
    this.stringTable = new StringTable(options.sharedStringSizeLimit);
  }

  get output(): OutputSink {
    return this.sink;
  }

  get strings(): ReadonlyStringTable {
    return this.stringTable;
  }

  get failure(): Error | null {
    return this.error;
  }

  /** Open scopes, the root included. */
  get depth(): number {
    return this.scopes.length;
  }

  get current(): ScopeHandle {
    return this.top();
  }

  get isFinished(): boolean {
    return this.scopes.length === 1 && this.scopes[0].remaining === 0;
  }

  getStats(): EncoderStats {
    return {
      values: { ...this.stats.values },
      strings: { ...this.stats.strings },
      pointers: this.stats.pointers,
      inlineValues: this.stats.inlineValues,
    };
  }

  /** Starts a new document, optionally on a new sink. Only legal between documents. */
  reset(sink: OutputSink = new ByteSink()): void {
    if (this.scopes.length > 1) {
      throw new EncodeError(
        EncodeErrorKind.InvalidReset,
        `Cannot reset while ${this.scopes.length - 1} collection(s) are open`
      );
    }
    this.sink = sink;
    this.stringTable.clear();
    this.scopes[0] = createRootScope();
    this.error = null;
    this.stats = createStats();
  }

  writeNull(): void {
    this.run(() => {
      this.putSpecial(SpecialValue.Null);
      this.stats.values.nulls += 1;
    });
  }

  writeBool(value: boolean): void {
    this.run(() => {
      this.putSpecial(value ? SpecialValue.True : SpecialValue.False);
      this.stats.values.booleans += 1;
    });
  }

  writeInt(value: number | bigint): void {
    this.run(() => {
      const n = toBigInt(value);
      if (n < INT64_MIN || n > INT64_MAX) {
        throw invalidValue(`Integer out of 64-bit signed range: ${n}`);
      }
      this.putInt(n, false);
      this.stats.values.integers += 1;
    });
  }

  writeUInt(value: number | bigint): void {
    this.run(() => {
      const n = toBigInt(value);
      if (n < 0n || n > UINT64_MAX) {
        throw invalidValue(`Integer out of 64-bit unsigned range: ${n}`);
      }
      this.putInt(n, true);
      this.stats.values.integers += 1;
    });
  }

  writeDouble(value: number): void {
    this.run(() => {
      if (Number.isNaN(value)) {
        throw invalidValue("Can't write NaN");
      }
      if (Number.isInteger(value) && value >= -INT64_LIMIT && value < INT64_LIMIT) {
        this.putInt(BigInt(value), false);
        this.stats.values.integers += 1;
        return;
      }
      const payload = Buffer.alloc(10);
      payload[0] = FLOAT64_SIZE_FLAG;
      payload.writeDoubleLE(value, 2);
      this.place(Tag.Float, payload, true);
      this.stats.values.floats += 1;
    });
  }

  /** Writes `value` rounded to single precision. */
  writeFloat(value: number): void {
    this.run(() => {
      const single = Math.fround(value);
      if (Number.isNaN(single)) {
        throw invalidValue("Can't write NaN");
      }
      if (Number.isInteger(single) && single >= -INT32_LIMIT && single < INT32_LIMIT) {
        this.putInt(BigInt(single), false);
        this.stats.values.integers += 1;
        return;
      }
      const payload = Buffer.alloc(6);
      payload[0] = FLOAT32_SIZE_FLAG;
      payload.writeFloatLE(single, 2);
      this.place(Tag.Float, payload, true);
      this.stats.values.floats += 1;
    });
  }

  writeString(value: string): void {
    this.run(() => {
      this.putString(value);
      this.stats.values.strings += 1;
    });
  }

  writeData(value: Uint8Array): void {
    this.run(() => {
      this.putData(Tag.Binary, value);
      this.stats.values.binaries += 1;
    });
  }

  writeKey(key: string): void {
    this.run(() => {
      const scope = this.top();
      if (scope.remaining === 0) {
        throw this.collectionFull(scope);
      }
      if (scope.kind !== "dict") {
        throw new EncodeError(
          EncodeErrorKind.ProtocolViolation,
          `Keys can only be written inside a dictionary, not the ${scope.kind}`
        );
      }
      if (!scope.expectingKey) {
        throw new EncodeError(
          EncodeErrorKind.ProtocolViolation,
          "Need a value after the previous key"
        );
      }
      scope.writingKey = true;
      this.putString(key);
      this.stats.values.keys += 1;
    });
  }

  beginArray(count: number, wide = false): ScopeHandle {
    return this.run(() => this.begin("array", count, wide));
  }

  beginDict(count: number, wide = false): ScopeHandle {
    return this.run(() => this.begin("dict", count, wide));
  }

  /** Asserts that every slot of `scope` was filled. Writes nothing. */
  end(scope: ScopeHandle): void {
    this.run(() => {
      if (scope.remaining !== 0) {
        throw new EncodeError(
          EncodeErrorKind.IncompleteCollection,
          `Not all items were written: ${scope.remaining} of ${scope.count} missing from ${scope.kind}`
        );
      }
    });
  }

  finish(): void {
    this.run(() => {
      if (!this.isFinished) {
        const open = this.scopes.length - 1;
        throw new EncodeError(
          EncodeErrorKind.IncompleteCollection,
          open > 0
            ? `Document is incomplete: ${open} collection(s) still open`
            : "Document is incomplete: no root value was written"
        );
      }
    });
  }

  private run<T>(operation: () => T): T {
    if (this.error) {
      throw this.error;
    }
    try {
      const result = operation();
      this.settle();
      return result;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.error = failure;
      throw failure;
    }
  }

  private top(): Scope {
    return this.scopes[this.scopes.length - 1];
  }

  /** Pops every scope whose values are all written; the root always stays. */
  private settle(): void {
    while (this.scopes.length > 1 && this.top().remaining === 0) {
      this.scopes.pop();
    }
  }

  private collectionFull(scope: Scope): EncodeError {
    return new EncodeError(
      EncodeErrorKind.CollectionFull,
      scope.kind === "root"
        ? "The document already has its root value"
        : `No more space in ${scope.kind} of ${scope.count}`
    );
  }

  private checkWritable(scope: Scope): void {
    if (scope.remaining === 0) {
      throw this.collectionFull(scope);
    }
    if (scope.expectingKey && !scope.writingKey) {
      throw new EncodeError(EncodeErrorKind.KeyExpected, "Need a key before this value");
    }
  }

  /**
   * Puts one encoded value into the current scope: appended at the root,
   * copied into the next slot when it fits, or appended out of line with a
   * pointer left in the slot. Returns the value's absolute position.
   */
  private place(tag: Tag, payload: Buffer, canInline: boolean): number {
    const scope = this.top();
    this.checkWritable(scope);

    if ((payload[0] & 0xf0) !== 0) {
      throw new Error(`First byte of ${Tag[tag]} payload overlaps the tag nibble`);
    }
    payload[0] |= tag << 4;

    let position: number;
    if (scope.kind === "root") {
      position = this.sink.append(payload);
    } else {
      const slot = scope.writingKey ? scope.keyCursor : scope.valueCursor;
      if (canInline && payload.length <= scope.width) {
        if (payload.length < scope.width) {
          const padded = Buffer.alloc(scope.width);
          payload.copy(padded);
          this.sink.rewrite(slot, padded);
        } else {
          this.sink.rewrite(slot, payload);
        }
        position = slot;
        this.stats.inlineValues += 1;
      } else {
        if (this.sink.length % 2 !== 0) {
          this.sink.append(PAD);
        }
        position = this.sink.length;
        const pointer = encodePointer(position - slot, scope.width);
        if (!pointer) {
          throw new EncodeError(
            EncodeErrorKind.PointerOutOfRange,
            `Delta too large to write value: ${position - slot} bytes from a ${scope.width}-byte slot`
          );
        }
        this.sink.rewrite(slot, pointer);
        this.sink.append(payload);
        this.stats.pointers += 1;
      }
    }

    this.advance(scope);
    return position;
  }

  /** Fills the next slot with a pointer to an earlier value; false if out of reach. */
  private placePointer(target: number): boolean {
    const scope = this.top();
    this.checkWritable(scope);
    if (scope.kind === "root") {
      throw new Error("The root scope has no slot to hold a pointer");
    }
    const slot = scope.writingKey ? scope.keyCursor : scope.valueCursor;
    const pointer = encodePointer(target - slot, scope.width);
    if (!pointer) {
      return false;
    }
    this.sink.rewrite(slot, pointer);
    this.stats.pointers += 1;
    this.advance(scope);
    return true;
  }

  private advance(scope: Scope): void {
    if (scope.writingKey) {
      scope.keyCursor += scope.width;
      scope.writingKey = false;
      scope.expectingKey = false;
      return;
    }
    scope.valueCursor += scope.width;
    scope.remaining -= 1;
    if (scope.kind === "dict") {
      scope.expectingKey = scope.remaining > 0;
    }
  }

  private putSpecial(special: SpecialValue): void {
    this.place(Tag.Special, Buffer.from([special, 0]), true);
  }

  private putInt(value: bigint, unsigned: boolean): void {
    if (value >= BigInt(SHORT_INT_MIN) && value <= BigInt(SHORT_INT_MAX)) {
      const short = Number(value);
      this.place(Tag.ShortInt, Buffer.from([(short >> 8) & 0x0f, short & 0xff]), true);
      return;
    }
    const size = unsigned ? unsignedByteLength(value) : signedByteLength(value);
    const payload = Buffer.alloc(1 + size + ((1 + size) & 1));
    payload[0] = (size - 1) | (unsigned ? UNSIGNED_FLAG : 0);
    let bits = BigInt.asUintN(size * 8, value);
    for (let i = 0; i < size; i += 1) {
      payload[1 + i] = Number(bits & 0xffn);
      bits >>= 8n;
    }
    this.place(Tag.Int, payload, true);
  }

  private putData(tag: Tag.String | Tag.Binary, data: Uint8Array): number {
    const length = data.length;
    const extra = length >= LONG_STRING_LENGTH ? encodeVarint(length) : EMPTY;
    const payload = Buffer.alloc(1 + extra.length + length + (length === 0 ? 1 : 0));
    payload[0] = Math.min(length, LONG_STRING_LENGTH);
    extra.copy(payload, 1);
    payload.set(data, 1 + extra.length);
    return this.place(tag, payload, true);
  }

  private putString(content: string): void {
    const scope = this.top();
    const data = Buffer.from(content, "utf8");

    if (this.stringTable.isEligible(data.length, scope.width)) {
      const cached = this.stringTable.lookup(content);
      if (cached !== undefined) {
        if (this.placePointer(cached)) {
          this.countString(data.length);
          this.stats.strings.sharedCount += 1;
          this.stats.strings.sharedBytes += data.length;
          return;
        }
        this.stats.strings.refreshedCount += 1;
      }
      // A fresh instance replaces any cached one that has fallen out of reach.
      this.stringTable.remember(content, this.putData(Tag.String, data));
    } else {
      this.putData(Tag.String, data);
    }
    this.countString(data.length);
  }

  private countString(byteLength: number): void {
    this.stats.strings.totalCount += 1;
    this.stats.strings.totalBytes += byteLength;
  }

  private begin(kind: "array" | "dict", count: number, wide: boolean): Scope {
    if (!Number.isInteger(count) || count < 0 || count > MAX_COUNT) {
      throw invalidValue(`Invalid ${kind} count: ${count}`);
    }
    const width = slotWidth(wide);

    // Only an empty collection may sit inside its parent's slot; otherwise the
    // slots must directly follow the header.
    this.place(kind === "dict" ? Tag.Dict : Tag.Array, encodeCollectionHeader(count, wide), count === 0);

    const scope: Scope = {
      kind,
      width,
      count,
      remaining: count,
      valueCursor: 0,
      keyCursor: 0,
      expectingKey: kind === "dict" && count > 0,
      writingKey: false,
    };
    if (count > 0) {
      const block = count * width;
      const start = this.sink.reserve(kind === "dict" ? block * 2 : block);
      if (kind === "dict") {
        scope.keyCursor = start;
        scope.valueCursor = start + block;
      } else {
        scope.valueCursor = start;
      }
    }
    this.scopes.push(scope);

    if (kind === "dict") {
      this.stats.values.dicts += 1;
    } else {
      this.stats.values.arrays += 1;
    }
    return scope;
  }
}
