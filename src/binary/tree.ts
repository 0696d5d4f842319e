import { Encoder } from "./encoder.js";
import { EncodeError, EncodeErrorKind, isEncodeError } from "./errors.js";
import { planWidths } from "./analyzer.js";
import { ByteSink } from "./sink.js";
import { isPackObject } from "./value.js";
import type { PackValue } from "./value.js";

export type WidthMode = "narrow" | "wide" | "auto";

export type EncodeOptions = {
  /** Slot width for every collection, or "auto" to pick per collection. Default "auto". */
  width?: WidthMode;
  sharedStringSizeLimit?: number;
};

export type EncodeResult = { ok: true; bytes: Buffer } | { ok: false; error: EncodeError };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const invalidValue = (message: string): EncodeError =>
  new EncodeError(EncodeErrorKind.InvalidValue, message);

/** Writes `value` and everything below it into the encoder's current scope. */
export function encodeValue(encoder: Encoder, value: PackValue, width: WidthMode = "auto"): void {
  const plan = width === "auto" ? planWidths(value) : undefined;
  const isWide = (collection: object): boolean => (plan ? plan.isWide(collection) : width === "wide");
  const ancestors = new Set<object>();

  const enter = (collection: object): void => {
    if (ancestors.has(collection)) {
      throw invalidValue("Cannot encode a cyclic structure");
    }
    ancestors.add(collection);
  };

  const write = (item: PackValue): void => {
    if (item === null) {
      encoder.writeNull();
      return;
    }
    switch (typeof item) {
      case "boolean":
        encoder.writeBool(item);
        return;
      case "number":
        encoder.writeDouble(item);
        return;
      case "bigint":
        if (item >= INT64_MIN && item <= INT64_MAX) {
          encoder.writeInt(item);
        } else {
          encoder.writeUInt(item);
        }
        return;
      case "string":
        encoder.writeString(item);
        return;
      case "object":
        break;
      default:
        throw invalidValue(`Cannot encode a value of type ${typeof item}`);
    }

    if (item instanceof Uint8Array) {
      encoder.writeData(item);
      return;
    }

    if (Array.isArray(item)) {
      enter(item);
      const scope = encoder.beginArray(item.length, isWide(item));
      for (const element of item) {
        write(element);
      }
      encoder.end(scope);
      ancestors.delete(item);
      return;
    }

    if (!isPackObject(item)) {
      throw invalidValue("Only plain objects can be encoded as dictionaries");
    }
    enter(item);
    const entries = Object.entries(item);
    const scope = encoder.beginDict(entries.length, isWide(item));
    for (const [key, entry] of entries) {
      encoder.writeKey(key);
      write(entry);
    }
    encoder.end(scope);
    ancestors.delete(item);
  };

  write(value);
}

export function encode(value: PackValue, options: EncodeOptions = {}): Buffer {
  const sink = new ByteSink();
  const encoder = new Encoder({ sink, sharedStringSizeLimit: options.sharedStringSizeLimit });
  encodeValue(encoder, value, options.width);
  encoder.finish();
  return sink.bytes();
}

/** Like `encode`, but reports encoding failures as a result instead of throwing. */
export function tryEncode(value: PackValue, options: EncodeOptions = {}): EncodeResult {
  try {
    return { ok: true, bytes: encode(value, options) };
  } catch (error) {
    if (isEncodeError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
