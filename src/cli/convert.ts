import { Encoder } from "../binary/encoder.js";
import type { EncoderStats } from "../binary/encoder.js";
import { decode } from "../binary/reader.js";
import { ByteSink } from "../binary/sink.js";
import { encodeValue } from "../binary/tree.js";
import type { WidthMode } from "../binary/tree.js";
import { createReadStream, createWriteStream, writeAll } from "../io/streams.js";
import { parseJsonStream } from "../parser/streamParser.js";
import type { PackObject, PackValue } from "../binary/value.js";

export type ConvertOptions = {
  inputPath: string;
  outputPath: string;
  width?: WidthMode;
  sharedStringSizeLimit?: number;
  verify?: boolean;
  signal?: AbortSignal;
};

export type ConvertReport = {
  outputBytes: number;
  stats: EncoderStats;
  verified: boolean;
};

/**
 * Deep equality of an input tree and its decoded form. A whole-number double
 * and a bigint of the same value count as equal, since both encode to the
 * same integer.
 */
export const isSameDocument = (input: PackValue, decoded: PackValue): boolean => {
  if (typeof input === "number" && typeof decoded === "bigint") {
    return Number.isInteger(input) && BigInt(input) === decoded;
  }
  if (typeof input === "bigint" && typeof decoded === "number") {
    return isSameDocument(decoded, input);
  }
  if (input instanceof Uint8Array || decoded instanceof Uint8Array) {
    return (
      input instanceof Uint8Array &&
      decoded instanceof Uint8Array &&
      Buffer.compare(input, decoded) === 0
    );
  }
  if (Array.isArray(input) || Array.isArray(decoded)) {
    if (!Array.isArray(input) || !Array.isArray(decoded) || input.length !== decoded.length) {
      return false;
    }
    const items: PackValue[] = decoded;
    return input.every((item, index) => isSameDocument(item, items[index]));
  }
  if (typeof input === "object" && input !== null && typeof decoded === "object" && decoded !== null) {
    const left: PackObject = input;
    const right: PackObject = decoded;
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every((key) => Object.hasOwn(right, key) && isSameDocument(left[key], right[key]))
    );
  }
  return input === decoded;
};

export const convertJsonFile = async (options: ConvertOptions): Promise<ConvertReport> => {
  const value = await parseJsonStream(createReadStream(options.inputPath, options.signal));

  const sink = new ByteSink();
  const encoder = new Encoder({ sink, sharedStringSizeLimit: options.sharedStringSizeLimit });
  encodeValue(encoder, value, options.width);
  encoder.finish();
  const bytes = sink.bytes();

  if (options.verify && !isSameDocument(value, decode(bytes))) {
    throw new Error("Verification failed: decoded output differs from the input document");
  }

  await writeAll(createWriteStream(options.outputPath, options.signal), bytes);

  return {
    outputBytes: bytes.length,
    stats: encoder.getStats(),
    verified: options.verify === true,
  };
};
