import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
import type { PackValue } from "../binary/value.js";
import { TreeBuilder } from "./treeBuilder.js";
const { parser } = pkg;

export interface JsonEventSink {
  startObject(): void;
  endObject(): void;
  startArray(): void;
  endArray(): void;
  key(key: string): void;
  string(value: string): void;
  number(value: number | bigint): void;
  boolean(value: boolean): void;
  null(): void;
}

type JsonToken = {
  name: string;
  value?: unknown;
};

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Integers keep full precision as bigint once they leave the safe range;
 * everything else is a double.
 */
export const parseNumberToken = (text: string): number | bigint => {
  if (INTEGER_PATTERN.test(text)) {
    const value = BigInt(text);
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
    return value;
  }
  const value = Number(text);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid number token: ${text}`);
  }
  return value;
};

const forwardToken = (sink: JsonEventSink, token: JsonToken): void => {
  switch (token.name) {
    case "startObject":
      return sink.startObject();
    case "endObject":
      return sink.endObject();
    case "startArray":
      return sink.startArray();
    case "endArray":
      return sink.endArray();
    case "keyValue":
      return sink.key(String(token.value ?? ""));
    case "stringValue":
      return sink.string(String(token.value ?? ""));
    case "numberValue":
      if (token.value === undefined) {
        throw new Error("Number token missing value");
      }
      return sink.number(parseNumberToken(String(token.value)));
    case "trueValue":
      return sink.boolean(true);
    case "falseValue":
      return sink.boolean(false);
    case "nullValue":
      return sink.null();
    default:
      // Streamed chunks (startString, stringChunk, ...) duplicate the packed values.
      return;
  }
};

const createEventWritable = (sink: JsonEventSink): Writable =>
  new Writable({
    objectMode: true,
    write(chunk: JsonToken, _encoding, callback) {
      try {
        forwardToken(sink, chunk);
        callback();
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });

export const createStreamParser = (sink: JsonEventSink): { parser: Transform; sink: Writable } => {
  const parserStream = parser();
  return { parser: parserStream, sink: createEventWritable(sink) };
};

export const streamJsonEvents = async (readable: Readable, sink: JsonEventSink): Promise<void> => {
  const { parser: parserStream, sink: writable } = createStreamParser(sink);
  await pipeline(readable, parserStream, writable);
};

export const parseJsonStream = async (readable: Readable): Promise<PackValue> => {
  const builder = new TreeBuilder();
  await streamJsonEvents(readable, builder);
  return builder.result();
};
