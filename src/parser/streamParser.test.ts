import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { JsonEventSink } from "./streamParser.js";
import { parseJsonStream, parseNumberToken, streamJsonEvents } from "./streamParser.js";
import { TreeBuilder } from "./treeBuilder.js";

type Event =
  | { type: "startObject" }
  | { type: "endObject" }
  | { type: "startArray" }
  | { type: "endArray" }
  | { type: "key"; value: string }
  | { type: "string"; value: string }
  | { type: "number"; value: number | bigint }
  | { type: "boolean"; value: boolean }
  | { type: "null" };

class RecordingSink implements JsonEventSink {
  readonly events: Event[] = [];

  startObject(): void {
    this.events.push({ type: "startObject" });
  }

  endObject(): void {
    this.events.push({ type: "endObject" });
  }

  startArray(): void {
    this.events.push({ type: "startArray" });
  }

  endArray(): void {
    this.events.push({ type: "endArray" });
  }

  key(key: string): void {
    this.events.push({ type: "key", value: key });
  }

  string(value: string): void {
    this.events.push({ type: "string", value });
  }

  number(value: number | bigint): void {
    this.events.push({ type: "number", value });
  }

  boolean(value: boolean): void {
    this.events.push({ type: "boolean", value });
  }

  null(): void {
    this.events.push({ type: "null" });
  }
}

const recordJson = async (payload: string): Promise<RecordingSink> => {
  const sink = new RecordingSink();
  await streamJsonEvents(Readable.from([payload]), sink);
  return sink;
};

describe("stream parser", () => {
  it("emits the expected sequence for a small object", async () => {
    const sink = await recordJson('{"name":"Ada","age":42}');

    expect(sink.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "name" },
      { type: "string", value: "Ada" },
      { type: "key", value: "age" },
      { type: "number", value: 42 },
      { type: "endObject" },
    ]);
  });

  it("handles arrays, objects, strings, numbers, booleans, and nulls", async () => {
    const sink = await recordJson(
      '{"items":[1,"two",false,null,{"ok":true}],"empty":{},"value":null}'
    );

    expect(sink.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "items" },
      { type: "startArray" },
      { type: "number", value: 1 },
      { type: "string", value: "two" },
      { type: "boolean", value: false },
      { type: "null" },
      { type: "startObject" },
      { type: "key", value: "ok" },
      { type: "boolean", value: true },
      { type: "endObject" },
      { type: "endArray" },
      { type: "key", value: "empty" },
      { type: "startObject" },
      { type: "endObject" },
      { type: "key", value: "value" },
      { type: "null" },
      { type: "endObject" },
    ]);
  });

  it("keeps integers beyond the safe range exact", async () => {
    const sink = await recordJson("[9007199254740993,-12,2.5e3]");
    expect(sink.events).toEqual([
      { type: "startArray" },
      { type: "number", value: 9007199254740993n },
      { type: "number", value: -12 },
      { type: "number", value: 2500 },
      { type: "endArray" },
    ]);
  });

  it("builds a value tree from a chunked stream", async () => {
    const value = await parseJsonStream(Readable.from(['{"list":[1,', '"a"],"ok":tr', "ue}"]));
    expect(value).toEqual({ list: [1, "a"], ok: true });
  });

  it("rejects malformed JSON", async () => {
    await expect(parseJsonStream(Readable.from(['{"open":']))).rejects.toThrow();
  });
});

describe("parseNumberToken", () => {
  it("returns doubles unless an integer needs more precision", () => {
    expect(parseNumberToken("42")).toBe(42);
    expect(parseNumberToken("-7")).toBe(-7);
    expect(parseNumberToken("1.5")).toBe(1.5);
    expect(parseNumberToken("1e3")).toBe(1000);
    expect(parseNumberToken("9007199254740991")).toBe(9007199254740991);
    expect(parseNumberToken("-9007199254740993")).toBe(-9007199254740993n);
  });

  it("rejects text that is not a number", () => {
    expect(() => parseNumberToken("1.2.3")).toThrow("Invalid number token: 1.2.3");
  });
});

describe("TreeBuilder", () => {
  it("stores keys as own properties, including __proto__", () => {
    const builder = new TreeBuilder();
    builder.startObject();
    builder.key("__proto__");
    builder.string("x");
    builder.endObject();

    const value = builder.result();
    expect(Object.keys(value ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
  });

  it("refuses to return an unfinished document", () => {
    const builder = new TreeBuilder();
    expect(() => builder.result()).toThrow("Incomplete JSON document");
    builder.startArray();
    expect(() => builder.result()).toThrow("Incomplete JSON document");
  });

  it("rejects a second top-level value", () => {
    const builder = new TreeBuilder();
    builder.null();
    expect(() => builder.boolean(true)).toThrow("Multiple top-level JSON values");
  });

  it("rejects mismatched closers", () => {
    const builder = new TreeBuilder();
    builder.startArray();
    expect(() => builder.endObject()).toThrow("Unbalanced object");
  });
});
