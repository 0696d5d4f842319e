import { describe, expect, it } from "vitest";
import { Encoder } from "./encoder.js";
import { decode } from "./reader.js";
import { ByteSink } from "./sink.js";
import { StringTable } from "./stringTable.js";

const SHARED = "shared-string";

describe("StringTable", () => {
  it("only admits strings at least one slot wide and within the limit", () => {
    const table = new StringTable();
    expect(table.sharedSizeLimit).toBe(100);
    expect(table.isEligible(2, 2)).toBe(true);
    expect(table.isEligible(1, 2)).toBe(false);
    expect(table.isEligible(3, 4)).toBe(false);
    expect(table.isEligible(100, 4)).toBe(true);
    expect(table.isEligible(101, 4)).toBe(false);
    expect(table.isEligible(20, 0)).toBe(false);
  });

  it("keeps the latest position per string until cleared", () => {
    const table = new StringTable(8);
    table.remember("alpha", 10);
    table.remember("alpha", 42);
    table.remember("beta", 12);
    expect(table.lookup("alpha")).toBe(42);
    expect(table.size).toBe(2);
    table.clear();
    expect(table.lookup("alpha")).toBeUndefined();
    expect(table.size).toBe(0);
  });

  it("rejects a negative or fractional limit", () => {
    expect(() => new StringTable(-1)).toThrow(RangeError);
    expect(() => new StringTable(2.5)).toThrow("Invalid shared string size limit: 2.5");
  });
});

describe("string sharing", () => {
  const writeArray = (encoder: Encoder, items: string[], wide = false): void => {
    const scope = encoder.beginArray(items.length, wide);
    for (const item of items) {
      encoder.writeString(item);
    }
    encoder.end(scope);
    encoder.finish();
  };

  it("points repeated strings at the first instance", () => {
    const sink = new ByteSink();
    const encoder = new Encoder({ sink });
    writeArray(encoder, [SHARED, SHARED]);

    const output = sink.bytes();
    expect(output.length).toBe(20);
    expect(output.subarray(2, 6)).toEqual(Buffer.from([0x80, 0x02, 0x80, 0x01]));
    expect(encoder.strings.lookup(SHARED)).toBe(6);
    expect(decode(output)).toEqual([SHARED, SHARED]);

    const stats = encoder.getStats();
    expect(stats.strings.sharedCount).toBe(1);
    expect(stats.strings.sharedBytes).toBe(13);
    expect(stats.strings.totalCount).toBe(2);
    expect(stats.strings.totalBytes).toBe(26);
  });

  it("costs only one slot for a repeat", () => {
    const once = new ByteSink();
    writeArray(new Encoder({ sink: once }), [SHARED]);
    const twice = new ByteSink();
    writeArray(new Encoder({ sink: twice }), [SHARED, SHARED]);
    expect(once.length).toBe(18);
    expect(twice.length - once.length).toBe(2);
  });

  it("shares dictionary keys across dictionaries", () => {
    const sink = new ByteSink();
    const encoder = new Encoder({ sink });
    const outer = encoder.beginArray(2);
    for (let i = 0; i < 2; i += 1) {
      const dict = encoder.beginDict(1);
      encoder.writeKey("name");
      encoder.writeInt(1);
      encoder.end(dict);
    }
    encoder.end(outer);
    encoder.finish();

    expect(encoder.getStats().strings.sharedCount).toBe(1);
    expect(decode(sink.bytes())).toEqual([{ name: 1 }, { name: 1 }]);
  });

  it("writes strings narrower than a slot inline every time", () => {
    const sink = new ByteSink();
    const encoder = new Encoder({ sink });
    writeArray(encoder, ["abc", "abc"], true);
    expect(sink.bytes()).toEqual(
      Buffer.from([0x68, 0x02, 0x43, 0x61, 0x62, 0x63, 0x43, 0x61, 0x62, 0x63])
    );
    expect(encoder.strings.size).toBe(0);
  });

  it("does not share strings over the size limit", () => {
    const limited = new ByteSink();
    const encoder = new Encoder({ sink: limited, sharedStringSizeLimit: 8 });
    writeArray(encoder, ["ninechars", "ninechars"]);
    expect(limited.length).toBe(26);
    expect(encoder.strings.size).toBe(0);

    const unlimited = new ByteSink();
    writeArray(new Encoder({ sink: unlimited }), ["ninechars", "ninechars"]);
    expect(unlimited.length).toBe(16);
  });

  it("never caches the root string", () => {
    const encoder = new Encoder();
    encoder.writeString(SHARED);
    encoder.finish();
    expect(encoder.strings.size).toBe(0);
  });

  it("writes a fresh copy when the cached one is out of reach", () => {
    const sink = new ByteSink();
    const encoder = new Encoder({ sink });
    const outer = encoder.beginArray(3, true);
    encoder.writeString(SHARED);
    encoder.writeData(Buffer.alloc(40000));
    const inner = encoder.beginArray(1);
    encoder.writeString(SHARED);
    encoder.end(inner);
    encoder.end(outer);
    encoder.finish();

    const output = sink.bytes();
    expect(output.length).toBe(40050);
    expect(encoder.strings.lookup(SHARED)).toBe(40036);
    expect(output.indexOf(SHARED)).toBe(15);
    expect(output.lastIndexOf(SHARED)).toBe(40037);

    const stats = encoder.getStats();
    expect(stats.strings.refreshedCount).toBe(1);
    expect(stats.strings.sharedCount).toBe(0);
    expect(decode(output)).toEqual([SHARED, Buffer.alloc(40000), [SHARED]]);
  });
});
