import { describe, expect, it } from "vitest";
import { decodeVarint, encodeVarint, varintLength } from "./varint.js";

describe("varint", () => {
  it("encodes seven bits per byte, low group first", () => {
    expect(encodeVarint(0)).toEqual(Buffer.from([0x00]));
    expect(encodeVarint(127)).toEqual(Buffer.from([0x7f]));
    expect(encodeVarint(128)).toEqual(Buffer.from([0x80, 0x01]));
    expect(encodeVarint(40000)).toEqual(Buffer.from([0xc0, 0xb8, 0x02]));
    expect(encodeVarint(2047n)).toEqual(Buffer.from([0xff, 0x0f]));
  });

  it("predicts the encoded length", () => {
    for (const value of [0, 127, 128, 16383, 16384, 40000, 2 ** 35]) {
      expect(varintLength(value)).toBe(encodeVarint(value).length);
    }
  });

  it("decodes from an offset and reports where it stopped", () => {
    expect(decodeVarint(Buffer.from([0xff, 0x80, 0x01, 0x33]), 1)).toEqual({ value: 128, next: 3 });
  });

  it("rejects values beyond the safe integer range", () => {
    expect(decodeVarint(encodeVarint(Number.MAX_SAFE_INTEGER), 0).value).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => decodeVarint(encodeVarint(2n ** 53n), 0)).toThrow(
      "Varint at 0 exceeds the safe integer range"
    );
  });

  it("rejects malformed input", () => {
    expect(() => encodeVarint(-1)).toThrow("Varint cannot be negative: -1");
    expect(() => decodeVarint(Buffer.from([0x80]), 0)).toThrow("Unexpected end of varint at 1");
    expect(() => decodeVarint(Buffer.alloc(11, 0x80), 0)).toThrow("Varint at 0 is longer than 10 bytes");
  });
});
