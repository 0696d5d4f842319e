import { access, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { EncodeErrorKind } from "../binary/errors.js";
import { decode } from "../binary/reader.js";
import { convertJsonFile, isSameDocument } from "../cli/convert.js";

const prepare = async (payload: string) => {
  const tempDir = await mkdtemp(path.join(tmpdir(), "slotpack-"));
  const inputPath = path.join(tempDir, "input.json");
  const outputPath = path.join(tempDir, "output.bin");
  await writeFile(inputPath, payload, "utf8");
  return { inputPath, outputPath };
};

describe("end-to-end conversion", () => {
  it("writes a document that reads back as the input JSON", async () => {
    const document = {
      message: "hi",
      items: [1, 2.5, -3000, true, null],
      nested: { message: "hi", id: 9007199254740993n },
    };
    const payload =
      '{"message":"hi","items":[1,2.5,-3000,true,null],"nested":{"message":"hi","id":9007199254740993}}';
    const { inputPath, outputPath } = await prepare(payload);

    const report = await convertJsonFile({ inputPath, outputPath, verify: true });

    const output = await readFile(outputPath);
    expect(report.verified).toBe(true);
    expect(report.outputBytes).toBe(output.length);
    expect(decode(output)).toEqual(document);
    expect(report.stats.values.dicts).toBe(2);
    expect(report.stats.values.arrays).toBe(1);
    expect(report.stats.values.keys).toBe(5);
  });

  it("verifies whole-number doubles that come back as integers", async () => {
    const { inputPath, outputPath } = await prepare('{"big":1e17,"negative":-0,"small":1e2,"ratio":0.5}');

    const report = await convertJsonFile({ inputPath, outputPath, verify: true });

    expect(report.verified).toBe(true);
    expect(decode(await readFile(outputPath))).toEqual({
      big: 100000000000000000n,
      negative: 0,
      small: 100,
      ratio: 0.5,
    });
  });

  it("shares repeated strings and keys", async () => {
    const { inputPath, outputPath } = await prepare(
      '[{"status":"pending"},{"status":"pending"},{"status":"pending"}]'
    );

    const report = await convertJsonFile({ inputPath, outputPath });

    expect(report.stats.strings.totalCount).toBe(6);
    expect(report.stats.strings.sharedCount).toBe(4);
    const output = await readFile(outputPath);
    expect(output.indexOf("pending")).toBe(output.lastIndexOf("pending"));
  });

  it("fails without writing when narrow pointers cannot reach", async () => {
    const { inputPath, outputPath } = await prepare(JSON.stringify(["x".repeat(40000), "tail-value"]));

    await expect(convertJsonFile({ inputPath, outputPath, width: "narrow" })).rejects.toMatchObject({
      kind: EncodeErrorKind.PointerOutOfRange,
    });
    await expect(access(outputPath)).rejects.toThrow();

    const report = await convertJsonFile({ inputPath, outputPath, width: "auto", verify: true });
    expect(report.verified).toBe(true);
  });
});

describe("isSameDocument", () => {
  it("matches a whole-number double with the integer it decodes to", () => {
    expect(isSameDocument(1e17, 100000000000000000n)).toBe(true);
    expect(isSameDocument({ list: [2 ** 60] }, { list: [2n ** 60n] })).toBe(true);
    expect(isSameDocument(-0, 0)).toBe(true);
  });

  it("still tells different documents apart", () => {
    expect(isSameDocument(1.5, 1n)).toBe(false);
    expect(isSameDocument(1e17, 100000000000000001n)).toBe(false);
    expect(isSameDocument({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(isSameDocument({ a: 1 }, { b: 1 })).toBe(false);
    expect(isSameDocument([1, 2], [1])).toBe(false);
    expect(isSameDocument([], {})).toBe(false);
    expect(isSameDocument("1", 1)).toBe(false);
    expect(isSameDocument(Buffer.from([1, 2]), Buffer.from([1, 3]))).toBe(false);
  });
});
