#!/usr/bin/env node
import { convertJsonFile } from "./convert.js";
import type { WidthMode } from "../binary/tree.js";

const args = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value) {
    consumedArgs.add(index + 1);
  }
  return value;
};

const readFlag = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return false;
  }
  consumedArgs.add(index);
  return true;
};

const isWidthMode = (value: string): value is WidthMode =>
  value === "narrow" || value === "wide" || value === "auto";

function usage(): never {
  console.error(
    "Usage: slotpack <input.json> <output.bin> " +
      "or slotpack --input <input.json> --output <output.bin> " +
      "[--width narrow|wide|auto] [--shared-limit <bytes>] [--verify]"
  );
  process.exit(1);
}

const inputFlag = readFlagValue("--input");
const outputFlag = readFlagValue("--output");
const widthFlag = readFlagValue("--width") ?? "auto";
const sharedLimitFlag = readFlagValue("--shared-limit");
const verify = readFlag("--verify");
const positionalArgs = args.filter(
  (value, index) => !consumedArgs.has(index) && !value.startsWith("--")
);

const inputPath = inputFlag ?? positionalArgs[0];
const outputPath = outputFlag ?? positionalArgs[1];

if (!inputPath || !outputPath) {
  usage();
}

if (!isWidthMode(widthFlag)) {
  console.error(`Invalid --width "${widthFlag}": expected narrow, wide or auto`);
  usage();
}

const sharedStringSizeLimit = sharedLimitFlag === undefined ? undefined : Number(sharedLimitFlag);
if (sharedStringSizeLimit !== undefined && (!Number.isInteger(sharedStringSizeLimit) || sharedStringSizeLimit < 0)) {
  console.error(`Invalid --shared-limit "${sharedLimitFlag}": expected a non-negative integer`);
  usage();
}

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const run = async (input: string, output: string, width: WidthMode): Promise<void> => {
  try {
    console.log(`Input JSON: ${input}`);
    console.log(`Output document: ${output}`);

    const report = await convertJsonFile({
      inputPath: input,
      outputPath: output,
      width,
      sharedStringSizeLimit,
      verify,
      signal: abortController.signal,
    });

    const { stats } = report;
    console.log(`Success: ${report.outputBytes} bytes written${report.verified ? " (verified)" : ""}.`);
    console.log("Encoding Report:");
    console.log("  Values:");
    console.log(`    Dicts:    ${stats.values.dicts}`);
    console.log(`    Arrays:   ${stats.values.arrays}`);
    console.log(`    Keys:     ${stats.values.keys}`);
    console.log(`    Strings:  ${stats.values.strings}`);
    console.log(`    Integers: ${stats.values.integers}`);
    console.log(`    Floats:   ${stats.values.floats}`);
    console.log(`    Booleans: ${stats.values.booleans}`);
    console.log(`    Nulls:    ${stats.values.nulls}`);
    console.log("  Layout:");
    console.log(`    Inline values: ${stats.inlineValues}`);
    console.log(`    Pointers:      ${stats.pointers}`);
    console.log("  String Sharing:");
    console.log(`    Total Strings:  ${stats.strings.totalCount}`);
    console.log(`    Total Bytes:    ${stats.strings.totalBytes}`);
    console.log(`    Shared Strings: ${stats.strings.sharedCount}`);
    console.log(`    Re-written:     ${stats.strings.refreshedCount}`);
    if (stats.strings.totalBytes > 0) {
      const ratio = (stats.strings.sharedBytes / stats.strings.totalBytes) * 100;
      console.log(`    Saved:          ${stats.strings.sharedBytes} bytes (${ratio.toFixed(2)}%)`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
};

if (inputPath && outputPath && isWidthMode(widthFlag)) {
  void run(inputPath, outputPath, widthFlag);
}
