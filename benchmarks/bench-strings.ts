import { Encoder } from "../src/binary/encoder.js";

// Compares output size with sharing on and off for a string-heavy array.
async function main() {
  const count = 200_000;
  const words = Array.from({ length: 500 }, (_, i) => `category-${i.toString(36)}-label`);

  for (const limit of [0, 100]) {
    const encoder = new Encoder({ sharedStringSizeLimit: limit });
    const start = process.hrtime.bigint();

    const scope = encoder.beginArray(count, true);
    for (let i = 0; i < count; i++) {
      encoder.writeString(words[i % words.length]);
    }
    encoder.end(scope);
    encoder.finish();

    const end = process.hrtime.bigint();
    const stats = encoder.getStats();
    console.log(`sharedStringSizeLimit=${limit}`);
    console.log(`  Output:  ${encoder.output.length} bytes`);
    console.log(`  Shared:  ${stats.strings.sharedCount} of ${stats.strings.totalCount}`);
    console.log(`  Time:    ${(Number(end - start) / 1e6).toFixed(2)}ms`);
  }
}

main().catch(console.error);
