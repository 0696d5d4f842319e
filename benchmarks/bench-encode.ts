import { Encoder } from "../src/binary/encoder.js";
import { ByteSink } from "../src/binary/sink.js";
import { encodeValue } from "../src/binary/tree.js";
import type { PackValue } from "../src/binary/value.js";

const STATUSES = ["active", "suspended", "pending-review", "archived"];

const buildRecords = (count: number): PackValue => {
  const records: PackValue[] = [];
  for (let i = 0; i < count; i++) {
    records.push({
      id: i,
      name: `user-${i}`,
      status: STATUSES[i % STATUSES.length],
      score: i * 0.25 + 0.1,
      tags: ["alpha", "beta", i % 2 === 0 ? "even" : "odd"],
      verified: i % 3 === 0,
    });
  }
  return { generatedBy: "bench-encode", records };
};

async function run() {
  const count = 100_000;
  const document = buildRecords(count);
  const iterations = 5;

  console.log(`Encoding ${count} records, ${iterations} iterations...`);
  let bytes = 0;
  const start = performance.now();

  for (let i = 0; i < iterations; i++) {
    const sink = new ByteSink();
    const encoder = new Encoder({ sink });
    encodeValue(encoder, document, "auto");
    encoder.finish();
    bytes = sink.length;
    if (i === iterations - 1) {
      console.log("Stats:", JSON.stringify(encoder.getStats(), null, 2));
    }
  }

  const duration = performance.now() - start;
  console.log(`Output size: ${bytes} bytes`);
  console.log(`Average time: ${(duration / iterations).toFixed(2)}ms`);
  console.log(`Throughput: ${((count * iterations) / (duration / 1000)).toFixed(0)} records/sec`);
}

run().catch(console.error);
