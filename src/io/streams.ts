import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { Writable } from "node:stream";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 64 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

/** Opens JSON text for reading as utf8 chunks. */
export const createReadStream = (path: string, signal?: AbortSignal): ReadStream => {
  const stream = fsCreateReadStream(path, {
    encoding: "utf8",
    highWaterMark: READ_HIGH_WATER_MARK,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

/**
 * Writes `data` in chunks, waiting for "drain" whenever the stream's buffer
 * is full, then ends the stream and waits for it to finish.
 */
export const writeAll = async (
  stream: Writable,
  data: Uint8Array,
  chunkSize = WRITE_HIGH_WATER_MARK
): Promise<void> => {
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    const chunk = data.subarray(offset, Math.min(offset + chunkSize, data.length));
    if (!stream.write(chunk)) {
      await once(stream, "drain");
    }
  }
  stream.end();
  await finished(stream);
};
