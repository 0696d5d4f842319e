/**
 * Where an encoder's bytes go. Positions are absolute offsets from the start
 * of the document.
 */
export interface OutputSink {
  readonly length: number;
  append(bytes: Uint8Array): number;
  /** Grows the output by `size` zero bytes and returns where they start. */
  reserve(size: number): number;
  /** Overwrites bytes that were already appended or reserved. */
  rewrite(position: number, bytes: Uint8Array): void;
}

const DEFAULT_CAPACITY = 64 * 1024;

export class ByteSink implements OutputSink {
  private buffer: Buffer;
  private cursor = 0;

  constructor(initialCapacity = DEFAULT_CAPACITY) {
    this.buffer = Buffer.alloc(Math.max(initialCapacity, 16));
  }

  get length(): number {
    return this.cursor;
  }

  append(bytes: Uint8Array): number {
    const position = this.cursor;
    this.ensureSpace(bytes.length);
    this.buffer.set(bytes, position);
    this.cursor += bytes.length;
    return position;
  }

  reserve(size: number): number {
    const position = this.cursor;
    this.ensureSpace(size);
    this.buffer.fill(0, position, position + size);
    this.cursor += size;
    return position;
  }

  rewrite(position: number, bytes: Uint8Array): void {
    if (!Number.isInteger(position) || position < 0 || position + bytes.length > this.cursor) {
      throw new RangeError(
        `Rewrite of ${bytes.length} bytes at ${position} is outside the written extent (${this.cursor})`
      );
    }
    this.buffer.set(bytes, position);
  }

  /** A copy of everything written so far. */
  bytes(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.cursor));
  }

  private ensureSpace(size: number): void {
    const required = this.cursor + size;
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = Buffer.alloc(capacity);
    this.buffer.copy(grown, 0, 0, this.cursor);
    this.buffer = grown;
  }
}
