// Unsigned LEB128, as used for long collection counts and string lengths.

export const MAX_VARINT_LENGTH = 10;

export const encodeVarint = (value: number | bigint): Buffer => {
  let remaining = BigInt(value);
  if (remaining < 0n) {
    throw new RangeError(`Varint cannot be negative: ${value}`);
  }
  const bytes: number[] = [];
  while (remaining >= 0x80n) {
    bytes.push(Number(remaining & 0x7fn) | 0x80);
    remaining >>= 7n;
  }
  bytes.push(Number(remaining));
  return Buffer.from(bytes);
};

export const varintLength = (value: number): number => {
  let length = 1;
  for (let remaining = value; remaining >= 0x80; remaining = Math.floor(remaining / 0x80)) {
    length += 1;
  }
  return length;
};

/** Reads a varint at `offset`; `next` is the offset just past it. */
export const decodeVarint = (
  buffer: Uint8Array,
  offset: number
): { value: number; next: number } => {
  let value = 0;
  let scale = 1;
  for (let position = offset; position < offset + MAX_VARINT_LENGTH; position += 1) {
    if (position >= buffer.length) {
      throw new Error(`Unexpected end of varint at ${position}`);
    }
    const byte = buffer[position];
    value += (byte & 0x7f) * scale;
    if (value > Number.MAX_SAFE_INTEGER) {
      throw new Error(`Varint at ${offset} exceeds the safe integer range`);
    }
    if ((byte & 0x80) === 0) {
      return { value, next: position + 1 };
    }
    scale *= 0x80;
  }
  throw new Error(`Varint at ${offset} is longer than ${MAX_VARINT_LENGTH} bytes`);
};
