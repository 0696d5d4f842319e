/** Failure kinds raised while building a document. */
export const EncodeErrorKind = {
  /** A value or key was written after the scope's declared count ran out. */
  CollectionFull: "CollectionFull",
  /** A dictionary value was written before its key. */
  KeyExpected: "KeyExpected",
  /** `writeKey` outside a dictionary, or twice in a row. */
  ProtocolViolation: "ProtocolViolation",
  /** A pointer delta does not fit the slot width of its scope. */
  PointerOutOfRange: "PointerOutOfRange",
  /** A scope was ended with unfilled slots. */
  IncompleteCollection: "IncompleteCollection",
  /** NaN, a non-integral or out-of-range integer, or an unencodable JS value. */
  InvalidValue: "InvalidValue",
  /** `reset()` while child scopes are still open. */
  InvalidReset: "InvalidReset",
} as const;

export type EncodeErrorKind = (typeof EncodeErrorKind)[keyof typeof EncodeErrorKind];

export class EncodeError extends Error {
  readonly kind: EncodeErrorKind;

  constructor(kind: EncodeErrorKind, message: string) {
    super(message);
    this.name = "EncodeError";
    this.kind = kind;
  }
}

export const isEncodeError = (error: unknown): error is EncodeError =>
  error instanceof EncodeError;
