import { DEFAULT_SHARED_STRING_SIZE_LIMIT } from "./format.js";

/**
 * Document-wide map from string content to the position of its most recent
 * full instance. Owned by one encoder and shared by all of its scopes.
 */
export class StringTable {
  private readonly positions = new Map<string, number>();

  constructor(readonly sharedSizeLimit = DEFAULT_SHARED_STRING_SIZE_LIMIT) {
    if (!Number.isInteger(sharedSizeLimit) || sharedSizeLimit < 0) {
      throw new RangeError(`Invalid shared string size limit: ${sharedSizeLimit}`);
    }
  }

  get size(): number {
    return this.positions.size;
  }

  /**
   * Strings shorter than a pointer gain nothing from sharing; strings over the
   * limit are left out to bound the table.
   */
  isEligible(byteLength: number, width: number): boolean {
    return width > 0 && byteLength >= width && byteLength <= this.sharedSizeLimit;
  }

  lookup(content: string): number | undefined {
    return this.positions.get(content);
  }

  /** Records (or moves) the instance that later references should point at. */
  remember(content: string, position: number): void {
    this.positions.set(content, position);
  }

  clear(): void {
    this.positions.clear();
  }
}
