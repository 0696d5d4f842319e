import type { PackObject, PackValue } from "../binary/value.js";
import type { JsonEventSink } from "./streamParser.js";

type Container =
  | { type: "object"; value: PackObject; key: string | null }
  | { type: "array"; value: PackValue[] };

/** Assembles the value tree described by a sequence of JSON events. */
export class TreeBuilder implements JsonEventSink {
  private readonly containers: Container[] = [];
  private root: PackValue | undefined;

  result(): PackValue {
    if (this.containers.length > 0 || this.root === undefined) {
      throw new Error("Incomplete JSON document");
    }
    return this.root;
  }

  private currentContainer(): Container | undefined {
    return this.containers[this.containers.length - 1];
  }

  private addValue(value: PackValue): void {
    const container = this.currentContainer();
    if (!container) {
      if (this.root !== undefined) {
        throw new Error("Multiple top-level JSON values");
      }
      this.root = value;
      return;
    }
    if (container.type === "array") {
      container.value.push(value);
      return;
    }
    if (container.key === null) {
      throw new Error("Object value without a key");
    }
    Object.defineProperty(container.value, container.key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
    container.key = null;
  }

  startObject(): void {
    const value: PackObject = {};
    this.addValue(value);
    this.containers.push({ type: "object", value, key: null });
  }

  endObject(): void {
    const container = this.containers.pop();
    if (!container || container.type !== "object") throw new Error("Unbalanced object");
  }

  startArray(): void {
    const value: PackValue[] = [];
    this.addValue(value);
    this.containers.push({ type: "array", value });
  }

  endArray(): void {
    const container = this.containers.pop();
    if (!container || container.type !== "array") throw new Error("Unbalanced array");
  }

  key(key: string): void {
    const container = this.currentContainer();
    if (!container || container.type !== "object" || container.key !== null) {
      throw new Error(`Unexpected key "${key}"`);
    }
    container.key = key;
  }

  string(value: string): void {
    this.addValue(value);
  }

  number(value: number | bigint): void {
    this.addValue(value);
  }

  boolean(value: boolean): void {
    this.addValue(value);
  }

  null(): void {
    this.addValue(null);
  }
}
