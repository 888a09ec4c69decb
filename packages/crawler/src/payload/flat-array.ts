import { PayloadReferenceError, ShapeError } from "../errors.js";
import { isRecord } from "./nested.js";
import { parseBlob } from "./blob.js";

/** Indirections followed per lookup before giving up */
export const MAX_HOPS = 4;

// Reactivity wrappers serialized as ["Reactive", index]
const WRAPPER_TAGS = new Set(["Reactive", "ShallowReactive", "Ref", "ShallowRef"]);

function wrappedIndex(value: unknown): number | undefined {
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    WRAPPER_TAGS.has(value[0]) &&
    typeof value[1] === "number"
  ) {
    return value[1];
  }
  return undefined;
}

/**
 * Page state serialized as one flat array, where object fields and array
 * items hold indices into the same array.
 *
 * Every index is bounds-checked and each lookup follows at most MAX_HOPS
 * wrappers, so malformed or cyclic input fails with PayloadReferenceError
 * instead of looping.
 */
export class FlatPayload {
  constructor(private readonly values: readonly unknown[]) {}

  static parse(raw: string): FlatPayload {
    const root = parseBlob(raw);
    if (!Array.isArray(root)) {
      throw new ShapeError("flat payload is not an array");
    }
    return new FlatPayload(root);
  }

  get length(): number {
    return this.values.length;
  }

  private at(index: unknown): unknown {
    if (typeof index !== "number" || !Number.isInteger(index)) {
      throw new PayloadReferenceError(`reference is not an index`, String(index));
    }
    if (index < 0 || index >= this.values.length) {
      throw new PayloadReferenceError(
        `index out of range (length ${this.values.length})`,
        String(index)
      );
    }
    return this.values[index];
  }

  /**
   * Value at `index`, with reactivity wrappers unwrapped
   */
  resolve(index: unknown): unknown {
    let value = this.at(index);
    for (let hops = 0; ; hops++) {
      const next = wrappedIndex(value);
      if (next === undefined) return value;
      if (hops >= MAX_HOPS) {
        throw new PayloadReferenceError(`more than ${MAX_HOPS} indirections`, String(index));
      }
      value = this.at(next);
    }
  }

  resolveObject(index: unknown): Record<string, unknown> {
    const value = this.resolve(index);
    if (!isRecord(value)) {
      throw new PayloadReferenceError("expected object", String(index));
    }
    return value;
  }

  resolveArray(index: unknown): unknown[] {
    const value = this.resolve(index);
    if (!Array.isArray(value)) {
      throw new PayloadReferenceError("expected array", String(index));
    }
    return value;
  }

  resolveString(index: unknown): string {
    const value = this.resolve(index);
    if (typeof value !== "string") {
      throw new PayloadReferenceError("expected string", String(index));
    }
    return value;
  }

  /**
   * Dereferences a field of a resolved object
   */
  field(object: Record<string, unknown>, key: string): unknown {
    if (!(key in object)) {
      throw new PayloadReferenceError(`missing field "${key}"`, key);
    }
    return this.resolve(object[key]);
  }

  /**
   * Indices of every top-level object that has all the given fields
   */
  indicesWithFields(...keys: string[]): number[] {
    const indices: number[] = [];
    this.values.forEach((value, index) => {
      if (isRecord(value) && keys.every((key) => key in value)) {
        indices.push(index);
      }
    });
    return indices;
  }
}
