import { ShapeError } from "../errors.js";

export type PathSegment = string | number;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Follows a fixed sequence of key and index lookups.
 *
 * Any missing key, out-of-range index or type mismatch is a ShapeError naming
 * the failing hop: the whole region is unusable.
 */
export function resolvePath(root: unknown, path: readonly PathSegment[]): unknown {
  let current = root;

  for (const [hop, segment] of path.entries()) {
    const at = path.slice(0, hop + 1).join(".");
    if (typeof segment === "number") {
      if (!Array.isArray(current)) {
        throw new ShapeError(`expected array at ${at}, got ${describe(current)}`);
      }
      if (segment < 0 || segment >= current.length) {
        throw new ShapeError(`index out of range at ${at} (length ${current.length})`);
      }
      current = current[segment];
    } else {
      if (!isRecord(current)) {
        throw new ShapeError(`expected object at ${at}, got ${describe(current)}`);
      }
      if (!(segment in current)) {
        throw new ShapeError(`missing key at ${at}`);
      }
      current = current[segment];
    }
  }

  return current;
}

export function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ShapeError(`expected ${what} to be an array, got ${describe(value)}`);
  }
  return value;
}

export function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ShapeError(`expected ${what} to be an object, got ${describe(value)}`);
  }
  return value;
}

/**
 * Picks an element by content, for CMS block lists whose order is not stable
 */
export function findInArray(
  items: readonly unknown[],
  predicate: (item: Record<string, unknown>) => boolean,
  what: string
): Record<string, unknown> {
  const found = items.find((item): item is Record<string, unknown> => isRecord(item) && predicate(item));
  if (!found) {
    throw new ShapeError(`${what} not found`);
  }
  return found;
}
