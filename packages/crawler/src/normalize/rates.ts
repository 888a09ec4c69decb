import { UnsupportedRateError } from "../errors.js";
import { normalizeSpaces } from "./text.js";

const DECIMAL = /^\d+(?:\.\d+)?$/;

/**
 * Parses a published percentage such as "3,58 %" or "3.58%".
 *
 * Empty cells and the "-" placeholder (not published this period) are errors,
 * never zero.
 */
export function parseRate(input: string): number {
  const cleaned = normalizeSpaces(input)
    .replace(/\s/g, "")
    .replace(/%+$/, "")
    .replace(",", ".");

  if (!DECIMAL.test(cleaned)) {
    throw new UnsupportedRateError(input);
  }
  const rate = Number.parseFloat(cleaned);
  if (!(rate > 0)) {
    throw new UnsupportedRateError(input);
  }
  return rate;
}

/**
 * Like parseRate for values that arrive as JSON numbers or numeric strings
 */
export function parseRateValue(value: unknown): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) {
      throw new UnsupportedRateError(String(value));
    }
    return value;
  }
  if (typeof value === "string") return parseRate(value);
  throw new UnsupportedRateError(String(value));
}
