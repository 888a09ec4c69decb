import { describe, it, expect } from "vitest";
import { sanitizeRows } from "./sanitize.js";

const isMonth = (cell: string) => /^[A-Za-zåäö]+ \d{4}$/.test(cell);

describe("sanitizeRows", () => {
  const wellFormed = [
    ["November 2025", "2,58", "2,76"],
    ["Oktober 2025", "2,58", "2,80"],
  ];

  it("should leave well-formed rows unchanged", () => {
    expect(sanitizeRows(wellFormed, isMonth)).toEqual(wellFormed);
  });

  it("should drop empty rows", () => {
    expect(sanitizeRows([wellFormed[0], [], wellFormed[1]], isMonth)).toEqual(wellFormed);
  });

  it("should merge a label row with the following values row", () => {
    const rows = [["November 2025", "2,58", "2,76"], ["Oktober 2025"], ["2,58", "2,80"]];
    expect(sanitizeRows(rows, isMonth)).toEqual(wellFormed);
  });

  it("should drop single-cell rows that are not labels", () => {
    const rows = [["Fotnot: räntorna är preliminära"], ["November 2025", "2,58", "2,76"]];
    expect(sanitizeRows(rows, isMonth)).toEqual([["November 2025", "2,58", "2,76"]]);
  });

  it("should drop a label row without values", () => {
    expect(sanitizeRows([["Oktober 2025"], ["September 2025"], ["2,60", "2,81"]], isMonth)).toEqual([
      ["September 2025", "2,60", "2,81"],
    ]);
  });

  it("should be idempotent", () => {
    const rows = [["Oktober 2025"], ["2,58", "2,80"], [], ["junk"], ["September 2025", "2,60"]];
    const once = sanitizeRows(rows, isMonth);
    expect(sanitizeRows(once, isMonth)).toEqual(once);
  });
});
