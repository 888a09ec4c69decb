import { describe, it, expect } from "vitest";
import { normalizeSpaces } from "./text.js";

describe("normalizeSpaces", () => {
  it("should collapse mixed whitespace", () => {
    expect(normalizeSpaces("  a\u00a0\u00a0b\tc\n")).toBe("a b c");
  });

  it("should replace the &nbsp; entity", () => {
    expect(normalizeSpaces("&nbsp;3&nbsp;mån")).toBe("3 mån");
  });

  it("should replace zero-width and narrow spaces", () => {
    expect(normalizeSpaces("3\u200bmån")).toBe("3 mån");
    expect(normalizeSpaces("3,58\u202f%")).toBe("3,58 %");
  });

  it("should return an empty string for whitespace only", () => {
    expect(normalizeSpaces("\r\n\t ")).toBe("");
  });
});
