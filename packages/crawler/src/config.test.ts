import { describe, it, expect } from "vitest";
import { BankId } from "@rantekoll/core";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      crawlerTimeoutMs: 120_000,
      httpTimeoutMs: 30_000,
      httpRetries: 0,
      outputPath: "data/interest-sets-latest.json",
      crawlers: [],
    });
  });

  it("should read numbers and crawler ids from strings", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      CRAWLER_TIMEOUT_MS: "5000",
      HTTP_RETRIES: "2",
      CRAWLERS: " sbab, nordea ,",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.crawlerTimeoutMs).toBe(5000);
    expect(config.httpRetries).toBe(2);
    expect(config.crawlers).toEqual([BankId.SBAB, BankId.NORDEA]);
  });

  it("should reject an unknown crawler id", () => {
    expect(() => loadConfig({ CRAWLERS: "nordea,acme" })).toThrow();
  });

  it("should reject a non-positive timeout", () => {
    expect(() => loadConfig({ CRAWLER_TIMEOUT_MS: "0" })).toThrow();
  });
});
