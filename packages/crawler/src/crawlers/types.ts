import type { BankId, InterestSet } from "@rantekoll/core";
import type { Logger } from "../logger.js";
import type { HttpClient } from "../utils/index.js";

/**
 * Where a crawler emits its records
 */
export interface RateSink {
  push(set: InterestSet): void;
}

/**
 * Interface for bank-specific rate crawlers
 */
export interface BankCrawler {
  bankId: BankId;
  sourceUrl: string;

  /**
   * Fetches the bank's rate disclosures and pushes every record found.
   * Failures are logged, never thrown; `out` is never closed.
   */
  crawl(out: RateSink, signal: AbortSignal): Promise<void>;
}

/**
 * Crawler dependencies
 */
export type CrawlerDeps = {
  http: HttpClient;
  logger: Logger;
  now?: () => Date; // Clock for last_crawled_at, injectable for tests
};
