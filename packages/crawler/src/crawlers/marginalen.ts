import { BankId, BankNames, createAverageRate } from "@rantekoll/core";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseYearMonthCompact } from "../normalize/index.js";
import { expectArray, findInArray, parseBlob, resolvePath } from "../payload/index.js";
import { extractTable } from "../table/index.js";
import { crawlTime, emit, readMonthlyAverages, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

// The site is a client-rendered app; the page content comes from the CMS content delivery API
const CONTENT_API_URL =
  "https://www.marginalen.se/api/episerver/v3.0/content?contentUrl=%2Fprivat%2Fbanktjanster%2Flan%2Fflytta-eller-utoka-bolan%2Fgenomsnittlig-bolaneranta%2F&matchExact=true&expand=*";

const TABLE_ANCHOR = "Genomsnittlig bolåneränta";

/**
 * Marginalen publishes no per-term list rates, only a credit-dependent
 * range, so only average rates are collected.
 */
export class MarginalenCrawler implements BankCrawler {
  bankId = BankId.MARGINALEN;
  sourceUrl = CONTENT_API_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "average rates", async () => {
      const json = await this.deps.http.fetch(CONTENT_API_URL, { signal });
      this.extractAverageRates(this.extractBody(json), crawledAt, out);
    });
  }

  /**
   * HTML of the content block holding the rates table.
   * Response shape: [ { mainContentArea: [ { mainContentArea: [ { body } ] } ] } ]
   */
  private extractBody(json: string): string {
    const blocks = expectArray(
      resolvePath(parseBlob(json), [0, "mainContentArea", 0, "mainContentArea"]),
      "content blocks"
    );
    const block = findInArray(
      blocks,
      (item) => typeof item.body === "string" && item.body.includes("<table"),
      "content block with a table"
    );
    if (typeof block.body !== "string") {
      throw new ShapeError("content block body is not a string");
    }
    return block.body;
  }

  private extractAverageRates(html: string, crawledAt: Date, out: RateSink): void {
    // Månad | 3 Mån | 6 Mån | 1 år | 2 år | 3 år, months as YYYYMM
    const table = extractTable(html, TABLE_ANCHOR, "textBeforeTable");

    for (const { month, term, rate } of readMonthlyAverages(table, parseYearMonthCompact, this.logger)) {
      emit(out, this.logger, () =>
        createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
      );
    }
  }
}
