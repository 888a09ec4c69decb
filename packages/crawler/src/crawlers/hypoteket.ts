import { BankId, BankNames, createAverageRate, createListRate } from "@rantekoll/core";
import type { Logger } from "../logger.js";
import { parseIsoDate, parseRateValue, parseTerm, parseYearMonthDashed } from "../normalize/index.js";
import { FlatPayload } from "../payload/index.js";
import { crawlTime, emit, isPlaceholder, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const PAYLOAD_URL = "https://hypoteket.com/borantor/_payload.json";

// Position of the page data object in the payload
const DATA_INDEX = 2;

// Average rate entries carry one field per term, named like the list rate terms
const AVERAGE_TERM_FIELDS = ["threeMonth", "oneYear", "twoYear", "threeYear", "fiveYear"];

/**
 * Reads the rates page's serialized state instead of its rendered HTML
 */
export class HypoteketCrawler implements BankCrawler {
  bankId = BankId.HYPOTEKET;
  sourceUrl = PAYLOAD_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "rates payload", async () => {
      const payload = FlatPayload.parse(await this.deps.http.fetch(PAYLOAD_URL, { signal }));
      await Promise.all([
        runSubCrawl(this.logger, "list rates", async () => this.extractListRates(payload, crawledAt, out)),
        runSubCrawl(this.logger, "average rates", async () => this.extractAverageRates(payload, crawledAt, out)),
      ]);
    });
  }

  private extractListRates(payload: FlatPayload, crawledAt: Date, out: RateSink): void {
    const data = payload.resolveObject(DATA_INDEX);
    const entries = payload.resolveArray(data["interest-rates"]);

    for (const entryIndex of entries) {
      try {
        const entry = payload.resolveObject(entryIndex);
        const term = parseTerm(payload.resolveString(entry.interestTerm));
        const rate = parseRateValue(payload.field(entry, "rate"));
        // validFrom is a timestamp such as 2025-11-10T00:00:00.000Z
        const changedOn =
          "validFrom" in entry ? parseIsoDate(payload.resolveString(entry.validFrom).slice(0, 10)) : undefined;
        emit(out, this.logger, () =>
          createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
        );
      } catch (error) {
        reportSkip(this.logger, error, { entryIndex });
      }
    }
  }

  private extractAverageRates(payload: FlatPayload, crawledAt: Date, out: RateSink): void {
    for (const entryIndex of payload.indicesWithFields("monthPeriod")) {
      try {
        const entry = payload.resolveObject(entryIndex);
        const month = parseYearMonthDashed(payload.resolveString(entry.monthPeriod));

        for (const field of AVERAGE_TERM_FIELDS) {
          if (!(field in entry)) continue;
          const value = payload.field(entry, field);
          if (typeof value === "string" && isPlaceholder(value)) continue;
          const term = parseTerm(field);
          const rate = parseRateValue(value);
          emit(out, this.logger, () =>
            createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
          );
        }
      } catch (error) {
        reportSkip(this.logger, error, { entryIndex });
      }
    }
  }
}
