import { BankId, BankNames, createAverageRate, createListRate } from "@rantekoll/core";
import type * as cheerio from "cheerio";
import type { Logger } from "../logger.js";
import { parseIsoDate, parseYearMonthSpaced } from "../normalize/index.js";
import { extractTable, loadDocument } from "../table/index.js";
import { crawlTime, emit, readMonthlyAverages, readTermRates, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const RATES_URL = "https://www.icabanken.se/lana/bolan/bolanerantor/";

// Bindningstid | Ränta | Senast ändrad
const CHANGED_ON_COLUMN = 2;

/**
 * List and average rates are published on the same page
 */
export class IcaBankenCrawler implements BankCrawler {
  bankId = BankId.ICA_BANKEN;
  sourceUrl = RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "rates page", async () => {
      const $ = loadDocument(await this.deps.http.fetch(RATES_URL, { signal }));
      await Promise.all([
        runSubCrawl(this.logger, "list rates", async () => this.extractListRates($, crawledAt, out)),
        runSubCrawl(this.logger, "average rates", async () => this.extractAverageRates($, crawledAt, out)),
      ]);
    });
  }

  private extractListRates($: cheerio.CheerioAPI, crawledAt: Date, out: RateSink): void {
    const table = extractTable($, "Aktuella bolåneräntor", "textBeforeTable");

    for (const { term, rate, row } of readTermRates(table.rows, this.logger)) {
      let changedOn: string;
      try {
        changedOn = parseIsoDate(row[CHANGED_ON_COLUMN] ?? "");
      } catch (error) {
        reportSkip(this.logger, error, { row });
        continue;
      }
      emit(out, this.logger, () =>
        createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
      );
    }
  }

  private extractAverageRates($: cheerio.CheerioAPI, crawledAt: Date, out: RateSink): void {
    // Månad | 3 mån | 1 år | ... with months written "2025 11"
    const table = extractTable($, "Snitträntor för bolån", "textBeforeTable");

    for (const { month, term, rate } of readMonthlyAverages(table, parseYearMonthSpaced, this.logger)) {
      emit(out, this.logger, () =>
        createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
      );
    }
  }
}
