import { BankId, BankNames, createAverageRate, createListRate } from "@rantekoll/core";
import type { Logger } from "../logger.js";
import { parseSwedishDayMonthYear, parseSwedishMonthYear } from "../normalize/index.js";
import { extractTable, type Table } from "../table/index.js";
import { crawlTime, emit, readMonthlyAverages, readTermRates, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const LIST_RATES_URL = "https://www.swedbank.se/privat/boende-och-bolan/bolanerantor.html";
const HISTORIC_RATES_URL =
  "https://www.swedbank.se/privat/boende-och-bolan/bolanerantor/historiska-genomsnittsrantor.html";

// "Ränta, senast ändrad 25 september 2025"
const CHANGED_ON_HEADER = /senast ändrad\s+(.+)$/i;

export class SwedbankCrawler implements BankCrawler {
  bankId = BankId.SWEDBANK;
  sourceUrl = LIST_RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await Promise.all([
      runSubCrawl(this.logger, "list rates", async () => {
        const html = await this.deps.http.fetch(LIST_RATES_URL, { signal });
        this.extractListRates(html, crawledAt, out);
      }),
      runSubCrawl(this.logger, "average rates", async () => {
        const html = await this.deps.http.fetch(HISTORIC_RATES_URL, { signal });
        this.extractAverageRates(html, crawledAt, out);
      }),
    ]);
  }

  private extractListRates(html: string, crawledAt: Date, out: RateSink): void {
    const table = extractTable(html, "Aktuella bolåneräntor – listpris", "textBeforeTable");
    const changedOn = this.changedOnFromHeader(table);

    // Banklån is an unsecured product listed in the same table
    const rows = table.rows.filter((row) => !/banklån/i.test(row[0] ?? ""));
    for (const { term, rate } of readTermRates(rows, this.logger)) {
      emit(out, this.logger, () =>
        createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
      );
    }
  }

  private changedOnFromHeader(table: Table): string | undefined {
    const match = CHANGED_ON_HEADER.exec(table.header[1] ?? "");
    if (!match) return undefined;
    try {
      return parseSwedishDayMonthYear(match[1]);
    } catch (error) {
      reportSkip(this.logger, error, { header: table.header[1] });
      return undefined;
    }
  }

  private extractAverageRates(html: string, crawledAt: Date, out: RateSink): void {
    const table = extractTable(html, "Våra historiska genomsnittsräntor", "caption");

    for (const { month, term, rate } of readMonthlyAverages(table, parseSwedishMonthYear, this.logger)) {
      emit(out, this.logger, () =>
        createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
      );
    }
  }
}
