import { BankId, BankNames, createAverageRate, createListRate } from "@rantekoll/core";
import type * as cheerio from "cheerio";
import type { Logger } from "../logger.js";
import { parseIsoDate, parseSwedishMonthYear } from "../normalize/index.js";
import { extractTable, loadDocument, sanitizeRows } from "../table/index.js";
import { crawlTime, emit, readMonthlyAverages, readTermRates, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const RATES_URL = "https://danskebank.se/privat/produkter/bolan/relaterat/aktuella-bolanerantor";

// Bindningstid | Ränta | Ändring | Senast ändrad
const CHANGED_ON_COLUMN = 3;

function isMonthLabel(cell: string): boolean {
  try {
    parseSwedishMonthYear(cell);
    return true;
  } catch {
    return false;
  }
}

export class DanskeBankCrawler implements BankCrawler {
  bankId = BankId.DANSKE_BANK;
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
    const table = extractTable($, "Bankens aktuella", "textBeforeTable");

    // Premium rates require a customer program and are not list prices
    const rows = table.rows.filter((row) => !row.some((cell) => cell.includes("Premium")));
    for (const { term, rate, row } of readTermRates(rows, this.logger)) {
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
    const table = extractTable($, "Genomsnittlig ränta", "textBeforeTable");
    // The CMS sometimes renders "November 2025" and its rates as separate rows
    const repaired = { header: table.header, rows: sanitizeRows(table.rows, isMonthLabel) };

    for (const { month, term, rate } of readMonthlyAverages(repaired, parseSwedishMonthYear, this.logger)) {
      emit(out, this.logger, () =>
        createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
      );
    }
  }
}
