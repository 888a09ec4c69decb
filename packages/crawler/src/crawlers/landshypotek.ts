import {
  BankId,
  BankNames,
  createListRate,
  createRatioDiscountedRate,
  type RatioDiscountBoundaries,
} from "@rantekoll/core";
import type * as cheerio from "cheerio";
import type { Logger } from "../logger.js";
import { parseIsoDate } from "../normalize/index.js";
import { extractTable, loadDocument } from "../table/index.js";
import { crawlTime, emit, readTermRates, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const RATES_URL = "https://www.landshypotek.se/lana/bolanerantor/";

type DiscountTier = {
  caption: string;
  boundaries: RatioDiscountBoundaries;
};

// Discounted rates are published per loan-to-value tier, one captioned table each
const DISCOUNT_TIERS: DiscountTier[] = [
  { caption: "belåningsgrad 60", boundaries: { min_ratio: 0, max_ratio: 60 } },
  { caption: "belåningsgrad 75", boundaries: { min_ratio: 60, max_ratio: 75 } },
];

// Bindningstid | Ränta | Ändring | Senast ändrad
const CHANGED_ON_COLUMN = 3;

export class LandshypotekCrawler implements BankCrawler {
  bankId = BankId.LANDSHYPOTEK;
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
        ...DISCOUNT_TIERS.map((tier) =>
          runSubCrawl(this.logger, `discounted rates (${tier.caption})`, async () =>
            this.extractDiscountedRates($, tier, crawledAt, out)
          )
        ),
        runSubCrawl(this.logger, "list rates", async () => this.extractListRates($, crawledAt, out)),
      ]);
    });
  }

  private extractDiscountedRates($: cheerio.CheerioAPI, tier: DiscountTier, crawledAt: Date, out: RateSink): void {
    // Bindningstid | Ränta | Effektiv ränta
    const table = extractTable($, tier.caption, "caption");

    for (const { term, rate } of readTermRates(table.rows, this.logger)) {
      emit(out, this.logger, () =>
        createRatioDiscountedRate({
          bank: BankNames[this.bankId],
          term,
          nominalRate: rate,
          crawledAt,
          boundaries: tier.boundaries,
        })
      );
    }
  }

  private extractListRates($: cheerio.CheerioAPI, crawledAt: Date, out: RateSink): void {
    const table = extractTable($, "Listräntor för bolån", "textBeforeTable");

    for (const { term, rate, row } of readTermRates(table.rows, this.logger)) {
      const changedOn = this.optionalChangedOn(row[CHANGED_ON_COLUMN]);
      emit(out, this.logger, () =>
        createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
      );
    }
  }

  // The change date column is often left blank; the rate is still valid without it
  private optionalChangedOn(cell: string | undefined): string | undefined {
    if (!cell) return undefined;
    try {
      return parseIsoDate(cell);
    } catch {
      this.logger.debug("ignoring unparseable change date", { input: cell });
      return undefined;
    }
  }
}
