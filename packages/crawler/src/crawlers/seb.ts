import { BankId, BankNames, createListRate } from "@rantekoll/core";
import { z } from "zod";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseIsoDate, parseRateValue, parseTerm } from "../normalize/index.js";
import { parseBlob } from "../payload/index.js";
import { crawlTime, emit, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const PORTAL_URL = "https://pricing-portal-web-public.clouda.sebgroup.com/";
const AVERAGE_RATE_PAGE_URL = `${PORTAL_URL}mortgage/averageratecurrent`;
const LIST_RATES_URL = "https://pricing-portal-api-public.clouda.sebgroup.com/public/mortgage/listrate/current";

const SCRIPT_NAME = /main\.[a-zA-Z0-9]+\.js/;
const API_KEY = /x-api-key":"(.*?)"/;

const ListRateSchema = z.object({
  adjustmentTerm: z.string(), // "3 mån"
  change: z.number().optional(),
  startDate: z.string(), // "2025-10-09T00:00:00"
  value: z.number(),
});

/**
 * The pricing API wants the key the portal's own script bundle sends, so the
 * bundle is looked up and read first.
 */
export class SebCrawler implements BankCrawler {
  bankId = BankId.SEB;
  sourceUrl = LIST_RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "list rates", async () => {
      const apiKey = await this.fetchApiKey(signal);
      const json = await this.deps.http.fetch(LIST_RATES_URL, {
        signal,
        headers: {
          "X-API-Key": apiKey,
          Referer: PORTAL_URL,
          Origin: PORTAL_URL.replace(/\/$/, ""),
        },
      });
      this.extractListRates(json, crawledAt, out);
    });
  }

  private async fetchApiKey(signal: AbortSignal): Promise<string> {
    const html = await this.deps.http.fetch(AVERAGE_RATE_PAGE_URL, { signal });
    const script = SCRIPT_NAME.exec(html);
    if (!script) {
      throw new ShapeError("no script bundle referenced by pricing portal");
    }

    const source = await this.deps.http.fetch(PORTAL_URL + script[0], { signal });
    const key = API_KEY.exec(source);
    if (!key || key[1] === "") {
      throw new ShapeError(`no API key in ${script[0]}`);
    }
    return key[1];
  }

  private extractListRates(json: string, crawledAt: Date, out: RateSink): void {
    const entries = z.array(z.unknown()).parse(parseBlob(json));

    for (const raw of entries) {
      try {
        const entry = ListRateSchema.parse(raw);
        const term = parseTerm(entry.adjustmentTerm);
        const changedOn = parseIsoDate(/\d{4}-\d{2}-\d{2}/.exec(entry.startDate)?.[0] ?? entry.startDate);
        const rate = parseRateValue(entry.value);
        emit(out, this.logger, () =>
          createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
        );
      } catch (error) {
        reportSkip(this.logger, error, { entry: raw });
      }
    }
  }
}
