import { BankId, BankNames, createAverageRate, createListRate } from "@rantekoll/core";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { avgMonthOfDate, parseIsoDate, parseRate, parseRateValue, parseTerm } from "../normalize/index.js";
import { parseBlob } from "../payload/index.js";
import { crawlTime, emit, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const LIST_RATES_URL = "https://www.sbab.se/api/interest-mortgage-service/api/external/v1/interest";
const AVERAGE_RATES_URL =
  "https://www.sbab.se/api/historical-average-interest-rate-service/interest-rate/average-interest-rate-last-twelve-months-by-period";

// Entries are validated one by one so a single odd entry does not cost the rest
const ListRatesResponseSchema = z.object({
  listInterests: z.array(z.unknown()),
});

const ListInterestSchema = z.object({
  period: z.string(), // "P_3_MONTHS", "P_1_YEAR"
  interestRate: z.string(), // "3.05"
  validFrom: z.string().optional(), // "2025-09-29"
});

const AverageRatesResponseSchema = z.object({
  average_interest_rate_last_twelve_months: z.array(z.unknown()),
});

const averageRate = z.number().nullable().optional();

const AveragePeriodSchema = z.object({
  period: z.string(), // last day of the month, YYYY-MM-DD
  three_months: averageRate,
  one_year: averageRate,
  two_years: averageRate,
  three_years: averageRate,
  four_years: averageRate,
  five_years: averageRate,
  seven_years: averageRate,
  ten_years: averageRate,
});

type AveragePeriod = z.infer<typeof AveragePeriodSchema>;

const AVERAGE_TERM_FIELDS = [
  "three_months",
  "one_year",
  "two_years",
  "three_years",
  "four_years",
  "five_years",
  "seven_years",
  "ten_years",
] as const satisfies ReadonlyArray<keyof AveragePeriod>;

export class SbabCrawler implements BankCrawler {
  bankId = BankId.SBAB;
  sourceUrl = LIST_RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await Promise.all([
      runSubCrawl(this.logger, "list rates", async () => {
        const json = await this.deps.http.fetch(LIST_RATES_URL, { signal });
        this.extractListRates(json, crawledAt, out);
      }),
      runSubCrawl(this.logger, "average rates", async () => {
        const json = await this.deps.http.fetch(AVERAGE_RATES_URL, { signal });
        this.extractAverageRates(json, crawledAt, out);
      }),
    ]);
  }

  private extractListRates(json: string, crawledAt: Date, out: RateSink): void {
    const response = ListRatesResponseSchema.parse(parseBlob(json));

    for (const raw of response.listInterests) {
      try {
        const entry = ListInterestSchema.parse(raw);
        const term = parseTerm(entry.period);
        const rate = parseRate(entry.interestRate);
        const changedOn = entry.validFrom ? parseIsoDate(entry.validFrom) : undefined;
        emit(out, this.logger, () =>
          createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
        );
      } catch (error) {
        reportSkip(this.logger, error, { entry: raw });
      }
    }
  }

  private extractAverageRates(json: string, crawledAt: Date, out: RateSink): void {
    const response = AverageRatesResponseSchema.parse(parseBlob(json));

    for (const raw of response.average_interest_rate_last_twelve_months) {
      try {
        const period = AveragePeriodSchema.parse(raw);
        const month = avgMonthOfDate(parseIsoDate(period.period));

        for (const field of AVERAGE_TERM_FIELDS) {
          const value = period[field];
          if (value === null || value === undefined) continue;
          const term = parseTerm(field);
          const rate = parseRateValue(value);
          emit(out, this.logger, () =>
            createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
          );
        }
      } catch (error) {
        reportSkip(this.logger, error, { entry: raw });
      }
    }
  }
}
