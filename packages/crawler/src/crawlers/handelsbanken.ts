import { BankId, BankNames, createAverageRate, createListRate, type AvgMonth, type Term } from "@rantekoll/core";
import { z } from "zod";
import { UnsupportedTermError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseRateValue, parseTerm, parseYearMonthCompact } from "../normalize/index.js";
import { parseBlob } from "../payload/index.js";
import { crawlTime, emit, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const API_URL = "https://www.handelsbanken.se/tron/slana/slan/service/mortgagerates/v1";
const LIST_RATES_URL = `${API_URL}/interestrates`;
const AVERAGE_RATES_URL = `${API_URL}/averagerates`;

const RateValueSchema = z.object({
  value: z.string().optional(), // "3,84"
  valueRaw: z.number(),
});

const InterestRateSchema = z.object({
  rateValue: RateValueSchema,
  periodBasisType: z.string(), // "3" months, "4" years
  term: z.string(),
});

type InterestRate = z.infer<typeof InterestRateSchema>;

const ListRatesResponseSchema = z.object({
  interestRates: z.array(z.unknown()),
});

const AverageRatesResponseSchema = z.object({
  averageRatePeriods: z.array(
    z.object({
      period: z.string(), // YYYYMM
      rates: z.array(z.unknown()),
    })
  ),
});

export function handelsbankenTerm(rate: Pick<InterestRate, "periodBasisType" | "term">): Term {
  switch (rate.periodBasisType) {
    case "3":
      return parseTerm(`${rate.term} mån`);
    case "4":
      return parseTerm(`${rate.term} år`);
    default:
      throw new UnsupportedTermError(`${rate.term} (period basis ${rate.periodBasisType})`);
  }
}

/**
 * Both endpoints return JSON. The API gives no change dates for list rates.
 */
export class HandelsbankenCrawler implements BankCrawler {
  bankId = BankId.HANDELSBANKEN;
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

    for (const raw of response.interestRates) {
      try {
        const entry = InterestRateSchema.parse(raw);
        const term = handelsbankenTerm(entry);
        const rate = parseRateValue(entry.rateValue.valueRaw);
        emit(out, this.logger, () =>
          createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt })
        );
      } catch (error) {
        reportSkip(this.logger, error, { entry: raw });
      }
    }
  }

  private extractAverageRates(json: string, crawledAt: Date, out: RateSink): void {
    const response = AverageRatesResponseSchema.parse(parseBlob(json));

    for (const period of response.averageRatePeriods) {
      let month: AvgMonth;
      try {
        month = parseYearMonthCompact(period.period);
      } catch (error) {
        reportSkip(this.logger, error, { period: period.period });
        continue;
      }

      for (const raw of period.rates) {
        try {
          const entry = InterestRateSchema.parse(raw);
          const term = handelsbankenTerm(entry);
          const rate = parseRateValue(entry.rateValue.valueRaw);
          emit(out, this.logger, () =>
            createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
          );
        } catch (error) {
          reportSkip(this.logger, error, { period: period.period, entry: raw });
        }
      }
    }
  }
}
