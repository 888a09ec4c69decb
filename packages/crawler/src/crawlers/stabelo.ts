import {
  BankId,
  BankNames,
  Term,
  createListRate,
  createRatioDiscountedRate,
  type RatioDiscountBoundaries,
} from "@rantekoll/core";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeSpaces, parseRate } from "../normalize/index.js";
import { extractText, parseAverageRates } from "../pdf/index.js";
import { loadDocument } from "../table/index.js";
import { crawlTime, emit, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const RATES_PAGE_URL = "https://www.stabelo.se/bolanerantor";

// Links whose file name suggests the average-rate report
const AVERAGE_PDF_HINTS = ["genomsnitt", "snitt"];

const RATE_TABLE_URL = "https://api.stabelo.se/rate-table/";

// Fixation codes used by the rate table
const FIXATIONS: Record<string, Term> = {
  "3M": Term.THREE_MONTHS,
  "1Y": Term.ONE_YEAR,
  "2Y": Term.TWO_YEARS,
  "3Y": Term.THREE_YEARS,
  "5Y": Term.FIVE_YEARS,
  "10Y": Term.TEN_YEARS,
};

// Rates in the page-state stream are hundredths of a percent
const STREAM_RATE_MIN = 200;
const STREAM_RATE_MAX = 600;

// The rate buttons show the price for the lowest loan-to-value tier
const BUTTON_RATE_BOUNDARIES: RatioDiscountBoundaries = { min_ratio: 0, max_ratio: 60 };

/**
 * Average rates come from a PDF report whose URL changes with every
 * publication, so it is looked up on the rates page first.
 */
export class StabeloCrawler implements BankCrawler {
  bankId = BankId.STABELO;
  sourceUrl = RATES_PAGE_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await Promise.all([
      runSubCrawl(this.logger, "average rates", async () => {
        const page = await this.deps.http.fetch(RATES_PAGE_URL, { signal });
        const pdfUrl = this.findPdfLink(page);
        this.logger.debug("found average rates PDF", { url: pdfUrl });

        const text = await extractText(await this.deps.http.fetchRaw(pdfUrl, { signal }));
        const sets = parseAverageRates(text, { bank: BankNames[this.bankId], crawledAt, logger: this.logger });
        for (const set of sets) {
          out.push(set);
        }
      }),
      runSubCrawl(this.logger, "rate table", async () => {
        const html = await this.deps.http.fetch(RATE_TABLE_URL, { signal });
        await Promise.all([
          runSubCrawl(this.logger, "list rates", async () => this.extractListRates(html, crawledAt, out)),
          runSubCrawl(this.logger, "LTV rates", async () => this.extractButtonRates(html, crawledAt, out)),
        ]);
      }),
    ]);
  }

  /**
   * The rate table page carries its state as a stream of JSON fragments.
   * Each fixation code is followed by its rates per loan-to-value tier; the
   * highest of them is the list rate.
   */
  extractListRates(html: string, crawledAt: Date, out: RateSink): void {
    let found = 0;
    for (const [code, term] of Object.entries(FIXATIONS)) {
      const pattern = new RegExp(`"${code}"[^"]*?(?<!\\d)(\\d{3})(?!\\d)`, "g");
      const values = Array.from(html.matchAll(pattern), (match) => Number(match[1])).filter(
        (value) => value >= STREAM_RATE_MIN && value <= STREAM_RATE_MAX
      );
      if (values.length === 0) {
        this.logger.debug("no list rate in page state", { fixation: code });
        continue;
      }
      found++;
      emit(out, this.logger, () =>
        createListRate({
          bank: BankNames[this.bankId],
          term,
          nominalRate: Math.max(...values) / 100,
          crawledAt,
        })
      );
    }
    if (found === 0) {
      throw new ShapeError("no list rates in rate table page state");
    }
  }

  extractButtonRates(html: string, crawledAt: Date, out: RateSink): void {
    const $ = loadDocument(html);
    const buttons = $("button[value]")
      .toArray()
      .filter((button) => Object.hasOwn(FIXATIONS, $(button).attr("value") ?? ""));
    if (buttons.length === 0) {
      throw new ShapeError("no rate buttons on rate table page");
    }

    for (const button of buttons) {
      const code = $(button).attr("value") ?? "";
      const term = FIXATIONS[code];
      const rateText = $(button)
        .find("span")
        .toArray()
        .map((span) => normalizeSpaces($(span).text()))
        .find((text) => text.endsWith("%"));
      if (rateText === undefined) {
        this.logger.warn("skipping rate button without a rate", { fixation: code });
        continue;
      }

      let rate: number;
      try {
        rate = parseRate(rateText);
      } catch (error) {
        reportSkip(this.logger, error, { fixation: code });
        continue;
      }
      emit(out, this.logger, () =>
        createRatioDiscountedRate({
          bank: BankNames[this.bankId],
          term,
          nominalRate: rate,
          crawledAt,
          boundaries: BUTTON_RATE_BOUNDARIES,
        })
      );
    }
  }

  /**
   * Absolute URL of the average-rate PDF. Falls back to the first PDF link.
   */
  findPdfLink(html: string): string {
    const $ = loadDocument(html);
    const links = $("a[href]")
      .toArray()
      .map((a) => $(a).attr("href") ?? "")
      .filter((href) => /\.pdf(?:$|[?#])/i.test(href));

    const preferred = links.find((href) => AVERAGE_PDF_HINTS.some((hint) => href.toLowerCase().includes(hint)));
    const href = preferred ?? links[0];
    if (href === undefined) {
      throw new ShapeError("no PDF link on rates page");
    }
    if (!preferred) {
      this.logger.warn("using fallback PDF link", { href });
    }
    return new URL(href, RATES_PAGE_URL).toString();
  }
}
