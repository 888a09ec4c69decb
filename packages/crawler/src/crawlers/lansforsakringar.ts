import { BankId, BankNames, createListRate } from "@rantekoll/core";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseIsoDate } from "../normalize/index.js";
import { extractText, parseAverageRates } from "../pdf/index.js";
import { extractTable } from "../table/index.js";
import { crawlTime, emit, readTermRates, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const LIST_RATES_URL = "https://www.lansforsakringar.se/stockholm/privat/bank/bolan/bolaneranta/";
const AVERAGE_RATES_PDF_URL = "https://www.lansforsakringar.se/osfiles/00000-bolanerantor-genomsnittliga.pdf";

type ListRateColumns = {
  rate: number;
  changedOn?: number;
};

/**
 * The column layout of the list-rate table shifts between regional pages, so
 * columns are picked by header text: the rate is the "ränta" column that is
 * not a change column, the date is the "datum" column.
 */
export function findListRateColumns(header: string[]): ListRateColumns {
  let rate: number | undefined;
  let changedOn: number | undefined;
  header.forEach((cell, index) => {
    const lower = cell.toLowerCase();
    if (lower.includes("ränta") && !lower.includes("ändring")) rate = index;
    if (lower.includes("datum")) changedOn = index;
  });
  if (rate === undefined) {
    throw new ShapeError(`no rate column in header: ${JSON.stringify(header)}`);
  }
  return { rate, changedOn };
}

export class LansforsakringarCrawler implements BankCrawler {
  bankId = BankId.LANSFORSAKRINGAR;
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
        const text = await extractText(await this.deps.http.fetchRaw(AVERAGE_RATES_PDF_URL, { signal }));
        // periods are anchored by YYYYMMDD tokens, terms read "3 Månader", "1 År"
        const sets = parseAverageRates(text, { bank: BankNames[this.bankId], crawledAt, logger: this.logger });
        for (const set of sets) {
          out.push(set);
        }
      }),
    ]);
  }

  private extractListRates(html: string, crawledAt: Date, out: RateSink): void {
    const table = extractTable(html, "Aktuella listräntor", "textBeforeTable");
    const columns = findListRateColumns(table.header);

    for (const { term, rate, row } of readTermRates(table.rows, this.logger, { term: 0, rate: columns.rate })) {
      const changedOn = columns.changedOn === undefined ? undefined : this.optionalChangedOn(row[columns.changedOn]);
      emit(out, this.logger, () =>
        createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
      );
    }
  }

  private optionalChangedOn(cell: string | undefined): string | undefined {
    const date = cell?.match(/\d{4}-\d{2}-\d{2}/)?.[0];
    if (date === undefined) return undefined;
    try {
      return parseIsoDate(date);
    } catch {
      this.logger.debug("ignoring unparseable change date", { input: cell });
      return undefined;
    }
  }
}
