import { BankId, BankNames, createAverageRate } from "@rantekoll/core";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeSpaces, parseYearMonthDashed } from "../normalize/index.js";
import { expectArray, extractBlob, findInArray, parseBlob, resolvePath } from "../payload/index.js";
import type { Table } from "../table/index.js";
import { crawlTime, emit, readMonthlyAverages, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const AVERAGE_RATES_URL = "https://www.nordax.se/lana/bolan/genomsnittsrantor";

const BODY_PATH = ["props", "pageProps", "page", "content", 0, "expandableContent", 0, "body"];

/**
 * Nordax only publishes average rates. They live in a CMS table block of the
 * page's embedded data, not in the rendered markup.
 */
export class NordaxCrawler implements BankCrawler {
  bankId = BankId.NORDAX;
  sourceUrl = AVERAGE_RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "average rates", async () => {
      const html = await this.deps.http.fetch(AVERAGE_RATES_URL, { signal });
      this.extractAverageRates(html, crawledAt, out);
    });
  }

  private extractAverageRates(html: string, crawledAt: Date, out: RateSink): void {
    // Datum | 3 månaders | 36 månaders | 60 månaders, months as YYYY-MM
    const table = this.readTableBlock(html);

    for (const { month, term, rate } of readMonthlyAverages(table, parseYearMonthDashed, this.logger)) {
      emit(out, this.logger, () =>
        createAverageRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, month })
      );
    }
  }

  private readTableBlock(html: string): Table {
    const data = parseBlob(extractBlob(html, { kind: "scriptId", id: "__NEXT_DATA__" }));
    const body = expectArray(resolvePath(data, BODY_PATH), "page body");
    const block = findInArray(body, (item) => item._type === "table", "table block");

    const rows = expectArray(resolvePath(block, ["content", "rows"]), "table rows").map((row) =>
      expectArray(resolvePath(row, ["cells"]), "table cells").map((cell) =>
        typeof cell === "string" ? normalizeSpaces(cell) : ""
      )
    );
    const [header, ...bodyRows] = rows;
    if (!header) {
      throw new ShapeError("table block has no rows");
    }
    return { header, rows: bodyRows };
  }
}
