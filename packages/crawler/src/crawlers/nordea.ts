import { BankId, BankNames, createAverageRate, createListRate, type Term } from "@rantekoll/core";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { avgMonthOfDate, matchTerm, parseIsoDate, parseMonthDayYearShort, parseRate, parseRateValue } from "../normalize/index.js";
import { cellText, readWorkbook, type Sheet, type SheetCell } from "../spreadsheet/index.js";
import { extractTable, loadDocument } from "../table/index.js";
import { crawlTime, emit, isPlaceholder, readTermRates, reportSkip, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const LIST_RATES_URL = "https://www.nordea.se/privat/produkter/bolan/listrantor.html";
const HISTORIC_RATES_URL = "https://www.nordea.se/privat/produkter/bolan/historiska-bolanerantor.html";

// Bindningstid | Ränta | Ändring | Senast ändrad
const CHANGED_ON_COLUMN = 3;

const HISTORIC_SHEET_HINTS = ["ränteändring", "ranteandring", "historisk"];
const DATE_HEADER_HINTS = ["ränteändringsdag", "ranteandring", "datum"];

type RateChange = { date: string; rate: number };

export class NordeaCrawler implements BankCrawler {
  bankId = BankId.NORDEA;
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
      runSubCrawl(this.logger, "historic rates", async () => {
        const xlsxUrl = findXlsxLink(await this.deps.http.fetch(HISTORIC_RATES_URL, { signal }));
        this.logger.debug("found historic rates workbook", { url: xlsxUrl });
        const sheets = await readWorkbook(await this.deps.http.fetchRaw(xlsxUrl, { signal }));
        this.extractHistoricRates(sheets, crawledAt, out);
      }),
    ]);
  }

  private extractListRates(html: string, crawledAt: Date, out: RateSink): void {
    const table = extractTable(html, "Listräntor för bolån", "textBeforeTable");

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

  /**
   * The workbook lists every rate change day. A month takes the rate of its
   * last change, which is the rate in force at month end.
   */
  private extractHistoricRates(sheets: Sheet[], crawledAt: Date, out: RateSink): void {
    const { rows } = findHistoricSheet(sheets);
    const headerIndex = rows.findIndex((row) =>
      row.slice(0, 3).some((cell) => DATE_HEADER_HINTS.some((hint) => cellText(cell).toLowerCase().includes(hint)))
    );
    if (headerIndex === -1) {
      throw new ShapeError("no header row in historic rates workbook");
    }

    const header = rows[headerIndex].map((cell) => cellText(cell).trim().toLowerCase());
    const dateColumn = Math.max(
      0,
      header.findIndex((cell) => DATE_HEADER_HINTS.some((hint) => cell.includes(hint)))
    );
    const termColumns: Array<{ index: number; term: Term }> = [];
    header.forEach((cell, index) => {
      if (index === dateColumn) return;
      const match = matchTerm(cell);
      if (match.kind === "term") termColumns.push({ index, term: match.term });
    });
    if (termColumns.length === 0) {
      throw new ShapeError(`no term columns in workbook header: ${JSON.stringify(header)}`);
    }

    const latest = new Map<string, RateChange & { term: Term }>();
    for (const row of rows.slice(headerIndex + 1)) {
      let date: string;
      try {
        date = changeDate(row[dateColumn] ?? null);
      } catch {
        // notes and blank lines below the table
        this.logger.debug("skipping workbook row without a change date", { row: row.map(cellText) });
        continue;
      }

      for (const { index, term } of termColumns) {
        const rate = readRateCell(row[index] ?? null, this.logger, { date, term });
        if (rate === undefined) continue;
        const key = `${date.slice(0, 7)}|${term}`;
        const seen = latest.get(key);
        if (!seen || seen.date < date) latest.set(key, { date, rate, term });
      }
    }

    for (const { date, rate, term } of latest.values()) {
      emit(out, this.logger, () =>
        createAverageRate({
          bank: BankNames[this.bankId],
          term,
          nominalRate: rate,
          crawledAt,
          month: avgMonthOfDate(date),
        })
      );
    }
  }
}

/**
 * Absolute URL of the first XLSX link on the page
 */
export function findXlsxLink(html: string): string {
  const $ = loadDocument(html);
  const href = $("a[href]")
    .toArray()
    .map((a) => $(a).attr("href") ?? "")
    .find((link) => /\.xlsx(?:$|[?#])/i.test(link));
  if (href === undefined) {
    throw new ShapeError("no XLSX link on historic rates page");
  }
  return new URL(href, HISTORIC_RATES_URL).toString();
}

function findHistoricSheet(sheets: Sheet[]): Sheet {
  const sheet =
    sheets.find((s) => HISTORIC_SHEET_HINTS.some((hint) => s.name.toLowerCase().includes(hint))) ??
    sheets.find((s) => !s.name.toLowerCase().includes("diagram")) ??
    sheets[0];
  if (!sheet) {
    throw new ShapeError("workbook has no sheets");
  }
  return sheet;
}

// Date cells arrive as dates; older rows hold "MM-DD-YY" text
function changeDate(cell: SheetCell): string {
  if (cell instanceof Date) return parseIsoDate(cellText(cell));
  return parseMonthDayYearShort(cellText(cell));
}

function readRateCell(
  cell: SheetCell,
  logger: Logger,
  context: { date: string; term: Term }
): number | undefined {
  const text = cellText(cell);
  if (isPlaceholder(text)) return undefined;
  try {
    return typeof cell === "number" ? parseRateValue(cell) : parseRate(text);
  } catch (error) {
    reportSkip(logger, error, { ...context, input: text });
    return undefined;
  }
}
