import { BankId, BankNames, createListRate } from "@rantekoll/core";
import * as cheerio from "cheerio";
import { ShapeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeSpaces, parseIsoDate } from "../normalize/index.js";
import { expectArray, extractBlob, isRecord, parseBlob, resolvePath } from "../payload/index.js";
import type { Table } from "../table/index.js";
import { crawlTime, emit, readTermRates, runSubCrawl } from "./shared.js";
import type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";

const LIST_RATES_URL = "https://www.skandia.se/lana/bolan/bolanerantor/";

type TableBlock = {
  headerText: string;
  columns: Array<{ cellHeader: string; cells: string[] }>;
};

function cellText(html: string): string {
  return normalizeSpaces(cheerio.load(html).root().text());
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/**
 * Content blocks are referenced as { contentLink: { expanded: {...} } }
 */
function expandedBlock(section: unknown): Record<string, unknown> | undefined {
  if (!isRecord(section) || !isRecord(section.contentLink)) return undefined;
  const expanded = section.contentLink.expanded;
  return isRecord(expanded) ? expanded : undefined;
}

function toTableBlock(block: Record<string, unknown>): TableBlock | undefined {
  if (!strings(block.contentType).includes("TableBlock")) return undefined;
  const headerText = isRecord(block.header) && typeof block.header.headerText === "string" ? block.header.headerText : "";
  const columns = (Array.isArray(block.columns) ? block.columns : []).flatMap((column) => {
    const expanded = expandedBlock(column);
    if (!expanded) return [];
    return [{ cellHeader: typeof expanded.cellHeader === "string" ? expanded.cellHeader : "", cells: strings(expanded.cells) }];
  });
  return { headerText, columns };
}

/**
 * Turns a column-oriented table block into header and rows
 */
function toTable(block: TableBlock): Table {
  const height = Math.max(0, ...block.columns.map((c) => c.cells.length));
  const rows: string[][] = [];
  for (let i = 0; i < height; i++) {
    rows.push(block.columns.map((c) => cellText(c.cells[i] ?? "")));
  }
  return { header: block.columns.map((c) => normalizeSpaces(c.cellHeader)), rows };
}

export class SkandiaCrawler implements BankCrawler {
  bankId = BankId.SKANDIA;
  sourceUrl = LIST_RATES_URL;

  private readonly logger: Logger;

  constructor(private readonly deps: CrawlerDeps) {
    this.logger = deps.logger.child(this.bankId);
  }

  async crawl(out: RateSink, signal: AbortSignal): Promise<void> {
    const crawledAt = crawlTime(this.deps);
    await runSubCrawl(this.logger, "list rates", async () => {
      const html = await this.deps.http.fetch(LIST_RATES_URL, { signal });
      this.extractListRates(html, crawledAt, out);
    });
  }

  private extractListRates(html: string, crawledAt: Date, out: RateSink): void {
    const content = parseBlob(extractBlob(html, { kind: "assignment", target: "SKB.pageContent" }));
    const sections = expectArray(resolvePath(content, ["sectionContent2"]), "sectionContent2");

    const block = sections
      .map(expandedBlock)
      .flatMap((expanded) => (expanded ? [toTableBlock(expanded)] : []))
      .find((table) => table?.headerText.includes("Listräntor"));
    if (!block) {
      throw new ShapeError("no TableBlock with header containing \"Listräntor\"");
    }

    // Bindningstid | Listränta | Senast ändrad, in any column order
    const table = toTable(block);
    const column = (needle: string) => table.header.findIndex((h) => h.toLowerCase().includes(needle));
    const termColumn = column("bindningstid");
    const rateColumn = column("listränta");
    const changedOnColumn = column("ändrad");
    if (termColumn < 0 || rateColumn < 0) {
      throw new ShapeError(`term or rate column missing: ${JSON.stringify(table.header)}`);
    }

    for (const { term, rate, row } of readTermRates(table.rows, this.logger, { term: termColumn, rate: rateColumn })) {
      const changedOn = changedOnColumn < 0 ? undefined : this.optionalChangedOn(row[changedOnColumn]);
      emit(out, this.logger, () =>
        createListRate({ bank: BankNames[this.bankId], term, nominalRate: rate, crawledAt, changedOn })
      );
    }
  }

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
