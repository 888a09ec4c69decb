import { readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";
import type { InterestSet } from "@rantekoll/core";
import { HttpStatusError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { HttpClient, RequestOptions } from "../utils/index.js";
import type { CrawlerDeps, RateSink } from "./types.js";

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), "../../../../fixtures");

export const FIXED_NOW = new Date("2025-11-20T06:00:00.000Z");

export function readFixture(file: string): Promise<string> {
  return readFile(join(FIXTURES_DIR, file), "utf-8");
}

/** A fixture file path, or bytes built by the test */
export type FixtureRoute = string | Uint8Array;

/**
 * Serves fixtures by URL; anything unmapped is a 404
 */
export class FixtureHttpClient implements HttpClient {
  readonly requested: string[] = [];
  readonly headers = new Map<string, Record<string, string>>();

  constructor(private readonly routes: Record<string, FixtureRoute>) {}

  async fetch(url: string, options?: RequestOptions): Promise<string> {
    return new TextDecoder("utf-8").decode(await this.fetchRaw(url, options));
  }

  async fetchRaw(url: string, options: RequestOptions = {}): Promise<Uint8Array> {
    this.requested.push(url);
    if (options.headers) this.headers.set(url, options.headers);
    const route = this.routes[url];
    if (route === undefined) {
      throw new HttpStatusError(url, 404, "Not Found");
    }
    return typeof route === "string" ? new Uint8Array(await readFile(join(FIXTURES_DIR, route))) : route;
  }
}

export class CollectingSink implements RateSink {
  readonly sets: InterestSet[] = [];

  push(set: InterestSet): void {
    this.sets.push(set);
  }
}

export function fixtureDeps(routes: Record<string, FixtureRoute>): CrawlerDeps & { http: FixtureHttpClient } {
  return { http: new FixtureHttpClient(routes), logger: silentLogger, now: () => FIXED_NOW };
}

/**
 * Runs a crawler to completion and returns what it pushed
 */
export async function collect(crawler: {
  crawl(out: RateSink, signal: AbortSignal): Promise<void>;
}): Promise<InterestSet[]> {
  const sink = new CollectingSink();
  await crawler.crawl(sink, new AbortController().signal);
  return sink.sets;
}

/**
 * XLSX bytes with the given sheets, for tests of spreadsheet sources
 */
export async function buildXlsx(sheets: Array<{ name: string; rows: CellValue[][] }>): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  for (const { name, rows } of sheets) {
    const worksheet = workbook.addWorksheet(name);
    rows.forEach((cells, r) => {
      cells.forEach((value, c) => {
        if (value !== null) worksheet.getCell(r + 1, c + 1).value = value;
      });
    });
  }
  return new Uint8Array(await workbook.xlsx.writeBuffer());
}
