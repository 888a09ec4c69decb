import type { AvgMonth, InterestSet, Term } from "@rantekoll/core";
import { ZodError } from "zod";
import { ParseError, ShapeError, TermHeaderError, errorMessage } from "../errors.js";
import type { Logger, LogContext } from "../logger.js";
import { matchTerm, normalizeSpaces, parseRate, parseTerm } from "../normalize/index.js";
import type { Table } from "../table/index.js";
import type { CrawlerDeps, RateSink } from "./types.js";

export function crawlTime(deps: CrawlerDeps): Date {
  return deps.now ? deps.now() : new Date();
}

/**
 * Logs a row or field that was skipped. Header cells are expected and only
 * show up at debug level.
 */
export function reportSkip(logger: Logger, error: unknown, context: LogContext = {}): void {
  if (error instanceof TermHeaderError) {
    logger.debug("skipping header cell", { ...context, input: error.input });
  } else if (error instanceof ParseError) {
    logger.warn("skipping unparseable field", { ...context, input: error.input, reason: error.message });
  } else if (error instanceof ZodError) {
    logger.warn("skipping invalid record", { ...context, issues: error.issues.map((i) => i.message) });
  } else {
    logger.warn("skipping row", { ...context, reason: errorMessage(error) });
  }
}

/**
 * Runs one independent part of a crawl (a single source document).
 * Failures are logged and contribute zero records; they never reach the caller.
 */
export async function runSubCrawl(logger: Logger, what: string, task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    const kind = error instanceof ShapeError ? "unexpected document shape" : "failed";
    logger.error(`${what}: ${kind}`, error);
  }
}

/**
 * Builds a record and pushes it, skipping it when validation rejects it
 */
export function emit(out: RateSink, logger: Logger, build: () => InterestSet, context?: LogContext): void {
  let set: InterestSet;
  try {
    set = build();
  } catch (error) {
    reportSkip(logger, error, context);
    return;
  }
  out.push(set);
}

/**
 * Cells that mean "not published" rather than a value: empty, dashes,
 * asterisks ("-*") or "n/a"
 */
export function isPlaceholder(cell: string): boolean {
  return /^(?:[-–—*]*|n\/a)$/i.test(normalizeSpaces(cell));
}

export type TermRate = {
  term: Term;
  rate: number;
  row: string[];
};

export type TermRateColumns = {
  term: number;
  rate: number;
};

/**
 * Reads rows shaped "term | rate | ...". Rows that fail are logged and skipped.
 */
export function readTermRates(
  rows: string[][],
  logger: Logger,
  columns: TermRateColumns = { term: 0, rate: 1 }
): TermRate[] {
  const width = Math.max(columns.term, columns.rate) + 1;
  const result: TermRate[] = [];

  for (const row of rows) {
    if (row.length < width) {
      logger.warn("skipping row with insufficient columns", { row });
      continue;
    }
    try {
      result.push({ term: parseTerm(row[columns.term]), rate: parseRate(row[columns.rate]), row });
    } catch (error) {
      reportSkip(logger, error, { row });
    }
  }

  return result;
}

export type MonthlyRate = {
  month: AvgMonth;
  term: Term;
  rate: number;
};

/**
 * Reads a month-per-row table whose header names one term per column.
 *
 * Header cells that are not terms ("Månad", "Tot") are ignored, placeholder
 * cells are skipped. Throws ShapeError when the header has no term column.
 */
export function readMonthlyAverages(
  table: Table,
  parseMonth: (cell: string) => AvgMonth,
  logger: Logger,
  monthColumn = 0
): MonthlyRate[] {
  const termColumns: Array<{ index: number; term: Term }> = [];
  table.header.forEach((cell, index) => {
    if (index === monthColumn) return;
    const match = matchTerm(cell);
    if (match.kind === "term") termColumns.push({ index, term: match.term });
  });
  if (termColumns.length === 0) {
    throw new ShapeError(`no term columns in header: ${JSON.stringify(table.header)}`);
  }

  const result: MonthlyRate[] = [];
  for (const row of table.rows) {
    const label = row[monthColumn];
    if (label === undefined) continue;

    let month: AvgMonth;
    try {
      month = parseMonth(label);
    } catch (error) {
      reportSkip(logger, error, { row });
      continue;
    }

    for (const { index, term } of termColumns) {
      const cell = row[index];
      if (cell === undefined || isPlaceholder(cell)) continue;
      try {
        result.push({ month, term, rate: parseRate(cell) });
      } catch (error) {
        reportSkip(logger, error, { month: label, term });
      }
    }
  }

  return result;
}
