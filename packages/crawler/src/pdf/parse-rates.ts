import { createAverageRate, type AverageRateSet, type AvgMonth, type Term } from "@rantekoll/core";
import { ParseError, ShapeError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  avgMonthOfDate,
  matchTerm,
  parseCompactDate,
  parseIsoDate,
  parseRate,
  parseYearMonthDashed,
  swedishMonthNumber,
  toAvgMonth,
} from "../normalize/index.js";

export type AverageRatePeriod = {
  month: AvgMonth;
  /** One entry per term column; null where the publisher left the cell blank */
  rates: Array<number | null>;
};

export type AverageRateTable = {
  terms: Term[];
  periods: AverageRatePeriod[];
};

export type PdfTableOptions = {
  /** Where the header starts; defaults to the start of the text */
  headerStart?: RegExp;
};

const TERM_TOKEN = /(\d+)\s*(månader|månad|mån|år)/gi;
const RATE_TOKEN = /^\d{1,2}[,.]\d{1,4}%?$/;
const PLACEHOLDERS = new Set(["-", "–", "—", "*", "n/a"]);
const MONTH_TOKEN = /^([a-zåäö]+\.?)(\d{4})?$/i;
const YEAR_TOKEN = /^\d{4}$/;

type Anchor = { month: AvgMonth; start: number; end: number };

function anchorAt(tokens: string[], i: number): Anchor | undefined {
  const token = tokens[i];
  try {
    if (/^\d{8}$/.test(token)) {
      return { month: avgMonthOfDate(parseCompactDate(token)), start: i, end: i + 1 };
    }
    if (/^\d{4}-\d{2}-\d{2}$/.test(token)) {
      return { month: avgMonthOfDate(parseIsoDate(token)), start: i, end: i + 1 };
    }
    if (/^\d{4}-\d{2}$/.test(token)) {
      return { month: parseYearMonthDashed(token), start: i, end: i + 1 };
    }
  } catch (error) {
    // a date-shaped token that is not a date does not start a period
    if (error instanceof ParseError) return undefined;
    throw error;
  }

  const named = MONTH_TOKEN.exec(token);
  const month = named ? swedishMonthNumber(named[1]) : undefined;
  if (!named || month === undefined) return undefined;

  const gluedYear = named[2];
  if (gluedYear !== undefined) {
    return toAnchor(Number(gluedYear), month, token, i, i + 1);
  }
  const next = tokens[i + 1];
  if (next !== undefined && YEAR_TOKEN.test(next)) {
    return toAnchor(Number(next), month, `${token} ${next}`, i, i + 2);
  }
  return undefined;
}

function toAnchor(year: number, month: number, input: string, start: number, end: number): Anchor | undefined {
  try {
    return { month: toAvgMonth(year, month, input), start, end };
  } catch (error) {
    if (error instanceof ParseError) return undefined;
    throw error;
  }
}

function findAnchors(tokens: string[]): Anchor[] {
  const anchors: Anchor[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const anchor = anchorAt(tokens, i);
    if (anchor) {
      anchors.push(anchor);
      i = anchor.end - 1;
    }
  }
  return anchors;
}

function discoverTerms(header: string): Term[] {
  const terms: Term[] = [];
  for (const match of header.matchAll(TERM_TOKEN)) {
    const unit = match[2].toLowerCase().startsWith("mån") ? "mån" : "år";
    const result = matchTerm(`${match[1]} ${unit}`);
    if (result.kind === "term" && !terms.includes(result.term)) {
      terms.push(result.term);
    }
  }
  return terms;
}

function readRates(tokens: string[], columns: number): Array<number | null> {
  const rates: Array<number | null> = [];
  for (const token of tokens) {
    if (rates.length === columns) break;
    if (RATE_TOKEN.test(token)) {
      try {
        rates.push(parseRate(token));
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        rates.push(null);
      }
    } else if (PLACEHOLDERS.has(token.toLowerCase())) {
      rates.push(null);
    }
  }
  return rates;
}

/**
 * Reads an average-rate table from a PDF text stream.
 *
 * Term columns come from "<n> mån/år" tokens in the header, which ends at the
 * first period anchor (a date token or "month-name year") followed by rates.
 * Anchors before it belong to titles and are ignored. The rate-looking tokens
 * after each anchor are zipped with the term columns in order.
 */
export function parseAverageRateTable(text: string, options: PdfTableOptions = {}): AverageRateTable {
  let body = text;
  if (options.headerStart) {
    const start = options.headerStart.exec(text);
    if (!start) {
      throw new ShapeError(`header ${options.headerStart} not found`);
    }
    body = text.slice(start.index);
  }

  const tokens = body.split(/\s+/).filter((token) => token.length > 0);
  const anchors = findAnchors(tokens);
  if (anchors.length === 0) {
    throw new ShapeError("no period anchors found in PDF text");
  }

  const periodTokens = (k: number): string[] =>
    tokens.slice(anchors[k].end, k + 1 < anchors.length ? anchors[k + 1].start : tokens.length);

  // A title or byline may carry a date; the table starts at the first period with rates
  const first = anchors.findIndex((_, k) => readRates(periodTokens(k), Infinity).some((rate) => rate !== null));
  if (first === -1) {
    throw new ShapeError("no period with rates found in PDF text");
  }

  const terms = discoverTerms(tokens.slice(0, anchors[first].start).join(" "));
  if (terms.length === 0) {
    throw new ShapeError("no term columns found in PDF header");
  }

  const periods: AverageRatePeriod[] = [];
  for (let k = first; k < anchors.length; k++) {
    periods.push({ month: anchors[k].month, rates: readRates(periodTokens(k), terms.length) });
  }

  return { terms, periods };
}

/**
 * Average-rate records of a PDF text stream. Blank cells produce no record.
 */
export function parseAverageRates(
  text: string,
  context: { bank: string; crawledAt: Date; logger: Logger } & PdfTableOptions
): AverageRateSet[] {
  const { terms, periods } = parseAverageRateTable(text, context);
  const sets: AverageRateSet[] = [];

  for (const period of periods) {
    period.rates.forEach((rate, column) => {
      if (rate === null) return;
      try {
        sets.push(
          createAverageRate({
            bank: context.bank,
            term: terms[column],
            nominalRate: rate,
            crawledAt: context.crawledAt,
            month: period.month,
          })
        );
      } catch (error) {
        context.logger.warn("skipping invalid average rate", {
          month: period.month,
          term: terms[column],
          error: errorMessage(error),
        });
      }
    });
  }

  return sets;
}
