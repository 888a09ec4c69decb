import { format, isValid, parse } from "date-fns";
import type { AvgMonth } from "@rantekoll/core";
import { UnsupportedAvgMonthError, UnsupportedDateError } from "../errors.js";
import { normalizeSpaces } from "./text.js";

export const MIN_YEAR = 1940;
export const MAX_YEAR = 2100;

const SWEDISH_MONTHS: ReadonlyMap<string, number> = new Map([
  ["januari", 1],
  ["jan", 1],
  ["februari", 2],
  ["feb", 2],
  ["mars", 3],
  ["mar", 3],
  ["april", 4],
  ["apr", 4],
  ["maj", 5],
  ["juni", 6],
  ["jun", 6],
  ["juli", 7],
  ["jul", 7],
  ["augusti", 8],
  ["aug", 8],
  ["september", 9],
  ["sept", 9],
  ["sep", 9],
  ["oktober", 10],
  ["okt", 10],
  ["november", 11],
  ["nov", 11],
  ["december", 12],
  ["dec", 12],
]);

/**
 * Month number of a full or abbreviated Swedish month name ("okt.", "Oktober")
 */
export function swedishMonthNumber(token: string): number | undefined {
  return SWEDISH_MONTHS.get(token.toLowerCase().replace(/\.$/, ""));
}

/**
 * Validated calendar month
 */
export function toAvgMonth(year: number, month: number, input: string): AvgMonth {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new UnsupportedAvgMonthError(input, "month out of range");
  }
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new UnsupportedAvgMonthError(input, "year out of range");
  }
  return { year, month };
}

function toDateString(input: string, pattern: string, cleaned: string): string {
  const date = parse(cleaned, pattern, new Date(2000, 0, 1));
  if (!isValid(date)) {
    throw new UnsupportedDateError(input);
  }
  const year = date.getFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new UnsupportedDateError(input, "year out of range");
  }
  return format(date, "yyyy-MM-dd");
}

// === Day-level dates, returned as YYYY-MM-DD ===

export function parseIsoDate(input: string): string {
  const cleaned = normalizeSpaces(input);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(cleaned)) {
    throw new UnsupportedDateError(input);
  }
  return toDateString(input, "yyyy-MM-dd", cleaned);
}

/** YYYYMMDD */
export function parseCompactDate(input: string): string {
  const cleaned = normalizeSpaces(input);
  if (!/^\d{8}$/.test(cleaned)) {
    throw new UnsupportedDateError(input);
  }
  return toDateString(input, "yyyyMMdd", cleaned);
}

/** "12 november 2025", "1 okt. 2025" */
export function parseSwedishDayMonthYear(input: string): string {
  const match = /^(\d{1,2}) ([a-zåäö]+\.?) (\d{4})$/i.exec(normalizeSpaces(input));
  const month = match ? swedishMonthNumber(match[2]) : undefined;
  if (!match || month === undefined) {
    throw new UnsupportedDateError(input);
  }
  const cleaned = `${match[3]}-${String(month).padStart(2, "0")}-${match[1].padStart(2, "0")}`;
  return toDateString(input, "yyyy-MM-dd", cleaned);
}

/**
 * The calendar month a YYYY-MM-DD date falls in
 */
export function avgMonthOfDate(date: string): AvgMonth {
  const match = /^(\d{4})-(\d{2})-\d{2}$/.exec(date);
  if (!match) {
    throw new UnsupportedAvgMonthError(date);
  }
  return toAvgMonth(Number(match[1]), Number(match[2]), date);
}

/**
 * "11-03-25" read as MM-DD-YY, the layout of spreadsheet exports. Two-digit
 * years from 90 up are the 1900s.
 */
export function parseMonthDayYearShort(input: string): string {
  const match = /^(\d{2})-(\d{2})-(\d{2})$/.exec(normalizeSpaces(input));
  if (!match) {
    throw new UnsupportedDateError(input);
  }
  const yy = Number(match[3]);
  const year = yy >= 90 ? 1900 + yy : 2000 + yy;
  return toDateString(input, "yyyy-MM-dd", `${year}-${match[1]}-${match[2]}`);
}

// === Calendar months ===

/** YYYY-MM */
export function parseYearMonthDashed(input: string): AvgMonth {
  const match = /^(\d{4})-(\d{2})$/.exec(normalizeSpaces(input));
  if (!match) throw new UnsupportedAvgMonthError(input);
  return toAvgMonth(Number(match[1]), Number(match[2]), input);
}

/** YYYYMM */
export function parseYearMonthCompact(input: string): AvgMonth {
  const match = /^(\d{4})(\d{2})$/.exec(normalizeSpaces(input));
  if (!match) throw new UnsupportedAvgMonthError(input);
  return toAvgMonth(Number(match[1]), Number(match[2]), input);
}

/**
 * YYMM with a two-digit year: below 40 is the 2000s, otherwise the 1900s
 */
export function parseYYMM(input: string | number): AvgMonth {
  const text = typeof input === "number" ? String(input).padStart(4, "0") : normalizeSpaces(input);
  const match = /^(\d{2})(\d{2})$/.exec(text);
  if (!match) throw new UnsupportedAvgMonthError(String(input));
  const yy = Number(match[1]);
  const year = yy < 40 ? 2000 + yy : 1900 + yy;
  return toAvgMonth(year, Number(match[2]), String(input));
}

/** "YYYY MM" or "YYYY M" */
export function parseYearMonthSpaced(input: string): AvgMonth {
  const match = /^(\d{4}) (\d{1,2})$/.exec(normalizeSpaces(input));
  if (!match) throw new UnsupportedAvgMonthError(input);
  return toAvgMonth(Number(match[1]), Number(match[2]), input);
}

/** "november 2025", "nov. 2025", "Nov 2025" */
export function parseSwedishMonthYear(input: string): AvgMonth {
  const match = /^([a-zåäö]+\.?) (\d{4})$/i.exec(normalizeSpaces(input));
  const month = match ? swedishMonthNumber(match[1]) : undefined;
  if (!match || month === undefined) throw new UnsupportedAvgMonthError(input);
  return toAvgMonth(Number(match[2]), month, input);
}

/** "2025 november", "2025 nov." */
export function parseSwedishYearMonth(input: string): AvgMonth {
  const match = /^(\d{4}) ([a-zåäö]+\.?)$/i.exec(normalizeSpaces(input));
  const month = match ? swedishMonthNumber(match[2]) : undefined;
  if (!match || month === undefined) throw new UnsupportedAvgMonthError(input);
  return toAvgMonth(Number(match[1]), month, input);
}
