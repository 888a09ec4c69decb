import { Term } from "@rantekoll/core";
import { TermHeaderError, UnsupportedTermError } from "../errors.js";
import { normalizeSpaces } from "./text.js";

export type TermMatch =
  | { kind: "term"; term: Term }
  | { kind: "header" }
  | { kind: "unsupported" };

const YEAR_TERMS: Readonly<Record<number, Term>> = {
  1: Term.ONE_YEAR,
  2: Term.TWO_YEARS,
  3: Term.THREE_YEARS,
  4: Term.FOUR_YEARS,
  5: Term.FIVE_YEARS,
  6: Term.SIX_YEARS,
  7: Term.SEVEN_YEARS,
  8: Term.EIGHT_YEARS,
  9: Term.NINE_YEARS,
  10: Term.TEN_YEARS,
};

const WORD_NUMBERS: Readonly<Record<string, number>> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  twelve: 12,
};

// Matched against the lowercased input with spaces, underscores and dashes removed
const MONTH_TERM = /(?:^|\D)(\d{1,3})(?:månader|månad|mån|mnd|months|month|mon|mo|m)/;
const YEAR_TERM = /(?:^|\D)(\d{1,2})(?:år|years|year|yrs|yr|y)/;
const WORD_MONTH_TERM = /^([a-z]+?)months?$/;
const WORD_YEAR_TERM = /^([a-z]+?)years?$/;

const HEADER_WORDS = [
  "bindningstid",
  "genomsnitt",
  "snittränt",
  "månad",
  "period",
  "räntebindning",
  "löptid",
  "datum",
  "term",
];
const EXACT_HEADERS = new Set(["tot", "totalt", "år", "ränta"]);

const HEADER: TermMatch = { kind: "header" };
const UNSUPPORTED: TermMatch = { kind: "unsupported" };

function fromMonths(months: number): TermMatch {
  if (months === 3) return { kind: "term", term: Term.THREE_MONTHS };
  if (months === 6) return { kind: "term", term: Term.SIX_MONTHS };
  if (months % 12 === 0) return fromYears(months / 12);
  return UNSUPPORTED;
}

function fromYears(years: number): TermMatch {
  const term = YEAR_TERMS[years];
  return term ? { kind: "term", term } : UNSUPPORTED;
}

function matchWordTerm(compact: string): TermMatch | undefined {
  const months = WORD_MONTH_TERM.exec(compact);
  if (months) {
    const n = WORD_NUMBERS[months[1]];
    return n === undefined ? UNSUPPORTED : fromMonths(n);
  }
  const years = WORD_YEAR_TERM.exec(compact);
  if (years) {
    const n = WORD_NUMBERS[years[1]];
    return n === undefined ? UNSUPPORTED : fromYears(n);
  }
  return undefined;
}

/**
 * Classifies a term spelling.
 *
 * Accepts Swedish ("3 mån", "1 år", "5-årig"), English ("3 months", "2 yrs"),
 * compact codes ("3M", "10y") and enum-style identifiers ("P_3_MONTHS",
 * "three_months", "oneYear"). Strings without digits that name a column
 * ("Bindningstid", "Månad", "Tot") are reported as headers.
 */
export function matchTerm(input: string): TermMatch {
  const compact = normalizeSpaces(input)
    .toLowerCase()
    .replace(/[\s_\-.]/g, "");
  if (compact === "") return UNSUPPORTED;

  if (!/\d/.test(compact)) {
    const word = matchWordTerm(compact);
    if (word) return word;
    if (EXACT_HEADERS.has(compact) || HEADER_WORDS.some((w) => compact.includes(w))) {
      return HEADER;
    }
    return UNSUPPORTED;
  }

  const months = MONTH_TERM.exec(compact);
  if (months) return fromMonths(Number(months[1]));

  const years = YEAR_TERM.exec(compact);
  if (years) return fromYears(Number(years[1]));

  return UNSUPPORTED;
}

/**
 * Like matchTerm, but throws TermHeaderError or UnsupportedTermError
 */
export function parseTerm(input: string): Term {
  const match = matchTerm(input);
  switch (match.kind) {
    case "term":
      return match.term;
    case "header":
      throw new TermHeaderError(input);
    case "unsupported":
      throw new UnsupportedTermError(input);
  }
}
