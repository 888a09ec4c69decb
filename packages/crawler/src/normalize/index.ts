export { normalizeSpaces } from "./text.js";
export { matchTerm, parseTerm, type TermMatch } from "./terms.js";
export { parseRate, parseRateValue } from "./rates.js";
export {
  MIN_YEAR,
  MAX_YEAR,
  swedishMonthNumber,
  toAvgMonth,
  parseIsoDate,
  parseCompactDate,
  parseSwedishDayMonthYear,
  parseMonthDayYearShort,
  avgMonthOfDate,
  parseYearMonthDashed,
  parseYearMonthCompact,
  parseYYMM,
  parseYearMonthSpaced,
  parseSwedishMonthYear,
  parseSwedishYearMonth,
} from "./dates.js";
