export { extractText } from "./extract-text.js";
export {
  parseAverageRateTable,
  parseAverageRates,
  type AverageRatePeriod,
  type AverageRateTable,
  type PdfTableOptions,
} from "./parse-rates.js";
