import { loadDocument, locateTable, type AnchorMode, type HtmlDocument, type LocateOptions } from "./locate.js";
import { parseTable, type Table } from "./parse.js";

export { loadDocument, locateTable, type AnchorMode, type HtmlDocument, type LocateOptions } from "./locate.js";
export { parseTable, type Table } from "./parse.js";
export { sanitizeRows } from "./sanitize.js";

/**
 * Locates a table by anchor phrase and parses it
 */
export function extractTable(
  document: HtmlDocument,
  anchorPhrase: string,
  mode: AnchorMode,
  options?: LocateOptions
): Table {
  const $ = loadDocument(document);
  return parseTable($, locateTable($, anchorPhrase, mode, options));
}
