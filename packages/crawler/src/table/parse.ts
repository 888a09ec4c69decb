import type * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { ShapeError } from "../errors.js";
import { normalizeSpaces } from "../normalize/index.js";

export type Table = {
  header: string[];
  rows: string[][];
};

/**
 * Reads a table into a header and body rows.
 *
 * th and td are both cells, taken in column order and whitespace-normalized.
 * Cell text is the concatenation of its text nodes, so "3<br>mån" reads as
 * "3mån". Rows are not padded; callers check lengths before indexing.
 */
export function parseTable($: cheerio.CheerioAPI, table: Element): Table {
  if (table.name !== "table") {
    throw new ShapeError(`expected <table>, got <${table.name}>`);
  }

  // rows of nested tables belong to those tables
  const rows = $(table)
    .find("tr")
    .filter((_, tr) => $(tr).closest("table")[0] === table)
    .toArray()
    .map((tr) =>
      $(tr)
        .children("th, td")
        .toArray()
        .map((cell) => normalizeSpaces($(cell).text()))
    )
    .filter((cells) => cells.length > 0);

  const [header = [], ...body] = rows;
  return { header, rows: body };
}
