import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { parseTable } from "./parse.js";
import { ShapeError } from "../errors.js";

function parse(html: string) {
  const $ = cheerio.load(html);
  const table = $("table").first().get(0);
  if (!table) throw new Error("fixture has no table");
  return parseTable($, table);
}

describe("parseTable", () => {
  it("should split header and rows across thead and tbody", () => {
    const table = parse(`
      <table>
        <thead><tr><th>Bindningstid</th><th>Ränta</th></tr></thead>
        <tbody>
          <tr><td>3 mån</td><td>3,33 %</td></tr>
          <tr><td>1 år</td><td>3,44 %</td></tr>
        </tbody>
      </table>`);

    expect(table).toEqual({
      header: ["Bindningstid", "Ränta"],
      rows: [
        ["3 mån", "3,33 %"],
        ["1 år", "3,44 %"],
      ],
    });
  });

  it("should concatenate text around line breaks", () => {
    const table = parse("<table><tr><td>Part1<br/>Part2</td></tr></table>");
    expect(table.header).toEqual(["Part1Part2"]);
  });

  it("should normalize entities and whitespace", () => {
    const table = parse("<table><tr><td>  3&nbsp;mån \n</td><td><span>2,5</span> %</td></tr></table>");
    expect(table.header).toEqual(["3 mån", "2,5 %"]);
  });

  it("should skip empty rows and keep short rows unpadded", () => {
    const table = parse(`
      <table>
        <tr><th>Månad</th><th>3 mån</th><th>1 år</th></tr>
        <tr></tr>
        <tr><td>2025 10</td><td>2,61</td></tr>
      </table>`);
    expect(table.rows).toEqual([["2025 10", "2,61"]]);
  });

  it("should return an empty header for an empty table", () => {
    expect(parse("<table></table>")).toEqual({ header: [], rows: [] });
  });

  it("should leave rows of nested tables out", () => {
    const table = parse(`
      <table>
        <tr><td>outer</td></tr>
        <tr><td><table><tr><td>inner</td></tr></table></td></tr>
        <tr><td>last</td></tr>
      </table>`);
    expect(table.rows).toEqual([["inner"], ["last"]]);
  });

  it("should degrade gracefully on an unclosed table", () => {
    const table = parse("<table><tr><td>3 mån<td>3,10 %");
    expect(table.header).toEqual(["3 mån", "3,10 %"]);
  });

  it("should reject elements that are not tables", () => {
    const $ = cheerio.load("<div>x</div>");
    const div = $("div").get(0);
    if (!div) throw new Error("fixture has no div");
    expect(() => parseTable($, div)).toThrow(ShapeError);
  });
});
