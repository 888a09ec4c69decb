import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { locateTable } from "./locate.js";
import { TableNotFoundError } from "../errors.js";

const HTML = `
<html><body>
  <table id="nav"><tr><td>Meny</td></tr></table>
  <h2>Listräntor&nbsp;för bolån</h2>
  <p>Gäller från idag</p>
  <table id="list"><tr><td>3 mån</td></tr></table>
  <table id="second"><tr><td>1 år</td></tr></table>
  <table id="averages">
    <caption>Våra historiska genomsnittsräntor</caption>
    <tr><td>Månad</td></tr>
  </table>
  <script>var text = "Snitträntor"; </script>
  <table id="after-script"><tr><td>x</td></tr></table>
</body></html>`;

describe("locateTable", () => {
  const $ = cheerio.load(HTML);

  it("should take the first table after the anchor text", () => {
    expect(locateTable($, "Listräntor för bolån", "textBeforeTable").attribs.id).toBe("list");
  });

  it("should skip the requested number of following tables", () => {
    expect(locateTable($, "Listräntor för bolån", "textBeforeTable", { skip: 1 }).attribs.id).toBe(
      "second"
    );
  });

  it("should match a substring of a text node", () => {
    expect(locateTable($, "från idag", "textBeforeTable").attribs.id).toBe("list");
  });

  it("should find a table by caption", () => {
    expect(locateTable($, "historiska genomsnittsräntor", "caption").attribs.id).toBe("averages");
  });

  it("should throw when the anchor text is absent", () => {
    expect(() => locateTable($, "Finns inte", "textBeforeTable")).toThrow(TableNotFoundError);
  });

  it("should throw when no table follows the anchor", () => {
    const doc = cheerio.load("<table><tr><td>a</td></tr></table><p>Sist på sidan</p>");
    expect(() => locateTable(doc, "Sist på sidan", "textBeforeTable")).toThrow(
      'no table after "Sist på sidan"'
    );
  });

  it("should ignore anchor text inside scripts", () => {
    expect(() => locateTable($, "Snitträntor", "textBeforeTable")).toThrow(TableNotFoundError);
  });

  it("should throw when no caption matches", () => {
    expect(() => locateTable($, "Listräntor", "caption")).toThrow(TableNotFoundError);
  });
});
