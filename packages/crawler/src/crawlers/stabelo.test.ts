import { describe, it, expect, beforeAll, vi } from "vitest";
import { RateType, Term, type InterestSet } from "@rantekoll/core";
import { extractText } from "../pdf/extract-text.js";
import { StabeloCrawler } from "./stabelo.js";
import { collect, fixtureDeps, readFixture } from "./test-helpers.js";

vi.mock("../pdf/extract-text.js", () => ({ extractText: vi.fn() }));

const PAGE_URL = "https://www.stabelo.se/bolanerantor";
const PDF_URL = "https://www.stabelo.se/dokument/Stabelo%20genomsnittsr%C3%A4ntor%202025.pdf";
const RATE_TABLE_URL = "https://api.stabelo.se/rate-table/";

describe("StabeloCrawler", () => {
  let sets: InterestSet[];

  beforeAll(async () => {
    const text = await readFixture("stabelo/average-rates.txt");
    vi.mocked(extractText).mockResolvedValue(text);
    sets = await collect(
      new StabeloCrawler(
        fixtureDeps({
          [PAGE_URL]: "stabelo/rates-page.html",
          [PDF_URL]: "stabelo/average-rates.txt",
          [RATE_TABLE_URL]: "stabelo/rate-table.html",
        })
      )
    );
  });

  it("should pick the average-rate PDF over other PDF links", () => {
    const crawler = new StabeloCrawler(fixtureDeps({}));
    const html = '<a href="/terms.pdf">Villkor</a><a href="https://cdn.example.test/snittrantor.pdf?v=2">Snitt</a>';
    expect(crawler.findPdfLink(html)).toBe("https://cdn.example.test/snittrantor.pdf?v=2");
  });

  it("should fall back to the first PDF link", () => {
    const crawler = new StabeloCrawler(fixtureDeps({}));
    expect(crawler.findPdfLink('<a href="rapport.pdf">Rapport</a>')).toBe("https://www.stabelo.se/rapport.pdf");
  });

  it("should pass the downloaded PDF to text extraction", () => {
    expect(extractText).toHaveBeenCalledWith(expect.any(Uint8Array));
  });

  it("should extract 10 average rates, skipping dashes", () => {
    const averages = sets.filter((s) => s.type === RateType.AVERAGE);
    expect(averages).toHaveLength(10);
    expect(averages.every((s) => s.bank === "Stabelo")).toBe(true);
  });

  it("should attach each rate to its month and term", () => {
    const tenYears = sets.filter((s) => s.type === RateType.AVERAGE && s.term === Term.TEN_YEARS);
    expect(tenYears).toHaveLength(1);
    expect(tenYears[0]).toMatchObject({ nominal_rate: 3.4, average_reference_month: { year: 2025, month: 9 } });
  });

  it("should take the highest streamed rate per fixation as list rate", () => {
    const lists = sets.filter((s) => s.type === RateType.LIST);
    expect(lists.map((s) => [s.term, s.nominal_rate])).toEqual([
      [Term.THREE_MONTHS, 3.89],
      [Term.ONE_YEAR, 3.72],
      [Term.TWO_YEARS, 3.68],
    ]);
    expect(lists.every((s) => s.type === RateType.LIST && s.changed_on === undefined)).toBe(true);
  });

  it("should read the rate buttons as rates for loans up to 60 percent", () => {
    const discounted = sets.filter((s) => s.type === RateType.RATIO_DISCOUNTED);
    expect(discounted.map((s) => [s.term, s.nominal_rate])).toEqual([
      [Term.THREE_MONTHS, 2.54],
      [Term.ONE_YEAR, 2.73],
      [Term.TWO_YEARS, 2.81],
    ]);
    expect(discounted[0]).toMatchObject({ ratio_discount_boundaries: { min_ratio: 0, max_ratio: 60 } });
  });

  it("should ignore numbers that run into longer digit sequences", () => {
    const crawler = new StabeloCrawler(fixtureDeps({}));
    const out: InterestSet[] = [];
    crawler.extractListRates('["3M",[20251,412]]', new Date("2025-11-05T08:00:00Z"), { push: (s) => out.push(s) });
    expect(out.map((s) => s.nominal_rate)).toEqual([4.12]);
  });

  it("should fail the list rates when the page state has none", () => {
    const crawler = new StabeloCrawler(fixtureDeps({}));
    expect(() => crawler.extractListRates("<html></html>", new Date(), { push: () => undefined })).toThrow(
      "no list rates in rate table page state"
    );
  });
});
