import { describe, it, expect, beforeAll } from "vitest";
import { RateType, Term, type InterestSet } from "@rantekoll/core";
import { NordeaCrawler, findXlsxLink } from "./nordea.js";
import { buildXlsx, collect, fixtureDeps } from "./test-helpers.js";

const LIST_URL = "https://www.nordea.se/privat/produkter/bolan/listrantor.html";
const HISTORIC_URL = "https://www.nordea.se/privat/produkter/bolan/historiska-bolanerantor.html";
const XLSX_URL = "https://www.nordea.se/content/dam/nordea/se/bolan/historiska-bolanerantor.xlsx";

function historicWorkbook(): Promise<Uint8Array> {
  return buildXlsx([
    { name: "Diagram", rows: [["Listränta 3 mån"], [3.45]] },
    {
      name: "Ränteändringsdagar 1990-2025",
      rows: [
        ["Nordea historiska bolåneräntor"],
        [],
        ["Ränteändringsdag", "3 mån", "1 år", "2 år", "Kommentar"],
        ["11-03-25", 3.45, 3.2, "-"],
        [new Date(Date.UTC(2025, 9, 15)), 3.55, "3,30", 3.1],
        [new Date(Date.UTC(2025, 9, 2)), 3.6, 3.35, 3.15, "sänkning"],
        ["Källa: Nordea"],
      ],
    },
  ]);
}

describe("NordeaCrawler", () => {
  let sets: InterestSet[];

  beforeAll(async () => {
    sets = await collect(
      new NordeaCrawler(
        fixtureDeps({
          [LIST_URL]: "nordea/list-rates.html",
          [HISTORIC_URL]: "nordea/historic-rates.html",
          [XLSX_URL]: await historicWorkbook(),
        })
      )
    );
  });

  describe("list rates", () => {
    let list: InterestSet[];

    beforeAll(() => {
      list = sets.filter((s) => s.type === RateType.LIST);
    });

    it("should extract 5 list rates, skipping a missing rate and a missing date", () => {
      expect(list).toHaveLength(5);
      expect(list.every((s) => s.bank === "Nordea")).toBe(true);
    });

    it("should carry the change date of each row", () => {
      const threeMonths = list.find((s) => s.term === Term.THREE_MONTHS);
      expect(threeMonths).toMatchObject({ nominal_rate: 3.64, changed_on: "2025-10-02" });
    });

    it("should stamp records with the crawl time", () => {
      expect(list[0].last_crawled_at).toBe("2025-11-20T06:00:00.000Z");
    });

    it("should read only the anchored table", () => {
      expect(list.find((s) => s.term === Term.ONE_YEAR)?.nominal_rate).toBe(3.49);
    });
  });

  describe("historic rates", () => {
    let averages: InterestSet[];

    beforeAll(() => {
      averages = sets.filter((s) => s.type === RateType.AVERAGE);
    });

    it("should take the last change of each month from the workbook", () => {
      expect(averages.map((s) => (s.type === RateType.AVERAGE ? [s.average_reference_month, s.term, s.nominal_rate] : []))).toEqual([
        [{ year: 2025, month: 11 }, Term.THREE_MONTHS, 3.45],
        [{ year: 2025, month: 11 }, Term.ONE_YEAR, 3.2],
        [{ year: 2025, month: 10 }, Term.THREE_MONTHS, 3.55],
        [{ year: 2025, month: 10 }, Term.ONE_YEAR, 3.3],
        [{ year: 2025, month: 10 }, Term.TWO_YEARS, 3.1],
      ]);
    });
  });

  it("should resolve a relative workbook link against the historic page", () => {
    expect(findXlsxLink('<a href="files/rantor.xlsx?v=3">Excel</a>')).toBe(
      "https://www.nordea.se/privat/produkter/bolan/files/rantor.xlsx?v=3"
    );
  });

  it("should keep list rates when the workbook is not a spreadsheet", async () => {
    const result = await collect(
      new NordeaCrawler(
        fixtureDeps({
          [LIST_URL]: "nordea/list-rates.html",
          [HISTORIC_URL]: "nordea/historic-rates.html",
          [XLSX_URL]: new TextEncoder().encode("not a workbook"),
        })
      )
    );
    expect(result).toHaveLength(5);
    expect(result.every((s) => s.type === RateType.LIST)).toBe(true);
  });

  it("should push nothing when no page can be fetched", async () => {
    await expect(collect(new NordeaCrawler(fixtureDeps({})))).resolves.toEqual([]);
  });
});
