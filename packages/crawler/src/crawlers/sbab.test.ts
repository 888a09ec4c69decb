import { describe, it, expect, beforeAll } from "vitest";
import { RateType, Term, type InterestSet } from "@rantekoll/core";
import { SbabCrawler } from "./sbab.js";
import { collect, fixtureDeps } from "./test-helpers.js";

const LIST_URL = "https://www.sbab.se/api/interest-mortgage-service/api/external/v1/interest";
const AVERAGE_URL =
  "https://www.sbab.se/api/historical-average-interest-rate-service/interest-rate/average-interest-rate-last-twelve-months-by-period";

describe("SbabCrawler", () => {
  let sets: InterestSet[];

  beforeAll(async () => {
    sets = await collect(
      new SbabCrawler(fixtureDeps({ [LIST_URL]: "sbab/list-rates.json", [AVERAGE_URL]: "sbab/average-rates.json" }))
    );
  });

  describe("list rates", () => {
    it("should extract 4 list rates, skipping an unsupported period and a numeric rate", () => {
      const list = sets.filter((s) => s.type === RateType.LIST);
      expect(list.map((s) => [s.term, s.nominal_rate])).toEqual([
        [Term.THREE_MONTHS, 3.05],
        [Term.ONE_YEAR, 3.1],
        [Term.TWO_YEARS, 3.15],
        [Term.FIVE_YEARS, 3.45],
      ]);
    });

    it("should use validFrom as the change date", () => {
      const fiveYears = sets.find((s) => s.type === RateType.LIST && s.term === Term.FIVE_YEARS);
      expect(fiveYears).toMatchObject({ changed_on: "2025-11-14" });
    });
  });

  describe("average rates", () => {
    it("should extract 6 average rates, skipping nulls and a malformed period", () => {
      const averages = sets.filter((s) => s.type === RateType.AVERAGE);
      expect(averages).toHaveLength(6);
    });

    it("should reference the month the period ends in", () => {
      const threeYears = sets.find((s) => s.type === RateType.AVERAGE && s.term === Term.THREE_YEARS);
      expect(threeYears).toMatchObject({ nominal_rate: 2.9, average_reference_month: { year: 2025, month: 10 } });
    });
  });

  it("should keep average rates when the list rate API fails", async () => {
    const result = await collect(new SbabCrawler(fixtureDeps({ [AVERAGE_URL]: "sbab/average-rates.json" })));
    expect(result).toHaveLength(6);
  });
});
