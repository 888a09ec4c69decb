import { describe, it, expect, beforeAll } from "vitest";
import { RateType, Term, type InterestSet } from "@rantekoll/core";
import { LandshypotekCrawler } from "./landshypotek.js";
import { collect, fixtureDeps } from "./test-helpers.js";

const RATES_URL = "https://www.landshypotek.se/lana/bolanerantor/";

describe("LandshypotekCrawler", () => {
  let sets: InterestSet[];

  beforeAll(async () => {
    sets = await collect(new LandshypotekCrawler(fixtureDeps({ [RATES_URL]: "landshypotek/rates-page.html" })));
  });

  describe("ratio-discounted rates", () => {
    it("should extract 3 rates for the 0-60 bracket", () => {
      const tier = sets.filter(
        (s) => s.type === RateType.RATIO_DISCOUNTED && s.ratio_discount_boundaries.max_ratio === 60
      );
      expect(tier.map((s) => [s.term, s.nominal_rate])).toEqual([
        [Term.THREE_MONTHS, 2.84],
        [Term.ONE_YEAR, 2.79],
        [Term.THREE_YEARS, 2.99],
      ]);
    });

    it("should extract 2 rates for the 60-75 bracket, skipping a non-numeric rate", () => {
      const tier = sets.filter(
        (s) => s.type === RateType.RATIO_DISCOUNTED && s.ratio_discount_boundaries.min_ratio === 60
      );
      expect(tier).toHaveLength(2);
      expect(tier[0]).toMatchObject({ ratio_discount_boundaries: { min_ratio: 60, max_ratio: 75 } });
    });
  });

  describe("list rates", () => {
    it("should extract 3 list rates from the accordion table", () => {
      const list = sets.filter((s) => s.type === RateType.LIST);
      expect(list.map((s) => s.nominal_rate)).toEqual([3.54, 3.49, 3.69]);
    });

    it("should omit the change date when the cell is blank", () => {
      const oneYear = sets.find((s) => s.type === RateType.LIST && s.term === Term.ONE_YEAR);
      expect(oneYear).toBeDefined();
      expect(oneYear && "changed_on" in oneYear).toBe(false);
    });
  });
});
