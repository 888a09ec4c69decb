import { describe, it, expect, beforeAll } from "vitest";
import { RateType, Term, type InterestSet } from "@rantekoll/core";
import { DanskeBankCrawler } from "./danske-bank.js";
import { collect, fixtureDeps } from "./test-helpers.js";

const RATES_URL = "https://danskebank.se/privat/produkter/bolan/relaterat/aktuella-bolanerantor";

describe("DanskeBankCrawler", () => {
  let sets: InterestSet[];

  beforeAll(async () => {
    sets = await collect(new DanskeBankCrawler(fixtureDeps({ [RATES_URL]: "danske-bank/rates-page.html" })));
  });

  it("should extract 4 list rates and skip Premium rows", () => {
    const list = sets.filter((s) => s.type === RateType.LIST);
    expect(list.map((s) => [s.term, s.nominal_rate])).toEqual([
      [Term.THREE_MONTHS, 3.65],
      [Term.ONE_YEAR, 3.5],
      [Term.THREE_YEARS, 3.55],
      [Term.FIVE_YEARS, 3.8],
    ]);
  });

  it("should extract 8 average rates including the split October row", () => {
    const averages = sets.filter((s) => s.type === RateType.AVERAGE);
    expect(averages).toHaveLength(8);
  });

  it("should attach the rates of a split row to its month label", () => {
    const october = sets.filter(
      (s) => s.type === RateType.AVERAGE && s.average_reference_month.month === 10
    );
    expect(october.map((s) => [s.term, s.nominal_rate])).toEqual([
      [Term.THREE_MONTHS, 2.58],
      [Term.ONE_YEAR, 2.8],
      [Term.TWO_YEARS, 2.83],
    ]);
  });
});
