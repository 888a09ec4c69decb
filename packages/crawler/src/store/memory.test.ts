import { describe, it, expect } from "vitest";
import { createAverageRate, createListRate, createRatioDiscountedRate, Term } from "@rantekoll/core";
import { MemoryStore } from "./memory.js";

const crawledAt = new Date("2025-11-03T06:00:00.000Z");

describe("MemoryStore", () => {
  it("should replace a record with the same natural key", async () => {
    const store = new MemoryStore();
    await store.upsertInterestSet(
      createListRate({ bank: "Nordea", term: Term.ONE_YEAR, nominalRate: 3.4, crawledAt, changedOn: "2025-10-01" })
    );
    await store.upsertInterestSet(
      createListRate({ bank: "Nordea", term: Term.ONE_YEAR, nominalRate: 3.5, crawledAt, changedOn: "2025-10-01" })
    );

    const sets = await store.getInterestSets();
    expect(sets).toHaveLength(1);
    expect(sets[0].nominal_rate).toBe(3.5);
  });

  it("should keep list rates with different change dates", async () => {
    const store = new MemoryStore();
    await store.upsertInterestSet(
      createListRate({ bank: "Nordea", term: Term.ONE_YEAR, nominalRate: 3.4, crawledAt, changedOn: "2025-09-01" })
    );
    await store.upsertInterestSet(
      createListRate({ bank: "Nordea", term: Term.ONE_YEAR, nominalRate: 3.5, crawledAt, changedOn: "2025-10-01" })
    );
    expect(await store.getInterestSets()).toHaveLength(2);
  });

  it("should keep average rates of different months", async () => {
    const store = new MemoryStore();
    for (const month of [9, 10, 10]) {
      await store.upsertInterestSet(
        createAverageRate({ bank: "SBAB", term: Term.THREE_MONTHS, nominalRate: 2.6, crawledAt, month: { year: 2025, month } })
      );
    }
    expect(await store.getInterestSets()).toHaveLength(2);
  });

  it("should keep LTV brackets apart", async () => {
    const store = new MemoryStore();
    for (const [min_ratio, max_ratio] of [
      [0, 60],
      [60, 75],
    ]) {
      await store.upsertInterestSet(
        createRatioDiscountedRate({
          bank: "Landshypotek",
          term: Term.THREE_MONTHS,
          nominalRate: 2.5,
          crawledAt,
          boundaries: { min_ratio, max_ratio },
        })
      );
    }
    expect(await store.getInterestSets()).toHaveLength(2);
  });
});
