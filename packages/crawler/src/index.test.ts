import { describe, it, expect } from "vitest";
import { BankId } from "@rantekoll/core";
import { createAllCrawlers, selectCrawlers } from "./index.js";
import { fixtureDeps } from "./crawlers/test-helpers.js";

describe("selectCrawlers", () => {
  const all = createAllCrawlers(fixtureDeps({}));

  it("should keep every crawler when none are named", () => {
    expect(selectCrawlers(all, { crawlers: [] })).toHaveLength(all.length);
  });

  it("should keep only the named crawlers", () => {
    const selected = selectCrawlers(all, { crawlers: [BankId.SBAB, BankId.NORDEA] });
    expect(selected.map((c) => c.bankId).sort()).toEqual([BankId.NORDEA, BankId.SBAB]);
  });
});
