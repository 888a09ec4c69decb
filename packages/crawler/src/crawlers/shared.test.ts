import { describe, it, expect, vi } from "vitest";
import { BankNames, BankId, RateType, Term, createListRate } from "@rantekoll/core";
import { silentLogger, type Logger } from "../logger.js";
import { parseYearMonthDashed } from "../normalize/index.js";
import { extractTable } from "../table/index.js";
import { emit, isPlaceholder, readMonthlyAverages, readTermRates, runSubCrawl } from "./shared.js";
import { CollectingSink, FIXED_NOW } from "./test-helpers.js";

function spyLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe("list rates after a text anchor", () => {
  it("should yield exactly two list rates from a minimal page", () => {
    const html = `
      <p>Aktuella räntor:</p>
      <table>
        <tr><th>Bindningstid</th><th>Ränta</th></tr>
        <tr><td>3 mån</td><td>3,33 %</td></tr>
        <tr><td>1 år</td><td>3,44 %</td></tr>
      </table>`;
    const sink = new CollectingSink();

    const table = extractTable(html, "Aktuella räntor:", "textBeforeTable");
    for (const { term, rate } of readTermRates(table.rows, silentLogger)) {
      emit(sink, silentLogger, () =>
        createListRate({ bank: BankNames[BankId.NORDEA], term, nominalRate: rate, crawledAt: FIXED_NOW })
      );
    }

    expect(sink.sets).toHaveLength(2);
    expect(sink.sets.map((s) => [s.type, s.term, s.nominal_rate])).toEqual([
      [RateType.LIST, Term.THREE_MONTHS, 3.33],
      [RateType.LIST, Term.ONE_YEAR, 3.44],
    ]);
  });
});

describe("readTermRates", () => {
  it("should skip short rows, headers and bad rates", () => {
    const logger = spyLogger();
    const rates = readTermRates(
      [["3 mån"], ["Bindningstid", "Ränta"], ["1 år", "-"], ["2 år", "3,10 %"], ["11 år", "3,9"]],
      logger
    );

    expect(rates).toEqual([{ term: Term.TWO_YEARS, rate: 3.1, row: ["2 år", "3,10 %"] }]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it("should read custom columns", () => {
    const rates = readTermRates([["Bolån", "5 år", "3,75%"]], silentLogger, { term: 1, rate: 2 });
    expect(rates.map((r) => [r.term, r.rate])).toEqual([[Term.FIVE_YEARS, 3.75]]);
  });
});

describe("readMonthlyAverages", () => {
  it("should read one rate per month and term column", () => {
    const rates = readMonthlyAverages(
      {
        header: ["Månad", "3 mån", "1 år", "Tot"],
        rows: [
          ["2025-10", "2,71", "-", "5"],
          ["2025-09", "2,80", "2,95", "5"],
          ["oktober", "2,10", "2,20", "5"],
        ],
      },
      parseYearMonthDashed,
      silentLogger
    );

    expect(rates).toEqual([
      { month: { year: 2025, month: 10 }, term: Term.THREE_MONTHS, rate: 2.71 },
      { month: { year: 2025, month: 9 }, term: Term.THREE_MONTHS, rate: 2.8 },
      { month: { year: 2025, month: 9 }, term: Term.ONE_YEAR, rate: 2.95 },
    ]);
  });

  it("should reject a header without term columns", () => {
    expect(() =>
      readMonthlyAverages({ header: ["Månad", "Ränta"], rows: [] }, parseYearMonthDashed, silentLogger)
    ).toThrow("no term columns in header");
  });
});

describe("isPlaceholder", () => {
  it("should recognize not-published markers", () => {
    expect(["", "-", "–", " * ", "-*", "N/A"].map(isPlaceholder)).toEqual([true, true, true, true, true, true]);
    expect(isPlaceholder("3,10")).toBe(false);
  });
});

describe("emit", () => {
  it("should skip a record that fails validation", () => {
    const sink = new CollectingSink();
    const logger = spyLogger();

    emit(sink, logger, () =>
      createListRate({ bank: "Nordea", term: Term.ONE_YEAR, nominalRate: 0, crawledAt: FIXED_NOW })
    );

    expect(sink.sets).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("skipping invalid record", expect.anything());
  });
});

describe("runSubCrawl", () => {
  it("should log a failing task instead of rejecting", async () => {
    const logger = spyLogger();
    await expect(
      runSubCrawl(logger, "average rates", async () => {
        throw new Error("offline");
      })
    ).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith("average rates: failed", expect.any(Error));
  });
});
