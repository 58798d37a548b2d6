import { DateTime } from "luxon";
import { describe, expect, it } from "vitest";

import { CashflowSeries } from "../../src/core/cashflow-series.js";
import type { CashFlow } from "../../src/core/cashflow-series.js";
import { InvalidInputError } from "../../src/core/errors.js";

describe("CashflowSeries", () => {
  it("uses the period index as the offset for regular flows", () => {
    const series = CashflowSeries.build([-100, 60, 60]);

    expect(series.length).toBe(3);
    expect(series.amounts()).toEqual([-100, 60, 60]);
    expect(series.offsets()).toEqual([0, 1, 2]);
  });

  it("is immutable once built", () => {
    const input = [-100, 110];
    const series = CashflowSeries.build(input);

    input[0] = 999;
    expect(series.amounts()).toEqual([-100, 110]);

    expect(() => {
      (series.flows as CashFlow[]).push({ amount: 1, timeOffset: 2 });
    }).toThrow();
    expect(series.length).toBe(2);
  });

  it("measures dated offsets in Actual/365 years from the earliest date", () => {
    const series = CashflowSeries.build(
      [-10000, 2750, 4250, 3250, 2750],
      ["2008-01-01", "2008-03-01", "2008-10-30", "2009-02-15", "2009-04-01"],
    );

    expect(series.offsets()).toEqual([0, 60 / 365, 303 / 365, 411 / 365, 456 / 365]);
  });

  it("takes the minimum date as reference, not the first element", () => {
    const series = CashflowSeries.build([2750, -10000], ["2009-04-01", "2008-01-01"]);

    expect(series.offsets()).toEqual([456 / 365, 0]);
  });

  it("counts leap days", () => {
    const series = CashflowSeries.build([-1, 1], ["2024-01-01", "2025-01-01"]);

    expect(series.offsets()).toEqual([0, 366 / 365]);
  });

  it("accepts Date and DateTime inputs", () => {
    const fromStrings = CashflowSeries.build([-1, 1], ["2025-01-01", "2025-03-15"]);
    const fromDates = CashflowSeries.build(
      [-1, 1],
      [new Date("2025-01-01T00:00:00Z"), new Date("2025-03-15T18:30:00Z")],
    );
    const fromDateTimes = CashflowSeries.build(
      [-1, 1],
      [DateTime.fromISO("2025-01-01", { zone: "utc" }), DateTime.fromISO("2025-03-15", { zone: "utc" })],
    );

    expect(fromDates.offsets()).toEqual(fromStrings.offsets());
    expect(fromDateTimes.offsets()).toEqual(fromStrings.offsets());
  });

  it("rejects an empty amounts array", () => {
    expect(() => CashflowSeries.build([])).toThrow(InvalidInputError);
    expect(() => CashflowSeries.build([], [])).toThrow(/non-empty/);
  });

  it("rejects mismatched amounts and dates", () => {
    expect(() => CashflowSeries.build([-1, 1], ["2025-01-01"])).toThrow(
      "cashflows and dates must have the same length (2 vs 1)",
    );
  });

  it("rejects non-finite amounts and unparseable dates", () => {
    expect(() => CashflowSeries.build([-1, Number.NaN])).toThrow("cashflows[1] must be a finite number");
    expect(() => CashflowSeries.build([-1, 1], ["2025-01-01", "2025-02-30"])).toThrow(
      "Invalid ISO date: 2025-02-30",
    );
  });

  it("reports the offending argument on the error", () => {
    try {
      CashflowSeries.build([-1, 1], ["2025-01-01", "nope"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect((error as InvalidInputError).path).toBe("dates[1]");
    }
  });

  it("accepts a series without a sign change", () => {
    expect(CashflowSeries.build([100, 50, 25]).length).toBe(3);
  });
});
