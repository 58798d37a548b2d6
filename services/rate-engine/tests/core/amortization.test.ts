import { describe, expect, it } from "vitest";

import { amortizationSchedule } from "../../src/core/amortization.js";
import { ipmt } from "../../src/core/tvm.js";

describe("amortizationSchedule", () => {
  it("splits each payment into interest and principal", () => {
    const rows = amortizationSchedule(0.01, 2, 1000);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      period: 1,
      payment: 507.51,
      interest: 10,
      principal: 497.51,
      cumulativeInterest: 10,
      cumulativePrincipal: 497.51,
      remainingBalance: 502.49,
    });

    const last = rows[1];
    expect(last?.period).toBe(2);
    expect(last?.interest).toBeCloseTo(5.02, 2);
    expect(last?.principal).toBeCloseTo(502.49, 2);
    expect(last?.cumulativeInterest).toBeCloseTo(15.02, 2);
    expect(last?.cumulativePrincipal).toBeCloseTo(1000, 2);
    expect(last?.remainingBalance).toBeCloseTo(0, 2);
  });

  it("pays off a mortgage over its term", () => {
    const rows = amortizationSchedule(0.0325 / 12, 180, 350_000);
    const last = rows[rows.length - 1];

    expect(rows).toHaveLength(180);
    expect(rows.every((row) => row.payment === rows[0]?.payment)).toBe(true);
    expect(last?.remainingBalance).toBeCloseTo(0, 2);
    expect(last?.cumulativePrincipal).toBeCloseTo(350_000, 2);
  });

  it("applies the first payment before interest when paying in advance", () => {
    const rows = amortizationSchedule(0.01, 2, 1000, 0, 1);

    expect(rows[0]).toEqual({
      period: 1,
      payment: 502.49,
      interest: 0,
      principal: 502.49,
      cumulativeInterest: 0,
      cumulativePrincipal: 502.49,
      remainingBalance: 497.51,
    });

    const last = rows[1];
    expect(last?.interest).toBeCloseTo(4.98, 2);
    expect(last?.principal).toBeCloseTo(497.51, 2);
    expect(last?.cumulativePrincipal).toBeCloseTo(1000, 2);
    expect(last?.remainingBalance).toBeCloseTo(0, 2);
  });

  it("clears a single advance payment in full", () => {
    const [row] = amortizationSchedule(0.1, 1, 1000, 0, 1);

    expect(row?.payment).toBeCloseTo(1000, 2);
    expect(row?.interest).toBe(0);
    expect(row?.cumulativePrincipal).toBeCloseTo(1000, 2);
    expect(row?.remainingBalance).toBeCloseTo(0, 2);
  });

  it("pays off a monthly loan in advance and agrees with ipmt", () => {
    const rows = amortizationSchedule(0.01, 12, 1000, 0, 1);
    const last = rows[rows.length - 1];

    expect(last?.remainingBalance).toBeCloseTo(0, 2);
    expect(last?.cumulativePrincipal).toBeCloseTo(1000, 2);
    rows.forEach((row) => {
      expect(row.interest).toBeCloseTo(-ipmt(0.01, row.period, 12, 1000, 0, 1), 1);
    });
  });

  it("rejects a non-integer term", () => {
    expect(() => amortizationSchedule(0.01, 1.5, 1000)).toThrow("nper must be a positive integer");
  });
});
