import { CashflowSeries } from "./cashflow-series.js";
import type { DateInput } from "./date-utils.js";
import { InvalidInputError } from "./errors.js";
import { assertAmounts, assertMixedSigns, assertRate } from "./math-utils.js";
import { evaluate } from "./residual.js";

// Net present value, first cash flow undiscounted
export function npv(rate: number, cashflows: readonly number[]): number {
  assertRate(rate, "rate");
  assertAmounts(cashflows);

  const r1 = 1 + rate;
  let discount = 1;
  let total = 0;
  for (let t = 0; t < cashflows.length; t += 1) {
    if (t > 0) {
      discount *= r1;
    }
    total += (cashflows[t] ?? 0) / discount;
  }
  return total;
}

// Date-weighted NPV; the earliest date is the reference point
export function xnpv(rate: number, cashflows: readonly number[], dates: readonly DateInput[]): number {
  assertRate(rate, "rate");
  return evaluate(rate, CashflowSeries.fromDates(cashflows, dates)).residual;
}

/**
 * Modified IRR: positive flows compound at `reinvestRate`, negative flows are
 * discounted at `financeRate`.
 */
export function mirr(
  cashflows: readonly number[],
  financeRate: number,
  reinvestRate: number,
): number {
  assertAmounts(cashflows);
  if (cashflows.length < 2) {
    throw new InvalidInputError("cashflows", "cashflows must be an array with at least 2 entries");
  }
  assertMixedSigns(cashflows);
  assertRate(financeRate, "financeRate");
  assertRate(reinvestRate, "reinvestRate");

  const positive = npv(reinvestRate, cashflows.map((value) => (value > 0 ? value : 0)));
  const negative = npv(financeRate, cashflows.map((value) => (value < 0 ? value : 0)));
  const n = cashflows.length;

  return Math.pow(Math.abs(positive) / Math.abs(negative), 1 / (n - 1)) * (1 + reinvestRate) - 1;
}
