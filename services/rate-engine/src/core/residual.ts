import type { CashflowSeries } from "./cashflow-series.js";

export interface Residual {
  /** Discounted sum of the series at the trial rate. */
  readonly residual: number;
  /** d(residual)/d(rate). */
  readonly derivative: number;
}

const UNDEFINED_RESIDUAL: Residual = Object.freeze({ residual: Number.NaN, derivative: Number.NaN });

// f(r) = sum(cf / (1+r)^t), f'(r) = sum(-t * cf / (1+r)^(t+1)), in one pass.
// A rate at or below -1 has no real discount factor, so both come back NaN.
export function evaluate(rate: number, series: CashflowSeries): Residual {
  if (Number.isNaN(rate) || rate <= -1) {
    return UNDEFINED_RESIDUAL;
  }

  const base = 1 + rate;
  let residual = 0;
  let derivative = 0;
  for (const { amount, timeOffset } of series.flows) {
    const discount = Math.pow(base, timeOffset);
    residual += amount / discount;
    derivative += (-timeOffset * amount) / (discount * base);
  }

  return { residual, derivative };
}
