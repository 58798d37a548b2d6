import { assertFiniteNumber, assertPositiveInteger, assertRate, assertTiming, roundTo } from "./math-utils.js";
import type { PaymentTiming } from "./math-utils.js";
import { pmt } from "./tvm.js";

export interface AmortizationRow {
  period: number;
  payment: number;
  interest: number;
  principal: number;
  cumulativeInterest: number;
  cumulativePrincipal: number;
  remainingBalance: number;
}

const CENTS = 2;

/**
 * Period-by-period loan schedule. Each row accrues interest on the
 * outstanding balance, then applies the payment:
 * `balance = balance + interest + payment`.
 *
 * With `when = 1` payments fall at the start of each period, so the first
 * payment is all principal and every later row carries the interest accrued
 * since the previous payment, matching `ipmt`. Reported figures are rounded
 * to cents; running totals accumulate the unrounded values.
 */
export function amortizationSchedule(
  rate: number,
  nper: number,
  pv: number,
  fv = 0,
  when: PaymentTiming = 0,
): AmortizationRow[] {
  assertRate(rate, "rate");
  assertPositiveInteger(nper, "nper");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");
  assertTiming(when);

  const payment = pmt(rate, nper, pv, fv, when);
  const rows: AmortizationRow[] = [];

  let balance = pv;
  let cumulativeInterest = 0;
  let cumulativePrincipal = 0;
  for (let period = 1; period <= nper; period += 1) {
    const interest = when === 1 && period === 1 ? 0 : balance * rate;
    const principal = Math.abs(payment) - interest;
    balance = balance + interest + payment;
    cumulativeInterest += interest;
    cumulativePrincipal += principal;

    rows.push({
      period,
      payment: roundTo(Math.abs(payment), CENTS),
      interest: roundTo(interest, CENTS),
      principal: roundTo(principal, CENTS),
      cumulativeInterest: roundTo(cumulativeInterest, CENTS),
      cumulativePrincipal: roundTo(cumulativePrincipal, CENTS),
      remainingBalance: roundTo(balance, CENTS),
    });
  }

  return rows;
}
