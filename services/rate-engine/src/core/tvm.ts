// Closed-form time-value-of-money formulas.
// Sign convention: cash paid out is negative, cash received is positive.
// `when` is 0 for end-of-period payments, 1 for beginning-of-period.

import { InvalidInputError } from "./errors.js";
import { assertFiniteNumber, assertPositiveInteger, assertRate, assertTiming } from "./math-utils.js";
import type { PaymentTiming } from "./math-utils.js";

function assertNonNegativePeriods(nper: number, name: string): void {
  assertFiniteNumber(nper, name);
  if (nper < 0) {
    throw new InvalidInputError(name, `${name} must be greater than or equal to 0`);
  }
}

// Future value
export function fv(rate: number, nper: number, pmt: number, pv: number, when: PaymentTiming = 0): number {
  assertRate(rate, "rate");
  assertNonNegativePeriods(nper, "nper");
  assertFiniteNumber(pmt, "pmt");
  assertFiniteNumber(pv, "pv");
  assertTiming(when);

  return futureValue(rate, nper, pmt, pv, when);
}

function futureValue(rate: number, nper: number, pmt: number, pv: number, when: PaymentTiming): number {
  if (rate === 0) {
    return -(pv + pmt * nper);
  }

  const pow = Math.pow(1 + rate, nper);
  return -pv * pow - (pmt * (1 + rate * when) * (pow - 1)) / rate;
}

// Present value
export function pv(rate: number, nper: number, pmt: number, fv = 0, when: PaymentTiming = 0): number {
  assertRate(rate, "rate");
  assertPositiveInteger(nper, "nper");
  assertFiniteNumber(pmt, "pmt");
  assertFiniteNumber(fv, "fv");
  assertTiming(when);

  if (rate === 0) {
    return -(fv + pmt * nper);
  }

  const pow = Math.pow(1 + rate, nper);
  return -(fv + (pmt * (1 + rate * when) * (pow - 1)) / rate) / pow;
}

// Payment per period (like Excel PMT)
export function pmt(rate: number, nper: number, pv: number, fv = 0, when: PaymentTiming = 0): number {
  assertRate(rate, "rate");
  assertPositiveInteger(nper, "nper");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");
  assertTiming(when);

  if (rate === 0) {
    return -(pv + fv) / nper;
  }

  const pow = Math.pow(1 + rate, nper);
  return -(rate * (fv + pv * pow)) / ((1 + rate * when) * (pow - 1));
}

// Number of periods needed to move from pv to fv at a fixed payment
export function nper(rate: number, pmt: number, pv: number, fv = 0, when: PaymentTiming = 0): number {
  assertRate(rate, "rate");
  assertFiniteNumber(pmt, "pmt");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");
  assertTiming(when);

  if (rate === 0) {
    if (pmt === 0) {
      throw new InvalidInputError("pmt", "pmt must be non-zero when rate is 0");
    }
    return -(fv + pv) / pmt;
  }

  const z = (pmt * (1 + rate * when)) / rate;
  const periods = Math.log((z - fv) / (z + pv)) / Math.log(1 + rate);
  if (!Number.isFinite(periods)) {
    throw new InvalidInputError("pmt", "pmt cannot reach fv from pv at this rate");
  }
  return periods;
}

function assertPeriod(per: number, nper: number): void {
  assertPositiveInteger(nper, "nper");
  if (!Number.isInteger(per) || per < 1 || per > nper) {
    throw new InvalidInputError("per", `per must be an integer between 1 and ${nper}`);
  }
}

// Interest portion of the payment in period `per` (1-based)
export function ipmt(
  rate: number,
  per: number,
  nper: number,
  pv: number,
  fv = 0,
  when: PaymentTiming = 0,
): number {
  assertPeriod(per, nper);
  const payment = pmt(rate, nper, pv, fv, when);

  if (when === 1 && per === 1) {
    return 0;
  }

  // Balance carried into the period, times the rate
  const interest = futureValue(rate, per - 1, payment, pv, when) * rate;
  return when === 1 ? interest / (1 + rate) : interest;
}

// Principal portion of the payment in period `per` (1-based)
export function ppmt(
  rate: number,
  per: number,
  nper: number,
  pv: number,
  fv = 0,
  when: PaymentTiming = 0,
): number {
  return pmt(rate, nper, pv, fv, when) - ipmt(rate, per, nper, pv, fv, when);
}
