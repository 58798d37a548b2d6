import { InvalidInputError } from "./errors.js";

export function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(name, `${name} must be a finite number`);
  }
}

export function assertRate(rate: number, name: string): void {
  assertFiniteNumber(rate, name);
  if (rate <= -1) {
    throw new InvalidInputError(name, `${name} must be greater than -1`);
  }
}

export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(name, `${name} must be a positive integer`);
  }
}

export type PaymentTiming = 0 | 1;

export function assertTiming(when: number, name = "when"): asserts when is PaymentTiming {
  if (when !== 0 && when !== 1) {
    throw new InvalidInputError(name, `${name} must be 0 or 1`);
  }
}

export function assertAmounts(cashflows: readonly number[], name = "cashflows"): void {
  if (!Array.isArray(cashflows)) {
    throw new InvalidInputError(name, `${name} must be an array`);
  }
  for (let i = 0; i < cashflows.length; i += 1) {
    const value = cashflows[i];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidInputError(`${name}[${i}]`, `${name}[${i}] must be a finite number`);
    }
  }
}

export function assertMixedSigns(cashflows: readonly number[], name = "cashflows"): void {
  const hasPositive = cashflows.some((value) => value > 0);
  const hasNegative = cashflows.some((value) => value < 0);
  if (!hasPositive || !hasNegative) {
    throw new InvalidInputError(
      name,
      `${name} must include at least one positive and one negative value`,
    );
  }
}

export function roundTo(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

// Convert annual rate to monthly
export function annualToMonthly(annualRate: number): number {
  assertRate(annualRate, "annualRate");
  return Math.pow(1 + annualRate, 1 / 12) - 1;
}

// Convert monthly rate to annual
export function monthlyToAnnual(monthlyRate: number): number {
  assertRate(monthlyRate, "monthlyRate");
  return Math.pow(1 + monthlyRate, 12) - 1;
}
