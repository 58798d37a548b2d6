import { CashflowSeries } from "./cashflow-series.js";
import type { DateInput } from "./date-utils.js";
import { InvalidInputError } from "./errors.js";
import { assertFiniteNumber } from "./math-utils.js";
import { solve } from "./newton.js";
import type { IterationMode } from "./newton.js";

export const DEFAULT_GUESS = 0.1;
export const DEFAULT_TOLERANCE = 1e-7;

export interface RateSolveOptions {
  mode?: IterationMode;
}

export interface IrrResult {
  irr: number | null;
  iterations: number;
  converged: boolean;
}

export interface XirrResult {
  xirr: number | null;
  iterations: number;
  converged: boolean;
}

function assertSolverInputs(guess: number, tol: number): void {
  assertFiniteNumber(guess, "guess");
  assertFiniteNumber(tol, "tol");
  if (tol <= 0) {
    throw new InvalidInputError("tol", "tol must be greater than 0");
  }
}

// Internal rate of return for regular periods; index 0 is "now"
export function irr(
  cashflows: readonly number[],
  guess = DEFAULT_GUESS,
  tol = DEFAULT_TOLERANCE,
  options: RateSolveOptions = {},
): IrrResult {
  const series = CashflowSeries.fromPeriods(cashflows);
  assertSolverInputs(guess, tol);

  const result = solve(series, { guess, tolerance: tol, mode: options.mode });
  return { irr: result.rate, iterations: result.iterationsRun, converged: result.converged };
}

// Extended IRR for irregular, date-stamped cash flows (Actual/365)
export function xirr(
  cashflows: readonly number[],
  dates: readonly DateInput[],
  guess = DEFAULT_GUESS,
  tol = DEFAULT_TOLERANCE,
  options: RateSolveOptions = {},
): XirrResult {
  const series = CashflowSeries.fromDates(cashflows, dates);
  assertSolverInputs(guess, tol);

  const result = solve(series, { guess, tolerance: tol, mode: options.mode });
  return { xirr: result.rate, iterations: result.iterationsRun, converged: result.converged };
}
