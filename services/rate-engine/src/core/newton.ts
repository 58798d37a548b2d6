import type { CashflowSeries } from "./cashflow-series.js";
import { classify, isConverged } from "./convergence.js";
import type { SolverResult, SolverState } from "./convergence.js";
import { evaluate } from "./residual.js";

/** Hard cap on Newton updates per solve. Not configurable by callers. */
export const MAX_ITERATIONS = 16;

/**
 * `early-exit` stops at the first state inside tolerance and reports the
 * steps it took. `fixed` always runs MAX_ITERATIONS steps and reports the
 * bound, reproducing the unrolled reference computation step for step.
 */
export const ITERATION_MODES = ["early-exit", "fixed"] as const;

export type IterationMode = (typeof ITERATION_MODES)[number];

export interface SolveOptions {
  guess: number;
  tolerance: number;
  mode?: IterationMode;
}

export function initialState(series: CashflowSeries, guess: number): SolverState {
  const { residual, derivative } = evaluate(guess, series);
  return Object.freeze({ rate: guess, residual, derivative });
}

// One Newton update. A zero (or undefined) derivative yields a NaN rate, which
// the evaluator carries through to a non-converged terminal state.
export function step(series: CashflowSeries, state: SolverState): SolverState {
  const next =
    state.derivative === 0 || Number.isNaN(state.derivative)
      ? Number.NaN
      : state.rate - state.residual / state.derivative;
  const { residual, derivative } = evaluate(next, series);
  return Object.freeze({ rate: next, residual, derivative });
}

export function solve(series: CashflowSeries, options: SolveOptions): SolverResult {
  const mode = options.mode ?? "early-exit";
  let state = initialState(series, options.guess);
  let steps = 0;

  while (steps < MAX_ITERATIONS) {
    if (mode === "early-exit" && isConverged(state, options.tolerance)) {
      break;
    }
    state = step(series, state);
    steps += 1;
  }

  return classify(state, options.tolerance, steps);
}
