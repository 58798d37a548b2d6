import { roundTo } from "./math-utils.js";

export interface SolverState {
  readonly rate: number;
  readonly residual: number;
  readonly derivative: number;
}

export interface SolverResult {
  readonly rate: number | null;
  readonly iterationsRun: number;
  readonly converged: boolean;
}

export const RATE_DECIMALS = 10;

export function isConverged(state: SolverState, tolerance: number): boolean {
  // NaN compares false, so an undefined step never counts as converged.
  return Math.abs(state.residual) < tolerance;
}

export function classify(
  finalState: SolverState,
  tolerance: number,
  iterationsRun: number,
): SolverResult {
  const converged = isConverged(finalState, tolerance);
  return Object.freeze({
    rate: converged ? roundTo(finalState.rate, RATE_DECIMALS) : null,
    iterationsRun,
    converged,
  });
}
