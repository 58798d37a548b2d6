// Rate-finding core
export { CashflowSeries } from "./core/cashflow-series.js";
export type { CashFlow } from "./core/cashflow-series.js";
export { evaluate } from "./core/residual.js";
export type { Residual } from "./core/residual.js";
export { ITERATION_MODES, MAX_ITERATIONS, initialState, solve, step } from "./core/newton.js";
export type { IterationMode, SolveOptions } from "./core/newton.js";
export { RATE_DECIMALS, classify, isConverged } from "./core/convergence.js";
export type { SolverResult, SolverState } from "./core/convergence.js";
export { DEFAULT_GUESS, DEFAULT_TOLERANCE, irr, xirr } from "./core/irr.js";
export type { IrrResult, RateSolveOptions, XirrResult } from "./core/irr.js";

// Formula library
export { mirr, npv, xnpv } from "./core/npv.js";
export { fv, ipmt, nper, pmt, ppmt, pv } from "./core/tvm.js";
export { amortizationSchedule } from "./core/amortization.js";
export type { AmortizationRow } from "./core/amortization.js";
export { annualToMonthly, monthlyToAnnual, roundTo } from "./core/math-utils.js";
export type { PaymentTiming } from "./core/math-utils.js";
export {
  calendarDaysBetween,
  parseDate,
  toUtcDay,
  yearFraction365,
} from "./core/date-utils.js";
export type { DateInput } from "./core/date-utils.js";
export { InvalidInputError, isInvalidInputError } from "./core/errors.js";

// Runtime
export { RateEngineRuntime } from "./runtime/rate-engine.js";
export type {
  Calculation,
  CalculationKind,
  CalculationOutcome,
  CalculationValue,
  RateEngineResult,
  RateEngineValidation,
  RateRequestV1,
  SolvedRate,
} from "./runtime/types.js";
export { checkRequest, validateRequest } from "./validate/validate.js";
export type { CheckedRequest, ValidationResult } from "./validate/validate.js";
