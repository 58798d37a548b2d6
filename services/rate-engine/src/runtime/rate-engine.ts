import { amortizationSchedule } from "../core/amortization.js";
import { isInvalidInputError } from "../core/errors.js";
import { DEFAULT_GUESS, DEFAULT_TOLERANCE, irr, xirr } from "../core/irr.js";
import { MAX_ITERATIONS } from "../core/newton.js";
import type { IterationMode } from "../core/newton.js";
import { mirr, npv, xnpv } from "../core/npv.js";
import { fv, ipmt, nper, pmt, ppmt, pv } from "../core/tvm.js";
import { checkRequest, validateRequest } from "../validate/validate.js";
import type {
  Calculation,
  CalculationOutcome,
  CalculationValue,
  RateEngineResult,
  RateEngineValidation,
} from "./types.js";

/**
 * Runs a batch of independent calculations from a validated request.
 * A calculation that fails input checks is reported on its own result and
 * never affects the others.
 */
export class RateEngineRuntime {
  private readonly request: unknown;

  constructor(request: unknown) {
    this.request = request;
  }

  validate(): RateEngineValidation {
    return validateRequest(this.request);
  }

  run(): RateEngineResult {
    const checked = checkRequest(this.request);
    const { validation } = checked;
    if (!checked.valid) {
      return { validation, warnings: [], results: [] };
    }

    const { request } = checked;
    const mode = request.options?.iteration_mode ?? "early-exit";
    const warnings: string[] = [];
    const results = request.calculations.map((calculation, index) =>
      this.runOne(calculation, calculation.id ?? `${calculation.kind}-${index}`, mode, warnings),
    );

    return { validation, warnings, results };
  }

  private runOne(
    calculation: Calculation,
    id: string,
    mode: IterationMode,
    warnings: string[],
  ): CalculationOutcome {
    try {
      const value = evaluateCalculation(calculation, mode);
      if (typeof value === "object" && "converged" in value && !value.converged) {
        warnings.push(`${id}: ${calculation.kind} did not converge after ${MAX_ITERATIONS} iterations.`);
      }
      return { id, kind: calculation.kind, ok: true, value };
    } catch (error) {
      if (isInvalidInputError(error)) {
        return { id, kind: calculation.kind, ok: false, error: { path: error.path, message: error.message } };
      }
      throw error;
    }
  }
}

function evaluateCalculation(calculation: Calculation, mode: IterationMode): CalculationValue {
  switch (calculation.kind) {
    case "irr": {
      const result = irr(
        calculation.cashflows,
        calculation.guess ?? DEFAULT_GUESS,
        calculation.tol ?? DEFAULT_TOLERANCE,
        { mode },
      );
      return { rate: result.irr, iterations: result.iterations, converged: result.converged };
    }
    case "xirr": {
      const result = xirr(
        calculation.cashflows,
        calculation.dates,
        calculation.guess ?? DEFAULT_GUESS,
        calculation.tol ?? DEFAULT_TOLERANCE,
        { mode },
      );
      return { rate: result.xirr, iterations: result.iterations, converged: result.converged };
    }
    case "npv":
      return npv(calculation.rate, calculation.cashflows);
    case "xnpv":
      return xnpv(calculation.rate, calculation.cashflows, calculation.dates);
    case "mirr":
      return mirr(calculation.cashflows, calculation.finance_rate, calculation.reinvest_rate);
    case "fv":
      return fv(calculation.rate, calculation.nper, calculation.pmt, calculation.pv, calculation.when);
    case "pv":
      return pv(calculation.rate, calculation.nper, calculation.pmt, calculation.fv, calculation.when);
    case "pmt":
      return pmt(calculation.rate, calculation.nper, calculation.pv, calculation.fv, calculation.when);
    case "nper":
      return nper(calculation.rate, calculation.pmt, calculation.pv, calculation.fv, calculation.when);
    case "ipmt":
      return ipmt(
        calculation.rate,
        calculation.per,
        calculation.nper,
        calculation.pv,
        calculation.fv,
        calculation.when,
      );
    case "ppmt":
      return ppmt(
        calculation.rate,
        calculation.per,
        calculation.nper,
        calculation.pv,
        calculation.fv,
        calculation.when,
      );
    case "amortization":
      return amortizationSchedule(
        calculation.rate,
        calculation.nper,
        calculation.pv,
        calculation.fv,
        calculation.when,
      );
  }
}
