import type { AmortizationRow } from "../core/amortization.js";
import type { PaymentTiming } from "../core/math-utils.js";
import type { IterationMode } from "../core/newton.js";
import type { ValidationResult } from "../validate/validate.js";

interface CalculationBase {
  id?: string;
}

export interface IrrCalculation extends CalculationBase {
  kind: "irr";
  cashflows: number[];
  guess?: number;
  tol?: number;
}

export interface XirrCalculation extends CalculationBase {
  kind: "xirr";
  cashflows: number[];
  dates: string[];
  guess?: number;
  tol?: number;
}

export interface NpvCalculation extends CalculationBase {
  kind: "npv";
  rate: number;
  cashflows: number[];
}

export interface XnpvCalculation extends CalculationBase {
  kind: "xnpv";
  rate: number;
  cashflows: number[];
  dates: string[];
}

export interface MirrCalculation extends CalculationBase {
  kind: "mirr";
  cashflows: number[];
  finance_rate: number;
  reinvest_rate: number;
}

export interface FvCalculation extends CalculationBase {
  kind: "fv";
  rate: number;
  nper: number;
  pmt: number;
  pv: number;
  when?: PaymentTiming;
}

export interface PvCalculation extends CalculationBase {
  kind: "pv";
  rate: number;
  nper: number;
  pmt: number;
  fv?: number;
  when?: PaymentTiming;
}

export interface PmtCalculation extends CalculationBase {
  kind: "pmt";
  rate: number;
  nper: number;
  pv: number;
  fv?: number;
  when?: PaymentTiming;
}

export interface NperCalculation extends CalculationBase {
  kind: "nper";
  rate: number;
  pmt: number;
  pv: number;
  fv?: number;
  when?: PaymentTiming;
}

export interface PaymentSplitCalculation extends CalculationBase {
  kind: "ipmt" | "ppmt";
  rate: number;
  per: number;
  nper: number;
  pv: number;
  fv?: number;
  when?: PaymentTiming;
}

export interface AmortizationCalculation extends CalculationBase {
  kind: "amortization";
  rate: number;
  nper: number;
  pv: number;
  fv?: number;
  when?: PaymentTiming;
}

export type Calculation =
  | IrrCalculation
  | XirrCalculation
  | NpvCalculation
  | XnpvCalculation
  | MirrCalculation
  | FvCalculation
  | PvCalculation
  | PmtCalculation
  | NperCalculation
  | PaymentSplitCalculation
  | AmortizationCalculation;

export type CalculationKind = Calculation["kind"];

export interface RateRequestV1 {
  contract: { contract_version: "RATE_V1" };
  options?: { iteration_mode?: IterationMode };
  calculations: Calculation[];
}

export interface SolvedRate {
  rate: number | null;
  iterations: number;
  converged: boolean;
}

export type CalculationValue = number | SolvedRate | AmortizationRow[];

export type CalculationOutcome =
  | { id: string; kind: CalculationKind; ok: true; value: CalculationValue }
  | { id: string; kind: CalculationKind; ok: false; error: { path: string; message: string } };

export type RateEngineValidation = ValidationResult;

export interface RateEngineResult {
  validation: RateEngineValidation;
  warnings: string[];
  results: CalculationOutcome[];
}
