import type { DateTime } from "luxon";

import { earliest, toUtcDay, yearFraction365 } from "./date-utils.js";
import type { DateInput } from "./date-utils.js";
import { InvalidInputError } from "./errors.js";
import { assertAmounts } from "./math-utils.js";

export interface CashFlow {
  readonly amount: number;
  /** Periods (IRR) or Actual/365 years (XIRR) after the reference point. */
  readonly timeOffset: number;
}

/**
 * Immutable (amount, timeOffset) pairs for one solve call.
 *
 * Without dates, offsets are the zero-based period index. With dates, offsets
 * are calendar days from the earliest date divided by 365, so the input does
 * not need to be sorted.
 */
export class CashflowSeries {
  readonly flows: readonly CashFlow[];
  readonly length: number;

  private constructor(flows: CashFlow[]) {
    this.flows = Object.freeze(flows.map((flow) => Object.freeze({ ...flow })));
    this.length = flows.length;
  }

  static build(amounts: readonly number[], dates?: readonly DateInput[]): CashflowSeries {
    return dates === undefined
      ? CashflowSeries.fromPeriods(amounts)
      : CashflowSeries.fromDates(amounts, dates);
  }

  static fromPeriods(amounts: readonly number[]): CashflowSeries {
    CashflowSeries.assertNonEmpty(amounts);
    assertAmounts(amounts);

    return new CashflowSeries(amounts.map((amount, index) => ({ amount, timeOffset: index })));
  }

  static fromDates(amounts: readonly number[], dates: readonly DateInput[]): CashflowSeries {
    CashflowSeries.assertNonEmpty(amounts);
    CashflowSeries.assertDateArray(dates);
    if (dates.length !== amounts.length) {
      throw new InvalidInputError(
        "dates",
        `cashflows and dates must have the same length (${amounts.length} vs ${dates.length})`,
      );
    }
    assertAmounts(amounts);

    const days = dates.map((date, index) => toUtcDay(date, `dates[${index}]`));
    const reference = earliest(days);
    if (reference === undefined) {
      throw new InvalidInputError("dates", "dates must not be empty");
    }

    return new CashflowSeries(
      amounts.map((amount, index) => ({
        amount,
        timeOffset: yearFraction365(reference, CashflowSeries.dayAt(days, index)),
      })),
    );
  }

  amounts(): number[] {
    return this.flows.map((flow) => flow.amount);
  }

  offsets(): number[] {
    return this.flows.map((flow) => flow.timeOffset);
  }

  private static dayAt(days: readonly DateTime[], index: number): DateTime {
    const day = days[index];
    if (day === undefined) {
      throw new RangeError(`dates index ${index} is out of range`);
    }
    return day;
  }

  private static assertDateArray(dates: readonly DateInput[]): void {
    if (!Array.isArray(dates)) {
      throw new InvalidInputError("dates", "dates must be an array");
    }
  }

  private static assertNonEmpty(amounts: readonly number[]): void {
    if (!Array.isArray(amounts) || amounts.length === 0) {
      throw new InvalidInputError("cashflows", "cashflows must be a non-empty array");
    }
  }
}
