import { DateTime } from "luxon";

import { InvalidInputError } from "./errors.js";

export type DateInput = string | Date | DateTime;

const DAYS_PER_YEAR = 365;

// Parse ISO date string to a UTC DateTime
export function parseDate(date: string, name = "date"): DateTime {
  if (typeof date !== "string") {
    throw new InvalidInputError(name, `${name} must be a string`);
  }

  const parsed = DateTime.fromISO(date, { zone: "utc" });
  if (!parsed.isValid) {
    throw new InvalidInputError(name, `Invalid ISO date: ${date}`);
  }

  return parsed;
}

// Normalize any accepted date input to midnight UTC of its calendar day
export function toUtcDay(value: DateInput, name = "date"): DateTime {
  let parsed: DateTime;
  if (typeof value === "string") {
    parsed = parseDate(value, name);
  } else if (value instanceof Date) {
    parsed = DateTime.fromJSDate(value, { zone: "utc" });
  } else if (value instanceof DateTime) {
    parsed = value.setZone("utc", { keepLocalTime: true });
  } else {
    throw new InvalidInputError(name, `${name} must be an ISO string, Date or DateTime`);
  }

  if (!parsed.isValid) {
    throw new InvalidInputError(name, `${name} must be a valid date`);
  }
  return parsed.startOf("day");
}

// Whole calendar days from start to end (negative when end precedes start)
export function calendarDaysBetween(start: DateTime, end: DateTime): number {
  return Math.round(end.diff(start, "days").days);
}

// Actual/365 year fraction
export function yearFraction365(start: DateTime, end: DateTime): number {
  return calendarDaysBetween(start, end) / DAYS_PER_YEAR;
}

export function earliest(dates: readonly DateTime[]): DateTime | undefined {
  let min: DateTime | undefined;
  for (const date of dates) {
    if (min === undefined || date.toMillis() < min.toMillis()) {
      min = date;
    }
  }
  return min;
}
