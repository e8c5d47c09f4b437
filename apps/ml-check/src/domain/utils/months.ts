/**
 * @fileoverview Archive month helpers
 *
 * The list archive publishes one file per calendar month. These
 * helpers walk months in UTC.
 *
 * @module domain/utils/months
 */

import { DateTime, Info } from "luxon";

/**
 * One archive month (month is 1-based).
 */
export interface MonthStep {
    readonly year: number;
    readonly month: number;
}

/**
 * Every month from `start` to `end`, both inclusive, crossing year
 * boundaries.
 *
 * @example
 * ```typescript
 * [...periodicMailSteps(DateTime.fromISO("2022-11-20"), DateTime.fromISO("2023-01-05"))];
 * // [{ year: 2022, month: 11 }, { year: 2022, month: 12 }, { year: 2023, month: 1 }]
 * ```
 */
export function* periodicMailSteps(start: DateTime, end: DateTime): Generator<MonthStep> {
    let cursor = start.toUTC().startOf("month");
    const last = end.toUTC().startOf("month");

    while (cursor.toMillis() <= last.toMillis()) {
        yield { year: cursor.year, month: cursor.month };
        cursor = cursor.plus({ months: 1 });
    }
}

/**
 * Full English month name ("November").
 */
export function monthName(month: number): string {
    const name = Info.months("long", { locale: "en-US" })[month - 1];
    if (name === undefined) {
        throw new RangeError(`Month must be in [1, 12], got ${month}`);
    }
    return name;
}

/**
 * Sortable key of a month ("2022-11").
 */
export function monthKey(step: MonthStep): string {
    return `${String(step.year).padStart(4, "0")}-${String(step.month).padStart(2, "0")}`;
}

/**
 * Whether a month contains the given instant (UTC).
 */
export function isSameMonth(step: MonthStep, instant: DateTime): boolean {
    const utc = instant.toUTC();
    return utc.year === step.year && utc.month === step.month;
}
