/**
 * Date Range
 *
 * An immutable, closed interval of calendar dates. Both ends are inclusive, so
 * a range that starts and ends on the same day lasts one day.
 *
 * Every operation returns new values; a DateRange is frozen at construction.
 */

import {
  type LocalDate,
  parseDate, addDays, daysBetween, yearOf, monthOf, minDate, maxDate,
} from './time-date'
import { type Result, Ok, Err } from './result'
import { InvalidRangeError, FormatError } from './errors'

export { InvalidRangeError, FormatError } from './errors'

// ============================================================================
// Type
// ============================================================================

declare const __dateRange: unique symbol

export type DateRange = {
  readonly startDate: LocalDate
  readonly endDate: LocalDate
  readonly [__dateRange]: true
}

/** Separator between the two dates in the serialized form. */
export const DATE_RANGE_SEPARATOR = '::'

// ============================================================================
// Construction
// ============================================================================

export function makeDateRange(startDate: LocalDate, endDate: LocalDate): DateRange {
  if (startDate > endDate) {
    throw new InvalidRangeError(`Start date ${startDate} is after end date ${endDate}`)
  }
  return Object.freeze({ startDate, endDate }) as DateRange
}

export function isDateRange(value: unknown): value is DateRange {
  if (typeof value !== 'object' || value === null) return false
  if (!('startDate' in value) || !('endDate' in value)) return false
  const { startDate, endDate } = value
  if (typeof startDate !== 'string' || typeof endDate !== 'string') return false
  return parseDate(startDate).ok && parseDate(endDate).ok && startDate <= endDate
}

// ============================================================================
// Durations
// ============================================================================

/** Duration in days, counting both the first and the last day. */
export function durationInDays(range: DateRange): number {
  return daysBetween(range.startDate, range.endDate) + 1
}

/**
 * Duration in calendar months, counting both the first and the last month.
 * Any partial month counts as a whole one: Jan 31 to Feb 1 is 2 months.
 */
export function durationInMonths(range: DateRange): number {
  const years = yearOf(range.endDate) - yearOf(range.startDate)
  const months = monthOf(range.endDate) - monthOf(range.startDate)
  return years * 12 + months + 1
}

// ============================================================================
// Predicates
// ============================================================================

/**
 * Whether two ranges overlap or touch. Ranges separated by no more than
 * `toleranceDays` days also count, so with the default of 1 a range ending
 * on the 5th is contiguous with one starting on the 6th.
 */
export function isContiguousWith(a: DateRange, b: DateRange, toleranceDays = 1): boolean {
  // Day counts rather than shifted date strings, which stop sorting past 9999-12-31.
  if (
    daysBetween(b.endDate, a.startDate) <= toleranceDays &&
    daysBetween(a.endDate, b.endDate) <= toleranceDays
  ) {
    return true
  }
  return (
    daysBetween(a.endDate, b.startDate) <= toleranceDays &&
    daysBetween(b.endDate, a.endDate) <= toleranceDays
  )
}

/** Whether `a`, widened by `toleranceDays` at both ends, contains all of `b`. */
export function encompasses(a: DateRange, b: DateRange, toleranceDays = 1): boolean {
  return (
    daysBetween(b.startDate, a.startDate) <= toleranceDays &&
    daysBetween(a.endDate, b.endDate) <= toleranceDays
  )
}

// ============================================================================
// Algebra
// ============================================================================

/**
 * Merge two ranges into one if they are contiguous within `toleranceDays`.
 * Otherwise both are returned unchanged, `a` first.
 */
export function mergeWith(a: DateRange, b: DateRange, toleranceDays = 1): DateRange[] {
  if (!isContiguousWith(a, b, toleranceDays)) return [a, b]
  return [makeDateRange(minDate(a.startDate, b.startDate), maxDate(a.endDate, b.endDate))]
}

/** Carve `b` out of `a`, leaving zero, one, or two ranges. */
export function subtract(a: DateRange, b: DateRange): DateRange[] {
  if (!isContiguousWith(a, b, 0)) return [a]

  if (encompasses(b, a, 0)) return []

  if (encompasses(a, b, 0)) {
    // Middle cut. A cut flush with either edge leaves a single piece.
    const pieces: DateRange[] = []
    if (b.startDate > a.startDate) {
      pieces.push(makeDateRange(a.startDate, addDays(b.startDate, -1)))
    }
    if (b.endDate < a.endDate) {
      pieces.push(makeDateRange(addDays(b.endDate, 1), a.endDate))
    }
    return pieces
  }

  if (b.startDate < a.startDate) {
    return [makeDateRange(addDays(b.endDate, 1), a.endDate)]
  }
  return [makeDateRange(a.startDate, addDays(b.startDate, -1))]
}

/** The days shared by `a` and `b`, or null when they share none. */
export function findOverlap(a: DateRange, b: DateRange): DateRange | null {
  if (!isContiguousWith(a, b, 0)) return null
  if (encompasses(b, a, 0)) return a
  if (encompasses(a, b, 0)) return b
  if (b.startDate < a.startDate) return makeDateRange(a.startDate, b.endDate)
  return makeDateRange(b.startDate, a.endDate)
}

export function dateRangeEquals(a: DateRange, b: DateRange): boolean {
  return a.startDate === b.startDate && a.endDate === b.endDate
}

// ============================================================================
// Serialization
// ============================================================================

/** Serialize as `YYYY-MM-DD::YYYY-MM-DD`. */
export function formatDateRange(range: DateRange): string {
  return `${range.startDate}${DATE_RANGE_SEPARATOR}${range.endDate}`
}

/** Parse the `YYYY-MM-DD::YYYY-MM-DD` form written by `formatDateRange`. */
export function parseDateRange(str: string): Result<DateRange, FormatError | InvalidRangeError> {
  const parts = str.split(DATE_RANGE_SEPARATOR)
  const [first, second] = parts
  if (parts.length !== 2 || first === undefined || second === undefined) {
    return Err(new FormatError(`Date range must be in the format YYYY-MM-DD::YYYY-MM-DD: '${str}'`))
  }
  const start = parseDate(first)
  const end = parseDate(second)
  if (!start.ok || !end.ok) {
    return Err(new FormatError(`Date range must be in the format YYYY-MM-DD::YYYY-MM-DD: '${str}'`))
  }
  if (start.value > end.value) {
    return Err(new InvalidRangeError(`Start date ${start.value} is after end date ${end.value}`))
  }
  return Ok(makeDateRange(start.value, end.value))
}
