/**
 * Date Range Group
 *
 * An ordered collection of DateRange values with group-level reduction,
 * carving, and pairwise intersection. Groups are plain readonly arrays; every
 * operation returns a new group and leaves its inputs untouched.
 */

import {
  type DateRange,
  isDateRange, isContiguousWith, makeDateRange, subtract, findOverlap,
  durationInDays, formatDateRange,
} from './date-range'
import { compareDates, minDate, maxDate } from './time-date'
import { TypeMismatchError } from './errors'

export { TypeMismatchError } from './errors'

export type DateRangeGroup = readonly DateRange[]

export type DurationBounds = {
  shortest: number
  longest: number
}

// ============================================================================
// Construction
// ============================================================================

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') return JSON.stringify(value)
  return `${typeof value} ${String(value)}`
}

function checkDateRange(value: unknown): DateRange {
  if (!isDateRange(value)) {
    throw new TypeMismatchError(`May only add DateRange values, got ${describeValue(value)}`)
  }
  return value
}

/** Build a group, checking that every member is a DateRange. */
export function createDateRangeGroup(ranges: Iterable<DateRange> = []): DateRangeGroup {
  return Object.freeze([...ranges].map(checkDateRange))
}

/** Append a range, checking its type. */
export function addDateRange(group: DateRangeGroup, range: DateRange): DateRangeGroup {
  return Object.freeze([...group, checkDateRange(range)])
}

// ============================================================================
// Ordering & Reduction
// ============================================================================

/** Sort by end date, then by start date. Ties keep their original order. */
export function sortDateRanges(group: DateRangeGroup): DateRangeGroup {
  return Object.freeze(
    [...group].sort((a, b) =>
      compareDates(a.endDate, b.endDate) || compareDates(a.startDate, b.startDate),
    ),
  )
}

/**
 * Reduce the group to the fewest ranges that cover the same days: the result
 * holds no two ranges that overlap or lie within `toleranceDays` of each other.
 * Returned in sorted order.
 */
export function mergeAll(group: DateRangeGroup, toleranceDays = 0): DateRangeGroup {
  const byStart = [...group].sort((a, b) => compareDates(a.startDate, b.startDate))
  const merged: DateRange[] = []
  for (const range of byStart) {
    const last = merged[merged.length - 1]
    if (last !== undefined && isContiguousWith(last, range, toleranceDays)) {
      merged[merged.length - 1] = makeDateRange(
        minDate(last.startDate, range.startDate),
        maxDate(last.endDate, range.endDate),
      )
    } else {
      merged.push(range)
    }
  }
  return sortDateRanges(merged)
}

/** Carve `range` out of every member of the group. */
export function subtractFromAll(group: DateRangeGroup, range: DateRange): DateRangeGroup {
  return sortDateRanges(group.flatMap((member) => subtract(member, range)))
}

/**
 * Every span of days covered by both groups, merged. Empty when either group
 * is empty.
 */
export function findAllOverlaps(a: DateRangeGroup, b: DateRangeGroup): DateRangeGroup {
  if (a.length === 0 || b.length === 0) return Object.freeze([])

  const overlaps: DateRange[] = []
  for (const rangeB of b) {
    for (const rangeA of a) {
      const overlap = findOverlap(rangeA, rangeB)
      if (overlap !== null) overlaps.push(overlap)
    }
  }
  return mergeAll(overlaps)
}

// ============================================================================
// Queries
// ============================================================================

/** Shortest and longest member durations in days; both 0 for an empty group. */
export function shortestAndLongestDurations(group: DateRangeGroup): DurationBounds {
  if (group.length === 0) return { shortest: 0, longest: 0 }
  const durations = group.map(durationInDays)
  return { shortest: Math.min(...durations), longest: Math.max(...durations) }
}

/** Members lasting at least `days` days. */
export function rangesOfMinimumDuration(group: DateRangeGroup, days: number): DateRangeGroup {
  return Object.freeze(group.filter((range) => durationInDays(range) >= days))
}

export function formatDateRangeGroup(group: DateRangeGroup): string {
  return `[${group.map(formatDateRange).join(', ')}]`
}
