/**
 * Well Group
 *
 * A set of wells researched together. `findGaps` finds the periods during
 * which every well in the group was simultaneously without qualifying
 * production under one category, and caches the result per category for
 * reporting.
 */

import { type LocalDate, addDays } from './time-date'
import { makeDateRange } from './date-range'
import {
  type DateRangeGroup,
  addDateRange, createDateRangeGroup, findAllOverlaps, mergeAll,
} from './date-range-group'
import { type WellRecord, hasCategory, dateRangesByCategory } from './well-record'
import { MissingCategoryError, InconsistentRecordError } from './errors'

export type WellGroup = {
  readonly wellRecords: readonly WellRecord[]
  /** Shared gaps found so far, keyed by category. */
  readonly researchedGaps: ReadonlyMap<string, DateRangeGroup>
  addWellRecord(record: WellRecord): void
  /** Earliest first date of any record, or null if no record has one. */
  findFirstDate(): LocalDate | null
  /** Latest last date of any record, or null if no record has one. */
  findLastDate(): LocalDate | null
  findGaps(category: string): DateRangeGroup
}

type Span = { first: LocalDate; last: LocalDate }

/**
 * Treat the parts of the overall span outside a well's own record window as
 * gaps: the well cannot have produced before its records begin or after
 * they end.
 */
export function normalizeGaps(gaps: DateRangeGroup, own: Span, overall: Span): DateRangeGroup {
  let normalized = gaps
  if (overall.first < own.first) {
    normalized = addDateRange(normalized, makeDateRange(overall.first, addDays(own.first, -1)))
  }
  if (overall.last > own.last) {
    normalized = addDateRange(normalized, makeDateRange(addDays(own.last, 1), overall.last))
  }
  return normalized
}

function checkCategory(records: readonly WellRecord[], category: string): void {
  const missing = records.filter((r) => !hasCategory(r, category)).map((r) => r.apiNum)
  if (missing.length > 0) {
    throw new MissingCategoryError(category, missing)
  }
}

function checkSpan(record: WellRecord): void {
  if ((record.firstDate === null) !== (record.lastDate === null)) {
    throw new InconsistentRecordError(
      record.apiNum,
      `Well ${record.apiNum} has only one of first date and last date set`,
    )
  }
}

export function createWellGroup(records: Iterable<WellRecord> = []): WellGroup {
  const wellRecords: WellRecord[] = [...records]
  const researchedGaps = new Map<string, DateRangeGroup>()

  function findFirstDate(): LocalDate | null {
    let first: LocalDate | null = null
    for (const record of wellRecords) {
      if (record.firstDate !== null && (first === null || record.firstDate < first)) {
        first = record.firstDate
      }
    }
    return first
  }

  function findLastDate(): LocalDate | null {
    let last: LocalDate | null = null
    for (const record of wellRecords) {
      if (record.lastDate !== null && (last === null || record.lastDate > last)) {
        last = record.lastDate
      }
    }
    return last
  }

  function findGaps(category: string): DateRangeGroup {
    checkCategory(wellRecords, category)

    const overallFirst = findFirstDate()
    const overallLast = findLastDate()
    const overall: Span | null = overallFirst !== null && overallLast !== null
      ? { first: overallFirst, last: overallLast }
      : null
    let running: DateRangeGroup | null = null

    for (const record of wellRecords) {
      // Span consistency is checked per record, so wells past an empty result go unchecked.
      checkSpan(record)
      // Without a span the well puts no date-bounded constraint on the group.
      if (record.firstDate === null || record.lastDate === null || overall === null) continue

      const normalized = normalizeGaps(
        dateRangesByCategory(record, category),
        { first: record.firstDate, last: record.lastDate },
        overall,
      )
      if (running === null) {
        running = mergeAll(normalized)
      } else if (running.length === 0) {
        break
      } else {
        running = findAllOverlaps(running, normalized)
      }
    }

    const gaps = running ?? createDateRangeGroup()
    researchedGaps.set(category, gaps)
    return gaps
  }

  return {
    get wellRecords() {
      return [...wellRecords]
    },
    get researchedGaps() {
      return new Map(researchedGaps)
    },
    addWellRecord(record: WellRecord) {
      wellRecords.push(record)
      researchedGaps.clear()
    },
    findFirstDate,
    findLastDate,
    findGaps,
  }
}
