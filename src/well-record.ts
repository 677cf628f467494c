/**
 * Well Record
 *
 * Production records for a single well: its overall reporting span and, per
 * category, the date ranges during which production did not qualify.
 *
 * A category registered with no ranges means "no gaps under this rule" and is
 * distinct from a category that was never registered.
 */

import type { LocalDate } from './time-date'
import type { DateRange } from './date-range'
import { type DateRangeGroup, addDateRange, createDateRangeGroup } from './date-range-group'
import { InvalidRangeError } from './errors'

export type WellRecord = {
  readonly apiNum: string
  wellName: string | null
  /** First date covered by the available records. Set together with lastDate. */
  firstDate: LocalDate | null
  lastDate: LocalDate | null
  /** When the records were pulled from their official source. */
  recordAccessDate: LocalDate | null
  readonly dateRanges: Map<string, DateRangeGroup>
}

export type WellRecordInput = {
  apiNum: string
  wellName?: string | null
  firstDate?: LocalDate | null
  lastDate?: LocalDate | null
  recordAccessDate?: LocalDate | null
}

export function createWellRecord(input: WellRecordInput): WellRecord {
  const firstDate = input.firstDate ?? null
  const lastDate = input.lastDate ?? null
  if (firstDate !== null && lastDate !== null && firstDate > lastDate) {
    throw new InvalidRangeError(
      `Well ${input.apiNum}: first date ${firstDate} is after last date ${lastDate}`,
    )
  }
  return {
    apiNum: input.apiNum,
    wellName: input.wellName ?? null,
    firstDate,
    lastDate,
    recordAccessDate: input.recordAccessDate ?? null,
    dateRanges: new Map(),
  }
}

// ============================================================================
// Categories
// ============================================================================

export function registerDateRange(record: WellRecord, category: string, range: DateRange): void {
  const existing = record.dateRanges.get(category) ?? createDateRangeGroup()
  record.dateRanges.set(category, addDateRange(existing, range))
}

/** Register a category without ranges. No effect if it already exists. */
export function registerEmptyCategory(record: WellRecord, category: string): void {
  if (!record.dateRanges.has(category)) {
    record.dateRanges.set(category, createDateRangeGroup())
  }
}

export function registeredCategories(record: WellRecord): string[] {
  return [...record.dateRanges.keys()]
}

export function hasCategory(record: WellRecord, category: string): boolean {
  return record.dateRanges.has(category)
}

/** The ranges for a category, or an empty group if it was never registered. */
export function dateRangesByCategory(record: WellRecord, category: string): DateRangeGroup {
  return record.dateRanges.get(category) ?? createDateRangeGroup()
}

// ============================================================================
// Span
// ============================================================================

/** Whether the record reports any production span at all. */
export function hasProductionSpan(record: WellRecord): boolean {
  return record.firstDate !== null && record.lastDate !== null
}

export function describeWellRecord(record: WellRecord): string {
  return `WellRecord<${JSON.stringify(record.wellName ?? 'No Name')} (${record.apiNum})>`
}
