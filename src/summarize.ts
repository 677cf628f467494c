/**
 * Summaries
 *
 * Turn ranges, groups, well records, and well groups into plain JSON-ready
 * objects for reporting.
 */

import type { DateRange } from './date-range'
import { durationInDays, durationInMonths, DATE_RANGE_SEPARATOR } from './date-range'
import { type DateRangeGroup, shortestAndLongestDurations } from './date-range-group'
import { type WellRecord, registeredCategories, dateRangesByCategory } from './well-record'
import type { WellGroup } from './well-group'

export type SummaryOptions = {
  /** Text between the start and end date of each range. Default `::`. */
  between?: string
  /** Append each range's duration in days. */
  showDays?: boolean
  /** Append each range's duration in calendar months. */
  showMonths?: boolean
}

export type RecordSummaryOptions = SummaryOptions & {
  /** Human descriptions keyed by category; the category itself is used when absent. */
  categoryDescriptions?: Readonly<Record<string, string>>
}

export type DateRangeGroupSummary = {
  longestDays: number
  dateRanges: string[]
}

export type CategorySummary = DateRangeGroupSummary & {
  description: string
}

export type WellRecordSummary = {
  apiNumber: string
  wellName: string
  firstDateOfProduction: string
  lastDateOfProduction: string
  recordAccessDate: string
  dateRanges: Record<string, CategorySummary>
}

export type WellGroupSummary = {
  wellCount: number
  apiNumbers: string[]
  earliestReportedDate: string
  latestReportedDate: string
  researchedGaps: Record<string, CategorySummary>
  wellRecords: WellRecordSummary[]
}

const NO_PRODUCTION = 'No production reported'
const UNKNOWN = 'Unknown'

/** e.g. `2020-01-01::2020-12-31 (366 days; 12 calendar months)` */
export function summarizeDateRange(range: DateRange, options: SummaryOptions = {}): string {
  const { between = DATE_RANGE_SEPARATOR, showDays = false, showMonths = false } = options
  const summary = `${range.startDate}${between}${range.endDate}`
  const details: string[] = []
  if (showDays) details.push(`${durationInDays(range)} days`)
  if (showMonths) details.push(`${durationInMonths(range)} calendar months`)
  return details.length > 0 ? `${summary} (${details.join('; ')})` : summary
}

export function summarizeDateRangeGroup(
  group: DateRangeGroup,
  options: SummaryOptions = {},
): DateRangeGroupSummary {
  return {
    longestDays: shortestAndLongestDurations(group).longest,
    dateRanges: group.map((range) => summarizeDateRange(range, options)),
  }
}

function summarizeCategory(
  group: DateRangeGroup,
  category: string,
  options: RecordSummaryOptions,
): CategorySummary {
  return {
    ...summarizeDateRangeGroup(group, options),
    description: options.categoryDescriptions?.[category] ?? category,
  }
}

export function summarizeWellRecord(
  record: WellRecord,
  options: RecordSummaryOptions = {},
): WellRecordSummary {
  const dateRanges: Record<string, CategorySummary> = {}
  for (const category of registeredCategories(record)) {
    dateRanges[category] = summarizeCategory(dateRangesByCategory(record, category), category, options)
  }
  return {
    apiNumber: record.apiNum,
    wellName: record.wellName ?? UNKNOWN,
    firstDateOfProduction: record.firstDate ?? NO_PRODUCTION,
    lastDateOfProduction: record.lastDate ?? NO_PRODUCTION,
    recordAccessDate: record.recordAccessDate ?? UNKNOWN,
    dateRanges,
  }
}

export function summarizeWellGroup(
  group: WellGroup,
  options: RecordSummaryOptions = {},
): WellGroupSummary {
  const records = group.wellRecords
  const researchedGaps: Record<string, CategorySummary> = {}
  for (const [category, gaps] of group.researchedGaps) {
    researchedGaps[category] = summarizeCategory(gaps, category, options)
  }
  return {
    wellCount: records.length,
    apiNumbers: records.map((r) => r.apiNum),
    earliestReportedDate: group.findFirstDate() ?? NO_PRODUCTION,
    latestReportedDate: group.findLastDate() ?? NO_PRODUCTION,
    researchedGaps,
    wellRecords: records.map((r) => summarizeWellRecord(r, options)),
  }
}
