/**
 * Shared builders for test data.
 */

import { parseDate, type LocalDate } from '../../src/time-date'
import { type DateRange, makeDateRange } from '../../src/date-range'
import {
  type WellRecord, type WellRecordInput,
  createWellRecord, registerDateRange, registerEmptyCategory,
} from '../../src/well-record'
import type { Logger, LogContext, LogLevel } from '../../src/logger'

export function d(str: string): LocalDate {
  const result = parseDate(str)
  if (!result.ok) throw result.error
  return result.value
}

/** `r('2020-01-01', '2020-01-31')` */
export function r(start: string, end: string): DateRange {
  return makeDateRange(d(start), d(end))
}

/** Plain `[start, end]` pairs for comparing groups with toEqual. */
export function pairs(ranges: readonly DateRange[]): [string, string][] {
  return ranges.map((range): [string, string] => [range.startDate, range.endDate])
}

type WellShape = {
  apiNum: string
  wellName?: string | null
  span?: [string, string]
  recordAccessDate?: string
  /** Category → `[start, end]` ranges; an empty list registers the category empty. */
  gaps?: Record<string, [string, string][]>
}

export function well(shape: WellShape): WellRecord {
  const input: WellRecordInput = {
    apiNum: shape.apiNum,
    wellName: shape.wellName ?? null,
    firstDate: shape.span ? d(shape.span[0]) : null,
    lastDate: shape.span ? d(shape.span[1]) : null,
    recordAccessDate: shape.recordAccessDate ? d(shape.recordAccessDate) : null,
  }
  const record = createWellRecord(input)
  for (const [category, ranges] of Object.entries(shape.gaps ?? {})) {
    registerEmptyCategory(record, category)
    for (const [start, end] of ranges) {
      registerDateRange(record, category, r(start, end))
    }
  }
  return record
}

export type LogEntry = {
  level: LogLevel
  message: string
  error?: unknown
  context?: LogContext
}

/** A logger that keeps every entry for assertions. */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return {
    entries,
    debug: (message, context) => { entries.push({ level: 'debug', message, context }) },
    info: (message, context) => { entries.push({ level: 'info', message, context }) },
    warn: (message, context) => { entries.push({ level: 'warn', message, context }) },
    error: (message, error, context) => { entries.push({ level: 'error', message, error, context }) },
  }
}
