/**
 * Generators for dates, ranges, and range groups.
 *
 * Dates fall in a two-year window so that generated ranges overlap often.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { type LocalDate, makeDate, addDays } from '../../../src/time-date'
import { type DateRange, makeDateRange } from '../../../src/date-range'
import type { DateRangeGroup } from '../../../src/date-range-group'

export const EPOCH: LocalDate = makeDate(2020, 1, 1)
export const WINDOW_DAYS = 730
export const MAX_RANGE_DAYS = 120

export function localDateGen(): Arbitrary<LocalDate> {
  return fc.integer({ min: 0, max: WINDOW_DAYS }).map((n) => addDays(EPOCH, n))
}

export function dateRangeGen(maxDays = MAX_RANGE_DAYS): Arbitrary<DateRange> {
  return fc
    .tuple(fc.integer({ min: 0, max: WINDOW_DAYS }), fc.integer({ min: 0, max: maxDays }))
    .map(([offset, length]) => makeDateRange(addDays(EPOCH, offset), addDays(EPOCH, offset + length)))
}

export function dateRangeGroupGen(maxLength = 6): Arbitrary<DateRangeGroup> {
  return fc.array(dateRangeGen(), { maxLength })
}

export type WellGaps = { span: DateRange; gaps: DateRangeGroup }

/** A well's record window, anywhere from one day to the whole window, and its gaps. */
export function wellGapsGen(): Arbitrary<WellGaps> {
  return fc.record({ span: dateRangeGen(WINDOW_DAYS), gaps: dateRangeGroupGen() })
}
