/**
 * well-gap-research
 *
 * Public API exports
 */

// Error system
export {
  GapResearchError, GapResearchErrorCode,
  InvalidRangeError, TypeMismatchError, FormatError, ParseError,
  MissingCategoryError, InconsistentRecordError,
  InvalidApiNumberError, ValidationError, CollectorNotFoundError,
  DuplicateKeyError, NotFoundError, InvalidDataError,
} from './errors'
export type { GapResearchErrorCode as GapResearchErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, makeDate, today,
  yearOf, monthOf, dayOf,
  addDays, daysBetween,
  compareDates, dateBefore, dateAfter, minDate, maxDate,
} from './time-date'

// Date ranges
export type { DateRange } from './date-range'
export {
  DATE_RANGE_SEPARATOR,
  makeDateRange, isDateRange,
  durationInDays, durationInMonths,
  isContiguousWith, encompasses, mergeWith, subtract, findOverlap, dateRangeEquals,
  formatDateRange, parseDateRange,
} from './date-range'

// Date range groups
export type { DateRangeGroup, DurationBounds } from './date-range-group'
export {
  createDateRangeGroup, addDateRange, sortDateRanges,
  mergeAll, subtractFromAll, findAllOverlaps,
  shortestAndLongestDurations, rangesOfMinimumDuration,
  formatDateRangeGroup,
} from './date-range-group'

// Well records & groups
export type { WellRecord, WellRecordInput } from './well-record'
export {
  createWellRecord, registerDateRange, registerEmptyCategory,
  registeredCategories, hasCategory, dateRangesByCategory,
  hasProductionSpan, describeWellRecord,
} from './well-record'
export type { WellGroup } from './well-group'
export { createWellGroup, normalizeGaps } from './well-group'
export type { StandardCategory } from './standard-categories'
export {
  NO_PROD_IGNORE_SHUTIN, NO_PROD_BUT_SHUTIN_COUNTS, CATEGORY_DESCRIPTIONS,
} from './standard-categories'

// API numbers
export { STATE_CODES, validateApiNumber, stateCodeOf, stateNameOf } from './api-number'

// Summaries
export type {
  SummaryOptions, RecordSummaryOptions,
  DateRangeGroupSummary, CategorySummary, WellRecordSummary, WellGroupSummary,
} from './summarize'
export {
  summarizeDateRange, summarizeDateRangeGroup, summarizeWellRecord, summarizeWellGroup,
} from './summarize'

// Persistence
export type { StoredWellRecord, UpdateOptions, WellRecordGateway } from './gateway'
export { createMockGateway, toStoredWellRecord, fromStoredWellRecord } from './gateway'
export type { SqliteGateway } from './sqlite-gateway'
export { createSqliteGateway } from './sqlite-gateway'

// Collection & research
export type { CollectOptions, WellRecordCollector } from './collector'
export type {
  GapResearcherConfig, GapResearcher,
  RecordLookupOptions, GetWellRecordOptions, GetWellGroupOptions,
  GapResearchEvents, GapResearchEvent,
} from './researcher'
export { createGapResearcher, DEFAULT_MAX_RECORD_AGE_DAYS } from './researcher'

// Logging
export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions } from './logger'
export { createConsoleLogger, silentLogger } from './logger'
