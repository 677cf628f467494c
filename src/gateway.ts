/**
 * Well Record Gateway
 *
 * Persistence interface for well records keyed by API number, the stored
 * representation shared by all implementations, and an in-memory
 * implementation for tests and short-lived research sessions.
 * All methods are async so that synchronous and asynchronous stores fit
 * the same interface.
 */

import { type LocalDate, parseDate } from './time-date'
import { formatDateRange, parseDateRange } from './date-range'
import {
  type WellRecord,
  createWellRecord, registerDateRange, registerEmptyCategory,
} from './well-record'
import { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

export { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

// ============================================================================
// Stored Representation
// ============================================================================

/**
 * A well record as stored: dates as `YYYY-MM-DD` strings and every range as
 * `YYYY-MM-DD::YYYY-MM-DD`, keyed by category. Empty categories are kept.
 */
export type StoredWellRecord = {
  apiNum: string
  wellName: string | null
  firstDate: string | null
  lastDate: string | null
  recordAccessDate: string | null
  dateRanges: Record<string, string[]>
}

export function toStoredWellRecord(record: WellRecord): StoredWellRecord {
  const dateRanges: Record<string, string[]> = {}
  for (const [category, group] of record.dateRanges) {
    dateRanges[category] = group.map(formatDateRange)
  }
  return {
    apiNum: record.apiNum,
    wellName: record.wellName,
    firstDate: record.firstDate,
    lastDate: record.lastDate,
    recordAccessDate: record.recordAccessDate,
    dateRanges,
  }
}

function decodeDate(apiNum: string, field: string, value: string | null): LocalDate | null {
  if (value === null) return null
  const result = parseDate(value)
  if (!result.ok) {
    throw new InvalidDataError(`Well ${apiNum}: invalid ${field}: ${result.error.message}`)
  }
  return result.value
}

export function fromStoredWellRecord(stored: StoredWellRecord): WellRecord {
  const { apiNum } = stored
  let record: WellRecord
  try {
    record = createWellRecord({
      apiNum,
      wellName: stored.wellName,
      firstDate: decodeDate(apiNum, 'first date', stored.firstDate),
      lastDate: decodeDate(apiNum, 'last date', stored.lastDate),
      recordAccessDate: decodeDate(apiNum, 'record access date', stored.recordAccessDate),
    })
  } catch (e) {
    if (e instanceof InvalidDataError) throw e
    throw new InvalidDataError(`Well ${apiNum}: ${e instanceof Error ? e.message : String(e)}`)
  }

  for (const [category, ranges] of Object.entries(stored.dateRanges)) {
    registerEmptyCategory(record, category)
    for (const raw of ranges) {
      const parsed = parseDateRange(raw)
      if (!parsed.ok) {
        throw new InvalidDataError(`Well ${apiNum}, category ${category}: ${parsed.error.message}`)
      }
      registerDateRange(record, category, parsed.value)
    }
  }
  return record
}

// ============================================================================
// Gateway Interface
// ============================================================================

export type UpdateOptions = {
  /** Insert the record if it is not stored yet. Default true. */
  upsert?: boolean
}

export interface WellRecordGateway {
  /** Store a new record. Rejects with DuplicateKeyError if its API number is taken. */
  insert(record: WellRecord): Promise<void>
  find(apiNum: string): Promise<WellRecord | null>
  /** Replace a stored record. Rejects with NotFoundError if absent and not upserting. */
  update(record: WellRecord, options?: UpdateOptions): Promise<void>
  delete(apiNum: string): Promise<void>
}

// ============================================================================
// In-Memory Gateway
// ============================================================================

export function createMockGateway(): WellRecordGateway {
  const records = new Map<string, StoredWellRecord>()

  return {
    async insert(record: WellRecord) {
      if (records.has(record.apiNum)) {
        throw new DuplicateKeyError(`Well record '${record.apiNum}' already exists`)
      }
      records.set(record.apiNum, toStoredWellRecord(record))
    },

    async find(apiNum: string) {
      const stored = records.get(apiNum)
      return stored ? fromStoredWellRecord(stored) : null
    },

    async update(record: WellRecord, options: UpdateOptions = {}) {
      const { upsert = true } = options
      if (!upsert && !records.has(record.apiNum)) {
        throw new NotFoundError(`Well record '${record.apiNum}' not found`)
      }
      records.set(record.apiNum, toStoredWellRecord(record))
    },

    async delete(apiNum: string) {
      records.delete(apiNum)
    },
  }
}
