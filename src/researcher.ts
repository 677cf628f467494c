/**
 * Gap Researcher
 *
 * Assembles well records from the store or, when missing or stale, from the
 * collector registered for the well's state, and runs gap research over the
 * resulting well groups.
 */

import { type LocalDate, daysBetween, today as hostToday } from './time-date'
import type { DateRangeGroup } from './date-range-group'
import { formatDateRangeGroup } from './date-range-group'
import { type WellRecord, describeWellRecord } from './well-record'
import { type WellGroup, createWellGroup } from './well-group'
import type { WellRecordGateway } from './gateway'
import type { WellRecordCollector } from './collector'
import { type Logger, createConsoleLogger } from './logger'
import { validateApiNumber, stateCodeOf, STATE_CODES } from './api-number'
import {
  InvalidApiNumberError, CollectorNotFoundError, ValidationError, NotFoundError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type GapResearcherConfig = {
  gateway: WellRecordGateway
  /** Collectors keyed by 2-digit state code. */
  collectors?: Readonly<Record<string, WellRecordCollector>>
  /** Stored records accessed longer ago than this are collected again. Default 3650. */
  maxRecordAgeDays?: number
  /** Store freshly collected records. Default true. */
  storeAfter?: boolean
  logger?: Logger
  today?: () => LocalDate
}

export type RecordLookupOptions = {
  maxRecordAgeDays?: number
  storeAfter?: boolean
}

export type GetWellRecordOptions = RecordLookupOptions & {
  wellName?: string | null
}

export type GetWellGroupOptions = RecordLookupOptions & {
  /** One name per API number, in the same order. */
  wellNames?: readonly (string | null)[]
}

export type GapResearchEvents = {
  recordLoaded: { apiNum: string }
  recordCollected: { apiNum: string; replacedStale: boolean }
  recordStored: { apiNum: string; operation: 'insert' | 'update' }
  gapsResearched: { apiNums: string[]; category: string; gaps: DateRangeGroup }
}

export type GapResearchEvent = keyof GapResearchEvents

type Handler<E extends GapResearchEvent> = (payload: GapResearchEvents[E]) => void

export type GapResearcher = {
  registerCollector(stateCode: string, collector: WellRecordCollector): void
  /** The record for a well, or null if it is neither stored nor collectable. */
  getWellRecord(apiNum: string, options?: GetWellRecordOptions): Promise<WellRecord | null>
  getWellGroup(apiNums: readonly string[], options?: GetWellGroupOptions): Promise<WellGroup>
  /** Build a group and find its shared gaps for each category. */
  researchGaps(
    apiNums: readonly string[],
    categories: readonly string[],
    options?: GetWellGroupOptions,
  ): Promise<WellGroup>
  on<E extends GapResearchEvent>(event: E, handler: Handler<E>): void
}

export const DEFAULT_MAX_RECORD_AGE_DAYS = 3650

// ============================================================================
// Factory
// ============================================================================

function checkMaxAge(days: number): number {
  if (!Number.isInteger(days) || days < 0) {
    throw new ValidationError(`maxRecordAgeDays must be a non-negative integer, got ${days}`)
  }
  return days
}

export function createGapResearcher(config: GapResearcherConfig): GapResearcher {
  if (!config.gateway || typeof config.gateway !== 'object') {
    throw new ValidationError('Gateway is required')
  }

  const gateway = config.gateway
  const defaultMaxAge = checkMaxAge(config.maxRecordAgeDays ?? DEFAULT_MAX_RECORD_AGE_DAYS)
  const defaultStoreAfter = config.storeAfter ?? true
  const logger = config.logger ?? createConsoleLogger({ level: 'warn' })
  const today = config.today ?? hostToday

  const collectors = new Map<string, WellRecordCollector>()

  // Event handlers
  const eventHandlers: { [E in GapResearchEvent]: Handler<E>[] } = {
    recordLoaded: [],
    recordCollected: [],
    recordStored: [],
    gapsResearched: [],
  }

  function emit<E extends GapResearchEvent>(event: E, payload: GapResearchEvents[E]): void {
    for (const handler of eventHandlers[event]) {
      try { handler(payload) } catch (e) { logger.error(`Event handler error on '${event}'`, e) }
    }
  }

  function on<E extends GapResearchEvent>(event: E, handler: Handler<E>): void {
    eventHandlers[event].push(handler)
  }

  function registerCollector(stateCode: string, collector: WellRecordCollector): void {
    if (!Object.hasOwn(STATE_CODES, stateCode)) {
      throw new ValidationError(`Unknown state code: '${stateCode}'`)
    }
    collectors.set(stateCode, collector)
  }

  for (const [stateCode, collector] of Object.entries<WellRecordCollector>(config.collectors ?? {})) {
    registerCollector(stateCode, collector)
  }

  function isStale(record: WellRecord, maxAgeDays: number): boolean {
    if (record.recordAccessDate === null) return false
    return daysBetween(record.recordAccessDate, today()) > maxAgeDays
  }

  async function getWellRecord(
    apiNum: string,
    options: GetWellRecordOptions = {},
  ): Promise<WellRecord | null> {
    if (!validateApiNumber(apiNum)) {
      logger.error('Invalid API number', undefined, { apiNum })
      throw new InvalidApiNumberError(`Invalid API number: '${apiNum}'`)
    }
    const maxAgeDays = options.maxRecordAgeDays === undefined
      ? defaultMaxAge
      : checkMaxAge(options.maxRecordAgeDays)
    const storeAfter = options.storeAfter ?? defaultStoreAfter

    const existing = await gateway.find(apiNum)
    const stale = existing !== null && isStale(existing, maxAgeDays)
    if (existing !== null && !stale) {
      logger.info('Well record found in store', { apiNum })
      emit('recordLoaded', { apiNum })
      return existing
    }

    const stateCode = stateCodeOf(apiNum)
    const collector = collectors.get(stateCode)
    if (!collector) {
      logger.error('No collector registered', undefined, { apiNum, stateCode })
      throw new CollectorNotFoundError(`No collector registered for state code '${stateCode}'`)
    }

    const collected = await collector.collect(apiNum, { wellName: options.wellName ?? null })
    if (collected === null) {
      if (existing !== null) {
        logger.warn('Well record could not be collected; using stale stored record', {
          apiNum, recordAccessDate: existing.recordAccessDate,
        })
        return existing
      }
      logger.info('Well record could not be collected', { apiNum })
      return null
    }
    if (collected.apiNum !== apiNum) {
      throw new ValidationError(
        `Collector for '${stateCode}' returned ${describeWellRecord(collected)} for '${apiNum}'`,
      )
    }
    emit('recordCollected', { apiNum, replacedStale: stale })

    if (storeAfter) {
      const operation = existing === null ? 'insert' : 'update'
      if (operation === 'insert') await gateway.insert(collected)
      else await gateway.update(collected)
      emit('recordStored', { apiNum, operation })
    }
    logger.info('Well record collected', {
      apiNum,
      stored: storeAfter,
      ...(stale ? { replacedRecordOlderThanDays: maxAgeDays } : {}),
    })
    return collected
  }

  async function getWellGroup(
    apiNums: readonly string[],
    options: GetWellGroupOptions = {},
  ): Promise<WellGroup> {
    const { wellNames, ...lookup } = options
    if (wellNames !== undefined && wellNames.length !== apiNums.length) {
      throw new ValidationError(
        `Got ${wellNames.length} well names for ${apiNums.length} API numbers`,
      )
    }

    const records: WellRecord[] = []
    for (const [i, apiNum] of apiNums.entries()) {
      const record = await getWellRecord(apiNum, { ...lookup, wellName: wellNames?.[i] ?? null })
      if (record === null) {
        throw new NotFoundError(`No well record could be found or collected for '${apiNum}'`)
      }
      records.push(record)
    }
    return createWellGroup(records)
  }

  async function researchGaps(
    apiNums: readonly string[],
    categories: readonly string[],
    options: GetWellGroupOptions = {},
  ): Promise<WellGroup> {
    const group = await getWellGroup(apiNums, options)
    for (const category of categories) {
      const gaps = group.findGaps(category)
      logger.info('Gaps researched', {
        category,
        apiNums: [...apiNums],
        gaps: formatDateRangeGroup(gaps),
      })
      emit('gapsResearched', { apiNums: [...apiNums], category, gaps })
    }
    return group
  }

  return {
    registerCollector,
    getWellRecord,
    getWellGroup,
    researchGaps,
    on,
  }
}
