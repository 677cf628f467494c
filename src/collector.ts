/**
 * Well Record Collector
 *
 * Boundary to whatever pulls production records from a state's public
 * sources. A collector returns records with their gap categories already
 * registered, including categories that turned out to have no ranges.
 */

import type { WellRecord } from './well-record'

export type CollectOptions = {
  /** Name to give the record; the source's own name wins when it has one. */
  wellName?: string | null
}

export interface WellRecordCollector {
  /** Resolves to null when the source has no records for the well. */
  collect(apiNum: string, options: CollectOptions): Promise<WellRecord | null>
}
