/**
 * SQLite Gateway
 *
 * Production implementation of the well record gateway using better-sqlite3.
 * Categories and their ranges live in their own tables so that a category
 * registered without ranges survives a round trip.
 */
import Database from 'better-sqlite3'
import type { WellRecord } from './well-record'
import {
  type WellRecordGateway, type StoredWellRecord, type UpdateOptions,
  toStoredWellRecord, fromStoredWellRecord,
} from './gateway'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'

export type SqliteGateway = WellRecordGateway & {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  close(): Promise<void>
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS well_record (
    api_num TEXT PRIMARY KEY,
    well_name TEXT,
    first_date TEXT,
    last_date TEXT,
    record_access_date TEXT,
    CHECK (first_date IS NULL OR last_date IS NULL OR first_date <= last_date)
  );

  CREATE TABLE IF NOT EXISTS date_range_category (
    api_num TEXT NOT NULL REFERENCES well_record(api_num) ON DELETE CASCADE,
    category TEXT NOT NULL,
    position INTEGER NOT NULL,
    PRIMARY KEY (api_num, category)
  );

  CREATE TABLE IF NOT EXISTS date_range (
    api_num TEXT NOT NULL,
    category TEXT NOT NULL,
    position INTEGER NOT NULL,
    date_range TEXT NOT NULL,
    PRIMARY KEY (api_num, category, position),
    FOREIGN KEY (api_num, category)
      REFERENCES date_range_category(api_num, category) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type WellRecordRow = {
  api_num: string
  well_name: string | null
  first_date: string | null
  last_date: string | null
  record_access_date: string | null
}

type CategoryRow = {
  category: string
}

type DateRangeRow = {
  category: string
  date_range: string
}

type SchemaVersionRow = {
  v: number | null
}

type TableRow = {
  name: string
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteGateway(path: string): Promise<SqliteGateway> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const insertRecord = db.prepare(
    'INSERT INTO well_record (api_num, well_name, first_date, last_date, record_access_date) VALUES (?, ?, ?, ?, ?)',
  )
  const upsertRecord = db.prepare(`
    INSERT INTO well_record (api_num, well_name, first_date, last_date, record_access_date)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(api_num) DO UPDATE SET
      well_name = excluded.well_name,
      first_date = excluded.first_date,
      last_date = excluded.last_date,
      record_access_date = excluded.record_access_date
  `)
  const insertCategory = db.prepare(
    'INSERT INTO date_range_category (api_num, category, position) VALUES (?, ?, ?)',
  )
  const insertDateRange = db.prepare(
    'INSERT INTO date_range (api_num, category, position, date_range) VALUES (?, ?, ?, ?)',
  )
  const deleteCategories = db.prepare('DELETE FROM date_range_category WHERE api_num = ?')
  const selectRecord = db.prepare('SELECT * FROM well_record WHERE api_num = ?')
  const selectCategories = db.prepare(
    'SELECT category FROM date_range_category WHERE api_num = ? ORDER BY position',
  )
  const selectDateRanges = db.prepare(
    'SELECT category, date_range FROM date_range WHERE api_num = ? ORDER BY category, position',
  )

  function recordParams(stored: StoredWellRecord) {
    return [
      stored.apiNum,
      stored.wellName,
      stored.firstDate,
      stored.lastDate,
      stored.recordAccessDate,
    ] as const
  }

  function writeDateRanges(stored: StoredWellRecord): void {
    Object.entries(stored.dateRanges).forEach(([category, ranges], categoryPosition) => {
      insertCategory.run(stored.apiNum, category, categoryPosition)
      ranges.forEach((range, position) => {
        insertDateRange.run(stored.apiNum, category, position, range)
      })
    })
  }

  const insertTx = db.transaction((stored: StoredWellRecord) => {
    insertRecord.run(...recordParams(stored))
    writeDateRanges(stored)
  })

  const replaceTx = db.transaction((stored: StoredWellRecord) => {
    upsertRecord.run(...recordParams(stored))
    deleteCategories.run(stored.apiNum)
    writeDateRanges(stored)
  })

  function exists(apiNum: string): boolean {
    return selectRecord.get(apiNum) !== undefined
  }

  const gateway: SqliteGateway = {
    async insert(record: WellRecord) {
      safe(() => insertTx(toStoredWellRecord(record)))
    },

    async find(apiNum: string) {
      const row = selectRecord.get(apiNum) as WellRecordRow | undefined
      if (!row) return null

      const dateRanges: Record<string, string[]> = {}
      for (const { category } of selectCategories.all(apiNum) as CategoryRow[]) {
        dateRanges[category] = []
      }
      for (const { category, date_range } of selectDateRanges.all(apiNum) as DateRangeRow[]) {
        dateRanges[category]?.push(date_range)
      }

      return fromStoredWellRecord({
        apiNum: row.api_num,
        wellName: row.well_name,
        firstDate: row.first_date,
        lastDate: row.last_date,
        recordAccessDate: row.record_access_date,
        dateRanges,
      })
    },

    async update(record: WellRecord, options: UpdateOptions = {}) {
      const { upsert = true } = options
      if (!upsert && !exists(record.apiNum)) {
        throw new NotFoundError(`Well record '${record.apiNum}' not found`)
      }
      safe(() => replaceTx(toStoredWellRecord(record)))
    },

    async delete(apiNum: string) {
      db.prepare('DELETE FROM well_record WHERE api_num = ?').run(apiNum)
    },

    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      ).all() as TableRow[]
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },

    async close() {
      db.close()
    },
  }

  return gateway
}
