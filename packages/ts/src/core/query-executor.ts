import type Database from 'better-sqlite3'
import { toTidemarkError } from './errors.js'

export type SqliteDb = InstanceType<typeof Database>

interface PreparedStatement {
  all(...params: unknown[]): unknown[]
  get(...params: unknown[]): unknown
  run(...params: unknown[]): {
    changes: number
    lastInsertRowid: number | bigint
  }
}

const STATEMENT_CACHE_CAPACITY = 128
const statementCaches = new WeakMap<SqliteDb, Map<string, PreparedStatement>>()

function getStatement(db: SqliteDb, sql: string): PreparedStatement {
  let cache = statementCaches.get(db)
  if (!cache) {
    cache = new Map()
    statementCaches.set(db, cache)
  }

  const cached = cache.get(sql)
  if (cached) {
    cache.delete(sql)
    cache.set(sql, cached)
    return cached
  }

  const stmt = db.prepare(sql)
  cache.set(sql, stmt)

  if (cache.size > STATEMENT_CACHE_CAPACITY) {
    const oldest = cache.keys().next().value
    if (oldest !== undefined) {
      cache.delete(oldest)
    }
  }

  return stmt
}

export function queryAll<T>(db: SqliteDb, sql: string, ...params: unknown[]): T[] {
  try {
    return getStatement(db, sql).all(...params) as T[]
  } catch (err) {
    throw toTidemarkError(err)
  }
}

export function queryOne<T>(db: SqliteDb, sql: string, ...params: unknown[]): T | undefined {
  try {
    return getStatement(db, sql).get(...params) as T | undefined
  } catch (err) {
    throw toTidemarkError(err)
  }
}

/** Runs a mutation and returns the number of rows it changed. */
export function execute(db: SqliteDb, sql: string, ...params: unknown[]): number {
  try {
    return getStatement(db, sql).run(...params).changes
  } catch (err) {
    throw toTidemarkError(err)
  }
}

/**
 * Runs `fn` inside a transaction on `db`. Nested calls become savepoints, so
 * components can compose their writes into one atomic unit.
 */
export function inTransaction<T>(db: SqliteDb, fn: () => T): T {
  return db.transaction(fn)()
}
