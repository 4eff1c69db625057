import { ChangeLogStore } from '../changelog/store.js'
import { ConnectionPool } from '../connection-pool.js'
import { CursorManager } from '../cursors/manager.js'
import { HookRegistry } from '../hooks/registry.js'
import { MetricsCollector } from '../metrics/collector.js'
import { MigrationRunner } from '../migrations/runner.js'
import { RetentionManager } from '../retention/manager.js'
import { TableStore } from '../tables/table-store.js'
import type { Clock, MetricsConfig } from '../types.js'

export interface ManualClock extends Clock {
  advance(ms: number): void
  set(ms: number): void
}

export function manualClock(start = 1_000_000): ManualClock {
  let current = start
  return {
    now: () => current,
    advance: ms => {
      current += ms
    },
    set: ms => {
      current = ms
    },
  }
}

export interface Stores {
  pool: ConnectionPool
  clock: ManualClock
  hooks: HookRegistry
  changeLog: ChangeLogStore
  tables: TableStore
  cursors: CursorManager
  retention: RetentionManager
}

/** Wires the storage components over a fresh in-memory database. */
export function openStores(options?: { pageSize?: number; dataExtensionMs?: number; metrics?: MetricsConfig }): Stores {
  const pool = new ConnectionPool({ path: ':memory:' })
  MigrationRunner.run(pool.acquireWriter())
  const clock = manualClock()
  const hooks = new HookRegistry()
  const metrics = options?.metrics ? new MetricsCollector(options.metrics) : undefined
  const changeLog = new ChangeLogStore(pool, { clock, hooks, metrics, pageSize: options?.pageSize })
  const tables = new TableStore(pool, changeLog)
  const cursors = new CursorManager(pool, changeLog, { clock, hooks, metrics })
  const retention = new RetentionManager(pool, changeLog, cursors, {
    clock,
    dataExtensionMs: options?.dataExtensionMs,
    hooks,
    metrics,
  })
  return { pool, clock, hooks, changeLog, tables, cursors, retention }
}
