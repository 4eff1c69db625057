import type { ConnectionSource } from '../connection-pool.js'
import { DEFAULT_PAGE_SIZE, systemClock } from '../config.js'
import {
  InvalidPositionError,
  RangeCompactedError,
  TableAlreadyExistsError,
  UntrackedTableError,
} from '../errors.js'
import type { HookRegistry } from '../hooks/registry.js'
import { createModuleLogger } from '../logger.js'
import type { MetricsCollector } from '../metrics/collector.js'
import { execute, inTransaction, queryAll, queryOne, type SqliteDb } from '../query-executor.js'
import type { AuditContext, ChangeInput, ChangeRecord, Clock, ReadOptions, Row } from '../types.js'
import { matchesFilter } from './filter.js'
import { serializeRow } from './payload.js'
import type { ChangeRow, PurgeResult, TableLogInfo, TableRow } from './types.js'

const log = createModuleLogger('changelog')

export interface ChangeLogStoreOptions {
  clock?: Clock
  /** Records fetched per query by {@link ChangeLogStore.readRange}. */
  pageSize?: number
  hooks?: HookRegistry
  metrics?: MetricsCollector
}

const SELECT_TABLE = 'SELECT * FROM _tidemark_tables WHERE table_id = ? AND dropped_at IS NULL'

const SELECT_REGISTRATION = 'SELECT * FROM _tidemark_tables WHERE table_id = ?'

const SELECT_PAGE = `SELECT table_id, seq, operation, is_update, row_identity, payload, committed_at, actor
  FROM _tidemark_changes
  WHERE table_id = ? AND seq > ? AND seq <= ?
  ORDER BY seq ASC
  LIMIT ?`

const INSERT_CHANGE = `INSERT INTO _tidemark_changes
  (table_id, seq, operation, is_update, row_identity, payload, committed_at, actor)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)`

function toRecord(row: ChangeRow): ChangeRecord {
  const record: ChangeRecord = {
    tableId: row.table_id,
    seq: row.seq,
    operation: row.operation,
    isUpdate: row.is_update === 1,
    rowIdentity: row.row_identity,
    row: JSON.parse(row.payload),
    committedAt: row.committed_at,
  }
  if (row.actor !== null) {
    record.actor = row.actor
  }
  return record
}

function toInfo(row: TableRow): TableLogInfo {
  return {
    tableId: row.table_id,
    tracking: row.tracking === 1,
    head: row.head,
    compactedThrough: row.compacted_through,
    lastCommittedAt: row.last_committed_at,
    createdAt: row.created_at,
  }
}

/**
 * Append-only, per-table ledger of row-level changes. Every tracked table has
 * its own monotonic sequence; positions are assigned inside the write
 * transaction and never reused, even after compaction or when tracking is
 * switched off and on again.
 */
export class ChangeLogStore {
  private readonly clock: Clock
  private readonly pageSize: number
  private readonly hooks: HookRegistry | null
  private readonly metrics: MetricsCollector | null

  constructor(
    private readonly connections: ConnectionSource,
    options?: ChangeLogStoreOptions,
  ) {
    this.clock = options?.clock ?? systemClock
    this.pageSize = options?.pageSize ?? DEFAULT_PAGE_SIZE
    this.hooks = options?.hooks ?? null
    this.metrics = options?.metrics ?? null
  }

  /**
   * Registers a new table. Used by the table store; tracking can be switched
   * on later with {@link enableTracking}. A dropped table of the same id is
   * revived with its head, so positions continue where they stopped.
   *
   * @throws {TableAlreadyExistsError} if the table is already registered.
   */
  registerTable(tableId: string, tracking: boolean): void {
    const db = this.connections.acquireWriter()
    const existing = queryOne<TableRow>(db, SELECT_REGISTRATION, tableId)
    if (existing && existing.dropped_at === null) {
      throw new TableAlreadyExistsError(tableId)
    }
    if (existing) {
      execute(
        db,
        'UPDATE _tidemark_tables SET tracking = ?, created_at = ?, dropped_at = NULL WHERE table_id = ?',
        tracking ? 1 : 0,
        this.clock.now(),
        tableId,
      )
      log.info({ tableId, head: existing.head }, 'dropped table registered again')
      return
    }
    execute(
      db,
      'INSERT INTO _tidemark_tables (table_id, tracking, created_at) VALUES (?, ?, ?)',
      tableId,
      tracking ? 1 : 0,
      this.clock.now(),
    )
  }

  /**
   * Drops the table's history. The entry stays behind, marked dropped, so its
   * head survives a later re-creation. Cursors on the table go STALE: what
   * they were reading no longer exists.
   */
  unregisterTable(tableId: string): void {
    const db = this.connections.acquireWriter()
    const staleCursors = inTransaction(db, () => {
      execute(db, 'DELETE FROM _tidemark_changes WHERE table_id = ?', tableId)
      execute(
        db,
        `UPDATE _tidemark_tables
         SET tracking = 0, compacted_through = head, compacted_committed_at = last_committed_at, dropped_at = ?
         WHERE table_id = ?`,
        this.clock.now(),
        tableId,
      )
      return execute(
        db,
        "UPDATE _tidemark_cursors SET state = 'STALE' WHERE table_id = ? AND state = 'ACTIVE'",
        tableId,
      )
    })
    if (staleCursors > 0) {
      log.warn({ tableId, staleCursors }, 'cursors on dropped table marked stale')
    }
  }

  hasTable(tableId: string): boolean {
    return this.findTable(this.connections.acquireReader(), tableId) !== undefined
  }

  /** Turns change tracking on, registering the table when it is unknown. Idempotent. */
  enableTracking(tableId: string): void {
    const db = this.connections.acquireWriter()
    const existing = this.findTable(db, tableId)
    if (existing?.tracking === 1) return

    if (existing) {
      execute(db, 'UPDATE _tidemark_tables SET tracking = 1 WHERE table_id = ?', tableId)
    } else {
      this.registerTable(tableId, true)
    }
    log.info({ tableId }, 'change tracking enabled')
  }

  /**
   * Turns change tracking off and drops the table's history. The head is kept
   * so that positions continue where they stopped if tracking comes back.
   */
  disableTracking(tableId: string): void {
    const db = this.connections.acquireWriter()
    const existing = this.findTable(db, tableId)
    if (!existing || existing.tracking === 0) return

    inTransaction(db, () => {
      execute(db, 'DELETE FROM _tidemark_changes WHERE table_id = ?', tableId)
      execute(
        db,
        `UPDATE _tidemark_tables
         SET tracking = 0, compacted_through = head, compacted_committed_at = last_committed_at
         WHERE table_id = ?`,
        tableId,
      )
    })
    log.info({ tableId }, 'change tracking disabled')
  }

  isTracked(tableId: string): boolean {
    return this.findTable(this.connections.acquireReader(), tableId)?.tracking === 1
  }

  trackedTables(): string[] {
    return queryAll<{ table_id: string }>(
      this.connections.acquireReader(),
      'SELECT table_id FROM _tidemark_tables WHERE tracking = 1 ORDER BY table_id',
    ).map(row => row.table_id)
  }

  /** Looks a table up on the writer connection, so uncommitted registrations are visible. */
  describeTable(tableId: string): TableLogInfo | undefined {
    const row = this.findTable(this.connections.acquireWriter(), tableId)
    return row ? toInfo(row) : undefined
  }

  tableInfo(tableId: string): TableLogInfo {
    return toInfo(this.requireTracked(this.connections.acquireReader(), tableId))
  }

  append(tableId: string, change: ChangeInput, ctx?: AuditContext): number {
    return this.appendBatch(tableId, [change], ctx)[0]
  }

  /**
   * Records an update as a DELETE of the old row immediately followed by an
   * INSERT of the new one. Both records carry `isUpdate` and the same row
   * identity, and occupy adjacent positions.
   */
  appendUpdate(tableId: string, rowIdentity: string, before: Row, after: Row, ctx?: AuditContext): [number, number] {
    const [deleted, inserted] = this.appendBatch(
      tableId,
      [
        { operation: 'DELETE', row: before, rowIdentity, isUpdate: true },
        { operation: 'INSERT', row: after, rowIdentity, isUpdate: true },
      ],
      ctx,
    )
    return [deleted, inserted]
  }

  /**
   * Appends several changes atomically and in order, sharing one commit
   * timestamp. Returns the assigned positions.
   *
   * @throws {UntrackedTableError} if change tracking is not enabled.
   * @throws {HookDeniedError} if a `beforeAppend` hook rejects a change.
   */
  appendBatch(tableId: string, changes: ChangeInput[], ctx?: AuditContext): number[] {
    if (changes.length === 0) return []

    const db = this.connections.acquireWriter()
    this.requireTracked(db, tableId)

    if (this.hooks?.has('beforeAppend')) {
      for (const change of changes) {
        this.hooks.gate('beforeAppend', {
          tableId,
          operation: change.operation,
          rowIdentity: change.rowIdentity,
          isUpdate: change.isUpdate ?? false,
          actor: ctx?.actor,
        })
      }
    }

    const write = () =>
      inTransaction(db, () => {
        const table = this.requireTracked(db, tableId)
        const committedAt = Math.max(this.clock.now(), table.last_committed_at)
        const positions: number[] = []
        let seq = table.head

        for (const change of changes) {
          seq += 1
          execute(
            db,
            INSERT_CHANGE,
            tableId,
            seq,
            change.operation,
            change.isUpdate ? 1 : 0,
            change.rowIdentity,
            serializeRow(tableId, change.rowIdentity, change.row),
            committedAt,
            ctx?.actor ?? null,
          )
          positions.push(seq)
        }

        execute(
          db,
          'UPDATE _tidemark_tables SET head = ?, last_committed_at = ? WHERE table_id = ?',
          seq,
          committedAt,
          tableId,
        )
        return { positions, committedAt }
      })

    const { positions, committedAt } = this.metrics
      ? this.metrics.trackAppend(write, { tableId, records: changes.length })
      : write()

    log.debug({ tableId, from: positions[0], to: positions[positions.length - 1] }, 'changes appended')

    if (this.hooks?.has('afterAppend')) {
      changes.forEach((change, i) => {
        this.hooks?.notify('afterAppend', {
          tableId,
          operation: change.operation,
          rowIdentity: change.rowIdentity,
          isUpdate: change.isUpdate ?? false,
          actor: ctx?.actor,
          seq: positions[i],
          committedAt,
        })
      })
    }

    return positions
  }

  /**
   * Lazily reads the changes in `(fromExclusive, toInclusive]` in position
   * order, a page at a time. The range is validated when this method is
   * called; the upper bound defaults to the head at that moment, so appends
   * made while iterating are not included.
   *
   * Under `APPEND_ONLY` only INSERT records surface, so an update appears as
   * the insert of its final state.
   *
   * @throws {UntrackedTableError} if change tracking is not enabled.
   * @throws {RangeCompactedError} if `fromExclusive` precedes retained history,
   *   or if compaction removes records while the iterator is being consumed.
   */
  readRange(
    tableId: string,
    fromExclusive: number,
    toInclusive?: number,
    options?: ReadOptions,
  ): IterableIterator<ChangeRecord> {
    const table = this.requireTracked(this.connections.acquireReader(), tableId)

    if (!Number.isInteger(fromExclusive) || fromExclusive < 0) {
      throw new InvalidPositionError(`Invalid start position ${fromExclusive} for table '${tableId}'`)
    }
    if (fromExclusive < table.compacted_through) {
      throw new RangeCompactedError(tableId, fromExclusive, table.compacted_through)
    }

    const to = Math.min(toInclusive ?? table.head, table.head)
    return this.iterate(tableId, fromExclusive, to, options ?? {})
  }

  headPosition(tableId: string): number {
    return this.requireTracked(this.connections.acquireReader(), tableId).head
  }

  compactedThrough(tableId: string): number {
    return this.requireTracked(this.connections.acquireReader(), tableId).compacted_through
  }

  /**
   * Resolves a timestamp to the last position committed at or before it.
   *
   * @throws {RangeCompactedError} if the timestamp falls inside history that
   *   has already been compacted away.
   */
  positionAt(tableId: string, timestamp: number): number {
    const db = this.connections.acquireReader()
    const table = this.requireTracked(db, tableId)

    if (timestamp >= table.last_committed_at) {
      return table.head
    }

    const row = queryOne<{ seq: number | null }>(
      db,
      'SELECT MAX(seq) AS seq FROM _tidemark_changes WHERE table_id = ? AND committed_at <= ?',
      tableId,
      timestamp,
    )
    if (row?.seq != null) {
      return row.seq
    }

    if (table.compacted_through === 0) {
      return 0
    }
    if (timestamp >= table.compacted_committed_at) {
      return table.compacted_through
    }
    throw new RangeCompactedError(tableId, 0, table.compacted_through)
  }

  /** Commit timestamp of the record at `seq`, if it is still retained. */
  committedAtOf(tableId: string, seq: number): number | undefined {
    return queryOne<{ committed_at: number }>(
      this.connections.acquireReader(),
      'SELECT committed_at FROM _tidemark_changes WHERE table_id = ? AND seq = ?',
      tableId,
      seq,
    )?.committed_at
  }

  /** True when a record after `position` was committed before `cutoff`. */
  hasCommittedBefore(tableId: string, position: number, cutoff: number): boolean {
    const row = queryOne<{ found: number }>(
      this.connections.acquireWriter(),
      'SELECT 1 AS found FROM _tidemark_changes WHERE table_id = ? AND seq > ? AND committed_at < ? LIMIT 1',
      tableId,
      position,
      cutoff,
    )
    return row !== undefined
  }

  /**
   * Deletes records positioned before `beforeSeq` that were also committed
   * before `committedBefore`. Both conditions must hold for a record to go.
   */
  purge(tableId: string, beforeSeq: number, committedBefore: number): PurgeResult {
    const db = this.connections.acquireWriter()
    return inTransaction(db, () => {
      const table = this.requireTracked(db, tableId)
      const bounds = queryOne<{ seq: number | null; at: number | null }>(
        db,
        `SELECT MAX(seq) AS seq, MAX(committed_at) AS at FROM _tidemark_changes
         WHERE table_id = ? AND seq < ? AND committed_at < ?`,
        tableId,
        beforeSeq,
        committedBefore,
      )

      if (bounds?.seq == null || bounds.at == null) {
        return { removed: 0, compactedThrough: table.compacted_through }
      }

      const removed = execute(
        db,
        'DELETE FROM _tidemark_changes WHERE table_id = ? AND seq < ? AND committed_at < ?',
        tableId,
        beforeSeq,
        committedBefore,
      )
      const compactedThrough = Math.max(table.compacted_through, bounds.seq)
      execute(
        db,
        `UPDATE _tidemark_tables
         SET compacted_through = ?, compacted_committed_at = MAX(compacted_committed_at, ?)
         WHERE table_id = ?`,
        compactedThrough,
        bounds.at,
        tableId,
      )
      return { removed, compactedThrough }
    })
  }

  private *iterate(tableId: string, from: number, to: number, options: ReadOptions): Generator<ChangeRecord> {
    const { mode = 'DEFAULT', filter, until } = options
    let last = from

    while (last < to) {
      const rows = queryAll<ChangeRow>(this.connections.acquireReader(), SELECT_PAGE, tableId, last, to, this.pageSize)
      if (rows.length === 0) {
        throw new RangeCompactedError(tableId, last, this.compactedThrough(tableId))
      }

      for (const row of rows) {
        if (row.seq !== last + 1) {
          throw new RangeCompactedError(tableId, last, this.compactedThrough(tableId))
        }
        last = row.seq

        if (until !== undefined && row.committed_at > until) return
        if (mode === 'APPEND_ONLY' && row.operation !== 'INSERT') continue

        const record = toRecord(row)
        if (filter && !matchesFilter(record.row, filter)) continue
        yield record
      }
    }
  }

  private findTable(db: SqliteDb, tableId: string): TableRow | undefined {
    return queryOne<TableRow>(db, SELECT_TABLE, tableId)
  }

  private requireTracked(db: SqliteDb, tableId: string): TableRow {
    const table = this.findTable(db, tableId)
    if (!table || table.tracking !== 1) {
      throw new UntrackedTableError(tableId)
    }
    return table
  }
}
