import { serializeRow } from '../changelog/payload.js'
import type { ChangeLogStore } from '../changelog/store.js'
import type { ConnectionSource } from '../connection-pool.js'
import { DuplicateRowError, RowNotFoundError, TableNotFoundError, TidemarkError } from '../errors.js'
import { createModuleLogger } from '../logger.js'
import { execute, inTransaction, queryAll, queryOne } from '../query-executor.js'
import type { AuditContext, ChangeInput, Row } from '../types.js'

const log = createModuleLogger('tables')

interface StoredRow {
  row_identity: string
  payload: string
  weight: number
}

export interface TableEntry {
  rowIdentity: string
  row: Row
  weight: number
}

/** A signed change in multiplicity for one row. */
export interface RowDelta {
  rowIdentity: string
  row: Row
  weight: number
}

export interface CreateTableOptions {
  /** Record every mutation in the change log. Default: true. */
  changeTracking?: boolean
}

export interface DeltaSummary {
  inserted: number
  deleted: number
}

const SELECT_ROW = 'SELECT row_identity, payload, weight FROM _tidemark_rows WHERE table_id = ? AND row_identity = ?'

/**
 * Current state of base tables and materialization results. Every mutation
 * and the change records describing it commit in the same transaction, so a
 * reader never sees a row change without its change record or the reverse.
 */
export class TableStore {
  constructor(
    private readonly connections: ConnectionSource,
    private readonly changeLog: ChangeLogStore,
  ) {}

  createTable(tableId: string, options?: CreateTableOptions): void {
    this.changeLog.registerTable(tableId, options?.changeTracking ?? true)
    log.info({ tableId, changeTracking: options?.changeTracking ?? true }, 'table created')
  }

  dropTable(tableId: string): void {
    this.requireTable(tableId)
    const db = this.connections.acquireWriter()
    inTransaction(db, () => {
      execute(db, 'DELETE FROM _tidemark_rows WHERE table_id = ?', tableId)
      this.changeLog.unregisterTable(tableId)
    })
    log.info({ tableId }, 'table dropped')
  }

  hasTable(tableId: string): boolean {
    return this.changeLog.describeTable(tableId) !== undefined
  }

  /**
   * Inserts a row under the given identity.
   *
   * @returns the change position, or `null` when the table is not tracked.
   * @throws {DuplicateRowError} if the identity is already present.
   */
  insert(tableId: string, rowIdentity: string, row: Row, ctx?: AuditContext): number | null {
    const tracked = this.requireTable(tableId)
    const db = this.connections.acquireWriter()

    return inTransaction(db, () => {
      if (queryOne<StoredRow>(db, SELECT_ROW, tableId, rowIdentity)) {
        throw new DuplicateRowError(tableId, rowIdentity)
      }
      execute(
        db,
        'INSERT INTO _tidemark_rows (table_id, row_identity, payload, weight) VALUES (?, ?, ?, 1)',
        tableId,
        rowIdentity,
        serializeRow(tableId, rowIdentity, row),
      )
      return tracked ? this.changeLog.append(tableId, { operation: 'INSERT', row, rowIdentity }, ctx) : null
    })
  }

  /**
   * Replaces a row. The change log receives the old row as a DELETE and the
   * new row as an INSERT, both flagged as an update.
   *
   * @returns the positions of the pair, or `null` when the table is not tracked.
   */
  update(tableId: string, rowIdentity: string, row: Row, ctx?: AuditContext): [number, number] | null {
    const tracked = this.requireTable(tableId)
    const db = this.connections.acquireWriter()

    return inTransaction(db, () => {
      const existing = queryOne<StoredRow>(db, SELECT_ROW, tableId, rowIdentity)
      if (!existing) {
        throw new RowNotFoundError(tableId, rowIdentity)
      }
      execute(
        db,
        'UPDATE _tidemark_rows SET payload = ? WHERE table_id = ? AND row_identity = ?',
        serializeRow(tableId, rowIdentity, row),
        tableId,
        rowIdentity,
      )
      return tracked ? this.changeLog.appendUpdate(tableId, rowIdentity, JSON.parse(existing.payload), row, ctx) : null
    })
  }

  /**
   * Deletes a row. The change record carries the deleted row.
   *
   * @returns the change position, or `null` when the table is not tracked.
   */
  delete(tableId: string, rowIdentity: string, ctx?: AuditContext): number | null {
    const tracked = this.requireTable(tableId)
    const db = this.connections.acquireWriter()

    return inTransaction(db, () => {
      const existing = queryOne<StoredRow>(db, SELECT_ROW, tableId, rowIdentity)
      if (!existing) {
        throw new RowNotFoundError(tableId, rowIdentity)
      }
      execute(db, 'DELETE FROM _tidemark_rows WHERE table_id = ? AND row_identity = ?', tableId, rowIdentity)
      return tracked
        ? this.changeLog.append(tableId, { operation: 'DELETE', row: JSON.parse(existing.payload), rowIdentity }, ctx)
        : null
    })
  }

  get(tableId: string, rowIdentity: string): Row | undefined {
    this.requireTable(tableId)
    const stored = queryOne<StoredRow>(this.connections.acquireReader(), SELECT_ROW, tableId, rowIdentity)
    return stored ? JSON.parse(stored.payload) : undefined
  }

  /** Every row with its multiplicity, ordered by identity. */
  entries(tableId: string): TableEntry[] {
    this.requireTable(tableId)
    return queryAll<StoredRow>(
      this.connections.acquireReader(),
      'SELECT row_identity, payload, weight FROM _tidemark_rows WHERE table_id = ? ORDER BY row_identity',
      tableId,
    ).map(stored => ({ rowIdentity: stored.row_identity, row: JSON.parse(stored.payload), weight: stored.weight }))
  }

  /** Every row, repeated by its multiplicity. */
  rows(tableId: string): Row[] {
    const result: Row[] = []
    for (const entry of this.entries(tableId)) {
      for (let i = 0; i < entry.weight; i++) {
        result.push(entry.row)
      }
    }
    return result
  }

  count(tableId: string): number {
    this.requireTable(tableId)
    const row = queryOne<{ total: number | null }>(
      this.connections.acquireReader(),
      'SELECT SUM(weight) AS total FROM _tidemark_rows WHERE table_id = ?',
      tableId,
    )
    return row?.total ?? 0
  }

  /**
   * Applies signed multiplicity changes to a table and logs one change record
   * per unit of weight. Deltas for the same identity are summed first.
   *
   * @throws {TidemarkError} with code `NEGATIVE_MULTIPLICITY` if a delta would
   *   remove more copies of a row than the table holds.
   */
  applyDelta(tableId: string, deltas: Iterable<RowDelta>, ctx?: AuditContext): DeltaSummary {
    const tracked = this.requireTable(tableId)
    const db = this.connections.acquireWriter()

    const merged = new Map<string, RowDelta>()
    for (const delta of deltas) {
      const current = merged.get(delta.rowIdentity)
      if (current) {
        current.weight += delta.weight
      } else {
        merged.set(delta.rowIdentity, { ...delta })
      }
    }

    return inTransaction(db, () => {
      const changes: ChangeInput[] = []
      let inserted = 0
      let deleted = 0

      for (const { rowIdentity, row, weight } of merged.values()) {
        if (weight === 0) continue

        const existing = queryOne<StoredRow>(db, SELECT_ROW, tableId, rowIdentity)
        const current = existing?.weight ?? 0
        const next = current + weight

        if (next < 0) {
          throw new TidemarkError(
            `Cannot remove ${-weight} copies of row '${rowIdentity}' from '${tableId}' holding ${current}`,
            'NEGATIVE_MULTIPLICITY',
          )
        }

        if (next === 0) {
          execute(db, 'DELETE FROM _tidemark_rows WHERE table_id = ? AND row_identity = ?', tableId, rowIdentity)
        } else if (current === 0) {
          execute(
            db,
            'INSERT INTO _tidemark_rows (table_id, row_identity, payload, weight) VALUES (?, ?, ?, ?)',
            tableId,
            rowIdentity,
            serializeRow(tableId, rowIdentity, row),
            next,
          )
        } else {
          execute(
            db,
            'UPDATE _tidemark_rows SET weight = ? WHERE table_id = ? AND row_identity = ?',
            next,
            tableId,
            rowIdentity,
          )
        }

        const operation = weight > 0 ? 'INSERT' : 'DELETE'
        for (let i = 0; i < Math.abs(weight); i++) {
          changes.push({ operation, row, rowIdentity })
        }
        if (weight > 0) {
          inserted += weight
        } else {
          deleted -= weight
        }
      }

      if (tracked && changes.length > 0) {
        this.changeLog.appendBatch(tableId, changes, ctx)
      }
      return { inserted, deleted }
    })
  }

  /** Returns whether the table is tracked. */
  private requireTable(tableId: string): boolean {
    const info = this.changeLog.describeTable(tableId)
    if (!info) {
      throw new TableNotFoundError(tableId)
    }
    return info.tracking
  }
}
