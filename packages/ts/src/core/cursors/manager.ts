import { parseFilter, serializeFilter } from '../changelog/filter.js'
import type { ChangeLogStore } from '../changelog/store.js'
import { systemClock } from '../config.js'
import type { ConnectionSource } from '../connection-pool.js'
import {
  CursorAlreadyExistsError,
  CursorExpiredError,
  CursorNotFoundError,
  InvalidPositionError,
  RangeCompactedError,
} from '../errors.js'
import type { HookRegistry } from '../hooks/registry.js'
import { createModuleLogger } from '../logger.js'
import type { MetricsCollector } from '../metrics/collector.js'
import { execute, queryAll, queryOne } from '../query-executor.js'
import type {
  AuditContext,
  ChangeRecord,
  ChangesOptions,
  Clock,
  CreateCursorOptions,
  CursorInfo,
  CursorMode,
  CursorState,
  HistoryPoint,
  PeekOptions,
  ReadOptions,
} from '../types.js'

const log = createModuleLogger('cursors')

interface CursorRow {
  cursor_id: string
  table_id: string
  mode: CursorMode
  position: number
  filter: string | null
  state: CursorState
  offset_at: number
  created_at: number
  owner: string | null
}

export interface CursorManagerOptions {
  clock?: Clock
  hooks?: HookRegistry
  metrics?: MetricsCollector
}

export interface ListCursorsOptions {
  tableId?: string
  /** Include cursors owned by materializations. Default: false. */
  includeInternal?: boolean
}

function toInfo(row: CursorRow): CursorInfo {
  const info: CursorInfo = {
    cursorId: row.cursor_id,
    tableId: row.table_id,
    mode: row.mode,
    position: row.position,
    state: row.state,
    offsetAt: row.offset_at,
    createdAt: row.created_at,
  }
  const filter = parseFilter(row.filter)
  if (filter) info.filter = filter
  if (row.owner !== null) info.owner = row.owner
  return info
}

/**
 * Named consumption checkpoints over the change log. Reads never move a
 * cursor; only {@link advance} (and {@link consume}, which ends in one) does,
 * and only forwards.
 */
export class CursorManager {
  private readonly clock: Clock
  private readonly hooks: HookRegistry | null
  private readonly metrics: MetricsCollector | null

  constructor(
    private readonly connections: ConnectionSource,
    private readonly changeLog: ChangeLogStore,
    options?: CursorManagerOptions,
  ) {
    this.clock = options?.clock ?? systemClock
    this.hooks = options?.hooks ?? null
    this.metrics = options?.metrics ?? null
  }

  /**
   * Creates a cursor positioned at the table's current head, or at the point
   * in history given by `options.at`.
   *
   * @throws {UntrackedTableError} if change tracking is not enabled.
   * @throws {CursorAlreadyExistsError} if the id is taken.
   * @throws {RangeCompactedError} if `at` points into compacted history.
   */
  create(cursorId: string, tableId: string, options?: CreateCursorOptions): CursorInfo {
    if (cursorId.length === 0) {
      throw new InvalidPositionError('Cursor id must not be empty')
    }
    const db = this.connections.acquireWriter()
    if (this.find(cursorId)) {
      throw new CursorAlreadyExistsError(cursorId)
    }

    const table = this.changeLog.tableInfo(tableId)
    const position = options?.at ? this.resolvePoint(tableId, options.at) : table.head
    const now = this.clock.now()
    const offsetAt = this.offsetTimeOf(tableId, position, table.head, table.createdAt, now, options?.at)

    execute(
      db,
      `INSERT INTO _tidemark_cursors
       (cursor_id, table_id, mode, position, filter, state, offset_at, created_at, owner)
       VALUES (?, ?, ?, ?, ?, 'ACTIVE', ?, ?, ?)`,
      cursorId,
      tableId,
      options?.mode ?? 'DEFAULT',
      position,
      serializeFilter(options?.filter),
      offsetAt,
      now,
      options?.owner ?? null,
    )

    log.info({ cursorId, tableId, position, mode: options?.mode ?? 'DEFAULT' }, 'cursor created')
    return this.get(cursorId)
  }

  get(cursorId: string): CursorInfo {
    const row = this.find(cursorId)
    if (!row) {
      throw new CursorNotFoundError(cursorId)
    }
    return toInfo(row)
  }

  has(cursorId: string): boolean {
    return this.find(cursorId) !== undefined
  }

  /** Tabular view of cursors, ordered by id (SHOW STREAMS). */
  list(options?: ListCursorsOptions): CursorInfo[] {
    const conditions: string[] = []
    const params: unknown[] = []
    if (options?.tableId !== undefined) {
      conditions.push('table_id = ?')
      params.push(options.tableId)
    }
    if (!options?.includeInternal) {
      conditions.push('owner IS NULL')
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
    return queryAll<CursorRow>(
      this.connections.acquireWriter(),
      `SELECT * FROM _tidemark_cursors ${where} ORDER BY cursor_id`,
      ...params,
    ).map(toInfo)
  }

  drop(cursorId: string): void {
    const removed = execute(this.connections.acquireWriter(), 'DELETE FROM _tidemark_cursors WHERE cursor_id = ?', cursorId)
    if (removed === 0) {
      throw new CursorNotFoundError(cursorId)
    }
    log.info({ cursorId }, 'cursor dropped')
  }

  /** Drops every cursor owned by a materialization. Returns how many went. */
  dropOwnedBy(owner: string): number {
    return execute(this.connections.acquireWriter(), 'DELETE FROM _tidemark_cursors WHERE owner = ?', owner)
  }

  /**
   * Lazily reads the changes after the cursor's position without moving it.
   * Calling this twice with no advance in between yields the same records.
   *
   * @throws {CursorExpiredError} if the cursor is stale.
   */
  peek(cursorId: string, options?: PeekOptions): IterableIterator<ChangeRecord> {
    const cursor = this.requireActive(cursorId)
    return this.changeLog.readRange(cursor.table_id, cursor.position, options?.end, {
      mode: cursor.mode,
      filter: parseFilter(cursor.filter),
      until: options?.until,
    })
  }

  /** True when at least one change is waiting for this cursor. */
  hasData(cursorId: string): boolean {
    return this.peek(cursorId).next().done !== true
  }

  /**
   * Moves the cursor to `options.to`, or to the table's head at call time.
   * Records appended after that head stay unconsumed. Returns the new
   * position.
   *
   * @throws {CursorExpiredError} if the cursor is stale.
   * @throws {InvalidPositionError} if the target is behind the cursor or past
   *   the head.
   */
  advance(cursorId: string, options?: { to?: number }, ctx?: AuditContext): number {
    const db = this.connections.acquireWriter()
    const cursor = this.requireActive(cursorId)
    const head = this.changeLog.headPosition(cursor.table_id)
    const to = options?.to ?? head

    if (to < cursor.position) {
      throw new InvalidPositionError(
        `Cannot move cursor '${cursorId}' back from ${cursor.position} to ${to}`,
      )
    }
    if (to > head) {
      throw new InvalidPositionError(`Cannot move cursor '${cursorId}' to ${to}, past head ${head}`)
    }

    const hookCtx = { cursorId, tableId: cursor.table_id, from: cursor.position, to, actor: ctx?.actor }
    this.hooks?.gate('beforeAdvance', hookCtx)

    const offsetAt = this.offsetTimeOf(cursor.table_id, to, head, 0, this.clock.now())
    const updated = execute(
      db,
      'UPDATE _tidemark_cursors SET position = ?, offset_at = ? WHERE cursor_id = ? AND position <= ?',
      to,
      offsetAt,
      cursorId,
      to,
    )
    if (updated === 0) {
      throw new InvalidPositionError(`Cursor '${cursorId}' moved past ${to} concurrently`)
    }

    log.debug({ cursorId, from: cursor.position, to }, 'cursor advanced')
    this.hooks?.notify('afterAdvance', hookCtx)
    this.metrics?.trackAdvance({ cursorId, tableId: cursor.table_id, consumed: to - cursor.position })
    return to
  }

  /**
   * Reads everything up to a head snapshot, hands it to `handler`, and
   * advances to exactly that snapshot once the handler returns. If the
   * handler throws, the cursor does not move.
   */
  consume<T>(cursorId: string, handler: (records: ChangeRecord[]) => T, ctx?: AuditContext): T {
    const cursor = this.requireActive(cursorId)
    const head = this.changeLog.headPosition(cursor.table_id)
    const records = [...this.peek(cursorId, { end: head })]
    const result = handler(records)
    this.advance(cursorId, { to: head }, ctx)
    return result
  }

  /**
   * CHANGES-style query: reads a table's changes from a point in history
   * without touching any cursor. Without `at`, all retained history is read.
   */
  changes(tableId: string, options?: ChangesOptions): IterableIterator<ChangeRecord> {
    const at = options?.at
    const from =
      at === undefined
        ? this.changeLog.compactedThrough(tableId)
        : 'cursor' in at
          ? this.positionFromCursor(at.cursor, tableId)
          : this.resolvePoint(tableId, at)

    return this.changeLog.readRange(tableId, from, options?.end, {
      mode: options?.mode,
      filter: options?.filter,
      until: options?.until,
    })
  }

  /**
   * Reads changes using another cursor's position as the lower bound. Neither
   * cursor moves. For a different table, the source cursor's offset time is
   * translated into a position on that table. Mode and filter default to the
   * source cursor's own.
   */
  peekFrom(
    sourceCursorId: string,
    targetTableId?: string,
    options?: PeekOptions & ReadOptions,
  ): IterableIterator<ChangeRecord> {
    const source = this.requireActive(sourceCursorId)
    const tableId = targetTableId ?? source.table_id
    return this.changes(tableId, {
      at: { cursor: sourceCursorId },
      end: options?.end,
      until: options?.until,
      mode: options?.mode ?? source.mode,
      filter: options?.filter ?? parseFilter(source.filter),
    })
  }

  /**
   * Re-creates a cursor at the current head and clears its stale flag.
   * Unconsumed history is given up.
   */
  rebaseline(cursorId: string): CursorInfo {
    const cursor = this.find(cursorId)
    if (!cursor) {
      throw new CursorNotFoundError(cursorId)
    }
    const head = this.changeLog.headPosition(cursor.table_id)
    execute(
      this.connections.acquireWriter(),
      "UPDATE _tidemark_cursors SET position = ?, state = 'ACTIVE', offset_at = ? WHERE cursor_id = ?",
      head,
      this.clock.now(),
      cursorId,
    )
    log.warn({ cursorId, from: cursor.position, to: head }, 'cursor rebaselined')
    return this.get(cursorId)
  }

  markStale(cursorIds: string[]): void {
    const db = this.connections.acquireWriter()
    for (const cursorId of cursorIds) {
      execute(db, "UPDATE _tidemark_cursors SET state = 'STALE' WHERE cursor_id = ?", cursorId)
    }
    if (cursorIds.length > 0) {
      log.warn({ cursorIds }, 'cursors marked stale')
    }
  }

  activeCursors(tableId: string): CursorInfo[] {
    return queryAll<CursorRow>(
      this.connections.acquireWriter(),
      "SELECT * FROM _tidemark_cursors WHERE table_id = ? AND state = 'ACTIVE' ORDER BY cursor_id",
      tableId,
    ).map(toInfo)
  }

  /** Lowest position across the table's active cursors, if it has any. */
  minActivePosition(tableId: string): number | undefined {
    const row = queryOne<{ position: number | null }>(
      this.connections.acquireWriter(),
      "SELECT MIN(position) AS position FROM _tidemark_cursors WHERE table_id = ? AND state = 'ACTIVE'",
      tableId,
    )
    return row?.position ?? undefined
  }

  private find(cursorId: string): CursorRow | undefined {
    return queryOne<CursorRow>(
      this.connections.acquireWriter(),
      'SELECT * FROM _tidemark_cursors WHERE cursor_id = ?',
      cursorId,
    )
  }

  private requireActive(cursorId: string): CursorRow {
    const row = this.find(cursorId)
    if (!row) {
      throw new CursorNotFoundError(cursorId)
    }
    if (row.state === 'STALE') {
      throw new CursorExpiredError(cursorId)
    }
    return row
  }

  private resolvePoint(tableId: string, point: HistoryPoint): number {
    if ('timestamp' in point) {
      return this.changeLog.positionAt(tableId, point.timestamp)
    }

    const { position } = point
    const table = this.changeLog.tableInfo(tableId)
    if (!Number.isInteger(position) || position < 0 || position > table.head) {
      throw new InvalidPositionError(`Position ${position} is outside 0..${table.head} for table '${tableId}'`)
    }
    if (position < table.compactedThrough) {
      throw new RangeCompactedError(tableId, position, table.compactedThrough)
    }
    return position
  }

  private positionFromCursor(cursorId: string, tableId: string): number {
    const cursor = this.requireActive(cursorId)
    if (cursor.table_id === tableId) {
      return cursor.position
    }
    return this.changeLog.positionAt(tableId, cursor.offset_at)
  }

  /**
   * The moment in history a position stands for: now for the head, the given
   * timestamp when the cursor was created at one, otherwise the commit time
   * of the record at that position.
   */
  private offsetTimeOf(
    tableId: string,
    position: number,
    head: number,
    createdAt: number,
    now: number,
    at?: HistoryPoint,
  ): number {
    if (at && 'timestamp' in at) return at.timestamp
    if (position === head) return now
    return this.changeLog.committedAtOf(tableId, position) ?? createdAt
  }
}
