import type { ChangeLogStore } from '../changelog/store.js'
import { DEFAULT_RETENTION_MS, EDITION_MAX_RETENTION_MS, systemClock } from '../config.js'
import type { ConnectionSource } from '../connection-pool.js'
import type { CursorManager } from '../cursors/manager.js'
import { InvalidRetentionError, UntrackedTableError } from '../errors.js'
import type { HookRegistry } from '../hooks/registry.js'
import { createModuleLogger } from '../logger.js'
import type { MetricsCollector } from '../metrics/collector.js'
import { execute, queryOne } from '../query-executor.js'
import type { Clock, CompactionResult, RetentionWindow } from '../types.js'

const log = createModuleLogger('retention')

interface RetentionRow {
  table_id: string
  window_ms: number
  effective_at: number
}

export interface RetentionManagerOptions {
  clock?: Clock
  /** Ceiling for {@link RetentionManager.setRetention}. Default: the standard edition's. */
  maxRetentionMs?: number
  defaultRetentionMs?: number
  /** Extra time a lagging cursor keeps its history before it goes stale. */
  dataExtensionMs?: number
  hooks?: HookRegistry
  metrics?: MetricsCollector
}

/**
 * Bounds change log growth. A record is purged only when it is older than the
 * table's retention window and every active cursor has consumed it. Cursors
 * that stay behind for longer than the window (plus the data extension) are
 * marked stale and stop protecting history.
 */
export class RetentionManager {
  private readonly clock: Clock
  private readonly maxRetentionMs: number
  private readonly defaultRetentionMs: number
  private readonly dataExtensionMs: number
  private readonly hooks: HookRegistry | null
  private readonly metrics: MetricsCollector | null

  constructor(
    private readonly connections: ConnectionSource,
    private readonly changeLog: ChangeLogStore,
    private readonly cursors: CursorManager,
    options?: RetentionManagerOptions,
  ) {
    this.clock = options?.clock ?? systemClock
    this.maxRetentionMs = options?.maxRetentionMs ?? EDITION_MAX_RETENTION_MS.standard
    this.defaultRetentionMs = options?.defaultRetentionMs ?? DEFAULT_RETENTION_MS
    this.dataExtensionMs = options?.dataExtensionMs ?? 0
    this.hooks = options?.hooks ?? null
    this.metrics = options?.metrics ?? null
  }

  /**
   * Sets the retention window of a tracked table. Values beyond the ceiling
   * are rejected, never clamped.
   *
   * @throws {InvalidRetentionError} if the window is negative, fractional or
   *   above the ceiling.
   * @throws {UntrackedTableError} if change tracking is not enabled.
   */
  setRetention(tableId: string, windowMs: number): RetentionWindow {
    if (!Number.isInteger(windowMs) || windowMs < 0 || windowMs > this.maxRetentionMs) {
      throw new InvalidRetentionError(windowMs, this.maxRetentionMs)
    }
    if (!this.changeLog.isTracked(tableId)) {
      throw new UntrackedTableError(tableId)
    }

    const effectiveAt = this.clock.now()
    execute(
      this.connections.acquireWriter(),
      `INSERT INTO _tidemark_retention (table_id, window_ms, effective_at) VALUES (?, ?, ?)
       ON CONFLICT (table_id) DO UPDATE SET window_ms = excluded.window_ms, effective_at = excluded.effective_at`,
      tableId,
      windowMs,
      effectiveAt,
    )
    log.info({ tableId, windowMs }, 'retention window set')
    return { tableId, windowMs, effectiveAt, isDefault: false }
  }

  getRetention(tableId: string): RetentionWindow {
    const row = queryOne<RetentionRow>(
      this.connections.acquireWriter(),
      'SELECT * FROM _tidemark_retention WHERE table_id = ?',
      tableId,
    )
    if (!row) {
      return { tableId, windowMs: this.defaultRetentionMs, effectiveAt: 0, isDefault: true }
    }
    return { tableId, windowMs: row.window_ms, effectiveAt: row.effective_at, isDefault: false }
  }

  /** Falls back to the default window. */
  clearRetention(tableId: string): void {
    execute(this.connections.acquireWriter(), 'DELETE FROM _tidemark_retention WHERE table_id = ?', tableId)
  }

  /**
   * Purges the records of one table that are both outside its retention
   * window and behind every active cursor. Lagging cursors whose unconsumed
   * records have expired are marked stale first.
   *
   * @throws {UntrackedTableError} if change tracking is not enabled.
   */
  compact(tableId: string): CompactionResult {
    const head = this.changeLog.headPosition(tableId)
    const { windowMs } = this.getRetention(tableId)
    const now = this.clock.now()
    const cutoff = now - windowMs

    const staleCursors = this.cursors
      .activeCursors(tableId)
      .filter(
        cursor =>
          now - cursor.offsetAt > windowMs + this.dataExtensionMs &&
          this.changeLog.hasCommittedBefore(tableId, cursor.position, cutoff),
      )
      .map(cursor => cursor.cursorId)
    this.cursors.markStale(staleCursors)

    // Records at or after the lowest active cursor position stay.
    const floor = this.cursors.minActivePosition(tableId) ?? head + 1
    const { removed, compactedThrough } = this.changeLog.purge(tableId, floor, cutoff)

    const result: CompactionResult = { tableId, removed, compactedThrough, staleCursors }
    if (removed > 0 || staleCursors.length > 0) {
      log.info({ tableId, removed, compactedThrough, staleCursors: staleCursors.length }, 'table compacted')
    }
    this.hooks?.notify('afterCompact', result)
    this.metrics?.trackCompaction({ tableId, removed, staleCursors: staleCursors.length })
    return result
  }

  /** Compacts every tracked table in id order. */
  compactAll(): CompactionResult[] {
    return this.changeLog.trackedTables().map(tableId => this.compact(tableId))
  }
}
