import { ChangeLogStore } from './changelog/store.js'
import { resolveOptions } from './config.js'
import { ConnectionPool } from './connection-pool.js'
import { CursorManager, type ListCursorsOptions } from './cursors/manager.js'
import { TidemarkError } from './errors.js'
import { HookRegistry } from './hooks/registry.js'
import type { HookDispose } from './hooks/types.js'
import { createModuleLogger, logError } from './logger.js'
import { type MaterializationDefinition, Materializer, type RefreshCallOptions } from './materialize/materializer.js'
import { planSources } from './materialize/plan.js'
import { MetricsCollector } from './metrics/collector.js'
import { MigrationRunner } from './migrations/runner.js'
import { RetentionManager } from './retention/manager.js'
import { type CompactionScheduleOptions, RetentionScheduler } from './retention/scheduler.js'
import { DependencyGraph } from './scheduler/graph.js'
import { RefreshScheduler, type TickScheduleOptions } from './scheduler/scheduler.js'
import { type CreateTableOptions, TableStore } from './tables/table-store.js'
import type {
  AfterAdvanceHook,
  AfterAppendHook,
  AfterCompactHook,
  AfterRefreshHook,
  AuditContext,
  BeforeAdvanceHook,
  BeforeAppendHook,
  ChangeRecord,
  ChangesOptions,
  CompactionResult,
  CreateCursorOptions,
  CursorInfo,
  MaterializationInfo,
  RefreshResult,
  RetentionWindow,
  Row,
  TickReport,
  TidemarkOptions,
} from './types.js'

const log = createModuleLogger('engine')

export interface OpenOptions extends TidemarkOptions {
  /** Directory of schema migrations. Defaults to the bundled ones. */
  migrationsPath?: string
}

/**
 * An embedded change-tracking engine over one SQLite database: tracked
 * tables, streams (cursors) over their change logs, retention, and
 * materializations kept fresh by a dependency-ordered scheduler.
 */
export class Tidemark {
  readonly changeLog: ChangeLogStore
  readonly tables: TableStore
  readonly cursors: CursorManager
  readonly retention: RetentionManager
  readonly materializer: Materializer
  readonly graph: DependencyGraph
  readonly scheduler: RefreshScheduler

  private readonly pool: ConnectionPool
  private readonly hooks: HookRegistry
  private readonly retentionScheduler: RetentionScheduler
  private readonly cancelJobs = new Set<() => void>()
  private closed = false

  constructor(
    readonly path: string = ':memory:',
    options?: OpenOptions,
  ) {
    const resolved = resolveOptions(options)
    this.pool = new ConnectionPool({ path, readPoolSize: resolved.readPoolSize, walMode: resolved.walMode })

    try {
      MigrationRunner.run(this.pool.acquireWriter(), options?.migrationsPath)
    } catch (err) {
      this.pool.close()
      throw err
    }

    this.hooks = new HookRegistry(resolved.hooks)
    const metrics = resolved.metrics ? new MetricsCollector(resolved.metrics) : undefined
    const { clock } = resolved

    this.changeLog = new ChangeLogStore(this.pool, { clock, pageSize: resolved.pageSize, hooks: this.hooks, metrics })
    this.tables = new TableStore(this.pool, this.changeLog)
    this.cursors = new CursorManager(this.pool, this.changeLog, { clock, hooks: this.hooks, metrics })
    this.retention = new RetentionManager(this.pool, this.changeLog, this.cursors, {
      clock,
      maxRetentionMs: resolved.maxRetentionMs,
      defaultRetentionMs: resolved.defaultRetentionMs,
      dataExtensionMs: resolved.dataExtensionMs,
      hooks: this.hooks,
      metrics,
    })
    this.materializer = new Materializer(this.pool, this.changeLog, this.tables, this.cursors, {
      clock,
      hooks: this.hooks,
      metrics,
      timeoutMs: resolved.refresh.timeoutMs,
      maxRetries: resolved.refresh.maxRetries,
      retryDelayMs: resolved.refresh.retryDelayMs,
    })
    this.graph = new DependencyGraph()
    this.scheduler = new RefreshScheduler(this.graph, this.materializer, {
      clock,
      maxConcurrency: resolved.refresh.maxConcurrency,
    })
    this.retentionScheduler = new RetentionScheduler(this.retention)

    log.info({ path, edition: resolved.edition }, 'tidemark opened')
  }

  createTable(tableId: string, options?: CreateTableOptions): void {
    this.ensureOpen()
    this.tables.createTable(tableId, options)
  }

  /** Switches change tracking on for an existing table. */
  enableChangeTracking(tableId: string): void {
    this.ensureOpen()
    this.changeLog.enableTracking(tableId)
  }

  insert(tableId: string, rowIdentity: string, row: Row, ctx?: AuditContext): number | null {
    this.ensureOpen()
    return this.tables.insert(tableId, rowIdentity, row, ctx)
  }

  update(tableId: string, rowIdentity: string, row: Row, ctx?: AuditContext): [number, number] | null {
    this.ensureOpen()
    return this.tables.update(tableId, rowIdentity, row, ctx)
  }

  delete(tableId: string, rowIdentity: string, ctx?: AuditContext): number | null {
    this.ensureOpen()
    return this.tables.delete(tableId, rowIdentity, ctx)
  }

  setRetention(tableId: string, windowMs: number): RetentionWindow {
    this.ensureOpen()
    return this.retention.setRetention(tableId, windowMs)
  }

  compact(tableId?: string): CompactionResult[] {
    this.ensureOpen()
    return tableId === undefined ? this.retention.compactAll() : [this.retention.compact(tableId)]
  }

  createStream(cursorId: string, tableId: string, options?: CreateCursorOptions): CursorInfo {
    this.ensureOpen()
    return this.cursors.create(cursorId, tableId, options)
  }

  dropStream(cursorId: string): void {
    this.ensureOpen()
    this.cursors.drop(cursorId)
  }

  /** CHANGES-clause read of a table's history; no cursor moves. */
  changes(tableId: string, options?: ChangesOptions): ChangeRecord[] {
    this.ensureOpen()
    return [...this.cursors.changes(tableId, options)]
  }

  /**
   * Registers a materialization in the dependency graph, then creates it.
   * When creation fails the graph entry is removed again.
   *
   * @throws {CycleDetectedError} if the materialization would read itself.
   */
  async createMaterialization(definition: MaterializationDefinition): Promise<MaterializationInfo> {
    this.ensureOpen()
    const { targetId } = definition
    this.graph.addSpec(targetId, planSources(definition.plan))
    try {
      return await this.materializer.create(definition)
    } catch (err) {
      this.graph.removeSpec(targetId)
      throw err
    }
  }

  /**
   * Drops a materialization. Materializations that read it are suspended,
   * since their source no longer exists. Returns their ids.
   */
  dropMaterialization(targetId: string): string[] {
    this.ensureOpen()
    const dependents = this.graph.removeSpec(targetId)
    for (const dependent of dependents) {
      this.materializer.suspend(dependent)
    }
    this.materializer.drop(targetId)
    if (dependents.length > 0) {
      log.warn({ targetId, dependents }, 'dependents suspended after drop')
    }
    return dependents
  }

  refresh(targetId: string, options?: RefreshCallOptions): Promise<RefreshResult> {
    this.ensureOpen()
    return this.materializer.refresh(targetId, options)
  }

  tick(): Promise<TickReport> {
    this.ensureOpen()
    return this.scheduler.tick()
  }

  read(targetId: string): Row[] {
    this.ensureOpen()
    return this.materializer.read(targetId)
  }

  showStreams(options?: ListCursorsOptions): CursorInfo[] {
    this.ensureOpen()
    return this.cursors.list(options)
  }

  showMaterializations(): MaterializationInfo[] {
    this.ensureOpen()
    return this.materializer.list()
  }

  /** Starts a recurring compaction sweep. Returns a function that stops it. */
  scheduleCompaction(options: CompactionScheduleOptions): () => void {
    this.ensureOpen()
    const cancel = this.retentionScheduler.schedule(options)
    this.cancelJobs.add(cancel)
    return () => {
      cancel()
      this.cancelJobs.delete(cancel)
    }
  }

  /** Starts recurring scheduler ticks. Returns a function that stops them. */
  startScheduler(options: TickScheduleOptions): () => void {
    this.ensureOpen()
    this.scheduler.start(options)
    return () => this.scheduler.stop()
  }

  onBeforeAppend(hook: BeforeAppendHook): HookDispose {
    return this.hooks.register('beforeAppend', hook)
  }

  onAppend(hook: AfterAppendHook): HookDispose {
    return this.hooks.register('afterAppend', hook)
  }

  onBeforeAdvance(hook: BeforeAdvanceHook): HookDispose {
    return this.hooks.register('beforeAdvance', hook)
  }

  onAdvance(hook: AfterAdvanceHook): HookDispose {
    return this.hooks.register('afterAdvance', hook)
  }

  onRefresh(hook: AfterRefreshHook): HookDispose {
    return this.hooks.register('afterRefresh', hook)
  }

  onCompact(hook: AfterCompactHook): HookDispose {
    return this.hooks.register('afterCompact', hook)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Stops scheduled work, cancels running refreshes and closes the database. */
  close(): void {
    if (this.closed) return
    this.closed = true

    this.scheduler.stop()
    for (const cancel of this.cancelJobs) {
      cancel()
    }
    this.cancelJobs.clear()
    for (const { targetId } of this.materializer.list()) {
      this.materializer.cancel(targetId)
    }

    try {
      this.pool.close()
    } catch (err) {
      logError(log, 'failed to close connection pool', err)
      throw err
    }
    log.info({ path: this.path }, 'tidemark closed')
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TidemarkError('Tidemark instance has been closed', 'CLOSED')
    }
  }
}
