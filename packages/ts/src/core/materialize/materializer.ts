import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import type { ChangeLogStore } from '../changelog/store.js'
import { systemClock } from '../config.js'
import type { ConnectionSource } from '../connection-pool.js'
import type { CursorManager } from '../cursors/manager.js'
import {
  CursorExpiredError,
  CycleDetectedError,
  InvalidOptionsError,
  MaterializationExistsError,
  MaterializationNotFoundError,
  MaterializationSuspendedError,
  NotInitializedError,
  RangeCompactedError,
  RefreshCancelledError,
  RefreshTimeoutError,
  toTidemarkError,
  UnsupportedIncrementalPlanError,
  UntrackedTableError,
} from '../errors.js'
import type { HookRegistry } from '../hooks/registry.js'
import { createModuleLogger } from '../logger.js'
import type { MetricsCollector } from '../metrics/collector.js'
import { inTransaction } from '../query-executor.js'
import { withRetry } from '../retry.js'
import type { TableStore } from '../tables/table-store.js'
import type {
  ChangeRecord,
  Clock,
  InitializeMode,
  MaterializationInfo,
  MaterializationStatus,
  RefreshMode,
  RefreshResult,
  RefreshStrategyKind,
  Row,
  SchedulingState,
  TargetLag,
} from '../types.js'
import { evaluate } from './evaluate.js'
import { IncrementalCircuit } from './incremental.js'
import { classifyPlan, type PlanClass, type PlanNode, planSources } from './plan.js'
import { rowKey, ZSet } from './zset.js'

const log = createModuleLogger('materializer')

export interface MaterializationDefinition {
  targetId: string
  plan: PlanNode
  targetLag: TargetLag
  /** Default: AUTO. */
  refreshMode?: RefreshMode
  /** Default: ON_CREATE. */
  initialize?: InitializeMode
}

export interface MaterializerOptions {
  clock?: Clock
  hooks?: HookRegistry
  metrics?: MetricsCollector
  /** Budget per refresh, measured on the clock. 0 = unlimited. */
  timeoutMs?: number
  maxRetries?: number
  retryDelayMs?: number
}

export interface RefreshCallOptions {
  signal?: AbortSignal
  /**
   * `refresh-stale` (default) first refreshes upstream materializations that
   * have pending changes. `skip` leaves ordering to the caller.
   */
  upstream?: 'refresh-stale' | 'skip'
}

export interface StalenessOptions {
  /** A dependent is about to refresh and needs this result current. */
  requiredBy?: boolean
}

interface MaterializationSpec {
  definition: MaterializationDefinition
  refreshMode: RefreshMode
  initialize: InitializeMode
  sources: string[]
  planClass: PlanClass
  state: SchedulingState
  status: MaterializationStatus
  lastRefreshedAt?: number
  lastStrategy?: RefreshStrategyKind
  lastError?: string
  /** Incremental state, in step with the stored result. Null until a full refresh rebuilds it. */
  circuit: IncrementalCircuit | null
  inFlight: Promise<RefreshResult> | null
  abort: AbortController | null
}

interface ComputedRefresh {
  strategy: RefreshStrategyKind
  delta: ZSet
  circuit: IncrementalCircuit | null
  heads: Map<string, number>
}

/** Id of the cursor a materialization reads one of its sources through. */
export function ownedCursorId(targetId: string, sourceId: string): string {
  return `${targetId}::${sourceId}`
}

function toDelta(records: Iterable<ChangeRecord>): ZSet {
  const delta = new ZSet()
  for (const record of records) {
    delta.add(record.row, record.operation === 'INSERT' ? 1 : -1)
  }
  return delta
}

/**
 * Keeps materialization results in line with their defining plans. Results
 * are tracked tables, so downstream materializations and cursors read them
 * through the change log like any base table.
 *
 * A refresh computes its whole output before writing anything, then commits
 * the result rows, their change records and the advance of every owned
 * cursor in one transaction. Readers see the old result or the new one,
 * never a mix.
 */
export class Materializer {
  private readonly specs = new Map<string, MaterializationSpec>()
  private readonly clock: Clock
  private readonly hooks: HookRegistry | null
  private readonly metrics: MetricsCollector | null
  private readonly timeoutMs: number
  private readonly maxRetries: number
  private readonly retryDelayMs: number

  constructor(
    private readonly connections: ConnectionSource,
    private readonly changeLog: ChangeLogStore,
    private readonly tables: TableStore,
    private readonly cursors: CursorManager,
    options?: MaterializerOptions,
  ) {
    this.clock = options?.clock ?? systemClock
    this.hooks = options?.hooks ?? null
    this.metrics = options?.metrics ?? null
    this.timeoutMs = options?.timeoutMs ?? 0
    this.maxRetries = options?.maxRetries ?? 2
    this.retryDelayMs = options?.retryDelayMs ?? 100
  }

  /**
   * Registers a materialization, creates its result table and one owned
   * cursor per source. With `initialize: 'ON_CREATE'` the first refresh runs
   * before this resolves; if it fails, the materialization is removed again.
   *
   * @throws {UnsupportedIncrementalPlanError} if INCREMENTAL is forced on a
   *   plan that is not delta-composable.
   * @throws {UntrackedTableError} if a source does not have change tracking.
   */
  async create(definition: MaterializationDefinition): Promise<MaterializationInfo> {
    const { targetId, plan, targetLag } = definition
    const refreshMode = definition.refreshMode ?? 'AUTO'
    const initialize = definition.initialize ?? 'ON_CREATE'

    if (this.specs.has(targetId)) {
      throw new MaterializationExistsError(targetId)
    }
    if (targetLag !== 'DOWNSTREAM' && (!Number.isInteger(targetLag) || targetLag < 0)) {
      throw new InvalidOptionsError(`Target lag must be 'DOWNSTREAM' or an integer >= 0, got ${targetLag}`)
    }

    const planClass = classifyPlan(plan)
    if (refreshMode === 'INCREMENTAL' && planClass.kind === 'full') {
      throw new UnsupportedIncrementalPlanError(targetId, planClass.reasons)
    }

    const sources = planSources(plan)
    if (sources.includes(targetId)) {
      throw new CycleDetectedError([targetId, targetId])
    }
    for (const source of sources) {
      if (!this.changeLog.isTracked(source)) {
        throw new UntrackedTableError(source)
      }
    }

    this.tables.createTable(targetId, { changeTracking: true })
    for (const source of sources) {
      const cursorId = ownedCursorId(targetId, source)
      if (this.cursors.has(cursorId)) {
        this.cursors.drop(cursorId)
      }
      this.cursors.create(cursorId, source, { owner: targetId })
    }

    this.specs.set(targetId, {
      definition,
      refreshMode,
      initialize,
      sources,
      planClass,
      state: 'ACTIVE',
      status: 'UNINITIALIZED',
      circuit: null,
      inFlight: null,
      abort: null,
    })
    log.info({ targetId, sources, targetLag, refreshMode, initialize }, 'materialization created')

    if (initialize === 'ON_CREATE') {
      try {
        await this.refresh(targetId)
      } catch (err) {
        this.drop(targetId)
        throw err
      }
    }
    return this.get(targetId)
  }

  has(targetId: string): boolean {
    return this.specs.has(targetId)
  }

  get(targetId: string): MaterializationInfo {
    return this.toInfo(this.require(targetId))
  }

  /** SHOW DYNAMIC TABLES view, ordered by target id. */
  list(): MaterializationInfo[] {
    return [...this.specs.keys()].sort().map(targetId => this.get(targetId))
  }

  sourcesOf(targetId: string): string[] {
    return [...this.require(targetId).sources]
  }

  /**
   * Current result rows.
   *
   * @throws {NotInitializedError} if no refresh has completed yet.
   */
  read(targetId: string): Row[] {
    const spec = this.require(targetId)
    if (spec.lastRefreshedAt === undefined) {
      throw new NotInitializedError(targetId)
    }
    return this.tables.rows(targetId)
  }

  /**
   * Whether the materialization should refresh now. A STALE status always
   * counts. Otherwise a source must have changes the result has not seen,
   * and either the target lag has elapsed since the last refresh or, for
   * DOWNSTREAM lag, a dependent requires this result.
   */
  evaluateStaleness(targetId: string, options?: StalenessOptions): boolean {
    const spec = this.require(targetId)
    if (spec.state === 'SUSPENDED' || spec.status === 'UNINITIALIZED') return false
    if (spec.status === 'STALE') return true
    if (!this.hasPendingChanges(spec)) return false

    if (spec.definition.targetLag === 'DOWNSTREAM') {
      return options?.requiredBy === true
    }
    return this.lagElapsed(targetId)
  }

  /** True when a numeric target lag has passed since the last refresh. */
  lagElapsed(targetId: string): boolean {
    const spec = this.require(targetId)
    const { targetLag } = spec.definition
    if (targetLag === 'DOWNSTREAM' || spec.lastRefreshedAt === undefined) return false
    return this.clock.now() - spec.lastRefreshedAt >= targetLag
  }

  /** True for an active ON_SCHEDULE materialization still waiting for its first refresh. */
  isPendingInitialization(targetId: string): boolean {
    const spec = this.require(targetId)
    return (
      spec.state === 'ACTIVE' && spec.status === 'UNINITIALIZED' && spec.initialize === 'ON_SCHEDULE' && !spec.inFlight
    )
  }

  /** The refresh currently running for the target, if any. */
  inFlight(targetId: string): Promise<RefreshResult> | undefined {
    return this.require(targetId).inFlight ?? undefined
  }

  /**
   * Brings the result up to date. Only one refresh per target runs at a
   * time; calling this while one is running returns the running one.
   *
   * @throws {MaterializationSuspendedError} if the materialization is suspended.
   * @throws {RefreshCancelledError} if cancelled; the previous status is kept.
   * @throws {RefreshTimeoutError} if the budget ran out; the status becomes STALE.
   */
  refresh(targetId: string, options?: RefreshCallOptions): Promise<RefreshResult> {
    const spec = this.require(targetId)
    if (spec.inFlight) {
      return spec.inFlight
    }
    if (spec.state === 'SUSPENDED') {
      return Promise.reject(new MaterializationSuspendedError(targetId))
    }

    const controller = new AbortController()
    const external = options?.signal
    const onAbort = () => controller.abort()
    if (external?.aborted) {
      controller.abort()
    } else {
      external?.addEventListener('abort', onAbort, { once: true })
    }

    const run = this.runRefresh(spec, controller.signal, options).finally(() => {
      external?.removeEventListener('abort', onAbort)
      spec.inFlight = null
      spec.abort = null
    })
    spec.inFlight = run
    spec.abort = controller
    return run
  }

  /** Aborts the running refresh, if any. Returns whether one was running. */
  cancel(targetId: string): boolean {
    const spec = this.require(targetId)
    if (!spec.abort) return false
    spec.abort.abort()
    log.info({ targetId }, 'refresh cancel requested')
    return true
  }

  /** Stops scheduling; a refresh already running finishes. */
  suspend(targetId: string): void {
    const spec = this.require(targetId)
    if (spec.state === 'SUSPENDED') return
    spec.state = 'SUSPENDED'
    log.info({ targetId }, 'materialization suspended')
  }

  /**
   * Returns to the status held before suspension. Changes made in the
   * meantime are picked up by the next staleness check as one delta.
   */
  resume(targetId: string): void {
    const spec = this.require(targetId)
    if (spec.state === 'ACTIVE') return
    spec.state = 'ACTIVE'
    log.info({ targetId, status: spec.status }, 'materialization resumed')
  }

  /** Flags an initialized result as needing a refresh on the next tick. */
  markStale(targetId: string): void {
    const spec = this.require(targetId)
    if (spec.status === 'FRESH') {
      spec.status = 'STALE'
    }
  }

  /** Removes the materialization, its result table and its owned cursors. */
  drop(targetId: string): void {
    const spec = this.require(targetId)
    spec.abort?.abort()
    this.specs.delete(targetId)
    this.cursors.dropOwnedBy(targetId)
    if (this.tables.hasTable(targetId)) {
      this.tables.dropTable(targetId)
    }
    log.info({ targetId }, 'materialization dropped')
  }

  private require(targetId: string): MaterializationSpec {
    const spec = this.specs.get(targetId)
    if (!spec) {
      throw new MaterializationNotFoundError(targetId)
    }
    return spec
  }

  private toInfo(spec: MaterializationSpec): MaterializationInfo {
    const { definition } = spec
    const info: MaterializationInfo = {
      targetId: definition.targetId,
      sources: [...spec.sources],
      targetLag: definition.targetLag,
      refreshMode: spec.refreshMode,
      initialize: spec.initialize,
      state: spec.state,
      status: spec.state === 'SUSPENDED' ? 'SUSPENDED' : spec.status,
      rowCount: this.tables.count(definition.targetId),
    }
    if (spec.lastRefreshedAt !== undefined) info.lastRefreshedAt = spec.lastRefreshedAt
    if (spec.lastStrategy) info.lastStrategy = spec.lastStrategy
    if (spec.lastError) info.lastError = spec.lastError
    return info
  }

  private hasPendingChanges(spec: MaterializationSpec): boolean {
    return spec.sources.some(source => {
      try {
        return this.cursors.hasData(ownedCursorId(spec.definition.targetId, source))
      } catch (err) {
        // An expired owned cursor means history was lost: only a refresh recovers.
        if (err instanceof CursorExpiredError || err instanceof RangeCompactedError) return true
        throw err
      }
    })
  }

  private async refreshUpstream(spec: MaterializationSpec, signal: AbortSignal): Promise<void> {
    for (const source of spec.sources) {
      const upstream = this.specs.get(source)
      if (!upstream || upstream.state === 'SUSPENDED') continue

      if (upstream.inFlight) {
        await upstream.inFlight
      } else if (
        upstream.status === 'UNINITIALIZED' ||
        upstream.status === 'STALE' ||
        this.hasPendingChanges(upstream)
      ) {
        await this.refresh(source, { signal })
      }
    }
  }

  private async runRefresh(
    spec: MaterializationSpec,
    signal: AbortSignal,
    options?: RefreshCallOptions,
  ): Promise<RefreshResult> {
    const { targetId } = spec.definition
    const priorStatus = spec.status
    const startedAt = this.clock.now()

    const attempt = async (): Promise<RefreshResult> => {
      await yieldToEventLoop()
      return this.computeAndCommit(spec, signal, startedAt)
    }

    try {
      if (options?.upstream !== 'skip') {
        await this.refreshUpstream(spec, signal)
      }
      spec.status = priorStatus === 'UNINITIALIZED' ? 'INITIALIZING' : 'REFRESHING'

      const retrying = () =>
        withRetry(attempt, {
          maxRetries: this.maxRetries,
          baseDelayMs: this.retryDelayMs,
          signal,
          onRetry: ({ attempt: n, error, delayMs }) => {
            log.warn({ targetId, attempt: n, delayMs, err: error }, 'refresh failed, retrying')
          },
        })
      const result = this.metrics ? await this.metrics.trackRefresh(targetId, retrying) : await retrying()

      spec.status = 'FRESH'
      spec.lastRefreshedAt = result.refreshedAt
      spec.lastStrategy = result.strategy
      spec.lastError = undefined
      log.info(
        { targetId, strategy: result.strategy, inserted: result.inserted, deleted: result.deleted },
        'materialization refreshed',
      )
      this.hooks?.notify('afterRefresh', result)
      return result
    } catch (err) {
      if (signal.aborted) {
        spec.status = priorStatus
        log.info({ targetId }, 'refresh cancelled')
        throw new RefreshCancelledError(targetId)
      }

      const error = toTidemarkError(err)
      spec.status = priorStatus === 'UNINITIALIZED' ? 'UNINITIALIZED' : 'STALE'
      spec.lastError = error.message
      log.warn({ targetId, err: error }, 'refresh failed')
      throw error
    }
  }

  /**
   * One synchronous refresh attempt: choose a strategy, compute the output
   * delta and commit it. Nothing can interleave between reading the source
   * heads and the commit, so the result matches exactly the changes the
   * owned cursors advance past.
   */
  private computeAndCommit(spec: MaterializationSpec, signal: AbortSignal, startedAt: number): RefreshResult {
    const { targetId } = spec.definition
    const started = performance.now()
    const guard = () => {
      if (signal.aborted) {
        throw new RefreshCancelledError(targetId)
      }
      if (this.timeoutMs > 0 && this.clock.now() - startedAt > this.timeoutMs) {
        throw new RefreshTimeoutError(targetId, this.timeoutMs)
      }
    }

    guard()
    const computed = this.compute(spec, guard)
    guard()

    const db = this.connections.acquireWriter()
    const summary = inTransaction(db, () => {
      const applied = this.tables.applyDelta(
        targetId,
        [...computed.delta].map(([row, weight]) => ({ rowIdentity: rowKey(row), row, weight })),
      )
      for (const source of spec.sources) {
        const cursorId = ownedCursorId(targetId, source)
        if (this.cursors.get(cursorId).state === 'STALE') {
          this.cursors.rebaseline(cursorId)
        } else {
          this.cursors.advance(cursorId, { to: computed.heads.get(source) })
        }
      }
      return applied
    })

    spec.circuit = computed.circuit
    return {
      targetId,
      strategy: computed.strategy,
      inserted: summary.inserted,
      deleted: summary.deleted,
      durationMs: performance.now() - started,
      refreshedAt: this.clock.now(),
    }
  }

  private compute(spec: MaterializationSpec, guard: () => void): ComputedRefresh {
    const { targetId, plan } = spec.definition
    const heads = new Map(spec.sources.map(source => [source, this.changeLog.headPosition(source)]))
    const maintainsCircuit = spec.planClass.kind === 'incremental' && spec.refreshMode !== 'FULL'

    if (spec.refreshMode === 'INCREMENTAL' && spec.planClass.kind === 'full') {
      throw new UnsupportedIncrementalPlanError(targetId, spec.planClass.reasons)
    }

    // The circuit is taken out while it is being stepped, so a failed attempt
    // leaves none behind and the next one rebuilds it with a full refresh.
    const circuit = spec.circuit
    spec.circuit = null

    if (maintainsCircuit && circuit && spec.status !== 'INITIALIZING') {
      const deltas = this.readDeltas(spec, heads)
      if (deltas) {
        guard()
        return { strategy: 'INCREMENTAL', delta: circuit.step(deltas), circuit, heads }
      }
    }

    const current = (tableId: string): Array<[Row, number]> =>
      this.tables.entries(tableId).map(entry => [entry.row, entry.weight])

    const full = evaluate(plan, current)
    const delta = full.minus(ZSet.from(current(targetId)))

    let rebuilt: IncrementalCircuit | null = null
    if (maintainsCircuit) {
      rebuilt = new IncrementalCircuit(plan, targetId)
      rebuilt.step(new Map(spec.sources.map(source => [source, ZSet.from(current(source))])))
    }
    return { strategy: 'FULL', delta, circuit: rebuilt, heads }
  }

  /** Source deltas up to the head snapshot, or null when an owned cursor lost its history. */
  private readDeltas(spec: MaterializationSpec, heads: Map<string, number>): Map<string, ZSet> | null {
    const { targetId } = spec.definition
    const deltas = new Map<string, ZSet>()
    for (const source of spec.sources) {
      try {
        deltas.set(source, toDelta(this.cursors.peek(ownedCursorId(targetId, source), { end: heads.get(source) })))
      } catch (err) {
        if (err instanceof CursorExpiredError || err instanceof RangeCompactedError) {
          log.warn({ targetId, source }, 'owned cursor expired, falling back to full refresh')
          return null
        }
        throw err
      }
    }
    return deltas
  }
}
