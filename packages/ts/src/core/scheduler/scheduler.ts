import { systemClock } from '../config.js'
import { startCronJob } from '../cron.js'
import { toTidemarkError } from '../errors.js'
import { createModuleLogger } from '../logger.js'
import type { Materializer } from '../materialize/materializer.js'
import type { Clock, ScheduleOptions, TickReport } from '../types.js'
import type { DependencyGraph, GraphSnapshot } from './graph.js'
import { createLimiter, type Limiter } from './limiter.js'

const log = createModuleLogger('scheduler')

type Outcome = 'refreshed' | 'failed' | 'skipped' | 'idle'

export interface RefreshSchedulerOptions {
  clock?: Clock
  /** Refreshes running at once. Default: 4. */
  maxConcurrency?: number
}

export interface TickScheduleOptions extends ScheduleOptions {
  onTick?: (report: TickReport) => void
}

/**
 * Refreshes stale materializations in dependency order. A tick plans against
 * a snapshot of the graph, so materializations added or dropped meanwhile
 * take effect from the next tick. Each materialization waits only for its
 * own upstreams, so independent branches run side by side.
 */
export class RefreshScheduler {
  private readonly clock: Clock
  private readonly limit: Limiter
  private running: Promise<TickReport> | null = null
  private stopJob: (() => void) | null = null

  constructor(
    private readonly graph: DependencyGraph,
    private readonly materializer: Materializer,
    options?: RefreshSchedulerOptions,
  ) {
    this.clock = options?.clock ?? systemClock
    this.limit = createLimiter(options?.maxConcurrency ?? 4)
  }

  /**
   * Runs one scheduling pass. Ticks never overlap: calling this while a tick
   * is running returns that tick's report.
   */
  tick(): Promise<TickReport> {
    if (this.running) {
      return this.running
    }
    const run = this.runTick().finally(() => {
      this.running = null
    })
    this.running = run
    return run
  }

  /** Runs {@link tick} on a cron expression until {@link stop} is called. */
  start(options: TickScheduleOptions): void {
    this.stop()
    this.stopJob = startCronJob(
      'refresh',
      options.cron,
      async () => {
        const report = await this.tick()
        options.onTick?.(report)
      },
      options.onError,
    )
  }

  stop(): void {
    this.stopJob?.()
    this.stopJob = null
  }

  get isRunning(): boolean {
    return this.stopJob !== null
  }

  private async runTick(): Promise<TickReport> {
    const report: TickReport = { startedAt: this.clock.now(), refreshed: [], failed: [], skipped: [] }
    const snapshot = this.graph.snapshot()
    const planned = this.plan(snapshot)

    const outcomes = new Map<string, Promise<Outcome>>()
    for (const targetId of snapshot.order) {
      const conditional = planned.get(targetId)
      if (conditional === undefined) continue

      const waitFor = snapshot.upstreamOf(targetId).flatMap(up => {
        const outcome = outcomes.get(up)
        return outcome ? [outcome] : []
      })
      outcomes.set(
        targetId,
        Promise.all(waitFor).then(upstream => this.runOne(targetId, conditional, upstream, snapshot, report)),
      )
    }

    await Promise.all(outcomes.values())
    if (report.refreshed.length > 0 || report.failed.length > 0) {
      log.info(
        { refreshed: report.refreshed.length, failed: report.failed.length, skipped: report.skipped.length },
        'tick complete',
      )
    }
    return report
  }

  /**
   * Picks the materializations to refresh this tick. The value is true for
   * entries whose staleness is only known once their upstreams have
   * refreshed: DOWNSTREAM-lag upstreams, and due dependents of anything
   * refreshing this tick.
   */
  private plan(snapshot: GraphSnapshot): Map<string, boolean> {
    const planned = new Map<string, boolean>()

    const addRequiredUpstream = (targetId: string) => {
      for (const up of snapshot.upstreamOf(targetId)) {
        if (planned.has(up) || !this.materializer.has(up)) continue
        const info = this.materializer.get(up)
        if (info.targetLag !== 'DOWNSTREAM' || info.state === 'SUSPENDED') continue
        planned.set(up, true)
        addRequiredUpstream(up)
      }
    }

    // Changes waiting in a DOWNSTREAM-lag upstream only reach a dependent's
    // sources once that upstream refreshes, so they count as the dependent's own.
    const upstreamPending = (targetId: string): boolean =>
      snapshot.upstreamOf(targetId).some(up => {
        if (!this.materializer.has(up)) return false
        const info = this.materializer.get(up)
        if (info.targetLag !== 'DOWNSTREAM' || info.state === 'SUSPENDED') return false
        return (
          this.materializer.isPendingInitialization(up) ||
          this.materializer.evaluateStaleness(up, { requiredBy: true }) ||
          upstreamPending(up)
        )
      })

    for (const targetId of snapshot.order) {
      if (!this.materializer.has(targetId)) continue
      const info = this.materializer.get(targetId)
      if (info.state === 'SUSPENDED' || info.targetLag === 'DOWNSTREAM') continue
      const lagElapsed = this.materializer.lagElapsed(targetId)
      if (
        this.materializer.isPendingInitialization(targetId) ||
        this.materializer.evaluateStaleness(targetId) ||
        (lagElapsed && upstreamPending(targetId))
      ) {
        planned.set(targetId, false)
        addRequiredUpstream(targetId)
      } else if (lagElapsed && snapshot.upstreamOf(targetId).some(up => planned.has(up))) {
        // Due, but only stale if an upstream refreshing this tick produces changes.
        planned.set(targetId, true)
      }
    }
    return planned
  }

  private async runOne(
    targetId: string,
    conditional: boolean,
    upstream: Outcome[],
    snapshot: GraphSnapshot,
    report: TickReport,
  ): Promise<Outcome> {
    if (upstream.some(outcome => outcome === 'failed' || outcome === 'skipped')) {
      return this.skip(targetId, report, 'upstream refresh failed')
    }

    // Upstream refreshes started outside this tick still have to land first.
    for (const up of snapshot.upstreamOf(targetId)) {
      const inFlight = this.materializer.has(up) ? this.materializer.inFlight(up) : undefined
      if (!inFlight) continue
      try {
        await inFlight
      } catch (err) {
        log.warn({ targetId, upstream: up, err }, 'upstream refresh failed')
        return this.skip(targetId, report, 'upstream refresh failed')
      }
    }

    if (!this.materializer.has(targetId)) {
      return 'idle'
    }
    if (
      conditional &&
      !this.materializer.isPendingInitialization(targetId) &&
      !this.materializer.evaluateStaleness(targetId, { requiredBy: true })
    ) {
      return 'idle'
    }

    try {
      const result = await this.limit(() => this.materializer.refresh(targetId, { upstream: 'skip' }))
      report.refreshed.push(result)
      return 'refreshed'
    } catch (err) {
      report.failed.push({ targetId, error: toTidemarkError(err) })
      return 'failed'
    }
  }

  private skip(targetId: string, report: TickReport, reason: string): Outcome {
    if (this.materializer.has(targetId)) {
      this.materializer.markStale(targetId)
    }
    report.skipped.push(targetId)
    log.warn({ targetId, reason }, 'refresh skipped')
    return 'skipped'
  }
}
