import { createModuleLogger } from '../logger.js'
import type {
  AdvanceMetrics,
  CompactionMetrics,
  MetricsConfig,
  RefreshMetrics,
  RefreshStrategyKind,
} from '../types.js'

const log = createModuleLogger('metrics')

export class MetricsCollector {
  private config: MetricsConfig

  constructor(config?: MetricsConfig) {
    this.config = config ?? {}
  }

  trackAppend<T>(fn: () => T, context: { tableId: string; records: number }): T {
    if (!this.config.onAppend) {
      return fn()
    }

    const start = performance.now()
    const result = fn()
    const durationMs = performance.now() - start
    this.safely('onAppend', () => this.config.onAppend?.({ ...context, durationMs }))
    return result
  }

  /**
   * Times an async refresh. The callback receives the strategy and row count
   * from the result; failures are reported with `error: true` and rethrown.
   */
  async trackRefresh<T extends { strategy: RefreshStrategyKind; inserted: number; deleted: number }>(
    targetId: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    if (!this.config.onRefresh) {
      return fn()
    }

    const start = performance.now()
    try {
      const result = await fn()
      const metrics: RefreshMetrics = {
        targetId,
        strategy: result.strategy,
        durationMs: performance.now() - start,
        rowsChanged: result.inserted + result.deleted,
        error: false,
      }
      this.safely('onRefresh', () => this.config.onRefresh?.(metrics))
      return result
    } catch (err) {
      const metrics: RefreshMetrics = { targetId, durationMs: performance.now() - start, error: true }
      this.safely('onRefresh', () => this.config.onRefresh?.(metrics))
      throw err
    }
  }

  trackAdvance(metrics: AdvanceMetrics): void {
    this.safely('onAdvance', () => this.config.onAdvance?.(metrics))
  }

  trackCompaction(metrics: CompactionMetrics): void {
    this.safely('onCompaction', () => this.config.onCompaction?.(metrics))
  }

  get active(): boolean {
    return !!(this.config.onAppend || this.config.onAdvance || this.config.onRefresh || this.config.onCompaction)
  }

  private safely(callback: keyof MetricsConfig, fn: () => void): void {
    try {
      fn()
    } catch (err) {
      log.warn({ err, callback }, 'metrics callback failed')
    }
  }
}
