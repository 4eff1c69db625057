import { describe, expect, it, vi } from 'vitest'
import { MetricsCollector } from '../metrics/collector.js'
import type { AppendMetrics, RefreshMetrics } from '../types.js'

describe('MetricsCollector', () => {
  describe('trackAppend', () => {
    it('returns the result of the wrapped function', () => {
      const collector = new MetricsCollector({ onAppend: vi.fn() })
      expect(collector.trackAppend(() => [1, 2], { tableId: 'orders', records: 2 })).toEqual([1, 2])
    })

    it('reports the table, record count and timing', () => {
      const onAppend = vi.fn()
      const collector = new MetricsCollector({ onAppend })

      collector.trackAppend(() => undefined, { tableId: 'orders', records: 3 })

      expect(onAppend).toHaveBeenCalledOnce()
      const metrics: AppendMetrics = onAppend.mock.calls[0][0]
      expect(metrics.tableId).toBe('orders')
      expect(metrics.records).toBe(3)
      expect(metrics.durationMs).toBeGreaterThanOrEqual(0)
    })

    it('does not report when the wrapped function throws', () => {
      const onAppend = vi.fn()
      const collector = new MetricsCollector({ onAppend })

      expect(() =>
        collector.trackAppend(
          () => {
            throw new Error('write failed')
          },
          { tableId: 'orders', records: 1 },
        ),
      ).toThrow('write failed')
      expect(onAppend).not.toHaveBeenCalled()
    })
  })

  describe('trackRefresh', () => {
    it('reports strategy and changed rows', async () => {
      const onRefresh = vi.fn()
      const collector = new MetricsCollector({ onRefresh })

      await collector.trackRefresh('totals', async () => ({ strategy: 'INCREMENTAL' as const, inserted: 2, deleted: 1 }))

      const metrics: RefreshMetrics = onRefresh.mock.calls[0][0]
      expect(metrics.targetId).toBe('totals')
      expect(metrics.strategy).toBe('INCREMENTAL')
      expect(metrics.rowsChanged).toBe(3)
      expect(metrics.error).toBe(false)
    })

    it('reports failures and rethrows', async () => {
      const onRefresh = vi.fn()
      const collector = new MetricsCollector({ onRefresh })

      await expect(
        collector.trackRefresh('totals', async () => {
          throw new Error('refresh failed')
        }),
      ).rejects.toThrow('refresh failed')

      const metrics: RefreshMetrics = onRefresh.mock.calls[0][0]
      expect(metrics.error).toBe(true)
      expect(metrics.strategy).toBeUndefined()
    })
  })

  it('ignores errors thrown by callbacks', () => {
    const collector = new MetricsCollector({
      onCompaction: () => {
        throw new Error('callback broke')
      },
    })

    expect(() => collector.trackCompaction({ tableId: 'orders', removed: 1, staleCursors: 0 })).not.toThrow()
  })

  it('is inactive without callbacks', () => {
    expect(new MetricsCollector().active).toBe(false)
    expect(new MetricsCollector({ onAdvance: vi.fn() }).active).toBe(true)
  })
})
