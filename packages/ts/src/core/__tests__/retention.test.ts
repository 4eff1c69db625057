import { afterEach, describe, expect, it, vi } from 'vitest'
import { CursorExpiredError, InvalidRetentionError, RangeCompactedError, UntrackedTableError } from '../errors.js'
import type { CompactionResult } from '../types.js'
import { openStores, type Stores } from './helpers.js'

let s: Stores

function setup(options?: { dataExtensionMs?: number }): Stores {
  s = openStores(options)
  s.tables.createTable('orders')
  return s
}

afterEach(() => {
  s.pool.close()
})

describe('RetentionManager', () => {
  describe('retention windows', () => {
    it('falls back to the default window', () => {
      setup()
      expect(s.retention.getRetention('orders')).toEqual({
        tableId: 'orders',
        windowMs: 86_400_000,
        effectiveAt: 0,
        isDefault: true,
      })
    })

    it('stores an explicit window until cleared', () => {
      setup()
      expect(s.retention.setRetention('orders', 60_000)).toEqual({
        tableId: 'orders',
        windowMs: 60_000,
        effectiveAt: 1_000_000,
        isDefault: false,
      })
      expect(s.retention.getRetention('orders').windowMs).toBe(60_000)

      s.retention.setRetention('orders', 30_000)
      expect(s.retention.getRetention('orders').windowMs).toBe(30_000)

      s.retention.clearRetention('orders')
      expect(s.retention.getRetention('orders').isDefault).toBe(true)
    })

    it('rejects windows outside the allowed range', () => {
      setup()
      expect(() => s.retention.setRetention('orders', -1)).toThrow(InvalidRetentionError)
      expect(() => s.retention.setRetention('orders', 1.5)).toThrow(InvalidRetentionError)
      expect(() => s.retention.setRetention('orders', 86_400_001)).toThrow(
        'Retention window 86400001ms is outside the allowed range 0..86400000ms',
      )
    })

    it('requires change tracking', () => {
      setup()
      s.tables.createTable('scratch', { changeTracking: false })
      expect(() => s.retention.setRetention('scratch', 1000)).toThrow(UntrackedTableError)
    })
  })

  describe('compact', () => {
    it('purges expired history when no cursor needs it', () => {
      setup()
      s.tables.insert('orders', 'a', { id: 'a' })
      s.retention.setRetention('orders', 1)
      s.clock.advance(2)

      const result = s.retention.compact('orders')

      expect(result).toEqual({ tableId: 'orders', removed: 1, compactedThrough: 1, staleCursors: [] })
      expect(() => s.changeLog.readRange('orders', 0)).toThrow(RangeCompactedError)
    })

    it('keeps history inside the window', () => {
      setup()
      s.tables.insert('orders', 'a', { id: 'a' })
      s.retention.setRetention('orders', 1000)
      s.clock.advance(500)

      expect(s.retention.compact('orders').removed).toBe(0)
      expect([...s.changeLog.readRange('orders', 0)]).toHaveLength(1)
    })

    it('keeps records an active cursor has not consumed', () => {
      setup({ dataExtensionMs: 10_000 })
      for (const id of ['a', 'b', 'c']) {
        s.tables.insert('orders', id, { id })
      }
      s.cursors.create('c1', 'orders', { at: { position: 2 } })
      s.retention.setRetention('orders', 1000)
      s.clock.advance(2000)

      const result = s.retention.compact('orders')

      expect(result).toEqual({ tableId: 'orders', removed: 1, compactedThrough: 1, staleCursors: [] })
      expect([...s.cursors.peek('c1')].map(r => r.rowIdentity)).toEqual(['c'])
    })

    it('marks a lagging cursor stale once its records expire', () => {
      setup()
      for (const id of ['a', 'b', 'c']) {
        s.tables.insert('orders', id, { id })
      }
      s.cursors.create('c1', 'orders', { at: { position: 2 } })
      s.retention.setRetention('orders', 1000)
      s.clock.advance(2000)

      const result = s.retention.compact('orders')

      expect(result).toEqual({ tableId: 'orders', removed: 3, compactedThrough: 3, staleCursors: ['c1'] })
      expect(s.cursors.get('c1').state).toBe('STALE')
      expect(() => s.cursors.peek('c1')).toThrow(CursorExpiredError)
    })

    it('does not expire a caught-up cursor', () => {
      setup()
      s.tables.insert('orders', 'a', { id: 'a' })
      s.cursors.create('c1', 'orders')
      s.retention.setRetention('orders', 1000)
      s.clock.advance(2000)

      expect(s.retention.compact('orders').staleCursors).toEqual([])
      expect(s.cursors.get('c1').state).toBe('ACTIVE')
    })

    it('notifies observers and metrics', () => {
      const onCompaction = vi.fn()
      s = openStores({ metrics: { onCompaction } })
      s.tables.createTable('orders')
      const seen: CompactionResult[] = []
      s.hooks.register('afterCompact', result => {
        seen.push(result)
      })
      s.tables.insert('orders', 'a', { id: 'a' })
      s.retention.setRetention('orders', 0)
      s.clock.advance(1)

      s.retention.compact('orders')

      expect(seen).toEqual([{ tableId: 'orders', removed: 1, compactedThrough: 1, staleCursors: [] }])
      expect(onCompaction).toHaveBeenCalledWith({ tableId: 'orders', removed: 1, staleCursors: 0 })
    })

    it('compacts every tracked table', () => {
      setup()
      s.tables.createTable('payments')
      s.tables.createTable('scratch', { changeTracking: false })

      expect(s.retention.compactAll().map(r => r.tableId)).toEqual(['orders', 'payments'])
    })
  })
})
