import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  CursorAlreadyExistsError,
  CursorExpiredError,
  CursorNotFoundError,
  HookDeniedError,
  InvalidPositionError,
  UntrackedTableError,
} from '../errors.js'
import { openStores, type Stores } from './helpers.js'

let s: Stores

beforeEach(() => {
  s = openStores()
  s.tables.createTable('orders')
})

afterEach(() => {
  s.pool.close()
})

describe('CursorManager', () => {
  describe('create', () => {
    it('starts at the head', () => {
      s.tables.insert('orders', 'a', { id: 'a' })
      const cursor = s.cursors.create('c1', 'orders')

      expect(cursor).toEqual({
        cursorId: 'c1',
        tableId: 'orders',
        mode: 'DEFAULT',
        position: 1,
        state: 'ACTIVE',
        offsetAt: 1_000_000,
        createdAt: 1_000_000,
      })
      expect([...s.cursors.peek('c1')]).toEqual([])
    })

    it('starts at an explicit position', () => {
      s.tables.insert('orders', 'a', { id: 'a' })
      s.tables.insert('orders', 'b', { id: 'b' })
      s.cursors.create('c1', 'orders', { at: { position: 1 } })

      expect([...s.cursors.peek('c1')].map(r => r.rowIdentity)).toEqual(['b'])
      expect(() => s.cursors.create('c2', 'orders', { at: { position: 3 } })).toThrow(InvalidPositionError)
    })

    it('starts at a point in time', () => {
      s.tables.insert('orders', 'a', { id: 'a' })
      s.clock.advance(10)
      s.tables.insert('orders', 'b', { id: 'b' })

      const cursor = s.cursors.create('c1', 'orders', { at: { timestamp: 1_000_005 } })

      expect(cursor.position).toBe(1)
      expect(cursor.offsetAt).toBe(1_000_005)
      expect([...s.cursors.peek('c1')].map(r => r.rowIdentity)).toEqual(['b'])
    })

    it('stores mode and filter', () => {
      const cursor = s.cursors.create('c1', 'orders', { mode: 'APPEND_ONLY', filter: { region: 'eu' } })
      expect(cursor.mode).toBe('APPEND_ONLY')
      expect(cursor.filter).toEqual({ region: 'eu' })
    })

    it('rejects duplicates, empty ids and untracked tables', () => {
      s.cursors.create('c1', 'orders')
      s.tables.createTable('scratch', { changeTracking: false })

      expect(() => s.cursors.create('c1', 'orders')).toThrow(CursorAlreadyExistsError)
      expect(() => s.cursors.create('', 'orders')).toThrow(InvalidPositionError)
      expect(() => s.cursors.create('c2', 'scratch')).toThrow(UntrackedTableError)
    })
  })

  describe('peek and advance', () => {
    it('reports an update as a flagged pair and consumes it on advance', () => {
      s.tables.insert('orders', 'a', { id: 'a', amount: 1 })
      s.cursors.create('c1', 'orders')
      s.tables.update('orders', 'a', { id: 'a', amount: 2 })

      const pending = [...s.cursors.peek('c1')]
      expect(pending.map(r => [r.operation, r.isUpdate, r.row.amount])).toEqual([
        ['DELETE', true, 1],
        ['INSERT', true, 2],
      ])

      expect(s.cursors.advance('c1')).toBe(3)
      expect([...s.cursors.peek('c1')]).toEqual([])
    })

    it('peeks without moving the cursor', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })

      const first = [...s.cursors.peek('c1')]
      const second = [...s.cursors.peek('c1')]

      expect(second).toEqual(first)
      expect(s.cursors.get('c1').position).toBe(0)
    })

    it('keeps cursors on the same table independent', () => {
      s.tables.insert('orders', 'a', { id: 'a' })
      s.cursors.create('c1', 'orders')
      s.cursors.create('c2', 'orders')
      s.tables.insert('orders', 'b', { id: 'b' })

      s.cursors.advance('c1')

      expect([...s.cursors.peek('c1')]).toEqual([])
      expect([...s.cursors.peek('c2')].map(r => r.rowIdentity)).toEqual(['b'])
      expect(s.cursors.get('c2').position).toBe(1)
    })

    it('advances to an explicit position', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })
      s.tables.insert('orders', 'b', { id: 'b' })

      s.cursors.advance('c1', { to: 1 })

      expect([...s.cursors.peek('c1')].map(r => r.seq)).toEqual([2])
    })

    it('refuses to move backwards or past the head', () => {
      s.tables.insert('orders', 'a', { id: 'a' })
      s.tables.insert('orders', 'b', { id: 'b' })
      s.cursors.create('c1', 'orders', { at: { position: 1 } })

      expect(() => s.cursors.advance('c1', { to: 0 })).toThrow(InvalidPositionError)
      expect(() => s.cursors.advance('c1', { to: 3 })).toThrow(InvalidPositionError)
      expect(s.cursors.get('c1').position).toBe(1)
    })

    it('bounds a peek by position and time', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })
      s.clock.advance(10)
      s.tables.insert('orders', 'b', { id: 'b' })
      s.tables.insert('orders', 'c', { id: 'c' })

      expect([...s.cursors.peek('c1', { end: 2 })].map(r => r.seq)).toEqual([1, 2])
      expect([...s.cursors.peek('c1', { until: 1_000_000 })].map(r => r.seq)).toEqual([1])
    })

    it('applies the cursor mode and filter', () => {
      s.tables.insert('orders', 'a', { id: 'a', region: 'eu' })
      s.cursors.create('eu', 'orders', { mode: 'APPEND_ONLY', filter: { region: 'eu' } })
      s.tables.insert('orders', 'b', { id: 'b', region: 'us' })
      s.tables.insert('orders', 'c', { id: 'c', region: 'eu' })
      s.tables.delete('orders', 'a')

      expect([...s.cursors.peek('eu')].map(r => r.rowIdentity)).toEqual(['c'])
    })

    it('reports whether data is waiting', () => {
      s.cursors.create('c1', 'orders')
      expect(s.cursors.hasData('c1')).toBe(false)

      s.tables.insert('orders', 'a', { id: 'a' })
      expect(s.cursors.hasData('c1')).toBe(true)
    })
  })

  describe('consume', () => {
    it('hands over pending records and advances past them', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })
      s.tables.insert('orders', 'b', { id: 'b' })

      const consumed = s.cursors.consume('c1', records => records.map(r => r.rowIdentity))

      expect(consumed).toEqual(['a', 'b'])
      expect(s.cursors.get('c1').position).toBe(2)
    })

    it('leaves the cursor in place when the handler throws', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })

      expect(() =>
        s.cursors.consume('c1', () => {
          throw new Error('downstream write failed')
        }),
      ).toThrow('downstream write failed')
      expect(s.cursors.get('c1').position).toBe(0)
    })
  })

  describe('changes', () => {
    beforeEach(() => {
      s.tables.insert('orders', 'a', { id: 'a' })
      s.clock.advance(10)
      s.tables.insert('orders', 'b', { id: 'b' })
    })

    it('reads all retained history by default', () => {
      expect([...s.cursors.changes('orders')].map(r => r.seq)).toEqual([1, 2])
    })

    it('reads from a position or a timestamp', () => {
      expect([...s.cursors.changes('orders', { at: { position: 1 } })].map(r => r.seq)).toEqual([2])
      expect([...s.cursors.changes('orders', { at: { timestamp: 1_000_005 } })].map(r => r.seq)).toEqual([2])
    })

    it('reads from another cursor without moving it', () => {
      s.cursors.create('c1', 'orders', { at: { position: 1 } })

      expect([...s.cursors.changes('orders', { at: { cursor: 'c1' } })].map(r => r.seq)).toEqual([2])
      expect(s.cursors.get('c1').position).toBe(1)
    })
  })

  describe('peekFrom', () => {
    it('translates the source cursor to another table by time', () => {
      s.tables.createTable('payments')
      s.tables.insert('orders', 'o1', { id: 'o1' })
      s.tables.insert('payments', 'p1', { id: 'p1' })
      s.clock.advance(5)
      s.cursors.create('oc', 'orders')
      s.clock.advance(5)
      s.tables.insert('payments', 'p2', { id: 'p2' })

      expect([...s.cursors.peekFrom('oc', 'payments')].map(r => r.rowIdentity)).toEqual(['p2'])
      expect(s.cursors.get('oc').position).toBe(1)
    })

    it('reuses the source cursor mode on its own table', () => {
      s.cursors.create('ins', 'orders', { mode: 'APPEND_ONLY' })
      s.tables.insert('orders', 'a', { id: 'a' })
      s.tables.delete('orders', 'a')

      expect([...s.cursors.peekFrom('ins')].map(r => r.operation)).toEqual(['INSERT'])
    })
  })

  describe('lifecycle', () => {
    it('lists cursors, hiding owned ones', () => {
      s.cursors.create('b', 'orders')
      s.cursors.create('a', 'orders')
      s.cursors.create('m1::orders', 'orders', { owner: 'm1' })

      expect(s.cursors.list().map(c => c.cursorId)).toEqual(['a', 'b'])
      expect(s.cursors.list({ includeInternal: true }).map(c => c.cursorId)).toEqual(['a', 'b', 'm1::orders'])
      expect(s.cursors.dropOwnedBy('m1')).toBe(1)
    })

    it('drops a cursor', () => {
      s.cursors.create('c1', 'orders')
      s.cursors.drop('c1')

      expect(s.cursors.has('c1')).toBe(false)
      expect(() => s.cursors.drop('c1')).toThrow(CursorNotFoundError)
      expect(() => s.cursors.peek('c1')).toThrow(CursorNotFoundError)
    })

    it('refuses reads from a stale cursor until it is rebaselined', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })
      s.cursors.markStale(['c1'])

      expect(() => s.cursors.peek('c1')).toThrow(CursorExpiredError)
      expect(() => s.cursors.advance('c1')).toThrow(CursorExpiredError)

      s.clock.advance(100)
      const rebased = s.cursors.rebaseline('c1')
      expect(rebased).toMatchObject({ state: 'ACTIVE', position: 1, offsetAt: 1_000_100 })
      expect([...s.cursors.peek('c1')]).toEqual([])
    })
  })

  describe('hooks and metrics', () => {
    it('lets a hook deny an advance', () => {
      s.cursors.create('c1', 'orders')
      s.tables.insert('orders', 'a', { id: 'a' })
      s.hooks.register('beforeAdvance', () => {
        throw new Error('frozen')
      })

      expect(() => s.cursors.advance('c1')).toThrow(HookDeniedError)
      expect(s.cursors.get('c1').position).toBe(0)
    })

    it('reports consumed positions', () => {
      const onAdvance = vi.fn()
      const metered = openStores({ metrics: { onAdvance } })
      metered.tables.createTable('orders')
      metered.cursors.create('c1', 'orders')
      metered.tables.insert('orders', 'a', { id: 'a' })
      metered.tables.insert('orders', 'b', { id: 'b' })

      metered.cursors.advance('c1', {}, { actor: 'etl' })

      expect(onAdvance).toHaveBeenCalledWith({ cursorId: 'c1', tableId: 'orders', consumed: 2 })
      metered.pool.close()
    })

    it('passes the actor to advance observers', () => {
      const seen: Array<string | undefined> = []
      s.hooks.register('afterAdvance', ctx => {
        seen.push(ctx.actor)
      })
      s.cursors.create('c1', 'orders')

      s.cursors.advance('c1', undefined, { actor: 'etl' })

      expect(seen).toEqual(['etl'])
    })
  })
})
