import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  DuplicateRowError,
  InvalidRowError,
  RowNotFoundError,
  TableAlreadyExistsError,
  TableNotFoundError,
} from '../errors.js'
import { openStores, type Stores } from './helpers.js'

let s: Stores

beforeEach(() => {
  s = openStores()
  s.tables.createTable('products')
})

afterEach(() => {
  s.pool.close()
})

describe('TableStore', () => {
  describe('row operations', () => {
    it('inserts, updates and deletes rows', () => {
      s.tables.insert('products', 'p1', { sku: 'p1', price: 5 })
      s.tables.update('products', 'p1', { sku: 'p1', price: 7 })

      expect(s.tables.get('products', 'p1')).toEqual({ sku: 'p1', price: 7 })
      expect(s.tables.count('products')).toBe(1)

      expect(s.tables.delete('products', 'p1')).toBe(4)
      expect(s.tables.get('products', 'p1')).toBeUndefined()
      expect(s.tables.count('products')).toBe(0)
    })

    it('rejects a row that cannot be stored as JSON', () => {
      expect(() => s.tables.insert('products', 'p1', { sku: 'p1', stock: 10n })).toThrow(InvalidRowError)
      expect(() => s.tables.insert('products', 'p1', { sku: 'p1', stock: 10n })).toThrow(
        "Row 'p1' for table 'products' cannot be stored as JSON: Do not know how to serialize a BigInt",
      )

      expect(s.tables.count('products')).toBe(0)
      expect(s.changeLog.headPosition('products')).toBe(0)
    })

    it('logs the deleted row', () => {
      s.tables.insert('products', 'p1', { sku: 'p1', price: 5 })
      s.tables.delete('products', 'p1')

      const [, removed] = [...s.changeLog.readRange('products', 0)]
      expect(removed).toMatchObject({ operation: 'DELETE', isUpdate: false, row: { sku: 'p1', price: 5 } })
    })

    it('rejects duplicates and missing rows', () => {
      s.tables.insert('products', 'p1', { sku: 'p1' })

      expect(() => s.tables.insert('products', 'p1', { sku: 'p1' })).toThrow(DuplicateRowError)
      expect(() => s.tables.update('products', 'p2', { sku: 'p2' })).toThrow(RowNotFoundError)
      expect(() => s.tables.delete('products', 'p2')).toThrow(RowNotFoundError)
      expect(s.changeLog.headPosition('products')).toBe(1)
    })

    it('rejects unknown and duplicate tables', () => {
      expect(() => s.tables.insert('missing', 'x', {})).toThrow(TableNotFoundError)
      expect(() => s.tables.createTable('products')).toThrow(TableAlreadyExistsError)
    })

    it('lists rows ordered by identity', () => {
      s.tables.insert('products', 'b', { sku: 'b' })
      s.tables.insert('products', 'a', { sku: 'a' })

      expect(s.tables.rows('products')).toEqual([{ sku: 'a' }, { sku: 'b' }])
    })
  })

  describe('applyDelta', () => {
    it('tracks multiplicities and logs one record per unit', () => {
      const summary = s.tables.applyDelta('products', [
        { rowIdentity: 'k1', row: { v: 1 }, weight: 2 },
        { rowIdentity: 'k2', row: { v: 2 }, weight: 1 },
      ])

      expect(summary).toEqual({ inserted: 3, deleted: 0 })
      expect(s.tables.count('products')).toBe(3)
      expect(s.tables.entries('products')).toEqual([
        { rowIdentity: 'k1', row: { v: 1 }, weight: 2 },
        { rowIdentity: 'k2', row: { v: 2 }, weight: 1 },
      ])
      expect([...s.changeLog.readRange('products', 0)].map(r => r.rowIdentity)).toEqual(['k1', 'k1', 'k2'])
    })

    it('sums deltas for the same identity before applying them', () => {
      s.tables.applyDelta('products', [{ rowIdentity: 'k1', row: { v: 1 }, weight: 1 }])

      const summary = s.tables.applyDelta('products', [
        { rowIdentity: 'k1', row: { v: 1 }, weight: -1 },
        { rowIdentity: 'k1', row: { v: 1 }, weight: 1 },
        { rowIdentity: 'k2', row: { v: 2 }, weight: 1 },
        { rowIdentity: 'k1', row: { v: 1 }, weight: -1 },
      ])

      expect(summary).toEqual({ inserted: 1, deleted: 1 })
      expect(s.tables.rows('products')).toEqual([{ v: 2 }])
    })

    it('refuses to drive a multiplicity negative', () => {
      expect(() => s.tables.applyDelta('products', [{ rowIdentity: 'k1', row: { v: 1 }, weight: -1 }])).toThrow(
        "Cannot remove 1 copies of row 'k1' from 'products' holding 0",
      )
      expect(s.changeLog.headPosition('products')).toBe(0)
    })
  })

  it('drops a table with its history', () => {
    s.tables.insert('products', 'p1', { sku: 'p1' })
    s.tables.dropTable('products')

    expect(s.tables.hasTable('products')).toBe(false)
    expect(s.changeLog.isTracked('products')).toBe(false)
    expect(() => s.tables.dropTable('products')).toThrow(TableNotFoundError)
  })

  it('continues positions when a dropped table is created again', () => {
    s.tables.insert('products', 'p1', { sku: 'p1' })
    s.tables.insert('products', 'p2', { sku: 'p2' })
    s.cursors.create('watch', 'products', { at: { position: 0 } })
    s.tables.dropTable('products')

    expect(s.cursors.get('watch').state).toBe('STALE')

    s.tables.createTable('products')
    expect(s.tables.insert('products', 'p3', { sku: 'p3' })).toBe(3)
    expect(s.changeLog.headPosition('products')).toBe(3)
    expect(s.tables.rows('products')).toEqual([{ sku: 'p3' }])
    expect(() => s.tables.createTable('products')).toThrow(TableAlreadyExistsError)
  })
})
