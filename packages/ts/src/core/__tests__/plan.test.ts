import { describe, expect, it } from 'vitest'
import { evaluate, type SourceReader } from '../materialize/evaluate.js'
import { classifyPlan, groupBy, join, planSources, rank, scan, select, top, where } from '../materialize/plan.js'
import { rowKey, ZSet } from '../materialize/zset.js'
import type { Row } from '../types.js'

function reader(data: Record<string, Row[]>): SourceReader {
  return tableId => (data[tableId] ?? []).map((row): [Row, number] => [row, 1])
}

describe('ZSet', () => {
  it('identifies rows by content regardless of key order', () => {
    expect(rowKey({ b: 2, a: 1 })).toBe(rowKey({ a: 1, b: 2 }))

    const set = new ZSet().add({ a: 1, b: 2 }, 2)
    expect(set.weightOf({ b: 2, a: 1 })).toBe(2)
  })

  it('drops entries whose weight reaches zero', () => {
    const set = new ZSet().add({ id: 1 }, 1).add({ id: 1 }, -1)
    expect(set.isEmpty()).toBe(true)
    expect(set.size).toBe(0)
  })

  it('subtracts and negates', () => {
    const current = ZSet.ofRows([{ id: 1 }, { id: 2 }])
    const next = ZSet.ofRows([{ id: 2 }, { id: 3 }])

    const delta = next.minus(current)

    expect(delta.weightOf({ id: 1 })).toBe(-1)
    expect(delta.weightOf({ id: 2 })).toBe(0)
    expect(delta.weightOf({ id: 3 })).toBe(1)
    expect(delta.negate().weightOf({ id: 1 })).toBe(1)
  })

  it('expands positive weights into rows', () => {
    const set = ZSet.from([
      [{ id: 1 }, 2],
      [{ id: 2 }, -1],
    ])
    expect(set.rows()).toEqual([{ id: 1 }, { id: 1 }])
    expect(set.toArray()).toEqual([
      [{ id: 1 }, 2],
      [{ id: 2 }, -1],
    ])
  })
})

describe('classifyPlan', () => {
  it('accepts selection, projection, inner joins and grouping', () => {
    const plan = groupBy(
      join(where(scan('orders'), row => row.status === 'paid'), scan('customers'), [['customerId', 'id']]),
      ['region'],
      [{ fn: 'sum', column: 'amount', as: 'total' }],
    )
    expect(classifyPlan(plan)).toEqual({ kind: 'incremental' })
  })

  it('lists every operator that needs a full refresh', () => {
    const plan = rank(join(scan('orders'), scan('customers'), [['customerId', 'id']], { type: 'left' }), {
      fn: 'rank',
      orderBy: [{ column: 'amount' }],
      as: 'pos',
    })
    expect(classifyPlan(plan)).toEqual({ kind: 'full', reasons: ['window function rank', 'left join'] })
  })

  it('rejects non-deterministic expressions and ordered limits', () => {
    expect(classifyPlan(where(scan('orders'), () => true, { deterministic: false }))).toEqual({
      kind: 'full',
      reasons: ['non-deterministic filter predicate'],
    })
    expect(classifyPlan(select(scan('orders'), { at: () => 0 }, { deterministic: false }))).toEqual({
      kind: 'full',
      reasons: ['non-deterministic projection'],
    })
    expect(classifyPlan(top(scan('orders'), [{ column: 'amount' }], 3))).toEqual({
      kind: 'full',
      reasons: ['ordered limit'],
    })
    expect(classifyPlan(join(scan('a'), scan('b'), []))).toEqual({
      kind: 'full',
      reasons: ['join without equality condition'],
    })
  })

  it('lists each source once in order of appearance', () => {
    const plan = join(join(scan('orders'), scan('customers'), [['customerId', 'id']]), scan('orders'), [['id', 'id']])
    expect(planSources(plan)).toEqual(['orders', 'customers'])
  })
})

describe('evaluate', () => {
  const orders: Row[] = [
    { id: 1, customerId: 'c1', region: 'eu', amount: 10, note: 'gift' },
    { id: 2, customerId: 'c1', region: 'eu', amount: 30, note: null },
    { id: 3, customerId: 'c2', region: 'us', amount: 5 },
    { id: 4, customerId: null, region: 'us', amount: 7 },
  ]
  const customers: Row[] = [
    { id: 'c1', name: 'Ada' },
    { id: 'c2', name: 'Lin' },
    { id: 'c3', name: 'Sam' },
  ]
  const read = reader({ orders, customers })

  it('filters and projects', () => {
    const plan = select(where(scan('orders'), row => Number(row.amount) > 8), {
      id: 'id',
      doubled: row => Number(row.amount) * 2,
    })

    expect(evaluate(plan, read).rows()).toEqual([
      { id: 1, doubled: 20 },
      { id: 2, doubled: 60 },
    ])
  })

  it('projects missing columns as null', () => {
    const result = evaluate(select(scan('orders'), ['id', 'note']), read)
    expect(result.weightOf({ id: 3, note: null })).toBe(1)
  })

  it('inner joins on equal columns, never on null', () => {
    const plan = select(
      join(scan('orders'), scan('customers'), [['customerId', 'id']], { leftPrefix: 'o', rightPrefix: 'c' }),
      { order: 'o.id', name: 'c.name' },
    )

    const result = evaluate(plan, read)

    expect(result.size).toBe(3)
    expect(result.weightOf({ order: 1, name: 'Ada' })).toBe(1)
    expect(result.weightOf({ order: 2, name: 'Ada' })).toBe(1)
    expect(result.weightOf({ order: 3, name: 'Lin' })).toBe(1)
  })

  it('keeps unmatched rows in a left join', () => {
    const plan = join(scan('customers'), scan('orders'), [['id', 'customerId']], {
      type: 'left',
      leftPrefix: 'c',
      rightPrefix: 'o',
    })

    const result = evaluate(plan, read)

    expect(result.size).toBe(4)
    expect(result.weightOf({ 'c.id': 'c3', 'c.name': 'Sam' })).toBe(1)
  })

  it('computes grouped aggregates', () => {
    const plan = groupBy(
      scan('orders'),
      ['region'],
      [
        { fn: 'count', as: 'n' },
        { fn: 'sum', column: 'amount', as: 'total' },
        { fn: 'avg', column: 'amount', as: 'mean' },
        { fn: 'min', column: 'amount', as: 'lo' },
        { fn: 'max', column: 'amount', as: 'hi' },
        { fn: 'count', column: 'note', as: 'notes' },
      ],
    )

    const result = evaluate(plan, read)

    expect(result.size).toBe(2)
    expect(result.weightOf({ region: 'eu', n: 2, total: 40, mean: 20, lo: 10, hi: 30, notes: 1 })).toBe(1)
    expect(result.weightOf({ region: 'us', n: 2, total: 12, mean: 6, lo: 5, hi: 7, notes: 0 })).toBe(1)
  })

  it('returns one row for a global aggregate over no input', () => {
    const plan = groupBy(
      where(scan('orders'), () => false),
      [],
      [
        { fn: 'count', as: 'n' },
        { fn: 'sum', column: 'amount', as: 'total' },
      ],
    )
    expect(evaluate(plan, read).rows()).toEqual([{ n: 0, total: null }])
  })

  it('ranks with shared positions for ties', () => {
    const scores = reader({
      scores: [
        { id: 'a', score: 10 },
        { id: 'b', score: 20 },
        { id: 'c', score: 20 },
        { id: 'd', score: 30 },
      ],
    })
    const plan = rank(scan('scores'), { fn: 'rank', orderBy: [{ column: 'score', direction: 'desc' }], as: 'pos' })

    const result = evaluate(plan, scores)

    expect(result.weightOf({ id: 'd', score: 30, pos: 1 })).toBe(1)
    expect(result.weightOf({ id: 'b', score: 20, pos: 2 })).toBe(1)
    expect(result.weightOf({ id: 'c', score: 20, pos: 2 })).toBe(1)
    expect(result.weightOf({ id: 'a', score: 10, pos: 4 })).toBe(1)
  })

  it('numbers rows within partitions', () => {
    const plan = rank(scan('orders'), { partitionBy: ['region'], orderBy: [{ column: 'amount' }], as: 'n' })

    const result = evaluate(select(plan, ['id', 'n']), read)

    expect(result.weightOf({ id: 1, n: 1 })).toBe(1)
    expect(result.weightOf({ id: 2, n: 2 })).toBe(1)
    expect(result.weightOf({ id: 3, n: 1 })).toBe(1)
    expect(result.weightOf({ id: 4, n: 2 })).toBe(1)
  })

  it('keeps the first rows of an ordered limit', () => {
    const plan = select(top(scan('orders'), [{ column: 'amount', direction: 'desc' }], 2), ['id'])
    expect(evaluate(plan, read).rows()).toEqual([{ id: 2 }, { id: 1 }])
  })
})
