import type { Row } from '../types.js'
import type { AggregateSpec, FilterNode, JoinNode, OrderKey, ProjectNode } from './plan.js'
import { rowKey, ZSet } from './zset.js'

/** Orders nulls first, numbers numerically and everything else as strings. */
export function compareValues(a: unknown, b: unknown): number {
  if (a == null && b == null) return 0
  if (a == null) return -1
  if (b == null) return 1
  if (typeof a === 'number' && typeof b === 'number') return a - b
  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

export function compareRows(a: Row, b: Row, orderBy: OrderKey[]): number {
  for (const { column, direction } of orderBy) {
    const order = compareValues(a[column], b[column])
    if (order !== 0) return direction === 'desc' ? -order : order
  }
  return 0
}

export function filterSet(input: ZSet, node: FilterNode): ZSet {
  const result = new ZSet()
  for (const [row, weight] of input) {
    if (node.predicate(row)) result.add(row, weight)
  }
  return result
}

export function projectRow(row: Row, columns: ProjectNode['columns']): Row {
  const projected: Row = {}
  for (const [name, source] of Object.entries(columns)) {
    projected[name] = typeof source === 'string' ? (row[source] ?? null) : source(row)
  }
  return projected
}

export function projectSet(input: ZSet, node: ProjectNode): ZSet {
  const result = new ZSet()
  for (const [row, weight] of input) {
    result.add(projectRow(row, node.columns), weight)
  }
  return result
}

/** Join key of a row, or undefined when a key column is null (null never matches). */
export function joinKeyOf(row: Row, columns: string[]): string | undefined {
  const values: unknown[] = []
  for (const column of columns) {
    const value = row[column]
    if (value == null) return undefined
    values.push(value)
  }
  return JSON.stringify(values)
}

function prefixed(row: Row, prefix: string | undefined): Row {
  if (!prefix) return row
  return Object.fromEntries(Object.entries(row).map(([key, value]) => [`${prefix}.${key}`, value]))
}

export function combineRows(left: Row, right: Row | undefined, node: JoinNode): Row {
  const combined = prefixed(left, node.leftPrefix)
  return right ? { ...combined, ...prefixed(right, node.rightPrefix) } : combined
}

/** Index of a Z-set by join key. Rows with a null key are left out. */
export type JoinIndex = Map<string, ZSet>

export function indexBy(input: ZSet, columns: string[], into: JoinIndex = new Map()): JoinIndex {
  for (const [row, weight] of input) {
    const key = joinKeyOf(row, columns)
    if (key === undefined) continue
    let bucket = into.get(key)
    if (!bucket) {
      bucket = new ZSet()
      into.set(key, bucket)
    }
    bucket.add(row, weight)
    if (bucket.isEmpty()) into.delete(key)
  }
  return into
}

/** Inner equi-join of a left Z-set against an indexed right side. Weights multiply. */
export function joinAgainst(left: ZSet, rightIndex: JoinIndex, node: JoinNode): ZSet {
  const leftColumns = node.on.map(([l]) => l)
  const result = new ZSet()
  for (const [leftRow, leftWeight] of left) {
    const key = joinKeyOf(leftRow, leftColumns)
    if (key === undefined) continue
    const matches = rightIndex.get(key)
    if (!matches) continue
    for (const [rightRow, rightWeight] of matches) {
      result.add(combineRows(leftRow, rightRow, node), leftWeight * rightWeight)
    }
  }
  return result
}

/** Inner equi-join of an indexed left side against a right Z-set. */
export function joinIndexed(leftIndex: JoinIndex, right: ZSet, node: JoinNode): ZSet {
  const rightColumns = node.on.map(([, r]) => r)
  const result = new ZSet()
  for (const [rightRow, rightWeight] of right) {
    const key = joinKeyOf(rightRow, rightColumns)
    if (key === undefined) continue
    const matches = leftIndex.get(key)
    if (!matches) continue
    for (const [leftRow, leftWeight] of matches) {
      result.add(combineRows(leftRow, rightRow, node), leftWeight * rightWeight)
    }
  }
  return result
}

export function groupKeyOf(row: Row, groupBy: string[]): string {
  return JSON.stringify(groupBy.map(column => row[column] ?? null))
}

export function groupValues(row: Row, groupBy: string[]): Row {
  return Object.fromEntries(groupBy.map(column => [column, row[column] ?? null]))
}

/**
 * Running state of one aggregation group. Counts and sums are adjusted in
 * place; min and max keep the multiset of contributing values and are
 * recomputed when the current extreme is retracted.
 */
export class GroupState {
  count = 0
  private readonly sums: number[]
  private readonly nonNull: number[]
  private readonly values: Array<Map<string, { value: unknown; weight: number }> | undefined>
  private readonly extremes: unknown[]

  constructor(
    readonly key: Row,
    private readonly aggregates: AggregateSpec[],
  ) {
    this.sums = aggregates.map(() => 0)
    this.nonNull = aggregates.map(() => 0)
    this.values = aggregates.map(spec => (spec.fn === 'min' || spec.fn === 'max' ? new Map() : undefined))
    this.extremes = aggregates.map(() => null)
  }

  add(row: Row, weight: number): void {
    this.count += weight
    this.aggregates.forEach((spec, i) => {
      if (spec.column === undefined) return
      const value = row[spec.column]
      if (value == null) return

      this.nonNull[i] += weight
      if (spec.fn === 'sum' || spec.fn === 'avg') {
        this.sums[i] += Number(value) * weight
      }

      const tracked = this.values[i]
      if (!tracked) return
      const valueKey = JSON.stringify(value)
      const entry = tracked.get(valueKey)
      const next = (entry?.weight ?? 0) + weight
      if (next <= 0) {
        tracked.delete(valueKey)
      } else {
        tracked.set(valueKey, { value, weight: next })
      }

      if (weight > 0) {
        const current = this.extremes[i]
        const better = spec.fn === 'min' ? compareValues(value, current) < 0 : compareValues(value, current) > 0
        if (current == null || better) this.extremes[i] = value
      } else if (compareValues(value, this.extremes[i]) === 0 && next <= 0) {
        this.extremes[i] = this.recompute(spec, tracked)
      }
    })
  }

  result(): Row {
    const row: Row = { ...this.key }
    this.aggregates.forEach((spec, i) => {
      switch (spec.fn) {
        case 'count':
          row[spec.as] = spec.column === undefined ? this.count : this.nonNull[i]
          break
        case 'sum':
          row[spec.as] = this.nonNull[i] > 0 ? this.sums[i] : null
          break
        case 'avg':
          row[spec.as] = this.nonNull[i] > 0 ? this.sums[i] / this.nonNull[i] : null
          break
        case 'min':
        case 'max':
          row[spec.as] = this.extremes[i] ?? null
          break
      }
    })
    return row
  }

  private recompute(spec: AggregateSpec, tracked: Map<string, { value: unknown; weight: number }>): unknown {
    let extreme: unknown = null
    for (const { value } of tracked.values()) {
      const better = spec.fn === 'min' ? compareValues(value, extreme) < 0 : compareValues(value, extreme) > 0
      if (extreme == null || better) extreme = value
    }
    return extreme
  }
}

/** Deterministic order for rows that compare equal on the sort keys. */
export function tieBreak(a: Row, b: Row): number {
  const left = rowKey(a)
  const right = rowKey(b)
  return left < right ? -1 : left > right ? 1 : 0
}
