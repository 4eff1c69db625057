import type { Row } from '../types.js'
import {
  combineRows,
  compareRows,
  compareValues,
  filterSet,
  groupKeyOf,
  groupValues,
  indexBy,
  joinAgainst,
  joinKeyOf,
  projectSet,
  tieBreak,
} from './operators.js'
import type { AggregateNode, AggregateSpec, JoinNode, LimitNode, PlanNode, WindowNode } from './plan.js'
import { ZSet } from './zset.js'

/** Current contents of a source table as rows with multiplicities. */
export type SourceReader = (tableId: string) => Iterable<[Row, number]>

/** Computes the complete result of a plan from the current source contents. */
export function evaluate(plan: PlanNode, read: SourceReader): ZSet {
  switch (plan.kind) {
    case 'scan':
      return ZSet.from(read(plan.tableId))
    case 'filter':
      return filterSet(evaluate(plan.input, read), plan)
    case 'project':
      return projectSet(evaluate(plan.input, read), plan)
    case 'join':
      return evaluateJoin(plan, evaluate(plan.left, read), evaluate(plan.right, read))
    case 'aggregate':
      return evaluateAggregate(plan, evaluate(plan.input, read))
    case 'window':
      return evaluateWindow(plan, evaluate(plan.input, read))
    case 'limit':
      return evaluateLimit(plan, evaluate(plan.input, read))
  }
}

function evaluateJoin(node: JoinNode, left: ZSet, right: ZSet): ZSet {
  const rightIndex = indexBy(
    right,
    node.on.map(([, r]) => r),
  )
  const result = joinAgainst(left, rightIndex, node)
  if (node.type === 'left') {
    const leftColumns = node.on.map(([l]) => l)
    for (const [row, weight] of left) {
      const key = joinKeyOf(row, leftColumns)
      if (key === undefined || !rightIndex.has(key)) {
        result.add(combineRows(row, undefined, node), weight)
      }
    }
  }
  return result
}

function computeAggregate(spec: AggregateSpec, rows: Array<[Row, number]>): unknown {
  const { column } = spec
  const values: Array<[unknown, number]> = []
  for (const [row, weight] of rows) {
    if (column === undefined) {
      values.push([null, weight])
    } else if (row[column] != null) {
      values.push([row[column], weight])
    }
  }
  const count = values.reduce((total, [, weight]) => total + weight, 0)

  switch (spec.fn) {
    case 'count':
      return count
    case 'sum':
      return count > 0 ? values.reduce((total, [value, weight]) => total + Number(value) * weight, 0) : null
    case 'avg':
      return count > 0 ? values.reduce((total, [value, weight]) => total + Number(value) * weight, 0) / count : null
    case 'min':
    case 'max': {
      let extreme: unknown = null
      for (const [value, weight] of values) {
        if (weight <= 0) continue
        const order = compareValues(value, extreme)
        if (extreme == null || (spec.fn === 'min' ? order < 0 : order > 0)) extreme = value
      }
      return extreme
    }
  }
}

/**
 * Groups rows and computes each aggregate. Without grouping columns the
 * result is always exactly one row, even over an empty input.
 */
function evaluateAggregate(node: AggregateNode, input: ZSet): ZSet {
  const groups = new Map<string, { key: Row; rows: Array<[Row, number]> }>()
  if (node.groupBy.length === 0) {
    groups.set('[]', { key: {}, rows: [] })
  }
  for (const [row, weight] of input) {
    const key = groupKeyOf(row, node.groupBy)
    const group = groups.get(key)
    if (group) {
      group.rows.push([row, weight])
    } else {
      groups.set(key, { key: groupValues(row, node.groupBy), rows: [[row, weight]] })
    }
  }

  const result = new ZSet()
  for (const group of groups.values()) {
    const size = group.rows.reduce((total, [, weight]) => total + weight, 0)
    if (node.groupBy.length > 0 && size <= 0) continue
    const row: Row = { ...group.key }
    for (const spec of node.aggregates) {
      row[spec.as] = computeAggregate(spec, group.rows)
    }
    result.add(row, 1)
  }
  return result
}

function sortedRows(input: ZSet, orderBy: WindowNode['orderBy']): Row[] {
  return input.rows().sort((a, b) => compareRows(a, b, orderBy) || tieBreak(a, b))
}

function evaluateWindow(node: WindowNode, input: ZSet): ZSet {
  const partitions = new Map<string, Row[]>()
  for (const row of sortedRows(input, node.orderBy)) {
    const key = groupKeyOf(row, node.partitionBy)
    const partition = partitions.get(key)
    if (partition) {
      partition.push(row)
    } else {
      partitions.set(key, [row])
    }
  }

  const result = new ZSet()
  for (const rows of partitions.values()) {
    let rank = 0
    rows.forEach((row, i) => {
      if (node.fn === 'row_number' || i === 0 || compareRows(rows[i - 1], row, node.orderBy) !== 0) {
        rank = i + 1
      }
      result.add({ ...row, [node.as]: rank }, 1)
    })
  }
  return result
}

function evaluateLimit(node: LimitNode, input: ZSet): ZSet {
  return ZSet.ofRows(sortedRows(input, node.orderBy).slice(0, node.limit))
}
