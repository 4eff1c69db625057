import type { Row } from '../types.js'

export type Predicate = (row: Row) => boolean
export type Expression = (row: Row) => unknown

export type AggregateFunction = 'count' | 'sum' | 'min' | 'max' | 'avg'

export interface AggregateSpec {
  fn: AggregateFunction
  /** Input column. `count` without a column counts rows. */
  column?: string
  /** Output column name. */
  as: string
}

export interface OrderKey {
  column: string
  direction?: 'asc' | 'desc'
}

export interface ScanNode {
  kind: 'scan'
  tableId: string
}

export interface FilterNode {
  kind: 'filter'
  input: PlanNode
  predicate: Predicate
  /** False when the predicate reads the clock, randomness or other outside state. */
  deterministic: boolean
}

export interface ProjectNode {
  kind: 'project'
  input: PlanNode
  /** Output column to input column name, or to a computed expression. */
  columns: Record<string, string | Expression>
  deterministic: boolean
}

export interface JoinNode {
  kind: 'join'
  type: 'inner' | 'left'
  left: PlanNode
  right: PlanNode
  /** Pairs of equal columns, left first. */
  on: Array<[string, string]>
  /** When set, output columns become `prefix.column`. */
  leftPrefix?: string
  rightPrefix?: string
}

export interface AggregateNode {
  kind: 'aggregate'
  input: PlanNode
  groupBy: string[]
  aggregates: AggregateSpec[]
}

export interface WindowNode {
  kind: 'window'
  input: PlanNode
  fn: 'row_number' | 'rank'
  partitionBy: string[]
  orderBy: OrderKey[]
  as: string
}

export interface LimitNode {
  kind: 'limit'
  input: PlanNode
  orderBy: OrderKey[]
  limit: number
}

/** Operator tree of a materialization's defining query. */
export type PlanNode = ScanNode | FilterNode | ProjectNode | JoinNode | AggregateNode | WindowNode | LimitNode

/** How a plan can be refreshed. */
export type PlanClass = { kind: 'incremental' } | { kind: 'full'; reasons: string[] }

export function scan(tableId: string): ScanNode {
  return { kind: 'scan', tableId }
}

export function where(input: PlanNode, predicate: Predicate, options?: { deterministic?: boolean }): FilterNode {
  return { kind: 'filter', input, predicate, deterministic: options?.deterministic ?? true }
}

export function select(
  input: PlanNode,
  columns: Record<string, string | Expression> | string[],
  options?: { deterministic?: boolean },
): ProjectNode {
  const mapping = Array.isArray(columns) ? Object.fromEntries(columns.map(c => [c, c])) : columns
  return { kind: 'project', input, columns: mapping, deterministic: options?.deterministic ?? true }
}

export function join(
  left: PlanNode,
  right: PlanNode,
  on: Array<[string, string]>,
  options?: { type?: 'inner' | 'left'; leftPrefix?: string; rightPrefix?: string },
): JoinNode {
  return {
    kind: 'join',
    type: options?.type ?? 'inner',
    left,
    right,
    on,
    leftPrefix: options?.leftPrefix,
    rightPrefix: options?.rightPrefix,
  }
}

export function groupBy(input: PlanNode, keys: string[], aggregates: AggregateSpec[]): AggregateNode {
  return { kind: 'aggregate', input, groupBy: keys, aggregates }
}

export function rank(
  input: PlanNode,
  options: { fn?: 'row_number' | 'rank'; partitionBy?: string[]; orderBy: OrderKey[]; as: string },
): WindowNode {
  return {
    kind: 'window',
    input,
    fn: options.fn ?? 'row_number',
    partitionBy: options.partitionBy ?? [],
    orderBy: options.orderBy,
    as: options.as,
  }
}

export function top(input: PlanNode, orderBy: OrderKey[], limit: number): LimitNode {
  return { kind: 'limit', input, orderBy, limit }
}

/** Distinct source tables in the order they first appear. */
export function planSources(plan: PlanNode): string[] {
  const sources: string[] = []
  const visit = (node: PlanNode): void => {
    switch (node.kind) {
      case 'scan':
        if (!sources.includes(node.tableId)) sources.push(node.tableId)
        return
      case 'join':
        visit(node.left)
        visit(node.right)
        return
      default:
        visit(node.input)
    }
  }
  visit(plan)
  return sources
}

/**
 * Decides whether every operator in the plan can be maintained from deltas.
 * Selection, projection, inner equi-joins and count/sum/avg/min/max grouping
 * are delta-composable; outer joins, window functions, ordered limits and
 * non-deterministic expressions are not.
 */
export function classifyPlan(plan: PlanNode): PlanClass {
  const reasons: string[] = []
  const visit = (node: PlanNode): void => {
    switch (node.kind) {
      case 'scan':
        return
      case 'filter':
        if (!node.deterministic) reasons.push('non-deterministic filter predicate')
        visit(node.input)
        return
      case 'project':
        if (!node.deterministic) reasons.push('non-deterministic projection')
        visit(node.input)
        return
      case 'join':
        if (node.type !== 'inner') reasons.push(`${node.type} join`)
        if (node.on.length === 0) reasons.push('join without equality condition')
        visit(node.left)
        visit(node.right)
        return
      case 'aggregate':
        visit(node.input)
        return
      case 'window':
        reasons.push(`window function ${node.fn}`)
        visit(node.input)
        return
      case 'limit':
        reasons.push('ordered limit')
        visit(node.input)
        return
    }
  }
  visit(plan)
  return reasons.length === 0 ? { kind: 'incremental' } : { kind: 'full', reasons }
}
