import { UnsupportedIncrementalPlanError } from '../errors.js'
import type { Row } from '../types.js'
import {
  filterSet,
  GroupState,
  groupKeyOf,
  groupValues,
  indexBy,
  joinAgainst,
  joinIndexed,
  type JoinIndex,
  projectSet,
} from './operators.js'
import { type AggregateNode, classifyPlan, type JoinNode, type PlanNode } from './plan.js'
import { ZSet } from './zset.js'

/** Deltas per source table for one step. Tables without changes may be absent. */
export type SourceDeltas = ReadonlyMap<string, ZSet>

interface Operator {
  step(deltas: SourceDeltas): ZSet
}

const EMPTY = new ZSet()

class ScanOperator implements Operator {
  constructor(private readonly tableId: string) {}

  step(deltas: SourceDeltas): ZSet {
    return deltas.get(this.tableId) ?? EMPTY
  }
}

class MapOperator implements Operator {
  constructor(
    private readonly input: Operator,
    private readonly apply: (delta: ZSet) => ZSet,
  ) {}

  step(deltas: SourceDeltas): ZSet {
    return this.apply(this.input.step(deltas))
  }
}

/**
 * Bilinear join: Δ(L ⋈ R) = ΔL ⋈ R + L ⋈ ΔR + ΔL ⋈ ΔR, with L and R the
 * states before this step. Both sides are kept integrated and indexed by
 * their join columns.
 */
class JoinOperator implements Operator {
  private readonly leftState: JoinIndex = new Map()
  private readonly rightState: JoinIndex = new Map()
  private readonly leftColumns: string[]
  private readonly rightColumns: string[]

  constructor(
    private readonly node: JoinNode,
    private readonly left: Operator,
    private readonly right: Operator,
  ) {
    this.leftColumns = node.on.map(([l]) => l)
    this.rightColumns = node.on.map(([, r]) => r)
  }

  step(deltas: SourceDeltas): ZSet {
    const leftDelta = this.left.step(deltas)
    const rightDelta = this.right.step(deltas)

    const result = joinAgainst(leftDelta, this.rightState, this.node)
      .merge(joinIndexed(this.leftState, rightDelta, this.node))
      .merge(joinAgainst(leftDelta, indexBy(rightDelta, this.rightColumns), this.node))

    indexBy(leftDelta, this.leftColumns, this.leftState)
    indexBy(rightDelta, this.rightColumns, this.rightState)
    return result
  }
}

/**
 * Keeps one {@link GroupState} per group and emits, for every group a step
 * touched, the retraction of its previous output row and its new one.
 */
class AggregateOperator implements Operator {
  private readonly groups = new Map<string, GroupState>()
  private readonly emitted = new Map<string, Row>()
  private primed = false

  constructor(
    private readonly node: AggregateNode,
    private readonly input: Operator,
  ) {}

  step(deltas: SourceDeltas): ZSet {
    const delta = this.input.step(deltas)
    const global = this.node.groupBy.length === 0
    const touched = new Set<string>()

    if (!this.primed && global) {
      this.groups.set('[]', new GroupState({}, this.node.aggregates))
      touched.add('[]')
    }
    this.primed = true

    for (const [row, weight] of delta) {
      const key = groupKeyOf(row, this.node.groupBy)
      let state = this.groups.get(key)
      if (!state) {
        state = new GroupState(groupValues(row, this.node.groupBy), this.node.aggregates)
        this.groups.set(key, state)
      }
      state.add(row, weight)
      touched.add(key)
    }

    const result = new ZSet()
    for (const key of touched) {
      const state = this.groups.get(key)
      if (!state) continue

      const previous = this.emitted.get(key)
      if (previous) result.add(previous, -1)

      if (!global && state.count <= 0) {
        this.groups.delete(key)
        this.emitted.delete(key)
        continue
      }
      const next = state.result()
      result.add(next, 1)
      this.emitted.set(key, next)
    }
    return result
  }
}

function build(node: PlanNode, targetId: string): Operator {
  switch (node.kind) {
    case 'scan':
      return new ScanOperator(node.tableId)
    case 'filter':
      return new MapOperator(build(node.input, targetId), delta => filterSet(delta, node))
    case 'project':
      return new MapOperator(build(node.input, targetId), delta => projectSet(delta, node))
    case 'join':
      return new JoinOperator(node, build(node.left, targetId), build(node.right, targetId))
    case 'aggregate':
      return new AggregateOperator(node, build(node.input, targetId))
    case 'window':
    case 'limit':
      throw new UnsupportedIncrementalPlanError(targetId, [`${node.kind} operator`])
  }
}

/**
 * Stateful dataflow for a delta-composable plan. Each {@link step} takes the
 * source deltas since the previous step and returns the change to the
 * result. Starting from an empty state, stepping with the full source
 * contents yields the full result.
 */
export class IncrementalCircuit {
  private readonly root: Operator

  /** @throws {UnsupportedIncrementalPlanError} if the plan is not delta-composable. */
  constructor(
    readonly plan: PlanNode,
    targetId = 'plan',
  ) {
    const planClass = classifyPlan(plan)
    if (planClass.kind === 'full') {
      throw new UnsupportedIncrementalPlanError(targetId, planClass.reasons)
    }
    this.root = build(plan, targetId)
  }

  step(deltas: SourceDeltas): ZSet {
    return this.root.step(deltas)
  }
}
