import { CycleDetectedError, MaterializationExistsError, MaterializationNotFoundError } from '../errors.js'

interface GraphNode {
  id: string
  /** True while a materialization with this id is registered. */
  isSpec: boolean
  upstream: number[]
  downstream: number[]
}

/** Frozen view of the graph, taken once per scheduler tick. */
export interface GraphSnapshot {
  /** Registered materializations, upstream before downstream. */
  readonly order: readonly string[]
  upstreamOf(id: string): readonly string[]
  downstreamOf(id: string): readonly string[]
}

/**
 * Dependencies between materializations and the tables they read. Nodes live
 * in an arena and edges are arena indices. Every insertion is checked for
 * cycles, so the graph is a DAG at all times.
 *
 * A node stays in the arena after its materialization is dropped, keeping
 * the edges of dependents that still read it.
 */
export class DependencyGraph {
  private readonly nodes: GraphNode[] = []
  private readonly index = new Map<string, number>()

  /**
   * Adds a materialization reading `sources`.
   *
   * @throws {CycleDetectedError} if a source already depends on `targetId`,
   *   or `targetId` is among its own sources. The error carries the cycle.
   */
  addSpec(targetId: string, sources: string[]): void {
    const existing = this.index.get(targetId)
    if (existing !== undefined && this.nodes[existing].isSpec) {
      throw new MaterializationExistsError(targetId)
    }
    if (sources.includes(targetId)) {
      throw new CycleDetectedError([targetId, targetId])
    }
    for (const source of sources) {
      const path = this.findPath(targetId, source)
      if (path) {
        throw new CycleDetectedError([...path, targetId])
      }
    }

    const targetIndex = this.ensureNode(targetId)
    const node = this.nodes[targetIndex]
    node.isSpec = true
    for (const source of new Set(sources)) {
      const sourceIndex = this.ensureNode(source)
      node.upstream.push(sourceIndex)
      this.nodes[sourceIndex].downstream.push(targetIndex)
    }
  }

  /**
   * Removes a materialization's own edges. Returns the registered
   * materializations that read it directly.
   */
  removeSpec(targetId: string): string[] {
    const targetIndex = this.index.get(targetId)
    if (targetIndex === undefined || !this.nodes[targetIndex].isSpec) {
      throw new MaterializationNotFoundError(targetId)
    }
    const node = this.nodes[targetIndex]
    for (const upstream of node.upstream) {
      const downstream = this.nodes[upstream].downstream
      downstream.splice(downstream.indexOf(targetIndex), 1)
    }
    node.upstream = []
    node.isSpec = false
    return this.downstreamOf(targetId)
  }

  hasSpec(id: string): boolean {
    const i = this.index.get(id)
    return i !== undefined && this.nodes[i].isSpec
  }

  /** Direct inputs of a node. */
  upstreamOf(id: string): string[] {
    const i = this.index.get(id)
    return i === undefined ? [] : this.nodes[i].upstream.map(j => this.nodes[j].id)
  }

  /** Registered materializations that read a node directly. */
  downstreamOf(id: string): string[] {
    const i = this.index.get(id)
    if (i === undefined) return []
    return this.nodes[i].downstream.filter(j => this.nodes[j].isSpec).map(j => this.nodes[j].id)
  }

  /** True when data written to `from` can reach `to`. */
  hasPathTo(from: string, to: string): boolean {
    return this.findPath(from, to) !== null
  }

  /**
   * Registered materializations in dependency order (Kahn's algorithm). Among
   * nodes that are ready at the same time, the one registered first comes
   * first.
   */
  topologicalOrder(): string[] {
    const pending = this.nodes.map(node => node.upstream.length)
    const ready: number[] = []
    pending.forEach((count, i) => {
      if (count === 0) ready.push(i)
    })

    const order: string[] = []
    while (ready.length > 0) {
      ready.sort((a, b) => a - b)
      const i = ready.shift()
      if (i === undefined) break
      const node = this.nodes[i]
      if (node.isSpec) order.push(node.id)
      for (const j of node.downstream) {
        pending[j] -= 1
        if (pending[j] === 0) ready.push(j)
      }
    }
    return order
  }

  snapshot(): GraphSnapshot {
    const order = Object.freeze(this.topologicalOrder())
    const upstream = new Map<string, readonly string[]>()
    const downstream = new Map<string, readonly string[]>()
    for (const node of this.nodes) {
      upstream.set(node.id, Object.freeze(this.upstreamOf(node.id)))
      downstream.set(node.id, Object.freeze(this.downstreamOf(node.id)))
    }
    return {
      order,
      upstreamOf: id => upstream.get(id) ?? [],
      downstreamOf: id => downstream.get(id) ?? [],
    }
  }

  private ensureNode(id: string): number {
    const existing = this.index.get(id)
    if (existing !== undefined) return existing
    this.nodes.push({ id, isSpec: false, upstream: [], downstream: [] })
    this.index.set(id, this.nodes.length - 1)
    return this.nodes.length - 1
  }

  /** Depth-first search along data flow. Returns the node ids from `from` to `to`. */
  private findPath(from: string, to: string): string[] | null {
    const start = this.index.get(from)
    const goal = this.index.get(to)
    if (start === undefined || goal === undefined) return null

    const visited = new Set<number>()
    const path: number[] = []
    const visit = (i: number): boolean => {
      if (visited.has(i)) return false
      visited.add(i)
      path.push(i)
      if (i === goal) return true
      for (const j of this.nodes[i].downstream) {
        if (visit(j)) return true
      }
      path.pop()
      return false
    }

    return visit(start) ? path.map(i => this.nodes[i].id) : null
  }
}
