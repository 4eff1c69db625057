import type { Row } from '../types.js'

/**
 * Stable identity of a row's content: JSON with the top-level keys sorted, so
 * `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` are the same row.
 */
export function rowKey(row: Row): string {
  const sorted: Row = {}
  for (const key of Object.keys(row).sort()) {
    sorted[key] = row[key]
  }
  return JSON.stringify(sorted)
}

interface Entry {
  row: Row
  weight: number
}

/**
 * A multiset of rows with signed multiplicities. Positive weights are rows
 * present, negative weights are rows retracted; a delta and a table are the
 * same kind of value. Entries whose weight reaches zero are dropped.
 */
export class ZSet implements Iterable<[Row, number]> {
  private readonly entries = new Map<string, Entry>()

  static from(rows: Iterable<[Row, number]>): ZSet {
    const set = new ZSet()
    for (const [row, weight] of rows) {
      set.add(row, weight)
    }
    return set
  }

  static ofRows(rows: Iterable<Row>): ZSet {
    const set = new ZSet()
    for (const row of rows) {
      set.add(row, 1)
    }
    return set
  }

  add(row: Row, weight: number): this {
    if (weight === 0) return this
    const key = rowKey(row)
    const entry = this.entries.get(key)
    if (!entry) {
      this.entries.set(key, { row, weight })
    } else if (entry.weight + weight === 0) {
      this.entries.delete(key)
    } else {
      entry.weight += weight
    }
    return this
  }

  /** Adds every entry of `other` into this set. */
  merge(other: ZSet): this {
    for (const [row, weight] of other) {
      this.add(row, weight)
    }
    return this
  }

  negate(): ZSet {
    const result = new ZSet()
    for (const [row, weight] of this) {
      result.add(row, -weight)
    }
    return result
  }

  /** `this - other`. */
  minus(other: ZSet): ZSet {
    return ZSet.from(this).merge(other.negate())
  }

  weightOf(row: Row): number {
    return this.entries.get(rowKey(row))?.weight ?? 0
  }

  get size(): number {
    return this.entries.size
  }

  isEmpty(): boolean {
    return this.entries.size === 0
  }

  /** Rows with positive weight, each repeated by its weight. */
  rows(): Row[] {
    const result: Row[] = []
    for (const { row, weight } of this.entries.values()) {
      for (let i = 0; i < weight; i++) {
        result.push(row)
      }
    }
    return result
  }

  toArray(): Array<[Row, number]> {
    return [...this]
  }

  *[Symbol.iterator](): Iterator<[Row, number]> {
    for (const { row, weight } of this.entries.values()) {
      yield [row, weight]
    }
  }
}
