import type { Row, RowFilter } from '../types.js'

/** True when every column named in `filter` holds exactly the given value. */
export function matchesFilter(row: Row, filter: RowFilter): boolean {
  for (const [key, value] of Object.entries(filter)) {
    if (row[key] !== value) {
      return false
    }
  }
  return true
}

/** Serialized form stored alongside a cursor; `null` for no filter. */
export function serializeFilter(filter: RowFilter | undefined): string | null {
  if (!filter || Object.keys(filter).length === 0) return null
  return JSON.stringify(filter)
}

export function parseFilter(raw: string | null): RowFilter | undefined {
  if (raw === null) return undefined
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined
  return Object.fromEntries(Object.entries(parsed))
}
