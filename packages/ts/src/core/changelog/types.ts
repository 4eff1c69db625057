export interface TableRow {
  table_id: string
  tracking: number
  head: number
  compacted_through: number
  compacted_committed_at: number
  last_committed_at: number
  created_at: number
  dropped_at: number | null
}

export interface ChangeRow {
  table_id: string
  seq: number
  operation: 'INSERT' | 'DELETE'
  is_update: number
  row_identity: string
  payload: string
  committed_at: number
  actor: string | null
}

/** Position bookkeeping for one table, as returned by {@link ChangeLogStore.tableInfo}. */
export interface TableLogInfo {
  tableId: string
  tracking: boolean
  head: number
  compactedThrough: number
  lastCommittedAt: number
  createdAt: number
}

export interface PurgeResult {
  removed: number
  compactedThrough: number
}
