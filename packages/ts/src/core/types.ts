/** A row payload: column name to value. Values must be JSON-serializable. */
export type Row = Record<string, unknown>

/** Row-level change operation. An update is a DELETE followed by an INSERT. */
export type ChangeOperation = 'INSERT' | 'DELETE'

/** DEFAULT surfaces every operation; APPEND_ONLY surfaces inserts only. */
export type CursorMode = 'DEFAULT' | 'APPEND_ONLY'

/** Column-equality predicate evaluated against a change record's row. */
export type RowFilter = Record<string, unknown>

/** Source of wall-clock time in milliseconds. Injected so tests control time. */
export interface Clock {
  now(): number
}

/** One immutable row-level delta in a table's change log. */
export interface ChangeRecord<T = Row> {
  tableId: string
  seq: number
  operation: ChangeOperation
  isUpdate: boolean
  rowIdentity: string
  row: T
  committedAt: number
  actor?: string
}

/** Input for appending a single change. */
export interface ChangeInput {
  operation: ChangeOperation
  row: Row
  rowIdentity: string
  isUpdate?: boolean
}

/** Caller identity attached to audited operations. */
export interface AuditContext {
  actor?: string
}

export interface ReadOptions {
  mode?: CursorMode
  filter?: RowFilter
  /** Only return changes committed at or before this timestamp. */
  until?: number
}

export type CursorState = 'ACTIVE' | 'STALE'

/** A point in a table's history. */
export type HistoryPoint = { position: number } | { timestamp: number }

export interface CreateCursorOptions {
  mode?: CursorMode
  filter?: RowFilter
  /** Start somewhere other than the current head. */
  at?: HistoryPoint
  /** Materialization that owns this cursor, if any. */
  owner?: string
}

/** Introspection view of a cursor (SHOW STREAMS). */
export interface CursorInfo {
  cursorId: string
  tableId: string
  mode: CursorMode
  position: number
  filter?: RowFilter
  state: CursorState
  /** Timestamp at which {@link position} was last set. */
  offsetAt: number
  createdAt: number
  owner?: string
}

export interface PeekOptions {
  /** Inclusive upper bound position. Defaults to the head at call time. */
  end?: number
  /** Inclusive upper bound commit timestamp. */
  until?: number
}

export interface ChangesOptions extends ReadOptions {
  /** Lower bound of the query: a position, a timestamp or another cursor. */
  at?: HistoryPoint | { cursor: string }
  end?: number
}

export interface RetentionWindow {
  tableId: string
  windowMs: number
  effectiveAt: number
  /** True when no explicit window was set and the default applies. */
  isDefault: boolean
}

export interface CompactionResult {
  tableId: string
  removed: number
  compactedThrough: number
  staleCursors: string[]
}

export type Edition = 'standard' | 'enterprise'

/** Maximum staleness in milliseconds, or refresh only when a dependent needs it. */
export type TargetLag = number | 'DOWNSTREAM'

export type RefreshMode = 'AUTO' | 'FULL' | 'INCREMENTAL'

export type InitializeMode = 'ON_CREATE' | 'ON_SCHEDULE'

export type SchedulingState = 'ACTIVE' | 'SUSPENDED'

export type MaterializationStatus = 'UNINITIALIZED' | 'INITIALIZING' | 'FRESH' | 'STALE' | 'REFRESHING' | 'SUSPENDED'

export type RefreshStrategyKind = 'FULL' | 'INCREMENTAL'

/** Introspection view of a materialization (SHOW DYNAMIC TABLES). */
export interface MaterializationInfo {
  targetId: string
  sources: string[]
  targetLag: TargetLag
  refreshMode: RefreshMode
  initialize: InitializeMode
  state: SchedulingState
  status: MaterializationStatus
  lastRefreshedAt?: number
  lastStrategy?: RefreshStrategyKind
  lastError?: string
  rowCount: number
}

export interface RefreshResult {
  targetId: string
  strategy: RefreshStrategyKind
  inserted: number
  deleted: number
  durationMs: number
  refreshedAt: number
}

export interface TickReport {
  startedAt: number
  refreshed: RefreshResult[]
  failed: Array<{ targetId: string; error: Error }>
  skipped: string[]
}

/** Context passed to append hooks. */
export interface AppendHookContext extends AuditContext {
  tableId: string
  operation: ChangeOperation
  rowIdentity: string
  isUpdate: boolean
}

/** Context passed to advance hooks. */
export interface AdvanceHookContext extends AuditContext {
  cursorId: string
  tableId: string
  from: number
  to: number
}

/** Hook invoked before a change is appended. Throw to deny. */
export type BeforeAppendHook = (ctx: AppendHookContext) => void

/** Hook invoked after a change is appended. */
export type AfterAppendHook = (ctx: AppendHookContext & { seq: number; committedAt: number }) => void

/** Hook invoked before a cursor is advanced. Throw to deny. */
export type BeforeAdvanceHook = (ctx: AdvanceHookContext) => void

/** Hook invoked after a cursor is advanced. */
export type AfterAdvanceHook = (ctx: AdvanceHookContext) => void

/** Hook invoked after a materialization refresh commits. */
export type AfterRefreshHook = (result: RefreshResult) => void

/** Hook invoked after a compaction pass over one table. */
export type AfterCompactHook = (result: CompactionResult) => void

/** Aggregated hook configuration. */
export interface HookConfig {
  onBeforeAppend?: BeforeAppendHook | BeforeAppendHook[]
  onAppend?: AfterAppendHook | AfterAppendHook[]
  onBeforeAdvance?: BeforeAdvanceHook | BeforeAdvanceHook[]
  onAdvance?: AfterAdvanceHook | AfterAdvanceHook[]
  onRefresh?: AfterRefreshHook | AfterRefreshHook[]
  onCompact?: AfterCompactHook | AfterCompactHook[]
}

/** Metrics emitted after records are appended. */
export interface AppendMetrics {
  tableId: string
  records: number
  durationMs: number
}

/** Metrics emitted after a cursor advances. */
export interface AdvanceMetrics {
  cursorId: string
  tableId: string
  consumed: number
}

/** Metrics emitted after a refresh attempt. */
export interface RefreshMetrics {
  targetId: string
  strategy?: RefreshStrategyKind
  durationMs: number
  rowsChanged?: number
  error?: boolean
}

/** Metrics emitted after a table is compacted. */
export interface CompactionMetrics {
  tableId: string
  removed: number
  staleCursors: number
}

/** Callbacks for metrics collection. */
export interface MetricsConfig {
  onAppend?: (metrics: AppendMetrics) => void
  onAdvance?: (metrics: AdvanceMetrics) => void
  onRefresh?: (metrics: RefreshMetrics) => void
  onCompaction?: (metrics: CompactionMetrics) => void
}

export interface RefreshOptions {
  /** Budget per refresh in milliseconds. 0 = unlimited. Default: 0. */
  timeoutMs?: number
  /** Retries for retryable failures. Default: 2. */
  maxRetries?: number
  /** Base backoff delay in milliseconds. Default: 100. */
  retryDelayMs?: number
  /** Refreshes running at once during a scheduler tick. Default: 4. */
  maxConcurrency?: number
}

/** Top-level options for a tidemark instance. */
export interface TidemarkOptions {
  /** Number of read connections in the pool. Default: 4. */
  readPoolSize?: number
  /** Enable WAL mode. Default: true. */
  walMode?: boolean
  clock?: Clock
  /** Records fetched per page by lazy log reads. Default: 500. */
  pageSize?: number
  /** Determines the retention ceiling. Default: 'standard' (1 day). */
  edition?: Edition
  /** Overrides the edition's retention ceiling. */
  maxRetentionMs?: number
  /** Retention for tables without an explicit window. Default: 1 day. */
  defaultRetentionMs?: number
  /** Extra time a lagging cursor protects history before going stale. Default: 0. */
  dataExtensionMs?: number
  refresh?: RefreshOptions
  hooks?: HookConfig
  metrics?: MetricsConfig
}

/** Options for a recurring job driven by a cron expression. */
export interface ScheduleOptions {
  /** Cron expression (e.g., '*\/5 * * * *' for every five minutes). */
  cron: string
  /** Receives errors from scheduled runs. Without it they are logged. */
  onError?: (error: Error) => void
}
