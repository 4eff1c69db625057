export { netChanges } from './changelog/net.js'
export { matchesFilter } from './changelog/filter.js'
export { ChangeLogStore, type ChangeLogStoreOptions } from './changelog/store.js'
export type { PurgeResult, TableLogInfo } from './changelog/types.js'
export {
  DEFAULT_PAGE_SIZE,
  DEFAULT_RETENTION_MS,
  EDITION_MAX_RETENTION_MS,
  type ResolvedOptions,
  resolveOptions,
  systemClock,
} from './config.js'
export { ConnectionPool, type ConnectionPoolOptions, type ConnectionSource, singleConnection } from './connection-pool.js'
export { startCronJob } from './cron.js'
export { CursorManager, type CursorManagerOptions, type ListCursorsOptions } from './cursors/manager.js'
export { type OpenOptions, Tidemark } from './engine.js'
export {
  ConnectionPoolError,
  CursorAlreadyExistsError,
  CursorExpiredError,
  CursorNotFoundError,
  CycleDetectedError,
  describeError,
  DuplicateRowError,
  type ErrorDescription,
  HookDeniedError,
  InvalidOptionsError,
  InvalidPositionError,
  InvalidRetentionError,
  InvalidRowError,
  isRetryable,
  MaterializationExistsError,
  MaterializationNotFoundError,
  MaterializationSuspendedError,
  MigrationError,
  NotInitializedError,
  RangeCompactedError,
  RefreshCancelledError,
  RefreshTimeoutError,
  RowNotFoundError,
  TableAlreadyExistsError,
  TableNotFoundError,
  TidemarkError,
  toTidemarkError,
  TransientFailure,
  UnsupportedIncrementalPlanError,
  UntrackedTableError,
} from './errors.js'
export { HookRegistry } from './hooks/registry.js'
export type { HookDispose, HookEvent, HookEventContextMap, HookHandler } from './hooks/types.js'
export { createModuleLogger, type Logger, logger } from './logger.js'
export { evaluate, type SourceReader } from './materialize/evaluate.js'
export { IncrementalCircuit, type SourceDeltas } from './materialize/incremental.js'
export {
  type MaterializationDefinition,
  Materializer,
  type MaterializerOptions,
  ownedCursorId,
  type RefreshCallOptions,
  type StalenessOptions,
} from './materialize/materializer.js'
export {
  type AggregateFunction,
  type AggregateNode,
  type AggregateSpec,
  classifyPlan,
  type Expression,
  type FilterNode,
  groupBy,
  join,
  type JoinNode,
  type LimitNode,
  type OrderKey,
  type PlanClass,
  type PlanNode,
  planSources,
  type Predicate,
  type ProjectNode,
  rank,
  scan,
  type ScanNode,
  select,
  top,
  where,
  type WindowNode,
} from './materialize/plan.js'
export { rowKey, ZSet } from './materialize/zset.js'
export { MetricsCollector } from './metrics/collector.js'
export { type MigrationFile, type MigrationResult, MigrationRunner, schemaMigrationsPath } from './migrations/runner.js'
export { RetentionManager, type RetentionManagerOptions } from './retention/manager.js'
export { type CompactionScheduleOptions, RetentionScheduler } from './retention/scheduler.js'
export { type RetryInfo, type RetryOptions, withRetry } from './retry.js'
export { DependencyGraph, type GraphSnapshot } from './scheduler/graph.js'
export { createLimiter, type Limiter } from './scheduler/limiter.js'
export { RefreshScheduler, type RefreshSchedulerOptions, type TickScheduleOptions } from './scheduler/scheduler.js'
export {
  type CreateTableOptions,
  type DeltaSummary,
  type RowDelta,
  type TableEntry,
  TableStore,
} from './tables/table-store.js'
export type * from './types.js'
