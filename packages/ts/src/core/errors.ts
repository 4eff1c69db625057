/**
 * Base class for all tidemark errors. Extend this class to create
 * domain-specific errors that carry a machine-readable {@link code}.
 */
export class TidemarkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message)
    this.name = 'TidemarkError'
  }
}

/**
 * Thrown when a change is appended to, or read from, a table that does not
 * have change tracking enabled.
 */
export class UntrackedTableError extends TidemarkError {
  constructor(public readonly tableId: string) {
    super(`Change tracking is not enabled for table '${tableId}'`, 'UNTRACKED_TABLE')
    this.name = 'UntrackedTableError'
  }
}

/**
 * Thrown when a requested range starts before the earliest retained change.
 * The caller must re-baseline; the history it asked for no longer exists.
 */
export class RangeCompactedError extends TidemarkError {
  constructor(
    public readonly tableId: string,
    public readonly requested: number,
    public readonly compactedThrough: number,
  ) {
    super(
      `Changes for table '${tableId}' after position ${requested} are no longer retained (compacted through ${compactedThrough})`,
      'RANGE_COMPACTED',
    )
    this.name = 'RangeCompactedError'
  }
}

/**
 * Thrown when a cursor fell behind the compaction floor and was marked stale.
 * Recreate or rebaseline the cursor to continue.
 */
export class CursorExpiredError extends TidemarkError {
  constructor(public readonly cursorId: string) {
    super(`Cursor '${cursorId}' is stale; its unconsumed changes are past the retention window`, 'CURSOR_EXPIRED')
    this.name = 'CursorExpiredError'
  }
}

export class InvalidRetentionError extends TidemarkError {
  constructor(windowMs: number, maxMs: number) {
    super(`Retention window ${windowMs}ms is outside the allowed range 0..${maxMs}ms`, 'INVALID_RETENTION')
    this.name = 'InvalidRetentionError'
  }
}

/**
 * Thrown when a materialization is read before its first refresh completed.
 * Run a manual refresh to initialize it.
 */
export class NotInitializedError extends TidemarkError {
  constructor(public readonly targetId: string) {
    super(`Materialization '${targetId}' has not been initialized`, 'NOT_INITIALIZED')
    this.name = 'NotInitializedError'
  }
}

/**
 * Thrown when registering a materialization would make it depend on itself.
 * {@link cyclePath} lists the nodes of the cycle, starting and ending with the
 * new target.
 */
export class CycleDetectedError extends TidemarkError {
  constructor(public readonly cyclePath: string[]) {
    super(
      cyclePath.length === 2 && cyclePath[0] === cyclePath[1]
        ? `Materialization '${cyclePath[0]}' cannot read from itself`
        : `Dependency cycle detected: ${cyclePath.join(' -> ')}`,
      'CYCLE_DETECTED',
    )
    this.name = 'CycleDetectedError'
  }
}

export class UnsupportedIncrementalPlanError extends TidemarkError {
  constructor(
    public readonly targetId: string,
    public readonly reasons: string[],
  ) {
    super(
      `Materialization '${targetId}' cannot be refreshed incrementally: ${reasons.join('; ')}`,
      'UNSUPPORTED_INCREMENTAL_PLAN',
    )
    this.name = 'UnsupportedIncrementalPlanError'
  }
}

/**
 * Wraps a failure that did not originate in tidemark itself, such as a
 * storage I/O error. {@link retryable} tells the caller whether trying again
 * can succeed.
 */
export class TransientFailure extends TidemarkError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly originalError?: unknown,
  ) {
    super(message, retryable ? 'TRANSIENT_FAILURE' : 'TERMINAL_FAILURE')
    this.name = 'TransientFailure'
  }
}

export class TableNotFoundError extends TidemarkError {
  constructor(tableId: string) {
    super(`Table '${tableId}' not found`, 'TABLE_NOT_FOUND')
    this.name = 'TableNotFoundError'
  }
}

export class TableAlreadyExistsError extends TidemarkError {
  constructor(tableId: string) {
    super(`Table '${tableId}' already exists`, 'TABLE_ALREADY_EXISTS')
    this.name = 'TableAlreadyExistsError'
  }
}

export class RowNotFoundError extends TidemarkError {
  constructor(tableId: string, rowIdentity: string) {
    super(`Row '${rowIdentity}' not found in table '${tableId}'`, 'ROW_NOT_FOUND')
    this.name = 'RowNotFoundError'
  }
}

export class DuplicateRowError extends TidemarkError {
  constructor(tableId: string, rowIdentity: string) {
    super(`Row '${rowIdentity}' already exists in table '${tableId}'`, 'DUPLICATE_ROW')
    this.name = 'DuplicateRowError'
  }
}

export class InvalidRowError extends TidemarkError {
  constructor(tableId: string, rowIdentity: string, reason: string) {
    super(`Row '${rowIdentity}' for table '${tableId}' cannot be stored as JSON: ${reason}`, 'INVALID_ROW')
    this.name = 'InvalidRowError'
  }
}

export class CursorNotFoundError extends TidemarkError {
  constructor(cursorId: string) {
    super(`Cursor '${cursorId}' not found`, 'CURSOR_NOT_FOUND')
    this.name = 'CursorNotFoundError'
  }
}

export class CursorAlreadyExistsError extends TidemarkError {
  constructor(cursorId: string) {
    super(`Cursor '${cursorId}' already exists`, 'CURSOR_ALREADY_EXISTS')
    this.name = 'CursorAlreadyExistsError'
  }
}

/**
 * Thrown when a position is moved backwards or past the head of the log.
 */
export class InvalidPositionError extends TidemarkError {
  constructor(message: string) {
    super(message, 'INVALID_POSITION')
    this.name = 'InvalidPositionError'
  }
}

export class MaterializationNotFoundError extends TidemarkError {
  constructor(targetId: string) {
    super(`Materialization '${targetId}' not found`, 'MATERIALIZATION_NOT_FOUND')
    this.name = 'MaterializationNotFoundError'
  }
}

export class MaterializationExistsError extends TidemarkError {
  constructor(targetId: string) {
    super(`Materialization '${targetId}' already exists`, 'MATERIALIZATION_EXISTS')
    this.name = 'MaterializationExistsError'
  }
}

export class MaterializationSuspendedError extends TidemarkError {
  constructor(targetId: string) {
    super(`Materialization '${targetId}' is suspended`, 'MATERIALIZATION_SUSPENDED')
    this.name = 'MaterializationSuspendedError'
  }
}

export class RefreshCancelledError extends TidemarkError {
  constructor(targetId: string) {
    super(`Refresh of '${targetId}' was cancelled`, 'REFRESH_CANCELLED')
    this.name = 'RefreshCancelledError'
  }
}

export class RefreshTimeoutError extends TidemarkError {
  constructor(targetId: string, budgetMs: number) {
    super(`Refresh of '${targetId}' exceeded its ${budgetMs}ms budget`, 'REFRESH_TIMEOUT')
    this.name = 'RefreshTimeoutError'
  }
}

/**
 * Thrown when a before-hook explicitly rejects an operation. The optional
 * `reason` string is surfaced in the message so callers can distinguish
 * between different hook policies.
 */
export class HookDeniedError extends TidemarkError {
  constructor(hookName: string, reason?: string) {
    super(
      reason ? `Hook '${hookName}' denied the operation: ${reason}` : `Hook '${hookName}' denied the operation`,
      'HOOK_DENIED',
    )
    this.name = 'HookDeniedError'
  }
}

/**
 * Thrown when a schema migration step fails. The {@link version} property
 * identifies which schema version triggered the error.
 */
export class MigrationError extends TidemarkError {
  constructor(
    message: string,
    public readonly version: number,
  ) {
    super(message, 'MIGRATION_ERROR')
    this.name = 'MigrationError'
  }
}

export class ConnectionPoolError extends TidemarkError {
  constructor(message: string) {
    super(message, 'CONNECTION_POOL_ERROR')
    this.name = 'ConnectionPoolError'
  }
}

export class InvalidOptionsError extends TidemarkError {
  constructor(message: string) {
    super(message, 'INVALID_OPTIONS')
    this.name = 'InvalidOptionsError'
  }
}

const RETRYABLE_SQLITE_CODES = /^SQLITE_(BUSY|LOCKED|IOERR)/

function driverCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  const code = err.code
  return typeof code === 'string' ? code : undefined
}

/**
 * Classifies any thrown value. Tidemark errors pass through unchanged;
 * everything else becomes a {@link TransientFailure}, retryable when the
 * driver reports contention or an I/O error.
 */
export function toTidemarkError(err: unknown): TidemarkError {
  if (err instanceof TidemarkError) return err

  const message = err instanceof Error ? err.message : String(err)
  const code = driverCode(err)
  const retryable = code !== undefined && RETRYABLE_SQLITE_CODES.test(code)
  return new TransientFailure(message, retryable, err)
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientFailure && err.retryable
}

export interface ErrorDescription {
  code: string
  message: string
  retryable: boolean
}

const USER_MESSAGES: Record<string, string> = {
  UNTRACKED_TABLE: 'Change tracking must be enabled on the table before streams or dynamic tables can read it.',
  RANGE_COMPACTED: 'The requested change history is older than the retention period and has been purged.',
  CURSOR_EXPIRED: 'The stream has become stale. Recreate it to resume reading changes from now.',
  INVALID_RETENTION: 'The retention period exceeds the maximum allowed for this edition.',
  NOT_INITIALIZED: 'The dynamic table has not been refreshed yet. Run a manual refresh to populate it.',
  CYCLE_DETECTED: 'The dynamic table definition would create a circular dependency.',
  UNSUPPORTED_INCREMENTAL_PLAN: 'The query cannot be refreshed incrementally. Use REFRESH_MODE = FULL or AUTO.',
  TRANSIENT_FAILURE: 'A temporary storage failure occurred. The operation can be retried.',
}

/**
 * Translates an error into the message a DDL front-end shows to its users.
 * The technical detail of the underlying error is appended after the
 * user-facing sentence.
 */
export function describeError(err: unknown): ErrorDescription {
  const classified = toTidemarkError(err)
  const summary = USER_MESSAGES[classified.code]
  return {
    code: classified.code,
    message: summary ? `${summary} (${classified.message})` : classified.message,
    retryable: isRetryable(classified),
  }
}
