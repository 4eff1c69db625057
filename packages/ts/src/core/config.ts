import { InvalidOptionsError } from './errors.js'
import type { Clock, Edition, HookConfig, MetricsConfig, TidemarkOptions } from './types.js'

const DAY_MS = 86_400_000

/** Retention ceiling per edition: one day on standard, ninety on enterprise. */
export const EDITION_MAX_RETENTION_MS: Record<Edition, number> = {
  standard: DAY_MS,
  enterprise: 90 * DAY_MS,
}

export const DEFAULT_RETENTION_MS = DAY_MS
export const DEFAULT_PAGE_SIZE = 500

export const systemClock: Clock = {
  now: () => Date.now(),
}

export interface ResolvedOptions {
  readPoolSize: number
  walMode: boolean
  clock: Clock
  pageSize: number
  edition: Edition
  maxRetentionMs: number
  defaultRetentionMs: number
  dataExtensionMs: number
  refresh: {
    timeoutMs: number
    maxRetries: number
    retryDelayMs: number
    maxConcurrency: number
  }
  hooks?: HookConfig
  metrics?: MetricsConfig
}

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidOptionsError(`Option '${name}' must be an integer >= ${min}, got ${value}`)
  }
}

/**
 * Applies defaults to user options and validates every numeric setting.
 *
 * @throws {InvalidOptionsError} when a value is out of range, or when the
 *   default retention exceeds the retention ceiling.
 */
export function resolveOptions(options?: TidemarkOptions): ResolvedOptions {
  const edition = options?.edition ?? 'standard'
  if (!(edition in EDITION_MAX_RETENTION_MS)) {
    throw new InvalidOptionsError(`Unknown edition '${edition}'`)
  }

  const resolved: ResolvedOptions = {
    readPoolSize: options?.readPoolSize ?? 4,
    walMode: options?.walMode ?? true,
    clock: options?.clock ?? systemClock,
    pageSize: options?.pageSize ?? DEFAULT_PAGE_SIZE,
    edition,
    maxRetentionMs: options?.maxRetentionMs ?? EDITION_MAX_RETENTION_MS[edition],
    defaultRetentionMs: options?.defaultRetentionMs ?? DEFAULT_RETENTION_MS,
    dataExtensionMs: options?.dataExtensionMs ?? 0,
    refresh: {
      timeoutMs: options?.refresh?.timeoutMs ?? 0,
      maxRetries: options?.refresh?.maxRetries ?? 2,
      retryDelayMs: options?.refresh?.retryDelayMs ?? 100,
      maxConcurrency: options?.refresh?.maxConcurrency ?? 4,
    },
    hooks: options?.hooks,
    metrics: options?.metrics,
  }

  assertInteger('readPoolSize', resolved.readPoolSize, 1)
  assertInteger('pageSize', resolved.pageSize, 1)
  assertInteger('maxRetentionMs', resolved.maxRetentionMs, 0)
  assertInteger('defaultRetentionMs', resolved.defaultRetentionMs, 0)
  assertInteger('dataExtensionMs', resolved.dataExtensionMs, 0)
  assertInteger('refresh.timeoutMs', resolved.refresh.timeoutMs, 0)
  assertInteger('refresh.maxRetries', resolved.refresh.maxRetries, 0)
  assertInteger('refresh.retryDelayMs', resolved.refresh.retryDelayMs, 0)
  assertInteger('refresh.maxConcurrency', resolved.refresh.maxConcurrency, 1)

  if (resolved.defaultRetentionMs > resolved.maxRetentionMs) {
    throw new InvalidOptionsError(
      `Option 'defaultRetentionMs' (${resolved.defaultRetentionMs}) exceeds the retention ceiling (${resolved.maxRetentionMs})`,
    )
  }

  return resolved
}
