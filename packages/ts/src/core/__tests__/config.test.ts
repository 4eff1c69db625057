import { describe, expect, it } from 'vitest'
import { EDITION_MAX_RETENTION_MS, resolveOptions, systemClock } from '../config.js'
import { InvalidOptionsError } from '../errors.js'

describe('resolveOptions', () => {
  it('applies defaults', () => {
    const resolved = resolveOptions()

    expect(resolved.edition).toBe('standard')
    expect(resolved.maxRetentionMs).toBe(86_400_000)
    expect(resolved.defaultRetentionMs).toBe(86_400_000)
    expect(resolved.pageSize).toBe(500)
    expect(resolved.readPoolSize).toBe(4)
    expect(resolved.walMode).toBe(true)
    expect(resolved.dataExtensionMs).toBe(0)
    expect(resolved.clock).toBe(systemClock)
    expect(resolved.refresh).toEqual({ timeoutMs: 0, maxRetries: 2, retryDelayMs: 100, maxConcurrency: 4 })
  })

  it('raises the retention ceiling for the enterprise edition', () => {
    expect(resolveOptions({ edition: 'enterprise' }).maxRetentionMs).toBe(EDITION_MAX_RETENTION_MS.enterprise)
    expect(EDITION_MAX_RETENTION_MS.enterprise).toBe(90 * 86_400_000)
  })

  it('keeps explicit values', () => {
    const resolved = resolveOptions({ pageSize: 10, refresh: { maxRetries: 0 } })
    expect(resolved.pageSize).toBe(10)
    expect(resolved.refresh.maxRetries).toBe(0)
    expect(resolved.refresh.retryDelayMs).toBe(100)
  })

  it('rejects out-of-range numbers', () => {
    expect(() => resolveOptions({ pageSize: 0 })).toThrow(InvalidOptionsError)
    expect(() => resolveOptions({ readPoolSize: 1.5 })).toThrow(InvalidOptionsError)
    expect(() => resolveOptions({ refresh: { maxConcurrency: 0 } })).toThrow(
      "Option 'refresh.maxConcurrency' must be an integer >= 1, got 0",
    )
  })

  it('rejects a default retention above the ceiling', () => {
    expect(() => resolveOptions({ maxRetentionMs: 1000, defaultRetentionMs: 2000 })).toThrow(InvalidOptionsError)
  })
})
