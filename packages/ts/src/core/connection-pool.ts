import Database from 'better-sqlite3'
import { ConnectionPoolError } from './errors.js'
import { createModuleLogger } from './logger.js'
import type { SqliteDb } from './query-executor.js'

const log = createModuleLogger('pool')

export interface ConnectionPoolOptions {
  path: string
  readPoolSize?: number
  walMode?: boolean
}

/** Anything that hands out the writer and a reader connection. */
export interface ConnectionSource {
  acquireWriter(): SqliteDb
  acquireReader(): SqliteDb
}

const MEMORY_PATH = ':memory:'

function closeAllSilently(connections: (SqliteDb | null)[]): void {
  for (const conn of connections) {
    if (!conn) continue
    try {
      conn.close()
    } catch (err) {
      // The open failure is rethrown; this one is only logged.
      log.warn({ err }, 'failed to close connection during cleanup')
    }
  }
}

/**
 * One writer plus a round-robin set of read-only connections. In WAL mode
 * readers see the last committed state and never block the writer. An
 * in-memory database cannot be shared between connections, so there the
 * writer also serves reads.
 */
export class ConnectionPool implements ConnectionSource {
  private readonly writer: SqliteDb
  private readonly readers: SqliteDb[]
  private readerIndex = 0
  private closed = false

  constructor(options: ConnectionPoolOptions) {
    const { path, readPoolSize = 4, walMode = true } = options

    let writer: SqliteDb | null = null
    const readers: SqliteDb[] = []

    try {
      writer = new Database(path)
      if (walMode && path !== MEMORY_PATH) {
        writer.pragma('journal_mode = WAL')
      }
      writer.pragma('synchronous = NORMAL')

      if (path === MEMORY_PATH) {
        readers.push(writer)
      } else {
        const poolSize = Math.max(readPoolSize, 1)
        for (let i = 0; i < poolSize; i++) {
          readers.push(new Database(path, { readonly: true }))
        }
      }
    } catch (err) {
      closeAllSilently([...readers.filter(r => r !== writer), writer])
      throw err
    }

    this.writer = writer
    this.readers = readers
  }

  acquireReader(): SqliteDb {
    if (this.closed) {
      throw new ConnectionPoolError('Connection pool is closed')
    }
    const reader = this.readers[this.readerIndex % this.readers.length]
    this.readerIndex = (this.readerIndex + 1) % this.readers.length
    return reader
  }

  acquireWriter(): SqliteDb {
    if (this.closed) {
      throw new ConnectionPoolError('Connection pool is closed')
    }
    return this.writer
  }

  get readerCount(): number {
    return this.readers.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    const errors: unknown[] = []

    for (const reader of this.readers) {
      if (reader === this.writer) continue
      try {
        reader.close()
      } catch (err) {
        errors.push(err)
      }
    }

    try {
      this.writer.close()
    } catch (err) {
      errors.push(err)
    }

    if (errors.length > 0) {
      throw new ConnectionPoolError(`Failed to close ${errors.length} connection(s)`)
    }
  }
}

/** A single connection serving both roles. Handy for tests and embedding. */
export function singleConnection(db: SqliteDb): ConnectionSource {
  return {
    acquireWriter: () => db,
    acquireReader: () => db,
  }
}
