import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { MigrationError } from '../errors.js'
import { createModuleLogger } from '../logger.js'
import { execute, queryAll, type SqliteDb } from '../query-executor.js'

const log = createModuleLogger('migrations')

export interface MigrationFile {
  version: number
  name: string
  sql: string
}

export interface MigrationResult {
  applied: MigrationFile[]
  skipped: number
}

const SCHEMA_MARKER = '001_change_log.sql'

/** `NNN_name.sql`; the numeric prefix is the version. */
const FILE_PATTERN = /^(\d+)_(\w+)\.sql$/

const CREATE_LEDGER = `CREATE TABLE IF NOT EXISTS _tidemark_migrations (
  version INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at REAL NOT NULL DEFAULT (unixepoch('subsec'))
)`

let schemaPath: string | null = null

/**
 * Directory of the bundled schema, found by walking up from this module, so it
 * resolves from the sources and from built output alike.
 */
export function schemaMigrationsPath(): string {
  if (schemaPath) return schemaPath

  for (let dir = dirname(fileURLToPath(import.meta.url)); ; dir = dirname(dir)) {
    const candidate = join(dir, 'migrations')
    if (existsSync(join(candidate, SCHEMA_MARKER))) {
      schemaPath = candidate
      return candidate
    }
    if (dirname(dir) === dir) {
      throw new MigrationError('Could not locate the tidemark schema migrations directory', 0)
    }
  }
}

function isDirectory(path: string): boolean | undefined {
  try {
    return statSync(path).isDirectory()
  } catch (err) {
    log.debug({ path, err }, 'migrations path not readable')
    return undefined
  }
}

/** Parses every migration file in `dir`, ordered by version. */
function readMigrations(dir: string): MigrationFile[] {
  const byVersion = new Map<number, { file: string; migration: MigrationFile }>()

  const files = readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort()
  for (const file of files) {
    const match = FILE_PATTERN.exec(file)
    if (!match) continue

    const version = Number(match[1])
    const clash = byVersion.get(version)
    if (clash) {
      throw new MigrationError(`Duplicate migration version ${version}: '${clash.file}' and '${file}'`, version)
    }

    const sql = readFileSync(join(dir, file), 'utf-8').trim()
    if (!sql) {
      throw new MigrationError(`Migration file is empty: ${file}`, version)
    }
    byVersion.set(version, { file, migration: { version, name: match[2], sql } })
  }

  return [...byVersion.values()].map(entry => entry.migration).sort((a, b) => a.version - b.version)
}

export const MigrationRunner = {
  /**
   * Applies the migrations in `migrationsPath` (default: the bundled schema)
   * that `_tidemark_migrations` has not recorded yet. All pending files run in
   * one transaction, so a failure leaves the database as it was.
   *
   * @throws {MigrationError} for a missing directory, duplicate versions, an
   *   empty file, or a failing statement.
   */
  run(db: SqliteDb, migrationsPath?: string): MigrationResult {
    const dir = resolve(migrationsPath ?? schemaMigrationsPath())
    const directory = isDirectory(dir)
    if (directory === undefined) {
      throw new MigrationError(`Migrations path does not exist: ${dir}`, 0)
    }
    if (!directory) {
      throw new MigrationError(`Migrations path is not a directory: ${dir}`, 0)
    }

    db.exec(CREATE_LEDGER)
    const migrations = readMigrations(dir)
    const done = new Set(
      queryAll<{ version: number }>(db, 'SELECT version FROM _tidemark_migrations').map(row => row.version),
    )
    const pending = migrations.filter(m => !done.has(m.version))
    if (pending.length === 0) {
      return { applied: [], skipped: migrations.length }
    }

    db.transaction(() => {
      for (const migration of pending) {
        try {
          db.exec(migration.sql)
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err)
          throw new MigrationError(
            `Migration ${migration.version}_${migration.name} failed: ${reason}`,
            migration.version,
          )
        }
        execute(db, 'INSERT INTO _tidemark_migrations (version, name) VALUES (?, ?)', migration.version, migration.name)
      }
    })()

    log.info({ dir, versions: pending.map(m => m.version) }, 'migrations applied')
    return { applied: pending, skipped: migrations.length - pending.length }
  },
}
