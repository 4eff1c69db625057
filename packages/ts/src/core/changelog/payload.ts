import { InvalidRowError } from '../errors.js'
import type { Row } from '../types.js'

/**
 * JSON text stored for a row payload.
 *
 * @throws {InvalidRowError} for values JSON cannot encode, such as a bigint
 *   or a circular reference.
 */
export function serializeRow(tableId: string, rowIdentity: string, row: Row): string {
  try {
    return JSON.stringify(row)
  } catch (err) {
    throw new InvalidRowError(tableId, rowIdentity, err instanceof Error ? err.message : String(err))
  }
}
