import type { ChangeRecord } from '../types.js'

interface IdentityRun {
  first: ChangeRecord
  last: ChangeRecord
}

/**
 * Collapses a change sequence into its net effect per row identity, the way a
 * standard stream reports it: a row inserted and then deleted inside the
 * range disappears, a row changed several times shows up as one
 * DELETE/INSERT pair holding the state before the range and the state after
 * it. Output follows the position of each identity's last change.
 */
export function netChanges(records: Iterable<ChangeRecord>): ChangeRecord[] {
  const runs = new Map<string, IdentityRun>()

  for (const record of records) {
    const run = runs.get(record.rowIdentity)
    if (run) {
      run.last = record
      // Re-insert so iteration order follows the latest change.
      runs.delete(record.rowIdentity)
      runs.set(record.rowIdentity, run)
    } else {
      runs.set(record.rowIdentity, { first: record, last: record })
    }
  }

  const result: ChangeRecord[] = []
  for (const { first, last } of runs.values()) {
    const existedBefore = first.operation === 'DELETE'
    const existsAfter = last.operation === 'INSERT'

    if (existedBefore && existsAfter) {
      result.push({ ...first, isUpdate: true }, { ...last, isUpdate: true })
    } else if (existedBefore) {
      result.push({ ...first, isUpdate: false })
    } else if (existsAfter) {
      result.push({ ...last, isUpdate: false })
    }
  }
  return result
}
