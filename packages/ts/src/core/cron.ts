import { Cron } from 'croner'
import { InvalidOptionsError, toTidemarkError } from './errors.js'
import { createModuleLogger } from './logger.js'

const log = createModuleLogger('cron')

/**
 * Runs `task` on a cron expression. The timer is unreferenced so it never
 * keeps the process alive, and runs do not overlap: a tick that fires while
 * the previous run is still going is skipped.
 *
 * Failures go to `onError` when provided and are logged otherwise. Returns a
 * cancel function that stops the job immediately.
 *
 * @throws {InvalidOptionsError} if the cron expression cannot be parsed.
 */
export function startCronJob(
  name: string,
  cronExpr: string,
  task: () => unknown,
  onError?: (error: Error) => void,
): () => void {
  const report = (err: unknown) => {
    const error = toTidemarkError(err)
    if (onError) {
      onError(error)
    } else {
      log.error({ err: error, job: name }, 'scheduled job failed')
    }
  }

  let job: Cron
  try {
    job = new Cron(cronExpr, { unref: true, protect: true }, async () => {
      try {
        await task()
      } catch (err) {
        report(err)
      }
    })
  } catch (err) {
    throw new InvalidOptionsError(
      `Invalid cron expression '${cronExpr}': ${err instanceof Error ? err.message : String(err)}`,
    )
  }

  log.debug({ job: name, cron: cronExpr }, 'job scheduled')
  return () => {
    job.stop()
  }
}
