import { startCronJob } from '../cron.js'
import type { CompactionResult, ScheduleOptions } from '../types.js'
import type { RetentionManager } from './manager.js'

export interface CompactionScheduleOptions extends ScheduleOptions {
  /** Receives the results of every sweep. */
  onCompacted?: (results: CompactionResult[]) => void
}

/** Background compaction sweep over all tracked tables. */
export class RetentionScheduler {
  constructor(private readonly manager: RetentionManager) {}

  /** Returns a cancel function that stops the sweep. */
  schedule(options: CompactionScheduleOptions): () => void {
    return startCronJob(
      'compaction',
      options.cron,
      () => {
        const results = this.manager.compactAll()
        options.onCompacted?.(results)
      },
      options.onError,
    )
  }
}
