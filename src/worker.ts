/**
 * Scan worker: on every tick of a cron rule, materializes due occurrences and
 * dispatches their notifications. A failed tick is logged and the next tick
 * starts over; ticks never overlap.
 */
import createDebug from 'debug'
import schedule from 'node-schedule'
import type { DispatchReport, NotificationDelivery, ReminderScheduler } from './scheduler'
import type { MaterializeReport } from './scanner'
import { ValidationError } from './errors'

const debug = createDebug('reminders:worker')

const JOB_NAME = 'reminders-scan'

type Job = ReturnType<typeof schedule.scheduleJob>

export type ScanWorkerOptions = {
  scheduler: ReminderScheduler
  /** Cron expression, e.g. '* * * * *' */
  rule: string
  deliver: NotificationDelivery
}

export type TickReport = {
  materialized: MaterializeReport
  dispatched: DispatchReport
}

export type ScanWorker = {
  runOnce(): Promise<TickReport>
  start(): void
  stop(): void
  isRunning(): boolean
}

export function createScanWorker(options: ScanWorkerOptions): ScanWorker {
  const { scheduler, rule, deliver } = options
  let job: Job | null = null
  let inFlight: Promise<TickReport> | null = null

  async function runOnce(): Promise<TickReport> {
    const materialized = await scheduler.materializeDueOccurrences()
    const dispatched = await scheduler.dispatchNotifications(deliver)
    return { materialized, dispatched }
  }

  function tick(): void {
    if (inFlight) {
      debug('Previous scan still running; skipping tick')
      return
    }
    inFlight = runOnce()
    void inFlight
      .then((report) => {
        debug(
          'Tick: %d created, %d duplicate, %d skipped, %d notified, %d failed',
          report.materialized.created.length,
          report.materialized.duplicates.length,
          report.materialized.skipped.length,
          report.dispatched.notified.length,
          report.dispatched.failed.length,
        )
      })
      .catch((err: unknown) => {
        debug('Scan failed; retrying on next tick: %O', err)
      })
      .finally(() => {
        inFlight = null
      })
  }

  return {
    runOnce,

    start() {
      if (job) return
      job = schedule.scheduleJob(JOB_NAME, rule, tick)
      if (!job) throw new ValidationError(`Could not schedule scan with rule '${rule}'`)
      debug('Scan worker started (%s)', rule)
    },

    stop() {
      if (!job) return
      job.cancel()
      job = null
      debug('Scan worker stopped')
    },

    isRunning() {
      return job !== null
    },
  }
}
