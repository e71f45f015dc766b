/**
 * Process entry: opens the SQLite store and runs the scan worker until
 * SIGINT/SIGTERM. Notification delivery is an external collaborator; this
 * entry only logs what would be sent.
 */
import createDebug from 'debug'
import { loadEnv } from './env'
import { createSqliteAdapter } from './sqlite-adapter'
import { createReminderScheduler } from './scheduler'
import type { NotificationDelivery } from './scheduler'
import { createScanWorker } from './worker'

const debug = createDebug('reminders:main')

const logDelivery: NotificationDelivery = async (occurrence) => {
  debug(
    'Notify employee %s: "%s" (occurrence %s at %s)',
    occurrence.reminder.employeeId,
    occurrence.reminder.text,
    occurrence.id,
    occurrence.timestamp,
  )
}

async function main(): Promise<void> {
  const env = loadEnv()
  const adapter = await createSqliteAdapter(env.REMINDERS_DB_PATH)
  const scheduler = createReminderScheduler({ adapter })
  const worker = createScanWorker({ scheduler, rule: env.REMINDERS_SCAN_RULE, deliver: logDelivery })

  worker.start()

  const shutdown = (signal: string) => {
    debug('Received %s, shutting down', signal)
    worker.stop()
    scheduler.close().then(
      () => process.exit(0),
      (err: unknown) => {
        debug('Close failed: %O', err)
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err: unknown) => {
  debug('Reminder worker startup failed: %O', err)
  process.exit(1)
})
