/**
 * Schema migration runner for the conversation store.
 * Every statement in runMigrations() uses IF NOT EXISTS, so re-running is a no-op.
 *
 * Usage: npm run migrate
 */
import 'dotenv/config'
import { loadConfig } from './config.js'
import { closeDatabase, initDatabase, runMigrations } from './store/database.js'
import { safeError } from './utils/safe-log.js'

const { databaseUrl } = loadConfig()
if (!databaseUrl) {
    console.error('[migrate] DATABASE_URL is not set; nothing to migrate')
    process.exit(1)
}

initDatabase(databaseUrl)

try {
    await runMigrations()
    console.log('[migrate] Schema is up to date')
} catch (err) {
    console.error('[migrate] Migration failed:', safeError(err))
    process.exitCode = 1
} finally {
    await closeDatabase()
}
