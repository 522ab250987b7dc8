/**
 * Postgres connection pool and schema.
 */

import { Pool } from 'pg'

let pool: Pool | null = null

export function initDatabase(databaseUrl: string): void {
  // sslmode in the URL overrides the ssl option below in surprising ways; SSL is set explicitly instead.
  const cleanUrl = databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

  pool = new Pool({
    connectionString: cleanUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    ssl: process.env.NODE_ENV === 'production'
      ? {
        ca: process.env.DATABASE_CA_CERT
          ? Buffer.from(process.env.DATABASE_CA_CERT, 'base64').toString()
          : undefined,
        rejectUnauthorized: !!process.env.DATABASE_CA_CERT,
      }
      : false,
  })

  pool.on('error', (err: Error) => {
    console.error('[DB] Idle client error:', err.message)
  })
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

/**
 * Apply the schema. Every statement uses IF NOT EXISTS, so this is safe to run
 * on every startup.
 */
export async function runMigrations(): Promise<void> {
  const p = getPool()
  await p.query(`
    CREATE TABLE IF NOT EXISTS conversations (
      user_id     TEXT PRIMARY KEY,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  await p.query(`
    CREATE TABLE IF NOT EXISTS messages (
      id          BIGSERIAL PRIMARY KEY,
      user_id     TEXT NOT NULL REFERENCES conversations(user_id) ON DELETE CASCADE,
      seq         INTEGER NOT NULL,
      direction   TEXT NOT NULL CHECK (direction IN ('incoming', 'outgoing')),
      content     TEXT NOT NULL,
      analysis    JSONB NOT NULL,
      sent_at     TIMESTAMPTZ NOT NULL,
      UNIQUE (user_id, seq)
    )
  `)
  await p.query(`CREATE INDEX IF NOT EXISTS idx_messages_user_sent ON messages(user_id, sent_at)`)
  await p.query(`
    CREATE TABLE IF NOT EXISTS user_context_aggregates (
      user_id         TEXT PRIMARY KEY REFERENCES conversations(user_id) ON DELETE CASCADE,
      total_messages  INTEGER NOT NULL,
      state           JSONB NOT NULL,
      updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  console.log('[DB] Migrations complete')
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}
