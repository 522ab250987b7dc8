import type { Pool, PoolClient } from 'pg'
import type { MessageDirection, StoredMessage, UserContextAggregate } from '../context/types.js'
import { PersistenceError, StaleContextError } from '../errors.js'
import { AggregateStateSchema, MessageAnalysisSchema } from '../types/schemas.js'
import { safeError } from '../utils/safe-log.js'
import { emptySummary, type ContextStore, type ConversationSummary } from './context-store.js'
import { getPool } from './database.js'

interface AggregateDbRow {
  total_messages: number
  state: unknown
}

interface MessageDbRow {
  user_id: string
  seq: number
  direction: string
  content: string
  analysis: unknown
  sent_at: Date | string
}

interface SummaryDbRow {
  total_messages: number
  first_at: Date | string | null
  last_at: Date | string | null
}

function toIso(value: Date | string): string {
  const parsed = value instanceof Date ? value : new Date(value)
  if (Number.isNaN(parsed.getTime())) throw new PersistenceError(`Unreadable timestamp in store: ${String(value)}`)
  return parsed.toISOString()
}

function toDirection(value: string): MessageDirection {
  if (value === 'incoming' || value === 'outgoing') return value
  throw new PersistenceError(`Unknown message direction in store: ${value}`)
}

function toStoredMessage(row: MessageDbRow): StoredMessage {
  const analysis = MessageAnalysisSchema.safeParse(row.analysis)
  if (!analysis.success) {
    throw new PersistenceError(`Stored analysis for ${row.user_id}#${row.seq} is corrupt`, analysis.error)
  }
  return {
    userId: row.user_id,
    seq: Number(row.seq),
    direction: toDirection(row.direction),
    text: row.content,
    timestamp: toIso(row.sent_at),
    analysis: analysis.data,
  }
}

/**
 * Postgres-backed ContextStore.
 *
 * The aggregate row and the message log are written in one transaction, under
 * an advisory lock keyed on the user, and only when the stored message count
 * is exactly one behind the incoming seq. A writer holding an outdated
 * aggregate (another process got there first) is rejected instead of
 * overwriting newer state.
 */
export class PgContextStore implements ContextStore {
  constructor(private readonly getDbPool: () => Pool = getPool) {}

  async load(userId: string): Promise<UserContextAggregate | null> {
    let rows: AggregateDbRow[]
    try {
      const result = await this.getDbPool().query<AggregateDbRow>(
        `SELECT total_messages, state
         FROM user_context_aggregates
         WHERE user_id = $1`,
        [userId],
      )
      rows = result.rows
    } catch (err) {
      throw new PersistenceError(`Failed to load context for ${userId}`, err)
    }

    if (rows.length === 0) return null

    const parsed = AggregateStateSchema.safeParse(rows[0].state)
    if (!parsed.success) {
      throw new PersistenceError(`Stored context for ${userId} is corrupt`, parsed.error)
    }
    if (parsed.data.userId !== userId || parsed.data.totalMessages !== Number(rows[0].total_messages)) {
      throw new PersistenceError(`Stored context for ${userId} does not match its row`)
    }
    return parsed.data
  }

  async commit(aggregate: UserContextAggregate, message: StoredMessage): Promise<void> {
    if (message.userId !== aggregate.userId || aggregate.totalMessages !== message.seq) {
      throw new PersistenceError(
        `Refusing to commit ${message.userId}#${message.seq} with aggregate ${aggregate.userId}@${aggregate.totalMessages}`,
      )
    }

    let client: PoolClient
    try {
      client = await this.getDbPool().connect()
    } catch (err) {
      throw new PersistenceError(`Failed to acquire a connection for ${aggregate.userId}`, err)
    }

    try {
      await client.query('BEGIN')
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`context:${aggregate.userId}`])
      await client.query(
        `INSERT INTO conversations (user_id)
         VALUES ($1)
         ON CONFLICT (user_id) DO UPDATE SET updated_at = NOW()`,
        [aggregate.userId],
      )

      const { rows } = await client.query<{ total_messages: number }>(
        `SELECT total_messages FROM user_context_aggregates WHERE user_id = $1`,
        [aggregate.userId],
      )
      const stored = rows.length > 0 ? Number(rows[0].total_messages) : 0
      if (stored !== message.seq - 1) {
        throw new StaleContextError(
          `Stale context for ${aggregate.userId}: store has ${stored} messages, commit carries seq ${message.seq}`,
        )
      }

      await this.append(client, message)
      await this.save(client, aggregate)
      await client.query('COMMIT')
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        console.error('[store] Rollback failed:', safeError(rollbackErr))
      })
      if (err instanceof PersistenceError) throw err
      throw new PersistenceError(`Failed to commit message ${message.seq} for ${aggregate.userId}`, err)
    } finally {
      client.release()
    }
  }

  async history(userId: string, limit: number): Promise<StoredMessage[]> {
    if (limit <= 0) return []

    let rows: MessageDbRow[]
    try {
      const result = await this.getDbPool().query<MessageDbRow>(
        `SELECT user_id, seq, direction, content, analysis, sent_at
         FROM messages
         WHERE user_id = $1
         ORDER BY seq DESC
         LIMIT $2`,
        [userId, limit],
      )
      rows = result.rows
    } catch (err) {
      throw new PersistenceError(`Failed to load history for ${userId}`, err)
    }

    return rows.map(toStoredMessage).reverse()
  }

  async summary(userId: string): Promise<ConversationSummary> {
    let row: SummaryDbRow | undefined
    try {
      const result = await this.getDbPool().query<SummaryDbRow>(
        `SELECT COUNT(*)::int AS total_messages, MIN(sent_at) AS first_at, MAX(sent_at) AS last_at
         FROM messages
         WHERE user_id = $1`,
        [userId],
      )
      row = result.rows[0]
    } catch (err) {
      throw new PersistenceError(`Failed to summarize ${userId}`, err)
    }

    const total = Number(row?.total_messages ?? 0)
    if (!row || total === 0) return emptySummary(userId)
    return {
      userId,
      totalConversations: 1,
      totalMessages: total,
      firstMessageAt: row.first_at ? toIso(row.first_at) : null,
      lastMessageAt: row.last_at ? toIso(row.last_at) : null,
    }
  }

  private async append(client: PoolClient, message: StoredMessage): Promise<void> {
    await client.query(
      `INSERT INTO messages (user_id, seq, direction, content, analysis, sent_at)
       VALUES ($1, $2, $3, $4, $5::jsonb, $6)`,
      [
        message.userId,
        message.seq,
        message.direction,
        message.text,
        JSON.stringify(message.analysis),
        message.timestamp,
      ],
    )
  }

  private async save(client: PoolClient, aggregate: UserContextAggregate): Promise<void> {
    await client.query(
      `INSERT INTO user_context_aggregates (user_id, total_messages, state, updated_at)
       VALUES ($1, $2, $3::jsonb, NOW())
       ON CONFLICT (user_id) DO UPDATE SET
         total_messages = EXCLUDED.total_messages,
         state = EXCLUDED.state,
         updated_at = EXCLUDED.updated_at`,
      [aggregate.userId, aggregate.totalMessages, JSON.stringify(aggregate)],
    )
  }
}
