import type { StoredMessage, UserContextAggregate } from '../context/types.js'
import { PersistenceError, StaleContextError } from '../errors.js'
import { emptySummary, type ContextStore, type ConversationSummary } from './context-store.js'

interface UserRecord {
  aggregate: UserContextAggregate
  messages: StoredMessage[]
}

/**
 * Process-memory ContextStore. Used when no DATABASE_URL is configured and in
 * tests. Values are cloned on the way in and out so callers cannot reach the
 * stored state.
 */
export class MemoryContextStore implements ContextStore {
  private readonly users = new Map<string, UserRecord>()

  async load(userId: string): Promise<UserContextAggregate | null> {
    const record = this.users.get(userId)
    return record ? structuredClone(record.aggregate) : null
  }

  async commit(aggregate: UserContextAggregate, message: StoredMessage): Promise<void> {
    const record = this.users.get(aggregate.userId)
    const stored = record?.messages.length ?? 0
    if (message.userId !== aggregate.userId || aggregate.totalMessages !== message.seq) {
      throw new PersistenceError(
        `Refusing to commit ${message.userId}#${message.seq} with aggregate ${aggregate.userId}@${aggregate.totalMessages}`,
      )
    }
    if (message.seq !== stored + 1) {
      throw new StaleContextError(
        `Stale aggregate for ${aggregate.userId}: stored=${stored} seq=${message.seq} total=${aggregate.totalMessages}`,
      )
    }

    this.users.set(aggregate.userId, {
      aggregate: structuredClone(aggregate),
      messages: [...(record?.messages ?? []), structuredClone(message)],
    })
  }

  async history(userId: string, limit: number): Promise<StoredMessage[]> {
    const messages = this.users.get(userId)?.messages ?? []
    if (limit <= 0) return []
    return structuredClone(messages.slice(-limit))
  }

  async summary(userId: string): Promise<ConversationSummary> {
    const messages = this.users.get(userId)?.messages ?? []
    if (messages.length === 0) return emptySummary(userId)
    return {
      userId,
      totalConversations: 1,
      totalMessages: messages.length,
      firstMessageAt: messages[0].timestamp,
      lastMessageAt: messages[messages.length - 1].timestamp,
    }
  }
}
