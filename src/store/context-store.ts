import type { StoredMessage, UserContextAggregate } from '../context/types.js'

export interface ConversationSummary {
  userId: string
  totalConversations: number
  totalMessages: number
  firstMessageAt: string | null
  lastMessageAt: string | null
}

/**
 * Durable home of each user's append-only message log and folded aggregate.
 *
 * `commit` appends the message and saves the aggregate as a single unit: after
 * a rejection neither is visible. Implementations must give read-your-writes
 * for sequential operations on one user id.
 */
export interface ContextStore {
  load(userId: string): Promise<UserContextAggregate | null>
  commit(aggregate: UserContextAggregate, message: StoredMessage): Promise<void>
  /** Most recent `limit` messages, oldest first. */
  history(userId: string, limit: number): Promise<StoredMessage[]>
  summary(userId: string): Promise<ConversationSummary>
}

export function emptySummary(userId: string): ConversationSummary {
  return {
    userId,
    totalConversations: 0,
    totalMessages: 0,
    firstMessageAt: null,
    lastMessageAt: null,
  }
}
