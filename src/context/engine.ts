/**
 * Context Analysis Engine
 *
 * The single entry point the API layer calls. Per request:
 *   classify text → load the user's aggregate → fold → commit → snapshot
 *
 * Every read-fold-commit for one user runs inside that user's critical
 * section (KeyedMutex), so two messages from the same user can never both fold
 * into the same prior state. Different users never share a lock.
 *
 * Aggregates are cached per user once loaded. The cache is written only after
 * the store accepted the commit; a failed commit drops the entry so the next
 * request reloads durable state. When the store reports the cached aggregate as
 * stale (another process committed for the same user), the message is folded
 * once more on the reloaded state. `describe` always reads the store.
 */

import { InputError, StaleContextError } from '../errors.js'
import type { ContextStore } from '../store/context-store.js'
import { safeError } from '../utils/safe-log.js'
import { createAggregate, foldMessage, snapshotOf } from './aggregator.js'
import { classify } from './classifier.js'
import { DEFAULT_ANALYSIS_SETTINGS } from './constants.js'
import { KeyedMutex } from './keyed-mutex.js'
import { getLexicon, type Lexicon } from './lexicon.js'
import type {
  AnalysisSettings,
  ContextAnalysis,
  MessageAnalysis,
  MessageDirection,
  StoredMessage,
  UserContextAggregate,
  UserContextSnapshot,
} from './types.js'

export interface ContextEngineOptions {
  store: ContextStore
  lexicon?: Lexicon
  settings?: AnalysisSettings
  clock?: () => Date
}

function assertUserId(userId: string): string {
  const trimmed = typeof userId === 'string' ? userId.trim() : ''
  if (!trimmed) throw new InputError('user_id must be a non-empty string')
  return trimmed
}

export class ContextAnalysisEngine {
  private readonly store: ContextStore
  private readonly lexicon: Lexicon
  private readonly settings: AnalysisSettings
  private readonly clock: () => Date
  private readonly cache = new Map<string, UserContextAggregate>()
  private readonly locks = new KeyedMutex()

  constructor(options: ContextEngineOptions) {
    this.store = options.store
    this.lexicon = options.lexicon ?? getLexicon()
    this.settings = options.settings ?? DEFAULT_ANALYSIS_SETTINGS
    this.clock = options.clock ?? (() => new Date())
  }

  /** Classify and record an incoming user message, returning the updated context. */
  async analyze(userId: string, text: string): Promise<ContextAnalysis> {
    const id = assertUserId(userId)
    const { aggregate, message } = await this.ingest(id, text, 'incoming')
    const snapshot = snapshotOf(aggregate, new Date(message.timestamp), this.settings)

    if (message.analysis.isCrisis) {
      console.warn(
        `[context] Crisis detected user=${id} urgency=${message.analysis.urgencyLevel} events=${aggregate.crisisEvents.count}`,
      )
    }

    return {
      ...snapshot,
      currentMessageAnalysis: message.analysis,
      messageSeq: message.seq,
    }
  }

  /** Record an outgoing reply in the user's history. */
  async recordReply(userId: string, text: string): Promise<StoredMessage> {
    const id = assertUserId(userId)
    const { message } = await this.ingest(id, text, 'outgoing')
    return message
  }

  /** Current snapshot without recording anything. Unknown users get the empty snapshot. */
  async describe(userId: string): Promise<UserContextSnapshot> {
    const id = assertUserId(userId)
    // Read through to the store so writes from other processes are visible.
    return this.locks.run(id, async () => {
      const stored = await this.store.load(id)
      if (stored) this.cache.set(id, stored)
      else this.cache.delete(id)
      return snapshotOf(stored ?? createAggregate(id), this.clock(), this.settings)
    })
  }

  private async ingest(
    userId: string,
    text: string,
    direction: MessageDirection,
  ): Promise<{ aggregate: UserContextAggregate; message: StoredMessage }> {
    // Pure; runs outside the lock.
    const analysis = classify(text, this.lexicon)

    return this.locks.run(userId, async () => {
      try {
        return await this.foldAndCommit(userId, text, direction, analysis)
      } catch (err) {
        if (!(err instanceof StaleContextError)) throw err
        // Another process advanced this user; fold once more on top of the durable state.
        console.warn(`[context] Cached context for user=${userId} was stale, reloading`)
        return this.foldAndCommit(userId, text, direction, analysis)
      }
    })
  }

  private async foldAndCommit(
    userId: string,
    text: string,
    direction: MessageDirection,
    analysis: MessageAnalysis,
  ): Promise<{ aggregate: UserContextAggregate; message: StoredMessage }> {
    const current = await this.loadAggregate(userId)
    const timestamp = this.timestampAfter(current.lastTimestamp)
    const folded = foldMessage(current, { userId, text, timestamp, direction }, analysis, this.settings)

    try {
      await this.store.commit(folded.aggregate, folded.message)
    } catch (err) {
      this.cache.delete(userId)
      console.error(`[context] Commit failed user=${userId} seq=${folded.message.seq}:`, safeError(err))
      throw err
    }

    this.cache.set(userId, folded.aggregate)
    return folded
  }

  private async loadAggregate(userId: string): Promise<UserContextAggregate> {
    const cached = this.cache.get(userId)
    if (cached) return cached

    const stored = await this.store.load(userId)
    const aggregate = stored ?? createAggregate(userId)
    if (stored) this.cache.set(userId, stored)
    return aggregate
  }

  /** Clock reading, never earlier than the user's last message. */
  private timestampAfter(lastTimestamp: string | null): string {
    const now = this.clock()
    if (lastTimestamp !== null && now.getTime() < Date.parse(lastTimestamp)) {
      return lastTimestamp
    }
    return now.toISOString()
  }
}
