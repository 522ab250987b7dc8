/**
 * Chat Service
 *
 * One user turn end to end:
 *   analyze (records the user message) → recent history → reply → record reply
 *   → crisis resources when flagged → HTML rendering
 */

import type { ContextAnalysisEngine } from '../context/engine.js'
import type { ContextAnalysis, StoredMessage, UserContextSnapshot } from '../context/types.js'
import type { ContextStore, ConversationSummary } from '../store/context-store.js'
import { safeError } from '../utils/safe-log.js'
import { crisisNotice } from './crisis-resources.js'
import { greetingFor } from './greeting.js'
import { UNAVAILABLE_FALLBACK, type ResponseGenerator, type ResponseRequest } from './responder.js'

export interface ChatServiceDeps {
  engine: ContextAnalysisEngine
  store: ContextStore
  responder: ResponseGenerator
  /** Prior turns handed to the responder. */
  historyLimit?: number
}

export interface ChatReply {
  response: string
  responseHtml: string
  userId: string
  messageId: number
  contextAnalysis: ContextAnalysis
}

export interface UserAnalysis {
  snapshot: UserContextSnapshot
  summary: ConversationSummary
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function toHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch).replace(/\r?\n/g, '<br>')
}

export class ChatService {
  private readonly engine: ContextAnalysisEngine
  private readonly store: ContextStore
  private readonly responder: ResponseGenerator
  private readonly historyLimit: number

  constructor(deps: ChatServiceDeps) {
    this.engine = deps.engine
    this.store = deps.store
    this.responder = deps.responder
    this.historyLimit = deps.historyLimit ?? 10
  }

  async handle(userId: string, message: string): Promise<ChatReply> {
    const analysis = await this.engine.analyze(userId, message)
    const history = this.historyLimit > 0
      ? await this.store.history(analysis.userId, this.historyLimit + 1)
      : []

    const reply = await this.generateReply({ userId: analysis.userId, text: message, analysis, history })
    const stored = await this.engine.recordReply(analysis.userId, reply)

    const response = analysis.currentMessageAnalysis.isCrisis
      ? `${reply}\n\n${crisisNotice()}`
      : reply

    return {
      response,
      responseHtml: toHtml(response),
      userId: analysis.userId,
      messageId: stored.seq,
      contextAnalysis: analysis,
    }
  }

  async history(userId: string, limit: number): Promise<StoredMessage[]> {
    return this.store.history(userId, limit)
  }

  async analysis(userId: string): Promise<UserAnalysis> {
    const [snapshot, summary] = await Promise.all([
      this.engine.describe(userId),
      this.store.summary(userId),
    ])
    return { snapshot, summary }
  }

  async summary(userId: string): Promise<ConversationSummary> {
    return this.store.summary(userId)
  }

  async greeting(userId: string): Promise<string> {
    return greetingFor(await this.engine.describe(userId))
  }

  private async generateReply(request: ResponseRequest): Promise<string> {
    try {
      const text = (await this.responder(request)).trim()
      if (text) return text
      console.warn(`[chat] Empty reply for user=${request.userId}, using fallback`)
    } catch (err) {
      console.error(`[chat] Response generation failed for user=${request.userId}:`, safeError(err))
    }
    return UNAVAILABLE_FALLBACK
  }
}
