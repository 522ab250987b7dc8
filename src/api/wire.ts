/**
 * snake_case JSON shapes returned by the HTTP API.
 */

import type {
  ContextAnalysis,
  MessageAnalysis,
  StoredMessage,
  UserContextSnapshot,
} from '../context/types.js'
import type { ConversationSummary } from '../store/context-store.js'

export function toWireMessageAnalysis(analysis: MessageAnalysis) {
  return {
    is_crisis: analysis.isCrisis,
    urgency_level: analysis.urgencyLevel,
    crisis_tier: analysis.crisisTier,
    is_negative: analysis.isNegative,
    is_positive: analysis.isPositive,
    message_length: analysis.messageLength,
    has_question: analysis.hasQuestion,
    topics: analysis.topics,
  }
}

export function toWireSnapshot(snapshot: UserContextSnapshot) {
  return {
    user_id: snapshot.userId,
    total_messages: snapshot.totalMessages,
    sentiment_trend: snapshot.sentimentTrend,
    common_topics: snapshot.commonTopics,
    engagement_level: snapshot.engagementLevel,
    crisis_events: {
      count: snapshot.crisisEvents.count,
      last_at: snapshot.crisisEvents.lastAt,
    },
    last_message_at: snapshot.lastMessageAt,
  }
}

export function toWireContextAnalysis(analysis: ContextAnalysis) {
  return {
    ...toWireSnapshot(analysis),
    message_id: analysis.messageSeq,
    current_message_analysis: toWireMessageAnalysis(analysis.currentMessageAnalysis),
  }
}

export function toWireMessage(message: StoredMessage) {
  return {
    id: message.seq,
    role: message.direction === 'incoming' ? 'user' : 'assistant',
    content: message.text,
    timestamp: message.timestamp,
  }
}

export function toWireSummary(summary: ConversationSummary) {
  return {
    total_conversations: summary.totalConversations,
    total_messages: summary.totalMessages,
    first_conversation: summary.firstMessageAt,
    last_conversation: summary.lastMessageAt,
  }
}
