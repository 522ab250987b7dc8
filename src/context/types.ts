export type CrisisTier = 'moderate' | 'severe' | 'imminent'

export type Polarity = 'positive' | 'negative'

export type UrgencyLevel = 'low' | 'medium' | 'high' | 'critical'

export type SentimentTrend = 'positive' | 'negative' | 'neutral' | 'improving' | 'worsening'

export type EngagementLevel = 'low' | 'medium' | 'high'

export type MessageDirection = 'incoming' | 'outgoing'

export interface MessageAnalysis {
  isCrisis: boolean
  urgencyLevel: UrgencyLevel
  /** Highest crisis tier matched, null when no crisis term matched. */
  crisisTier: CrisisTier | null
  isNegative: boolean
  isPositive: boolean
  messageLength: number
  hasQuestion: boolean
  topics: string[]
}

export interface ConversationMessage {
  userId: string
  text: string
  /** ISO-8601, non-decreasing per user. */
  timestamp: string
  direction: MessageDirection
}

/** A message as it sits in the user's append-only log. */
export interface StoredMessage extends ConversationMessage {
  /** 1-based position in the user's history. */
  seq: number
  analysis: MessageAnalysis
}

export interface TopicTally {
  count: number
  /** seq of the most recent message that mentioned the topic. */
  lastSeq: number
}

export interface CrisisEvents {
  count: number
  lastAt: string | null
}

export interface UserContextAggregate {
  userId: string
  totalMessages: number
  lastTimestamp: string | null
  /** isNegative flags of the most recent incoming messages, oldest first. */
  sentimentWindow: boolean[]
  topicCounts: Record<string, TopicTally>
  crisisEvents: CrisisEvents
  /** Incoming message timestamps inside the trailing engagement window. */
  recentActivity: string[]
}

export interface UserContextSnapshot {
  userId: string
  totalMessages: number
  sentimentTrend: SentimentTrend
  commonTopics: string[]
  engagementLevel: EngagementLevel
  crisisEvents: CrisisEvents
  lastMessageAt: string | null
}

export interface ContextAnalysis extends UserContextSnapshot {
  currentMessageAnalysis: MessageAnalysis
  messageSeq: number
}

export interface AnalysisSettings {
  /** Number of incoming turns kept for the sentiment trend (W). */
  sentimentWindow: number
  minTrendSample: number
  trendDelta: number
  negativeTrendRatio: number
  positiveTrendRatio: number
  topTopics: number
  engagementWindowMs: number
  /** Shortest span a rate is computed over, so a burst is not divided by ~0. */
  minEngagementSpanMs: number
  minEngagementSample: number
  engagementMediumPerHour: number
  engagementHighPerHour: number
}
