import { OutOfOrderMessageError } from '../errors.js'
import { DEFAULT_ANALYSIS_SETTINGS } from './constants.js'
import type {
  AnalysisSettings,
  ConversationMessage,
  EngagementLevel,
  MessageAnalysis,
  SentimentTrend,
  StoredMessage,
  TopicTally,
  UserContextAggregate,
  UserContextSnapshot,
} from './types.js'

const HOUR_MS = 60 * 60 * 1000

export interface FoldResult {
  aggregate: UserContextAggregate
  message: StoredMessage
}

export function createAggregate(userId: string): UserContextAggregate {
  return {
    userId,
    totalMessages: 0,
    lastTimestamp: null,
    sentimentWindow: [],
    topicCounts: {},
    crisisEvents: { count: 0, lastAt: null },
    recentActivity: [],
  }
}

function toMillis(iso: string): number {
  const ms = Date.parse(iso)
  if (Number.isNaN(ms)) throw new RangeError(`Invalid message timestamp: ${iso}`)
  return ms
}

function withinWindow(timestamps: readonly string[], asOfMs: number, windowMs: number): string[] {
  return timestamps.filter(ts => {
    const age = asOfMs - toMillis(ts)
    return age >= 0 && age <= windowMs
  })
}

function foldTopics(
  counts: Readonly<Record<string, TopicTally>>,
  topics: readonly string[],
  seq: number,
): Record<string, TopicTally> {
  const next: Record<string, TopicTally> = { ...counts }
  for (const topic of topics) {
    const previous = next[topic]
    next[topic] = { count: (previous?.count ?? 0) + 1, lastSeq: seq }
  }
  return next
}

/**
 * One fold step. Returns a new aggregate and the message as it will be stored;
 * the input aggregate is left untouched. Outgoing messages only extend the
 * history, the user-derived statistics come from incoming messages alone.
 */
export function foldMessage(
  aggregate: UserContextAggregate,
  message: ConversationMessage,
  analysis: MessageAnalysis,
  settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS,
): FoldResult {
  if (message.userId !== aggregate.userId) {
    throw new RangeError(`Message for ${message.userId} folded into aggregate of ${aggregate.userId}`)
  }

  const atMs = toMillis(message.timestamp)
  if (aggregate.lastTimestamp !== null && atMs < toMillis(aggregate.lastTimestamp)) {
    throw new OutOfOrderMessageError(aggregate.userId, message.timestamp, aggregate.lastTimestamp)
  }

  const seq = aggregate.totalMessages + 1
  const stored: StoredMessage = { ...message, seq, analysis }

  const next: UserContextAggregate = {
    ...aggregate,
    totalMessages: seq,
    lastTimestamp: message.timestamp,
  }

  if (message.direction === 'incoming') {
    next.sentimentWindow = [...aggregate.sentimentWindow, analysis.isNegative].slice(-settings.sentimentWindow)
    next.topicCounts = foldTopics(aggregate.topicCounts, analysis.topics, seq)
    next.recentActivity = withinWindow([...aggregate.recentActivity, message.timestamp], atMs, settings.engagementWindowMs)
    if (analysis.isCrisis) {
      next.crisisEvents = { count: aggregate.crisisEvents.count + 1, lastAt: message.timestamp }
    }
  }

  return { aggregate: next, message: stored }
}

/** Rebuild an aggregate from its stored log, using each message's recorded analysis. */
export function replayHistory(
  userId: string,
  history: readonly StoredMessage[],
  settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS,
): UserContextAggregate {
  let aggregate = createAggregate(userId)
  for (const stored of history) {
    const { seq: _seq, analysis, ...message } = stored
    aggregate = foldMessage(aggregate, message, analysis, settings).aggregate
  }
  return aggregate
}

function negativeRatio(flags: readonly boolean[]): number {
  if (flags.length === 0) return 0
  return flags.filter(Boolean).length / flags.length
}

export function sentimentTrend(
  window: readonly boolean[],
  settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS,
): SentimentTrend {
  const samples = window.slice(-settings.sentimentWindow)
  if (samples.length < settings.minTrendSample) return 'neutral'

  const half = Math.floor(samples.length / 2)
  const recent = samples.slice(samples.length - half)
  const prior = samples.slice(samples.length - 2 * half, samples.length - half)
  const shift = negativeRatio(recent) - negativeRatio(prior)

  if (shift > settings.trendDelta) return 'worsening'
  if (shift < -settings.trendDelta) return 'improving'

  const overall = negativeRatio(samples)
  if (overall > settings.negativeTrendRatio) return 'negative'
  if (overall < settings.positiveTrendRatio) return 'positive'
  return 'neutral'
}

/** Ranked by count, then most recent mention, then name. */
export function commonTopics(counts: Readonly<Record<string, TopicTally>>, limit: number): string[] {
  return Object.entries(counts)
    .sort(([nameA, a], [nameB, b]) =>
      b.count - a.count || b.lastSeq - a.lastSeq || nameA.localeCompare(nameB),
    )
    .slice(0, limit)
    .map(([name]) => name)
}

export function engagementLevel(
  activity: readonly string[],
  asOf: Date,
  settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS,
): EngagementLevel {
  const asOfMs = asOf.getTime()
  const recent = withinWindow(activity, asOfMs, settings.engagementWindowMs)
  if (recent.length < settings.minEngagementSample) return 'low'

  // Activity is kept in arrival order, which the fold guarantees is non-decreasing.
  const earliest = toMillis(recent[0])
  const spanMs = Math.max(settings.minEngagementSpanMs, asOfMs - earliest)
  const perHour = recent.length / (spanMs / HOUR_MS)

  if (perHour >= settings.engagementHighPerHour) return 'high'
  if (perHour >= settings.engagementMediumPerHour) return 'medium'
  return 'low'
}

/**
 * Caller-facing view of an aggregate. Engagement is evaluated at `asOf`,
 * which the engine sets to the newest message time right after a fold.
 */
export function snapshotOf(
  aggregate: UserContextAggregate,
  asOf: Date,
  settings: AnalysisSettings = DEFAULT_ANALYSIS_SETTINGS,
): UserContextSnapshot {
  return {
    userId: aggregate.userId,
    totalMessages: aggregate.totalMessages,
    sentimentTrend: sentimentTrend(aggregate.sentimentWindow, settings),
    commonTopics: commonTopics(aggregate.topicCounts, settings.topTopics),
    engagementLevel: engagementLevel(aggregate.recentActivity, asOf, settings),
    crisisEvents: { ...aggregate.crisisEvents },
    lastMessageAt: aggregate.lastTimestamp,
  }
}
