import type { AnalysisSettings, CrisisTier, UrgencyLevel } from './types.js'

const HOUR_MS = 60 * 60 * 1000

export const DEFAULT_ANALYSIS_SETTINGS: Readonly<AnalysisSettings> = Object.freeze({
  sentimentWindow: 10,
  minTrendSample: 3,
  trendDelta: 0.2,
  negativeTrendRatio: 0.5,
  positiveTrendRatio: 0.3,
  topTopics: 3,
  engagementWindowMs: 24 * HOUR_MS,
  minEngagementSpanMs: HOUR_MS,
  minEngagementSample: 3,
  engagementMediumPerHour: 0.5,
  engagementHighPerHour: 2,
})

export const CRISIS_TIER_RANK: Record<CrisisTier, number> = {
  moderate: 1,
  severe: 2,
  imminent: 3,
}

export const URGENCY_FOR_TIER: Record<CrisisTier, UrgencyLevel> = {
  moderate: 'medium',
  severe: 'high',
  imminent: 'critical',
}

export const CRISIS_TIERS: readonly CrisisTier[] = ['imminent', 'severe', 'moderate']
