import { CRISIS_TIER_RANK, URGENCY_FOR_TIER } from './constants.js'
import { countOccurrences, getLexicon, matchPositions, stemTokens, type Lexicon } from './lexicon.js'
import type { CrisisTier, MessageAnalysis } from './types.js'

function neutralAnalysis(text: string): MessageAnalysis {
  return {
    isCrisis: false,
    urgencyLevel: 'low',
    crisisTier: null,
    isNegative: false,
    isPositive: false,
    messageLength: text.trim().length,
    hasQuestion: text.includes('?'),
    topics: [],
  }
}

interface CrisisMatch {
  tier: CrisisTier | null
  /** Token indexes covered by any crisis term. */
  covered: ReadonlySet<number>
}

/** Highest tier among every crisis term present. Negation is not interpreted. */
function matchCrisis(tokens: readonly string[], lexicon: Lexicon): CrisisMatch {
  let tier: CrisisTier | null = null
  const covered = new Set<number>()
  for (const entry of lexicon.crisis) {
    const positions = matchPositions(tokens, entry)
    if (positions.length === 0) continue
    for (const start of positions) {
      for (let i = start; i < start + entry.stems.length; i++) covered.add(i)
    }
    if (tier === null || CRISIS_TIER_RANK[entry.value] > CRISIS_TIER_RANK[tier]) tier = entry.value
  }
  return { tier, covered }
}

/** Positive terms that sit inside a crisis phrase ("better off dead") are not counted. */
function sentimentCounts(
  tokens: readonly string[],
  lexicon: Lexicon,
  crisisCovered: ReadonlySet<number>,
): { positive: number; negative: number } {
  let positive = 0
  let negative = 0
  for (const entry of lexicon.sentiment) {
    if (entry.value === 'negative') {
      negative += countOccurrences(tokens, entry)
      continue
    }
    for (const start of matchPositions(tokens, entry)) {
      const inCrisis = entry.stems.some((_, offset) => crisisCovered.has(start + offset))
      if (!inCrisis) positive++
    }
  }
  return { positive, negative }
}

function matchedTopics(tokens: readonly string[], lexicon: Lexicon): string[] {
  const topics = new Set<string>()
  for (const entry of lexicon.topics) {
    if (topics.has(entry.value)) continue
    if (countOccurrences(tokens, entry) > 0) topics.add(entry.value)
  }
  return Array.from(topics).sort()
}

/**
 * Classify a single message. Pure and total: no history, no I/O, no clock,
 * and no input makes it throw.
 */
export function classify(text: string, lexicon: Lexicon = getLexicon()): MessageAnalysis {
  const base = neutralAnalysis(text)

  if (lexicon.degraded) {
    console.warn('[context] Lexicon unavailable, classifying in degraded mode (no crisis/sentiment/topic detection)')
    return base
  }

  const tokens = stemTokens(text)
  if (tokens.length === 0) return base

  const { tier: crisisTier, covered } = matchCrisis(tokens, lexicon)
  const isCrisis = crisisTier === 'severe' || crisisTier === 'imminent'
  const { positive, negative } = sentimentCounts(tokens, lexicon, covered)

  return {
    ...base,
    isCrisis,
    urgencyLevel: crisisTier ? URGENCY_FOR_TIER[crisisTier] : 'low',
    crisisTier,
    isNegative: isCrisis || negative > positive,
    isPositive: !isCrisis && positive > negative,
    topics: matchedTopics(tokens, lexicon),
  }
}
