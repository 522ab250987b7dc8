/**
 * Lexicon Store
 *
 * Process-wide, read-only keyword tables used by the classifier:
 *   crisis terms    → tier (moderate | severe | imminent)
 *   sentiment terms → polarity (positive | negative)
 *   topic terms     → topic label
 *
 * Terms and message text go through the same normalization (lowercase,
 * apostrophes dropped, punctuation split) and the same single-suffix stemmer,
 * so "Stressed", "stresses" and "stress" all meet on the stem "stress".
 *
 * Loading never throws. A missing or malformed file produces an empty lexicon
 * flagged `degraded`; the classifier then answers with conservative defaults.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { LexiconFileSchema, safeParseJson, type LexiconFile } from '../types/schemas.js'
import { safeError } from '../utils/safe-log.js'
import { CRISIS_TIERS } from './constants.js'
import type { CrisisTier, Polarity } from './types.js'

export interface LexiconEntry<V> {
  term: string
  stems: readonly string[]
  value: V
}

export interface Lexicon {
  readonly crisis: readonly LexiconEntry<CrisisTier>[]
  readonly sentiment: readonly LexiconEntry<Polarity>[]
  readonly topics: readonly LexiconEntry<string>[]
  /** True when the tables could not be loaded; every lookup then misses. */
  readonly degraded: boolean
}

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url))

// Longest suffix first; the first rule whose conditions hold is the only one applied.
const SUFFIX_RULES: ReadonlyArray<{ suffix: string; replacement: string; when?: (stem: string) => boolean }> = [
  { suffix: 'ness', replacement: '' },
  { suffix: 'ies', replacement: 'y' },
  { suffix: 'ied', replacement: 'y' },
  { suffix: 'ing', replacement: '' },
  { suffix: 'es', replacement: '', when: stem => /(s|x|z|ch|sh)$/.test(stem) },
  { suffix: 'ed', replacement: '' },
  { suffix: 'ly', replacement: '' },
  { suffix: 's', replacement: '', when: stem => !/[sui]$/.test(stem) },
]

const MIN_STEM_LENGTH = 3

export function stem(word: string): string {
  if (word.length <= MIN_STEM_LENGTH) return word

  for (const rule of SUFFIX_RULES) {
    if (!word.endsWith(rule.suffix)) continue
    const base = word.slice(0, word.length - rule.suffix.length)
    if (base.length < MIN_STEM_LENGTH) continue
    if (rule.when && !rule.when(base)) continue
    return base + rule.replacement
  }
  return word
}

/** Lowercased word tokens with apostrophes removed ("Don't" → "dont"). */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['‘’`]/g, '')
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
}

export function stemTokens(text: string): string[] {
  return tokenize(text).map(stem)
}

function compileEntries<V>(terms: readonly string[], value: V): LexiconEntry<V>[] {
  const entries: LexiconEntry<V>[] = []
  for (const term of terms) {
    const stems = stemTokens(term)
    if (stems.length === 0) continue
    entries.push(Object.freeze({ term, stems: Object.freeze(stems), value }))
  }
  return entries
}

function freezeLexicon(
  crisis: LexiconEntry<CrisisTier>[],
  sentiment: LexiconEntry<Polarity>[],
  topics: LexiconEntry<string>[],
  degraded: boolean,
): Lexicon {
  return Object.freeze({
    crisis: Object.freeze(crisis),
    sentiment: Object.freeze(sentiment),
    topics: Object.freeze(topics),
    degraded,
  })
}

export function emptyLexicon(): Lexicon {
  return freezeLexicon([], [], [], true)
}

export function buildLexicon(file: LexiconFile): Lexicon {
  const crisis = CRISIS_TIERS.flatMap(tier => compileEntries(file.crisis[tier], tier))
  const sentiment = [
    ...compileEntries<Polarity>(file.sentiment.positive, 'positive'),
    ...compileEntries<Polarity>(file.sentiment.negative, 'negative'),
  ]
  const topics = Object.keys(file.topics)
    .sort()
    .flatMap(label => compileEntries(file.topics[label] ?? [], label))

  const degraded = crisis.length === 0 && sentiment.length === 0 && topics.length === 0
  return freezeLexicon(crisis, sentiment, topics, degraded)
}

export function loadLexicon(path: string = DEFAULT_LEXICON_PATH): Lexicon {
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (err) {
    console.error(`[lexicon] Could not read ${path}, classification will run degraded:`, safeError(err))
    return emptyLexicon()
  }

  const file = safeParseJson(raw, LexiconFileSchema, 'lexicon')
  if (!file) {
    console.error(`[lexicon] ${path} is not a valid lexicon, classification will run degraded`)
    return emptyLexicon()
  }

  const lexicon = buildLexicon(file)
  if (lexicon.degraded) {
    console.error(`[lexicon] ${path} contains no terms, classification will run degraded`)
  } else {
    if (lexicon.crisis.length === 0) {
      console.warn(`[lexicon] ${path} has no crisis terms, crisis detection is off`)
    }
    console.log(
      `[lexicon] Loaded crisis=${lexicon.crisis.length} sentiment=${lexicon.sentiment.length} topics=${lexicon.topics.length}`,
    )
  }
  return lexicon
}

let processLexicon: Lexicon | null = null

/** Loads the default lexicon on first use and returns the same instance afterwards. */
export function getLexicon(): Lexicon {
  if (!processLexicon) {
    processLexicon = loadLexicon()
  }
  return processLexicon
}

/**
 * Start indexes at which `entry` occurs in the stemmed token sequence.
 * Multi-word terms must appear as consecutive tokens.
 */
export function matchPositions<V>(tokens: readonly string[], entry: LexiconEntry<V>): number[] {
  const width = entry.stems.length
  const positions: number[] = []
  for (let i = 0; i + width <= tokens.length; i++) {
    let matched = true
    for (let j = 0; j < width; j++) {
      if (tokens[i + j] !== entry.stems[j]) {
        matched = false
        break
      }
    }
    if (matched) positions.push(i)
  }
  return positions
}

export function countOccurrences<V>(tokens: readonly string[], entry: LexiconEntry<V>): number {
  return matchPositions(tokens, entry).length
}
