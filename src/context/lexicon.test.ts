import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { LexiconFileSchema } from '../types/schemas.js'
import {
  buildLexicon,
  countOccurrences,
  emptyLexicon,
  getLexicon,
  loadLexicon,
  stem,
  stemTokens,
  tokenize,
} from './lexicon.js'

describe('stem', () => {
  it('strips one inflectional suffix', () => {
    expect(stem('stressed')).toBe('stress')
    expect(stem('stresses')).toBe('stress')
    expect(stem('feeling')).toBe('feel')
    expect(stem('worries')).toBe('worry')
    expect(stem('worried')).toBe('worry')
    expect(stem('nightmares')).toBe('nightmare')
  })

  it('leaves words whose trailing s is part of the root', () => {
    expect(stem('stress')).toBe('stress')
    expect(stem('anxious')).toBe('anxious')
    expect(stem('crisis')).toBe('crisis')
  })

  it('keeps short words and short stems intact', () => {
    expect(stem('was')).toBe('was')
    expect(stem('sing')).toBe('sing')
    expect(stem('helpful')).toBe('helpful')
  })
})

describe('tokenize', () => {
  it('lowercases, drops apostrophes and splits on punctuation', () => {
    expect(tokenize("Don't STOP—now!")).toEqual(['dont', 'stop', 'now'])
    expect(tokenize('self-harm')).toEqual(['self', 'harm'])
    expect(tokenize('I can’t cope')).toEqual(['i', 'cant', 'cope'])
  })

  it('returns nothing for whitespace and punctuation', () => {
    expect(tokenize('   ...!? ')).toEqual([])
  })

  it('stems every token', () => {
    expect(stemTokens('Feeling stressed')).toEqual(['feel', 'stress'])
  })
})

describe('buildLexicon', () => {
  it('compiles multi-word terms into stem sequences', () => {
    const lexicon = buildLexicon(LexiconFileSchema.parse({
      crisis: { imminent: ['Ending it all'] },
    }))

    expect(lexicon.degraded).toBe(false)
    expect(lexicon.crisis).toEqual([{ term: 'Ending it all', stems: ['end', 'it', 'all'], value: 'imminent' }])
    expect(lexicon.sentiment).toEqual([])
  })

  it('orders topic entries by label', () => {
    const lexicon = buildLexicon(LexiconFileSchema.parse({
      topics: { work: ['job'], anxiety: ['nervous'] },
    }))
    expect(lexicon.topics.map(entry => entry.value)).toEqual(['anxiety', 'work'])
  })

  it('is degraded when the file carries no terms', () => {
    expect(buildLexicon(LexiconFileSchema.parse({})).degraded).toBe(true)
    expect(emptyLexicon().degraded).toBe(true)
  })

  it('is frozen', () => {
    const lexicon = buildLexicon(LexiconFileSchema.parse({ sentiment: { positive: ['good'] } }))
    expect(Object.isFrozen(lexicon)).toBe(true)
    expect(Object.isFrozen(lexicon.sentiment)).toBe(true)
  })
})

describe('countOccurrences', () => {
  const lexicon = buildLexicon(LexiconFileSchema.parse({ crisis: { imminent: ['end it all'] } }))
  const entry = lexicon.crisis[0]

  it('requires consecutive tokens', () => {
    expect(countOccurrences(stemTokens('I want to end it all'), entry)).toBe(1)
    expect(countOccurrences(stemTokens('end of it all'), entry)).toBe(0)
  })

  it('counts repeated matches', () => {
    expect(countOccurrences(stemTokens('end it all, end it all'), entry)).toBe(2)
  })
})

describe('loadLexicon', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lexicon-'))
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('loads a valid file', () => {
    const path = join(dir, 'lexicon.json')
    writeFileSync(path, JSON.stringify({ sentiment: { negative: ['sad'] }, topics: { sleep: ['tired'] } }))

    const lexicon = loadLexicon(path)
    expect(lexicon.degraded).toBe(false)
    expect(lexicon.sentiment).toHaveLength(1)
    expect(lexicon.topics[0].value).toBe('sleep')
  })

  it('warns when a file has no crisis terms', () => {
    const path = join(dir, 'no-crisis.json')
    writeFileSync(path, JSON.stringify({ sentiment: { negative: ['sad'] } }))

    expect(loadLexicon(path).degraded).toBe(false)
    expect(console.warn).toHaveBeenCalledWith(`[lexicon] ${path} has no crisis terms, crisis detection is off`)
  })

  it('does not warn when crisis terms are present', () => {
    const path = join(dir, 'full.json')
    writeFileSync(path, JSON.stringify({ crisis: { severe: ['suicide'] }, sentiment: { negative: ['sad'] } }))

    loadLexicon(path)
    expect(console.warn).not.toHaveBeenCalled()
  })

  it('degrades on a missing file', () => {
    const lexicon = loadLexicon(join(dir, 'missing.json'))
    expect(lexicon.degraded).toBe(true)
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('degrades on malformed JSON', () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{ "crisis": ')
    expect(loadLexicon(path).degraded).toBe(true)
  })

  it('degrades on a file with the wrong shape', () => {
    const path = join(dir, 'wrong.json')
    writeFileSync(path, JSON.stringify({ crisis: { imminent: 'end it all' } }))
    expect(loadLexicon(path).degraded).toBe(true)
  })

  it('ships a usable default lexicon', () => {
    const lexicon = getLexicon()
    expect(lexicon.degraded).toBe(false)
    expect(getLexicon()).toBe(lexicon)
  })
})
