import type { FastifyInstance } from 'fastify'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ChatService } from './chat/chat-service.js'
import { ContextAnalysisEngine } from './context/engine.js'
import { PersistenceError } from './errors.js'
import { APP_VERSION, buildServer } from './server.js'
import { MemoryContextStore } from './store/memory-context-store.js'

const NOW = new Date('2026-03-01T09:00:00.000Z')

async function serverWith(store: MemoryContextStore): Promise<FastifyInstance> {
  const engine = new ContextAnalysisEngine({ store, clock: () => NOW })
  const chat = new ChatService({
    engine,
    store,
    responder: async () => 'I am here with you.',
  })
  return buildServer({ chat, logger: false })
}

describe('HTTP API', () => {
  let store: MemoryContextStore
  let server: FastifyInstance

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    store = new MemoryContextStore()
    server = await serverWith(store)
  })

  afterEach(async () => {
    await server.close()
  })

  it('reports health', async () => {
    const res = await server.inject({ method: 'GET', url: '/health' })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: 'healthy', version: APP_VERSION })
  })

  it('answers a chat message with its context analysis', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/chat',
      payload: { user_id: 'u1', message: 'I had a tough day at work, feeling stressed' },
    })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({
      response: 'I am here with you.',
      response_html: 'I am here with you.',
      user_id: 'u1',
      message_id: 2,
      context_analysis: {
        user_id: 'u1',
        total_messages: 1,
        sentiment_trend: 'neutral',
        common_topics: ['stress', 'work'],
        engagement_level: 'low',
        crisis_events: { count: 0, last_at: null },
        last_message_at: NOW.toISOString(),
        message_id: 1,
        current_message_analysis: {
          is_crisis: false,
          urgency_level: 'low',
          crisis_tier: null,
          is_negative: true,
          is_positive: false,
          message_length: 43,
          has_question: false,
          topics: ['stress', 'work'],
        },
      },
    })
  })

  it('rejects an empty message without recording anything', async () => {
    const res = await server.inject({ method: 'POST', url: '/chat', payload: { user_id: 'u1', message: '   ' } })

    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ error: 'message must not be empty', code: 'ERR_INPUT' })
    expect(await store.load('u1')).toBeNull()
  })

  it('rejects a missing user id', async () => {
    const res = await server.inject({ method: 'POST', url: '/chat', payload: { message: 'hello' } })
    expect(res.statusCode).toBe(400)
    expect(res.json().code).toBe('ERR_INPUT')
  })

  it('rejects malformed JSON', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/chat',
      headers: { 'content-type': 'application/json' },
      payload: '{"user_id": ',
    })
    expect(res.statusCode).toBe(400)
  })

  it('returns conversation history', async () => {
    await server.inject({ method: 'POST', url: '/chat', payload: { user_id: 'u1', message: 'hello there' } })

    const res = await server.inject({ method: 'GET', url: '/conversation/u1/history?limit=1' })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({
      user_id: 'u1',
      history: [{ id: 2, role: 'assistant', content: 'I am here with you.', timestamp: NOW.toISOString() }],
    })
  })

  it('validates the history limit', async () => {
    const res = await server.inject({ method: 'GET', url: '/conversation/u1/history?limit=0' })
    expect(res.statusCode).toBe(400)
  })

  it('describes an unknown user', async () => {
    const res = await server.inject({ method: 'GET', url: '/user/nobody/analysis' })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({
      user_id: 'nobody',
      analysis: {
        user_id: 'nobody',
        total_messages: 0,
        sentiment_trend: 'neutral',
        common_topics: [],
        engagement_level: 'low',
        crisis_events: { count: 0, last_at: null },
        last_message_at: null,
      },
      summary: {
        total_conversations: 0,
        total_messages: 0,
        first_conversation: null,
        last_conversation: null,
      },
    })
  })

  it('returns summary and greeting', async () => {
    await server.inject({ method: 'POST', url: '/chat', payload: { user_id: 'u1', message: 'hello there' } })

    const summary = await server.inject({ method: 'GET', url: '/user/u1/summary' })
    expect(summary.json().summary.total_messages).toBe(2)

    const greeting = await server.inject({ method: 'GET', url: '/user/u2/greeting' })
    expect(greeting.json()).toEqual({
      user_id: 'u2',
      greeting: "Hello! I'm here to support you. How are you feeling today?",
    })
  })

  it('maps persistence failures to 503', async () => {
    vi.spyOn(store, 'load').mockRejectedValue(new PersistenceError('connection reset'))

    const res = await server.inject({ method: 'POST', url: '/chat', payload: { user_id: 'u1', message: 'hello' } })

    expect(res.statusCode).toBe(503)
    expect(res.json()).toEqual({ error: 'Service temporarily unavailable', code: 'ERR_PERSISTENCE' })
  })

  it('hides unexpected errors', async () => {
    vi.spyOn(store, 'summary').mockRejectedValue(new Error('secret detail'))

    const res = await server.inject({ method: 'GET', url: '/user/u1/summary' })

    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({ error: 'Internal server error' })
  })
})
