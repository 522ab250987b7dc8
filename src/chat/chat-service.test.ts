import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { ContextAnalysisEngine } from '../context/engine.js'
import { MemoryContextStore } from '../store/memory-context-store.js'
import { ChatService, toHtml } from './chat-service.js'
import { CRISIS_RESOURCES } from './crisis-resources.js'
import { UNAVAILABLE_FALLBACK, type ResponseGenerator } from './responder.js'

const NOW = new Date('2026-03-01T09:00:00.000Z')

describe('toHtml', () => {
  it('escapes markup and keeps line breaks', () => {
    expect(toHtml(`a < b & "c" isn't\nnext`)).toBe('a &lt; b &amp; &quot;c&quot; isn&#39;t<br>next')
  })
})

describe('ChatService', () => {
  let store: MemoryContextStore
  let responder: Mock<ResponseGenerator>
  let chat: ChatService

  beforeEach(() => {
    store = new MemoryContextStore()
    const engine = new ContextAnalysisEngine({ store, clock: () => NOW })
    responder = vi.fn<ResponseGenerator>().mockResolvedValue('Thank you for telling me.\nI am listening.')
    chat = new ChatService({ engine, store, responder, historyLimit: 4 })
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  it('analyzes, replies and records both turns', async () => {
    const reply = await chat.handle('u1', 'I had a tough day at work, feeling stressed')

    expect(reply.response).toBe('Thank you for telling me.\nI am listening.')
    expect(reply.responseHtml).toBe('Thank you for telling me.<br>I am listening.')
    expect(reply.userId).toBe('u1')
    expect(reply.messageId).toBe(2)
    expect(reply.contextAnalysis.messageSeq).toBe(1)
    expect(reply.contextAnalysis.commonTopics).toEqual(['stress', 'work'])

    const history = await store.history('u1', 10)
    expect(history.map(m => [m.seq, m.direction])).toEqual([[1, 'incoming'], [2, 'outgoing']])
  })

  it('hands the responder the analysis and recent history', async () => {
    await chat.handle('u1', 'first message')
    await chat.handle('u1', 'second message')

    const request = responder.mock.calls[1][0]
    expect(request.text).toBe('second message')
    expect(request.analysis.messageSeq).toBe(3)
    expect(request.history.map(m => m.seq)).toEqual([1, 2, 3])
  })

  it('appends crisis resources to a crisis reply', async () => {
    const reply = await chat.handle('u1', 'I want to end it all')

    expect(reply.contextAnalysis.currentMessageAnalysis.urgencyLevel).toBe('critical')
    expect(reply.response.startsWith('Thank you for telling me.\nI am listening.\n\n')).toBe(true)
    for (const line of CRISIS_RESOURCES) {
      expect(reply.response).toContain(`- ${line}`)
    }

    const [, outgoing] = await store.history('u1', 2)
    expect(outgoing.text).toBe('Thank you for telling me.\nI am listening.')
  })

  it('falls back when the responder fails', async () => {
    responder.mockRejectedValueOnce(new Error('provider down'))

    const reply = await chat.handle('u1', 'hello')

    expect(reply.response).toBe(UNAVAILABLE_FALLBACK)
    expect((await store.history('u1', 1))[0].text).toBe(UNAVAILABLE_FALLBACK)
  })

  it('falls back on an empty reply', async () => {
    responder.mockResolvedValueOnce('   ')
    expect((await chat.handle('u1', 'hello')).response).toBe(UNAVAILABLE_FALLBACK)
  })

  it('exposes history, analysis, summary and greeting', async () => {
    expect(await chat.greeting('u1')).toBe("Hello! I'm here to support you. How are you feeling today?")

    await chat.handle('u1', 'I feel sad')

    expect((await chat.history('u1', 1)).map(m => m.direction)).toEqual(['outgoing'])

    const { snapshot, summary } = await chat.analysis('u1')
    expect(snapshot.totalMessages).toBe(2)
    expect(summary).toEqual({
      userId: 'u1',
      totalConversations: 1,
      totalMessages: 2,
      firstMessageAt: NOW.toISOString(),
      lastMessageAt: NOW.toISOString(),
    })
    expect((await chat.summary('u1')).totalMessages).toBe(2)
  })
})
