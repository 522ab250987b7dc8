/**
 * Chat API — REST endpoints for the supportive chat service.
 *
 * Every request is validated with zod before it reaches the chat service;
 * a bad user id or message is an InputError (400) and touches no state.
 */

import type { FastifyInstance } from 'fastify'
import type { z } from 'zod'
import type { ChatService } from '../chat/chat-service.js'
import { InputError } from '../errors.js'
import { ChatRequestSchema, HistoryQuerySchema, UserParamsSchema } from '../types/schemas.js'
import {
  toWireContextAnalysis,
  toWireMessage,
  toWireSnapshot,
  toWireSummary,
} from './wire.js'

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new InputError(result.error.issues.map(issue => issue.message).join('; '), result.error.issues)
  }
  return result.data
}

export function registerChatRoutes(server: FastifyInstance, chat: ChatService): void {
  server.post('/chat', async request => {
    const body = parseInput(ChatRequestSchema, request.body)
    const reply = await chat.handle(body.user_id, body.message)

    return {
      response: reply.response,
      response_html: reply.responseHtml,
      user_id: reply.userId,
      message_id: reply.messageId,
      context_analysis: toWireContextAnalysis(reply.contextAnalysis),
    }
  })

  server.get('/conversation/:userId/history', async request => {
    const { userId } = parseInput(UserParamsSchema, request.params)
    const { limit } = parseInput(HistoryQuerySchema, request.query)
    const history = await chat.history(userId, limit)
    return { user_id: userId, history: history.map(toWireMessage) }
  })

  server.get('/user/:userId/analysis', async request => {
    const { userId } = parseInput(UserParamsSchema, request.params)
    const { snapshot, summary } = await chat.analysis(userId)
    return {
      user_id: userId,
      analysis: toWireSnapshot(snapshot),
      summary: toWireSummary(summary),
    }
  })

  server.get('/user/:userId/summary', async request => {
    const { userId } = parseInput(UserParamsSchema, request.params)
    return { user_id: userId, summary: toWireSummary(await chat.summary(userId)) }
  })

  server.get('/user/:userId/greeting', async request => {
    const { userId } = parseInput(UserParamsSchema, request.params)
    return { user_id: userId, greeting: await chat.greeting(userId) }
  })
}
