/**
 * HTTP server: Fastify with CORS, the chat routes, a health check and one
 * error handler that turns the error taxonomy into JSON responses.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import cors from '@fastify/cors'
import { ZodError } from 'zod'
import { registerChatRoutes } from './api/routes.js'
import type { ChatService } from './chat/chat-service.js'
import { AppError, InputError } from './errors.js'

export const APP_VERSION = '1.0.0'

export interface ServerDeps {
  chat: ChatService
  logger?: FastifyServerOptions['logger']
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const server = Fastify({ logger: deps.logger ?? true })

  await server.register(cors, { origin: '*' })

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed')
        return reply.code(error.statusCode).send({ error: 'Service temporarily unavailable', code: error.code })
      }
      const details = error instanceof InputError ? error.details : undefined
      return reply.code(error.statusCode).send({ error: error.message, code: error.code, details })
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid input', code: 'ERR_INPUT', details: error.issues })
    }
    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message, code: error.code })
    }

    request.log.error({ err: error }, 'Unhandled error')
    return reply.code(500).send({ error: 'Internal server error' })
  })

  server.get('/', async () => ({
    message: 'Supportive chat API',
    version: APP_VERSION,
    endpoints: [
      'POST /chat',
      'GET /conversation/:userId/history',
      'GET /user/:userId/analysis',
      'GET /user/:userId/summary',
      'GET /user/:userId/greeting',
      'GET /health',
    ],
  }))

  server.get('/health', async () => ({ status: 'healthy', version: APP_VERSION }))

  registerChatRoutes(server, deps.chat)

  return server
}
