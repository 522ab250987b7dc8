/**
 * Supportive chat service - main entry point
 */

import 'dotenv/config'
import { createLlmResponder } from './chat/responder.js'
import { ChatService } from './chat/chat-service.js'
import { loadConfig } from './config.js'
import { ContextAnalysisEngine, getLexicon, loadLexicon } from './context/index.js'
import { ProviderChain, buildProviders } from './llm/providerChain.js'
import { buildServer } from './server.js'
import type { ContextStore } from './store/context-store.js'
import { closeDatabase, initDatabase, runMigrations } from './store/database.js'
import { MemoryContextStore } from './store/memory-context-store.js'
import { PgContextStore } from './store/pg-context-store.js'

const config = loadConfig()

let store: ContextStore
if (config.databaseUrl) {
  initDatabase(config.databaseUrl)
  await runMigrations()
  store = new PgContextStore()
} else {
  console.warn('[DB] DATABASE_URL not set; conversation state is kept in memory and lost on restart')
  store = new MemoryContextStore()
}

const engine = new ContextAnalysisEngine({
  store,
  lexicon: config.lexiconPath ? loadLexicon(config.lexiconPath) : getLexicon(),
  settings: config.analysis,
})

const chat = new ChatService({
  engine,
  store,
  responder: createLlmResponder(new ProviderChain(buildProviders(config.llm))),
  historyLimit: config.historyLimit,
})

const server = await buildServer({ chat, logger: { level: config.logLevel } })

const start = async () => {
  try {
    await server.listen({ port: config.port, host: config.host })
    server.log.info(`Chat service ready on port ${config.port} | env: ${config.env}`)
  } catch (err) {
    server.log.error(err)
    await closeDatabase()
    process.exit(1)
  }
}

const shutdown = async (signal: string) => {
  server.log.info(`${signal} received, shutting down`)
  await server.close()
  await closeDatabase()
  process.exit(0)
}

process.on('SIGTERM', () => { void shutdown('SIGTERM') })
process.on('SIGINT', () => { void shutdown('SIGINT') })

await start()
