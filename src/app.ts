import type { FastifyInstance } from 'fastify'
import { Redis } from 'ioredis'
import { createAuditLog, type AuditLog } from './audit/audit-log.js'
import { loadConfig, type Config } from './config.js'
import { createFlowDispatcher, type FlowDispatcher } from './dispatcher/dispatcher.js'
import { createFlowEngine, type FlowEngine } from './flows/engine.js'
import { createFlowRegistry } from './flows/index.js'
import { createLedgerClient } from './ledger/client.js'
import type { LedgerClient } from './ledger/types.js'
import { createLogger, type Logger } from './logger.js'
import { createMessageRenderer, loadMessages, type Messages } from './messages.js'
import { createServer } from './server.js'
import { createInMemoryStateStore } from './state/memory-store.js'
import { createRedisStateStore } from './state/redis-store.js'
import { createStateManager, type StateManager } from './state/state-manager.js'
import type { StateStore } from './state/types.js'
import { createWebhookHandler, type WebhookHandler } from './webhook/handler.js'

export interface AppDependencies {
  config: Config
  logger: Logger
  messages: Messages
  store: StateStore
  stateManager: StateManager
  audit: AuditLog
  ledger: LedgerClient
  engine: FlowEngine
  dispatcher: FlowDispatcher
  webhookHandler: WebhookHandler
}

export interface App {
  server: FastifyInstance
  dependencies: AppDependencies
}

export interface AppOverrides {
  store?: StateStore
  fetchFunction?: typeof fetch
  sleep?: (ms: number) => Promise<void>
}

interface StoreHandle {
  store: StateStore
  close?: () => Promise<void>
}

function createStore(config: Config, logger: Logger): StoreHandle {
  if (!config.state.redisUrl) {
    logger.warn({ event: 'state_store_in_memory', hint: 'Set REDIS_URL to share sessions across instances' })
    return { store: createInMemoryStateStore() }
  }
  const redis = new Redis(config.state.redisUrl, { maxRetriesPerRequest: 3 })
  redis.on('error', (error: Error) => logger.error({ event: 'redis_error', error }))
  return {
    store: createRedisStateStore(redis, logger),
    close: async () => {
      await redis.quit()
    }
  }
}

export function createApp(env: NodeJS.ProcessEnv = process.env, overrides: AppOverrides = {}): App {
  const config = loadConfig(env)
  const logger = createLogger('credex-chat-agent', config.logLevel)
  const messages = loadMessages()
  const renderer = createMessageRenderer(messages)

  const storeHandle: StoreHandle = overrides.store ? { store: overrides.store } : createStore(config, logger)
  const { store } = storeHandle

  const audit = createAuditLog({
    logger: logger.child({ component: 'audit' }),
    maxEventsPerFlow: config.audit.maxEventsPerFlow
  })

  const stateManager = createStateManager({
    store,
    ttlSeconds: config.state.ttlSeconds,
    maxWriteAttempts: config.state.maxWriteAttempts,
    audit,
    logger
  })

  const ledger = createLedgerClient({
    config: config.ledger,
    stateManager,
    logger,
    ...(overrides.fetchFunction ? { fetchFunction: overrides.fetchFunction } : {}),
    ...(overrides.sleep ? { sleep: overrides.sleep } : {})
  })

  const engine = createFlowEngine({
    flows: createFlowRegistry(renderer),
    audit,
    ledger,
    messages: renderer,
    logger
  })

  const dispatcher = createFlowDispatcher({ stateManager, engine, ledger, audit, messages: renderer, logger })
  const webhookHandler = createWebhookHandler({ dispatcher, logger })

  logger.info({ event: 'dependencies_loaded', messageKeys: Object.keys(messages).length })

  const server = createServer(config, logger, webhookHandler)
  const closeStore = storeHandle.close
  if (closeStore) {
    server.addHook('onClose', async () => {
      await closeStore()
    })
  }

  return {
    server,
    dependencies: { config, logger, messages, store, stateManager, audit, ledger, engine, dispatcher, webhookHandler }
  }
}
