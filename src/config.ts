import { z } from 'zod'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ledger: z.object({
    baseUrl: z.string({ required_error: 'LEDGER_API_URL is required' }).url('LEDGER_API_URL must be a valid URL'),
    clientApiKey: z.string({ required_error: 'LEDGER_CLIENT_API_KEY is required' }).min(1, 'LEDGER_CLIENT_API_KEY cannot be empty'),
    timeoutMs: z.coerce.number().int().min(1000).default(30000),
    maxRetries: z.coerce.number().int().min(0).max(10).default(3),
    retryDelayMs: z.coerce.number().int().min(0).default(1000)
  }),
  state: z.object({
    redisUrl: z.string().min(1).optional(),
    ttlSeconds: z.coerce.number().int().min(1).default(300),
    maxWriteAttempts: z.coerce.number().int().min(1).max(10).default(3)
  }),
  audit: z.object({
    maxEventsPerFlow: z.coerce.number().int().min(1).default(200)
  })
})

export type Config = z.infer<typeof configSchema>

function fieldToEnvVar(field: string): string {
  const mapping: Record<string, string> = {
    'port': 'PORT',
    'logLevel': 'LOG_LEVEL',
    'ledger.baseUrl': 'LEDGER_API_URL',
    'ledger.clientApiKey': 'LEDGER_CLIENT_API_KEY',
    'ledger.timeoutMs': 'LEDGER_TIMEOUT_MS',
    'ledger.maxRetries': 'LEDGER_MAX_RETRIES',
    'ledger.retryDelayMs': 'LEDGER_RETRY_DELAY_MS',
    'state.redisUrl': 'REDIS_URL',
    'state.ttlSeconds': 'SESSION_TTL_SECONDS',
    'state.maxWriteAttempts': 'STATE_MAX_WRITE_ATTEMPTS',
    'audit.maxEventsPerFlow': 'AUDIT_MAX_EVENTS_PER_FLOW'
  }
  return mapping[field] || field.toUpperCase()
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    ledger: {
      baseUrl: env.LEDGER_API_URL,
      clientApiKey: env.LEDGER_CLIENT_API_KEY,
      timeoutMs: env.LEDGER_TIMEOUT_MS,
      maxRetries: env.LEDGER_MAX_RETRIES,
      retryDelayMs: env.LEDGER_RETRY_DELAY_MS
    },
    state: {
      redisUrl: env.REDIS_URL || undefined,
      ttlSeconds: env.SESSION_TTL_SECONDS,
      maxWriteAttempts: env.STATE_MAX_WRITE_ATTEMPTS
    },
    audit: {
      maxEventsPerFlow: env.AUDIT_MAX_EVENTS_PER_FLOW
    }
  })

  if (!result.success) {
    const missingVars: string[] = []
    const errors = result.error.errors.map(e => {
      const field = e.path.join('.')
      const envVarName = fieldToEnvVar(field)
      if (e.code === 'invalid_type' && e.received === 'undefined') {
        missingVars.push(envVarName)
      }
      return { field, envVar: envVarName, message: e.message }
    })

    logger.error({ event: 'config_validation_failed', errors })

    if (missingVars.length > 0) {
      logger.error({
        event: 'missing_environment_variables',
        missing: missingVars,
        hint: 'Add these variables to your environment or .env file'
      })
    }

    const firstError = result.error.errors[0]
    const field = firstError.path.join('.')
    throw new ConfigError(firstError.message, field)
  }

  logger.info({
    event: 'config_loaded',
    port: result.data.port,
    logLevel: result.data.logLevel,
    stateBackend: result.data.state.redisUrl ? 'redis' : 'memory'
  })
  return result.data
}
