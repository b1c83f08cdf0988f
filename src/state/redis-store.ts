import { z } from 'zod'
import { SystemError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { CompareAndSetResult, GetResult, StateStore, StoredValue } from './types.js'

/** The subset of the ioredis client this store needs. */
export interface RedisCommands {
  hgetall(key: string): Promise<Record<string, string>>
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>
  del(...keys: string[]): Promise<number>
}

// KEYS[1] key; ARGV: expected version, new version, payload, ttl seconds.
// Returns {applied, currentVersion, currentPayload}.
export const COMPARE_AND_SET_SCRIPT = `
local current = tonumber(redis.call('HGET', KEYS[1], 'version') or '0')
if current ~= tonumber(ARGV[1]) then
  return {0, current, redis.call('HGET', KEYS[1], 'payload') or ''}
end
redis.call('HSET', KEYS[1], 'version', ARGV[2], 'payload', ARGV[3])
redis.call('EXPIRE', KEYS[1], tonumber(ARGV[4]))
return {1, tonumber(ARGV[2]), ARGV[3]}
`

// KEYS[1] key; ARGV: version, payload, ttl seconds.
export const SET_SCRIPT = `
redis.call('DEL', KEYS[1])
redis.call('HSET', KEYS[1], 'version', ARGV[1], 'payload', ARGV[2])
redis.call('EXPIRE', KEYS[1], tonumber(ARGV[3]))
return 1
`

const casReplySchema = z.tuple([z.number(), z.number(), z.string()])

const storedVersionSchema = z.coerce.number().int().min(0)

const storedHashSchema = z.object({
  version: storedVersionSchema,
  payload: z.string()
})

export function createRedisStateStore(redis: RedisCommands, logger?: Logger): StateStore {
  const log = logger ?? createNoopLogger()

  async function get(key: string): Promise<GetResult> {
    const hash = await redis.hgetall(key)
    if (Object.keys(hash).length === 0) {
      return { found: false }
    }
    const parsed = storedHashSchema.safeParse(hash)
    if (parsed.success) {
      return { found: true, value: parsed.data }
    }

    log.warn({ event: 'redis_state_malformed', key, fields: Object.keys(hash) })
    // CAS compares against the stored version
    const version = storedVersionSchema.safeParse(hash['version'])
    if (version.success) {
      return { found: true, value: { version: version.data, payload: '' } }
    }
    await redis.del(key)
    return { found: false }
  }

  async function set(key: string, value: StoredValue, ttlSeconds: number): Promise<void> {
    await redis.eval(SET_SCRIPT, 1, key, value.version, value.payload, ttlSeconds)
  }

  async function compareAndSet(
    key: string,
    expectedVersion: number,
    value: StoredValue,
    ttlSeconds: number
  ): Promise<CompareAndSetResult> {
    const reply = await redis.eval(
      COMPARE_AND_SET_SCRIPT,
      1,
      key,
      expectedVersion,
      value.version,
      value.payload,
      ttlSeconds
    )

    const parsed = casReplySchema.safeParse(reply)
    if (!parsed.success) {
      log.error({ event: 'redis_cas_unexpected_reply', key })
      throw new SystemError(`Unexpected compare-and-set reply for ${key}`)
    }

    const [applied, currentVersion, currentPayload] = parsed.data
    const current = currentVersion === 0 && currentPayload === ''
      ? null
      : { version: currentVersion, payload: currentPayload }

    return { ok: applied === 1, current }
  }

  async function deleteKey(key: string): Promise<void> {
    await redis.del(key)
  }

  return { get, set, compareAndSet, delete: deleteKey }
}
