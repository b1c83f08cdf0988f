import { StateConflictError, StateInvalidError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { err, ok, type Result } from '../result.js'
import type { AuditLog } from '../audit/audit-log.js'
import { describeIssues, sessionSchema, sessionShapeSchema } from './schema.js'
import {
  CRITICAL_FIELDS,
  type ChannelIdentity,
  type CriticalField,
  type Session,
  type SessionUpdate,
  type StateStore
} from './types.js'

export const DEFAULT_SESSION_TTL_SECONDS = 300
export const DEFAULT_MAX_WRITE_ATTEMPTS = 3

export interface StateManagerDeps {
  store: StateStore
  ttlSeconds?: number
  maxWriteAttempts?: number
  audit?: AuditLog
  logger?: Logger
  now?: () => Date
}

export type UpdateResult = Result<Session, StateConflictError | StateInvalidError>

export interface StateManager {
  load(identity: ChannelIdentity): Promise<Session>
  update(identity: ChannelIdentity, update: SessionUpdate): Promise<UpdateResult>
  getField<K extends keyof Session>(session: Session, key: K): Result<Session[K], StateInvalidError>
  validate(session: Session): Result<Session, StateInvalidError>
  reset(identity: ChannelIdentity): Promise<UpdateResult>
}

export function sessionKey(identity: ChannelIdentity): string {
  return `channel:${identity.channelType}:${identity.identifier}`
}

export function createEmptySession(identity: ChannelIdentity): Session {
  return {
    channelIdentity: { channelType: identity.channelType, identifier: identity.identifier },
    memberId: null,
    accountId: null,
    authenticated: false,
    authToken: null,
    profileSnapshot: null,
    activeAccount: null,
    flow: null,
    version: 0,
    lastUpdated: null
  }
}

function isCriticalField(key: keyof Session): key is CriticalField {
  return CRITICAL_FIELDS.some(field => field === key)
}

function applyUpdate(current: Session, update: SessionUpdate): Session {
  const next: Session = { ...current }
  if (update.memberId !== undefined) next.memberId = update.memberId
  if (update.accountId !== undefined) next.accountId = update.accountId
  if (update.authenticated !== undefined) next.authenticated = update.authenticated
  if (update.authToken !== undefined) next.authToken = update.authToken
  if (update.profileSnapshot !== undefined) next.profileSnapshot = update.profileSnapshot
  if (update.activeAccount !== undefined) next.activeAccount = update.activeAccount
  if (update.flow !== undefined) next.flow = update.flow
  return next
}

function summarize(session: Session) {
  return {
    version: session.version,
    authenticated: session.authenticated,
    memberId: session.memberId,
    flowType: session.flow?.flowType ?? null,
    stepIndex: session.flow?.stepIndex ?? null
  }
}

export function createStateManager(deps: StateManagerDeps): StateManager {
  const { store, audit } = deps
  const ttlSeconds = deps.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS
  const maxWriteAttempts = deps.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS
  const logger = deps.logger ?? createNoopLogger()
  const now = deps.now ?? (() => new Date())

  function parsePayload(key: string, payload: string): unknown {
    try {
      return JSON.parse(payload)
    } catch (error) {
      logger.warn({ event: 'state_payload_unreadable', key, error })
      return undefined
    }
  }

  async function load(identity: ChannelIdentity): Promise<Session> {
    const key = sessionKey(identity)
    const result = await store.get(key)
    if (!result.found) {
      return createEmptySession(identity)
    }

    const parsed = sessionShapeSchema.safeParse(parsePayload(key, result.value.payload))
    if (!parsed.success) {
      logger.warn({ event: 'state_shape_invalid', key, issues: describeIssues(parsed.error) })
      return { ...createEmptySession(identity), version: result.value.version }
    }

    if (parsed.data.channelIdentity.identifier !== identity.identifier ||
      parsed.data.channelIdentity.channelType !== identity.channelType) {
      logger.warn({ event: 'state_identity_mismatch', key })
      return { ...createEmptySession(identity), version: result.value.version }
    }

    return { ...parsed.data, version: result.value.version }
  }

  function validate(session: Session): Result<Session, StateInvalidError> {
    const result = sessionSchema.safeParse(session)
    if (!result.success) {
      const issues = describeIssues(result.error)
      return err(new StateInvalidError(`Session failed validation: ${issues.join('; ')}`, issues))
    }
    return ok(session)
  }

  function getField<K extends keyof Session>(session: Session, key: K): Result<Session[K], StateInvalidError> {
    if (isCriticalField(key)) {
      const validation = validate(session)
      if (!validation.ok) {
        logger.warn({ event: 'critical_field_blocked', field: key, issues: validation.error.issues })
        return validation
      }
    }
    return ok(session[key])
  }

  async function update(identity: ChannelIdentity, changes: SessionUpdate): Promise<UpdateResult> {
    const key = sessionKey(identity)

    for (let attempt = 1; attempt <= maxWriteAttempts; attempt++) {
      const current = await load(identity)
      const merged: Session = {
        ...applyUpdate(current, changes),
        version: current.version + 1,
        lastUpdated: now().toISOString()
      }

      const validation = validate(merged)
      if (!validation.ok) {
        logger.warn({ event: 'state_update_rejected', key, issues: validation.error.issues })
        return validation
      }

      const written = await store.compareAndSet(
        key,
        current.version,
        { version: merged.version, payload: JSON.stringify(merged) },
        ttlSeconds
      )

      if (written.ok) {
        logger.debug({ event: 'state_updated', key, version: merged.version, attempt })
        const flowId = merged.flow?.flowId ?? current.flow?.flowId
        if (audit && flowId) {
          audit.logStateTransition(flowId, summarize(current), summarize(merged), 'success')
        }
        return ok(merged)
      }

      logger.warn({
        event: 'state_write_conflict',
        key,
        attempt,
        expectedVersion: current.version,
        currentVersion: written.current?.version ?? 0
      })
    }

    logger.error({ event: 'state_write_conflict_exhausted', key, attempts: maxWriteAttempts })
    return err(new StateConflictError(key, maxWriteAttempts))
  }

  async function reset(identity: ChannelIdentity): Promise<UpdateResult> {
    return update(identity, { authenticated: false, authToken: null, flow: null })
  }

  return {
    load,
    update,
    getField,
    validate,
    reset
  }
}
