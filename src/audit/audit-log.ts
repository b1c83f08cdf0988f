import { createNoopLogger, type Logger } from '../logger.js'

export type AuditStatus = 'success' | 'failure' | 'in_progress'

export interface AuditEvent {
  timestamp: string
  flowId: string
  eventType: string
  stepId: string | null
  status: AuditStatus
  context: Record<string, unknown>
  error?: string
}

export interface AuditLog {
  logFlowEvent(
    flowId: string,
    eventType: string,
    stepId: string | null,
    context: Record<string, unknown>,
    status: AuditStatus,
    error?: string
  ): void
  logStateTransition(
    flowId: string,
    before: Record<string, unknown>,
    after: Record<string, unknown>,
    status: AuditStatus,
    error?: string
  ): void
  logValidationEvent(flowId: string, stepId: string, input: unknown, valid: boolean, error?: string): void
  getFlowHistory(flowId: string): AuditEvent[]
  getDroppedCount(): number
}

export interface AuditLogDeps {
  logger?: Logger
  maxEventsPerFlow?: number
  maxFlows?: number
  now?: () => Date
}

const SECRET_KEY_PATTERN = /token|authorization|secret|password|api-?key/i

export function redactSecrets(value: unknown, depth = 0): unknown {
  if (depth > 8) {
    return '[Truncated]'
  }
  if (Array.isArray(value)) {
    return value.map(item => redactSecrets(item, depth + 1))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SECRET_KEY_PATTERN.test(key) && entry !== null
        ? '[REDACTED]'
        : redactSecrets(entry, depth + 1)
    }
    return result
  }
  return value
}

function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactSecrets(context)
  return redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)
    ? { ...redacted }
    : {}
}

/**
 * Append-only audit trail of flow activity, written to the structured log and
 * kept in a bounded in-memory history per flow id for debugging and replay.
 * Writing an audit record never throws into the caller.
 */
export function createAuditLog(deps: AuditLogDeps = {}): AuditLog {
  const logger = deps.logger ?? createNoopLogger()
  const maxEventsPerFlow = deps.maxEventsPerFlow ?? 200
  const maxFlows = deps.maxFlows ?? 1000
  const now = deps.now ?? (() => new Date())

  const history = new Map<string, AuditEvent[]>()
  let dropped = 0

  function remember(event: AuditEvent): void {
    let events = history.get(event.flowId)
    if (!events) {
      if (history.size >= maxFlows) {
        const oldest = history.keys().next()
        if (!oldest.done) {
          history.delete(oldest.value)
        }
      }
      events = []
      history.set(event.flowId, events)
    }
    events.push(event)
    if (events.length > maxEventsPerFlow) {
      events.splice(0, events.length - maxEventsPerFlow)
    }
  }

  function record(event: AuditEvent): void {
    try {
      remember(event)
      logger.info({ event: 'audit', audit: event })
    } catch {
      dropped++
    }
  }

  function logFlowEvent(
    flowId: string,
    eventType: string,
    stepId: string | null,
    context: Record<string, unknown>,
    status: AuditStatus,
    error?: string
  ): void {
    record({
      timestamp: now().toISOString(),
      flowId,
      eventType,
      stepId,
      status,
      context: redactContext(context),
      ...(error !== undefined ? { error } : {})
    })
  }

  function logStateTransition(
    flowId: string,
    before: Record<string, unknown>,
    after: Record<string, unknown>,
    status: AuditStatus,
    error?: string
  ): void {
    record({
      timestamp: now().toISOString(),
      flowId,
      eventType: 'state_transition',
      stepId: null,
      status,
      context: redactContext({ from: before, to: after }),
      ...(error !== undefined ? { error } : {})
    })
  }

  function logValidationEvent(flowId: string, stepId: string, input: unknown, valid: boolean, error?: string): void {
    record({
      timestamp: now().toISOString(),
      flowId,
      eventType: 'validation',
      stepId,
      status: valid ? 'success' : 'failure',
      context: redactContext({ input }),
      ...(error !== undefined ? { error } : {})
    })
  }

  function getFlowHistory(flowId: string): AuditEvent[] {
    return [...(history.get(flowId) ?? [])]
  }

  function getDroppedCount(): number {
    return dropped
  }

  return { logFlowEvent, logStateTransition, logValidationEvent, getFlowHistory, getDroppedCount }
}
