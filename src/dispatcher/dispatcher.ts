import type { AuditLog } from '../audit/audit-log.js'
import { StateInvalidError, toAppError, type AppError } from '../errors.js'
import { activeDashboardAccount, pendingOffersFor, preselectContext } from '../flows/action.js'
import type { FlowEngine, FlowOutcome } from '../flows/engine.js'
import { isUpgradeAvailable, resolveTrigger, type FlowTrigger } from '../flows/index.js'
import type { FlowInput } from '../flows/types.js'
import { inputText } from '../flows/validators.js'
import type { LedgerClient } from '../ledger/types.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage, withNotice, type OutboundMessage } from '../outbound.js'
import type { StateManager } from '../state/state-manager.js'
import type { ChannelIdentity, JsonObject, Session, SessionUpdate } from '../state/types.js'
import { MENU_COMMANDS, renderLedger, renderMenu } from './menu.js'

export interface InboundEvent {
  channelIdentity: ChannelIdentity
  messageKind: FlowInput['kind']
  rawValue: FlowInput['value']
}

export interface FlowDispatcherDeps {
  stateManager: StateManager
  engine: FlowEngine
  ledger: LedgerClient
  audit: AuditLog
  messages: MessageRenderer
  logger?: Logger
}

export interface FlowDispatcher {
  handle(event: InboundEvent): Promise<OutboundMessage>
}

export const GREETING_KEYWORDS: ReadonlySet<string> = new Set([
  'menu', 'memu', 'hi', 'hie', 'home', 'hy', 'reset', 'hello', 'hey', 'retry'
])

const DISPATCH_FLOW_ID = 'dispatcher'

interface ErrorScope {
  flowId: string | null
  stepId: string | null
}

export function createFlowDispatcher(deps: FlowDispatcherDeps): FlowDispatcher {
  const { stateManager, engine, ledger, audit, messages } = deps
  const logger = deps.logger ?? createNoopLogger()

  async function persist(identity: ChannelIdentity, changes: SessionUpdate): Promise<Session> {
    const result = await stateManager.update(identity, changes)
    if (!result.ok) {
      throw result.error
    }
    return result.value
  }

  function errorMessage(error: AppError): OutboundMessage {
    if (error.kind === 'validation') {
      return textMessage(messages.render(error.reasonKey))
    }
    if (error.kind === 'api') {
      return textMessage(messages.render('error_api', { message: error.message }))
    }
    return textMessage(messages.render(`error_${error.kind}`))
  }

  async function recover(identity: ChannelIdentity, error: AppError): Promise<void> {
    const result = error instanceof StateInvalidError
      ? await stateManager.reset(identity)
      : await stateManager.update(identity, { flow: null })
    if (!result.ok) {
      logger.error({ event: 'dispatch_recovery_failed', channel: identity.channelType, error: result.error })
    }
  }

  async function fail(identity: ChannelIdentity, error: AppError, scope: ErrorScope): Promise<OutboundMessage> {
    audit.logFlowEvent(
      scope.flowId ?? DISPATCH_FLOW_ID,
      'dispatch_error',
      scope.stepId,
      { errorKind: error.kind },
      'failure',
      error.message
    )
    logger.error({ event: 'dispatch_failed', flowId: scope.flowId, stepId: scope.stepId, errorKind: error.kind, error })

    const message = errorMessage(error)
    if (error.kind === 'validation') {
      return message
    }
    try {
      await recover(identity, error)
    } catch (recoveryError) {
      logger.error({ event: 'dispatch_recovery_failed', channel: identity.channelType, error: recoveryError })
    }
    return backToMenu(identity, message)
  }

  /** Puts the error above the menu while the member is still signed in. */
  async function backToMenu(identity: ChannelIdentity, notice: OutboundMessage): Promise<OutboundMessage> {
    try {
      const session = await stateManager.load(identity)
      if (session.authenticated && !session.flow && stateManager.validate(session).ok) {
        return withNotice(renderMenu(messages, session), notice.body)
      }
    } catch (loadError) {
      logger.warn({ event: 'dispatch_menu_unavailable', channel: identity.channelType, error: loadError })
    }
    return notice
  }

  async function settle(identity: ChannelIdentity, outcome: FlowOutcome): Promise<OutboundMessage> {
    if (outcome.status === 'errored') {
      return fail(identity, outcome.error, { flowId: outcome.flowId, stepId: outcome.stepId })
    }
    await persist(identity, { flow: outcome.flow })
    return outcome.message
  }

  /** Logs in when needed; null means the member is not registered. */
  async function authenticate(identity: ChannelIdentity, session: Session): Promise<Session | null> {
    if (session.authenticated) {
      return session
    }
    const login = await ledger.login(identity)
    if (login.kind === 'new_member') {
      return null
    }
    return stateManager.load(identity)
  }

  async function startRegistration(identity: ChannelIdentity, session: Session): Promise<OutboundMessage> {
    const outcome = await engine.start('registration', session, {})
    const message = await settle(identity, outcome)
    return outcome.status === 'running'
      ? withNotice(message, messages.render('registration_welcome'))
      : message
  }

  async function startFlow(identity: ChannelIdentity, session: Session, trigger: FlowTrigger): Promise<OutboundMessage> {
    let current = session
    if (engine.definition(trigger.flowType).requiresAuth) {
      const authenticated = await authenticate(identity, session)
      if (!authenticated) {
        return startRegistration(identity, session)
      }
      current = authenticated
    }

    let context: JsonObject = {}
    if (trigger.flowType === 'accept' || trigger.flowType === 'decline' || trigger.flowType === 'cancel') {
      if (trigger.credexId) {
        context = preselectContext(trigger.flowType, current, trigger.credexId)
      } else if (pendingOffersFor(trigger.flowType, current).length === 0) {
        return textMessage(messages.render('no_pending_offers'))
      }
    }
    if (trigger.flowType === 'upgrade' && !isUpgradeAvailable(current)) {
      return textMessage(messages.render('upgrade_unavailable'))
    }

    return settle(identity, await engine.start(trigger.flowType, current, context))
  }

  async function showMenu(identity: ChannelIdentity, session: Session, refresh: boolean): Promise<OutboundMessage> {
    const authenticated = await authenticate(identity, session)
    if (!authenticated) {
      return startRegistration(identity, session)
    }
    if (refresh && authenticated === session) {
      await ledger.getDashboard(identity)
      return renderMenu(messages, await stateManager.load(identity))
    }
    return renderMenu(messages, authenticated)
  }

  async function acceptAll(identity: ChannelIdentity, session: Session): Promise<OutboundMessage> {
    const authenticated = await authenticate(identity, session)
    if (!authenticated) {
      return startRegistration(identity, session)
    }
    const pending = pendingOffersFor('accept', authenticated)
    if (pending.length === 0) {
      return textMessage(messages.render('no_pending_offers'))
    }
    await ledger.acceptOffersBulk(identity, pending.map(offer => offer.credexID))
    await ledger.getDashboard(identity)
    return textMessage(messages.render('accept_all_complete', { count: pending.length }))
  }

  async function viewLedger(identity: ChannelIdentity, session: Session): Promise<OutboundMessage> {
    const authenticated = await authenticate(identity, session)
    if (!authenticated) {
      return startRegistration(identity, session)
    }
    const account = activeDashboardAccount(authenticated)
    const accountId = authenticated.accountId ?? account?.accountID
    if (!accountId) {
      return renderMenu(messages, authenticated)
    }
    const page = await ledger.getLedger(identity, { accountId })
    return renderLedger(messages, account?.accountName ?? authenticated.activeAccount?.accountName ?? '', page)
  }

  async function route(identity: ChannelIdentity, input: FlowInput, scope: ErrorScope): Promise<OutboundMessage> {
    const session = await stateManager.load(identity)
    const valid = stateManager.validate(session)
    if (!valid.ok) {
      throw valid.error
    }
    const text = inputText(input)
    const command = text?.toLowerCase() ?? null

    if (command !== null && GREETING_KEYWORDS.has(command)) {
      if (session.flow) {
        audit.logFlowEvent(session.flow.flowId, 'abandoned', null, { flowType: session.flow.flowType, command }, 'success')
        await persist(identity, { flow: null })
        return showMenu(identity, await stateManager.load(identity), true)
      }
      return showMenu(identity, session, true)
    }

    if (session.flow) {
      scope.flowId = session.flow.flowId
      return settle(identity, await engine.processInput(session, input))
    }

    const trigger = text === null ? null : resolveTrigger(text)
    if (trigger) {
      return startFlow(identity, session, trigger)
    }

    if (command === MENU_COMMANDS.viewLedger) {
      return viewLedger(identity, session)
    }
    if (command === MENU_COMMANDS.acceptAll) {
      return acceptAll(identity, session)
    }
    return showMenu(identity, session, command === MENU_COMMANDS.refresh)
  }

  async function handle(event: InboundEvent): Promise<OutboundMessage> {
    const identity = event.channelIdentity
    const input: FlowInput = { kind: event.messageKind, value: event.rawValue }
    const scope: ErrorScope = { flowId: null, stepId: null }

    logger.info({ event: 'dispatch_start', channel: identity.channelType, messageKind: event.messageKind })
    try {
      return await route(identity, input, scope)
    } catch (error) {
      return fail(identity, toAppError(error), scope)
    }
  }

  return { handle }
}
