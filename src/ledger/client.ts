import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'
import {
  AuthenticationError,
  LedgerApiError,
  NetworkError,
  type LedgerErrorCode
} from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { StateManager } from '../state/state-manager.js'
import type { ChannelIdentity, JsonValue, SessionUpdate } from '../state/types.js'
import { LEDGER_ENDPOINTS, buildEndpointUrl } from './endpoints.js'
import {
  ledgerEnvelopeSchema,
  ledgerPageSchema,
  parseDashboard,
  selectDefaultAccount,
  toActiveAccount,
  type AccountSummary,
  type ActionResult,
  type CreateOfferInput,
  type Dashboard,
  type GetLedgerInput,
  type LedgerClient,
  type LedgerConfig,
  type LedgerEndpointName,
  type LedgerEnvelope,
  type LedgerPage,
  type LoginResult,
  type RegisterMemberInput,
  type RequestOptions
} from './types.js'

export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_RETRY_DELAY_MS = 1_000

export interface LedgerClientDeps {
  config: LedgerConfig
  stateManager: StateManager
  logger?: Logger
  fetchFunction?: typeof fetch
  sleep?: (ms: number) => Promise<void>
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
  details: z.object({ reason: z.string().optional() }).optional(),
  data: z.object({
    action: z.object({
      details: z.object({ reason: z.string().optional() }).optional()
    }).optional()
  }).optional()
})

const accountDetailsSchema = z.object({
  accountID: z.string(),
  accountName: z.string(),
  accountHandle: z.string().optional()
})

function parseErrorCode(statusCode: number): LedgerErrorCode {
  if (statusCode === 400) return 'invalid_data'
  if (statusCode === 401) return 'unauthorized'
  if (statusCode === 403) return 'forbidden'
  if (statusCode === 404) return 'not_found'
  if (statusCode >= 500) return 'server_error'
  return 'unknown'
}

function fallbackMessage(statusCode: number): string {
  if (statusCode === 401) return 'Authentication with the ledger failed'
  if (statusCode === 403) return 'You do not have permission to perform this action'
  if (statusCode === 404) return 'The requested resource was not found'
  if (statusCode >= 500) return 'The ledger service is unavailable, please try again later'
  return `Ledger request failed with status ${statusCode}`
}

export function extractErrorMessage(statusCode: number, responseBody: string): string {
  let body: unknown
  try {
    body = JSON.parse(responseBody)
  } catch {
    return fallbackMessage(statusCode)
  }

  const parsed = errorBodySchema.safeParse(body)
  if (!parsed.success) {
    return fallbackMessage(statusCode)
  }

  const { message, error, details, data } = parsed.data
  return message ||
    data?.action?.details?.reason ||
    details?.reason ||
    error ||
    fallbackMessage(statusCode)
}

function toActionResult(envelope: LedgerEnvelope): ActionResult {
  const action = envelope.data?.action
  return {
    actionId: action?.id ?? null,
    actionType: action?.type ?? null,
    details: action?.details ?? {}
  }
}

export function createLedgerClient(deps: LedgerClientDeps): LedgerClient {
  const { config, stateManager } = deps
  const log = deps.logger ?? createNoopLogger()
  const fetchFunction = deps.fetchFunction ?? fetch
  const sleep = deps.sleep ?? ((ms: number) => delay(ms))
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES
  const retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS

  function buildHeaders(token: string | null): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'x-client-api-key': config.clientApiKey
    }
    if (token) {
      headers['Authorization'] = `Bearer ${token}`
    }
    return headers
  }

  async function send(endpoint: LedgerEndpointName, token: string | null, payload: Record<string, unknown>): Promise<Response> {
    const url = buildEndpointUrl(config.baseUrl, endpoint)
    const body = JSON.stringify(payload)
    let lastError: unknown

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(retryDelayMs)
      }
      try {
        return await fetchFunction(url, {
          method: LEDGER_ENDPOINTS[endpoint].method,
          headers: buildHeaders(token),
          body,
          signal: AbortSignal.timeout(timeoutMs)
        })
      } catch (error) {
        lastError = error
        log.warn({ event: 'ledger_network_error', endpoint, attempt: attempt + 1, error })
      }
    }

    log.error({ event: 'ledger_network_exhausted', endpoint, attempts: maxRetries + 1 })
    throw new NetworkError(`Ledger service unreachable (${endpoint})`, maxRetries + 1, { cause: lastError })
  }

  async function readBody(response: Response): Promise<string> {
    try {
      return await response.text()
    } catch (error) {
      log.error({ event: 'ledger_response_read_error', error })
      return ''
    }
  }

  async function currentToken(identity: ChannelIdentity): Promise<string | null> {
    const session = await stateManager.load(identity)
    const token = stateManager.getField(session, 'authToken')
    if (!token.ok) {
      throw token.error
    }
    return token.value
  }

  async function persist(identity: ChannelIdentity, changes: SessionUpdate): Promise<void> {
    const result = await stateManager.update(identity, changes)
    if (!result.ok) {
      throw result.error
    }
  }

  async function markUnauthenticated(identity: ChannelIdentity): Promise<void> {
    await persist(identity, { authenticated: false, authToken: null })
  }

  async function refreshSnapshot(identity: ChannelIdentity, envelope: LedgerEnvelope): Promise<void> {
    const dashboard = envelope.data?.dashboard
    if (dashboard === undefined) {
      return
    }
    const result = await stateManager.update(identity, { profileSnapshot: dashboard })
    if (!result.ok) {
      log.warn({ event: 'ledger_snapshot_refresh_failed', error: result.error.message })
    }
  }

  async function perform(
    identity: ChannelIdentity,
    endpoint: LedgerEndpointName,
    payload: Record<string, unknown>,
    requiresAuth: boolean
  ): Promise<unknown> {
    let token: string | null = null
    let refreshed = false

    if (requiresAuth) {
      token = await currentToken(identity)
      if (!token) {
        log.info({ event: 'ledger_token_missing', endpoint })
        token = await refreshToken(identity)
        refreshed = true
      }
    }

    log.info({ event: 'ledger_request_start', endpoint })
    let response = await send(endpoint, token, payload)

    if (response.status === 401 && requiresAuth) {
      if (refreshed) {
        await markUnauthenticated(identity)
        throw new AuthenticationError(`Ledger rejected the refreshed token (${endpoint})`)
      }
      log.info({ event: 'ledger_token_rejected', endpoint })
      token = await refreshToken(identity)
      response = await send(endpoint, token, payload)
      if (response.status === 401) {
        await markUnauthenticated(identity)
        throw new AuthenticationError(`Ledger rejected the refreshed token (${endpoint})`)
      }
    }

    const text = await readBody(response)

    if (!response.ok) {
      log.error({ event: 'ledger_api_error', endpoint, statusCode: response.status })
      throw new LedgerApiError(
        extractErrorMessage(response.status, text),
        response.status,
        parseErrorCode(response.status)
      )
    }

    let body: unknown
    try {
      body = text === '' ? {} : JSON.parse(text)
    } catch (error) {
      log.error({ event: 'ledger_json_parse_error', endpoint, error })
      throw new LedgerApiError('The ledger returned an unreadable response', response.status, 'invalid_response', { cause: error })
    }

    log.info({ event: 'ledger_request_success', endpoint, statusCode: response.status })

    if (requiresAuth) {
      const envelope = ledgerEnvelopeSchema.safeParse(body)
      if (envelope.success) {
        await refreshSnapshot(identity, envelope.data)
      }
    }

    return body
  }

  function parseEnvelope(endpoint: LedgerEndpointName, body: unknown): LedgerEnvelope {
    const envelope = ledgerEnvelopeSchema.safeParse(body)
    if (!envelope.success) {
      log.error({ event: 'ledger_response_invalid', endpoint, issues: envelope.error.issues.length })
      throw new LedgerApiError('The ledger returned an unexpected response', undefined, 'invalid_response')
    }
    return envelope.data
  }

  async function establishSession(identity: ChannelIdentity, endpoint: LedgerEndpointName, body: unknown): Promise<LoginResult> {
    const envelope = parseEnvelope(endpoint, body)
    const details = envelope.data?.action?.details ?? {}
    const token = details['token']
    if (typeof token !== 'string' || token === '') {
      await markUnauthenticated(identity)
      throw new AuthenticationError(`The ledger did not issue a token (${endpoint})`)
    }

    const dashboard = parseDashboard(envelope.data?.dashboard)
    const detailMemberId = details['memberID']
    const memberId = typeof detailMemberId === 'string' ? detailMemberId : dashboard?.member.memberID
    if (!memberId) {
      await markUnauthenticated(identity)
      throw new AuthenticationError(`The ledger did not identify the member (${endpoint})`)
    }

    const account = dashboard ? selectDefaultAccount(dashboard) : null
    await persist(identity, {
      authToken: token,
      memberId,
      authenticated: true,
      profileSnapshot: envelope.data?.dashboard ?? null,
      accountId: account?.accountID ?? null,
      activeAccount: account ? toActiveAccount(account) : null
    })

    log.info({ event: 'ledger_session_established', endpoint, memberId })
    return { kind: 'authenticated', memberId, dashboard }
  }

  async function login(identity: ChannelIdentity): Promise<LoginResult> {
    let body: unknown
    try {
      body = await perform(identity, 'login', { phone: identity.identifier }, false)
    } catch (error) {
      if (error instanceof LedgerApiError && error.statusCode === 400) {
        log.info({ event: 'ledger_login_new_member' })
        return { kind: 'new_member', message: error.message }
      }
      if (error instanceof LedgerApiError && error.statusCode === 401) {
        await markUnauthenticated(identity)
        throw new AuthenticationError(error.message, { cause: error })
      }
      throw error
    }
    return establishSession(identity, 'login', body)
  }

  async function refreshToken(identity: ChannelIdentity): Promise<string> {
    let result: LoginResult
    try {
      result = await login(identity)
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      await markUnauthenticated(identity)
      throw new AuthenticationError('Could not refresh the ledger session', { cause: error })
    }

    if (result.kind === 'new_member') {
      await markUnauthenticated(identity)
      throw new AuthenticationError('Member is not registered with the ledger')
    }

    const token = await currentToken(identity)
    if (!token) {
      throw new AuthenticationError('Ledger session was not stored after login')
    }
    return token
  }

  async function request(
    identity: ChannelIdentity,
    endpoint: LedgerEndpointName,
    payload: Record<string, unknown>,
    options: RequestOptions = {}
  ): Promise<unknown> {
    return perform(identity, endpoint, payload, options.requiresAuth ?? LEDGER_ENDPOINTS[endpoint].requiresAuth)
  }

  async function registerMember(identity: ChannelIdentity, input: RegisterMemberInput): Promise<LoginResult> {
    const body = await request(identity, 'onboardMember', {
      firstname: input.firstName,
      lastname: input.lastName,
      phone: identity.identifier,
      defaultDenom: input.defaultDenom
    })
    return establishSession(identity, 'onboardMember', body)
  }

  async function getDashboard(identity: ChannelIdentity): Promise<Dashboard> {
    const body = await request(identity, 'getMemberDashboardByPhone', { phone: identity.identifier })
    const dashboard = parseDashboard(parseEnvelope('getMemberDashboardByPhone', body).data?.dashboard)
    if (!dashboard) {
      throw new LedgerApiError('The ledger returned no dashboard', undefined, 'invalid_response')
    }
    return dashboard
  }

  async function validateHandle(identity: ChannelIdentity, handle: string): Promise<AccountSummary> {
    const body = await request(identity, 'getAccountByHandle', { accountHandle: handle.toLowerCase() })
    const details = accountDetailsSchema.safeParse(parseEnvelope('getAccountByHandle', body).data?.action?.details)
    if (!details.success) {
      throw new LedgerApiError(`No account found for handle ${handle}`, 404, 'not_found')
    }
    return {
      accountId: details.data.accountID,
      accountName: details.data.accountName,
      accountHandle: details.data.accountHandle ?? handle.toLowerCase()
    }
  }

  async function createOffer(identity: ChannelIdentity, input: CreateOfferInput): Promise<ActionResult> {
    const body = await request(identity, 'createCredex', {
      issuerAccountID: input.issuerAccountId,
      receiverAccountID: input.receiverAccountId,
      Denomination: input.denomination,
      InitialAmount: input.amount,
      credexType: 'PURCHASE',
      OFFERSorREQUESTS: 'OFFERS',
      securedCredex: input.securedCredex ?? true
    })
    return toActionResult(parseEnvelope('createCredex', body))
  }

  async function credexAction(
    identity: ChannelIdentity,
    endpoint: 'acceptCredex' | 'declineCredex' | 'cancelCredex',
    credexId: string
  ): Promise<ActionResult> {
    const body = await request(identity, endpoint, { credexID: credexId })
    return toActionResult(parseEnvelope(endpoint, body))
  }

  async function acceptOffersBulk(identity: ChannelIdentity, credexIds: string[]): Promise<ActionResult> {
    const body = await request(identity, 'acceptCredexBulk', { credexIDs: credexIds })
    return toActionResult(parseEnvelope('acceptCredexBulk', body))
  }

  async function getCredex(identity: ChannelIdentity, credexId: string): Promise<JsonValue> {
    const body = await request(identity, 'getCredex', { credexID: credexId })
    return parseEnvelope('getCredex', body).data?.action?.details ?? null
  }

  async function getLedger(identity: ChannelIdentity, input: GetLedgerInput): Promise<LedgerPage> {
    const body = await request(identity, 'getLedger', {
      accountID: input.accountId,
      startRow: input.startRow ?? 0,
      numRows: input.numRows ?? 8
    })
    const page = ledgerPageSchema.safeParse(body)
    if (!page.success) {
      throw new LedgerApiError('The ledger returned an unexpected ledger page', undefined, 'invalid_response')
    }
    return {
      entries: page.data.data.ledger,
      hasMore: page.data.data.pagination?.hasMore ?? false
    }
  }

  async function upgradeMemberTier(identity: ChannelIdentity, memberId: string): Promise<ActionResult> {
    const body = await request(identity, 'upgradeMemberTier', { memberID: memberId })
    return toActionResult(parseEnvelope('upgradeMemberTier', body))
  }

  return {
    request,
    login,
    registerMember,
    getDashboard,
    validateHandle,
    createOffer,
    acceptOffer: (identity, credexId) => credexAction(identity, 'acceptCredex', credexId),
    acceptOffersBulk,
    declineOffer: (identity, credexId) => credexAction(identity, 'declineCredex', credexId),
    cancelOffer: (identity, credexId) => credexAction(identity, 'cancelCredex', credexId),
    getCredex,
    getLedger,
    upgradeMemberTier
  }
}
