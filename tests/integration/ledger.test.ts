import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest'
import { AuthenticationError, LedgerApiError, NetworkError } from '../../src/errors.js'
import { createLedgerClient } from '../../src/ledger/client.js'
import { parseDashboard, type LedgerClient } from '../../src/ledger/types.js'
import { createInMemoryStateStore } from '../../src/state/memory-store.js'
import { createStateManager, type StateManager } from '../../src/state/state-manager.js'
import type { ChannelIdentity } from '../../src/state/types.js'
import { createMockLedgerServer, type MockLedgerServer } from './ledger-server.js'

const ALICE: ChannelIdentity = { channelType: 'whatsapp', identifier: '263770000001' }
const BOB: ChannelIdentity = { channelType: 'whatsapp', identifier: '263770000002' }
const NEWCOMER: ChannelIdentity = { channelType: 'sms', identifier: '263770000009' }

describe('Integration: Ledger Client', () => {
  let mockServer: MockLedgerServer
  let stateManager: StateManager
  let client: LedgerClient

  beforeAll(async () => {
    mockServer = createMockLedgerServer()
    await mockServer.start()
  })

  afterAll(async () => {
    await mockServer.stop()
  })

  beforeEach(() => {
    mockServer.reset()
    mockServer.seedMember(ALICE.identifier, 'Alice', 'Moyo', 'alice')
    mockServer.seedMember(BOB.identifier, 'Bob', 'Dube', 'bob')
    stateManager = createStateManager({ store: createInMemoryStateStore() })
    client = createLedgerClient({
      config: { baseUrl: mockServer.url, clientApiKey: 'test-secret', maxRetries: 0 },
      stateManager
    })
  })

  describe('login', () => {
    it('should authenticate a known member and store the session', async () => {
      const result = await client.login(ALICE)

      expect(result.kind).toBe('authenticated')
      const session = await stateManager.load(ALICE)
      expect(session.authenticated).toBe(true)
      expect(session.memberId).toBe('member-1')
      expect(session.accountId).toBe('acct-2')
      expect(session.activeAccount).toEqual({
        accountId: 'acct-2',
        accountHandle: 'alice',
        accountName: 'Alice Personal',
        defaultDenom: 'USD'
      })
      expect(mockServer.getRequestLog()[0]).toEqual({
        endpoint: 'login',
        body: { phone: ALICE.identifier },
        apiKey: 'test-secret',
        authorization: undefined
      })
    })

    it('should report an unknown member as new', async () => {
      const result = await client.login(NEWCOMER)

      expect(result).toEqual({ kind: 'new_member', message: 'Member not found' })
      expect((await stateManager.load(NEWCOMER)).authenticated).toBe(false)
    })

    it('should surface a rejected client key as an api error', async () => {
      mockServer.setApiKey('other-secret')

      const failure = client.login(ALICE)

      await expect(failure).rejects.toBeInstanceOf(LedgerApiError)
      await expect(failure).rejects.toMatchObject({ statusCode: 403, message: 'Invalid client API key' })
    })
  })

  it('should register a new member and sign them in', async () => {
    const result = await client.registerMember(NEWCOMER, { firstName: 'Tendai', lastName: 'Ncube', defaultDenom: 'USD' })

    expect(result.kind).toBe('authenticated')
    expect(mockServer.findMember(NEWCOMER.identifier)?.firstname).toBe('Tendai')
    const session = await stateManager.load(NEWCOMER)
    expect(session.authenticated).toBe(true)
    expect(session.activeAccount?.accountName).toBe('Tendai Personal')
  })

  describe('authenticated calls', () => {
    beforeEach(async () => {
      await client.login(ALICE)
    })

    it('should send the bearer token with each call', async () => {
      await client.getDashboard(ALICE)

      const last = mockServer.getRequestLog().at(-1)
      expect(last?.endpoint).toBe('getMemberDashboardByPhone')
      expect(last?.authorization).toBe(`Bearer ${(await stateManager.load(ALICE)).authToken}`)
    })

    it('should resolve a handle to an account', async () => {
      const account = await client.validateHandle(ALICE, 'BOB')

      expect(account).toEqual({ accountId: 'acct-4', accountName: 'Bob Personal', accountHandle: 'bob' })
    })

    it('should report an unknown handle as not found', async () => {
      const failure = client.validateHandle(ALICE, 'nobody')

      await expect(failure).rejects.toMatchObject({ statusCode: 404, errorCode: 'not_found' })
    })

    it('should create an offer and refresh the stored dashboard', async () => {
      const result = await client.createOffer(ALICE, {
        issuerAccountId: 'acct-2',
        receiverAccountId: 'acct-4',
        amount: 12.5,
        denomination: 'USD'
      })

      expect(result.actionType).toBe('CREDEX_CREATED')
      const credexId = result.details['credexID']
      expect(mockServer.findMember(BOB.identifier)?.account.pendingIn).toEqual([
        { credexID: credexId, formattedInitialAmount: '12.50 USD', counterpartyAccountName: 'Alice Personal' }
      ])
      const snapshot = parseDashboard((await stateManager.load(ALICE)).profileSnapshot)
      expect(snapshot?.accounts[0].pendingOutData).toEqual([
        { credexID: credexId, formattedInitialAmount: '12.50 USD', counterpartyAccountName: 'Bob Personal' }
      ])
    })

    it('should surface the ledger reason when an offer is refused', async () => {
      const failure = client.createOffer(ALICE, {
        issuerAccountId: 'acct-2',
        receiverAccountId: 'acct-missing',
        amount: 1,
        denomination: 'USD'
      })

      await expect(failure).rejects.toMatchObject({ statusCode: 400, message: 'Receiver account not found' })
    })

    it('should fetch a single credex by id', async () => {
      const offer = await client.createOffer(ALICE, {
        issuerAccountId: 'acct-2',
        receiverAccountId: 'acct-4',
        amount: 7,
        denomination: 'CAD'
      })
      const credexId = offer.details['credexID']

      const details = await client.getCredex(ALICE, typeof credexId === 'string' ? credexId : '')

      expect(details).toEqual({ credexID: credexId, formattedInitialAmount: '7.00 CAD', counterpartyAccountName: 'Bob Personal' })
    })

    it('should send a raw request with the caller payload', async () => {
      const body = await client.request(ALICE, 'getMemberDashboardByPhone', { phone: ALICE.identifier })

      expect(body).toMatchObject({ data: { dashboard: { member: { firstname: 'Alice' } } } })
      expect(mockServer.getRequestLog().at(-1)).toMatchObject({
        endpoint: 'getMemberDashboardByPhone',
        body: { phone: ALICE.identifier }
      })
    })

    it('should upgrade the member tier once', async () => {
      const upgraded = await client.upgradeMemberTier(ALICE, 'member-1')

      expect(upgraded.details).toEqual({ memberID: 'member-1', memberTier: 2 })
      expect(parseDashboard((await stateManager.load(ALICE)).profileSnapshot)?.member.memberTier).toBe(2)
      await expect(client.upgradeMemberTier(ALICE, 'member-1')).rejects.toMatchObject({
        statusCode: 400,
        message: 'Member is already at the top tier'
      })
    })

    it('should log in again when the token has expired', async () => {
      mockServer.revokeTokens()

      await client.getDashboard(ALICE)

      const endpoints = mockServer.getRequestLog().map(entry => entry.endpoint)
      expect(endpoints).toEqual(['login', 'getMemberDashboardByPhone', 'login', 'getMemberDashboardByPhone'])
      expect((await stateManager.load(ALICE)).authenticated).toBe(true)
    })

    it('should accept an offer and list it in the ledger', async () => {
      const bobClient = createLedgerClient({
        config: { baseUrl: mockServer.url, clientApiKey: 'test-secret', maxRetries: 0 },
        stateManager
      })
      await bobClient.login(BOB)
      const offer = await bobClient.createOffer(BOB, {
        issuerAccountId: 'acct-4',
        receiverAccountId: 'acct-2',
        amount: 3,
        denomination: 'USD'
      })
      const credexId = offer.details['credexID']
      expect(typeof credexId).toBe('string')

      await client.acceptOffer(ALICE, typeof credexId === 'string' ? credexId : '')
      const page = await client.getLedger(ALICE, { accountId: 'acct-2' })

      expect(page).toEqual({
        entries: [{ credexID: credexId, formattedInitialAmount: '3.00 USD', counterpartyAccountName: 'Bob Personal' }],
        hasMore: false
      })
    })
  })

  it('should fail with an authentication error when the member vanished', async () => {
    await client.login(ALICE)
    mockServer.reset()

    await expect(client.getDashboard(ALICE)).rejects.toBeInstanceOf(AuthenticationError)
    expect((await stateManager.load(ALICE)).authenticated).toBe(false)
  })

  it('should give up with a network error when the ledger is down', async () => {
    const downServer = createMockLedgerServer()
    await downServer.start()
    const url = downServer.url
    await downServer.stop()
    const offline = createLedgerClient({
      config: { baseUrl: url, clientApiKey: 'test-secret', maxRetries: 1, retryDelayMs: 0 },
      stateManager
    })

    const failure = offline.login(ALICE)

    await expect(failure).rejects.toBeInstanceOf(NetworkError)
    await expect(failure).rejects.toMatchObject({ attempts: 2 })
  })
})
