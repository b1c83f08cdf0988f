import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify'

export interface MockPendingOffer {
  credexID: string
  formattedInitialAmount: string
  counterpartyAccountName: string
}

export interface MockAccount {
  accountID: string
  accountName: string
  accountHandle: string
  pendingIn: MockPendingOffer[]
  pendingOut: MockPendingOffer[]
  ledger: MockPendingOffer[]
  balances: string[]
}

export interface MockMember {
  memberID: string
  firstname: string
  lastname: string
  phone: string
  memberTier: number
  account: MockAccount
}

export interface LoggedRequest {
  endpoint: string
  body: unknown
  apiKey: string | undefined
  authorization: string | undefined
}

export interface MockLedgerServer {
  server: FastifyInstance
  url: string
  start(): Promise<void>
  stop(): Promise<void>
  seedMember(phone: string, firstname: string, lastname: string, handle: string): MockMember
  findMember(phone: string): MockMember | undefined
  revokeTokens(): void
  setApiKey(apiKey: string): void
  reset(): void
  getRequestLog(): LoggedRequest[]
}

interface PhoneBody { phone: string }
interface OnboardBody { firstname: string; lastname: string; phone: string; defaultDenom: string }
interface HandleBody { accountHandle: string }
interface CreateCredexBody {
  issuerAccountID: string
  receiverAccountID: string
  Denomination: string
  InitialAmount: number
}
interface CredexBody { credexID: string }
interface BulkBody { credexIDs: string[] }
interface LedgerBody { accountID: string; numRows?: number }
interface MemberBody { memberID: string }

const TOP_MEMBER_TIER = 2

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

function dashboardFor(member: MockMember) {
  const { account } = member
  return {
    member: {
      memberID: member.memberID,
      firstname: member.firstname,
      lastname: member.lastname,
      memberHandle: account.accountHandle,
      defaultDenom: 'USD',
      memberTier: member.memberTier
    },
    accounts: [{
      accountID: account.accountID,
      accountName: account.accountName,
      accountHandle: account.accountHandle,
      accountType: 'PERSONAL_CONSUMPTION',
      defaultDenom: 'USD',
      isOwnedAccount: true,
      pendingInData: account.pendingIn,
      pendingOutData: account.pendingOut,
      balanceData: { securedNetBalancesByDenom: account.balances }
    }]
  }
}

export function createMockLedgerServer(prefix = '/v1'): MockLedgerServer {
  const server = Fastify({ logger: false })
  const members = new Map<string, MockMember>()
  const tokens = new Map<string, string>()
  let requestLog: LoggedRequest[] = []
  let expectedApiKey = 'test-secret'
  let sequence = 0
  let actualPort = 0

  function nextId(kind: string): string {
    sequence++
    return `${kind}-${sequence}`
  }

  function seedMember(phone: string, firstname: string, lastname: string, handle: string): MockMember {
    const member: MockMember = {
      memberID: nextId('member'),
      firstname,
      lastname,
      phone,
      memberTier: 1,
      account: {
        accountID: nextId('acct'),
        accountName: `${firstname} Personal`,
        accountHandle: handle,
        pendingIn: [],
        pendingOut: [],
        ledger: [],
        balances: ['0.00 USD']
      }
    }
    members.set(phone, member)
    return member
  }

  function issueToken(member: MockMember) {
    const token = nextId('token')
    tokens.set(token, member.phone)
    return {
      data: {
        action: { id: nextId('action'), type: 'MEMBER_LOGIN', details: { token, memberID: member.memberID } },
        dashboard: dashboardFor(member)
      }
    }
  }

  function memberByAccount(accountId: string): MockMember | undefined {
    return [...members.values()].find(member => member.account.accountID === accountId)
  }

  function authenticatedMember(request: FastifyRequest): MockMember | undefined {
    const authorization = headerValue(request.headers.authorization)
    if (!authorization?.startsWith('Bearer ')) {
      return undefined
    }
    const phone = tokens.get(authorization.slice('Bearer '.length))
    return phone === undefined ? undefined : members.get(phone)
  }

  function actionResponse(member: MockMember, type: string, details: Record<string, unknown>) {
    return { data: { action: { id: nextId('action'), type, details }, dashboard: dashboardFor(member) } }
  }

  /** Removes the offer from both parties; returns it when the member held it on the given side. */
  function settleOffer(member: MockMember, credexId: string, side: 'pendingIn' | 'pendingOut'): MockPendingOffer | undefined {
    const offer = member.account[side].find(entry => entry.credexID === credexId)
    if (!offer) {
      return undefined
    }
    for (const party of members.values()) {
      party.account.pendingIn = party.account.pendingIn.filter(entry => entry.credexID !== credexId)
      party.account.pendingOut = party.account.pendingOut.filter(entry => entry.credexID !== credexId)
    }
    return offer
  }

  server.addHook('preHandler', async (request, reply) => {
    const apiKey = headerValue(request.headers['x-client-api-key'])
    requestLog.push({
      endpoint: request.url.replace(`${prefix}/`, ''),
      body: request.body,
      apiKey,
      authorization: headerValue(request.headers.authorization)
    })
    if (apiKey !== expectedApiKey) {
      return reply.status(403).send({ message: 'Invalid client API key' })
    }
  })

  async function requireMember(request: FastifyRequest, reply: FastifyReply): Promise<MockMember | undefined> {
    const member = authenticatedMember(request)
    if (!member) {
      await reply.status(401).send({ message: 'Invalid or expired token' })
    }
    return member
  }

  void server.register(async app => {
    app.post<{ Body: PhoneBody }>('/login', async (request, reply) => {
      const member = members.get(request.body.phone)
      if (!member) {
        return reply.status(400).send({ message: 'Member not found' })
      }
      return issueToken(member)
    })

    app.post<{ Body: OnboardBody }>('/onboardMember', async (request, reply) => {
      const { firstname, lastname, phone } = request.body
      if (members.has(phone)) {
        return reply.status(400).send({ message: 'Member already exists' })
      }
      const member = seedMember(phone, firstname, lastname, `${firstname.toLowerCase()}_${sequence}`)
      return issueToken(member)
    })

    app.post<{ Body: PhoneBody }>('/getMemberDashboardByPhone', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      return { data: { dashboard: dashboardFor(member) } }
    })

    app.post<{ Body: HandleBody }>('/getAccountByHandle', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const owner = [...members.values()].find(entry => entry.account.accountHandle === request.body.accountHandle)
      if (!owner) {
        return reply.status(404).send({ message: 'Account not found' })
      }
      return {
        data: {
          action: {
            type: 'ACCOUNT_FOUND',
            details: {
              accountID: owner.account.accountID,
              accountName: owner.account.accountName,
              accountHandle: owner.account.accountHandle
            }
          }
        }
      }
    })

    app.post<{ Body: CreateCredexBody }>('/createCredex', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const receiver = memberByAccount(request.body.receiverAccountID)
      if (!receiver || request.body.issuerAccountID !== member.account.accountID) {
        return reply.status(400).send({ data: { action: { details: { reason: 'Receiver account not found' } } } })
      }
      const credexID = nextId('cx')
      const formattedInitialAmount = `${request.body.InitialAmount.toFixed(2)} ${request.body.Denomination}`
      member.account.pendingOut.push({ credexID, formattedInitialAmount, counterpartyAccountName: receiver.account.accountName })
      receiver.account.pendingIn.push({ credexID, formattedInitialAmount, counterpartyAccountName: member.account.accountName })
      return actionResponse(member, 'CREDEX_CREATED', { credexID })
    })

    app.post<{ Body: CredexBody }>('/acceptCredex', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const offer = settleOffer(member, request.body.credexID, 'pendingIn')
      if (!offer) {
        return reply.status(404).send({ message: 'Credex not found' })
      }
      member.account.ledger.push(offer)
      return actionResponse(member, 'CREDEX_ACCEPTED', { credexID: offer.credexID })
    })

    app.post<{ Body: BulkBody }>('/acceptCredexBulk', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const accepted: string[] = []
      for (const credexId of request.body.credexIDs) {
        const offer = settleOffer(member, credexId, 'pendingIn')
        if (offer) {
          member.account.ledger.push(offer)
          accepted.push(credexId)
        }
      }
      return actionResponse(member, 'CREDEX_ACCEPTED', { credexIDs: accepted })
    })

    app.post<{ Body: CredexBody }>('/declineCredex', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const offer = settleOffer(member, request.body.credexID, 'pendingIn')
      if (!offer) {
        return reply.status(404).send({ message: 'Credex not found' })
      }
      return actionResponse(member, 'CREDEX_DECLINED', { credexID: offer.credexID })
    })

    app.post<{ Body: CredexBody }>('/cancelCredex', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const offer = settleOffer(member, request.body.credexID, 'pendingOut')
      if (!offer) {
        return reply.status(404).send({ message: 'Credex not found' })
      }
      return actionResponse(member, 'CREDEX_CANCELLED', { credexID: offer.credexID })
    })

    app.post<{ Body: CredexBody }>('/getCredex', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const { pendingIn, pendingOut, ledger } = member.account
      const offer = [...pendingIn, ...pendingOut, ...ledger].find(entry => entry.credexID === request.body.credexID)
      if (!offer) {
        return reply.status(404).send({ message: 'Credex not found' })
      }
      return { data: { action: { type: 'CREDEX_FOUND', details: { ...offer } } } }
    })

    app.post<{ Body: LedgerBody }>('/getLedger', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      const numRows = request.body.numRows ?? 8
      return {
        data: {
          ledger: member.account.ledger.slice(0, numRows),
          pagination: { hasMore: member.account.ledger.length > numRows }
        }
      }
    })

    app.post<{ Body: MemberBody }>('/upgradeMemberTier', async (request, reply) => {
      const member = await requireMember(request, reply)
      if (!member) return reply
      if (request.body.memberID !== member.memberID) {
        return reply.status(403).send({ message: 'Cannot upgrade another member' })
      }
      if (member.memberTier >= TOP_MEMBER_TIER) {
        return reply.status(400).send({ data: { action: { details: { reason: 'Member is already at the top tier' } } } })
      }
      member.memberTier++
      return actionResponse(member, 'MEMBER_TIER_UPGRADED', { memberID: member.memberID, memberTier: member.memberTier })
    })
  }, { prefix })

  return {
    server,
    get url() {
      return `http://127.0.0.1:${actualPort}${prefix}`
    },
    async start() {
      const address = await server.listen({ port: 0, host: '127.0.0.1' })
      actualPort = Number(new URL(address).port)
    },
    async stop() {
      await server.close()
    },
    seedMember,
    findMember(phone: string) {
      return members.get(phone)
    },
    revokeTokens() {
      tokens.clear()
    },
    setApiKey(apiKey: string) {
      expectedApiKey = apiKey
    },
    reset() {
      members.clear()
      tokens.clear()
      requestLog = []
      expectedApiKey = 'test-secret'
      sequence = 0
    },
    getRequestLog() {
      return requestLog
    }
  }
}
