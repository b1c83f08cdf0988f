import { z } from 'zod'
import { jsonValueSchema } from '../state/schema.js'
import type { ActiveAccount, ChannelIdentity, JsonValue } from '../state/types.js'

export interface LedgerConfig {
  baseUrl: string
  clientApiKey: string
  timeoutMs?: number
  maxRetries?: number
  retryDelayMs?: number
}

export const pendingOfferSchema = z.object({
  credexID: z.string(),
  formattedInitialAmount: z.string(),
  counterpartyAccountName: z.string(),
  dueDate: z.string().nullable().optional(),
  secured: z.boolean().nullable().optional()
})

export const dashboardAccountSchema = z.object({
  accountID: z.string(),
  accountName: z.string(),
  accountHandle: z.string(),
  accountType: z.string().optional(),
  defaultDenom: z.string().default('USD'),
  isOwnedAccount: z.boolean().default(true),
  pendingInData: z.array(pendingOfferSchema).default([]),
  pendingOutData: z.array(pendingOfferSchema).default([]),
  balanceData: z.object({
    securedNetBalancesByDenom: z.array(z.string()).default([]),
    netCredexAssetsInDefaultDenom: z.string().optional()
  }).optional()
})

export const dashboardSchema = z.object({
  member: z.object({
    memberID: z.string(),
    firstname: z.string(),
    lastname: z.string(),
    memberHandle: z.string().optional(),
    defaultDenom: z.string().optional(),
    memberTier: z.number().optional()
  }),
  accounts: z.array(dashboardAccountSchema).default([])
})

export type PendingOffer = z.infer<typeof pendingOfferSchema>
export type DashboardAccount = z.infer<typeof dashboardAccountSchema>
export type Dashboard = z.infer<typeof dashboardSchema>

export const ledgerEnvelopeSchema = z.object({
  message: z.string().optional(),
  data: z.object({
    action: z.object({
      id: z.string().optional(),
      type: z.string().optional(),
      details: z.record(jsonValueSchema).optional()
    }).optional(),
    dashboard: jsonValueSchema.optional()
  }).optional()
})

export type LedgerEnvelope = z.infer<typeof ledgerEnvelopeSchema>

export const ledgerEntrySchema = z.object({
  credexID: z.string(),
  formattedInitialAmount: z.string(),
  counterpartyAccountName: z.string(),
  dateTime: z.string().optional()
})

export const ledgerPageSchema = z.object({
  data: z.object({
    ledger: z.array(ledgerEntrySchema).default([]),
    pagination: z.object({ hasMore: z.boolean() }).optional()
  })
})

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>

export interface LedgerPage {
  entries: LedgerEntry[]
  hasMore: boolean
}

export type LoginResult =
  | { kind: 'authenticated'; memberId: string; dashboard: Dashboard | null }
  | { kind: 'new_member'; message: string }

export interface RegisterMemberInput {
  firstName: string
  lastName: string
  defaultDenom: string
}

export interface AccountSummary {
  accountId: string
  accountName: string
  accountHandle: string
}

export interface CreateOfferInput {
  issuerAccountId: string
  receiverAccountId: string
  amount: number
  denomination: string
  securedCredex?: boolean
}

export interface ActionResult {
  actionId: string | null
  actionType: string | null
  details: Record<string, JsonValue>
}

export interface GetLedgerInput {
  accountId: string
  startRow?: number
  numRows?: number
}

export interface RequestOptions {
  requiresAuth?: boolean
}

export interface LedgerClient {
  request(identity: ChannelIdentity, endpoint: LedgerEndpointName, payload: Record<string, unknown>, options?: RequestOptions): Promise<unknown>
  login(identity: ChannelIdentity): Promise<LoginResult>
  registerMember(identity: ChannelIdentity, input: RegisterMemberInput): Promise<LoginResult>
  getDashboard(identity: ChannelIdentity): Promise<Dashboard>
  validateHandle(identity: ChannelIdentity, handle: string): Promise<AccountSummary>
  createOffer(identity: ChannelIdentity, input: CreateOfferInput): Promise<ActionResult>
  acceptOffer(identity: ChannelIdentity, credexId: string): Promise<ActionResult>
  acceptOffersBulk(identity: ChannelIdentity, credexIds: string[]): Promise<ActionResult>
  declineOffer(identity: ChannelIdentity, credexId: string): Promise<ActionResult>
  cancelOffer(identity: ChannelIdentity, credexId: string): Promise<ActionResult>
  getCredex(identity: ChannelIdentity, credexId: string): Promise<JsonValue>
  getLedger(identity: ChannelIdentity, input: GetLedgerInput): Promise<LedgerPage>
  upgradeMemberTier(identity: ChannelIdentity, memberId: string): Promise<ActionResult>
}

export type LedgerEndpointName =
  | 'login'
  | 'onboardMember'
  | 'getMemberDashboardByPhone'
  | 'getAccountByHandle'
  | 'createCredex'
  | 'acceptCredex'
  | 'acceptCredexBulk'
  | 'declineCredex'
  | 'cancelCredex'
  | 'getCredex'
  | 'getLedger'
  | 'upgradeMemberTier'

export function parseDashboard(value: unknown): Dashboard | null {
  const result = dashboardSchema.safeParse(value)
  return result.success ? result.data : null
}

export function selectDefaultAccount(dashboard: Dashboard): DashboardAccount | null {
  return dashboard.accounts.find(account => account.isOwnedAccount) ?? dashboard.accounts[0] ?? null
}

export function toActiveAccount(account: DashboardAccount): ActiveAccount {
  return {
    accountId: account.accountID,
    accountHandle: account.accountHandle,
    accountName: account.accountName,
    defaultDenom: account.defaultDenom
  }
}
