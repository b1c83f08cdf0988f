import type { LedgerEndpointName } from './types.js'

export interface EndpointDefinition {
  path: string
  method: 'POST' | 'GET'
  requiresAuth: boolean
}

export const LEDGER_ENDPOINTS: Record<LedgerEndpointName, EndpointDefinition> = {
  login: { path: 'login', method: 'POST', requiresAuth: false },
  onboardMember: { path: 'onboardMember', method: 'POST', requiresAuth: false },
  getMemberDashboardByPhone: { path: 'getMemberDashboardByPhone', method: 'POST', requiresAuth: true },
  getAccountByHandle: { path: 'getAccountByHandle', method: 'POST', requiresAuth: true },
  createCredex: { path: 'createCredex', method: 'POST', requiresAuth: true },
  acceptCredex: { path: 'acceptCredex', method: 'POST', requiresAuth: true },
  acceptCredexBulk: { path: 'acceptCredexBulk', method: 'POST', requiresAuth: true },
  declineCredex: { path: 'declineCredex', method: 'POST', requiresAuth: true },
  cancelCredex: { path: 'cancelCredex', method: 'POST', requiresAuth: true },
  getCredex: { path: 'getCredex', method: 'POST', requiresAuth: true },
  getLedger: { path: 'getLedger', method: 'POST', requiresAuth: true },
  upgradeMemberTier: { path: 'upgradeMemberTier', method: 'POST', requiresAuth: true }
}

export function buildEndpointUrl(baseUrl: string, endpoint: LedgerEndpointName): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
  return new URL(LEDGER_ENDPOINTS[endpoint].path, base).toString()
}
