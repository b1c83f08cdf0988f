export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

export type ChannelType = 'whatsapp' | 'sms'

export interface ChannelIdentity {
  channelType: ChannelType
  identifier: string
}

export type FlowType = 'offer' | 'accept' | 'decline' | 'cancel' | 'registration' | 'upgrade'

export type StepResult = JsonObject

export interface FlowState {
  flowId: string
  flowType: FlowType
  stepIndex: number
  stepData: Record<string, StepResult>
  startedAt: string
  context: JsonObject
}

export interface ActiveAccount {
  accountId: string
  accountHandle: string
  accountName: string
  defaultDenom: string
}

export interface Session {
  channelIdentity: ChannelIdentity
  memberId: string | null
  accountId: string | null
  authenticated: boolean
  authToken: string | null
  profileSnapshot: JsonValue | null
  activeAccount: ActiveAccount | null
  flow: FlowState | null
  version: number
  lastUpdated: string | null
}

/** Fields callers may change through StateManager.update. */
export type SessionUpdate = Partial<Omit<Session, 'channelIdentity' | 'version' | 'lastUpdated'>>

export const CRITICAL_FIELDS = ['channelIdentity', 'memberId', 'authToken', 'authenticated', 'flow'] as const

export type CriticalField = typeof CRITICAL_FIELDS[number]

export interface StoredValue {
  version: number
  payload: string
}

export type GetResult =
  | { found: true; value: StoredValue }
  | { found: false }

export interface CompareAndSetResult {
  ok: boolean
  current: StoredValue | null
}

/**
 * Versioned key/value persistence. `compareAndSet` with `expectedVersion` 0
 * succeeds only when the key is absent. Expiry is a hard delete.
 */
export interface StateStore {
  get(key: string): Promise<GetResult>
  set(key: string, value: StoredValue, ttlSeconds: number): Promise<void>
  compareAndSet(key: string, expectedVersion: number, value: StoredValue, ttlSeconds: number): Promise<CompareAndSetResult>
  delete(key: string): Promise<void>
}
