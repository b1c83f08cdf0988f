import type { LedgerClient } from '../ledger/types.js'
import type { OutboundMessage } from '../outbound.js'
import type {
  ChannelIdentity,
  FlowType,
  JsonObject,
  Session,
  StepResult
} from '../state/types.js'

export type InputKind = 'text' | 'button' | 'list'

export type InboundKind = InputKind | 'form'

export interface FlowInput {
  kind: InboundKind
  value: string | Record<string, string>
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string }

/** What a step sees: the session, the results recorded so far and the start context. */
export interface StepView {
  session: Session
  data: Record<string, StepResult>
  context: JsonObject
}

export interface FlowContext extends StepView {
  identity: ChannelIdentity
  flowId: string
  ledger: LedgerClient
}

export interface StepDefinition {
  id: string
  inputKind: InputKind
  message(view: StepView): OutboundMessage
  validate(input: FlowInput, view: StepView): ValidationResult
  transform(input: FlowInput, ctx: FlowContext): StepResult | Promise<StepResult>
  condition?(view: StepView): boolean
}

export interface FlowDefinition {
  type: FlowType
  requiresAuth: boolean
  steps: StepDefinition[]
  complete(ctx: FlowContext): Promise<OutboundMessage>
}

export type FlowRegistry = Record<FlowType, FlowDefinition>
