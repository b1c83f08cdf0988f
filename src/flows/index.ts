import type { MessageRenderer } from '../messages.js'
import type { FlowType } from '../state/types.js'
import { createActionFlow, type ActionFlowType } from './action.js'
import { createOfferFlow } from './offer.js'
import { createRegistrationFlow } from './registration.js'
import type { FlowRegistry } from './types.js'
import { createUpgradeFlow } from './upgrade.js'

export function createFlowRegistry(messages: MessageRenderer): FlowRegistry {
  return {
    offer: createOfferFlow(messages),
    accept: createActionFlow('accept', messages),
    decline: createActionFlow('decline', messages),
    cancel: createActionFlow('cancel', messages),
    registration: createRegistrationFlow(messages),
    upgrade: createUpgradeFlow(messages)
  }
}

export interface FlowTrigger {
  flowType: FlowType
  credexId?: string
}

const TRIGGERS: ReadonlyMap<string, FlowType> = new Map<string, FlowType>([
  ['offer', 'offer'],
  ['offer_credex', 'offer'],
  ['accept_offers', 'accept'],
  ['decline_offers', 'decline'],
  ['cancel_offers', 'cancel'],
  ['upgrade', 'upgrade'],
  ['upgrade_tier', 'upgrade']
])

const PRESELECT_PATTERN = /^(accept|decline|cancel)_([A-Za-z0-9-]+)$/

function isActionFlowType(value: string): value is ActionFlowType {
  return value === 'accept' || value === 'decline' || value === 'cancel'
}

/**
 * Maps a menu selection or typed command to the flow it starts. `accept_<id>`
 * style commands start an action flow with that credex preselected.
 */
export function resolveTrigger(raw: string): FlowTrigger | null {
  const value = raw.trim()
  const exact = TRIGGERS.get(value.toLowerCase())
  if (exact) {
    return { flowType: exact }
  }

  const match = PRESELECT_PATTERN.exec(value)
  if (match && isActionFlowType(match[1])) {
    return { flowType: match[1], credexId: match[2] }
  }
  return null
}

export { createOfferFlow } from './offer.js'
export { createActionFlow, pendingOffersFor, preselectContext } from './action.js'
export { createRegistrationFlow } from './registration.js'
export { createUpgradeFlow, isUpgradeAvailable } from './upgrade.js'
export type { FlowDefinition, FlowInput, FlowRegistry, StepDefinition, StepView } from './types.js'
