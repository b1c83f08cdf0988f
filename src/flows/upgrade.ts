import { SystemError } from '../errors.js'
import { parseDashboard } from '../ledger/types.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage } from '../outbound.js'
import type { Session } from '../state/types.js'
import { confirmButtons } from './buttons.js'
import type { FlowDefinition } from './types.js'
import { validateConfirmInput } from './validators.js'

/** Tiers below this one carry a spending limit and can be upgraded. */
export const UNLIMITED_MEMBER_TIER = 2

function memberTier(session: Session): number | null {
  return parseDashboard(session.profileSnapshot)?.member.memberTier ?? null
}

export function isUpgradeAvailable(session: Session): boolean {
  const tier = memberTier(session)
  return tier !== null && tier < UNLIMITED_MEMBER_TIER
}

export function createUpgradeFlow(messages: MessageRenderer): FlowDefinition {
  return {
    type: 'upgrade',
    requiresAuth: true,
    steps: [
      {
        id: 'confirm',
        inputKind: 'button',
        message: view => confirmButtons(messages, messages.render('upgrade_confirm', {
          tier: memberTier(view.session) ?? ''
        })),
        validate: input => validateConfirmInput(input),
        transform: () => ({ confirmed: true })
      }
    ],
    async complete(ctx) {
      const memberId = ctx.session.memberId
      if (!memberId) {
        throw new SystemError('No member to upgrade')
      }

      const result = await ctx.ledger.upgradeMemberTier(ctx.identity, memberId)
      const tier = result.details['memberTier']
      return typeof tier === 'number'
        ? textMessage(messages.render('upgrade_complete', { tier }))
        : textMessage(messages.render('upgrade_complete_generic'))
    }
  }
}
