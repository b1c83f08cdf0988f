import { SystemError } from '../errors.js'
import { parseDashboard, selectDefaultAccount, type DashboardAccount, type PendingOffer } from '../ledger/types.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage, type ListMessage } from '../outbound.js'
import type { Session } from '../state/types.js'
import { confirmButtons } from './buttons.js'
import { readString } from './step-data.js'
import type { FlowDefinition, StepView } from './types.js'
import { inputText, validateConfirmInput } from './validators.js'

export type ActionFlowType = 'accept' | 'decline' | 'cancel'

export type SelectedOffer = {
  credexId: string
  amount: string
  counterparty: string
}

const MAX_LIST_ROWS = 10

export function activeDashboardAccount(session: Session): DashboardAccount | null {
  const dashboard = parseDashboard(session.profileSnapshot)
  if (!dashboard) {
    return null
  }
  const accountId = session.accountId ?? session.activeAccount?.accountId
  return dashboard.accounts.find(account => account.accountID === accountId) ?? selectDefaultAccount(dashboard)
}

/** Incoming offers for accept and decline, outgoing ones for cancel. */
export function pendingOffersFor(flowType: ActionFlowType, session: Session): PendingOffer[] {
  const account = activeDashboardAccount(session)
  if (!account) {
    return []
  }
  return flowType === 'cancel' ? account.pendingOutData : account.pendingInData
}

function toSelected(offer: PendingOffer): SelectedOffer {
  return {
    credexId: offer.credexID,
    amount: offer.formattedInitialAmount,
    counterparty: offer.counterpartyAccountName
  }
}

export function selectedOffer(view: StepView): SelectedOffer | null {
  const source = view.data['select'] ?? view.context
  const credexId = readString(source, 'credexId')
  if (!credexId) {
    return null
  }
  return {
    credexId,
    amount: readString(source, 'amount') ?? '',
    counterparty: readString(source, 'counterparty') ?? ''
  }
}

export function createActionFlow(flowType: ActionFlowType, messages: MessageRenderer): FlowDefinition {
  function offerList(view: StepView): ListMessage {
    const offers = pendingOffersFor(flowType, view.session).slice(0, MAX_LIST_ROWS)
    return {
      type: 'list',
      body: messages.render(`${flowType}_select_prompt`, { count: offers.length }),
      buttonLabel: messages.render('list_button_label'),
      sections: [{
        title: messages.render(`${flowType}_select_section`),
        rows: offers.map(offer => ({
          rowId: offer.credexID,
          title: offer.formattedInitialAmount,
          description: offer.counterpartyAccountName
        }))
      }]
    }
  }

  function findOffer(view: StepView, credexId: string): PendingOffer | undefined {
    return pendingOffersFor(flowType, view.session).find(offer => offer.credexID === credexId)
  }

  return {
    type: flowType,
    requiresAuth: true,
    steps: [
      {
        id: 'select',
        inputKind: 'list',
        condition: view => readString(view.context, 'credexId') === null,
        message: view => offerList(view),
        validate: (input, view) => {
          const credexId = inputText(input)
          return credexId !== null && findOffer(view, credexId)
            ? { valid: true }
            : { valid: false, reason: 'invalid_selection' }
        },
        transform: (input, ctx) => {
          const offer = findOffer(ctx, inputText(input) ?? '')
          if (!offer) {
            throw new SystemError('Selected offer disappeared from the dashboard')
          }
          return toSelected(offer)
        }
      },
      {
        id: 'confirm',
        inputKind: 'button',
        message: view => {
          const offer = selectedOffer(view)
          return confirmButtons(messages, messages.render(`${flowType}_confirm`, {
            amount: offer?.amount ?? '',
            counterparty: offer?.counterparty ?? ''
          }))
        },
        validate: input => validateConfirmInput(input),
        transform: () => ({ confirmed: true })
      }
    ],
    async complete(ctx) {
      const offer = selectedOffer(ctx)
      if (!offer) {
        throw new SystemError(`No offer selected for ${flowType}`)
      }

      if (flowType === 'accept') {
        await ctx.ledger.acceptOffer(ctx.identity, offer.credexId)
      } else if (flowType === 'decline') {
        await ctx.ledger.declineOffer(ctx.identity, offer.credexId)
      } else {
        await ctx.ledger.cancelOffer(ctx.identity, offer.credexId)
      }

      return textMessage(messages.render(`${flowType}_complete`, {
        amount: offer.amount,
        counterparty: offer.counterparty
      }))
    }
  }
}

export function preselectContext(flowType: ActionFlowType, session: Session, credexId: string): SelectedOffer {
  const offer = pendingOffersFor(flowType, session).find(entry => entry.credexID === credexId)
  return offer ? toSelected(offer) : { credexId, amount: '', counterparty: '' }
}
