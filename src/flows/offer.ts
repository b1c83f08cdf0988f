import { LedgerApiError, SystemError, ValidationError } from '../errors.js'
import type { AccountSummary } from '../ledger/types.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage } from '../outbound.js'
import { confirmButtons } from './buttons.js'
import { readNumber, readString } from './step-data.js'
import type { FlowDefinition, StepView } from './types.js'
import {
  inputText,
  parseAmount,
  validateAmountInput,
  validateConfirmInput,
  validateHandleInput
} from './validators.js'

function offerSummary(view: StepView) {
  const amount = view.data['amount']
  const handle = view.data['handle']
  return {
    amount: readNumber(amount, 'amount') ?? 0,
    denom: readString(amount, 'denom') ?? '',
    accountName: readString(handle, 'accountName') ?? '',
    handle: readString(handle, 'accountHandle') ?? ''
  }
}

export function createOfferFlow(messages: MessageRenderer): FlowDefinition {
  return {
    type: 'offer',
    requiresAuth: true,
    steps: [
      {
        id: 'amount',
        inputKind: 'text',
        message: () => textMessage(messages.render('offer_amount_prompt')),
        validate: input => validateAmountInput(input),
        transform: input => {
          const parsed = parseAmount(inputText(input) ?? '')
          if (!parsed.ok) {
            throw new ValidationError('Amount could not be parsed', parsed.error)
          }
          return { amount: parsed.value.amount, denom: parsed.value.denom }
        }
      },
      {
        id: 'handle',
        inputKind: 'text',
        message: () => textMessage(messages.render('offer_handle_prompt')),
        validate: input => validateHandleInput(input),
        transform: async (input, ctx) => {
          const handle = inputText(input) ?? ''
          let account: AccountSummary
          try {
            account = await ctx.ledger.validateHandle(ctx.identity, handle)
          } catch (error) {
            if (error instanceof LedgerApiError && error.errorCode === 'not_found') {
              throw new ValidationError(`No account for handle ${handle}`, 'handle_not_found')
            }
            throw error
          }
          if (account.accountId === ctx.session.accountId) {
            throw new ValidationError('Cannot offer to own account', 'offer_to_self')
          }
          return {
            accountId: account.accountId,
            accountName: account.accountName,
            accountHandle: account.accountHandle
          }
        }
      },
      {
        id: 'confirm',
        inputKind: 'button',
        message: view => confirmButtons(messages, messages.render('offer_confirm', offerSummary(view))),
        validate: input => validateConfirmInput(input),
        transform: () => ({ confirmed: true })
      }
    ],
    async complete(ctx) {
      const issuerAccountId = ctx.session.accountId ?? ctx.session.activeAccount?.accountId
      const receiverAccountId = readString(ctx.data['handle'], 'accountId')
      const amount = readNumber(ctx.data['amount'], 'amount')
      const denomination = readString(ctx.data['amount'], 'denom')
      if (!issuerAccountId || !receiverAccountId || amount === null || denomination === null) {
        throw new SystemError('Offer is missing an account or amount')
      }

      await ctx.ledger.createOffer(ctx.identity, { issuerAccountId, receiverAccountId, amount, denomination })
      return textMessage(messages.render('offer_complete', offerSummary(ctx)))
    }
  }
}
