import { SystemError } from '../errors.js'
import type { MessageRenderer } from '../messages.js'
import { textMessage } from '../outbound.js'
import { confirmButtons } from './buttons.js'
import { readString } from './step-data.js'
import type { JsonObject } from '../state/types.js'
import type { FlowDefinition, FlowInput, StepView, ValidationResult } from './types.js'
import {
  DEFAULT_DENOMINATION,
  formValue,
  inputText,
  isValidName,
  validateConfirmInput,
  validateNameInput
} from './validators.js'

const FIRST_NAME_KEYS = ['firstName', 'firstname', 'first_name']
const LAST_NAME_KEYS = ['lastName', 'lastname', 'last_name']

export function registeredNames(view: StepView): { firstName: string | null; lastName: string | null } {
  const first = view.data['first_name']
  const last = view.data['last_name']
  return {
    firstName: readString(view.context, 'firstName') ?? readString(first, 'firstName'),
    lastName: readString(view.context, 'lastName') ?? readString(first, 'lastName') ?? readString(last, 'lastName')
  }
}

/** A form carries both names at once; plain text carries the first name only. */
function validateFirstNameInput(input: FlowInput): ValidationResult {
  if (input.kind !== 'form') {
    return validateNameInput(input)
  }
  const firstName = formValue(input, ...FIRST_NAME_KEYS)
  const lastName = formValue(input, ...LAST_NAME_KEYS)
  if (firstName === null || !isValidName(firstName)) {
    return { valid: false, reason: 'invalid_name' }
  }
  if (lastName !== null && !isValidName(lastName)) {
    return { valid: false, reason: 'invalid_name' }
  }
  return { valid: true }
}

export function createRegistrationFlow(messages: MessageRenderer): FlowDefinition {
  return {
    type: 'registration',
    requiresAuth: false,
    steps: [
      {
        id: 'first_name',
        inputKind: 'text',
        condition: view => readString(view.context, 'firstName') === null,
        message: () => textMessage(messages.render('registration_first_name_prompt')),
        validate: input => validateFirstNameInput(input),
        transform: (input): JsonObject => {
          if (input.kind === 'form') {
            const firstName = formValue(input, ...FIRST_NAME_KEYS) ?? ''
            const lastName = formValue(input, ...LAST_NAME_KEYS)
            return lastName === null ? { firstName } : { firstName, lastName }
          }
          return { firstName: inputText(input) ?? '' }
        }
      },
      {
        id: 'last_name',
        inputKind: 'text',
        condition: view => registeredNames(view).lastName === null,
        message: () => textMessage(messages.render('registration_last_name_prompt')),
        validate: input => validateNameInput(input),
        transform: input => ({ lastName: inputText(input) ?? '' })
      },
      {
        id: 'confirm',
        inputKind: 'button',
        message: view => {
          const names = registeredNames(view)
          return confirmButtons(messages, messages.render('registration_confirm', {
            firstName: names.firstName ?? '',
            lastName: names.lastName ?? ''
          }))
        },
        validate: input => validateConfirmInput(input),
        transform: () => ({ confirmed: true })
      }
    ],
    async complete(ctx) {
      const { firstName, lastName } = registeredNames(ctx)
      if (!firstName || !lastName) {
        throw new SystemError('Registration is missing a name')
      }
      await ctx.ledger.registerMember(ctx.identity, {
        firstName,
        lastName,
        defaultDenom: DEFAULT_DENOMINATION
      })
      return textMessage(messages.render('registration_complete', { firstName }))
    }
  }
}
