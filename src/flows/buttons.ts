import type { MessageRenderer } from '../messages.js'
import type { ButtonsMessage } from '../outbound.js'
import { CANCEL_BUTTON_ID, CONFIRM_BUTTON_ID } from './validators.js'

export function confirmButtons(messages: MessageRenderer, body: string): ButtonsMessage {
  return {
    type: 'buttons',
    body,
    options: [
      { buttonId: CONFIRM_BUTTON_ID, buttonText: messages.render('button_confirm') },
      { buttonId: CANCEL_BUTTON_ID, buttonText: messages.render('button_cancel') }
    ]
  }
}
