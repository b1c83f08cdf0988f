export interface TextMessage {
  type: 'text'
  body: string
}

export interface ButtonOption {
  buttonId: string
  buttonText: string
}

export interface ButtonsMessage {
  type: 'buttons'
  body: string
  header?: string
  footer?: string
  options: ButtonOption[]
}

export interface ListRow {
  rowId: string
  title: string
  description?: string
}

export interface ListSection {
  title: string
  rows: ListRow[]
}

export interface ListMessage {
  type: 'list'
  body: string
  buttonLabel: string
  sections: ListSection[]
}

/** Channel-agnostic reply; the channel adapter turns it into its own wire format. */
export type OutboundMessage = TextMessage | ButtonsMessage | ListMessage

export function textMessage(body: string): TextMessage {
  return { type: 'text', body }
}

export function withNotice(message: OutboundMessage, notice: string): OutboundMessage {
  return { ...message, body: `${notice}\n\n${message.body}` }
}
