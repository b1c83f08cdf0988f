import { WebhookError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { FlowDispatcher } from '../dispatcher/dispatcher.js'
import type { OutboundMessage } from '../outbound.js'
import { inboundEventSchema, type InboundEventPayload } from './types.js'

export interface WebhookHandlerDeps {
  dispatcher: FlowDispatcher
  logger?: Logger
}

export interface WebhookHandlerResult {
  message: OutboundMessage
}

export function createWebhookHandler(deps: WebhookHandlerDeps) {
  const { dispatcher } = deps
  const logger = deps.logger ?? createNoopLogger()

  function parsePayload(body: unknown): InboundEventPayload {
    const result = inboundEventSchema.safeParse(body)
    if (!result.success) {
      const field = result.error.errors[0]?.path.join('.') ?? 'unknown'
      logger.error({ event: 'webhook_parse_error', error: result.error.message, field })
      throw new WebhookError(`Invalid inbound event: ${result.error.errors[0]?.message ?? 'unknown'}`, field)
    }
    return result.data
  }

  async function handle(body: unknown): Promise<WebhookHandlerResult> {
    const payload = parsePayload(body)

    logger.info({
      event: 'inbound_event_received',
      channelType: payload.channelIdentity.channelType,
      messageKind: payload.messageKind
    })

    const message = await dispatcher.handle(payload)

    logger.info({ event: 'inbound_event_processed', messageKind: payload.messageKind, replyType: message.type })
    return { message }
  }

  return { handle, parsePayload }
}

export type WebhookHandler = ReturnType<typeof createWebhookHandler>
