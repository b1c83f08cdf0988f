import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createWebhookHandler } from '../../src/webhook/handler.js'
import { WebhookError } from '../../src/errors.js'
import { textMessage } from '../../src/outbound.js'
import { createMockLogger } from '../mocks/logger.js'

describe('WebhookHandler', () => {
  const dispatcher = { handle: vi.fn() }
  let mockLogger: ReturnType<typeof createMockLogger>

  beforeEach(() => {
    dispatcher.handle.mockReset()
    dispatcher.handle.mockResolvedValue(textMessage('pong'))
    mockLogger = createMockLogger()
  })

  function createHandler() {
    return createWebhookHandler({ dispatcher, logger: mockLogger })
  }

  describe('handle', () => {
    it('should pass a text event to the dispatcher and return its reply', async () => {
      const event = {
        channelIdentity: { channelType: 'whatsapp', identifier: '263770000001' },
        messageKind: 'text',
        rawValue: 'hi'
      }

      const result = await createHandler().handle(event)

      expect(dispatcher.handle).toHaveBeenCalledWith(event)
      expect(result).toEqual({ message: { type: 'text', body: 'pong' } })
    })

    it('should pass form values through as a record', async () => {
      await createHandler().handle({
        channelIdentity: { channelType: 'sms', identifier: '263770000002' },
        messageKind: 'form',
        rawValue: { firstName: 'Ann', lastName: 'Dube' }
      })

      expect(dispatcher.handle).toHaveBeenCalledWith(expect.objectContaining({
        messageKind: 'form',
        rawValue: { firstName: 'Ann', lastName: 'Dube' }
      }))
    })

    it('should log receipt and processing', async () => {
      await createHandler().handle({
        channelIdentity: { channelType: 'whatsapp', identifier: '263770000001' },
        messageKind: 'button',
        rawValue: 'confirm_action'
      })

      expect(mockLogger.info).toHaveBeenCalledWith({
        event: 'inbound_event_received',
        channelType: 'whatsapp',
        messageKind: 'button'
      })
      expect(mockLogger.info).toHaveBeenCalledWith({
        event: 'inbound_event_processed',
        messageKind: 'button',
        replyType: 'text'
      })
    })
  })

  describe('parsePayload', () => {
    it('should reject an unknown channel type', () => {
      const handler = createHandler()

      expect(() => handler.parsePayload({
        channelIdentity: { channelType: 'telegram', identifier: '1' },
        messageKind: 'text',
        rawValue: 'hi'
      })).toThrow(WebhookError)
    })

    it('should name the offending field', () => {
      const handler = createHandler()

      try {
        handler.parsePayload({
          channelIdentity: { channelType: 'whatsapp', identifier: '' },
          messageKind: 'text',
          rawValue: 'hi'
        })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(WebhookError)
        expect(error).toMatchObject({ field: 'channelIdentity.identifier' })
      }
    })

    it('should reject an empty button id', () => {
      expect(() => createHandler().parsePayload({
        channelIdentity: { channelType: 'whatsapp', identifier: '263770000001' },
        messageKind: 'button',
        rawValue: ''
      })).toThrow('Invalid inbound event')
    })

    it('should reject a form with non-string values', () => {
      expect(() => createHandler().parsePayload({
        channelIdentity: { channelType: 'whatsapp', identifier: '263770000001' },
        messageKind: 'form',
        rawValue: { age: 40 }
      })).toThrow(WebhookError)
    })

    it('should not call the dispatcher for an invalid payload', async () => {
      await expect(createHandler().handle({ messageKind: 'text' })).rejects.toBeInstanceOf(WebhookError)
      expect(dispatcher.handle).not.toHaveBeenCalled()
    })
  })
})
