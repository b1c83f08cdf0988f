import { z } from 'zod'
import { channelIdentitySchema } from '../state/schema.js'

export const inboundEventSchema = z.discriminatedUnion('messageKind', [
  z.object({
    channelIdentity: channelIdentitySchema,
    messageKind: z.literal('text'),
    rawValue: z.string()
  }),
  z.object({
    channelIdentity: channelIdentitySchema,
    messageKind: z.literal('button'),
    rawValue: z.string().min(1)
  }),
  z.object({
    channelIdentity: channelIdentitySchema,
    messageKind: z.literal('list'),
    rawValue: z.string().min(1)
  }),
  z.object({
    channelIdentity: channelIdentitySchema,
    messageKind: z.literal('form'),
    rawValue: z.record(z.string())
  })
])

export type InboundEventPayload = z.infer<typeof inboundEventSchema>
