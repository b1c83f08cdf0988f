import { z } from 'zod'
import type { JsonValue } from './types.js'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
)

export const jsonObjectSchema = z.record(jsonValueSchema)

export const channelIdentitySchema = z.object({
  channelType: z.enum(['whatsapp', 'sms']),
  identifier: z.string().min(1, 'channel identifier cannot be empty')
})

export const flowTypeSchema = z.enum(['offer', 'accept', 'decline', 'cancel', 'registration', 'upgrade'])

export const flowStateSchema = z.object({
  flowId: z.string().min(1, 'flow id cannot be empty'),
  flowType: flowTypeSchema,
  stepIndex: z.number().int().min(0),
  stepData: z.record(jsonObjectSchema),
  startedAt: z.string(),
  context: jsonObjectSchema
})

export const activeAccountSchema = z.object({
  accountId: z.string(),
  accountHandle: z.string(),
  accountName: z.string(),
  defaultDenom: z.string()
})

/** Structural shape only; a stored session may still break the invariant. */
export const sessionShapeSchema = z.object({
  channelIdentity: channelIdentitySchema,
  memberId: z.string().nullable(),
  accountId: z.string().nullable(),
  authenticated: z.boolean(),
  authToken: z.string().nullable(),
  profileSnapshot: jsonValueSchema.nullable(),
  activeAccount: activeAccountSchema.nullable(),
  flow: flowStateSchema.nullable(),
  version: z.number().int().min(0),
  lastUpdated: z.string().nullable()
})

export const sessionSchema = sessionShapeSchema.superRefine((session, ctx) => {
  if (session.authenticated && !session.authToken) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['authToken'],
      message: 'authenticated session requires an auth token'
    })
  }
  if (session.authenticated && !session.memberId) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['memberId'],
      message: 'authenticated session requires a member id'
    })
  }
})

export function describeIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

