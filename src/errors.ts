export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class MessagesError extends Error {
  readonly name = 'MessagesError'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}

export class WebhookError extends Error {
  readonly name = 'WebhookError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export type ErrorKind =
  | 'validation'
  | 'state_conflict'
  | 'state_invalid'
  | 'authentication'
  | 'network'
  | 'api'
  | 'system'

/**
 * Bad step input. Carries the message key used to re-prompt the user;
 * never leaves the current step.
 */
export class ValidationError extends Error {
  readonly name = 'ValidationError'
  readonly kind = 'validation'

  constructor(message: string, public readonly reasonKey: string = 'invalid_input') {
    super(message)
  }
}

export class StateConflictError extends Error {
  readonly name = 'StateConflictError'
  readonly kind = 'state_conflict'

  constructor(public readonly key: string, public readonly attempts: number) {
    super(`State write for ${key} conflicted ${attempts} times`)
  }
}

export class StateInvalidError extends Error {
  readonly name = 'StateInvalidError'
  readonly kind = 'state_invalid'

  constructor(message: string, public readonly issues: string[] = []) {
    super(message)
  }
}

export class AuthenticationError extends Error {
  readonly name = 'AuthenticationError'
  readonly kind = 'authentication'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}

export class NetworkError extends Error {
  readonly name = 'NetworkError'
  readonly kind = 'network'

  constructor(
    message: string,
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export type LedgerErrorCode =
  | 'invalid_data'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'server_error'
  | 'invalid_response'
  | 'unknown'

export class LedgerApiError extends Error {
  readonly name = 'LedgerApiError'
  readonly kind = 'api'

  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode: LedgerErrorCode = 'unknown',
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class SystemError extends Error {
  readonly name = 'SystemError'
  readonly kind = 'system'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}

export type AppError =
  | ValidationError
  | StateConflictError
  | StateInvalidError
  | AuthenticationError
  | NetworkError
  | LedgerApiError
  | SystemError

export function toAppError(error: unknown): AppError {
  if (
    error instanceof ValidationError ||
    error instanceof StateConflictError ||
    error instanceof StateInvalidError ||
    error instanceof AuthenticationError ||
    error instanceof NetworkError ||
    error instanceof LedgerApiError ||
    error instanceof SystemError
  ) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new SystemError(message, { cause: error })
}
