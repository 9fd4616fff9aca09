/**
 * Domain errors raised by the account, auth and inference layers.
 * Routes translate them into ApiHttpError responses; the inference client
 * never lets its two errors escape to callers.
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly fields: string[] = []
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class DuplicateUserError extends Error {
  constructor(readonly username: string) {
    super('Username already exists')
    this.name = 'DuplicateUserError'
  }
}

export class AuthError extends Error {
  constructor(message = 'Invalid username or password') {
    super(message)
    this.name = 'AuthError'
  }
}

export class ProviderUsageLimitError extends Error {
  constructor(readonly status: number) {
    super('Monthly usage limit reached. Please try again later.')
    this.name = 'ProviderUsageLimitError'
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message)
    this.name = 'ProviderError'
  }
}
