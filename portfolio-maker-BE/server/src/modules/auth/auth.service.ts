import type { ProfileRecord } from '@shared/types'
import type { Logger } from 'pino'
import { env } from '../../config/env'
import { logger } from '../../logger'
import { AccountRepository } from '../accounts/account.repository'
import { hashPassword, verifyPassword } from '../accounts/password'
import { SessionRepository, type SessionRecord } from '../accounts/session.repository'
import { AuthError, ValidationError } from '../errors'

export interface AuthenticatedAccount {
  username: string
  portfolio: ProfileRecord | null
}

export interface LoginResult extends AuthenticatedAccount {
  session: SessionRecord
}

export class AuthService {
  private readonly log: Logger

  constructor(
    private readonly accounts: AccountRepository = new AccountRepository(),
    private readonly sessions: SessionRepository = new SessionRepository(),
    private readonly sessionTtlDays: number = env.SESSION_TTL_DAYS
  ) {
    this.log = logger.child({ module: 'AuthService' })
  }

  async register(username: string, password: string, confirm: string): Promise<{ username: string }> {
    const name = username.trim()
    if (!name || !password) {
      throw new ValidationError('Please fill all fields', [!name ? 'username' : 'password'])
    }
    if (password !== confirm) {
      throw new ValidationError('Passwords do not match', ['confirm'])
    }

    const account = this.accounts.insert(name, await hashPassword(password))
    this.log.info({ username: account.username }, 'Account registered')
    return { username: account.username }
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const name = username.trim()
    if (!name || !password) {
      throw new ValidationError('Please enter username and password')
    }

    const account = this.accounts.findByUsername(name)
    if (!account) {
      throw new AuthError()
    }

    const check = await verifyPassword(account.passwordHash, password)
    if (!check.valid) {
      throw new AuthError()
    }

    if (check.needsRehash) {
      this.accounts.updatePasswordHash(name, await hashPassword(password))
      this.log.info({ username: name }, 'Upgraded stored password hash')
    }

    const session = this.sessions.create(name, this.sessionTtlDays)
    this.log.info({ username: name }, 'User logged in')
    return { username: name, portfolio: account.portfolio, session }
  }

  /**
   * Resolve a session token to its account. Expired sessions are removed.
   */
  restoreSession(token: string, now: Date = new Date()): AuthenticatedAccount {
    const session = this.sessions.find(token)
    if (!session) {
      throw new AuthError('Invalid session')
    }

    if (Date.parse(session.expiresAt) <= now.getTime()) {
      this.sessions.delete(token)
      throw new AuthError('Session expired')
    }

    const account = this.accounts.findByUsername(session.username)
    if (!account) {
      this.sessions.delete(token)
      throw new AuthError('Invalid session')
    }

    return { username: account.username, portfolio: account.portfolio }
  }

  logout(token: string): void {
    this.sessions.delete(token)
  }

  savePortfolio(username: string, portfolio: ProfileRecord): void {
    if (!this.accounts.replacePortfolio(username, portfolio)) {
      throw new AuthError('Account no longer exists')
    }
    this.log.info({ username }, 'Portfolio saved')
  }

  loadPortfolio(username: string): ProfileRecord | null {
    return this.accounts.findByUsername(username)?.portfolio ?? null
  }

  purgeExpiredSessions(): number {
    return this.sessions.purgeExpired()
  }
}

let authService: AuthService | null = null

export function getAuthService(): AuthService {
  if (!authService) {
    authService = new AuthService()
  }
  return authService
}
