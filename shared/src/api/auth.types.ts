/**
 * Auth API Types
 *
 * Types for the username/password endpoints (register, login, session, logout)
 * and the portfolio save/load endpoints that hang off the same session.
 */

import type { ProfileRecord } from "../profile.types"

/**
 * Authenticated user returned from auth endpoints.
 */
export interface SessionUser {
  username: string
}

export interface RegisterRequest {
  username: string
  password: string
  confirm: string
}

export interface RegisterResponseData {
  username: string
}

export interface LoginRequest {
  username: string
  password: string
}

/**
 * Login and session responses carry the persisted portfolio so the client can
 * restore its working profile. `null` when nothing has been saved yet.
 */
export interface LoginResponseData {
  user: SessionUser
  portfolio: ProfileRecord | null
}

export type SessionResponseData = LoginResponseData

export interface LogoutResponseData {
  loggedOut: boolean
}

export interface PortfolioResponseData {
  portfolio: ProfileRecord | null
}

export interface SavePortfolioRequest {
  portfolio: ProfileRecord
}

export interface SavePortfolioResponseData {
  saved: boolean
}
