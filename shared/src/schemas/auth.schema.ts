import { z } from 'zod'
import { profileRecordSchema } from './profile.schema'

export const AUTH_CONSTRAINTS = {
  MAX_USERNAME_LENGTH: 64,
  MAX_PASSWORD_LENGTH: 256,
} as const

/**
 * Schema for POST /api/auth/register. Emptiness and confirmation are checked by
 * the auth service so the user sees the same messages the form shows.
 */
export const registerRequestSchema = z.object({
  username: z.string().max(AUTH_CONSTRAINTS.MAX_USERNAME_LENGTH),
  password: z.string().max(AUTH_CONSTRAINTS.MAX_PASSWORD_LENGTH),
  confirm: z.string().max(AUTH_CONSTRAINTS.MAX_PASSWORD_LENGTH),
})

/**
 * Schema for POST /api/auth/login
 */
export const loginRequestSchema = z.object({
  username: z.string().max(AUTH_CONSTRAINTS.MAX_USERNAME_LENGTH),
  password: z.string().max(AUTH_CONSTRAINTS.MAX_PASSWORD_LENGTH),
})

/**
 * Schema for PUT /api/portfolio
 */
export const savePortfolioRequestSchema = z.object({
  portfolio: profileRecordSchema,
})

export type RegisterRequestSchema = z.infer<typeof registerRequestSchema>
export type LoginRequestSchema = z.infer<typeof loginRequestSchema>
export type SavePortfolioRequestSchema = z.infer<typeof savePortfolioRequestSchema>
