/**
 * @shared/types
 *
 * Shared types, schemas and pure helpers for the portfolio-maker API and frontend
 */

// Core types
export * from "./profile.types"

// API types
export * from "./api.types"
export * from "./api/auth.types"
export * from "./api/generator.types"

// Pure helpers
export * from "./profile-intake"
export * from "./download"
export * from "./templates"

// Runtime schemas (Zod)
export * from "./schemas"
