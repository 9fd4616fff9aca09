import { describe, expect, it } from "vitest"
import { API_ERROR_DEFINITIONS, ApiErrorCode, DEFAULT_API_ERROR_DEFINITION, getApiErrorDefinition } from "../api.types"

describe("API error codes", () => {
  it("lists only the codes the server emits", () => {
    expect(Object.values(ApiErrorCode)).toEqual([
      "UNAUTHORIZED",
      "INVALID_REQUEST",
      "MISSING_FIELD",
      "VALIDATION_FAILED",
      "NOT_FOUND",
      "ALREADY_EXISTS",
      "RATE_LIMIT_EXCEEDED",
      "INTERNAL_ERROR",
    ])
  })

  it("keys every definition by its own code", () => {
    for (const [key, definition] of Object.entries(API_ERROR_DEFINITIONS)) {
      expect(definition.code).toBe(key)
    }
  })

  it("falls back to the internal error for unknown codes", () => {
    expect(getApiErrorDefinition("DATABASE_ERROR")).toBe(DEFAULT_API_ERROR_DEFINITION)
    expect(getApiErrorDefinition(undefined).httpStatus).toBe(500)
    expect(getApiErrorDefinition(ApiErrorCode.ALREADY_EXISTS).httpStatus).toBe(409)
  })
})
