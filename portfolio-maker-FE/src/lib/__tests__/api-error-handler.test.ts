import { describe, expect, it, vi, beforeEach } from "vitest"
import { ApiErrorCode, getApiErrorDefinition, type ApiErrorResponse } from "@shared/types"
import { ApiError } from "@/api/base-client"
import { getUserMessage, handleApiError, isValidationError, normalizeApiError } from "@/lib/api-error-handler"

const toastError = vi.fn()

vi.mock("@/components/toast", () => ({
  toast: {
    error: (...args: unknown[]) => toastError(...args),
  },
}))

vi.mock("@/services/logging/FrontendLogger", () => ({
  logger: {
    error: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    debug: vi.fn(),
  },
}))

const missingFieldPayload: ApiErrorResponse = {
  success: false,
  error: {
    code: ApiErrorCode.MISSING_FIELD,
    message: "Please fill in all required fields (marked with *)",
    details: { missing: ["email"] },
  },
}

describe("api error handler", () => {
  beforeEach(() => {
    toastError.mockClear()
  })

  it("normalizes ApiError with response payload", () => {
    const apiError = new ApiError(missingFieldPayload.error.message, 400, missingFieldPayload, ApiErrorCode.MISSING_FIELD)

    expect(normalizeApiError(apiError)).toEqual({
      code: ApiErrorCode.MISSING_FIELD,
      message: "Please fill in all required fields (marked with *)",
      status: 400,
      details: { missing: ["email"] },
      raw: apiError,
    })
    expect(isValidationError(apiError)).toBe(true)
  })

  it("falls back for values that are not errors", () => {
    expect(normalizeApiError("nope", "Something broke").message).toBe("Something broke")
  })

  it("keeps backend wording for client errors", () => {
    const apiError = new ApiError("Passwords do not match", 400, undefined, ApiErrorCode.VALIDATION_FAILED)
    expect(getUserMessage(apiError)).toBe("Passwords do not match")
  })

  it("uses user copy for server errors", () => {
    const apiError = new ApiError("HTTP 500: Internal Server Error", 500)
    expect(getUserMessage(apiError)).toBe(getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR).userMessage)
  })

  it("shows a toast unless silent", () => {
    const definition = getApiErrorDefinition(ApiErrorCode.RATE_LIMIT_EXCEEDED)
    const apiError = new ApiError(definition.defaultMessage, 429, undefined, ApiErrorCode.RATE_LIMIT_EXCEEDED)

    handleApiError(apiError, { silent: true })
    expect(toastError).not.toHaveBeenCalled()

    const normalized = handleApiError(apiError)
    expect(normalized.code).toBe(ApiErrorCode.RATE_LIMIT_EXCEEDED)
    expect(toastError).toHaveBeenCalledWith({ title: definition.userMessage, description: undefined })
  })
})
