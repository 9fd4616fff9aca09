// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { ApiErrorCode } from "@shared/types"
import { AuthClient } from "../auth-client"
import { ApiError } from "../base-client"

vi.mock("@/lib/api-error-handler", () => ({
  handleApiError: vi.fn(),
}))

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })

describe("AuthClient", () => {
  const fetchMock = vi.fn<typeof fetch>()
  const client = new AuthClient("http://api.test/api")

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal("fetch", fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("does not retry a login that hits a server error", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ success: false, error: { code: ApiErrorCode.INTERNAL_ERROR, message: "boom" } }, 500)
    )

    const error = await client.login("jane", "test-password").catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ApiError)
    if (!(error instanceof ApiError)) return
    expect(error.statusCode).toBe(500)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it("returns the registered username with the confirmation copy", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: true, data: { username: "jane" } }, 201))

    await expect(client.register("jane", "test-password", "test-password")).resolves.toEqual({
      username: "jane",
      message: "Registration successful! Please login.",
    })
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe("http://api.test/api/auth/register")
    expect(init?.body).toBe('{"username":"jane","password":"test-password","confirm":"test-password"}')
  })
})
