import { API_CONFIG } from "@/config/api"
import { BaseApiClient } from "./base-client"
import type {
  ApiSuccessResponse,
  LoginResponseData,
  LogoutResponseData,
  RegisterResponseData,
  SessionResponseData,
} from "@shared/types"

export interface RegisterResult extends RegisterResponseData {
  message: string
}

const REGISTER_SUCCESS_MESSAGE = "Registration successful! Please login."

/**
 * Username/password auth against the session-cookie endpoints.
 * Credential requests are never retried.
 */
export class AuthClient extends BaseApiClient {
  constructor(baseUrl: string | (() => string), options?: { timeout?: number }) {
    super(baseUrl, {
      timeout: options?.timeout ?? 30000,
      retryAttempts: 1,
    })
  }

  async register(username: string, password: string, confirm: string): Promise<RegisterResult> {
    const response = await this.post<ApiSuccessResponse<RegisterResponseData>>("/auth/register", {
      username,
      password,
      confirm,
    })
    return { ...response.data, message: response.message ?? REGISTER_SUCCESS_MESSAGE }
  }

  async login(username: string, password: string): Promise<LoginResponseData> {
    const response = await this.post<ApiSuccessResponse<LoginResponseData>>("/auth/login", { username, password })
    return response.data
  }

  /**
   * Restore the signed-in account from the session cookie. Throws ApiError
   * with status 401 when there is no valid session.
   */
  async fetchSession(): Promise<SessionResponseData> {
    const response = await this.get<ApiSuccessResponse<SessionResponseData>>("/auth/session")
    return response.data
  }

  async logout(): Promise<LogoutResponseData> {
    const response = await this.post<ApiSuccessResponse<LogoutResponseData>>("/auth/logout")
    return response.data
  }
}

export const authClient = new AuthClient(() => API_CONFIG.baseUrl, {
  timeout: API_CONFIG.timeout,
})
