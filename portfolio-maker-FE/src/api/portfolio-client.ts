import { API_CONFIG } from "@/config/api"
import { BaseApiClient } from "./base-client"
import type {
  ApiSuccessResponse,
  ProfileFormInput,
  ProfileIntakeResponseData,
  ProfileRecord,
  SavePortfolioResponseData,
} from "@shared/types"

export interface IntakeResult extends ProfileIntakeResponseData {
  message?: string
}

export class PortfolioClient extends BaseApiClient {
  /** Validate the raw form and get back the profile record plus link insights */
  async submitIntake(form: ProfileFormInput): Promise<IntakeResult> {
    const response = await this.post<ApiSuccessResponse<ProfileIntakeResponseData>>("/profile/intake", form)
    return { ...response.data, message: response.message }
  }

  /** Replace the stored portfolio. Returns the server's confirmation message. */
  async savePortfolio(portfolio: ProfileRecord): Promise<string> {
    const response = await this.put<ApiSuccessResponse<SavePortfolioResponseData>>("/portfolio", { portfolio })
    return response.message ?? "Portfolio data saved successfully!"
  }
}

export const portfolioClient = new PortfolioClient(() => API_CONFIG.baseUrl, {
  timeout: API_CONFIG.timeout,
  retryAttempts: API_CONFIG.retryAttempts,
  retryDelay: API_CONFIG.retryDelay,
})
