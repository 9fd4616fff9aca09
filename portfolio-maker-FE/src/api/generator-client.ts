import { API_CONFIG } from "@/config/api"
import { GENERATION_TIMEOUT_MS } from "@/config/constants"
import { BaseApiClient } from "./base-client"
import type {
  ApiSuccessResponse,
  CoverLetterGenerationRequest,
  GenerationResponseData,
  PortfolioAnalysisRequest,
  ResumeGenerationRequest,
} from "@shared/types"

/**
 * Generation endpoints. A generation is sent once: each attempt costs a full
 * model run, so these requests are never retried.
 */
export class GeneratorClient extends BaseApiClient {
  constructor(baseUrl: string | (() => string)) {
    super(baseUrl, { timeout: GENERATION_TIMEOUT_MS, retryAttempts: 1 })
  }

  async generateResume(request: ResumeGenerationRequest): Promise<GenerationResponseData> {
    const response = await this.post<ApiSuccessResponse<GenerationResponseData>>("/generator/resume", request)
    return response.data
  }

  async generateCoverLetter(request: CoverLetterGenerationRequest): Promise<GenerationResponseData> {
    const response = await this.post<ApiSuccessResponse<GenerationResponseData>>("/generator/cover-letter", request)
    return response.data
  }

  async analyzePortfolio(request: PortfolioAnalysisRequest): Promise<GenerationResponseData> {
    const response = await this.post<ApiSuccessResponse<GenerationResponseData>>(
      "/generator/portfolio-analysis",
      request
    )
    return response.data
  }

  async enhance(originalContent: string): Promise<GenerationResponseData> {
    const response = await this.post<ApiSuccessResponse<GenerationResponseData>>("/generator/enhance", {
      originalContent,
    })
    return response.data
  }
}

export const generatorClient = new GeneratorClient(() => API_CONFIG.baseUrl)
