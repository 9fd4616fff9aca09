/**
 * Generator API Types
 *
 * Request/response shapes for the resume, cover letter, analysis and
 * skill-enhancement endpoints under /api/generator.
 */

import type { LinksData, ProfileRecord } from "../profile.types"

export const RESUME_STYLES = ["Modern Professional", "Creative", "Minimalist", "ATS-Optimized"] as const
export type ResumeStyle = (typeof RESUME_STYLES)[number]

export const COVER_LETTER_TONES = ["Professional", "Enthusiastic", "Formal", "Creative"] as const
export type CoverLetterTone = (typeof COVER_LETTER_TONES)[number]

export const COVER_LETTER_LENGTHS = ["Brief", "Standard", "Detailed"] as const
export type CoverLetterLength = (typeof COVER_LETTER_LENGTHS)[number]

/**
 * How a generation ended. Anything other than "ok" means `content` holds
 * the fixed placeholder text rather than model output.
 */
export type GenerationOutcome = "ok" | "usage_limit" | "provider_error" | "failed"

export const GENERATION_FALLBACK_TEXT: Record<Exclude<GenerationOutcome, "ok">, string> = {
  usage_limit: "Service temporarily unavailable.",
  provider_error: "Unable to generate content at this time.",
  failed: "Content generation failed.",
}

export interface ResumeOptions {
  style: ResumeStyle
  targetCompany: string
  jobDescription: string
  includeSummary: boolean
  includeSkills: boolean
  includeProjects: boolean
}

export interface ResumeGenerationRequest {
  profile: ProfileRecord
  links?: LinksData
  options?: Partial<ResumeOptions>
}

export interface CoverLetterGenerationRequest {
  profile: ProfileRecord
  companyName: string
  hiringManager?: string
  jobTitle: string
  jobDescription: string
  tone?: CoverLetterTone
  length?: CoverLetterLength
}

export interface PortfolioAnalysisRequest {
  profile: ProfileRecord
  links?: LinksData
}

export interface SkillEnhanceRequest {
  originalContent: string
}

export interface GenerationResponseData {
  content: string
  outcome: GenerationOutcome
}

export interface ProfileIntakeResponseData {
  profile: ProfileRecord
  links: LinksData
}

export interface PortfolioTemplate {
  name: string
  description: string
  features: string[]
}
