import { z } from 'zod'
import { COVER_LETTER_LENGTHS, COVER_LETTER_TONES, RESUME_STYLES } from '../api/generator.types'
import { linksDataSchema, profileRecordSchema } from './profile.schema'

export const GENERATOR_CONSTRAINTS = {
  /** Maximum length of a pasted job description */
  MAX_JOB_DESCRIPTION_LENGTH: 20000,
  /** Maximum length of text sent for enhancement */
  MAX_ENHANCE_LENGTH: 5000,
} as const

export const resumeOptionsSchema = z.object({
  style: z.enum(RESUME_STYLES).default('Modern Professional'),
  targetCompany: z.string().default(''),
  jobDescription: z.string().max(GENERATOR_CONSTRAINTS.MAX_JOB_DESCRIPTION_LENGTH).default(''),
  includeSummary: z.boolean().default(true),
  includeSkills: z.boolean().default(true),
  includeProjects: z.boolean().default(true),
})

/**
 * Schema for POST /api/generator/resume
 */
export const resumeRequestSchema = z.object({
  profile: profileRecordSchema,
  links: linksDataSchema.default({}),
  options: resumeOptionsSchema.default({}),
})

/**
 * Schema for POST /api/generator/cover-letter. Required text fields are
 * checked for emptiness by the route so they report MISSING_FIELD.
 */
export const coverLetterRequestSchema = z.object({
  profile: profileRecordSchema,
  companyName: z.string(),
  hiringManager: z.string().default(''),
  jobTitle: z.string(),
  jobDescription: z.string().max(GENERATOR_CONSTRAINTS.MAX_JOB_DESCRIPTION_LENGTH),
  tone: z.enum(COVER_LETTER_TONES).default('Professional'),
  length: z.enum(COVER_LETTER_LENGTHS).default('Standard'),
})

/**
 * Schema for POST /api/generator/portfolio-analysis
 */
export const portfolioAnalysisRequestSchema = z.object({
  profile: profileRecordSchema,
  links: linksDataSchema.default({}),
})

/**
 * Schema for POST /api/generator/enhance
 */
export const skillEnhanceRequestSchema = z.object({
  originalContent: z.string().max(GENERATOR_CONSTRAINTS.MAX_ENHANCE_LENGTH),
})

export type ResumeOptionsSchema = z.infer<typeof resumeOptionsSchema>
export type ResumeRequestSchema = z.infer<typeof resumeRequestSchema>
export type CoverLetterRequestSchema = z.infer<typeof coverLetterRequestSchema>
export type PortfolioAnalysisRequestSchema = z.infer<typeof portfolioAnalysisRequestSchema>
export type SkillEnhanceRequestSchema = z.infer<typeof skillEnhanceRequestSchema>
