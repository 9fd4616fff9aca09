import { z } from 'zod'
import { EXPERIENCE_LEVELS, TARGET_INDUSTRIES } from '../profile.types'

const monthSchema = z.union([z.literal(''), z.string().regex(/^\d{4}-\d{2}$/, 'Expected YYYY-MM')])

/**
 * Schema for a complete profile record as produced by intake and persisted on save
 */
export const profileRecordSchema = z.object({
  personal_info: z.object({
    full_name: z.string().trim().min(1),
    email: z.string().trim().min(1),
    phone: z.string(),
    location: z.string(),
    linkedin: z.string(),
    github: z.string(),
    portfolio: z.string(),
  }),
  career_goals: z.object({
    target_position: z.string().trim().min(1),
    target_industry: z.enum(TARGET_INDUSTRIES),
    experience_level: z.enum(EXPERIENCE_LEVELS),
  }),
  work_experience: z.object({
    company: z.string(),
    job_title: z.string(),
    location: z.string(),
    start_date: monthSchema,
    end_date: monthSchema,
    current_job: z.boolean(),
    responsibilities: z.string(),
  }),
  education: z.object({
    institution: z.string().trim().min(1),
    degree: z.string().trim().min(1),
    graduation_date: monthSchema,
    gpa: z.string(),
  }),
  skills: z.object({
    technical: z.array(z.string().trim().min(1)),
    soft: z.array(z.string().trim().min(1)),
  }),
  projects: z.object({
    title: z.string(),
    description: z.string(),
    technologies: z.string(),
    link: z.string(),
  }),
  certifications: z.array(z.string().trim().min(1)),
})

/**
 * Schema for the raw intake form. Required-field presence is checked by
 * buildProfileRecord so that all missing fields are reported together.
 */
export const profileFormSchema = z.object({
  full_name: z.string(),
  email: z.string(),
  phone: z.string().optional(),
  location: z.string().optional(),
  linkedin_url: z.string().optional(),
  github_url: z.string().optional(),
  portfolio_url: z.string().optional(),
  target_position: z.string(),
  target_industry: z.enum(TARGET_INDUSTRIES).optional(),
  experience_level: z.enum(EXPERIENCE_LEVELS).optional(),
  company: z.string().optional(),
  job_title: z.string().optional(),
  job_location: z.string().optional(),
  start_date: monthSchema.optional(),
  end_date: monthSchema.optional(),
  current_job: z.boolean().optional(),
  responsibilities: z.string().optional(),
  institution: z.string(),
  degree: z.string(),
  graduation_date: monthSchema.optional(),
  gpa: z.string().optional(),
  technical_skills: z.string().optional(),
  soft_skills: z.string().optional(),
  project_title: z.string().optional(),
  project_description: z.string().optional(),
  project_technologies: z.string().optional(),
  project_link: z.string().optional(),
  certifications: z.string().optional(),
})

export const linkedInInsightsSchema = z.object({
  simulated: z.literal(true),
  skills: z.array(z.string()),
  experience: z.string(),
  education: z.string(),
  certifications: z.array(z.string()),
  summary: z.string(),
})

export const gitHubInsightsSchema = z.object({
  simulated: z.literal(true),
  programming_languages: z.array(z.string()),
  projects: z.array(z.string()),
  technologies: z.array(z.string()),
  activity: z.string(),
})

export const linksDataSchema = z.object({
  linkedin: linkedInInsightsSchema.optional(),
  github: gitHubInsightsSchema.optional(),
})

export type ProfileRecordSchema = z.infer<typeof profileRecordSchema>
export type ProfileFormSchema = z.infer<typeof profileFormSchema>
export type LinksDataSchema = z.infer<typeof linksDataSchema>
