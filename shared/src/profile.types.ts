/**
 * Profile Types
 *
 * The structured career record collected by the intake form, plus the
 * simulated link insights attached to it. Field names are snake_case because
 * the record is persisted as-is in the account document.
 */

export const TARGET_INDUSTRIES = [
  "Technology",
  "Healthcare",
  "Finance",
  "Education",
  "Marketing",
  "Engineering",
  "Design",
  "Other",
] as const

export type TargetIndustry = (typeof TARGET_INDUSTRIES)[number]

export const EXPERIENCE_LEVELS = ["Entry Level", "Junior", "Mid-Level", "Senior", "Executive"] as const

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number]

export interface PersonalInfo {
  full_name: string
  email: string
  phone: string
  location: string
  linkedin: string
  github: string
  portfolio: string
}

export interface CareerGoals {
  target_position: string
  target_industry: TargetIndustry
  experience_level: ExperienceLevel
}

/** Dates are `YYYY-MM` or empty. */
export interface WorkExperience {
  company: string
  job_title: string
  location: string
  start_date: string
  end_date: string
  current_job: boolean
  responsibilities: string
}

export interface Education {
  institution: string
  degree: string
  graduation_date: string
  gpa: string
}

export interface Skills {
  technical: string[]
  soft: string[]
}

export interface ProjectEntry {
  title: string
  description: string
  technologies: string
  link: string
}

export interface ProfileRecord {
  personal_info: PersonalInfo
  career_goals: CareerGoals
  work_experience: WorkExperience
  education: Education
  skills: Skills
  projects: ProjectEntry
  certifications: string[]
}

/**
 * Raw form input before intake. Every field is free text except the two
 * select boxes and the current-job checkbox; list fields are delimited strings.
 */
export interface ProfileFormInput {
  full_name: string
  email: string
  phone?: string
  location?: string
  linkedin_url?: string
  github_url?: string
  portfolio_url?: string
  target_position: string
  target_industry?: TargetIndustry
  experience_level?: ExperienceLevel
  company?: string
  job_title?: string
  job_location?: string
  start_date?: string
  end_date?: string
  current_job?: boolean
  responsibilities?: string
  institution: string
  degree: string
  graduation_date?: string
  gpa?: string
  technical_skills?: string
  soft_skills?: string
  project_title?: string
  project_description?: string
  project_technologies?: string
  project_link?: string
  certifications?: string
}

export const REQUIRED_PROFILE_FIELDS = [
  "full_name",
  "email",
  "target_position",
  "institution",
  "degree",
] as const

export type RequiredProfileField = (typeof REQUIRED_PROFILE_FIELDS)[number]

export type ProfileIntakeResult =
  | { ok: true; profile: ProfileRecord }
  | { ok: false; missing: RequiredProfileField[] }

export interface LinkedInInsights {
  simulated: true
  skills: string[]
  experience: string
  education: string
  certifications: string[]
  summary: string
}

export interface GitHubInsights {
  simulated: true
  programming_languages: string[]
  projects: string[]
  technologies: string[]
  activity: string
}

export interface LinksData {
  linkedin?: LinkedInInsights
  github?: GitHubInsights
}
