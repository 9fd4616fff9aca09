import type {
  ProfileFormInput,
  ProfileIntakeResult,
  ProfileRecord,
  RequiredProfileField,
} from "./profile.types"
import { REQUIRED_PROFILE_FIELDS } from "./profile.types"
import { profileRecordSchema } from "./schemas/profile.schema"

export type ListSeparator = "comma" | "newline"

const SEPARATORS: Record<ListSeparator, RegExp> = {
  comma: /[,\n]/,
  newline: /\r?\n/,
}

/**
 * Split a delimited text field into an ordered list of trimmed entries.
 * Empty entries are dropped and repeats (after trimming) keep their first position.
 */
export function splitList(text: string | undefined, separator: ListSeparator = "comma"): string[] {
  if (!text) return []
  const seen = new Set<string>()
  const result: string[] = []
  for (const raw of text.split(SEPARATORS[separator])) {
    const entry = raw.trim()
    if (!entry || seen.has(entry)) continue
    seen.add(entry)
    result.push(entry)
  }
  return result
}

const clean = (value: string | undefined): string => value?.trim() ?? ""

export function findMissingFields(form: Partial<ProfileFormInput>): RequiredProfileField[] {
  return REQUIRED_PROFILE_FIELDS.filter((field) => clean(form[field]) === "")
}

/**
 * Turn raw form input into a ProfileRecord, or report which required
 * fields are empty. Missing fields come back in form order.
 */
export function buildProfileRecord(form: ProfileFormInput): ProfileIntakeResult {
  const missing = findMissingFields(form)
  if (missing.length > 0) {
    return { ok: false, missing }
  }

  const profile: ProfileRecord = {
    personal_info: {
      full_name: clean(form.full_name),
      email: clean(form.email),
      phone: clean(form.phone),
      location: clean(form.location),
      linkedin: clean(form.linkedin_url),
      github: clean(form.github_url),
      portfolio: clean(form.portfolio_url),
    },
    career_goals: {
      target_position: clean(form.target_position),
      target_industry: form.target_industry ?? "Technology",
      experience_level: form.experience_level ?? "Entry Level",
    },
    work_experience: {
      company: clean(form.company),
      job_title: clean(form.job_title),
      location: clean(form.job_location),
      start_date: clean(form.start_date),
      end_date: form.current_job ? "" : clean(form.end_date),
      current_job: form.current_job ?? false,
      responsibilities: clean(form.responsibilities),
    },
    education: {
      institution: clean(form.institution),
      degree: clean(form.degree),
      graduation_date: clean(form.graduation_date),
      gpa: clean(form.gpa),
    },
    skills: {
      technical: splitList(form.technical_skills, "comma"),
      soft: splitList(form.soft_skills, "comma"),
    },
    projects: {
      title: clean(form.project_title),
      description: clean(form.project_description),
      technologies: clean(form.project_technologies),
      link: clean(form.project_link),
    },
    certifications: splitList(form.certifications, "newline"),
  }

  return { ok: true, profile }
}

/**
 * Read a persisted portfolio value. Accounts start with an empty object, and
 * anything that is not a complete record is treated as "nothing saved".
 */
export function parseStoredPortfolio(value: unknown): ProfileRecord | null {
  const parsed = profileRecordSchema.safeParse(value)
  return parsed.success ? parsed.data : null
}

/**
 * Inverse of buildProfileRecord, used to pre-fill the form from a restored portfolio.
 */
export function profileToFormInput(profile: ProfileRecord): ProfileFormInput {
  return {
    full_name: profile.personal_info.full_name,
    email: profile.personal_info.email,
    phone: profile.personal_info.phone,
    location: profile.personal_info.location,
    linkedin_url: profile.personal_info.linkedin,
    github_url: profile.personal_info.github,
    portfolio_url: profile.personal_info.portfolio,
    target_position: profile.career_goals.target_position,
    target_industry: profile.career_goals.target_industry,
    experience_level: profile.career_goals.experience_level,
    company: profile.work_experience.company,
    job_title: profile.work_experience.job_title,
    job_location: profile.work_experience.location,
    start_date: profile.work_experience.start_date,
    end_date: profile.work_experience.end_date,
    current_job: profile.work_experience.current_job,
    responsibilities: profile.work_experience.responsibilities,
    institution: profile.education.institution,
    degree: profile.education.degree,
    graduation_date: profile.education.graduation_date,
    gpa: profile.education.gpa,
    technical_skills: profile.skills.technical.join(", "),
    soft_skills: profile.skills.soft.join(", "),
    project_title: profile.projects.title,
    project_description: profile.projects.description,
    project_technologies: profile.projects.technologies,
    project_link: profile.projects.link,
    certifications: profile.certifications.join("\n"),
  }
}
