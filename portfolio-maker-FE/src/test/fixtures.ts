import { buildProfileRecord, type ProfileFormInput, type ProfileRecord } from "@shared/types"

export const sampleForm: ProfileFormInput = {
  full_name: "Jane Doe",
  email: "jane@example.com",
  linkedin_url: "https://linkedin.com/in/jane",
  target_position: "Engineer",
  target_industry: "Technology",
  experience_level: "Junior",
  institution: "State University",
  degree: "BSc Computer Science",
  technical_skills: "TypeScript, React",
  soft_skills: "Teamwork",
}

export function sampleProfile(): ProfileRecord {
  const result = buildProfileRecord(sampleForm)
  if (!result.ok) throw new Error(`Sample form is missing ${result.missing.join(", ")}`)
  return result.profile
}
