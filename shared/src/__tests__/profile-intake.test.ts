import { describe, expect, it } from "vitest"
import {
  buildProfileRecord,
  findMissingFields,
  parseStoredPortfolio,
  profileToFormInput,
  splitList,
} from "../profile-intake"
import type { ProfileFormInput } from "../profile.types"

const completeForm: ProfileFormInput = {
  full_name: "  Jane Doe ",
  email: "jane@example.com",
  target_position: "Engineer",
  target_industry: "Finance",
  experience_level: "Senior",
  institution: "State University",
  degree: "BSc Computer Science",
  technical_skills: "TypeScript, SQL,  SQL ",
  soft_skills: "Leadership,,Communication",
  certifications: "Cloud Practitioner\n\n  Scrum Master \nCloud Practitioner",
  company: "Acme",
  start_date: "2021-03",
  end_date: "2023-01",
  current_job: true,
}

describe("splitList", () => {
  it("trims, drops empties and collapses repeats after trimming", () => {
    expect(splitList("Python, SQL,  SQL ")).toEqual(["Python", "SQL"])
  })

  it("keeps first-occurrence order", () => {
    expect(splitList("b, a, b, c, a")).toEqual(["b", "a", "c"])
  })

  it("splits certifications on newlines only", () => {
    expect(splitList("AWS, Associate\r\nGCP", "newline")).toEqual(["AWS, Associate", "GCP"])
  })

  it("returns an empty list for blank input", () => {
    expect(splitList(undefined)).toEqual([])
    expect(splitList(" , ,\n ")).toEqual([])
  })
})

describe("buildProfileRecord", () => {
  it("reports every missing required field in form order", () => {
    const result = buildProfileRecord({
      full_name: " ",
      email: "",
      target_position: "Engineer",
      institution: "",
      degree: "BA",
    })

    expect(result).toEqual({ ok: false, missing: ["full_name", "email", "institution"] })
  })

  it("builds a nested record from a complete form", () => {
    const result = buildProfileRecord(completeForm)
    if (!result.ok) throw new Error("expected intake to succeed")

    expect(result.profile.personal_info.full_name).toBe("Jane Doe")
    expect(result.profile.personal_info.phone).toBe("")
    expect(result.profile.career_goals).toEqual({
      target_position: "Engineer",
      target_industry: "Finance",
      experience_level: "Senior",
    })
    expect(result.profile.skills).toEqual({
      technical: ["TypeScript", "SQL"],
      soft: ["Leadership", "Communication"],
    })
    expect(result.profile.certifications).toEqual(["Cloud Practitioner", "Scrum Master"])
    expect(result.profile.work_experience.end_date).toBe("")
    expect(result.profile.work_experience.current_job).toBe(true)
  })

  it("defaults the select fields", () => {
    const result = buildProfileRecord({
      full_name: "A",
      email: "a@example.com",
      target_position: "Analyst",
      institution: "Uni",
      degree: "BA",
    })
    if (!result.ok) throw new Error("expected intake to succeed")

    expect(result.profile.career_goals.target_industry).toBe("Technology")
    expect(result.profile.career_goals.experience_level).toBe("Entry Level")
  })
})

describe("findMissingFields", () => {
  it("treats absent fields as missing", () => {
    expect(findMissingFields({ email: "x@example.com" })).toEqual([
      "full_name",
      "target_position",
      "institution",
      "degree",
    ])
  })
})

describe("parseStoredPortfolio", () => {
  it("returns null for the empty object written at registration", () => {
    expect(parseStoredPortfolio({})).toBeNull()
  })

  it("round-trips a record through the form input", () => {
    const result = buildProfileRecord({ ...completeForm, current_job: false })
    if (!result.ok) throw new Error("expected intake to succeed")

    expect(parseStoredPortfolio(result.profile)).toEqual(result.profile)
    expect(buildProfileRecord(profileToFormInput(result.profile))).toEqual(result)
  })
})
