import { describe, it, expect } from "vitest"
import {
  initialSessionState,
  isTabLocked,
  sessionReducer,
  type SessionState,
} from "../session-state"
import type { ProfileRecord } from "@shared/types"
import { sampleProfile } from "@/test/fixtures"

const profile = sampleProfile()

const signedIn = (portfolio: ProfileRecord | null = profile): SessionState =>
  sessionReducer(initialSessionState, { type: "signedIn", user: { username: "jane" }, portfolio })

describe("sessionReducer", () => {
  it("restores the stored portfolio on sign-in", () => {
    const state = signedIn()

    expect(state).toEqual({
      status: "signedIn",
      user: { username: "jane" },
      profile,
      links: {},
      artifacts: {},
      activeTab: "input",
      lastSavedAt: null,
    })
  })

  it("returns a new object for every transition", () => {
    const before = signedIn()
    const after = sessionReducer(before, { type: "tabSelected", tab: "resume" })

    expect(after).not.toBe(before)
    expect(before.activeTab).toBe("input")
    expect(after.activeTab).toBe("resume")
  })

  it("keeps the same state for a no-op tab selection", () => {
    const state = signedIn()
    expect(sessionReducer(state, { type: "tabSelected", tab: "input" })).toBe(state)
  })

  it("records artifacts by kind", () => {
    const state = sessionReducer(signedIn(), { type: "artifactGenerated", kind: "resume", content: "# Resume" })
    const next = sessionReducer(state, { type: "artifactGenerated", kind: "coverLetter", content: "Dear team" })

    expect(next.artifacts).toEqual({ resume: "# Resume", coverLetter: "Dear team" })
  })

  it("replaces profile and links on submission", () => {
    const state = sessionReducer(signedIn(null), {
      type: "profileSubmitted",
      profile,
      links: {
        github: { simulated: true, programming_languages: [], projects: [], technologies: [], activity: "" },
      },
    })

    expect(state.profile).toBe(profile)
    expect(Object.keys(state.links)).toEqual(["github"])
  })

  it("ignores profile-bound actions without a profile", () => {
    const state = signedIn(null)

    expect(sessionReducer(state, { type: "artifactGenerated", kind: "resume", content: "x" })).toBe(state)
    expect(sessionReducer(state, { type: "portfolioSaved", savedAt: "2026-01-01T00:00:00.000Z" })).toBe(state)
  })

  it("ignores workspace actions while signed out", () => {
    const state = sessionReducer(initialSessionState, { type: "signedOut" })

    expect(sessionReducer(state, { type: "profileSubmitted", profile, links: {} })).toBe(state)
    expect(sessionReducer(state, { type: "tabSelected", tab: "resume" })).toBe(state)
  })

  it("clears everything on sign-out", () => {
    const busy = sessionReducer(signedIn(), { type: "artifactGenerated", kind: "resume", content: "# Resume" })
    const state = sessionReducer(busy, { type: "signedOut" })

    expect(state).toEqual({ ...initialSessionState, status: "signedOut" })
  })

  it("stamps the last save", () => {
    const state = sessionReducer(signedIn(), { type: "portfolioSaved", savedAt: "2026-01-01T00:00:00.000Z" })
    expect(state.lastSavedAt).toBe("2026-01-01T00:00:00.000Z")
  })
})

describe("isTabLocked", () => {
  it("locks generator tabs until a profile exists", () => {
    const empty = signedIn(null)

    expect(isTabLocked(empty, "input")).toBe(false)
    expect(isTabLocked(empty, "templates")).toBe(false)
    expect(isTabLocked(empty, "resume")).toBe(true)
    expect(isTabLocked(signedIn(), "resume")).toBe(false)
  })
})
