import type { LinksData, ProfileRecord, SessionUser } from "@shared/types"

export const WORKSPACE_TABS = ["input", "resume", "cover-letter", "analysis", "templates"] as const
export type WorkspaceTab = (typeof WORKSPACE_TABS)[number]

export const TAB_LABELS: Record<WorkspaceTab, string> = {
  input: "Input Data",
  resume: "Resume Builder",
  "cover-letter": "Cover Letters",
  analysis: "Analysis",
  templates: "Templates",
}

/** Tabs that can be used before a profile has been submitted */
export const PROFILE_FREE_TABS: readonly WorkspaceTab[] = ["input", "templates"]

export type ArtifactKind = "resume" | "coverLetter" | "analysis" | "enhanced"

export type SessionStatus = "restoring" | "signedOut" | "signedIn"

export interface SessionState {
  readonly status: SessionStatus
  readonly user: SessionUser | null
  readonly profile: ProfileRecord | null
  readonly links: LinksData
  readonly artifacts: Readonly<Partial<Record<ArtifactKind, string>>>
  readonly activeTab: WorkspaceTab
  readonly lastSavedAt: string | null
}

export type SessionAction =
  | { type: "signedIn"; user: SessionUser; portfolio: ProfileRecord | null }
  | { type: "signedOut" }
  | { type: "profileSubmitted"; profile: ProfileRecord; links: LinksData }
  | { type: "artifactGenerated"; kind: ArtifactKind; content: string }
  | { type: "tabSelected"; tab: WorkspaceTab }
  | { type: "portfolioSaved"; savedAt: string }

export const initialSessionState: SessionState = {
  status: "restoring",
  user: null,
  profile: null,
  links: {},
  artifacts: {},
  activeTab: "input",
  lastSavedAt: null,
}

const signedOutState: SessionState = { ...initialSessionState, status: "signedOut" }

/**
 * Session transitions. Every transition returns a new state object; actions
 * that make no sense in the current state return the state unchanged.
 */
export function sessionReducer(state: SessionState, action: SessionAction): SessionState {
  switch (action.type) {
    case "signedIn":
      return {
        ...signedOutState,
        status: "signedIn",
        user: action.user,
        profile: action.portfolio,
      }

    case "signedOut":
      return signedOutState

    case "profileSubmitted":
      if (state.status !== "signedIn") return state
      return { ...state, profile: action.profile, links: action.links }

    case "artifactGenerated":
      if (state.status !== "signedIn" || !state.profile) return state
      return { ...state, artifacts: { ...state.artifacts, [action.kind]: action.content } }

    case "tabSelected":
      if (state.status !== "signedIn" || state.activeTab === action.tab) return state
      return { ...state, activeTab: action.tab }

    case "portfolioSaved":
      if (state.status !== "signedIn" || !state.profile) return state
      return { ...state, lastSavedAt: action.savedAt }
  }
}

export const hasProfile = (state: SessionState): state is SessionState & { profile: ProfileRecord } =>
  state.profile !== null

export const isTabLocked = (state: SessionState, tab: WorkspaceTab): boolean =>
  !PROFILE_FREE_TABS.includes(tab) && !hasProfile(state)
