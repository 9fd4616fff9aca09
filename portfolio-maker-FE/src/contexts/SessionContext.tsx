/* eslint-disable react-refresh/only-export-components */
import React, { createContext, useCallback, useContext, useEffect, useMemo, useReducer } from 'react'
import type { ProfileFormInput } from '@shared/types'
import { ApiError } from '@/api/base-client'
import { authClient } from '@/api/auth-client'
import { portfolioClient } from '@/api/portfolio-client'
import {
  initialSessionState,
  sessionReducer,
  type ArtifactKind,
  type SessionState,
  type WorkspaceTab,
} from '@/lib/session-state'
import { logger } from '@/services/logging/FrontendLogger'

export const MISSING_PROFILE_MESSAGE = "Please provide your information in the 'Input Data' tab first"

interface SessionContextType {
  state: SessionState
  login: (username: string, password: string) => Promise<void>
  register: (username: string, password: string, confirm: string) => Promise<string>
  logout: () => Promise<void>
  submitProfile: (form: ProfileFormInput) => Promise<string | undefined>
  savePortfolio: () => Promise<string>
  recordArtifact: (kind: ArtifactKind, content: string) => void
  selectTab: (tab: WorkspaceTab) => void
}

const SessionContext = createContext<SessionContextType | undefined>(undefined)

export function SessionProvider({ children }: { children: React.ReactNode }) {
  const [state, dispatch] = useReducer(sessionReducer, initialSessionState)

  // Restore session from cookie on mount
  useEffect(() => {
    let mounted = true

    const restoreSession = async () => {
      try {
        const session = await authClient.fetchSession()
        if (mounted) dispatch({ type: 'signedIn', user: session.user, portfolio: session.portfolio })
      } catch (error) {
        // 401 just means nobody is signed in
        if (!(error instanceof ApiError && error.statusCode === 401)) {
          logger.warning('session', 'restore', 'Failed to restore session', {
            details: { error: error instanceof Error ? error.message : String(error) },
          })
        }
        if (mounted) dispatch({ type: 'signedOut' })
      }
    }

    void restoreSession()

    return () => {
      mounted = false
    }
  }, [])

  const login = useCallback(async (username: string, password: string) => {
    const result = await authClient.login(username, password)
    dispatch({ type: 'signedIn', user: result.user, portfolio: result.portfolio })
    logger.info('session', 'login', 'Signed in', { details: { restored: result.portfolio !== null } })
  }, [])

  const register = useCallback(async (username: string, password: string, confirm: string) => {
    const result = await authClient.register(username, password, confirm)
    return result.message
  }, [])

  /**
   * Sign out on the server and always clear local state, even if the request fails.
   */
  const logout = useCallback(async () => {
    try {
      await authClient.logout()
    } catch (error) {
      logger.warning('session', 'logout', 'Logout request failed', {
        details: { error: error instanceof Error ? error.message : String(error) },
      })
    }
    dispatch({ type: 'signedOut' })
  }, [])

  const submitProfile = useCallback(async (form: ProfileFormInput) => {
    const result = await portfolioClient.submitIntake(form)
    dispatch({ type: 'profileSubmitted', profile: result.profile, links: result.links })
    return result.message
  }, [])

  const savePortfolio = useCallback(async () => {
    if (!state.profile) {
      throw new Error(MISSING_PROFILE_MESSAGE)
    }
    const message = await portfolioClient.savePortfolio(state.profile)
    dispatch({ type: 'portfolioSaved', savedAt: new Date().toISOString() })
    return message
  }, [state.profile])

  const recordArtifact = useCallback((kind: ArtifactKind, content: string) => {
    dispatch({ type: 'artifactGenerated', kind, content })
  }, [])

  const selectTab = useCallback((tab: WorkspaceTab) => {
    dispatch({ type: 'tabSelected', tab })
  }, [])

  const value = useMemo<SessionContextType>(
    () => ({ state, login, register, logout, submitProfile, savePortfolio, recordArtifact, selectTab }),
    [state, login, register, logout, submitProfile, savePortfolio, recordArtifact, selectTab]
  )

  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>
}

export function useSession() {
  const context = useContext(SessionContext)
  if (context === undefined) {
    throw new Error('useSession must be used within a SessionProvider')
  }
  return context
}
