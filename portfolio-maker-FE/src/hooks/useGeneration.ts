import { useCallback, useState } from "react"
import type { GenerationResponseData } from "@shared/types"
import { useSession } from "@/contexts/SessionContext"
import { getUserMessage } from "@/lib/api-error-handler"
import type { ArtifactKind } from "@/lib/session-state"

interface UseGenerationResult {
  content: string | undefined
  busy: boolean
  error: string | null
  generate: (request: () => Promise<GenerationResponseData>) => Promise<void>
}

/**
 * Run one generation and keep the result in the session. A non-"ok" outcome
 * is shown as an error and leaves the previous artifact in place.
 */
export function useGeneration(kind: ArtifactKind): UseGenerationResult {
  const { state, recordArtifact } = useSession()
  const [busy, setBusy] = useState(false)
  const [error, setError] = useState<string | null>(null)

  const generate = useCallback(
    async (request: () => Promise<GenerationResponseData>) => {
      setBusy(true)
      setError(null)
      try {
        const result = await request()
        if (result.outcome === "ok") {
          recordArtifact(kind, result.content)
        } else {
          setError(result.content)
        }
      } catch (err) {
        setError(getUserMessage(err))
      } finally {
        setBusy(false)
      }
    },
    [kind, recordArtifact]
  )

  return { content: state.artifacts[kind], busy, error, generate }
}
