import { useState } from "react"
import { FileText, LogOut, Save, Search } from "lucide-react"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Button } from "@/components/ui/button"
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card"
import { MISSING_PROFILE_MESSAGE, useSession } from "@/contexts/SessionContext"
import { getUserMessage } from "@/lib/api-error-handler"

/**
 * Sidebar panel shown while signed in: greeting, logout, save and quick actions.
 */
export function AccountPanel() {
  const { state, logout, savePortfolio, selectTab } = useSession()
  const [notice, setNotice] = useState<{ ok: boolean; message: string } | null>(null)
  const [saving, setSaving] = useState(false)

  const handleSave = async () => {
    if (!state.profile) {
      setNotice({ ok: false, message: MISSING_PROFILE_MESSAGE })
      return
    }
    setSaving(true)
    try {
      setNotice({ ok: true, message: await savePortfolio() })
    } catch (error) {
      setNotice({ ok: false, message: getUserMessage(error) })
    } finally {
      setSaving(false)
    }
  }

  return (
    <div className="space-y-4">
      <Card>
        <CardHeader className="pb-2">
          <CardTitle className="text-indigo-600">Welcome back!</CardTitle>
        </CardHeader>
        <CardContent>
          <p data-testid="signed-in-username">{state.user?.username}</p>
        </CardContent>
      </Card>

      <Button variant="outline" className="w-full" onClick={() => void logout()}>
        <LogOut aria-hidden />
        Logout
      </Button>

      <section className="space-y-2 border-t pt-4">
        <h3 className="font-semibold">Save Your Progress</h3>
        <Button className="w-full" onClick={() => void handleSave()} disabled={saving}>
          <Save aria-hidden />
          Save Portfolio Data
        </Button>
        {notice && (
          <Alert variant={notice.ok ? "success" : "warning"}>
            <AlertDescription>{notice.message}</AlertDescription>
          </Alert>
        )}
      </section>

      <section className="space-y-2 border-t pt-4">
        <h3 className="font-semibold">Quick Actions</h3>
        <Button variant="secondary" className="w-full" onClick={() => selectTab("resume")}>
          <FileText aria-hidden />
          New Resume
        </Button>
        <Button variant="secondary" className="w-full" onClick={() => selectTab("analysis")}>
          <Search aria-hidden />
          Analyze Profiles
        </Button>
      </section>
    </div>
  )
}
