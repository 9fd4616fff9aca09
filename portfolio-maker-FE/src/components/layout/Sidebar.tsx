import { AccountPanel } from "@/components/auth/AccountPanel"
import { AuthPanel } from "@/components/auth/AuthPanel"
import { useSession } from "@/contexts/SessionContext"

export function Sidebar() {
  const { state } = useSession()

  return (
    <aside className="w-full space-y-6 border-b bg-muted/40 p-6 md:min-h-screen md:w-80 md:border-r md:border-b-0">
      <div className="text-center">
        <h2 className="text-xl font-bold text-indigo-600">Portfolio Maker</h2>
        <p className="text-sm text-muted-foreground">AI Resume Builder</p>
      </div>
      {state.status === "signedIn" ? <AccountPanel /> : state.status === "signedOut" ? <AuthPanel /> : null}
    </aside>
  )
}
