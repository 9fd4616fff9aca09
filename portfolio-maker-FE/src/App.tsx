import ErrorBoundary from "@/components/error/ErrorBoundary"
import { Header } from "@/components/layout/Header"
import { Sidebar } from "@/components/layout/Sidebar"
import { SessionProvider, useSession } from "@/contexts/SessionContext"
import { WelcomePage } from "@/pages/welcome/WelcomePage"
import { WorkspacePage } from "@/pages/workspace/WorkspacePage"

function MainContent() {
  const { state } = useSession()

  if (state.status === "restoring") {
    return <p className="text-center text-muted-foreground">Loading...</p>
  }
  return state.status === "signedIn" ? <WorkspacePage /> : <WelcomePage />
}

function App() {
  return (
    <ErrorBoundary>
      <SessionProvider>
        <div className="flex min-h-screen flex-col md:flex-row">
          <Sidebar />
          <main className="flex-1 space-y-8 p-6 md:p-10">
            <Header />
            <MainContent />
          </main>
        </div>
      </SessionProvider>
    </ErrorBoundary>
  )
}

export default App
