import { BarChart3, FileText, LayoutTemplate, Lock, Mail, UserRound } from "lucide-react"
import type { LucideIcon } from "lucide-react"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs"
import { MISSING_PROFILE_MESSAGE, useSession } from "@/contexts/SessionContext"
import { TAB_LABELS, WORKSPACE_TABS, isTabLocked, type WorkspaceTab } from "@/lib/session-state"
import { AnalysisTab } from "./tabs/AnalysisTab"
import { CoverLetterTab } from "./tabs/CoverLetterTab"
import { InputDataTab } from "./tabs/InputDataTab"
import { ResumeBuilderTab } from "./tabs/ResumeBuilderTab"
import { TemplatesTab } from "./tabs/TemplatesTab"

const TAB_ICONS: Record<WorkspaceTab, LucideIcon> = {
  input: UserRound,
  resume: FileText,
  "cover-letter": Mail,
  analysis: BarChart3,
  templates: LayoutTemplate,
}

const isWorkspaceTab = (value: string): value is WorkspaceTab => WORKSPACE_TABS.some((tab) => tab === value)

export function WorkspacePage() {
  const { state, selectTab } = useSession()
  const { profile, links } = state

  if (state.status !== "signedIn") return null

  const renderTab = (tab: WorkspaceTab) => {
    if (tab === "input") return <InputDataTab />
    if (tab === "templates") return <TemplatesTab />
    if (!profile) {
      return (
        <Alert variant="info">
          <AlertDescription>{MISSING_PROFILE_MESSAGE}</AlertDescription>
        </Alert>
      )
    }
    switch (tab) {
      case "resume":
        return <ResumeBuilderTab profile={profile} links={links} />
      case "cover-letter":
        return <CoverLetterTab profile={profile} />
      case "analysis":
        return <AnalysisTab profile={profile} links={links} />
    }
  }

  return (
    <Tabs
      value={state.activeTab}
      onValueChange={(value) => {
        if (isWorkspaceTab(value)) selectTab(value)
      }}
    >
      <TabsList className="flex h-auto w-full flex-wrap">
        {WORKSPACE_TABS.map((tab) => {
          const Icon = isTabLocked(state, tab) ? Lock : TAB_ICONS[tab]
          return (
            <TabsTrigger key={tab} value={tab}>
              <Icon className="h-4 w-4" aria-hidden />
              {TAB_LABELS[tab]}
            </TabsTrigger>
          )
        })}
      </TabsList>
      {WORKSPACE_TABS.map((tab) => (
        <TabsContent key={tab} value={tab}>
          {renderTab(tab)}
        </TabsContent>
      ))}
    </Tabs>
  )
}
