import { useState } from "react"
import { Search, Wand2 } from "lucide-react"
import type { GitHubInsights, LinkedInInsights, LinksData, ProfileRecord } from "@shared/types"
import { generatorClient } from "@/api/generator-client"
import { Alert, AlertDescription, AlertTitle } from "@/components/ui/alert"
import { Badge } from "@/components/ui/badge"
import { Button } from "@/components/ui/button"
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card"
import { Label } from "@/components/ui/label"
import { Textarea } from "@/components/ui/textarea"
import { useGeneration } from "@/hooks/useGeneration"
import { GenerationResult } from "./GenerationResult"

export const ENHANCE_REQUIRED_MESSAGE = "Please paste a description to enhance"

const SIMULATED_NOTE = "Simulated insights. Profiles are not fetched."

function TagList({ items }: { items: readonly string[] }) {
  return (
    <div className="flex flex-wrap gap-1.5">
      {items.map((item) => (
        <Badge key={item} variant="secondary">
          {item}
        </Badge>
      ))}
    </div>
  )
}

function LinkedInCard({ insights }: { insights: LinkedInInsights }) {
  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-base">LinkedIn Analysis</CardTitle>
        <CardDescription>{SIMULATED_NOTE}</CardDescription>
      </CardHeader>
      <CardContent className="space-y-3 text-sm">
        <p className="font-medium">Skills Identified:</p>
        <TagList items={insights.skills} />
        <p>
          <span className="font-medium">Experience:</span> {insights.experience || "N/A"}
        </p>
        <p>
          <span className="font-medium">Education:</span> {insights.education || "N/A"}
        </p>
      </CardContent>
    </Card>
  )
}

function GitHubCard({ insights }: { insights: GitHubInsights }) {
  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-base">GitHub Analysis</CardTitle>
        <CardDescription>{SIMULATED_NOTE}</CardDescription>
      </CardHeader>
      <CardContent className="space-y-3 text-sm">
        <p className="font-medium">Programming Languages:</p>
        <TagList items={insights.programming_languages} />
        <p className="font-medium">Notable Projects:</p>
        <ul className="ml-5 list-disc">
          {insights.projects.map((project) => (
            <li key={project}>{project}</li>
          ))}
        </ul>
      </CardContent>
    </Card>
  )
}

function SkillEnhancer() {
  const { content, busy, error, generate } = useGeneration("enhanced")
  const [original, setOriginal] = useState("")
  const [submitted, setSubmitted] = useState<string | null>(null)
  const [validationError, setValidationError] = useState<string | null>(null)

  const handleEnhance = () => {
    const text = original.trim()
    if (!text) {
      setValidationError(ENHANCE_REQUIRED_MESSAGE)
      return
    }
    setValidationError(null)
    setSubmitted(text)
    void generate(() => generatorClient.enhance(text))
  }

  return (
    <section className="space-y-4 border-t pt-6">
      <h3 className="text-lg font-semibold">Skill Enhancement</h3>
      <div className="space-y-1.5">
        <Label htmlFor="enhance-original">Paste your original job description or achievement to enhance:</Label>
        <Textarea
          id="enhance-original"
          rows={4}
          placeholder="Responsible for developing web applications and managing databases..."
          value={original}
          onChange={(event) => setOriginal(event.target.value)}
        />
      </div>
      <Button className="w-full" onClick={handleEnhance} disabled={busy}>
        <Wand2 aria-hidden />
        {busy ? "Professionalizing your description..." : "Enhance Description"}
      </Button>
      {validationError && (
        <Alert variant="warning">
          <AlertDescription>{validationError}</AlertDescription>
        </Alert>
      )}
      {error && (
        <Alert variant="destructive">
          <AlertDescription>{error}</AlertDescription>
        </Alert>
      )}
      {content !== undefined && (
        <div className="grid gap-4 md:grid-cols-2">
          <Alert variant="info">
            <AlertTitle>Original</AlertTitle>
            <AlertDescription>{submitted ?? ""}</AlertDescription>
          </Alert>
          <Alert variant="success">
            <AlertTitle>Enhanced</AlertTitle>
            <AlertDescription data-testid="enhanced-content">{content}</AlertDescription>
          </Alert>
        </div>
      )}
    </section>
  )
}

interface AnalysisTabProps {
  profile: ProfileRecord
  links: LinksData
}

export function AnalysisTab({ profile, links }: AnalysisTabProps) {
  const analysis = useGeneration("analysis")
  const hasInsights = Boolean(links.linkedin ?? links.github)

  return (
    <div className="space-y-6">
      <h2 className="text-xl font-semibold">Portfolio Analysis</h2>

      {hasInsights && (
        <section className="space-y-3">
          <h3 className="text-lg font-semibold">Extracted Insights from Your Links</h3>
          <div className="grid gap-4 md:grid-cols-2">
            {links.linkedin && <LinkedInCard insights={links.linkedin} />}
            {links.github && <GitHubCard insights={links.github} />}
          </div>
        </section>
      )}

      <Button
        size="lg"
        className="w-full"
        disabled={analysis.busy}
        onClick={() => void analysis.generate(() => generatorClient.analyzePortfolio({ profile, links }))}
      >
        <Search aria-hidden />
        {analysis.busy ? "Analyzing your portfolio..." : "Generate Full Analysis"}
      </Button>

      <GenerationResult title="Portfolio Analysis Report" content={analysis.content} error={analysis.error} />

      <SkillEnhancer />
    </div>
  )
}
