import { useState } from "react"
import { Sparkles } from "lucide-react"
import {
  ARTIFACT_FILES,
  RESUME_STYLES,
  type LinksData,
  type ProfileRecord,
  type ResumeOptions,
  type ResumeStyle,
} from "@shared/types"
import { generatorClient } from "@/api/generator-client"
import { DownloadLinks, type DownloadOption } from "@/components/DownloadLinks"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Button } from "@/components/ui/button"
import { Checkbox } from "@/components/ui/checkbox"
import { Input } from "@/components/ui/input"
import { Label } from "@/components/ui/label"
import { Select } from "@/components/ui/select"
import { Textarea } from "@/components/ui/textarea"
import { useGeneration } from "@/hooks/useGeneration"
import { GenerationResult } from "./GenerationResult"

const RESUME_DOWNLOADS: readonly DownloadOption[] = [
  { label: "Download Markdown", ...ARTIFACT_FILES.resumeMarkdown },
  { label: "Download Text", ...ARTIFACT_FILES.resumeText },
]

const SECTION_TOGGLES = [
  { key: "includeSummary", label: "Include Professional Summary" },
  { key: "includeSkills", label: "Include Skills Section" },
  { key: "includeProjects", label: "Include Projects" },
] as const

const isResumeStyle = (value: string): value is ResumeStyle => RESUME_STYLES.some((style) => style === value)

interface ResumeBuilderTabProps {
  profile: ProfileRecord
  links: LinksData
}

export function ResumeBuilderTab({ profile, links }: ResumeBuilderTabProps) {
  const { content, busy, error, generate } = useGeneration("resume")
  const [options, setOptions] = useState<ResumeOptions>({
    style: "Modern Professional",
    targetCompany: "",
    jobDescription: "",
    includeSummary: true,
    includeSkills: true,
    includeProjects: true,
  })

  const handleGenerate = () => generate(() => generatorClient.generateResume({ profile, links, options }))

  return (
    <div className="space-y-6">
      <h2 className="text-xl font-semibold">AI Resume Generator</h2>

      <div className="grid gap-6 md:grid-cols-2">
        <div className="space-y-4">
          <div className="space-y-1.5">
            <Label htmlFor="resume-style">Resume Style</Label>
            <Select
              id="resume-style"
              options={RESUME_STYLES}
              value={options.style}
              onChange={(event) => {
                const value = event.target.value
                if (isResumeStyle(value)) setOptions((current) => ({ ...current, style: value }))
              }}
            />
          </div>
          {SECTION_TOGGLES.map(({ key, label }) => (
            <div key={key} className="flex items-center gap-2">
              <Checkbox
                id={`resume-${key}`}
                checked={options[key]}
                onChange={(event) => {
                  const checked = event.target.checked
                  setOptions((current) => ({ ...current, [key]: checked }))
                }}
              />
              <Label htmlFor={`resume-${key}`}>{label}</Label>
            </div>
          ))}
        </div>

        <div className="space-y-4">
          <div className="space-y-1.5">
            <Label htmlFor="resume-target-company">Target Company (optional)</Label>
            <Input
              id="resume-target-company"
              placeholder="Google, Amazon, etc."
              value={options.targetCompany}
              onChange={(event) => {
                const value = event.target.value
                setOptions((current) => ({ ...current, targetCompany: value }))
              }}
            />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="resume-job-description">Paste Job Description (optional)</Label>
            <Textarea
              id="resume-job-description"
              rows={6}
              placeholder="Paste the job description to tailor your resume..."
              value={options.jobDescription}
              onChange={(event) => {
                const value = event.target.value
                setOptions((current) => ({ ...current, jobDescription: value }))
              }}
            />
          </div>
        </div>
      </div>

      <Button size="lg" className="w-full" onClick={() => void handleGenerate()} disabled={busy}>
        <Sparkles aria-hidden />
        {busy ? "Crafting your professional resume..." : "Generate Professional Resume"}
      </Button>

      <GenerationResult
        title="Your Generated Resume"
        content={content}
        error={error}
        aside={
          content !== undefined && (
            <>
              <h3 className="font-semibold">Download Options</h3>
              <DownloadLinks content={content} options={RESUME_DOWNLOADS} />
              <Alert variant="info">
                <AlertDescription>
                  <strong>Pro Tip:</strong> Copy the markdown content to a .md file for easy formatting
                </AlertDescription>
              </Alert>
            </>
          )
        }
      />
    </div>
  )
}
