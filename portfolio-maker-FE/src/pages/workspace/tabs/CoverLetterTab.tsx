import { useState } from "react"
import { Mail } from "lucide-react"
import {
  ARTIFACT_FILES,
  COVER_LETTER_LENGTHS,
  COVER_LETTER_TONES,
  type CoverLetterLength,
  type CoverLetterTone,
  type ProfileRecord,
} from "@shared/types"
import { generatorClient } from "@/api/generator-client"
import { DownloadLinks, type DownloadOption } from "@/components/DownloadLinks"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Button } from "@/components/ui/button"
import { Input } from "@/components/ui/input"
import { Label } from "@/components/ui/label"
import { Select } from "@/components/ui/select"
import { Textarea } from "@/components/ui/textarea"
import { useGeneration } from "@/hooks/useGeneration"
import { GenerationResult } from "./GenerationResult"

export const COVER_LETTER_REQUIRED_MESSAGE = "Please fill in all required fields"

const COVER_LETTER_DOWNLOADS: readonly DownloadOption[] = [
  { label: "Download Cover Letter", ...ARTIFACT_FILES.coverLetterMarkdown },
]

const isTone = (value: string): value is CoverLetterTone => COVER_LETTER_TONES.some((tone) => tone === value)
const isLength = (value: string): value is CoverLetterLength =>
  COVER_LETTER_LENGTHS.some((length) => length === value)

export function CoverLetterTab({ profile }: { profile: ProfileRecord }) {
  const { content, busy, error, generate } = useGeneration("coverLetter")
  const [companyName, setCompanyName] = useState("")
  const [hiringManager, setHiringManager] = useState("")
  const [jobTitle, setJobTitle] = useState("")
  const [jobDescription, setJobDescription] = useState("")
  const [tone, setTone] = useState<CoverLetterTone>("Professional")
  const [length, setLength] = useState<CoverLetterLength>("Standard")
  const [validationError, setValidationError] = useState<string | null>(null)

  const handleGenerate = () => {
    if (!companyName.trim() || !jobTitle.trim() || !jobDescription.trim()) {
      setValidationError(COVER_LETTER_REQUIRED_MESSAGE)
      return
    }
    setValidationError(null)
    void generate(() =>
      generatorClient.generateCoverLetter({
        profile,
        companyName,
        hiringManager,
        jobTitle,
        jobDescription,
        tone,
        length,
      })
    )
  }

  return (
    <div className="space-y-6">
      <h2 className="text-xl font-semibold">AI Cover Letter Generator</h2>

      <div className="grid gap-6 md:grid-cols-2">
        <div className="space-y-4">
          <div className="space-y-1.5">
            <Label htmlFor="cover-company">Company Name*</Label>
            <Input
              id="cover-company"
              placeholder="Tech Innovations Inc."
              value={companyName}
              onChange={(event) => setCompanyName(event.target.value)}
            />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="cover-manager">Hiring Manager Name (optional)</Label>
            <Input
              id="cover-manager"
              placeholder="Jane Smith"
              value={hiringManager}
              onChange={(event) => setHiringManager(event.target.value)}
            />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="cover-job-title">Job Title*</Label>
            <Input
              id="cover-job-title"
              placeholder="Senior Software Engineer"
              value={jobTitle}
              onChange={(event) => setJobTitle(event.target.value)}
            />
          </div>
        </div>

        <div className="space-y-4">
          <div className="space-y-1.5">
            <Label htmlFor="cover-tone">Tone Style</Label>
            <Select
              id="cover-tone"
              options={COVER_LETTER_TONES}
              value={tone}
              onChange={(event) => {
                if (isTone(event.target.value)) setTone(event.target.value)
              }}
            />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="cover-length">Length</Label>
            <Select
              id="cover-length"
              options={COVER_LETTER_LENGTHS}
              value={length}
              onChange={(event) => {
                if (isLength(event.target.value)) setLength(event.target.value)
              }}
            />
          </div>
        </div>
      </div>

      <div className="space-y-1.5">
        <Label htmlFor="cover-job-description">Job Description*</Label>
        <Textarea
          id="cover-job-description"
          rows={8}
          placeholder="Paste the complete job description here..."
          value={jobDescription}
          onChange={(event) => setJobDescription(event.target.value)}
        />
      </div>

      <Button size="lg" className="w-full" onClick={handleGenerate} disabled={busy}>
        <Mail aria-hidden />
        {busy ? "Writing your personalized cover letter..." : "Generate Cover Letter"}
      </Button>

      {validationError && (
        <Alert variant="destructive">
          <AlertDescription>{validationError}</AlertDescription>
        </Alert>
      )}

      <GenerationResult
        title="Your Generated Cover Letter"
        content={content}
        error={error}
        aside={content !== undefined && <DownloadLinks content={content} options={COVER_LETTER_DOWNLOADS} />}
      />
    </div>
  )
}
