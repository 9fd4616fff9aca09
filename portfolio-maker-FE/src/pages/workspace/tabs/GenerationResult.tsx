import type { ReactNode } from "react"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card"
import { MarkdownView } from "@/components/MarkdownView"

interface GenerationResultProps {
  title: string
  content: string | undefined
  error: string | null
  aside?: ReactNode
}

/** Latest artifact of one kind, or the error from the last attempt. */
export function GenerationResult({ title, content, error, aside }: GenerationResultProps) {
  return (
    <>
      {error && (
        <Alert variant="destructive">
          <AlertDescription>{error}</AlertDescription>
        </Alert>
      )}
      {content !== undefined && (
        <div className="grid gap-4 lg:grid-cols-3">
          <Card className={aside ? "lg:col-span-2" : "lg:col-span-3"}>
            <CardHeader>
              <CardTitle>{title}</CardTitle>
            </CardHeader>
            <CardContent>
              <MarkdownView content={content} />
            </CardContent>
          </Card>
          {aside && <div className="space-y-4">{aside}</div>}
        </div>
      )}
    </>
  )
}
