import Markdown from "react-markdown"
import { cn } from "@/lib/utils"

interface MarkdownViewProps {
  content: string
  className?: string
}

/** Renders generated markdown. Raw HTML in model output is not rendered. */
export function MarkdownView({ content, className }: MarkdownViewProps) {
  return (
    <div
      className={cn(
        "space-y-3 text-sm leading-relaxed [&_h1]:text-2xl [&_h1]:font-bold [&_h2]:text-xl [&_h2]:font-semibold [&_h3]:font-semibold [&_li]:ml-5 [&_ul]:list-disc [&_ol]:list-decimal",
        className
      )}
      data-testid="markdown-view"
    >
      <Markdown>{content}</Markdown>
    </div>
  )
}
