import { Download } from "lucide-react"
import { buildDownloadLink, type ArtifactMimeType } from "@shared/types"
import { buttonVariants } from "@/components/ui/button"
import { cn } from "@/lib/utils"

export interface DownloadOption {
  label: string
  filename: string
  mimeType: ArtifactMimeType
}

interface DownloadLinksProps {
  content: string
  options: readonly DownloadOption[]
}

export function DownloadLinks({ content, options }: DownloadLinksProps) {
  return (
    <div className="flex flex-col gap-2">
      {options.map((option) => {
        const link = buildDownloadLink(content, option.filename, option.mimeType)
        return (
          <a
            key={option.filename}
            href={link.href}
            download={link.filename}
            className={cn(buttonVariants({ variant: "outline", size: "sm" }), "justify-start")}
          >
            <Download aria-hidden />
            {option.label}
          </a>
        )
      })}
    </div>
  )
}
