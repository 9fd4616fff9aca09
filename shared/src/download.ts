/**
 * Download links for generated artifacts.
 *
 * Artifacts never touch the server's disk: the text is base64-encoded (as
 * UTF-8) into a data URI that the browser saves under the given filename.
 */

export type ArtifactMimeType = "text/markdown" | "text/plain"

export interface DownloadLink {
  href: string
  filename: string
  mimeType: ArtifactMimeType
}

export const ARTIFACT_FILES = {
  resumeMarkdown: { filename: "resume.md", mimeType: "text/markdown" },
  resumeText: { filename: "resume.txt", mimeType: "text/plain" },
  coverLetterMarkdown: { filename: "cover_letter.md", mimeType: "text/markdown" },
} as const satisfies Record<string, { filename: string; mimeType: ArtifactMimeType }>

export function encodeBase64Utf8(content: string): string {
  const bytes = new TextEncoder().encode(content)
  let binary = ""
  for (const byte of bytes) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
}

export function buildDownloadLink(
  content: string,
  filename: string,
  mimeType: ArtifactMimeType = "text/plain"
): DownloadLink {
  return {
    href: `data:${mimeType};base64,${encodeBase64Utf8(content)}`,
    filename,
    mimeType,
  }
}
