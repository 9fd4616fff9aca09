import { describe, expect, it } from "vitest"
import { ARTIFACT_FILES, buildDownloadLink, encodeBase64Utf8 } from "../download"

describe("buildDownloadLink", () => {
  it("encodes markdown into a data URI", () => {
    const link = buildDownloadLink("# Resume", ARTIFACT_FILES.resumeMarkdown.filename, "text/markdown")

    expect(link).toEqual({
      href: "data:text/markdown;base64,IyBSZXN1bWU=",
      filename: "resume.md",
      mimeType: "text/markdown",
    })
  })

  it("defaults to text/plain", () => {
    expect(buildDownloadLink("hi", "resume.txt").href).toBe("data:text/plain;base64,aGk=")
  })

  it("encodes non-ASCII text as UTF-8", () => {
    expect(encodeBase64Utf8("é")).toBe("w6k=")
  })
})
