import { act, render, screen } from "@testing-library/react"
import userEvent from "@testing-library/user-event"
import { describe, expect, it } from "vitest"
import { toast, ToastViewport } from "@/components/toast"

describe("ToastViewport", () => {
  it("renders nothing until an error is pushed", () => {
    render(<ToastViewport />)
    expect(screen.queryByRole("alert")).not.toBeInTheDocument()
  })

  it("shows error toasts and dismisses them on click", async () => {
    const user = userEvent.setup()
    render(<ToastViewport />)

    act(() => {
      toast.error({ title: "Request failed", description: "Service unavailable" })
    })

    const alert = screen.getByRole("alert")
    expect(alert).toHaveTextContent("Request failed")
    expect(alert).toHaveTextContent("Service unavailable")

    await user.click(screen.getByRole("button", { name: "Dismiss notification" }))
    expect(screen.queryByRole("alert")).not.toBeInTheDocument()
  })
})
