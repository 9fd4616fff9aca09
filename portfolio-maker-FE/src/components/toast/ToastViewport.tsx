import { createPortal } from "react-dom"
import { CircleAlert, X } from "lucide-react"
import { dismissToast, useToastStore } from "./toast-store"

export const ToastViewport = () => {
  const toasts = useToastStore()

  if (toasts.length === 0) return null

  return createPortal(
    <div className="fixed top-4 right-4 z-50 flex max-w-sm flex-col gap-3" aria-live="polite">
      {toasts.map(toast => (
        <div
          key={toast.id}
          role="alert"
          className="flex w-full items-start justify-between gap-2 rounded-lg border border-rose-200 bg-rose-50 px-4 py-3 text-rose-900 shadow-lg"
        >
          <div className="flex gap-2">
            <CircleAlert className="mt-0.5 h-4 w-4 shrink-0" aria-hidden />
            <div className="flex flex-col">
              <p className="text-sm font-semibold leading-tight">{toast.title}</p>
              {toast.description && <p className="mt-1 text-xs leading-snug opacity-80">{toast.description}</p>}
            </div>
          </div>
          <button
            type="button"
            onClick={() => dismissToast(toast.id)}
            aria-label="Dismiss notification"
            className="rounded-full p-1 transition hover:bg-black/5"
          >
            <X className="h-4 w-4" aria-hidden />
          </button>
        </div>
      ))}
    </div>,
    document.body
  )
}

export default ToastViewport
