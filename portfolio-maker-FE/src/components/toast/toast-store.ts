import { useEffect, useState } from "react"
import { TOAST_DURATION_MS } from "@/config/constants"

export interface ToastOptions {
  title: string
  description?: string
}

export interface Toast extends ToastOptions {
  id: string
}

type Listener = (toasts: Toast[]) => void

const listeners = new Set<Listener>()
let state: Toast[] = []
let nextId = 0

const notify = () => {
  const snapshot = [...state]
  listeners.forEach(listener => listener(snapshot))
}

export const dismissToast = (id: string) => {
  state = state.filter(toast => toast.id !== id)
  notify()
}

export const clearToasts = () => {
  state = []
  notify()
}

/** Failed requests are the only thing the app toasts about. */
export const toast = {
  error: (options: ToastOptions): string => {
    const id = `toast-${++nextId}`
    state = [...state, { id, ...options }]
    notify()
    window.setTimeout(() => dismissToast(id), TOAST_DURATION_MS)
    return id
  },
}

export const useToastStore = () => {
  const [toasts, setToasts] = useState<Toast[]>(state)

  useEffect(() => {
    listeners.add(setToasts)
    setToasts(state)
    return () => {
      listeners.delete(setToasts)
    }
  }, [])

  return toasts
}
