/**
 * API configuration for the Portfolio Maker backend.
 *
 * Every environment points at its API through `VITE_API_BASE_URL`. In
 * development the current hostname is used so other devices on the network
 * can reach the dev server.
 */

import { API_TIMEOUT_MS, API_RETRY_DELAY_MS } from "./constants"

const DEFAULT_API_PORT = "8080"

export function resolveApiBaseUrl(): string {
  if (import.meta.env.VITE_API_BASE_URL) {
    return import.meta.env.VITE_API_BASE_URL.replace(/\/$/, "")
  }

  if (import.meta.env.DEV && typeof window !== "undefined") {
    const port = import.meta.env.VITE_API_PORT || DEFAULT_API_PORT
    return `http://${window.location.hostname}:${port}`
  }

  return `http://localhost:${DEFAULT_API_PORT}`
}

/**
 * Getters keep the URL dynamic in development
 */
export const API_CONFIG = {
  get baseUrl() {
    return `${resolveApiBaseUrl()}/api`
  },
  timeout: API_TIMEOUT_MS,
  retryAttempts: 3,
  retryDelay: API_RETRY_DELAY_MS,
}
