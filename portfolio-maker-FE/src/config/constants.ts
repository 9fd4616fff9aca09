/**
 * Application-wide constants
 */

/** Default API request timeout in milliseconds */
export const API_TIMEOUT_MS = 30000

/** Generation requests stream a full document before responding */
export const GENERATION_TIMEOUT_MS = 120000

/** Default retry delay in milliseconds */
export const API_RETRY_DELAY_MS = 1000

/** Toast/notification duration in milliseconds */
export const TOAST_DURATION_MS = 6000
