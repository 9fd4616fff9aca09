export { ToastViewport } from "./ToastViewport"
export { toast, clearToasts } from "./toast-store"
