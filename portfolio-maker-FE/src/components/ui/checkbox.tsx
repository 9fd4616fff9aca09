import { forwardRef, type InputHTMLAttributes } from "react"

import { cn } from "@/lib/utils"

const Checkbox = forwardRef<HTMLInputElement, Omit<InputHTMLAttributes<HTMLInputElement>, "type">>(
  ({ className, ...props }, ref) => (
    <input
      type="checkbox"
      ref={ref}
      className={cn("peer h-4 w-4 shrink-0 rounded-sm border border-primary accent-primary", className)}
      {...props}
    />
  )
)
Checkbox.displayName = "Checkbox"

export { Checkbox }
