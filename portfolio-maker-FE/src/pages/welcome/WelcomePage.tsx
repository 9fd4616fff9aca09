import { FileText, Link2, Mail, Palette, Rocket } from "lucide-react"
import type { LucideIcon } from "lucide-react"
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card"

interface Feature {
  title: string
  caption: string
  icon: LucideIcon
}

const FEATURES: readonly Feature[] = [
  { title: "ATS-Optimized Resumes", caption: "Get past automated screening systems", icon: FileText },
  { title: "LinkedIn & GitHub Analysis", caption: "Extract insights from your profiles", icon: Link2 },
  { title: "Personalized Cover Letters", caption: "Tailored to each job application", icon: Mail },
  { title: "Professional Templates", caption: "Multiple designs for different industries", icon: Palette },
]

export function WelcomePage() {
  return (
    <div className="grid gap-8 lg:grid-cols-3">
      <section className="space-y-6 lg:col-span-2">
        <h2 className="text-2xl font-bold">Create Professional Resumes &amp; Portfolios with AI</h2>
        <p className="text-muted-foreground">
          Portfolio Maker uses AI to turn your experience and skills into resumes, cover letters and
          portfolio content that stand out to employers.
        </p>
        <h3 className="text-lg font-semibold">What You Can Create:</h3>
        <div className="grid gap-4 sm:grid-cols-2">
          {FEATURES.map(({ title, caption, icon: Icon }) => (
            <Card key={title}>
              <CardHeader>
                <CardTitle className="flex items-center gap-2 text-base">
                  <Icon className="h-5 w-5 text-indigo-600" aria-hidden />
                  {title}
                </CardTitle>
                <CardDescription>{caption}</CardDescription>
              </CardHeader>
            </Card>
          ))}
        </div>
      </section>

      <Card className="self-start text-center">
        <CardHeader>
          <CardTitle className="text-indigo-600">Get Started</CardTitle>
        </CardHeader>
        <CardContent className="space-y-4">
          <p>Login or register to start building your professional portfolio</p>
          <Rocket className="mx-auto h-12 w-12 text-indigo-600" aria-hidden />
          <p className="text-xs text-muted-foreground">Use the sidebar to create your account</p>
        </CardContent>
      </Card>
    </div>
  )
}
