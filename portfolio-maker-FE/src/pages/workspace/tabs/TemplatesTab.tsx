import { PORTFOLIO_TEMPLATES } from "@shared/types"
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card"

/** Static gallery of portfolio layouts. */
export function TemplatesTab() {
  return (
    <div className="space-y-6">
      <h2 className="text-xl font-semibold">Portfolio Templates</h2>
      <div className="grid gap-4 md:grid-cols-2">
        {PORTFOLIO_TEMPLATES.map((template) => (
          <Card key={template.name}>
            <CardHeader>
              <CardTitle className="text-base">{template.name}</CardTitle>
              <CardDescription>{template.description}</CardDescription>
            </CardHeader>
            <CardContent>
              <ul className="ml-5 list-disc text-sm">
                {template.features.map((feature) => (
                  <li key={feature}>{feature}</li>
                ))}
              </ul>
            </CardContent>
          </Card>
        ))}
      </div>
    </div>
  )
}
