import type { PortfolioTemplate } from "./api/generator.types"

/**
 * Portfolio layouts offered in the templates gallery.
 */
export const PORTFOLIO_TEMPLATES: readonly PortfolioTemplate[] = [
  {
    name: "Modern Professional",
    description: "Clean, ATS-friendly design with focus on content",
    features: ["Single column", "Professional fonts", "Skill tags", "Project highlights"],
  },
  {
    name: "Creative Showcase",
    description: "Visual-focused template for designers and creatives",
    features: ["Two-column layout", "Project galleries", "Color accents", "Custom sections"],
  },
  {
    name: "Tech Portfolio",
    description: "Optimized for developers and technical roles",
    features: ["Code snippets", "Technology stack", "GitHub integration", "Live demos"],
  },
  {
    name: "Executive Profile",
    description: "Sophisticated design for senior and executive roles",
    features: ["Minimalist design", "Achievement metrics", "Leadership focus", "Testimonials"],
  },
]
