import type {
  CoverLetterLength,
  CoverLetterTone,
  LinksData,
  ProfileRecord,
  ResumeOptions,
} from '@shared/types'

export type PromptKind = 'resume_writer' | 'cover_letter' | 'portfolio_analyzer' | 'skill_enhancer'

export type PromptVariable =
  | 'user_data'
  | 'target_position'
  | 'company_name'
  | 'job_description'
  | 'links'
  | 'original_content'

export type PromptVariables = Partial<Record<PromptVariable, string>>

export interface AssembledPrompt {
  systemPrompt: string
  userPrompt: string
}

export const PROMPT_TEMPLATES: Record<PromptKind, string> = {
  resume_writer: `You are an expert resume writer and career coach. Your task is to create professional, ATS-friendly resumes that highlight the user's strengths and achievements.

Key guidelines:
- Use industry-standard resume formatting
- Focus on quantifiable achievements and results
- Use action verbs and professional language
- Tailor content to the user's target industry
- Ensure ATS (Applicant Tracking System) compatibility
- Highlight relevant skills and certifications
- Keep it concise and impactful

User Profile:
{{user_data}}

Target Position: {{target_position}}

Generate a professional resume in markdown format with the following sections:
1. Professional Summary
2. Technical Skills
3. Work Experience (with bullet points emphasizing achievements)
4. Education
5. Projects
6. Certifications
7. Additional Sections (if relevant)`,

  cover_letter: `You are an expert cover letter writer. Create a compelling, personalized cover letter that complements the resume.

Key guidelines:
- Address the hiring manager professionally
- Connect the user's skills to the job requirements
- Show enthusiasm and cultural fit
- Include specific examples and achievements
- Keep it to one page
- Use professional but engaging tone

User Profile:
{{user_data}}

Target Position: {{target_position}}
Company: {{company_name}}
Job Description: {{job_description}}

Generate a professional cover letter in markdown format.`,

  portfolio_analyzer: `You are a portfolio analysis expert. Analyze the user's provided links and information to extract key skills, achievements, and project details.

Extract and organize:
1. Technical skills and proficiency levels
2. Key projects with descriptions and technologies used
3. Professional achievements and metrics
4. Education and certifications
5. Work experience details
6. Specialized knowledge areas

User Information:
{{user_data}}

Provided Links:
{{links}}

Provide a comprehensive analysis in JSON format for resume generation.`,

  skill_enhancer: `You are a career development expert. Enhance and professionalize the user's skill descriptions and achievements.

Transform basic descriptions into professional, impactful statements:
- Use industry-standard terminology
- Add quantifiable metrics where possible
- Focus on results and impact
- Use action-oriented language

Original Content:
{{original_content}}

Enhanced Version:`,
}

/** Fixed instruction text preceding the first interpolation point of each template. */
export function templatePreamble(kind: PromptKind): string {
  const template = PROMPT_TEMPLATES[kind]
  return template.slice(0, template.indexOf('{{')).trimEnd()
}

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g

function isPromptVariable(name: string): name is PromptVariable {
  return (
    name === 'user_data' ||
    name === 'target_position' ||
    name === 'company_name' ||
    name === 'job_description' ||
    name === 'links' ||
    name === 'original_content'
  )
}

/**
 * Interpolate a template. Absent variables render as empty text.
 */
export function renderTemplate(kind: PromptKind, variables: PromptVariables): string {
  return PROMPT_TEMPLATES[kind].replace(VARIABLE_PATTERN, (match, name: string) =>
    isPromptVariable(name) ? (variables[name] ?? '') : match
  )
}

/**
 * Readable structured text form of a (possibly partial) profile.
 */
export function serializeProfile(profile: unknown): string {
  return JSON.stringify(profile ?? {}, null, 2)
}

function serializeLinks(links: LinksData | undefined): string {
  return links && Object.keys(links).length ? JSON.stringify(links, null, 2) : 'None provided'
}

function lines(entries: Array<[label: string, value: string]>): string {
  return entries.map(([label, value]) => `${label}: ${value}`).join('\n')
}

export function buildResumePrompt(
  profile: ProfileRecord,
  links: LinksData | undefined,
  options: ResumeOptions
): AssembledPrompt {
  const userData = serializeProfile(profile)
  const sections = [
    options.includeSummary ? 'Professional Summary' : null,
    options.includeSkills ? 'Skills' : null,
    options.includeProjects ? 'Projects' : null,
  ].filter((section): section is string => section !== null)

  return {
    systemPrompt: renderTemplate('resume_writer', {
      user_data: userData,
      target_position: profile.career_goals.target_position,
    }),
    userPrompt: lines([
      ['User Data', userData],
      ['Links Data', serializeLinks(links)],
      ['Resume Style', options.style],
      ['Target Company', options.targetCompany],
      ['Job Description', options.jobDescription],
      ['Include Sections', sections.length ? sections.join(', ') : 'None'],
    ]),
  }
}

export interface CoverLetterParameters {
  companyName: string
  hiringManager: string
  jobTitle: string
  jobDescription: string
  tone: CoverLetterTone
  length: CoverLetterLength
}

export function buildCoverLetterPrompt(profile: ProfileRecord, params: CoverLetterParameters): AssembledPrompt {
  const userData = serializeProfile(profile)
  return {
    systemPrompt: renderTemplate('cover_letter', {
      user_data: userData,
      target_position: params.jobTitle || profile.career_goals.target_position,
      company_name: params.companyName,
      job_description: params.jobDescription,
    }),
    userPrompt: lines([
      ['User Data', userData],
      ['Company', params.companyName],
      ['Hiring Manager', params.hiringManager],
      ['Job Title', params.jobTitle],
      ['Job Description', params.jobDescription],
      ['Tone', params.tone],
      ['Length', params.length],
    ]),
  }
}

export function buildPortfolioAnalysisPrompt(profile: ProfileRecord, links: LinksData | undefined): AssembledPrompt {
  const userData = serializeProfile(profile)
  const linksText = serializeLinks(links)
  return {
    systemPrompt: renderTemplate('portfolio_analyzer', { user_data: userData, links: linksText }),
    userPrompt: lines([
      ['User Data', userData],
      ['Links Data', linksText],
    ]),
  }
}

export function buildSkillEnhancerPrompt(originalContent: string): AssembledPrompt {
  return {
    systemPrompt: renderTemplate('skill_enhancer', { original_content: originalContent }),
    userPrompt: originalContent,
  }
}
