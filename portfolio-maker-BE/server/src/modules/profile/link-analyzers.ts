/**
 * Link analyzers for LinkedIn and GitHub profile URLs.
 *
 * These return fixed sample insights regardless of the URL: no profile is
 * fetched or scraped. Results are marked `simulated` so the UI can say so.
 */

import type { GitHubInsights, LinkedInInsights, LinksData, PersonalInfo } from '@shared/types'
import { logger } from '../../logger'

const log = logger.child({ module: 'LinkAnalyzers' })

export function analyzeLinkedIn(profileUrl: string): LinkedInInsights {
  log.debug({ profileUrl }, 'Simulating LinkedIn profile analysis')
  return {
    simulated: true,
    skills: ['Python', 'Machine Learning', 'Data Analysis', 'SQL', 'Project Management'],
    experience: '3+ years in software development',
    education: "Bachelor's in Computer Science",
    certifications: ['AWS Certified', 'Google Data Analytics'],
    summary: 'Experienced professional with strong technical background',
  }
}

export function analyzeGitHub(profileUrl: string): GitHubInsights {
  log.debug({ profileUrl }, 'Simulating GitHub profile analysis')
  return {
    simulated: true,
    programming_languages: ['Python', 'JavaScript', 'Java'],
    projects: ['Machine Learning Portfolio', 'Web Application', 'Data Analysis Tool'],
    technologies: ['React', 'Node.js', 'MongoDB', 'TensorFlow'],
    activity: 'Active contributor with multiple repositories',
  }
}

/**
 * Run the analyzers for whichever profile URLs are filled in.
 */
export function analyzeLinks(info: Pick<PersonalInfo, 'linkedin' | 'github'>): LinksData {
  const links: LinksData = {}
  if (info.linkedin) links.linkedin = analyzeLinkedIn(info.linkedin)
  if (info.github) links.github = analyzeGitHub(info.github)
  return links
}
