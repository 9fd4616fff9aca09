import { describe, expect, it } from 'vitest'
import { analyzeGitHub, analyzeLinkedIn, analyzeLinks } from '../link-analyzers'

describe('link analyzers', () => {
  it('returns the same sample insights for any LinkedIn URL', () => {
    const first = analyzeLinkedIn('https://linkedin.com/in/a')
    const second = analyzeLinkedIn('not a url')

    expect(first).toEqual(second)
    expect(first.simulated).toBe(true)
    expect(first.skills).toContain('Project Management')
  })

  it('returns sample GitHub insights', () => {
    expect(analyzeGitHub('https://github.com/a').programming_languages).toEqual(['Python', 'JavaScript', 'Java'])
  })

  it('only analyzes the links that are filled in', () => {
    expect(analyzeLinks({ linkedin: '', github: '' })).toEqual({})
    expect(Object.keys(analyzeLinks({ linkedin: 'https://linkedin.com/in/a', github: '' }))).toEqual(['linkedin'])
    expect(Object.keys(analyzeLinks({ linkedin: 'x', github: 'y' }))).toEqual(['linkedin', 'github'])
  })
})
