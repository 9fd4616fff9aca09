import type { Express } from 'express'
import request from 'supertest'
import { buildProfileRecord, type ProfileFormInput, type ProfileRecord } from '@shared/types'
import { getDb } from '../../src/db/sqlite'

export const TEST_CREDENTIALS = { username: 'jane', password: 'test-password' }

export const SAMPLE_FORM: ProfileFormInput = {
  full_name: 'Jane Doe',
  email: 'jane@example.com',
  github_url: 'https://github.com/jane',
  target_position: 'Engineer',
  target_industry: 'Technology',
  experience_level: 'Mid-Level',
  company: 'Acme',
  job_title: 'Developer',
  start_date: '2021-03',
  current_job: true,
  institution: 'State University',
  degree: 'BSc Computer Science',
  technical_skills: 'TypeScript, SQL',
  soft_skills: 'Communication',
  certifications: 'Cloud Practitioner',
}

export function sampleProfile(): ProfileRecord {
  const result = buildProfileRecord(SAMPLE_FORM)
  if (!result.ok) throw new Error(`Sample form is missing ${result.missing.join(', ')}`)
  return result.profile
}

export function resetStore(): void {
  const db = getDb()
  db.prepare('DELETE FROM documents').run()
  db.prepare('DELETE FROM sessions').run()
}

/** Register and log in, returning an agent that carries the session cookie. */
export async function signedInAgent(app: Express) {
  const agent = request.agent(app)
  await agent
    .post('/api/auth/register')
    .send({ ...TEST_CREDENTIALS, confirm: TEST_CREDENTIALS.password })
    .expect(201)
  await agent.post('/api/auth/login').send(TEST_CREDENTIALS).expect(200)
  return agent
}
