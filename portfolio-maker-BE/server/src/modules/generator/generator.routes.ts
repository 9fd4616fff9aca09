import { Router } from 'express'
import type { ZodTypeAny, output } from 'zod'
import {
  ApiErrorCode,
  coverLetterRequestSchema,
  portfolioAnalysisRequestSchema,
  resumeRequestSchema,
  skillEnhanceRequestSchema,
} from '@shared/types'
import { ApiHttpError } from '../../middleware/api-error'
import { asyncHandler } from '../../utils/async-handler'
import { success } from '../../utils/api-response'
import { getGeneratorService } from './generator.service'

function parseBody<S extends ZodTypeAny>(schema: S, body: unknown): output<S> {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid request', {
      status: 400,
      details: { errors: parsed.error.flatten().fieldErrors },
    })
  }
  return parsed.data
}

function requireFilled(fields: Record<string, string>, message: string): void {
  const missing = Object.entries(fields)
    .filter(([, value]) => !value.trim())
    .map(([name]) => name)
  if (missing.length) {
    throw new ApiHttpError(ApiErrorCode.MISSING_FIELD, message, { details: { missing } })
  }
}

/**
 * Generation endpoints. Every route answers 200 with `{content, outcome}`;
 * provider failures show up as a non-"ok" outcome with placeholder content.
 */
export function buildGeneratorRouter() {
  const router = Router()

  router.post(
    '/resume',
    asyncHandler(async (req, res) => {
      const request = parseBody(resumeRequestSchema, req.body)
      res.json(success(await getGeneratorService().generateResume(request)))
    })
  )

  router.post(
    '/cover-letter',
    asyncHandler(async (req, res) => {
      const request = parseBody(coverLetterRequestSchema, req.body)
      requireFilled(
        {
          companyName: request.companyName,
          jobTitle: request.jobTitle,
          jobDescription: request.jobDescription,
        },
        'Please fill in all required fields'
      )
      res.json(success(await getGeneratorService().generateCoverLetter(request)))
    })
  )

  router.post(
    '/portfolio-analysis',
    asyncHandler(async (req, res) => {
      const request = parseBody(portfolioAnalysisRequestSchema, req.body)
      res.json(success(await getGeneratorService().analyzePortfolio(request)))
    })
  )

  router.post(
    '/enhance',
    asyncHandler(async (req, res) => {
      const { originalContent } = parseBody(skillEnhanceRequestSchema, req.body)
      requireFilled({ originalContent }, 'Please paste a description to enhance')
      res.json(success(await getGeneratorService().enhanceContent(originalContent.trim())))
    })
  )

  return router
}
