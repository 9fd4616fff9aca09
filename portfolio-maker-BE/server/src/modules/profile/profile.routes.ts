import { Router } from 'express'
import {
  ApiErrorCode,
  buildProfileRecord,
  profileFormSchema,
  type ProfileIntakeResponseData,
} from '@shared/types'
import { ApiHttpError } from '../../middleware/api-error'
import { success } from '../../utils/api-response'
import { analyzeLinks } from './link-analyzers'

export function buildProfileRouter() {
  const router = Router()

  /**
   * POST /api/profile/intake
   * Validate the raw form, build the profile record and attach link insights.
   */
  router.post('/intake', (req, res) => {
    const parsed = profileFormSchema.safeParse(req.body)
    if (!parsed.success) {
      throw new ApiHttpError(ApiErrorCode.INVALID_REQUEST, 'Invalid request', {
        status: 400,
        details: { errors: parsed.error.flatten().fieldErrors },
      })
    }

    const result = buildProfileRecord(parsed.data)
    if (!result.ok) {
      throw new ApiHttpError(ApiErrorCode.MISSING_FIELD, 'Please fill in all required fields (marked with *)', {
        details: { missing: result.missing },
      })
    }

    const data: ProfileIntakeResponseData = {
      profile: result.profile,
      links: analyzeLinks(result.profile.personal_info),
    }
    res.json(success(data, 'Data saved! Navigate to other tabs to generate documents.'))
  })

  return router
}
