import { Router } from 'express'
import {
  ApiErrorCode,
  savePortfolioRequestSchema,
  type PortfolioResponseData,
  type SavePortfolioResponseData,
} from '@shared/types'
import { ApiHttpError } from '../../middleware/api-error'
import { getSessionAccount } from '../../middleware/session-auth'
import { success } from '../../utils/api-response'
import { getAuthService } from '../auth/auth.service'

/**
 * Portfolio persistence for the signed-in account. Mount behind requireSession.
 */
export function buildPortfolioRouter() {
  const router = Router()

  router.get('/', (req, res) => {
    const { username } = getSessionAccount(req)
    const data: PortfolioResponseData = { portfolio: getAuthService().loadPortfolio(username) }
    res.json(success(data))
  })

  router.put('/', (req, res) => {
    const { username } = getSessionAccount(req)
    const parsed = savePortfolioRequestSchema.safeParse(req.body)
    if (!parsed.success) {
      throw new ApiHttpError(ApiErrorCode.VALIDATION_FAILED, 'Portfolio data is invalid', {
        details: { errors: parsed.error.flatten().fieldErrors },
      })
    }

    getAuthService().savePortfolio(username, parsed.data.portfolio)
    const data: SavePortfolioResponseData = { saved: true }
    res.json(success(data, 'Portfolio data saved successfully!'))
  })

  return router
}
