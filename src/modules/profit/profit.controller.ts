import type { Request, Response, NextFunction } from 'express'
import { matchedData } from 'express-validator'
import * as profitService from './profit.service'
import { calculateProfitSchema, defaultsQuerySchema } from './profit.validation'
import { logger } from '../../config/logger'

/**
 * Profit Controller
 *
 * Handles HTTP requests and responses for single-unit profit calculations
 * Delegates business logic to profit.service
 */

/**
 * GET /profit/defaults
 * Get the calculator's starting inputs
 *
 * Query Parameters:
 * - mode: 'CPA' | 'ROAS' (optional, defaults to CPA)
 *
 * Returns: ProfitInputs
 */
export async function getDefaults(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { mode } = defaultsQuerySchema.parse(matchedData(req))

    res.status(200).json({
      success: true,
      data: profitService.getDefaultInputs(mode),
    })
  } catch (error) {
    logger.error('Failed to get default inputs', { error })
    next(error)
  }
}

/**
 * POST /profit/calculate
 * Calculate fees, ad spend, CPA, ROAS, profit and breakeven metrics for one unit
 *
 * Body:
 * - productPrice: number >= 0 (default 82.99)
 * - cogs: number >= 0 (default 10)
 * - mode: 'CPA' | 'ROAS' (default CPA)
 * - modeValue: desired CPA or desired ROAS, >= 0 (default 20 / 2)
 *
 * Returns: ProfitReport
 *
 * Example Response:
 * {
 *   "success": true,
 *   "data": {
 *     "inputs": { "productPrice": 100, "cogs": 20, "mode": "ROAS", "modeValue": 2 },
 *     "result": { "shopifyFees": 3.2, "adSpend": 50, "cpa": 50, "roas": 2, "profit": 26.8, ... },
 *     "display": { "adSpend": "$50.00", "roas": "2.00", "profit": "$26.80", ... }
 *   }
 * }
 */
export async function calculateProfit(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const input = calculateProfitSchema.parse(req.body)
    const result = profitService.buildProfitReport(input)

    res.status(200).json({
      success: true,
      data: result,
    })
  } catch (error) {
    logger.error('Failed to calculate profit', { error, body: req.body })
    next(error)
  }
}
