import type { Request, Response, NextFunction } from 'express'
import { matchedData } from 'express-validator'
import * as chartsService from './charts.service'
import { costDistributionQuerySchema } from './charts.validation'
import { calculateUnitProfit } from '../profit.service'
import { logger } from '../../../config/logger'

/**
 * GET /profit/charts/cost-distribution
 * Cost distribution (COGS, Shopify Fees, Ad Spend, Profit) of one unit
 *
 * Query Parameters:
 * - productPrice, cogs, modeValue: non-negative numbers (required)
 * - mode: 'CPA' | 'ROAS' (required)
 * - chartType: 'pie' | 'bar' (optional, defaults to pie)
 */
export async function getCostDistributionChart(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { chartType, ...input } = costDistributionQuerySchema.parse(matchedData(req))

    const result = calculateUnitProfit(input)
    const chart = chartsService.buildCostDistributionChart(input.cogs, result, chartType)

    res.status(200).json({ success: true, data: chart })
  } catch (error) {
    logger.error('Failed to get cost distribution chart', { error, query: req.query })
    next(error)
  }
}
