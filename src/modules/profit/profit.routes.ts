import { Router } from 'express'
import * as profitController from './profit.controller'
import chartsRoutes from './charts/charts.routes'
import { validate, validateRequest } from '../../middlewares/validation.middleware'
import { calculateProfitSchema, validateDefaultsQuery } from './profit.validation'

/**
 * Profit routes
 *
 * Endpoints:
 * - GET /profit/defaults - Get the calculator's starting inputs
 * - POST /profit/calculate - Calculate single-unit profit and breakeven metrics
 * - /profit/charts/* - Chart endpoints (see charts.routes.ts)
 */

const router = Router()

router.get('/defaults', ...validateDefaultsQuery, validateRequest, profitController.getDefaults)
router.post('/calculate', validate(calculateProfitSchema), profitController.calculateProfit)

// Charts routes
router.use('/charts', chartsRoutes)

export default router
