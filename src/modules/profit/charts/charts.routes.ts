import { Router } from 'express'
import * as chartsController from './charts.controller'
import { validateRequest } from '../../../middlewares/validation.middleware'
import { validateCostDistributionQuery } from './charts.validation'

const router = Router()

router.get(
  '/cost-distribution',
  ...validateCostDistributionQuery,
  validateRequest,
  chartsController.getCostDistributionChart
)

export default router
