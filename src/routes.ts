import { Router } from 'express'

import profitRoutes from './modules/profit/profit.routes'

/**
 * Central route registration
 */
export function registerRoutes(): Router {
  const router = Router()

  // Profit calculator routes
  router.use('/profit', profitRoutes)

  return router
}
