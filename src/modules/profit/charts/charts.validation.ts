import { z } from 'zod'
import { query } from 'express-validator'
import { calculationModeSchema, isSingleValue, modeQuery } from '../profit.validation'

const amountQuery = (field: string) =>
  query(field)
    .exists({ values: 'falsy' })
    .withMessage(`${field} is required`)
    .bail()
    .custom(isSingleValue)
    .withMessage(`${field} must be a single value`)
    .bail()
    .isFloat({ min: 0 })
    .withMessage(`${field} must be a non-negative number`)
    .bail()
    .custom((value) => Number.isFinite(Number(value)))
    .withMessage(`${field} must be a finite number`)
    .toFloat()

export const validateCostDistributionQuery = [
  amountQuery('productPrice'),
  amountQuery('cogs'),
  modeQuery(),
  amountQuery('modeValue'),
  query('chartType')
    .optional()
    .custom(isSingleValue)
    .withMessage('chartType must be a single value')
    .bail()
    .isIn(['pie', 'bar'])
    .withMessage('chartType must be either pie or bar'),
]

/**
 * Shape of `matchedData(req)` once the chains above have passed
 */
export const costDistributionQuerySchema = z.object({
  productPrice: z.number(),
  cogs: z.number(),
  mode: calculationModeSchema,
  modeValue: z.number(),
  chartType: z.enum(['pie', 'bar']).default('pie'),
})
