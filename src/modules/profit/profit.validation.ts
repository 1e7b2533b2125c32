import { z } from 'zod'
import { query } from 'express-validator'
import { DEFAULT_COGS, DEFAULT_MODE, DEFAULT_MODE_VALUES, DEFAULT_PRODUCT_PRICE } from './profit.service'

/**
 * Validation rules for profit calculation requests
 */

export const calculationModeSchema = z.enum(['CPA', 'ROAS'], {
  errorMap: () => ({ message: 'mode must be either CPA or ROAS' }),
})

function amountSchema(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite(`${field} must be a finite number`)
    .nonnegative(`${field} must be non-negative`)
}

/**
 * Calculate request body
 *
 * Omitted fields fall back to the calculator's starting values;
 * `modeValue` falls back to the default target of the chosen mode.
 */
export const calculateProfitSchema = z
  .object({
    productPrice: amountSchema('productPrice').default(DEFAULT_PRODUCT_PRICE),
    cogs: amountSchema('cogs').default(DEFAULT_COGS),
    mode: calculationModeSchema.default(DEFAULT_MODE),
    modeValue: amountSchema('modeValue').optional(),
  })
  .transform((val) => ({
    ...val,
    modeValue: val.modeValue ?? DEFAULT_MODE_VALUES[val.mode],
  }))

export type CalculateProfitInput = z.infer<typeof calculateProfitSchema>

/**
 * A repeated query key arrives as an array; express-validator would check
 * each element and let it through
 */
export const isSingleValue = (value: unknown) => value === undefined || typeof value === 'string'

export const modeQuery = () =>
  query('mode')
    .custom(isSingleValue)
    .withMessage('mode must be a single value')
    .bail()
    .isIn(['CPA', 'ROAS'])
    .withMessage('mode must be either CPA or ROAS')

export const validateDefaultsQuery = [modeQuery().optional()]

export const defaultsQuerySchema = z.object({
  mode: calculationModeSchema.default(DEFAULT_MODE),
})
