import { logger } from '../../config/logger'
import { AppError } from '../../middlewares/error.middleware'
import { formatCurrency, formatPercentage, formatRatio } from '../../utils/currency'
import { calculate, calculateMargin } from './calculations'
import type {
  CalculationMode,
  ProfitCalculationResult,
  ProfitDisplayMetrics,
  ProfitInputs,
  ProfitReport,
} from '../../types/profit.types'

/**
 * Profit Service
 *
 * Binds the pure calculator to the API:
 * - Runs a single-unit calculation
 * - Formats results as currency / ratio strings
 * - Supplies the calculator's starting inputs
 */

export const DEFAULT_PRODUCT_PRICE = 82.99
export const DEFAULT_COGS = 10
export const DEFAULT_MODE: CalculationMode = 'CPA'

/**
 * Starting target per mode: $20 CPA, or a 2.0 ROAS
 */
export const DEFAULT_MODE_VALUES: Record<CalculationMode, number> = {
  CPA: 20,
  ROAS: 2,
}

export function getDefaultInputs(mode: CalculationMode = DEFAULT_MODE): ProfitInputs {
  return {
    productPrice: DEFAULT_PRODUCT_PRICE,
    cogs: DEFAULT_COGS,
    mode,
    modeValue: DEFAULT_MODE_VALUES[mode],
  }
}

export function calculateUnitProfit(input: ProfitInputs): ProfitCalculationResult {
  const result = calculate(input.productPrice, input.cogs, input.mode, input.modeValue)

  // Infinity serializes as null
  const overflowed = Object.entries(result).filter(([, value]) => !Number.isFinite(value))
  if (overflowed.length > 0) {
    logger.warn('Unit profit calculation overflowed', { input, fields: overflowed.map(([key]) => key) })
    throw new AppError('Inputs produce values too large to calculate', 400)
  }

  logger.debug('Calculated unit profit', { input, result })

  return result
}

/**
 * Format a result the way the calculator displays it
 * Margin is profit as a percentage of the product price
 */
export function formatProfitMetrics(productPrice: number, result: ProfitCalculationResult): ProfitDisplayMetrics {
  return {
    shopifyFees: formatCurrency(result.shopifyFees),
    adSpend: formatCurrency(result.adSpend),
    cpa: formatCurrency(result.cpa),
    roas: formatRatio(result.roas),
    profit: formatCurrency(result.profit),
    profitMargin: formatPercentage(calculateMargin(productPrice, productPrice - result.profit)),
    breakevenCpa: formatCurrency(result.breakevenCpa),
    breakevenRoas: formatRatio(result.breakevenRoas),
  }
}

export function buildProfitReport(input: ProfitInputs): ProfitReport {
  const result = calculateUnitProfit(input)

  return {
    inputs: { ...input },
    result,
    display: formatProfitMetrics(input.productPrice, result),
  }
}
