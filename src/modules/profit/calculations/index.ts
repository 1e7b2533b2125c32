import type {
  AdSpendResolution,
  BreakevenMetrics,
  CalculationMode,
  ProfitCalculationResult,
} from '../../../types/profit.types'

/**
 * Profit calculation utilities
 *
 * Pure single-unit arithmetic. Nothing here validates, rounds or throws:
 * every zero or non-positive denominator maps to 0, and rounding is left
 * to the display layer.
 */

/** Percentage fee charged by Shopify Payments per transaction */
export const SHOPIFY_FEE_RATE = 0.029

/** Fixed fee charged by Shopify Payments per transaction */
export const SHOPIFY_FIXED_FEE = 0.3

/**
 * Calculate profit margin
 */
export function calculateMargin(revenue: number, cost: number): number {
  if (revenue === 0) return 0
  return ((revenue - cost) / revenue) * 100
}

/**
 * Calculate ROAS (Return on Ad Spend)
 */
export function calculateROAS(revenue: number, adSpend: number): number {
  if (adSpend <= 0) return 0
  return revenue / adSpend
}

/**
 * Shopify fees for a single transaction
 */
export function computeFees(productPrice: number): number {
  return SHOPIFY_FEE_RATE * productPrice + SHOPIFY_FIXED_FEE
}

/**
 * Breakeven metrics for a single unit
 *
 * Breakeven ad spend is whatever is left after COGS and fees, negative
 * included. Breakeven ROAS is reported as 0 when that ad spend is exactly 0.
 */
export function computeBreakeven(productPrice: number, cogs: number, shopifyFees: number): BreakevenMetrics {
  const breakevenAdSpend = productPrice - cogs - shopifyFees

  return {
    breakevenCpa: breakevenAdSpend,
    breakevenRoas: breakevenAdSpend !== 0 ? productPrice / breakevenAdSpend : 0,
  }
}

/**
 * Resolve ad spend, CPA and ROAS from the chosen mode
 *
 * - CPA: one unit's ad spend is its target CPA
 * - ROAS: ad spend is price / target ROAS; a target of 0 means "no target"
 *   and resolves everything to 0
 */
export function resolveAdSpend(mode: CalculationMode, modeValue: number, productPrice: number): AdSpendResolution {
  if (mode === 'CPA') {
    return {
      adSpend: modeValue,
      cpa: modeValue,
      roas: calculateROAS(productPrice, modeValue),
    }
  }

  if (modeValue > 0) {
    const adSpend = productPrice / modeValue
    return { adSpend, cpa: adSpend, roas: modeValue }
  }

  return { adSpend: 0, cpa: 0, roas: 0 }
}

/**
 * Single-unit profit, unclamped
 */
export function computeProfit(productPrice: number, cogs: number, shopifyFees: number, adSpend: number): number {
  return productPrice - cogs - shopifyFees - adSpend
}

/**
 * Run the full pipeline for one unit
 */
export function calculate(
  productPrice: number,
  cogs: number,
  mode: CalculationMode,
  modeValue: number
): ProfitCalculationResult {
  const shopifyFees = computeFees(productPrice)
  const { breakevenCpa, breakevenRoas } = computeBreakeven(productPrice, cogs, shopifyFees)
  const { adSpend, cpa, roas } = resolveAdSpend(mode, modeValue, productPrice)
  const profit = computeProfit(productPrice, cogs, shopifyFees, adSpend)

  return Object.freeze({
    shopifyFees,
    adSpend,
    cpa,
    roas,
    profit,
    breakevenCpa,
    breakevenRoas,
  })
}
