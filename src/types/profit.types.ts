/**
 * Profit module types
 * Type definitions for single-unit profit calculations
 */

/**
 * How ad spend is derived: from a target CPA or from a target ROAS
 */
export type CalculationMode = 'CPA' | 'ROAS'

/**
 * Calculator inputs
 * `modeValue` is the desired CPA ($) in CPA mode, the desired ROAS in ROAS mode
 */
export interface ProfitInputs {
  productPrice: number
  cogs: number
  mode: CalculationMode
  modeValue: number
}

export interface BreakevenMetrics {
  readonly breakevenCpa: number
  readonly breakevenRoas: number
}

export interface AdSpendResolution {
  readonly adSpend: number
  readonly cpa: number
  readonly roas: number
}

/**
 * Output record of one calculation
 * Values are unrounded; formatting happens in the display layer
 */
export interface ProfitCalculationResult extends BreakevenMetrics, AdSpendResolution {
  readonly shopifyFees: number
  readonly profit: number
}

/**
 * Display strings for the result metrics
 */
export interface ProfitDisplayMetrics {
  shopifyFees: string
  adSpend: string
  cpa: string
  roas: string
  profit: string
  profitMargin: string
  breakevenCpa: string
  breakevenRoas: string
}

/**
 * Calculation response: inputs echoed back, raw result and formatted metrics
 */
export interface ProfitReport {
  inputs: ProfitInputs
  result: ProfitCalculationResult
  display: ProfitDisplayMetrics
}
