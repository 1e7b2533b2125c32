import { calculatePercentage, roundCurrency } from '../../../utils/currency'
import type { ProfitCalculationResult } from '../../../types/profit.types'
import type {
  ChartType,
  CostDistributionChart,
  CostSegment,
  CostSegmentLabel,
  SegmentColor,
} from '../../../types/charts.types'

export const COST_DISTRIBUTION_TITLE = 'Cost Distribution (Single Unit)'

/**
 * Fixed colour per segment, identical across chart types
 */
export const SEGMENT_COLORS: Record<CostSegmentLabel, SegmentColor> = {
  COGS: 'blue',
  'Shopify Fees': 'orange',
  'Ad Spend': 'red',
  Profit: 'green',
}

export const BAR_AXIS_LABELS = { x: 'Segments', y: 'Amount ($)' }

/**
 * Build the cost distribution of one unit's price
 *
 * Segments always come in the order COGS, Shopify Fees, Ad Spend, Profit.
 * Negative values (a loss-making profit, a negative COGS from a bad caller)
 * are drawn as 0; the calculation result itself is left untouched.
 */
export function buildCostDistributionChart(
  cogs: number,
  result: ProfitCalculationResult,
  chartType: ChartType = 'pie'
): CostDistributionChart {
  const magnitudes: Array<[CostSegmentLabel, number]> = [
    ['COGS', cogs],
    ['Shopify Fees', result.shopifyFees],
    ['Ad Spend', result.adSpend],
    ['Profit', result.profit],
  ]

  const clamped = magnitudes.map(([label, value]): [CostSegmentLabel, number] => [label, Math.max(0, value)])
  const total = clamped.reduce((sum, [, value]) => sum + value, 0)

  const segments: CostSegment[] = clamped.map(([label, value]) => ({
    label,
    value,
    color: SEGMENT_COLORS[label],
    share: calculatePercentage(value, total),
  }))

  return {
    type: chartType,
    title: COST_DISTRIBUTION_TITLE,
    segments,
    total: roundCurrency(total),
    ...(chartType === 'bar' && { axisLabels: { ...BAR_AXIS_LABELS } }),
  }
}
